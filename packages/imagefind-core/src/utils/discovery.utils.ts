import { promises as fs } from 'fs';
import * as path from 'path';
import { ValidationError } from '../errors';
import type { TagGroup } from '../types/pipeline.types';
import { isImagePath } from './keys.utils';

/**
 * Recursively list image files under a directory, sorted
 */
export async function listImages(root: string): Promise<string[]> {
  const stats = await fs.stat(root);
  if (!stats.isDirectory()) {
    throw new ValidationError('Input must be a directory', { root });
  }

  const images: string[] = [];
  const pending = [path.resolve(root)];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile() && isImagePath(entry.name)) {
        images.push(fullPath);
      }
    }
  }

  return images.sort();
}

/**
 * Path of `filePath` relative to `root`, with POSIX separators
 */
export function toRelativePosix(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}

/**
 * Group probe images by folder.
 * A directory yields one group per folder holding images directly, tagged with the
 * folder path relative to the input's parent; a file yields a single group tagged
 * with its parent folder name.
 */
export async function groupProbeImages(input: string): Promise<TagGroup[]> {
  const resolved = path.resolve(input);
  const stats = await fs.stat(resolved);

  if (!stats.isDirectory()) {
    if (!isImagePath(resolved)) {
      throw new ValidationError('Invalid image format', { input: resolved });
    }
    return [{ tag: path.basename(path.dirname(resolved)), files: [resolved] }];
  }

  const base = path.dirname(resolved);
  const byFolder = new Map<string, string[]>();

  for (const file of await listImages(resolved)) {
    const tag = toRelativePosix(base, path.dirname(file));
    const files = byFolder.get(tag);
    if (files) {
      files.push(file);
    } else {
      byFolder.set(tag, [file]);
    }
  }

  return Array.from(byFolder.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([tag, files]) => ({ tag, files }));
}

/**
 * Default output: "<parent>/output" for a directory, the parent folder for a file
 */
export async function defaultOutputDir(input: string): Promise<string> {
  const resolved = path.resolve(input);
  const stats = await fs.stat(resolved);
  const parent = path.dirname(resolved);
  return stats.isDirectory() ? path.join(parent, 'output') : parent;
}

/**
 * Resolve `relative` under `root`, refusing anything that escapes it
 */
export function resolveInside(root: string, relative: string): string | null {
  const base = path.resolve(root);
  const target = path.resolve(base, relative);
  const fromRoot = path.relative(base, target);
  if (fromRoot === '' || fromRoot === '..' || fromRoot.startsWith(`..${path.sep}`) || path.isAbsolute(fromRoot)) {
    return null;
  }
  return target;
}

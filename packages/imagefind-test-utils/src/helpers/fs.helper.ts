import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Create an isolated temp directory; call the returned cleanup in afterEach
 */
export async function createTempDir(prefix = 'imagefind-'): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return {
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true })
  };
}

export async function writeFileDeep(filePath: string, bytes: Buffer): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, bytes);
  return filePath;
}

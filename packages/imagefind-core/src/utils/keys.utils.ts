import * as path from 'path';
import { v5 as uuidv5 } from 'uuid';
import { DEFAULT_CONTENT_TYPE, IMAGE_CONTENT_TYPES } from '../constants/formats';
import { ValidationError } from '../errors';

// Fixed namespace: changing it re-keys every point in existing collections
export const POINT_ID_NAMESPACE = '6f1c2b7e-3d4a-5c8e-9b0f-2a7d4e6c1b3f';

/**
 * Lowercase extension without the dot ('' when there is none)
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Blob store key: "{hash}.{extension}"
 */
export function storedObjectKey(hash: string, filePath: string): string {
  const extension = extensionOf(filePath);
  if (!extension) {
    throw new ValidationError('File has no extension', { filePath });
  }
  return `${hash}.${extension}`;
}

/**
 * Vector index point id, a name-based UUID of the content hash
 */
export function pointIdFor(hash: string): string {
  return uuidv5(hash, POINT_ID_NAMESPACE);
}

export function contentTypeFor(filePath: string): string {
  const extension = extensionOf(filePath);
  return Object.hasOwn(IMAGE_CONTENT_TYPES, extension) ? IMAGE_CONTENT_TYPES[extension] : DEFAULT_CONTENT_TYPE;
}

export function isImagePath(filePath: string): boolean {
  return Object.hasOwn(IMAGE_CONTENT_TYPES, extensionOf(filePath));
}

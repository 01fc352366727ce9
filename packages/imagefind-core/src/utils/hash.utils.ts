import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { pipeline } from 'stream/promises';

const HASH_ALGORITHM = 'sha256';

/**
 * Hash raw bytes, hex encoded
 */
export function hashBytes(bytes: Uint8Array): string {
  return createHash(HASH_ALGORITHM).update(bytes).digest('hex');
}

/**
 * Hash a file by streaming it, so large images never sit in memory whole
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash(HASH_ALGORITHM);
  await pipeline(createReadStream(filePath), hash);
  return hash.digest('hex');
}

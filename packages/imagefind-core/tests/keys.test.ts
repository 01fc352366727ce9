import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { validate as uuidValidate, version as uuidVersion } from 'uuid';
import { createTempDir, writeFileDeep } from '@imagefind/test-utils';
import {
  contentTypeFor,
  extensionOf,
  hashBytes,
  hashFile,
  isImagePath,
  pointIdFor,
  storedObjectKey
} from '../src/utils';
import { ValidationError } from '../src/errors';

describe('hashing', () => {
  let temp: { dir: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    temp = await createTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should produce hex sha256 of bytes', () => {
    expect(hashBytes(Buffer.from('abc'))).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should hash a file the same as its bytes', async () => {
    const bytes = Buffer.from('some image bytes');
    const filePath = await writeFileDeep(path.join(temp.dir, 'a', 'b.png'), bytes);

    expect(await hashFile(filePath)).toBe(hashBytes(bytes));
  });

  it('should hash identical bytes under different names alike', async () => {
    const bytes = Buffer.from([1, 2, 3, 4]);
    const first = await writeFileDeep(path.join(temp.dir, 'one.png'), bytes);
    const second = await writeFileDeep(path.join(temp.dir, 'nested', 'two.jpg'), bytes);

    expect(await hashFile(first)).toBe(await hashFile(second));
  });

  it('should change the hash when one bit flips', () => {
    const bytes = Buffer.from([1, 2, 3, 4]);
    const flipped = Buffer.from(bytes);
    flipped[2] ^= 0x01;

    expect(hashBytes(flipped)).not.toBe(hashBytes(bytes));
  });
});

describe('keys', () => {
  const hash = hashBytes(Buffer.from('abc'));

  it('should lowercase the extension', () => {
    expect(extensionOf('photos/Holiday.JPG')).toBe('jpg');
    expect(extensionOf('README')).toBe('');
  });

  it('should build the stored object key from hash and extension', () => {
    expect(storedObjectKey(hash, 'dir/Photo.PNG')).toBe(`${hash}.png`);
  });

  it('should refuse a file without extension', () => {
    expect(() => storedObjectKey(hash, 'dir/photo')).toThrow(ValidationError);
  });

  it('should derive a stable version 5 point id', () => {
    const id = pointIdFor(hash);

    expect(uuidValidate(id)).toBe(true);
    expect(uuidVersion(id)).toBe(5);
    expect(pointIdFor(hash)).toBe(id);
    expect(pointIdFor(hashBytes(Buffer.from('abd')))).not.toBe(id);
  });

  it('should map content types', () => {
    expect(contentTypeFor('a.jpeg')).toBe('image/jpeg');
    expect(contentTypeFor('a.TIF')).toBe('image/tiff');
    expect(contentTypeFor('a.xyz')).toBe('application/octet-stream');
  });

  it('should recognise image paths only', () => {
    expect(isImagePath('a/b.webp')).toBe(true);
    expect(isImagePath('a/b.txt')).toBe(false);
    expect(isImagePath('a/b.constructor')).toBe(false);
  });

  it('should leave out formats the decoder cannot read', () => {
    expect(isImagePath('scan.bmp')).toBe(false);
    expect(isImagePath('scan.BMP')).toBe(false);
    expect(contentTypeFor('scan.bmp')).toBe('application/octet-stream');
  });
});

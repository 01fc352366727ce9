import { faker } from '@faker-js/faker';
import * as path from 'path';
import sharp from 'sharp';
import { writeFileDeep } from '../helpers/fs.helper';

export type Rgb = { r: number; g: number; b: number };

export interface ImageFactoryOptions {
  width?: number;
  height?: number;
  color?: Rgb;
  format?: 'png' | 'jpeg' | 'webp';
}

export const RED: Rgb = { r: 255, g: 0, b: 0 };
export const GREEN: Rgb = { r: 0, g: 255, b: 0 };
export const BLUE: Rgb = { r: 0, g: 0, b: 255 };

/**
 * Encode a solid-colour image
 */
export async function createImage(options: ImageFactoryOptions = {}): Promise<Buffer> {
  const color = options.color ?? {
    r: faker.number.int({ min: 1, max: 255 }),
    g: faker.number.int({ min: 1, max: 255 }),
    b: faker.number.int({ min: 1, max: 255 })
  };

  return sharp({
    create: {
      width: options.width ?? 16,
      height: options.height ?? 16,
      channels: 3,
      background: color
    }
  })
    .toFormat(options.format ?? 'png')
    .toBuffer();
}

/**
 * Write an image to `dir/relativePath` (a random name when omitted)
 */
export async function writeImage(
  dir: string,
  relativePath?: string,
  options: ImageFactoryOptions = {}
): Promise<{ path: string; bytes: Buffer }> {
  const name = relativePath ?? `${faker.string.alphanumeric(10)}.${options.format ?? 'png'}`;
  const bytes = await createImage(options);
  return { path: await writeFileDeep(path.join(dir, name), bytes), bytes };
}

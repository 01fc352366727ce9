import sharp from 'sharp';
import { ImageDecodeError } from '../errors';
import type { ChannelOrder } from '../schemas/inference.schema';
import type { ImagePreprocessor, PreparedImage } from '../types/collaborator.types';

const WHITE = { r: 255, g: 255, b: 255, alpha: 1 };

/**
 * Letterboxes images onto the model's white square canvas.
 * Decoding and resampling run on libuv's thread pool inside sharp.
 */
export class SharpImagePreprocessor implements ImagePreprocessor {
  async prepare(bytes: Buffer, targetSize: number, channelOrder: ChannelOrder): Promise<PreparedImage> {
    const { data, info } = await this.decode(bytes, targetSize);
    const { width, height, channels } = info;

    if (channels !== 3 || width !== targetSize || height !== targetSize) {
      throw new ImageDecodeError('Unexpected decoded layout', { width, height, channels, targetSize });
    }

    if (channelOrder === 'bgr') {
      swapRedBlue(data);
    }

    return { width, height, data };
  }

  private async decode(bytes: Buffer, targetSize: number) {
    try {
      return await sharp(bytes, { failOn: 'error' })
        .toColourspace('srgb')
        .removeAlpha()
        .resize(targetSize, targetSize, {
          fit: 'contain',
          background: WHITE,
          kernel: 'lanczos3'
        })
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw new ImageDecodeError(
        error instanceof Error ? error.message : 'Unknown decode failure',
        { byteLength: bytes.length },
        error
      );
    }
  }
}

/**
 * In-place RGB <-> BGR swap of a packed 3-channel buffer
 */
export function swapRedBlue(data: Buffer): void {
  for (let i = 0; i + 2 < data.length; i += 3) {
    const red = data[i];
    data[i] = data[i + 2];
    data[i + 2] = red;
  }
}

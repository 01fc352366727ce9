/**
 * Image formats recognized by discovery, keyed by lowercase extension.
 * Only formats the prebuilt sharp binaries decode; BMP is left out.
 */
export const IMAGE_CONTENT_TYPES: Readonly<Record<string, string>> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  avif: 'image/avif'
};

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

import type { ExtractedImage, ImageFormat } from '@docmill/model';

const EXTENSION_BY_MIME: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/bmp': 'bmp',
  'image/tiff': 'tiff',
  'image/svg+xml': 'svg',
  'image/x-emf': 'emf',
  'image/x-wmf': 'wmf',
};

const MIME_BY_EXTENSION: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  bmp: 'image/bmp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  svg: 'image/svg+xml',
  emf: 'image/x-emf',
  wmf: 'image/x-wmf',
};

const DATA_URI_PATTERN = /^data:([\w.+-]+\/[\w.+-]+)(?:;[\w-]+=[^;,]*)*;base64,(.*)$/s;

export interface DecodedImage {
  mimeType: string;
  data: Buffer;
}

/**
 * Decode a base64 data URI ("data:image/png;base64,...").
 *
 * @returns null for anything that is not a base64 image data URI
 */
export function decodeDataUri(uri: string): DecodedImage | null {
  const match = DATA_URI_PATTERN.exec(uri.trim());
  if (!match || !match[1].startsWith('image/')) {
    return null;
  }
  return {
    mimeType: match[1].toLowerCase(),
    data: Buffer.from(match[2], 'base64'),
  };
}

/**
 * MIME type for an image file extension, or undefined when unknown
 */
export function mimeTypeForExtension(extension: string): string | undefined {
  return MIME_BY_EXTENSION[extension.toLowerCase().replace(/^\./, '')];
}

/**
 * Collects extracted images and assigns sequential output file names
 * (`image-001.png`, `image-002.jpg`, ...).
 */
export class ImageCollector {
  private readonly collected: ExtractedImage[] = [];

  constructor(private readonly fallbackFormat: ImageFormat = 'png') {}

  /**
   * Register an image and return it with its assigned file name.
   */
  add(data: Uint8Array, mimeType: string, pageIndex?: number): ExtractedImage {
    const extension =
      EXTENSION_BY_MIME[mimeType.toLowerCase()] ??
      (this.fallbackFormat === 'jpeg' ? 'jpg' : 'png');
    const sequence = String(this.collected.length + 1).padStart(3, '0');

    const image: ExtractedImage = {
      filename: `image-${sequence}.${extension}`,
      data,
      mimeType,
      sizeBytes: data.byteLength,
      pageIndex,
    };
    this.collected.push(image);
    return image;
  }

  get images(): ExtractedImage[] {
    return [...this.collected];
  }
}

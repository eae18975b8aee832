/**
 * Image codec port and its sharp implementation.
 *
 * sharp ships a native binary; on hosts where it fails to load the codec is
 * reported as unavailable and images are stored untouched.
 */

import logger from '../../utils/logger';
import { errorMessage } from '../../errors';

export interface ImageInfo {
  width: number;
  height: number;
  hasAlpha: boolean;
  format?: string;
}

export interface TranscodeOptions {
  width: number;
  height: number;
  /** Composite transparent pixels over white */
  flatten: boolean;
  /** JPEG quality, 1-100 */
  quality: number;
}

export interface ImageCodec {
  inspect(data: Buffer): Promise<ImageInfo>;
  /** Re-encode as JPEG at the given size */
  toJpeg(data: Buffer, options: TranscodeOptions): Promise<Buffer>;
}

export type ImageCodecLoader = () => Promise<ImageCodec | null>;

type Sharp = typeof import('sharp');

export class SharpImageCodec implements ImageCodec {
  constructor(private readonly sharp: Sharp) {}

  async inspect(data: Buffer): Promise<ImageInfo> {
    const metadata = await this.sharp(data).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error(`Image has no dimensions (format: ${metadata.format ?? 'unknown'})`);
    }
    return {
      width: metadata.width,
      height: metadata.height,
      hasAlpha: metadata.hasAlpha ?? false,
      format: metadata.format,
    };
  }

  async toJpeg(data: Buffer, options: TranscodeOptions): Promise<Buffer> {
    let pipeline = this.sharp(data).resize({
      width: options.width,
      height: options.height,
      fit: 'fill',
      kernel: 'lanczos3',
    });

    if (options.flatten) {
      pipeline = pipeline.flatten({ background: { r: 255, g: 255, b: 255 } });
    }

    return pipeline.jpeg({ quality: options.quality }).toBuffer();
  }
}

let cachedCodec: Promise<ImageCodec | null> | undefined;

/**
 * Load sharp once per process. Resolves to null (and warns once) when the
 * native module cannot be loaded.
 */
export const loadSharpCodec: ImageCodecLoader = () => {
  if (!cachedCodec) {
    cachedCodec = import('sharp')
      .then((mod): ImageCodec => new SharpImageCodec(mod.default))
      .catch((error: unknown) => {
        logger.warn('sharp not available - image resizing disabled', {
          error: errorMessage(error),
        });
        return null;
      });
  }
  return cachedCodec;
};

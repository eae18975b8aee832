/**
 * Image Resizer
 * Shrinks oversized images before they are stored: anything above the byte
 * threshold is scaled to fit `maxDimension` on both axes and re-encoded as
 * JPEG. Smaller images, and any image the codec cannot handle, come back
 * untouched. resize() never rejects.
 */

import logger from '../../utils/logger';
import { ImageResizeError, errorMessage } from '../../errors';
import { ImageCodecLoader, loadSharpCodec } from './imageCodec';

export interface ImageResizerOptions {
  maxSizeMb?: number;
  maxDimension?: number;
  quality?: number;
}

export interface ResizeResult {
  data: Buffer;
  wasResized: boolean;
  /** Byte length of `data` */
  size: number;
  /** Byte length of the input */
  originalSize: number;
  /** `WxH` before and after, when the image was decoded */
  originalDimensions?: string;
  newDimensions?: string;
}

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Scale proportionally so neither side exceeds `maxDimension`.
 */
export function fitWithin(width: number, height: number, maxDimension: number): Dimensions {
  if (width <= maxDimension && height <= maxDimension) {
    return { width, height };
  }

  if (width > height) {
    return { width: maxDimension, height: Math.max(1, Math.floor((height * maxDimension) / width)) };
  }
  return { width: Math.max(1, Math.floor((width * maxDimension) / height)), height: maxDimension };
}

function unchanged(data: Buffer): ResizeResult {
  return { data, wasResized: false, size: data.length, originalSize: data.length };
}

export class ImageResizer {
  readonly maxSizeBytes: number;
  readonly maxDimension: number;
  readonly quality: number;

  constructor(
    options: ImageResizerOptions = {},
    private readonly loadCodec: ImageCodecLoader = loadSharpCodec
  ) {
    this.maxSizeBytes = (options.maxSizeMb ?? 2) * 1024 * 1024;
    this.maxDimension = options.maxDimension ?? 2048;
    this.quality = options.quality ?? 85;
  }

  async resize(data: Buffer): Promise<ResizeResult> {
    const originalSize = data.length;
    if (originalSize <= this.maxSizeBytes) {
      return unchanged(data);
    }

    try {
      const codec = await this.loadCodec();
      if (!codec) {
        return unchanged(data);
      }

      logger.info('Image exceeds size limit, resizing', {
        originalSize,
        maxSizeBytes: this.maxSizeBytes,
      });

      const info = await codec.inspect(data);
      const target = fitWithin(info.width, info.height, this.maxDimension);
      const resized = await codec.toJpeg(data, {
        ...target,
        flatten: info.hasAlpha,
        quality: this.quality,
      });

      if (resized.length === 0) {
        throw new ImageResizeError('Encoder produced no output', { originalSize });
      }

      logger.info('Image resized', {
        originalSize,
        newSize: resized.length,
        percentOfOriginal: Number(((resized.length / originalSize) * 100).toFixed(1)),
        from: `${info.width}x${info.height}`,
        to: `${target.width}x${target.height}`,
      });

      return {
        data: resized,
        wasResized: true,
        size: resized.length,
        originalSize,
        originalDimensions: `${info.width}x${info.height}`,
        newDimensions: `${target.width}x${target.height}`,
      };
    } catch (error: unknown) {
      logger.error('Error resizing image', { error: errorMessage(error), originalSize });
      return unchanged(data);
    }
  }
}

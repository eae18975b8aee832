/**
 * Attachment Extractor
 * Saves image and document attachments from a container into date-bucketed
 * storage under the media root and describes each saved file.
 *
 * Other attachment types are skipped. A failure on one attachment is
 * logged and recorded; extraction carries on with the rest.
 */

import { promises as fs } from 'fs';
import path from 'path';
import logger from '../../utils/logger';
import { AttachmentError } from '../../errors';
import { DOCUMENT_EXTENSIONS, IMAGE_EXTENSIONS } from '../../config/parsing';
import { FileOperationsLog, noopFileOperationsLog } from '../../utils/fileOperationsLogger';
import {
  buildBucketedPath,
  generateSavedFilename,
  getExtension,
  resolveAttachmentFilename,
} from '../../utils/fileNaming';
import { AttachmentFileType, AttachmentRecord, RawAttachment } from '../../parsing/types';
import { ImageResizer, ResizeResult } from './ImageResizer';

const JPEG_EXTENSIONS = ['.jpg', '.jpeg'];

export interface AttachmentExtractorOptions {
  mediaRoot: string;
  mediaUrl: string;
  imageDir?: string;
  documentDir?: string;
  resizer: ImageResizer;
  fileLog?: FileOperationsLog;
  now?: () => Date;
}

export interface AttachmentFailure {
  filename: string;
  error: AttachmentError;
}

export interface ExtractionResult {
  records: AttachmentRecord[];
  failures: AttachmentFailure[];
  /** Unsupported types and attachments without bytes */
  skipped: number;
}

export function classifyAttachment(filename: string): AttachmentFileType | null {
  const ext = getExtension(filename);
  if (IMAGE_EXTENSIONS.includes(ext)) {
    return 'image';
  }
  if (DOCUMENT_EXTENSIONS.includes(ext)) {
    return 'document';
  }
  return null;
}

export class AttachmentExtractor {
  private readonly imageDir: string;
  private readonly documentDir: string;
  private readonly fileLog: FileOperationsLog;
  private readonly now: () => Date;

  constructor(private readonly options: AttachmentExtractorOptions) {
    this.imageDir = options.imageDir ?? 'enquiry_photos';
    this.documentDir = options.documentDir ?? 'enquiry_attachments/documents';
    this.fileLog = options.fileLog ?? noopFileOperationsLog;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Process attachments in source order; records come back in that order.
   */
  async extract(attachments: readonly RawAttachment[] | null | undefined): Promise<ExtractionResult> {
    const result: ExtractionResult = { records: [], failures: [], skipped: 0 };
    if (!attachments || attachments.length === 0) {
      return result;
    }

    const today = this.now();

    for (const attachment of attachments) {
      const filename = resolveAttachmentFilename(attachment);
      try {
        const record = await this.processAttachment(attachment, filename, today);
        if (record) {
          result.records.push(record);
        } else {
          result.skipped++;
        }
      } catch (error: unknown) {
        const failure = AttachmentError.fromCause(filename, error);
        logger.error(failure.message, { filename, error: failure.toJSON() });
        this.fileLog.logError('EXTRACT', filename, failure.message);
        result.failures.push({ filename, error: failure });
      }
    }

    return result;
  }

  private async processAttachment(
    attachment: RawAttachment,
    filename: string,
    today: Date
  ): Promise<AttachmentRecord | null> {
    const fileType = classifyAttachment(filename);
    if (!fileType) {
      logger.debug('Skipping unsupported attachment type', { filename });
      return null;
    }

    const data = attachment.data;
    if (!data || data.length === 0) {
      logger.debug('Skipping attachment without data', { filename });
      return null;
    }

    const ext = getExtension(filename);

    if (fileType === 'document') {
      const stored = await this.store(this.documentDir, ext, data, today);
      logger.info(`Extracted document attachment: ${filename} -> ${stored.relativePath}`);
      return {
        original_filename: filename,
        saved_filename: stored.savedFilename,
        file_path: stored.relativePath,
        file_size: stored.size,
        file_url: this.toUrl(stored.relativePath),
        file_type: 'document',
        upload_type: 'extracted',
      };
    }

    const resized: ResizeResult = await this.options.resizer.resize(data);
    const savedExt = resized.wasResized && !JPEG_EXTENSIONS.includes(ext) ? '.jpg' : ext;
    const stored = await this.store(this.imageDir, savedExt, resized.data, today);

    if (resized.wasResized && resized.originalDimensions && resized.newDimensions) {
      this.fileLog.logResize(stored.relativePath, resized.originalDimensions, resized.newDimensions);
    }

    const resizeInfo = resized.wasResized ? ` (resized from ${resized.originalSize} bytes)` : '';
    logger.info(`Extracted image attachment: ${filename} -> ${stored.relativePath}${resizeInfo}`);

    return {
      original_filename: filename,
      saved_filename: stored.savedFilename,
      file_path: stored.relativePath,
      file_size: stored.size,
      file_url: this.toUrl(stored.relativePath),
      file_type: 'image',
      upload_type: 'extracted',
      was_resized: resized.wasResized,
      original_size: resized.originalSize,
    };
  }

  private async store(
    category: string,
    ext: string,
    data: Buffer,
    today: Date
  ): Promise<{ savedFilename: string; relativePath: string; size: number }> {
    const savedFilename = generateSavedFilename(ext);
    const relativePath = buildBucketedPath(category, savedFilename, today);
    const absolutePath = path.join(this.options.mediaRoot, ...relativePath.split('/'));

    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    // never overwrite an existing file
    await fs.writeFile(absolutePath, data, { flag: 'wx' });

    return { savedFilename, relativePath, size: data.length };
  }

  private toUrl(relativePath: string): string {
    return `${this.options.mediaUrl}${relativePath}`;
  }
}

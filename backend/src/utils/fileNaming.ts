/**
 * File naming utilities for extracted attachments.
 *
 * Saved files are named `{uuid}{ext}` and bucketed by processing date:
 *   enquiry_photos/2024/06/15/0b0c7f5e-....jpg
 *   enquiry_attachments/documents/2024/06/15/4d2e....pdf
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';

export interface AttachmentNameSource {
  longFilename?: string | null;
  shortFilename?: string | null;
}

/**
 * Prefer the long filename, fall back to the 8.3 short one.
 */
export function resolveAttachmentFilename(attachment: AttachmentNameSource): string {
  return attachment.longFilename?.trim() || attachment.shortFilename?.trim() || 'unknown';
}

/**
 * Lower-cased extension including the dot, or '' when there is none.
 */
export function getExtension(fileName: string): string {
  return path.extname(fileName.toLowerCase());
}

/**
 * Collision-free stored name. Names are never reused, so concurrent
 * extractions need no locking.
 */
export function generateSavedFilename(extension: string): string {
  return `${uuidv4()}${extension}`;
}

/**
 * `[yyyy, mm, dd]` of the UTC processing date.
 */
export function dateBucket(date: Date = new Date()): [string, string, string] {
  const [year, month, day] = date.toISOString().split('T')[0].split('-');
  return [year, month, day];
}

/**
 * Media-root-relative path, always with forward slashes.
 */
export function buildBucketedPath(category: string, savedFilename: string, date: Date = new Date()): string {
  return path.posix.join(category, ...dateBucket(date), savedFilename);
}

/**
 * Container file checks run before a file is handed to the decoder.
 */

import { promises as fs } from 'fs';
import path from 'path';
import logger from '../utils/logger';
import { ContainerOpenError, ContainerValidationError } from '../errors';
import { CONTAINER_EXTENSIONS, OLE_SIGNATURE } from '../config/parsing';

const EML_HEADER_PATTERNS = ['received:', 'from:', 'to:', 'subject:', 'date:', 'message-id:'];
const HEADER_SAMPLE_BYTES = 1024;

export interface ContainerFileInfo {
  extension: string;
  size: number;
}

export interface ContainerValidationOptions {
  maxSizeMb: number;
}

export function validateContainerExtension(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  if (!extension) {
    throw new ContainerValidationError('File must have an extension', filePath);
  }
  if (!CONTAINER_EXTENSIONS.includes(extension)) {
    throw new ContainerValidationError(
      `File extension '${extension}' not allowed. Allowed: ${CONTAINER_EXTENSIONS.join(', ')}`,
      filePath
    );
  }
  return extension;
}

export function validateContainerSize(size: number, filePath: string, maxSizeMb: number): void {
  if (size <= 0) {
    throw new ContainerValidationError('File appears to be empty', filePath);
  }
  if (size > maxSizeMb * 1024 * 1024) {
    throw new ContainerValidationError(
      `File too large. Maximum size for email files is ${maxSizeMb.toFixed(1)}MB`,
      filePath,
      { size }
    );
  }
}

/**
 * A .msg must open with the OLE2 header. An .eml without any recognisable
 * header line is logged and let through to the decoder.
 */
export function validateContainerHeader(header: Buffer, extension: string, filePath: string): void {
  if (extension === '.msg') {
    if (!header.subarray(0, OLE_SIGNATURE.length).equals(OLE_SIGNATURE)) {
      throw new ContainerValidationError('File is not an Outlook .msg (missing OLE2 signature)', filePath);
    }
    return;
  }

  const text = header.toString('utf8').toLowerCase();
  if (!EML_HEADER_PATTERNS.some((pattern) => text.includes(pattern))) {
    logger.warn('Email file validation: no recognisable header lines', { filePath });
  }
}

async function readHeader(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Check type, size and signature of a container file on disk.
 */
export async function validateContainerFile(
  filePath: string,
  options: ContainerValidationOptions
): Promise<ContainerFileInfo> {
  const extension = validateContainerExtension(filePath);

  let size: number;
  let header: Buffer;
  try {
    size = (await fs.stat(filePath)).size;
    header = size > 0 ? await readHeader(filePath, Math.min(size, HEADER_SAMPLE_BYTES)) : Buffer.alloc(0);
  } catch (error: unknown) {
    throw ContainerOpenError.fromCause(filePath, error);
  }

  validateContainerSize(size, filePath, options.maxSizeMb);
  validateContainerHeader(header, extension, filePath);

  logger.debug('Container file validation passed', { filePath, extension, size });
  return { extension, size };
}

/**
 * File Operations Log
 * Dedicated audit trail for attachment files resized under the media
 * root, and for files that failed to parse or extract. One line per operation:
 *   2024-06-15 10:00:00 | INFO | RESIZE | enquiry_photos/... | 3000x2000 → 2048x1365
 */

import fs from 'fs';
import path from 'path';
import winston from 'winston';

export interface FileOperationsLog {
  logResize(filePath: string, oldDimensions: string, newDimensions: string, enquiryRef?: string): void;
  logError(operation: string, filePath: string, errorMsg: string): void;
}

/** Minimal sink the operation lines are written to. */
export interface OperationSink {
  info(message: string): void;
  error(message: string): void;
}

export const FILE_OPERATIONS_LOG_NAME = 'file_operations.log';

export class FileOperationsLogger implements FileOperationsLog {
  constructor(private readonly sink: OperationSink) {}

  logResize(filePath: string, oldDimensions: string, newDimensions: string, enquiryRef?: string): void {
    const msg = `RESIZE | ${filePath} | ${oldDimensions} → ${newDimensions}`;
    this.sink.info(enquiryRef ? `${msg} | Enquiry: ${enquiryRef}` : msg);
  }

  logError(operation: string, filePath: string, errorMsg: string): void {
    this.sink.error(`ERROR | ${operation} | ${filePath} | ${errorMsg}`);
  }
}

/**
 * Create the winston-backed file operations log under `logDir`.
 * Call once at startup; the directory is created here.
 */
export function createFileOperationsLogger(logDir: string): FileOperationsLogger {
  fs.mkdirSync(logDir, { recursive: true });

  const { combine, timestamp, printf } = winston.format;

  const sink = winston.createLogger({
    level: 'info',
    format: combine(
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      printf(({ level, message, timestamp }) => `${timestamp} | ${level.toUpperCase()} | ${message}`)
    ),
    transports: [
      new winston.transports.File({
        filename: path.join(logDir, FILE_OPERATIONS_LOG_NAME),
      }),
    ],
  });

  return new FileOperationsLogger({
    info: (message) => sink.info(message),
    error: (message) => sink.error(message),
  });
}

/** Log that drops every operation; for callers without an audit trail. */
export const noopFileOperationsLog: FileOperationsLog = new FileOperationsLogger({
  info: () => undefined,
  error: () => undefined,
});

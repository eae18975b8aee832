/**
 * Parsing Types
 * Container boundary and the normalized record produced from a .msg file.
 */

// ============================================================================
// Container boundary
// ============================================================================

export interface RawAttachment {
  /** Long (display) filename, preferred when present */
  longFilename?: string | null;
  /** 8.3 short filename */
  shortFilename?: string | null;
  /** Attachment bytes; null for embedded messages and links */
  data: Buffer | null;
}

/**
 * An opened mail container. Every field is optional because real .msg files
 * omit properties freely; readers fill in what the file carries.
 */
export interface MailContainer {
  /** Raw sender field, e.g. `John Smith <john@example.com>` */
  sender?: string | null;
  senderName?: string | null;
  senderEmail?: string | null;
  subject?: string | null;
  /** Delivery time. Aware when it carries a zone, naive otherwise. */
  receivedTime?: string | null;
  /** Client submit time. Aware when it carries a zone, naive otherwise. */
  sentTime?: string | null;
  /** Naive sent time as [year, month, day, hour, minute, second] */
  sentTimeParts?: readonly number[] | null;
  htmlBody?: string | null;
  plainBody?: string | null;
  /** Semicolon-joined recipient strings */
  to?: string | null;
  cc?: string | null;
  bcc?: string | null;
  attachments?: readonly RawAttachment[] | null;
  close(): void;
}

export interface ContainerReader {
  /**
   * Open and decode a container. Rejects with ContainerOpenError when the
   * file cannot be read or is not a message.
   */
  open(filePath: string): Promise<MailContainer>;
}

// ============================================================================
// Output records
// ============================================================================

export type BodyContentMode = 'snippet' | 'plain' | 'full';

export const BODY_CONTENT_MODES: readonly BodyContentMode[] = ['snippet', 'plain', 'full'];

export type EmailDirection = 'INCOMING' | 'OUTGOING';

export type AttachmentFileType = 'image' | 'document';

interface AttachmentRecordBase {
  original_filename: string;
  /** `{uuid}{ext}`; never reused */
  saved_filename: string;
  /** Relative to the media root: `{category}/{yyyy}/{mm}/{dd}/{saved_filename}` */
  file_path: string;
  /** Bytes actually written */
  file_size: number;
  file_url: string;
  upload_type: 'extracted';
}

export interface ImageAttachmentRecord extends AttachmentRecordBase {
  file_type: 'image';
  was_resized: boolean;
  /** Byte count before resizing */
  original_size: number;
}

export interface DocumentAttachmentRecord extends AttachmentRecordBase {
  file_type: 'document';
}

export type AttachmentRecord = ImageAttachmentRecord | DocumentAttachmentRecord;

export interface ParsedEmail {
  raw_from: string;
  email_from: string;
  email_to: string;
  email_cc: string;
  subject: string;
  email_date: Date;
  email_date_str: string;
  body_content: string;
  direction: EmailDirection;
  has_attachments: boolean;
  is_html: boolean;
  image_attachments: AttachmentRecord[];
}

export interface ParseFailure {
  error: string;
}

export type ParseResult = ParsedEmail | ParseFailure;

export function isParseFailure(result: ParseResult): result is ParseFailure {
  return 'error' in result;
}

export interface ParseOptions {
  body_content_mode?: BodyContentMode;
  skip_attachments?: boolean;
}

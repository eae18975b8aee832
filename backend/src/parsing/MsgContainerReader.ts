/**
 * Outlook .msg container reader
 * Decodes a .msg file once with @kenjiuno/msgreader and exposes it as a
 * MailContainer. The decoder output is validated with zod rather than
 * trusted; missing properties simply come through as absent.
 */

import { promises as fs } from 'fs';
import MsgReader from '@kenjiuno/msgreader';
import { z } from 'zod';
import logger from '../utils/logger';
import { ContainerOpenError, errorMessage } from '../errors';
import { DEFAULT_PARSING_CONFIG } from '../config/parsing';
import { formatMailbox } from './addresses';
import { validateContainerFile } from './containerValidation';
import { ContainerReader, MailContainer, RawAttachment } from './types';

const optionalText = z.string().nullish();

const recipientSchema = z
  .object({
    name: optionalText,
    email: optionalText,
    smtpAddress: optionalText,
    recipType: optionalText,
  })
  .passthrough();

const attachmentSchema = z
  .object({
    fileName: optionalText,
    fileNameShort: optionalText,
    innerMsgContent: z.boolean().nullish(),
  })
  .passthrough();

export const msgFieldsSchema = z
  .object({
    error: optionalText,
    dataType: optionalText,
    subject: optionalText,
    senderName: optionalText,
    senderEmail: optionalText,
    senderSmtpAddress: optionalText,
    headers: optionalText,
    body: optionalText,
    bodyHtml: optionalText,
    html: z.instanceof(Uint8Array).nullish(),
    messageDeliveryTime: optionalText,
    clientSubmitTime: optionalText,
    recipients: z.array(recipientSchema).nullish(),
    attachments: z.array(attachmentSchema).nullish(),
  })
  .passthrough();

export type MsgFields = z.infer<typeof msgFieldsSchema>;
type MsgRecipient = z.infer<typeof recipientSchema>;

const FROM_HEADER_LINE = /^From:[ \t]*(.+(?:\r?\n[ \t]+.+)*)/im;

function recipientAddress(recipient: MsgRecipient): string {
  const smtp = recipient.smtpAddress?.trim();
  if (smtp && smtp.includes('@')) {
    return smtp;
  }
  return recipient.email?.trim() ?? '';
}

function formatRecipient(recipient: MsgRecipient): string {
  const name = recipient.name?.trim() ?? '';
  const address = recipientAddress(recipient);
  if (name && address && name.toLowerCase() !== address.toLowerCase()) {
    return formatMailbox(name, address);
  }
  return address || name;
}

/**
 * Semicolon-joined recipients of one kind, as Outlook displays them.
 */
export function joinRecipients(
  recipients: readonly MsgRecipient[] | null | undefined,
  kind: 'to' | 'cc' | 'bcc'
): string | null {
  if (!recipients) {
    return null;
  }

  const entries = recipients
    .filter((recipient) => (recipient.recipType ?? 'to').toLowerCase() === kind)
    .map(formatRecipient)
    .filter((entry) => entry.length > 0);

  return entries.length > 0 ? entries.join('; ') : null;
}

/**
 * The raw `From:` header when transport headers survive, otherwise the
 * sender display name and address as stored.
 */
export function rawSender(fields: MsgFields): string | null {
  const headerMatch = fields.headers?.match(FROM_HEADER_LINE);
  if (headerMatch) {
    return headerMatch[1].replace(/\r?\n[ \t]+/g, ' ').trim();
  }

  const name = fields.senderName?.trim();
  const email = senderAddress(fields);
  if (name && email) {
    return formatMailbox(name, email);
  }
  return email || name || null;
}

function senderAddress(fields: MsgFields): string | null {
  const smtp = fields.senderSmtpAddress?.trim();
  if (smtp && smtp.includes('@')) {
    return smtp;
  }
  const email = fields.senderEmail?.trim();
  // Exchange-internal senders carry an X.500 DN instead of an address
  return email && email.includes('@') ? email : null;
}

function htmlBody(fields: MsgFields): string | null {
  if (fields.bodyHtml) {
    return fields.bodyHtml;
  }
  if (fields.html && fields.html.length > 0) {
    return new TextDecoder('utf-8').decode(fields.html);
  }
  return null;
}

export interface MsgContainerReaderOptions {
  /** Largest file accepted by open() */
  maxSizeMb?: number;
}

export class MsgContainerReader implements ContainerReader {
  private readonly maxSizeMb: number;

  constructor(options: MsgContainerReaderOptions = {}) {
    this.maxSizeMb = options.maxSizeMb ?? DEFAULT_PARSING_CONFIG.containers.max_size_mb;
  }

  async open(filePath: string): Promise<MailContainer> {
    await validateContainerFile(filePath, { maxSizeMb: this.maxSizeMb });

    let fileData: Buffer;
    try {
      fileData = await fs.readFile(filePath);
    } catch (error: unknown) {
      throw ContainerOpenError.fromCause(filePath, error);
    }

    return this.decode(fileData, filePath);
  }

  /**
   * Decode an in-memory .msg file.
   */
  decode(fileData: Buffer, filePath = '<buffer>'): MailContainer {
    let reader: MsgReader;
    let fields: MsgFields;

    try {
      reader = new MsgReader(new DataView(fileData.buffer, fileData.byteOffset, fileData.byteLength));
      const parsed = msgFieldsSchema.safeParse(reader.getFileData());
      if (!parsed.success) {
        throw ContainerOpenError.notAMessage(filePath, parsed.error.issues[0]?.message);
      }
      fields = parsed.data;
    } catch (error: unknown) {
      if (error instanceof ContainerOpenError) {
        throw error;
      }
      throw ContainerOpenError.fromCause(filePath, error);
    }

    if (fields.error || (fields.dataType && fields.dataType !== 'msg')) {
      throw ContainerOpenError.notAMessage(filePath, fields.error ?? `data type ${fields.dataType}`);
    }

    const attachments = this.readAttachments(reader, fields, filePath);

    return {
      sender: rawSender(fields),
      senderName: fields.senderName ?? null,
      senderEmail: senderAddress(fields),
      subject: fields.subject ?? null,
      receivedTime: fields.messageDeliveryTime ?? null,
      sentTime: fields.clientSubmitTime ?? null,
      sentTimeParts: null,
      htmlBody: htmlBody(fields),
      plainBody: fields.body ?? null,
      to: joinRecipients(fields.recipients, 'to'),
      cc: joinRecipients(fields.recipients, 'cc'),
      bcc: joinRecipients(fields.recipients, 'bcc'),
      attachments,
      close: () => {
        attachments.length = 0;
      },
    };
  }

  private readAttachments(reader: MsgReader, fields: MsgFields, filePath: string): RawAttachment[] {
    return (fields.attachments ?? []).map((attachment, index): RawAttachment => {
      const names = {
        longFilename: attachment.fileName ?? null,
        shortFilename: attachment.fileNameShort ?? null,
      };

      if (attachment.innerMsgContent) {
        return { ...names, data: null };
      }

      try {
        const { content } = reader.getAttachment(index);
        return { ...names, data: Buffer.from(content) };
      } catch (error: unknown) {
        logger.warn('Could not read attachment bytes', {
          filePath,
          attachment: names.longFilename ?? names.shortFilename,
          error: errorMessage(error),
        });
        return { ...names, data: null };
      }
    });
  }
}

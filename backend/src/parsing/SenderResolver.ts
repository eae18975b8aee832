/**
 * Sender Resolver
 * Builds the canonical `Name <email>` sender from fragmentary container fields.
 * Names holding address specials are quoted so the result parses back.
 */

import { formatMailbox, parseAddress } from './addresses';
import { MailContainer } from './types';

export const UNKNOWN_SENDER = 'Unknown Sender';

export interface ResolvedSender {
  /** Canonical display form, never empty */
  email_from: string;
  /** Unprocessed sender field, kept for audit */
  raw_from: string;
}

type SenderFields = Pick<MailContainer, 'sender' | 'senderName' | 'senderEmail'>;

/**
 * Explicit name/email fields win over whatever can be parsed out of the raw
 * sender string; each missing half is filled from the raw string.
 */
export function resolveSender(fields: SenderFields): ResolvedSender {
  const rawFrom = fields.sender ?? '';
  let senderName = fields.senderName?.trim() ?? '';
  let senderEmail = fields.senderEmail?.trim() ?? '';

  if ((!senderEmail || !senderName) && rawFrom) {
    const parsed = parseAddress(rawFrom);
    senderEmail = senderEmail || parsed.address;
    // A name parsed from the raw string only belongs to its own address
    if (!senderName && parsed.address && parsed.address.toLowerCase() === senderEmail.toLowerCase()) {
      senderName = parsed.name;
    }
  }

  let emailFrom: string;
  if (senderName && senderEmail) {
    emailFrom = formatMailbox(senderName, senderEmail);
  } else if (senderEmail) {
    emailFrom = senderEmail;
  } else {
    emailFrom = rawFrom.trim() || UNKNOWN_SENDER;
  }

  return { email_from: emailFrom, raw_from: rawFrom };
}

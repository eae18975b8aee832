/**
 * Shapes a parsed email for the enquiry forms: the new-enquiry form
 * (prefilled fields plus the matching member) and the history update
 * form (newest message only).
 */

import logger from '../utils/logger';
import { errorMessage } from '../errors';
import { extractLatestEmailFromConversation } from '../cleaning/LatestMessageExtractor';
import { AttachmentRecord, EmailDirection, ParseResult, ParsedEmail, isParseFailure } from '../parsing/types';
import { Member, MemberDirectory } from '../repositories/IEnquiryRepository';
import { extractSenderEmail } from './enquiryFromEmail';

export interface MemberInfo {
  id: number;
  name: string;
  email: string;
}

export interface EnquiryFormData {
  subject: string;
  body_content: string;
  sender_email: string;
  email_from: string;
  email_to: string;
  email_cc: string;
  email_date: string;
  image_attachments: AttachmentRecord[];
}

export type FormPopulationResult =
  | {
      success: true;
      data: EnquiryFormData;
      sender_email: string;
      member_found: boolean;
      member_info?: MemberInfo;
    }
  | { success: false; error: string };

export interface HistoryEmailData {
  subject: string;
  from: string;
  to: string;
  cc: string;
  date: string;
  /** Newest message of the conversation */
  body: string;
  direction: EmailDirection;
}

/**
 * Sender address from `email_from`, falling back to the raw sender.
 */
export function senderEmailOf(parsed: Pick<ParsedEmail, 'email_from' | 'raw_from'>): string {
  return extractSenderEmail(parsed.email_from) || extractSenderEmail(parsed.raw_from);
}

/**
 * First active member with this address, or null.
 */
export async function findActiveMember(members: MemberDirectory, email: string): Promise<Member | null> {
  const active = await members.findActiveByEmail(email);
  if (active.length > 1) {
    logger.warn('Multiple active members share an email address, using the first', { email });
  }
  return active[0] ?? null;
}

function toMemberInfo(member: Member): MemberInfo {
  return {
    id: member.id,
    name: `${member.firstName} ${member.lastName}`.trim(),
    email: member.email,
  };
}

export async function processEmailForFormPopulation(
  result: ParseResult,
  members: MemberDirectory
): Promise<FormPopulationResult> {
  if (isParseFailure(result)) {
    return { success: false, error: result.error };
  }

  const senderEmail = senderEmailOf(result);
  if (!senderEmail) {
    return { success: false, error: 'Could not extract sender email address from email' };
  }

  let member: Member | null;
  try {
    member = await findActiveMember(members, senderEmail);
  } catch (error: unknown) {
    logger.error('Member lookup failed during form population', { senderEmail, error: errorMessage(error) });
    return { success: false, error: `Error looking up member: ${errorMessage(error)}` };
  }

  return {
    success: true,
    data: {
      subject: result.subject,
      body_content: result.body_content,
      sender_email: senderEmail,
      email_from: result.email_from,
      email_to: result.email_to,
      email_cc: result.email_cc,
      email_date: result.email_date_str,
      image_attachments: result.image_attachments,
    },
    sender_email: senderEmail,
    member_found: member !== null,
    ...(member ? { member_info: toMemberInfo(member) } : {}),
  };
}

export function processEmailForHistory(parsed: ParsedEmail): HistoryEmailData {
  return {
    subject: parsed.subject,
    from: parsed.email_from,
    to: parsed.email_to,
    cc: parsed.email_cc,
    date: parsed.email_date_str,
    body: extractLatestEmailFromConversation(parsed.body_content),
    direction: parsed.direction,
  };
}

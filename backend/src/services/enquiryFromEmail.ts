/**
 * Create an enquiry from a parsed email: find the active member who sent
 * it, open a new enquiry with the email's subject and body, and note where
 * it came from in the enquiry history.
 */

import logger from '../utils/logger';
import { MemberLookupError, errorMessage } from '../errors';
import { parseAddress } from '../parsing/addresses';
import { ParsedEmail } from '../parsing/types';
import { Enquiry, EnquiryStore, Member, MemberDirectory } from '../repositories/IEnquiryRepository';

export const TITLE_MAX_LENGTH = 255;

export interface EnquiryFromEmailDependencies {
  members: MemberDirectory;
  enquiries: EnquiryStore;
}

export type EnquiryFromEmailResult =
  | { success: true; enquiry: Enquiry; member: Member }
  | { success: false; error: string };

type EmailForEnquiry = Pick<ParsedEmail, 'email_from' | 'subject' | 'body_content' | 'email_date_str'>;

/**
 * Sender address, or '' when `email_from` carries none.
 */
export function extractSenderEmail(emailFrom: string | null | undefined): string {
  if (!emailFrom) {
    return '';
  }
  return parseAddress(emailFrom).address;
}

/**
 * The member an enquiry belongs to: the first active match. Several
 * matches with none active are reported separately from no match at all.
 */
export async function findEnquiryMember(members: MemberDirectory, email: string): Promise<Member> {
  const active = await members.findActiveByEmail(email);
  if (active.length > 0) {
    return active[0];
  }

  const all = await members.findByEmail(email);
  if (all.length > 1) {
    throw MemberLookupError.noneActive(email);
  }
  throw MemberLookupError.noActiveMember(email);
}

export async function createEnquiryFromEmail(
  parsed: EmailForEnquiry,
  createdBy: string,
  deps: EnquiryFromEmailDependencies
): Promise<EnquiryFromEmailResult> {
  try {
    const senderEmail = extractSenderEmail(parsed.email_from);
    if (!senderEmail) {
      return { success: false, error: MemberLookupError.missingSender().message };
    }

    const member = await findEnquiryMember(deps.members, senderEmail);

    const enquiry = await deps.enquiries.createEnquiry({
      title: (parsed.subject || 'Email Enquiry').slice(0, TITLE_MAX_LENGTH),
      description: parsed.body_content || 'No content available',
      memberId: member.id,
      reference: await deps.enquiries.generateReference(),
      status: 'new',
    });

    await deps.enquiries.addHistory({
      enquiryId: enquiry.id,
      note: `Enquiry created from email sent on ${parsed.email_date_str || 'unknown date'}`,
      noteType: 'enquiry_created',
      createdBy,
    });

    logger.info('Enquiry created from email', {
      reference: enquiry.reference,
      memberId: member.id,
      createdBy,
    });

    return { success: true, enquiry, member };
  } catch (error: unknown) {
    if (error instanceof MemberLookupError) {
      logger.warn('No member for email sender', { code: error.code, error: error.message });
      return { success: false, error: error.message };
    }

    logger.error('Error creating enquiry from email', { error: errorMessage(error) });
    return { success: false, error: `Error creating enquiry: ${errorMessage(error)}` };
  }
}

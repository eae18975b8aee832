/**
 * Unit Tests for enquiry form data built from parsed emails
 */

import {
  processEmailForFormPopulation,
  processEmailForHistory,
  senderEmailOf,
} from '../../services/emailFormData';
import { ParsedEmail } from '../../parsing/types';
import { Member } from '../../repositories/IEnquiryRepository';
import { MemoryMemberDirectory } from '../../repositories/MemoryEnquiryRepository';

const JANE: Member = {
  id: 1,
  firstName: 'Jane',
  lastName: 'Resident',
  email: 'jane.resident@example.com',
  isActive: true,
};

function parsedEmail(overrides: Partial<ParsedEmail> = {}): ParsedEmail {
  return {
    raw_from: 'Jane Resident <jane.resident@example.com>',
    email_from: 'Jane Resident <jane.resident@example.com>',
    email_to: 'memberenquiries@redcar-cleveland.gov.uk',
    email_cc: '',
    subject: 'Streetlight out',
    email_date: new Date('2024-03-04T09:15:00Z'),
    email_date_str: 'Mar 04, 2024 09:15 GMT',
    body_content: 'The streetlight on Elm Road is out.',
    direction: 'INCOMING',
    has_attachments: false,
    is_html: false,
    image_attachments: [],
    ...overrides,
  };
}

describe('senderEmailOf', () => {
  it('falls back to the raw sender', () => {
    expect(senderEmailOf({ email_from: 'Unknown Sender', raw_from: 'jane.resident@example.com' })).toBe(
      'jane.resident@example.com'
    );
  });
});

describe('processEmailForFormPopulation', () => {
  let members: MemoryMemberDirectory;

  beforeEach(() => {
    members = new MemoryMemberDirectory([JANE]);
  });

  it('prefills the form and reports the sending member', async () => {
    expect(await processEmailForFormPopulation(parsedEmail(), members)).toEqual({
      success: true,
      data: {
        subject: 'Streetlight out',
        body_content: 'The streetlight on Elm Road is out.',
        sender_email: 'jane.resident@example.com',
        email_from: 'Jane Resident <jane.resident@example.com>',
        email_to: 'memberenquiries@redcar-cleveland.gov.uk',
        email_cc: '',
        email_date: 'Mar 04, 2024 09:15 GMT',
        image_attachments: [],
      },
      sender_email: 'jane.resident@example.com',
      member_found: true,
      member_info: { id: 1, name: 'Jane Resident', email: 'jane.resident@example.com' },
    });
  });

  it('still prefills the form when no member matches', async () => {
    const result = await processEmailForFormPopulation(
      parsedEmail({ email_from: 'someone@example.com', raw_from: 'someone@example.com' }),
      members
    );

    if (!result.success) {
      throw new Error(result.error);
    }
    expect(result.member_found).toBe(false);
    expect(result.sender_email).toBe('someone@example.com');
    expect(result).not.toHaveProperty('member_info');
  });

  it('passes a parse failure through', async () => {
    expect(
      await processEmailForFormPopulation({ error: 'Failed to open/parse container: File appears to be empty' }, members)
    ).toEqual({ success: false, error: 'Failed to open/parse container: File appears to be empty' });
  });

  it('fails when no sender address can be found', async () => {
    const result = await processEmailForFormPopulation(
      parsedEmail({ email_from: 'Unknown Sender', raw_from: '' }),
      members
    );

    expect(result).toEqual({ success: false, error: 'Could not extract sender email address from email' });
  });

  it('reports a member lookup failure', async () => {
    jest.spyOn(members, 'findActiveByEmail').mockRejectedValue(new Error('connection reset'));

    expect(await processEmailForFormPopulation(parsedEmail(), members)).toEqual({
      success: false,
      error: 'Error looking up member: connection reset',
    });
  });
});

describe('processEmailForHistory', () => {
  it('keeps only the newest message of the conversation', () => {
    const parsed = parsedEmail({
      direction: 'OUTGOING',
      body_content: 'I can do Tuesday.\n\n> Are you free next week?',
    });

    expect(processEmailForHistory(parsed)).toEqual({
      subject: 'Streetlight out',
      from: 'Jane Resident <jane.resident@example.com>',
      to: 'memberenquiries@redcar-cleveland.gov.uk',
      cc: '',
      date: 'Mar 04, 2024 09:15 GMT',
      body: 'I can do Tuesday.',
      direction: 'OUTGOING',
    });
  });
});

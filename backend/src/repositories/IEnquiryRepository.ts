/**
 * Member and Enquiry Repository Interfaces
 * Storage ports used when an enquiry is created from a parsed email.
 *
 * Implementations:
 * - MemoryMemberDirectory / MemoryEnquiryStore: in-memory for testing
 * - PostgresMemberDirectory / PostgresEnquiryStore: database-backed
 */

// ============================================================================
// Records
// ============================================================================

export interface Member {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  isActive: boolean;
}

export type EnquiryStatus = 'new' | 'open' | 'closed';

export interface Enquiry {
  id: number;
  /** `MEM-YY-NNNN` */
  reference: string;
  title: string;
  description: string;
  status: EnquiryStatus;
  memberId: number;
  createdAt: Date;
}

export interface NewEnquiry {
  reference: string;
  title: string;
  description: string;
  status: EnquiryStatus;
  memberId: number;
}

export type HistoryNoteType = 'general' | 'enquiry_created' | 'email_incoming' | 'email_outgoing';

export interface EnquiryHistoryEntry {
  id: number;
  enquiryId: number;
  note: string;
  noteType: HistoryNoteType;
  createdBy: string;
  createdAt: Date;
}

export interface NewHistoryEntry {
  enquiryId: number;
  note: string;
  noteType: HistoryNoteType;
  createdBy: string;
}

// ============================================================================
// Ports
// ============================================================================

export interface MemberDirectory {
  /** Active members whose email matches case-insensitively, best match first */
  findActiveByEmail(email: string): Promise<Member[]>;
  /** Every member whose email matches case-insensitively */
  findByEmail(email: string): Promise<Member[]>;
}

export interface EnquiryStore {
  /** Next unused reference for the current year */
  generateReference(): Promise<string>;
  createEnquiry(enquiry: NewEnquiry): Promise<Enquiry>;
  addHistory(entry: NewHistoryEntry): Promise<EnquiryHistoryEntry>;
}

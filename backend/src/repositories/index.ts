/**
 * Repository Module
 * Storage ports for members and enquiries, with in-memory and Postgres backends.
 */

// Types and interfaces
export {
  Member,
  Enquiry,
  EnquiryStatus,
  NewEnquiry,
  EnquiryHistoryEntry,
  NewHistoryEntry,
  HistoryNoteType,
  MemberDirectory,
  EnquiryStore,
} from './IEnquiryRepository';

// Implementations
export { MemoryMemberDirectory, MemoryEnquiryStore } from './MemoryEnquiryRepository';
export { PostgresMemberDirectory, PostgresEnquiryStore } from './PostgresEnquiryRepository';

export { formatEnquiryReference, referenceYear } from './enquiryReference';

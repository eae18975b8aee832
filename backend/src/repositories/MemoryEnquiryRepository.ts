/**
 * In-Memory Member Directory and Enquiry Store
 * For testing and development.
 */

import {
  Enquiry,
  EnquiryHistoryEntry,
  EnquiryStore,
  Member,
  MemberDirectory,
  NewEnquiry,
  NewHistoryEntry,
} from './IEnquiryRepository';
import { formatEnquiryReference, referenceYear } from './enquiryReference';
import { PersistenceError } from '../errors';

/** Active first, then by name. */
function compareMembers(a: Member, b: Member): number {
  if (a.isActive !== b.isActive) {
    return a.isActive ? -1 : 1;
  }
  return a.firstName.localeCompare(b.firstName) || a.lastName.localeCompare(b.lastName);
}

export class MemoryMemberDirectory implements MemberDirectory {
  private members: Member[];

  constructor(members: Member[] = []) {
    this.members = members.map((member) => ({ ...member }));
  }

  add(member: Member): void {
    this.members.push({ ...member });
  }

  async findByEmail(email: string): Promise<Member[]> {
    const needle = email.toLowerCase();
    return this.members
      .filter((member) => member.email.toLowerCase() === needle)
      .sort(compareMembers)
      .map((member) => ({ ...member }));
  }

  async findActiveByEmail(email: string): Promise<Member[]> {
    const matches = await this.findByEmail(email);
    return matches.filter((member) => member.isActive);
  }
}

export interface MemoryEnquiryStoreConfig {
  now?: () => Date;
}

export class MemoryEnquiryStore implements EnquiryStore {
  private enquiries: Map<number, Enquiry> = new Map();
  private history: EnquiryHistoryEntry[] = [];
  private sequences: Map<number, number> = new Map();
  private readonly now: () => Date;

  constructor(config: MemoryEnquiryStoreConfig = {}) {
    this.now = config.now ?? (() => new Date());
  }

  async generateReference(): Promise<string> {
    const year = referenceYear(this.now());
    let sequence = this.sequences.get(year) ?? 1;
    let reference = formatEnquiryReference(year, sequence);

    while (this.hasReference(reference)) {
      sequence++;
      reference = formatEnquiryReference(year, sequence);
    }

    this.sequences.set(year, sequence + 1);
    return reference;
  }

  async createEnquiry(enquiry: NewEnquiry): Promise<Enquiry> {
    if (this.hasReference(enquiry.reference)) {
      throw PersistenceError.uniqueViolation('enquiry', 'reference', enquiry.reference);
    }

    const created: Enquiry = {
      ...enquiry,
      id: this.enquiries.size + 1,
      createdAt: this.now(),
    };
    this.enquiries.set(created.id, created);
    return { ...created };
  }

  async addHistory(entry: NewHistoryEntry): Promise<EnquiryHistoryEntry> {
    const created: EnquiryHistoryEntry = {
      ...entry,
      id: this.history.length + 1,
      createdAt: this.now(),
    };
    this.history.push(created);
    return { ...created };
  }

  async listEnquiries(): Promise<Enquiry[]> {
    return Array.from(this.enquiries.values()).map((enquiry) => ({ ...enquiry }));
  }

  async historyFor(enquiryId: number): Promise<EnquiryHistoryEntry[]> {
    return this.history.filter((entry) => entry.enquiryId === enquiryId).map((entry) => ({ ...entry }));
  }

  /**
   * Seed a reference as taken, as if an enquiry already used it.
   */
  reserveReference(reference: string, memberId = 0): void {
    const id = this.enquiries.size + 1;
    this.enquiries.set(id, {
      id,
      reference,
      title: '',
      description: '',
      status: 'closed',
      memberId,
      createdAt: this.now(),
    });
  }

  private hasReference(reference: string): boolean {
    for (const enquiry of this.enquiries.values()) {
      if (enquiry.reference === reference) {
        return true;
      }
    }
    return false;
  }
}

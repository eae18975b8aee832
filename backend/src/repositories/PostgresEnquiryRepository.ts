/**
 * PostgreSQL Member Directory and Enquiry Store
 * Rows are validated with zod on the way out of the driver.
 */

import { z } from 'zod';
import { QueryFn, QueryRows, TransactionRunner, query, withTransaction } from '../db';
import logger from '../utils/logger';
import { PersistenceError, errorMessage, parsePgError } from '../errors';
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

// ============================================================================
// Row Schemas
// ============================================================================

const memberRowSchema = z.object({
  id: z.coerce.number(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  is_active: z.boolean(),
});

const enquiryRowSchema = z.object({
  id: z.coerce.number(),
  reference: z.string(),
  title: z.string(),
  description: z.string(),
  status: z.enum(['new', 'open', 'closed']),
  member_id: z.coerce.number(),
  created_at: z.coerce.date(),
});

const historyRowSchema = z.object({
  id: z.coerce.number(),
  enquiry_id: z.coerce.number(),
  note: z.string(),
  note_type: z.enum(['general', 'enquiry_created', 'email_incoming', 'email_outgoing']),
  created_by: z.string(),
  created_at: z.coerce.date(),
});

const sequenceRowSchema = z.object({ next_number: z.coerce.number() });

function toMember(row: unknown): Member {
  const parsed = memberRowSchema.parse(row);
  return {
    id: parsed.id,
    firstName: parsed.first_name,
    lastName: parsed.last_name,
    email: parsed.email,
    isActive: parsed.is_active,
  };
}

function toEnquiry(row: unknown): Enquiry {
  const parsed = enquiryRowSchema.parse(row);
  return {
    id: parsed.id,
    reference: parsed.reference,
    title: parsed.title,
    description: parsed.description,
    status: parsed.status,
    memberId: parsed.member_id,
    createdAt: parsed.created_at,
  };
}

function toHistoryEntry(row: unknown): EnquiryHistoryEntry {
  const parsed = historyRowSchema.parse(row);
  return {
    id: parsed.id,
    enquiryId: parsed.enquiry_id,
    note: parsed.note,
    noteType: parsed.note_type,
    createdBy: parsed.created_by,
    createdAt: parsed.created_at,
  };
}

function firstRow(result: QueryRows, operation: string): unknown {
  const row = result.rows[0];
  if (!row) {
    throw new PersistenceError(`${operation} returned no row`, 'PERSIST_001', 'insert');
  }
  return row;
}

function toPersistenceError(error: unknown): unknown {
  if (error instanceof PersistenceError) {
    return error;
  }
  if (error instanceof Error && 'code' in error) {
    return parsePgError(error);
  }
  return error;
}

// ============================================================================
// Member Directory
// ============================================================================

export interface PostgresRepositoryOptions {
  tableName?: string;
}

export class PostgresMemberDirectory implements MemberDirectory {
  private readonly tableName: string;

  constructor(
    options: PostgresRepositoryOptions = {},
    private readonly runQuery: QueryFn = query
  ) {
    this.tableName = options.tableName || 'members';
  }

  async findByEmail(email: string): Promise<Member[]> {
    const result = await this.runQuery(
      `SELECT id, first_name, last_name, email, is_active
       FROM ${this.tableName}
       WHERE LOWER(email) = LOWER($1)
       ORDER BY is_active DESC, first_name, last_name`,
      [email]
    );
    return result.rows.map(toMember);
  }

  async findActiveByEmail(email: string): Promise<Member[]> {
    const result = await this.runQuery(
      `SELECT id, first_name, last_name, email, is_active
       FROM ${this.tableName}
       WHERE LOWER(email) = LOWER($1) AND is_active = TRUE
       ORDER BY first_name, last_name`,
      [email]
    );
    return result.rows.map(toMember);
  }
}

// ============================================================================
// Enquiry Store
// ============================================================================

export interface PostgresEnquiryStoreOptions {
  now?: () => Date;
}

export class PostgresEnquiryStore implements EnquiryStore {
  private readonly now: () => Date;

  constructor(
    options: PostgresEnquiryStoreOptions = {},
    private readonly runQuery: QueryFn = query,
    private readonly runTransaction: TransactionRunner = withTransaction
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Take the next number from the per-year sequence under a row lock,
   * skipping any reference an existing enquiry already holds.
   */
  async generateReference(): Promise<string> {
    const year = referenceYear(this.now());

    try {
      return await this.runTransaction(async (tx) => {
        await tx(
          `INSERT INTO reference_sequences (year, next_number) VALUES ($1, 1)
           ON CONFLICT (year) DO NOTHING`,
          [year]
        );

        const sequence = sequenceRowSchema.parse(
          firstRow(
            await tx('SELECT next_number FROM reference_sequences WHERE year = $1 FOR UPDATE', [year]),
            'Reference sequence lookup'
          )
        );

        let number = sequence.next_number;
        let reference = formatEnquiryReference(year, number);
        while ((await tx('SELECT 1 FROM enquiries WHERE reference = $1', [reference])).rows.length > 0) {
          number++;
          reference = formatEnquiryReference(year, number);
        }

        await tx('UPDATE reference_sequences SET next_number = $2 WHERE year = $1', [year, number + 1]);
        return reference;
      });
    } catch (error: unknown) {
      logger.error('Failed to generate enquiry reference', { year, error: errorMessage(error) });
      throw toPersistenceError(error);
    }
  }

  async createEnquiry(enquiry: NewEnquiry): Promise<Enquiry> {
    try {
      const result = await this.runQuery(
        `INSERT INTO enquiries (reference, title, description, status, member_id, created_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id, reference, title, description, status, member_id, created_at`,
        [enquiry.reference, enquiry.title, enquiry.description, enquiry.status, enquiry.memberId, this.now()]
      );
      return toEnquiry(firstRow(result, 'Enquiry insert'));
    } catch (error: unknown) {
      throw toPersistenceError(error);
    }
  }

  async addHistory(entry: NewHistoryEntry): Promise<EnquiryHistoryEntry> {
    try {
      const result = await this.runQuery(
        `INSERT INTO enquiry_history (enquiry_id, note, note_type, created_by, created_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, enquiry_id, note, note_type, created_by, created_at`,
        [entry.enquiryId, entry.note, entry.noteType, entry.createdBy, this.now()]
      );
      return toHistoryEntry(firstRow(result, 'History insert'));
    } catch (error: unknown) {
      throw toPersistenceError(error);
    }
  }
}

/**
 * Unit Tests for the member directory and enquiry store implementations
 * The Postgres variants run against a stubbed query function.
 */

import { QueryFn, QueryRows } from '../../db';
import { PersistenceError } from '../../errors';
import { formatEnquiryReference, referenceYear } from '../../repositories/enquiryReference';
import { MemoryEnquiryStore, MemoryMemberDirectory } from '../../repositories/MemoryEnquiryRepository';
import { PostgresEnquiryStore, PostgresMemberDirectory } from '../../repositories/PostgresEnquiryRepository';

const NOW = new Date('2024-03-05T10:00:00Z');

function rows(...values: Record<string, unknown>[]): QueryRows {
  return { rows: values, rowCount: values.length };
}

describe('enquiry references', () => {
  it('formats MEM-YY-NNNN', () => {
    expect(formatEnquiryReference(24, 1)).toBe('MEM-24-0001');
    expect(formatEnquiryReference(5, 123)).toBe('MEM-05-0123');
    expect(formatEnquiryReference(24, 12345)).toBe('MEM-24-12345');
  });

  it('uses the two-digit UTC year', () => {
    expect(referenceYear(new Date('2024-12-31T23:30:00Z'))).toBe(24);
    expect(referenceYear(new Date('2100-01-01T00:00:00Z'))).toBe(0);
  });
});

describe('MemoryMemberDirectory', () => {
  const directory = new MemoryMemberDirectory([
    { id: 1, firstName: 'Zoe', lastName: 'Active', email: 'shared@example.com', isActive: true },
    { id: 2, firstName: 'Adam', lastName: 'Former', email: 'SHARED@example.com', isActive: false },
    { id: 3, firstName: 'Amy', lastName: 'Active', email: 'shared@example.com', isActive: true },
    { id: 4, firstName: 'Other', lastName: 'Person', email: 'other@example.com', isActive: true },
  ]);

  it('matches case-insensitively with active members first', async () => {
    const found = await directory.findByEmail('Shared@Example.com');
    expect(found.map((member) => member.id)).toEqual([3, 1, 2]);
  });

  it('returns only active members from findActiveByEmail', async () => {
    const found = await directory.findActiveByEmail('shared@example.com');
    expect(found.map((member) => member.id)).toEqual([3, 1]);
  });
});

describe('MemoryEnquiryStore', () => {
  it('numbers references sequentially within a year', async () => {
    const store = new MemoryEnquiryStore({ now: () => NOW });

    expect(await store.generateReference()).toBe('MEM-24-0001');
    expect(await store.generateReference()).toBe('MEM-24-0002');
  });

  it('restarts numbering in a new year', async () => {
    let now = NOW;
    const store = new MemoryEnquiryStore({ now: () => now });

    expect(await store.generateReference()).toBe('MEM-24-0001');
    now = new Date('2025-01-02T09:00:00Z');
    expect(await store.generateReference()).toBe('MEM-25-0001');
  });

  it('rejects a duplicate reference', async () => {
    const store = new MemoryEnquiryStore({ now: () => NOW });
    const enquiry = {
      reference: 'MEM-24-0001',
      title: 'Bins',
      description: 'Missed collection',
      status: 'new' as const,
      memberId: 1,
    };

    await store.createEnquiry(enquiry);

    await expect(store.createEnquiry(enquiry)).rejects.toMatchObject({ code: 'PERSIST_002' });
  });
});

describe('PostgresMemberDirectory', () => {
  it('maps rows to members', async () => {
    const runQuery = jest.fn(async (_text: string, _params?: unknown[]) =>
      rows({ id: '7', first_name: 'Jane', last_name: 'Resident', email: 'jane@example.com', is_active: true })
    );
    const directory = new PostgresMemberDirectory({}, runQuery);

    const found = await directory.findActiveByEmail('Jane@Example.com');

    expect(found).toEqual([
      { id: 7, firstName: 'Jane', lastName: 'Resident', email: 'jane@example.com', isActive: true },
    ]);
    expect(runQuery).toHaveBeenCalledWith(expect.stringContaining('is_active = TRUE'), ['Jane@Example.com']);
  });

  it('queries the configured table', async () => {
    const runQuery = jest.fn(async (_text: string, _params?: unknown[]) => rows());
    const directory = new PostgresMemberDirectory({ tableName: 'council_members' }, runQuery);

    expect(await directory.findByEmail('jane@example.com')).toEqual([]);
    expect(runQuery).toHaveBeenCalledWith(expect.stringContaining('FROM council_members'), ['jane@example.com']);
  });
});

describe('PostgresEnquiryStore', () => {
  function createStore(runQuery: QueryFn) {
    const runTransaction = <T>(work: (tx: QueryFn) => Promise<T>): Promise<T> => work(runQuery);
    return new PostgresEnquiryStore({ now: () => NOW }, runQuery, runTransaction);
  }

  it('takes the next free number and advances the sequence', async () => {
    const runQuery = jest.fn(async (text: string, params?: unknown[]): Promise<QueryRows> => {
      if (text.startsWith('SELECT next_number')) {
        return rows({ next_number: '7' });
      }
      if (text.startsWith('SELECT 1 FROM enquiries')) {
        return params?.[0] === 'MEM-24-0007' ? rows({ exists: 1 }) : rows();
      }
      return rows();
    });

    expect(await createStore(runQuery).generateReference()).toBe('MEM-24-0008');
    expect(runQuery).toHaveBeenCalledWith('UPDATE reference_sequences SET next_number = $2 WHERE year = $1', [
      24,
      9,
    ]);
  });

  it('fails when the sequence row is missing', async () => {
    const runQuery = jest.fn(async (_text: string, _params?: unknown[]) => rows());

    await expect(createStore(runQuery).generateReference()).rejects.toThrow(
      'Reference sequence lookup returned no row'
    );
  });

  it('returns the inserted enquiry', async () => {
    const runQuery = jest.fn(async (_text: string, _params?: unknown[]) =>
      rows({
        id: '3',
        reference: 'MEM-24-0003',
        title: 'Bins',
        description: 'Missed collection',
        status: 'new',
        member_id: 1,
        created_at: '2024-03-05T10:00:00.000Z',
      })
    );

    const enquiry = await createStore(runQuery).createEnquiry({
      reference: 'MEM-24-0003',
      title: 'Bins',
      description: 'Missed collection',
      status: 'new',
      memberId: 1,
    });

    expect(enquiry).toEqual({
      id: 3,
      reference: 'MEM-24-0003',
      title: 'Bins',
      description: 'Missed collection',
      status: 'new',
      memberId: 1,
      createdAt: NOW,
    });
    expect(runQuery).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO enquiries'), [
      'MEM-24-0003',
      'Bins',
      'Missed collection',
      'new',
      1,
      NOW,
    ]);
  });

  it('maps a unique violation to a persistence error', async () => {
    const runQuery = jest.fn(async (_text: string, _params?: unknown[]): Promise<QueryRows> => {
      throw Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
    });

    const attempt = createStore(runQuery).createEnquiry({
      reference: 'MEM-24-0003',
      title: 'Bins',
      description: 'Missed collection',
      status: 'new',
      memberId: 1,
    });

    await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
    await expect(attempt).rejects.toMatchObject({ code: 'PERSIST_002' });
  });

  it('records history entries', async () => {
    const runQuery = jest.fn(async (_text: string, _params?: unknown[]) =>
      rows({
        id: 11,
        enquiry_id: 3,
        note: 'Enquiry created from email sent on unknown date',
        note_type: 'enquiry_created',
        created_by: 'officer.test',
        created_at: NOW,
      })
    );

    const entry = await createStore(runQuery).addHistory({
      enquiryId: 3,
      note: 'Enquiry created from email sent on unknown date',
      noteType: 'enquiry_created',
      createdBy: 'officer.test',
    });

    expect(entry).toEqual({
      id: 11,
      enquiryId: 3,
      note: 'Enquiry created from email sent on unknown date',
      noteType: 'enquiry_created',
      createdBy: 'officer.test',
      createdAt: NOW,
    });
  });
});

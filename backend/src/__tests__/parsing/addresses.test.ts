/**
 * Unit Tests for address helpers
 */

import { formatAddress, formatMailbox, formatRecipientList, parseAddress } from '../../parsing/addresses';

describe('addresses', () => {
  describe('parseAddress', () => {
    it('splits a display name from its address', () => {
      expect(parseAddress('John Smith <john@example.com>')).toEqual({
        name: 'John Smith',
        address: 'john@example.com',
      });
    });

    it('handles a quoted display name containing a comma', () => {
      expect(parseAddress('"Smith, John" <john@example.com>')).toEqual({
        name: 'Smith, John',
        address: 'john@example.com',
      });
    });

    it('finds the address in an unquoted "Last, First" entry', () => {
      expect(parseAddress('Smith, John <john@example.com>').address).toBe('john@example.com');
    });

    it('returns a bare address with an empty name', () => {
      expect(parseAddress('  bob@example.com ')).toEqual({ name: '', address: 'bob@example.com' });
    });

    it('returns empty parts when there is no address', () => {
      expect(parseAddress('Finance Team')).toEqual({ name: '', address: '' });
      expect(parseAddress('   ')).toEqual({ name: '', address: '' });
    });
  });

  describe('formatMailbox', () => {
    it('leaves plain names unquoted', () => {
      expect(formatMailbox('Jane Doe', 'jane@example.com')).toBe('Jane Doe <jane@example.com>');
    });

    it('quotes names with specials and escapes embedded quotes', () => {
      expect(formatMailbox('Smith, John', 'john@example.com')).toBe('"Smith, John" <john@example.com>');
      expect(formatMailbox('Jane "JD" Doe', 'jd@example.com')).toBe('"Jane \\"JD\\" Doe" <jd@example.com>');
    });

    it('produces entries that parse back to the same parts', () => {
      expect(parseAddress(formatMailbox('Smith, John', 'john@example.com'))).toEqual({
        name: 'Smith, John',
        address: 'john@example.com',
      });
    });
  });

  describe('formatAddress', () => {
    it('keeps a quoted display name quoted', () => {
      expect(formatAddress('"Smith, John" <john@example.com>')).toBe('"Smith, John" <john@example.com>');
    });

    it('renders name and address canonically', () => {
      expect(formatAddress('  Jane Doe   <jane@example.com>')).toBe('Jane Doe <jane@example.com>');
    });

    it('keeps an entry without an address as written', () => {
      expect(formatAddress(' Finance Team ')).toBe('Finance Team');
    });
  });

  describe('formatRecipientList', () => {
    it('formats each entry and joins with "; "', () => {
      expect(formatRecipientList('Jane Doe <jane@example.com>;  bob@example.com;')).toBe(
        'Jane Doe <jane@example.com>; bob@example.com'
      );
    });

    it('returns an empty string for missing input', () => {
      expect(formatRecipientList(null)).toBe('');
      expect(formatRecipientList(undefined)).toBe('');
      expect(formatRecipientList(' ; ; ')).toBe('');
    });
  });
});

/**
 * Unit Tests for DateResolver
 */

import logger from '../../utils/logger';
import { DateResolutionError } from '../../errors';
import {
  DateResolver,
  formatDisplayDate,
  fromTimeParts,
  parseTimestamp,
  zoneAbbreviation,
} from '../../parsing/DateResolver';

const LONDON = 'Europe/London';

describe('DateResolver', () => {
  const resolver = new DateResolver({ localTimeZone: LONDON, displayTimeZone: LONDON });

  describe('parseTimestamp', () => {
    it('keeps the zone of an aware timestamp', () => {
      expect(parseTimestamp('2024-06-15T09:00:00Z', LONDON).toISOString()).toBe('2024-06-15T09:00:00.000Z');
      expect(parseTimestamp('2024-06-15T09:00:00+01:00', LONDON).toISOString()).toBe(
        '2024-06-15T08:00:00.000Z'
      );
      expect(parseTimestamp('Sat, 15 Jun 2024 09:00:00 GMT', LONDON).toISOString()).toBe(
        '2024-06-15T09:00:00.000Z'
      );
    });

    it('localizes a naive timestamp in the local zone', () => {
      // BST is UTC+1
      expect(parseTimestamp('2024-06-15 10:00:00', LONDON).toISOString()).toBe('2024-06-15T09:00:00.000Z');
      // GMT is UTC+0
      expect(parseTimestamp('2024-01-10T09:00:00', LONDON).toISOString()).toBe('2024-01-10T09:00:00.000Z');
    });

    it('rejects text that is not a timestamp', () => {
      expect(() => parseTimestamp('next Tuesday', LONDON)).toThrow(DateResolutionError);
    });
  });

  describe('fromTimeParts', () => {
    it('localizes a naive tuple', () => {
      expect(fromTimeParts([2024, 6, 15, 10, 30, 0], LONDON).toISOString()).toBe('2024-06-15T09:30:00.000Z');
    });

    it('rejects out-of-range and rolled-over dates', () => {
      expect(() => fromTimeParts([2024, 13, 1, 0, 0, 0], LONDON)).toThrow(DateResolutionError);
      expect(() => fromTimeParts([2024, 6, 31, 10, 0, 0], LONDON)).toThrow(DateResolutionError);
      expect(() => fromTimeParts([2024, 6, 15], LONDON)).toThrow(DateResolutionError);
    });
  });

  describe('display formatting', () => {
    it('uses BST in summer and GMT in winter', () => {
      expect(zoneAbbreviation(new Date('2024-06-15T09:00:00Z'), LONDON)).toBe('BST');
      expect(zoneAbbreviation(new Date('2024-01-10T09:00:00Z'), LONDON)).toBe('GMT');
    });

    it('formats in the display zone', () => {
      expect(formatDisplayDate(new Date('2024-06-15T09:00:00Z'), LONDON)).toBe('Jun 15, 2024 10:00 BST');
      expect(formatDisplayDate(new Date('2024-01-10T09:00:00Z'), LONDON)).toBe('Jan 10, 2024 09:00 GMT');
    });
  });

  describe('resolve', () => {
    it('prefers the received time', () => {
      const result = resolver.resolve({
        receivedTime: '2024-06-15T09:00:00Z',
        sentTime: '2024-06-14T09:00:00Z',
      });

      expect(result.email_date.toISOString()).toBe('2024-06-15T09:00:00.000Z');
      expect(result.email_date_str).toBe('Jun 15, 2024 10:00 BST');
    });

    it('falls through an unparseable source to the next one', () => {
      const result = resolver.resolve({
        receivedTime: 'garbage',
        sentTime: '2024-01-10T09:00:00Z',
      });

      expect(result.email_date.toISOString()).toBe('2024-01-10T09:00:00.000Z');
      expect(result.email_date_str).toBe('Jan 10, 2024 09:00 GMT');
      expect(logger.warn).toHaveBeenCalledWith(
        'Could not parse date from message container',
        expect.objectContaining({ source: 'receivedTime' })
      );
    });

    it('uses sent-time parts when no timestamp string exists', () => {
      const result = resolver.resolve({ sentTimeParts: [2024, 6, 15, 10, 0, 0] });
      expect(result.email_date.toISOString()).toBe('2024-06-15T09:00:00.000Z');
    });

    it('falls back to the injected clock when nothing is usable', () => {
      const fixed = new DateResolver({
        localTimeZone: LONDON,
        displayTimeZone: LONDON,
        now: () => new Date('2024-03-01T12:00:00Z'),
      });

      const result = fixed.resolve({ receivedTime: null, sentTime: 'not a date' });

      expect(result.email_date.toISOString()).toBe('2024-03-01T12:00:00.000Z');
      expect(result.email_date_str).toBe('Mar 01, 2024 12:00 GMT');
    });

    it('falls back to the current time within 10 seconds', () => {
      const before = Date.now();
      const result = resolver.resolve({});

      expect(Math.abs(result.email_date.getTime() - before)).toBeLessThan(10_000);
    });

    it('never throws for an unknown display zone', () => {
      const broken = new DateResolver({
        localTimeZone: LONDON,
        displayTimeZone: 'Not/AZone',
        now: () => new Date('2024-03-01T12:00:00Z'),
      });

      const result = broken.resolve({});
      expect(result.email_date.toISOString()).toBe('2024-03-01T12:00:00.000Z');
      expect(result.email_date_str).toBe('Mar 01, 2024 12:00 UTC');
    });
  });
});

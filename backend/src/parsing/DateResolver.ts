/**
 * Date Resolver
 * Picks the best timestamp a container offers and normalizes it to a UTC
 * instant plus a display string in the display zone (GMT/BST for the UK).
 *
 * Source order: received time, sent time, naive sent-time parts. Naive
 * values are wall-clock times in the deployment's local zone. When nothing
 * usable exists the current instant is returned; resolution never throws.
 */

import { isValid } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import logger from '../utils/logger';
import { DateResolutionError, errorMessage } from '../errors';
import { MailContainer } from './types';

export interface ResolvedDate {
  /** UTC instant */
  email_date: Date;
  /** e.g. `Jun 15, 2024 10:00 BST` */
  email_date_str: string;
}

export interface DateResolverOptions {
  /** Zone naive timestamps are assumed to be in */
  localTimeZone: string;
  /** Zone of the display string */
  displayTimeZone: string;
  now?: () => Date;
}

type DateFields = Pick<MailContainer, 'receivedTime' | 'sentTime' | 'sentTimeParts'>;

/** Returns the instant, or null when the source is absent. Throws when present but unusable. */
type DateSource = (fields: DateFields, localTimeZone: string) => Date | null;

const DISPLAY_FORMAT = 'MMM dd, yyyy HH:mm';

const AWARE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2}|\b(?:GMT|UTC))(?:\s*\([^)]*\))?$/i;
const NAIVE_ISO = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Interpret a container timestamp string. Aware strings keep their zone;
 * naive ISO-like strings are wall-clock times in `localTimeZone`.
 */
export function parseTimestamp(value: string, localTimeZone: string): Date {
  const trimmed = value.trim();
  let parsed: Date;

  if (AWARE_SUFFIX.test(trimmed)) {
    parsed = new Date(trimmed);
  } else if (NAIVE_ISO.test(trimmed)) {
    parsed = fromZonedTime(trimmed, localTimeZone);
  } else {
    throw DateResolutionError.unparseable(value);
  }

  if (!isValid(parsed)) {
    throw DateResolutionError.unparseable(value);
  }
  return parsed;
}

/**
 * Localize a naive [year, month, day, hour, minute, second] tuple.
 */
export function fromTimeParts(parts: readonly number[], localTimeZone: string): Date {
  const [year, month, day, hour, minute, second] = parts;
  const fields = [year, month, day, hour, minute, second];

  if (parts.length < 6 || !fields.every((n) => Number.isInteger(n))) {
    throw DateResolutionError.unparseable(JSON.stringify(parts));
  }
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    throw DateResolutionError.unparseable(JSON.stringify(parts));
  }

  const wallClock = `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
  const parsed = fromZonedTime(wallClock, localTimeZone);

  // fromZonedTime rolls 31 June over to 1 July; reject instead
  if (!isValid(parsed) || formatInTimeZone(parsed, localTimeZone, 'd') !== String(day)) {
    throw DateResolutionError.unparseable(JSON.stringify(parts));
  }
  return parsed;
}

export const DATE_SOURCES: ReadonlyArray<{ name: string; resolve: DateSource }> = [
  {
    name: 'receivedTime',
    resolve: (fields, tz) => (fields.receivedTime ? parseTimestamp(fields.receivedTime, tz) : null),
  },
  {
    name: 'sentTime',
    resolve: (fields, tz) => (fields.sentTime ? parseTimestamp(fields.sentTime, tz) : null),
  },
  {
    name: 'sentTimeParts',
    resolve: (fields, tz) =>
      fields.sentTimeParts && fields.sentTimeParts.length > 0
        ? fromTimeParts(fields.sentTimeParts, tz)
        : null,
  },
];

/**
 * Time zone abbreviation for an instant, e.g. GMT or BST for Europe/London.
 */
export function zoneAbbreviation(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    timeZoneName: 'short',
  }).formatToParts(date);

  return parts.find((part) => part.type === 'timeZoneName')?.value ?? timeZone;
}

/**
 * Display string in a fixed zone, e.g. `Jun 15, 2024 10:00 BST`.
 */
export function formatDisplayDate(date: Date, timeZone: string): string {
  return `${formatInTimeZone(date, timeZone, DISPLAY_FORMAT)} ${zoneAbbreviation(date, timeZone)}`;
}

export class DateResolver {
  private readonly now: () => Date;

  constructor(private readonly options: DateResolverOptions) {
    this.now = options.now ?? (() => new Date());
  }

  resolve(fields: DateFields): ResolvedDate {
    for (const source of DATE_SOURCES) {
      try {
        const instant = source.resolve(fields, this.options.localTimeZone);
        if (instant) {
          return this.toResolved(instant);
        }
      } catch (error: unknown) {
        logger.warn('Could not parse date from message container', {
          source: source.name,
          error: errorMessage(error),
        });
      }
    }

    logger.warn('No usable date in message container, using current time', {
      error: DateResolutionError.noSource().message,
    });
    const now = this.now();
    try {
      return this.toResolved(now);
    } catch (error: unknown) {
      logger.warn('Display time zone rejected, formatting in UTC', {
        timeZone: this.options.displayTimeZone,
        error: errorMessage(error),
      });
      return { email_date: now, email_date_str: formatDisplayDate(now, 'UTC') };
    }
  }

  private toResolved(instant: Date): ResolvedDate {
    return {
      email_date: new Date(instant.getTime()),
      email_date_str: formatDisplayDate(instant, this.options.displayTimeZone),
    };
  }
}

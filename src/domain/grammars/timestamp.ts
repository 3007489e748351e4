import type { ClockContext } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

const MONTHS: Readonly<Record<string, number>> = {
  Jan: 1, Feb: 2, Mar: 3, Apr: 4, May: 5, Jun: 6,
  Jul: 7, Aug: 8, Sep: 9, Oct: 10, Nov: 11, Dec: 12,
};

interface DateParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

/**
 * A timestamp form accepted at the start of a BSD syslog header.
 *
 * `pattern` is anchored at the start and must be followed by a space or the
 * end of input.
 */
export interface TimestampFormat {
  readonly name: string;
  readonly pattern: RegExp;
  toDate(match: RegExpExecArray, clock: ClockContext): Date | null;
}

export interface LeadingTimestamp {
  readonly timestamp: Date;
  readonly format: string;
  /** Text after the timestamp with the separating spaces removed. */
  readonly rest: string;
}

function group(match: RegExpExecArray, index: number): string {
  return match[index] ?? '';
}

/** First three fractional digits as milliseconds; finer digits are dropped. */
function fractionToMs(digits: string): number {
  if (digits === '') return 0;
  return Number(digits.padEnd(3, '0').slice(0, 3));
}

function daysInMonth(year: number, month: number): number {
  const probe = new Date(0);
  probe.setUTCFullYear(year, month, 0);
  return probe.getUTCDate();
}

/**
 * Build a Date from wall-clock parts observed at `offsetMinutes` from UTC.
 * Returns null for any out-of-range part, including impossible calendar days.
 */
export function partsToDate(parts: DateParts, offsetMinutes: number): Date | null {
  const { year, month, day, hour, minute, second, millisecond } = parts;
  if (year < 0 || year > 9999) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);
  return new Date(date.getTime() - offsetMinutes * MINUTE_MS);
}

/** `Z`, `+hh:mm` or `+hhmm` to minutes east of UTC; null when out of range. */
export function parseUtcOffset(text: string): number | null {
  if (text === 'Z' || text === 'z') return 0;
  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(text);
  if (!match) return null;

  const hours = Number(group(match, 2));
  const minutes = Number(group(match, 3));
  if (hours > 23 || minutes > 59) return null;

  const sign = group(match, 1) === '-' ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

/**
 * Pick the year for a timestamp that carries none.
 *
 * The reference year is used unless that puts the event more than a day
 * after the reference time, in which case it is last year's event.
 */
export function inferYear(parts: Omit<DateParts, 'year'>, clock: ClockContext): number {
  const localReference = clock.referenceTime + clock.utcOffsetMinutes * MINUTE_MS;
  const referenceYear = new Date(localReference).getUTCFullYear();

  // Date.UTC rolls Feb 29 over to Mar 1, which is close enough to compare
  const candidate = Date.UTC(
    referenceYear,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
    parts.millisecond,
  );
  return candidate > localReference + DAY_MS ? referenceYear - 1 : referenceYear;
}

function bsdToDate(
  monthName: string,
  day: string,
  hour: string,
  minute: string,
  second: string,
  fraction: string,
  year: string | null,
  clock: ClockContext,
): Date | null {
  const month = MONTHS[monthName];
  if (month === undefined) return null;

  const wallClock = {
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    millisecond: fractionToMs(fraction),
  };
  return partsToDate(
    { year: year === null ? inferYear(wallClock, clock) : Number(year), ...wallClock },
    clock.utcOffsetMinutes,
  );
}

const END = '(?= |$)';
const BSD_DATE = '([A-Z][a-z]{2}) +(\\d{1,2})';
const CLOCK = '(\\d{2}):(\\d{2}):(\\d{2})(?:\\.(\\d{1,9}))?';

/** Header timestamp forms, tried in this order. */
export const HEADER_TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    name: 'iso8601',
    pattern: new RegExp(
      `^(\\d{4})-(\\d{2})-(\\d{2})[Tt ](\\d{2}):(\\d{2}):(\\d{2})(?:[.,](\\d{1,9}))?(Z|z|[+-]\\d{2}:?\\d{2})?${END}`,
    ),
    toDate(m, clock) {
      const zone = group(m, 8);
      const offset = zone === '' ? clock.utcOffsetMinutes : parseUtcOffset(zone);
      if (offset === null) return null;
      return partsToDate(
        {
          year: Number(group(m, 1)),
          month: Number(group(m, 2)),
          day: Number(group(m, 3)),
          hour: Number(group(m, 4)),
          minute: Number(group(m, 5)),
          second: Number(group(m, 6)),
          millisecond: fractionToMs(group(m, 7)),
        },
        offset,
      );
    },
  },
  {
    name: 'year_first_bsd',
    pattern: new RegExp(`^(\\d{4}) ${BSD_DATE} ${CLOCK}${END}`),
    toDate: (m, clock) =>
      bsdToDate(group(m, 2), group(m, 3), group(m, 4), group(m, 5), group(m, 6), group(m, 7), group(m, 1), clock),
  },
  {
    name: 'bsd_trailing_year',
    pattern: new RegExp(`^${BSD_DATE} ${CLOCK} (\\d{4})${END}`),
    toDate: (m, clock) =>
      bsdToDate(group(m, 1), group(m, 2), group(m, 3), group(m, 4), group(m, 5), group(m, 6), group(m, 7), clock),
  },
  {
    name: 'bsd_year_after_day',
    pattern: new RegExp(`^${BSD_DATE} (\\d{4}) ${CLOCK}${END}`),
    toDate: (m, clock) =>
      bsdToDate(group(m, 1), group(m, 2), group(m, 4), group(m, 5), group(m, 6), group(m, 7), group(m, 3), clock),
  },
  {
    name: 'bsd',
    pattern: new RegExp(`^${BSD_DATE} ${CLOCK}${END}`),
    toDate: (m, clock) =>
      bsdToDate(group(m, 1), group(m, 2), group(m, 3), group(m, 4), group(m, 5), group(m, 6), null, clock),
  },
  {
    name: 'epoch',
    pattern: new RegExp(`^(\\d{10,19})(?:[.,](\\d{1,9}))?${END}`),
    toDate(m) {
      const digits = group(m, 1);
      // digits past the tenth are the sub-second part (ms, us or ns)
      const fraction = digits.length > 10 ? digits.slice(10) : group(m, 2);
      return new Date(Number(digits.slice(0, 10)) * 1000 + fractionToMs(fraction));
    },
  },
];

/**
 * Match a timestamp at the very start of `text`.
 *
 * A form whose text matches but whose value is not a real date (Feb 30,
 * hour 25) stops the search: the text is not a timestamp at all.
 */
export function parseLeadingTimestamp(
  text: string,
  clock: ClockContext,
): LeadingTimestamp | null {
  for (const format of HEADER_TIMESTAMP_FORMATS) {
    const match = format.pattern.exec(text);
    if (!match) continue;

    const timestamp = format.toDate(match, clock);
    if (timestamp === null) return null;

    return {
      timestamp,
      format: format.name,
      rest: text.slice(match[0].length).replace(/^ +/, ''),
    };
  }
  return null;
}

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?(Z|[+-]\d{2}:\d{2})$/;

/** Strict RFC3339 as RFC5424 allows it: 1-6 fractional digits, explicit zone. */
export function parseRfc3339(text: string): Date | null {
  const match = RFC3339.exec(text);
  if (!match) return null;

  const offset = parseUtcOffset(group(match, 8));
  if (offset === null) return null;

  return partsToDate(
    {
      year: Number(group(match, 1)),
      month: Number(group(match, 2)),
      day: Number(group(match, 3)),
      hour: Number(group(match, 4)),
      minute: Number(group(match, 5)),
      second: Number(group(match, 6)),
      millisecond: fractionToMs(group(match, 7)),
    },
    offset,
  );
}

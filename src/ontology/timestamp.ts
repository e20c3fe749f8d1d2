import { z } from 'zod';

/**
 * ISO-8601 calendar date with an optional time. A time of day must carry
 * `Z` or a numeric offset so the instant is unambiguous.
 */
export const ISO_8601_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2}))?$/;

/** Canonical timestamps always start with a four-digit year. */
const CANONICAL_YEAR_PATTERN = /^\d{4}-/;

function hasValidFields(match: RegExpExecArray): boolean {
  const [year, month, day, hour = 0, minute = 0, second = 0] = match.slice(1).map((field) =>
    field === undefined ? undefined : Number(field),
  );
  if (year === undefined || month === undefined || day === undefined) return false;
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return false;
  // Day 0 of the next month is the last day of this one.
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= daysInMonth;
}

/** Canonical form of epoch milliseconds, or null outside years 0000-9999. */
export function timestampFromMillis(millis: number): string | null {
  const date = new Date(millis);
  if (Number.isNaN(date.getTime())) return null;
  const iso = date.toISOString();
  return CANONICAL_YEAR_PATTERN.test(iso) ? iso : null;
}

/**
 * Convert an ISO-8601 string to the canonical `YYYY-MM-DDTHH:mm:ss.sssZ` form.
 * Returns null when the string is not an ISO-8601 instant or names a calendar
 * field out of range (February 30, hour 25).
 */
export function canonicalTimestamp(value: string): string | null {
  const match = ISO_8601_PATTERN.exec(value);
  if (match === null || !hasValidFields(match)) {
    return null;
  }
  return timestampFromMillis(Date.parse(value));
}

export function timestampMillis(timestamp: string): number {
  return Date.parse(timestamp);
}

/** Canonical UTC timestamp. Accepts ISO-8601 strings and valid `Date` objects. */
export const TimestampSchema = z.preprocess(
  (value) => (value instanceof Date && !Number.isNaN(value.getTime()) ? value.toISOString() : value),
  z.string().transform((value, ctx) => {
    const canonical = canonicalTimestamp(value);
    if (canonical === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Not an ISO-8601 instant: "${value}"`,
        params: { kind: 'type_mismatch' },
      });
      return z.NEVER;
    }
    return canonical;
  }),
);

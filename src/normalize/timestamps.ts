/**
 * Timestamp parsing for raw trace documents.
 *
 * Accepted encodings:
 *   - ISO-8601 strings, with `Z`, a numeric offset, or no zone (read as UTC)
 *   - a space instead of `T` between date and time
 *   - epoch numbers or numeric strings: seconds below 1e11, milliseconds otherwise
 *
 * Instants outside years 0000-9999 are rejected.
 */

import { NormalizationError } from '../shared/errors.js';
import { canonicalTimestamp, timestampFromMillis } from '../ontology/timestamp.js';
import type { RawValue } from './types.js';

const EPOCH_SECONDS_LIMIT = 1e11;
const NUMERIC_PATTERN = /^-?\d+(?:\.\d+)?$/;
const ZONE_SUFFIX_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

function fromEpoch(value: number): string | null {
  if (!Number.isFinite(value)) return null;
  return timestampFromMillis(Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * 1000 : value);
}

function fromIsoString(value: string): string | null {
  let candidate = value.replace(/^(\d{4}-\d{2}-\d{2}) (\d{2}:)/, '$1T$2');
  if (candidate.includes('T') && !ZONE_SUFFIX_PATTERN.test(candidate)) {
    candidate = `${candidate}Z`;
  }
  candidate = candidate.replace(/z$/, 'Z');
  return canonicalTimestamp(candidate);
}

/**
 * Parse a raw timestamp into the canonical UTC form, or throw
 * NormalizationError(`invalid_timestamp`) naming `path`.
 */
export function parseRawTimestamp(value: RawValue, path: string): string {
  let parsed: string | null = null;
  if (typeof value === 'number') {
    parsed = fromEpoch(value);
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    parsed = NUMERIC_PATTERN.test(trimmed) ? fromEpoch(Number(trimmed)) : fromIsoString(trimmed);
  }

  if (parsed === null) {
    throw new NormalizationError('invalid_timestamp', 'Unparseable timestamp', path, value);
  }
  return parsed;
}

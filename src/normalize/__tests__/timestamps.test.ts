import { describe, expect, it } from 'vitest';
import { NormalizationError } from '../../shared/errors.js';
import { parseRawTimestamp } from '../timestamps.js';

const EXPECTED = '2026-03-01T10:00:00.000Z';

describe('parseRawTimestamp', () => {
  it.each([
    ['Z suffix', '2026-03-01T10:00:00Z'],
    ['lowercase z', '2026-03-01T10:00:00z'],
    ['numeric offset', '2026-03-01T12:00:00+02:00'],
    ['no zone', '2026-03-01T10:00:00'],
    ['space separator', '2026-03-01 10:00:00'],
    ['fractional seconds', '2026-03-01T10:00:00.000000Z'],
  ])('parses ISO strings with %s', (_label, value) => {
    expect(parseRawTimestamp(value, 'timestamp')).toBe(EXPECTED);
  });

  it('reads a bare date as midnight UTC', () => {
    expect(parseRawTimestamp('2026-03-01', 'timestamp')).toBe('2026-03-01T00:00:00.000Z');
  });

  it('reads small epoch numbers as seconds and large ones as milliseconds', () => {
    expect(parseRawTimestamp(1772359200, 'timestamp')).toBe(EXPECTED);
    expect(parseRawTimestamp(1772359200000, 'timestamp')).toBe(EXPECTED);
    expect(parseRawTimestamp(1772359200.5, 'timestamp')).toBe('2026-03-01T10:00:00.500Z');
  });

  it('reads numeric strings as epoch values', () => {
    expect(parseRawTimestamp('1772359200', 'timestamp')).toBe(EXPECTED);
    expect(parseRawTimestamp(' 1772359200000 ', 'timestamp')).toBe(EXPECTED);
  });

  it.each([
    ['soon'],
    [true],
    [null],
    [{ at: 1 }],
    [['2026-03-01']],
    ['03/01/2026'],
    ['2026-02-30T00:00:00Z'],
    ['2026-03-01 25:00:00'],
    ['2025-02-29'],
    [1e15],
    ['-62198755200000'],
  ])(
    'rejects %j',
    (value) => {
      let caught: unknown;
      try {
        parseRawTimestamp(value, 'steps[2].timestamp');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(NormalizationError);
      if (caught instanceof NormalizationError) {
        expect(caught.kind).toBe('invalid_timestamp');
        expect(caught.path).toBe('steps[2].timestamp');
        expect(caught.value).toEqual(value);
      }
    },
  );
});

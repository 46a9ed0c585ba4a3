import { describe, expect, it } from 'vitest';
import { normalizeTimestamp, padFractionalSeconds, parseTimestamp } from '../timestamp.js';

describe('padFractionalSeconds', () => {
  it('pads short fractions to microseconds and rewrites Z', () => {
    expect(padFractionalSeconds('2024-05-01T10:15:30.45Z')).toBe('2024-05-01T10:15:30.450000+00:00');
    expect(padFractionalSeconds('2024-05-01T10:15:30.4')).toBe('2024-05-01T10:15:30.400000');
  });

  it('keeps a numeric offset glued to the fraction intact', () => {
    expect(padFractionalSeconds('2024-05-01T10:15:30.4+02:00')).toBe('2024-05-01T10:15:30.400000+02:00');
    expect(padFractionalSeconds('2024-05-01T10:15:30.123-05:00')).toBe('2024-05-01T10:15:30.123000-05:00');
  });

  it('leaves values without a fraction alone apart from Z', () => {
    expect(padFractionalSeconds('2024-05-01T10:15:30+01:00')).toBe('2024-05-01T10:15:30+01:00');
    expect(padFractionalSeconds('2024-05-01T10:15:30Z')).toBe('2024-05-01T10:15:30+00:00');
  });
});

describe('normalizeTimestamp', () => {
  it('reads a truncated UTC fraction', () => {
    const result = normalizeTimestamp('2024-05-01T10:15:30.45Z');
    expect(result.ok).toBe(true);
    expect(result.ok && result.value.toISOString()).toBe('2024-05-01T10:15:30.450Z');
  });

  it('applies positive and negative offsets', () => {
    expect(parseTimestamp('2024-05-01T10:15:30.4+02:00')?.toISOString()).toBe('2024-05-01T08:15:30.400Z');
    expect(parseTimestamp('2024-05-01T10:15:30.123-05:00')?.toISOString()).toBe('2024-05-01T15:15:30.123Z');
  });

  it('matches the fully-qualified microsecond form for 1-6 fractional digits', () => {
    const fractions = ['1', '12', '123', '1234', '12345', '123456'];
    const suffixes = ['Z', '+00:00', '-03:30', '+05:45', ''];

    for (const digits of fractions) {
      for (const suffix of suffixes) {
        const short = parseTimestamp(`2024-05-01T10:15:30.${digits}${suffix}`);
        const full = parseTimestamp(`2024-05-01T10:15:30.${digits.padEnd(6, '0')}${suffix}`);
        const millis = digits.padEnd(3, '0').slice(0, 3);
        const expected = new Date(`2024-05-01T10:15:30.${millis}${suffix || 'Z'}`);

        expect(short?.getTime()).toBe(full?.getTime());
        expect(short?.getTime()).toBe(expected.getTime());
      }
    }
  });

  it('treats values without an offset as UTC', () => {
    expect(parseTimestamp('2024-05-01T10:15:30')?.toISOString()).toBe('2024-05-01T10:15:30.000Z');
    expect(parseTimestamp('2024-05-01')?.toISOString()).toBe('2024-05-01T00:00:00.000Z');
  });

  it('reports missing input', () => {
    for (const raw of ['', '   ', undefined, null]) {
      const result = normalizeTimestamp(raw);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.kind).toBe('missing');
    }
  });

  it('reports values that cannot be parsed', () => {
    for (const raw of ['yesterday', '2024-13-01T00:00:00Z', '2024-02-30T00:00:00Z', '2024-05-01T10:15:30.1234567Z']) {
      const result = normalizeTimestamp(raw);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.kind).toBe('invalid');
    }
    expect(parseTimestamp('2024-05-01T25:00:00Z')).toBeNull();
  });
});

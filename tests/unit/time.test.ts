import { describe, it, expect } from 'vitest';
import { addDays, dayKey, isDayKey, parseTimestamp, recencyFactor } from '../../src/utils/time.js';

describe('parseTimestamp', () => {
  it.each([
    ['2026-03-10', '2026-03-10T00:00:00.000Z'],
    ['2026-03-10 12:30:00', '2026-03-10T12:30:00.000Z'],
    ['2026-03-10T12:30:00', '2026-03-10T12:30:00.000Z'],
    ['2026-03-10T12:30:00+02:00', '2026-03-10T10:30:00.000Z'],
    [' 2026-03-10T12:30:00.250Z ', '2026-03-10T12:30:00.250Z'],
  ])('reads %s as UTC', (raw, iso) => {
    expect(parseTimestamp(raw)?.toISOString()).toBe(iso);
  });

  it('returns null for anything else', () => {
    expect(parseTimestamp('yesterday-ish')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(new Date('nope'))).toBeNull();
  });

  it.each(['2026-02-30T10:00:00Z', '2026-02-29', '2026-13-01T00:00:00Z', '2026-04-31 08:00:00', '2026-00-10'])(
    'rejects the impossible calendar date in %s',
    (raw) => {
      expect(parseTimestamp(raw)).toBeNull();
    },
  );

  it('accepts leap days and month ends', () => {
    expect(parseTimestamp('2028-02-29T10:00:00Z')?.toISOString()).toBe('2028-02-29T10:00:00.000Z');
    expect(parseTimestamp('2026-01-31')?.toISOString()).toBe('2026-01-31T00:00:00.000Z');
  });
});

describe('day keys', () => {
  it('works in UTC calendar days', () => {
    expect(dayKey(new Date('2026-03-10T23:59:59Z'))).toBe('2026-03-10');
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
    expect(addDays('2026-12-31', 1)).toBe('2027-01-01');
    expect(isDayKey('2026-03-10')).toBe(true);
    expect(isDayKey('2026-3-1')).toBe(false);
    expect(isDayKey('2026-02-31')).toBe(false);
    expect(isDayKey('2026-13-01')).toBe(false);
    expect(isDayKey('2028-02-29')).toBe(true);
  });
});

describe('recencyFactor', () => {
  const now = new Date('2026-03-14T12:00:00Z');

  it('decays linearly over the window and floors at 0.1', () => {
    expect(recencyFactor(now, now)).toBe(1);
    expect(recencyFactor(new Date('2026-03-11T00:00:00Z'), now)).toBe(0.5);
    expect(recencyFactor(new Date('2026-02-01T00:00:00Z'), now)).toBe(0.1);
  });

  it('treats future timestamps as fresh', () => {
    expect(recencyFactor(new Date('2026-03-15T00:00:00Z'), now)).toBe(1);
  });
});

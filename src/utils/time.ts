const HOUR_MS = 3600 * 1000;
export const DAY_MS = 24 * HOUR_MS;

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;
const SQL_DATETIME = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/** UTC calendar day key, YYYY-MM-DD. */
export function dayKey(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function addDays(day: string, delta: number): string {
  return dayKey(new Date(Date.parse(`${day}T00:00:00Z`) + delta * DAY_MS));
}

const LEADING_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

// Date.parse rolls impossible days forward (Feb 30 -> Mar 2)
function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function hasCalendarDate(raw: string): boolean {
  const m = LEADING_DATE.exec(raw);
  return !m || isCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

export function isDayKey(value: string): boolean {
  return ISO_DAY.test(value) && hasCalendarDate(value);
}

/**
 * Parses ISO-8601 (with or without offset), `YYYY-MM-DD HH:MM:SS` and
 * `YYYY-MM-DD`. Offset-less values are read as UTC. Returns null when the
 * value is not a timestamp or names a day the calendar does not have.
 */
export function parseTimestamp(value: string | Date | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  const raw = value.trim();
  if (!raw || !hasCalendarDate(raw)) return null;
  let normalized = raw;
  if (ISO_DAY.test(raw)) normalized = `${raw}T00:00:00Z`;
  else if (SQL_DATETIME.test(raw)) normalized = `${raw.replace(' ', 'T')}Z`;
  else if (/^\d{4}-\d{2}-\d{2}T[\d:.]+$/.test(raw)) normalized = `${raw}Z`;
  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function hoursBetween(later: Date, earlier: Date): number {
  return (later.getTime() - earlier.getTime()) / HOUR_MS;
}

/** Linear decay from 1.0 at `now` to `floor` at `windowHours`, never below `floor`. */
export function recencyFactor(
  publishedAt: Date,
  now: Date,
  windowHours = 168,
  floor = 0.1,
): number {
  const ageHours = Math.max(0, hoursBetween(now, publishedAt));
  return Math.max(floor, 1.0 - ageHours / windowHours);
}

import { isValid } from 'date-fns';
import { InvalidInputError } from './error';

/** A wall-calendar day, independent of any time zone. */
export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;
const DAY_MS = 86_400_000;

export type Weekday = (typeof WEEKDAYS)[number];

export function weekdayLabels(): Weekday[] {
  return [...WEEKDAYS];
}

/**
 * Parses a stored timestamp. PostgREST returns timestamptz with an offset, but
 * rows written as naive "YYYY-MM-DD HH:MM:SS" strings are UTC.
 */
export function parseTimestamp(raw: unknown): Date | null {
  if (raw instanceof Date) return isValid(raw) ? raw : null;
  if (typeof raw !== 'string' || !raw.trim()) return null;
  let s = raw.trim().replace(' ', 'T');
  if (/^\d{4}-\d{2}-\d{2}$/.test(s)) s += 'T00:00:00';
  if (!/(Z|[+-]\d{2}:?\d{2})$/i.test(s)) s += 'Z';
  const d = new Date(s);
  return isValid(d) ? d : null;
}

/**
 * Parses a YYYY-MM-DD query parameter.
 * @throws InvalidInputError when the string is not a real calendar day
 */
export function parseDateParam(value: string, name: string = 'date'): CalendarDate {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!m) throw new InvalidInputError(`Invalid ${name}: expected YYYY-MM-DD, got "${value}"`);
  const date = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
  const probe = new Date(Date.UTC(date.year, date.month - 1, date.day));
  if (probe.getUTCMonth() !== date.month - 1 || probe.getUTCDate() !== date.day) {
    throw new InvalidInputError(`Invalid ${name}: "${value}" is not a calendar day`);
  }
  return date;
}

export function formatCalendarDate({ year, month, day }: CalendarDate): string {
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function toUtcMidnight({ year, month, day }: CalendarDate): number {
  return Date.UTC(year, month - 1, day);
}

function fromUtcMs(ms: number): CalendarDate {
  const d = new Date(ms);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcMs(toUtcMidnight(date) + days * DAY_MS);
}

/** Days from `a` to `b` (negative when b is earlier). */
export function calendarDaysBetween(a: CalendarDate, b: CalendarDate): number {
  return Math.round((toUtcMidnight(b) - toUtcMidnight(a)) / DAY_MS);
}

/** 0 = Monday … 6 = Sunday */
export function weekdayIndex(date: CalendarDate): number {
  return (new Date(toUtcMidnight(date)).getUTCDay() + 6) % 7;
}

export function mondayOf(date: CalendarDate): CalendarDate {
  return addCalendarDays(date, -weekdayIndex(date));
}

export function monthLabel(year: number, month: number): string {
  return `${MONTH_NAMES[month - 1]} ${String(year % 100).padStart(2, '0')}`;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

interface ZonedParts extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let dtf = formatters.get(timeZone);
  if (!dtf) {
    dtf = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric', month: '2-digit', day: '2-digit',
      hour: '2-digit', minute: '2-digit', second: '2-digit',
    });
    formatters.set(timeZone, dtf);
  }
  return dtf;
}

/** Wall-clock fields of an instant as seen in `timeZone`. */
export function zonedParts(at: Date, timeZone: string): ZonedParts {
  const map: Record<string, string> = {};
  for (const p of formatterFor(timeZone).formatToParts(at)) map[p.type] = p.value;
  return {
    year: Number(map.year),
    month: Number(map.month),
    day: Number(map.day),
    hour: Number(map.hour) % 24,
    minute: Number(map.minute),
    second: Number(map.second),
  };
}

export function calendarDateIn(at: Date, timeZone: string): CalendarDate {
  const { year, month, day } = zonedParts(at, timeZone);
  return { year, month, day };
}

/** "HH:mm" in `timeZone`. */
export function formatClock(at: Date, timeZone: string): string {
  const { hour, minute } = zonedParts(at, timeZone);
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/** "10 Mar 2024" in `timeZone`. */
export function formatDisplayDate(at: Date, timeZone: string): string {
  const { year, month, day } = zonedParts(at, timeZone);
  return `${String(day).padStart(2, '0')} ${MONTH_NAMES[month - 1]} ${year}`;
}

/** "hh:mm AM" in `timeZone`. */
export function formatClock12(at: Date, timeZone: string): string {
  const { hour, minute } = zonedParts(at, timeZone);
  const h12 = hour % 12 || 12;
  return `${String(h12).padStart(2, '0')}:${String(minute).padStart(2, '0')} ${hour < 12 ? 'AM' : 'PM'}`;
}

/**
 * The UTC instant of local midnight starting `date` in `timeZone`.
 */
export function zonedStartOfDay(date: CalendarDate, timeZone: string): Date {
  const baseUtc = toUtcMidnight(date);
  const offsetMinutesAt = (at: Date) => {
    const p = zonedParts(at, timeZone);
    // asUTC is the UTC ms when 'at' is represented in the target timezone.
    // The difference gives timezone offset in ms at that instant.
    const asUTC = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
    return (asUTC - Math.floor(at.getTime() / 1000) * 1000) / 60000;
  };
  const off1 = offsetMinutesAt(new Date(baseUtc));
  let utcMs = baseUtc - off1 * 60000;
  const off2 = offsetMinutesAt(new Date(utcMs));
  if (off2 !== off1) utcMs = baseUtc - off2 * 60000; // adjust across DST boundaries
  return new Date(utcMs);
}

// Calendar-date and time-zone helpers built on Intl.
// A calendar date is always a 'YYYY-MM-DD' string; instants are Dates.

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;
const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

const DAY_MS = 24 * 60 * 60 * 1000;

// Internal: attempt to coerce a string/Date into Date or return null
export function toDate(input?: string | Date | null): Date | null {
  if (!input) return null;
  if (input instanceof Date) return isNaN(input.getTime()) ? null : input;
  const d = new Date(input);
  return isNaN(d.getTime()) ? null : d;
}

export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const probe = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return probe.toISOString().slice(0, 10) === value;
}

// 'YYYY-MM-DD' of an instant as seen on a wall clock in `timeZone`
export function calendarDateInZone(instant: Date, timeZone: string): string {
  const parts = zonedParts(instant, timeZone);
  return `${parts.year}-${pad(parts.month)}-${pad(parts.day)}`;
}

/**
 * Normalize a caller-supplied date. Strings must already be calendar dates;
 * Date objects are read in `timeZone`. Throws on anything else.
 */
export function toCalendarDate(value: string | Date, timeZone: string): string {
  if (value instanceof Date) {
    if (isNaN(value.getTime())) throw new RangeError('Invalid Date');
    return calendarDateInZone(value, timeZone);
  }
  const trimmed = value.trim();
  if (!isCalendarDate(trimmed)) throw new RangeError(`Not a calendar date: ${value}`);
  return trimmed;
}

export function addDays(date: string, days: number): string {
  const [y, m, d] = date.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d) + days * DAY_MS).toISOString().slice(0, 10);
}

// Whole days from `from` to `to` (both calendar dates)
export function daysBetween(from: string, to: string): number {
  const [fy, fm, fd] = from.split('-').map(Number);
  const [ty, tm, td] = to.split('-').map(Number);
  return Math.round((Date.UTC(ty, tm - 1, td) - Date.UTC(fy, fm - 1, fd)) / DAY_MS);
}

// Milliseconds to add to UTC to get wall-clock time in `timeZone` at `instant`
export function zoneOffsetMs(instant: Date, timeZone: string): number {
  const p = zonedParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(instant.getTime() / 1000) * 1000;
}

// The instant at which a wall-clock time in `timeZone` occurs
export function zonedTimeToInstant(
  wall: { year: number; month: number; day: number; hour?: number; minute?: number; second?: number },
  timeZone: string,
): Date {
  const guess = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour ?? 0, wall.minute ?? 0, wall.second ?? 0);
  // Two passes settle DST transitions.
  const first = guess - zoneOffsetMs(new Date(guess), timeZone);
  const second = guess - zoneOffsetMs(new Date(first), timeZone);
  return new Date(second);
}

// [start, end) instants of a calendar day in `timeZone`
export function zonedDayBounds(date: string, timeZone: string): { start: Date; end: Date } {
  const [year, month, day] = date.split('-').map(Number);
  const next = addDays(date, 1).split('-').map(Number);
  return {
    start: zonedTimeToInstant({ year, month, day }, timeZone),
    end: zonedTimeToInstant({ year: next[0], month: next[1], day: next[2] }, timeZone),
  };
}

/**
 * Calendar dates, as seen in `sourceZone`, that overlap the caller's day
 * `date` in `callerZone`. One date when the zones agree, two otherwise.
 */
export function sourceDatesCovering(date: string, callerZone: string, sourceZone: string): string[] {
  const { start, end } = zonedDayBounds(date, callerZone);
  const first = calendarDateInZone(start, sourceZone);
  const last = calendarDateInZone(new Date(end.getTime() - 1), sourceZone);
  const dates = [first];
  for (let d = first; d !== last; ) {
    d = addDays(d, 1);
    dates.push(d);
  }
  return dates;
}

/**
 * Parse a provider timestamp. Strings with an explicit offset ('Z' or
 * ±hh:mm) are absolute already; bare local times are read in `sourceZone`.
 * Returns null when the text is not a timestamp.
 */
export function parseInstant(text: string, sourceZone: string): Date | null {
  const value = text.trim();
  if (!value) return null;

  if (HAS_OFFSET.test(value)) {
    return toDate(value);
  }

  const match = LOCAL_DATE_TIME.exec(value);
  if (!match) return null;
  const [, y, mo, d, h, mi, s] = match;
  const wall = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: h === undefined ? 0 : Number(h),
    minute: mi === undefined ? 0 : Number(mi),
    second: s === undefined ? 0 : Number(s),
  };
  if (sourceZone === 'UTC') {
    const instant = new Date(Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second));
    return isNaN(instant.getTime()) ? null : instant;
  }
  return zonedTimeToInstant(wall, sourceZone);
}

// 'YYYYMMDD' form some upstream APIs take
export function compactDate(date: string): string {
  return date.replace(/-/g, '');
}

// ─────────────────────────────────────────────────────────────────────────────
// Internal
// ─────────────────────────────────────────────────────────────────────────────

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts: ZonedParts = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    switch (part.type) {
      case 'year':
      case 'month':
      case 'day':
      case 'hour':
      case 'minute':
      case 'second':
        parts[part.type] = Number(part.value);
        break;
      default:
        break;
    }
  }
  return parts;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

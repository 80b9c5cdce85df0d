// Partition keys: local calendar dates written as MM-DD-YYYY

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const DATE_KEY = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function formatDateKey({ year, month, day }: CalendarDate): string {
  return `${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}-${year}`;
}

/**
 * Calendar date of `instant` in `timeZone`
 */
export function calendarDateIn(instant: Date, timeZone: string): CalendarDate {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find(part => part.type === type)?.value ?? NaN);
  return { year: pick('year'), month: pick('month'), day: pick('day') };
}

/**
 * Partition key for an instant, e.g. "10-19-2026"
 */
export function localDateKey(instant: Date, timeZone: string): string {
  return formatDateKey(calendarDateIn(instant, timeZone));
}

/**
 * Parse a partition key; null when it is not a real calendar date
 */
export function parseDateKey(key: string): CalendarDate | null {
  const match = key.match(DATE_KEY);
  if (!match) return null;
  const month = Number(match[1]);
  const day = Number(match[2]);
  const year = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * Keep valid keys only, de-duplicated, newest first
 */
export function sortDateKeysDescending(keys: Iterable<string>): string[] {
  const parsed: { key: string; date: CalendarDate }[] = [];
  for (const key of new Set(keys)) {
    const date = parseDateKey(key);
    if (date) parsed.push({ key, date });
  }
  return parsed
    .sort((a, b) => compareCalendarDates(b.date, a.date))
    .map(entry => entry.key);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate()
  };
}

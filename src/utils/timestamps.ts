/**
 * Timestamp normalizer
 *
 * Feeds and article pages publish dates in many shapes. Every parser hands its
 * candidate values to `resolvePublished`, which walks them in priority order
 * and always produces an instant: textual fields first, then structured
 * (pre-parsed) values, then the current time.
 */

export const VIETNAM_OFFSET = '+07:00';

export interface TextualCandidate {
  value?: string | null;
  /** Offset assumed when the value itself carries no zone, e.g. "+07:00" */
  offset?: string;
}

export type StructuredCandidate = Date | string | null | undefined;

export interface ResolvedTimestamp {
  date: Date;
  from: 'textual' | 'structured' | 'now';
}

// A numeric offset counts only after a clock time, so "05-10-2026" keeps its year
const ZONE_SUFFIX = /(?:\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}:?\d{2})|\b(?:GMT|UTC|UT|[ECMP][SD]T)\b)\s*$/i;
const GMT_OFFSET = /\b(?:GMT|UTC)\s*([+-])\s*(\d{1,2})(?::?(\d{2}))?\b/i;

const ISO_LOCAL = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?$/;
const DMY_TIME = /(\d{1,2})[/-](\d{1,2})[/-](\d{4})(?:\s*[,-]?\s*(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([AP]M))?)?/i;
const TIME_DMY = /(\d{1,2}):(\d{2})(?::(\d{2}))?\s*,?\s*(?:ngày\s*)?(\d{1,2})[/-](\d{1,2})[/-](\d{4})/i;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

/**
 * Offset string ("+07:00", "-0530", "+7") to minutes east of UTC
 */
export function offsetToMinutes(offset: string): number | null {
  const match = offset.trim().match(/^([+-])(\d{1,2})(?::?(\d{2}))?$/);
  if (!match) return null;
  const hours = Number(match[2]);
  const minutes = Number(match[3] ?? '0');
  if (hours > 14 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return match[1] === '-' ? -total : total;
}

export function hasZoneMarker(text: string): boolean {
  return ZONE_SUFFIX.test(text.trim()) || GMT_OFFSET.test(text);
}

function num(value: string | undefined): number {
  return value === undefined ? 0 : Number(value);
}

function to24Hour(hour: number, meridiem: string | undefined): number {
  if (!meridiem) return hour;
  const pm = meridiem.toUpperCase() === 'PM';
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

function extractParts(text: string): DateParts | null {
  const iso = text.match(ISO_LOCAL);
  if (iso) {
    return {
      year: num(iso[1]),
      month: num(iso[2]),
      day: num(iso[3]),
      hour: num(iso[4]),
      minute: num(iso[5]),
      second: num(iso[6]),
      millisecond: iso[7] ? Math.floor(Number(`0.${iso[7]}`) * 1000) : 0
    };
  }

  const timeFirst = text.match(TIME_DMY);
  if (timeFirst) {
    return {
      year: num(timeFirst[6]),
      month: num(timeFirst[5]),
      day: num(timeFirst[4]),
      hour: num(timeFirst[1]),
      minute: num(timeFirst[2]),
      second: num(timeFirst[3]),
      millisecond: 0
    };
  }

  const dateFirst = text.match(DMY_TIME);
  if (dateFirst) {
    return {
      year: num(dateFirst[3]),
      month: num(dateFirst[2]),
      day: num(dateFirst[1]),
      hour: to24Hour(num(dateFirst[4]), dateFirst[7]),
      minute: num(dateFirst[5]),
      second: num(dateFirst[6]),
      millisecond: 0
    };
  }

  return null;
}

function partsToDate(parts: DateParts, offsetMinutes: number): Date | null {
  const { year, month, day, hour, minute, second, millisecond } = parts;
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
  const check = new Date(utc);
  // Rejects 31/02 and friends, which Date.UTC silently rolls over
  if (check.getUTCDate() !== day || check.getUTCMonth() !== month - 1) {
    return null;
  }
  return new Date(utc - offsetMinutes * 60_000);
}

function isValid(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Parse one textual date. Values without a zone marker take `assumedOffset`
 * (UTC when omitted) so the result never depends on the host's local zone.
 */
export function parseTextualDate(text: string, assumedOffset?: string): Date | null {
  const value = text.trim();
  if (!value) return null;

  // "19/10/2026 08:30 (GMT+7)" style: explicit offset wrapped in prose
  const gmt = value.match(GMT_OFFSET);
  if (gmt) {
    const offset = offsetToMinutes(`${gmt[1]}${gmt[2]}${gmt[3] ? `:${gmt[3]}` : ''}`);
    const parts = extractParts(value.replace(GMT_OFFSET, '').replace(/[()]/g, ' ').trim());
    if (parts && offset !== null) {
      return partsToDate(parts, offset);
    }
  }

  if (ZONE_SUFFIX.test(value)) {
    const native = new Date(value);
    if (isValid(native)) return native;
  }

  const offsetMinutes = offsetToMinutes(assumedOffset ?? '+00:00') ?? 0;
  const parts = extractParts(value);
  if (parts) {
    return partsToDate(parts, offsetMinutes);
  }

  // Month-name shapes ("Jul 15, 2025 10:00"): pin the zone before handing to Date
  if (/[a-z]{3}/i.test(value) && /\d{4}/.test(value)) {
    const sign = offsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(offsetMinutes);
    const pinned = `${value} GMT${sign}${String(Math.floor(abs / 60)).padStart(2, '0')}${String(abs % 60).padStart(2, '0')}`;
    const native = new Date(pinned);
    if (isValid(native)) return native;
  }

  return null;
}

function parseStructured(candidate: StructuredCandidate): Date | null {
  if (!candidate) return null;
  if (candidate instanceof Date) {
    return isValid(candidate) ? candidate : null;
  }
  const parsed = new Date(candidate);
  return isValid(parsed) ? parsed : null;
}

/**
 * Walk the fallback chain. Never throws; worst case is `now()`.
 */
export function resolvePublished(
  textual: TextualCandidate[],
  structured: StructuredCandidate[] = [],
  now: () => Date = () => new Date()
): ResolvedTimestamp {
  for (const candidate of textual) {
    if (!candidate.value) continue;
    const date = parseTextualDate(candidate.value, candidate.offset);
    if (date) return { date, from: 'textual' };
  }

  for (const candidate of structured) {
    const date = parseStructured(candidate);
    if (date) return { date, from: 'structured' };
  }

  return { date: now(), from: 'now' };
}

/**
 * UTC instant as "YYYY-MM-DDTHH:mm:ss+00:00", with a six-digit fraction only
 * when the instant has sub-second precision. This string feeds the fallback
 * fingerprint, so its shape must not change.
 */
export function toUtcIso(date: Date): string {
  const iso = date.toISOString();
  const base = iso.slice(0, 19);
  const ms = date.getUTCMilliseconds();
  const fraction = ms === 0 ? '' : `.${String(ms).padStart(3, '0')}000`;
  return `${base}${fraction}+00:00`;
}

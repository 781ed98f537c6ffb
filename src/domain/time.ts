import type { ISODateTime } from './types.js';
import { DomainError } from './errors.js';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;
const LOCAL_DATE_TIME_RE = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2})?)$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let dtf = formatters.get(timeZone);
  if (!dtf) {
    dtf = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, dtf);
  }
  return dtf;
}

function zonedParts(date: Date, timeZone: string): Record<string, string> {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') parts[part.type] = part.value;
  }
  return parts;
}

function getTimeZoneOffset(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const asUTC = Date.UTC(
    Number(p.year),
    Number(p.month) - 1,
    Number(p.day),
    Number(p.hour),
    Number(p.minute),
    Number(p.second)
  );
  return (asUTC - date.getTime()) / (60 * 1000);
}

export function isValidDate(date: string): boolean {
  const m = DATE_RE.exec(date);
  if (!m) return false;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

export function isValidTime(time: string): boolean {
  const m = TIME_RE.exec(time);
  if (!m) return false;
  return Number(m[1]) < 24 && Number(m[2]) < 60 && Number(m[3] ?? '0') < 60;
}

/**
 * Converts a wall-clock date and time in `timeZone` to a UTC ISO instant.
 */
export function toZonedIso(date: string, time: string, timeZone: string): ISODateTime {
  const [year, month, day] = date.split('-').map(Number);
  const [hour, minute, second = 0] = time.split(':').map(Number);
  const utcTs = Date.UTC(year, month - 1, day, hour, minute, second);
  const offsetMinutes = getTimeZoneOffset(new Date(utcTs), timeZone);
  return new Date(utcTs - offsetMinutes * 60 * 1000).toISOString();
}

/**
 * Parses `YYYY-MM-DDTHH:mm[:ss]` (or with a space separator) as campus local time.
 */
export function parseLocalDateTime(value: string, timeZone: string): ISODateTime {
  const m = LOCAL_DATE_TIME_RE.exec(value.trim());
  if (!m || !isValidDate(m[1]) || !isValidTime(m[2])) {
    throw new DomainError('invalid_input', `Invalid date-time: ${value}`);
  }
  return toZonedIso(m[1], m[2], timeZone);
}

/** Renders an instant as `YYYY-MM-DDTHH:mm:ss` wall-clock time in `timeZone`. */
export function formatZoned(iso: ISODateTime, timeZone: string): string {
  const p = zonedParts(new Date(iso), timeZone);
  return `${p.year}-${p.month}-${p.day}T${p.hour}:${p.minute}:${p.second}`;
}

export function addHours(iso: ISODateTime, hours: number): ISODateTime {
  return new Date(new Date(iso).getTime() + hours * 60 * 60 * 1000).toISOString();
}

export function toMillis(iso: ISODateTime): number {
  return new Date(iso).getTime();
}

export interface TimeRange {
  start: ISODateTime;
  end: ISODateTime;
}

/**
 * Half-open overlap: [a, b) and [c, d) overlap iff a < d && c < b, so ranges
 * that merely touch (b == c) never conflict.
 */
export function overlaps(a: TimeRange, b: TimeRange): boolean {
  return toMillis(a.start) < toMillis(b.end) && toMillis(b.start) < toMillis(a.end);
}

import type { IntervalState, ISODateTime, Space, SpaceType } from './types.js';
import { LIVE_STATES } from './types.js';
import { DomainError } from './errors.js';
import { db, fromStore } from '../store/db.js';
import { hasConflict } from './conflicts.js';
import { addHours, isValidDate, isValidTime, toMillis, toZonedIso } from './time.js';

export const DAY_START_HOUR = 8;
export const DAY_END_HOUR = 22;
const DEFAULT_START_TIME = '08:00';
const DEFAULT_DURATION_HOURS = 1;
export const MAX_DURATION_HOURS = 24;

export interface AvailabilityQuery {
  date: string; // YYYY-MM-DD
  time?: string; // HH:mm, defaults to the start of the day
  durationHours?: number;
  spaceType?: SpaceType;
}

export interface SpaceAvailability {
  space: Space;
  available: boolean;
}

export interface CalendarSlot {
  hour: string; // HH:mm local
  start: ISODateTime;
  available: boolean;
  occupiedBy: { id: number; state: IntervalState; reason: string } | null;
}

export interface SpaceCalendar {
  space: Space;
  date: string;
  slots: CalendarSlot[];
}

function assertDate(date: string): void {
  if (!isValidDate(date)) {
    throw new DomainError('invalid_input', `Invalid date: ${date}`);
  }
}

/**
 * Reports, for every active space (optionally of one type), whether
 * [date time, +durationHours) is free. Read-only.
 */
export async function checkAvailability(
  query: AvailabilityQuery,
  timeZone: string
): Promise<SpaceAvailability[]> {
  assertDate(query.date);
  const time = query.time ?? DEFAULT_START_TIME;
  if (!isValidTime(time)) {
    throw new DomainError('invalid_input', `Invalid time: ${time}`);
  }
  const durationHours = query.durationHours ?? DEFAULT_DURATION_HOURS;
  if (!(durationHours > 0) || durationHours > MAX_DURATION_HOURS) {
    throw new DomainError(
      'invalid_input',
      `duration must be between 0 and ${MAX_DURATION_HOURS} hours`
    );
  }

  const start = toZonedIso(query.date, time, timeZone);
  const end = addHours(start, durationHours);

  const spaces = await fromStore(db.listSpaces({ type: query.spaceType, activeOnly: true }));
  const results: SpaceAvailability[] = [];
  for (const space of spaces) {
    results.push({ space, available: !(await hasConflict(space.id, start, end)) });
  }
  return results;
}

/**
 * Hourly grid for one space from DAY_START_HOUR to DAY_END_HOUR.
 *
 * A slot is occupied when a live interval covers the slot's start instant,
 * so a booking from 10:00 to 10:30 marks the whole 10:00 slot.
 */
export async function getCalendar(
  spaceId: number,
  date: string,
  timeZone: string
): Promise<SpaceCalendar> {
  assertDate(date);

  const space = await fromStore(db.getSpace(spaceId));
  if (!space || !space.active) {
    throw new DomainError('not_found', `Space ${spaceId} not found`);
  }

  const live = await fromStore(db.listIntervalsBySpace(spaceId, LIVE_STATES));

  const slots: CalendarSlot[] = [];
  for (let hour = DAY_START_HOUR; hour < DAY_END_HOUR; hour++) {
    const label = `${String(hour).padStart(2, '0')}:00`;
    const start = toZonedIso(date, label, timeZone);
    const instant = toMillis(start);

    const occupying = live.find(
      (interval) => toMillis(interval.start) <= instant && instant < toMillis(interval.end)
    );

    slots.push({
      hour: label,
      start,
      available: !occupying,
      occupiedBy: occupying
        ? { id: occupying.id, state: occupying.state, reason: occupying.reason }
        : null,
    });
  }

  return { space, date, slots };
}

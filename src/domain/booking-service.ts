import type {
  DecisionOutcome,
  ISODateTime,
  ReservationInterval,
  Space,
} from './types.js';
import { DomainError } from './errors.js';
import { db, fromStore } from '../store/db.js';
import { withSpaceLock } from '../store/locks.js';
import { metricsStore } from '../store/metrics.js';
import { findConflicts } from './conflicts.js';
import { toMillis } from './time.js';

export interface BookingSummary {
  booking: ReservationInterval;
  space: Pick<Space, 'id' | 'name'> | null;
}

export function assertValidRange(start: ISODateTime, end: ISODateTime): void {
  const startMs = toMillis(start);
  const endMs = toMillis(end);
  if (Number.isNaN(startMs) || Number.isNaN(endMs)) {
    throw new DomainError('invalid_input', 'start and end must be valid date-times');
  }
  if (endMs <= startMs) {
    throw new DomainError('invalid_range', 'end must be after start');
  }
}

async function requireActiveSpace(spaceId: number): Promise<Space> {
  const space = await fromStore(db.getSpace(spaceId));
  if (!space || !space.active) {
    throw new DomainError('not_found', `Space ${spaceId} not found`);
  }
  return space;
}

async function requireActiveUser(userId: number): Promise<void> {
  const user = await fromStore(db.getUser(userId));
  if (!user || !user.active) {
    throw new DomainError('not_found', `User ${userId} not found`);
  }
}

async function requireBooking(id: number): Promise<ReservationInterval> {
  const booking = await fromStore(db.getInterval(id));
  // Blocks are not bookings; they only change through the incident handler.
  if (!booking || booking.kind !== 'normal') {
    throw new DomainError('not_found', `Booking ${id} not found`);
  }
  return booking;
}

/**
 * Creates a PENDING booking for [start, end) on a space.
 *
 * The conflict scan and the insert run under the space lock, so of any number
 * of concurrent overlapping requests for one space at most one is written.
 *
 * @throws {DomainError} 'invalid_range' if end <= start
 * @throws {DomainError} 'not_found' if the user or space is missing or inactive
 * @throws {DomainError} 'slot_unavailable' if a pending, approved or block interval overlaps
 */
export async function createBooking(
  spaceId: number,
  ownerUserId: number,
  start: ISODateTime,
  end: ISODateTime,
  reason = ''
): Promise<ReservationInterval> {
  assertValidRange(start, end);
  await requireActiveUser(ownerUserId);
  await requireActiveSpace(spaceId);

  const startedAt = Date.now();

  return withSpaceLock(spaceId, async () => {
    const conflicts = await findConflicts(spaceId, start, end);
    if (conflicts.length > 0) {
      metricsStore.incrementBookingConflict();
      throw new DomainError(
        'slot_unavailable',
        `Space ${spaceId} is not available in the requested range`
      );
    }

    const booking = await fromStore(
      db.insertInterval({
        spaceId,
        start,
        end,
        state: 'PENDING',
        kind: 'normal',
        ownerUserId,
        reason,
        incidentId: null,
      })
    );

    metricsStore.incrementBookingCreated();
    metricsStore.recordCreateTime(Date.now() - startedAt);

    return booking;
  });
}

/**
 * Approves or rejects a PENDING booking.
 *
 * No conflict re-check: nothing overlapping could have been written while this
 * booking held its range as PENDING.
 */
export async function decideBooking(
  id: number,
  outcome: DecisionOutcome,
  decidedBy: number
): Promise<ReservationInterval> {
  const booking = await requireBooking(id);
  if (booking.state !== 'PENDING') {
    throw new DomainError('invalid_state', `Booking ${id} is ${booking.state}, not PENDING`);
  }

  const updated = await fromStore(
    db.transitionInterval(id, ['PENDING'], outcome, {
      decidedBy,
      decidedAt: new Date().toISOString(),
    })
  );
  // Lost the compare-and-set to a concurrent decide or cancel
  if (!updated) {
    throw new DomainError('invalid_state', `Booking ${id} is no longer PENDING`);
  }

  if (outcome === 'APPROVED') {
    metricsStore.incrementBookingApproved();
  } else {
    metricsStore.incrementBookingRejected();
  }
  return updated;
}

/**
 * Cancels a PENDING or APPROVED booking on behalf of its owner or an administrator.
 * Cancelling twice is an error so callers can spot double-cancel bugs.
 */
export async function cancelBooking(id: number, requestedBy: number): Promise<ReservationInterval> {
  const booking = await requireBooking(id);

  if (booking.ownerUserId !== requestedBy) {
    const requester = await fromStore(db.getUser(requestedBy));
    if (!requester || !requester.active || requester.role !== 'administrador') {
      throw new DomainError('not_found', `Booking ${id} not found for user ${requestedBy}`);
    }
  }

  if (booking.state !== 'PENDING' && booking.state !== 'APPROVED') {
    throw new DomainError('invalid_state', `Booking ${id} is already ${booking.state}`);
  }

  const updated = await fromStore(
    db.transitionInterval(id, ['PENDING', 'APPROVED'], 'CANCELLED', {
      cancelledBy: requestedBy,
      cancelledAt: new Date().toISOString(),
    })
  );
  if (!updated) {
    throw new DomainError('invalid_state', `Booking ${id} can no longer be cancelled`);
  }

  metricsStore.incrementBookingCancelled();
  return updated;
}

/**
 * A user's bookings, newest request first, with the space they are for.
 */
export async function listUserBookings(userId: number): Promise<BookingSummary[]> {
  const bookings = await fromStore(db.listIntervalsByOwner(userId));
  const names = new Map<number, Pick<Space, 'id' | 'name'> | null>();

  const summaries: BookingSummary[] = [];
  for (const booking of bookings) {
    if (!names.has(booking.spaceId)) {
      const space = await fromStore(db.getSpace(booking.spaceId));
      names.set(booking.spaceId, space ? { id: space.id, name: space.name } : null);
    }
    summaries.push({ booking, space: names.get(booking.spaceId) ?? null });
  }
  return summaries;
}

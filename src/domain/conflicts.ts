/**
 * Conflict detection for reservation intervals. See `overlaps` in time.ts for
 * the half-open rule.
 */

import type { ISODateTime, ReservationInterval } from './types.js';
import { LIVE_STATES } from './types.js';
import { db, fromStore } from '../store/db.js';
import { overlaps, toMillis } from './time.js';

/**
 * Live intervals of `spaceId` overlapping [start, end).
 *
 * The result is only a stable answer while the caller holds the space lock;
 * without it a concurrent writer can invalidate it before the next await.
 */
export async function findConflicts(
  spaceId: number,
  start: ISODateTime,
  end: ISODateTime,
  excludeIntervalId?: number
): Promise<ReservationInterval[]> {
  // Empty ranges occupy nothing
  if (toMillis(start) >= toMillis(end)) {
    return [];
  }

  const live = await fromStore(db.listIntervalsBySpace(spaceId, LIVE_STATES));
  return live.filter(
    (interval) => interval.id !== excludeIntervalId && overlaps(interval, { start, end })
  );
}

export async function hasConflict(
  spaceId: number,
  start: ISODateTime,
  end: ISODateTime,
  excludeIntervalId?: number
): Promise<boolean> {
  const conflicts = await findConflicts(spaceId, start, end, excludeIntervalId);
  return conflicts.length > 0;
}

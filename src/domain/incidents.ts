/**
 * Incident blocks.
 *
 * An open incident may hold one block interval on its space. Applying the block
 * cancels every pending or approved booking it overlaps; resolving the incident
 * hard-deletes the block so it never shows up in booking history.
 */

import type {
  Incident,
  IncidentStatus,
  IncidentType,
  ISODateTime,
  Space,
} from './types.js';
import { DomainError } from './errors.js';
import { db, fromStore } from '../store/db.js';
import { withSpaceLock } from '../store/locks.js';
import { metricsStore } from '../store/metrics.js';
import { findConflicts } from './conflicts.js';
import { assertValidRange } from './booking-service.js';

export interface BlockResult {
  blockId: number;
  cancelledCount: number;
  cancelledIds: number[];
}

export interface ResolveResult {
  released: boolean;
  incident: Incident;
}

export interface IncidentSummary {
  incident: Incident;
  space: Pick<Space, 'id' | 'name'> | null;
}

async function requireIncident(id: number): Promise<Incident> {
  const incident = await fromStore(db.getIncident(id));
  if (!incident) {
    throw new DomainError('not_found', `Incident ${id} not found`);
  }
  return incident;
}

function assertBlockable(incident: Incident): void {
  if (incident.status !== 'OPEN') {
    throw new DomainError('invalid_state', `Incident ${incident.id} is already resolved`);
  }
  if (incident.blockIntervalId !== null) {
    throw new DomainError(
      'invalid_state',
      `Incident ${incident.id} already blocks interval ${incident.blockIntervalId}`
    );
  }
}

export function blockReason(incidentId: number): string {
  return `Bloqueo por incidencia #${incidentId}`;
}

export async function reportIncident(
  spaceId: number,
  type: IncidentType,
  description: string,
  reportedBy: number | null = null
): Promise<Incident> {
  const space = await fromStore(db.getSpace(spaceId));
  if (!space || !space.active) {
    throw new DomainError('not_found', `Space ${spaceId} not found`);
  }

  const incident = await fromStore(
    db.createIncident({ spaceId, type, description, reportedBy })
  );
  metricsStore.incrementIncidentReported();
  return incident;
}

/**
 * Blocks [start, end) on the incident's space.
 *
 * Cancelling the overlapping bookings and inserting the block are committed in
 * one store transaction; neither is visible without the other.
 *
 * @throws {DomainError} 'invalid_range' if end <= start
 * @throws {DomainError} 'not_found' if the incident does not exist
 * @throws {DomainError} 'invalid_state' if the incident is resolved or already blocking
 * @throws {DomainError} 'slot_unavailable' if another block overlaps the range
 */
export async function applyBlock(
  incidentId: number,
  start: ISODateTime,
  end: ISODateTime
): Promise<BlockResult> {
  assertValidRange(start, end);
  const { spaceId } = await requireIncident(incidentId);

  return withSpaceLock(spaceId, async () => {
    // Re-read under the lock: a concurrent apply on the same incident may have won.
    const incident = await requireIncident(incidentId);
    assertBlockable(incident);

    const conflicts = await findConflicts(spaceId, start, end);
    const otherBlock = conflicts.find((interval) => interval.kind === 'block');
    if (otherBlock) {
      throw new DomainError(
        'slot_unavailable',
        `Range overlaps block ${otherBlock.id} on space ${spaceId}`
      );
    }

    const now = new Date().toISOString();
    let blockId = 0;
    const result = await fromStore(
      db.transaction((tx) => {
        for (const booking of conflicts) {
          tx.transitionInterval(booking.id, ['PENDING', 'APPROVED'], 'CANCELLED', {
            cancelledBy: null,
            cancelledAt: now,
          });
        }
        blockId = tx.insertInterval({
          spaceId,
          start,
          end,
          state: 'BLOCK',
          kind: 'block',
          ownerUserId: null,
          reason: blockReason(incidentId),
          incidentId,
        });
        tx.updateIncident(incidentId, { blockIntervalId: blockId });
      })
    );

    metricsStore.recordBlockApplied(result.transitioned.length);
    metricsStore.incrementBookingCancelled(result.transitioned.length);

    return {
      blockId,
      cancelledCount: result.transitioned.length,
      cancelledIds: result.transitioned,
    };
  });
}

/**
 * Marks the incident resolved and deletes its block. Safe to retry: once the
 * block is gone the call reports `released: false`.
 */
export async function resolveIncident(
  incidentId: number,
  solution?: string
): Promise<ResolveResult> {
  const { spaceId } = await requireIncident(incidentId);

  return withSpaceLock(spaceId, async () => {
    const incident = await requireIncident(incidentId);
    const blocks = await fromStore(db.listIntervalsBySpace(spaceId, ['BLOCK']));
    const owned = blocks.filter((block) => block.incidentId === incidentId).map((block) => block.id);

    const result = await fromStore(
      db.transaction((tx) => {
        tx.deleteIntervals(owned);
        tx.updateIncident(incidentId, {
          status: 'RESOLVED',
          blockIntervalId: null,
          solution: solution ?? incident.solution,
          resolvedAt: incident.resolvedAt ?? new Date().toISOString(),
        });
      })
    );

    const released = result.deleted > 0;
    if (released) {
      metricsStore.incrementBlockReleased();
    }

    return { released, incident: await requireIncident(incidentId) };
  });
}

export async function listIncidents(
  filter: { status?: IncidentStatus; spaceId?: number } = {}
): Promise<IncidentSummary[]> {
  const incidents = await fromStore(db.listIncidents(filter));
  const summaries: IncidentSummary[] = [];
  for (const incident of incidents) {
    const space = await fromStore(db.getSpace(incident.spaceId));
    summaries.push({ incident, space: space ? { id: space.id, name: space.name } : null });
  }
  return summaries;
}

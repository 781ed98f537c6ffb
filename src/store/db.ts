import type {
  Incident,
  IncidentStatus,
  IntervalState,
  NewInterval,
  ReservationInterval,
  Space,
  SpaceType,
  User,
} from '../domain/types.js';
import { LIVE_STATES } from '../domain/types.js';
import { DomainError, isDomainError } from '../domain/errors.js';
import { overlaps } from '../domain/time.js';

export type IntervalPatch = Partial<
  Pick<ReservationInterval, 'decidedBy' | 'decidedAt' | 'cancelledBy' | 'cancelledAt'>
>;

export type IncidentPatch = Partial<
  Pick<Incident, 'status' | 'blockIntervalId' | 'solution' | 'resolvedAt'>
>;

/**
 * Writes staged inside {@link InMemoryDB.transaction}. Nothing is visible to
 * readers until the whole batch commits.
 */
export interface StoreTransaction {
  /** Compare-and-set on state; rows no longer in `from` at commit are skipped. */
  transitionInterval(id: number, from: readonly IntervalState[], to: IntervalState, patch?: IntervalPatch): void;
  /** Returns the id the interval will get on commit. */
  insertInterval(draft: NewInterval): number;
  deleteIntervals(ids: number[]): void;
  updateIncident(id: number, patch: IncidentPatch): void;
}

export interface CommitResult {
  transitioned: number[];
  inserted: number[];
  deleted: number;
}

type StagedOp =
  | { op: 'transition'; id: number; from: readonly IntervalState[]; to: IntervalState; patch: IntervalPatch }
  | { op: 'insert'; interval: ReservationInterval }
  | { op: 'delete'; ids: number[] }
  | { op: 'incident'; id: number; patch: IncidentPatch };

export interface SeedData {
  users: User[];
  spaces: Space[];
}

/**
 * Async in-memory store for intervals, incidents and the read-only space and
 * user directories. Rows are copied in and out so callers never hold live
 * references.
 *
 * Like an exclusion constraint in a relational store, it refuses any write that
 * would leave two live intervals of one space overlapping.
 */
export class InMemoryDB {
  private spaces: Map<number, Space> = new Map();
  private users: Map<number, User> = new Map();
  private intervals: Map<number, ReservationInterval> = new Map();
  private incidents: Map<number, Incident> = new Map();
  private nextIntervalId = 1;
  private nextIncidentId = 1;

  // Directories
  async getSpace(id: number): Promise<Space | undefined> {
    const space = this.spaces.get(id);
    return space && { ...space };
  }

  async listSpaces(filter: { type?: SpaceType; activeOnly?: boolean } = {}): Promise<Space[]> {
    return Array.from(this.spaces.values())
      .filter((s) => (filter.activeOnly ? s.active : true))
      .filter((s) => (filter.type ? s.type === filter.type : true))
      .sort((a, b) => a.id - b.id)
      .map((s) => ({ ...s }));
  }

  async getUser(id: number): Promise<User | undefined> {
    const user = this.users.get(id);
    return user && { ...user };
  }

  // Intervals
  async getInterval(id: number): Promise<ReservationInterval | undefined> {
    const interval = this.intervals.get(id);
    return interval && { ...interval };
  }

  async listIntervalsBySpace(
    spaceId: number,
    states?: readonly IntervalState[]
  ): Promise<ReservationInterval[]> {
    return Array.from(this.intervals.values())
      .filter((i) => i.spaceId === spaceId && (!states || states.includes(i.state)))
      .sort((a, b) => a.start.localeCompare(b.start))
      .map((i) => ({ ...i }));
  }

  async listIntervalsByOwner(userId: number): Promise<ReservationInterval[]> {
    return Array.from(this.intervals.values())
      .filter((i) => i.kind === 'normal' && i.ownerUserId === userId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id)
      .map((i) => ({ ...i }));
  }

  async insertInterval(draft: NewInterval): Promise<ReservationInterval> {
    const interval = this.materialize(draft, this.nextIntervalId);
    this.assertNoLiveOverlap(interval, this.intervals);
    this.nextIntervalId++;
    this.intervals.set(interval.id, interval);
    return { ...interval };
  }

  /**
   * Moves an interval to `to` only if its current state is one of `from`.
   * Returns the updated row, or undefined when the row is missing or the guard failed.
   */
  async transitionInterval(
    id: number,
    from: readonly IntervalState[],
    to: IntervalState,
    patch: IntervalPatch = {}
  ): Promise<ReservationInterval | undefined> {
    const current = this.intervals.get(id);
    if (!current || !from.includes(current.state)) return undefined;
    const updated = { ...current, ...patch, state: to };
    this.intervals.set(id, updated);
    return { ...updated };
  }

  async deleteIntervals(ids: number[]): Promise<number> {
    let count = 0;
    for (const id of ids) {
      if (this.intervals.delete(id)) count++;
    }
    return count;
  }

  // Incidents
  async createIncident(
    draft: Pick<Incident, 'spaceId' | 'type' | 'description' | 'reportedBy'>
  ): Promise<Incident> {
    const incident: Incident = {
      ...draft,
      id: this.nextIncidentId++,
      status: 'OPEN',
      reportedAt: new Date().toISOString(),
      blockIntervalId: null,
      solution: null,
      resolvedAt: null,
    };
    this.incidents.set(incident.id, incident);
    return { ...incident };
  }

  async getIncident(id: number): Promise<Incident | undefined> {
    const incident = this.incidents.get(id);
    return incident && { ...incident };
  }

  async updateIncident(id: number, patch: IncidentPatch): Promise<Incident | undefined> {
    const current = this.incidents.get(id);
    if (!current) return undefined;
    const updated = { ...current, ...patch };
    this.incidents.set(id, updated);
    return { ...updated };
  }

  async listIncidents(filter: { status?: IncidentStatus; spaceId?: number } = {}): Promise<Incident[]> {
    return Array.from(this.incidents.values())
      .filter((i) => (filter.status ? i.status === filter.status : true))
      .filter((i) => (filter.spaceId !== undefined ? i.spaceId === filter.spaceId : true))
      .sort((a, b) => b.reportedAt.localeCompare(a.reportedAt) || b.id - a.id)
      .map((i) => ({ ...i }));
  }

  /**
   * Runs `build` to stage writes, then validates and applies them as one unit.
   * If `build` throws, or the staged batch would break the overlap constraint
   * or touch a missing incident, nothing is applied.
   */
  async transaction(build: (tx: StoreTransaction) => void | Promise<void>): Promise<CommitResult> {
    const staged: StagedOp[] = [];

    const tx: StoreTransaction = {
      transitionInterval: (id, from, to, patch = {}) => {
        staged.push({ op: 'transition', id, from, to, patch });
      },
      insertInterval: (draft) => {
        // Ids come from the shared sequence; an aborted batch leaves a gap.
        const interval = this.materialize(draft, this.nextIntervalId++);
        staged.push({ op: 'insert', interval });
        return interval.id;
      },
      deleteIntervals: (ids) => {
        staged.push({ op: 'delete', ids: [...ids] });
      },
      updateIncident: (id, patch) => {
        staged.push({ op: 'incident', id, patch });
      },
    };

    await build(tx);

    // Replay against a scratch copy first so a failure leaves the store untouched.
    const scratch = new Map(this.intervals);
    const incidents = new Map(this.incidents);
    const result: CommitResult = { transitioned: [], inserted: [], deleted: 0 };

    for (const step of staged) {
      switch (step.op) {
        case 'transition': {
          const current = scratch.get(step.id);
          if (current && step.from.includes(current.state)) {
            scratch.set(step.id, { ...current, ...step.patch, state: step.to });
            result.transitioned.push(step.id);
          }
          break;
        }
        case 'insert':
          this.assertNoLiveOverlap(step.interval, scratch);
          scratch.set(step.interval.id, step.interval);
          result.inserted.push(step.interval.id);
          break;
        case 'delete':
          for (const id of step.ids) {
            if (scratch.delete(id)) result.deleted++;
          }
          break;
        case 'incident': {
          const current = incidents.get(step.id);
          if (!current) {
            throw new DomainError('not_found', `Incident ${step.id} not found`);
          }
          incidents.set(step.id, { ...current, ...step.patch });
          break;
        }
      }
    }

    this.intervals = scratch;
    this.incidents = incidents;
    return result;
  }

  private materialize(draft: NewInterval, id: number): ReservationInterval {
    return {
      ...draft,
      id,
      decidedBy: null,
      decidedAt: null,
      cancelledBy: null,
      cancelledAt: null,
      createdAt: new Date().toISOString(),
    };
  }

  private assertNoLiveOverlap(
    candidate: ReservationInterval,
    rows: Map<number, ReservationInterval>
  ): void {
    if (!LIVE_STATES.includes(candidate.state)) return;
    for (const row of rows.values()) {
      if (
        row.id !== candidate.id &&
        row.spaceId === candidate.spaceId &&
        LIVE_STATES.includes(row.state) &&
        overlaps(row, candidate)
      ) {
        throw new DomainError(
          'slot_unavailable',
          `Interval overlaps interval ${row.id} on space ${candidate.spaceId}`
        );
      }
    }
  }

  seed(data: SeedData): void {
    data.users.forEach((user) => this.users.set(user.id, { ...user }));
    data.spaces.forEach((space) => this.spaces.set(space.id, { ...space }));
  }

  // Clear all (for testing)
  clear(): void {
    this.spaces.clear();
    this.users.clear();
    this.intervals.clear();
    this.incidents.clear();
    this.nextIntervalId = 1;
    this.nextIncidentId = 1;
  }
}

export const db = new InMemoryDB();

/**
 * Awaits a store call, surfacing unexpected failures as `store_unavailable`.
 * Domain errors raised by the store (constraint violations) pass through.
 */
export async function fromStore<T>(call: Promise<T>): Promise<T> {
  try {
    return await call;
  } catch (err) {
    if (isDomainError(err)) throw err;
    throw new DomainError('store_unavailable', 'Interval store is unavailable', { cause: err });
  }
}

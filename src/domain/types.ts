export type ISODateTime = string;

export type SpaceType = 'sala' | 'cancha';

export interface Space {
  id: number;
  name: string;
  type: SpaceType;
  capacity: number;
  location?: string;
  active: boolean;
}

export type UserRole = 'estudiante' | 'funcionario' | 'administrador';

export interface User {
  id: number;
  name: string;
  role: UserRole;
  active: boolean;
}

export type IntervalState =
  | 'PENDING'
  | 'APPROVED'
  | 'REJECTED'
  | 'CANCELLED'
  | 'BLOCK';

export type IntervalKind = 'normal' | 'block';

// States that occupy the space. Pairwise non-overlapping per space.
export const LIVE_STATES: readonly IntervalState[] = ['PENDING', 'APPROVED', 'BLOCK'];

export interface ReservationInterval {
  id: number;
  spaceId: number;
  start: ISODateTime; // [start,end)
  end: ISODateTime;
  state: IntervalState;
  kind: IntervalKind;
  ownerUserId: number | null; // null for blocks
  reason: string;
  incidentId: number | null;
  decidedBy: number | null;
  decidedAt: ISODateTime | null;
  cancelledBy: number | null;
  cancelledAt: ISODateTime | null;
  createdAt: ISODateTime;
}

export type NewInterval = Pick<
  ReservationInterval,
  'spaceId' | 'start' | 'end' | 'state' | 'kind' | 'ownerUserId' | 'reason' | 'incidentId'
>;

export type DecisionOutcome = 'APPROVED' | 'REJECTED';

export type IncidentType = 'mantencion' | 'averia' | 'limpieza' | 'otro';

export type IncidentStatus = 'OPEN' | 'RESOLVED';

export interface Incident {
  id: number;
  spaceId: number;
  type: IncidentType;
  description: string;
  status: IncidentStatus;
  reportedBy: number | null;
  reportedAt: ISODateTime;
  blockIntervalId: number | null; // reference only, the store owns the block
  solution: string | null;
  resolvedAt: ISODateTime | null;
}

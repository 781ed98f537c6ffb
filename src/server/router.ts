import type { IncidentStatus, IntervalState } from '../domain/types.js';
import { isDomainError } from '../domain/errors.js';
import { formatZoned, parseLocalDateTime } from '../domain/time.js';
import {
  cancelBooking,
  createBooking,
  decideBooking,
  listUserBookings,
} from '../domain/booking-service.js';
import { checkAvailability, getCalendar } from '../domain/availability.js';
import {
  applyBlock,
  listIncidents,
  reportIncident,
  resolveIncident,
} from '../domain/incidents.js';
import type {
  AvailRequest,
  BookRequest,
  IncidRequest,
  ServiceName,
  ServiceRequest,
} from '../protocol/requests.js';
import { decodeRequest } from '../protocol/requests.js';
import type { Logger } from '../logger.js';

export const STATE_LABELS: Record<IntervalState, string> = {
  PENDING: 'pendiente',
  APPROVED: 'aprobada',
  REJECTED: 'rechazada',
  CANCELLED: 'cancelada',
  BLOCK: 'bloqueo',
};

const INCIDENT_STATUS_LABELS: Record<IncidentStatus, string> = {
  OPEN: 'abierta',
  RESOLVED: 'resuelta',
};

export interface RouteContext {
  timeZone: string;
  logger: Logger;
  /** Identifies the caller in logs, e.g. the remote address. */
  remote?: string;
}

export interface ErrorPayload {
  error: string;
  detail: string;
}

async function routeBook(request: BookRequest, ctx: RouteContext): Promise<unknown> {
  switch (request.kind) {
    case 'create': {
      const booking = await createBooking(
        request.spaceId,
        request.userId,
        parseLocalDateTime(request.start, ctx.timeZone),
        parseLocalDateTime(request.end, ctx.timeZone),
        request.reason
      );
      return { id: booking.id, estado: STATE_LABELS[booking.state] };
    }
    case 'decide':
      await decideBooking(
        request.bookingId,
        request.outcome === 'aprobada' ? 'APPROVED' : 'REJECTED',
        request.adminId
      );
      return { updated: true };
    case 'cancel':
      await cancelBooking(request.bookingId, request.userId);
      return { cancelled: true };
    case 'listByUser': {
      const summaries = await listUserBookings(request.userId);
      return summaries.map(({ booking, space }) => ({
        id: booking.id,
        espacio: space?.name ?? null,
        fecha_inicio: formatZoned(booking.start, ctx.timeZone),
        fecha_fin: formatZoned(booking.end, ctx.timeZone),
        estado: STATE_LABELS[booking.state],
        motivo: booking.reason,
        fecha_solicitud: formatZoned(booking.createdAt, ctx.timeZone),
      }));
    }
  }
}

async function routeAvail(request: AvailRequest, ctx: RouteContext): Promise<unknown> {
  switch (request.kind) {
    case 'check': {
      const results = await checkAvailability(
        {
          date: request.date,
          time: request.time,
          durationHours: request.durationHours,
          spaceType: request.spaceType,
        },
        ctx.timeZone
      );
      return results.map(({ space, available }) => ({
        id: space.id,
        nombre: space.name,
        tipo: space.type,
        capacidad: space.capacity,
        disponible: available,
      }));
    }
    case 'calendar': {
      const calendar = await getCalendar(request.spaceId, request.date, ctx.timeZone);
      return {
        espacio: calendar.space.name,
        fecha: calendar.date,
        horarios: calendar.slots.map((slot) => ({
          hora: slot.hour,
          disponible: slot.available,
          reserva_id: slot.occupiedBy?.id ?? null,
          estado: slot.occupiedBy ? STATE_LABELS[slot.occupiedBy.state] : null,
          motivo: slot.occupiedBy?.reason ?? null,
        })),
      };
    }
  }
}

async function routeIncid(request: IncidRequest, ctx: RouteContext): Promise<unknown> {
  switch (request.kind) {
    case 'report': {
      const incident = await reportIncident(
        request.spaceId,
        request.type,
        request.description,
        request.userId
      );
      return { id_incidencia: incident.id, estado: INCIDENT_STATUS_LABELS[incident.status] };
    }
    case 'applyBlock': {
      const result = await applyBlock(
        request.incidentId,
        parseLocalDateTime(request.start, ctx.timeZone),
        parseLocalDateTime(request.end, ctx.timeZone)
      );
      return { bloqueado: true, reservas_canceladas: result.cancelledCount };
    }
    case 'resolve': {
      const result = await resolveIncident(request.incidentId, request.solution);
      return { resuelta: true, espacio_liberado: result.released };
    }
    case 'list': {
      const summaries = await listIncidents({
        status: request.status === undefined ? undefined : request.status === 'abierta' ? 'OPEN' : 'RESOLVED',
        spaceId: request.spaceId,
      });
      return summaries.map(({ incident, space }) => ({
        id: incident.id,
        espacio: space?.name ?? null,
        tipo: incident.type,
        descripcion: incident.description,
        estado: INCIDENT_STATUS_LABELS[incident.status],
        fecha_reporte: formatZoned(incident.reportedAt, ctx.timeZone),
        solucion: incident.solution,
        fecha_resolucion: incident.resolvedAt ? formatZoned(incident.resolvedAt, ctx.timeZone) : null,
      }));
    }
  }
}

export function route(req: ServiceRequest, ctx: RouteContext): Promise<unknown> {
  switch (req.service) {
    case 'book':
      return routeBook(req.request, ctx);
    case 'avail':
      return routeAvail(req.request, ctx);
    case 'incid':
      return routeIncid(req.request, ctx);
  }
}

export function errorPayload(err: unknown): ErrorPayload {
  if (isDomainError(err)) {
    return { error: err.code, detail: err.message };
  }
  return { error: 'internal_error', detail: 'An unexpected error occurred' };
}

/**
 * Decodes a payload for `service`, runs it and returns the response payload.
 * Never throws: every failure becomes an error payload so the connection can
 * keep serving requests.
 */
export async function dispatch(
  service: ServiceName,
  payload: unknown,
  ctx: RouteContext
): Promise<unknown> {
  const startTime = Date.now();
  let op: string = service;

  try {
    const request = decodeRequest(service, payload);
    op = `${service}.${request.request.kind}`;
    const response = await route(request, ctx);

    ctx.logger.info({
      op,
      remote: ctx.remote,
      durationMs: Date.now() - startTime,
      outcome: 'success',
    });
    return response;
  } catch (err) {
    const body = errorPayload(err);
    const fields = {
      op,
      remote: ctx.remote,
      durationMs: Date.now() - startTime,
      outcome: 'failure',
      error: body.error,
      detail: body.detail,
    };

    // Expected business outcomes are warnings; store failures and bugs are errors.
    if (isDomainError(err) && err.code !== 'store_unavailable') {
      ctx.logger.warn(fields);
    } else {
      ctx.logger.error({ ...fields, err });
    }
    return body;
  }
}

import { z } from 'zod';
import { DomainError } from '../domain/errors.js';
import { MAX_DURATION_HOURS } from '../domain/availability.js';

/**
 * Every service accepts a closed set of operations. A payload may name its
 * operation in `accion`; otherwise exactly one operation schema has to accept
 * it. Schemas are strict, so a payload carrying keys of two operations matches
 * neither instead of being routed by guesswork.
 */

// Ids arrive as JSON numbers or digit strings; booleans and arrays are not ids.
const id = z
  .union([z.number(), z.string().regex(/^\d+$/, 'expected a positive integer').transform(Number)])
  .pipe(z.number().int().positive());
const duration = z
  .union([z.number(), z.string().regex(/^\d+(\.\d+)?$/, 'expected a number of hours').transform(Number)])
  .pipe(z.number().positive().max(MAX_DURATION_HOURS));
const localDateTime = z.string().min(1);
const date = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const time = z.string().regex(/^\d{2}:\d{2}$/, 'expected HH:mm');

export type ServiceName = 'book' | 'avail' | 'incid';

export type BookRequest =
  | { kind: 'create'; userId: number; spaceId: number; start: string; end: string; reason: string }
  | { kind: 'decide'; bookingId: number; outcome: 'aprobada' | 'rechazada'; adminId: number }
  | { kind: 'cancel'; bookingId: number; userId: number }
  | { kind: 'listByUser'; userId: number };

export type AvailRequest =
  | {
      kind: 'check';
      date: string;
      time?: string;
      durationHours?: number;
      spaceType?: 'sala' | 'cancha';
    }
  | { kind: 'calendar'; spaceId: number; date: string };

export type IncidRequest =
  | {
      kind: 'report';
      spaceId: number;
      type: 'mantencion' | 'averia' | 'limpieza' | 'otro';
      description: string;
      userId: number | null;
    }
  | { kind: 'applyBlock'; incidentId: number; start: string; end: string }
  | { kind: 'resolve'; incidentId: number; solution?: string }
  | { kind: 'list'; status?: 'abierta' | 'resuelta'; spaceId?: number };

export type ServiceRequest =
  | { service: 'book'; request: BookRequest }
  | { service: 'avail'; request: AvailRequest }
  | { service: 'incid'; request: IncidRequest };

interface Operation<R> {
  action: string;
  schema: z.ZodType<R, z.ZodTypeDef, unknown>;
}

function op<R>(action: string, schema: z.ZodType<R, z.ZodTypeDef, unknown>): Operation<R> {
  return { action, schema };
}

const bookOperations: Operation<BookRequest>[] = [
  op(
    'crear',
    z
      .object({
        accion: z.literal('crear').optional(),
        user: id,
        space: id,
        inicio: localDateTime,
        fin: localDateTime,
        motivo: z.string().optional(),
      })
      .strict()
      .transform((p): BookRequest => ({
        kind: 'create',
        userId: p.user,
        spaceId: p.space,
        start: p.inicio,
        end: p.fin,
        reason: p.motivo ?? '',
      }))
  ),
  op(
    'decidir',
    z
      .object({
        accion: z.literal('decidir').optional(),
        reserva: id,
        estado: z.enum(['aprobada', 'rechazada']),
        admin: id,
      })
      .strict()
      .transform((p): BookRequest => ({
        kind: 'decide',
        bookingId: p.reserva,
        outcome: p.estado,
        adminId: p.admin,
      }))
  ),
  op(
    'cancelar',
    z
      .object({ accion: z.literal('cancelar').optional(), reserva: id, user: id })
      .strict()
      .transform((p): BookRequest => ({ kind: 'cancel', bookingId: p.reserva, userId: p.user }))
  ),
  op(
    'listar',
    z
      .object({ accion: z.literal('listar').optional(), user: id })
      .strict()
      .transform((p): BookRequest => ({ kind: 'listByUser', userId: p.user }))
  ),
];

const availOperations: Operation<AvailRequest>[] = [
  op(
    'consultar',
    z
      .object({
        accion: z.literal('consultar').optional(),
        fecha: date,
        hora: time.optional(),
        duracion: duration.optional(),
        tipo: z.enum(['sala', 'cancha']).optional(),
      })
      .strict()
      .transform((p): AvailRequest => ({
        kind: 'check',
        date: p.fecha,
        time: p.hora,
        durationHours: p.duracion,
        spaceType: p.tipo,
      }))
  ),
  op(
    'calendario',
    z
      .object({ accion: z.literal('calendario').optional(), space: id, fecha: date })
      .strict()
      .transform((p): AvailRequest => ({ kind: 'calendar', spaceId: p.space, date: p.fecha }))
  ),
];

const incidOperations: Operation<IncidRequest>[] = [
  op(
    'reportar',
    z
      .object({
        accion: z.literal('reportar').optional(),
        space: id,
        tipo: z.enum(['mantencion', 'averia', 'limpieza', 'otro']),
        descripcion: z.string().min(1),
        user: id.optional(),
      })
      .strict()
      .transform((p): IncidRequest => ({
        kind: 'report',
        spaceId: p.space,
        type: p.tipo,
        description: p.descripcion,
        userId: p.user ?? null,
      }))
  ),
  op(
    'bloquear',
    z
      .object({
        accion: z.literal('bloquear').optional(),
        incidencia: id,
        inicio: localDateTime,
        fin: localDateTime,
      })
      .strict()
      .transform((p): IncidRequest => ({
        kind: 'applyBlock',
        incidentId: p.incidencia,
        start: p.inicio,
        end: p.fin,
      }))
  ),
  op(
    'resolver',
    z
      .object({
        accion: z.literal('resolver').optional(),
        incidencia: id,
        solucion: z.string().optional(),
      })
      .strict()
      .transform((p): IncidRequest => ({
        kind: 'resolve',
        incidentId: p.incidencia,
        solution: p.solucion,
      }))
  ),
  op(
    'listar',
    z
      .object({
        accion: z.literal('listar').optional(),
        estado: z.enum(['abierta', 'resuelta']).optional(),
        space: id.optional(),
        getall: z.literal(true).optional(),
      })
      .strict()
      .transform((p): IncidRequest => ({ kind: 'list', status: p.estado, spaceId: p.space }))
  ),
];

// `action` values sent by older clients, mapped onto `accion`.
const legacyActions: Record<ServiceName, ReadonlyMap<string, string>> = {
  book: new Map([
    ['get', 'listar'],
    ['cancel', 'cancelar'],
  ]),
  avail: new Map(),
  incid: new Map(),
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withLegacyAction(service: ServiceName, payload: Record<string, unknown>): Record<string, unknown> {
  if (payload.action === undefined) return payload;

  const { action, ...rest } = payload;
  if (rest.accion !== undefined) {
    throw new DomainError('invalid_input', 'Use either accion or action, not both');
  }
  const accion = typeof action === 'string' ? legacyActions[service].get(action) : undefined;
  if (!accion) {
    throw new DomainError('invalid_input', `Unknown ${service} action: ${String(action)}`);
  }
  return { ...rest, accion };
}

function decodeWith<R>(service: ServiceName, operations: Operation<R>[], raw: unknown): R {
  if (!isRecord(raw)) {
    throw new DomainError('invalid_input', 'Payload must be a JSON object');
  }
  const payload = withLegacyAction(service, raw);

  const named = payload.accion;
  if (named !== undefined) {
    const operation = operations.find((o) => o.action === named);
    if (!operation) {
      throw new DomainError('invalid_input', `Unknown ${service} action: ${String(named)}`);
    }
    const parsed = operation.schema.safeParse(payload);
    if (!parsed.success) {
      throw new DomainError('invalid_input', formatIssues(parsed.error));
    }
    return parsed.data;
  }

  const matches: { action: string; data: R }[] = [];
  for (const operation of operations) {
    const parsed = operation.schema.safeParse(payload);
    if (parsed.success) matches.push({ action: operation.action, data: parsed.data });
  }

  if (matches.length === 0) {
    throw new DomainError('invalid_input', `Unrecognized ${service} request`);
  }
  if (matches.length > 1) {
    throw new DomainError(
      'invalid_input',
      `Ambiguous ${service} request, matches ${matches.map((m) => m.action).join(', ')}`
    );
  }
  return matches[0].data;
}

export function decodeRequest(service: ServiceName, payload: unknown): ServiceRequest {
  switch (service) {
    case 'book':
      return { service, request: decodeWith(service, bookOperations, payload) };
    case 'avail':
      return { service, request: decodeWith(service, availOperations, payload) };
    case 'incid':
      return { service, request: decodeWith(service, incidOperations, payload) };
  }
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { db } from '../store/db.js';
import { logger } from '../logger.js';
import type { RouteContext } from '../server/router.js';
import { dispatch, errorPayload } from '../server/router.js';
import { DomainError } from '../domain/errors.js';
import { ADMIN, SALA_A, STUDENT, seedCampus } from './fixtures.js';

const ctx: RouteContext = { timeZone: 'UTC', logger, remote: 'test' };

const createPayload = {
  user: STUDENT,
  space: SALA_A,
  inicio: '2030-03-04T10:00',
  fin: '2030-03-04T11:00',
  motivo: 'Estudio',
};

describe('Router', () => {
  beforeEach(() => {
    seedCampus();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('book', () => {
    it('creates, lists and decides bookings', async () => {
      expect(await dispatch('book', createPayload, ctx)).toEqual({ id: 1, estado: 'pendiente' });

      const listed = await dispatch('book', { user: STUDENT }, ctx);
      expect(listed).toEqual([
        {
          id: 1,
          espacio: 'Sala A',
          fecha_inicio: '2030-03-04T10:00:00',
          fecha_fin: '2030-03-04T11:00:00',
          estado: 'pendiente',
          motivo: 'Estudio',
          fecha_solicitud: expect.any(String),
        },
      ]);

      expect(await dispatch('book', { reserva: 1, estado: 'aprobada', admin: ADMIN }, ctx)).toEqual({
        updated: true,
      });
      expect(await dispatch('book', { reserva: 1, estado: 'rechazada', admin: ADMIN }, ctx)).toEqual({
        error: 'invalid_state',
        detail: 'Booking 1 is APPROVED, not PENDING',
      });
    });

    it('answers conflicts with slot_unavailable', async () => {
      await dispatch('book', createPayload, ctx);

      expect(
        await dispatch('book', { ...createPayload, inicio: '2030-03-04 10:30', fin: '2030-03-04 12:00' }, ctx)
      ).toEqual({ error: 'slot_unavailable', detail: 'Space 1 is not available in the requested range' });
    });

    it('cancels on behalf of the owner', async () => {
      await dispatch('book', createPayload, ctx);

      expect(await dispatch('book', { reserva: 1, user: STUDENT }, ctx)).toEqual({ cancelled: true });
      expect(await dispatch('book', { reserva: 1, user: STUDENT }, ctx)).toEqual({
        error: 'invalid_state',
        detail: 'Booking 1 is already CANCELLED',
      });
    });

    it('rejects unparseable date-times', async () => {
      expect(await dispatch('book', { ...createPayload, inicio: 'mañana' }, ctx)).toEqual({
        error: 'invalid_input',
        detail: 'Invalid date-time: mañana',
      });
    });
  });

  describe('avail', () => {
    it('renders the calendar with booking details', async () => {
      await dispatch('book', createPayload, ctx);
      await dispatch('book', { reserva: 1, estado: 'aprobada', admin: ADMIN }, ctx);

      const calendar = await dispatch('avail', { space: SALA_A, fecha: '2030-03-04' }, ctx);
      expect(calendar).toMatchObject({ espacio: 'Sala A', fecha: '2030-03-04' });
      expect(calendar).toHaveProperty('horarios.2', {
        hora: '10:00',
        disponible: false,
        reserva_id: 1,
        estado: 'aprobada',
        motivo: 'Estudio',
      });
      expect(calendar).toHaveProperty('horarios.3', {
        hora: '11:00',
        disponible: true,
        reserva_id: null,
        estado: null,
        motivo: null,
      });
    });

    it('lists spaces with their availability', async () => {
      await dispatch('book', createPayload, ctx);

      expect(await dispatch('avail', { fecha: '2030-03-04', hora: '10:00', tipo: 'sala' }, ctx)).toEqual([
        { id: 1, nombre: 'Sala A', tipo: 'sala', capacidad: 30, disponible: false },
        { id: 2, nombre: 'Sala B', tipo: 'sala', capacidad: 20, disponible: true },
      ]);
    });
  });

  describe('avail input limits', () => {
    it('answers an out-of-range duration as invalid input', async () => {
      const errorLog = vi.spyOn(logger, 'error');

      expect(
        await dispatch('avail', { accion: 'consultar', fecha: '2030-03-04', duracion: 1e12 }, ctx)
      ).toEqual({ error: 'invalid_input', detail: 'duracion: Number must be less than or equal to 24' });
      expect(errorLog).not.toHaveBeenCalled();
    });
  });

  describe('incid', () => {
    it('reports, blocks, resolves and lists incidents', async () => {
      await dispatch('book', createPayload, ctx);

      expect(
        await dispatch('incid', { space: SALA_A, tipo: 'averia', descripcion: 'Sin luz', user: STUDENT }, ctx)
      ).toEqual({ id_incidencia: 1, estado: 'abierta' });
      expect(
        await dispatch('incid', { incidencia: 1, inicio: '2030-03-04T09:00', fin: '2030-03-04T12:00' }, ctx)
      ).toEqual({ bloqueado: true, reservas_canceladas: 1 });
      expect(await dispatch('incid', { incidencia: 1, solucion: 'Tablero reparado' }, ctx)).toEqual({
        resuelta: true,
        espacio_liberado: true,
      });
      expect(await dispatch('incid', { incidencia: 1 }, ctx)).toEqual({
        resuelta: true,
        espacio_liberado: false,
      });

      expect(await dispatch('incid', { estado: 'resuelta' }, ctx)).toEqual([
        {
          id: 1,
          espacio: 'Sala A',
          tipo: 'averia',
          descripcion: 'Sin luz',
          estado: 'resuelta',
          fecha_reporte: expect.any(String),
          solucion: 'Tablero reparado',
          fecha_resolucion: expect.any(String),
        },
      ]);
      expect(await dispatch('incid', { accion: 'listar', estado: 'abierta' }, ctx)).toEqual([]);
    });
  });

  describe('failures', () => {
    it('turns store failures into store_unavailable and logs them as errors', async () => {
      vi.spyOn(db, 'listIntervalsBySpace').mockRejectedValueOnce(new Error('connection reset'));
      const errorLog = vi.spyOn(logger, 'error');

      expect(await dispatch('book', createPayload, ctx)).toEqual({
        error: 'store_unavailable',
        detail: 'Interval store is unavailable',
      });
      expect(errorLog).toHaveBeenCalledWith(
        expect.objectContaining({ op: 'book.create', outcome: 'failure', error: 'store_unavailable' })
      );

      // The next request goes through normally.
      expect(await dispatch('book', createPayload, ctx)).toEqual({ id: 1, estado: 'pendiente' });
    });

    it('logs business failures as warnings', async () => {
      const warnLog = vi.spyOn(logger, 'warn');

      await dispatch('book', { reserva: 5, user: STUDENT }, ctx);
      expect(warnLog).toHaveBeenCalledWith(
        expect.objectContaining({ op: 'book.cancel', outcome: 'failure', error: 'not_found' })
      );
    });

    it('hides unexpected errors behind internal_error', () => {
      expect(errorPayload(new TypeError('x is undefined'))).toEqual({
        error: 'internal_error',
        detail: 'An unexpected error occurred',
      });
      expect(errorPayload(new DomainError('invalid_range', 'end must be after start'))).toEqual({
        error: 'invalid_range',
        detail: 'end must be after start',
      });
    });
  });
});

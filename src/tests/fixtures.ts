import { db } from '../store/db.js';
import { metricsStore } from '../store/metrics.js';

export const ADMIN = 1;
export const STUDENT = 2;
export const OTHER_STUDENT = 3;
export const INACTIVE_USER = 9;

export const SALA_A = 1;
export const SALA_B = 2;
export const CANCHA = 3;
export const CLOSED_SALA = 4;

export function seedCampus(): void {
  db.clear();
  metricsStore.reset();
  db.seed({
    users: [
      { id: ADMIN, name: 'Admin', role: 'administrador', active: true },
      { id: STUDENT, name: 'Student One', role: 'estudiante', active: true },
      { id: OTHER_STUDENT, name: 'Student Two', role: 'estudiante', active: true },
      { id: INACTIVE_USER, name: 'Former Staff', role: 'funcionario', active: false },
    ],
    spaces: [
      { id: SALA_A, name: 'Sala A', type: 'sala', capacity: 30, active: true },
      { id: SALA_B, name: 'Sala B', type: 'sala', capacity: 20, active: true },
      { id: CANCHA, name: 'Cancha 1', type: 'cancha', capacity: 22, active: true },
      { id: CLOSED_SALA, name: 'Sala Cerrada', type: 'sala', capacity: 10, active: false },
    ],
  });
}

/** UTC instant for a wall-clock time on the test day. */
export function at(time: string, date = '2030-03-04'): string {
  return new Date(`${date}T${time}:00.000Z`).toISOString();
}

/** Resolves to the DomainError code a call failed with, or 'ok'. */
export async function outcomeOf(call: Promise<unknown>): Promise<string> {
  try {
    await call;
    return 'ok';
  } catch (err) {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
    throw err;
  }
}

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { InMemoryDB, SeedData } from './db.js';

const userSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  role: z.enum(['estudiante', 'funcionario', 'administrador']),
  active: z.boolean().default(true),
});

const spaceSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  type: z.enum(['sala', 'cancha']),
  capacity: z.number().int().nonnegative(),
  location: z.string().optional(),
  active: z.boolean().default(true),
});

export const seedSchema = z.object({
  users: z.array(userSchema),
  spaces: z.array(spaceSchema),
});

export const DEFAULT_SEED_URL = new URL('../../data/seed.json', import.meta.url);

export function parseSeed(raw: unknown): SeedData {
  const parsed = seedSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid seed data: ${issues}`);
  }
  return parsed.data;
}

/** Loads users and spaces from a JSON fixture into `store`. */
export async function loadSeed(store: InMemoryDB, source: URL | string = DEFAULT_SEED_URL): Promise<SeedData> {
  const text = await readFile(source, 'utf8');
  const data = parseSeed(JSON.parse(text));
  store.seed(data);
  return data;
}

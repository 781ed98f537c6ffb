import { z } from 'zod';

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  BOOK_PORT: port(5005),
  AVAIL_PORT: port(5004),
  INCID_PORT: port(5006),
  OPS_PORT: port(3000),
  CAMPUS_TIMEZONE: z
    .string()
    .default('America/Santiago')
    .refine((tz) => {
      try {
        new Intl.DateTimeFormat('en-US', { timeZone: tz });
        return true;
      } catch {
        return false;
      }
    }, { message: 'Unknown IANA time zone' }),
  SOCKET_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(5_000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  env: Env['NODE_ENV'];
  host: string;
  ports: { book: number; avail: number; incid: number; ops: number };
  timeZone: string;
  idleTimeoutMs: number;
  shutdownGraceMs: number;
  logLevel: NonNullable<Env['LOG_LEVEL']>;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const env = parsed.data;
  const isTest = Boolean(source.VITEST) || env.NODE_ENV === 'test';

  return {
    env: env.NODE_ENV,
    host: env.HOST,
    ports: { book: env.BOOK_PORT, avail: env.AVAIL_PORT, incid: env.INCID_PORT, ops: env.OPS_PORT },
    timeZone: env.CAMPUS_TIMEZONE,
    idleTimeoutMs: env.SOCKET_IDLE_TIMEOUT_MS,
    shutdownGraceMs: env.SHUTDOWN_GRACE_MS,
    logLevel: env.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
  };
}

export const config = loadConfig();

import { describe, it, expect, beforeEach } from 'vitest';
import { loadConfig } from '../config.js';
import { loadSeed, parseSeed } from '../store/seed.js';
import { db } from '../store/db.js';

describe('loadConfig', () => {
  it('falls back to the documented defaults', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      host: '0.0.0.0',
      ports: { book: 5005, avail: 5004, incid: 5006, ops: 3000 },
      timeZone: 'America/Santiago',
      idleTimeoutMs: 30_000,
      shutdownGraceMs: 5_000,
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const cfg = loadConfig({
      NODE_ENV: 'production',
      BOOK_PORT: '7005',
      CAMPUS_TIMEZONE: 'UTC',
      LOG_LEVEL: 'warn',
    });

    expect(cfg.env).toBe('production');
    expect(cfg.ports.book).toBe(7005);
    expect(cfg.timeZone).toBe('UTC');
    expect(cfg.logLevel).toBe('warn');
  });

  it('silences logs under test', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ VITEST: 'true' }).logLevel).toBe('silent');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ BOOK_PORT: 'seventy' })).toThrow(/^Invalid configuration: BOOK_PORT/);
    expect(() => loadConfig({ CAMPUS_TIMEZONE: 'Mars/Olympus' })).toThrow('Unknown IANA time zone');
  });
});

describe('seed data', () => {
  beforeEach(() => {
    db.clear();
  });

  it('loads the bundled fixture', async () => {
    const data = await loadSeed(db);

    expect(data.spaces.map((s) => s.name)).toEqual([
      'Sala A101',
      'Sala B201',
      'Cancha Futbol 1',
      'Cancha Basquetbol 1',
    ]);
    expect((await db.getUser(1))?.role).toBe('administrador');
    expect(await db.listSpaces({ type: 'cancha' })).toHaveLength(2);
  });

  it('defaults active to true and rejects unknown roles', () => {
    const data = parseSeed({
      users: [{ id: 1, name: 'Admin', role: 'administrador' }],
      spaces: [{ id: 1, name: 'Sala', type: 'sala', capacity: 5 }],
    });
    expect(data.users[0].active).toBe(true);
    expect(data.spaces[0].active).toBe(true);

    expect(() => parseSeed({ users: [{ id: 1, name: 'X', role: 'rector' }], spaces: [] })).toThrow(
      /^Invalid seed data: users\.0\.role/
    );
  });
});

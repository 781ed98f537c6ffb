import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { loadConfig } from '../config.js';
import { startEngine } from '../index.js';
import { FrameClient } from '../protocol/client.js';
import { db } from '../store/db.js';

describe('startEngine', () => {
  it('serves every service and the ops app, then stops cleanly', async () => {
    db.clear();
    const cfg = loadConfig({
      NODE_ENV: 'test',
      HOST: '127.0.0.1',
      BOOK_PORT: '0',
      AVAIL_PORT: '0',
      INCID_PORT: '0',
      OPS_PORT: '0',
      CAMPUS_TIMEZONE: 'UTC',
    });
    const engine = await startEngine(cfg);

    try {
      expect(engine.servers.map((s) => s.service)).toEqual(['book', 'avail', 'incid']);

      const avail = engine.servers[1].address();
      expect(avail).not.toBeNull();
      const client = await FrameClient.connect(avail?.port ?? 0);
      const response = await client.request('avail', { fecha: '2030-03-04', tipo: 'cancha' });
      expect(response.payload).toEqual([
        { id: 3, nombre: 'Cancha Futbol 1', tipo: 'cancha', capacidad: 22, disponible: true },
        { id: 4, nombre: 'Cancha Basquetbol 1', tipo: 'cancha', capacidad: 10, disponible: true },
      ]);
      await client.close();

      const ops = engine.ops.address();
      const port = ops && typeof ops === 'object' ? ops.port : 0;
      const res = await request(`http://127.0.0.1:${port}`).get('/health');
      expect(res.body).toEqual({ status: 'ok' });
    } finally {
      await engine.stop();
    }

    expect(engine.ops.listening).toBe(false);
    expect(engine.servers.every((s) => s.address() === null)).toBe(true);
  });
});

import type { Server } from 'node:http';
import type { Config } from './config.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { db } from './store/db.js';
import { loadSeed } from './store/seed.js';
import { FrameServer } from './server/frame-server.js';
import type { ServiceName } from './protocol/requests.js';
import { createOpsApp } from './http/app.js';

const SERVICES: ServiceName[] = ['book', 'avail', 'incid'];

export interface Engine {
  servers: FrameServer[];
  ops: Server;
  stop(): Promise<void>;
}

export async function startEngine(cfg: Config): Promise<Engine> {
  if (cfg.env !== 'production') {
    const seed = await loadSeed(db);
    logger.info({ op: 'seed', users: seed.users.length, spaces: seed.spaces.length }, 'Seed data loaded');
  }

  const servers = SERVICES.map(
    (service) =>
      new FrameServer({
        service,
        host: cfg.host,
        port: cfg.ports[service],
        idleTimeoutMs: cfg.idleTimeoutMs,
        shutdownGraceMs: cfg.shutdownGraceMs,
        timeZone: cfg.timeZone,
        logger,
      })
  );

  for (const server of servers) {
    await server.start();
  }

  const app = createOpsApp({ timeZone: cfg.timeZone });
  const ops = await new Promise<Server>((resolve, reject) => {
    const server = app.listen(cfg.ports.ops, cfg.host, () => resolve(server));
    server.once('error', reject);
  });
  logger.info({ op: 'start', port: cfg.ports.ops }, 'Ops server listening');

  return {
    servers,
    ops,
    async stop() {
      await Promise.all(servers.map((server) => server.stop()));
      await new Promise<void>((resolve, reject) => {
        ops.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

if (!process.env.VITEST) {
  startEngine(config)
    .then((engine) => {
      let stopping = false;
      const shutdown = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        logger.info({ op: 'shutdown', signal }, 'Shutting down');
        engine
          .stop()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            logger.error({ op: 'shutdown', err }, 'Shutdown failed');
            process.exit(1);
          });
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    })
    .catch((err: unknown) => {
      logger.fatal({ op: 'start', err }, 'Startup failed');
      process.exit(1);
    });
}

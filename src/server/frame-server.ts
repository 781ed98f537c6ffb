import net from 'node:net';
import type { AddressInfo, Socket } from 'node:net';
import type { Frame } from '../protocol/frame.js';
import { FrameError, FrameReader, decode, encode, serviceOf } from '../protocol/frame.js';
import type { ServiceName } from '../protocol/requests.js';
import { metricsStore } from '../store/metrics.js';
import type { Logger } from '../logger.js';
import { dispatch } from './router.js';

export interface FrameServerOptions {
  service: ServiceName;
  host: string;
  port: number;
  idleTimeoutMs: number;
  shutdownGraceMs: number;
  timeZone: string;
  logger: Logger;
}

/**
 * One client connection. Frames are handled strictly in arrival order; a slow
 * request delays only the connection it came in on.
 */
class Connection {
  private readonly reader = new FrameReader();
  private queue: Promise<void> = Promise.resolve();
  private inFlight = 0;
  private draining = false;
  private drainTimer: NodeJS.Timeout | null = null;
  readonly remote: string;

  constructor(
    private readonly socket: Socket,
    private readonly options: FrameServerOptions,
    private readonly log: Logger
  ) {
    this.remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;

    socket.setTimeout(options.idleTimeoutMs);
    socket.on('timeout', () => {
      this.log.warn({ op: 'idle_timeout', remote: this.remote }, 'Closing idle connection');
      socket.destroy();
    });
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('close', () => this.clearDrainTimer());
    socket.on('error', (err) => {
      this.log.warn({ op: 'socket_error', remote: this.remote, err }, 'Socket error');
    });
  }

  onClose(listener: () => void): void {
    this.socket.once('close', listener);
  }

  private onData(chunk: Buffer): void {
    if (this.draining) return;

    let frames: Buffer[];
    try {
      frames = this.reader.push(chunk);
    } catch (err) {
      // Without a trustworthy length header the rest of the stream cannot be framed.
      metricsStore.incrementFrameError();
      this.draining = true;
      this.socket.pause();
      const detail = err instanceof Error ? err.message : 'Unreadable frame';
      this.log.warn({ op: 'frame_error', remote: this.remote, detail }, 'Dropping connection');
      this.enqueue(async () => {
        this.write({ error: 'frame_error', detail });
        this.socket.end();
      });
      return;
    }

    for (const raw of frames) {
      this.enqueue(() => this.handle(raw));
    }
  }

  private enqueue(task: () => Promise<void>): void {
    this.inFlight++;
    this.queue = this.queue
      .then(task)
      .catch((err: unknown) => {
        this.log.error({ op: 'handle', remote: this.remote, err }, 'Request loop failure');
        this.write({ error: 'internal_error', detail: 'An unexpected error occurred' });
      })
      .finally(() => {
        this.inFlight--;
        if (this.draining && this.inFlight === 0 && !this.socket.destroyed) {
          this.socket.end();
        }
      });
  }

  private async handle(raw: Buffer): Promise<void> {
    metricsStore.incrementFrameReceived();
    const { service } = this.options;

    let frame: Frame;
    try {
      frame = decode(raw);
    } catch (err) {
      if (!(err instanceof FrameError)) throw err;
      metricsStore.incrementFrameError();
      this.write({ error: 'frame_error', detail: err.message });
      return;
    }

    const tag = serviceOf(frame.tag);
    if (tag !== service) {
      this.write({ error: 'wrong_service', detail: `This endpoint serves ${service}, not ${tag}` });
      return;
    }

    const response = await dispatch(service, frame.payload, {
      timeZone: this.options.timeZone,
      logger: this.log,
      remote: this.remote,
    });
    this.write(response);
  }

  private write(payload: unknown): void {
    if (!this.socket.writable) return;
    let bytes: Buffer;
    try {
      bytes = encode(this.options.service, payload);
    } catch (err) {
      if (!(err instanceof FrameError)) throw err;
      this.log.error({ op: 'encode', remote: this.remote, err }, 'Response does not fit in a frame');
      bytes = encode(this.options.service, { error: 'frame_error', detail: err.message });
    }
    if (!this.socket.write(bytes)) {
      this.awaitDrain();
    }
  }

  /**
   * The peer is not reading its responses: stop reading its requests until the
   * write buffer flushes, and drop it if that takes longer than the idle timeout.
   */
  private awaitDrain(): void {
    if (this.drainTimer) return;
    this.socket.pause();
    this.drainTimer = setTimeout(() => {
      this.log.warn(
        { op: 'stalled', remote: this.remote, buffered: this.socket.writableLength },
        'Dropping client that stopped reading'
      );
      this.socket.destroy();
    }, this.options.idleTimeoutMs);
    this.socket.once('drain', () => {
      this.clearDrainTimer();
      if (!this.draining) this.socket.resume();
    });
  }

  private clearDrainTimer(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
  }

  /** Stops reading and ends the socket once queued requests have been answered. */
  drain(): void {
    this.draining = true;
    this.socket.pause();
    if (this.inFlight === 0) {
      this.socket.end();
    }
  }

  destroy(): void {
    this.socket.destroy();
  }
}

/**
 * A TCP listener for one service tag. Owns its socket and its connections;
 * `stop()` stops accepting, lets every connection finish the requests it has
 * already received, and force-closes whatever is left after the grace period.
 */
export class FrameServer {
  private server: net.Server | null = null;
  private readonly connections = new Set<Connection>();
  private readonly log: Logger;

  constructor(private readonly options: FrameServerOptions) {
    this.log = options.logger.child({ service: options.service });
  }

  get service(): ServiceName {
    return this.options.service;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error(`${this.options.service} server already started`);
    }

    const server = net.createServer((socket) => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        resolve();
      });
    }).catch((err: unknown) => {
      this.server = null;
      throw err;
    });

    server.on('error', (err) => {
      this.log.error({ op: 'listen', err }, 'Listener error');
    });

    const address = this.address();
    if (!address) {
      throw new Error(`${this.options.service} server has no TCP address`);
    }
    this.log.info({ op: 'start', port: address.port }, 'Service listening');
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

    for (const connection of this.connections) {
      connection.drain();
    }

    const timer = setTimeout(() => {
      if (this.connections.size > 0) {
        this.log.warn({ op: 'stop', remaining: this.connections.size }, 'Forcing connections closed');
      }
      for (const connection of this.connections) {
        connection.destroy();
      }
    }, this.options.shutdownGraceMs);
    timer.unref();

    try {
      await closed;
    } finally {
      clearTimeout(timer);
    }
    this.log.info({ op: 'stop' }, 'Service stopped');
  }

  private accept(socket: Socket): void {
    const connection = new Connection(socket, this.options, this.log);
    this.connections.add(connection);
    metricsStore.incrementConnectionOpened();
    this.log.debug({ op: 'connect', remote: connection.remote }, 'Connection opened');

    connection.onClose(() => {
      this.connections.delete(connection);
      metricsStore.incrementConnectionClosed();
      this.log.debug({ op: 'disconnect', remote: connection.remote }, 'Connection closed');
    });
  }
}

import net from 'node:net';
import type { Socket } from 'node:net';
import type { Frame } from './frame.js';
import { FrameReader, decode, encode } from './frame.js';

interface Waiter {
  resolve: (frame: Frame) => void;
  reject: (err: Error) => void;
}

/**
 * Minimal client for the frame protocol. Responses are matched to requests in
 * order, which is how every service answers on a single connection.
 */
export class FrameClient {
  private readonly reader = new FrameReader();
  private readonly waiters: Waiter[] = [];
  private closedError: Error | null = null;

  private constructor(private readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      try {
        for (const raw of this.reader.push(chunk)) {
          this.waiters.shift()?.resolve(decode(raw));
        }
      } catch (err) {
        this.fail(err instanceof Error ? err : new Error(String(err)));
        socket.destroy();
      }
    });
    socket.on('error', (err) => this.fail(err));
    socket.on('close', () => this.fail(new Error('Connection closed')));
  }

  static connect(port: number, host = '127.0.0.1'): Promise<FrameClient> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ port, host });
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.off('error', reject);
        resolve(new FrameClient(socket));
      });
    });
  }

  get closed(): boolean {
    return this.closedError !== null;
  }

  request(tag: string, payload: unknown): Promise<Frame> {
    return this.send(encode(tag, payload));
  }

  /** Writes bytes as-is and waits for the next response frame. */
  send(bytes: Buffer | string): Promise<Frame> {
    if (this.closedError) {
      return Promise.reject(this.closedError);
    }
    return new Promise<Frame>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
      this.socket.write(bytes);
    });
  }

  /** Resolves once the server has closed the connection. */
  waitForClose(): Promise<void> {
    if (this.socket.destroyed || this.closedError) return Promise.resolve();
    return new Promise((resolve) => this.socket.once('close', () => resolve()));
  }

  close(): Promise<void> {
    if (this.socket.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.end();
    });
  }

  private fail(err: Error): void {
    if (!this.closedError) this.closedError = err;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }
}

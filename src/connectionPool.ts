import net from 'node:net';

import { LocalIOError, ResourceExhaustionError, isResourceExhaustion } from './errors.js';
import type { Logger } from './logger.js';
import { destroyBestEffort } from './util/socketSafe.js';
import { formatOneLineError } from './util/text.js';

const KEEPALIVE_INITIAL_DELAY_MS = 30_000;

export type DialFn = (host: string, port: number, timeoutMs: number) => Promise<net.Socket>;

/**
 * Connects to a local service. The socket comes back paused and half-open capable so the
 * forwarder decides when bytes start flowing.
 */
export function dialLocalService(host: string, port: number, timeoutMs: number): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    let socket: net.Socket;
    try {
      socket = net.createConnection({ host, port, allowHalfOpen: true });
    } catch (err) {
      reject(toDialError(host, port, err));
      return;
    }
    socket.pause();

    const timer = setTimeout(() => {
      socket.removeListener('error', onError);
      destroyBestEffort(socket);
      reject(new LocalIOError(`dial ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      destroyBestEffort(socket);
      reject(toDialError(host, port, err));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      socket.setNoDelay(true);
      socket.setKeepAlive(true, KEEPALIVE_INITIAL_DELAY_MS);
      resolve(socket);
    });
  });
}

function toDialError(host: string, port: number, err: unknown): Error {
  const message = `dial ${host}:${port} failed: ${formatOneLineError(err, 256)}`;
  if (isResourceExhaustion(err)) {
    return new ResourceExhaustionError(message, { cause: err });
  }
  return new LocalIOError(message, { cause: err });
}

export type ConnectionPoolOptions = {
  host: string;
  port: number;
  /** Warm sockets to keep; a soft bound, checkouts beyond it dial fresh. */
  size: number;
  dialTimeoutMs: number;
  /** Warm sockets older than this are recycled on checkout. */
  maxIdleMs: number;
  logger: Logger;
  dial?: DialFn;
  now?: () => number;
};

type IdleSocket = {
  socket: net.Socket;
  since: number;
  evict: () => void;
};

/**
 * Pre-dialed sockets to one local service. A socket leaves the pool for good on checkout;
 * every checkout schedules a refill in the background.
 */
export class ConnectionPool {
  readonly host: string;
  readonly port: number;
  private readonly size: number;
  private readonly dialTimeoutMs: number;
  private readonly maxIdleMs: number;
  private readonly logger: Logger;
  private readonly dial: DialFn;
  private readonly now: () => number;
  private readonly idle: IdleSocket[] = [];
  private dialing = 0;
  private refillSuspended = false;
  private closed = false;

  constructor(opts: ConnectionPoolOptions) {
    this.host = opts.host;
    this.port = opts.port;
    this.size = Math.max(0, opts.size);
    this.dialTimeoutMs = opts.dialTimeoutMs;
    this.maxIdleMs = opts.maxIdleMs;
    this.logger = opts.logger;
    this.dial = opts.dial ?? dialLocalService;
    this.now = opts.now ?? Date.now;
  }

  get idleCount(): number {
    return this.idle.length;
  }

  get pendingDials(): number {
    return this.dialing;
  }

  start(): void {
    this.replenish();
  }

  /** Hands out a warm socket, or dials a fresh one when none is usable. */
  async checkout(): Promise<net.Socket> {
    if (this.closed) throw new LocalIOError(`pool for port ${this.port} is closed`);

    this.refillSuspended = false;
    const warm = this.takeWarm();
    this.replenish();
    if (warm) return warm;

    this.logger.debug({ port: this.port }, 'pool_fresh_dial');
    return await this.dial(this.host, this.port, this.dialTimeoutMs);
  }

  /** Used sockets never come back; discarding one makes room for a fresh dial. */
  discard(socket: net.Socket): void {
    destroyBestEffort(socket);
    this.replenish();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const entry of this.idle.splice(0)) destroyBestEffort(entry.socket);
  }

  private takeWarm(): net.Socket | null {
    const now = this.now();
    for (let entry = this.idle.shift(); entry; entry = this.idle.shift()) {
      entry.socket.removeListener('close', entry.evict);
      entry.socket.removeListener('error', entry.evict);
      entry.socket.removeListener('end', entry.evict);
      if (entry.socket.destroyed || now - entry.since > this.maxIdleMs) {
        destroyBestEffort(entry.socket);
        continue;
      }
      return entry.socket;
    }
    return null;
  }

  private replenish(): void {
    while (!this.closed && !this.refillSuspended && this.idle.length + this.dialing < this.size) {
      this.dialing += 1;
      void this.dialWarm();
    }
  }

  private async dialWarm(): Promise<void> {
    let socket: net.Socket;
    try {
      socket = await this.dial(this.host, this.port, this.dialTimeoutMs);
    } catch (err) {
      this.dialing -= 1;
      // Refilling resumes on the next checkout instead of hammering a failing service.
      this.refillSuspended = true;
      this.logger.warn({ port: this.port, err: formatOneLineError(err, 512) }, 'pool_replenish_failed');
      return;
    }
    this.dialing -= 1;

    if (this.closed) {
      destroyBestEffort(socket);
      return;
    }

    const entry: IdleSocket = {
      socket,
      since: this.now(),
      evict: () => {
        const index = this.idle.indexOf(entry);
        if (index >= 0) this.idle.splice(index, 1);
        destroyBestEffort(socket);
      },
    };
    socket.once('close', entry.evict);
    socket.once('error', entry.evict);
    socket.once('end', entry.evict);
    this.idle.push(entry);
  }
}

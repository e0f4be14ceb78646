import type { Duplex } from 'node:stream';

import { ProtocolError, ProtocolErrorCode, ResourceExhaustionError, TransportError } from './errors.js';
import { CONTROL_CONN_ID } from './protocol/frame.js';
import { destroyBestEffort } from './util/socketSafe.js';

const MAX_CONN_ID = 0xffffffff;

export type LogicalConnection = {
  readonly connId: number;
  readonly streamId: number;
  /** Target port on the client; public-facing registered port on the relay. */
  readonly port: number;
  readonly socket: Duplex;
  readonly stream: Duplex;
  bytesSent: number;
  bytesReceived: number;
  readonly createdAt: number;
  lastActivityAt: number;
};

export type LogicalConnectionInit = {
  streamId: number;
  port: number;
  socket: Duplex;
  stream: Duplex;
};

/**
 * Logical connections of one tunnel session, keyed by conn id. Each mutation runs to completion
 * on the event loop, so allocation never hands out the same id twice.
 */
export class ConnectionTable {
  private readonly entries = new Map<number, LogicalConnection>();
  private nextConnId: number;
  private closedReason: string | null = null;

  constructor(
    private readonly now: () => number = Date.now,
    firstConnId = CONTROL_CONN_ID + 1,
  ) {
    this.nextConnId = firstConnId;
  }

  get size(): number {
    return this.entries.size;
  }

  get closed(): boolean {
    return this.closedReason !== null;
  }

  /** Relay side: assigns the next conn id. Ids never repeat within a session. */
  allocate(init: LogicalConnectionInit): LogicalConnection {
    this.assertOpen();
    if (this.nextConnId > MAX_CONN_ID) {
      throw new ResourceExhaustionError('conn id space of this session is exhausted');
    }
    const connId = this.nextConnId;
    this.nextConnId += 1;
    return this.insert(connId, init);
  }

  /** Client side: records a conn id the relay assigned. */
  bind(connId: number, init: LogicalConnectionInit): LogicalConnection {
    this.assertOpen();
    if (!Number.isInteger(connId) || connId <= CONTROL_CONN_ID || connId > MAX_CONN_ID) {
      throw new ProtocolError(ProtocolErrorCode.UNEXPECTED_CONN_ID, `conn id ${connId} cannot carry data`);
    }
    if (this.entries.has(connId)) {
      throw new ProtocolError(ProtocolErrorCode.DUPLICATE_CONN_ID, `conn id ${connId} is already bound`);
    }
    return this.insert(connId, init);
  }

  /** An unknown id is normal: the frame raced with a local close and is dropped. */
  lookup(connId: number): LogicalConnection | undefined {
    return this.entries.get(connId);
  }

  remove(connId: number): boolean {
    return this.entries.delete(connId);
  }

  recordSent(connId: number, bytes: number): void {
    const entry = this.entries.get(connId);
    if (!entry) return;
    entry.bytesSent += bytes;
    entry.lastActivityAt = this.now();
  }

  recordReceived(connId: number, bytes: number): void {
    const entry = this.entries.get(connId);
    if (!entry) return;
    entry.bytesReceived += bytes;
    entry.lastActivityAt = this.now();
  }

  /**
   * Destroys every socket and stream and refuses further inserts. Safe to call repeatedly;
   * returns the number of connections closed by this call.
   */
  closeAll(reason: string): number {
    if (this.closedReason === null) this.closedReason = reason;
    const entries = [...this.entries.values()];
    this.entries.clear();
    for (const entry of entries) {
      destroyBestEffort(entry.socket);
      destroyBestEffort(entry.stream);
    }
    return entries.length;
  }

  private insert(connId: number, init: LogicalConnectionInit): LogicalConnection {
    const now = this.now();
    const entry: LogicalConnection = {
      connId,
      streamId: init.streamId,
      port: init.port,
      socket: init.socket,
      stream: init.stream,
      bytesSent: 0,
      bytesReceived: 0,
      createdAt: now,
      lastActivityAt: now,
    };
    this.entries.set(connId, entry);
    return entry;
  }

  private assertOpen(): void {
    if (this.closedReason !== null) {
      throw new TransportError(`session closed (${this.closedReason})`);
    }
  }
}

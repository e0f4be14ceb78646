import type net from 'node:net';

import { ExponentialBackoff } from '../backoff.js';
import type { ConnectionPool } from '../connectionPool.js';
import { ConnectionTable } from '../connectionTable.js';
import { startForwarder } from '../forwarder.js';
import type { Logger } from '../logger.js';
import { ControlChannel, type ControlMessage } from '../protocol/control.js';
import type { TransportConnection, TransportStream } from '../transport/types.js';
import { destroyBestEffort } from '../util/socketSafe.js';
import { formatOneLineError } from '../util/text.js';
import { unrefBestEffort } from '../util/unrefSafe.js';

export type ClientSessionOptions = {
  connection: TransportConnection;
  logger: Logger;
  /** Pool of the local service behind a tunneled port, if that port is still tunneled. */
  poolFor: (port: number) => ConnectionPool | undefined;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  /** How long a stream or CONNECT waits for its partner before it is dropped. */
  ackTimeoutMs: number;
  maxFramePayloadBytes: number;
  /** REGISTER attempts per port before the port is given up. */
  registerAttempts: number;
  registerRetryBaseMs: number;
  registerRetryMaxMs: number;
  /** The relay never opened a listener for `port`, after every attempt. */
  onRegisterFailed?: (port: number) => void;
  now?: () => number;
};

type PendingRegistration = {
  attempts: number;
  awaitingReply: boolean;
  timer: NodeJS.Timeout | null;
  backoff: ExponentialBackoff;
};

type ConnectRequest = Extract<ControlMessage, { type: 'connect' }>;

type PendingHalf =
  | { kind: 'stream'; stream: TransportStream; timer: NodeJS.Timeout }
  | { kind: 'connect'; request: ConnectRequest; timer: NodeJS.Timeout };

/**
 * Client end of one tunnel connection: the control stream, heartbeats, and the logical
 * connections the relay opens. Everything it owns dies with the connection.
 */
export class ClientSession {
  readonly table: ConnectionTable;
  readonly closed: Promise<string>;
  private readonly connection: TransportConnection;
  private readonly control: ControlChannel;
  private readonly logger: Logger;
  private readonly opts: ClientSessionOptions;
  private readonly now: () => number;
  private readonly pending = new Map<number, PendingHalf>();
  private readonly registrations = new Map<number, PendingRegistration>();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private lastHeartbeatReplyAt: number;
  private closeReason: string | null = null;
  private resolveClosed: (reason: string) => void = () => {};

  constructor(opts: ClientSessionOptions) {
    this.opts = opts;
    this.connection = opts.connection;
    this.logger = opts.logger;
    this.now = opts.now ?? Date.now;
    this.table = new ConnectionTable(this.now);
    this.lastHeartbeatReplyAt = this.now();
    this.closed = new Promise<string>((resolve) => {
      this.resolveClosed = resolve;
    });

    this.control = new ControlChannel(this.connection.openStream(), opts.maxFramePayloadBytes);
    this.control.onMessage((msg) => this.handleControl(msg));
    this.control.onError((err) => {
      this.logger.error({ err: formatOneLineError(err, 512) }, 'control_channel_failed');
      this.close('control_error');
    });

    this.connection.onStream((stream) => this.handleStream(stream));
    this.connection.onClose((err) => {
      this.close(err ? 'transport_lost' : 'transport_closed');
    });
  }

  get isClosed(): boolean {
    return this.closeReason !== null;
  }

  /** Registers the currently tunneled ports and starts heartbeats. */
  start(tunneledPorts: readonly number[]): void {
    for (const port of tunneledPorts) this.register(port);

    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.opts.heartbeatIntervalMs);
    unrefBestEffort(this.heartbeatTimer);
  }

  /** Sends REGISTER and keeps retrying until the relay confirms a public listener. */
  register(port: number): boolean {
    this.cancelRegistration(port);
    const registration: PendingRegistration = {
      attempts: 0,
      awaitingReply: false,
      timer: null,
      backoff: new ExponentialBackoff({
        baseMs: this.opts.registerRetryBaseMs,
        maxMs: this.opts.registerRetryMaxMs,
      }),
    };
    this.registrations.set(port, registration);
    return this.sendRegister(port, registration);
  }

  /** Ports whose REGISTER has not been confirmed yet. */
  pendingRegistrations(): number[] {
    return [...this.registrations.keys()].sort((a, b) => a - b);
  }

  deregister(port: number): boolean {
    this.cancelRegistration(port);
    const sent = this.control.send({ type: 'deregister', port });
    if (sent) this.logger.info({ port }, 'deregister_sent');
    return sent;
  }

  close(reason: string): void {
    if (this.closeReason !== null) return;
    this.closeReason = reason;

    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;

    for (const half of this.pending.values()) {
      clearTimeout(half.timer);
      if (half.kind === 'stream') destroyBestEffort(half.stream);
    }
    this.pending.clear();
    for (const registration of this.registrations.values()) {
      if (registration.timer) clearTimeout(registration.timer);
    }
    this.registrations.clear();

    const dropped = this.table.closeAll(reason);
    this.control.close();
    this.connection.close(reason);
    this.logger.info({ reason, droppedConnections: dropped }, 'session_closed');
    this.resolveClosed(reason);
  }

  private heartbeat(): void {
    if (this.closeReason !== null) return;
    const silentForMs = this.now() - this.lastHeartbeatReplyAt;
    if (silentForMs > this.opts.heartbeatTimeoutMs) {
      this.logger.warn({ silentForMs }, 'heartbeat_timeout');
      this.close('heartbeat_timeout');
      return;
    }
    this.control.send({ type: 'heartbeat' });
  }

  private handleControl(msg: ControlMessage): void {
    switch (msg.type) {
      case 'heartbeat':
        this.lastHeartbeatReplyAt = this.now();
        return;
      case 'registered':
        this.handleRegistered(msg.port, msg.publicPort);
        return;
      case 'connect':
        this.handleConnect(msg);
        return;
      default:
        this.logger.error({ type: msg.type }, 'unexpected_control_message');
        this.close('control_error');
    }
  }

  private sendRegister(port: number, registration: PendingRegistration): boolean {
    registration.attempts += 1;
    if (!this.control.send({ type: 'register', port })) return false;
    registration.awaitingReply = true;
    this.logger.info({ port, attempt: registration.attempts }, 'register_sent');
    registration.timer = setTimeout(() => this.registrationFailed(port, registration, 'timeout'), this.opts.ackTimeoutMs);
    unrefBestEffort(registration.timer);
    return true;
  }

  private handleRegistered(port: number, publicPort: number): void {
    const registration = this.registrations.get(port);
    if (publicPort === 0) {
      this.logger.warn({ port }, 'relay_register_failed');
      // A refusal that arrives after its attempt timed out was already counted.
      if (registration?.awaitingReply) this.registrationFailed(port, registration, 'refused');
      return;
    }
    if (registration) this.cancelRegistration(port);
    this.logger.info({ port, publicPort }, 'port_registered');
  }

  private registrationFailed(port: number, registration: PendingRegistration, reason: string): void {
    if (this.registrations.get(port) !== registration) return;
    if (registration.timer) clearTimeout(registration.timer);
    registration.timer = null;
    registration.awaitingReply = false;

    if (registration.attempts >= this.opts.registerAttempts) {
      this.registrations.delete(port);
      this.logger.warn({ port, attempts: registration.attempts, reason }, 'register_abandoned');
      this.opts.onRegisterFailed?.(port);
      return;
    }

    const delayMs = registration.backoff.next();
    this.logger.warn({ port, attempt: registration.attempts, reason, delayMs }, 'register_retry_scheduled');
    registration.timer = setTimeout(() => {
      registration.timer = null;
      if (this.registrations.get(port) === registration) this.sendRegister(port, registration);
    }, delayMs);
    unrefBestEffort(registration.timer);
  }

  private cancelRegistration(port: number): void {
    const registration = this.registrations.get(port);
    if (!registration) return;
    if (registration.timer) clearTimeout(registration.timer);
    this.registrations.delete(port);
  }

  // A relay-opened stream and its CONNECT travel independently; whichever arrives first waits.
  private handleStream(stream: TransportStream): void {
    if (this.closeReason !== null) {
      destroyBestEffort(stream);
      return;
    }

    const waiting = this.pending.get(stream.id);
    if (waiting?.kind === 'connect') {
      clearTimeout(waiting.timer);
      this.pending.delete(stream.id);
      void this.accept(waiting.request, stream);
      return;
    }

    const timer = setTimeout(() => {
      this.pending.delete(stream.id);
      this.logger.warn({ streamId: stream.id }, 'stream_without_connect_dropped');
      destroyBestEffort(stream);
    }, this.opts.ackTimeoutMs);
    unrefBestEffort(timer);
    stream.once('close', () => {
      const half = this.pending.get(stream.id);
      if (half?.kind === 'stream' && half.stream === stream) {
        clearTimeout(half.timer);
        this.pending.delete(stream.id);
      }
    });
    this.pending.set(stream.id, { kind: 'stream', stream, timer });
  }

  private handleConnect(request: ConnectRequest): void {
    const waiting = this.pending.get(request.streamId);
    if (waiting?.kind === 'stream') {
      clearTimeout(waiting.timer);
      this.pending.delete(request.streamId);
      void this.accept(request, waiting.stream);
      return;
    }

    const timer = setTimeout(() => {
      this.pending.delete(request.streamId);
      this.logger.warn({ connId: request.connId, streamId: request.streamId }, 'connect_without_stream_dropped');
    }, this.opts.ackTimeoutMs);
    unrefBestEffort(timer);
    this.pending.set(request.streamId, { kind: 'connect', request, timer });
  }

  private async accept(request: ConnectRequest, stream: TransportStream): Promise<void> {
    const { connId, port } = request;
    const pool = this.opts.poolFor(port);
    if (!pool) {
      this.logger.warn({ connId, port }, 'connect_for_untunneled_port');
      destroyBestEffort(stream);
      return;
    }

    let socket: net.Socket;
    try {
      socket = await pool.checkout();
    } catch (err) {
      // The relay sees the reset instead of an ACK and drops the public connection.
      this.logger.warn({ connId, port, err: formatOneLineError(err, 512) }, 'local_dial_failed');
      destroyBestEffort(stream);
      return;
    }

    if (this.closeReason !== null || stream.destroyed) {
      pool.discard(socket);
      return;
    }

    try {
      this.table.bind(connId, { streamId: stream.id, port, socket, stream });
    } catch (err) {
      this.logger.warn({ connId, port, err: formatOneLineError(err, 512) }, 'connect_rejected');
      pool.discard(socket);
      destroyBestEffort(stream);
      return;
    }

    this.control.send({ type: 'ack', ref: connId });
    this.logger.debug({ connId, port, streamId: stream.id }, 'logical_connection_opened');
    startForwarder({
      connId,
      local: socket,
      stream,
      table: this.table,
      logger: this.logger,
      maxFramePayloadBytes: this.opts.maxFramePayloadBytes,
    });
  }
}

import net from 'node:net';

import { ConnectionTable } from '../connectionTable.js';
import { startForwarder, type ForwardSummary } from '../forwarder.js';
import type { Logger } from '../logger.js';
import type { RelayMetrics } from '../metrics.js';
import { ControlChannel, type ControlMessage } from '../protocol/control.js';
import { MAX_PORT, MIN_PORT } from '../portScanner.js';
import type { TransportConnection, TransportStream } from '../transport/types.js';
import { destroyBestEffort } from '../util/socketSafe.js';
import { formatOneLineError } from '../util/text.js';
import { unrefBestEffort } from '../util/unrefSafe.js';

export type RelaySessionOptions = {
  connection: TransportConnection;
  logger: Logger;
  publicHost: string;
  publicPortOffset: number;
  ackTimeoutMs: number;
  heartbeatTimeoutMs: number;
  maxFramePayloadBytes: number;
  metrics?: RelayMetrics;
  /** Maps a registered port to the public port to bind (0 = any free port); null refuses it. */
  publicPortFor?: (port: number) => number | null;
  now?: () => number;
};

type PublicListener = {
  port: number;
  server: net.Server;
  /** Null until the bind completes. */
  publicPort: number | null;
};

type PendingAck = {
  start: () => void;
  fail: (reason: string) => void;
};

/**
 * Relay end of one client connection. Owns the public listeners of the ports this client
 * registered and every logical connection accepted on them.
 */
export class RelaySession {
  readonly table: ConnectionTable;
  readonly closed: Promise<string>;
  readonly remoteAddress: string | null;
  private readonly connection: TransportConnection;
  private readonly logger: Logger;
  private readonly opts: RelaySessionOptions;
  private readonly listeners = new Map<number, PublicListener>();
  private readonly pendingAcks = new Map<number, PendingAck>();
  private control: ControlChannel | null = null;
  private idleTimer: NodeJS.Timeout;
  private closeReason: string | null = null;
  private resolveClosed: (reason: string) => void = () => {};

  constructor(opts: RelaySessionOptions) {
    this.opts = opts;
    this.connection = opts.connection;
    this.remoteAddress = opts.connection.remoteAddress;
    this.logger = opts.logger;
    this.table = new ConnectionTable(opts.now ?? Date.now);
    this.closed = new Promise<string>((resolve) => {
      this.resolveClosed = resolve;
    });

    this.idleTimer = setTimeout(() => {
      this.logger.warn({ remoteAddress: this.remoteAddress }, 'heartbeat_timeout');
      this.close('heartbeat_timeout');
    }, opts.heartbeatTimeoutMs);
    unrefBestEffort(this.idleTimer);

    this.connection.onStream((stream) => this.handleClientStream(stream));
    this.connection.onClose((err) => {
      this.close(err ? 'transport_lost' : 'transport_closed');
    });
  }

  get isClosed(): boolean {
    return this.closeReason !== null;
  }

  /** Registered port to bound public port, for ports whose listener is up. */
  publicPorts(): Map<number, number> {
    const out = new Map<number, number>();
    for (const listener of this.listeners.values()) {
      if (listener.publicPort !== null) out.set(listener.port, listener.publicPort);
    }
    return out;
  }

  close(reason: string): void {
    if (this.closeReason !== null) return;
    this.closeReason = reason;
    clearTimeout(this.idleTimer);

    for (const pending of [...this.pendingAcks.values()]) pending.fail(reason);
    for (const port of [...this.listeners.keys()]) this.closeListener(port);

    const dropped = this.table.closeAll(reason);
    this.control?.close();
    this.connection.close(reason);
    this.logger.info({ reason, remoteAddress: this.remoteAddress, droppedConnections: dropped }, 'session_closed');
    this.resolveClosed(reason);
  }

  private handleClientStream(stream: TransportStream): void {
    if (this.closeReason !== null) {
      destroyBestEffort(stream);
      return;
    }
    if (this.control) {
      this.logger.warn({ streamId: stream.id }, 'unexpected_client_stream_reset');
      destroyBestEffort(stream);
      return;
    }

    const control = new ControlChannel(stream, this.opts.maxFramePayloadBytes);
    this.control = control;
    control.onMessage((msg) => this.handleControl(msg));
    control.onError((err) => {
      this.opts.metrics?.protocolErrorsTotal.inc();
      this.logger.error({ err: formatOneLineError(err, 512) }, 'control_channel_failed');
      this.close('control_error');
    });
  }

  private handleControl(msg: ControlMessage): void {
    this.idleTimer.refresh();
    switch (msg.type) {
      case 'register':
        this.handleRegister(msg.port);
        return;
      case 'deregister':
        if (this.closeListener(msg.port)) this.logger.info({ port: msg.port }, 'port_deregistered');
        return;
      case 'heartbeat':
        this.control?.send({ type: 'heartbeat' });
        return;
      case 'ack':
        this.handleAck(msg.ref);
        return;
      default:
        this.opts.metrics?.protocolErrorsTotal.inc();
        this.logger.error({ type: msg.type }, 'unexpected_control_message');
        this.close('control_error');
    }
  }

  private resolvePublicPort(port: number): number | null {
    if (this.opts.publicPortFor) return this.opts.publicPortFor(port);
    const publicPort = port + this.opts.publicPortOffset;
    return publicPort >= MIN_PORT && publicPort <= MAX_PORT ? publicPort : null;
  }

  private handleRegister(port: number): void {
    const existing = this.listeners.get(port);
    if (existing) {
      // A bind in progress answers when it completes.
      if (existing.publicPort !== null) {
        this.control?.send({ type: 'registered', port, publicPort: existing.publicPort });
      }
      return;
    }

    const publicPort = this.resolvePublicPort(port);
    if (publicPort === null || !Number.isInteger(publicPort) || publicPort < 0 || publicPort > MAX_PORT) {
      this.logger.warn({ port, publicPort }, 'public_port_out_of_range');
      this.control?.send({ type: 'registered', port, publicPort: 0 });
      return;
    }

    const server = net.createServer({ allowHalfOpen: true, pauseOnConnect: true });
    const listener: PublicListener = { port, server, publicPort: null };
    this.listeners.set(port, listener);

    const onBindError = (err: Error) => {
      if (this.listeners.get(port) === listener) this.listeners.delete(port);
      this.logger.warn({ port, publicPort, err: formatOneLineError(err, 512) }, 'public_bind_failed');
      this.control?.send({ type: 'registered', port, publicPort: 0 });
    };
    server.once('error', onBindError);
    server.on('connection', (socket: net.Socket) => this.handlePublicConnection(port, socket));

    server.listen({ host: this.opts.publicHost, port: publicPort }, () => {
      server.removeListener('error', onBindError);
      server.on('error', (err: Error) => {
        this.logger.warn({ port, err: formatOneLineError(err, 512) }, 'public_listener_error');
      });
      if (this.listeners.get(port) !== listener) {
        // Deregistered or closed while binding.
        server.close();
        return;
      }

      const address = server.address();
      listener.publicPort = typeof address === 'object' && address !== null ? address.port : publicPort;
      this.opts.metrics?.registeredPorts.inc();
      this.logger.info({ port, publicPort: listener.publicPort }, 'port_registered');
      this.control?.send({ type: 'registered', port, publicPort: listener.publicPort });
    });
  }

  private closeListener(port: number): boolean {
    const listener = this.listeners.get(port);
    if (!listener) return false;
    this.listeners.delete(port);
    // Connections already accepted keep running; only new ones are refused.
    if (listener.publicPort !== null) {
      listener.server.close();
      this.opts.metrics?.registeredPorts.dec();
    }
    return true;
  }

  private handlePublicConnection(port: number, socket: net.Socket): void {
    const onEarlyError = (err: Error) => {
      this.logger.debug({ port, err: formatOneLineError(err, 512) }, 'public_socket_error');
    };
    socket.on('error', onEarlyError);

    const control = this.control;
    if (this.closeReason !== null || !control) {
      destroyBestEffort(socket);
      return;
    }

    let stream: TransportStream;
    try {
      stream = this.connection.openStream();
    } catch (err) {
      this.logger.warn({ port, err: formatOneLineError(err, 512) }, 'open_stream_failed');
      destroyBestEffort(socket);
      return;
    }

    let connId: number;
    try {
      connId = this.table.allocate({ streamId: stream.id, port, socket, stream }).connId;
    } catch (err) {
      this.logger.error({ port, err: formatOneLineError(err, 512) }, 'conn_id_allocation_failed');
      destroyBestEffort(socket);
      destroyBestEffort(stream);
      return;
    }
    this.opts.metrics?.logicalConnectionsTotal.inc();

    const cleanup = () => {
      clearTimeout(timer);
      this.pendingAcks.delete(connId);
      stream.removeListener('close', onEarlyClose);
      socket.removeListener('close', onEarlyClose);
    };
    const fail = (reason: string) => {
      cleanup();
      this.table.remove(connId);
      destroyBestEffort(socket);
      destroyBestEffort(stream);
      this.logger.warn({ connId, port, reason }, 'connect_failed');
    };
    const onEarlyClose = () => fail(stream.destroyed ? 'connect_refused' : 'public_closed');
    const timer = setTimeout(() => fail('ack_timeout'), this.opts.ackTimeoutMs);
    unrefBestEffort(timer);
    stream.once('close', onEarlyClose);
    socket.once('close', onEarlyClose);

    this.pendingAcks.set(connId, {
      fail,
      start: () => {
        cleanup();
        socket.removeListener('error', onEarlyError);
        this.opts.metrics?.logicalConnectionsActive.inc();
        this.logger.debug({ connId, port, streamId: stream.id }, 'logical_connection_opened');
        startForwarder({
          connId,
          local: socket,
          stream,
          table: this.table,
          logger: this.logger,
          maxFramePayloadBytes: this.opts.maxFramePayloadBytes,
          onClosed: (summary) => this.recordForwardSummary(summary),
        });
      },
    });

    if (!control.send({ type: 'connect', connId, streamId: stream.id, port })) {
      fail('control_unavailable');
    }
  }

  private handleAck(ref: number): void {
    const pending = this.pendingAcks.get(ref);
    if (!pending) {
      // The wait already timed out or the public side went away.
      this.logger.debug({ ref }, 'late_ack_dropped');
      return;
    }
    pending.start();
  }

  private recordForwardSummary(summary: ForwardSummary): void {
    const metrics = this.opts.metrics;
    if (!metrics) return;
    metrics.logicalConnectionsActive.dec();
    metrics.bytesTotal.inc({ direction: 'to_client' }, summary.bytesSent);
    metrics.bytesTotal.inc({ direction: 'to_public' }, summary.bytesReceived);
    if (summary.reason === 'protocol_error') metrics.protocolErrorsTotal.inc();
  }
}

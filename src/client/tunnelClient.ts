import fs from 'node:fs';

import { ExponentialBackoff } from '../backoff.js';
import type { ClientConfig } from '../config.js';
import { ConnectionPool, type DialFn } from '../connectionPool.js';
import { AuthenticationError } from '../errors.js';
import type { Logger } from '../logger.js';
import { PortLifecycleManager } from '../portLifecycle.js';
import { ScanPlanner, scanPorts, type ProbeFn } from '../portScanner.js';
import { connectWsTransport } from '../transport/wsStreamTransport.js';
import type { TransportConnector, TransportTlsOptions } from '../transport/types.js';
import { formatOneLineError } from '../util/text.js';
import { unrefBestEffort } from '../util/unrefSafe.js';
import { ClientSession } from './clientSession.js';

export type TunnelClientOptions = {
  config: ClientConfig;
  logger: Logger;
  connector?: TransportConnector;
  probe?: ProbeFn;
  dial?: DialFn;
  now?: () => number;
};

export type TunnelClientStatus = Readonly<{
  connected: boolean;
  tunneledPorts: number[];
  activeConnections: number;
  reconnectAttempts: number;
}>;

/**
 * Long-running client agent: scans for local listeners, keeps one tunnel session to the relay
 * alive, and re-registers tunneled ports after every reconnect.
 */
export class TunnelClient {
  private readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly connector: TransportConnector;
  private readonly probe: ProbeFn | undefined;
  private readonly dial: DialFn | undefined;
  private readonly now: () => number;
  private readonly lifecycle: PortLifecycleManager;
  private readonly planner: ScanPlanner;
  private readonly backoff: ExponentialBackoff;
  private readonly pools = new Map<number, ConnectionPool>();
  private readonly tls: TransportTlsOptions | null;
  private session: ClientSession | null = null;
  private resumptionToken: Buffer | null = null;
  private scanTimer: NodeJS.Timeout | null = null;
  private wakeReconnect: (() => void) | null = null;
  private stopped = false;
  private started = false;
  private runPromise: Promise<void> | null = null;

  constructor(opts: TunnelClientOptions) {
    this.config = opts.config;
    this.logger = opts.logger;
    this.connector = opts.connector ?? connectWsTransport;
    this.probe = opts.probe;
    this.dial = opts.dial;
    this.now = opts.now ?? Date.now;

    const config = this.config;
    this.tls = config.RELAY_TLS
      ? {
          rejectUnauthorized: config.TLS_REJECT_UNAUTHORIZED,
          ...(config.TLS_CA_PATH ? { ca: fs.readFileSync(config.TLS_CA_PATH) } : {}),
          ...(config.TLS_SERVERNAME ? { servername: config.TLS_SERVERNAME } : {}),
        }
      : null;

    this.lifecycle = new PortLifecycleManager({
      stableTimeMs: config.STABLE_TIME_MS,
      graceMs: config.GRACE_MS,
      logger: this.logger,
      onRegister: (port) => this.onPortTunneled(port),
      onDeregister: (port) => this.onPortUntunneled(port),
    });
    this.planner = new ScanPlanner({
      ports: config.PORTS,
      excludePorts: config.EXCLUDE_PORTS,
      lazy: config.LAZY_SCAN,
      lazyBatchSize: config.LAZY_BATCH_SIZE,
      fullScanIntervalMs: config.FULL_SCAN_INTERVAL_MS,
    });
    this.backoff = new ExponentialBackoff({
      baseMs: config.RECONNECT_BASE_MS,
      maxMs: config.RECONNECT_MAX_MS,
    });
  }

  /**
   * Starts scanning and connecting. Resolves after `stop()`; rejects when the relay refuses
   * the client permanently.
   */
  run(): Promise<void> {
    if (this.runPromise) return this.runPromise;
    this.started = true;
    this.scheduleScan(0);
    this.runPromise = this.connectLoop();
    return this.runPromise;
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.scanTimer) clearTimeout(this.scanTimer);
    this.scanTimer = null;
    this.session?.close('client_stopped');
    this.session = null;
    this.wakeReconnect?.();
    for (const pool of this.pools.values()) pool.close();
    this.pools.clear();
    if (this.started) this.logger.info('client_stopped');
  }

  status(): TunnelClientStatus {
    const session = this.session;
    return {
      connected: session !== null && !session.isClosed,
      tunneledPorts: this.lifecycle.tunneledPorts(),
      activeConnections: session?.table.size ?? 0,
      reconnectAttempts: this.backoff.attempts,
    };
  }

  /** Runs one scan cycle immediately. */
  async scanOnce(): Promise<void> {
    const plan = this.planner.next(this.now());
    const open = await scanPorts(this.config.TARGET_HOST, plan.ports, {
      workers: this.config.WORKERS,
      timeoutMs: this.config.PROBE_TIMEOUT_MS,
      probe: this.probe,
    });
    if (this.stopped) return;
    this.lifecycle.observe(open, plan.covers, this.now());
    this.logger.info(
      { plan: plan.kind, probed: plan.ports.length, open: open.length, ...this.status() },
      'scan_completed',
    );
  }

  private scheduleScan(delayMs: number): void {
    if (this.stopped) return;
    this.scanTimer = setTimeout(() => {
      this.scanTimer = null;
      this.scanOnce().then(
        () => this.scheduleScan(this.config.SCAN_INTERVAL_MS),
        (err: unknown) => {
          this.logger.error({ err: formatOneLineError(err, 512) }, 'scan_failed');
          this.scheduleScan(this.config.SCAN_INTERVAL_MS);
        },
      );
    }, delayMs);
  }

  private onPortTunneled(port: number): void {
    if (!this.pools.has(port)) {
      const pool = new ConnectionPool({
        host: this.config.TARGET_HOST,
        port,
        size: this.config.POOL_SIZE,
        dialTimeoutMs: this.config.DIAL_TIMEOUT_MS,
        maxIdleMs: this.config.POOL_MAX_IDLE_MS,
        logger: this.logger,
        dial: this.dial,
        now: this.now,
      });
      this.pools.set(port, pool);
      pool.start();
    }
    this.session?.register(port);
  }

  private onPortUntunneled(port: number): void {
    this.session?.deregister(port);
    this.pools.get(port)?.close();
    this.pools.delete(port);
  }

  // The next scan sees the port as new and offers it to the relay again.
  private onRegisterFailed(port: number): void {
    this.lifecycle.forget(port);
    this.pools.get(port)?.close();
    this.pools.delete(port);
  }

  private async connectLoop(): Promise<void> {
    while (!this.stopped) {
      let session: ClientSession;
      try {
        session = await this.connectOnce();
      } catch (err) {
        if (err instanceof AuthenticationError) {
          this.logger.fatal({ err: formatOneLineError(err, 512) }, 'relay_authentication_failed');
          this.stop();
          throw err;
        }
        if (this.stopped) return;
        const delayMs = this.backoff.next();
        this.logger.warn(
          { err: formatOneLineError(err, 512), attempt: this.backoff.attempts, delayMs },
          'session_reconnect_scheduled',
        );
        await this.sleep(delayMs);
        continue;
      }

      await session.closed;
      this.session = null;
      if (this.stopped) return;
      // One immediate retry after a working session drops, then the backoff takes over.
      await this.sleep(this.backoff.next());
    }
  }

  private async connectOnce(): Promise<ClientSession> {
    const transport = await this.connector({
      host: this.config.RELAY_HOST,
      port: this.config.RELAY_PORT,
      tls: this.tls,
      resumptionToken: this.resumptionToken,
      handshakeTimeoutMs: this.config.HANDSHAKE_TIMEOUT_MS,
      maxFramePayloadBytes: this.config.MAX_FRAME_PAYLOAD_BYTES,
    });
    if (this.stopped) {
      transport.connection.close('client_stopped');
      throw new Error('client stopped during handshake');
    }

    this.backoff.reset();
    const session = new ClientSession({
      connection: transport.connection,
      logger: this.logger,
      poolFor: (port) => this.pools.get(port),
      heartbeatIntervalMs: this.config.HEARTBEAT_INTERVAL_MS,
      heartbeatTimeoutMs: this.config.HEARTBEAT_TIMEOUT_MS,
      ackTimeoutMs: this.config.ACK_TIMEOUT_MS,
      maxFramePayloadBytes: this.config.MAX_FRAME_PAYLOAD_BYTES,
      registerAttempts: this.config.REGISTER_ATTEMPTS,
      registerRetryBaseMs: this.config.RECONNECT_BASE_MS,
      registerRetryMaxMs: this.config.RECONNECT_MAX_MS,
      onRegisterFailed: (port) => this.onRegisterFailed(port),
      now: this.now,
    });
    this.session = session;
    transport.connection.onClose(() => {
      // Keep the newest ticket for the next handshake.
      this.resumptionToken = transport.resumptionToken ?? this.resumptionToken;
    });

    const ports = this.lifecycle.tunneledPorts();
    this.logger.info(
      {
        relay: `${this.config.RELAY_HOST}:${this.config.RELAY_PORT}`,
        resumed: transport.resumed,
        reregisteredPorts: ports,
      },
      'session_established',
    );
    session.start(ports);
    return session;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wakeReconnect = null;
        resolve();
      }, ms);
      unrefBestEffort(timer);
      this.wakeReconnect = () => {
        clearTimeout(timer);
        this.wakeReconnect = null;
        resolve();
      };
    });
  }
}

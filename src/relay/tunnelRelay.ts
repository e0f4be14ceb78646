import type { Logger } from '../logger.js';
import type { RelayMetrics } from '../metrics.js';
import type { TransportConnection } from '../transport/types.js';
import { RelaySession } from './relaySession.js';

export type TunnelRelayOptions = {
  logger: Logger;
  publicHost: string;
  publicPortOffset: number;
  ackTimeoutMs: number;
  heartbeatTimeoutMs: number;
  maxFramePayloadBytes: number;
  metrics?: RelayMetrics;
  publicPortFor?: (port: number) => number | null;
};

/**
 * Serves a single trusted client. A new tunnel connection supersedes the current session, so a
 * client that lost its link can come back before the old session notices.
 */
export class TunnelRelay {
  private session: RelaySession | null = null;
  private closed = false;

  constructor(private readonly opts: TunnelRelayOptions) {}

  get activeSession(): RelaySession | null {
    return this.session;
  }

  accept(connection: TransportConnection, remoteAddress: string | null): RelaySession | null {
    if (this.closed) {
      connection.close('relay_shutting_down');
      return null;
    }

    const previous = this.session;
    if (previous) {
      this.opts.logger.info(
        { previous: previous.remoteAddress, next: remoteAddress },
        'session_superseded',
      );
      previous.close('session_superseded');
    }

    const { metrics } = this.opts;
    const session = new RelaySession({
      connection,
      logger: this.opts.logger,
      publicHost: this.opts.publicHost,
      publicPortOffset: this.opts.publicPortOffset,
      ackTimeoutMs: this.opts.ackTimeoutMs,
      heartbeatTimeoutMs: this.opts.heartbeatTimeoutMs,
      maxFramePayloadBytes: this.opts.maxFramePayloadBytes,
      metrics,
      publicPortFor: this.opts.publicPortFor,
    });
    this.session = session;
    metrics?.sessionsActive.inc();
    this.opts.logger.info({ remoteAddress }, 'session_accepted');

    void session.closed.then(() => {
      metrics?.sessionsActive.dec();
      if (this.session === session) this.session = null;
    });
    return session;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.session?.close('relay_shutting_down');
    this.session = null;
  }
}

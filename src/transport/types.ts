import type { Duplex } from 'node:stream';

/**
 * One bidirectional stream of a multiplexed connection. `end()` half-closes the local sending
 * side; `destroy()` resets the stream in both directions.
 */
export interface TransportStream extends Duplex {
  readonly id: number;
}

export interface TransportConnection {
  readonly closed: boolean;
  readonly remoteAddress: string | null;
  openStream(): TransportStream;
  /** Streams opened by the peer. */
  onStream(listener: (stream: TransportStream) => void): void;
  /** Called once, with the error that ended the connection or null after a local `close()`. */
  onClose(listener: (err: Error | null) => void): void;
  close(reason?: string): void;
}

export interface TransportTlsOptions {
  /** Extra trusted CA certificates (PEM). */
  ca?: Buffer;
  servername?: string;
  rejectUnauthorized: boolean;
}

export interface TransportConnectOptions {
  host: string;
  port: number;
  /** null selects a plaintext connection. */
  tls: TransportTlsOptions | null;
  /** Opaque state cached from an earlier session; invalid tokens fall back to a full handshake. */
  resumptionToken: Buffer | null;
  handshakeTimeoutMs: number;
  maxFramePayloadBytes: number;
}

export interface TransportSession {
  connection: TransportConnection;
  /** Latest resumption state offered by the server, if any. */
  readonly resumptionToken: Buffer | null;
  /** True when the handshake reused cached session state. */
  readonly resumed: boolean;
}

/** Rejects with `TransportError`, or `AuthenticationError` when retrying cannot succeed. */
export type TransportConnector = (options: TransportConnectOptions) => Promise<TransportSession>;

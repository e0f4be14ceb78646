export const ProtocolErrorCode = {
  FRAME_TOO_LARGE: 'FRAME_TOO_LARGE',
  FRAME_TRUNCATED: 'FRAME_TRUNCATED',
  UNEXPECTED_CONN_ID: 'UNEXPECTED_CONN_ID',
  DUPLICATE_CONN_ID: 'DUPLICATE_CONN_ID',
  CONTROL_MALFORMED: 'CONTROL_MALFORMED',
  CONTROL_UNEXPECTED: 'CONTROL_UNEXPECTED',
  CONTROL_STREAM_ENDED: 'CONTROL_STREAM_ENDED',
  STREAM_VIOLATION: 'STREAM_VIOLATION',
} as const;
export type ProtocolErrorCode = (typeof ProtocolErrorCode)[keyof typeof ProtocolErrorCode];

/** Malformed frame or control message. */
export class ProtocolError extends Error {
  override name = 'ProtocolError';
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

/** Handshake failure or loss of the tunnel connection; the client retries with backoff. */
export class TransportError extends Error {
  override name = 'TransportError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A transport failure that retrying cannot fix (rejected credentials or an untrusted peer). */
export class AuthenticationError extends TransportError {
  override name = 'AuthenticationError';
}

export class LocalIOError extends Error {
  override name = 'LocalIOError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ResourceExhaustionError extends Error {
  override name = 'ResourceExhaustionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

const RESOURCE_EXHAUSTION_CODES = new Set(['EMFILE', 'ENFILE', 'EADDRNOTAVAIL', 'ENOBUFS', 'ENOMEM']);

/** The string `code` of a Node system or TLS error. */
export function errorCodeOf(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/** Out of sockets, ports or memory: the local host, not the remote service, is the problem. */
export function isResourceExhaustion(err: unknown): boolean {
  const code = errorCodeOf(err);
  return code !== undefined && RESOURCE_EXHAUSTION_CODES.has(code);
}

import { Duplex } from 'node:stream';
import type tls from 'node:tls';
import { TLSSocket } from 'node:tls';
import WebSocket from 'ws';

import { AuthenticationError, TransportError, errorCodeOf } from '../errors.js';
import {
  STREAM_MUX_HEADER_BYTES,
  STREAM_MUX_SUBPROTOCOL,
  StreamMuxCloseFlags,
  StreamMuxFrameParser,
  StreamMuxMsgType,
  decodeStreamMuxClosePayload,
  decodeStreamMuxWindowPayload,
  encodeStreamMuxClosePayload,
  encodeStreamMuxFrame,
  encodeStreamMuxWindowPayload,
  type StreamMuxFrame,
} from '../protocol/streamMux.js';
import { formatOneLineError, formatOneLineUtf8 } from '../util/text.js';
import { unrefBestEffort } from '../util/unrefSafe.js';
import type {
  TransportConnection,
  TransportConnectOptions,
  TransportSession,
  TransportStream,
} from './types.js';

export const TUNNEL_PATH = '/tunnel';

const DATA_PIECE_BYTES = 64 * 1024;
const MAX_MUX_PAYLOAD_BYTES = 16 * 1024 * 1024;
// Per-stream flow control: a sender may have at most this many unconsumed bytes in flight on
// one stream. The receiver returns window once half of it has been read.
const STREAM_WINDOW_BYTES = 1024 * 1024;
const WINDOW_UPDATE_THRESHOLD_BYTES = STREAM_WINDOW_BYTES / 2;
const CLOSE_HANDSHAKE_TIMEOUT_MS = 1_000;

// Certificate verification failures; reconnecting cannot fix these.
const TLS_AUTH_ERROR_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_UNTRUSTED',
  'CERT_SIGNATURE_FAILURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

export type StreamRole = 'client' | 'server';

class MuxStream extends Duplex implements TransportStream {
  readonly id: number;
  localFinSent = false;
  remoteFinReceived = false;
  resetByPeer = false;
  /** DATA bytes the peer still accepts before it grants more window. */
  sendWindow = STREAM_WINDOW_BYTES;
  /** The remainder of a write waiting for window. */
  blockedWrite: { chunk: Buffer; callback: (err?: Error | null) => void } | null = null;
  receivedBytes = 0;
  grantedBytes = 0;

  constructor(
    private readonly owner: WsStreamConnection,
    id: number,
  ) {
    super({
      allowHalfOpen: true,
      readableHighWaterMark: STREAM_WINDOW_BYTES,
      writableHighWaterMark: STREAM_WINDOW_BYTES,
    });
    this.id = id;
  }

  override _read(): void {}

  // Every path that hands buffered bytes to a consumer goes through read(), except a push
  // straight into a flowing stream, which the connection accounts for itself.
  override read(size?: number): unknown {
    const chunk: unknown = super.read(size);
    this.owner.returnWindow(this);
    return chunk;
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (err?: Error | null) => void): void {
    this.owner.sendData(this, chunk, callback);
  }

  override _final(callback: (err?: Error | null) => void): void {
    this.localFinSent = true;
    this.owner.sendClose(this.id, StreamMuxCloseFlags.FIN);
    callback();
  }

  override _destroy(err: Error | null, callback: (err?: Error | null) => void): void {
    this.owner.onStreamDestroyed(this);
    callback(err);
  }
}

/**
 * QUIC-style stream multiplexing over one WebSocket. Stream ids use QUIC's bidirectional
 * numbering: the client opens 0, 4, 8, ... and the server 1, 5, 9, ...
 *
 * Each stream has its own credit window, so a stream whose reader stalls only stalls its
 * sender; the WebSocket itself is always read.
 */
export class WsStreamConnection implements TransportConnection {
  readonly remoteAddress: string | null;
  private readonly parser = new StreamMuxFrameParser(MAX_MUX_PAYLOAD_BYTES);
  private readonly streams = new Map<number, MuxStream>();
  private readonly streamListeners: Array<(stream: TransportStream) => void> = [];
  private readonly closeListeners: Array<(err: Error | null) => void> = [];
  private nextLocalStreamId: number;
  private highestPeerStreamId = -1;
  private isClosed = false;
  private latestTicket: Buffer | null = null;

  constructor(
    private readonly ws: WebSocket,
    private readonly role: StreamRole,
    remoteAddress: string | null = null,
  ) {
    this.remoteAddress = remoteAddress;
    this.nextLocalStreamId = role === 'client' ? 0 : 1;

    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (this.isClosed) return;
      if (!isBinary) {
        this.fail(new TransportError('text messages are not part of the stream protocol'));
        return;
      }

      const buf = Buffer.isBuffer(data) ? data : Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data);
      let frames: StreamMuxFrame[];
      try {
        frames = this.parser.push(buf);
      } catch (err) {
        this.fail(new TransportError(`stream protocol error: ${formatOneLineError(err, 256)}`));
        return;
      }
      for (const frame of frames) {
        this.handleFrame(frame);
        if (this.isClosed) return;
      }
    });

    ws.once('close', (code: number, reason: Buffer) => {
      const why = formatOneLineUtf8(reason.toString('utf8'), 123);
      this.fail(new TransportError(`tunnel connection closed (${code}${why ? ` ${why}` : ''})`));
    });

    ws.on('error', (err: Error) => {
      this.fail(new TransportError(`tunnel connection error: ${formatOneLineError(err, 256)}`, { cause: err }));
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Newest TLS session state seen on this connection; null for plaintext. */
  get resumptionToken(): Buffer | null {
    return this.latestTicket;
  }

  trackTlsSessions(socket: TLSSocket): void {
    const current = socket.getSession();
    if (current) this.latestTicket = current;
    socket.on('session', (session: Buffer) => {
      this.latestTicket = session;
    });
  }

  openStream(): TransportStream {
    if (this.isClosed) throw new TransportError('tunnel connection is closed');
    const id = this.nextLocalStreamId;
    if (id > 0xffffffff) throw new TransportError('stream id space exhausted');
    this.nextLocalStreamId += 4;

    const stream = new MuxStream(this, id);
    this.streams.set(id, stream);
    this.send(encodeStreamMuxFrame(StreamMuxMsgType.OPEN, id));
    return stream;
  }

  onStream(listener: (stream: TransportStream) => void): void {
    this.streamListeners.push(listener);
  }

  onClose(listener: (err: Error | null) => void): void {
    this.closeListeners.push(listener);
  }

  close(reason = 'closed'): void {
    if (this.isClosed) return;
    try {
      this.ws.close(1000, formatOneLineUtf8(reason, 123));
    } catch {
      this.ws.terminate();
    }
    const timer = setTimeout(() => this.ws.terminate(), CLOSE_HANDSHAKE_TIMEOUT_MS);
    unrefBestEffort(timer);
    this.fail(null);
  }

  sendData(stream: MuxStream, chunk: Buffer, callback: (err?: Error | null) => void): void {
    if (this.isClosed || !this.streams.has(stream.id)) {
      callback(new TransportError('stream is closed'));
      return;
    }
    if (chunk.length === 0) {
      callback();
      return;
    }
    this.pumpData(stream, chunk, callback);
  }

  // Large writes are cut into pieces so one busy stream cannot monopolise the socket. The
  // callback completes once the last piece reaches the socket, which adds the WebSocket's own
  // backpressure to the stream window.
  private pumpData(stream: MuxStream, chunk: Buffer, callback: (err?: Error | null) => void): void {
    let offset = 0;
    while (offset < chunk.length && stream.sendWindow > 0) {
      const end = Math.min(chunk.length, offset + DATA_PIECE_BYTES, offset + stream.sendWindow);
      const piece = chunk.subarray(offset, end);
      offset = end;
      stream.sendWindow -= piece.length;
      const frame = encodeStreamMuxFrame(StreamMuxMsgType.DATA, stream.id, piece);
      this.send(frame, offset >= chunk.length ? callback : undefined);
    }
    if (offset < chunk.length) stream.blockedWrite = { chunk: chunk.subarray(offset), callback };
  }

  returnWindow(stream: MuxStream): void {
    if (this.isClosed || stream.remoteFinReceived || this.streams.get(stream.id) !== stream) return;
    const consumed = stream.receivedBytes - stream.readableLength;
    const increment = consumed - stream.grantedBytes;
    if (increment < WINDOW_UPDATE_THRESHOLD_BYTES) return;
    stream.grantedBytes = consumed;
    this.send(encodeStreamMuxFrame(StreamMuxMsgType.WINDOW, stream.id, encodeStreamMuxWindowPayload(increment)));
  }

  sendClose(streamId: number, flags: StreamMuxCloseFlags): void {
    if (this.isClosed) return;
    this.send(encodeStreamMuxFrame(StreamMuxMsgType.CLOSE, streamId, encodeStreamMuxClosePayload(flags)));
  }

  onStreamDestroyed(stream: MuxStream): void {
    if (this.streams.get(stream.id) !== stream) return;
    this.streams.delete(stream.id);
    // Writable drops a pending write callback once the stream is destroyed.
    stream.blockedWrite = null;
    if (!stream.resetByPeer && !(stream.localFinSent && stream.remoteFinReceived)) {
      this.sendClose(stream.id, StreamMuxCloseFlags.RST);
    }
  }

  private send(frame: Buffer, callback?: (err?: Error | null) => void): void {
    if (this.isClosed || this.ws.readyState !== WebSocket.OPEN) {
      callback?.(new TransportError('tunnel connection is closed'));
      return;
    }
    this.ws.send(frame, { binary: true }, (err?: Error) => {
      if (err) {
        this.fail(new TransportError(`tunnel write failed: ${formatOneLineError(err, 256)}`, { cause: err }));
      }
      callback?.(err ?? null);
    });
  }

  private isPeerStreamId(id: number): boolean {
    return id % 4 === (this.role === 'client' ? 1 : 0);
  }

  private handleFrame(frame: StreamMuxFrame): void {
    switch (frame.msgType) {
      case StreamMuxMsgType.OPEN: {
        if (!this.isPeerStreamId(frame.streamId) || frame.streamId <= this.highestPeerStreamId) {
          this.fail(new TransportError(`peer opened invalid stream id ${frame.streamId}`));
          return;
        }
        this.highestPeerStreamId = frame.streamId;
        const stream = new MuxStream(this, frame.streamId);
        this.streams.set(frame.streamId, stream);
        for (const listener of this.streamListeners) listener(stream);
        return;
      }
      case StreamMuxMsgType.DATA: {
        // Data can race with a local reset of the stream.
        const stream = this.streams.get(frame.streamId);
        if (!stream || stream.remoteFinReceived || frame.payload.length === 0) return;
        if (stream.receivedBytes - stream.grantedBytes + frame.payload.length > STREAM_WINDOW_BYTES) {
          // The peer overran the window; only this stream is reset.
          stream.destroy();
          return;
        }
        stream.receivedBytes += frame.payload.length;
        stream.push(Buffer.from(frame.payload));
        this.returnWindow(stream);
        return;
      }
      case StreamMuxMsgType.WINDOW: {
        let increment: number;
        try {
          increment = decodeStreamMuxWindowPayload(frame.payload).increment;
        } catch (err) {
          this.fail(new TransportError(`stream protocol error: ${formatOneLineError(err, 256)}`));
          return;
        }
        const stream = this.streams.get(frame.streamId);
        if (!stream) return;
        stream.sendWindow += increment;
        const blocked = stream.blockedWrite;
        if (blocked && stream.sendWindow > 0) {
          stream.blockedWrite = null;
          this.pumpData(stream, blocked.chunk, blocked.callback);
        }
        return;
      }
      case StreamMuxMsgType.CLOSE: {
        let flags: number;
        try {
          flags = decodeStreamMuxClosePayload(frame.payload).flags;
        } catch (err) {
          this.fail(new TransportError(`stream protocol error: ${formatOneLineError(err, 256)}`));
          return;
        }
        const stream = this.streams.get(frame.streamId);
        if (!stream) return;
        if (flags & StreamMuxCloseFlags.RST) {
          // Consumers see a reset as 'close' without a preceding 'end'.
          stream.resetByPeer = true;
          stream.destroy();
          return;
        }
        if (flags & StreamMuxCloseFlags.FIN && !stream.remoteFinReceived) {
          stream.remoteFinReceived = true;
          stream.push(null);
        }
        return;
      }
      default:
        this.fail(new TransportError(`unknown stream message type ${frame.msgType}`));
    }
  }

  private fail(err: Error | null): void {
    if (this.isClosed) return;
    this.isClosed = true;

    if (err) this.ws.terminate();
    for (const stream of [...this.streams.values()]) {
      stream.resetByPeer = true;
      stream.destroy();
    }
    this.streams.clear();

    for (const listener of this.closeListeners) listener(err);
  }
}

function formatHostForUrl(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

function classifyHandshakeError(err: Error): TransportError {
  const code = errorCodeOf(err);
  const message = formatOneLineError(err, 256);
  if (code !== undefined && TLS_AUTH_ERROR_CODES.has(code)) {
    return new AuthenticationError(`relay certificate rejected (${code}): ${message}`, { cause: err });
  }
  return new TransportError(`tunnel handshake failed: ${message}`, { cause: err });
}

type WsClientOptions = WebSocket.ClientOptions & Pick<tls.ConnectionOptions, 'session' | 'servername'>;

/** Opens a tunnel connection to a relay (ws, or wss when `tls` is set). */
export async function connectWsTransport(options: TransportConnectOptions): Promise<TransportSession> {
  const scheme = options.tls ? 'wss' : 'ws';
  const url = `${scheme}://${formatHostForUrl(options.host)}:${options.port}${TUNNEL_PATH}`;

  const clientOptions: WsClientOptions = {
    handshakeTimeout: options.handshakeTimeoutMs,
    maxPayload: STREAM_MUX_HEADER_BYTES + MAX_MUX_PAYLOAD_BYTES,
    perMessageDeflate: false,
  };
  if (options.tls) {
    clientOptions.rejectUnauthorized = options.tls.rejectUnauthorized;
    if (options.tls.ca) clientOptions.ca = options.tls.ca;
    if (options.tls.servername) clientOptions.servername = options.tls.servername;
    if (options.resumptionToken) clientOptions.session = options.resumptionToken;
  }

  const ws = new WebSocket(url, [STREAM_MUX_SUBPROTOCOL], clientOptions);

  return await new Promise<TransportSession>((resolve, reject) => {
    let settled = false;
    let tlsSocket: TLSSocket | null = null;

    const settleError = (err: TransportError) => {
      if (settled) return;
      settled = true;
      ws.terminate();
      reject(err);
    };

    ws.on('upgrade', (res) => {
      if (res.socket instanceof TLSSocket) tlsSocket = res.socket;
    });

    ws.on('unexpected-response', (_req, res) => {
      const status = res.statusCode ?? 0;
      res.resume();
      if (status === 401 || status === 403) {
        settleError(new AuthenticationError(`relay refused the tunnel (HTTP ${status})`));
        return;
      }
      settleError(new TransportError(`relay answered the tunnel upgrade with HTTP ${status}`));
    });

    ws.on('error', (err: Error) => {
      settleError(classifyHandshakeError(err));
    });

    ws.once('open', () => {
      if (settled) return;
      if (ws.protocol !== STREAM_MUX_SUBPROTOCOL) {
        settleError(new TransportError(`relay selected unexpected subprotocol "${ws.protocol}"`));
        return;
      }

      settled = true;
      const connection = new WsStreamConnection(ws, 'client', `${options.host}:${options.port}`);
      const resumed = tlsSocket ? tlsSocket.isSessionReused() : false;
      if (tlsSocket) connection.trackTlsSessions(tlsSocket);
      resolve({
        connection,
        get resumptionToken() {
          return connection.resumptionToken;
        },
        resumed,
      });
    });
  });
}

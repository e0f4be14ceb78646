import type { Duplex } from 'node:stream';

import type { ConnectionTable } from './connectionTable.js';
import { LocalIOError, ProtocolError, ProtocolErrorCode } from './errors.js';
import type { Logger } from './logger.js';
import { FrameDecoder, encodeCloseFrame, encodeFrame, isCloseFrame, type Frame } from './protocol/frame.js';
import {
  destroyBestEffort,
  endCaptureErrorBestEffort,
  pauseBestEffort,
  resumeBestEffort,
  writeCaptureErrorBestEffort,
} from './util/socketSafe.js';
import { formatOneLineError } from './util/text.js';

export type ForwardSummary = Readonly<{
  connId: number;
  bytesSent: number;
  bytesReceived: number;
  reason: string;
}>;

export type ForwarderOptions = {
  connId: number;
  /** Local TCP socket (or any byte duplex) of this logical connection. */
  local: Duplex;
  /** The transport stream dedicated to this logical connection. */
  stream: Duplex;
  table: ConnectionTable;
  logger: Logger;
  maxFramePayloadBytes: number;
  onClosed?: (summary: ForwardSummary) => void;
};

export type Forwarder = {
  readonly done: Promise<ForwardSummary>;
  /** Tears the logical connection down; a no-op once it has ended. */
  close(reason: string): void;
};

/**
 * Pumps one logical connection in both directions: local bytes are framed onto the stream and
 * frames from the stream are written to the local socket. Either side reaching EOF half-closes
 * the other; errors tear down this connection only.
 */
export function startForwarder(opts: ForwarderOptions): Forwarder {
  const { connId, local, stream, table, logger, maxFramePayloadBytes } = opts;
  const decoder = new FrameDecoder(maxFramePayloadBytes);

  let bytesSent = 0;
  let bytesReceived = 0;
  let localEofSent = false;
  let remoteEofSeen = false;
  let finished = false;
  let pausedLocalForStream = false;
  let pausedStreamForLocal = false;

  let resolveDone: (summary: ForwardSummary) => void = () => {};
  const done = new Promise<ForwardSummary>((resolve) => {
    resolveDone = resolve;
  });

  const finish = (reason: string) => {
    if (finished) return;
    finished = true;
    table.remove(connId);

    const summary: ForwardSummary = { connId, bytesSent, bytesReceived, reason };
    logger.debug(summary, 'logical_connection_closed');
    opts.onClosed?.(summary);
    resolveDone(summary);
  };

  const abort = (reason: string) => {
    if (finished) return;
    destroyBestEffort(local);
    destroyBestEffort(stream);
    finish(reason);
  };

  // Exactly one close frame per connection; nothing for this conn id follows it.
  const sendLocalEof = () => {
    if (localEofSent) return;
    localEofSent = true;
    if (stream.destroyed || stream.writableEnded) return;
    const err = endCaptureErrorBestEffort(stream, encodeCloseFrame(connId));
    if (err) logger.debug({ connId, err: formatOneLineError(err, 512) }, 'stream_end_failed');
  };

  local.on('data', (chunk: Buffer) => {
    if (finished || localEofSent) return;
    for (let offset = 0; offset < chunk.length; offset += maxFramePayloadBytes) {
      const piece = chunk.subarray(offset, Math.min(chunk.length, offset + maxFramePayloadBytes));
      const res = writeCaptureErrorBestEffort(stream, encodeFrame(connId, piece));
      if (res.err) {
        logger.warn({ connId, err: formatOneLineError(res.err, 512) }, 'stream_write_failed');
        abort('stream_write_error');
        return;
      }
      bytesSent += piece.length;
      table.recordSent(connId, piece.length);
      if (!res.ok && !pausedLocalForStream) {
        pausedLocalForStream = true;
        pauseBestEffort(local);
      }
    }
  });

  stream.on('drain', () => {
    if (!pausedLocalForStream) return;
    pausedLocalForStream = false;
    resumeBestEffort(local);
  });

  local.on('end', () => {
    sendLocalEof();
  });

  local.on('error', (err: Error) => {
    const ioErr = new LocalIOError(formatOneLineError(err, 512), { cause: err });
    logger.warn({ connId, err: ioErr.message }, 'local_socket_error');
    abort('local_error');
  });

  local.on('close', () => {
    // A local socket destroyed without a FIN still counts as EOF for the peer.
    sendLocalEof();
    finish(remoteEofSeen ? 'eof' : 'local_closed');
  });

  const onRemoteEof = () => {
    if (remoteEofSeen) return;
    remoteEofSeen = true;
    const err = endCaptureErrorBestEffort(local);
    if (err) logger.debug({ connId, err: formatOneLineError(err, 512) }, 'local_end_failed');
  };

  const handleFrame = (frame: Frame): boolean => {
    if (frame.connId !== connId) {
      if (table.lookup(frame.connId) === undefined) {
        logger.debug({ connId, frameConnId: frame.connId }, 'frame_for_unknown_conn_dropped');
        return true;
      }
      const err = new ProtocolError(
        ProtocolErrorCode.UNEXPECTED_CONN_ID,
        `stream of conn ${connId} carried a frame for conn ${frame.connId}`,
      );
      logger.warn({ connId, err: err.message }, 'protocol_error');
      abort('protocol_error');
      return false;
    }

    if (isCloseFrame(frame)) {
      onRemoteEof();
      return true;
    }

    const res = writeCaptureErrorBestEffort(local, frame.payload);
    if (res.err) {
      logger.warn({ connId, err: formatOneLineError(res.err, 512) }, 'local_write_failed');
      abort('local_error');
      return false;
    }
    bytesReceived += frame.payload.length;
    table.recordReceived(connId, frame.payload.length);
    if (!res.ok && !pausedStreamForLocal) {
      pausedStreamForLocal = true;
      pauseBestEffort(stream);
    }
    return true;
  };

  stream.on('data', (chunk: Buffer) => {
    if (finished || remoteEofSeen) return;
    let frames: Frame[];
    try {
      frames = decoder.push(chunk);
    } catch (err) {
      logger.warn({ connId, err: formatOneLineError(err, 512) }, 'protocol_error');
      abort('protocol_error');
      return;
    }
    for (const frame of frames) {
      if (remoteEofSeen || !handleFrame(frame)) return;
    }
  });

  local.on('drain', () => {
    if (!pausedStreamForLocal) return;
    pausedStreamForLocal = false;
    resumeBestEffort(stream);
  });

  stream.on('end', () => {
    if (finished) return;
    if (!remoteEofSeen) {
      try {
        decoder.finish();
      } catch (err) {
        // Truncated data must not reach the local service as a clean close.
        logger.warn({ connId, err: formatOneLineError(err, 512) }, 'protocol_error');
        abort('protocol_error');
        return;
      }
    }
    onRemoteEof();
  });

  stream.on('error', (err: Error) => {
    logger.debug({ connId, err: formatOneLineError(err, 512) }, 'stream_error');
    abort('stream_error');
  });

  stream.on('close', () => {
    // Closing without 'end' means the peer reset the stream or the tunnel went away.
    if (!stream.readableEnded) abort('stream_reset');
  });

  // Pooled and freshly accepted sockets arrive paused; a 'data' listener alone does not restart them.
  resumeBestEffort(local);

  return {
    done,
    close: (reason: string) => abort(reason),
  };
}

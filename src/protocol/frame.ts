import { ProtocolError, ProtocolErrorCode } from '../errors.js';
import { err, ok, type Result } from '../result.js';

/** `[length u32 BE][conn_id u32 BE]` */
export const FRAME_HEADER_BYTES = 8;

export const DEFAULT_MAX_FRAME_PAYLOAD_BYTES = 1024 * 1024;

/** Reserved for the control stream; logical connections are numbered from 1. */
export const CONTROL_CONN_ID = 0;

export interface Frame {
  connId: number;
  payload: Buffer;
}

export interface DecodedFrame extends Frame {
  bytesConsumed: number;
}

export function encodeFrame(connId: number, payload: Uint8Array): Buffer {
  const buf = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
  buf.writeUInt32BE(payload.length >>> 0, 0);
  buf.writeUInt32BE(connId >>> 0, 4);
  buf.set(payload, FRAME_HEADER_BYTES);
  return buf;
}

/** A zero-length frame: the producer saw EOF on its local socket. */
export function encodeCloseFrame(connId: number): Buffer {
  return encodeFrame(connId, Buffer.alloc(0));
}

export function isCloseFrame(frame: Frame): boolean {
  return frame.payload.length === 0;
}

/**
 * Decodes one frame from the start of `buf`. `FRAME_TRUNCATED` means more bytes are needed;
 * `FRAME_TOO_LARGE` means the header is malformed and the stream cannot be resynchronised.
 */
export function decodeFrame(
  buf: Buffer,
  maxPayloadBytes: number = DEFAULT_MAX_FRAME_PAYLOAD_BYTES,
): Result<DecodedFrame> {
  if (buf.length < FRAME_HEADER_BYTES) {
    return err('FRAME_TRUNCATED', 'Frame header is truncated');
  }

  const length = buf.readUInt32BE(0);
  const connId = buf.readUInt32BE(4);
  if (length > maxPayloadBytes) {
    return err('FRAME_TOO_LARGE', `Frame payload length ${length} exceeds max ${maxPayloadBytes}`);
  }

  const bytesConsumed = FRAME_HEADER_BYTES + length;
  if (buf.length < bytesConsumed) {
    return err('FRAME_TRUNCATED', 'Frame payload is truncated');
  }

  return ok({ connId, payload: buf.subarray(FRAME_HEADER_BYTES, bytesConsumed), bytesConsumed });
}

/**
 * Reassembles frames from one stream's byte chunks, which may split a frame anywhere.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly maxPayloadBytes: number;

  constructor(maxPayloadBytes = DEFAULT_MAX_FRAME_PAYLOAD_BYTES) {
    if (!Number.isInteger(maxPayloadBytes) || maxPayloadBytes < 0) {
      throw new Error(`Invalid maxPayloadBytes: ${maxPayloadBytes}`);
    }
    this.maxPayloadBytes = maxPayloadBytes;
  }

  /** Throws `ProtocolError` as soon as an oversize header is seen. */
  push(chunk: Buffer): Frame[] {
    if (chunk.length === 0) return [];
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: Frame[] = [];
    for (;;) {
      const res = decodeFrame(this.buffer, this.maxPayloadBytes);
      if (!res.ok) {
        if (res.code === 'FRAME_TOO_LARGE') {
          throw new ProtocolError(ProtocolErrorCode.FRAME_TOO_LARGE, res.message);
        }
        break;
      }

      const { connId, payload, bytesConsumed } = res.value;
      // Copy so a retained payload does not pin the reassembly buffer.
      frames.push({ connId, payload: Buffer.from(payload) });
      this.buffer =
        bytesConsumed === this.buffer.length ? Buffer.alloc(0) : this.buffer.subarray(bytesConsumed);
    }
    return frames;
  }

  pendingBytes(): number {
    return this.buffer.length;
  }

  finish(): void {
    if (this.buffer.length === 0) return;
    throw new ProtocolError(
      ProtocolErrorCode.FRAME_TRUNCATED,
      `stream ended inside a frame (${this.buffer.length} pending bytes)`,
    );
  }
}

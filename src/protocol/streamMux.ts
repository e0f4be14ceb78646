export const STREAM_MUX_SUBPROTOCOL = 'tunnelmux-streams-v1';

export const STREAM_MUX_HEADER_BYTES = 9;

export const StreamMuxMsgType = {
  OPEN: 1,
  DATA: 2,
  CLOSE: 3,
  /** Grants the peer more bytes of DATA on one stream. */
  WINDOW: 4,
} as const;
export type StreamMuxMsgType = (typeof StreamMuxMsgType)[keyof typeof StreamMuxMsgType];

/** CLOSE payload bits: FIN half-closes the sender's direction, RST aborts the whole stream. */
export const StreamMuxCloseFlags = {
  FIN: 0x01,
  RST: 0x02,
} as const;
export type StreamMuxCloseFlags = number;

export type StreamMuxFrame = {
  msgType: number;
  streamId: number;
  payload: Buffer;
};

export function encodeStreamMuxFrame(msgType: StreamMuxMsgType, streamId: number, payload?: Buffer): Buffer {
  const payloadBuf = payload ?? Buffer.alloc(0);
  const buf = Buffer.allocUnsafe(STREAM_MUX_HEADER_BYTES + payloadBuf.length);
  buf.writeUInt8(msgType, 0);
  buf.writeUInt32BE(streamId >>> 0, 1);
  buf.writeUInt32BE(payloadBuf.length >>> 0, 5);
  payloadBuf.copy(buf, STREAM_MUX_HEADER_BYTES);
  return buf;
}

export function encodeStreamMuxClosePayload(flags: StreamMuxCloseFlags): Buffer {
  const buf = Buffer.allocUnsafe(1);
  buf.writeUInt8(flags & 0xff, 0);
  return buf;
}

export function decodeStreamMuxClosePayload(buf: Buffer): { flags: StreamMuxCloseFlags } {
  if (buf.length !== 1) {
    throw new Error('CLOSE payload must be exactly 1 byte');
  }
  return { flags: buf.readUInt8(0) };
}

export function encodeStreamMuxWindowPayload(increment: number): Buffer {
  if (!Number.isInteger(increment) || increment < 1 || increment > 0xffffffff) {
    throw new Error(`invalid window increment: ${increment}`);
  }
  const buf = Buffer.allocUnsafe(4);
  buf.writeUInt32BE(increment, 0);
  return buf;
}

export function decodeStreamMuxWindowPayload(buf: Buffer): { increment: number } {
  if (buf.length !== 4) {
    throw new Error('WINDOW payload must be exactly 4 bytes');
  }
  const increment = buf.readUInt32BE(0);
  if (increment === 0) {
    throw new Error('WINDOW increment must be positive');
  }
  return { increment };
}

/** Splits the concatenated mux messages of one WebSocket into frames. */
export class StreamMuxFrameParser {
  private pending: Buffer = Buffer.alloc(0);

  constructor(private readonly maxPayloadBytes: number) {
    if (!Number.isInteger(maxPayloadBytes) || maxPayloadBytes < 0) {
      throw new Error(`Invalid maxPayloadBytes: ${maxPayloadBytes}`);
    }
  }

  /** Throws once a header announces more than `maxPayloadBytes`; the connection is unusable then. */
  push(chunk: Buffer): StreamMuxFrame[] {
    if (chunk.length === 0) return [];
    let buf = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    const frames: StreamMuxFrame[] = [];
    while (buf.length >= STREAM_MUX_HEADER_BYTES) {
      const length = buf.readUInt32BE(5);
      if (length > this.maxPayloadBytes) {
        throw new Error(`mux payload of ${length} bytes exceeds ${this.maxPayloadBytes}`);
      }
      const total = STREAM_MUX_HEADER_BYTES + length;
      if (buf.length < total) break;

      frames.push({
        msgType: buf.readUInt8(0),
        streamId: buf.readUInt32BE(1),
        payload: buf.subarray(STREAM_MUX_HEADER_BYTES, total),
      });
      buf = buf.subarray(total);
    }

    this.pending = buf.length === 0 ? Buffer.alloc(0) : Buffer.from(buf);
    return frames;
  }

  pendingBytes(): number {
    return this.pending.length;
  }
}

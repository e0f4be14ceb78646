import type { Duplex } from 'node:stream';

import { ProtocolError, ProtocolErrorCode } from '../errors.js';
import { err, ok, type Result } from '../result.js';
import { CONTROL_CONN_ID, FrameDecoder, encodeFrame, type Frame } from './frame.js';

export const ControlMsgType = {
  REGISTER: 1,
  DEREGISTER: 2,
  HEARTBEAT: 3,
  ACK: 4,
  REGISTERED: 5,
  CONNECT: 6,
} as const;
export type ControlMsgType = (typeof ControlMsgType)[keyof typeof ControlMsgType];

export type ControlMessage =
  | { type: 'register'; port: number }
  | { type: 'deregister'; port: number }
  | { type: 'heartbeat' }
  | { type: 'ack'; ref: number }
  /** `publicPort` 0 means the relay could not open a public listener. */
  | { type: 'registered'; port: number; publicPort: number }
  | { type: 'connect'; connId: number; streamId: number; port: number };

function isPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function assertPort(port: number, allowZero = false): void {
  if (allowZero && port === 0) return;
  if (!isPort(port)) throw new Error(`invalid port: ${port}`);
}

function assertU32(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new Error(`invalid ${name}: ${value}`);
  }
}

function encodeBody(msg: ControlMessage): Buffer {
  switch (msg.type) {
    case 'register':
    case 'deregister': {
      assertPort(msg.port);
      const buf = Buffer.allocUnsafe(3);
      buf.writeUInt8(msg.type === 'register' ? ControlMsgType.REGISTER : ControlMsgType.DEREGISTER, 0);
      buf.writeUInt16BE(msg.port, 1);
      return buf;
    }
    case 'heartbeat':
      return Buffer.from([ControlMsgType.HEARTBEAT]);
    case 'ack': {
      assertU32(msg.ref, 'ack ref');
      const buf = Buffer.allocUnsafe(5);
      buf.writeUInt8(ControlMsgType.ACK, 0);
      buf.writeUInt32BE(msg.ref, 1);
      return buf;
    }
    case 'registered': {
      assertPort(msg.port);
      assertPort(msg.publicPort, true);
      const buf = Buffer.allocUnsafe(5);
      buf.writeUInt8(ControlMsgType.REGISTERED, 0);
      buf.writeUInt16BE(msg.port, 1);
      buf.writeUInt16BE(msg.publicPort, 3);
      return buf;
    }
    case 'connect': {
      assertU32(msg.connId, 'conn id');
      if (msg.connId === CONTROL_CONN_ID) throw new Error('conn id 0 is reserved for control');
      assertU32(msg.streamId, 'stream id');
      assertPort(msg.port);
      const buf = Buffer.allocUnsafe(11);
      buf.writeUInt8(ControlMsgType.CONNECT, 0);
      buf.writeUInt32BE(msg.connId, 1);
      buf.writeUInt32BE(msg.streamId, 5);
      buf.writeUInt16BE(msg.port, 9);
      return buf;
    }
  }
}

/** Encodes a control message as a complete frame on the reserved control conn id. */
export function encodeControlMessage(msg: ControlMessage): Buffer {
  return encodeFrame(CONTROL_CONN_ID, encodeBody(msg));
}

const BODY_LENGTHS: Record<ControlMsgType, number> = {
  [ControlMsgType.REGISTER]: 3,
  [ControlMsgType.DEREGISTER]: 3,
  [ControlMsgType.HEARTBEAT]: 1,
  [ControlMsgType.ACK]: 5,
  [ControlMsgType.REGISTERED]: 5,
  [ControlMsgType.CONNECT]: 11,
};

const CONTROL_MSG_TYPES: readonly ControlMsgType[] = Object.values(ControlMsgType);

function toControlMsgType(value: number): ControlMsgType | null {
  return CONTROL_MSG_TYPES.find((type) => type === value) ?? null;
}

export function decodeControlMessage(frame: Frame): Result<ControlMessage> {
  if (frame.connId !== CONTROL_CONN_ID) {
    return err('CONTROL_BAD_CONN_ID', `control frame carries conn id ${frame.connId}`);
  }
  const body = frame.payload;
  if (body.length === 0) return err('CONTROL_EMPTY', 'control frame has no body');

  const type = toControlMsgType(body.readUInt8(0));
  if (type === null) {
    return err('CONTROL_UNKNOWN_TYPE', `unknown control message type ${body.readUInt8(0)}`);
  }
  if (body.length !== BODY_LENGTHS[type]) {
    return err('CONTROL_BAD_LENGTH', `control message type ${type} has ${body.length} bytes`);
  }

  switch (type) {
    case ControlMsgType.REGISTER:
    case ControlMsgType.DEREGISTER: {
      const port = body.readUInt16BE(1);
      if (!isPort(port)) return err('CONTROL_BAD_PORT', 'port 0 is not valid');
      return ok({ type: type === ControlMsgType.REGISTER ? 'register' : 'deregister', port });
    }
    case ControlMsgType.HEARTBEAT:
      return ok({ type: 'heartbeat' });
    case ControlMsgType.ACK:
      return ok({ type: 'ack', ref: body.readUInt32BE(1) });
    case ControlMsgType.REGISTERED: {
      const port = body.readUInt16BE(1);
      if (!isPort(port)) return err('CONTROL_BAD_PORT', 'port 0 is not valid');
      return ok({ type: 'registered', port, publicPort: body.readUInt16BE(3) });
    }
    case ControlMsgType.CONNECT: {
      const connId = body.readUInt32BE(1);
      if (connId === CONTROL_CONN_ID) return err('CONTROL_BAD_CONN_ID', 'CONNECT with reserved conn id 0');
      const port = body.readUInt16BE(9);
      if (!isPort(port)) return err('CONTROL_BAD_PORT', 'port 0 is not valid');
      return ok({ type: 'connect', connId, streamId: body.readUInt32BE(5), port });
    }
  }
}

type MessageListener = (msg: ControlMessage) => void;
type ErrorListener = (err: Error) => void;

/**
 * The control stream of a session. Every decode failure and every premature end of the stream
 * is reported once through `onError`; callers treat it as fatal to the session.
 */
export class ControlChannel {
  private readonly decoder: FrameDecoder;
  private readonly messageListeners: MessageListener[] = [];
  private readonly errorListeners: ErrorListener[] = [];
  private failed = false;
  private closing = false;

  constructor(
    private readonly stream: Duplex,
    maxPayloadBytes: number,
  ) {
    this.decoder = new FrameDecoder(maxPayloadBytes);
    stream.on('data', (chunk: Buffer) => this.onData(chunk));
    stream.on('end', () => {
      if (!this.closing) this.fail(new ProtocolError(ProtocolErrorCode.CONTROL_STREAM_ENDED, 'control stream ended'));
    });
    stream.on('error', (err) => {
      if (!this.closing) this.fail(err);
    });
    stream.on('close', () => {
      if (!this.closing) this.fail(new ProtocolError(ProtocolErrorCode.CONTROL_STREAM_ENDED, 'control stream closed'));
    });
  }

  onMessage(listener: MessageListener): void {
    this.messageListeners.push(listener);
  }

  onError(listener: ErrorListener): void {
    this.errorListeners.push(listener);
  }

  /** Returns false once the channel is unusable. */
  send(msg: ControlMessage): boolean {
    if (this.failed || this.closing || this.stream.destroyed || this.stream.writableEnded) return false;
    this.stream.write(encodeControlMessage(msg));
    return true;
  }

  close(): void {
    if (this.closing) return;
    this.closing = true;
    this.stream.destroy();
  }

  private onData(chunk: Buffer): void {
    if (this.failed) return;
    let frames: Frame[];
    try {
      frames = this.decoder.push(chunk);
    } catch (err) {
      this.fail(err instanceof Error ? err : new Error(String(err)));
      return;
    }

    for (const frame of frames) {
      const res = decodeControlMessage(frame);
      if (!res.ok) {
        this.fail(new ProtocolError(ProtocolErrorCode.CONTROL_MALFORMED, `${res.code}: ${res.message}`));
        return;
      }
      for (const listener of this.messageListeners) listener(res.value);
      if (this.failed || this.closing) return;
    }
  }

  private fail(err: Error): void {
    if (this.failed) return;
    this.failed = true;
    for (const listener of this.errorListeners) listener(err);
  }
}

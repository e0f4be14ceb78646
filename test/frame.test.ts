import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ProtocolError } from '../src/errors.js';
import {
  FRAME_HEADER_BYTES,
  FrameDecoder,
  decodeFrame,
  encodeCloseFrame,
  encodeFrame,
  isCloseFrame,
  type Frame,
} from '../src/protocol/frame.js';

describe('frame codec', () => {
  it('encodes a big-endian length and conn id header before the payload', () => {
    const frame = encodeFrame(0x01020304, Buffer.from('hi'));
    assert.deepEqual(frame, Buffer.from([0, 0, 0, 2, 1, 2, 3, 4, 0x68, 0x69]));
  });

  it('encodes a close frame as a header with length 0', () => {
    assert.deepEqual(encodeCloseFrame(9), Buffer.from([0, 0, 0, 0, 0, 0, 0, 9]));
  });

  it('decodes a frame and reports the bytes consumed', () => {
    const buf = Buffer.concat([encodeFrame(5, Buffer.from('abc')), Buffer.from([0xff])]);
    const res = decodeFrame(buf, 16);
    assert.ok(res.ok);
    assert.equal(res.value.connId, 5);
    assert.deepEqual(res.value.payload, Buffer.from('abc'));
    assert.equal(res.value.bytesConsumed, FRAME_HEADER_BYTES + 3);
  });

  it('asks for more data on a truncated header or payload', () => {
    const full = encodeFrame(1, Buffer.from('abcdef'));
    const header = decodeFrame(full.subarray(0, 5), 16);
    assert.equal(header.ok, false);
    assert.equal(header.ok ? null : header.code, 'FRAME_TRUNCATED');

    const payload = decodeFrame(full.subarray(0, FRAME_HEADER_BYTES + 2), 16);
    assert.equal(payload.ok ? null : payload.code, 'FRAME_TRUNCATED');
  });

  it('accepts a payload of exactly the maximum and rejects one byte more', () => {
    assert.equal(decodeFrame(encodeFrame(1, Buffer.alloc(16)), 16).ok, true);
    const res = decodeFrame(encodeFrame(1, Buffer.alloc(17)), 16);
    assert.equal(res.ok ? null : res.code, 'FRAME_TOO_LARGE');
  });

  it('treats only empty payloads as close frames', () => {
    assert.equal(isCloseFrame({ connId: 1, payload: Buffer.alloc(0) }), true);
    assert.equal(isCloseFrame({ connId: 1, payload: Buffer.from([0]) }), false);
  });
});

describe('FrameDecoder', () => {
  it('reassembles frames split at every byte boundary', () => {
    const stream = Buffer.concat([encodeFrame(1, Buffer.from('one')), encodeCloseFrame(1), encodeFrame(2, Buffer.from('two'))]);
    const decoder = new FrameDecoder(64);
    const frames: Frame[] = [];
    for (const byte of stream) frames.push(...decoder.push(Buffer.from([byte])));

    assert.deepEqual(
      frames.map((f) => [f.connId, f.payload.toString()]),
      [
        [1, 'one'],
        [1, ''],
        [2, 'two'],
      ],
    );
    assert.equal(decoder.pendingBytes(), 0);
  });

  it('throws FRAME_TOO_LARGE as soon as the oversize header arrives', () => {
    const decoder = new FrameDecoder(4);
    const header = encodeFrame(1, Buffer.alloc(5)).subarray(0, FRAME_HEADER_BYTES);
    assert.throws(
      () => decoder.push(header),
      (err: unknown) => err instanceof ProtocolError && err.code === 'FRAME_TOO_LARGE',
    );
  });

  it('reports a partial frame at end of stream', () => {
    const decoder = new FrameDecoder(64);
    decoder.push(encodeFrame(3, Buffer.from('abc')).subarray(0, 9));
    assert.equal(decoder.pendingBytes(), 9);
    assert.throws(
      () => decoder.finish(),
      (err: unknown) => err instanceof ProtocolError && err.code === 'FRAME_TRUNCATED',
    );
  });

  it('hands out payloads that do not alias the input chunk', () => {
    const chunk = encodeFrame(1, Buffer.from('abc'));
    const [frame] = new FrameDecoder(64).push(chunk);
    chunk.fill(0);
    assert.equal(frame?.payload.toString(), 'abc');
  });
});

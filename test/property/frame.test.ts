import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import fc from 'fast-check';

import { ProtocolError } from '../../src/errors.js';
import { FrameDecoder, encodeFrame, type Frame } from '../../src/protocol/frame.js';

const FC_NUM_RUNS = process.env.FC_NUM_RUNS ? Number(process.env.FC_NUM_RUNS) : process.env.CI ? 200 : 500;
const FC_TIME_LIMIT_MS = process.env.CI ? 2_000 : 5_000;
const MAX_PAYLOAD = 256;

function chunkBuffer(buf: Buffer, chunkSizes: readonly number[]): Buffer[] {
  const chunks: Buffer[] = [];
  let offset = 0;
  for (const size of chunkSizes) {
    if (offset >= buf.length) break;
    const end = Math.min(buf.length, offset + Math.max(1, size));
    chunks.push(buf.subarray(offset, end));
    offset = end;
  }
  if (offset < buf.length) chunks.push(buf.subarray(offset));
  return chunks;
}

const frameArb = fc
  .tuple(fc.integer({ min: 0, max: 0xffffffff }), fc.uint8Array({ minLength: 0, maxLength: MAX_PAYLOAD }))
  .map(([connId, payload]) => ({ connId, payload: Buffer.from(payload) }));

describe('frame codec (property)', () => {
  it('arbitrary chunking decodes to the frames that were encoded', { timeout: 10_000 }, () => {
    fc.assert(
      fc.property(
        fc.array(frameArb, { maxLength: 20 }),
        fc.array(fc.integer({ min: 1, max: 64 }), { minLength: 1, maxLength: 30 }),
        (frames, chunkSizes) => {
          const encoded = Buffer.concat(frames.map((f) => encodeFrame(f.connId, f.payload)));
          const decoder = new FrameDecoder(MAX_PAYLOAD);
          const decoded: Frame[] = [];
          for (const chunk of chunkBuffer(encoded, chunkSizes)) decoded.push(...decoder.push(chunk));

          assert.equal(decoder.pendingBytes(), 0);
          assert.deepEqual(
            decoded.map((f) => [f.connId, f.payload]),
            frames.map((f) => [f.connId, f.payload]),
          );
        },
      ),
      { numRuns: FC_NUM_RUNS, interruptAfterTimeLimit: FC_TIME_LIMIT_MS },
    );
  });

  it('random bytes either decode, wait for more, or fail with a ProtocolError', { timeout: 10_000 }, () => {
    fc.assert(
      fc.property(fc.array(fc.uint8Array({ maxLength: 64 }), { minLength: 1, maxLength: 10 }), (chunks) => {
        const decoder = new FrameDecoder(MAX_PAYLOAD);
        let total = 0;
        try {
          for (const chunk of chunks) {
            total += chunk.length;
            decoder.push(Buffer.from(chunk));
            assert.ok(decoder.pendingBytes() <= total);
          }
        } catch (err) {
          assert.ok(err instanceof ProtocolError);
        }
      }),
      { numRuns: FC_NUM_RUNS, interruptAfterTimeLimit: FC_TIME_LIMIT_MS },
    );
  });
});

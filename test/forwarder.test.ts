import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ConnectionTable } from '../src/connectionTable.js';
import { startForwarder } from '../src/forwarder.js';
import { FrameDecoder, encodeCloseFrame, encodeFrame, type Frame } from '../src/protocol/frame.js';
import { memoryDuplexPair, silentLogger, waitFor, type MemoryDuplex } from './helpers.js';

type Harness = {
  table: ConnectionTable;
  /** The local application's end of the local connection. */
  app: MemoryDuplex;
  /** The peer's end of the transport stream. */
  remote: MemoryDuplex;
  localSide: MemoryDuplex;
  streamSide: MemoryDuplex;
  remoteFrames: Frame[];
  remoteEnded: () => boolean;
};

function setup(connId: number, maxFramePayloadBytes = 1024) {
  const table = new ConnectionTable();
  const [app, localSide] = memoryDuplexPair();
  const [streamSide, remote] = memoryDuplexPair();
  table.bind(connId, { streamId: 4, port: 80, socket: localSide, stream: streamSide });

  const remoteFrames: Frame[] = [];
  const decoder = new FrameDecoder(maxFramePayloadBytes);
  let ended = false;
  remote.on('data', (chunk: Buffer) => remoteFrames.push(...decoder.push(chunk)));
  remote.on('end', () => {
    ended = true;
  });

  const forwarder = startForwarder({
    connId,
    local: localSide,
    stream: streamSide,
    table,
    logger: silentLogger,
    maxFramePayloadBytes,
  });
  const harness: Harness = { table, app, remote, localSide, streamSide, remoteFrames, remoteEnded: () => ended };
  return { ...harness, forwarder };
}

function collect(stream: MemoryDuplex): { text: () => string; ended: () => boolean } {
  const chunks: Buffer[] = [];
  let ended = false;
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  stream.on('end', () => {
    ended = true;
  });
  return { text: () => Buffer.concat(chunks).toString(), ended: () => ended };
}

describe('startForwarder', () => {
  it('frames local bytes and unframes stream bytes', async () => {
    const h = setup(7);
    const appIn = collect(h.app);

    h.app.write('hello');
    h.remote.write(encodeFrame(7, Buffer.from('world')));

    await waitFor(() => h.remoteFrames.length === 1 && appIn.text() === 'world');
    assert.equal(h.remoteFrames[0]?.connId, 7);
    assert.equal(h.remoteFrames[0]?.payload.toString(), 'hello');
    h.forwarder.close('test_done');
  });

  it('splits large local chunks at the maximum payload size', async () => {
    const h = setup(3, 16);
    h.app.write(Buffer.alloc(40, 1));

    await waitFor(() => h.remoteFrames.length === 3);
    assert.deepEqual(
      h.remoteFrames.map((f) => f.payload.length),
      [16, 16, 8],
    );
    h.forwarder.close('test_done');
  });

  it('half-closes each direction and completes after both EOFs', async () => {
    const h = setup(7);
    const appIn = collect(h.app);

    h.app.write('ping');
    h.app.end();
    await waitFor(() => h.remoteEnded(), 3_000, 'stream end');
    assert.deepEqual(
      h.remoteFrames.map((f) => [f.connId, f.payload.toString()]),
      [
        [7, 'ping'],
        [7, ''],
      ],
    );

    // The other direction still flows after the local side finished sending.
    h.remote.write(encodeFrame(7, Buffer.from('pong')));
    h.remote.end(encodeCloseFrame(7));

    const summary = await h.forwarder.done;
    assert.deepEqual(summary, { connId: 7, bytesSent: 4, bytesReceived: 4, reason: 'eof' });
    await waitFor(() => appIn.ended(), 3_000, 'local end');
    assert.equal(appIn.text(), 'pong');
    assert.equal(h.table.lookup(7), undefined);
  });

  it('drops frames for unknown conn ids and keeps forwarding', async () => {
    const h = setup(7);
    const appIn = collect(h.app);

    h.remote.write(encodeFrame(99, Buffer.from('stale')));
    h.remote.write(encodeFrame(7, Buffer.from('fresh')));

    await waitFor(() => appIn.text() === 'fresh');
    assert.ok(h.table.lookup(7));
    h.forwarder.close('test_done');
  });

  it('aborts on a frame for another live connection', async () => {
    const h = setup(7);
    h.table.bind(8, { streamId: 8, port: 80, socket: h.app, stream: h.remote });

    h.remote.write(encodeFrame(8, Buffer.from('wrong')));

    const summary = await h.forwarder.done;
    assert.equal(summary.reason, 'protocol_error');
    assert.equal(h.localSide.destroyed, true);
    assert.equal(h.streamSide.destroyed, true);
    assert.equal(h.table.lookup(7), undefined);
    assert.ok(h.table.lookup(8));
  });

  it('aborts on an oversize frame header', async () => {
    const h = setup(7, 16);
    h.remote.write(encodeFrame(7, Buffer.alloc(17)));

    const summary = await h.forwarder.done;
    assert.equal(summary.reason, 'protocol_error');
    assert.equal(h.localSide.destroyed, true);
  });

  it('treats a stream ending inside a frame as a protocol error, not EOF', async () => {
    const h = setup(7);
    const appIn = collect(h.app);

    h.remote.write(encodeFrame(7, Buffer.from('whole')));
    h.remote.end(encodeFrame(7, Buffer.from('truncated')).subarray(0, 12));

    const summary = await h.forwarder.done;
    assert.equal(summary.reason, 'protocol_error');
    assert.equal(summary.bytesReceived, 5);
    assert.equal(h.localSide.destroyed, true);
    assert.equal(h.streamSide.destroyed, true);
    await waitFor(() => appIn.text() === 'whole', 3_000, 'complete frame delivered');
    assert.equal(appIn.ended(), false);
  });

  it('tears the local side down when the stream is reset', async () => {
    const h = setup(7);
    h.streamSide.destroy();

    const summary = await h.forwarder.done;
    assert.equal(summary.reason, 'stream_reset');
    assert.equal(h.localSide.destroyed, true);
    assert.equal(h.table.size, 0);
  });

  it('close() is idempotent and reports the first reason', async () => {
    const h = setup(7);
    h.forwarder.close('session_closed');
    h.forwarder.close('later');

    const summary = await h.forwarder.done;
    assert.equal(summary.reason, 'session_closed');
  });
});

import assert from 'node:assert/strict';
import net from 'node:net';
import { after, before, describe, it } from 'node:test';

import { TunnelClient } from '../src/client/tunnelClient.js';
import { AuthenticationError, TransportError } from '../src/errors.js';
import { buildRelayServer, type RelayServerBundle } from '../src/relay/server.js';
import type { TransportConnector } from '../src/transport/types.js';
import { connectWsTransport } from '../src/transport/wsStreamTransport.js';
import { closeServer, connectTcp, listen, readBytes, silentLogger, startEchoServer, stopEchoServer, waitFor } from './helpers.js';
import { makeClientTestConfig, makeRelayTestConfig } from './testConfig.js';

// Replies once to the first chunk, then closes its side.
async function startOneShotServer(): Promise<{ server: net.Server; port: number }> {
  const server = net.createServer((socket) => {
    socket.on('error', () => socket.destroy());
    socket.once('data', (chunk: Buffer) => {
      socket.end(Buffer.concat([Buffer.from('partial:'), chunk]));
    });
  });
  return { server, port: await listen(server) };
}

function patternBytes(length: number): Buffer {
  const buf = Buffer.alloc(length);
  for (let i = 0; i < length; i++) buf[i] = (i * 31 + 7) & 0xff;
  return buf;
}

describe('tunnel end to end', () => {
  let relay: RelayServerBundle;
  let relayPort = 0;
  let echo: Awaited<ReturnType<typeof startEchoServer>>;
  let oneShot: Awaited<ReturnType<typeof startOneShotServer>>;
  let client: TunnelClient;
  let clientRun: Promise<void>;

  async function publicPortFor(port: number): Promise<number> {
    let publicPort: number | undefined;
    await waitFor(
      () => {
        publicPort = relay.relay.activeSession?.publicPorts().get(port);
        return publicPort !== undefined;
      },
      3_000,
      `public listener for ${port}`,
    );
    if (publicPort === undefined) throw new Error(`no public listener for ${port}`);
    return publicPort;
  }

  before(async () => {
    relay = buildRelayServer(makeRelayTestConfig(), { publicPortFor: () => 0 });
    await relay.app.listen({ host: '127.0.0.1', port: 0 });
    const address = relay.app.server.address();
    if (!address || typeof address !== 'object') throw new Error('expected a TCP address');
    relayPort = address.port;

    echo = await startEchoServer();
    oneShot = await startOneShotServer();
    client = new TunnelClient({
      config: makeClientTestConfig({ RELAY_PORT: relayPort, PORTS: [echo.port, oneShot.port], STABLE_TIME_MS: 100 }),
      logger: silentLogger,
    });
    clientRun = client.run();
  });

  after(async () => {
    client.stop();
    await clientRun;
    relay.closeUpgradeSockets();
    await relay.app.close();
    await stopEchoServer(echo);
    await closeServer(oneShot.server);
  });

  it('carries bytes verbatim and in order between a public client and a local service', async () => {
    const publicPort = await publicPortFor(echo.port);
    assert.deepEqual(client.status().tunneledPorts, [echo.port, oneShot.port].sort((a, b) => a - b));

    const visitor = await connectTcp(publicPort);
    const payload = patternBytes(256 * 1024);
    visitor.write(payload);
    assert.deepEqual(await readBytes(visitor, payload.length), payload);
    assert.equal(client.status().connected, true);
    visitor.destroy();
  });

  it('passes the local service closing its socket on to the public client', async () => {
    const publicPort = await publicPortFor(oneShot.port);
    const visitor = await connectTcp(publicPort);
    const chunks: Buffer[] = [];
    visitor.on('data', (chunk: Buffer) => chunks.push(chunk));
    const ended = new Promise<void>((resolve) => visitor.once('end', () => resolve()));

    visitor.write('abc');
    await ended;
    assert.equal(Buffer.concat(chunks).toString(), 'partial:abc');
    visitor.destroy();
  });

  it('drops in-flight connections on session loss and re-registers after reconnecting', async () => {
    await publicPortFor(echo.port);
    const firstSession = relay.relay.activeSession;
    assert.ok(firstSession);

    const visitor = await connectTcp(await publicPortFor(echo.port));
    visitor.write('before');
    assert.equal((await readBytes(visitor, 6)).toString(), 'before');
    const visitorClosed = new Promise<void>((resolve) => visitor.once('close', () => resolve()));

    firstSession.close('connection_lost');
    await visitorClosed;

    await waitFor(
      () => relay.relay.activeSession !== null && relay.relay.activeSession !== firstSession,
      3_000,
      'reconnected session',
    );
    const publicPort = await publicPortFor(echo.port);
    const again = await connectTcp(publicPort);
    again.write('after');
    assert.equal((await readBytes(again, 5)).toString(), 'after');
    assert.equal(client.status().reconnectAttempts, 0);
    again.destroy();
  });
});

describe('tunnel with a stalled visitor', () => {
  let relay: RelayServerBundle;
  let echo: Awaited<ReturnType<typeof startEchoServer>>;
  let client: TunnelClient;
  let clientRun: Promise<void>;

  before(async () => {
    relay = buildRelayServer(makeRelayTestConfig({ HEARTBEAT_TIMEOUT_MS: 1_000 }), { publicPortFor: () => 0 });
    await relay.app.listen({ host: '127.0.0.1', port: 0 });
    const address = relay.app.server.address();
    if (!address || typeof address !== 'object') throw new Error('expected a TCP address');

    echo = await startEchoServer();
    client = new TunnelClient({
      config: makeClientTestConfig({
        RELAY_PORT: address.port,
        PORTS: [echo.port],
        HEARTBEAT_INTERVAL_MS: 200,
        HEARTBEAT_TIMEOUT_MS: 1_000,
      }),
      logger: silentLogger,
    });
    clientRun = client.run();
  });

  after(async () => {
    client.stop();
    await clientRun;
    relay.closeUpgradeSockets();
    await relay.app.close();
    await stopEchoServer(echo);
  });

  it('keeps the session and other visitors alive while one visitor stops reading', async () => {
    let publicPort: number | undefined;
    await waitFor(
      () => {
        publicPort = relay.relay.activeSession?.publicPorts().get(echo.port);
        return publicPort !== undefined;
      },
      3_000,
      'public listener',
    );
    if (publicPort === undefined) throw new Error('no public listener');
    const session = relay.relay.activeSession;
    assert.ok(session);

    const stalled = await connectTcp(publicPort);
    stalled.pause();
    stalled.write(patternBytes(32 * 1024 * 1024));

    const other = await connectTcp(publicPort);
    other.write('hello');
    assert.equal((await readBytes(other, 5)).toString(), 'hello');

    // Past both heartbeat timeouts, with the stalled echo still backed up.
    await new Promise<void>((resolve) => setTimeout(resolve, 1_500));
    assert.equal(relay.relay.activeSession, session);
    assert.equal(client.status().connected, true);
    other.write('again');
    assert.equal((await readBytes(other, 5)).toString(), 'again');

    stalled.destroy();
    other.destroy();
  });
});

describe('TunnelClient registration retry', () => {
  it('drops a port the relay keeps refusing and offers it again on a later scan', async () => {
    let publicPortCalls = 0;
    const relay = buildRelayServer(makeRelayTestConfig(), {
      publicPortFor: () => {
        publicPortCalls += 1;
        return publicPortCalls <= 2 ? null : 0;
      },
    });
    await relay.app.listen({ host: '127.0.0.1', port: 0 });
    const address = relay.app.server.address();
    if (!address || typeof address !== 'object') throw new Error('expected a TCP address');
    const echo = await startEchoServer();

    const client = new TunnelClient({
      config: makeClientTestConfig({ RELAY_PORT: address.port, PORTS: [echo.port], REGISTER_ATTEMPTS: 2 }),
      logger: silentLogger,
    });
    const run = client.run();
    try {
      await waitFor(
        () => relay.relay.activeSession?.publicPorts().get(echo.port) !== undefined,
        3_000,
        'public listener after retry',
      );
      assert.equal(publicPortCalls, 3);
      assert.deepEqual(client.status().tunneledPorts, [echo.port]);
    } finally {
      client.stop();
      await run;
      relay.closeUpgradeSockets();
      await relay.app.close();
      await stopEchoServer(echo);
    }
  });
});

describe('TunnelClient reconnect policy', () => {
  it('retries transport failures with backoff until the relay answers', async () => {
    const relay = buildRelayServer(makeRelayTestConfig(), { publicPortFor: () => 0 });
    await relay.app.listen({ host: '127.0.0.1', port: 0 });
    const address = relay.app.server.address();
    if (!address || typeof address !== 'object') throw new Error('expected a TCP address');

    let attempts = 0;
    const connector: TransportConnector = async (options) => {
      attempts += 1;
      if (attempts <= 2) throw new TransportError('tunnel handshake failed: connect ECONNREFUSED');
      return await connectWsTransport(options);
    };
    const client = new TunnelClient({
      config: makeClientTestConfig({ RELAY_PORT: address.port, PORTS: [1] }),
      logger: silentLogger,
      connector,
      probe: async () => false,
    });
    const run = client.run();
    try {
      await waitFor(() => client.status().connected, 3_000, 'connected');
      assert.equal(attempts, 3);
      assert.equal(client.status().reconnectAttempts, 0);
    } finally {
      client.stop();
      await run;
      await relay.app.close();
    }
  });

  it('gives up when the relay rejects the client', async () => {
    let attempts = 0;
    const client = new TunnelClient({
      config: makeClientTestConfig({ PORTS: [1] }),
      logger: silentLogger,
      connector: async () => {
        attempts += 1;
        throw new AuthenticationError('relay refused the tunnel (HTTP 401)');
      },
      probe: async () => false,
    });

    await assert.rejects(client.run(), (err: unknown) => {
      assert.ok(err instanceof AuthenticationError);
      assert.equal(err.message, 'relay refused the tunnel (HTTP 401)');
      return true;
    });
    assert.equal(attempts, 1);
    assert.equal(client.status().connected, false);
  });
});

import fastify, { type FastifyInstance } from 'fastify';
import fs from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type WebSocket } from 'ws';

import type { RelayConfig } from '../config.js';
import { setupMetrics, type RelayMetrics } from '../metrics.js';
import { STREAM_MUX_HEADER_BYTES, STREAM_MUX_SUBPROTOCOL } from '../protocol/streamMux.js';
import { TUNNEL_PATH, WsStreamConnection } from '../transport/wsStreamTransport.js';
import { destroyBestEffort } from '../util/socketSafe.js';
import { formatOneLineError } from '../util/text.js';
import { TunnelRelay } from './tunnelRelay.js';
import { parseOfferedSubprotocols, respondUpgradeHttp } from './upgradeHttp.js';

// Upper bound for one mux message: header plus the largest DATA piece the peer may send.
const MAX_WS_MESSAGE_BYTES = STREAM_MUX_HEADER_BYTES + 16 * 1024 * 1024;

export type RelayServerOverrides = {
  /** Maps a registered port to the public port to bind (0 = any free port). */
  publicPortFor?: (port: number) => number | null;
};

export type RelayServerBundle = {
  app: FastifyInstance;
  relay: TunnelRelay;
  metrics: RelayMetrics;
  markShuttingDown: () => void;
  closeUpgradeSockets: () => void;
};

function formatRemoteAddress(socket: Duplex & { remoteAddress?: string; remotePort?: number }): string | null {
  if (!socket.remoteAddress) return null;
  return `${socket.remoteAddress}:${socket.remotePort ?? 0}`;
}

export function buildRelayServer(config: RelayConfig, overrides: RelayServerOverrides = {}): RelayServerBundle {
  let shuttingDown = false;
  const upgradeSockets = new Set<Duplex>();

  const tlsOptions = config.TLS_ENABLED
    ? { cert: fs.readFileSync(config.TLS_CERT_PATH), key: fs.readFileSync(config.TLS_KEY_PATH) }
    : null;

  const app = fastify({
    logger: { level: config.LOG_LEVEL },
    serverFactory: (handler) => (tlsOptions ? https.createServer(tlsOptions, handler) : http.createServer(handler)),
  });

  const metrics = setupMetrics(app);
  const relay = new TunnelRelay({
    logger: app.log,
    publicHost: config.PUBLIC_HOST,
    publicPortOffset: config.PUBLIC_PORT_OFFSET,
    ackTimeoutMs: config.ACK_TIMEOUT_MS,
    heartbeatTimeoutMs: config.HEARTBEAT_TIMEOUT_MS,
    maxFramePayloadBytes: config.MAX_FRAME_PAYLOAD_BYTES,
    metrics,
    publicPortFor: overrides.publicPortFor,
  });

  const wss = new WebSocketServer({
    noServer: true,
    maxPayload: MAX_WS_MESSAGE_BYTES,
    perMessageDeflate: false,
    handleProtocols: (protocols: Set<string>) => (protocols.has(STREAM_MUX_SUBPROTOCOL) ? STREAM_MUX_SUBPROTOCOL : false),
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (_request, reply) => {
    if (shuttingDown) return reply.code(503).send({ ok: false });
    return { ok: true, connected: relay.activeSession !== null };
  });

  // The tunnel upgrade is routed at the Node HTTP server layer; fastify has no upgrade routes.
  app.server.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    upgradeSockets.add(socket);
    socket.once('close', () => upgradeSockets.delete(socket));

    try {
      if (shuttingDown) {
        respondUpgradeHttp(socket, 503, 'Shutting down');
        return;
      }

      let pathname: string;
      try {
        pathname = new URL(req.url ?? '', 'http://localhost').pathname;
      } catch {
        respondUpgradeHttp(socket, 400, 'Invalid request URL');
        return;
      }
      if (pathname !== TUNNEL_PATH) {
        respondUpgradeHttp(socket, 404, 'Not Found');
        return;
      }
      if (!parseOfferedSubprotocols(req.headers['sec-websocket-protocol']).includes(STREAM_MUX_SUBPROTOCOL)) {
        respondUpgradeHttp(socket, 400, `Missing required subprotocol: ${STREAM_MUX_SUBPROTOCOL}`);
        return;
      }

      const remoteAddress = formatRemoteAddress(req.socket);
      wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
        upgradeSockets.delete(socket);
        const connection = new WsStreamConnection(ws, 'server', remoteAddress);
        relay.accept(connection, remoteAddress);
      });
    } catch (err) {
      app.log.error({ err: formatOneLineError(err, 512) }, 'upgrade_unexpected_error');
      if (socket.destroyed) return;
      respondUpgradeHttp(socket, 500, 'WebSocket upgrade failed');
    }
  });

  // Upgraded sockets would hold up the HTTP server's close, so sessions go first.
  app.addHook('preClose', async () => {
    relay.close();
    for (const client of wss.clients) client.terminate();
    wss.close();
  });

  return {
    app,
    relay,
    metrics,
    markShuttingDown: () => {
      shuttingDown = true;
    },
    closeUpgradeSockets: () => {
      for (const socket of upgradeSockets) destroyBestEffort(socket);
      upgradeSockets.clear();
    },
  };
}

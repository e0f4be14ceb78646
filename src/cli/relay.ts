#!/usr/bin/env node
import { loadRelayConfig, type RelayConfig } from '../config.js';
import { buildRelayServer } from '../relay/server.js';
import { formatOneLineError } from '../util/text.js';
import { unrefBestEffort } from '../util/unrefSafe.js';
import { formatUsage, parseArgs, type FlagTable } from './args.js';

const RELAY_FLAGS: FlagTable = {
  host: { env: 'HOST', help: 'Tunnel listen address' },
  port: { env: 'PORT', help: 'Tunnel listen port' },
  'public-host': { env: 'PUBLIC_HOST', help: 'Bind address for public listeners' },
  'public-port-offset': { env: 'PUBLIC_PORT_OFFSET', help: 'Public port = registered port + offset' },
  tls: { env: 'TLS_ENABLED', boolean: true, help: 'Serve the tunnel over TLS' },
  cert: { env: 'TLS_CERT_PATH', help: 'PEM certificate' },
  key: { env: 'TLS_KEY_PATH', help: 'PEM private key' },
  'ack-timeout-ms': { env: 'ACK_TIMEOUT_MS', help: 'Wait for the client to accept a connection' },
  'heartbeat-timeout-ms': { env: 'HEARTBEAT_TIMEOUT_MS', help: 'Drop a silent client after this long' },
  'max-frame-bytes': { env: 'MAX_FRAME_PAYLOAD_BYTES', help: 'Largest accepted frame payload' },
  'log-level': { env: 'LOG_LEVEL', help: 'fatal|error|warn|info|debug|trace|silent' },
};

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), RELAY_FLAGS);
  if (args.kind === 'help') {
    console.log(formatUsage('tunnelmux-relay', RELAY_FLAGS));
    return;
  }
  if (args.kind === 'error') {
    console.error(`${args.message}\n\n${formatUsage('tunnelmux-relay', RELAY_FLAGS)}`);
    process.exitCode = 1;
    return;
  }

  let config: RelayConfig;
  try {
    config = loadRelayConfig({ ...process.env, ...args.env });
  } catch (err) {
    console.error(err instanceof Error ? err.message : formatOneLineError(err, 512));
    process.exitCode = 1;
    return;
  }

  const { app, markShuttingDown, closeUpgradeSockets } = buildRelayServer(config);
  let forceExitTimer: NodeJS.Timeout | null = null;

  async function shutdown(signal: string): Promise<void> {
    markShuttingDown();
    app.log.info({ signal }, 'shutdown_requested');

    forceExitTimer = setTimeout(() => {
      app.log.error({ graceMs: config.SHUTDOWN_GRACE_MS }, 'shutdown_timed_out');
      process.exit(1);
    }, config.SHUTDOWN_GRACE_MS);
    unrefBestEffort(forceExitTimer);

    try {
      const closePromise = app.close();
      closeUpgradeSockets();
      await closePromise;
      process.exit(0);
    } catch (err) {
      app.log.error({ err: formatOneLineError(err, 512) }, 'shutdown_failed');
      process.exit(1);
    }
  }

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ host: config.HOST, port: config.PORT });
  app.log.info(
    {
      host: config.HOST,
      port: config.PORT,
      scheme: config.TLS_ENABLED ? 'wss' : 'ws',
      publicHost: config.PUBLIC_HOST,
      publicPortOffset: config.PUBLIC_PORT_OFFSET,
    },
    'relay_listening',
  );

  process.once('exit', () => {
    if (forceExitTimer) clearTimeout(forceExitTimer);
  });
}

main().catch((err: unknown) => {
  console.error(formatOneLineError(err, 512));
  process.exitCode = 1;
});

#!/usr/bin/env node
import { TunnelClient } from '../client/tunnelClient.js';
import { loadClientConfig, type ClientConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { formatOneLineError } from '../util/text.js';
import { formatUsage, parseArgs, type FlagTable } from './args.js';

const CLIENT_FLAGS: FlagTable = {
  'relay-host': { env: 'RELAY_HOST', help: 'Relay address (required)' },
  'relay-port': { env: 'RELAY_PORT', help: 'Relay tunnel port' },
  tls: { env: 'RELAY_TLS', boolean: true, help: 'Connect to the relay over TLS' },
  ca: { env: 'TLS_CA_PATH', help: 'Extra trusted CA certificate (PEM)' },
  servername: { env: 'TLS_SERVERNAME', help: 'Certificate name to verify' },
  'target-host': { env: 'TARGET_HOST', help: 'Host whose services are tunneled' },
  ports: { env: 'PORTS', help: 'Comma-separated ports to watch (default: all)' },
  'exclude-ports': { env: 'EXCLUDE_PORTS', help: 'Comma-separated ports never tunneled' },
  'scan-interval': { env: 'SCAN_INTERVAL_SECONDS', help: 'Seconds between scans' },
  'stable-time': { env: 'STABLE_TIME_SECONDS', help: 'Seconds a port must stay up before it is tunneled' },
  grace: { env: 'GRACE_SECONDS', help: 'Seconds a tunneled port may be missing' },
  workers: { env: 'WORKERS', help: 'Concurrent probes' },
  'probe-timeout-ms': { env: 'PROBE_TIMEOUT_MS', help: 'Probe connect timeout' },
  lazy: { env: 'LAZY_SCAN', boolean: true, help: 'Scan the port range in slices' },
  'lazy-batch': { env: 'LAZY_BATCH_SIZE', help: 'Ports per lazy slice' },
  'full-scan-interval': { env: 'FULL_SCAN_INTERVAL_SECONDS', help: 'Seconds between full sweeps in lazy mode' },
  'pool-size': { env: 'POOL_SIZE', help: 'Warm connections per tunneled port' },
  'dial-timeout-ms': { env: 'DIAL_TIMEOUT_MS', help: 'Local dial timeout' },
  'log-level': { env: 'LOG_LEVEL', help: 'fatal|error|warn|info|debug|trace|silent' },
};

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), CLIENT_FLAGS);
  if (args.kind === 'help') {
    console.log(formatUsage('tunnelmux-client', CLIENT_FLAGS));
    return;
  }
  if (args.kind === 'error') {
    console.error(`${args.message}\n\n${formatUsage('tunnelmux-client', CLIENT_FLAGS)}`);
    process.exitCode = 1;
    return;
  }

  let config: ClientConfig;
  try {
    config = loadClientConfig({ ...process.env, ...args.env });
  } catch (err) {
    console.error(err instanceof Error ? err.message : formatOneLineError(err, 512));
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(config.LOG_LEVEL, 'tunnelmux-client');
  const client = new TunnelClient({ config, logger });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutdown_requested');
    client.stop();
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  logger.info(
    {
      relay: `${config.RELAY_HOST}:${config.RELAY_PORT}`,
      tls: config.RELAY_TLS,
      targetHost: config.TARGET_HOST,
      ports: config.PORTS.length > 0 ? config.PORTS : 'all',
      lazy: config.LAZY_SCAN,
    },
    'client_starting',
  );
  await client.run();
}

main().catch((err: unknown) => {
  console.error(formatOneLineError(err, 512));
  process.exitCode = 1;
});

import type { FastifyInstance } from 'fastify';
import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export type RelayMetrics = Readonly<{
  registry: Registry;
  sessionsActive: Gauge<string>;
  registeredPorts: Gauge<string>;
  logicalConnectionsActive: Gauge<string>;
  logicalConnectionsTotal: Counter<string>;
  bytesTotal: Counter<'direction'>;
  protocolErrorsTotal: Counter<string>;
}>;

export function createRelayMetrics(): RelayMetrics {
  // One registry per server so several relays can live in one process.
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  return {
    registry,
    sessionsActive: new Gauge({
      name: 'tunnel_sessions_active',
      help: 'Client tunnel sessions currently connected',
      registers: [registry],
    }),
    registeredPorts: new Gauge({
      name: 'tunnel_registered_ports',
      help: 'Ports with an open public listener',
      registers: [registry],
    }),
    logicalConnectionsActive: new Gauge({
      name: 'tunnel_logical_connections_active',
      help: 'Public connections currently forwarded through the tunnel',
      registers: [registry],
    }),
    logicalConnectionsTotal: new Counter({
      name: 'tunnel_logical_connections_total',
      help: 'Public connections accepted by the relay',
      registers: [registry],
    }),
    bytesTotal: new Counter({
      name: 'tunnel_bytes_total',
      help: 'Payload bytes forwarded by the relay',
      labelNames: ['direction'] as const,
      registers: [registry],
    }),
    protocolErrorsTotal: new Counter({
      name: 'tunnel_protocol_errors_total',
      help: 'Control or framing violations seen by the relay',
      registers: [registry],
    }),
  };
}

export function setupMetrics(app: FastifyInstance): RelayMetrics {
  const metrics = createRelayMetrics();

  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  return metrics;
}

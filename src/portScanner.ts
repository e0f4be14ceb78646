import net from 'node:net';

import { destroyBestEffort } from './util/socketSafe.js';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export type ProbeFn = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

/** TCP connect probe: true when something accepts a connection on `host:port`. */
export function probePort(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    let settled = false;
    const socket = net.createConnection({ host, port });

    const settle = (open: boolean) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      destroyBestEffort(socket);
      resolve(open);
    };

    const timer = setTimeout(() => settle(false), timeoutMs);
    socket.once('connect', () => settle(true));
    socket.once('error', () => settle(false));
  });
}

export type ScanOptions = {
  /** Maximum probes in flight. */
  workers: number;
  timeoutMs: number;
  probe?: ProbeFn;
};

/** Probes `ports` with bounded concurrency and returns the open ones in ascending order. */
export async function scanPorts(host: string, ports: readonly number[], opts: ScanOptions): Promise<number[]> {
  const probe = opts.probe ?? probePort;
  const open: number[] = [];
  let next = 0;

  const worker = async () => {
    while (next < ports.length) {
      const port = ports[next];
      next += 1;
      if (port === undefined) continue;
      if (await probe(host, port, opts.timeoutMs)) open.push(port);
    }
  };

  const workerCount = Math.max(1, Math.min(opts.workers, ports.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return open.sort((a, b) => a - b);
}

export type ScanPlan = Readonly<{
  kind: 'list' | 'full' | 'incremental';
  ports: readonly number[];
  /** Whether this cycle looked at `port`; ports outside the plan are neither seen nor missed. */
  covers(port: number): boolean;
}>;

export type ScanPlannerOptions = {
  /** Explicit ports; empty means the whole range. */
  ports: readonly number[];
  excludePorts: readonly number[];
  lazy: boolean;
  lazyBatchSize: number;
  /** Full sweep cadence in lazy mode; 0 disables it. */
  fullScanIntervalMs: number;
};

function range(start: number, endInclusive: number, exclude: ReadonlySet<number>): number[] {
  const out: number[] = [];
  for (let port = start; port <= endInclusive; port++) {
    if (!exclude.has(port)) out.push(port);
  }
  return out;
}

/**
 * Chooses which ports each scan cycle probes. Lazy mode walks the port space in slices,
 * round-robin, with an occasional full sweep.
 */
export class ScanPlanner {
  private readonly exclude: ReadonlySet<number>;
  private readonly listPlan: ScanPlan | null;
  private cursor = MIN_PORT;
  private lastFullScanAt: number | null = null;

  constructor(private readonly opts: ScanPlannerOptions) {
    this.exclude = new Set(opts.excludePorts);
    if (opts.ports.length > 0) {
      const ports = [...new Set(opts.ports)].filter((p) => !this.exclude.has(p)).sort((a, b) => a - b);
      const members = new Set(ports);
      this.listPlan = { kind: 'list', ports, covers: (port) => members.has(port) };
    } else {
      this.listPlan = null;
    }
  }

  next(now: number): ScanPlan {
    if (this.listPlan) return this.listPlan;

    if (!this.opts.lazy) return this.fullPlan();

    if (this.lastFullScanAt === null) this.lastFullScanAt = now;
    const interval = this.opts.fullScanIntervalMs;
    if (interval > 0 && now - this.lastFullScanAt >= interval) {
      this.lastFullScanAt = now;
      return this.fullPlan();
    }

    const start = this.cursor;
    const end = Math.min(MAX_PORT, start + Math.max(1, this.opts.lazyBatchSize) - 1);
    this.cursor = end >= MAX_PORT ? MIN_PORT : end + 1;
    const exclude = this.exclude;
    return {
      kind: 'incremental',
      ports: range(start, end, exclude),
      covers: (port) => port >= start && port <= end && !exclude.has(port),
    };
  }

  private fullPlan(): ScanPlan {
    const exclude = this.exclude;
    return {
      kind: 'full',
      ports: range(MIN_PORT, MAX_PORT, exclude),
      covers: (port) => port >= MIN_PORT && port <= MAX_PORT && !exclude.has(port),
    };
  }
}

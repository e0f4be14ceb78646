import type { Logger } from './logger.js';

export type PortState = 'seen' | 'stable' | 'tunneled';

export type RegisteredPort = Readonly<{
  port: number;
  state: PortState;
  firstSeen: number;
  lastSeen: number;
  stableSince: number | null;
}>;

type PortEntry = {
  port: number;
  state: PortState;
  firstSeen: number;
  lastSeen: number;
  stableSince: number | null;
};

export type PortLifecycleOptions = {
  stableTimeMs: number;
  graceMs: number;
  onRegister: (port: number) => void;
  onDeregister: (port: number) => void;
  logger: Logger;
};

/**
 * Debounces discovered local listeners. A port is tunneled only after it has been observed
 * continuously for `stableTimeMs`, and deregistered after `graceMs` without being observed.
 * Unseen ports have no entry.
 */
export class PortLifecycleManager {
  private readonly entries = new Map<number, PortEntry>();

  constructor(private readonly opts: PortLifecycleOptions) {}

  /**
   * Applies one scan result. `covers` tells which ports the scan looked at; only those can be
   * counted as missing.
   */
  observe(activePorts: Iterable<number>, covers: (port: number) => boolean, now: number): void {
    const active = new Set<number>();
    for (const port of activePorts) {
      if (covers(port)) active.add(port);
    }

    for (const port of active) {
      let entry = this.entries.get(port);
      if (!entry) {
        entry = { port, state: 'seen', firstSeen: now, lastSeen: now, stableSince: null };
        this.entries.set(port, entry);
        this.opts.logger.debug({ port }, 'port_seen');
      } else {
        entry.lastSeen = now;
      }

      if (entry.state === 'seen' && now - entry.firstSeen >= this.opts.stableTimeMs) {
        entry.state = 'stable';
        entry.stableSince = now;
      }
      if (entry.state === 'stable') {
        entry.state = 'tunneled';
        this.opts.logger.info({ port, firstSeen: entry.firstSeen }, 'port_tunneled');
        this.opts.onRegister(port);
      }
    }

    for (const entry of [...this.entries.values()]) {
      if (active.has(entry.port) || !covers(entry.port)) continue;

      if (entry.state !== 'tunneled') {
        // Flapped before becoming stable: forget it without telling the relay.
        this.entries.delete(entry.port);
        this.opts.logger.debug({ port: entry.port }, 'port_flapped');
        continue;
      }

      if (now - entry.lastSeen >= this.opts.graceMs) {
        this.entries.delete(entry.port);
        this.opts.logger.info({ port: entry.port, lastSeen: entry.lastSeen }, 'port_untunneled');
        this.opts.onDeregister(entry.port);
      }
    }
  }

  /** Drops a port without calling `onDeregister`; it starts over as unseen. */
  forget(port: number): boolean {
    if (!this.entries.delete(port)) return false;
    this.opts.logger.info({ port }, 'port_forgotten');
    return true;
  }

  stateOf(port: number): PortState | 'unseen' {
    return this.entries.get(port)?.state ?? 'unseen';
  }

  tunneledPorts(): number[] {
    const ports: number[] = [];
    for (const entry of this.entries.values()) {
      if (entry.state === 'tunneled') ports.push(entry.port);
    }
    return ports.sort((a, b) => a - b);
  }

  snapshot(): RegisteredPort[] {
    return [...this.entries.values()].map((entry) => ({ ...entry })).sort((a, b) => a.port - b.port);
  }
}

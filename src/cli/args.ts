import type { Env } from '../config.js';

export type FlagSpec = Readonly<{
  env: string;
  /** Boolean flags take no value and set the env key to "1". */
  boolean?: boolean;
  help: string;
}>;

export type FlagTable = Readonly<Record<string, FlagSpec>>;

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'ok'; env: Env }
  | { kind: 'error'; message: string };

/**
 * Maps `--flag value` / `--flag=value` / `--bool` arguments onto environment keys, so flags and
 * env vars go through the same validation.
 */
export function parseArgs(argv: readonly string[], flags: FlagTable): ParsedArgs {
  const env: Env = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') return { kind: 'help' };
    if (!arg.startsWith('--')) return { kind: 'error', message: `Unexpected argument: ${arg}` };

    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const flagSpec = flags[name];
    if (!flagSpec) return { kind: 'error', message: `Unknown flag: --${name}` };

    if (flagSpec.boolean) {
      env[flagSpec.env] = eq >= 0 ? arg.slice(eq + 1) : '1';
      continue;
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined || value.startsWith('--')) {
      return { kind: 'error', message: `Missing value for --${name}` };
    }
    env[flagSpec.env] = value;
  }
  return { kind: 'ok', env };
}

export function formatUsage(command: string, flags: FlagTable): string {
  const rows = Object.entries(flags).map(([name, flagSpec]) => {
    const left = flagSpec.boolean ? `--${name}` : `--${name} <value>`;
    return `  ${left.padEnd(32)}${flagSpec.help} (env ${flagSpec.env})`;
  });
  return [`Usage:`, `  ${command} [options]`, '', 'Options:', ...rows, `  ${'--help'.padEnd(32)}Show this help`].join(
    '\n',
  );
}

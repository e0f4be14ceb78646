import fs from 'node:fs';
import { z } from 'zod';

import { logLevels, type LogLevel } from './logger.js';
import { DEFAULT_MAX_FRAME_PAYLOAD_BYTES } from './protocol/frame.js';
import { splitCommaList } from './util/list.js';
import { formatOneLineUtf8 } from './util/text.js';

export type RelayConfig = Readonly<{
  HOST: string;
  PORT: number;
  PUBLIC_HOST: string;
  PUBLIC_PORT_OFFSET: number;
  LOG_LEVEL: LogLevel;
  SHUTDOWN_GRACE_MS: number;

  TLS_ENABLED: boolean;
  TLS_CERT_PATH: string;
  TLS_KEY_PATH: string;

  ACK_TIMEOUT_MS: number;
  HEARTBEAT_TIMEOUT_MS: number;
  MAX_FRAME_PAYLOAD_BYTES: number;
}>;

export type ClientConfig = Readonly<{
  RELAY_HOST: string;
  RELAY_PORT: number;
  RELAY_TLS: boolean;
  TLS_CA_PATH: string;
  TLS_SERVERNAME: string;
  TLS_REJECT_UNAUTHORIZED: boolean;
  LOG_LEVEL: LogLevel;

  TARGET_HOST: string;
  PORTS: number[];
  EXCLUDE_PORTS: number[];
  SCAN_INTERVAL_MS: number;
  STABLE_TIME_MS: number;
  GRACE_MS: number;
  WORKERS: number;
  PROBE_TIMEOUT_MS: number;
  LAZY_SCAN: boolean;
  LAZY_BATCH_SIZE: number;
  FULL_SCAN_INTERVAL_MS: number;

  POOL_SIZE: number;
  POOL_MAX_IDLE_MS: number;
  DIAL_TIMEOUT_MS: number;

  HANDSHAKE_TIMEOUT_MS: number;
  HEARTBEAT_INTERVAL_MS: number;
  HEARTBEAT_TIMEOUT_MS: number;
  ACK_TIMEOUT_MS: number;
  REGISTER_ATTEMPTS: number;
  RECONNECT_BASE_MS: number;
  RECONNECT_MAX_MS: number;
  MAX_FRAME_PAYLOAD_BYTES: number;
}>;

export type Env = Record<string, string | undefined>;

function formatForError(value: string, maxLen = 128): string {
  if (maxLen <= 0) return `(${value.length} chars)`;
  if (value.length <= maxLen) return value;
  return `${value.slice(0, maxLen)}…(${value.length} chars)`;
}

const MAX_ENV_INT_LEN = 64;
const MAX_ENV_ERROR_MESSAGE_BYTES = 256;

function splitCommaListPorts(value: string, envName: string): number[] {
  if (value.trim() === '') return [];
  let entries: string[];
  try {
    entries = splitCommaList(value, { maxLen: 512 * 1024, maxItems: 65535 });
  } catch (err) {
    const msg = formatOneLineUtf8(err instanceof Error ? err.message : err, MAX_ENV_ERROR_MESSAGE_BYTES) || 'Error';
    throw new Error(`Invalid ${envName}: ${msg}`);
  }

  const ports: number[] = [];
  for (const raw of entries) {
    if (raw.length > MAX_ENV_INT_LEN) {
      throw new Error(`Invalid ${envName} entry (too long)`);
    }
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 1 || n > 65535) {
      throw new Error(`Invalid ${envName} entry: ${formatForError(raw)}`);
    }
    ports.push(n);
  }
  return ports;
}

function assertReadableFile(filePath: string, envName: string): void {
  let isFile: boolean;
  try {
    isFile = fs.statSync(filePath).isFile();
  } catch {
    throw new Error(`${envName} does not exist: ${formatForError(filePath)}`);
  }
  if (!isFile) {
    throw new Error(`${envName} must point to a file: ${formatForError(filePath)}`);
  }
}

const flag = z.enum(['0', '1']).optional().default('0');
const flagOn = z.enum(['0', '1']).optional().default('1');
const maxFramePayloadBytes = z.coerce
  .number()
  .int()
  .min(1)
  .max(16 * 1024 * 1024)
  .default(DEFAULT_MAX_FRAME_PAYLOAD_BYTES);

const relayEnvSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(7000),
  PUBLIC_HOST: z.string().min(1).default('0.0.0.0'),
  PUBLIC_PORT_OFFSET: z.coerce.number().int().min(-65534).max(65534).default(0),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(10_000),

  TLS_ENABLED: flag,
  TLS_CERT_PATH: z.string().optional().default(''),
  TLS_KEY_PATH: z.string().optional().default(''),

  ACK_TIMEOUT_MS: z.coerce.number().int().min(1).default(5_000),
  HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  MAX_FRAME_PAYLOAD_BYTES: maxFramePayloadBytes,
});

export function loadRelayConfig(env: Env = process.env): RelayConfig {
  const parsed = relayEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  const tlsEnabled = raw.TLS_ENABLED === '1';
  const tlsCertPath = raw.TLS_CERT_PATH.trim();
  const tlsKeyPath = raw.TLS_KEY_PATH.trim();

  if (tlsEnabled) {
    if (!tlsCertPath) {
      throw new Error('TLS_CERT_PATH is required when TLS_ENABLED=1');
    }
    if (!tlsKeyPath) {
      throw new Error('TLS_KEY_PATH is required when TLS_ENABLED=1');
    }

    assertReadableFile(tlsCertPath, 'TLS_CERT_PATH');
    assertReadableFile(tlsKeyPath, 'TLS_KEY_PATH');
  }

  return {
    HOST: raw.HOST,
    PORT: raw.PORT,
    PUBLIC_HOST: raw.PUBLIC_HOST,
    PUBLIC_PORT_OFFSET: raw.PUBLIC_PORT_OFFSET,
    LOG_LEVEL: raw.LOG_LEVEL,
    SHUTDOWN_GRACE_MS: raw.SHUTDOWN_GRACE_MS,

    TLS_ENABLED: tlsEnabled,
    TLS_CERT_PATH: tlsCertPath,
    TLS_KEY_PATH: tlsKeyPath,

    ACK_TIMEOUT_MS: raw.ACK_TIMEOUT_MS,
    HEARTBEAT_TIMEOUT_MS: raw.HEARTBEAT_TIMEOUT_MS,
    MAX_FRAME_PAYLOAD_BYTES: raw.MAX_FRAME_PAYLOAD_BYTES,
  };
}

const clientEnvSchema = z.object({
  RELAY_HOST: z.string().trim().min(1, 'RELAY_HOST is required'),
  RELAY_PORT: z.coerce.number().int().min(1).max(65535).default(7000),
  RELAY_TLS: flag,
  TLS_CA_PATH: z.string().optional().default(''),
  TLS_SERVERNAME: z.string().optional().default(''),
  TLS_REJECT_UNAUTHORIZED: flagOn,
  LOG_LEVEL: z.enum(logLevels).default('info'),

  TARGET_HOST: z.string().min(1).default('127.0.0.1'),
  PORTS: z.string().optional().default(''),
  EXCLUDE_PORTS: z.string().optional().default(''),
  SCAN_INTERVAL_SECONDS: z.coerce.number().positive().default(30),
  STABLE_TIME_SECONDS: z.coerce.number().min(0).default(10),
  GRACE_SECONDS: z.coerce.number().min(0).default(60),
  WORKERS: z.coerce.number().int().min(1).max(10_000).default(200),
  PROBE_TIMEOUT_MS: z.coerce.number().int().min(1).default(300),
  LAZY_SCAN: flag,
  LAZY_BATCH_SIZE: z.coerce.number().int().min(1).max(65535).default(20_000),
  FULL_SCAN_INTERVAL_SECONDS: z.coerce.number().min(0).default(600),

  POOL_SIZE: z.coerce.number().int().min(0).max(1024).default(5),
  POOL_MAX_IDLE_MS: z.coerce.number().int().min(1).default(60_000),
  DIAL_TIMEOUT_MS: z.coerce.number().int().min(1).default(5_000),

  HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().min(1).default(5_000),
  HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().min(1).default(20_000),
  ACK_TIMEOUT_MS: z.coerce.number().int().min(1).default(5_000),
  REGISTER_ATTEMPTS: z.coerce.number().int().min(1).max(100).default(5),
  RECONNECT_BASE_MS: z.coerce.number().int().min(0).default(500),
  RECONNECT_MAX_MS: z.coerce.number().int().min(1).default(30_000),
  MAX_FRAME_PAYLOAD_BYTES: maxFramePayloadBytes,
});

export function loadClientConfig(env: Env = process.env): ClientConfig {
  const parsed = clientEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  const caPath = raw.TLS_CA_PATH.trim();
  if (caPath) assertReadableFile(caPath, 'TLS_CA_PATH');

  if (raw.RECONNECT_MAX_MS < raw.RECONNECT_BASE_MS) {
    throw new Error('RECONNECT_MAX_MS must be >= RECONNECT_BASE_MS');
  }
  if (raw.HEARTBEAT_TIMEOUT_MS <= raw.HEARTBEAT_INTERVAL_MS) {
    throw new Error('HEARTBEAT_TIMEOUT_MS must be greater than HEARTBEAT_INTERVAL_MS');
  }

  return {
    RELAY_HOST: raw.RELAY_HOST,
    RELAY_PORT: raw.RELAY_PORT,
    RELAY_TLS: raw.RELAY_TLS === '1',
    TLS_CA_PATH: caPath,
    TLS_SERVERNAME: raw.TLS_SERVERNAME.trim(),
    TLS_REJECT_UNAUTHORIZED: raw.TLS_REJECT_UNAUTHORIZED === '1',
    LOG_LEVEL: raw.LOG_LEVEL,

    TARGET_HOST: raw.TARGET_HOST,
    PORTS: splitCommaListPorts(raw.PORTS, 'PORTS'),
    EXCLUDE_PORTS: splitCommaListPorts(raw.EXCLUDE_PORTS, 'EXCLUDE_PORTS'),
    SCAN_INTERVAL_MS: Math.round(raw.SCAN_INTERVAL_SECONDS * 1000),
    STABLE_TIME_MS: Math.round(raw.STABLE_TIME_SECONDS * 1000),
    GRACE_MS: Math.round(raw.GRACE_SECONDS * 1000),
    WORKERS: raw.WORKERS,
    PROBE_TIMEOUT_MS: raw.PROBE_TIMEOUT_MS,
    LAZY_SCAN: raw.LAZY_SCAN === '1',
    LAZY_BATCH_SIZE: raw.LAZY_BATCH_SIZE,
    FULL_SCAN_INTERVAL_MS: Math.round(raw.FULL_SCAN_INTERVAL_SECONDS * 1000),

    POOL_SIZE: raw.POOL_SIZE,
    POOL_MAX_IDLE_MS: raw.POOL_MAX_IDLE_MS,
    DIAL_TIMEOUT_MS: raw.DIAL_TIMEOUT_MS,

    HANDSHAKE_TIMEOUT_MS: raw.HANDSHAKE_TIMEOUT_MS,
    HEARTBEAT_INTERVAL_MS: raw.HEARTBEAT_INTERVAL_MS,
    HEARTBEAT_TIMEOUT_MS: raw.HEARTBEAT_TIMEOUT_MS,
    ACK_TIMEOUT_MS: raw.ACK_TIMEOUT_MS,
    REGISTER_ATTEMPTS: raw.REGISTER_ATTEMPTS,
    RECONNECT_BASE_MS: raw.RECONNECT_BASE_MS,
    RECONNECT_MAX_MS: raw.RECONNECT_MAX_MS,
    MAX_FRAME_PAYLOAD_BYTES: raw.MAX_FRAME_PAYLOAD_BYTES,
  };
}

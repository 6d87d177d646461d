import * as path from 'node:path';
import { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE, MAX_FRAME_BYTES } from '@edgepull/protocol';

/** Whether one agent may run several transfers at once */
export type ConcurrencyPolicy = 'allow' | 'deny';

export const CONCURRENCY_POLICIES: readonly ConcurrencyPolicy[] = ['allow', 'deny'] as const;

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  corsOrigin: string | string[] | boolean;
  /** Directory that receives transferred artifacts */
  downloadDir: string;
  /** Maximum payload bytes per chunk requested from agents */
  chunkSize: number;
  /** A dispatched or running transfer fails after this long without a chunk */
  transferInactivityTimeoutMs: number;
  transferConcurrency: ConcurrencyPolicy;
  wsHeartbeatInterval: number;
  wsPingTimeout: number;
  /** Largest inbound WebSocket frame in bytes */
  wsMaxPayload: number;
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function isConcurrencyPolicy(value: string): value is ConcurrencyPolicy {
  return CONCURRENCY_POLICIES.some((policy) => policy === value);
}

/**
 * Build the server configuration from environment variables.
 *
 * Environment variables:
 * - PORT, HOST: listen address (default 8080, 0.0.0.0)
 * - NODE_ENV, LOG_LEVEL
 * - CORS_ORIGIN: '*' or a comma-separated list
 * - DOWNLOAD_DIR: artifact directory (default ./downloads)
 * - CHUNK_SIZE: bytes per chunk (default 1 MiB)
 * - TRANSFER_INACTIVITY_TIMEOUT_MS: default 30000
 * - TRANSFER_CONCURRENCY: allow | deny (default allow)
 * - WS_HEARTBEAT_INTERVAL, WS_PING_TIMEOUT, WS_MAX_PAYLOAD
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const corsOrigin = getEnv(env, 'CORS_ORIGIN', '*');
  const concurrency = getEnv(env, 'TRANSFER_CONCURRENCY', 'allow');

  return {
    port: getEnvNumber(env, 'PORT', 8080),
    host: getEnv(env, 'HOST', '0.0.0.0'),
    nodeEnv: getEnv(env, 'NODE_ENV', 'development'),
    logLevel: getEnv(env, 'LOG_LEVEL', 'info'),
    corsOrigin: corsOrigin === '*' ? true : corsOrigin.split(','),
    downloadDir: path.resolve(getEnv(env, 'DOWNLOAD_DIR', './downloads')),
    chunkSize: getEnvNumber(env, 'CHUNK_SIZE', DEFAULT_CHUNK_SIZE),
    transferInactivityTimeoutMs: getEnvNumber(env, 'TRANSFER_INACTIVITY_TIMEOUT_MS', 30_000),
    transferConcurrency: isConcurrencyPolicy(concurrency) ? concurrency : 'allow',
    wsHeartbeatInterval: getEnvNumber(env, 'WS_HEARTBEAT_INTERVAL', 30_000),
    wsPingTimeout: getEnvNumber(env, 'WS_PING_TIMEOUT', 10_000),
    wsMaxPayload: getEnvNumber(env, 'WS_MAX_PAYLOAD', MAX_FRAME_BYTES),
  };
}

/**
 * Validate a server configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateServerConfig(config: ServerConfig): string[] {
  const errors: string[] = [];

  if (config.port < 0 || config.port > 65535) {
    errors.push('port must be between 0 and 65535');
  }

  if (!config.downloadDir) {
    errors.push('downloadDir is required');
  }

  if (config.chunkSize < 1) {
    errors.push('chunkSize must be at least 1');
  }

  if (config.chunkSize > MAX_CHUNK_SIZE) {
    errors.push(`chunkSize must not exceed ${MAX_CHUNK_SIZE}`);
  }

  // base64 inflates by 4/3; leave room for the JSON envelope
  if (Math.ceil(config.chunkSize / 3) * 4 + 1024 > config.wsMaxPayload) {
    errors.push('wsMaxPayload is too small for the configured chunkSize');
  }

  if (config.transferInactivityTimeoutMs < 1) {
    errors.push('transferInactivityTimeoutMs must be positive');
  }

  if (!isConcurrencyPolicy(config.transferConcurrency)) {
    errors.push(`transferConcurrency must be one of: ${CONCURRENCY_POLICIES.join(', ')}`);
  }

  if (config.wsHeartbeatInterval < 1) {
    errors.push('wsHeartbeatInterval must be positive');
  }

  return errors;
}

/**
 * Server URL resolution order:
 * 1. --server option
 * 2. EDGEPULL_SERVER_URL environment variable
 * 3. http://localhost:8080
 */

export const DEFAULT_SERVER_URL = 'http://localhost:8080';

type Env = Record<string, string | undefined>;

export function resolveServerUrl(flag?: string, env: Env = process.env): string {
  const url = flag || env['EDGEPULL_SERVER_URL'] || DEFAULT_SERVER_URL;
  return url.replace(/\/+$/, '');
}

/**
 * WebSocket URL an agent connects to: http -> ws, https -> wss.
 */
export function agentSocketUrl(serverUrl: string, clientId: string): string {
  const base = serverUrl.replace(/^http:\/\//, 'ws://').replace(/^https:\/\//, 'wss://');
  return `${base}/ws?clientId=${encodeURIComponent(clientId)}`;
}

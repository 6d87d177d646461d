/** Default chunk size: 1 MiB */
export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

/** Largest chunk size a server will ask an agent for */
export const MAX_CHUNK_SIZE = 8 * 1024 * 1024;

/**
 * Largest WebSocket frame accepted on the data plane.
 * A 1 MiB chunk is ~1.34 MiB once base64 encoded inside JSON.
 */
export const MAX_FRAME_BYTES = 16 * 1024 * 1024;

/** Path of the agent WebSocket endpoint */
export const AGENT_WS_PATH = '/ws';

/** Query parameter carrying the agent identifier on connect */
export const CLIENT_ID_PARAM = 'clientId';

/** Agent identifiers: 1-128 chars of alphanumerics, dot, underscore or hyphen */
export const CLIENT_ID_PATTERN = /^[a-zA-Z0-9._-]{1,128}$/;

/** WebSocket close codes used on the data plane */
export const CloseCodes = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  MISSING_CLIENT_ID: 4000,
} as const;

import type {
  AbortMessage,
  AgentMessage,
  ChunkAckMessage,
  ChunkMessage,
  ConnectedMessage,
  ErrorMessage,
  PingMessage,
  PongMessage,
  ProtocolMessage,
  ServerMessage,
  TransferCancelMessage,
  TransferRequestMessage,
} from './messages.js';

/** Frame data as delivered by `ws` (text frames arrive as Buffers) */
export type RawFrame = string | Buffer | ArrayBuffer | Buffer[];

/**
 * Outcome of decoding a frame. A rejected frame keeps the transfer it named,
 * when it named one, so the caller can fail that transfer.
 */
export type DecodeResult<T> =
  | { ok: true; message: T }
  | { ok: false; error: string; transferId?: string };

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function frameToString(data: RawFrame): string {
  if (typeof data === 'string') return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

function fail<T>(error: string, transferId?: string): DecodeResult<T> {
  return transferId === undefined ? { ok: false, error } : { ok: false, error, transferId };
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function positiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}

function nonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

export function isBase64(value: string): boolean {
  return value.length % 4 === 0 && BASE64_PATTERN.test(value);
}

// ─── Per-type validation ────────────────────────────────────────────

function decodeChunk(payload: unknown): DecodeResult<ChunkMessage> {
  if (!isRecord(payload)) return fail('chunk: payload must be an object');
  const { transferId, sequence, data, isLast, totalBytes } = payload;
  if (!nonEmptyString(transferId)) return fail('chunk: transferId is required');
  if (!positiveInteger(sequence)) {
    return fail('chunk: sequence must be a positive integer', transferId);
  }
  if (typeof data !== 'string' || !isBase64(data)) {
    return fail('chunk: data must be base64', transferId);
  }
  if (typeof isLast !== 'boolean') return fail('chunk: isLast must be a boolean', transferId);

  const message: ChunkMessage = {
    type: 'chunk',
    payload: { transferId, sequence, data, isLast },
  };
  if (nonNegativeInteger(totalBytes)) {
    message.payload.totalBytes = totalBytes;
  } else if (totalBytes !== undefined) {
    return fail('chunk: totalBytes must be a non-negative integer', transferId);
  }
  return { ok: true, message };
}

function decodeAbort(payload: unknown): DecodeResult<AbortMessage> {
  if (!isRecord(payload)) return fail('abort: payload must be an object');
  const { transferId, message } = payload;
  if (!nonEmptyString(transferId)) return fail('abort: transferId is required');
  if (typeof message !== 'string') return fail('abort: message must be a string');
  return { ok: true, message: { type: 'abort', payload: { transferId, message } } };
}

function decodeConnected(payload: unknown): DecodeResult<ConnectedMessage> {
  if (!isRecord(payload)) return fail('connected: payload must be an object');
  const { clientId, timestamp } = payload;
  if (!nonEmptyString(clientId)) return fail('connected: clientId is required');
  if (!nonNegativeInteger(timestamp)) return fail('connected: timestamp is required');
  return { ok: true, message: { type: 'connected', payload: { clientId, timestamp } } };
}

function decodeTransferRequest(payload: unknown): DecodeResult<TransferRequestMessage> {
  if (!isRecord(payload)) return fail('transfer_request: payload must be an object');
  const { transferId, path, chunkSize } = payload;
  if (!nonEmptyString(transferId)) return fail('transfer_request: transferId is required');
  if (!nonEmptyString(path)) return fail('transfer_request: path is required');
  if (!positiveInteger(chunkSize)) return fail('transfer_request: chunkSize must be a positive integer');
  return {
    ok: true,
    message: { type: 'transfer_request', payload: { transferId, path, chunkSize } },
  };
}

function decodeChunkAck(payload: unknown): DecodeResult<ChunkAckMessage> {
  if (!isRecord(payload)) return fail('chunk_ack: payload must be an object');
  const { transferId, sequence } = payload;
  if (!nonEmptyString(transferId)) return fail('chunk_ack: transferId is required');
  if (!positiveInteger(sequence)) return fail('chunk_ack: sequence must be a positive integer');
  return { ok: true, message: { type: 'chunk_ack', payload: { transferId, sequence } } };
}

function decodeTransferCancel(payload: unknown): DecodeResult<TransferCancelMessage> {
  if (!isRecord(payload)) return fail('transfer_cancel: payload must be an object');
  const { transferId, reason } = payload;
  if (!nonEmptyString(transferId)) return fail('transfer_cancel: transferId is required');
  if (typeof reason !== 'string') return fail('transfer_cancel: reason must be a string');
  return { ok: true, message: { type: 'transfer_cancel', payload: { transferId, reason } } };
}

function decodeError(payload: unknown): DecodeResult<ErrorMessage> {
  if (!isRecord(payload)) return fail('error: payload must be an object');
  const { code, message } = payload;
  if (typeof code !== 'string' || typeof message !== 'string') {
    return fail('error: code and message must be strings');
  }
  return { ok: true, message: { type: 'error', payload: { code, message } } };
}

function decodePing(): DecodeResult<PingMessage> {
  return { ok: true, message: { type: 'ping' } };
}

function decodePong(payload: unknown): DecodeResult<PongMessage> {
  const timestamp = isRecord(payload) ? payload.timestamp : undefined;
  return {
    ok: true,
    message: { type: 'pong', payload: { timestamp: nonNegativeInteger(timestamp) ? timestamp : 0 } },
  };
}

// ─── Public API ─────────────────────────────────────────────────────

function parseEnvelope(data: RawFrame): DecodeResult<{ type: string; payload: unknown }> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(frameToString(data));
  } catch {
    return fail('frame is not valid JSON');
  }
  if (!isRecord(parsed)) {
    return fail('frame must be a JSON object');
  }
  const { type, payload } = parsed;
  if (typeof type !== 'string') {
    return fail('frame must have a string type');
  }
  return { ok: true, message: { type, payload } };
}

/**
 * Decode a frame received by the server from an agent.
 */
export function decodeAgentMessage(data: RawFrame): DecodeResult<AgentMessage> {
  const envelope = parseEnvelope(data);
  if (!envelope.ok) return envelope;
  const { type, payload } = envelope.message;

  switch (type) {
    case 'chunk':
      return decodeChunk(payload);
    case 'abort':
      return decodeAbort(payload);
    case 'ping':
      return decodePing();
    case 'pong':
      return decodePong(payload);
    default:
      return fail(`unknown message type '${type}'`);
  }
}

/**
 * Decode a frame received by an agent from the server.
 */
export function decodeServerMessage(data: RawFrame): DecodeResult<ServerMessage> {
  const envelope = parseEnvelope(data);
  if (!envelope.ok) return envelope;
  const { type, payload } = envelope.message;

  switch (type) {
    case 'connected':
      return decodeConnected(payload);
    case 'transfer_request':
      return decodeTransferRequest(payload);
    case 'chunk_ack':
      return decodeChunkAck(payload);
    case 'transfer_cancel':
      return decodeTransferCancel(payload);
    case 'error':
      return decodeError(payload);
    case 'ping':
      return decodePing();
    case 'pong':
      return decodePong(payload);
    default:
      return fail(`unknown message type '${type}'`);
  }
}

export function encodeMessage(message: ProtocolMessage): string {
  return JSON.stringify(message);
}

/**
 * Build a chunk message around raw bytes.
 */
export function encodeChunk(
  transferId: string,
  sequence: number,
  bytes: Uint8Array,
  isLast: boolean,
  totalBytes?: number
): ChunkMessage {
  const message: ChunkMessage = {
    type: 'chunk',
    payload: {
      transferId,
      sequence,
      data: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64'),
      isLast,
    },
  };
  if (totalBytes !== undefined) {
    message.payload.totalBytes = totalBytes;
  }
  return message;
}

export function decodeChunkData(data: string): Buffer {
  return Buffer.from(data, 'base64');
}

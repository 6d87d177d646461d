/**
 * Messages carried over an agent's persistent WebSocket connection.
 *
 * Every frame is a JSON object `{ type, payload }`. Messages that refer to
 * a transfer carry its `transferId` so one connection can multiplex several
 * concurrent transfers.
 */

export interface WebSocketMessage {
  type: string;
  payload?: unknown;
}

// ─── Server → agent ─────────────────────────────────────────────────

/**
 * Registration confirmation, sent once the agent is in the registry
 */
export interface ConnectedMessage extends WebSocketMessage {
  type: 'connected';
  payload: {
    clientId: string;
    timestamp: number;
  };
}

/**
 * Ask the agent to stream a file
 */
export interface TransferRequestMessage extends WebSocketMessage {
  type: 'transfer_request';
  payload: {
    transferId: string;
    /** Source path, interpreted only by the agent */
    path: string;
    /** Maximum payload bytes per chunk */
    chunkSize: number;
  };
}

/**
 * Sent after a chunk has been written to the destination artifact.
 * Agents keep at most one unacknowledged chunk per transfer.
 */
export interface ChunkAckMessage extends WebSocketMessage {
  type: 'chunk_ack';
  payload: {
    transferId: string;
    sequence: number;
  };
}

/**
 * Tells the agent to stop sending a transfer (cancelled or failed server-side)
 */
export interface TransferCancelMessage extends WebSocketMessage {
  type: 'transfer_cancel';
  payload: {
    transferId: string;
    reason: string;
  };
}

export interface ErrorMessage extends WebSocketMessage {
  type: 'error';
  payload: {
    code: string;
    message: string;
  };
}

// ─── Agent → server ─────────────────────────────────────────────────

/**
 * One ordered piece of a transfer. `isLast` marks end of stream.
 */
export interface ChunkMessage extends WebSocketMessage {
  type: 'chunk';
  payload: {
    transferId: string;
    /** 1-based, strictly increasing per transfer */
    sequence: number;
    /** Base64 encoded bytes */
    data: string;
    isLast: boolean;
    /** Size of the source file, announced on the first chunk */
    totalBytes?: number;
  };
}

/**
 * The agent cannot complete a transfer
 */
export interface AbortMessage extends WebSocketMessage {
  type: 'abort';
  payload: {
    transferId: string;
    message: string;
  };
}

// ─── Either direction ───────────────────────────────────────────────

export interface PingMessage extends WebSocketMessage {
  type: 'ping';
}

export interface PongMessage extends WebSocketMessage {
  type: 'pong';
  payload: {
    timestamp: number;
  };
}

export type ServerMessage =
  | ConnectedMessage
  | TransferRequestMessage
  | ChunkAckMessage
  | TransferCancelMessage
  | ErrorMessage
  | PingMessage
  | PongMessage;

export type AgentMessage = ChunkMessage | AbortMessage | PingMessage | PongMessage;

export type ProtocolMessage = ServerMessage | AgentMessage;

export type ProtocolMessageType = ProtocolMessage['type'];

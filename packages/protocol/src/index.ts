export {
  DEFAULT_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  MAX_FRAME_BYTES,
  AGENT_WS_PATH,
  CLIENT_ID_PARAM,
  CLIENT_ID_PATTERN,
  CloseCodes,
} from './constants.js';

export {
  decodeAgentMessage,
  decodeServerMessage,
  encodeMessage,
  encodeChunk,
  decodeChunkData,
  isBase64,
} from './codec.js';
export type { RawFrame, DecodeResult } from './codec.js';

export type {
  WebSocketMessage,
  ConnectedMessage,
  TransferRequestMessage,
  ChunkAckMessage,
  TransferCancelMessage,
  ErrorMessage,
  ChunkMessage,
  AbortMessage,
  PingMessage,
  PongMessage,
  ServerMessage,
  AgentMessage,
  ProtocolMessage,
  ProtocolMessageType,
} from './messages.js';

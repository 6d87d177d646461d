export { websocketPlugin } from './websocket-plugin.js';
export type { WebSocketPluginOptions } from './websocket-plugin.js';
export { InMemoryConnectionRegistry } from './connection-registry.js';
export { sendMessage } from './send.js';
export type {
  AgentConnection,
  AgentLiveness,
  AgentSummary,
  ConnectionRegistry,
  ConnectionRegistryEvents,
  DisconnectReason,
  LivenessChange,
} from './types.js';

export { AgentClient } from './agent-client.js';
export type { AgentClientOptions, AgentEvent, AgentStatus } from './agent-client.js';
export { TransferSender } from './sender.js';
export type { AgentChannel, SendOutcome, SendResult, TransferSenderOptions } from './sender.js';
export { expandPath } from './expand-path.js';

import type { WebSocket } from 'ws';

export type AgentLiveness = 'connected' | 'disconnected';

/**
 * Why an agent entry went away
 */
export type DisconnectReason = 'disconnected' | 'replaced';

export interface AgentConnection {
  agentId: string;
  /** Owned by the registry for the lifetime of the entry */
  socket: WebSocket;
  liveness: AgentLiveness;
  connectedAt: Date;
  /** Last inbound message, ping or pong */
  lastSeen: Date;
  /** Cleared each heartbeat round, set again by a pong */
  isAlive: boolean;
}

/**
 * Read-only view of an agent for the control plane
 */
export interface AgentSummary {
  agentId: string;
  liveness: AgentLiveness;
  connectedAt: Date;
  lastSeen: Date;
}

export type LivenessChange =
  | { agentId: string; liveness: 'connected' }
  | { agentId: string; liveness: 'disconnected'; reason: DisconnectReason };

export interface ConnectionRegistryEvents {
  liveness: (change: LivenessChange) => void;
}

export interface ConnectionRegistry {
  register(agentId: string, socket: WebSocket): void;
  lookup(agentId: string): AgentConnection | undefined;
  deregister(agentId: string, socket?: WebSocket): boolean;
  list(): AgentSummary[];
  touch(agentId: string): void;
  markDead(agentId: string): void;
  onLivenessChange(listener: ConnectionRegistryEvents['liveness']): () => void;
  readonly size: number;
}

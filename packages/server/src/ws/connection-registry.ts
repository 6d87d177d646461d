import { EventEmitter } from 'node:events';
import type { WebSocket } from 'ws';
import { CloseCodes } from '@edgepull/protocol';
import type {
  AgentConnection,
  AgentSummary,
  ConnectionRegistry,
  ConnectionRegistryEvents,
  LivenessChange,
} from './types.js';

/**
 * In-memory registry of agent WebSocket connections, one per agent id.
 * Single-process; every mutation runs on the event loop so readers never
 * see a half-applied change.
 */
export class InMemoryConnectionRegistry implements ConnectionRegistry {
  private connections: Map<string, AgentConnection> = new Map();
  private readonly events = new EventEmitter();

  /**
   * Add an agent connection.
   * An existing connection for the same agent is closed and reported as
   * replaced before the new one is announced.
   */
  register(agentId: string, socket: WebSocket): void {
    const existing = this.connections.get(agentId);
    if (existing) {
      this.connections.delete(agentId);
      try {
        existing.socket.close(CloseCodes.NORMAL, 'New connection established');
      } catch {
        // Socket may already be closed
      }
      existing.liveness = 'disconnected';
      this.emit({ agentId, liveness: 'disconnected', reason: 'replaced' });
    }

    const now = new Date();
    this.connections.set(agentId, {
      agentId,
      socket,
      liveness: 'connected',
      connectedAt: now,
      lastSeen: now,
      isAlive: true,
    });

    this.emit({ agentId, liveness: 'connected' });
  }

  lookup(agentId: string): AgentConnection | undefined {
    return this.connections.get(agentId);
  }

  /**
   * Remove an agent after its transport went away.
   * When `socket` is given the entry is only removed if it still owns that
   * socket, so the late close of a replaced connection is a no-op.
   */
  deregister(agentId: string, socket?: WebSocket): boolean {
    const connection = this.connections.get(agentId);
    if (!connection) return false;
    if (socket && connection.socket !== socket) return false;

    this.connections.delete(agentId);
    connection.liveness = 'disconnected';
    this.emit({ agentId, liveness: 'disconnected', reason: 'disconnected' });
    return true;
  }

  list(): AgentSummary[] {
    return Array.from(this.connections.values(), (connection) => ({
      agentId: connection.agentId,
      liveness: connection.liveness,
      connectedAt: new Date(connection.connectedAt),
      lastSeen: new Date(connection.lastSeen),
    }));
  }

  /**
   * Record inbound activity from an agent.
   */
  touch(agentId: string): void {
    const connection = this.connections.get(agentId);
    if (connection) {
      connection.lastSeen = new Date();
      connection.isAlive = true;
    }
  }

  /**
   * Mark a connection as unconfirmed until its next pong.
   */
  markDead(agentId: string): void {
    const connection = this.connections.get(agentId);
    if (connection) {
      connection.isAlive = false;
    }
  }

  getAll(): AgentConnection[] {
    return Array.from(this.connections.values());
  }

  get size(): number {
    return this.connections.size;
  }

  onLivenessChange(listener: ConnectionRegistryEvents['liveness']): () => void {
    this.events.on('liveness', listener);
    return () => {
      this.events.off('liveness', listener);
    };
  }

  /**
   * Close every connection. Used on shutdown.
   */
  clear(): void {
    for (const connection of Array.from(this.connections.values())) {
      try {
        connection.socket.close(CloseCodes.GOING_AWAY, 'Server shutting down');
      } catch {
        // Socket may already be closed
      }
      this.deregister(connection.agentId);
    }
  }

  private emit(change: LivenessChange): void {
    this.events.emit('liveness', change);
  }
}

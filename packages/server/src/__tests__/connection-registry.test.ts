import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryConnectionRegistry } from '../ws/connection-registry.js';
import type { LivenessChange } from '../ws/types.js';
import { createMockSocket } from './helpers.js';

describe('InMemoryConnectionRegistry', () => {
  let registry: InMemoryConnectionRegistry;
  let changes: LivenessChange[];

  beforeEach(() => {
    registry = new InMemoryConnectionRegistry();
    changes = [];
    registry.onLivenessChange((change) => changes.push(change));
  });

  describe('register', () => {
    it('should add a new connection', () => {
      const socket = createMockSocket();
      registry.register('agent-1', socket);

      expect(registry.size).toBe(1);
      const connection = registry.lookup('agent-1');
      expect(connection?.agentId).toBe('agent-1');
      expect(connection?.socket).toBe(socket);
      expect(connection?.liveness).toBe('connected');
      expect(connection?.isAlive).toBe(true);
      expect(changes).toEqual([{ agentId: 'agent-1', liveness: 'connected' }]);
    });

    it('should replace an existing connection with the same id', () => {
      const socket1 = createMockSocket();
      const socket2 = createMockSocket();

      registry.register('agent-1', socket1);
      registry.register('agent-1', socket2);

      expect(registry.size).toBe(1);
      expect(registry.lookup('agent-1')?.socket).toBe(socket2);
      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(socket1.close).toHaveBeenCalledWith(1000, 'New connection established');
      expect(changes).toEqual([
        { agentId: 'agent-1', liveness: 'connected' },
        { agentId: 'agent-1', liveness: 'disconnected', reason: 'replaced' },
        { agentId: 'agent-1', liveness: 'connected' },
      ]);
    });

    it('should keep different agents apart', () => {
      registry.register('agent-1', createMockSocket());
      registry.register('agent-2', createMockSocket());
      registry.register('agent-3', createMockSocket());

      expect(registry.size).toBe(3);
    });
  });

  describe('deregister', () => {
    it('should remove a connection and report the disconnect', () => {
      const socket = createMockSocket();
      registry.register('agent-1', socket);

      expect(registry.deregister('agent-1', socket)).toBe(true);
      expect(registry.size).toBe(0);
      expect(registry.lookup('agent-1')).toBeUndefined();
      expect(changes[1]).toEqual({ agentId: 'agent-1', liveness: 'disconnected', reason: 'disconnected' });
    });

    it('should ignore the late close of a replaced socket', () => {
      const socket1 = createMockSocket();
      const socket2 = createMockSocket();
      registry.register('agent-1', socket1);
      registry.register('agent-1', socket2);

      expect(registry.deregister('agent-1', socket1)).toBe(false);
      expect(registry.lookup('agent-1')?.socket).toBe(socket2);
      expect(changes).toHaveLength(3);
    });

    it('should return false for an unknown agent', () => {
      expect(registry.deregister('missing')).toBe(false);
      expect(changes).toEqual([]);
    });
  });

  describe('list', () => {
    it('should return copies that do not track later changes', () => {
      registry.register('agent-1', createMockSocket());
      const [summary] = registry.list();

      expect(summary?.agentId).toBe('agent-1');
      expect(summary?.liveness).toBe('connected');

      registry.deregister('agent-1');
      expect(summary?.liveness).toBe('connected');
      expect(registry.list()).toEqual([]);
    });
  });

  describe('heartbeat bookkeeping', () => {
    it('should mark dead and revive on touch', () => {
      vi.useFakeTimers();
      try {
        vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
        registry.register('agent-1', createMockSocket());

        registry.markDead('agent-1');
        expect(registry.lookup('agent-1')?.isAlive).toBe(false);

        vi.setSystemTime(new Date('2026-01-01T00:00:05Z'));
        registry.touch('agent-1');

        const connection = registry.lookup('agent-1');
        expect(connection?.isAlive).toBe(true);
        expect(connection?.lastSeen.toISOString()).toBe('2026-01-01T00:00:05.000Z');
        expect(connection?.connectedAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
      } finally {
        vi.useRealTimers();
      }
    });

    it('should ignore unknown agents', () => {
      expect(() => registry.touch('missing')).not.toThrow();
      expect(() => registry.markDead('missing')).not.toThrow();
    });
  });

  describe('onLivenessChange', () => {
    it('should stop notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = registry.onLivenessChange(listener);

      registry.register('agent-1', createMockSocket());
      unsubscribe();
      registry.deregister('agent-1');

      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe('clear', () => {
    it('should close every socket with going-away', () => {
      const socket1 = createMockSocket();
      const socket2 = createMockSocket();
      registry.register('agent-1', socket1);
      registry.register('agent-2', socket2);

      registry.clear();

      expect(registry.size).toBe(0);
      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(socket1.close).toHaveBeenCalledWith(1001, 'Server shutting down');
      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(socket2.close).toHaveBeenCalledWith(1001, 'Server shutting down');
    });
  });
});

import { vi } from 'vitest';
import pino from 'pino';
import type { WebSocket } from 'ws';
import type { FastifyBaseLogger } from 'fastify';

export function createMockSocket(readyState = 1): WebSocket {
  return {
    readyState,
    OPEN: 1,
    CLOSED: 3,
    close: vi.fn(),
    terminate: vi.fn(),
    send: vi.fn(),
    ping: vi.fn(),
    on: vi.fn(),
  } as unknown as WebSocket;
}

export function silentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

/**
 * JSON frames handed to a mock socket's `send`, decoded
 */
export function sentFrames(socket: WebSocket): Array<{ type: string; payload?: Record<string, unknown> }> {
  return vi.mocked(socket.send).mock.calls.map(([data]) => JSON.parse(String(data)));
}

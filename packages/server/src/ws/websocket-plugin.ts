import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import type { SocketStream } from '@fastify/websocket';
import type { WebSocket, RawData } from 'ws';
import websocket from '@fastify/websocket';
import {
  AGENT_WS_PATH,
  CLIENT_ID_PARAM,
  CLIENT_ID_PATTERN,
  CloseCodes,
  decodeAgentMessage,
} from '@edgepull/protocol';
import type { TransferOrchestrator } from '../transfers/orchestrator.js';
import type { InMemoryConnectionRegistry } from './connection-registry.js';
import { sendMessage } from './send.js';

export interface WebSocketPluginOptions {
  registry: InMemoryConnectionRegistry;
  orchestrator: TransferOrchestrator;
  /** Interval in ms between heartbeat checks (default: 30000) */
  heartbeatInterval?: number;
  /** Timeout in ms for ping response before terminating (default: 10000) */
  pingTimeout?: number;
  /** Largest inbound frame in bytes */
  maxPayload?: number;
}

/**
 * Extract the agent id from the upgrade URL.
 */
function getClientId(url: string | undefined): string | null {
  if (!url) return null;
  try {
    const urlObj = new URL(url, 'http://localhost');
    return urlObj.searchParams.get(CLIENT_ID_PARAM);
  } catch {
    return null;
  }
}

export const websocketPlugin: FastifyPluginCallback<WebSocketPluginOptions> = (
  fastify: FastifyInstance,
  opts,
  done
): void => {
  const heartbeatInterval = opts.heartbeatInterval ?? 30000;
  const pingTimeout = opts.pingTimeout ?? 10000;
  const { registry, orchestrator } = opts;
  const log = fastify.log.child({ component: 'agent-ws' });

  let heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  void fastify.register(websocket, {
    options: opts.maxPayload !== undefined ? { maxPayload: opts.maxPayload } : {},
  });

  /**
   * True while `socket` is the registered connection for `agentId`.
   * Frames from a replaced connection are dropped.
   */
  const isCurrent = (agentId: string, socket: WebSocket): boolean =>
    registry.lookup(agentId)?.socket === socket;

  const handleFrame = (agentId: string, socket: WebSocket, data: RawData): void => {
    if (!isCurrent(agentId, socket)) {
      log.debug({ agentId }, 'Frame from replaced connection ignored');
      return;
    }

    registry.touch(agentId);

    const decoded = decodeAgentMessage(data);
    if (!decoded.ok) {
      log.warn({ agentId, error: decoded.error }, 'Received invalid message');
      if (decoded.transferId) {
        orchestrator.onMalformed(agentId, decoded.transferId, decoded.error);
      } else {
        sendMessage(socket, {
          type: 'error',
          payload: { code: 'INVALID_MESSAGE', message: decoded.error },
        });
      }
      return;
    }

    const message = decoded.message;
    switch (message.type) {
      case 'chunk': {
        const outcome = orchestrator.onChunk(agentId, message.payload);
        if (outcome.kind === 'ignored') {
          log.debug(
            { agentId, transferId: message.payload.transferId, reason: outcome.reason },
            'Chunk ignored'
          );
        }
        break;
      }
      case 'abort':
        orchestrator.onAbort(agentId, message.payload.transferId, message.payload.message);
        break;
      case 'ping':
        sendMessage(socket, { type: 'pong', payload: { timestamp: Date.now() } });
        break;
      case 'pong':
        // touch() above is all a pong needs
        break;
    }
  };

  fastify.after(() => {
    fastify.get(AGENT_WS_PATH, { websocket: true }, (connection: SocketStream, request) => {
      const socket = connection.socket;
      const agentId = getClientId(request.url);

      if (!agentId || !CLIENT_ID_PATTERN.test(agentId)) {
        sendMessage(socket, {
          type: 'error',
          payload: {
            code: 'MISSING_CLIENT_ID',
            message: `${CLIENT_ID_PARAM} query parameter is required`,
          },
        });
        socket.close(CloseCodes.MISSING_CLIENT_ID, 'clientId required');
        return;
      }

      registry.register(agentId, socket);
      log.info({ agentId }, 'Agent connected');

      sendMessage(socket, {
        type: 'connected',
        payload: { clientId: agentId, timestamp: Date.now() },
      });

      socket.on('message', (data: RawData) => {
        handleFrame(agentId, socket, data);
      });

      // WebSocket-level pong (response to ws.ping())
      socket.on('pong', () => {
        if (isCurrent(agentId, socket)) {
          registry.touch(agentId);
        }
      });

      socket.on('close', (code: number, reason: Buffer) => {
        if (registry.deregister(agentId, socket)) {
          log.info({ agentId, code, reason: reason.toString() }, 'Agent disconnected');
        }
      });

      socket.on('error', (error: Error) => {
        log.error({ agentId, error: error.message }, 'WebSocket error');
        registry.deregister(agentId, socket);
      });
    });

    heartbeatTimer = setInterval(() => {
      const now = Date.now();

      for (const connection of registry.getAll()) {
        const sinceLastSeen = now - connection.lastSeen.getTime();

        if (!connection.isAlive && sinceLastSeen > pingTimeout) {
          log.warn({ agentId: connection.agentId }, 'Terminating unresponsive connection');
          connection.socket.terminate();
          registry.deregister(connection.agentId, connection.socket);
          continue;
        }

        registry.markDead(connection.agentId);

        // WebSocket-level ping, not a JSON message
        if (connection.socket.readyState === connection.socket.OPEN) {
          connection.socket.ping();
        }
      }
    }, heartbeatInterval);
  });

  // Runs before connections are torn down so open transfers record the shutdown
  fastify.addHook('preClose', async () => {
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer);
      heartbeatTimer = null;
    }
    await orchestrator.shutdown();
    registry.clear();
  });

  done();
};

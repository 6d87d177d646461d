import { WebSocket, type RawData } from 'ws';
import { CloseCodes, decodeServerMessage, encodeMessage } from '@edgepull/protocol';
import type { AgentMessage, ServerMessage, TransferRequestMessage } from '@edgepull/protocol';
import { agentSocketUrl } from '../utils/config.js';
import { TransferSender, type AgentChannel, type SendResult } from './sender.js';

const DEFAULT_RECONNECT_DELAY = 5000;
const DEFAULT_PING_INTERVAL = 30000;

export type AgentStatus = 'connecting' | 'connected' | 'reconnecting' | 'stopped';

export type AgentEvent =
  | { type: 'status'; status: AgentStatus }
  | { type: 'transfer_started'; transferId: string; path: string }
  | { type: 'transfer_progress'; transferId: string; bytesSent: number; totalBytes: number }
  | { type: 'transfer_finished'; result: SendResult }
  | { type: 'server_error'; code: string; message: string }
  | { type: 'connection_error'; message: string };

export interface AgentClientOptions {
  serverUrl: string;
  clientId: string;
  /** Delay before reconnecting after the connection drops (default: 5000) */
  reconnectDelayMs?: number;
  /** Interval between application-level pings (default: 30000) */
  pingIntervalMs?: number;
  /** Per-chunk acknowledgement timeout handed to senders */
  ackTimeoutMs?: number;
}

/**
 * Long-running agent connection.
 * Holds one outbound WebSocket, serves transfer requests over it and
 * reconnects after a fixed delay until stopped.
 */
export class AgentClient {
  private readonly options: AgentClientOptions;
  private readonly reconnectDelayMs: number;
  private readonly pingIntervalMs: number;
  private ws: WebSocket | null = null;
  private status: AgentStatus = 'stopped';
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private intentionalClose = false;
  private readonly senders = new Map<string, TransferSender>();
  private readonly running = new Set<Promise<void>>();
  private readonly listeners = new Set<(event: AgentEvent) => void>();

  constructor(options: AgentClientOptions) {
    this.options = options;
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY;
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL;
  }

  getStatus(): AgentStatus {
    return this.status;
  }

  onEvent(listener: (event: AgentEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    this.intentionalClose = false;
    this.connect();
  }

  /**
   * Close the connection, cancel running transfers and stop reconnecting.
   * Resolves once every sender has returned.
   */
  async stop(): Promise<void> {
    this.intentionalClose = true;
    this.clearTimers();
    this.cancelAll('agent stopping');

    if (this.ws) {
      const ws = this.ws;
      this.ws = null;
      ws.close(CloseCodes.NORMAL, 'Agent stopping');
    }

    this.setStatus('stopped');
    await Promise.all(this.running);
  }

  private connect(): void {
    if (this.ws) return;

    if (this.status !== 'reconnecting') {
      this.setStatus('connecting');
    }
    const ws = new WebSocket(agentSocketUrl(this.options.serverUrl, this.options.clientId));
    this.ws = ws;

    ws.on('open', () => {
      this.startPing();
    });

    ws.on('message', (data: RawData) => {
      this.handleMessage(ws, data);
    });

    // Error events are followed by close events
    ws.on('error', (error: Error) => {
      this.emit({ type: 'connection_error', message: error.message });
    });

    ws.on('close', (code: number) => {
      if (this.ws !== ws) return;
      this.ws = null;
      this.clearTimers();
      this.cancelAll('connection closed');

      if (this.intentionalClose) return;

      if (code === CloseCodes.MISSING_CLIENT_ID) {
        this.setStatus('stopped');
        return;
      }

      this.scheduleReconnect();
    });
  }

  private handleMessage(ws: WebSocket, data: RawData): void {
    const decoded = decodeServerMessage(data);
    if (!decoded.ok) {
      this.emit({ type: 'connection_error', message: `Invalid message from server: ${decoded.error}` });
      return;
    }

    const message: ServerMessage = decoded.message;
    switch (message.type) {
      case 'connected':
        this.setStatus('connected');
        break;
      case 'transfer_request':
        this.startTransfer(ws, message);
        break;
      case 'chunk_ack':
        this.senders.get(message.payload.transferId)?.ack(message.payload.sequence);
        break;
      case 'transfer_cancel':
        this.senders.get(message.payload.transferId)?.cancel(message.payload.reason);
        break;
      case 'ping':
        this.send(ws, { type: 'pong', payload: { timestamp: Date.now() } });
        break;
      case 'pong':
        break;
      case 'error':
        this.emit({ type: 'server_error', code: message.payload.code, message: message.payload.message });
        break;
    }
  }

  private startTransfer(ws: WebSocket, request: TransferRequestMessage): void {
    const { transferId, path, chunkSize } = request.payload;
    if (this.senders.has(transferId)) return;

    const channel: AgentChannel = {
      send: (message) => this.send(ws, message),
    };
    const sender = new TransferSender({
      channel,
      transferId,
      path,
      chunkSize,
      ackTimeoutMs: this.options.ackTimeoutMs,
      onProgress: (bytesSent, totalBytes) => {
        this.emit({ type: 'transfer_progress', transferId, bytesSent, totalBytes });
      },
    });
    this.senders.set(transferId, sender);
    this.emit({ type: 'transfer_started', transferId, path });

    const run = sender
      .run()
      .then((result) => {
        this.emit({ type: 'transfer_finished', result });
      })
      .finally(() => {
        this.senders.delete(transferId);
        this.running.delete(run);
      });
    this.running.add(run);
  }

  private send(ws: WebSocket, message: AgentMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(encodeMessage(message));
    }
  }

  private cancelAll(reason: string): void {
    for (const sender of this.senders.values()) {
      sender.cancel(reason);
    }
  }

  private setStatus(status: AgentStatus): void {
    if (this.status === status) return;
    this.status = status;
    this.emit({ type: 'status', status });
  }

  private emit(event: AgentEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private scheduleReconnect(): void {
    this.setStatus('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, this.reconnectDelayMs);
  }

  private startPing(): void {
    this.stopPing();
    this.pingTimer = setInterval(() => {
      if (this.ws) {
        this.send(this.ws, { type: 'ping' });
      }
    }, this.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private clearTimers(): void {
    this.stopPing();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}

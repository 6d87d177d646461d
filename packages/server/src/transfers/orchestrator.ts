/**
 * TransferOrchestrator - owns the lifecycle of every transfer.
 *
 * Integrates:
 * - ConnectionRegistry: finds the agent socket, reports disconnects/replacements
 * - ChunkReassembler: one per transfer, validates order and writes the artifact
 * - DeadlineTracker: fails transfers that stop receiving chunks
 *
 * The orchestrator is the single writer of transfer records. Each change
 * publishes a new frozen snapshot, so `status()` reads never observe a
 * partial update and never wait on the write path.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { decodeChunkData } from '@edgepull/protocol';
import type { ChunkMessage } from '@edgepull/protocol';
import type { ConcurrencyPolicy } from '../config.js';
import { AgentBusyError, AgentNotConnectedError, TransferNotFoundError } from '../errors.js';
import type { ConnectionRegistry, LivenessChange } from '../ws/types.js';
import { sendMessage } from '../ws/send.js';
import { ChunkReassembler, type AcceptResult } from './reassembler.js';
import { DeadlineTracker } from './deadline-tracker.js';
import {
  FailureReasons,
  canTransition,
  isTerminal,
  type TransferChangeCallback,
  type TransferErrorCode,
  type TransferSnapshot,
  type TransferStatus,
} from './types.js';

export interface TransferOrchestratorOptions {
  registry: ConnectionRegistry;
  logger: FastifyBaseLogger;
  downloadDir: string;
  chunkSize: number;
  inactivityTimeoutMs: number;
  concurrency: ConcurrencyPolicy;
  /** Transfer id generator (default: random UUID) */
  generateId?: () => string;
}

/**
 * Outcome of an inbound chunk, for logging and tests
 */
export type ChunkOutcome = AcceptResult | { kind: 'ignored'; reason: string };

interface MutableTransfer {
  id: string;
  agentId: string;
  sourcePath: string;
  destinationPath: string;
  status: TransferStatus;
  chunksReceived: number;
  bytesReceived: number;
  totalBytes: number | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
  error: string | null;
  errorCode: TransferErrorCode | null;
}

interface TransferEntry {
  record: MutableTransfer;
  snapshot: TransferSnapshot;
  reassembler: ChunkReassembler | null;
}

/**
 * Typed event emitter interface for the orchestrator.
 */
export interface TransferOrchestratorEvents {
  transfer: TransferChangeCallback;
}

export interface TypedTransferOrchestratorEmitter {
  on<K extends keyof TransferOrchestratorEvents>(event: K, listener: TransferOrchestratorEvents[K]): this;
  off<K extends keyof TransferOrchestratorEvents>(event: K, listener: TransferOrchestratorEvents[K]): this;
  emit<K extends keyof TransferOrchestratorEvents>(
    event: K,
    ...args: Parameters<TransferOrchestratorEvents[K]>
  ): boolean;
}

const UNSAFE_FILENAME_CHARS = /[^a-zA-Z0-9._-]/g;

/**
 * Local file name for a transfer's artifact:
 * `<agentId>_<transferId>_<source basename>`.
 */
export function artifactFileName(agentId: string, transferId: string, sourcePath: string): string {
  const base = sourcePath.split(/[\\/]/).filter(Boolean).pop() ?? '';
  const safeBase = base.replace(UNSAFE_FILENAME_CHARS, '_').replace(/^\.+/, '');
  const safeAgent = agentId.replace(UNSAFE_FILENAME_CHARS, '_');
  return `${safeAgent}_${transferId}_${safeBase || 'artifact'}`;
}

function freeze(record: MutableTransfer): TransferSnapshot {
  return Object.freeze({
    ...record,
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
    completedAt: record.completedAt ? new Date(record.completedAt) : null,
  });
}

export class TransferOrchestrator extends EventEmitter implements TypedTransferOrchestratorEmitter {
  private readonly registry: ConnectionRegistry;
  private readonly logger: FastifyBaseLogger;
  private readonly downloadDir: string;
  private readonly chunkSize: number;
  private readonly concurrency: ConcurrencyPolicy;
  private readonly generateId: () => string;
  private readonly deadlines: DeadlineTracker;
  private readonly transfers = new Map<string, TransferEntry>();
  private unsubscribeRegistry: (() => void) | null;

  constructor(options: TransferOrchestratorOptions) {
    super();
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'transfer-orchestrator' });
    this.downloadDir = options.downloadDir;
    this.chunkSize = options.chunkSize;
    this.concurrency = options.concurrency;
    this.generateId = options.generateId ?? randomUUID;
    this.deadlines = new DeadlineTracker(options.inactivityTimeoutMs, (transferId) => {
      this.onDeadline(transferId);
    });
    this.unsubscribeRegistry = this.registry.onLivenessChange((change) => {
      this.onLivenessChange(change);
    });
  }

  // --- Control plane ---

  /**
   * Create a transfer and hand the request to the agent.
   * Throws AgentNotConnectedError / AgentBusyError without recording anything.
   */
  create(agentId: string, sourcePath: string): TransferSnapshot {
    const connection = this.registry.lookup(agentId);
    if (!connection) {
      throw new AgentNotConnectedError(agentId);
    }

    if (this.concurrency === 'deny' && this.hasActiveTransfer(agentId)) {
      throw new AgentBusyError(agentId);
    }

    let id = this.generateId();
    while (this.transfers.has(id)) {
      id = this.generateId();
    }

    const now = new Date();
    const record: MutableTransfer = {
      id,
      agentId,
      sourcePath,
      destinationPath: path.join(this.downloadDir, artifactFileName(agentId, id, sourcePath)),
      status: 'pending',
      chunksReceived: 0,
      bytesReceived: 0,
      totalBytes: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      error: null,
      errorCode: null,
    };
    const entry: TransferEntry = { record, snapshot: freeze(record), reassembler: null };
    this.transfers.set(id, entry);
    this.emit('transfer', entry.snapshot);

    const sent = sendMessage(
      connection.socket,
      { type: 'transfer_request', payload: { transferId: id, path: sourcePath, chunkSize: this.chunkSize } },
      (err) => {
        this.logger.warn({ transferId: id, agentId, err }, 'Transfer request could not be delivered');
        this.fail(id, 'AgentNotConnected', `${FailureReasons.AGENT_NOT_CONNECTED}: ${err.message}`);
      }
    );

    if (!sent) {
      this.fail(id, 'AgentNotConnected', FailureReasons.AGENT_NOT_CONNECTED);
      return entry.snapshot;
    }

    this.update(entry, { status: 'dispatched' });
    this.deadlines.arm(id);
    this.logger.info({ transferId: id, agentId, sourcePath }, 'Transfer dispatched');
    return entry.snapshot;
  }

  /**
   * Latest snapshot of a transfer.
   */
  status(transferId: string): TransferSnapshot | undefined {
    return this.transfers.get(transferId)?.snapshot;
  }

  /**
   * Snapshots of every known transfer, oldest first.
   */
  list(): TransferSnapshot[] {
    return Array.from(this.transfers.values(), (entry) => entry.snapshot);
  }

  /**
   * Number of transfers not yet in a terminal state.
   */
  get activeCount(): number {
    let count = 0;
    for (const entry of this.transfers.values()) {
      if (!isTerminal(entry.record.status)) count++;
    }
    return count;
  }

  /**
   * Force a transfer into `failed` with reason `cancelled`.
   * A transfer that is already terminal is returned unchanged.
   */
  cancel(transferId: string): TransferSnapshot {
    const entry = this.transfers.get(transferId);
    if (!entry) {
      throw new TransferNotFoundError(transferId);
    }
    this.fail(transferId, 'Cancelled', FailureReasons.CANCELLED);
    return entry.snapshot;
  }

  // --- Data plane ---

  /**
   * Route an inbound chunk to its transfer.
   */
  onChunk(agentId: string, chunk: ChunkMessage['payload']): ChunkOutcome {
    const entry = this.ownedEntry(agentId, chunk.transferId);
    if (!entry) {
      return { kind: 'ignored', reason: 'unknown transfer' };
    }

    const { record } = entry;
    if (isTerminal(record.status)) {
      this.logger.debug(
        { transferId: record.id, sequence: chunk.sequence, status: record.status },
        'Chunk for finished transfer ignored'
      );
      return { kind: 'ignored', reason: `transfer is ${record.status}` };
    }

    const reassembler = entry.reassembler ?? this.createReassembler(entry);
    const payload = decodeChunkData(chunk.data);
    const result = reassembler.accept(chunk.sequence, payload, chunk.isLast, chunk.totalBytes);

    if (result.kind === 'rejected') {
      this.logger.warn({ transferId: record.id, agentId, reason: result.reason }, 'Chunk rejected');
      this.fail(record.id, 'ProtocolViolation', result.reason);
      return result;
    }

    // Counted on acceptance; the write and its ack follow on the write chain
    const changes: Partial<MutableTransfer> = {
      chunksReceived: record.chunksReceived + 1,
      bytesReceived: record.bytesReceived + payload.length,
    };
    if (record.status === 'dispatched') {
      changes.status = 'in_progress';
    }
    if (chunk.sequence === 1 && chunk.totalBytes !== undefined) {
      changes.totalBytes = chunk.totalBytes;
    }
    this.update(entry, changes);

    // Once the last chunk is in, the wait is on our own disk, not the agent
    if (chunk.isLast) {
      this.deadlines.clear(record.id);
    } else {
      this.deadlines.arm(record.id);
    }

    return result;
  }

  /**
   * A frame that named a transfer could not be decoded.
   */
  onMalformed(agentId: string, transferId: string, error: string): void {
    const entry = this.ownedEntry(agentId, transferId);
    if (!entry) return;
    this.fail(transferId, 'ProtocolViolation', `malformed chunk: ${error}`);
  }

  /**
   * The agent gave up on a transfer.
   */
  onAbort(agentId: string, transferId: string, message: string): void {
    const entry = this.ownedEntry(agentId, transferId);
    if (!entry) return;
    this.fail(transferId, 'AgentAborted', message || 'aborted by agent', { notifyAgent: false });
  }

  /**
   * Fail every open transfer and release timers. The registry subscription
   * is dropped so later disconnects are not reported.
   */
  async shutdown(): Promise<void> {
    this.deadlines.clearAll();
    if (this.unsubscribeRegistry) {
      this.unsubscribeRegistry();
      this.unsubscribeRegistry = null;
    }

    const pending: Promise<void>[] = [];
    for (const entry of this.transfers.values()) {
      this.fail(entry.record.id, 'ServerShutdown', FailureReasons.SERVER_SHUTDOWN, { notifyAgent: false });
      if (entry.reassembler) {
        pending.push(entry.reassembler.settled());
      }
    }
    await Promise.all(pending);
  }

  /**
   * Resolves once the transfer's queued artifact writes have settled.
   */
  async settled(transferId: string): Promise<void> {
    await this.transfers.get(transferId)?.reassembler?.settled();
  }

  // --- Internals ---

  private ownedEntry(agentId: string, transferId: string): TransferEntry | undefined {
    const entry = this.transfers.get(transferId);
    if (!entry) {
      this.logger.warn({ agentId, transferId }, 'Message for unknown transfer');
      return undefined;
    }
    if (entry.record.agentId !== agentId) {
      this.logger.warn(
        { agentId, transferId, owner: entry.record.agentId },
        'Message for a transfer owned by another agent'
      );
      return undefined;
    }
    return entry;
  }

  private hasActiveTransfer(agentId: string): boolean {
    for (const entry of this.transfers.values()) {
      if (entry.record.agentId === agentId && !isTerminal(entry.record.status)) {
        return true;
      }
    }
    return false;
  }

  private createReassembler(entry: TransferEntry): ChunkReassembler {
    const { id, destinationPath } = entry.record;
    const reassembler = new ChunkReassembler({
      transferId: id,
      destinationPath,
      maxChunkBytes: this.chunkSize,
      logger: this.logger,
      onPersisted: (sequence) => {
        this.onPersisted(entry, sequence);
      },
      onComplete: () => {
        this.onComplete(entry);
      },
      onWriteFailure: (error) => {
        this.fail(id, 'ArtifactWriteFailure', `artifact write failed: ${error.message}`);
      },
    });
    entry.reassembler = reassembler;
    return reassembler;
  }

  private onPersisted(entry: TransferEntry, sequence: number): void {
    const { record } = entry;
    if (isTerminal(record.status)) return;

    const connection = this.registry.lookup(record.agentId);
    if (connection) {
      sendMessage(connection.socket, { type: 'chunk_ack', payload: { transferId: record.id, sequence } });
    }
  }

  private onComplete(entry: TransferEntry): void {
    const { record } = entry;
    if (isTerminal(record.status)) return;

    this.deadlines.clear(record.id);
    this.update(entry, { status: 'completed', completedAt: new Date() });
    this.logger.info(
      {
        transferId: record.id,
        agentId: record.agentId,
        chunks: record.chunksReceived,
        bytes: record.bytesReceived,
        path: record.destinationPath,
      },
      'Transfer completed'
    );
  }

  private onDeadline(transferId: string): void {
    this.logger.warn({ transferId }, 'Transfer inactive, failing');
    this.fail(transferId, 'InactivityTimeout', FailureReasons.INACTIVITY_TIMEOUT);
  }

  private onLivenessChange(change: LivenessChange): void {
    if (change.liveness !== 'disconnected') return;

    const [code, reason]: [TransferErrorCode, string] =
      change.reason === 'replaced'
        ? ['ConnectionReplaced', FailureReasons.CONNECTION_REPLACED]
        : ['AgentDisconnected', FailureReasons.AGENT_DISCONNECTED];

    for (const entry of this.transfers.values()) {
      if (entry.record.agentId === change.agentId && !isTerminal(entry.record.status)) {
        this.fail(entry.record.id, code, reason, { notifyAgent: false });
      }
    }
  }

  /**
   * Move a transfer to `failed`. No-op for terminal transfers.
   * Chunks already accepted are still written; nothing further is accepted.
   */
  private fail(
    transferId: string,
    code: TransferErrorCode,
    reason: string,
    opts: { notifyAgent?: boolean } = {}
  ): boolean {
    const entry = this.transfers.get(transferId);
    if (!entry || isTerminal(entry.record.status)) return false;

    this.deadlines.clear(transferId);
    this.update(entry, { status: 'failed', error: reason, errorCode: code });
    void entry.reassembler?.abort();

    if (opts.notifyAgent ?? true) {
      const connection = this.registry.lookup(entry.record.agentId);
      if (connection) {
        sendMessage(connection.socket, { type: 'transfer_cancel', payload: { transferId, reason } });
      }
    }

    this.logger.warn({ transferId, agentId: entry.record.agentId, code, reason }, 'Transfer failed');
    return true;
  }

  private update(entry: TransferEntry, changes: Partial<MutableTransfer>): void {
    const { record } = entry;
    if (changes.status !== undefined && changes.status !== record.status) {
      if (!canTransition(record.status, changes.status)) {
        throw new Error(`Illegal transfer transition ${record.status} -> ${changes.status}`);
      }
    }

    Object.assign(record, changes, { updatedAt: new Date() });
    entry.snapshot = freeze(record);
    this.emit('transfer', entry.snapshot);
  }
}

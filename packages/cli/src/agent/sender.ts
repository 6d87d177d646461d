/**
 * Agent-side sender: streams one requested file as numbered chunks.
 *
 * One chunk is in flight at a time; the next is sent after the server's
 * `chunk_ack`. A `transfer_cancel` stops the stream without an abort.
 */

import * as fs from 'node:fs';
import { encodeChunk } from '@edgepull/protocol';
import type { AgentMessage } from '@edgepull/protocol';
import { expandPath } from './expand-path.js';

/** Outbound half of the agent's connection */
export interface AgentChannel {
  send(message: AgentMessage): void;
}

export interface TransferSenderOptions {
  channel: AgentChannel;
  transferId: string;
  /** Path as requested by the server, before expansion */
  path: string;
  chunkSize: number;
  /** Give up when an ack takes longer than this (default: 30000) */
  ackTimeoutMs?: number;
  env?: Record<string, string | undefined>;
  homeDir?: string;
  onProgress?: (bytesSent: number, totalBytes: number) => void;
}

export type SendOutcome = 'sent' | 'cancelled' | 'aborted';

export interface SendResult {
  outcome: SendOutcome;
  transferId: string;
  /** Path after `~` and variable expansion */
  path: string;
  chunks: number;
  bytes: number;
  error?: string;
}

class TransferCancelledError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'TransferCancelledError';
  }
}

interface PendingAck {
  sequence: number;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class TransferSender {
  readonly transferId: string;
  private readonly options: TransferSenderOptions;
  private readonly ackTimeoutMs: number;
  private pending: PendingAck | null = null;
  private cancelReason: string | null = null;

  constructor(options: TransferSenderOptions) {
    this.options = options;
    this.transferId = options.transferId;
    this.ackTimeoutMs = options.ackTimeoutMs ?? 30000;
  }

  /**
   * The server persisted chunk `sequence`.
   */
  ack(sequence: number): void {
    const pending = this.pending;
    if (!pending || pending.sequence !== sequence) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve();
  }

  /**
   * Stop sending. Safe to call at any time.
   */
  cancel(reason: string): void {
    if (this.cancelReason !== null) return;
    this.cancelReason = reason;

    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timer);
      pending.reject(new TransferCancelledError(reason));
    }
  }

  /**
   * Stream the file. Never rejects; read errors become an `abort` message.
   */
  async run(): Promise<SendResult> {
    const filePath = expandPath(this.options.path, this.options.env, this.options.homeDir);
    let chunks = 0;
    let bytes = 0;

    const result = (outcome: SendOutcome, error?: string): SendResult => ({
      outcome,
      transferId: this.transferId,
      path: filePath,
      chunks,
      bytes,
      ...(error !== undefined ? { error } : {}),
    });

    try {
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) {
        throw new Error(`Not a regular file: ${filePath}`);
      }
      const totalBytes = stat.size;

      const sendChunk = async (piece: Buffer, isLast: boolean): Promise<void> => {
        this.throwIfCancelled();
        const sequence = chunks + 1;
        const acked = this.waitForAck(sequence);
        this.options.channel.send(
          encodeChunk(this.transferId, sequence, piece, isLast, sequence === 1 ? totalBytes : undefined)
        );
        await acked;
        chunks = sequence;
        bytes += piece.length;
        this.options.onProgress?.(bytes, totalBytes);
      };

      // Hold one piece back so the final chunk can carry isLast
      let held: Buffer | null = null;
      const stream = fs.createReadStream(filePath, { highWaterMark: this.options.chunkSize });
      for await (const piece of stream) {
        if (!Buffer.isBuffer(piece)) continue;
        if (held) {
          await sendChunk(held, false);
        }
        held = piece;
      }

      // An empty file is one empty final chunk
      await sendChunk(held ?? Buffer.alloc(0), true);
      return result('sent');
    } catch (err) {
      if (err instanceof TransferCancelledError) {
        return result('cancelled', err.message);
      }

      const message = err instanceof Error ? err.message : String(err);
      this.abandonPending();
      this.options.channel.send({ type: 'abort', payload: { transferId: this.transferId, message } });
      return result('aborted', message);
    }
  }

  private throwIfCancelled(): void {
    if (this.cancelReason !== null) {
      throw new TransferCancelledError(this.cancelReason);
    }
  }

  private waitForAck(sequence: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending?.sequence === sequence) {
          this.pending = null;
          reject(new Error(`Timed out waiting for acknowledgement of chunk ${sequence}`));
        }
      }, this.ackTimeoutMs);
      this.pending = { sequence, resolve, reject, timer };
    });
  }

  private abandonPending(): void {
    if (this.pending) {
      clearTimeout(this.pending.timer);
      this.pending = null;
    }
  }
}

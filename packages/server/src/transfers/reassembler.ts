/**
 * Chunk reassembler.
 *
 * Validates chunk order for one transfer and appends accepted payloads to
 * the destination artifact. Validation is synchronous so the connection
 * reader learns the verdict immediately; the write itself is queued on a
 * per-transfer promise chain and never reorders. There is no reordering
 * buffer: the artifact is always a prefix of the source.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';

export type AcceptResult = { kind: 'applied' } | { kind: 'rejected'; reason: string };

export interface ChunkReassemblerOptions {
  transferId: string;
  destinationPath: string;
  /** Largest payload accepted in a single chunk */
  maxChunkBytes: number;
  logger: FastifyBaseLogger;
  /** A chunk reached the artifact. Not reported once aborted. */
  onPersisted: (sequence: number, bytes: number) => void;
  /** The final chunk was written and the artifact closed */
  onComplete: () => void;
  onWriteFailure: (error: Error) => void;
}

type ReassemblerState = 'open' | 'finished' | 'aborted' | 'write_failed';

export class ChunkReassembler {
  private readonly options: ChunkReassemblerOptions;
  private readonly logger: FastifyBaseLogger;

  private state: ReassemblerState = 'open';
  private nextSequence = 1;
  private acceptedBytes = 0;
  private expectedBytes: number | null = null;

  private handle: fs.FileHandle | null = null;
  private position = 0;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: ChunkReassemblerOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'reassembler', transferId: options.transferId });
  }

  /** Sequence number the next chunk must carry */
  get expectedSequence(): number {
    return this.nextSequence;
  }

  get isClosed(): boolean {
    return this.state !== 'open';
  }

  /**
   * Accept or reject a chunk. An applied chunk is queued for writing.
   * `totalBytes` is honoured on the first chunk only.
   */
  accept(sequence: number, payload: Buffer, isLast: boolean, totalBytes?: number): AcceptResult {
    if (this.state !== 'open') {
      return { kind: 'rejected', reason: 'stream already closed' };
    }

    if (sequence !== this.nextSequence) {
      return {
        kind: 'rejected',
        reason: `out-of-order chunk: expected sequence ${this.nextSequence}, received ${sequence}`,
      };
    }

    if (payload.length > this.options.maxChunkBytes) {
      return {
        kind: 'rejected',
        reason: `chunk ${sequence} carries ${payload.length} bytes, limit is ${this.options.maxChunkBytes}`,
      };
    }

    const expectedBytes = sequence === 1 && totalBytes !== undefined ? totalBytes : this.expectedBytes;
    const acceptedBytes = this.acceptedBytes + payload.length;

    if (expectedBytes !== null && acceptedBytes > expectedBytes) {
      return {
        kind: 'rejected',
        reason: `received ${acceptedBytes} bytes, more than the announced ${expectedBytes}`,
      };
    }

    if (isLast && expectedBytes !== null && acceptedBytes !== expectedBytes) {
      return {
        kind: 'rejected',
        reason: `end of stream before all data received (${acceptedBytes} of ${expectedBytes} bytes)`,
      };
    }

    this.expectedBytes = expectedBytes;
    this.acceptedBytes = acceptedBytes;
    this.nextSequence = sequence + 1;
    if (isLast) {
      this.state = 'finished';
    }

    this.writeChain = this.writeChain
      .then(() => this.persist(sequence, payload, isLast))
      .catch((err: unknown) => {
        this.logger.error({ err, sequence }, 'Chunk persistence callback failed');
      });

    return { kind: 'applied' };
  }

  /**
   * Stop accepting chunks. Chunks already accepted are still written, then
   * the artifact is closed; only persistence and completion reporting stop.
   * Resolves once the artifact is closed.
   */
  abort(): Promise<void> {
    if (this.state === 'open' || this.state === 'finished') {
      this.state = 'aborted';
      this.writeChain = this.writeChain.then(() => this.closeHandle());
    }
    return this.writeChain;
  }

  /**
   * Resolves when every queued write (and close) has settled.
   */
  settled(): Promise<void> {
    return this.writeChain;
  }

  private isAborted(): boolean {
    return this.state === 'aborted' || this.state === 'write_failed';
  }

  private async persist(sequence: number, payload: Buffer, isLast: boolean): Promise<void> {
    // Nothing lands after a failed write, so the artifact stays a prefix
    if (this.state === 'write_failed') return;

    try {
      const handle = await this.openHandle();
      let offset = 0;
      while (offset < payload.length) {
        const { bytesWritten } = await handle.write(payload, offset, payload.length - offset, this.position);
        offset += bytesWritten;
        this.position += bytesWritten;
      }
      if (isLast) {
        await handle.sync();
        await this.closeHandle();
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error({ err: error, sequence }, 'Artifact write failed');
      const reportFailure = this.state !== 'aborted';
      this.state = 'write_failed';
      await this.closeHandle();
      if (reportFailure) {
        this.options.onWriteFailure(error);
      }
      return;
    }

    // Written after an abort: the bytes stay, the transfer is already decided
    if (this.isAborted()) return;

    this.options.onPersisted(sequence, payload.length);
    if (isLast) {
      this.logger.debug({ bytes: this.position, path: this.options.destinationPath }, 'Artifact closed');
      this.options.onComplete();
    }
  }

  private async openHandle(): Promise<fs.FileHandle> {
    if (this.handle) return this.handle;
    await fs.mkdir(path.dirname(this.options.destinationPath), { recursive: true });
    this.handle = await fs.open(this.options.destinationPath, 'w');
    return this.handle;
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;
    try {
      await handle.close();
    } catch (err) {
      this.logger.warn({ err }, 'Failed to close artifact');
    }
  }
}

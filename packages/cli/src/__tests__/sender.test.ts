import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { AgentMessage, ChunkMessage } from '@edgepull/protocol';
import { TransferSender, type AgentChannel, type TransferSenderOptions } from '../agent/sender.js';

/**
 * Channel that records outbound messages and lets a test decide how to
 * answer each chunk.
 */
class FakeChannel implements AgentChannel {
  readonly sent: AgentMessage[] = [];
  onChunk: (chunk: ChunkMessage) => void = () => {};

  send(message: AgentMessage): void {
    this.sent.push(message);
    if (message.type === 'chunk') {
      this.onChunk(message);
    }
  }

  chunks(): ChunkMessage[] {
    return this.sent.filter((message): message is ChunkMessage => message.type === 'chunk');
  }
}

describe('TransferSender', () => {
  let dir: string;
  let channel: FakeChannel;

  function createSender(overrides: Partial<TransferSenderOptions> = {}): TransferSender {
    return new TransferSender({
      channel,
      transferId: 't-1',
      path: path.join(dir, 'data.bin'),
      chunkSize: 16,
      ...overrides,
    });
  }

  /** Ack every chunk as soon as it is sent */
  function autoAck(sender: TransferSender): void {
    channel.onChunk = (chunk) => sender.ack(chunk.payload.sequence);
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sender-'));
    channel = new FakeChannel();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should stream a file as acknowledged chunks', async () => {
    const content = Buffer.from('0123456789abcdefghijklmnopqrstuvwxyzABCD');
    await fs.writeFile(path.join(dir, 'data.bin'), content);
    const progress: Array<[number, number]> = [];
    const sender = createSender({ onProgress: (sent, total) => progress.push([sent, total]) });
    autoAck(sender);

    const result = await sender.run();

    expect(result).toEqual({ outcome: 'sent', transferId: 't-1', path: path.join(dir, 'data.bin'), chunks: 3, bytes: 40 });

    const chunks = channel.chunks();
    expect(chunks.map((c) => c.payload.sequence)).toEqual([1, 2, 3]);
    expect(chunks.map((c) => c.payload.isLast)).toEqual([false, false, true]);
    expect(chunks[0]?.payload.totalBytes).toBe(40);
    expect(chunks[1]?.payload.totalBytes).toBeUndefined();
    expect(Buffer.concat(chunks.map((c) => Buffer.from(c.payload.data, 'base64'))).equals(content)).toBe(true);
    expect(progress).toEqual([
      [16, 40],
      [32, 40],
      [40, 40],
    ]);
  });

  it('should mark the last chunk when the size is a multiple of the chunk size', async () => {
    await fs.writeFile(path.join(dir, 'data.bin'), Buffer.alloc(32, 7));
    const sender = createSender();
    autoAck(sender);

    const result = await sender.run();

    expect(result.chunks).toBe(2);
    expect(channel.chunks().map((c) => c.payload.isLast)).toEqual([false, true]);
  });

  it('should send an empty file as a single empty final chunk', async () => {
    await fs.writeFile(path.join(dir, 'data.bin'), '');
    const sender = createSender();
    autoAck(sender);

    const result = await sender.run();

    expect(result).toMatchObject({ outcome: 'sent', chunks: 1, bytes: 0 });
    expect(channel.sent).toEqual([
      { type: 'chunk', payload: { transferId: 't-1', sequence: 1, data: '', isLast: true, totalBytes: 0 } },
    ]);
  });

  it('should expand the requested path before reading', async () => {
    await fs.writeFile(path.join(dir, 'data.bin'), 'hello');
    const sender = createSender({ path: '~/data.bin', homeDir: dir, env: {} });
    autoAck(sender);

    const result = await sender.run();

    expect(result.path).toBe(path.join(dir, 'data.bin'));
    expect(result.bytes).toBe(5);
  });

  it('should abort when the file does not exist', async () => {
    const sender = createSender({ path: path.join(dir, 'missing.txt') });

    const result = await sender.run();

    expect(result.outcome).toBe('aborted');
    expect(result.error).toContain('ENOENT');
    expect(channel.sent).toEqual([{ type: 'abort', payload: { transferId: 't-1', message: result.error } }]);
  });

  it('should abort when the path is a directory', async () => {
    const sender = createSender({ path: dir });

    const result = await sender.run();

    expect(result.error).toBe(`Not a regular file: ${dir}`);
    expect(channel.sent[0]?.type).toBe('abort');
  });

  it('should stop without an abort when cancelled mid-stream', async () => {
    await fs.writeFile(path.join(dir, 'data.bin'), Buffer.alloc(48, 1));
    const sender = createSender();
    channel.onChunk = (chunk) => {
      if (chunk.payload.sequence === 1) {
        sender.ack(1);
      } else {
        sender.cancel('cancelled by operator');
      }
    };

    const result = await sender.run();

    expect(result).toMatchObject({ outcome: 'cancelled', chunks: 1, bytes: 16, error: 'cancelled by operator' });
    expect(channel.sent.map((m) => m.type)).toEqual(['chunk', 'chunk']);
  });

  it('should ignore an ack for a different sequence', async () => {
    await fs.writeFile(path.join(dir, 'data.bin'), 'abc');
    const sender = createSender({ ackTimeoutMs: 50 });
    channel.onChunk = () => sender.ack(7);

    const result = await sender.run();

    expect(result.outcome).toBe('aborted');
  });

  it('should abort when an acknowledgement never arrives', async () => {
    await fs.writeFile(path.join(dir, 'data.bin'), 'abc');
    const sender = createSender({ ackTimeoutMs: 50 });

    const result = await sender.run();

    expect(result).toMatchObject({
      outcome: 'aborted',
      chunks: 0,
      error: 'Timed out waiting for acknowledgement of chunk 1',
    });
    expect(channel.sent[channel.sent.length - 1]).toEqual({
      type: 'abort',
      payload: { transferId: 't-1', message: 'Timed out waiting for acknowledgement of chunk 1' },
    });
  });
});

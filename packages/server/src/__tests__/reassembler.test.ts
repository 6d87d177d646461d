import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ChunkReassembler } from '../transfers/reassembler.js';
import { silentLogger } from './helpers.js';

describe('ChunkReassembler', () => {
  let dir: string;
  let destination: string;
  let onPersisted: Mock<(sequence: number, bytes: number) => void>;
  let onComplete: Mock<() => void>;
  let onWriteFailure: Mock<(error: Error) => void>;

  function create(maxChunkBytes = 16, destinationPath = destination): ChunkReassembler {
    return new ChunkReassembler({
      transferId: 'transfer-1',
      destinationPath,
      maxChunkBytes,
      logger: silentLogger(),
      onPersisted,
      onComplete,
      onWriteFailure,
    });
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reassembler-'));
    destination = path.join(dir, 'nested', 'artifact.bin');
    onPersisted = vi.fn<(sequence: number, bytes: number) => void>();
    onComplete = vi.fn<() => void>();
    onWriteFailure = vi.fn<(error: Error) => void>();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write chunks in order and complete on the last one', async () => {
    const reassembler = create();

    expect(reassembler.accept(1, Buffer.from('hello '), false, 11)).toEqual({ kind: 'applied' });
    expect(reassembler.accept(2, Buffer.from('world'), true)).toEqual({ kind: 'applied' });
    expect(reassembler.isClosed).toBe(true);

    await reassembler.settled();

    expect(await fs.readFile(destination, 'utf8')).toBe('hello world');
    expect(onPersisted.mock.calls).toEqual([
      [1, 6],
      [2, 5],
    ]);
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onWriteFailure).not.toHaveBeenCalled();
  });

  it('should reject a gap without touching the artifact', async () => {
    const reassembler = create();

    reassembler.accept(1, Buffer.from('a'), false);
    const result = reassembler.accept(3, Buffer.from('c'), false);

    expect(result).toEqual({
      kind: 'rejected',
      reason: 'out-of-order chunk: expected sequence 2, received 3',
    });
    expect(reassembler.expectedSequence).toBe(2);

    await reassembler.settled();
    expect(await fs.readFile(destination, 'utf8')).toBe('a');
  });

  it('should reject a duplicate sequence', () => {
    const reassembler = create();

    reassembler.accept(1, Buffer.from('a'), false);
    expect(reassembler.accept(1, Buffer.from('a'), false)).toEqual({
      kind: 'rejected',
      reason: 'out-of-order chunk: expected sequence 2, received 1',
    });
  });

  it('should reject a stream that does not start at 1', () => {
    const reassembler = create();

    expect(reassembler.accept(2, Buffer.from('b'), false)).toEqual({
      kind: 'rejected',
      reason: 'out-of-order chunk: expected sequence 1, received 2',
    });
  });

  it('should reject chunks larger than the limit', () => {
    const reassembler = create(4);

    expect(reassembler.accept(1, Buffer.from('too long'), false)).toEqual({
      kind: 'rejected',
      reason: 'chunk 1 carries 8 bytes, limit is 4',
    });
  });

  it('should reject end of stream before the announced size', () => {
    const reassembler = create();

    reassembler.accept(1, Buffer.from('abc'), false, 10);
    expect(reassembler.accept(2, Buffer.from('de'), true)).toEqual({
      kind: 'rejected',
      reason: 'end of stream before all data received (5 of 10 bytes)',
    });
  });

  it('should reject data beyond the announced size', () => {
    const reassembler = create();

    expect(reassembler.accept(1, Buffer.from('abcdef'), false, 4)).toEqual({
      kind: 'rejected',
      reason: 'received 6 bytes, more than the announced 4',
    });
  });

  it('should reject chunks after the stream closed', () => {
    const reassembler = create();

    reassembler.accept(1, Buffer.from('a'), true);
    expect(reassembler.accept(2, Buffer.from('b'), false)).toEqual({
      kind: 'rejected',
      reason: 'stream already closed',
    });
  });

  it('should create an empty artifact for an empty final chunk', async () => {
    const reassembler = create();

    reassembler.accept(1, Buffer.alloc(0), true, 0);
    await reassembler.settled();

    expect(await fs.readFile(destination)).toHaveLength(0);
    expect(onPersisted).toHaveBeenCalledWith(1, 0);
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it('should keep written bytes and stop reporting after abort', async () => {
    const reassembler = create();

    reassembler.accept(1, Buffer.from('kept'), false);
    await reassembler.settled();
    await reassembler.abort();

    expect(reassembler.accept(2, Buffer.from('x'), true)).toEqual({
      kind: 'rejected',
      reason: 'stream already closed',
    });
    expect(await fs.readFile(destination, 'utf8')).toBe('kept');
    expect(onPersisted).toHaveBeenCalledTimes(1);
    expect(onComplete).not.toHaveBeenCalled();
  });

  it('should finish writing accepted chunks after abort without reporting them', async () => {
    const reassembler = create();

    reassembler.accept(1, Buffer.from('one,'), false);
    reassembler.accept(2, Buffer.from('two,'), false);
    reassembler.accept(3, Buffer.from('three'), false);
    await reassembler.abort();

    expect(await fs.readFile(destination, 'utf8')).toBe('one,two,three');
    expect(onPersisted).not.toHaveBeenCalled();
    expect(onComplete).not.toHaveBeenCalled();
    expect(reassembler.accept(4, Buffer.from('four'), true)).toEqual({
      kind: 'rejected',
      reason: 'stream already closed',
    });
  });

  it('should report a write failure', async () => {
    // A regular file where a directory is expected makes mkdir fail
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'x');
    const reassembler = create(16, path.join(blocker, 'artifact.bin'));

    reassembler.accept(1, Buffer.from('data'), false);
    await reassembler.settled();

    expect(onWriteFailure).toHaveBeenCalledTimes(1);
    expect(onPersisted).not.toHaveBeenCalled();
    expect(reassembler.isClosed).toBe(true);
  });
});

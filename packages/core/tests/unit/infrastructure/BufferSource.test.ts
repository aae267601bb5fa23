import { describe, it, expect } from 'vitest';
import { BufferSource } from '../../../src/infrastructure/sources/BufferSource.js';

async function readChunks(source: BufferSource): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('BufferSource', () => {
  it('should yield string content in one chunk by default', async () => {
    expect(await readChunks(new BufferSource('a,b\n1,2\n'))).toEqual(['a,b\n1,2\n']);
  });

  it('should decode Buffer content as UTF-8', async () => {
    expect(await readChunks(new BufferSource(Buffer.from('naïve\n', 'utf-8')))).toEqual(['naïve\n']);
  });

  it('should yield fixed-size chunks when chunkSize is set', async () => {
    expect(await readChunks(new BufferSource('abcdefg', { chunkSize: 3 }))).toEqual(['abc', 'def', 'g']);
  });

  it('should yield nothing for empty content', async () => {
    expect(await readChunks(new BufferSource(''))).toEqual([]);
  });

  it('should reject a chunkSize that is not a positive integer', () => {
    expect(() => new BufferSource('a\n1\n', { chunkSize: 0 })).toThrow(
      'BufferSource: chunkSize must be a positive integer, got 0',
    );
    expect(() => new BufferSource('a', { chunkSize: -2 })).toThrow('got -2');
    expect(() => new BufferSource('a', { chunkSize: Number.NaN })).toThrow('got NaN');
    expect(() => new BufferSource('a', { chunkSize: 1.5 })).toThrow('got 1.5');
  });

  it('should report name and byte size', () => {
    expect(new BufferSource('é', { fileName: 'accent.csv' }).metadata()).toEqual({
      fileName: 'accent.csv',
      fileSize: 2,
    });
    expect(new BufferSource('abc').metadata()).toEqual({ fileName: 'buffer-input', fileSize: 3 });
  });
});

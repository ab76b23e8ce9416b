/**
 * Compression Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { compress, decompress } from '../codec.js';
import { CompressionFailedError, DecompressionFailedError } from '../../utils/errors.js';

function pseudoRandomBytes(length: number, seed = 42): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) % 2147483648;
    bytes[i] = state & 0xff;
  }
  return bytes;
}

describe('compress / decompress', () => {
  it('should round-trip an empty payload', async () => {
    const compressed = await compress(new Uint8Array(0), 'balanced');
    expect(compressed.byteLength).toBe(0);

    const restored = await decompress(compressed);
    expect(restored.byteLength).toBe(0);
  });

  it('should round-trip a single byte', async () => {
    const input = new Uint8Array([7]);
    const restored = await decompress(await compress(input, 'balanced'));

    expect(Array.from(restored)).toEqual([7]);
  });

  it('should shrink and restore 10 000 repeating bytes', async () => {
    const input = new Uint8Array(10_000).fill(0x41);
    const compressed = await compress(input, 'balanced');

    expect(compressed.byteLength).toBeLessThan(input.byteLength);
    expect(Buffer.from(await decompress(compressed)).equals(Buffer.from(input))).toBe(true);
  });

  it('should round-trip 100 000 pseudo-random bytes', async () => {
    const input = pseudoRandomBytes(100_000);
    const restored = await decompress(await compress(input, 'balanced'));

    expect(restored.byteLength).toBe(100_000);
    expect(Buffer.from(restored).equals(Buffer.from(input))).toBe(true);
  });

  it('should grow the output bound for highly compressible payloads', async () => {
    const input = new Uint8Array(2 * 1024 * 1024);
    const compressed = await compress(input, 'balanced');

    const restored = await decompress(compressed);
    expect(restored.byteLength).toBe(2 * 1024 * 1024);
  });

  it('should return the input unchanged at level none', async () => {
    const input = new Uint8Array([1, 2, 3]);
    expect(await compress(input, 'none')).toBe(input);
  });
});

describe('decompress failures', () => {
  it('should reject bytes that are not a deflate stream', async () => {
    await expect(decompress(new Uint8Array([1, 2, 3, 4]))).rejects.toBeInstanceOf(DecompressionFailedError);
  });

  it('should fail instead of truncating when the ceiling is reached', async () => {
    const compressed = await compress(new Uint8Array(200_000), 'balanced');

    const error = await decompress(compressed, { maxOutputBytes: 100_000 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DecompressionFailedError);
    expect(error).toMatchObject({
      code: 'DECOMPRESSION_FAILED',
      message: 'Decompressed payload exceeds 100000 bytes',
    });
  });

  it('should use distinct error codes for each direction', () => {
    expect(new CompressionFailedError('x').code).toBe('COMPRESSION_FAILED');
    expect(new DecompressionFailedError('x').code).toBe('DECOMPRESSION_FAILED');
  });
});

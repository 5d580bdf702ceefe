/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { InputSourceError, ReadCanceledError } from '../utils/errors.js';
import { StreamByteSource } from './byteSource.js';

function text(bytes: Uint8Array | null): string | null {
  return bytes === null ? null : Buffer.from(bytes).toString('utf8');
}

describe('StreamByteSource', () => {
  let stream: PassThrough;
  let source: StreamByteSource;

  beforeEach(() => {
    stream = new PassThrough();
    source = new StreamByteSource(stream);
  });

  it('should resolve a pending read when data arrives', async () => {
    const read = source.read(64);
    stream.write('hello');
    expect(text(await read)).toBe('hello');
  });

  it('should return at most maxBytes and keep the rest', async () => {
    stream.write('abcdef');
    expect(text(await source.read(2))).toBe('ab');
    expect(text(await source.read(64))).toBe('cdef');
  });

  it('should resolve null once the stream has ended', async () => {
    stream.end();
    expect(await source.read(64)).toBeNull();
    expect(await source.read(64)).toBeNull();
  });

  it('should deliver buffered data before reporting the end', async () => {
    stream.end('xy');
    expect(text(await source.read(64))).toBe('xy');
    expect(await source.read(64)).toBeNull();
  });

  it('should fail the pending read when cancelled', async () => {
    const read = source.read(64);
    expect(source.cancel()).toBe(true);
    await expect(read).rejects.toBeInstanceOf(ReadCanceledError);
  });

  it('should fail every read after cancel', async () => {
    source.cancel();
    expect(source.cancel()).toBe(false);
    await expect(source.read(64)).rejects.toThrow('Read canceled');
  });

  it('should reject a second concurrent read', async () => {
    const first = source.read(64);
    await expect(source.read(64)).rejects.toThrow(
      'Another read is already pending',
    );
    stream.write('a');
    expect(text(await first)).toBe('a');
  });

  it('should report stream errors to the pending and later reads', async () => {
    const read = source.read(64);
    stream.destroy(new Error('device gone'));
    await expect(read).rejects.toBeInstanceOf(InputSourceError);
    await expect(source.read(64)).rejects.toThrow(
      'Input stream failed: device gone',
    );
  });

  it('should pause the stream on close', async () => {
    source.close();
    expect(stream.isPaused()).toBe(true);
    await expect(source.read(64)).rejects.toBeInstanceOf(ReadCanceledError);
  });

  it('should stop listening for stream errors on close', () => {
    expect(stream.listenerCount('error')).toBe(1);
    source.close();
    expect(stream.listenerCount('error')).toBe(0);
  });
});

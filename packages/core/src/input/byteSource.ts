/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable } from 'node:stream';
import {
  InputSourceError,
  ReadCanceledError,
  getErrorMessage,
} from '../utils/errors.js';

/**
 * A cancellable source of raw terminal bytes. No framing is assumed: a
 * read may return part of a sequence or several sequences.
 */
export interface ByteSource {
  /**
   * Resolves with between 1 and `maxBytes` bytes, or `null` once the
   * source has ended. Rejects with `ReadCanceledError` after `cancel()`.
   */
  read(maxBytes: number): Promise<Uint8Array | null>;
  /** Fails the pending read and every later one. False if already cancelled. */
  cancel(): boolean;
  close(): void;
}

interface PendingRead {
  fail(error: Error): void;
}

function toBytes(chunk: unknown): Uint8Array | undefined {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  return undefined;
}

/**
 * Adapts a Node.js `Readable` such as `process.stdin`. Bytes beyond
 * `maxBytes` are pushed back with `unshift` for the next read.
 */
export class StreamByteSource implements ByteSource {
  private canceled = false;
  private closed = false;
  private streamError: InputSourceError | undefined;
  private pending: PendingRead | undefined;
  private readonly onStreamError = (error: unknown) => {
    this.streamError = new InputSourceError(
      `Input stream failed: ${getErrorMessage(error)}`,
      { cause: error },
    );
    this.pending?.fail(this.streamError);
  };

  constructor(private readonly stream: Readable) {
    stream.on('error', this.onStreamError);
  }

  read(maxBytes: number): Promise<Uint8Array | null> {
    if (this.canceled) {
      return Promise.reject(new ReadCanceledError());
    }
    if (this.streamError) {
      return Promise.reject(this.streamError);
    }
    if (this.pending) {
      return Promise.reject(
        new InputSourceError('Another read is already pending'),
      );
    }

    return new Promise<Uint8Array | null>((resolve, reject) => {
      const attempt = (): boolean => {
        const chunk = toBytes(this.stream.read());
        if (chunk) {
          resolve(this.take(chunk, maxBytes));
          return true;
        }
        if (this.stream.readableEnded) {
          resolve(null);
          return true;
        }
        return false;
      };

      if (attempt()) {
        return;
      }

      const cleanup = () => {
        this.stream.removeListener('readable', onReadable);
        this.stream.removeListener('end', onEnd);
        this.pending = undefined;
      };
      const onReadable = () => {
        if (attempt()) {
          cleanup();
        }
      };
      const onEnd = () => {
        cleanup();
        resolve(null);
      };

      this.pending = {
        fail: (error) => {
          cleanup();
          reject(error);
        },
      };
      this.stream.on('readable', onReadable);
      this.stream.once('end', onEnd);
    });
  }

  private take(chunk: Uint8Array, maxBytes: number): Uint8Array {
    if (chunk.length <= maxBytes) {
      return chunk;
    }
    this.stream.unshift(chunk.subarray(maxBytes));
    return chunk.subarray(0, maxBytes);
  }

  cancel(): boolean {
    if (this.canceled) {
      return false;
    }
    this.canceled = true;
    this.pending?.fail(new ReadCanceledError());
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.cancel();
    this.stream.off('error', this.onStreamError);
    this.stream.pause();
  }
}

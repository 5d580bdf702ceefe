/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_BUFFER_SIZE, MIN_BUFFER_SIZE } from '../config/settings.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import { EndOfInputError } from '../utils/errors.js';
import type { ByteSource } from './byteSource.js';
import { decodeBuffer } from './decoder.js';
import type { InputEvent } from './events.js';
import {
  type SequenceTable,
  type SequenceTableOptions,
  buildSequenceTable,
} from './sequenceTable.js';
import { decodeUtf8DroppingInvalid } from './utf8.js';

const logger = DebugLogger.getLogger('ttyinput:driver');

export interface InputDriverOptions extends SequenceTableOptions {
  /** Read buffer capacity in bytes; at least 16. */
  bufferSize?: number;
}

/**
 * Reads terminal input from a byte source and decodes it into events.
 * Single consumer: at most one `readInput`/`peekInput` call may be
 * outstanding at a time.
 */
export class InputDriver implements AsyncIterable<InputEvent> {
  private readonly table: SequenceTable;
  private readonly capacity: number;
  /** Bytes read from the source and not yet consumed. */
  private buffer: Uint8Array = new Uint8Array(0);
  private paste: Uint8Array | null = null;
  private ended = false;

  constructor(
    private readonly source: ByteSource,
    options: InputDriverOptions = {},
  ) {
    this.capacity = Math.max(
      MIN_BUFFER_SIZE,
      options.bufferSize ?? DEFAULT_BUFFER_SIZE,
    );
    this.table = buildSequenceTable(options);
  }

  get sequenceTable(): SequenceTable {
    return this.table;
  }

  /** Whether a bracketed paste is being accumulated. */
  get pasting(): boolean {
    return this.paste !== null;
  }

  /**
   * Resolves with the events of every complete unit buffered, reading
   * from the source until at least one event is available. Rejects with
   * `EndOfInputError` once the source has ended and nothing is left.
   */
  readInput(): Promise<InputEvent[]> {
    return this.decode(true);
  }

  /**
   * Like `readInput` but leaves the buffered bytes and the paste state as
   * they were. Bytes read from the source to satisfy the peek stay
   * buffered for the next call.
   */
  peekInput(): Promise<InputEvent[]> {
    return this.decode(false);
  }

  cancel(): boolean {
    return this.source.cancel();
  }

  close(): void {
    this.source.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<InputEvent, void> {
    for (;;) {
      let events: InputEvent[];
      try {
        events = await this.readInput();
      } catch (error: unknown) {
        if (error instanceof EndOfInputError) {
          return;
        }
        throw error;
      }
      yield* events;
    }
  }

  private async decode(consume: boolean): Promise<InputEvent[]> {
    let offset = 0;
    let paste = this.paste;

    for (;;) {
      const window = this.buffer.subarray(offset);

      if (window.length === 0 && this.ended) {
        if (paste) {
          if (consume) {
            this.paste = null;
          }
          logger.debug('input ended inside a bracketed paste');
          return [{ type: 'paste', text: decodeUtf8DroppingInvalid(paste) }];
        }
        throw new EndOfInputError();
      }

      if (window.length > 0) {
        const result = decodeBuffer(window, paste, this.table, {
          flush: this.ended,
          capacity: this.capacity,
        });
        offset += result.consumed;
        paste = result.paste;
        if (consume) {
          this.buffer = this.buffer.subarray(offset);
          this.paste = paste;
          offset = 0;
        }
        if (result.events.length > 0) {
          logger.debug(
            () =>
              `${consume ? 'read' : 'peeked'} ${result.events.length} event(s) from ${result.consumed} byte(s)`,
          );
          return result.events;
        }
      }

      await this.fill(offset);
    }
  }

  private async fill(offset: number): Promise<void> {
    const free = this.capacity - (this.buffer.length - offset);
    const chunk = await this.source.read(Math.max(free, 1));
    if (chunk === null) {
      this.ended = true;
      logger.debug('input source ended');
      return;
    }
    this.buffer = Buffer.concat([this.buffer, chunk]);
  }
}

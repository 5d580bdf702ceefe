/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PASTE_END_8BIT_BYTES, PASTE_END_BYTES } from './ansi.js';
import type { InputEvent } from './events.js';
import { decodeNext } from './parser.js';
import type { SequenceTable } from './sequenceTable.js';
import { decodeRune, decodeUtf8DroppingInvalid } from './utf8.js';

export interface BufferDecodeResult {
  /** Bytes of the buffer that were decoded or absorbed into a paste. */
  consumed: number;
  events: InputEvent[];
  /** Raw paste bytes accumulated so far, or `null` when not pasting. */
  paste: Uint8Array | null;
}

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length);
}

// 7-bit `ESC [ 201 ~` and 8-bit `CSI 201 ~`.
const PASTE_END_MARKERS = [PASTE_END_BYTES, PASTE_END_8BIT_BYTES];

export interface BufferDecodeOptions {
  /** No more bytes will arrive; every incomplete unit is forced out. */
  flush?: boolean;
  /**
   * Read buffer capacity. A unit whose remaining window already fills the
   * buffer is forced out, since more bytes cannot arrive to complete it.
   */
  capacity?: number;
}

/**
 * Length of the longest suffix of `bytes` that is a proper prefix of a
 * paste-end marker.
 */
export function partialPasteEndLength(bytes: Uint8Array): number {
  let longest = 0;
  for (const marker of PASTE_END_MARKERS) {
    const max = Math.min(marker.length - 1, bytes.length);
    for (let k = max; k > longest; k--) {
      const tail = asBuffer(bytes.subarray(bytes.length - k));
      if (tail.equals(marker.subarray(0, k))) {
        longest = k;
        break;
      }
    }
  }
  return longest;
}

/** Whether the byte at `index` continues a code point started before it. */
function continuesUtf8(bytes: Uint8Array, index: number): boolean {
  for (let back = 1; back <= 3 && back <= index; back++) {
    const rune = decodeRune(bytes, index - back);
    if (rune.kind === 'rune' && rune.size > back) {
      return true;
    }
  }
  return false;
}

interface PasteEnd {
  index: number;
  length: number;
}

/**
 * The earliest paste-end marker in `bytes`. `before` holds the pasted bytes
 * preceding it: an 8-bit CSI byte that continues a UTF-8 code point is text,
 * not a marker.
 */
function findPasteEnd(
  bytes: Uint8Array,
  before: Uint8Array,
): PasteEnd | undefined {
  const context = before.subarray(Math.max(0, before.length - 3));
  const haystack = Buffer.concat([context, bytes]);
  let found: PasteEnd | undefined;

  for (const marker of PASTE_END_MARKERS) {
    let index = haystack.indexOf(marker, context.length);
    while (
      index !== -1 &&
      marker === PASTE_END_8BIT_BYTES &&
      continuesUtf8(haystack, index)
    ) {
      index = haystack.indexOf(marker, index + 1);
    }
    if (index !== -1 && (found === undefined || index < found.index)) {
      found = { index, length: marker.length };
    }
  }

  return (
    found && { index: found.index - context.length, length: found.length }
  );
}

function append(paste: Uint8Array, chunk: Uint8Array): Uint8Array {
  if (chunk.length === 0) {
    return paste;
  }
  // Copy on write.
  return Buffer.concat([paste, chunk]);
}

/**
 * Decodes every complete unit in `buf`.
 *
 * `paste` is the accumulator carried over from the previous call. While it
 * is non-null bytes are collected verbatim up to the paste-end marker,
 * which then yields `paste-end` followed by the `paste` text. The
 * accumulator passed in is never mutated.
 */
export function decodeBuffer(
  buf: Uint8Array,
  paste: Uint8Array | null,
  table: SequenceTable,
  options: BufferDecodeOptions = {},
): BufferDecodeResult {
  const events: InputEvent[] = [];
  let offset = 0;

  while (offset < buf.length) {
    const rest = buf.subarray(offset);

    if (paste) {
      const marker = findPasteEnd(rest, paste);
      if (!marker) {
        // Held back even when the buffer is full.
        const keep = options.flush ? 0 : partialPasteEndLength(rest);
        paste = append(paste, rest.subarray(0, rest.length - keep));
        offset += rest.length - keep;
        break;
      }

      paste = append(paste, rest.subarray(0, marker.index));
      events.push(
        { type: 'paste-end' },
        { type: 'paste', text: decodeUtf8DroppingInvalid(paste) },
      );
      paste = null;
      offset += marker.index + marker.length;
      continue;
    }

    const flush =
      options.flush === true ||
      (options.capacity !== undefined && rest.length >= options.capacity);
    const result = decodeNext(rest, table, { flush });
    if (result.consumed === 0) {
      break;
    }
    offset += result.consumed;
    for (const event of result.events) {
      events.push(event);
      if (event.type === 'paste-start') {
        paste = new Uint8Array(0);
      }
    }
  }

  return { consumed: offset, events, paste };
}

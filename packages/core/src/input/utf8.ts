/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const REPLACEMENT_CHARACTER = '\uFFFD';

export type RuneResult =
  | { kind: 'rune'; codePoint: number; size: number }
  | { kind: 'invalid' }
  | { kind: 'incomplete' };

const INVALID: RuneResult = { kind: 'invalid' };
const INCOMPLETE: RuneResult = { kind: 'incomplete' };

function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Decodes one UTF-8 code point at `start`. Overlong forms, surrogates and
 * values above U+10FFFF are invalid. A valid prefix cut off by `end` is
 * incomplete.
 */
export function decodeRune(
  bytes: Uint8Array,
  start: number,
  end: number = bytes.length,
): RuneResult {
  const lead = bytes[start];
  if (lead < 0x80) {
    return { kind: 'rune', codePoint: lead, size: 1 };
  }

  let size: number;
  let codePoint: number;
  let min = 0x80;
  let max = 0xbf;
  if (lead >= 0xc2 && lead <= 0xdf) {
    size = 2;
    codePoint = lead & 0x1f;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    size = 3;
    codePoint = lead & 0x0f;
    if (lead === 0xe0) {
      min = 0xa0;
    } else if (lead === 0xed) {
      max = 0x9f;
    }
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    size = 4;
    codePoint = lead & 0x07;
    if (lead === 0xf0) {
      min = 0x90;
    } else if (lead === 0xf4) {
      max = 0x8f;
    }
  } else {
    return INVALID;
  }

  for (let k = 1; k < size; k++) {
    if (start + k >= end) {
      return INCOMPLETE;
    }
    const byte = bytes[start + k];
    if (k === 1 ? byte < min || byte > max : !isContinuation(byte)) {
      return INVALID;
    }
    codePoint = (codePoint << 6) | (byte & 0x3f);
  }

  return { kind: 'rune', codePoint, size };
}

export function isValidCodePoint(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 0x10ffff &&
    (value < 0xd800 || value > 0xdfff)
  );
}

/**
 * Decodes UTF-8 text, dropping bytes that do not form valid code points.
 */
export function decodeUtf8DroppingInvalid(bytes: Uint8Array): string {
  let text = '';
  let i = 0;
  while (i < bytes.length) {
    const rune = decodeRune(bytes, i);
    if (rune.kind === 'rune') {
      text += String.fromCodePoint(rune.codePoint);
      i += rune.size;
    } else {
      i++;
    }
  }
  return text;
}

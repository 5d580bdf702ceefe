/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { FatalError } from '@ttyinput/core';
import { USAGE_EXIT_CODE } from '../config/args.js';

const SIMPLE_ESCAPES: Readonly<Record<string, number>> = {
  e: 0x1b,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  '\\': 0x5c,
};

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

function readHex(text: string, start: number, length: number): number {
  const digits = text.slice(start, start + length);
  if (digits.length !== length || !HEX_DIGITS.test(digits)) {
    throw new FatalError(
      `Expected ${length} hex digits at offset ${start} of "${text}"`,
      USAGE_EXIT_CODE,
    );
  }
  return parseInt(digits, 16);
}

/**
 * Turns a command line string into terminal bytes. `\xHH` is a raw byte,
 * `\uHHHH` a UTF-8 encoded code point, and everything outside an escape
 * is UTF-8 encoded.
 */
export function unescapeInput(text: string): Uint8Array {
  const bytes: number[] = [];
  let i = 0;

  while (i < text.length) {
    if (text[i] !== '\\') {
      const codePoint = text.codePointAt(i) ?? 0;
      const char = String.fromCodePoint(codePoint);
      bytes.push(...Buffer.from(char, 'utf8'));
      i += char.length;
      continue;
    }

    const escape = text[i + 1];
    if (escape === 'x') {
      bytes.push(readHex(text, i + 2, 2));
      i += 4;
    } else if (escape === 'u') {
      const codePoint = readHex(text, i + 2, 4);
      bytes.push(...Buffer.from(String.fromCodePoint(codePoint), 'utf8'));
      i += 6;
    } else if (escape !== undefined && escape in SIMPLE_ESCAPES) {
      bytes.push(SIMPLE_ESCAPES[escape]);
      i += 2;
    } else {
      throw new FatalError(
        `Unsupported escape "\\${escape ?? ''}" at offset ${i} of "${text}"`,
        USAGE_EXIT_CODE,
      );
    }
  }

  return Uint8Array.from(bytes);
}

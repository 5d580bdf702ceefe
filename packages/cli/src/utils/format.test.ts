/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { type InputEvent, KeyMod, keyEvent } from '@ttyinput/core';
import { formatEvent, formatPeekedEvent, quote } from './format.js';

describe('quote', () => {
  it('should escape quotes, backslashes and whitespace controls', () => {
    expect(quote('a"b\\c\n\r\t')).toBe('"a\\"b\\\\c\\n\\r\\t"');
  });

  it('should write other control characters as hex bytes', () => {
    expect(quote('\x1b[A\x7f\u0085')).toBe('"\\x1b[A\\x7f\\x85"');
  });

  it('should keep printable non-ASCII text unless quoting raw bytes', () => {
    expect(quote('é')).toBe('"é"');
    expect(quote('\xc3\xa9', true)).toBe('"\\xc3\\xa9"');
  });
});

describe('formatEvent', () => {
  it.each<[InputEvent, string]>([
    [keyEvent({ runes: 'a', modifiers: KeyMod.Ctrl }), 'key ctrl+a'],
    [keyEvent({ sym: 'up', action: 'release' }), 'key up release'],
    [keyEvent({ runes: ' ', action: 'repeat' }), 'key space repeat'],
    [
      {
        type: 'mouse',
        x: 9,
        y: 19,
        button: 'left',
        action: 'press',
        modifiers: KeyMod.None,
      },
      'mouse left press 9,19',
    ],
    [
      {
        type: 'mouse',
        x: 0,
        y: 0,
        button: 'wheel-up',
        action: 'press',
        modifiers: KeyMod.Shift | KeyMod.Ctrl,
      },
      'mouse ctrl+shift+wheel-up press 0,0',
    ],
    [{ type: 'paste', text: 'ab\x1b[Ac' }, 'paste "ab\\x1b[Ac"'],
    [
      { type: 'background-color', color: { r: 16, g: 32, b: 48, a: 255 } },
      'background-color #102030',
    ],
    [
      { type: 'cursor-color', color: { r: 255, g: 0, b: 0, a: 128 } },
      'cursor-color #ff000080',
    ],
    [{ type: 'unknown', raw: '\x1b[?1;2c' }, 'unknown "\\x1b[?1;2c"'],
    [{ type: 'paste-start' }, 'paste-start'],
    [{ type: 'focus-out' }, 'focus-out'],
  ])('should format %j as text', (event, expected) => {
    expect(formatEvent(event, 'text')).toBe(expected);
  });

  it('should write the event object as JSON', () => {
    expect(formatEvent({ type: 'paste', text: 'x' }, 'json')).toBe(
      '{"type":"paste","text":"x"}',
    );
  });
});

describe('formatPeekedEvent', () => {
  it('should mark peeked events', () => {
    expect(formatPeekedEvent({ type: 'focus-in' }, 'text')).toBe(
      'peek focus-in',
    );
    expect(formatPeekedEvent({ type: 'focus-in' }, 'json')).toBe(
      '{"peek":{"type":"focus-in"}}',
    );
  });
});

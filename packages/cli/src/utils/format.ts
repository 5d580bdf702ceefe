/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type InputEvent,
  assertNever,
  colorToHex,
  keyToString,
  modifiersToString,
} from '@ttyinput/core';
import type { OutputFormat } from '../config/args.js';

const NAMED_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

function hexByte(code: number): string {
  return `\\x${code.toString(16).padStart(2, '0')}`;
}

/**
 * Quotes text for one line of output. Control characters become `\xHH`.
 * With `rawBytes`, every character is a byte and those above 0x7f are
 * escaped too.
 */
export function quote(text: string, rawBytes = false): string {
  let out = '';
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    const named = NAMED_ESCAPES[char];
    if (named !== undefined) {
      out += named;
    } else if (
      code < 0x20 ||
      code === 0x7f ||
      (code >= 0x80 && code < 0xa0) ||
      (rawBytes && code > 0x7f)
    ) {
      out += hexByte(code);
    } else {
      out += char;
    }
  }
  return `"${out}"`;
}

function formatText(event: InputEvent): string {
  switch (event.type) {
    case 'key': {
      const action = event.action === 'press' ? '' : ` ${event.action}`;
      return `key ${keyToString(event)}${action}`;
    }
    case 'mouse': {
      const modifiers = modifiersToString(event.modifiers);
      const button = modifiers ? `${modifiers}+${event.button}` : event.button;
      return `mouse ${button} ${event.action} ${event.x},${event.y}`;
    }
    case 'paste':
      return `paste ${quote(event.text)}`;
    case 'foreground-color':
    case 'background-color':
    case 'cursor-color':
      return `${event.type} ${colorToHex(event.color)}`;
    case 'unknown':
      return `unknown ${quote(event.raw, true)}`;
    case 'paste-start':
    case 'paste-end':
    case 'focus-in':
    case 'focus-out':
      return event.type;
    default:
      return assertNever(event);
  }
}

export function formatEvent(event: InputEvent, format: OutputFormat): string {
  return format === 'json' ? JSON.stringify(event) : formatText(event);
}

/** Formats an event returned by a peek, which is read again afterwards. */
export function formatPeekedEvent(
  event: InputEvent,
  format: OutputFormat,
): string {
  return format === 'json'
    ? JSON.stringify({ peek: event })
    : `peek ${formatText(event)}`;
}

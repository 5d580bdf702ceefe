/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { MouseAction, MouseButton, MouseEvent } from './events.js';
import { KeyMod } from './keys.js';
import { type CsiParams, param } from './params.js';

const MOUSE_SHIFT = 4;
const MOUSE_ALT = 8;
const MOUSE_CTRL = 16;
const MOUSE_MOTION = 32;
const MOUSE_WHEEL = 64;
const MOUSE_EXTRA = 128;

const BASIC_BUTTONS: readonly MouseButton[] = ['left', 'middle', 'right'];
const WHEEL_BUTTONS: readonly MouseButton[] = [
  'wheel-up',
  'wheel-down',
  'wheel-left',
  'wheel-right',
];
const EXTRA_BUTTONS: readonly MouseButton[] = [
  'backward',
  'forward',
  'button10',
  'button11',
];

interface DecodedButton {
  button: MouseButton;
  isWheel: boolean;
  modifiers: number;
}

function decodeButton(code: number): DecodedButton {
  const low = code & 3;
  let modifiers: number = KeyMod.None;
  if ((code & MOUSE_SHIFT) !== 0) modifiers |= KeyMod.Shift;
  if ((code & MOUSE_ALT) !== 0) modifiers |= KeyMod.Alt;
  if ((code & MOUSE_CTRL) !== 0) modifiers |= KeyMod.Ctrl;

  if ((code & MOUSE_EXTRA) !== 0) {
    return { button: EXTRA_BUTTONS[low], isWheel: false, modifiers };
  }
  if ((code & MOUSE_WHEEL) !== 0) {
    return { button: WHEEL_BUTTONS[low], isWheel: true, modifiers };
  }
  return { button: BASIC_BUTTONS[low] ?? 'none', isWheel: false, modifiers };
}

/**
 * Decodes the three bytes following `CSI M`: button code, column and row,
 * each offset by 32, with 1-based coordinates.
 */
export function parseX10Mouse(
  bytes: Uint8Array,
  start: number,
): MouseEvent {
  const [code, col, row] = [
    bytes[start],
    bytes[start + 1],
    bytes[start + 2],
  ].map((b) => (b >= 32 ? b - 32 : b));

  const { button, isWheel, modifiers } = decodeButton(code);
  let action: MouseAction = 'press';
  if ((code & MOUSE_MOTION) !== 0 && !isWheel) {
    action = 'motion';
  } else if (button === 'none') {
    action = 'release';
  }

  return { type: 'mouse', x: col - 1, y: row - 1, button, action, modifiers };
}

/**
 * Decodes the `b;x;y` parameters of an SGR report. `final` is `M` for
 * press and motion, `m` for release. Missing parameters yield `undefined`.
 */
export function parseSgrMouse(
  params: CsiParams,
  final: 'M' | 'm',
): MouseEvent | undefined {
  const code = param(params, 0);
  const col = param(params, 1);
  const row = param(params, 2);
  if (code === undefined || col === undefined || row === undefined) {
    return undefined;
  }

  const { button, isWheel, modifiers } = decodeButton(code);
  let action: MouseAction = 'press';
  if (final === 'm') {
    action = 'release';
  } else if ((code & MOUSE_MOTION) !== 0 && !isWheel) {
    action = 'motion';
  }

  return { type: 'mouse', x: col - 1, y: row - 1, button, action, modifiers };
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Named keys. Function keys are `f1`…`f63` and are not listed here.
 */
export const NAMED_KEY_SYMS = [
  'none',
  'up',
  'down',
  'right',
  'left',
  'begin',
  'find',
  'insert',
  'delete',
  'select',
  'pageup',
  'pagedown',
  'home',
  'end',
  'backspace',
  'tab',
  'return',
  'escape',
  'space',
  'kp-enter',
  'kp-equal',
  'kp-multiply',
  'kp-plus',
  'kp-comma',
  'kp-minus',
  'kp-decimal',
  'kp-divide',
  'kp-0',
  'kp-1',
  'kp-2',
  'kp-3',
  'kp-4',
  'kp-5',
  'kp-6',
  'kp-7',
  'kp-8',
  'kp-9',
  'kp-sep',
  'kp-up',
  'kp-down',
  'kp-left',
  'kp-right',
  'kp-pageup',
  'kp-pagedown',
  'kp-home',
  'kp-end',
  'kp-insert',
  'kp-delete',
  'kp-begin',
  'caps-lock',
  'scroll-lock',
  'num-lock',
  'print-screen',
  'pause',
  'menu',
  'media-play',
  'media-pause',
  'media-play-pause',
  'media-reverse',
  'media-stop',
  'media-fast-forward',
  'media-rewind',
  'media-next',
  'media-prev',
  'media-record',
  'lower-volume',
  'raise-volume',
  'mute',
  'left-shift',
  'left-alt',
  'left-ctrl',
  'left-super',
  'left-hyper',
  'left-meta',
  'right-shift',
  'right-alt',
  'right-ctrl',
  'right-super',
  'right-hyper',
  'right-meta',
  'iso-level3-shift',
  'iso-level5-shift',
] as const;

export type NamedKeySym = (typeof NAMED_KEY_SYMS)[number];
export type FunctionKeySym = `f${number}`;
export type KeySym = NamedKeySym | FunctionKeySym;

export const MAX_FUNCTION_KEY = 63;

export function functionKey(n: number): FunctionKeySym {
  return `f${n}`;
}

const NAMED_KEY_SET: ReadonlySet<string> = new Set(NAMED_KEY_SYMS);
const FUNCTION_KEY_REGEX = /^f([1-9]\d?)$/;

export function isKeySym(value: string): value is KeySym {
  if (NAMED_KEY_SET.has(value)) {
    return true;
  }
  const match = value.match(FUNCTION_KEY_REGEX);
  return match !== null && Number(match[1]) <= MAX_FUNCTION_KEY;
}

/**
 * Modifier bit set carried by key and mouse events.
 */
export const KeyMod = {
  None: 0,
  Shift: 1 << 0,
  Alt: 1 << 1,
  Ctrl: 1 << 2,
  Meta: 1 << 3,
  Hyper: 1 << 4,
  Super: 1 << 5,
  CapsLock: 1 << 6,
  NumLock: 1 << 7,
  ScrollLock: 1 << 8,
} as const;

export type KeyModName = Exclude<keyof typeof KeyMod, 'None'>;

const MODIFIER_NAMES: ReadonlyArray<[number, string]> = [
  [KeyMod.Ctrl, 'ctrl'],
  [KeyMod.Alt, 'alt'],
  [KeyMod.Shift, 'shift'],
  [KeyMod.Meta, 'meta'],
  [KeyMod.Hyper, 'hyper'],
  [KeyMod.Super, 'super'],
];

/**
 * Renders a modifier set as `ctrl+alt+…`, without the lock keys.
 */
export function modifiersToString(modifiers: number): string {
  return MODIFIER_NAMES.filter(([bit]) => (modifiers & bit) !== 0)
    .map(([, name]) => name)
    .join('+');
}

/**
 * Parses modifier names such as `shift` or `ctrl` into a bit set.
 * Unknown names yield `undefined`.
 */
export function parseModifierNames(
  names: readonly string[],
): number | undefined {
  let modifiers: number = KeyMod.None;
  for (const name of names) {
    const entry = MODIFIER_NAMES.find(([, n]) => n === name);
    if (!entry) {
      return undefined;
    }
    modifiers |= entry[0];
  }
  return modifiers;
}

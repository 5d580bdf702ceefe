/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { readDataFile } from '../utils/dataFiles.js';
import { type KeyAction, type KeyEvent, keyEvent } from './events.js';
import { type KeySym, KeyMod, isKeySym } from './keys.js';
import { type CsiParams, param } from './params.js';
import { REPLACEMENT_CHARACTER, isValidCodePoint } from './utf8.js';

/**
 * Modifier bits of the Kitty keyboard protocol, reported as `1 + mask`.
 * @see https://sw.kovidgoyal.net/kitty/keyboard-protocol/#modifiers
 */
export const KittyMod = {
  Shift: 1 << 0,
  Alt: 1 << 1,
  Ctrl: 1 << 2,
  Super: 1 << 3,
  Hyper: 1 << 4,
  Meta: 1 << 5,
  CapsLock: 1 << 6,
  NumLock: 1 << 7,
} as const;

const KITTY_TO_KEYMOD: ReadonlyArray<[number, number]> = [
  [KittyMod.Shift, KeyMod.Shift],
  [KittyMod.Alt, KeyMod.Alt],
  [KittyMod.Ctrl, KeyMod.Ctrl],
  [KittyMod.Super, KeyMod.Super],
  [KittyMod.Hyper, KeyMod.Hyper],
  [KittyMod.Meta, KeyMod.Meta],
  [KittyMod.CapsLock, KeyMod.CapsLock],
  [KittyMod.NumLock, KeyMod.NumLock],
];

export function fromKittyModifiers(mask: number): number {
  let modifiers: number = KeyMod.None;
  for (const [kitty, mod] of KITTY_TO_KEYMOD) {
    if ((mask & kitty) !== 0) {
      modifiers |= mod;
    }
  }
  return modifiers;
}

/**
 * Decodes the `modifiers:event-type` parameter shared by `CSI … u` and the
 * enhanced legacy forms (`CSI 1;5:3A`).
 */
export function parseModifierParam(
  params: CsiParams,
  index: number,
): { modifiers: number; action: KeyAction } {
  const mods = param(params, index) ?? 1;
  let action: KeyAction = 'press';
  switch (param(params, index, 1)) {
    case 2:
      action = 'repeat';
      break;
    case 3:
      action = 'release';
      break;
    default:
      break;
  }
  return {
    modifiers: mods > 1 ? fromKittyModifiers(mods - 1) : KeyMod.None,
    action,
  };
}

const kittyKeysSchema = z.record(
  z.string().regex(/^\d+$/),
  z.string().refine(isKeySym),
);

let kittyKeys: ReadonlyMap<number, KeySym> | undefined;

/** Symbol for a Kitty key code, for codes that are not plain text. */
export function kittyKeySym(code: number): KeySym | undefined {
  if (!kittyKeys) {
    const parsed = kittyKeysSchema.parse(readDataFile('kitty-keys.json'));
    kittyKeys = new Map(
      Object.entries(parsed).map(([k, sym]): [number, KeySym] => [
        Number(k),
        sym,
      ]),
    );
  }
  return kittyKeys.get(code);
}

function rune(code: number): string {
  return isValidCodePoint(code)
    ? String.fromCodePoint(code)
    : REPLACEMENT_CHARACTER;
}

/**
 * Decodes the parameters of `CSI key-code:alternates ; modifiers:event ;
 * text u`.
 */
export function parseKittyKey(params: CsiParams): KeyEvent {
  let sym: KeySym = 'none';
  let runes = '';
  let altRunes = '';

  const code = param(params, 0);
  if (code !== undefined) {
    const named = kittyKeySym(code);
    if (named) {
      sym = named;
    } else {
      runes = rune(code);
      const alternate = param(params, 0, 1);
      if (alternate !== undefined && isValidCodePoint(alternate)) {
        altRunes = String.fromCodePoint(alternate);
      }
    }
  }

  const { modifiers, action } = parseModifierParam(params, 1);

  for (const value of params[2] ?? []) {
    if (value !== undefined) {
      altRunes += rune(value);
    }
  }

  return keyEvent({ sym, runes, altRunes, modifiers, action });
}

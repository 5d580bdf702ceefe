/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { type KeySym, KeyMod, modifiersToString } from './keys.js';

export type KeyAction = 'press' | 'repeat' | 'release';

export interface KeyEvent {
  type: 'key';
  /** Named key, or `none` for keys reported through their runes. */
  sym: KeySym;
  /** Code points produced by the key, in order. */
  runes: string;
  /** Shifted or base-layout code points reported by the Kitty protocol. */
  altRunes: string;
  modifiers: number;
  action: KeyAction;
}

export type MouseButton =
  | 'none'
  | 'left'
  | 'middle'
  | 'right'
  | 'wheel-up'
  | 'wheel-down'
  | 'wheel-left'
  | 'wheel-right'
  | 'backward'
  | 'forward'
  | 'button10'
  | 'button11';

export type MouseAction = 'press' | 'release' | 'motion';

export interface MouseEvent {
  type: 'mouse';
  /** 0-based column. */
  x: number;
  /** 0-based row. */
  y: number;
  button: MouseButton;
  action: MouseAction;
  modifiers: number;
}

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface ColorEvent {
  type: 'foreground-color' | 'background-color' | 'cursor-color';
  color: Color;
}

export interface PasteEvent {
  type: 'paste';
  text: string;
}

export interface UnknownEvent {
  type: 'unknown';
  /** The bytes of the sequence, one character per byte. */
  raw: string;
}

export type InputEvent =
  | KeyEvent
  | MouseEvent
  | { type: 'paste-start' }
  | { type: 'paste-end' }
  | PasteEvent
  | ColorEvent
  | { type: 'focus-in' }
  | { type: 'focus-out' }
  | UnknownEvent;

export type InputEventType = InputEvent['type'];

export function keyEvent(init: Partial<Omit<KeyEvent, 'type'>>): KeyEvent {
  return {
    type: 'key',
    sym: init.sym ?? 'none',
    runes: init.runes ?? '',
    altRunes: init.altRunes ?? '',
    modifiers: init.modifiers ?? KeyMod.None,
    action: init.action ?? 'press',
  };
}

export function withModifiers(key: KeyEvent, modifiers: number): KeyEvent {
  if (modifiers === KeyMod.None) {
    return key;
  }
  return { ...key, modifiers: key.modifiers | modifiers };
}

export function unknownEvent(raw: string): UnknownEvent {
  return { type: 'unknown', raw };
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected input event: ${JSON.stringify(value)}`);
}

/**
 * Renders a key the way keybinding configs spell it, e.g. `ctrl+alt+a`,
 * `shift+tab` or `space`.
 */
export function keyToString(key: KeyEvent): string {
  let name: string;
  if (key.sym !== 'none') {
    name = key.sym;
  } else if (key.runes === ' ') {
    name = 'space';
  } else {
    name = key.runes;
  }
  const prefix = modifiersToString(key.modifiers);
  return prefix ? `${prefix}+${name}` : name;
}

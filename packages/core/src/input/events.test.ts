/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { keyEvent, keyToString, withModifiers } from './events.js';
import { KeyMod } from './keys.js';

describe('keyToString', () => {
  it('should render named keys with modifiers', () => {
    expect(
      keyToString(keyEvent({ sym: 'tab', modifiers: KeyMod.Shift })),
    ).toBe('shift+tab');
    expect(
      keyToString(
        keyEvent({ runes: 'a', modifiers: KeyMod.Ctrl | KeyMod.Alt }),
      ),
    ).toBe('ctrl+alt+a');
  });

  it('should render a space rune as space', () => {
    expect(keyToString(keyEvent({ runes: ' ' }))).toBe('space');
  });

  it('should leave out lock modifiers', () => {
    expect(
      keyToString(keyEvent({ runes: 'x', modifiers: KeyMod.CapsLock })),
    ).toBe('x');
  });
});

describe('withModifiers', () => {
  it('should return the same key when adding nothing', () => {
    const key = keyEvent({ sym: 'up' });
    expect(withModifiers(key, KeyMod.None)).toBe(key);
  });

  it('should not modify the key it was given', () => {
    const key = keyEvent({ sym: 'up', modifiers: KeyMod.Shift });
    expect(withModifiers(key, KeyMod.Alt).modifiers).toBe(
      KeyMod.Shift | KeyMod.Alt,
    );
    expect(key.modifiers).toBe(KeyMod.Shift);
  });
});

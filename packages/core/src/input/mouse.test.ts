/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { KeyMod } from './keys.js';
import { parseSgrMouse, parseX10Mouse } from './mouse.js';

describe('parseSgrMouse', () => {
  it.each([
    [1, 'middle'],
    [2, 'right'],
    [65, 'wheel-down'],
    [66, 'wheel-left'],
    [67, 'wheel-right'],
    [128, 'backward'],
    [129, 'forward'],
    [130, 'button10'],
    [131, 'button11'],
  ])('should decode button code %i as %s', (code, button) => {
    expect(parseSgrMouse([[code], [1], [1]], 'M')).toMatchObject({
      button,
      action: 'press',
    });
  });

  it('should not report wheel events as motion', () => {
    expect(parseSgrMouse([[96], [1], [1]], 'M')).toMatchObject({
      button: 'wheel-up',
      action: 'press',
    });
  });

  it('should decode Shift and Alt', () => {
    expect(parseSgrMouse([[12], [1], [1]], 'M')).toMatchObject({
      modifiers: KeyMod.Shift | KeyMod.Alt,
    });
  });

  it('should reject reports with missing parameters', () => {
    expect(parseSgrMouse([[0], [1]], 'M')).toBeUndefined();
    expect(parseSgrMouse([[0], [undefined], [1]], 'M')).toBeUndefined();
  });
});

describe('parseX10Mouse', () => {
  it('should remove the offset of 32 and convert to 0-based', () => {
    expect(parseX10Mouse(Buffer.from('\x22!!'), 0)).toEqual({
      type: 'mouse',
      x: 0,
      y: 0,
      button: 'right',
      action: 'press',
      modifiers: KeyMod.None,
    });
  });

  it('should decode motion with a button held', () => {
    expect(parseX10Mouse(Buffer.from('@%&'), 0)).toEqual({
      type: 'mouse',
      x: 4,
      y: 5,
      button: 'left',
      action: 'motion',
      modifiers: KeyMod.None,
    });
  });

  it('should read from the given offset', () => {
    expect(parseX10Mouse(Buffer.from('xx`!!'), 2)).toMatchObject({
      button: 'wheel-up',
      action: 'press',
    });
  });
});

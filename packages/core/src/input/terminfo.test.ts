/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { keyEvent } from './events.js';
import { DecoderFlag } from './flags.js';
import { KeyMod } from './keys.js';
import { buildTerminfoKeys, functionKeyCapability } from './terminfo.js';

describe('functionKeyCapability', () => {
  it.each([
    [1, 'f1', KeyMod.None],
    [12, 'f12', KeyMod.None],
    [13, 'f1', KeyMod.Shift],
    [24, 'f12', KeyMod.Shift],
    [25, 'f1', KeyMod.Ctrl],
    [37, 'f1', KeyMod.Ctrl | KeyMod.Shift],
    [49, 'f1', KeyMod.Alt],
    [61, 'f1', KeyMod.Alt | KeyMod.Shift],
    [63, 'f3', KeyMod.Alt | KeyMod.Shift],
  ])('should fold kf%i onto %s', (n, sym, modifiers) => {
    expect(functionKeyCapability(n, 0)).toEqual({ sym, modifiers });
  });

  it('should reject numbers outside 1–63', () => {
    expect(functionKeyCapability(0, 0)).toBeUndefined();
    expect(functionKeyCapability(64, 0)).toBeUndefined();
  });

  it('should not fold with FKeys', () => {
    expect(functionKeyCapability(40, DecoderFlag.FKeys)).toEqual({
      sym: 'f40',
      modifiers: KeyMod.None,
    });
  });
});

describe('buildTerminfoKeys', () => {
  it('should return nothing without a source', () => {
    expect(buildTerminfoKeys('xterm', 0, undefined).size).toBe(0);
  });

  it('should return nothing when the terminal is unknown', () => {
    expect(buildTerminfoKeys('dumb', 0, () => undefined).size).toBe(0);
  });

  it('should translate known capabilities', () => {
    const keys = buildTerminfoKeys('xterm', 0, () => ({
      kcuu1: '\x1bOA',
      kDC5: '\x1b[3;5~',
      kf14: '\x1b[26~',
    }));
    expect([...keys]).toEqual([
      ['\x1bOA', keyEvent({ sym: 'up' })],
      ['\x1b[3;5~', keyEvent({ sym: 'delete', modifiers: KeyMod.Ctrl })],
      ['\x1b[26~', keyEvent({ sym: 'f2', modifiers: KeyMod.Shift })],
    ]);
  });

  it('should skip unknown capabilities and empty sequences', () => {
    const keys = buildTerminfoKeys('xterm', 0, () => ({
      kcuu1: '',
      smkx: '\x1b[?1h',
      kf0: '\x1b[10~',
      kf64: '\x1b[99~',
    }));
    expect(keys.size).toBe(0);
  });
});

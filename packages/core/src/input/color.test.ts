/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { colorToHex, parseXColor } from './color.js';

describe('parseXColor', () => {
  it('should scale rgb: components of any width', () => {
    expect(parseXColor('rgb:ffff/0000/8080')).toEqual({
      r: 255,
      g: 0,
      b: 128,
      a: 255,
    });
    expect(parseXColor('rgb:f/8/0')).toEqual({ r: 255, g: 136, b: 0, a: 255 });
    expect(parseXColor('rgb:1000/2000/3000')).toEqual({
      r: 16,
      g: 32,
      b: 48,
      a: 255,
    });
  });

  it('should read the alpha of rgba:', () => {
    expect(parseXColor('rgba:ff/00/00/80')).toEqual({
      r: 255,
      g: 0,
      b: 0,
      a: 128,
    });
  });

  it('should split # specs into three equal parts', () => {
    expect(parseXColor('#f00')).toEqual({ r: 255, g: 0, b: 0, a: 255 });
    expect(parseXColor('#00FF00')).toEqual({ r: 0, g: 255, b: 0, a: 255 });
    expect(parseXColor('#00000000ffff')).toEqual({
      r: 0,
      g: 0,
      b: 255,
      a: 255,
    });
  });

  it.each([
    'rgb:ff/ff',
    'rgb:ff/ff/ff/ff',
    'rgba:ff/ff/ff',
    'rgb:fffff/0/0',
    'rgb:gg/0/0',
    '#ff',
    '#',
    '#0000000000000',
    'red',
  ])('should reject %j', (spec) => {
    expect(parseXColor(spec)).toBeUndefined();
  });
});

describe('colorToHex', () => {
  it('should render opaque colors without alpha', () => {
    expect(colorToHex({ r: 255, g: 136, b: 0, a: 255 })).toBe('#ff8800');
  });

  it('should append alpha when not opaque', () => {
    expect(colorToHex({ r: 1, g: 2, b: 3, a: 128 })).toBe('#01020380');
  });
});

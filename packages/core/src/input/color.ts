/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Color } from './events.js';

const HEX_COMPONENT = /^[0-9a-f]{1,4}$/i;

// Scales an n-digit hex component to 8 bits: `f` → 255, `1000` → 16.
function scaleComponent(hex: string): number | undefined {
  if (!HEX_COMPONENT.test(hex)) {
    return undefined;
  }
  const max = 16 ** hex.length - 1;
  return Math.round((parseInt(hex, 16) / max) * 255);
}

function fromComponents(parts: string[]): Color | undefined {
  const values = parts.map(scaleComponent);
  const [r, g, b, a = 255] = values;
  if (
    r === undefined ||
    g === undefined ||
    b === undefined ||
    values.some((v) => v === undefined)
  ) {
    return undefined;
  }
  return { r, g, b, a };
}

/**
 * Parses an X11 color spec as sent in OSC 10/11/12 replies:
 * `rgb:R/G/B`, `rgba:R/G/B/A` or `#RGB` with 1–4 hex digits per component.
 */
export function parseXColor(spec: string): Color | undefined {
  const lower = spec.toLowerCase();

  if (lower.startsWith('rgb:')) {
    const parts = lower.slice(4).split('/');
    return parts.length === 3 ? fromComponents(parts) : undefined;
  }

  if (lower.startsWith('rgba:')) {
    const parts = lower.slice(5).split('/');
    return parts.length === 4 ? fromComponents(parts) : undefined;
  }

  if (lower.startsWith('#')) {
    const digits = lower.slice(1);
    if (digits.length === 0 || digits.length % 3 !== 0 || digits.length > 12) {
      return undefined;
    }
    const n = digits.length / 3;
    return fromComponents([
      digits.slice(0, n),
      digits.slice(n, 2 * n),
      digits.slice(2 * n),
    ]);
  }

  return undefined;
}

/** `#rrggbb`, with `aa` appended when the color is not opaque. */
export function colorToHex(color: Color): string {
  const channels = [color.r, color.g, color.b];
  if (color.a !== 255) {
    channels.push(color.a);
  }
  return `#${channels.map((c) => c.toString(16).padStart(2, '0')).join('')}`;
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * `;`-separated parameters, each a list of `:`-separated sub-values.
 * Empty values are `undefined`, so `1;;3` is `[[1], [undefined], [3]]`.
 */
export type CsiParams = Array<Array<number | undefined>>;

const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;
const COLON = 0x3a;
const SEMICOLON = 0x3b;

/** `<`, `=`, `>` and `?` mark private parameter strings when they lead. */
export function isPrivateMarker(byte: number): boolean {
  return byte >= 0x3c && byte <= 0x3f;
}

/**
 * Parses parameter bytes in `bytes[start, end)`. Returns `undefined` when a
 * private marker appears anywhere but the first position.
 */
export function parseParams(
  bytes: Uint8Array,
  start: number,
  end: number,
): CsiParams | undefined {
  if (start >= end) {
    return [];
  }

  const params: CsiParams = [];
  let current: Array<number | undefined> = [];
  let value: number | undefined;

  for (let i = start; i < end; i++) {
    const byte = bytes[i];
    if (byte >= DIGIT_0 && byte <= DIGIT_9) {
      value = (value ?? 0) * 10 + (byte - DIGIT_0);
    } else if (byte === COLON) {
      current.push(value);
      value = undefined;
    } else if (byte === SEMICOLON) {
      current.push(value);
      params.push(current);
      current = [];
      value = undefined;
    } else {
      return undefined;
    }
  }

  current.push(value);
  params.push(current);
  return params;
}

/** Sub-value `sub` of parameter `index`, if present. */
export function param(
  params: CsiParams,
  index: number,
  sub = 0,
): number | undefined {
  return params[index]?.[sub];
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Byte values of the C0/C1 control characters the decoder dispatches on.
 * @see https://vt100.net/docs/vt510-rm/chapter4.html
 */

export const NUL = 0x00;
export const BEL = 0x07;
export const BS = 0x08;
export const HT = 0x09;
export const CR = 0x0d;
export const ESC = 0x1b;
export const US = 0x1f;
export const SP = 0x20;
export const DEL = 0x7f;

// 8-bit introducers
export const SS3 = 0x8f;
export const DCS = 0x90;
export const CSI = 0x9b;
export const ST = 0x9c;
export const OSC = 0x9d;
export const APC = 0x9f;

// Second byte of the 7-bit (ESC-prefixed) introducers
export const SS3_7BIT = 0x4f; // O
export const DCS_7BIT = 0x50; // P
export const CSI_7BIT = 0x5b; // [
export const OSC_7BIT = 0x5d; // ]
export const APC_7BIT = 0x5f; // _
export const ST_7BIT = 0x5c; // \

export const PASTE_START = '\x1b[200~';
export const PASTE_END = '\x1b[201~';
export const PASTE_END_BYTES = Buffer.from(PASTE_END, 'latin1');
export const PASTE_END_8BIT_BYTES = Buffer.from('\x9b201~', 'latin1');

/**
 * Renders bytes one character per byte, the representation used for table
 * keys and for the raw payload of unknown events.
 */
export function toBinaryString(
  bytes: Uint8Array,
  start: number = 0,
  end: number = bytes.length,
): string {
  return Buffer.from(
    bytes.buffer,
    bytes.byteOffset + start,
    end - start,
  ).toString('latin1');
}

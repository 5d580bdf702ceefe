/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationError } from '../utils/errors.js';

/**
 * Behavior flags applied when the sequence table is built.
 */
export const DecoderFlag = {
  /** NUL is Ctrl+@ rather than Ctrl+Space. */
  CtrlAt: 1 << 0,
  /** HT is Ctrl+I rather than Tab. */
  CtrlI: 1 << 1,
  /** CR is Ctrl+M rather than Enter. */
  CtrlM: 1 << 2,
  /** ESC is Ctrl+[ rather than Escape. */
  CtrlOpenBracket: 1 << 3,
  /** SPACE is a plain rune rather than the space key symbol. */
  Space: 1 << 4,
  /**
   * BS is Backspace and DEL is Delete. Without it DEL is Backspace, which is
   * what VT220-descended terminals send.
   */
  Backspace: 1 << 5,
  /** `CSI 1 ~` is Find rather than Home. */
  Find: 1 << 6,
  /** `CSI 4 ~` is Select rather than End. */
  Select: 1 << 7,
  /** Skip the XTerm modifier forms. */
  NoXTerm: 1 << 8,
  /** Ignore terminfo overrides. */
  NoTerminfo: 1 << 9,
  /** Keep terminfo F13–F63 instead of folding them into modified F1–F12. */
  FKeys: 1 << 10,
} as const;

export type DecoderFlagName = keyof typeof DecoderFlag;

export const FLAG_NAMES: ReadonlyMap<string, DecoderFlagName> = new Map<
  string,
  DecoderFlagName
>([
  ['ctrl-at', 'CtrlAt'],
  ['ctrl-i', 'CtrlI'],
  ['ctrl-m', 'CtrlM'],
  ['ctrl-open-bracket', 'CtrlOpenBracket'],
  ['space', 'Space'],
  ['backspace', 'Backspace'],
  ['find', 'Find'],
  ['select', 'Select'],
  ['no-xterm', 'NoXTerm'],
  ['no-terminfo', 'NoTerminfo'],
  ['f-keys', 'FKeys'],
]);

export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) !== 0;
}

/**
 * Maps kebab-case flag names from settings or the command line to a bit set.
 */
export function resolveFlags(names: readonly string[]): number {
  let flags = 0;
  for (const name of names) {
    const key = FLAG_NAMES.get(name);
    if (key === undefined) {
      throw new ConfigurationError(
        `Unknown decoder flag "${name}". Valid flags: ${[...FLAG_NAMES.keys()].join(', ')}`,
      );
    }
    flags |= DecoderFlag[key];
  }
  return flags;
}

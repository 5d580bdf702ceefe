/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/DebugLogger.js';
import { BS, CR, DEL, ESC, HT, NUL, SP, toBinaryString } from './ansi.js';
import { type KeyEvent, keyEvent, withModifiers } from './events.js';
import { DecoderFlag, hasFlag } from './flags.js';
import { type KeySym, KeyMod, functionKey } from './keys.js';
import { type TerminfoSource, buildTerminfoKeys } from './terminfo.js';

const logger = DebugLogger.getLogger('ttyinput:table');

/**
 * Exact-match lookup from escape sequences to key events. Keys are byte
 * strings with one character per byte.
 */
export class SequenceTable {
  private readonly entries: ReadonlyMap<string, KeyEvent>;
  private readonly _maxLength: number;

  constructor(entries: Iterable<[string, KeyEvent]>) {
    const map = new Map<string, KeyEvent>();
    let maxLength = 0;
    for (const [sequence, key] of entries) {
      map.set(sequence, Object.freeze({ ...key }));
      maxLength = Math.max(maxLength, sequence.length);
    }
    this.entries = map;
    this._maxLength = maxLength;
  }

  /** Length of the longest registered sequence. */
  get maxLength(): number {
    return this._maxLength;
  }

  get size(): number {
    return this.entries.size;
  }

  get(sequence: string): KeyEvent | undefined {
    const key = this.entries.get(sequence);
    return key ? { ...key } : undefined;
  }

  /**
   * Looks up `bytes[start, end)`. Windows longer than any registered
   * sequence miss without building a key.
   */
  lookup(
    bytes: Uint8Array,
    start = 0,
    end = bytes.length,
  ): KeyEvent | undefined {
    const length = end - start;
    if (length <= 0 || length > this._maxLength) {
      return undefined;
    }
    return this.get(toBinaryString(bytes, start, end));
  }

  *[Symbol.iterator](): IterableIterator<[string, KeyEvent]> {
    for (const [sequence, key] of this.entries) {
      yield [sequence, { ...key }];
    }
  }
}

export interface SequenceTableOptions {
  /** Terminal type passed to the terminfo source. */
  term?: string;
  /** Bit set of `DecoderFlag` values. */
  flags?: number;
  terminfo?: TerminfoSource;
}

const CSI = `${String.fromCharCode(ESC)}[`;
const SS3 = `${String.fromCharCode(ESC)}O`;

function key(sym: KeySym, modifiers: number = KeyMod.None): KeyEvent {
  return keyEvent({ sym, modifiers });
}

function ctrl(rune: string): KeyEvent {
  return keyEvent({ runes: rune, modifiers: KeyMod.Ctrl });
}

// Finals shared by the CSI and SS3 cursor forms (`CSI A`, `SS3 A`, `CSI 1;5A`).
const CURSOR_FINALS: ReadonlyArray<[string, KeySym]> = [
  ['A', 'up'],
  ['B', 'down'],
  ['C', 'right'],
  ['D', 'left'],
  ['E', 'begin'],
  ['F', 'end'],
  ['H', 'home'],
  ['P', 'f1'],
  ['Q', 'f2'],
  ['R', 'f3'],
  ['S', 'f4'],
];

// Application keypad mode, VT100 table 3-8.
const KEYPAD_FINALS: ReadonlyArray<[string, KeySym]> = [
  ['M', 'kp-enter'],
  ['X', 'kp-equal'],
  ['j', 'kp-multiply'],
  ['k', 'kp-plus'],
  ['l', 'kp-comma'],
  ['m', 'kp-minus'],
  ['n', 'kp-decimal'],
  ['o', 'kp-divide'],
  ['p', 'kp-0'],
  ['q', 'kp-1'],
  ['r', 'kp-2'],
  ['s', 'kp-3'],
  ['t', 'kp-4'],
  ['u', 'kp-5'],
  ['v', 'kp-6'],
  ['w', 'kp-7'],
  ['x', 'kp-8'],
  ['y', 'kp-9'],
];

// `CSI n ~` function key numbers; the gaps are historical.
const FUNCTION_KEY_CODES: ReadonlyArray<[number, number]> = [
  [11, 1],
  [12, 2],
  [13, 3],
  [14, 4],
  [15, 5],
  [17, 6],
  [18, 7],
  [19, 8],
  [20, 9],
  [21, 10],
  [23, 11],
  [24, 12],
  [25, 13],
  [26, 14],
  [28, 15],
  [29, 16],
  [31, 17],
  [32, 18],
  [33, 19],
  [34, 20],
];

function editingKeys(flags: number): Array<[number, KeySym]> {
  return [
    [1, hasFlag(flags, DecoderFlag.Find) ? 'find' : 'home'],
    [2, 'insert'],
    [3, 'delete'],
    [4, hasFlag(flags, DecoderFlag.Select) ? 'select' : 'end'],
    [5, 'pageup'],
    [6, 'pagedown'],
    [7, 'home'],
    [8, 'end'],
  ];
}

/** Tilde keys: editing keys followed by F1–F20. */
function tildeKeys(flags: number): Array<[number, KeySym]> {
  return [
    ...editingKeys(flags),
    ...FUNCTION_KEY_CODES.map(([code, n]): [number, KeySym] => [
      code,
      functionKey(n),
    ]),
  ];
}

function controlKeys(flags: number, table: Map<string, KeyEvent>): void {
  const set = (byte: number, event: KeyEvent) =>
    table.set(String.fromCharCode(byte), event);

  // SOH..SUB are Ctrl+A..Ctrl+Z; HT, CR and BS are overridden below.
  for (let byte = 0x01; byte <= 0x1a; byte++) {
    set(byte, ctrl(String.fromCharCode(byte + 0x60)));
  }
  set(0x1c, ctrl('\\'));
  set(0x1d, ctrl(']'));
  set(0x1e, ctrl('^'));
  set(0x1f, ctrl('_'));

  set(
    NUL,
    hasFlag(flags, DecoderFlag.CtrlAt)
      ? ctrl('@')
      : keyEvent({ sym: 'space', runes: ' ', modifiers: KeyMod.Ctrl }),
  );
  set(HT, hasFlag(flags, DecoderFlag.CtrlI) ? ctrl('i') : key('tab'));
  set(CR, hasFlag(flags, DecoderFlag.CtrlM) ? ctrl('m') : key('return'));
  set(
    ESC,
    hasFlag(flags, DecoderFlag.CtrlOpenBracket) ? ctrl('[') : key('escape'),
  );
  set(
    SP,
    hasFlag(flags, DecoderFlag.Space)
      ? keyEvent({ runes: ' ' })
      : keyEvent({ sym: 'space', runes: ' ' }),
  );

  if (hasFlag(flags, DecoderFlag.Backspace)) {
    set(BS, key('backspace'));
    set(DEL, key('delete'));
  } else {
    set(DEL, key('backspace'));
  }
}

function vtKeys(flags: number, table: Map<string, KeyEvent>): void {
  table.set(`${CSI}Z`, key('tab', KeyMod.Shift));

  for (const [final, sym] of CURSOR_FINALS) {
    table.set(`${CSI}${final}`, key(sym));
    table.set(`${SS3}${final}`, key(sym));
  }
  for (const [final, sym] of KEYPAD_FINALS) {
    table.set(`${SS3}${final}`, key(sym));
  }
  for (const [code, sym] of tildeKeys(flags)) {
    table.set(`${CSI}${code}~`, key(sym));
  }
}

// URxvt reports modified keys with `$` (shift), `^` (ctrl) and `@`
// (ctrl+shift) in place of `~`, and modified arrows as lowercase finals.
function urxvtKeys(flags: number, table: Map<string, KeyEvent>): void {
  const arrows: ReadonlyArray<[string, KeySym]> = [
    ['a', 'up'],
    ['b', 'down'],
    ['c', 'right'],
    ['d', 'left'],
  ];
  for (const [final, sym] of arrows) {
    table.set(`${CSI}${final}`, key(sym, KeyMod.Shift));
    table.set(`${SS3}${final}`, key(sym, KeyMod.Ctrl));
  }

  const suffixes: ReadonlyArray<[string, number]> = [
    ['$', KeyMod.Shift],
    ['^', KeyMod.Ctrl],
    ['@', KeyMod.Ctrl | KeyMod.Shift],
  ];
  for (const [code, sym] of tildeKeys(flags)) {
    for (const [suffix, modifiers] of suffixes) {
      table.set(`${CSI}${code}${suffix}`, key(sym, modifiers));
    }
  }
}

/**
 * XTerm encodes modifiers as `1 + mask` with shift 1, alt 2, ctrl 4 and
 * meta 8, which lines up with the low `KeyMod` bits.
 */
export function xtermModifiers(param: number): number {
  return param > 1 ? (param - 1) & 0x0f : KeyMod.None;
}

function xtermKeys(flags: number, table: Map<string, KeyEvent>): void {
  const otherKeys: ReadonlyArray<[number, KeySym]> = [
    [BS, 'backspace'],
    [HT, 'tab'],
    [CR, 'return'],
    [ESC, 'escape'],
    [DEL, 'backspace'],
  ];

  for (let param = 2; param <= 16; param++) {
    const modifiers = xtermModifiers(param);
    for (const [final, sym] of CURSOR_FINALS) {
      table.set(`${CSI}1;${param}${final}`, key(sym, modifiers));
      table.set(`${SS3}${param}${final}`, key(sym, modifiers));
    }
    for (const [final, sym] of KEYPAD_FINALS) {
      table.set(`${SS3}${param}${final}`, key(sym, modifiers));
    }
    for (const [code, sym] of tildeKeys(flags)) {
      table.set(`${CSI}${code};${param}~`, key(sym, modifiers));
    }
    for (const [code, sym] of otherKeys) {
      table.set(`${CSI}27;${param};${code}~`, key(sym, modifiers));
    }
  }
}

function withAltVariants(
  table: Map<string, KeyEvent>,
  source: ReadonlyMap<string, KeyEvent>,
): void {
  const esc = String.fromCharCode(ESC);
  for (const [sequence, event] of source) {
    table.set(`${esc}${sequence}`, withModifiers(event, KeyMod.Alt));
  }
}

/**
 * Builds the sequence table for a terminal. The result depends only on
 * the options; flags are applied here and never consulted per event.
 */
export function buildSequenceTable(
  options: SequenceTableOptions = {},
): SequenceTable {
  const flags = options.flags ?? 0;
  const table = new Map<string, KeyEvent>();

  controlKeys(flags, table);
  vtKeys(flags, table);
  urxvtKeys(flags, table);
  withAltVariants(table, new Map(table));

  if (!hasFlag(flags, DecoderFlag.NoXTerm)) {
    xtermKeys(flags, table);
  }

  const terminfo = buildTerminfoKeys(
    options.term ?? '',
    flags,
    options.terminfo,
  );
  for (const [sequence, event] of terminfo) {
    table.set(sequence, event);
  }
  withAltVariants(table, terminfo);

  logger.debug(
    () =>
      `built table for term=${JSON.stringify(options.term ?? '')} flags=0x${flags.toString(16)}: ${table.size} entries, ${terminfo.size} from terminfo`,
  );
  return new SequenceTable(table);
}

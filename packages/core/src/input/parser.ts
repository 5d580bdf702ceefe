/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  APC,
  APC_7BIT,
  BEL,
  CSI,
  CSI_7BIT,
  DCS,
  DCS_7BIT,
  DEL,
  ESC,
  OSC,
  OSC_7BIT,
  SP,
  SS3,
  SS3_7BIT,
  ST,
  ST_7BIT,
  US,
  toBinaryString,
} from './ansi.js';
import { parseXColor } from './color.js';
import {
  type InputEvent,
  type KeyEvent,
  keyEvent,
  unknownEvent,
  withModifiers,
} from './events.js';
import { kittyKeySym, parseKittyKey, parseModifierParam } from './kitty.js';
import { KeyMod } from './keys.js';
import { parseSgrMouse, parseX10Mouse } from './mouse.js';
import {
  type CsiParams,
  isPrivateMarker,
  param,
  parseParams,
} from './params.js';
import { type SequenceTable, xtermModifiers } from './sequenceTable.js';
import {
  REPLACEMENT_CHARACTER,
  decodeRune,
  isValidCodePoint,
} from './utf8.js';

export interface DecodeOptions {
  /**
   * No more bytes will arrive before the next call (end of input or a full
   * buffer). Incomplete units are emitted as `unknown` instead of waiting.
   */
  flush?: boolean;
}

export interface DecodeResult {
  /** Bytes making up the decoded unit; 0 means more input is needed. */
  consumed: number;
  events: InputEvent[];
}

interface ParseContext {
  buf: Uint8Array;
  table: SequenceTable;
  flush: boolean;
}

/** A parsed unit, or `null` when the buffer ends before the unit does. */
type Parsed = { length: number; event: InputEvent } | null;

type SequenceParser = (
  ctx: ParseContext,
  start: number,
  alt: boolean,
) => Parsed;

const INTRODUCERS_7BIT: ReadonlyMap<number, SequenceParser> = new Map<
  number,
  SequenceParser
>([
  [SS3_7BIT, parseSs3],
  [DCS_7BIT, parseDcs],
  [CSI_7BIT, parseCsi],
  [OSC_7BIT, parseOsc],
  [APC_7BIT, parseApc],
]);

const INTRODUCERS_8BIT: ReadonlyMap<number, SequenceParser> = new Map<
  number,
  SequenceParser
>([
  [SS3, parseSs3],
  [DCS, parseDcs],
  [CSI, parseCsi],
  [OSC, parseOsc],
  [APC, parseApc],
]);

function needMore(): DecodeResult {
  return { consumed: 0, events: [] };
}

function altKey(key: KeyEvent, alt: boolean): KeyEvent {
  return alt ? withModifiers(key, KeyMod.Alt) : key;
}

function unknown(ctx: ParseContext, start: number, end: number): InputEvent {
  return unknownEvent(toBinaryString(ctx.buf, start, end));
}

function isControl(codePoint: number): boolean {
  return codePoint <= US || codePoint === DEL || codePoint === SP;
}

/**
 * Decodes the next unit at the start of `buf`.
 *
 * Returns the number of bytes the unit spans together with its events, or
 * `consumed: 0` when `buf` ends inside a unit and more bytes are needed.
 * With `flush` set a non-empty buffer always makes progress.
 */
export function decodeNext(
  buf: Uint8Array,
  table: SequenceTable,
  options: DecodeOptions = {},
): DecodeResult {
  if (buf.length === 0) {
    return needMore();
  }

  const whole = table.lookup(buf);
  if (whole) {
    return { consumed: buf.length, events: [whole] };
  }

  const ctx: ParseContext = { buf, table, flush: options.flush ?? false };
  let i = 0;
  let alt = false;

  // Each pass either emits a unit or moves past one ESC and sets `alt`.
  for (;;) {
    const b = buf[i];

    if (b === ESC) {
      if (i + 1 >= buf.length) {
        return emit(i + 1, altKey(escapeKey(table), alt));
      }

      const next = buf[i + 1];
      const parser = INTRODUCERS_7BIT.get(next);
      if (parser) {
        if (i + 2 >= buf.length) {
          // Nothing follows the introducer: the user typed Alt+[ and friends.
          const key = keyEvent({
            runes: String.fromCharCode(next),
            modifiers: KeyMod.Alt,
          });
          return emit(i + 2, key);
        }
        return run(parser, ctx, i, alt);
      }

      if (alt) {
        // ESC ESC x: the first ESC is Alt, the second the Escape key.
        return emit(i + 1, altKey(escapeKey(table), true));
      }
      alt = true;
      i++;
      continue;
    }

    const parser = INTRODUCERS_8BIT.get(b);
    if (parser) {
      return run(parser, ctx, i, alt);
    }

    if (isControl(b)) {
      const key =
        table.lookup(buf, i, i + 1) ??
        keyEvent({ runes: String.fromCharCode(b) });
      return emit(i + 1, altKey(key, alt));
    }

    return collectRunes(ctx, i, alt);
  }
}

function emit(consumed: number, event: InputEvent): DecodeResult {
  return { consumed, events: [event] };
}

function escapeKey(table: SequenceTable): KeyEvent {
  return table.get(String.fromCharCode(ESC)) ?? keyEvent({ sym: 'escape' });
}

function run(
  parser: SequenceParser,
  ctx: ParseContext,
  start: number,
  alt: boolean,
): DecodeResult {
  const parsed = parser(ctx, start, alt);
  if (!parsed) {
    return needMore();
  }
  return emit(start + parsed.length, parsed.event);
}

/**
 * Collects printable code points into one key. With `alt` set only the
 * first code point belongs to the Alt chord.
 */
function collectRunes(
  ctx: ParseContext,
  start: number,
  alt: boolean,
): DecodeResult {
  const { buf } = ctx;
  const first = decodeRune(buf, start);

  if (first.kind === 'incomplete') {
    if (!ctx.flush) {
      return needMore();
    }
    return emit(
      buf.length,
      altKey(keyEvent({ runes: REPLACEMENT_CHARACTER }), alt),
    );
  }
  if (first.kind === 'invalid') {
    return emit(
      start + 1,
      altKey(keyEvent({ runes: REPLACEMENT_CHARACTER }), alt),
    );
  }

  let runes = String.fromCodePoint(first.codePoint);
  let i = start + first.size;
  while (!alt && i < buf.length) {
    const rune = decodeRune(buf, i);
    if (rune.kind !== 'rune' || isControl(rune.codePoint)) {
      break;
    }
    runes += String.fromCodePoint(rune.codePoint);
    i += rune.size;
  }

  return emit(i, altKey(keyEvent({ runes }), alt));
}

const SEVEN_BIT_FORMS: ReadonlyMap<number, string> = new Map([
  [CSI, String.fromCharCode(ESC, CSI_7BIT)],
  [SS3, String.fromCharCode(ESC, SS3_7BIT)],
]);

/**
 * Table lookup of `buf[start, end)`. The table lists 7-bit forms only, so
 * an 8-bit introducer is looked up as its ESC-prefixed equivalent.
 */
function lookup(
  ctx: ParseContext,
  start: number,
  end: number,
): KeyEvent | undefined {
  const sevenBit = SEVEN_BIT_FORMS.get(ctx.buf[start]);
  if (sevenBit === undefined) {
    return ctx.table.lookup(ctx.buf, start, end);
  }
  return ctx.table.get(sevenBit + toBinaryString(ctx.buf, start + 1, end));
}

/** Offset of the first byte after a 7- or 8-bit introducer at `start`. */
function afterIntroducer(ctx: ParseContext, start: number): number {
  return ctx.buf[start] === ESC ? start + 2 : start + 1;
}

/**
 * Looks up a sequence that stopped short of its final byte. Some terminals
 * (URxvt) send `CSI 2 $` for Shift+Insert.
 */
function truncated(
  ctx: ParseContext,
  start: number,
  end: number,
  alt: boolean,
  atEnd: boolean,
): Parsed {
  const key = lookup(ctx, start, end);
  if (key) {
    return { length: end - start, event: altKey(key, alt) };
  }
  if (atEnd && !ctx.flush) {
    return null;
  }
  return { length: end - start, event: unknown(ctx, start, end) };
}

/**
 * CSI: parameter bytes 0x30–0x3F, intermediate bytes 0x20–0x2F, one final
 * byte 0x40–0x7E.
 */
function parseCsi(ctx: ParseContext, start: number, alt: boolean): Parsed {
  const { buf } = ctx;
  const paramStart = afterIntroducer(ctx, start);
  let i = paramStart;
  while (i < buf.length && buf[i] >= 0x30 && buf[i] <= 0x3f) i++;
  const paramEnd = i;
  while (i < buf.length && buf[i] >= 0x20 && buf[i] <= 0x2f) i++;

  if (i >= buf.length) {
    return truncated(ctx, start, i, alt, true);
  }
  const final = buf[i];
  if (final < 0x40 || final > 0x7e) {
    return truncated(ctx, start, i, alt, false);
  }

  const end = i + 1;
  const key = lookup(ctx, start, end);
  if (key) {
    return { length: end - start, event: altKey(key, alt) };
  }

  const hasIntermediates = i > paramEnd;
  if (hasIntermediates) {
    const prefix = lookup(ctx, start, i);
    if (prefix) {
      return { length: i - start, event: altKey(prefix, alt) };
    }
    return { length: end - start, event: unknown(ctx, start, end) };
  }

  // X10 mouse: exactly CSI M followed by three raw bytes.
  if (final === 0x4d && paramEnd === paramStart) {
    if (end + 3 > buf.length) {
      if (!ctx.flush) {
        return null;
      }
      return {
        length: buf.length - start,
        event: unknown(ctx, start, buf.length),
      };
    }
    return { length: end + 3 - start, event: parseX10Mouse(buf, end) };
  }

  const marker =
    paramEnd > paramStart && isPrivateMarker(buf[paramStart])
      ? buf[paramStart]
      : undefined;
  const params = parseParams(
    buf,
    marker === undefined ? paramStart : paramStart + 1,
    paramEnd,
  );
  const event = params
    ? interpretCsi(ctx, marker, params, final, alt)
    : undefined;
  return {
    length: end - start,
    event: event ?? unknown(ctx, start, end),
  };
}

// Finals of `CSI 1 ; modifiers X` cursor and F1–F4 keys.
const CURSOR_FINALS: ReadonlySet<string> = new Set([
  'A',
  'B',
  'C',
  'D',
  'E',
  'F',
  'H',
  'P',
  'Q',
  'R',
  'S',
]);

function interpretCsi(
  ctx: ParseContext,
  marker: number | undefined,
  params: CsiParams,
  finalByte: number,
  alt: boolean,
): InputEvent | undefined {
  const final = String.fromCharCode(finalByte);

  if (marker !== undefined) {
    if (marker === 0x3c && (final === 'M' || final === 'm')) {
      return parseSgrMouse(params, final);
    }
    return undefined;
  }

  const first = param(params, 0);

  if (final === '~' && params.length === 1) {
    if (first === 200) return { type: 'paste-start' };
    if (first === 201) return { type: 'paste-end' };
  }

  if (params.length === 0) {
    if (final === 'I') return { type: 'focus-in' };
    if (final === 'O') return { type: 'focus-out' };
  }

  if (final === 'u' && first !== undefined) {
    return altKey(parseKittyKey(params), alt);
  }

  if (CURSOR_FINALS.has(final) && params.length >= 2 && (first ?? 1) === 1) {
    return functionalKey(ctx, `[${final}`, params, alt);
  }

  if (final === '~' && first === 27 && params.length >= 3) {
    return modifyOtherKeys(params, alt);
  }

  if (final === '~' && first !== undefined && params.length >= 2) {
    return functionalKey(ctx, `[${first}~`, params, alt);
  }

  return undefined;
}

/**
 * A legacy key with a modifier parameter the table does not list, such as
 * `CSI 1;5:3A` (Ctrl+Up released) or `CSI 3;33~`. The unmodified form in
 * the table names the key.
 */
function functionalKey(
  ctx: ParseContext,
  base: string,
  params: CsiParams,
  alt: boolean,
): InputEvent | undefined {
  const key = ctx.table.get(`${String.fromCharCode(ESC)}${base}`);
  if (!key) {
    return undefined;
  }
  const { modifiers, action } = parseModifierParam(params, 1);
  return altKey({ ...key, modifiers: key.modifiers | modifiers, action }, alt);
}

/** XTerm modifyOtherKeys: `CSI 27 ; modifiers ; code ~`. */
function modifyOtherKeys(
  params: CsiParams,
  alt: boolean,
): InputEvent | undefined {
  const mods = param(params, 1);
  const code = param(params, 2);
  if (mods === undefined || code === undefined) {
    return undefined;
  }
  const sym = kittyKeySym(code);
  const key = sym
    ? keyEvent({ sym })
    : keyEvent({
        runes: isValidCodePoint(code)
          ? String.fromCodePoint(code)
          : REPLACEMENT_CHARACTER,
      });
  return altKey(withModifiers(key, xtermModifiers(mods)), alt);
}

/** SS3: an optional modifier digit string, then one GL character. */
function parseSs3(ctx: ParseContext, start: number, alt: boolean): Parsed {
  const { buf } = ctx;
  let i = afterIntroducer(ctx, start);
  while (i < buf.length && buf[i] >= 0x30 && buf[i] <= 0x39) i++;

  if (i >= buf.length) {
    return truncated(ctx, start, i, alt, true);
  }
  if (buf[i] < 0x21 || buf[i] > 0x7e) {
    return truncated(ctx, start, i, alt, false);
  }

  const end = i + 1;
  const key = lookup(ctx, start, end);
  return {
    length: end - start,
    event: key ? altKey(key, alt) : unknown(ctx, start, end),
  };
}

interface StringSequence {
  /** Offset just past the terminator. */
  end: number;
  payloadStart: number;
  payloadEnd: number;
}

/**
 * Scans a control string to its terminator: 8-bit ST, `ESC \`, or BEL
 * when `allowBel` is set. A bare ESC ends the string without being
 * consumed.
 */
function scanString(
  ctx: ParseContext,
  start: number,
  allowBel: boolean,
): StringSequence | null {
  const { buf } = ctx;
  const payloadStart = afterIntroducer(ctx, start);

  for (let i = payloadStart; i < buf.length; i++) {
    const b = buf[i];
    if (b === ST || (allowBel && b === BEL)) {
      return { end: i + 1, payloadStart, payloadEnd: i };
    }
    if (b === ESC) {
      if (i + 1 >= buf.length) {
        return ctx.flush ? { end: i, payloadStart, payloadEnd: i } : null;
      }
      const end = buf[i + 1] === ST_7BIT ? i + 2 : i;
      return { end, payloadStart, payloadEnd: i };
    }
  }

  return ctx.flush
    ? { end: buf.length, payloadStart, payloadEnd: buf.length }
    : null;
}

const COLOR_EVENTS = {
  '10': 'foreground-color',
  '11': 'background-color',
  '12': 'cursor-color',
} as const;

function isColorIdentifier(id: string): id is keyof typeof COLOR_EVENTS {
  return Object.hasOwn(COLOR_EVENTS, id);
}

/** OSC: `identifier ; data` up to BEL or ST. */
function parseOsc(ctx: ParseContext, start: number): Parsed {
  const seq = scanString(ctx, start, true);
  if (!seq) {
    return null;
  }

  const length = seq.end - start;
  const payload = toBinaryString(ctx.buf, seq.payloadStart, seq.payloadEnd);
  const separator = payload.indexOf(';');
  const id = separator === -1 ? payload : payload.slice(0, separator);

  if (separator !== -1 && isColorIdentifier(id)) {
    const color = parseXColor(payload.slice(separator + 1));
    if (color) {
      return { length, event: { type: COLOR_EVENTS[id], color } };
    }
  }
  return { length, event: unknown(ctx, start, seq.end) };
}

/** DCS and APC: surfaced raw so callers can layer their own protocols. */
function parseControlString(ctx: ParseContext, start: number): Parsed {
  const seq = scanString(ctx, start, false);
  if (!seq) {
    return null;
  }
  return { length: seq.end - start, event: unknown(ctx, start, seq.end) };
}

function parseDcs(ctx: ParseContext, start: number): Parsed {
  return parseControlString(ctx, start);
}

function parseApc(ctx: ParseContext, start: number): Parsed {
  return parseControlString(ctx, start);
}

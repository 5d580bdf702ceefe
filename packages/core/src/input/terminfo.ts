/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { readDataFile } from '../utils/dataFiles.js';
import { type KeyEvent, keyEvent } from './events.js';
import { DecoderFlag, hasFlag } from './flags.js';
import {
  type KeySym,
  KeyMod,
  MAX_FUNCTION_KEY,
  functionKey,
  isKeySym,
  parseModifierNames,
} from './keys.js';

/**
 * Capability name to sequence, e.g. `{ kcuu1: '\x1bOA' }`, as read from a
 * compiled terminfo entry.
 */
export type TerminfoCapabilities = Readonly<Record<string, string>>;

/**
 * Looks up the key capabilities of a terminal type. Loading the terminfo
 * database is left to the caller.
 */
export type TerminfoSource = (
  term: string,
) => TerminfoCapabilities | undefined;

const terminfoKeysSchema = z.record(
  z.object({
    sym: z.string().refine(isKeySym),
    modifiers: z.array(z.enum(['shift', 'alt', 'ctrl', 'meta'])),
  }),
);

interface CapabilityKey {
  sym: KeySym;
  modifiers: number;
}

let capabilityKeys: ReadonlyMap<string, CapabilityKey> | undefined;

function getCapabilityKeys(): ReadonlyMap<string, CapabilityKey> {
  if (!capabilityKeys) {
    const parsed = terminfoKeysSchema.parse(
      readDataFile('terminfo-keys.json'),
    );
    const map = new Map<string, CapabilityKey>();
    for (const [name, entry] of Object.entries(parsed)) {
      map.set(name, {
        sym: entry.sym,
        modifiers: parseModifierNames(entry.modifiers) ?? KeyMod.None,
      });
    }
    capabilityKeys = map;
  }
  return capabilityKeys;
}

// kf13–kf24 are Shift+F1–F12, kf25–kf36 Ctrl, kf37–kf48 Ctrl+Shift,
// kf49–kf60 Alt, kf61–kf63 Alt+Shift.
const FOLDED_FUNCTION_KEY_MODIFIERS = [
  KeyMod.Shift,
  KeyMod.Ctrl,
  KeyMod.Ctrl | KeyMod.Shift,
  KeyMod.Alt,
  KeyMod.Alt | KeyMod.Shift,
];

const FUNCTION_KEY_CAPABILITY = /^kf(\d+)$/;

export function functionKeyCapability(
  n: number,
  flags: number,
): CapabilityKey | undefined {
  if (n < 1 || n > MAX_FUNCTION_KEY) {
    return undefined;
  }
  if (n <= 12 || hasFlag(flags, DecoderFlag.FKeys)) {
    return { sym: functionKey(n), modifiers: KeyMod.None };
  }
  const group = Math.floor((n - 1) / 12);
  return {
    sym: functionKey(((n - 1) % 12) + 1),
    modifiers: FOLDED_FUNCTION_KEY_MODIFIERS[group - 1],
  };
}

/**
 * Translates the key capabilities of `term` into sequence table entries.
 * Unknown capabilities and empty sequences are skipped.
 */
export function buildTerminfoKeys(
  term: string,
  flags: number,
  source: TerminfoSource | undefined,
): Map<string, KeyEvent> {
  const entries = new Map<string, KeyEvent>();
  if (!source || hasFlag(flags, DecoderFlag.NoTerminfo)) {
    return entries;
  }

  const capabilities = source(term);
  if (!capabilities) {
    return entries;
  }

  const known = getCapabilityKeys();
  for (const [name, sequence] of Object.entries(capabilities)) {
    if (sequence.length === 0) {
      continue;
    }
    const fn = name.match(FUNCTION_KEY_CAPABILITY);
    const key = fn
      ? functionKeyCapability(Number(fn[1]), flags)
      : known.get(name);
    if (key) {
      entries.set(sequence, keyEvent(key));
    }
  }
  return entries;
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import {
  ConfigurationError,
  type TerminfoSource,
  getErrorMessage,
} from '@ttyinput/core';

const terminfoFileSchema = z.record(z.record(z.string()));

/**
 * Reads a JSON file of the form `{ "<term>": { "<capability>": "<sequence>" } }`
 * and serves it as a terminfo source.
 */
export function loadTerminfoFile(filePath: string): TerminfoSource {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Failed to read terminfo file ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  const result = terminfoFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid terminfo file ${filePath}: expected terminal types mapped to capability strings`,
    );
  }

  const entries = new Map(Object.entries(result.data));
  return (term) => entries.get(term);
}

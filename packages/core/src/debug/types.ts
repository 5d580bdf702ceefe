/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const DEBUG_LEVELS = ['debug', 'log', 'warn', 'error'] as const;

export type DebugLevel = (typeof DEBUG_LEVELS)[number];

export interface DebugSettings {
  enabled: boolean;
  /** Namespace patterns; `*` matches any run of characters. */
  namespaces: string[];
  /** Lowest level that is written. */
  level: DebugLevel;
}

export const debugSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  namespaces: z.array(z.string()).optional(),
  level: z.enum(DEBUG_LEVELS).optional(),
});

export type PartialDebugSettings = z.infer<typeof debugSettingsSchema>;

export function isDebugLevel(value: string): value is DebugLevel {
  return DEBUG_LEVELS.some((level) => level === value);
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { debugSettingsSchema } from '../debug/types.js';
import { resolveFlags } from '../input/flags.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

export const SETTINGS_DIR = '.ttyinput';
export const SETTINGS_FILE_NAME = 'settings.json';

export const DEFAULT_BUFFER_SIZE = 256;
export const MIN_BUFFER_SIZE = 16;
export const MAX_BUFFER_SIZE = 65536;

export const settingsSchema = z.object({
  /** Terminal type used for terminfo lookups, e.g. `xterm-256color`. */
  term: z.string().min(1).optional(),
  /** Decoder flag names such as `ctrl-at` or `no-xterm`. */
  flags: z.array(z.string()).optional(),
  bufferSize: z
    .number()
    .int()
    .min(MIN_BUFFER_SIZE)
    .max(MAX_BUFFER_SIZE)
    .optional(),
  debug: debugSettingsSchema.optional(),
});

export type Settings = z.infer<typeof settingsSchema>;

export interface SettingsError {
  message: string;
  path: string;
}

export interface LoadedSettings {
  user: Settings;
  project: Settings;
  /** Project settings layered over user settings. */
  merged: Settings;
  errors: SettingsError[];
}

export interface LoadSettingsOptions {
  cwd?: string;
  homeDir?: string;
}

export function getUserSettingsPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, SETTINGS_DIR, SETTINGS_FILE_NAME);
}

export function getProjectSettingsPath(cwd: string = process.cwd()): string {
  return path.join(cwd, SETTINGS_DIR, SETTINGS_FILE_NAME);
}

/**
 * Reads one settings file. A missing file yields an empty object; malformed
 * JSON, schema violations and unknown flag names throw `ConfigurationError`.
 */
export function readSettingsFile(filePath: string): Settings {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Failed to read ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid settings in ${filePath}: ${issues}`);
  }

  if (result.data.flags) {
    resolveFlags(result.data.flags);
  }
  return result.data;
}

export function mergeSettings(...layers: Settings[]): Settings {
  return layers.reduce<Settings>((merged, layer) => {
    const next: Settings = { ...merged, ...layer };
    if (merged.debug || layer.debug) {
      next.debug = { ...merged.debug, ...layer.debug };
    }
    return next;
  }, {});
}

function realPath(dir: string): string {
  const resolved = path.resolve(dir);
  try {
    return fs.realpathSync(resolved);
  } catch (_e) {
    return resolved;
  }
}

/**
 * Loads settings from the user and project directories.
 * Project settings override user settings. Files that fail to load are
 * reported in `errors` and contribute nothing.
 */
export function loadSettings(
  options: LoadSettingsOptions = {},
): LoadedSettings {
  const homeDir = options.homeDir ?? os.homedir();
  const cwd = options.cwd ?? process.cwd();
  const errors: SettingsError[] = [];

  const load = (filePath: string): Settings => {
    try {
      return readSettingsFile(filePath);
    } catch (error: unknown) {
      errors.push({ message: getErrorMessage(error), path: filePath });
      return {};
    }
  };

  const user = load(getUserSettingsPath(homeDir));
  const project =
    realPath(cwd) !== realPath(homeDir)
      ? load(getProjectSettingsPath(cwd))
      : {};

  return {
    user,
    project,
    merged: mergeSettings(user, project),
    errors,
  };
}

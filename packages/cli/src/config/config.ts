/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type InputDriverOptions,
  type PartialDebugSettings,
  type Settings,
  resolveFlags,
} from '@ttyinput/core';
import type { CliArgs, OutputFormat } from './args.js';
import { loadTerminfoFile } from './terminfoFile.js';

export interface CliConfig {
  driver: InputDriverOptions;
  format: OutputFormat;
  peek: boolean;
  /** Logger overrides from the command line, if any. */
  debug: PartialDebugSettings | undefined;
}

/**
 * Combines command line arguments with loaded settings. Arguments win over
 * settings, and settings win over `$TERM`.
 */
export function loadCliConfig(
  args: CliArgs,
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const term = args.term ?? settings.term ?? env['TERM'];
  const flagNames = args.flags ?? settings.flags ?? [];

  return {
    driver: {
      term: term || undefined,
      flags: resolveFlags(flagNames),
      terminfo: args.terminfo ? loadTerminfoFile(args.terminfo) : undefined,
      bufferSize: args.bufferSize ?? settings.bufferSize,
    },
    format: args.format,
    peek: args.peek,
    debug: args.debug
      ? { enabled: true, namespaces: ['ttyinput:*'], level: 'debug' }
      : undefined,
  };
}

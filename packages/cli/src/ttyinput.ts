/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Readable } from 'node:stream';
import {
  ConfigurationError,
  ConfigurationManager,
  DebugLogger,
  EndOfInputError,
  FatalError,
  InputDriver,
  type LoadSettingsOptions,
  StreamByteSource,
  loadSettings,
} from '@ttyinput/core';
import {
  type CliArgs,
  USAGE_EXIT_CODE,
  parseArguments,
} from './config/args.js';
import { type CliConfig, loadCliConfig } from './config/config.js';
import { formatEvent, formatPeekedEvent } from './utils/format.js';
import { unescapeInput } from './utils/unescape.js';

const logger = DebugLogger.getLogger('ttyinput:cli');

export interface CliIO {
  stdin: Readable;
  /** Writes one line of output. */
  writeLine(line: string): void;
  env: NodeJS.ProcessEnv;
  /** Where to look for settings files; defaults to the home and current directories. */
  settingsLocation?: LoadSettingsOptions;
}

const processIO: CliIO = {
  stdin: process.stdin,
  writeLine: (line) => {
    process.stdout.write(`${line}\n`);
  },
  env: process.env,
};

function resolveConfig(args: CliArgs, io: CliIO): CliConfig {
  const settings = loadSettings(io.settingsLocation);
  if (settings.errors.length > 0) {
    const errorMessages = settings.errors.map(
      (error) => `Error in ${error.path}: ${error.message}`,
    );
    throw new FatalError(
      `${errorMessages.join('\n')}\nPlease fix the settings file(s) and try again.`,
    );
  }

  try {
    return loadCliConfig(args, settings.merged, io.env);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      throw new FatalError(error.message, USAGE_EXIT_CODE);
    }
    throw error;
  }
}

async function printEvents(
  driver: InputDriver,
  config: CliConfig,
  io: CliIO,
): Promise<void> {
  if (!config.peek) {
    for await (const event of driver) {
      io.writeLine(formatEvent(event, config.format));
    }
    return;
  }

  for (;;) {
    try {
      for (const event of await driver.peekInput()) {
        io.writeLine(formatPeekedEvent(event, config.format));
      }
      for (const event of await driver.readInput()) {
        io.writeLine(formatEvent(event, config.format));
      }
    } catch (error: unknown) {
      if (error instanceof EndOfInputError) {
        return;
      }
      throw error;
    }
  }
}

export async function main(
  argv?: string[],
  io: CliIO = processIO,
): Promise<void> {
  const args = await parseArguments(argv);
  const config = resolveConfig(args, io);

  if (config.debug) {
    ConfigurationManager.getInstance().setCliConfig(config.debug);
  }
  logger.debug(
    () =>
      `term=${config.driver.term ?? '(none)'} flags=${config.driver.flags ?? 0} format=${config.format}`,
  );

  const stream = args.inputs
    ? Readable.from(args.inputs.map(unescapeInput))
    : io.stdin;
  const driver = new InputDriver(new StreamByteSource(stream), config.driver);
  logger.debug(() => `sequence table has ${driver.sequenceTable.size} entries`);

  try {
    await printEvents(driver, config, io);
  } finally {
    driver.close();
  }
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import {
  FLAG_NAMES,
  FatalError,
  MAX_BUFFER_SIZE,
  MIN_BUFFER_SIZE,
  getErrorMessage,
} from '@ttyinput/core';

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliArgs {
  term: string | undefined;
  flags: string[] | undefined;
  terminfo: string | undefined;
  format: OutputFormat;
  peek: boolean;
  bufferSize: number | undefined;
  debug: boolean;
  /** Escaped strings given to `decode`; undefined when reading stdin. */
  inputs: string[] | undefined;
}

/** Exit code for command line usage errors. */
export const USAGE_EXIT_CODE = 2;

export async function parseArguments(
  argv: string[] = hideBin(process.argv),
): Promise<CliArgs> {
  let inputs: string[] | undefined;

  const result = await yargs(argv)
    .locale('en')
    .scriptName('ttyinput')
    .usage(
      '$0 [options]',
      'Decode terminal input from stdin and print one line per event',
    )
    .command(
      'decode <input..>',
      'Decode escaped strings such as "\\e[1;5A" and exit',
      (yargsInstance) =>
        yargsInstance.positional('input', {
          describe: 'Input with \\e, \\xHH, \\uHHHH, \\n, \\r, \\t escapes',
          type: 'string',
          array: true,
          demandOption: true,
        }),
      (args) => {
        inputs = args.input;
      },
    )
    .option('term', {
      type: 'string',
      description: 'Terminal type for terminfo lookups. Defaults to $TERM.',
    })
    .option('flag', {
      alias: 'f',
      type: 'array',
      string: true,
      description: `Decoder flag, repeatable: ${[...FLAG_NAMES.keys()].join(', ')}`,
    })
    .option('terminfo', {
      type: 'string',
      description:
        'JSON file mapping terminal types to key capability sequences',
    })
    .option('format', {
      type: 'string',
      choices: OUTPUT_FORMATS,
      description: 'Output format (default: text)',
    })
    .option('peek', {
      type: 'boolean',
      default: false,
      description: 'Also print each batch of events as peeked before reading',
    })
    .option('buffer-size', {
      type: 'number',
      description: `Read buffer size in bytes (${MIN_BUFFER_SIZE}-${MAX_BUFFER_SIZE})`,
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      default: false,
      description: 'Write ttyinput debug logs to stderr',
    })
    .check((args) => {
      const bufferSize = args['buffer-size'];
      if (
        bufferSize !== undefined &&
        (!Number.isInteger(bufferSize) ||
          bufferSize < MIN_BUFFER_SIZE ||
          bufferSize > MAX_BUFFER_SIZE)
      ) {
        throw new Error(
          `--buffer-size must be an integer between ${MIN_BUFFER_SIZE} and ${MAX_BUFFER_SIZE}`,
        );
      }
      return true;
    })
    .help()
    .alias('h', 'help')
    .version(false)
    .strict()
    .fail((message, error) => {
      throw new FatalError(message || getErrorMessage(error), USAGE_EXIT_CODE);
    })
    .parseAsync();

  return {
    term: result.term,
    flags: result.flag,
    terminfo: result.terminfo,
    format: result.format ?? 'text',
    peek: result.peek,
    bufferSize: result['buffer-size'],
    debug: result.debug,
    inputs,
  };
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

export class TtyInputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The byte source was cancelled while (or before) a read was pending.
 */
export class ReadCanceledError extends TtyInputError {
  constructor() {
    super('Read canceled');
  }
}

/**
 * The underlying stream reported an error.
 */
export class InputSourceError extends TtyInputError {}

/**
 * The byte source ended and every buffered byte has been decoded.
 */
export class EndOfInputError extends TtyInputError {
  constructor() {
    super('End of input');
  }
}

export class ConfigurationError extends TtyInputError {}

export class FatalError extends TtyInputError {
  constructor(
    message: string,
    readonly exitCode: number = 1,
  ) {
    super(message);
  }
}

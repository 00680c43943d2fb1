/**
 * @fileoverview Argument helpers shared by CLI commands
 */

import { getErrorMessage } from '../utils/errors.js';
import { createError } from './errors.js';
import { COMMANDS, type Command } from './help.js';

/**
 * Run a `parseArgs` call, turning its parse failures into INVALID_ARGUMENT
 * errors that carry the command's usage line.
 */
export function parseCommandArgs<T>(command: Command, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `${getErrorMessage(error)}. Usage: ${COMMANDS[command].usage}`, { command });
  }
}

export function requirePositional(command: Command, positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined || value === '') {
    throw createError('INVALID_ARGUMENT', `Missing <${name}>. Usage: ${COMMANDS[command].usage}`, { command });
  }
  return value;
}

/** Parse a decimal integer argument */
export function parseInteger(name: string, raw: string, min = 0): number {
  const value = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    throw createError('INVALID_ARGUMENT', `${name} must be an integer >= ${min}, got ${raw}`);
  }
  return value;
}

export function parseOptionalInteger(name: string, raw: string | undefined, min = 0): number | undefined {
  return raw === undefined ? undefined : parseInteger(name, raw, min);
}

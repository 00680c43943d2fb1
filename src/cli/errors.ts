/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isSlicebaseError } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_COMMAND'
  | 'UNKNOWN_UNIT';

/** Keyed by CLI codes and by the library's error codes */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  INVALID_ARGUMENT: 'Run `slicebase help <command>` for usage information.',
  UNKNOWN_COMMAND: 'Run `slicebase help` to list the available commands.',
  UNKNOWN_UNIT: 'Run `slicebase bc-files` to list the known units.',
  UNKNOWN_PACKAGE: 'Run `slicebase packages` to list the known packages.',
  NOT_FOUND: 'Check the function name and the store root (--root).',
  CONFIGURATION_ERROR: 'Check slicebase.yaml and the SLICEBASE_* environment variables.',
  UNIMPLEMENTED_QUERY: 'Run `slicebase help` for the supported queries.',
  PARSE_ERROR: 'Fix or regenerate the file named above.',
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

function withSuggestion(line: string, suggestion: string | undefined): string {
  return suggestion ? `${line}\nSuggestion: ${suggestion}` : line;
}

/**
 * Diagnostic line, followed by a suggestion line for known codes
 */
export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    return withSuggestion(`Error [${error.code}]: ${error.message}`, error.suggestion);
  }
  if (isSlicebaseError(error)) {
    return withSuggestion(`Error [${error.code}]: ${error.message}`, ERROR_SUGGESTIONS[error.code]);
  }
  if (error instanceof Error) {
    if (error.message.includes('ENOENT')) {
      return `Error: File or directory not found: ${error.message}`;
    }
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/**
 * @fileoverview slicebase error hierarchy
 *
 * Every failure the store, the query layer or the oracle loop reports is one
 * of these typed errors. Storage-level failures surface unchanged through the
 * query layer and the CLI; the CLI only formats them.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class SlicebaseError extends Error {
  abstract readonly code: string;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// LOOKUP ERRORS
// ============================================================================

export type EntityKind = 'package' | 'function' | 'unit' | 'slice' | 'trace' | 'feature';

export class NotFoundError extends SlicebaseError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: EntityKind,
    readonly identifier: string,
    readonly location?: string,
  ) {
    super(location ? `No ${entity} ${identifier} at ${location}` : `No ${entity} ${identifier}`);
    this.name = 'NotFoundError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        entity: this.entity,
        identifier: this.identifier,
        location: this.location,
      },
    };
  }
}

export class UnknownPackageError extends SlicebaseError {
  readonly code = 'UNKNOWN_PACKAGE';

  constructor(readonly packageName: string) {
    super(`Unknown package ${packageName}`);
    this.name = 'UnknownPackageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { packageName: this.packageName },
    };
  }
}

// ============================================================================
// DOCUMENT ERRORS
// ============================================================================

export class ParseError extends SlicebaseError {
  readonly code = 'PARSE_ERROR';

  constructor(
    readonly filePath: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Cannot parse ${filePath}: ${message}`);
    this.name = 'ParseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filePath: this.filePath,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION / PROTOCOL ERRORS
// ============================================================================

export class ConfigurationError extends SlicebaseError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { field: this.field },
    };
  }
}

export class UnimplementedQueryError extends SlicebaseError {
  readonly code = 'UNIMPLEMENTED_QUERY';

  constructor(readonly query: string) {
    super(`Query ${query} is not implemented`);
    this.name = 'UnimplementedQueryError';
  }
}

export class InvalidArgumentError extends SlicebaseError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    readonly argument: string,
    message: string,
  ) {
    super(`Invalid ${argument}: ${message}`);
    this.name = 'InvalidArgumentError';
  }
}

/** Raised when a ranking strategy hands back an index that is not in the remaining pool. */
export class InvalidSelectionError extends SlicebaseError {
  readonly code = 'INVALID_SELECTION';

  constructor(readonly index: number) {
    super(`Selected index ${index} is not in the remaining pool`);
    this.name = 'InvalidSelectionError';
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isSlicebaseError(error: unknown): error is SlicebaseError {
  return error instanceof SlicebaseError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

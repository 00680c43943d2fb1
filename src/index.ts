/**
 * @fileoverview slicebase - program-analysis artifact store and triage loop
 *
 * Stores per-function slices, def-use traces and feature documents for the
 * compiled units of fetched packages, answers catalog queries over them, and
 * drives an oracle-in-the-loop labeling session over a function's data points.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { openSession, createPool, createSequentialStrategy, OracleLoop } from 'slicebase';
 *
 * const session = await openSession({ root: '/data/slicebase' });
 * const pool = createPool(await session.datapoints.collect('malloc'));
 * const loop = new OracleLoop({
 *   pool,
 *   strategy: createSequentialStrategy(),
 *   oracle: { kind: 'ground-truth', label: 'undersized' },
 *   budget: 100,
 *   numAlarms: 10,
 * });
 * const result = await loop.run();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// SESSION
// ============================================================================

export { AnalysisSession, openSession, type OpenSessionOptions } from './api/session.js';

// ============================================================================
// STORAGE & QUERIES
// ============================================================================

export * from './storage/index.js';
export {
  ArtifactCatalog,
  type CountOptions,
  type EnumerateUnitsOptions,
  type ResolvedSlice,
} from './query/catalog.js';
export { DataPoint, DataPointStream, type DataPointInit } from './query/datapoints.js';

// ============================================================================
// LEARNING
// ============================================================================

export * from './learning/index.js';

// ============================================================================
// AMBIENT
// ============================================================================

export {
  SlicebaseError,
  NotFoundError,
  UnknownPackageError,
  ParseError,
  ConfigurationError,
  UnimplementedQueryError,
  InvalidArgumentError,
  InvalidSelectionError,
  isSlicebaseError,
  isNotFoundError,
  type EntityKind,
  type ErrorJSON,
} from './core/errors.js';
export { loadConfig, SlicebaseConfigSchema, type SlicebaseConfig, type LoadConfigOptions } from './config/index.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION
// ============================================================================

/**
 * Layout version of the store written by this release. Bump MAJOR when an
 * existing store can no longer be read.
 */
export const SLICEBASE_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;

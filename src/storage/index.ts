/**
 * @fileoverview Storage module exports
 */

export { ArtifactStore } from './artifact_store.js';
export { PackageIndex } from './package_index.js';
export { StoreLayout, parseDocumentId, documentFileName } from './layout.js';
export { listEntries, removeTree, countFiles, compareNames } from './fs_walk.js';
export {
  ARTIFACT_KINDS,
  KIND_DIRECTORIES,
  PackageRecordSchema,
  BuildResultSchema,
  hasTraceId,
} from './types.js';
export type {
  ArtifactCoordinates,
  ArtifactKind,
  BuildResult,
  JsonObject,
  JsonValue,
  PackageRecord,
  PackageRecordInput,
  SliceCoordinates,
  TraceCoordinates,
} from './types.js';

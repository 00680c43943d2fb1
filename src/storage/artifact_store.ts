/**
 * @fileoverview Artifact store
 *
 * Whole-document storage for slices, traces (def-use graphs) and features.
 * Writes are plain overwrites: one writer, any number of readers, no locking.
 * A reader racing a writer on the same coordinates may see the previous
 * document or, in pathological cases, a partially written one.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { InvalidArgumentError, NotFoundError, ParseError } from '../core/errors.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import { isMissingPathError } from '../utils/errors.js';
import { safeJsonParse, stringifyDocument } from '../utils/safe_json.js';
import { isDirectory, listEntries, removeTree } from './fs_walk.js';
import { StoreLayout, assertSegment, parseDocumentId } from './layout.js';
import {
  ARTIFACT_KINDS,
  hasTraceId,
  type ArtifactCoordinates,
  type ArtifactKind,
  type JsonValue,
  type SliceCoordinates,
  type TraceCoordinates,
} from './types.js';

const isDocumentFile = (name: string): boolean => parseDocumentId(name) !== null;

function describeCoordinates(coords: ArtifactCoordinates): string {
  const base = `${coords.function}/${coords.unit}/${coords.sliceId}`;
  return hasTraceId(coords) ? `${base}/${coords.traceId}` : base;
}

function sortedIds(names: string[]): number[] {
  const ids: number[] = [];
  for (const name of names) {
    const id = parseDocumentId(name);
    if (id !== null) ids.push(id);
  }
  return ids.sort((a, b) => a - b);
}

export class ArtifactStore {
  constructor(readonly layout: StoreLayout) {}

  /** Materialize the top-level layout; safe to call on an existing store */
  async initialize(): Promise<void> {
    await fs.mkdir(this.layout.packagesDir(), { recursive: true });
    for (const kind of ARTIFACT_KINDS) {
      await fs.mkdir(this.layout.kindDir(kind), { recursive: true });
    }
    await fs.mkdir(this.layout.tempDir(), { recursive: true });
  }

  // ==========================================================================
  // NAMESPACES
  // ==========================================================================

  /**
   * Idempotently create the namespace directory for (function, unit) or, for
   * traces and features, for one slice below it. Returns the directory.
   */
  async ensureNamespace(kind: ArtifactKind, func: string, unit: string, sliceId?: number): Promise<string> {
    let dir: string;
    if (sliceId === undefined) {
      dir = this.layout.unitDir(kind, func, unit);
    } else if (kind === 'slice') {
      throw new InvalidArgumentError('slice id', 'slices have no per-slice namespace');
    } else {
      dir = this.layout.sliceNamespaceDir(kind, func, unit, sliceId);
    }
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  // ==========================================================================
  // DOCUMENTS
  // ==========================================================================

  documentPath(kind: 'slice', coords: SliceCoordinates): string;
  documentPath(kind: 'trace' | 'feature', coords: TraceCoordinates): string;
  documentPath(kind: ArtifactKind, coords: ArtifactCoordinates): string;
  documentPath(kind: ArtifactKind, coords: ArtifactCoordinates): string {
    return this.layout.documentPath(kind, coords);
  }

  /** Overwrite the document at `coords`, creating its namespace as needed */
  write(kind: 'slice', coords: SliceCoordinates, doc: JsonValue): Promise<string>;
  write(kind: 'trace' | 'feature', coords: TraceCoordinates, doc: JsonValue): Promise<string>;
  write(kind: ArtifactKind, coords: ArtifactCoordinates, doc: JsonValue): Promise<string>;
  async write(kind: ArtifactKind, coords: ArtifactCoordinates, doc: JsonValue): Promise<string> {
    const filePath = this.layout.documentPath(kind, coords);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, stringifyDocument(doc), 'utf8');
    return filePath;
  }

  /**
   * @throws NotFoundError when no document exists at `coords`
   * @throws ParseError when the stored content is not JSON
   */
  read(kind: 'slice', coords: SliceCoordinates): Promise<JsonValue>;
  read(kind: 'trace' | 'feature', coords: TraceCoordinates): Promise<JsonValue>;
  read(kind: ArtifactKind, coords: ArtifactCoordinates): Promise<JsonValue>;
  async read(kind: ArtifactKind, coords: ArtifactCoordinates): Promise<JsonValue> {
    const filePath = this.layout.documentPath(kind, coords);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingPathError(error)) {
        throw new NotFoundError(kind, describeCoordinates(coords), filePath);
      }
      throw error;
    }
    const parsed = safeJsonParse<JsonValue>(raw);
    if (!parsed.ok) {
      throw new ParseError(filePath, parsed.error.message, parsed.error);
    }
    return parsed.value;
  }

  async exists(kind: ArtifactKind, coords: ArtifactCoordinates): Promise<boolean> {
    try {
      return (await fs.stat(this.layout.documentPath(kind, coords))).isFile();
    } catch (error) {
      if (isMissingPathError(error)) return false;
      throw error;
    }
  }

  // ==========================================================================
  // LISTINGS (sorted)
  // ==========================================================================

  async hasFunction(kind: ArtifactKind, func: string): Promise<boolean> {
    return isDirectory(this.layout.functionDir(kind, func));
  }

  async listFunctions(kind: ArtifactKind): Promise<string[]> {
    return listEntries(this.layout.kindDir(kind), 'directories');
  }

  async listUnits(kind: ArtifactKind, func: string): Promise<string[]> {
    return listEntries(this.layout.functionDir(kind, func), 'directories');
  }

  /** Slice ids under (function, unit), ascending */
  async listSliceIds(func: string, unit: string): Promise<number[]> {
    return sortedIds(await listEntries(this.layout.unitDir('slice', func, unit), 'files'));
  }

  /** Trace ids stored for one slice, ascending */
  async listTraceIds(kind: 'trace' | 'feature', func: string, unit: string, sliceId: number): Promise<number[]> {
    return sortedIds(await listEntries(this.layout.sliceNamespaceDir(kind, func, unit, sliceId), 'files'));
  }

  // ==========================================================================
  // REMOVAL
  // ==========================================================================

  /**
   * Remove every artifact of `unit` across all functions and kinds by walking
   * `<kind>/<function>/<unit>` explicitly. Returns the number of documents
   * removed; an unknown unit removes nothing.
   */
  async clear(unit: string): Promise<number> {
    assertSegment('unit', unit);
    let removed = 0;
    for (const kind of ARTIFACT_KINDS) {
      for (const func of await this.listFunctions(kind)) {
        removed += await removeTree(this.layout.unitDir(kind, func, unit), isDocumentFile);
      }
    }
    if (removed > 0) {
      logInfo('[store] Cleared unit artifacts', { unit, removed });
    } else {
      logDebug('[store] No artifacts to clear', { unit });
    }
    return removed;
  }
}

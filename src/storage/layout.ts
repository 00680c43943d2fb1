/**
 * @fileoverview On-disk layout of a slicebase store
 *
 * ```
 * <root>/
 *   packages/<name>/index.json
 *   packages/<name>/source/
 *   analysis/slices/<function>/<unit>/<sliceId>.json
 *   analysis/dugraphs/<function>/<unit>/<sliceId>/<traceId>.json
 *   analysis/features/<function>/<unit>/<sliceId>/<traceId>.json
 *   temp/
 * ```
 *
 * Pure path arithmetic; nothing here touches the filesystem.
 */

import * as path from 'node:path';
import { InvalidArgumentError } from '../core/errors.js';
import {
  KIND_DIRECTORIES,
  PathSegmentSchema,
  hasTraceId,
  type ArtifactCoordinates,
  type ArtifactKind,
} from './types.js';

const DOCUMENT_EXTENSION = '.json';
const DOCUMENT_NAME_PATTERN = /^(\d+)\.json$/;

export function assertSegment(argument: string, value: string): void {
  const parsed = PathSegmentSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(argument, `${JSON.stringify(value)} must be a single path segment`);
  }
}

export function assertId(argument: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(argument, `${value} must be a non-negative integer`);
  }
}

/** `12.json` -> 12; anything else -> null */
export function parseDocumentId(fileName: string): number | null {
  const match = DOCUMENT_NAME_PATTERN.exec(fileName);
  return match ? Number(match[1]) : null;
}

export function documentFileName(id: number): string {
  return `${id}${DOCUMENT_EXTENSION}`;
}

export class StoreLayout {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  // --------------------------------------------------------------------------
  // Packages
  // --------------------------------------------------------------------------

  packagesDir(): string {
    return path.join(this.root, 'packages');
  }

  packageDir(name: string): string {
    assertSegment('package name', name);
    return path.join(this.packagesDir(), name);
  }

  packageIndexPath(name: string): string {
    return path.join(this.packageDir(name), 'index.json');
  }

  packageSourceDir(name: string): string {
    return path.join(this.packageDir(name), 'source');
  }

  // --------------------------------------------------------------------------
  // Analysis artifacts
  // --------------------------------------------------------------------------

  analysisDir(): string {
    return path.join(this.root, 'analysis');
  }

  kindDir(kind: ArtifactKind): string {
    return path.join(this.analysisDir(), KIND_DIRECTORIES[kind]);
  }

  functionDir(kind: ArtifactKind, func: string): string {
    assertSegment('function', func);
    return path.join(this.kindDir(kind), func);
  }

  unitDir(kind: ArtifactKind, func: string, unit: string): string {
    assertSegment('unit', unit);
    return path.join(this.functionDir(kind, func), unit);
  }

  /** Directory holding the per-trace documents of one slice (traces and features only) */
  sliceNamespaceDir(kind: Exclude<ArtifactKind, 'slice'>, func: string, unit: string, sliceId: number): string {
    assertId('slice id', sliceId);
    return path.join(this.unitDir(kind, func, unit), String(sliceId));
  }

  documentPath(kind: ArtifactKind, coords: ArtifactCoordinates): string {
    if (kind === 'slice') {
      assertId('slice id', coords.sliceId);
      return path.join(this.unitDir(kind, coords.function, coords.unit), documentFileName(coords.sliceId));
    }
    if (!hasTraceId(coords)) {
      throw new InvalidArgumentError('coordinates', `${kind} documents need a trace id`);
    }
    assertId('trace id', coords.traceId);
    return path.join(
      this.sliceNamespaceDir(kind, coords.function, coords.unit, coords.sliceId),
      documentFileName(coords.traceId),
    );
  }

  // --------------------------------------------------------------------------
  // Scratch
  // --------------------------------------------------------------------------

  tempDir(): string {
    return path.join(this.root, 'temp');
  }
}

/**
 * @fileoverview Storage types for slicebase
 *
 * Artifacts are addressed by coordinates rather than paths:
 * - slices by (function, unit, sliceId)
 * - traces (def-use graphs) and features by (function, unit, sliceId, traceId)
 *
 * Packages are described by an `index.json` validated against
 * {@link PackageRecordSchema}.
 */

import { z } from 'zod';

// ============================================================================
// DOCUMENTS
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// ARTIFACT ADDRESSING
// ============================================================================

export type ArtifactKind = 'slice' | 'trace' | 'feature';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ['slice', 'trace', 'feature'];

/** On-disk directory under `analysis/` for each artifact kind */
export const KIND_DIRECTORIES: Record<ArtifactKind, string> = {
  slice: 'slices',
  trace: 'dugraphs',
  feature: 'features',
};

export interface SliceCoordinates {
  function: string;
  unit: string;
  sliceId: number;
}

export interface TraceCoordinates extends SliceCoordinates {
  traceId: number;
}

export type ArtifactCoordinates = SliceCoordinates | TraceCoordinates;

export function hasTraceId(coords: ArtifactCoordinates): coords is TraceCoordinates {
  return 'traceId' in coords;
}

// ============================================================================
// PACKAGES
// ============================================================================

/** A name that is safe to use as one directory segment */
export const PathSegmentSchema = z
  .string()
  .min(1)
  .refine((value) => value !== '.' && value !== '..' && !/[\\/\0]/.test(value), {
    message: 'must be a single path segment',
  });

export const BuildResultSchema = z.enum(['not-built', 'success', 'failure']);
export type BuildResult = z.infer<typeof BuildResultSchema>;

export const PackageRecordSchema = z.object({
  name: PathSegmentSchema,
  fetched: z.boolean().default(false),
  build: z
    .object({
      result: BuildResultSchema.default('not-built'),
      message: z.string().optional(),
    })
    .default({}),
  units: z
    .array(PathSegmentSchema)
    .default([])
    .refine((units) => new Set(units).size === units.length, { message: 'unit identifiers must be unique' }),
});

/** A package as held by the index, with defaults applied */
export type PackageRecord = z.infer<typeof PackageRecordSchema>;

/** What callers hand to `PackageIndex.upsert` */
export type PackageRecordInput = z.input<typeof PackageRecordSchema>;

/**
 * @fileoverview Data points
 *
 * A DataPoint joins one slice with one of its traces. It is the unit the
 * oracle loop labels. The slice document is shared by every trace of the
 * slice; trace and feature documents are read only when asked for.
 */

import { NotFoundError } from '../core/errors.js';
import type { ArtifactStore } from '../storage/artifact_store.js';
import type { JsonValue, TraceCoordinates } from '../storage/types.js';
import { isJsonObject } from '../utils/safe_json.js';

// ============================================================================
// DATA POINT
// ============================================================================

export interface DataPointInit {
  function: string;
  unit: string;
  sliceId: number;
  traceId: number;
  slice: JsonValue;
}

export class DataPoint {
  readonly function: string;
  readonly unit: string;
  readonly sliceId: number;
  readonly traceId: number;
  readonly slice: JsonValue;

  private traceDocument: JsonValue | undefined;
  private featureDocument: JsonValue | undefined;

  constructor(
    private readonly store: ArtifactStore,
    init: DataPointInit,
  ) {
    this.function = init.function;
    this.unit = init.unit;
    this.sliceId = init.sliceId;
    this.traceId = init.traceId;
    this.slice = init.slice;
  }

  /** `<unit>:<sliceId>:<traceId>` */
  get key(): string {
    return `${this.unit}:${this.sliceId}:${this.traceId}`;
  }

  get coordinates(): TraceCoordinates {
    return { function: this.function, unit: this.unit, sliceId: this.sliceId, traceId: this.traceId };
  }

  /** Whether `other` comes from the same slice (same unit and slice id) */
  sameSlice(other: DataPoint): boolean {
    return this.function === other.function && this.unit === other.unit && this.sliceId === other.sliceId;
  }

  async trace(): Promise<JsonValue> {
    if (this.traceDocument === undefined) {
      this.traceDocument = await this.store.read('trace', this.coordinates);
    }
    return this.traceDocument;
  }

  async feature(): Promise<JsonValue> {
    if (this.featureDocument === undefined) {
      this.featureDocument = await this.store.read('feature', this.coordinates);
    }
    return this.featureDocument;
  }

  /** Labels attached to the trace by filtering stages, e.g. `undersized` */
  async labels(): Promise<string[]> {
    const trace = await this.trace();
    if (!isJsonObject(trace) || !Array.isArray(trace.labels)) return [];
    return trace.labels.filter((label): label is string => typeof label === 'string');
  }

  async hasLabel(label: string): Promise<boolean> {
    return (await this.labels()).includes(label);
  }
}

// ============================================================================
// STREAM
// ============================================================================

export class DataPointStream {
  constructor(private readonly store: ArtifactStore) {}

  /**
   * Lazily yield every (slice, trace) pair of `func`, ordered by unit name,
   * then slice id, then trace id. Each slice document is read once.
   *
   * @throws NotFoundError on first pull when the function has no slices
   */
  async *forFunction(func: string): AsyncGenerator<DataPoint> {
    if (!(await this.store.hasFunction('slice', func))) {
      throw new NotFoundError('function', func, this.store.layout.functionDir('slice', func));
    }

    for (const unit of await this.store.listUnits('slice', func)) {
      for (const sliceId of await this.store.listSliceIds(func, unit)) {
        const slice = await this.store.read('slice', { function: func, unit, sliceId });
        for (const traceId of await this.store.listTraceIds('trace', func, unit, sliceId)) {
          yield new DataPoint(this.store, { function: func, unit, sliceId, traceId, slice });
        }
      }
    }
  }

  async collect(func: string): Promise<DataPoint[]> {
    const points: DataPoint[] = [];
    for await (const point of this.forFunction(func)) {
      points.push(point);
    }
    return points;
  }
}

/**
 * @fileoverview Oracle loop types
 */

import type { DataPoint } from '../query/datapoints.js';
import type { FunctionSpec } from './function_spec.js';

type MaybePromise<T> = T | Promise<T>;

// ============================================================================
// POOL
// ============================================================================

/**
 * One candidate in the labeling pool. `index` is the entry's fixed position
 * in the original pool and is what strategies hand back from `select`.
 */
export interface PoolEntry {
  index: number;
  datapoint: DataPoint;
  features: readonly number[];
}

export interface RankedAlarm {
  index: number;
  datapoint: DataPoint;
  /** Higher means more anomalous */
  score: number;
}

// ============================================================================
// RANKING STRATEGY
// ============================================================================

/**
 * The ranking model, injected into the loop. The loop never inspects how a
 * strategy scores; it only asks what to label next and what to report.
 */
export interface RankingStrategy {
  readonly name: string;
  /** Pool index of the next entry to label, or null when nothing is left to ask */
  select(remaining: readonly PoolEntry[]): MaybePromise<number | null>;
  /** Called once per labeled entry, propagated ones included */
  feedback?(entry: PoolEntry, isAlarm: boolean): MaybePromise<void>;
  /** The `count` highest-ranked alarms over the whole pool */
  alarms(count: number): MaybePromise<RankedAlarm[]>;
}

// ============================================================================
// ORACLE SOURCES
// ============================================================================

export type OracleSource =
  | { kind: 'ground-truth'; label: string }
  | { kind: 'human-visual'; sourceRoot: string }
  | { kind: 'specification'; spec: FunctionSpec };

export type OracleKind = OracleSource['kind'];

export const HUMAN_RESPONSES = ['y', 'Y', 'n', 'N', 'q'] as const;

/**
 * `y`/`n` label the shown item, `Y`/`N` also label the rest of its slice
 * inside the propagation window, `q` ends the session.
 */
export type HumanResponse = (typeof HUMAN_RESPONSES)[number];

export function isHumanResponse(value: string): value is HumanResponse {
  return HUMAN_RESPONSES.some((response) => response === value);
}

// ============================================================================
// RESULT
// ============================================================================

export type TerminationReason = 'budgetExhausted' | 'selectionExhausted' | 'oracleQuit';

export interface Discovery {
  datapoint: DataPoint;
  /** Attempt during which the alarm was labeled */
  attempt: number;
}

export interface OracleLoopResult {
  alarms: RankedAlarm[];
  /** Running alarm count, starting at 0, one entry per labeling event */
  cumulativeOutliers: number[];
  /** Precision of the strategy's top-k after each step; empty without ground truth */
  precisionAtK: number[];
  discoveries: Discovery[];
  termination: TerminationReason;
  /** Steps that produced a label */
  attempts: number;
}

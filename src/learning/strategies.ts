/**
 * @fileoverview Ranking strategies
 *
 * Stand-ins for a trained model behind the {@link RankingStrategy} seam:
 * - `sequential`: asks in pool order; reports labeled alarms in discovery order
 * - `distance`: k-nearest-neighbour distance outlier score over the feature
 *   vectors; asks about the most isolated entry first
 */

import type { PoolEntry, RankedAlarm, RankingStrategy } from './types.js';

export type StrategyName = 'sequential' | 'distance';

export const STRATEGY_NAMES: readonly StrategyName[] = ['sequential', 'distance'];

export function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

// ============================================================================
// SEQUENTIAL
// ============================================================================

export function createSequentialStrategy(): RankingStrategy {
  const labeledAlarms: PoolEntry[] = [];

  return {
    name: 'sequential',

    select(remaining) {
      return remaining.length > 0 ? remaining[0].index : null;
    },

    feedback(entry, isAlarm) {
      if (isAlarm) labeledAlarms.push(entry);
    },

    alarms(count) {
      return labeledAlarms.slice(0, Math.max(0, count)).map((entry) => ({
        index: entry.index,
        datapoint: entry.datapoint,
        score: 1,
      }));
    },
  };
}

// ============================================================================
// DISTANCE
// ============================================================================

export interface DistanceRankingOptions {
  /** Neighbours averaged into each score (default 5) */
  neighbors?: number;
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i++) {
    const delta = (a[i] ?? 0) - (b[i] ?? 0);
    sum += delta * delta;
  }
  return Math.sqrt(sum);
}

/**
 * Mean distance from every entry to its `neighbors` nearest other entries.
 * A pool of one scores 0.
 */
export function knnOutlierScores(pool: readonly PoolEntry[], neighbors: number): Map<number, number> {
  const scores = new Map<number, number>();
  for (const entry of pool) {
    const distances = pool
      .filter((other) => other.index !== entry.index)
      .map((other) => euclideanDistance(entry.features, other.features))
      .sort((a, b) => a - b)
      .slice(0, Math.max(1, neighbors));
    const score = distances.length === 0
      ? 0
      : distances.reduce((total, distance) => total + distance, 0) / distances.length;
    scores.set(entry.index, score);
  }
  return scores;
}

function byScoreThenIndex(a: RankedAlarm, b: RankedAlarm): number {
  return b.score - a.score || a.index - b.index;
}

export function createDistanceRankingStrategy(
  pool: readonly PoolEntry[],
  options: DistanceRankingOptions = {},
): Omit<RankingStrategy, 'alarms'> & { alarms(count: number): RankedAlarm[] } {
  const scores = knnOutlierScores(pool, options.neighbors ?? 5);
  const labels = new Map<number, boolean>();
  const scoreOf = (entry: PoolEntry): number => scores.get(entry.index) ?? 0;

  return {
    name: 'distance',

    select(remaining) {
      let best: PoolEntry | null = null;
      for (const entry of remaining) {
        if (best === null || scoreOf(entry) > scoreOf(best)) {
          best = entry;
        }
      }
      return best === null ? null : best.index;
    },

    feedback(entry, isAlarm) {
      labels.set(entry.index, isAlarm);
    },

    // Confirmed alarms first, then unlabeled entries; confirmed non-alarms never.
    alarms(count) {
      const confirmed: RankedAlarm[] = [];
      const candidates: RankedAlarm[] = [];
      for (const entry of pool) {
        const ranked = { index: entry.index, datapoint: entry.datapoint, score: scoreOf(entry) };
        const label = labels.get(entry.index);
        if (label === true) confirmed.push(ranked);
        else if (label === undefined) candidates.push(ranked);
      }
      return [...confirmed.sort(byScoreThenIndex), ...candidates.sort(byScoreThenIndex)].slice(0, Math.max(0, count));
    },
  };
}

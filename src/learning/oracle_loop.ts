/**
 * @fileoverview Oracle-driven active learning loop
 *
 * Runs at most `budget` labeling steps over a fixed pool:
 * 1. the injected strategy selects the next entry (null ends the loop)
 * 2. the configured oracle labels it; a human reviewer may extend the label
 *    to the rest of the entry's slice inside the propagation window, or quit
 * 3. the strategy receives feedback for every labeled entry
 * 4. the cumulative-outlier curve (and, with ground truth, the precision of
 *    the strategy's top-k) is updated
 *
 * The human visualizer is created on first use and destroyed on every exit
 * path before the loop returns or rethrows.
 */

import { ConfigurationError, InvalidSelectionError } from '../core/errors.js';
import type { DataPoint } from '../query/datapoints.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import { DEFAULT_PROPAGATION_RADIUS } from '../config/index.js';
import { describeOracle } from './oracle_source.js';
import { createTerminalVisualizer, type OracleVisualizer, type VisualizerFactory } from './visualizer.js';
import type {
  Discovery,
  OracleLoopResult,
  OracleSource,
  PoolEntry,
  RankingStrategy,
  TerminationReason,
} from './types.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface OracleLoopOptions {
  pool: readonly PoolEntry[];
  strategy: RankingStrategy;
  oracle: OracleSource;
  /** Maximum labeling steps */
  budget: number;
  /** Size of the alarm list returned at the end */
  numAlarms: number;
  /** k for precision-at-k; defaults to the number of ground-truth alarms in the pool */
  numOutliers?: number;
  /** Half-width of the slice propagation window around the selected index */
  propagationRadius?: number;
  /** Builds the human visualizer; defaults to the terminal visualizer */
  createVisualizer?: VisualizerFactory;
}

type Verdict =
  | { kind: 'label'; isAlarm: boolean; propagate: boolean }
  | { kind: 'quit' };

const HUMAN_PROMPT_SUFFIX = 'Do you think this is a bug? [y|Y|n|N|q] > ';

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`, name);
  }
}

/** Pair data points with their feature vectors, fixing each entry's pool index */
export function createPool(datapoints: readonly DataPoint[], features: readonly (readonly number[])[] = []): PoolEntry[] {
  if (features.length > 0 && features.length !== datapoints.length) {
    throw new ConfigurationError(
      `Feature vectors (${features.length}) do not match data points (${datapoints.length})`,
      'features',
    );
  }
  return datapoints.map((datapoint, index) => ({ index, datapoint, features: features[index] ?? [] }));
}

// ============================================================================
// LOOP
// ============================================================================

export class OracleLoop {
  private readonly pool: readonly PoolEntry[];
  private readonly strategy: RankingStrategy;
  private readonly oracle: OracleSource;
  private readonly budget: number;
  private readonly numAlarms: number;
  private readonly numOutliers: number | undefined;
  private readonly radius: number;
  private readonly createVisualizer: VisualizerFactory;
  private visualizer: OracleVisualizer | null = null;

  constructor(options: OracleLoopOptions) {
    assertCount('budget', options.budget);
    assertCount('numAlarms', options.numAlarms);
    if (options.numOutliers !== undefined) assertCount('numOutliers', options.numOutliers);
    const radius = options.propagationRadius ?? DEFAULT_PROPAGATION_RADIUS;
    assertCount('propagationRadius', radius);
    options.pool.forEach((entry, position) => {
      if (entry.index !== position) {
        throw new ConfigurationError(`Pool entry at position ${position} has index ${entry.index}`, 'pool');
      }
    });

    this.pool = options.pool;
    this.strategy = options.strategy;
    this.oracle = options.oracle;
    this.budget = options.budget;
    this.numAlarms = options.numAlarms;
    this.numOutliers = options.numOutliers;
    this.radius = radius;
    this.createVisualizer = options.createVisualizer ?? ((sourceRoot) => createTerminalVisualizer(sourceRoot));
  }

  async run(): Promise<OracleLoopResult> {
    const remaining = new Map<number, PoolEntry>(this.pool.map((entry) => [entry.index, entry]));
    const cumulativeOutliers = [0];
    const precisionAtK: number[] = [];
    const discoveries: Discovery[] = [];
    const groundTruth = this.oracle.kind === 'ground-truth' ? this.oracle.label : null;
    const k = groundTruth === null ? 0 : (this.numOutliers ?? await this.countLabeled(groundTruth));

    let outliers = 0;
    let attempts = 0;
    let termination: TerminationReason = 'budgetExhausted';

    logInfo('[oracle] Starting labeling session', {
      oracle: describeOracle(this.oracle),
      strategy: this.strategy.name,
      pool: this.pool.length,
      budget: this.budget,
    });

    try {
      for (let attempt = 0; attempt < this.budget; attempt++) {
        const selected = await this.strategy.select([...remaining.values()]);
        if (selected === null) {
          termination = 'selectionExhausted';
          break;
        }
        const entry = remaining.get(selected);
        if (!entry) {
          throw new InvalidSelectionError(selected);
        }

        const verdict = await this.label(entry, attempt);
        if (verdict.kind === 'quit') {
          termination = 'oracleQuit';
          break;
        }
        logDebug(`[oracle] Attempt ${attempt} is alarm: ${verdict.isAlarm}`, {
          datapoint: entry.datapoint.key,
          propagate: verdict.propagate,
        });

        const labeled = verdict.propagate ? [entry, ...this.sliceWindow(entry, remaining)] : [entry];
        for (const item of labeled) {
          await this.strategy.feedback?.(item, verdict.isAlarm);
          remaining.delete(item.index);
          if (verdict.isAlarm) {
            outliers++;
            discoveries.push({ datapoint: item.datapoint, attempt });
          }
          cumulativeOutliers.push(outliers);
        }
        attempts++;

        if (groundTruth !== null) {
          precisionAtK.push(await this.precisionAt(k, groundTruth));
        }
      }
    } finally {
      await this.releaseVisualizer();
    }

    logInfo('[oracle] Labeling session finished', { termination, attempts, outliers });

    return {
      alarms: await this.strategy.alarms(this.numAlarms),
      cumulativeOutliers,
      precisionAtK,
      discoveries,
      termination,
      attempts,
    };
  }

  private async label(entry: PoolEntry, attempt: number): Promise<Verdict> {
    const oracle = this.oracle;
    switch (oracle.kind) {
      case 'ground-truth':
        return { kind: 'label', isAlarm: await entry.datapoint.hasLabel(oracle.label), propagate: false };
      case 'specification':
        return { kind: 'label', isAlarm: !(await oracle.spec.matches(entry.datapoint)), propagate: false };
      case 'human-visual': {
        const response = await this.acquireVisualizer(oracle.sourceRoot).ask(entry.datapoint, {
          attempt,
          prompt: `Attempt ${attempt}: ${HUMAN_PROMPT_SUFFIX}`,
        });
        if (response === 'q') return { kind: 'quit' };
        return {
          kind: 'label',
          isAlarm: response === 'y' || response === 'Y',
          propagate: response === 'Y' || response === 'N',
        };
      }
    }
  }

  private acquireVisualizer(sourceRoot: string): OracleVisualizer {
    if (!this.visualizer) {
      this.visualizer = this.createVisualizer(sourceRoot);
    }
    return this.visualizer;
  }

  private async releaseVisualizer(): Promise<void> {
    const active = this.visualizer;
    this.visualizer = null;
    if (active) {
      await active.destroy();
    }
  }

  /** Remaining entries of the same (function, unit, slice id) at pool positions [i - r, i + r), excluding i */
  private sliceWindow(entry: PoolEntry, remaining: ReadonlyMap<number, PoolEntry>): PoolEntry[] {
    const start = Math.max(entry.index - this.radius, 0);
    const end = Math.min(entry.index + this.radius, this.pool.length);
    const members: PoolEntry[] = [];
    for (let index = start; index < end; index++) {
      if (index === entry.index) continue;
      const candidate = remaining.get(index);
      if (candidate && candidate.datapoint.sameSlice(entry.datapoint)) {
        members.push(candidate);
      }
    }
    return members;
  }

  private async countLabeled(label: string): Promise<number> {
    let count = 0;
    for (const entry of this.pool) {
      if (await entry.datapoint.hasLabel(label)) count++;
    }
    return count;
  }

  private async precisionAt(k: number, label: string): Promise<number> {
    const top = await this.strategy.alarms(k);
    if (top.length === 0) return 0;
    let hits = 0;
    for (const alarm of top) {
      if (await alarm.datapoint.hasLabel(label)) hits++;
    }
    return hits / top.length;
  }
}

/**
 * @fileoverview Learn command - oracle-driven labeling session
 *
 * Collects every data point of a function, resolves the single oracle source,
 * encodes feature vectors when the strategy needs them, runs the loop and
 * prints (optionally writes) the report.
 */

import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { encodeFeature, unifyFeatures, type UnifiedFeatureKeys } from '../../learning/features.js';
import { FunctionSpec } from '../../learning/function_spec.js';
import { OracleLoop, createPool } from '../../learning/oracle_loop.js';
import { describeOracle, resolveOracleSource } from '../../learning/oracle_source.js';
import { writeLearningReport } from '../../learning/report.js';
import {
  STRATEGY_NAMES,
  createDistanceRankingStrategy,
  createSequentialStrategy,
  isStrategyName,
} from '../../learning/strategies.js';
import type { OracleLoopResult, PoolEntry, RankingStrategy } from '../../learning/types.js';
import { createTerminalVisualizer, type VisualizerFactory } from '../../learning/visualizer.js';
import type { DataPoint } from '../../query/datapoints.js';
import type { JsonValue } from '../../storage/types.js';
import { parseCommandArgs, parseOptionalInteger, requirePositional } from '../args.js';
import type { CommandContext } from '../context.js';
import { createError } from '../errors.js';
import { createProgressBar, printKeyValue, printTable } from '../progress.js';

const DEFAULT_NUM_ALARMS = 10;

export interface LearnCommandOptions {
  /** Replaces the terminal visualizer for the human oracle */
  createVisualizer?: VisualizerFactory;
  /** Draw the feature-loading progress bar (default: stderr is a TTY) */
  showProgress?: boolean;
  /** Recorded in curves.json */
  argv?: string[];
}

export async function learnCommand(context: CommandContext, options: LearnCommandOptions = {}): Promise<OracleLoopResult> {
  const { values, positionals } = parseCommandArgs('learn', () => parseArgs({
    args: context.args,
    options: {
      'ground-truth': { type: 'string', short: 'g' },
      'source': { type: 'string', short: 's' },
      'function-spec': { type: 'string' },
      'strategy': { type: 'string', default: 'sequential' },
      'budget': { type: 'string' },
      'num-alarms': { type: 'string' },
      'num-outliers': { type: 'string' },
      'radius': { type: 'string' },
      'neighbors': { type: 'string' },
      'output': { type: 'string', short: 'o' },
    },
    allowPositionals: true,
  }));

  const func = requirePositional('learn', positionals, 0, 'function');
  const strategyName = values.strategy ?? 'sequential';
  if (!isStrategyName(strategyName)) {
    throw createError('INVALID_ARGUMENT', `--strategy must be one of ${STRATEGY_NAMES.join(', ')}, got ${strategyName}`);
  }
  const budget = parseOptionalInteger('--budget', values.budget) ?? context.config.defaultBudget;
  const numAlarms = parseOptionalInteger('--num-alarms', values['num-alarms']) ?? DEFAULT_NUM_ALARMS;
  const numOutliers = parseOptionalInteger('--num-outliers', values['num-outliers']);
  const radius = parseOptionalInteger('--radius', values.radius) ?? context.config.propagationRadius;
  const neighbors = parseOptionalInteger('--neighbors', values.neighbors, 1);

  const specPath = values['function-spec'];
  const oracle = resolveOracleSource({
    groundTruth: values['ground-truth'],
    source: values.source === undefined ? undefined : path.resolve(values.source),
    functionSpec: specPath === undefined ? undefined : await FunctionSpec.load(path.resolve(specPath)),
  });

  const datapoints = await context.session.datapoints.collect(func);

  let unified: UnifiedFeatureKeys | undefined;
  let strategyFor: (pool: readonly PoolEntry[]) => RankingStrategy = () => createSequentialStrategy();
  let vectors: number[][] = [];
  if (strategyName === 'distance') {
    const documents = await loadFeatures(datapoints, options.showProgress ?? process.stderr.isTTY === true);
    const keys = unifyFeatures(documents);
    unified = keys;
    vectors = documents.map((document) => encodeFeature(document, keys));
    strategyFor = (pool) => createDistanceRankingStrategy(pool, { neighbors });
  }

  const pool = createPool(datapoints, vectors);
  const viewer = context.config.viewer;
  const loop = new OracleLoop({
    pool,
    strategy: strategyFor(pool),
    oracle,
    budget,
    numAlarms,
    numOutliers,
    propagationRadius: radius,
    createVisualizer: options.createVisualizer ?? ((sourceRoot) => createTerminalVisualizer(sourceRoot, { viewer })),
  });
  const result = await loop.run();

  printKeyValue([
    { key: 'Function', value: func },
    { key: 'Oracle', value: describeOracle(oracle) },
    { key: 'Strategy', value: strategyName },
    { key: 'Data points', value: pool.length },
    { key: 'Attempts', value: result.attempts },
    { key: 'Termination', value: result.termination },
    { key: 'Alarms found', value: result.discoveries.length },
    { key: 'Precision@k', value: result.precisionAtK.length > 0 ? result.precisionAtK[result.precisionAtK.length - 1].toFixed(3) : null },
  ]);
  if (result.alarms.length > 0) {
    console.log('');
    printTable(
      ['Rank', 'Unit', 'Slice', 'Trace', 'Score'],
      result.alarms.map((alarm, rank) => [
        String(rank + 1),
        alarm.datapoint.unit,
        String(alarm.datapoint.sliceId),
        String(alarm.datapoint.traceId),
        alarm.score.toFixed(3),
      ]),
    );
  }

  if (values.output !== undefined) {
    const outputDir = path.resolve(values.output);
    await writeLearningReport(outputDir, result, { unified, argv: options.argv });
    console.log(`\nReport written to ${outputDir}`);
  }
  return result;
}

async function loadFeatures(datapoints: readonly DataPoint[], showProgress: boolean): Promise<JsonValue[]> {
  const progress = createProgressBar({ total: datapoints.length, task: 'Loading features', silent: !showProgress });
  const documents: JsonValue[] = [];
  try {
    for (const datapoint of datapoints) {
      documents.push(await datapoint.feature());
      progress.increment(1, { task: datapoint.key });
    }
  } finally {
    progress.stop();
  }
  return documents;
}

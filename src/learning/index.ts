/**
 * @fileoverview Oracle-driven active learning
 *
 * @packageDocumentation
 */

export { OracleLoop, createPool, type OracleLoopOptions } from './oracle_loop.js';
export { resolveOracleSource, describeOracle, type OracleSelectionOptions } from './oracle_source.js';
export {
  createSequentialStrategy,
  createDistanceRankingStrategy,
  knnOutlierScores,
  euclideanDistance,
  isStrategyName,
  STRATEGY_NAMES,
  type StrategyName,
  type DistanceRankingOptions,
} from './strategies.js';
export {
  FunctionSpec,
  FunctionSpecSchema,
  SpecRuleSchema,
  lookupPath,
  type FunctionSpecDefinition,
  type SpecRule,
} from './function_spec.js';
export {
  TerminalVisualizer,
  createTerminalVisualizer,
  findSourceLocation,
  renderExcerpt,
  type AskRequest,
  type OracleVisualizer,
  type SourceLocation,
  type TerminalVisualizerOptions,
  type VisualizerFactory,
} from './visualizer.js';
export { FEATURE_GROUPS, unifyFeatures, encodeFeature, type FeatureGroup, type UnifiedFeatureKeys } from './features.js';
export { writeLearningReport, formatAlarmsCsv, formatAlarmsBriefCsv, formatDiscoveriesCsv, type ReportExtras } from './report.js';
export {
  HUMAN_RESPONSES,
  isHumanResponse,
  type Discovery,
  type HumanResponse,
  type OracleKind,
  type OracleLoopResult,
  type OracleSource,
  type PoolEntry,
  type RankedAlarm,
  type RankingStrategy,
  type TerminationReason,
} from './types.js';

/**
 * @fileoverview Oracle source resolution
 *
 * Exactly one labeling source answers "is this an alarm?" for a session.
 * Candidates are considered in precedence order (ground truth, human visual,
 * specification); configuring none, or more than one, is rejected before any
 * labeling starts.
 */

import { ConfigurationError } from '../core/errors.js';
import type { FunctionSpec } from './function_spec.js';
import type { OracleSource } from './types.js';

export interface OracleSelectionOptions {
  /** Label carried by true alarms in the trace documents */
  groundTruth?: string;
  /** Source tree shown to a human reviewer */
  source?: string;
  /** Declarative specification to check data points against */
  functionSpec?: FunctionSpec;
}

const ORACLE_FLAGS: Record<OracleSource['kind'], string> = {
  'ground-truth': '--ground-truth',
  'human-visual': '--source',
  'specification': '--function-spec',
};

export function describeOracle(source: OracleSource): string {
  switch (source.kind) {
    case 'ground-truth':
      return `ground truth (${source.label})`;
    case 'human-visual':
      return `human review (${source.sourceRoot})`;
    case 'specification':
      return `specification${source.spec.definition.function ? ` (${source.spec.definition.function})` : ''}`;
  }
}

/**
 * @throws ConfigurationError when no source or several sources are configured
 */
export function resolveOracleSource(options: OracleSelectionOptions): OracleSource {
  const candidates: OracleSource[] = [];
  if (options.groundTruth !== undefined && options.groundTruth !== '') {
    candidates.push({ kind: 'ground-truth', label: options.groundTruth });
  }
  if (options.source !== undefined && options.source !== '') {
    candidates.push({ kind: 'human-visual', sourceRoot: options.source });
  }
  if (options.functionSpec !== undefined) {
    candidates.push({ kind: 'specification', spec: options.functionSpec });
  }

  const [selected, ...rest] = candidates;
  if (!selected) {
    throw new ConfigurationError(
      `No oracle configured: provide one of ${Object.values(ORACLE_FLAGS).join(', ')}`,
      'oracle',
    );
  }
  if (rest.length > 0) {
    throw new ConfigurationError(
      `Ambiguous oracle configuration: ${candidates.map((candidate) => ORACLE_FLAGS[candidate.kind]).join(', ')} were all given; choose one`,
      'oracle',
    );
  }
  return selected;
}

/**
 * @fileoverview Labeling session report
 *
 * Files written to the output directory:
 * - `alarms.csv`       unit,slice_id,trace_id,score (ranked)
 * - `alarms_brief.csv` unit,slice_id,num_traces,score_avg (one row per slice)
 * - `discoveries.csv`  unit,slice_id,trace_id,attempt (discovery order)
 * - `curves.json`      termination, attempts and both diagnostic curves
 * - `unified.json`     unified feature keys, when features were encoded
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { stringifyDocument } from '../utils/safe_json.js';
import { logInfo } from '../telemetry/logger.js';
import type { UnifiedFeatureKeys } from './features.js';
import type { OracleLoopResult } from './types.js';

export interface ReportExtras {
  unified?: UnifiedFeatureKeys;
  /** Command line that produced the session, recorded in curves.json */
  argv?: string[];
}

export function csvField(value: string | number | boolean): string {
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvLine(values: Array<string | number | boolean>): string {
  return `${values.map(csvField).join(',')}\n`;
}

export function formatAlarmsCsv(result: OracleLoopResult): string {
  let csv = csvLine(['unit', 'slice_id', 'trace_id', 'score']);
  for (const alarm of result.alarms) {
    const { unit, sliceId, traceId } = alarm.datapoint;
    csv += csvLine([unit, sliceId, traceId, alarm.score]);
  }
  return csv;
}

/** Alarms grouped by slice, highest average score first; ties keep rank order */
export function formatAlarmsBriefCsv(result: OracleLoopResult): string {
  const slices = new Map<string, { unit: string; sliceId: number; total: number; count: number }>();
  for (const alarm of result.alarms) {
    const { unit, sliceId } = alarm.datapoint;
    const key = JSON.stringify([unit, sliceId]);
    const entry = slices.get(key);
    if (entry) {
      entry.total += alarm.score;
      entry.count++;
    } else {
      slices.set(key, { unit, sliceId, total: alarm.score, count: 1 });
    }
  }

  const rows = [...slices.values()].sort((a, b) => b.total / b.count - a.total / a.count);
  let csv = csvLine(['unit', 'slice_id', 'num_traces', 'score_avg']);
  for (const row of rows) {
    csv += csvLine([row.unit, row.sliceId, row.count, row.total / row.count]);
  }
  return csv;
}

export function formatDiscoveriesCsv(result: OracleLoopResult): string {
  let csv = csvLine(['unit', 'slice_id', 'trace_id', 'attempt']);
  for (const discovery of result.discoveries) {
    const { unit, sliceId, traceId } = discovery.datapoint;
    csv += csvLine([unit, sliceId, traceId, discovery.attempt]);
  }
  return csv;
}

/** Write the report files; returns their paths */
export async function writeLearningReport(
  outputDir: string,
  result: OracleLoopResult,
  extras: ReportExtras = {},
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });
  const files: Array<[string, string]> = [
    ['alarms.csv', formatAlarmsCsv(result)],
    ['alarms_brief.csv', formatAlarmsBriefCsv(result)],
    ['discoveries.csv', formatDiscoveriesCsv(result)],
    ['curves.json', stringifyDocument({
      termination: result.termination,
      attempts: result.attempts,
      cumulativeOutliers: result.cumulativeOutliers,
      precisionAtK: result.precisionAtK,
      ...(extras.argv ? { argv: extras.argv } : {}),
    })],
  ];
  if (extras.unified) {
    files.push(['unified.json', stringifyDocument(extras.unified)]);
  }

  const written: string[] = [];
  for (const [name, content] of files) {
    const filePath = path.join(outputDir, name);
    await fs.writeFile(filePath, content, 'utf8');
    written.push(filePath);
  }
  logInfo('[report] Labeling report written', { outputDir, files: written.length });
  return written;
}

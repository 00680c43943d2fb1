/**
 * @fileoverview Human oracle visualizer
 *
 * Shows a data point to a reviewer and collects a y/Y/n/N/q answer. The
 * terminal implementation renders the slice location with surrounding source
 * lines, can additionally open the location in an external viewer, and
 * reads answers line by line from its input stream. Invalid answers are
 * asked again; end of input counts as `q`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as readline from 'node:readline';
import { execa } from 'execa';
import type { DataPoint } from '../query/datapoints.js';
import type { JsonValue } from '../storage/types.js';
import { logWarning } from '../telemetry/logger.js';
import { isMissingPathError } from '../utils/errors.js';
import { isJsonObject } from '../utils/safe_json.js';
import { HUMAN_RESPONSES, isHumanResponse, type HumanResponse } from './types.js';

// ============================================================================
// INTERFACE
// ============================================================================

export interface AskRequest {
  attempt: number;
  prompt: string;
}

export interface OracleVisualizer {
  ask(datapoint: DataPoint, request: AskRequest): Promise<HumanResponse>;
  /** Release terminal/viewer resources; called exactly once by the loop */
  destroy(): Promise<void>;
}

export type VisualizerFactory = (sourceRoot: string) => OracleVisualizer;

// ============================================================================
// SOURCE LOCATIONS
// ============================================================================

export interface SourceLocation {
  file: string;
  line: number;
}

const LOCATION_KEYS = ['location', 'loc', 'instr', 'entry'] as const;
const LOCATION_PATTERN = /^(.+?):(\d+)(?::\d+)?$/;

/** Find the first `file:line[:col]` string among the slice's location fields */
export function findSourceLocation(slice: JsonValue): SourceLocation | null {
  if (!isJsonObject(slice)) return null;
  for (const key of LOCATION_KEYS) {
    const value = slice[key];
    if (typeof value !== 'string') continue;
    const match = LOCATION_PATTERN.exec(value.trim());
    if (match) {
      return { file: match[1], line: Number(match[2]) };
    }
  }
  return null;
}

/** Numbered excerpt of `lines` around 1-based `line`, marking that line */
export function renderExcerpt(lines: string[], line: number, context: number): string[] {
  const first = Math.max(1, line - context);
  const last = Math.min(lines.length, line + context);
  const width = String(last).length;
  const rendered: string[] = [];
  for (let current = first; current <= last; current++) {
    const marker = current === line ? '>' : ' ';
    rendered.push(`${marker} ${String(current).padStart(width)} | ${lines[current - 1]}`);
  }
  return rendered;
}

// ============================================================================
// TERMINAL VISUALIZER
// ============================================================================

export interface TerminalVisualizerOptions {
  sourceRoot: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /**
   * External command opened with `<file>:<line>` for every shown data point.
   * It runs in the foreground on the terminal; the prompt follows once it exits.
   */
  viewer?: string;
  /** Source lines shown above and below the slice location */
  contextLines?: number;
}

export class TerminalVisualizer implements OracleVisualizer {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly contextLines: number;
  private rl: readline.Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(private readonly options: TerminalVisualizerOptions) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.contextLines = options.contextLines ?? 6;
  }

  async ask(datapoint: DataPoint, request: AskRequest): Promise<HumanResponse> {
    await this.present(datapoint, request.attempt);
    const lines = this.lineReader();

    for (;;) {
      this.output.write(request.prompt);
      const next = await lines.next();
      if (next.done) {
        this.output.write('\n');
        return 'q';
      }
      const answer = next.value.trim();
      if (isHumanResponse(answer)) {
        return answer;
      }
      this.output.write(`Please answer one of ${HUMAN_RESPONSES.join(', ')}\n`);
    }
  }

  async destroy(): Promise<void> {
    this.lines = null;
    if (this.rl) {
      this.rl.close();
      this.rl = null;
    }
  }

  private lineReader(): AsyncIterator<string> {
    if (!this.lines) {
      this.rl = readline.createInterface({ input: this.input, terminal: false, crlfDelay: Infinity });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    return this.lines;
  }

  private async present(datapoint: DataPoint, attempt: number): Promise<void> {
    const out: string[] = [
      '',
      `=== Attempt ${attempt}: ${datapoint.function} in ${datapoint.unit}, slice ${datapoint.sliceId}, trace ${datapoint.traceId} ===`,
    ];

    const location = findSourceLocation(datapoint.slice);
    if (location) {
      const filePath = path.resolve(this.options.sourceRoot, location.file);
      out.push(`${location.file}:${location.line}`);
      out.push(...(await this.excerpt(filePath, location.line)));
      if (this.options.viewer) {
        await this.openViewer(filePath, location.line);
      }
    } else {
      out.push(JSON.stringify(datapoint.slice, null, 2));
    }

    this.output.write(`${out.join('\n')}\n`);
  }

  private async excerpt(filePath: string, line: number): Promise<string[]> {
    try {
      const content = await fs.readFile(filePath, 'utf8');
      return renderExcerpt(content.split(/\r?\n/), line, this.contextLines);
    } catch (error) {
      if (isMissingPathError(error)) return ['  (source unavailable)'];
      throw error;
    }
  }

  private async openViewer(filePath: string, line: number): Promise<void> {
    const viewer = this.options.viewer;
    if (!viewer) return;
    const result = await execa(viewer, [`${filePath}:${line}`], { reject: false, stdio: 'inherit' });
    if (result.failed) {
      logWarning('[oracle] External viewer failed', { viewer, exitCode: result.exitCode });
    }
  }
}

export function createTerminalVisualizer(sourceRoot: string, options: Omit<TerminalVisualizerOptions, 'sourceRoot'> = {}): TerminalVisualizer {
  return new TerminalVisualizer({ ...options, sourceRoot });
}

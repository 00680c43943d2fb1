/**
 * @fileoverview Terminal progress and table helpers
 *
 * Progress bars draw on stderr; tables and key/value lists are command output
 * and go to stdout.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  task: string;
  format?: string;
  /** Draw nothing; used when output is not interactive */
  silent?: boolean;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total, task, silent = false } = options;
  if (silent) {
    return { increment: () => undefined, stop: () => undefined };
  }

  const format = options.format || '{bar} {percentage}% | {value}/{total} | {task} | ETA: {eta_formatted}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { task });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] || '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  console.log(headerLine.trimEnd());
  console.log(separator);

  for (const row of rows) {
    const line = row.map((cell, i) => (cell || '').padEnd(widths[i])).join(' | ');
    console.log(line.trimEnd());
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

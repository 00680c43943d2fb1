import { mkdirSync } from 'node:fs';
import { availableParallelism } from 'node:os';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for vitest internals and fixtures.
const fallbackTmpDir = '/tmp';
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Vitest Configuration for slicebase
 *
 * Test tiers controlled by SLICEBASE_TEST_MODE:
 * - 'unit' (default): everything except *.system.test.ts
 * - 'system': also runs system tests that drive the CLI end to end
 *
 * Override the worker count with SLICEBASE_TEST_WORKERS.
 */
const envWorkers = parseInt(process.env.SLICEBASE_TEST_WORKERS ?? '', 10);
const maxForks = !isNaN(envWorkers) && envWorkers > 0
  ? envWorkers
  : Math.max(1, Math.min(4, availableParallelism() - 1));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: (() => {
      const mode = process.env.SLICEBASE_TEST_MODE ?? 'unit';
      const excluded = ['node_modules/**', 'dist/**'];
      if (mode === 'unit') {
        excluded.push('**/*.system.test.ts');
      }
      return excluded;
    })(),
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks,
        minForks: 1,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});

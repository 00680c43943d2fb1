/**
 * @fileoverview Tests for CLI dispatch and exit codes
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as path from 'node:path';
import { createTestStore, seedSlice, type TestStore } from '../../__tests__/helpers/index.js';
import { runCli, splitCommandLine } from '../main.js';

describe('splitCommandLine', () => {
  it('separates global options, the command and its arguments', () => {
    expect(splitCommandLine(['--root', '/data', '--verbose', 'slice', 'a.bc', '--x'])).toEqual({
      globalArgs: ['--root', '/data', '--verbose'],
      command: 'slice',
      commandArgs: ['a.bc', '--x'],
    });
  });

  it('returns no command for options only', () => {
    expect(splitCommandLine(['-h'])).toEqual({ globalArgs: ['-h'], command: undefined, commandArgs: [] });
  });
});

describe('runCli', () => {
  let fixture: TestStore;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  const output = () => log.mock.calls.map((call) => String(call[0]));
  const diagnostic = () => String(error.mock.calls[0][0]);

  beforeEach(async () => {
    vi.stubEnv('SLICEBASE_LOG_LEVEL', 'silent');
    fixture = await createTestStore();
    await fixture.session.upsertPackage({ name: 'curl', units: ['libcurl.bc'] });
    for (const sliceId of [1, 2, 3]) await seedSlice(fixture.session, 'malloc', 'libcurl.bc', sliceId);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await fixture.cleanup();
  });

  it('prints the version', async () => {
    expect(await runCli(['--version'])).toBe(0);
    expect(output()).toEqual(['slicebase 0.1.0']);
  });

  it('prints help without a command', async () => {
    expect(await runCli([])).toBe(0);
    expect(output()[0]).toContain('COMMANDS:');
  });

  it('runs a query against the store root', async () => {
    expect(await runCli(['--root', fixture.root, 'num-slices', '--function', 'malloc'])).toBe(0);
    expect(output()).toEqual(['3']);
    expect(error).not.toHaveBeenCalled();
  });

  it('prints a slice document', async () => {
    expect(await runCli(['--root', fixture.root, 'slice', 'curl', 'malloc', '2'])).toBe(0);
    expect(JSON.parse(output()[0])).toEqual({ function: 'malloc', unit: 'libcurl.bc', sliceId: 2 });
  });

  it('fails with exit code 1 on an unknown command', async () => {
    expect(await runCli(['frobnicate'])).toBe(1);
    expect(diagnostic()).toBe(
      'Error [UNKNOWN_COMMAND]: Unknown command: frobnicate\nSuggestion: Run `slicebase help` to list the available commands.',
    );
  });

  it('reports declared queries without an implementation', async () => {
    expect(await runCli(['--root', fixture.root, 'trace', 'curl', 'malloc', '1', '0'])).toBe(1);
    expect(diagnostic()).toBe(
      'Error [UNIMPLEMENTED_QUERY]: Query trace is not implemented\nSuggestion: Run `slicebase help` for the supported queries.',
    );
  });

  it('reports an unresolved unit', async () => {
    expect(await runCli(['--root', fixture.root, 'slice', 'zzz', 'malloc', '1'])).toBe(1);
    expect(diagnostic()).toBe(
      'Error [UNKNOWN_UNIT]: Unknown unit zzz\nSuggestion: Run `slicebase bc-files` to list the known units.',
    );
  });

  it('reports a missing slice of a known unit', async () => {
    expect(await runCli(['--root', fixture.root, 'slice', 'curl', 'malloc', '9'])).toBe(1);
    expect(diagnostic()).toMatch(/^Error \[NOT_FOUND\]: No slice /);
  });

  it('reports an unknown package', async () => {
    expect(await runCli(['--root', fixture.root, 'num-slices', '--package', 'nope'])).toBe(1);
    expect(diagnostic()).toBe(
      'Error [UNKNOWN_PACKAGE]: Unknown package nope\nSuggestion: Run `slicebase packages` to list the known packages.',
    );
  });

  it('reports invalid command options with the usage', async () => {
    expect(await runCli(['--root', fixture.root, 'num-slices', '--bogus'])).toBe(1);
    expect(diagnostic()).toMatch(/^Error \[INVALID_ARGUMENT\]: .*Usage: slicebase num-slices /);
  });

  it('reports invalid global options', async () => {
    expect(await runCli(['--bogus', 'packages'])).toBe(1);
    expect(diagnostic()).toMatch(/^Error \[INVALID_ARGUMENT\]: /);
  });

  it('reports a learning session over a function without slices', async () => {
    expect(await runCli(['--root', fixture.root, 'learn', 'free', '--ground-truth', 'bug'])).toBe(1);
    expect(diagnostic()).toBe(
      `Error [NOT_FOUND]: No function free at ${path.join(fixture.root, 'analysis', 'slices', 'free')}\n` +
        'Suggestion: Check the function name and the store root (--root).',
    );
  });
});

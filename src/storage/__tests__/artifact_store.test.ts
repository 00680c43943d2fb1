/**
 * @fileoverview Tests for the artifact store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ArtifactStore } from '../artifact_store.js';
import { StoreLayout } from '../layout.js';
import { InvalidArgumentError, NotFoundError, ParseError } from '../../core/errors.js';
import { cleanupRoot, createTempRoot, createTestFile } from '../../__tests__/helpers/index.js';

describe('ArtifactStore', () => {
  let root: string;
  let store: ArtifactStore;

  const sliceCoords = { function: 'malloc', unit: 'a.bc', sliceId: 3 };
  const traceCoords = { ...sliceCoords, traceId: 7 };

  beforeEach(async () => {
    root = await createTempRoot();
    store = new ArtifactStore(new StoreLayout(root));
    await store.initialize();
  });

  afterEach(async () => {
    await cleanupRoot(root);
  });

  it('creates the top-level layout', async () => {
    for (const dir of ['packages', 'analysis/slices', 'analysis/dugraphs', 'analysis/features', 'temp']) {
      expect((await fs.stat(path.join(root, dir))).isDirectory()).toBe(true);
    }
  });

  it('initializes an existing store without losing documents', async () => {
    await store.write('slice', sliceCoords, { kept: true });
    await store.initialize();
    expect(await store.read('slice', sliceCoords)).toEqual({ kept: true });
  });

  // ========================================================================
  // Documents
  // ========================================================================

  it('round-trips documents of every kind', async () => {
    const slice = { instr: 'src/a.c:10', args: [1, 2] };
    const trace = { labels: ['undersized'], nodes: [{ id: 0 }] };
    const feature = { invoked_before: { free: true }, invoked_after: {} };

    await store.write('slice', sliceCoords, slice);
    await store.write('trace', traceCoords, trace);
    await store.write('feature', traceCoords, feature);

    expect(await store.read('slice', sliceCoords)).toEqual(slice);
    expect(await store.read('trace', traceCoords)).toEqual(trace);
    expect(await store.read('feature', traceCoords)).toEqual(feature);
  });

  it('writes documents at their layout paths', async () => {
    expect(await store.write('slice', sliceCoords, {})).toBe(
      path.join(root, 'analysis', 'slices', 'malloc', 'a.bc', '3.json'),
    );
    expect(await store.write('trace', traceCoords, {})).toBe(
      path.join(root, 'analysis', 'dugraphs', 'malloc', 'a.bc', '3', '7.json'),
    );
    expect(await store.write('feature', traceCoords, {})).toBe(
      path.join(root, 'analysis', 'features', 'malloc', 'a.bc', '3', '7.json'),
    );
  });

  it('overwrites a document on a second write', async () => {
    await store.write('slice', sliceCoords, { version: 1 });
    await store.write('slice', sliceCoords, { version: 2 });
    expect(await store.read('slice', sliceCoords)).toEqual({ version: 2 });
  });

  it('throws NotFoundError for a missing document', async () => {
    await expect(store.read('slice', sliceCoords)).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.read('feature', traceCoords)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('throws ParseError for content that is not JSON', async () => {
    await createTestFile(root, 'analysis/slices/malloc/a.bc/3.json', '{not json');
    await expect(store.read('slice', sliceCoords)).rejects.toBeInstanceOf(ParseError);
  });

  it('rejects coordinates that leave their namespace', async () => {
    await expect(store.write('slice', { function: 'malloc', unit: '../x', sliceId: 1 }, {})).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    await expect(store.write('slice', { function: 'malloc', unit: 'a.bc', sliceId: -1 }, {})).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
  });

  it('reports whether a document exists', async () => {
    expect(await store.exists('slice', sliceCoords)).toBe(false);
    await store.write('slice', sliceCoords, {});
    expect(await store.exists('slice', sliceCoords)).toBe(true);
    expect(await store.exists('trace', traceCoords)).toBe(false);
  });

  // ========================================================================
  // Namespaces and listings
  // ========================================================================

  it('creates namespaces idempotently', async () => {
    const first = await store.ensureNamespace('trace', 'malloc', 'a.bc', 3);
    const second = await store.ensureNamespace('trace', 'malloc', 'a.bc', 3);

    expect(second).toBe(first);
    expect(first).toBe(path.join(root, 'analysis', 'dugraphs', 'malloc', 'a.bc', '3'));
    expect((await fs.stat(first)).isDirectory()).toBe(true);
  });

  it('refuses a per-slice namespace for slices', async () => {
    await expect(store.ensureNamespace('slice', 'malloc', 'a.bc', 3)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('lists ids in numeric order and ignores other files', async () => {
    for (const sliceId of [10, 2, 1]) {
      await store.write('slice', { function: 'malloc', unit: 'a.bc', sliceId }, {});
    }
    await createTestFile(root, 'analysis/slices/malloc/a.bc/notes.txt', 'scratch');

    expect(await store.listSliceIds('malloc', 'a.bc')).toEqual([1, 2, 10]);
  });

  it('lists functions, units and trace ids', async () => {
    await store.write('trace', { function: 'free', unit: 'b.bc', sliceId: 1, traceId: 4 }, {});
    await store.write('trace', { function: 'malloc', unit: 'b.bc', sliceId: 1, traceId: 0 }, {});
    await store.write('trace', { function: 'malloc', unit: 'a.bc', sliceId: 1, traceId: 0 }, {});

    expect(await store.listFunctions('trace')).toEqual(['free', 'malloc']);
    expect(await store.listUnits('trace', 'malloc')).toEqual(['a.bc', 'b.bc']);
    expect(await store.listTraceIds('trace', 'free', 'b.bc', 1)).toEqual([4]);
    expect(await store.listTraceIds('feature', 'free', 'b.bc', 1)).toEqual([]);
    expect(await store.listUnits('slice', 'missing')).toEqual([]);
  });

  // ========================================================================
  // Removal
  // ========================================================================

  it('clears one unit across functions and kinds', async () => {
    await store.write('slice', { function: 'malloc', unit: 'a.bc', sliceId: 1 }, {});
    await store.write('slice', { function: 'malloc', unit: 'a.bc', sliceId: 2 }, {});
    await store.write('trace', { function: 'malloc', unit: 'a.bc', sliceId: 1, traceId: 1 }, {});
    await store.write('trace', { function: 'malloc', unit: 'a.bc', sliceId: 2, traceId: 1 }, {});
    await store.write('feature', { function: 'malloc', unit: 'a.bc', sliceId: 1, traceId: 1 }, {});
    await store.write('slice', { function: 'free', unit: 'a.bc', sliceId: 1 }, {});
    await store.write('slice', { function: 'malloc', unit: 'b.bc', sliceId: 1 }, {});

    expect(await store.clear('a.bc')).toBe(6);

    expect(await store.exists('slice', { function: 'malloc', unit: 'b.bc', sliceId: 1 })).toBe(true);
    await expect(store.read('slice', { function: 'free', unit: 'a.bc', sliceId: 1 })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(await store.listUnits('trace', 'malloc')).toEqual([]);
    expect(await store.clear('a.bc')).toBe(0);
  });

  it('clears nothing for an unknown unit', async () => {
    await store.write('slice', sliceCoords, {});
    expect(await store.clear('zzz.bc')).toBe(0);
    expect(await store.exists('slice', sliceCoords)).toBe(true);
  });
});

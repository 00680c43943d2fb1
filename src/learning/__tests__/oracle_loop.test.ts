/**
 * @fileoverview Tests for the oracle loop
 *
 * Pools come from a temporary store so that data points resolve their trace
 * labels and feature documents the way they do in a real session.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigurationError, InvalidSelectionError } from '../../core/errors.js';
import type { AnalysisSession } from '../../api/session.js';
import { FunctionSpec } from '../function_spec.js';
import { OracleLoop, createPool } from '../oracle_loop.js';
import { createSequentialStrategy } from '../strategies.js';
import type { HumanResponse, PoolEntry, RankingStrategy } from '../types.js';
import type { AskRequest, OracleVisualizer } from '../visualizer.js';
import type { DataPoint } from '../../query/datapoints.js';
import type { JsonValue } from '../../storage/types.js';
import { createTestStore, seedSlice, type TestStore } from '../../__tests__/helpers/index.js';

const LABEL = 'undersized';

/** One slice per flag, each with a single trace labeled when the flag is set */
async function seedAlarms(session: AnalysisSession, alarms: boolean[]): Promise<PoolEntry[]> {
  for (const [position, isAlarm] of alarms.entries()) {
    await seedSlice(session, 'malloc', 'a.bc', position + 1, [{ traceId: 0, labels: isAlarm ? [LABEL] : [] }]);
  }
  return createPool(await session.datapoints.collect('malloc'));
}

function scriptedVisualizer(responses: HumanResponse[]) {
  const queue = [...responses];
  const visualizer = {
    ask: vi.fn(async (_datapoint: DataPoint, _request: AskRequest): Promise<HumanResponse> => queue.shift() ?? 'q'),
    destroy: vi.fn(async (): Promise<void> => undefined),
  } satisfies OracleVisualizer;
  const factory = vi.fn((_sourceRoot: string): OracleVisualizer => visualizer);
  return { visualizer, factory };
}

/** Picks `first` on the first call, then falls back to pool order */
function startingAt(first: number): RankingStrategy {
  const base = createSequentialStrategy();
  let calls = 0;
  return {
    ...base,
    select(remaining) {
      calls++;
      return calls === 1 ? first : base.select(remaining);
    },
  };
}

describe('OracleLoop', () => {
  let fixture: TestStore;

  beforeEach(async () => {
    fixture = await createTestStore();
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  // ========================================================================
  // Ground truth
  // ========================================================================

  describe('with ground truth', () => {
    it('builds the cumulative outlier curve in selection order', async () => {
      const pool = await seedAlarms(fixture.session, [true, false, false, true, false]);
      const loop = new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'ground-truth', label: LABEL },
        budget: 5,
        numAlarms: 10,
      });

      const result = await loop.run();

      expect(result.cumulativeOutliers).toEqual([0, 1, 1, 1, 2, 2]);
      expect(result.precisionAtK).toEqual([1, 1, 1, 1, 1]);
      expect(result.termination).toBe('budgetExhausted');
      expect(result.attempts).toBe(5);
      expect(result.discoveries.map((d) => [d.datapoint.key, d.attempt])).toEqual([
        ['a.bc:1:0', 0],
        ['a.bc:4:0', 3],
      ]);
      expect(result.alarms.map((alarm) => alarm.datapoint.key)).toEqual(['a.bc:1:0', 'a.bc:4:0']);
    });

    it('stops after exactly budget steps', async () => {
      const pool = await seedAlarms(fixture.session, [true, false, false, true, false]);
      const result = await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'ground-truth', label: LABEL },
        budget: 3,
        numAlarms: 10,
      }).run();

      expect(result.attempts).toBe(3);
      expect(result.cumulativeOutliers).toEqual([0, 1, 1, 1]);
      expect(result.termination).toBe('budgetExhausted');
    });

    it('ends when the strategy has nothing left to select', async () => {
      const pool = await seedAlarms(fixture.session, [false, true]);
      const result = await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'ground-truth', label: LABEL },
        budget: 10,
        numAlarms: 10,
      }).run();

      expect(result.termination).toBe('selectionExhausted');
      expect(result.attempts).toBe(2);
      expect(result.precisionAtK).toEqual([0, 1]);
    });

    it('uses an explicit k for precision', async () => {
      const pool = await seedAlarms(fixture.session, [true, true, false]);
      const result = await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'ground-truth', label: LABEL },
        budget: 3,
        numAlarms: 1,
        numOutliers: 1,
      }).run();

      expect(result.precisionAtK).toEqual([1, 1, 1]);
      expect(result.alarms).toHaveLength(1);
    });

    it('never creates a visualizer', async () => {
      const pool = await seedAlarms(fixture.session, [true]);
      const { factory } = scriptedVisualizer([]);
      await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'ground-truth', label: LABEL },
        budget: 1,
        numAlarms: 1,
        createVisualizer: factory,
      }).run();

      expect(factory).not.toHaveBeenCalled();
    });
  });

  // ========================================================================
  // Human visual
  // ========================================================================

  describe('with a human oracle', () => {
    /** Slice 1 has traces 0..5 (pool 0..5), slice 2 has traces 0..1 (pool 6..7) */
    async function seedTwoSlices(): Promise<PoolEntry[]> {
      await seedSlice(fixture.session, 'malloc', 'a.bc', 1, [0, 1, 2, 3, 4, 5].map((traceId) => ({ traceId })));
      await seedSlice(fixture.session, 'malloc', 'a.bc', 2, [{ traceId: 0 }, { traceId: 1 }]);
      return createPool(await fixture.session.datapoints.collect('malloc'));
    }

    it('propagates Y and N to the rest of the slice inside the window', async () => {
      const pool = await seedTwoSlices();
      const { visualizer, factory } = scriptedVisualizer(['Y', 'N', 'n', 'q']);
      const recorded = vi.fn();
      const base = createSequentialStrategy();
      const strategy: RankingStrategy = {
        ...base,
        feedback(entry, isAlarm) {
          recorded(entry.index, isAlarm);
          return base.feedback?.(entry, isAlarm);
        },
      };

      const result = await new OracleLoop({
        pool,
        strategy,
        oracle: { kind: 'human-visual', sourceRoot: '/src' },
        budget: 10,
        numAlarms: 10,
        propagationRadius: 3,
        createVisualizer: factory,
      }).run();

      expect(result.termination).toBe('oracleQuit');
      expect(result.attempts).toBe(3);
      expect(result.cumulativeOutliers).toEqual([0, 1, 2, 3, 3, 3, 3, 3]);
      expect(result.discoveries.map((d) => d.datapoint.key)).toEqual(['a.bc:1:0', 'a.bc:1:1', 'a.bc:1:2']);
      expect(recorded.mock.calls).toEqual([
        [0, true],
        [1, true],
        [2, true],
        [3, false],
        [4, false],
        [5, false],
        [6, false],
      ]);
      expect(factory).toHaveBeenCalledTimes(1);
      expect(factory).toHaveBeenCalledWith('/src');
      expect(visualizer.ask).toHaveBeenCalledTimes(4);
      expect(visualizer.ask.mock.calls[0][1]).toEqual({
        attempt: 0,
        prompt: 'Attempt 0: Do you think this is a bug? [y|Y|n|N|q] > ',
      });
      expect(visualizer.destroy).toHaveBeenCalledTimes(1);
    });

    it('labels nothing outside [i - r, i + r)', async () => {
      const pool = await seedTwoSlices();
      const { factory } = scriptedVisualizer(['Y', 'q']);

      const result = await new OracleLoop({
        pool,
        strategy: startingAt(3),
        oracle: { kind: 'human-visual', sourceRoot: '/src' },
        budget: 10,
        numAlarms: 10,
        propagationRadius: 2,
        createVisualizer: factory,
      }).run();

      expect(result.discoveries.map((d) => d.datapoint.key)).toEqual(['a.bc:1:3', 'a.bc:1:1', 'a.bc:1:2', 'a.bc:1:4']);
      expect(result.cumulativeOutliers).toEqual([0, 1, 2, 3, 4]);
    });

    it('does not propagate lowercase answers', async () => {
      const pool = await seedTwoSlices();
      const { factory } = scriptedVisualizer(['y', 'q']);

      const result = await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'human-visual', sourceRoot: '/src' },
        budget: 10,
        numAlarms: 10,
        createVisualizer: factory,
      }).run();

      expect(result.cumulativeOutliers).toEqual([0, 1]);
      expect(result.discoveries.map((d) => d.datapoint.key)).toEqual(['a.bc:1:0']);
    });

    it('does not propagate to a slice of another unit with the same id', async () => {
      await seedSlice(fixture.session, 'malloc', 'a.bc', 1, [{ traceId: 0 }, { traceId: 1 }]);
      await seedSlice(fixture.session, 'malloc', 'b.bc', 1, [{ traceId: 0 }, { traceId: 1 }]);
      const pool = createPool(await fixture.session.datapoints.collect('malloc'));
      const { factory } = scriptedVisualizer(['Y', 'q']);

      const result = await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'human-visual', sourceRoot: '/src' },
        budget: 10,
        numAlarms: 10,
        createVisualizer: factory,
      }).run();

      expect(result.discoveries.map((d) => d.datapoint.key)).toEqual(['a.bc:1:0', 'a.bc:1:1']);
      expect(result.cumulativeOutliers).toEqual([0, 1, 2]);
    });

    it('releases the visualizer on quit', async () => {
      const pool = await seedTwoSlices();
      const { visualizer, factory } = scriptedVisualizer(['n', 'q']);

      const result = await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'human-visual', sourceRoot: '/src' },
        budget: 10,
        numAlarms: 10,
        createVisualizer: factory,
      }).run();

      expect(result.termination).toBe('oracleQuit');
      expect(result.attempts).toBe(1);
      expect(result.cumulativeOutliers).toEqual([0, 0]);
      expect(result.precisionAtK).toEqual([]);
      expect(visualizer.destroy).toHaveBeenCalledTimes(1);
    });

    it('releases the visualizer when a step fails', async () => {
      const pool = await seedTwoSlices();
      const { visualizer, factory } = scriptedVisualizer(['n', 'n']);
      let calls = 0;
      const strategy: RankingStrategy = {
        name: 'broken',
        select: (remaining) => (++calls === 1 ? remaining[0].index : 999),
        alarms: () => [],
      };

      await expect(
        new OracleLoop({
          pool,
          strategy,
          oracle: { kind: 'human-visual', sourceRoot: '/src' },
          budget: 10,
          numAlarms: 10,
          createVisualizer: factory,
        }).run(),
      ).rejects.toBeInstanceOf(InvalidSelectionError);
      expect(visualizer.destroy).toHaveBeenCalledTimes(1);
    });

    it('releases the visualizer when asking fails', async () => {
      const pool = await seedTwoSlices();
      const { visualizer, factory } = scriptedVisualizer([]);
      visualizer.ask.mockRejectedValueOnce(new Error('terminal closed'));

      await expect(
        new OracleLoop({
          pool,
          strategy: createSequentialStrategy(),
          oracle: { kind: 'human-visual', sourceRoot: '/src' },
          budget: 10,
          numAlarms: 10,
          createVisualizer: factory,
        }).run(),
      ).rejects.toThrow('terminal closed');
      expect(visualizer.destroy).toHaveBeenCalledTimes(1);
    });
  });

  // ========================================================================
  // Specification
  // ========================================================================

  describe('with a specification', () => {
    it('raises an alarm for every data point that violates the function spec', async () => {
      const features: JsonValue[] = [{ invoked_after: { free: true } }, { invoked_after: { free: false } }, { invoked_after: {} }];
      for (const [position, feature] of features.entries()) {
        await seedSlice(fixture.session, 'malloc', 'a.bc', position + 1, [{ traceId: 0, feature }]);
      }
      const pool = createPool(await fixture.session.datapoints.collect('malloc'));
      const spec = FunctionSpec.parse('rules:\n  - path: invoked_after.free\n    equals: true\n');

      const result = await new OracleLoop({
        pool,
        strategy: createSequentialStrategy(),
        oracle: { kind: 'specification', spec },
        budget: 3,
        numAlarms: 10,
      }).run();

      expect(result.cumulativeOutliers).toEqual([0, 0, 1, 2]);
      expect(result.precisionAtK).toEqual([]);
      expect(result.discoveries.map((d) => d.datapoint.key)).toEqual(['a.bc:2:0', 'a.bc:3:0']);
    });
  });

  // ========================================================================
  // Validation
  // ========================================================================

  describe('configuration', () => {
    it('rejects negative counts', async () => {
      const pool = await seedAlarms(fixture.session, [true]);
      const oracle = { kind: 'ground-truth', label: LABEL } as const;
      const strategy = createSequentialStrategy();

      expect(() => new OracleLoop({ pool, strategy, oracle, budget: -1, numAlarms: 1 })).toThrow(ConfigurationError);
      expect(() => new OracleLoop({ pool, strategy, oracle, budget: 1, numAlarms: 1.5 })).toThrow(ConfigurationError);
      expect(() => new OracleLoop({ pool, strategy, oracle, budget: 1, numAlarms: 1, propagationRadius: -2 })).toThrow(
        ConfigurationError,
      );
    });

    it('rejects feature vectors that do not match the data points', async () => {
      const pool = await seedAlarms(fixture.session, [true, false]);
      const datapoints = pool.map((entry) => entry.datapoint);
      expect(() => createPool(datapoints, [[1]])).toThrow(ConfigurationError);
      expect(createPool(datapoints, [[1], [0]]).map((entry) => entry.features)).toEqual([[1], [0]]);
    });
  });
});

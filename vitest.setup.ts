/**
 * Centralized Vitest Setup for slicebase
 *
 * Logs go to stderr and would drown the reporter output, so the logger is
 * silenced for every test file unless SLICEBASE_TEST_LOGS=true.
 */

import { beforeAll, afterAll } from 'vitest';
import { getLogLevel, setLogLevel } from './src/telemetry/logger.js';

const previousLevel = getLogLevel();

beforeAll(() => {
  if (process.env.SLICEBASE_TEST_LOGS !== 'true') {
    setLogLevel('silent');
  }
});

afterAll(() => {
  setLogLevel(previousLevel);
});

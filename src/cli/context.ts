/**
 * @fileoverview Per-invocation command context
 */

import { openSession, type AnalysisSession } from '../api/session.js';
import { loadConfig, type SlicebaseConfig } from '../config/index.js';
import { logDebug, setLogLevel } from '../telemetry/logger.js';

export interface GlobalOptions {
  root?: string;
  configPath?: string;
  verbose: boolean;
}

export interface CommandContext {
  session: AnalysisSession;
  config: SlicebaseConfig;
  /** Arguments after the command name */
  args: string[];
}

/**
 * Resolve configuration, apply its log level (--verbose forces debug) and
 * open the store session.
 */
export async function openCommandContext(globals: GlobalOptions, args: string[]): Promise<CommandContext> {
  const config = await loadConfig({ root: globals.root, configPath: globals.configPath });
  setLogLevel(globals.verbose ? 'debug' : config.logLevel);
  logDebug('[cli] Configuration resolved', { root: config.root, logLevel: config.logLevel });
  const session = await openSession({ root: config.root });
  return { session, config, args };
}

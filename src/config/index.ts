/**
 * @fileoverview slicebase configuration
 *
 * Resolution order, lowest to highest precedence:
 * - built-in defaults
 * - `slicebase.yaml` in the store root, or an explicit config file
 * - SLICEBASE_* environment variables
 * - explicit overrides (CLI flags)
 *
 * The merged object is validated with zod before use.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { isMissingPathError } from '../utils/errors.js';
import { isJsonObject } from '../utils/safe_json.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const CONFIG_FILENAME = 'slicebase.yaml';
export const DEFAULT_ROOT = 'slicebase-data';
export const DEFAULT_PROPAGATION_RADIUS = 50;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const SlicebaseConfigSchema = z.object({
  root: z.string().min(1),
  propagationRadius: z.number().int().nonnegative().default(DEFAULT_PROPAGATION_RADIUS),
  defaultBudget: z.number().int().positive().default(100),
  logLevel: LogLevelSchema.default('info'),
  viewer: z.string().min(1).optional(),
}).strict();

export type SlicebaseConfig = z.infer<typeof SlicebaseConfigSchema>;

export interface LoadConfigOptions {
  /** Store root; wins over the file and the environment */
  root?: string;
  /** Explicit config file; defaults to `<root>/slicebase.yaml` when present */
  configPath?: string;
  /** Extra overrides applied last */
  overrides?: Partial<Omit<SlicebaseConfig, 'root'>>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

// ============================================================================
// LOADING
// ============================================================================

async function readConfigFile(filePath: string, required: boolean): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (!required && isMissingPathError(error)) return {};
    throw new ConfigurationError(`Cannot read config file ${filePath}`, 'configPath');
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${reason}`, 'configPath');
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`, 'configPath');
  }
  return parsed;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.SLICEBASE_ROOT) values.root = env.SLICEBASE_ROOT;
  if (env.SLICEBASE_LOG_LEVEL) values.logLevel = env.SLICEBASE_LOG_LEVEL;
  if (env.SLICEBASE_VIEWER) values.viewer = env.SLICEBASE_VIEWER;
  return values;
}

/**
 * Resolve the effective configuration.
 *
 * @throws ConfigurationError when the file is unreadable or a field is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SlicebaseConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const envValues = readEnv(env);

  // The root decides where the default config file lives, so settle it first.
  const rootHint = options.root ?? (typeof envValues.root === 'string' ? envValues.root : undefined);
  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : path.join(path.resolve(cwd, rootHint ?? DEFAULT_ROOT), CONFIG_FILENAME);
  const fileValues = await readConfigFile(configPath, options.configPath !== undefined);

  const merged: Record<string, unknown> = {
    root: DEFAULT_ROOT,
    ...fileValues,
    ...envValues,
    ...(options.overrides ?? {}),
  };
  if (options.root) merged.root = options.root;

  const parsed = SlicebaseConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || undefined;
    throw new ConfigurationError(
      `Invalid configuration${field ? ` at ${field}` : ''}: ${issue?.message ?? 'unknown issue'}`,
      field,
    );
  }

  return { ...parsed.data, root: path.resolve(cwd, parsed.data.root) };
}

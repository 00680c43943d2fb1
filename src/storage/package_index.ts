/**
 * @fileoverview Package index
 *
 * Durable registry of known packages and their compiled units. The on-disk
 * truth is one `packages/<name>/index.json` per package; the in-memory list
 * is rebuilt only by {@link PackageIndex.load} and changed only by
 * {@link PackageIndex.upsert}.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { InvalidArgumentError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { isMissingPathError } from '../utils/errors.js';
import { safeJsonParse, stringifyDocument } from '../utils/safe_json.js';
import { listEntries } from './fs_walk.js';
import type { StoreLayout } from './layout.js';
import { PackageRecordSchema, type PackageRecord, type PackageRecordInput } from './types.js';

export class PackageIndex {
  private packages: PackageRecord[] = [];

  constructor(private readonly layout: StoreLayout) {}

  /**
   * Rebuild the in-memory list from disk. Entries without a readable,
   * valid `index.json`, or whose record names another package, are skipped. Returns the number of packages loaded.
   */
  async load(): Promise<number> {
    const loaded: PackageRecord[] = [];
    const packagesDir = this.layout.packagesDir();

    for (const dirName of await listEntries(packagesDir, 'directories')) {
      const indexPath = path.join(packagesDir, dirName, 'index.json');
      const record = await readPackageRecord(indexPath);
      if (!record) continue;
      // upsert only ever writes packages/<name>/index.json
      if (record.name !== dirName) {
        logWarning('[packages] Skipping package metadata stored under another name', {
          name: record.name,
          path: indexPath,
        });
        continue;
      }
      loaded.push(record);
    }

    this.packages = loaded;
    logDebug('[packages] Package index loaded', { count: loaded.length, path: packagesDir });
    return loaded.length;
  }

  /**
   * Persist `input` as the package's metadata (full overwrite), then replace
   * the in-memory entry of the same name or append a new one.
   */
  async upsert(input: PackageRecordInput): Promise<PackageRecord> {
    const parsed = PackageRecordSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidArgumentError('package', `${issue?.path.join('.') || 'record'} ${issue?.message ?? 'is invalid'}`);
    }
    const record = parsed.data;

    await fs.mkdir(this.layout.packageDir(record.name), { recursive: true });
    await fs.writeFile(this.layout.packageIndexPath(record.name), stringifyDocument(record), 'utf8');

    const existing = this.packages.findIndex((pkg) => pkg.name === record.name);
    if (existing >= 0) {
      this.packages[existing] = record;
    } else {
      this.packages.push(record);
    }
    return record;
  }

  has(name: string): boolean {
    return this.packages.some((pkg) => pkg.name === name);
  }

  get(name: string): PackageRecord | undefined {
    return this.packages.find((pkg) => pkg.name === name);
  }

  /** Packages in index order */
  list(): readonly PackageRecord[] {
    return this.packages;
  }

  get size(): number {
    return this.packages.length;
  }

  sourceDir(name: string): string {
    return this.layout.packageSourceDir(name);
  }

  /** Full path of a compiled unit inside its package's source tree */
  unitPath(name: string, unit: string): string {
    return path.join(this.layout.packageSourceDir(name), unit);
  }
}

async function readPackageRecord(indexPath: string): Promise<PackageRecord | null> {
  let raw: string;
  try {
    raw = await fs.readFile(indexPath, 'utf8');
  } catch (error) {
    if (!isMissingPathError(error)) {
      logWarning('[packages] Cannot read package metadata', {
        path: indexPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return null;
  }

  const json = safeJsonParse(raw);
  if (!json.ok) {
    logWarning('[packages] Skipping malformed package metadata', { path: indexPath, error: json.error.message });
    return null;
  }
  const parsed = PackageRecordSchema.safeParse(json.value);
  if (!parsed.success) {
    logWarning('[packages] Skipping invalid package metadata', {
      path: indexPath,
      error: parsed.error.issues.map((issue) => issue.message).join('; '),
    });
    return null;
  }
  return parsed.data;
}

/**
 * @fileoverview Deterministic directory walking
 *
 * Directory listing order is unspecified on most filesystems, so every
 * listing here is sorted before it is returned.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isMissingPathError } from '../utils/errors.js';

export type EntryFilter = 'directories' | 'files';

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * List the names of the direct children of `dir`, sorted. A missing
 * directory lists as empty.
 */
export async function listEntries(dir: string, filter: EntryFilter): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingPathError(error)) return [];
    throw error;
  }
  return entries
    .filter((entry) => (filter === 'directories' ? entry.isDirectory() : entry.isFile()))
    .map((entry) => entry.name)
    .sort(compareNames);
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (isMissingPathError(error)) return false;
    throw error;
  }
}

/**
 * Count the regular files below `dir` (recursively) accepted by `predicate`.
 */
export async function countFiles(dir: string, predicate: (name: string) => boolean = () => true): Promise<number> {
  let count = 0;
  for (const name of await listEntries(dir, 'files')) {
    if (predicate(name)) count++;
  }
  for (const name of await listEntries(dir, 'directories')) {
    count += await countFiles(path.join(dir, name), predicate);
  }
  return count;
}

/**
 * Remove `dir` and everything below it. Returns how many files accepted by
 * `predicate` were removed; a missing directory removes nothing.
 */
export async function removeTree(dir: string, predicate: (name: string) => boolean = () => true): Promise<number> {
  if (!(await isDirectory(dir))) return 0;
  const removed = await countFiles(dir, predicate);
  await fs.rm(dir, { recursive: true, force: true });
  return removed;
}

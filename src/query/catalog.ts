/**
 * @fileoverview Artifact catalog queries
 *
 * Read-only enumeration, unit resolution and slice counting over the package
 * index and the artifact store. Nothing here writes.
 */

import * as path from 'node:path';
import { glob } from 'glob';
import { UnknownPackageError } from '../core/errors.js';
import type { ArtifactStore } from '../storage/artifact_store.js';
import { listEntries } from '../storage/fs_walk.js';
import { parseDocumentId } from '../storage/layout.js';
import type { PackageIndex } from '../storage/package_index.js';
import type { JsonValue } from '../storage/types.js';

export interface EnumerateUnitsOptions {
  /** Only the units of this package */
  package?: string;
  /** Yield full source paths instead of unit identifiers */
  full?: boolean;
}

export interface CountOptions {
  function?: string;
  unit?: string;
  /**
   * Match `unit` exactly when counting without a function. By default a leaf
   * directory counts when its name contains `unit`, which is ambiguous when
   * one unit name is a substring of another.
   */
  exactUnit?: boolean;
}

export interface ResolvedSlice {
  unit: string;
  document: JsonValue;
}

const isDocumentPath = (relative: string): boolean => parseDocumentId(path.basename(relative)) !== null;

export class ArtifactCatalog {
  constructor(
    private readonly index: PackageIndex,
    private readonly store: ArtifactStore,
  ) {}

  // ==========================================================================
  // UNITS
  // ==========================================================================

  /**
   * Lazily enumerate compiled units in index order.
   *
   * @throws UnknownPackageError when `options.package` is not in the index
   */
  enumerateUnits(options: EnumerateUnitsOptions = {}): Generator<string> {
    const { package: packageName, full = false } = options;
    if (packageName !== undefined && !this.index.has(packageName)) {
      throw new UnknownPackageError(packageName);
    }
    const index = this.index;
    return (function* units() {
      for (const pkg of index.list()) {
        if (packageName !== undefined && pkg.name !== packageName) continue;
        for (const unit of pkg.units) {
          yield full ? index.unitPath(pkg.name, unit) : unit;
        }
      }
    })();
  }

  /**
   * First unit whose identifier contains `fragment`, scanning packages in
   * index order and units in listing order. Not a best match.
   */
  resolveUnitByFragment(fragment: string): string | undefined {
    for (const unit of this.enumerateUnits()) {
      if (unit.includes(fragment)) return unit;
    }
    return undefined;
  }

  // ==========================================================================
  // COUNTS
  // ==========================================================================

  async count(options: CountOptions = {}): Promise<number> {
    const { function: func, unit, exactUnit = false } = options;
    const layout = this.store.layout;

    if (func !== undefined && unit !== undefined) {
      const files = await listEntries(layout.unitDir('slice', func, unit), 'files');
      return files.filter(isDocumentPath).length;
    }

    if (func !== undefined) {
      return (await this.sliceDocuments(layout.functionDir('slice', func))).length;
    }

    const all = await this.sliceDocuments(layout.kindDir('slice'));
    if (unit === undefined) {
      return all.length;
    }

    return all.filter((relative) => {
      const leaf = path.basename(path.dirname(relative));
      return exactUnit ? leaf === unit : leaf.includes(unit);
    }).length;
  }

  /**
   * Slices of every unit a package owns, each unit matched exactly.
   *
   * @throws UnknownPackageError when the package is not in the index
   */
  async countForPackage(name: string): Promise<number> {
    const pkg = this.index.get(name);
    if (!pkg) {
      throw new UnknownPackageError(name);
    }
    let total = 0;
    for (const unit of pkg.units) {
      total += await this.count({ unit, exactUnit: true });
    }
    return total;
  }

  // ==========================================================================
  // DOCUMENTS
  // ==========================================================================

  /**
   * Resolve `unitFragment` to a unit and read one of its slices. Returns
   * undefined when no unit matches; a missing slice still throws NotFoundError.
   */
  async slice(unitFragment: string, func: string, sliceId: number): Promise<ResolvedSlice | undefined> {
    const unit = this.resolveUnitByFragment(unitFragment);
    if (unit === undefined) return undefined;
    const document = await this.store.read('slice', { function: func, unit, sliceId });
    return { unit, document };
  }

  private async sliceDocuments(cwd: string): Promise<string[]> {
    const matches = await glob('**/*.json', { cwd, nodir: true, posix: true });
    return matches.filter(isDocumentPath);
  }
}

/**
 * @fileoverview Analysis session
 *
 * One session per store root. It owns the only PackageIndex value for that
 * root (rebuilt by `reloadPackages`, changed by `upsertPackage`) together
 * with the artifact store and the read-only query layer built over them.
 *
 * ```typescript
 * const session = await openSession({ root: '/data/slicebase' });
 * const units = [...session.catalog.enumerateUnits({ package: 'curl' })];
 * for await (const point of session.datapoints.forFunction('malloc')) {
 *   // ...
 * }
 * ```
 */

import { ArtifactStore } from '../storage/artifact_store.js';
import { StoreLayout } from '../storage/layout.js';
import { PackageIndex } from '../storage/package_index.js';
import type { PackageRecord, PackageRecordInput } from '../storage/types.js';
import { ArtifactCatalog } from '../query/catalog.js';
import { DataPointStream } from '../query/datapoints.js';
import { logDebug } from '../telemetry/logger.js';

export interface OpenSessionOptions {
  root: string;
}

export class AnalysisSession {
  readonly layout: StoreLayout;
  readonly store: ArtifactStore;
  readonly catalog: ArtifactCatalog;
  readonly datapoints: DataPointStream;
  private readonly index: PackageIndex;

  constructor(root: string) {
    this.layout = new StoreLayout(root);
    this.store = new ArtifactStore(this.layout);
    this.index = new PackageIndex(this.layout);
    this.catalog = new ArtifactCatalog(this.index, this.store);
    this.datapoints = new DataPointStream(this.store);
  }

  get root(): string {
    return this.layout.root;
  }

  get packages(): Pick<PackageIndex, 'has' | 'get' | 'list' | 'size' | 'sourceDir' | 'unitPath'> {
    return this.index;
  }

  /** Create the store layout if needed and load the package index */
  async initialize(): Promise<void> {
    await this.store.initialize();
    const count = await this.index.load();
    logDebug('[session] Session ready', { root: this.root, packages: count });
  }

  async reloadPackages(): Promise<number> {
    return this.index.load();
  }

  async upsertPackage(pkg: PackageRecordInput): Promise<PackageRecord> {
    return this.index.upsert(pkg);
  }
}

export async function openSession(options: OpenSessionOptions): Promise<AnalysisSession> {
  const session = new AnalysisSession(options.root);
  await session.initialize();
  return session;
}

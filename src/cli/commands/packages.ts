/**
 * @fileoverview Packages command - list known packages
 */

import type { CommandContext } from '../context.js';
import { printTable } from '../progress.js';

export async function packagesCommand(context: CommandContext): Promise<void> {
  const packages = context.session.packages.list();
  if (packages.length === 0) {
    console.log('No packages');
    return;
  }
  printTable(
    ['Name', 'Fetch Status', 'Build Status'],
    packages.map((pkg) => [pkg.name, pkg.fetched ? 'fetched' : 'not fetched', pkg.build.result]),
  );
}

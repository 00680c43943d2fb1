/**
 * @fileoverview num-slices command - count stored slices
 *
 * `--package` sums the exact counts of the package's units; `--bc` matches
 * unit directory names by substring, as the catalog does without a function.
 */

import { parseArgs } from 'node:util';
import { parseCommandArgs } from '../args.js';
import type { CommandContext } from '../context.js';
import { createError } from '../errors.js';

export async function numSlicesCommand(context: CommandContext): Promise<void> {
  const { values } = parseCommandArgs('num-slices', () => parseArgs({
    args: context.args,
    options: {
      package: { type: 'string', short: 'p' },
      bc: { type: 'string', short: 'b' },
      function: { type: 'string', short: 'f' },
    },
    allowPositionals: false,
  }));
  const catalog = context.session.catalog;

  if (values.package !== undefined) {
    if (values.bc !== undefined || values.function !== undefined) {
      throw createError('INVALID_ARGUMENT', '--package cannot be combined with --bc or --function');
    }
    console.log(await catalog.countForPackage(values.package));
    return;
  }

  console.log(await catalog.count({ function: values.function, unit: values.bc }));
}

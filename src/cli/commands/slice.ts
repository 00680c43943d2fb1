/**
 * @fileoverview Slice command - print one slice document
 */

import { parseArgs } from 'node:util';
import { parseCommandArgs, parseInteger, requirePositional } from '../args.js';
import type { CommandContext } from '../context.js';
import { createError } from '../errors.js';

export async function sliceCommand(context: CommandContext): Promise<void> {
  const { positionals } = parseCommandArgs('slice', () => parseArgs({
    args: context.args,
    options: {},
    allowPositionals: true,
  }));
  const fragment = requirePositional('slice', positionals, 0, 'unit');
  const func = requirePositional('slice', positionals, 1, 'function');
  const sliceId = parseInteger('<slice-id>', requirePositional('slice', positionals, 2, 'slice-id'));

  const resolved = await context.session.catalog.slice(fragment, func, sliceId);
  if (!resolved) {
    throw createError('UNKNOWN_UNIT', `Unknown unit ${fragment}`, { fragment });
  }
  console.log(JSON.stringify(resolved.document, null, 2));
}

/**
 * @fileoverview Clear command - remove every artifact of a compiled unit
 */

import { parseArgs } from 'node:util';
import { parseCommandArgs, requirePositional } from '../args.js';
import type { CommandContext } from '../context.js';

export async function clearCommand(context: CommandContext): Promise<void> {
  const { positionals } = parseCommandArgs('clear', () => parseArgs({
    args: context.args,
    options: {},
    allowPositionals: true,
  }));
  const unit = requirePositional('clear', positionals, 0, 'unit');

  const removed = await context.session.store.clear(unit);
  console.log(`Removed ${removed} document${removed === 1 ? '' : 's'} of ${unit}`);
}

/**
 * @fileoverview bc-files command - list compiled units
 */

import { parseArgs } from 'node:util';
import { parseCommandArgs } from '../args.js';
import type { CommandContext } from '../context.js';

export async function bcFilesCommand(context: CommandContext): Promise<void> {
  const { values } = parseCommandArgs('bc-files', () => parseArgs({
    args: context.args,
    options: {
      package: { type: 'string', short: 'p' },
      full: { type: 'boolean', default: false },
    },
    allowPositionals: false,
  }));

  for (const unit of context.session.catalog.enumerateUnits({ package: values.package, full: values.full ?? false })) {
    console.log(unit);
  }
}

/**
 * @fileoverview slicebase CLI dispatcher
 *
 * Global options come before the command name; everything after it belongs to
 * the command's own parser. Every failure is printed as one diagnostic on
 * stderr and yields exit code 1.
 */

import { parseArgs } from 'node:util';
import { getErrorMessage } from '../utils/errors.js';
import { bcFilesCommand } from './commands/bc_files.js';
import { clearCommand } from './commands/clear.js';
import { learnCommand } from './commands/learn.js';
import { numSlicesCommand } from './commands/num_slices.js';
import { packagesCommand } from './commands/packages.js';
import { sliceCommand } from './commands/slice.js';
import { unimplementedQueryCommand } from './commands/unimplemented.js';
import { openCommandContext, type GlobalOptions } from './context.js';
import { createError, formatError } from './errors.js';
import { isCommand, showHelp } from './help.js';

/** Global options that take a value */
const VALUED_GLOBALS = new Set(['--root', '--config']);

interface SplitArgs {
  globalArgs: string[];
  command: string | undefined;
  commandArgs: string[];
}

export function splitCommandLine(args: string[]): SplitArgs {
  let index = 0;
  while (index < args.length && args[index].startsWith('-')) {
    index += VALUED_GLOBALS.has(args[index]) ? 2 : 1;
  }
  return {
    globalArgs: args.slice(0, index),
    command: args[index],
    commandArgs: args.slice(index + 1),
  };
}

function parseGlobals(globalArgs: string[]) {
  try {
    return parseArgs({
      args: globalArgs,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        root: { type: 'string' },
        config: { type: 'string' },
        verbose: { type: 'boolean', default: false },
      },
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

/**
 * Run one CLI invocation. Returns the process exit code.
 */
export async function runCli(args: string[]): Promise<number> {
  try {
    await dispatch(args);
    return 0;
  } catch (error) {
    console.error(formatError(error));
    return 1;
  }
}

async function dispatch(args: string[]): Promise<void> {
  const { globalArgs, command, commandArgs } = splitCommandLine(args);
  const values = parseGlobals(globalArgs);

  if (values.version) {
    const { SLICEBASE_VERSION } = await import('../index.js');
    console.log(`slicebase ${SLICEBASE_VERSION.string}`);
    return;
  }

  if (values.help || command === undefined || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : undefined);
    return;
  }

  if (!isCommand(command)) {
    throw createError('UNKNOWN_COMMAND', `Unknown command: ${command}`, { command });
  }

  switch (command) {
    case 'num-traces':
    case 'trace':
    case 'feature':
      await unimplementedQueryCommand(command);
      return;
    default:
      break;
  }

  const globals: GlobalOptions = {
    root: values.root,
    configPath: values.config,
    verbose: values.verbose ?? false,
  };
  const context = await openCommandContext(globals, commandArgs);

  switch (command) {
    case 'packages':
      await packagesCommand(context);
      break;
    case 'bc-files':
      await bcFilesCommand(context);
      break;
    case 'num-slices':
      await numSlicesCommand(context);
      break;
    case 'slice':
      await sliceCommand(context);
      break;
    case 'clear':
      await clearCommand(context);
      break;
    case 'learn':
      await learnCommand(context, { argv: args });
      break;
  }
}

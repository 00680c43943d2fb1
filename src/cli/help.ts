/**
 * @fileoverview Help text for slicebase CLI commands
 */

export type Command =
  | 'packages'
  | 'bc-files'
  | 'num-slices'
  | 'slice'
  | 'num-traces'
  | 'trace'
  | 'feature'
  | 'clear'
  | 'learn'
  | 'help';

export const COMMANDS: Record<Command, { description: string; usage: string }> = {
  'packages': {
    description: 'List known packages with their fetch and build status',
    usage: 'slicebase packages',
  },
  'bc-files': {
    description: 'List compiled units, one per line',
    usage: 'slicebase bc-files [--package <name>] [--full]',
  },
  'num-slices': {
    description: 'Count stored slices',
    usage: 'slicebase num-slices [--package <name> | --bc <unit> | --function <name>]',
  },
  'slice': {
    description: 'Print one slice document',
    usage: 'slicebase slice <unit> <function> <slice-id>',
  },
  'num-traces': {
    description: 'Count stored traces (not implemented)',
    usage: 'slicebase num-traces',
  },
  'trace': {
    description: 'Print one trace document (not implemented)',
    usage: 'slicebase trace <unit> <function> <slice-id> <trace-id>',
  },
  'feature': {
    description: 'Print one feature document (not implemented)',
    usage: 'slicebase feature <unit> <function> <slice-id> <trace-id>',
  },
  'clear': {
    description: 'Remove every artifact of a compiled unit',
    usage: 'slicebase clear <unit>',
  },
  'learn': {
    description: 'Run an oracle-driven labeling session over a function',
    usage: 'slicebase learn <function> (--ground-truth <label> | --source <dir> | --function-spec <file>) [options]',
  },
  'help': {
    description: 'Show help information',
    usage: 'slicebase help [command]',
  },
};

export function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

const MAIN_HELP = `
slicebase - program-analysis artifact store and triage loop

USAGE:
    slicebase [global options] <command> [options]

COMMANDS:
${Object.entries(COMMANDS).map(([name, { description }]) => `    ${name.padEnd(14)}${description}`).join('\n')}

GLOBAL OPTIONS (before the command):
    -h, --help          Show help information
    -v, --version       Show version information
    --root <dir>        Store root (default: slicebase.yaml, SLICEBASE_ROOT or ./slicebase-data)
    --config <file>     Configuration file (default: <root>/slicebase.yaml when present)
    --verbose           Enable debug logging
`;

const DETAILS: Partial<Record<Command, string>> = {
  'bc-files': `
OPTIONS:
    -p, --package <name>  Only the units of this package
    --full                Print full source paths instead of unit names
`,
  'num-slices': `
OPTIONS:
    -p, --package <name>   Slices of every unit the package owns
    -b, --bc <unit>        Slices of one unit, across functions
    -f, --function <name>  Slices around one function

    Without options, every stored slice is counted.
`,
  'slice': `
    <unit> may be any fragment of a unit name; the first unit containing it
    (packages in index order) is used.
`,
  'clear': `
    Removes slices, traces and features of <unit> for every function and
    prints how many documents were removed.
`,
  'learn': `
ORACLE (exactly one):
    --ground-truth <label>   Alarm iff the trace carries <label>
    --source <dir>           Ask a human, showing source lines from <dir>
    --function-spec <file>   Alarm iff the data point violates the YAML spec

OPTIONS:
    --strategy <name>        sequential | distance (default: sequential)
    --budget <n>             Maximum labeling steps (default: defaultBudget)
    --num-alarms <k>         Alarms to report (default: 10)
    --num-outliers <m>       k for precision-at-k (default: labeled alarms in the pool)
    --radius <r>             Propagation window half-width (default: propagationRadius)
    --neighbors <n>          Neighbours for the distance strategy (default: 5)
    --output <dir>           Write alarms.csv, alarms_brief.csv, discoveries.csv,
                             curves.json, unified.json

HUMAN ANSWERS:
    y / n    alarm / not an alarm
    Y / N    same, for every remaining trace of the slice in the window
    q        stop the session
`,
};

export function getCommandHelp(command: string): string {
  if (!isCommand(command)) return MAIN_HELP;
  const { description, usage } = COMMANDS[command];
  return `\n${description}\n\nUSAGE:\n    ${usage}\n${DETAILS[command] ?? ''}`;
}

export function showHelp(command?: string): void {
  if (command && !isCommand(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(command ? getCommandHelp(command) : MAIN_HELP);
}

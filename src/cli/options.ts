/**
 * Command-line parsing for the lahey CLI.
 */
import { DEFAULT_CELL_BITS, parseCellBits, parseVersion, toCell } from '../core/constants';
import { DEFAULT_INTERVAL } from '../stores/debuggerStore';
import { FungeVersion } from '../core/types';
import type { Cell, CellBits } from '../core/types';

export const USAGE = [
  'Usage: lahey <file> [options] [args...]',
  '',
  'Options:',
  '  -d, --debug[=interval]  step in the terminal debugger (seconds between steps when running)',
  '  -b, --bits <8|16|32>    cell width (default 32)',
  '  -s, --steps <n>         run at most n steps; with --debug, run n steps before the debugger opens',
  '  -B, --befunge <93|97|98>',
  '                          language version (default 98)',
  '  --break <x,y>           breakpoint for the debugger (repeatable)',
  '  --stack                 push args onto the stack instead of queueing them as input',
  '  -h, --help              show this help',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  file: string;
  debug: boolean;
  /** Seconds between ticks while the debugger runs. */
  interval: number;
  cellBits: CellBits;
  steps: number | null;
  version: FungeVersion;
  breakpoints: [number, number][];
  stack: boolean;
  help: boolean;
  /** Passed to the program. */
  args: string[];
}

function parseCount(flag: string, text: string | undefined): number {
  if (text === undefined || !/^\d+$/.test(text)) {
    throw new UsageError(`${flag} expects a non-negative integer, got ${text ?? 'nothing'}`);
  }
  return Number(text);
}

function parseInterval(text: string): number {
  const value = Number(text);
  if (text === '' || !Number.isFinite(value) || value <= 0) {
    throw new UsageError(`--debug expects a positive number of seconds, got ${text}`);
  }
  return value;
}

function parseCoordinate(text: string | undefined): [number, number] {
  const match = text === undefined ? null : /^(-?\d+),(-?\d+)$/.exec(text);
  if (!match) throw new UsageError(`--break expects x,y, got ${text ?? 'nothing'}`);
  return [Number(match[1]), Number(match[2])];
}

/** Parse `argv` (without the node and script entries). Throws UsageError. */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    file: '',
    debug: false,
    interval: DEFAULT_INTERVAL,
    cellBits: DEFAULT_CELL_BITS,
    steps: null,
    version: FungeVersion.B98,
    breakpoints: [],
    stack: false,
    help: false,
    args: [],
  };
  const positional: string[] = [];

  let i = 0;
  const value = (inline: string | undefined): string | undefined =>
    inline ?? (i + 1 < argv.length ? argv[++i] : undefined);

  for (; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-' || /^-\d/.test(arg)) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    switch (flag) {
      case '-d':
      case '--debug':
        options.debug = true;
        if (inline !== undefined) options.interval = parseInterval(inline);
        break;
      case '-b':
      case '--bits': {
        const text = value(inline);
        const bits = text === undefined ? null : parseCellBits(text);
        if (bits === null) throw new UsageError(`${flag} expects 8, 16 or 32, got ${text ?? 'nothing'}`);
        options.cellBits = bits;
        break;
      }
      case '-s':
      case '--steps':
        options.steps = parseCount(flag, value(inline));
        break;
      case '-B':
      case '--befunge': {
        const text = value(inline);
        if (text === undefined) throw new UsageError(`${flag} expects 93, 97 or 98`);
        options.version = parseVersion(text);
        break;
      }
      case '--break':
        options.breakpoints.push(parseCoordinate(value(inline)));
        break;
      case '--stack':
        options.stack = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (positional.length === 0) {
    if (options.help) return options;
    throw new UsageError('No program file given');
  }
  options.file = positional[0];
  options.args = positional.slice(1);
  return options;
}

/**
 * Initial stack for `--stack`: integers as cells, anything else as a
 * 0gnirts string. The first argument ends up on top.
 */
export function argumentsToStack(args: readonly string[], bits: CellBits = DEFAULT_CELL_BITS): Cell[] {
  const cells: Cell[] = [];
  for (const arg of [...args].reverse()) {
    if (/^-?\d+$/.test(arg)) {
      cells.push(toCell(Number(arg), bits));
      continue;
    }
    cells.push(0);
    const chars = Array.from(arg);
    for (let j = chars.length - 1; j >= 0; j--) cells.push(chars[j].codePointAt(0) ?? 0);
  }
  return cells;
}

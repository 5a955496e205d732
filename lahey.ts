/**
 * lahey: Befunge-93 / Funge-98 interpreter and terminal debugger
 *
 * Usage:
 *   npx tsx lahey.ts <file> [options] [args...]
 *   # or bundle with `npm run bundle` and run dist/lahey.mjs
 *
 * Options:
 *   --debug[=interval]  Open the stepping debugger
 *   --bits 8|16|32      Cell width
 *   --steps N           Step limit (with --debug: steps run before the debugger opens)
 *   --befunge 93|97|98  Language version
 *   --break x,y         Debugger breakpoint, repeatable
 *   --stack             Push args onto the stack instead of queueing them as input
 */
import { readFileSync } from 'fs';
import { sep } from 'path';
import { argumentsToStack, parseArgs, USAGE, UsageError } from './src/cli/options';
import type { CliOptions } from './src/cli/options';
import { NodeFiles } from './src/cli/nodeFiles';
import { UnknownVersionError } from './src/core/constants';
import { FungeInterpreter } from './src/core/interpreter';
import type { InterpreterOptions } from './src/core/interpreter';
import { QueuedInput, StreamOutput } from './src/core/io';
import { LoadError } from './src/core/loader';
import { createDebuggerSession, createDebuggerStore } from './src/stores/debuggerStore';
import type { DebuggerSession } from './src/stores/debuggerStore';
import { runTerminalSession } from './src/ui/terminal/session';

function fail(message: string): never {
  console.error(`\x1b[31m✗ ${message}\x1b[0m`);
  process.exit(1);
}

// ---- Argument parsing ----

let cli: CliOptions;
try {
  cli = parseArgs(process.argv.slice(2));
} catch (err) {
  if (err instanceof UsageError || err instanceof UnknownVersionError) {
    console.error(`\x1b[31m✗ ${err.message}\x1b[0m`);
    console.error('');
    console.error(USAGE);
    process.exit(1);
  }
  throw err;
}

if (cli.help) {
  console.log(USAGE);
  process.exit(0);
}

let source: Uint8Array;
try {
  source = new Uint8Array(readFileSync(cli.file));
} catch {
  fail(`cannot read file '${cli.file}'`);
}

// ---- Interpreter setup ----

const env: Record<string, string> = {};
for (const [name, value] of Object.entries(process.env)) {
  if (value !== undefined) env[name] = value;
}

const common: InterpreterOptions = {
  version: cli.version,
  cellBits: cli.cellBits,
  files: new NodeFiles(),
  programName: cli.file,
  args: cli.args,
  env,
  pathSeparator: sep,
  initialStack: cli.stack ? argumentsToStack(cli.args, cli.cellBits) : [],
};

// Without --stack, each argument is one line of input.
const argumentInput = cli.stack ? '' : cli.args.map(arg => arg + '\n').join('');

// ---- Debugger ----

if (cli.debug) {
  let session: DebuggerSession;
  try {
    session = createDebuggerSession(source, common, new QueuedInput(argumentInput));
  } catch (err) {
    if (err instanceof LoadError) fail(`${cli.file}: ${err.message}`);
    throw err;
  }
  const dbg = session.debugger;
  for (const [x, y] of cli.breakpoints) dbg.setBreakpoint(x, y);
  for (let i = 0; i < (cli.steps ?? 0) && !dbg.snapshot().halted; i++) dbg.step();

  const store = createDebuggerStore(session, cli.interval);
  await runTerminalSession(session, store);
  process.exit(dbg.snapshot().exitCode ?? 0);
}

// ---- Run ----

const input = new QueuedInput(argumentInput);
if (argumentInput) {
  input.close();
} else {
  process.stdin.setEncoding('utf8');
  process.stdin.on('data', (chunk: string) => input.feed(chunk));
  process.stdin.on('end', () => input.close());
}

const interpreter = new FungeInterpreter({
  ...common,
  input,
  output: new StreamOutput(text => process.stdout.write(text)),
});
try {
  interpreter.loadSource(source);
} catch (err) {
  if (err instanceof LoadError) fail(`${cli.file}: ${err.message}`);
  throw err;
}

const code = await interpreter.run(cli.steps ?? Infinity);
if (code === null) {
  console.error(`\x1b[33m! stopped after ${cli.steps} steps\x1b[0m`);
}
process.exit(code ?? 0);

/**
 * FungeInterpreter: Funge-Space, scheduler and ports wired together.
 */
import { DEFAULT_CELL_BITS } from './constants';
import { createDefaultRegistry } from './fingerprints/builtins';
import type { FingerprintRegistry } from './fingerprints/registry';
import { BufferedOutput, QueuedInput } from './io';
import { loadSource } from './loader';
import { Scheduler } from './scheduler';
import { FungeSpace } from './space';
import type { SysInfoEnvironment } from './sysinfo';
import { FungeVersion } from './types';
import type {
  Cell, CellBits, FileSystemPort, InputPort, InterpreterSnapshot, OutputPort,
} from './types';

export interface InterpreterOptions {
  version?: FungeVersion;
  cellBits?: CellBits;
  input?: InputPort;
  output?: OutputPort;
  /** Backing for `i` and `o`; without one both reflect. */
  files?: FileSystemPort | null;
  fingerprints?: FingerprintRegistry;
  /** Reported by `y` as the first command-line entry. */
  programName?: string;
  args?: readonly string[];
  env?: Readonly<Record<string, string>>;
  pathSeparator?: string;
  clock?: () => Date;
  random?: () => number;
  /** Cells pushed onto IP 0's stack before the first tick. */
  initialStack?: readonly Cell[];
}

export type ResolvedOptions = Required<InterpreterOptions>;

export function resolveOptions(options: InterpreterOptions = {}): ResolvedOptions {
  const closedInput = new QueuedInput();
  closedInput.close();
  return {
    version: options.version ?? FungeVersion.B98,
    cellBits: options.cellBits ?? DEFAULT_CELL_BITS,
    input: options.input ?? closedInput,
    output: options.output ?? new BufferedOutput(),
    files: options.files ?? null,
    fingerprints: options.fingerprints ?? createDefaultRegistry(),
    programName: options.programName ?? '',
    args: options.args ?? [],
    env: options.env ?? {},
    pathSeparator: options.pathSeparator ?? '/',
    clock: options.clock ?? (() => new Date()),
    random: options.random ?? Math.random,
    initialStack: options.initialStack ?? [],
  };
}

// Ticks executed between yields to the event loop in run()
const RUN_BATCH = 10_000;

export class FungeInterpreter {
  readonly options: ResolvedOptions;
  readonly space = new FungeSpace();
  readonly scheduler: Scheduler;

  constructor(options: InterpreterOptions = {}) {
    this.options = resolveOptions(options);
    const o = this.options;
    this.scheduler = new Scheduler({
      space: this.space,
      fingerprints: o.fingerprints,
      input: o.input,
      output: o.output,
      files: o.files,
      version: o.version,
      cellBits: o.cellBits,
      random: o.random,
      sysInfo: () => this.sysInfo(),
    });
    this.scheduler.start(o.initialStack);
  }

  get input(): InputPort {
    return this.options.input;
  }

  get output(): OutputPort {
    return this.options.output;
  }

  private sysInfo(): SysInfoEnvironment {
    const o = this.options;
    return {
      cellBits: o.cellBits,
      fileIo: o.files !== null,
      programName: o.programName,
      args: o.args,
      env: o.env,
      pathSeparator: o.pathSeparator,
      now: o.clock(),
    };
  }

  /** Place initial cells and (re)start with a single IP at the origin. */
  load(cells: Iterable<[number, number, Cell]>): void {
    this.space.loadCells(cells);
    this.scheduler.start(this.options.initialStack);
  }

  /** Parse source text or bytes and load it. Throws LoadError. */
  loadSource(source: string | Uint8Array): void {
    this.load(loadSource(source, { version: this.options.version }).cells);
  }

  /** Run one tick. Returns false once halted. */
  tick(): boolean {
    return this.scheduler.tick();
  }

  get isHalted(): boolean {
    return this.scheduler.isHalted;
  }

  get exitCode(): number | null {
    return this.scheduler.currentExitCode;
  }

  /**
   * Run until the program halts (or `maxTicks` ticks have run) and return
   * the exit code, or null when the tick limit stopped it first.
   */
  async run(maxTicks: number = Infinity): Promise<number | null> {
    const input = this.input;
    let remaining = maxTicks;
    while (!this.isHalted && remaining > 0) {
      const batch = Math.min(RUN_BATCH, remaining);
      for (let i = 0; i < batch && this.tick(); i++) {
        remaining--;
        if (this.scheduler.allAwaitingInput) break;
      }
      if (this.isHalted) break;
      if (this.scheduler.allAwaitingInput && input.whenReadable) {
        await input.whenReadable();
      } else {
        await new Promise<void>(resolve => setTimeout(resolve, 0));
      }
    }
    return this.exitCode;
  }

  snapshot(): InterpreterSnapshot {
    return {
      tick: this.scheduler.ticks,
      halted: this.scheduler.isHalted,
      exitCode: this.scheduler.currentExitCode,
      bounds: this.space.bounds(),
      ips: this.scheduler.getSnapshots(),
    };
  }
}

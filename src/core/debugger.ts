/**
 * Stepping debugger over a FungeInterpreter: single ticks, step back
 * through a bounded history, breakpoints and stop-on-opcode.
 */
import { isRewindable } from './io';
import type { FungeInterpreter } from './interpreter';
import type { SchedulerState } from './scheduler';
import type { CellWrite } from './space';
import type { Bounds, InterpreterSnapshot } from './types';

export type StopReason = 'breakpoint' | 'opcode' | 'halted' | 'awaiting-input' | 'limit';

export const DEFAULT_HISTORY_LIMIT = 16_384;

interface HistoryEntry {
  state: SchedulerState;
  bounds: Bounds;
  writes: CellWrite[];
  outputMark: number | null;
  inputMark: number | null;
}

export interface DebuggerOptions {
  historyLimit?: number;
}

const key = (x: number, y: number): string => `${x},${y}`;

export class FungeDebugger {
  private history: HistoryEntry[] = [];
  private breakpoints: Map<string, [number, number]> = new Map();
  private stopOpcode: number | null = null;
  private readonly historyLimit: number;

  constructor(readonly interpreter: FungeInterpreter, options: DebuggerOptions = {}) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  // ========================================================================
  // Stepping
  // ========================================================================

  /** Run one tick, recording enough to undo it. No-op once halted. */
  step(): InterpreterSnapshot {
    const interp = this.interpreter;
    if (interp.isHalted) return interp.snapshot();

    const { input, output } = interp;
    const entry: HistoryEntry = {
      state: interp.scheduler.captureState(),
      bounds: interp.space.bounds(),
      writes: [],
      outputMark: isRewindable(output) ? output.mark() : null,
      inputMark: isRewindable(input) ? input.mark() : null,
    };
    interp.space.startJournal();
    try {
      interp.tick();
    } finally {
      entry.writes = interp.space.takeJournal();
      interp.space.stopJournal();
    }
    this.history.push(entry);
    if (this.history.length > this.historyLimit) this.history.shift();
    return interp.snapshot();
  }

  /** Undo the most recent tick. Returns false when there is no history. */
  stepBack(): boolean {
    const entry = this.history.pop();
    if (!entry) return false;
    const interp = this.interpreter;
    interp.space.revert(entry.writes, entry.bounds);
    interp.scheduler.restoreState(entry.state);
    const { input, output } = interp;
    if (entry.outputMark !== null && isRewindable(output)) output.rewind(entry.outputMark);
    if (entry.inputMark !== null && isRewindable(input)) input.rewind(entry.inputMark);
    return true;
  }

  get historyLength(): number {
    return this.history.length;
  }

  snapshot(): InterpreterSnapshot {
    return this.interpreter.snapshot();
  }

  // ========================================================================
  // Breakpoints
  // ========================================================================

  setBreakpoint(x: number, y: number): void {
    this.breakpoints.set(key(x, y), [x, y]);
  }

  clearBreakpoint(x: number, y: number): void {
    this.breakpoints.delete(key(x, y));
  }

  /** Toggle a breakpoint; returns whether it is now set. */
  toggleBreakpoint(x: number, y: number): boolean {
    if (this.hasBreakpoint(x, y)) {
      this.clearBreakpoint(x, y);
      return false;
    }
    this.setBreakpoint(x, y);
    return true;
  }

  clearAllBreakpoints(): void {
    this.breakpoints.clear();
  }

  hasBreakpoint(x: number, y: number): boolean {
    return this.breakpoints.has(key(x, y));
  }

  listBreakpoints(): [number, number][] {
    return [...this.breakpoints.values()];
  }

  /** Stop when any IP reaches a cell holding `opcode`; cleared once hit. */
  setStopOpcode(opcode: string | number | null): void {
    this.stopOpcode = typeof opcode === 'string' ? (opcode.codePointAt(0) ?? null) : opcode;
  }

  get pendingStopOpcode(): number | null {
    return this.stopOpcode;
  }

  // ========================================================================
  // Running
  // ========================================================================

  private checkStops(): StopReason | null {
    const interp = this.interpreter;
    if (interp.isHalted) return 'halted';
    const ips = interp.scheduler.liveIps;
    if (ips.some(ip => this.hasBreakpoint(ip.position[0], ip.position[1]))) {
      return 'breakpoint';
    }
    const op = this.stopOpcode;
    if (op !== null && ips.some(ip => interp.space.get(ip.position[0], ip.position[1]) === op)) {
      this.stopOpcode = null;
      return 'opcode';
    }
    return null;
  }

  /**
   * Tick until a stop condition holds after a tick, or `maxTicks` ticks have
   * run. Every call runs at least one tick unless already halted, so blocked
   * reads are retried.
   */
  runUntilBreakpointOrHalt(maxTicks: number = 1_000_000): StopReason {
    const scheduler = this.interpreter.scheduler;
    for (let i = 0; i < maxTicks; i++) {
      if (scheduler.isHalted) return 'halted';
      this.step();
      const reason = this.checkStops();
      if (reason) return reason;
      if (scheduler.allAwaitingInput) return 'awaiting-input';
    }
    return 'limit';
  }
}

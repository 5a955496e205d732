/**
 * Zustand store for an interactive debugging session.
 * Holds the latest snapshot and output text, and drives the timed run loop.
 */
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { FungeDebugger } from '../core/debugger';
import type { DebuggerOptions, StopReason } from '../core/debugger';
import { FungeInterpreter } from '../core/interpreter';
import type { InterpreterOptions } from '../core/interpreter';
import { BufferedOutput, QueuedInput } from '../core/io';
import type { InterpreterSnapshot } from '../core/types';

export const DEFAULT_INTERVAL = 0.05;
const MIN_INTERVAL = 0.001;
const MAX_INTERVAL = 2;

/** The objects a store drives: the debugger plus the ports it reads back. */
export interface DebuggerSession {
  debugger: FungeDebugger;
  output: BufferedOutput;
  input: QueuedInput;
}

export interface DebuggerState {
  snapshot: InterpreterSnapshot;
  output: string;
  running: boolean;
  /** Seconds between ticks while running. */
  interval: number;
  lastStop: StopReason | null;
  breakpoints: [number, number][];

  // Actions
  step: () => void;
  stepBack: () => void;
  run: () => void;
  pause: () => void;
  toggleRun: () => void;
  faster: () => void;
  slower: () => void;
  /** Run until some IP reaches a cell holding `opcode`. */
  runToOpcode: (opcode: string) => void;
  toggleBreakpoint: (x: number, y: number) => void;
  /** Queue text for `&`/`~`; does not resume a paused run. */
  provideInput: (text: string) => void;
}

export type SessionOptions = Omit<InterpreterOptions, 'input' | 'output'> & DebuggerOptions;

/** Load `source` into a fresh interpreter wired with buffered ports. Throws LoadError. */
export function createDebuggerSession(
  source: string | Uint8Array,
  options: SessionOptions = {},
  input: QueuedInput = new QueuedInput(),
): DebuggerSession {
  const output = new BufferedOutput();
  const interpreter = new FungeInterpreter({ ...options, input, output });
  interpreter.loadSource(source);
  return {
    debugger: new FungeDebugger(interpreter, { historyLimit: options.historyLimit }),
    output,
    input,
  };
}

export function createDebuggerStore(
  session: DebuggerSession,
  interval: number = DEFAULT_INTERVAL,
): StoreApi<DebuggerState> {
  const dbg = session.debugger;
  let timer: ReturnType<typeof setTimeout> | null = null;

  return createStore<DebuggerState>()((set, get) => {
    const refresh = () => ({ snapshot: dbg.snapshot(), output: session.output.getText() });

    const cancel = (): void => {
      if (timer !== null) clearTimeout(timer);
      timer = null;
    };

    const schedule = (): void => {
      timer = setTimeout(runLoop, get().interval * 1000);
    };

    function runLoop(): void {
      timer = null;
      if (!get().running) return;
      const reason = dbg.runUntilBreakpointOrHalt(1);
      if (reason !== 'limit') {
        set({ ...refresh(), running: false, lastStop: reason });
        return;
      }
      set(refresh());
      schedule();
    }

    return {
      ...refresh(),
      running: false,
      interval,
      lastStop: null,
      breakpoints: dbg.listBreakpoints(),

      step: () => {
        if (get().running) return;
        const snapshot = dbg.step();
        let lastStop: StopReason | null = null;
        if (snapshot.halted) lastStop = 'halted';
        else if (dbg.interpreter.scheduler.allAwaitingInput) lastStop = 'awaiting-input';
        set({ ...refresh(), lastStop });
      },

      stepBack: () => {
        if (get().running) return;
        dbg.stepBack();
        set({ ...refresh(), lastStop: null });
      },

      run: () => {
        if (get().running || get().snapshot.halted) return;
        set({ running: true, lastStop: null });
        schedule();
      },

      pause: () => {
        cancel();
        set({ running: false });
      },

      toggleRun: () => {
        if (get().running) get().pause();
        else get().run();
      },

      faster: () => set({ interval: Math.max(MIN_INTERVAL, get().interval / 2) }),
      slower: () => set({ interval: Math.min(MAX_INTERVAL, get().interval * 2) }),

      runToOpcode: (opcode) => {
        dbg.setStopOpcode(opcode);
        get().run();
      },

      toggleBreakpoint: (x, y) => {
        dbg.toggleBreakpoint(x, y);
        set({ breakpoints: dbg.listBreakpoints() });
      },

      provideInput: (text) => {
        session.input.feed(text);
        set({ lastStop: null });
      },
    };
  });
}

/**
 * Interactive terminal debugger: raw-mode keys drive the session store,
 * every store change redraws the frame.
 */
import * as readline from 'readline';
import type { StoreApi } from 'zustand/vanilla';
import type { DebuggerSession, DebuggerState } from '../../stores/debuggerStore';
import { renderFrame } from './render';

export type KeyCommand =
  | 'quit'
  | 'back'
  | 'toggle'
  | 'step'
  | 'faster'
  | 'slower'
  | { opcode: string };

export interface TerminalStreams {
  input: NodeJS.ReadStream;
  output: NodeJS.WriteStream;
}

const CLEAR = '\x1b[H\x1b[2J';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

/** Map a keypress to a debugger command. Printable keys run to that opcode. */
export function keyCommand(str: string | undefined, key: readline.Key | undefined): KeyCommand | null {
  if (key?.ctrl && key.name === 'c') return 'quit';
  switch (key?.name) {
    case 'escape': return 'quit';
    case 'backspace': return 'back';
    case 'space': return 'toggle';
    case 'return':
    case 'enter': return 'step';
    case 'up': return 'faster';
    case 'down': return 'slower';
  }
  if (str !== undefined && str.length === 1 && str >= '!' && str <= '~') return { opcode: str };
  return null;
}

export function applyCommand(store: StoreApi<DebuggerState>, command: KeyCommand): void {
  const state = store.getState();
  if (typeof command === 'object') {
    state.runToOpcode(command.opcode);
    return;
  }
  switch (command) {
    case 'back': state.stepBack(); break;
    case 'toggle': state.toggleRun(); break;
    case 'step': state.step(); break;
    case 'faster': state.faster(); break;
    case 'slower': state.slower(); break;
    case 'quit': state.pause(); break;
  }
}

/** Run the debugger UI until the user quits. */
export function runTerminalSession(
  session: DebuggerSession,
  store: StoreApi<DebuggerState>,
  streams: TerminalStreams = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const { input, output } = streams;
  const interactive = input.isTTY === true;

  const draw = (): void => {
    const state = store.getState();
    const lines = renderFrame(
      {
        snapshot: state.snapshot,
        space: session.debugger.interpreter.space,
        output: state.output,
        running: state.running,
        interval: state.interval,
        canStepBack: session.debugger.historyLength > 0,
        breakpoints: state.breakpoints,
        lastStop: state.lastStop,
      },
      { columns: output.columns ?? 80, rows: output.rows ?? 24 },
      output.isTTY === true,
    );
    output.write(CLEAR + lines.join('\n'));
  };

  return new Promise(resolve => {
    let prompting = false;

    const setRaw = (raw: boolean): void => {
      if (interactive) input.setRawMode(raw);
    };

    const finish = (): void => {
      store.getState().pause();
      unsubscribe();
      input.off('keypress', onKey);
      setRaw(false);
      input.pause();
      output.write(SHOW_CURSOR + '\n');
      resolve();
    };

    /** Leave raw mode for a line of program input, then resume a run that was going. */
    const promptForInput = (resume: boolean): void => {
      prompting = true;
      input.off('keypress', onKey);
      setRaw(false);
      output.write(SHOW_CURSOR);
      const rl = readline.createInterface({ input, output });
      rl.question('\ninput: ', line => {
        rl.close();
        prompting = false;
        setRaw(true);
        input.resume();
        input.on('keypress', onKey);
        output.write(HIDE_CURSOR);
        const state = store.getState();
        state.provideInput(line + '\n');
        if (resume) state.run();
        else draw();
      });
    };

    function onKey(str: string | undefined, key: readline.Key | undefined): void {
      const command = keyCommand(str, key);
      if (command === null) return;
      applyCommand(store, command);
      if (command === 'quit') finish();
    }

    const unsubscribe = store.subscribe((state, previous) => {
      if (prompting) return;
      draw();
      if (state.lastStop === 'awaiting-input' && previous.lastStop !== 'awaiting-input') {
        promptForInput(previous.running);
      }
    });

    readline.emitKeypressEvents(input);
    setRaw(true);
    input.resume();
    input.setEncoding('utf8');
    input.on('keypress', onKey);
    output.write(HIDE_CURSOR);
    draw();
  });
}

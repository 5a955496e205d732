/**
 * Debugger frame rendering for the terminal.
 *
 * Pure: takes the session state and a terminal size, returns the lines to
 * draw. The top half shows Funge-Space around the IPs (whole box when it
 * fits), followed by IP positions, stacks, output, step count and key help.
 */
import type { StopReason } from '../../core/debugger';
import { printable } from '../../core/space';
import type { FungeSpace } from '../../core/space';
import type { InterpreterSnapshot, IpSnapshot } from '../../core/types';

export interface FrameState {
  snapshot: InterpreterSnapshot;
  space: FungeSpace;
  output: string;
  running: boolean;
  interval: number;
  canStepBack: boolean;
  breakpoints: readonly (readonly [number, number])[];
  lastStop: StopReason | null;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface Viewport {
  left: number;
  top: number;
  /** Exclusive. */
  right: number;
  /** Exclusive. */
  bottom: number;
}

// ANSI attributes
const INVERSE = '\x1b[7m';
const INVERSE_OFF = '\x1b[27m';
const RED_BG = '\x1b[41m';
const BG_OFF = '\x1b[49m';

function mean(values: number[]): number {
  return Math.floor(values.reduce((a, b) => a + b, 0) / values.length);
}

/** Rectangle of space to show: the whole box if it fits, else centred on the IPs. */
export function computeViewport(snapshot: InterpreterSnapshot, width: number, height: number): Viewport {
  const { minX, minY, maxX, maxY } = snapshot.bounds;
  const ips = snapshot.ips;

  let left = minX;
  let right = maxX + 1;
  if (right - left > width) {
    const x = ips.length > 0 ? mean(ips.map(ip => ip.position[0])) : minX;
    left = Math.max(x - Math.floor(width / 2), minX);
    right = left + width;
  }

  let top = minY;
  let bottom = maxY + 1;
  if (bottom - top > height) {
    const y = ips.length > 0 ? mean(ips.map(ip => ip.position[1])) : minY;
    top = Math.max(y - Math.floor(height / 2), minY);
    bottom = top + height;
  }
  return { left, top, right, bottom };
}

/** Split text into lines of at most `width` characters, dropping empty lines. */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  for (let line of text.split('\n')) {
    while (line.length > width) {
      lines.push(line.slice(0, width));
      line = line.slice(width);
    }
    if (line.length > 0) lines.push(line);
  }
  return lines;
}

function formatVector(v: readonly [number, number]): string {
  return `[${v[0]}, ${v[1]}]`;
}

function formatStacks(ip: IpSnapshot): string {
  return `ip ${ip.id}: ${ip.stacks.map(s => `[${s.join(', ')}]`).join(' ')}`;
}

function renderGrid(state: FrameState, view: Viewport, color: boolean): string[] {
  const rows = state.space.renderRows(view.left, view.top, view.right, view.bottom);
  if (!color) return rows;

  const ipCells = new Set(state.snapshot.ips.map(ip => `${ip.position[0]},${ip.position[1]}`));
  const breakCells = new Set(state.breakpoints.map(([x, y]) => `${x},${y}`));
  return rows.map((row, dy) => {
    const y = view.top + dy;
    let line = '';
    Array.from(row).forEach((glyph, dx) => {
      const key = `${view.left + dx},${y}`;
      let cell = glyph;
      if (breakCells.has(key)) cell = `${RED_BG}${cell}${BG_OFF}`;
      if (ipCells.has(key)) cell = `${INVERSE}${cell}${INVERSE_OFF}`;
      line += cell;
    });
    return line;
  });
}

function helpLine(state: FrameState): string {
  const text = ['esc: quit'];
  if (state.canStepBack) text.push('backspace: back');
  text.push(state.running ? 'space: pause' : 'space: run');
  text.push('enter: step');
  text.push(`interval: ${state.interval} up/down arrow`);
  return text.join(', ');
}

export function renderFrame(state: FrameState, size: TerminalSize, color: boolean = true): string[] {
  const { snapshot } = state;
  const gridHeight = Math.max(1, Math.floor(size.rows / 2));
  const view = computeViewport(snapshot, size.columns, gridHeight);

  const lines = renderGrid(state, view, color);
  const n = lines.length;

  const positions = snapshot.ips.map(ip => formatVector(ip.position)).join(', ');
  const offsets = snapshot.ips.map(ip => formatVector(ip.storageOffset)).join(', ');
  lines.push('');
  lines.push(`top-left: ${view.top}, ${view.left}, ip pos: [${positions}], offset: [${offsets}]`);

  let stack = wrapText(snapshot.ips.map(formatStacks).join('\n'), size.columns);
  let output = wrapText(state.output, size.columns);
  if (size.rows >= n + 9) {
    stack = stack.slice(-Math.max(1, Math.floor(size.rows / 5)));
    const room = size.rows - stack.length - n - 9;
    output = room > 0 ? output.slice(-room) : [];
  } else {
    stack = [];
    output = [];
  }

  lines.push('');
  lines.push('stacks:');
  lines.push(...stack);
  lines.push('');
  lines.push('output:');
  lines.push(...output);
  lines.push('');
  let steps = `steps: ${snapshot.tick}`;
  if (snapshot.halted) steps += `, exit code: ${snapshot.exitCode ?? 0}`;
  else if (state.lastStop) steps += `, stopped: ${state.lastStop}`;
  lines.push(steps);

  const body = lines.slice(0, Math.max(0, size.rows - 1));
  while (body.length < size.rows - 1) body.push('');
  body.push(helpLine(state));
  return body;
}

/**
 * Terminal frame rendering tests
 */
import { describe, it, expect } from 'vitest';
import { FungeInterpreter } from '../../core/interpreter';
import type { InterpreterSnapshot, IpSnapshot } from '../../core/types';
import { IpStatus } from '../../core/types';
import { computeViewport, renderFrame, wrapText } from './render';
import type { FrameState } from './render';

function frameAfter(source: string, ticks: number, overrides: Partial<FrameState> = {}): FrameState {
  const interp = new FungeInterpreter();
  interp.loadSource(source);
  for (let i = 0; i < ticks; i++) interp.tick();
  return {
    snapshot: interp.snapshot(),
    space: interp.space,
    output: '',
    running: false,
    interval: 0.05,
    canStepBack: true,
    breakpoints: [],
    lastStop: null,
    ...overrides,
  };
}

function ipAt(x: number, y: number): IpSnapshot {
  return {
    id: 0,
    status: IpStatus.RUNNING,
    position: [x, y],
    delta: [1, 0],
    storageOffset: [0, 0],
    stringMode: false,
    stacks: [[]],
    fingerprints: {},
  };
}

function wideSnapshot(ipX: number): InterpreterSnapshot {
  return {
    tick: 0,
    halted: false,
    exitCode: null,
    bounds: { minX: 0, minY: 0, maxX: 99, maxY: 0 },
    ips: [ipAt(ipX, 0)],
  };
}

describe('computeViewport', () => {
  it('shows the whole box when it fits', () => {
    const snap = frameAfter('12+.@', 0).snapshot;
    expect(computeViewport(snap, 20, 6)).toEqual({ left: 0, top: 0, right: 5, bottom: 1 });
  });

  it('centres on the IP when the box is too wide', () => {
    expect(computeViewport(wideSnapshot(50), 20, 6)).toEqual({ left: 40, top: 0, right: 60, bottom: 1 });
  });

  it('does not scroll past the left edge', () => {
    expect(computeViewport(wideSnapshot(3), 20, 6)).toEqual({ left: 0, top: 0, right: 20, bottom: 1 });
  });
});

describe('wrapText', () => {
  it('splits long lines and drops empty ones', () => {
    expect(wrapText('abcdefg\n\nxy', 3)).toEqual(['abc', 'def', 'g', 'xy']);
  });
});

describe('renderFrame', () => {
  it('lays out grid, positions, stacks, output and help', () => {
    const lines = renderFrame(frameAfter('12+.@', 2), { columns: 20, rows: 12 }, false);
    expect(lines).toEqual([
      '12+.@',
      '',
      'top-left: 0, 0, ip pos: [[2, 0]], offset: [[0, 0]]',
      '',
      'stacks:',
      'ip 0: [1, 2]',
      '',
      'output:',
      '',
      'steps: 2',
      '',
      'esc: quit, backspace: back, space: run, enter: step, interval: 0.05 up/down arrow',
    ]);
  });

  it('highlights IPs and breakpoints', () => {
    const state = frameAfter('12+.@', 2, { breakpoints: [[4, 0]] });
    const lines = renderFrame(state, { columns: 20, rows: 12 });
    expect(lines[0]).toBe('12\x1b[7m+\x1b[27m.\x1b[41m@\x1b[49m');
  });

  it('reports the exit code once halted', () => {
    const lines = renderFrame(frameAfter('@', 1, { canStepBack: false }), { columns: 20, rows: 12 }, false);
    expect(lines[2]).toBe('top-left: 0, 0, ip pos: [], offset: []');
    expect(lines[8]).toBe('steps: 1, exit code: 0');
    expect(lines[11]).toBe('esc: quit, space: run, enter: step, interval: 0.05 up/down arrow');
  });

  it('shows the stop reason and the tail of the output', () => {
    const state = frameAfter('12+.@', 2, { lastStop: 'breakpoint', output: 'one\ntwo\nthree', running: true });
    const lines = renderFrame(state, { columns: 20, rows: 13 }, false);
    expect(lines.slice(7, 12)).toEqual(['output:', 'two', 'three', '', 'steps: 2, stopped: breakpoint']);
    expect(lines[12]).toBe('esc: quit, backspace: back, space: pause, enter: step, interval: 0.05 up/down arrow');
  });

  it('drops stacks and output when the terminal is short', () => {
    const lines = renderFrame(frameAfter('12+.@', 2), { columns: 20, rows: 4 }, false);
    expect(lines).toEqual([
      '12+.@',
      '',
      'top-left: 0, 0, ip pos: [[2, 0]], offset: [[0, 0]]',
      'esc: quit, backspace: back, space: run, enter: step, interval: 0.05 up/down arrow',
    ]);
  });
});

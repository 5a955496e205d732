/**
 * `y` layout tests.
 */
import { describe, it, expect } from 'vitest';
import { HANDPRINT } from './constants';
import { BufferedOutput } from './io';
import { FungeInterpreter } from './interpreter';
import { InstructionPointer } from './ip';
import { buildSysInfo, pushSysInfo } from './sysinfo';
import type { SysInfoEnvironment } from './sysinfo';
import type { Bounds, FileSystemPort } from './types';

const BOUNDS: Bounds = { minX: 0, minY: 0, maxX: 4, maxY: 2 };

function environment(): SysInfoEnvironment {
  return {
    cellBits: 32,
    fileIo: false,
    programName: 'p',
    args: ['a'],
    env: { K: 'V' },
    pathSeparator: '/',
    now: new Date(2024, 0, 2, 3, 4, 5),
  };
}

function freshIp(): InstructionPointer {
  const ip = new InstructionPointer(0);
  ip.stack.push(7);
  return ip;
}

describe('buildSysInfo', () => {
  it('lays out every cell bottom first', () => {
    expect(buildSysInfo(freshIp(), BOUNDS, environment())).toEqual([
      0, 0, 86, 61, 75,          // env "K=V"
      0, 0, 97, 0, 112,          // program name "p", arg "a"
      1,                         // TOSS size
      1,                         // stack count
      3 * 65536 + 4 * 256 + 5,   // time
      124 * 65536 + 1 * 256 + 2, // date
      4, 2,                      // greatest point relative to least
      0, 0,                      // least point
      0, 0,                      // storage offset
      1, 0,                      // delta
      0, 0,                      // position
      0, 0, 2, 47, 0, 100, HANDPRINT, 4, 17,
    ]);
  });
});

describe('pushSysInfo', () => {
  it('leaves everything for n <= 0', () => {
    const ip = freshIp();
    pushSysInfo(ip, 0, BOUNDS, environment());
    expect(ip.stack.toss.size).toBe(1 + 33);
    expect(ip.stack.peek()).toBe(17);
  });

  it('picks the n-th cell from the top for n > 0', () => {
    const pick = (n: number): number[] => {
      const ip = freshIp();
      pushSysInfo(ip, n, BOUNDS, environment());
      return ip.stack.toss.toArray();
    };
    expect(pick(1)).toEqual([7, 17]);
    expect(pick(4)).toEqual([7, 100]);
    expect(pick(6)).toEqual([7, 47]);
    expect(pick(22)).toEqual([7, 1]);
    expect(pick(23)).toEqual([7, 1]);
    expect(pick(24)).toEqual([7, 112]);
    expect(pick(34)).toEqual([7, 7]);
    expect(pick(500)).toEqual([7, 0]);
  });
});

describe('y instruction', () => {
  const files: FileSystemPort = {
    readFile: () => null,
    writeFile: () => false,
  };

  it('reports file I/O support in the flags cell', () => {
    const run = (withFiles: boolean): string => {
      const output = new BufferedOutput();
      const interp = new FungeInterpreter({ output, files: withFiles ? files : null });
      interp.loadSource('1y.@');
      while (interp.tick()) { /* run to completion */ }
      return output.getText();
    };
    expect(run(false)).toBe('17 ');
    expect(run(true)).toBe('23 ');
  });

  it('reports the cell width', () => {
    const output = new BufferedOutput();
    const interp = new FungeInterpreter({ output, cellBits: 16 });
    interp.loadSource('2y.@');
    while (interp.tick()) { /* run to completion */ }
    expect(output.getText()).toBe('2 ');
  });
});

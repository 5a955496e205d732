import { describe, it, expect } from 'vitest';
import { LoadError, decodeSource, loadSource, splitLines } from './loader';
import { FungeVersion } from './types';

describe('splitLines', () => {
  it('accepts every line terminator and drops form feeds', () => {
    expect(splitLines('a\r\nb\rc\nd\f')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('does not add a line for a trailing terminator', () => {
    expect(splitLines('ab\n')).toEqual(['ab']);
    expect(splitLines('ab\n\n')).toEqual(['ab', '']);
  });
});

describe('loadSource', () => {
  it('returns non-space cells with their coordinates', () => {
    const program = loadSource('1 2\n @');
    expect(program.cells).toEqual([[0, 0, 0x31], [2, 0, 0x32], [1, 1, 0x40]]);
    expect(program.width).toBe(3);
    expect(program.height).toBe(2);
  });

  it('skips a leading interpreter line', () => {
    const program = loadSource('#!/usr/bin/env lahey\n5.@');
    expect(program.cells[0]).toEqual([0, 0, 0x35]);
    expect(program.height).toBe(1);
  });

  it('keeps a leading # line that names no interpreter', () => {
    expect(loadSource('#!@').cells).toHaveLength(3);
  });

  it('reads bytes as Latin-1', () => {
    expect(decodeSource(Uint8Array.from([0x41, 0xE9]))).toBe('Aé');
    expect(loadSource(Uint8Array.from([0xE9])).cells).toEqual([[0, 0, 0xE9]]);
  });

  it('rejects Befunge-93 sources larger than 80x25', () => {
    const wide = 'v'.repeat(81);
    expect(() => loadSource(wide, { version: FungeVersion.B93 })).toThrow(LoadError);
    expect(() => loadSource(wide)).not.toThrow();
    const tall = Array.from({ length: 26 }, () => '@').join('\n');
    expect(() => loadSource(tall, { version: FungeVersion.B93 })).toThrow(
      'Befunge-93 source is 1x26, larger than 80x25',
    );
  });

  it('loads an empty source', () => {
    expect(loadSource('')).toEqual({ cells: [], width: 0, height: 0 });
  });
});

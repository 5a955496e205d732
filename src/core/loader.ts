/**
 * Program loader: source text or bytes -> initial Funge-Space cells.
 */
import { BEFUNGE93_HEIGHT, BEFUNGE93_WIDTH, SPACE } from './constants';
import { FungeVersion } from './types';
import type { Cell } from './types';

export class LoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoadError';
  }
}

export interface LoadOptions {
  version?: FungeVersion;
}

export interface LoadedProgram {
  /** Non-space cells as [x, y, value]. */
  cells: [number, number, Cell][];
  width: number;
  height: number;
}

/** Bytes are read as Latin-1, one cell per byte. */
export function decodeSource(source: string | Uint8Array): string {
  if (typeof source === 'string') return source;
  let text = '';
  for (const byte of source) text += String.fromCharCode(byte);
  return text;
}

/**
 * Split source text into lines: `\r\n`, `\r` and `\n` end a line, form
 * feeds are dropped, and a trailing line terminator adds no empty line.
 */
export function splitLines(text: string): string[] {
  const lines = text.replace(/\f/g, '').split(/\r\n|\r|\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function isShebang(line: string): boolean {
  return line.startsWith('#!') && line.includes('lahey');
}

export function loadSource(source: string | Uint8Array, options: LoadOptions = {}): LoadedProgram {
  const version = options.version ?? FungeVersion.B98;
  let lines = splitLines(decodeSource(source));
  if (lines.length > 0 && isShebang(lines[0])) lines = lines.slice(1);
  if (lines.length === 1 && lines[0] === '') lines = [];

  const cells: [number, number, Cell][] = [];
  let width = 0;
  lines.forEach((line, y) => {
    const chars = Array.from(line);
    width = Math.max(width, chars.length);
    chars.forEach((ch, x) => {
      const value = ch.codePointAt(0) ?? SPACE;
      if (value !== SPACE) cells.push([x, y, value]);
    });
  });
  const height = lines.length;

  if (version === FungeVersion.B93 && (width > BEFUNGE93_WIDTH || height > BEFUNGE93_HEIGHT)) {
    throw new LoadError(
      `Befunge-93 source is ${width}x${height}, larger than ${BEFUNGE93_WIDTH}x${BEFUNGE93_HEIGHT}`,
    );
  }
  return { cells, width, height };
}

import { FungeVersion } from './types';
import type { CellBits } from './types';

export const SPACE = 0x20;
export const SEMICOLON = 0x3B;
export const QUOTE = 0x22;

/** Interpreter version as reported by `y` (1.0.0). */
export const VERSION_NUMBER = 100;

export const DEFAULT_CELL_BITS: CellBits = 32;

/** Zero cells a single `{`, `}` or `u` may add beyond the cells it has; more reflects. */
export const MAX_ZERO_FILL = 1 << 20;

/** Largest rectangle `o` writes without trimming; larger reflects. */
export const MAX_OUTPUT_CELLS = 1 << 24;

export const BEFUNGE93_WIDTH = 80;
export const BEFUNGE93_HEIGHT = 25;

const B93_SET = '!"#$%&*+,-./0123456789:<>?@\\^_`gpv|~ ';
const B97_SET = B93_SET + "'abcdef";
const B98_SET = '!"#$%&\'()*+,-./0123456789:;<>?@[\\]^_`abcdefghijklmnopqrstuvwxyz{|}~ '
  + 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

// Instruction sets indexed by version (char code -> allowed)
export const INSTRUCTION_SETS: Record<FungeVersion, ReadonlySet<number>> = {
  B93: toCodeSet(B93_SET),
  B97: toCodeSet(B97_SET),
  B98: toCodeSet(B98_SET),
};

/** Befunge-93/97 ignore unknown instructions; Funge-98 reflects. */
export const REFLECT_UNKNOWN: Record<FungeVersion, boolean> = {
  B93: false,
  B97: false,
  B98: true,
};

function toCodeSet(chars: string): ReadonlySet<number> {
  return new Set(Array.from(chars, c => c.charCodeAt(0)));
}

export class UnknownVersionError extends Error {
  constructor(readonly requested: string) {
    super(`Unrecognized version: ${requested} (expected 93, 97 or 98)`);
    this.name = 'UnknownVersionError';
  }
}

/** Accepts "93", "B93", "b98", ... */
export function parseVersion(text: string): FungeVersion {
  const key = text.toUpperCase().startsWith('B') ? text.toUpperCase() : `B${text}`;
  switch (key) {
    case FungeVersion.B93: return FungeVersion.B93;
    case FungeVersion.B97: return FungeVersion.B97;
    case FungeVersion.B98: return FungeVersion.B98;
    default: throw new UnknownVersionError(text);
  }
}

/** Pack up to four characters into a 32-bit code, first character most significant. */
export function packCode(text: string): number {
  let code = 0;
  for (const ch of text) {
    code = (Math.imul(code, 256) + ch.charCodeAt(0)) | 0;
  }
  return code;
}

export const HANDPRINT = packCode('LAHY');

// ============================================================================
// Cell width
// ============================================================================

/** Wrap an integer into a signed cell of the given width (two's complement). */
export function toCell(value: number, bits: CellBits = DEFAULT_CELL_BITS): number {
  switch (bits) {
    case 32: return value | 0;
    case 16: return (value << 16) >> 16;
    case 8: return (value << 24) >> 24;
  }
}

/** Multiply two cells without losing low bits past 2^53. */
export function mulCell(a: number, b: number, bits: CellBits = DEFAULT_CELL_BITS): number {
  return toCell(Math.imul(a, b), bits);
}

export function parseCellBits(text: string): CellBits | null {
  switch (text) {
    case '8': return 8;
    case '16': return 16;
    case '32': return 32;
    default: return null;
  }
}

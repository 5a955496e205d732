/**
 * Fingerprints shipped with the interpreter: NULL, ROMA, BOOL, MODU, BASE.
 */
import { toCell } from '../constants';
import { attemptRead } from '../io';
import type { InstructionPointer } from '../ip';
import { defineFingerprint, FingerprintRegistry } from './registry';
import type { Fingerprint, FingerprintContext, FingerprintOp } from './registry';

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

const reflect: FingerprintOp = ip => ip.reflect();

function pushValue(value: number): FingerprintOp {
  return (ip, ctx) => ip.stack.push(toCell(value, ctx.cellBits));
}

/** Pop b then a and push op(a, b). */
function binary(op: (a: number, b: number) => number): FingerprintOp {
  return (ip, ctx) => {
    const b = ip.stack.pop();
    const a = ip.stack.pop();
    ip.stack.push(toCell(op(a, b), ctx.cellBits));
  };
}

export const NULL_FINGERPRINT: Fingerprint = defineFingerprint(
  'NULL',
  Object.fromEntries(Array.from(LETTERS, l => [l, reflect] as const)),
);

export const ROMA_FINGERPRINT: Fingerprint = defineFingerprint('ROMA', {
  C: pushValue(100),
  D: pushValue(500),
  I: pushValue(1),
  L: pushValue(50),
  M: pushValue(1000),
  V: pushValue(5),
  X: pushValue(10),
});

export const BOOL_FINGERPRINT: Fingerprint = defineFingerprint('BOOL', {
  A: binary((a, b) => a & b),
  O: binary((a, b) => a | b),
  X: binary((a, b) => a ^ b),
  N: (ip, ctx) => ip.stack.push(toCell(~ip.stack.pop(), ctx.cellBits)),
});

export const MODU_FINGERPRINT: Fingerprint = defineFingerprint('MODU', {
  // floored: result takes the sign of the divisor
  M: binary((a, b) => (b === 0 ? 0 : a - Math.floor(a / b) * b)),
  // never negative
  U: binary((a, b) => {
    if (b === 0) return 0;
    const r = a % b;
    return r < 0 ? r + Math.abs(b) : r;
  }),
  // C remainder: sign of the dividend
  R: binary((a, b) => (b === 0 ? 0 : a % b)),
});

function writeInBase(ip: InstructionPointer, ctx: FingerprintContext, base: number): void {
  const value = ip.stack.pop();
  ctx.output.writeText(`${value.toString(base)} `);
}

function isRadix(base: number): boolean {
  return base >= 2 && base <= 36;
}

export const BASE_FINGERPRINT: Fingerprint = defineFingerprint('BASE', {
  B: (ip, ctx) => writeInBase(ip, ctx, 2),
  H: (ip, ctx) => writeInBase(ip, ctx, 16),
  O: (ip, ctx) => writeInBase(ip, ctx, 8),
  N: (ip, ctx) => {
    const base = ip.stack.pop();
    if (!isRadix(base)) {
      ip.stack.pop();
      ip.reflect();
      return;
    }
    writeInBase(ip, ctx, base);
  },
  I: (ip, ctx) => {
    const base = ip.stack.pop();
    if (!isRadix(base)) {
      ip.reflect();
      return;
    }
    attemptRead(ip, { base }, ctx.input, ctx.cellBits);
  },
});

export const BUILTIN_FINGERPRINTS: readonly Fingerprint[] = [
  NULL_FINGERPRINT,
  ROMA_FINGERPRINT,
  BOOL_FINGERPRINT,
  MODU_FINGERPRINT,
  BASE_FINGERPRINT,
];

export function createDefaultRegistry(): FingerprintRegistry {
  return new FingerprintRegistry(BUILTIN_FINGERPRINTS);
}

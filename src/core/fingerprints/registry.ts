/**
 * Fingerprint registry: a static table from fingerprint code to the opcode
 * overrides it provides. Overrides are resolved by explicit lookup at
 * dispatch time through the IP's per-letter stacks.
 */
import type { InstructionPointer } from '../ip';
import type { FungeSpace } from '../space';
import type { CellBits, InputPort, OutputPort } from '../types';
import { packCode } from '../constants';

/** What a fingerprint instruction may touch besides its own IP. */
export interface FingerprintContext {
  readonly space: FungeSpace;
  readonly output: OutputPort;
  readonly input: InputPort;
  readonly cellBits: CellBits;
}

export type FingerprintOp = (ip: InstructionPointer, ctx: FingerprintContext) => void;

export interface Fingerprint {
  readonly name: string;
  readonly code: number;
  /** Letter ('A'..'Z') -> behavior. */
  readonly ops: Readonly<Partial<Record<string, FingerprintOp>>>;
}

export function defineFingerprint(
  name: string,
  ops: Readonly<Partial<Record<string, FingerprintOp>>>,
): Fingerprint {
  return { name, code: packCode(name), ops };
}

/** Letters a fingerprint defines, as char codes in alphabetical order. */
export function fingerprintLetters(fp: Fingerprint): number[] {
  return Object.keys(fp.ops)
    .filter(k => /^[A-Z]$/.test(k))
    .sort()
    .map(k => k.charCodeAt(0));
}

/** Fold cells (first popped = most significant) into a fingerprint code. */
export function fingerprintCode(cells: readonly number[]): number {
  let code = 0;
  for (const c of cells) {
    code = (Math.imul(code, 256) + c) | 0;
  }
  return code;
}

export class FingerprintRegistry {
  private readonly table: ReadonlyMap<number, Fingerprint>;

  constructor(fingerprints: readonly Fingerprint[]) {
    this.table = new Map(fingerprints.map(fp => [fp.code, fp]));
  }

  lookup(code: number): Fingerprint | undefined {
    return this.table.get(code);
  }

  /** Behavior for `letter` under fingerprint `code`, if that fingerprint defines it. */
  resolve(code: number, letter: number): FingerprintOp | undefined {
    return this.table.get(code)?.ops[String.fromCharCode(letter)];
  }

  list(): Fingerprint[] {
    return [...this.table.values()];
  }
}

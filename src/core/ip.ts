/**
 * Instruction pointer state: position, delta, storage offset, string mode,
 * stack stack and per-letter fingerprint stacks.
 */
import { StackStack } from './stack';
import { IpStatus } from './types';
import type { Cell, IpSnapshot, PendingRead, Vector } from './types';

export const EAST: Vector = [1, 0];
export const WEST: Vector = [-1, 0];
export const NORTH: Vector = [0, -1];
export const SOUTH: Vector = [0, 1];

/** `k` iterations still owed when its operand suspended on input. */
export interface PendingRepeat {
  operand: Cell;
  remaining: number;
  /** Position of the `k` cell. */
  origin: Vector;
  /** Operand cell, where the IP lands if the operand never moved it. */
  target: Vector;
}

// Zero components stay +0
const negate = (v: number): number => (v === 0 ? 0 : -v);

export class InstructionPointer {
  readonly id: number;
  status: IpStatus = IpStatus.RUNNING;
  position: Vector = [0, 0];
  delta: Vector = EAST;
  storageOffset: Vector = [0, 0];
  stringMode = false;
  stack: StackStack;
  pendingRead: PendingRead | null = null;
  pendingRepeat: PendingRepeat | null = null;

  // Letter ('A'..'Z' char code) -> stack of fingerprint codes, top last
  private fingerprintOps: Map<number, number[]> = new Map();

  constructor(id: number, stack: StackStack = new StackStack()) {
    this.id = id;
    this.stack = stack;
  }

  // ========================================================================
  // Direction
  // ========================================================================

  reflect(): void {
    this.delta = [negate(this.delta[0]), negate(this.delta[1])];
  }

  turnLeft(): void {
    this.delta = [this.delta[1], negate(this.delta[0])];
  }

  turnRight(): void {
    this.delta = [negate(this.delta[1]), this.delta[0]];
  }

  // ========================================================================
  // Fingerprint letter stacks
  // ========================================================================

  /** Fingerprint code currently bound to `letter`, or undefined. */
  boundFingerprint(letter: number): number | undefined {
    const codes = this.fingerprintOps.get(letter);
    return codes && codes.length > 0 ? codes[codes.length - 1] : undefined;
  }

  bindFingerprint(letter: number, code: number): void {
    const codes = this.fingerprintOps.get(letter);
    if (codes) codes.push(code);
    else this.fingerprintOps.set(letter, [code]);
  }

  /** Pop `code` from `letter` if it is on top. Returns whether anything was popped. */
  unbindFingerprint(letter: number, code: number): boolean {
    const codes = this.fingerprintOps.get(letter);
    if (!codes || codes.length === 0 || codes[codes.length - 1] !== code) return false;
    codes.pop();
    if (codes.length === 0) this.fingerprintOps.delete(letter);
    return true;
  }

  // ========================================================================
  // Split / snapshot
  // ========================================================================

  /** Deep copy under a new id (split, debugger history). */
  clone(id: number = this.id): InstructionPointer {
    const copy = new InstructionPointer(id, this.stack.clone());
    copy.status = this.status;
    copy.position = this.position;
    copy.delta = this.delta;
    copy.storageOffset = this.storageOffset;
    copy.stringMode = this.stringMode;
    copy.pendingRead = this.pendingRead;
    copy.pendingRepeat = this.pendingRepeat;
    for (const [letter, codes] of this.fingerprintOps) {
      copy.fingerprintOps.set(letter, [...codes]);
    }
    return copy;
  }

  getSnapshot(): IpSnapshot {
    const fingerprints: Record<string, number[]> = {};
    for (const [letter, codes] of this.fingerprintOps) {
      fingerprints[String.fromCharCode(letter)] = [...codes];
    }
    return {
      id: this.id,
      status: this.status,
      position: this.position,
      delta: this.delta,
      storageOffset: this.storageOffset,
      stringMode: this.stringMode,
      stacks: this.stack.toArrays(),
      fingerprints,
    };
  }
}

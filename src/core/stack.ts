/**
 * Funge stacks.
 * A FungeStack never underflows: popping an empty stack yields 0.
 * A StackStack always holds at least one stack; the last one is the TOSS.
 */
import { MAX_ZERO_FILL } from './constants';
import type { Cell, Vector } from './types';

// Whether moving `count` cells out of `available` would invent too many zeros
const overfills = (count: number, available: number): boolean => count - available > MAX_ZERO_FILL;

export class FungeStack {
  private body: Cell[];

  constructor(cells: Cell[] = []) {
    this.body = cells;
  }

  push(value: Cell): void {
    this.body.push(value);
  }

  pop(): Cell {
    return this.body.pop() ?? 0;
  }

  peek(): Cell {
    return this.body.length > 0 ? this.body[this.body.length - 1] : 0;
  }

  /** Pop `n` cells and return them in push order (deepest first); missing cells are 0. */
  popMany(n: number): Cell[] {
    const cells = new Array<Cell>(n).fill(0);
    for (let i = n - 1; i >= 0; i--) {
      cells[i] = this.pop();
    }
    return cells;
  }

  pushMany(cells: readonly Cell[]): void {
    for (const c of cells) this.body.push(c);
  }

  clear(): void {
    this.body = [];
  }

  get size(): number {
    return this.body.length;
  }

  /** Cell `n` places below the top (0 = top); 0 when out of range. */
  at(n: number): Cell {
    const idx = this.body.length - 1 - n;
    return idx >= 0 && idx < this.body.length ? this.body[idx] : 0;
  }

  /** Bottom-to-top copy. */
  toArray(): Cell[] {
    return [...this.body];
  }

  clone(): FungeStack {
    return new FungeStack([...this.body]);
  }
}

export class StackStack {
  private stacks: FungeStack[];

  constructor(stacks: FungeStack[] = [new FungeStack()]) {
    this.stacks = stacks.length > 0 ? stacks : [new FungeStack()];
  }

  /** Top of stack stack. */
  get toss(): FungeStack {
    return this.stacks[this.stacks.length - 1];
  }

  /** Second on stack stack, or null with a single stack. */
  get soss(): FungeStack | null {
    return this.stacks.length > 1 ? this.stacks[this.stacks.length - 2] : null;
  }

  get depth(): number {
    return this.stacks.length;
  }

  push(value: Cell): void {
    this.toss.push(value);
  }

  pop(): Cell {
    return this.toss.pop();
  }

  peek(): Cell {
    return this.toss.peek();
  }

  pushVector(v: Vector): void {
    this.toss.push(v[0]);
    this.toss.push(v[1]);
  }

  popVector(): Vector {
    const y = this.toss.pop();
    const x = this.toss.pop();
    return [x, y];
  }

  /** Clear the TOSS only. */
  clear(): void {
    this.toss.clear();
  }

  // ========================================================================
  // Block operations ({ } u)
  // ========================================================================

  /**
   * `{`: open a new TOSS. Positive n carries n cells over (order preserved),
   * negative n pads the old TOSS with |n| zeros. The old storage offset is
   * saved on what becomes the SOSS. Returns false, changing nothing, when
   * the zero padding would be too large.
   */
  beginBlock(n: number, storageOffset: Vector): boolean {
    const old = this.toss;
    if (n > 0 ? overfills(n, old.size) : overfills(-n, 0)) return false;
    const carried = n > 0 ? old.popMany(n) : [];
    for (let i = 0; i < -n; i++) old.push(0);
    old.push(storageOffset[0]);
    old.push(storageOffset[1]);
    this.stacks.push(new FungeStack(carried));
    return true;
  }

  /**
   * `}`: close the TOSS. Returns the restored storage offset, or null when
   * there is no SOSS or the zero padding would be too large (the caller
   * reflects).
   */
  endBlock(n: number): Vector | null {
    if (this.stacks.length < 2) return null;
    if (n > 0 && overfills(n, this.toss.size)) return null;
    const carried = n > 0 ? this.toss.popMany(n) : [];
    this.stacks.pop();
    const offset = this.popVector();
    if (n > 0) {
      this.toss.pushMany(carried);
    } else {
      const drop = Math.min(-n, this.toss.size);
      for (let i = 0; i < drop; i++) this.toss.pop();
    }
    return offset;
  }

  /**
   * `u`: move cells one at a time between SOSS and TOSS.
   * Positive n moves SOSS -> TOSS, negative n moves TOSS -> SOSS.
   * Returns false when there is no SOSS or the zero padding would be too large.
   */
  transfer(n: number): boolean {
    const soss = this.soss;
    if (!soss) return false;
    const toss = this.toss;
    if (n > 0 ? overfills(n, soss.size) : overfills(-n, toss.size)) return false;
    if (n > 0) {
      for (let i = 0; i < n; i++) toss.push(soss.pop());
    } else {
      for (let i = 0; i < -n; i++) soss.push(toss.pop());
    }
    return true;
  }

  /** Stack sizes, TOSS first. */
  sizes(): number[] {
    const result: number[] = [];
    for (let i = this.stacks.length - 1; i >= 0; i--) {
      result.push(this.stacks[i].size);
    }
    return result;
  }

  /** Every stack, bottom stack first. */
  toArrays(): Cell[][] {
    return this.stacks.map(s => s.toArray());
  }

  clone(): StackStack {
    return new StackStack(this.stacks.map(s => s.clone()));
  }
}

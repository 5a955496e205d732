/**
 * Funge-Space: sparse 2-D grid of cells with a tracked bounding box.
 *
 * Cells are stored per row (y -> x -> value); unset cells read as space.
 * The bounding box only grows: it always contains the origin and every
 * coordinate ever written. Wrapping is derived from the current box.
 */
import { SPACE } from './constants';
import type { Bounds, Cell, Vector } from './types';

export interface CellWrite {
  x: number;
  y: number;
  previous: Cell;
}

export class FungeSpace {
  private rows: Map<number, Map<number, Cell>> = new Map();
  private minX = 0;
  private minY = 0;
  private maxX = 0;
  private maxY = 0;

  // Undo log of writes (debugger history), null when not recording
  private journal: CellWrite[] | null = null;

  get(x: number, y: number): Cell {
    return this.rows.get(y)?.get(x) ?? SPACE;
  }

  set(x: number, y: number, value: Cell): void {
    if (this.journal) {
      this.journal.push({ x, y, previous: this.get(x, y) });
    }
    this.store(x, y, value);
    this.include(x, y);
  }

  private store(x: number, y: number, value: Cell): void {
    let row = this.rows.get(y);
    if (value === SPACE) {
      if (row) {
        row.delete(x);
        if (row.size === 0) this.rows.delete(y);
      }
      return;
    }
    if (!row) {
      row = new Map();
      this.rows.set(y, row);
    }
    row.set(x, value);
  }

  private include(x: number, y: number): void {
    if (x < this.minX) this.minX = x;
    if (x > this.maxX) this.maxX = x;
    if (y < this.minY) this.minY = y;
    if (y > this.maxY) this.maxY = y;
  }

  bounds(): Bounds {
    return { minX: this.minX, minY: this.minY, maxX: this.maxX, maxY: this.maxY };
  }

  contains(x: number, y: number): boolean {
    return x >= this.minX && x <= this.maxX && y >= this.minY && y <= this.maxY;
  }

  /** Number of non-space cells stored. */
  get population(): number {
    let n = 0;
    for (const row of this.rows.values()) n += row.size;
    return n;
  }

  // ========================================================================
  // Movement
  // ========================================================================

  /**
   * Next position along `delta`, wrapping Lahey-style: leaving the box
   * re-enters on the opposite face along the same line. A position already
   * outside the box keeps moving.
   */
  next(position: Vector, delta: Vector): Vector {
    const [px, py] = position;
    const [dx, dy] = delta;
    const cx = px + dx;
    const cy = py + dy;
    if (this.contains(cx, cy) || !this.contains(px, py)) return [cx, cy];

    // Largest k such that candidate - j*delta stays inside for j = 1..k
    const back = this.stepsInside(cx, cy, dx, dy);
    return [cx - back * dx, cy - back * dy];
  }

  /**
   * How many steps back along `delta` from (x, y) remain inside the box,
   * assuming the first step back is inside.
   */
  private stepsInside(x: number, y: number, dx: number, dy: number): number {
    let k = Infinity;
    if (dx > 0) k = Math.min(k, Math.floor((x - this.minX) / dx));
    else if (dx < 0) k = Math.min(k, Math.floor((this.maxX - x) / -dx));
    if (dy > 0) k = Math.min(k, Math.floor((y - this.minY) / dy));
    else if (dy < 0) k = Math.min(k, Math.floor((this.maxY - y) / -dy));
    return Number.isFinite(k) ? k : 0;
  }

  /**
   * Number of distinct cells an IP visits on its wrapped line before it
   * returns to `position` (1 for a zero delta or a position outside the box).
   */
  orbitLength(position: Vector, delta: Vector): number {
    const [px, py] = position;
    const [dx, dy] = delta;
    if ((dx === 0 && dy === 0) || !this.contains(px, py)) return 1;
    const ahead = this.stepsInside(px, py, -dx, -dy);
    const behind = this.stepsInside(px, py, dx, dy);
    return ahead + behind + 1;
  }

  // ========================================================================
  // Bulk access
  // ========================================================================

  /** Write every non-space cell; spaces are transparent. */
  loadCells(cells: Iterable<[number, number, Cell]>): void {
    for (const [x, y, value] of cells) {
      if (value !== SPACE) this.set(x, y, value);
    }
  }

  /** Iterate every stored (non-space) cell. */
  *entries(): IterableIterator<[number, number, Cell]> {
    for (const [y, row] of this.rows) {
      for (const [x, value] of row) {
        yield [x, y, value];
      }
    }
  }

  /** Render rows of the rectangle [left, right) x [top, bottom) as printable text. */
  renderRows(left: number, top: number, right: number, bottom: number): string[] {
    const lines: string[] = [];
    for (let y = top; y < bottom; y++) {
      let line = '';
      for (let x = left; x < right; x++) {
        line += printable(this.get(x, y));
      }
      lines.push(line);
    }
    return lines;
  }

  // ========================================================================
  // Journal (debugger history)
  // ========================================================================

  startJournal(): void {
    this.journal = [];
  }

  takeJournal(): CellWrite[] {
    const writes = this.journal ?? [];
    this.journal = [];
    return writes;
  }

  stopJournal(): void {
    this.journal = null;
  }

  /** Undo writes (newest first) and restore the bounding box. */
  revert(writes: readonly CellWrite[], bounds: Bounds): void {
    for (let i = writes.length - 1; i >= 0; i--) {
      const w = writes[i];
      this.store(w.x, w.y, w.previous);
    }
    this.minX = bounds.minX;
    this.minY = bounds.minY;
    this.maxX = bounds.maxX;
    this.maxY = bounds.maxY;
  }
}

/** Printable glyph for a cell: Latin-1 printable range, otherwise the currency sign. */
export function printable(value: Cell): string {
  if ((value >= 32 && value <= 126) || (value >= 161 && value <= 255)) {
    return String.fromCharCode(value);
  }
  return '¤';
}

/**
 * `y` (Get SysInfo): builds the Funge-98 system information cells.
 */
import { HANDPRINT, VERSION_NUMBER, toCell } from './constants';
import type { InstructionPointer } from './ip';
import type { Bounds, Cell, CellBits } from './types';

export interface SysInfoEnvironment {
  cellBits: CellBits;
  fileIo: boolean;
  programName: string;
  args: readonly string[];
  env: Readonly<Record<string, string>>;
  pathSeparator: string;
  now: Date;
}

// Flag bits reported in cell 1
const FLAG_CONCURRENT = 0x01;
const FLAG_FILE_INPUT = 0x02;
const FLAG_FILE_OUTPUT = 0x04;
const FLAG_UNBUFFERED = 0x10;

/** Characters of `text` followed by a terminating 0, in reading order. */
function zeroTerminated(text: string): Cell[] {
  const cells = Array.from(text, ch => ch.codePointAt(0) ?? 0);
  cells.push(0);
  return cells;
}

/**
 * Cells to push for `y`, bottom first (so the last element ends up on top).
 * Stack sizes are measured before anything is pushed.
 */
export function buildSysInfo(ip: InstructionPointer, bounds: Bounds, sys: SysInfoEnvironment): Cell[] {
  const cells: Cell[] = [];

  // 20: environment, "KEY=VALUE" strings, terminated by an extra 0
  const envCells: Cell[] = [];
  for (const [key, value] of Object.entries(sys.env)) {
    envCells.push(...zeroTerminated(`${key}=${value}`));
  }
  envCells.push(0);
  cells.push(...envCells.reverse());

  // 19: command line, program name first, terminated by an extra 0
  const argCells: Cell[] = [...zeroTerminated(sys.programName)];
  for (const arg of sys.args) argCells.push(...zeroTerminated(arg));
  argCells.push(0);
  cells.push(...argCells.reverse());

  // 18: size of each stack, TOSS on top
  cells.push(...ip.stack.sizes().reverse());
  // 17: number of stacks
  cells.push(ip.stack.depth);

  const now = sys.now;
  // 16: time, 15: date
  cells.push(now.getHours() * 256 * 256 + now.getMinutes() * 256 + now.getSeconds());
  cells.push((now.getFullYear() - 1900) * 256 * 256 + (now.getMonth() + 1) * 256 + now.getDate());

  // 14: greatest point relative to least point, 13: least point
  cells.push(bounds.maxX - bounds.minX, bounds.maxY - bounds.minY);
  cells.push(bounds.minX, bounds.minY);

  // 12: storage offset, 11: delta, 10: position
  cells.push(...ip.storageOffset);
  cells.push(...ip.delta);
  cells.push(...ip.position);

  cells.push(0);                                    // 9: team number
  cells.push(ip.id);                                // 8: IP id
  cells.push(2);                                    // 7: dimensions
  cells.push(sys.pathSeparator.charCodeAt(0));      // 6: path separator
  cells.push(0);                                    // 5: operating paradigm (no `=`)
  cells.push(VERSION_NUMBER);                       // 4: version
  cells.push(HANDPRINT);                            // 3: handprint
  cells.push(sys.cellBits / 8);                     // 2: bytes per cell

  let flags = FLAG_CONCURRENT | FLAG_UNBUFFERED;    // 1: flags
  if (sys.fileIo) flags |= FLAG_FILE_INPUT | FLAG_FILE_OUTPUT;
  cells.push(flags);

  return cells;
}

/**
 * Execute `y n` against the IP's TOSS: n <= 0 leaves every cell pushed,
 * n > 0 leaves only the n-th cell from the top (0 when out of range).
 */
export function pushSysInfo(ip: InstructionPointer, n: number, bounds: Bounds, sys: SysInfoEnvironment): void {
  const cells = buildSysInfo(ip, bounds, sys);
  const toss = ip.stack.toss;
  toss.pushMany(cells.map(c => toCell(c, sys.cellBits)));
  if (n > 0) {
    const picked = toss.at(n - 1);
    for (let i = 0; i < cells.length; i++) toss.pop();
    toss.push(picked);
  }
}

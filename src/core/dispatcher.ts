/**
 * Instruction dispatcher: decodes the cell under an IP and executes it
 * against Funge-Space and the IP's stacks, then moves the IP on to its next
 * executable cell. Every cell value has defined behavior; nothing here throws.
 */
import {
  INSTRUCTION_SETS, MAX_OUTPUT_CELLS, QUOTE, REFLECT_UNKNOWN, SEMICOLON, SPACE,
  mulCell, toCell,
} from './constants';
import { fingerprintCode, fingerprintLetters } from './fingerprints/registry';
import type { FingerprintContext, FingerprintRegistry } from './fingerprints/registry';
import { attemptRead } from './io';
import { EAST, NORTH, SOUTH, WEST } from './ip';
import type { InstructionPointer, PendingRepeat } from './ip';
import { splitLines } from './loader';
import type { FungeSpace } from './space';
import { pushSysInfo } from './sysinfo';
import type { SysInfoEnvironment } from './sysinfo';
import { IpStatus } from './types';
import type {
  Cell, CellBits, FileSystemPort, FungeVersion, InputPort, OutputPort, Vector,
} from './types';

/** Callbacks into the scheduler that owns the IPs. */
export interface DispatchHost {
  nextIpId(): number;
  spawn(parent: InstructionPointer, child: InstructionPointer): void;
  quit(code: Cell): void;
  readonly quitRequested: boolean;
}

export interface DispatcherConfig {
  space: FungeSpace;
  fingerprints: FingerprintRegistry;
  input: InputPort;
  output: OutputPort;
  files: FileSystemPort | null;
  version: FungeVersion;
  cellBits: CellBits;
  random: () => number;
  sysInfo: () => SysInfoEnvironment;
}

const RANDOM_DIRECTIONS: readonly Vector[] = [EAST, WEST, NORTH, SOUTH];

const ch = (c: string): number => c.charCodeAt(0);

export class Dispatcher {
  private readonly space: FungeSpace;
  private readonly allowed: ReadonlySet<number>;
  private readonly fingerprintCtx: FingerprintContext;

  constructor(private readonly config: DispatcherConfig, private readonly host: DispatchHost) {
    this.space = config.space;
    this.allowed = INSTRUCTION_SETS[config.version];
    this.fingerprintCtx = {
      space: config.space,
      output: config.output,
      input: config.input,
      cellBits: config.cellBits,
    };
  }

  // ========================================================================
  // Tick entry points
  // ========================================================================

  /** Execute the instruction under a running IP and advance it. */
  step(ip: InstructionPointer): void {
    if (ip.status !== IpStatus.RUNNING) return;
    const op = this.space.get(ip.position[0], ip.position[1]);
    if (ip.stringMode) {
      if (op === QUOTE) ip.stringMode = false;
      else this.pushCell(ip, op);
    } else {
      this.execute(ip, op);
    }
    if (ip.status === IpStatus.RUNNING && !this.host.quitRequested) {
      this.advance(ip);
    }
  }

  /**
   * Retry the read an IP is suspended on. On completion any `k` iterations
   * still owed run, then the IP advances.
   */
  resumeRead(ip: InstructionPointer): void {
    if (ip.status !== IpStatus.AWAITING_INPUT || ip.pendingRead === null) return;
    attemptRead(ip, ip.pendingRead, this.config.input, this.config.cellBits);
    if (ip.status !== IpStatus.RUNNING) return;
    const owed = ip.pendingRepeat;
    if (owed !== null) {
      ip.pendingRepeat = null;
      this.repeat(ip, owed);
    }
    if (ip.status === IpStatus.RUNNING && !this.host.quitRequested) this.advance(ip);
  }

  /** Move a freshly created IP off spaces and comments onto its first instruction. */
  settle(ip: InstructionPointer): void {
    ip.position = this.skipIdle(ip.position, ip.delta);
  }

  // ========================================================================
  // Movement
  // ========================================================================

  /** Move past the current cell to the next executable one. */
  advance(ip: InstructionPointer): void {
    const space = this.space;
    if (ip.stringMode) {
      let pos = ip.position;
      if (space.get(pos[0], pos[1]) === SPACE) {
        // a run of spaces reads as one space in string mode
        let guard = this.idleLimit(pos, ip.delta);
        pos = space.next(pos, ip.delta);
        while (space.get(pos[0], pos[1]) === SPACE && guard-- > 0) {
          pos = space.next(pos, ip.delta);
        }
      } else {
        pos = space.next(pos, ip.delta);
      }
      ip.position = pos;
      return;
    }
    ip.position = this.skipIdle(space.next(ip.position, ip.delta), ip.delta);
  }

  /**
   * Skip spaces and `;...;` comments from `pos`. Gives up after one full
   * orbit of the IP's line so an all-space line cannot stall a tick.
   */
  private skipIdle(start: Vector, delta: Vector): Vector {
    const space = this.space;
    let guard = this.idleLimit(start, delta);
    let pos = start;
    while (guard-- > 0) {
      const cell = space.get(pos[0], pos[1]);
      if (cell === SPACE) {
        pos = space.next(pos, delta);
      } else if (cell === SEMICOLON && this.allowed.has(SEMICOLON)) {
        pos = this.matchingSemicolon(pos, delta);
        pos = space.next(pos, delta);
      } else {
        break;
      }
    }
    return pos;
  }

  /** Position of the `;` closing the comment opened at `pos` (or where the search gave up). */
  private matchingSemicolon(pos: Vector, delta: Vector): Vector {
    const space = this.space;
    let guard = this.idleLimit(pos, delta);
    let p = space.next(pos, delta);
    while (space.get(p[0], p[1]) !== SEMICOLON && guard-- > 0) {
      p = space.next(p, delta);
    }
    return p;
  }

  private idleLimit(pos: Vector, delta: Vector): number {
    return this.space.orbitLength(pos, delta) * 2 + 4;
  }

  private jump(ip: InstructionPointer, n: number): void {
    const [px, py] = ip.position;
    const [dx, dy] = ip.delta;
    if (!this.space.contains(px, py)) {
      ip.position = [px + n * dx, py + n * dy];
      return;
    }
    const orbit = this.space.orbitLength(ip.position, ip.delta);
    const steps = ((n % orbit) + orbit) % orbit;
    let pos = ip.position;
    for (let i = 0; i < steps; i++) pos = this.space.next(pos, ip.delta);
    ip.position = pos;
  }

  // ========================================================================
  // Instruction execution
  // ========================================================================

  private unknown(ip: InstructionPointer): void {
    if (REFLECT_UNKNOWN[this.config.version]) ip.reflect();
  }

  private pushCell(ip: InstructionPointer, value: number): void {
    ip.stack.push(toCell(value, this.config.cellBits));
  }

  /** Execute a single instruction; does not move the IP past it. */
  execute(ip: InstructionPointer, op: Cell): void {
    if (!this.allowed.has(op)) {
      this.unknown(ip);
      return;
    }
    if (op >= 0x41 && op <= 0x5A) {
      this.executeFingerprintOp(ip, op);
      return;
    }

    const stack = ip.stack;
    const bits = this.config.cellBits;
    switch (op) {
      case SPACE:
      case ch('z'):
        return;

      // ---- literals ----
      case ch('0'): case ch('1'): case ch('2'): case ch('3'): case ch('4'):
      case ch('5'): case ch('6'): case ch('7'): case ch('8'): case ch('9'):
        stack.push(op - 0x30);
        return;
      case ch('a'): case ch('b'): case ch('c'): case ch('d'): case ch('e'): case ch('f'):
        stack.push(op - 0x61 + 10);
        return;
      case QUOTE:
        ip.stringMode = true;
        return;
      case ch("'"): {
        ip.position = this.space.next(ip.position, ip.delta);
        this.pushCell(ip, this.space.get(ip.position[0], ip.position[1]));
        return;
      }
      case ch('s'): {
        ip.position = this.space.next(ip.position, ip.delta);
        this.space.set(ip.position[0], ip.position[1], stack.pop());
        return;
      }

      // ---- arithmetic ----
      case ch('+'): {
        const b = stack.pop();
        const a = stack.pop();
        this.pushCell(ip, a + b);
        return;
      }
      case ch('-'): {
        const b = stack.pop();
        const a = stack.pop();
        this.pushCell(ip, a - b);
        return;
      }
      case ch('*'): {
        const b = stack.pop();
        const a = stack.pop();
        stack.push(mulCell(a, b, bits));
        return;
      }
      case ch('/'): {
        const b = stack.pop();
        const a = stack.pop();
        this.pushCell(ip, b === 0 ? 0 : Math.trunc(a / b));
        return;
      }
      case ch('%'): {
        const b = stack.pop();
        const a = stack.pop();
        this.pushCell(ip, b === 0 ? 0 : a % b);
        return;
      }
      case ch('!'):
        stack.push(stack.pop() === 0 ? 1 : 0);
        return;
      case ch('`'): {
        const b = stack.pop();
        const a = stack.pop();
        stack.push(a > b ? 1 : 0);
        return;
      }

      // ---- stack manipulation ----
      case ch(':'): {
        const v = stack.pop();
        stack.push(v);
        stack.push(v);
        return;
      }
      case ch('\\'): {
        const a = stack.pop();
        const b = stack.pop();
        stack.push(a);
        stack.push(b);
        return;
      }
      case ch('$'):
        stack.pop();
        return;
      case ch('n'):
        stack.clear();
        return;

      // ---- direction ----
      case ch('>'): ip.delta = EAST; return;
      case ch('<'): ip.delta = WEST; return;
      case ch('^'): ip.delta = NORTH; return;
      case ch('v'): ip.delta = SOUTH; return;
      case ch('?'): {
        const i = Math.min(3, Math.floor(this.config.random() * 4));
        ip.delta = RANDOM_DIRECTIONS[i];
        return;
      }
      case ch('_'):
        ip.delta = stack.pop() === 0 ? EAST : WEST;
        return;
      case ch('|'):
        ip.delta = stack.pop() === 0 ? SOUTH : NORTH;
        return;
      case ch('['):
        ip.turnLeft();
        return;
      case ch(']'):
        ip.turnRight();
        return;
      case ch('r'):
        ip.reflect();
        return;
      case ch('x'):
        ip.delta = stack.popVector();
        return;
      case ch('w'): {
        const b = stack.pop();
        const a = stack.pop();
        if (a < b) ip.turnLeft();
        else if (a > b) ip.turnRight();
        return;
      }

      // ---- flow ----
      case ch('#'):
        ip.position = this.space.next(ip.position, ip.delta);
        return;
      case SEMICOLON:
        ip.position = this.matchingSemicolon(ip.position, ip.delta);
        return;
      case ch('j'):
        this.jump(ip, stack.pop());
        return;
      case ch('k'):
        this.iterate(ip, stack.pop());
        return;
      case ch('@'):
        ip.status = IpStatus.TERMINATED;
        return;
      case ch('q'):
        this.host.quit(stack.pop());
        return;
      case ch('t'): {
        const child = ip.clone(this.host.nextIpId());
        child.reflect();
        this.advance(child);
        this.host.spawn(ip, child);
        return;
      }

      // ---- Funge-Space ----
      case ch('g'): {
        const [x, y] = stack.popVector();
        this.pushCell(ip, this.space.get(x + ip.storageOffset[0], y + ip.storageOffset[1]));
        return;
      }
      case ch('p'): {
        const [x, y] = stack.popVector();
        const value = stack.pop();
        this.space.set(x + ip.storageOffset[0], y + ip.storageOffset[1], value);
        return;
      }

      // ---- I/O ----
      case ch('.'):
        this.config.output.writeNumber(stack.pop());
        return;
      case ch(','):
        this.config.output.writeChar(stack.pop());
        return;
      case ch('&'):
        attemptRead(ip, 'number', this.config.input, bits);
        return;
      case ch('~'):
        attemptRead(ip, 'char', this.config.input, bits);
        return;
      case ch('i'):
        this.inputFile(ip);
        return;
      case ch('o'):
        this.outputFile(ip);
        return;
      case ch('y'): {
        const n = stack.pop();
        pushSysInfo(ip, n, this.space.bounds(), this.config.sysInfo());
        return;
      }

      // ---- stack stack ----
      case ch('{'): {
        const n = stack.pop();
        if (!stack.beginBlock(n, ip.storageOffset)) {
          ip.reflect();
          return;
        }
        ip.storageOffset = [ip.position[0] + ip.delta[0], ip.position[1] + ip.delta[1]];
        return;
      }
      case ch('}'): {
        if (stack.depth < 2) {
          ip.reflect();
          return;
        }
        const offset = stack.endBlock(stack.pop());
        if (offset) ip.storageOffset = offset;
        else ip.reflect();
        return;
      }
      case ch('u'): {
        if (stack.depth < 2) {
          ip.reflect();
          return;
        }
        if (!stack.transfer(stack.pop())) ip.reflect();
        return;
      }

      // ---- fingerprints ----
      case ch('('):
        this.loadFingerprint(ip);
        return;
      case ch(')'):
        this.unloadFingerprint(ip);
        return;

      default:
        this.unknown(ip);
    }
  }

  /**
   * `k`: execute the next instruction on the IP's path n times from the `k`
   * cell. `0k` skips it. When the operand leaves the IP where it was, the IP
   * then moves past the operand.
   */
  private iterate(ip: InstructionPointer, n: number): void {
    if (n < 0) {
      ip.reflect();
      return;
    }
    const target = this.skipIdle(this.space.next(ip.position, ip.delta), ip.delta);
    if (n === 0) {
      ip.position = target;
      return;
    }
    this.repeat(ip, {
      operand: this.space.get(target[0], target[1]),
      remaining: n,
      origin: ip.position,
      target,
    });
  }

  /** Run the iterations of a `k`; a suspending operand leaves the rest on the IP. */
  private repeat(ip: InstructionPointer, work: PendingRepeat): void {
    const { operand, remaining, origin, target } = work;
    for (let i = 0; i < remaining; i++) {
      if (ip.status !== IpStatus.RUNNING || this.host.quitRequested) break;
      this.execute(ip, operand);
      if (ip.status === IpStatus.AWAITING_INPUT) {
        if (ip.pendingRepeat === null) ip.pendingRepeat = { ...work, remaining: remaining - i - 1 };
        return;
      }
    }
    if (ip.position[0] === origin[0] && ip.position[1] === origin[1]) {
      ip.position = target;
    }
  }

  // ========================================================================
  // Fingerprints
  // ========================================================================

  private popFingerprintCode(ip: InstructionPointer): number {
    const count = ip.stack.pop();
    const cells: number[] = [];
    // after the stack runs dry, four zero cells already shift every bit out
    const reads = Math.min(Math.max(count, 0), ip.stack.toss.size + 4);
    for (let i = 0; i < reads; i++) cells.push(ip.stack.pop());
    return fingerprintCode(cells);
  }

  private loadFingerprint(ip: InstructionPointer): void {
    const code = this.popFingerprintCode(ip);
    const fp = this.config.fingerprints.lookup(code);
    if (!fp) {
      ip.reflect();
      return;
    }
    for (const letter of fingerprintLetters(fp)) {
      ip.bindFingerprint(letter, code);
    }
    ip.stack.push(code);
    ip.stack.push(1);
  }

  private unloadFingerprint(ip: InstructionPointer): void {
    const code = this.popFingerprintCode(ip);
    const fp = this.config.fingerprints.lookup(code);
    if (!fp) {
      ip.reflect();
      return;
    }
    let unloaded = false;
    for (const letter of fingerprintLetters(fp)) {
      if (ip.unbindFingerprint(letter, code)) unloaded = true;
    }
    if (!unloaded) ip.reflect();
  }

  private executeFingerprintOp(ip: InstructionPointer, letter: number): void {
    const code = ip.boundFingerprint(letter);
    const op = code === undefined ? undefined : this.config.fingerprints.resolve(code, letter);
    if (!op) {
      ip.reflect();
      return;
    }
    op(ip, this.fingerprintCtx);
  }

  // ========================================================================
  // File I/O (i / o)
  // ========================================================================

  private popString(ip: InstructionPointer): string {
    let text = '';
    const limit = ip.stack.toss.size;
    for (let i = 0; i <= limit; i++) {
      const c = ip.stack.pop();
      if (c === 0) break;
      text += String.fromCharCode(c & 0xFFFF);
    }
    return text;
  }

  private inputFile(ip: InstructionPointer): void {
    const path = this.popString(ip);
    const flags = ip.stack.pop();
    const [vx, vy] = ip.stack.popVector();
    const files = this.config.files;
    const data = files ? files.readFile(path) : null;
    if (!data) {
      ip.reflect();
      return;
    }
    const x0 = vx + ip.storageOffset[0];
    const y0 = vy + ip.storageOffset[1];
    const text = Array.from(data, b => String.fromCharCode(b)).join('');
    const lines = (flags & 1) === 1 ? [text] : splitLines(text);
    let width = 0;
    lines.forEach((line, dy) => {
      width = Math.max(width, line.length);
      for (let dx = 0; dx < line.length; dx++) {
        const value = line.charCodeAt(dx);
        if (value !== SPACE) this.space.set(x0 + dx, y0 + dy, value);
      }
    });
    ip.stack.pushVector([width, lines.length]);
    ip.stack.pushVector([vx, vy]);
  }

  private outputFile(ip: InstructionPointer): void {
    const path = this.popString(ip);
    const flags = ip.stack.pop();
    const [vx, vy] = ip.stack.popVector();
    const [width, height] = ip.stack.popVector();
    const files = this.config.files;
    if (!files) {
      ip.reflect();
      return;
    }
    const text = (flags & 1) === 1;
    const x0 = vx + ip.storageOffset[0];
    const y0 = vy + ip.storageOffset[1];
    let right = x0 + Math.max(width, 0);
    let bottom = y0 + Math.max(height, 0);
    if (text) {
      // past the box there is only trimmed space
      const box = this.space.bounds();
      right = Math.max(x0, Math.min(right, box.maxX + 1));
      bottom = Math.max(y0, Math.min(bottom, box.maxY + 1));
    }
    if ((right - x0) * (bottom - y0) > MAX_OUTPUT_CELLS) {
      ip.reflect();
      return;
    }
    let rows: string[] = [];
    for (let y = y0; y < bottom; y++) {
      let row = '';
      for (let x = x0; x < right; x++) {
        row += String.fromCharCode(this.space.get(x, y) & 0xFF);
      }
      rows.push(row);
    }
    if (text) {
      rows = rows.map(r => r.replace(/ +$/, ''));
      while (rows.length > 0 && rows[rows.length - 1] === '') rows.pop();
    }
    const bytes = Uint8Array.from(rows.map(r => `${r}\n`).join(''), c => c.charCodeAt(0));
    if (!files.writeFile(path, bytes)) ip.reflect();
  }
}

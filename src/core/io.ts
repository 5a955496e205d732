/**
 * I/O ports: queued input with pending/EOF states, buffered and streaming
 * output, and the shared read routine used by `&`, `~` and fingerprints.
 */
import { toCell } from './constants';
import type { InstructionPointer } from './ip';
import { IpStatus } from './types';
import type { Cell, CellBits, InputPort, OutputPort, PendingRead, ReadResult, Rewindable } from './types';

const PENDING: ReadResult = { status: 'pending' };
const EOF: ReadResult = { status: 'eof' };
const CELL_RANGE = 4_294_967_296;

/** Character for an output cell; invalid code points become U+FFFD. */
export function cellToChar(value: Cell): string {
  if (value >= 0 && value <= 0x10FFFF && (value < 0xD800 || value > 0xDFFF)) {
    return String.fromCodePoint(value);
  }
  return '�';
}

function digitValue(code: number, radix: number): number {
  let d = -1;
  if (code >= 0x30 && code <= 0x39) d = code - 0x30;
  else if (code >= 0x61 && code <= 0x7A) d = code - 0x61 + 10;
  else if (code >= 0x41 && code <= 0x5A) d = code - 0x41 + 10;
  return d >= 0 && d < radix ? d : -1;
}

// ============================================================================
// Input
// ============================================================================

/**
 * Input fed incrementally (stdin chunks, debugger prompts, CLI arguments).
 * Reads never block: an empty open queue answers `pending`, a closed one `eof`.
 */
export class QueuedInput implements InputPort, Rewindable {
  private chars: number[] = [];
  private cursor = 0;
  private closed = false;
  private waiters: (() => void)[] = [];

  constructor(initial: string = '') {
    if (initial) this.feed(initial);
  }

  feed(text: string): void {
    for (const ch of text) this.chars.push(ch.codePointAt(0) ?? 0);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Characters fed but not yet consumed. */
  get available(): number {
    return this.chars.length - this.cursor;
  }

  /** Resolves on the next feed or close (immediately once closed). */
  whenReadable(): Promise<void> {
    if (this.closed) return Promise.resolve();
    return new Promise(resolve => this.waiters.push(resolve));
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w();
  }

  readChar(): ReadResult {
    if (this.cursor < this.chars.length) {
      return { status: 'ok', value: this.chars[this.cursor++] };
    }
    return this.closed ? EOF : PENDING;
  }

  /**
   * Skip to the first digit and read the run of digits. Nothing is consumed
   * until the number is complete (followed by a non-digit, or input closed).
   */
  readNumber(radix: number = 10): ReadResult {
    let i = this.cursor;
    while (i < this.chars.length && digitValue(this.chars[i], radix) < 0) i++;
    if (i >= this.chars.length) {
      if (!this.closed) return PENDING;
      this.cursor = i;
      return EOF;
    }
    let value = 0;
    let j = i;
    while (j < this.chars.length) {
      const d = digitValue(this.chars[j], radix);
      if (d < 0) break;
      value = (value * radix + d) % CELL_RANGE;
      j++;
    }
    if (j >= this.chars.length && !this.closed) return PENDING;
    this.cursor = j;
    return { status: 'ok', value };
  }

  mark(): number {
    return this.cursor;
  }

  rewind(mark: number): void {
    this.cursor = Math.min(mark, this.chars.length);
  }
}

// ============================================================================
// Output
// ============================================================================

/** Collects output in memory (tests, debugger). */
export class BufferedOutput implements OutputPort, Rewindable {
  private text = '';

  writeNumber(value: Cell): void {
    this.text += `${value} `;
  }

  writeChar(value: Cell): void {
    this.text += cellToChar(value);
  }

  writeText(text: string): void {
    this.text += text;
  }

  getText(): string {
    return this.text;
  }

  mark(): number {
    return this.text.length;
  }

  rewind(mark: number): void {
    this.text = this.text.slice(0, mark);
  }
}

/** Forwards output as it is produced (stdout). */
export class StreamOutput implements OutputPort {
  constructor(private readonly write: (text: string) => void) {}

  writeNumber(value: Cell): void {
    this.write(`${value} `);
  }

  writeChar(value: Cell): void {
    this.write(cellToChar(value));
  }

  writeText(text: string): void {
    this.write(text);
  }
}

export function isRewindable(port: object): port is Rewindable {
  return 'mark' in port && typeof port.mark === 'function'
    && 'rewind' in port && typeof port.rewind === 'function';
}

// ============================================================================
// Reads on behalf of an IP
// ============================================================================

/**
 * Perform (or retry) a read for `ip`. A value is pushed, pending input
 * suspends the IP in AwaitingInput, end of input reflects.
 */
export function attemptRead(
  ip: InstructionPointer,
  kind: PendingRead,
  input: InputPort,
  cellBits: CellBits,
): void {
  const result = kind === 'char'
    ? input.readChar()
    : input.readNumber(kind === 'number' ? 10 : kind.base);
  switch (result.status) {
    case 'ok':
      ip.stack.push(toCell(result.value, cellBits));
      ip.pendingRead = null;
      ip.status = IpStatus.RUNNING;
      break;
    case 'pending':
      ip.pendingRead = kind;
      ip.status = IpStatus.AWAITING_INPUT;
      break;
    case 'eof':
      ip.pendingRead = null;
      ip.status = IpStatus.RUNNING;
      ip.reflect();
      break;
  }
}

// Cell value (stored as standard JS number, normalised to the configured cell width)
export type Cell = number;

export type Vector = readonly [number, number];

export const IpStatus = {
  RUNNING: 'running',
  AWAITING_INPUT: 'awaiting_input',
  TERMINATED: 'terminated',
} as const;
export type IpStatus = typeof IpStatus[keyof typeof IpStatus];

export const FungeVersion = {
  B93: 'B93',
  B97: 'B97',
  B98: 'B98',
} as const;
export type FungeVersion = typeof FungeVersion[keyof typeof FungeVersion];

export type CellBits = 8 | 16 | 32;

/** What an IP suspended on input is waiting for. */
export type PendingRead = 'number' | 'char' | { base: number };

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export type ReadResult =
  | { status: 'ok'; value: Cell }
  | { status: 'pending' }
  | { status: 'eof' };

export interface InputPort {
  readChar(): ReadResult;
  /** Read a decimal number (or a number in `radix`), skipping leading non-digits. */
  readNumber(radix?: number): ReadResult;
  /** Resolves when a read that was pending may now succeed. */
  whenReadable?(): Promise<void>;
}

export interface OutputPort {
  writeNumber(value: Cell): void;
  writeChar(value: Cell): void;
  writeText(text: string): void;
}

export interface FileSystemPort {
  readFile(path: string): Uint8Array | null;
  writeFile(path: string, data: Uint8Array): boolean;
}

/** A port whose consumed/produced data can be wound back (used by step back). */
export interface Rewindable {
  mark(): number;
  rewind(mark: number): void;
}

export interface IpSnapshot {
  id: number;
  status: IpStatus;
  position: Vector;
  delta: Vector;
  storageOffset: Vector;
  stringMode: boolean;
  stacks: Cell[][];          // bottom stack first, each bottom-to-top
  fingerprints: Record<string, number[]>;
}

export interface InterpreterSnapshot {
  tick: number;
  halted: boolean;
  exitCode: number | null;
  bounds: Bounds;
  ips: IpSnapshot[];
}

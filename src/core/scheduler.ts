/**
 * Scheduler: owns the ordered IP sequence and runs one tick at a time.
 *
 * A tick visits the IPs present at its start, in order, one instruction
 * each. Terminations and splits are applied at the end of the tick; `q`
 * cuts the tick short.
 */
import { Dispatcher } from './dispatcher';
import type { DispatchHost, DispatcherConfig } from './dispatcher';
import { InstructionPointer } from './ip';
import { IpStatus } from './types';
import type { Cell, IpSnapshot } from './types';

/** Everything the debugger needs to put the scheduler back where it was. */
export interface SchedulerState {
  ips: InstructionPointer[];
  nextId: number;
  tick: number;
  halted: boolean;
  exitCode: number | null;
}

export class Scheduler implements DispatchHost {
  readonly dispatcher: Dispatcher;
  private ips: InstructionPointer[] = [];
  private spawned: Map<InstructionPointer, InstructionPointer[]> = new Map();
  private nextId = 0;
  private tickCount = 0;
  private halted = false;
  private exitCode: number | null = null;
  private quitCode: number | null = null;

  constructor(config: DispatcherConfig) {
    this.dispatcher = new Dispatcher(config, this);
  }

  /** Replace all IPs with a fresh IP 0 at the origin, optionally seeding its stack. */
  start(initialStack: readonly Cell[] = []): void {
    this.ips = [];
    this.spawned.clear();
    this.nextId = 0;
    this.tickCount = 0;
    this.halted = false;
    this.exitCode = null;
    this.quitCode = null;

    const ip = new InstructionPointer(this.nextIpId());
    ip.stack.toss.pushMany(initialStack);
    this.dispatcher.settle(ip);
    this.ips.push(ip);
  }

  // ========================================================================
  // DispatchHost
  // ========================================================================

  nextIpId(): number {
    return this.nextId++;
  }

  spawn(parent: InstructionPointer, child: InstructionPointer): void {
    const children = this.spawned.get(parent);
    if (children) children.push(child);
    else this.spawned.set(parent, [child]);
  }

  quit(code: Cell): void {
    this.quitCode = code;
  }

  get quitRequested(): boolean {
    return this.quitCode !== null;
  }

  // ========================================================================
  // Ticking
  // ========================================================================

  /** Run one tick. Returns false once the program has halted. */
  tick(): boolean {
    if (this.halted) return false;

    for (const ip of this.ips) {
      if (ip.status === IpStatus.AWAITING_INPUT) this.dispatcher.resumeRead(ip);
      else this.dispatcher.step(ip);
      if (this.quitCode !== null) break;
    }
    this.commit();
    this.tickCount++;
    return !this.halted;
  }

  private commit(): void {
    const next: InstructionPointer[] = [];
    for (const ip of this.ips) {
      if (ip.status !== IpStatus.TERMINATED) next.push(ip);
      const children = this.spawned.get(ip);
      if (children) next.push(...children);
    }
    this.spawned.clear();
    this.ips = next;

    if (this.quitCode !== null) {
      this.halted = true;
      this.exitCode = this.quitCode;
    } else if (next.length === 0) {
      this.halted = true;
      this.exitCode = 0;
    }
  }

  // ========================================================================
  // Inspection
  // ========================================================================

  get isHalted(): boolean {
    return this.halted;
  }

  get currentExitCode(): number | null {
    return this.exitCode;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get liveIps(): readonly InstructionPointer[] {
    return this.ips;
  }

  /** True when there are IPs and every one of them is blocked on input. */
  get allAwaitingInput(): boolean {
    return this.ips.length > 0 && this.ips.every(ip => ip.status === IpStatus.AWAITING_INPUT);
  }

  getSnapshots(): IpSnapshot[] {
    return this.ips.map(ip => ip.getSnapshot());
  }

  captureState(): SchedulerState {
    return {
      ips: this.ips.map(ip => ip.clone()),
      nextId: this.nextId,
      tick: this.tickCount,
      halted: this.halted,
      exitCode: this.exitCode,
    };
  }

  restoreState(state: SchedulerState): void {
    this.ips = state.ips.map(ip => ip.clone());
    this.spawned.clear();
    this.nextId = state.nextId;
    this.tickCount = state.tick;
    this.halted = state.halted;
    this.exitCode = state.exitCode;
    this.quitCode = null;
  }
}

/**
 * Debugger store tests: stepping actions and the timed run loop.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { QueuedInput } from '../core/io';
import { createDebuggerSession, createDebuggerStore } from './debuggerStore';

function storeFor(source: string, input?: QueuedInput) {
  return createDebuggerStore(createDebuggerSession(source, {}, input), 0.05);
}

describe('debugger store', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts paused with the loaded program', () => {
    const store = storeFor('1.@');
    const state = store.getState();
    expect(state.running).toBe(false);
    expect(state.snapshot.tick).toBe(0);
    expect(state.output).toBe('');
  });

  it('steps forward and back', () => {
    const store = storeFor('1.@');
    store.getState().step();
    store.getState().step();
    expect(store.getState().output).toBe('1 ');
    store.getState().stepBack();
    expect(store.getState().output).toBe('');
    expect(store.getState().snapshot.tick).toBe(1);
  });

  it('runs one tick per interval until paused', () => {
    const store = storeFor('123456@');
    store.getState().run();
    expect(store.getState().running).toBe(true);
    vi.advanceTimersByTime(50);
    expect(store.getState().snapshot.tick).toBe(1);
    vi.advanceTimersByTime(100);
    expect(store.getState().snapshot.tick).toBe(3);
    store.getState().pause();
    vi.advanceTimersByTime(500);
    expect(store.getState().snapshot.tick).toBe(3);
    expect(store.getState().running).toBe(false);
  });

  it('stops by itself when the program halts', () => {
    const store = storeFor('@');
    store.getState().toggleRun();
    vi.advanceTimersByTime(50);
    expect(store.getState().running).toBe(false);
    expect(store.getState().lastStop).toBe('halted');
    store.getState().run();
    expect(store.getState().running).toBe(false);
  });

  it('runs to an opcode', () => {
    const store = storeFor('12.@');
    store.getState().runToOpcode('.');
    vi.advanceTimersByTime(200);
    const state = store.getState();
    expect(state.lastStop).toBe('opcode');
    expect(state.snapshot.tick).toBe(2);
    expect(state.snapshot.ips[0].position).toEqual([2, 0]);
  });

  it('stops on breakpoints', () => {
    const store = storeFor('1234@');
    store.getState().toggleBreakpoint(2, 0);
    expect(store.getState().breakpoints).toEqual([[2, 0]]);
    store.getState().run();
    vi.advanceTimersByTime(500);
    expect(store.getState().lastStop).toBe('breakpoint');
    expect(store.getState().snapshot.tick).toBe(2);
  });

  it('halves and doubles the interval within limits', () => {
    const store = storeFor('@');
    store.getState().faster();
    expect(store.getState().interval).toBe(0.025);
    store.getState().slower();
    store.getState().slower();
    expect(store.getState().interval).toBe(0.1);
    for (let i = 0; i < 20; i++) store.getState().faster();
    expect(store.getState().interval).toBe(0.001);
  });

  it('reports waiting input after a manual step', () => {
    const store = storeFor('~.@', new QueuedInput());
    store.getState().step();
    expect(store.getState().lastStop).toBe('awaiting-input');
    store.getState().provideInput('A');
    store.getState().step();
    expect(store.getState().lastStop).toBeNull();
    expect(store.getState().snapshot.ips[0].stacks).toEqual([[65]]);
  });

  it('stops for input and resumes once it is provided', () => {
    const store = storeFor('&.@', new QueuedInput());
    store.getState().run();
    vi.advanceTimersByTime(50);
    expect(store.getState().lastStop).toBe('awaiting-input');
    store.getState().provideInput('4\n');
    store.getState().run();
    vi.advanceTimersByTime(500);
    expect(store.getState().output).toBe('4 ');
    expect(store.getState().lastStop).toBe('halted');
  });
});

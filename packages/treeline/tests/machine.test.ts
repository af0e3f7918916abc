import { describe, expect, it, vi } from 'vitest';

import { InvalidStateTransitionError } from '../src/errors/errors.js';
import { silentLog, type Log } from '../src/log/log.js';
import { Machine } from '../src/state/machine.js';

type TestState = StateA | StateB | StateC | StateD;

class StateA {
  canTransitionTo(next: TestState): boolean {
    return next instanceof StateB;
  }
}

class StateB {
  canTransitionTo(next: TestState): boolean {
    return next instanceof StateC;
  }
}

class StateC {
  canTransitionTo(next: TestState): boolean {
    return next instanceof StateA;
  }
}

class StateD {}

const machine = (initial: TestState = new StateA(), log: Log = silentLog) =>
  new Machine<TestState>(initial, undefined, { log });

describe('Machine', () => {
  it('announces the initial state once', () => {
    const listener = vi.fn();
    const initial = new StateA();

    const m = new Machine<TestState>(initial, listener, { log: silentLog });

    expect(m.state).toBe(initial);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(initial);
  });

  it('applies allowed transitions and rejects the rest', () => {
    const m = machine();
    const seen: string[] = [];
    m.onChanged((state) => seen.push(state.constructor.name));

    m.update(new StateB());
    m.update(new StateC());

    expect(m.state).toBeInstanceOf(StateC);
    expect(seen).toEqual(['StateB', 'StateC']);

    const update = () => m.update(new StateB());
    expect(update).toThrow(InvalidStateTransitionError);
    expect(update).toThrow(
      expect.objectContaining({ current: expect.any(StateC), desired: expect.any(StateB) })
    );
    expect(m.state).toBeInstanceOf(StateC);
    expect(seen).toEqual(['StateB', 'StateC']);
  });

  it('ignores updates to an equal state', () => {
    const m = machine();
    const listener = vi.fn();
    m.onChanged(listener);

    m.update(m.state);

    expect(listener).not.toHaveBeenCalled();
    expect(m.isBusy).toBe(false);
  });

  it('compares field-less class states by identity', () => {
    const m = machine();

    expect(() => m.update(new StateA())).toThrow(InvalidStateTransitionError);
  });

  it('announces changed map contents', () => {
    const m = new Machine(new Map([[1, 'a']]), undefined, { log: silentLog });
    const listener = vi.fn();
    m.onChanged(listener);

    m.update(new Map([[1, 'a']]));
    expect(listener).not.toHaveBeenCalled();

    m.update(new Map([[1, 'b']]));
    expect(listener).toHaveBeenCalledTimes(1);
    expect(m.state.get(1)).toBe('b');
  });

  it('accepts any transition from states without a predicate', () => {
    const m = machine(new StateD());

    m.update(new StateC());

    expect(m.state).toBeInstanceOf(StateC);
  });

  it('applies updates made by observers after the current announcement', () => {
    const m = machine();
    const seen: string[] = [];
    m.onChanged((state) => {
      seen.push(state.constructor.name);
      if (state instanceof StateB) {
        m.update(new StateC());
        seen.push(`queued ${m.pending}`);
      }
    });

    m.update(new StateB());

    expect(m.state).toBeInstanceOf(StateC);
    expect(seen).toEqual(['StateB', 'queued 1', 'StateC']);
    expect(m.isBusy).toBe(false);
  });

  it('keeps re-entrant updates in submission order', () => {
    const m = new Machine(0, undefined, { log: silentLog });
    const seen: number[] = [];
    m.onChanged((state) => {
      seen.push(state);
      if (state === 1) {
        m.update(2);
        m.update(3);
      }
      if (state === 2) m.update(4);
    });

    m.update(1);

    expect(seen).toEqual([1, 2, 3, 4]);
    expect(m.state).toBe(4);
  });

  it('discards queued transitions after a rejection', () => {
    const log: Log = { ...silentLog, warn: vi.fn() };
    const m = machine(new StateA(), log);
    m.onChanged((state) => {
      if (state instanceof StateB) {
        m.update(new StateA());
        m.update(new StateC());
      }
    });

    expect(() => m.update(new StateB())).toThrow(InvalidStateTransitionError);

    expect(m.state).toBeInstanceOf(StateB);
    expect(m.pending).toBe(0);
    expect(m.isBusy).toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      'Rejected transition StateB -> StateA; 1 queued transition(s) dropped.'
    );
  });

  it('recovers after an observer throws', () => {
    const m = machine();
    const failure = new Error('observer failed');
    const off = m.onChanged((state) => {
      if (state instanceof StateB) throw failure;
    });

    expect(() => m.update(new StateB())).toThrow(failure);
    expect(m.isBusy).toBe(false);
    expect(m.state).toBeInstanceOf(StateB);

    off();
    m.update(new StateC());
    expect(m.state).toBeInstanceOf(StateC);
  });

  it('re-broadcasts the current state on announce', () => {
    const m = machine();
    const listener = vi.fn();
    m.onChanged(listener);

    m.announce();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(m.state);
  });

  it('removes observers', () => {
    const m = machine();
    const listener = vi.fn();
    m.onChanged(listener);

    expect(m.offChanged(listener)).toBe(true);
    expect(m.offChanged(listener)).toBe(false);

    m.update(new StateB());
    expect(listener).not.toHaveBeenCalled();
  });

  it('uses the transition predicate option', () => {
    const table: Record<string, string[]> = {
      idle: ['loading'],
      loading: ['idle', 'done'],
      done: [],
    };
    const m = new Machine('idle', undefined, {
      canTransition: (from, to) => table[from]?.includes(to) ?? false,
      log: silentLog,
    });

    expect(() => m.update('done')).toThrow(InvalidStateTransitionError);
    expect(() => m.update('done')).toThrow("Invalid state transition between 'idle' and 'done'.");

    m.update('loading');
    m.update('done');
    expect(m.state).toBe('done');
  });

  it('uses the equality option', () => {
    const m = new Machine(
      { id: 1, label: 'first' },
      undefined,
      { equals: (a, b) => a.id === b.id, log: silentLog }
    );
    const listener = vi.fn();
    m.onChanged(listener);

    m.update({ id: 1, label: 'renamed' });
    expect(listener).not.toHaveBeenCalled();

    m.update({ id: 2, label: 'second' });
    expect(listener).toHaveBeenCalledWith({ id: 2, label: 'second' });
  });
});

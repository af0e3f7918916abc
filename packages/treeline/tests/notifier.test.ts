import { describe, expect, it, vi } from 'vitest';

import { Notifier } from '../src/state/notifier.js';

describe('Notifier', () => {
  it('announces the initial value with no previous value', () => {
    const listener = vi.fn();

    const notifier = new Notifier('a', listener);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('a', undefined);
    expect(notifier.value).toBe('a');
    expect(notifier.previous).toBeUndefined();
  });

  it('announces changes with the previous value and skips equal ones', () => {
    const notifier = new Notifier('a');
    const calls: Array<[string, string | undefined]> = [];
    notifier.onChanged((current, previous) => calls.push([current, previous]));

    notifier.update('b');
    notifier.update('b');

    expect(calls).toEqual([['b', 'a']]);
    expect(notifier.value).toBe('b');
    expect(notifier.previous).toBe('a');
  });

  it('compares objects by value', () => {
    const notifier = new Notifier({ x: 1, tags: ['a'] });
    const listener = vi.fn();
    notifier.onChanged(listener);

    notifier.update({ x: 1, tags: ['a'] });
    expect(listener).not.toHaveBeenCalled();

    notifier.update({ x: 1, tags: ['b'] });
    expect(listener).toHaveBeenCalledWith({ x: 1, tags: ['b'] }, { x: 1, tags: ['a'] });
  });

  it('announces a different date', () => {
    const listener = vi.fn();
    const notifier = new Notifier(new Date(1), listener);

    notifier.update(new Date(1));
    expect(listener).toHaveBeenCalledTimes(1);

    notifier.update(new Date(2));
    expect(listener).toHaveBeenCalledTimes(2);
    expect(notifier.value.getTime()).toBe(2);
    expect(notifier.previous?.getTime()).toBe(1);
  });

  it('uses the equality option', () => {
    const notifier = new Notifier(1.0, undefined, {
      equals: (a, b) => Math.abs(a - b) < 0.5,
    });

    notifier.update(1.2);
    expect(notifier.value).toBe(1.0);

    notifier.update(2);
    expect(notifier.value).toBe(2);
  });

  it('calls updated listeners after changed listeners', () => {
    const notifier = new Notifier(0);
    const order: string[] = [];
    notifier.onUpdated((value) => order.push(`updated ${value}`));
    notifier.onChanged((value) => order.push(`changed ${value}`));

    notifier.update(5);

    expect(order).toEqual(['changed 5', 'updated 5']);
  });

  it('re-broadcasts on announce', () => {
    const notifier = new Notifier('a');
    notifier.update('b');
    const listener = vi.fn();
    notifier.onChanged(listener);

    notifier.announce();

    expect(listener).toHaveBeenCalledWith('b', 'a');
  });

  it('announces updates made from a listener inline', () => {
    const notifier = new Notifier(0);
    const seen: number[] = [];
    notifier.onChanged((value) => {
      seen.push(value);
      if (value === 1) notifier.update(2);
    });

    notifier.update(1);

    expect(seen).toEqual([1, 2]);
    expect(notifier.value).toBe(2);
    expect(notifier.previous).toBe(1);
  });

  it('removes listeners', () => {
    const notifier = new Notifier(0);
    const changed = vi.fn();
    const updated = vi.fn();
    const offChanged = notifier.onChanged(changed);
    notifier.onUpdated(updated);

    offChanged();
    expect(notifier.offUpdated(updated)).toBe(true);
    expect(notifier.offUpdated(updated)).toBe(false);
    expect(notifier.offChanged(changed)).toBe(false);

    notifier.update(1);
    expect(changed).not.toHaveBeenCalled();
    expect(updated).not.toHaveBeenCalled();
  });
});

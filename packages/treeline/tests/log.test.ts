import { afterEach, describe, expect, it, vi } from 'vitest';

import { AssertionError, ConsoleLog, silentLog } from '../src/log/log.js';

describe('ConsoleLog', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags messages with its prefix', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const out: ConsoleLog = new ConsoleLog('game');

    out.print('hello');
    out.warn('careful');
    out.error('broken');

    expect(log).toHaveBeenCalledWith('[game] hello');
    expect(warn).toHaveBeenCalledWith('[game] careful');
    expect(error).toHaveBeenCalledWith('[game] broken');
  });

  it('throws and logs on failed assertions', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const out: ConsoleLog = new ConsoleLog();

    expect(() => out.assert(true, 'fine')).not.toThrow();
    expect(() => out.assert(false, 'slots must be bound')).toThrow(AssertionError);
    expect(error).toHaveBeenCalledWith('[treeline] slots must be bound');
  });

  it('logs, reports and rethrows errors from run', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const out: ConsoleLog = new ConsoleLog();
    const failure = new Error('boom');
    const onError = vi.fn();

    expect(out.run(() => 7)).toBe(7);
    expect(() =>
      out.run(() => {
        throw failure;
      }, onError)
    ).toThrow(failure);

    expect(onError).toHaveBeenCalledWith(failure);
    expect(error).toHaveBeenNthCalledWith(1, '[treeline] An error occurred.');
    expect(error).toHaveBeenCalledTimes(2);
  });

  it('returns the fallback from always', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const out: ConsoleLog = new ConsoleLog();

    const value = out.always(() => {
      throw new Error('boom');
    }, 5);

    expect(value).toBe(5);
    expect(out.always(() => 1, 5)).toBe(1);
    expect(warn).toHaveBeenNthCalledWith(1, '[treeline] An error occurred. Using fallback value `5`.');
  });
});

describe('silentLog', () => {
  it('keeps assert, run and always semantics', () => {
    expect(() => silentLog.assert(false, 'nope')).toThrow(AssertionError);
    expect(silentLog.run(() => 'ok')).toBe('ok');
    expect(
      silentLog.always((): string => {
        throw new Error('boom');
      }, 'fallback')
    ).toBe('fallback');
  });
});

import { describe, expect, it, vi } from 'vitest';

import {
  hasPublished,
  listen,
  provide,
  providesToken,
  publish,
  stopListening,
  subscriberCount,
  unpublish,
  valueOf,
} from '../src/core/provider.js';
import { token } from '../src/core/token.js';
import { UnexpectedBindingTypeError } from '../src/errors/errors.js';
import { Node } from '../src/tree/node.js';

const ScoreT = token<number>('Score');
const NameT = token<string>('Name');

describe('provider protocol', () => {
  it('declares tokens and reads values lazily', () => {
    const node = new Node('Stats');
    let score = 1;
    provide(node, ScoreT, () => score);

    expect(providesToken(node, ScoreT)).toBe(true);
    expect(providesToken(node, NameT)).toBe(false);
    expect(valueOf(node, ScoreT)).toBe(1);

    score = 5;
    expect(valueOf(node, ScoreT)).toBe(5);
  });

  it('rejects reads of tokens the node does not provide', () => {
    const node = new Node('Stats');
    provide(node, ScoreT, () => 1);

    expect(() => valueOf(node, NameT)).toThrow(UnexpectedBindingTypeError);
  });

  it('publishes to subscribers in registration order', () => {
    const node = new Node('Provider');
    const calls: string[] = [];
    listen(node, () => calls.push('first'));
    listen(node, () => calls.push('second'));

    expect(hasPublished(node)).toBe(false);
    publish(node);

    expect(hasPublished(node)).toBe(true);
    expect(calls).toEqual(['first', 'second']);
  });

  it('passes the provider to its listeners', () => {
    const node = new Node('Provider');
    const listener = vi.fn();
    listen(node, listener);

    publish(node);

    expect(listener).toHaveBeenCalledWith(node);
  });

  it('notifies a snapshot of subscribers', () => {
    const node = new Node('Provider');
    const calls: string[] = [];
    const late = () => calls.push('late');
    const selfRemoving = () => {
      calls.push('self');
      stopListening(node, selfRemoving);
      listen(node, late);
    };
    listen(node, selfRemoving);
    listen(node, () => calls.push('next'));

    publish(node);
    expect(calls).toEqual(['self', 'next']);

    publish(node);
    expect(calls).toEqual(['self', 'next', 'next', 'late']);
  });

  it('notifies current subscribers again on every publish', () => {
    const node = new Node('Provider');
    const listener = vi.fn();
    listen(node, listener);

    publish(node);
    publish(node);

    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('removes one registration per stopListening call', () => {
    const node = new Node('Provider');
    const listener = vi.fn();
    listen(node, listener);
    listen(node, listener);

    expect(subscriberCount(node)).toBe(2);
    expect(stopListening(node, listener)).toBe(true);
    expect(subscriberCount(node)).toBe(1);
    expect(stopListening(node, listener)).toBe(true);
    expect(stopListening(node, listener)).toBe(false);
    expect(stopListening(new Node(), listener)).toBe(false);
  });

  it('resets the publish flag on unpublish', () => {
    const node = new Node('Provider');
    publish(node);
    unpublish(node);

    expect(hasPublished(node)).toBe(false);
    expect(() => unpublish(new Node())).not.toThrow();
  });
});

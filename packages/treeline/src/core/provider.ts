/* Provider registration and publish protocol
 *
 * A provider is any tree node that publishes values under tokens for its
 * descendants. The node itself carries none of this: its record lives in a
 * module-level WeakRegistry keyed by node identity.
 *
 * Record:
 *  - hasPublished: set by publish(), reset by unpublish() on re-entry
 *  - subscribers: ordered listeners, invoked on every publish()
 *  - values: token id -> value source, declared with provide()
 *
 * Contract:
 *  Providers call publish() once every value they provide is initialised.
 *  Publishing earlier lets dependents observe half-built values; nothing
 *  here can detect that.
 */

import { UnexpectedBindingTypeError } from '../errors/errors.js';
import type { PublishListener, TreeNode } from '../types/types.js';
import type { CanonicalId, Token } from './token.js';
import { WeakRegistry } from './weak-registry.js';

export interface ProviderRegistration {
  hasPublished: boolean;
  readonly subscribers: PublishListener[];
  readonly values: Map<CanonicalId, () => unknown>;
}

const registrations = new WeakRegistry<TreeNode, ProviderRegistration>(() => ({
  hasPublished: false,
  subscribers: [],
  values: new Map(),
}));

/**
 * Declare that `node` publishes `token`. `source` is read on every
 * {@link valueOf}, so it may return a field that is filled in later.
 *
 * @example
 * ```typescript
 * class Level extends Node {
 *   private map!: TileMap;
 *   constructor() {
 *     super('Level');
 *     provide(this, TileMapT, () => this.map);
 *   }
 *   protected override ready() {
 *     this.map = loadMap();
 *     publish(this);
 *   }
 * }
 * ```
 */
export function provide<T>(node: TreeNode, token: Token<T>, source: () => T): void {
  registrations.getOrCreate(node).values.set(token.id, source);
}

export function providesToken(node: TreeNode, token: Token): boolean {
  return registrations.get(node)?.values.has(token.id) ?? false;
}

/**
 * Read the value `node` publishes under `token`.
 *
 * @throws {UnexpectedBindingTypeError} if `node` does not provide `token`
 */
export function valueOf<T>(node: TreeNode, token: Token<T>): T {
  const source = registrations.get(node)?.values.get(token.id);
  if (!source) {
    throw new UnexpectedBindingTypeError(token.label, 'node does not provide this token');
  }
  return source() as T;
}

/**
 * Mark `node` as published and notify its current subscribers in
 * registration order.
 *
 * Listeners added while notifying wait for the next publish; listeners that
 * remove themselves do not disturb the rest of the round.
 */
export function publish(node: TreeNode): void {
  const reg = registrations.getOrCreate(node);
  reg.hasPublished = true;
  if (reg.subscribers.length === 0) return;
  for (const listener of reg.subscribers.slice()) listener(node);
}

export function hasPublished(node: TreeNode): boolean {
  return registrations.get(node)?.hasPublished ?? false;
}

/**
 * Reset the publish flag. Called when a provider re-enters the tree and
 * must publish again before dependents treat it as ready.
 */
export function unpublish(node: TreeNode): void {
  const reg = registrations.get(node);
  if (reg) reg.hasPublished = false;
}

export function listen(node: TreeNode, listener: PublishListener): void {
  registrations.getOrCreate(node).subscribers.push(listener);
}

/**
 * Remove one registration of `listener`. Returns false if it was not subscribed.
 */
export function stopListening(node: TreeNode, listener: PublishListener): boolean {
  const subscribers = registrations.get(node)?.subscribers;
  if (!subscribers) return false;
  const index = subscribers.indexOf(listener);
  if (index === -1) return false;
  subscribers.splice(index, 1);
  return true;
}

export function subscriberCount(node: TreeNode): number {
  return registrations.get(node)?.subscribers.length ?? 0;
}

/**
 * Drop the provider record for `node`.
 *
 * @internal Called by release() when a node is destroyed
 */
export function forgetProvider(node: TreeNode): boolean {
  return registrations.delete(node);
}

/* Resolver
 *
 * Binds a dependent's slot to the nearest ancestor that publishes the
 * slot's token.
 *
 * Resolution order (first match wins):
 *  1. The slot's cached provider (O(1), no walk)
 *  2. Ancestors, starting at node.parent:
 *     a. the ancestor provides the token          -> bind 'tree'
 *     b. the ancestor is a dependent whose slot
 *        for the token is already bound           -> bind 'borrowed'
 *     c. otherwise keep walking
 *  3. The fallback registry                       -> bind 'fallback'
 *  4. ProviderNotFoundError
 *
 * Borrowing (2b) only shortens walks. An ancestor dependent A resolved its
 * own slot by walking from A.parent; D's walk reaching A would, absent a
 * provider at A itself, continue from A.parent and find the same node. An
 * unbound ancestor slot is skipped rather than resolved, so the walk goes on
 * exactly as a full walk would.
 *
 * Cached bindings are trusted until the slot is reset. A node that moves in
 * the tree must be invalidated (see release.ts) or re-attached through the
 * LifecycleGate, which resets its slots.
 */

import { ProviderNotFoundError, UnexpectedBindingTypeError } from '../errors/errors.js';
import { FallbackRegistry } from '../registry/fallback-registry.js';
import { SlotSource, type ResolverOptions, type TreeNode } from '../types/types.js';
import { dependent, peekSlot } from './dependent.js';
import { providesToken, valueOf } from './provider.js';
import type { DependencySlot } from './slot.js';
import type { Token } from './token.js';

export class Resolver {
  private readonly borrow: boolean;

  constructor(private readonly options: ResolverOptions = {}) {
    this.borrow = options.borrow ?? true;
  }

  /**
   * Registry consulted after the walk. Read on every miss so that
   * FallbackRegistry.resetGlobal() takes effect for default resolvers.
   */
  get fallback(): FallbackRegistry {
    return this.options.fallback ?? FallbackRegistry.global();
  }

  /**
   * Find (and cache) the provider of `token` for `node`.
   *
   * @throws {ProviderNotFoundError} if neither the tree nor the fallback
   *   registry provides `token`
   * @throws {UnexpectedBindingTypeError} if the cached provider no longer
   *   provides `token`
   */
  resolve<T>(node: TreeNode, token: Token<T>): TreeNode {
    return this.resolveSlot(node, dependent(node).slotFor(token));
  }

  /**
   * Resolve and read the value published under `token`.
   *
   * @example
   * ```typescript
   * const theme = resolver.value(hud, ThemeT); // Theme
   * ```
   */
  value<T>(node: TreeNode, token: Token<T>): T {
    return valueOf(this.resolve(node, token), token);
  }

  /**
   * Resolve `token` for `node`, returning undefined instead of throwing
   * when nothing provides it. Binding errors still propagate.
   */
  tryResolve<T>(node: TreeNode, token: Token<T>): TreeNode | undefined {
    try {
      return this.resolve(node, token);
    } catch (e) {
      if (e instanceof ProviderNotFoundError) return undefined;
      throw e;
    }
  }

  /**
   * Resolve a specific slot owned by `node`.
   */
  resolveSlot<T>(node: TreeNode, slot: DependencySlot<T>): TreeNode {
    const { token } = slot;

    const cached = slot.provider;
    if (cached) {
      if (!providesToken(cached, token)) {
        throw new UnexpectedBindingTypeError(
          token.label,
          `cached provider '${cached.name ?? 'anonymous'}' no longer provides it`
        );
      }
      return cached;
    }

    let depth = 0;
    for (let current = node.parent; current; current = current.parent) {
      depth++;
      if (providesToken(current, token)) {
        return this.bind(slot, current, SlotSource.Tree, depth);
      }
      if (this.borrow) {
        const borrowed = peekSlot(current, token)?.provider;
        if (borrowed) return this.bind(slot, borrowed, SlotSource.Borrowed, depth);
      }
    }

    const global = this.fallback.lookup(token);
    if (global) return this.bind(slot, global, SlotSource.Fallback, depth);

    throw new ProviderNotFoundError(token.label, depth, node.name);
  }

  private bind<T>(
    slot: DependencySlot<T>,
    provider: TreeNode,
    source: SlotSource,
    depth: number
  ): TreeNode {
    slot.bind(provider, source);
    this.options.onResolve?.(slot.token, source, depth);
    return provider;
  }
}

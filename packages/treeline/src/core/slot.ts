import type { SlotSource, TreeNode } from '../types/types.js';
import { FLAG_BOUND, flagToSource, sourceToFlag } from './flags.js';
import type { Token } from './token.js';

/**
 * A single typed dependency: "this node needs a value published under `token`".
 *
 * The bound provider is held through a WeakRef. The tree owns providers; a
 * slot must never keep one alive after the tree lets it go. A provider that
 * has been collected reads as unbound and is resolved again.
 *
 * @template T - Value type of the token
 */
export class DependencySlot<T = unknown> {
  private ref: WeakRef<TreeNode> | undefined;

  /** FLAG_BOUND plus source bits, see core/flags.ts */
  private flags = 0;

  constructor(readonly token: Token<T>) {}

  get provider(): TreeNode | undefined {
    const provider = this.ref?.deref();
    if (!provider && this.ref) this.clear();
    return provider;
  }

  get isResolved(): boolean {
    return this.provider !== undefined;
  }

  /** How the live binding was found; undefined once the provider is gone */
  get source(): SlotSource | undefined {
    if (!this.provider) return undefined;
    return this.flags & FLAG_BOUND ? flagToSource(this.flags) : undefined;
  }

  bind(provider: TreeNode, source: SlotSource): void {
    this.ref = new WeakRef(provider);
    this.flags = FLAG_BOUND | sourceToFlag(source);
  }

  clear(): void {
    this.ref = undefined;
    this.flags = 0;
  }
}

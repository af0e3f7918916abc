import type { Token } from '../core/token.js';
import type { FallbackRegistry } from '../registry/fallback-registry.js';
import type { Log } from '../log/log.js';

/**
 * Host-tree contract.
 *
 * Resolution only ever follows `parent`. `children` is part of the contract
 * because the activation walk (descendants before ancestors) is defined over
 * it; the resolution engine relies on that order but does not enforce it.
 */
export interface TreeNode {
  readonly parent: TreeNode | null;
  readonly children: ReadonlyArray<TreeNode>;
  /** Optional display name used in diagnostics */
  readonly name?: string;

  /**
   * Optional destruction hook. Registries holding on to a node subscribe
   * here to drop it when it is destroyed.
   *
   * @returns Function removing the listener
   */
  onDestroyed?(listener: (node: TreeNode) => void): () => void;
}

/**
 * Callback invoked with the provider node when it publishes.
 */
export type PublishListener = (provider: TreeNode) => void;

/**
 * Callback invoked once every slot of a dependent has a published provider.
 */
export type ReadyCallback<N extends TreeNode = TreeNode> = (node: N) => void;

/**
 * Where a slot's provider was found.
 *
 *   - **Tree**: an ancestor publishes the token
 *   - **Borrowed**: copied from an ancestor dependent's already-bound slot
 *   - **Fallback**: the global fallback registry
 *
 * Strings at the API boundary; slots store these as bit flags
 * (see `core/flags.ts`).
 */
export const SlotSource = {
  Tree: 'tree',
  Borrowed: 'borrowed',
  Fallback: 'fallback',
} as const;

export type SlotSource = (typeof SlotSource)[keyof typeof SlotSource];

/**
 * Resolver configuration.
 */
export interface ResolverOptions {
  /**
   * Registry consulted when the ancestor walk finds nothing.
   *
   * @default FallbackRegistry.global()
   */
  fallback?: FallbackRegistry;

  /**
   * Reuse an ancestor dependent's bound slot instead of walking past it.
   * Disabling this never changes results, only how far walks go.
   *
   * @default true
   */
  borrow?: boolean;

  /**
   * Invoked after every fresh (non-cached) resolution with the source of the
   * binding and the number of ancestors visited. Cache hits do not fire it.
   */
  onResolve?: (token: Token, source: SlotSource, depth: number) => void;
}

/**
 * LifecycleGate configuration.
 */
export interface GateOptions {
  /** @default defaultLog */
  log?: Log;
}

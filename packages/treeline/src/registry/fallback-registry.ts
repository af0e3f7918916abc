import { providesToken } from '../core/provider.js';
import type { CanonicalId, Token } from '../core/token.js';
import { defaultLog, type Log } from '../log/log.js';
import type { TreeNode } from '../types/types.js';

/**
 * Global symbol under which the process-wide registry is stored.
 *
 * Living on globalThis keeps a single registry per process even when the
 * package is bundled more than once.
 */
const GLOBAL_SYMBOL = Symbol.for('treeline.fallbackRegistry');

/**
 * Duck-typed guard: a registry created by another copy of this module is not
 * an instanceof this class but must still be reused.
 */
function isRegistry(value: unknown): value is FallbackRegistry {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof (value as FallbackRegistry).lookup === 'function' &&
    typeof (value as FallbackRegistry).register === 'function'
  );
}

/**
 * Registry of global providers ("autoloads"), consulted only after the
 * ancestor walk finds nothing.
 *
 * The host's bootstrap registers singleton provider nodes in order. Lookups
 * scan them for the first one that provides the token and cache the hit, so
 * each token is scanned for at most once until the registry changes.
 *
 * @example
 * ```typescript
 * const settings = new Node('Settings');
 * provide(settings, SettingsT, () => loadSettings());
 * FallbackRegistry.global().register(settings);
 * publish(settings);
 * ```
 */
export class FallbackRegistry {
  private readonly providers: TreeNode[] = [];
  private readonly cache = new Map<CanonicalId, TreeNode>();
  private readonly unsubscribers = new Map<TreeNode, () => void>();

  constructor(private readonly log: Log = defaultLog) {}

  /**
   * The shared process-wide registry, created on first access.
   */
  static global(): FallbackRegistry {
    const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
    if (isRegistry(existing)) return existing;
    return FallbackRegistry.resetGlobal();
  }

  /**
   * Replace the process-wide registry with an empty one.
   *
   * ⚠️ For test environments. Resolvers created earlier keep the old instance.
   */
  static resetGlobal(): FallbackRegistry {
    const fresh = new FallbackRegistry();
    Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
    return fresh;
  }

  get size(): number {
    return this.providers.length;
  }

  /**
   * Add a global provider. Earlier registrations win lookups. A provider
   * with an `onDestroyed` hook is unregistered when it is destroyed.
   */
  register(provider: TreeNode): void {
    if (this.providers.includes(provider)) {
      this.log.warn(
        `Global provider '${provider.name ?? 'anonymous'}' is already registered; ignoring.`
      );
      return;
    }
    this.providers.push(provider);
    const unsubscribe = provider.onDestroyed?.(() => {
      this.unregister(provider);
    });
    if (unsubscribe) this.unsubscribers.set(provider, unsubscribe);
  }

  /**
   * Remove a global provider and forget every cached lookup pointing at it.
   */
  unregister(provider: TreeNode): boolean {
    const index = this.providers.indexOf(provider);
    if (index === -1) return false;
    this.providers.splice(index, 1);
    this.unsubscribers.get(provider)?.();
    this.unsubscribers.delete(provider);
    for (const [id, cached] of this.cache) {
      if (cached === provider) this.cache.delete(id);
    }
    return true;
  }

  /**
   * First registered provider of `token`, or undefined. A cached provider
   * that stopped providing `token` (its record was released) is evicted and
   * the scan runs again.
   */
  lookup(token: Token): TreeNode | undefined {
    const cached = this.cache.get(token.id);
    if (cached) {
      if (providesToken(cached, token)) return cached;
      this.cache.delete(token.id);
    }
    const found = this.providers.find((p) => providesToken(p, token));
    if (found) this.cache.set(token.id, found);
    return found;
  }

  has(token: Token): boolean {
    return this.lookup(token) !== undefined;
  }

  /** Number of tokens with a cached lookup */
  get cachedCount(): number {
    return this.cache.size;
  }

  reset(): void {
    for (const unsubscribe of this.unsubscribers.values()) unsubscribe();
    this.unsubscribers.clear();
    this.providers.length = 0;
    this.cache.clear();
  }
}

/**
 * Identity-keyed side table.
 *
 * Attaches auxiliary state (provider status, dependency slots) to tree nodes
 * that do not declare it themselves. Keys are held weakly: once the tree drops
 * a node, its state is unreachable. {@link WeakRegistry.delete} exists for
 * hosts that know exactly when a node is destroyed and want the state gone at
 * that point rather than at the next collection.
 *
 * @template K - Key object (a tree node)
 * @template S - State attached to each key
 */
export class WeakRegistry<K extends object, S> {
  private states = new WeakMap<K, S>();

  /**
   * @param create - Builds the initial state for a key seen for the first time
   */
  constructor(private readonly create: (key: K) => S) {}

  getOrCreate(key: K): S {
    let state = this.states.get(key);
    if (state === undefined) {
      state = this.create(key);
      this.states.set(key, state);
    }
    return state;
  }

  get(key: K): S | undefined {
    return this.states.get(key);
  }

  set(key: K, state: S): void {
    this.states.set(key, state);
  }

  has(key: K): boolean {
    return this.states.has(key);
  }

  delete(key: K): boolean {
    return this.states.delete(key);
  }

  /**
   * Drop every entry. WeakMap has no clear(), so the map is replaced.
   */
  clear(): void {
    this.states = new WeakMap();
  }
}

import { valueEquals, type Equality } from './equality.js';

/**
 * Receives the new value and the one it replaced. On the initial
 * announcement `previous` is undefined.
 */
export type NotifierListener<T> = (current: T, previous: T | undefined) => void;

export type UpdatedListener<T> = (current: T) => void;

export interface NotifierOptions<T> {
  /** @default valueEquals */
  equals?: Equality<T>;
}

/**
 * Observe-only view of a {@link Notifier}.
 */
export interface ReadOnlyNotifier<T> {
  readonly value: T;
  readonly previous: T | undefined;
  onChanged(listener: NotifierListener<T>): () => void;
  offChanged(listener: NotifierListener<T>): boolean;
  onUpdated(listener: UpdatedListener<T>): () => void;
  offUpdated(listener: UpdatedListener<T>): boolean;
}

const remove = <L>(list: L[], listener: L): boolean => {
  const index = list.indexOf(listener);
  if (index === -1) return false;
  list.splice(index, 1);
  return true;
};

/**
 * A value that tells observers when it changes.
 *
 * The unqueued sibling of Machine: any value is accepted, so there is no
 * rejection that could leave a queue out of step, and updates made from a
 * listener simply announce inline.
 *
 * @example
 * ```typescript
 * const health = new Notifier(100, (now, before) => flash(now < (before ?? now)));
 * health.update(80); // listener gets (80, 100)
 * health.update(80); // equal, nothing announced
 * ```
 */
export class Notifier<T> implements ReadOnlyNotifier<T> {
  private current: T;
  private last: T | undefined;
  private readonly changed: NotifierListener<T>[] = [];
  private readonly updated: UpdatedListener<T>[] = [];
  private readonly equals: Equality<T>;

  constructor(initial: T, onChanged?: NotifierListener<T>, options: NotifierOptions<T> = {}) {
    this.current = initial;
    this.equals = options.equals ?? valueEquals;
    if (onChanged) this.changed.push(onChanged);
    this.announce();
  }

  get value(): T {
    return this.current;
  }

  /** Value replaced by the most recent change, or undefined before any */
  get previous(): T | undefined {
    return this.last;
  }

  onChanged(listener: NotifierListener<T>): () => void {
    this.changed.push(listener);
    return () => {
      this.offChanged(listener);
    };
  }

  offChanged(listener: NotifierListener<T>): boolean {
    return remove(this.changed, listener);
  }

  /** Like onChanged, for listeners that only need the new value */
  onUpdated(listener: UpdatedListener<T>): () => void {
    this.updated.push(listener);
    return () => {
      this.offUpdated(listener);
    };
  }

  offUpdated(listener: UpdatedListener<T>): boolean {
    return remove(this.updated, listener);
  }

  /**
   * Store `value` and announce it, unless it equals the current value.
   */
  update(value: T): void {
    if (this.equals(this.current, value)) return;
    this.last = this.current;
    this.current = value;
    this.announce();
  }

  /**
   * Announce the current value (and previous) to every listener.
   */
  announce(): void {
    const current = this.current;
    const previous = this.last;
    for (const listener of this.changed.slice()) listener(current, previous);
    for (const listener of this.updated.slice()) listener(current);
  }
}

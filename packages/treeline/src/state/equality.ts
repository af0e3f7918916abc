/**
 * Equality predicate used by Machine and Notifier.
 */
export type Equality<T> = (a: T, b: T) => boolean;

interface HasEquals {
  equals(other: unknown): boolean;
}

function hasEquals(value: object): value is HasEquals {
  return typeof (value as Partial<HasEquals>).equals === 'function';
}

function entriesEqual(a: Map<unknown, unknown>, b: Map<unknown, unknown>): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (!b.has(key) || !valueEquals(value, b.get(key))) return false;
  }
  return true;
}

function membersEqual(a: Set<unknown>, b: Set<unknown>): boolean {
  if (a.size !== b.size) return false;
  for (const value of a) if (!b.has(value)) return false;
  return true;
}

/**
 * Value equality for state objects.
 *
 *   - Primitives compare with Object.is
 *   - An object with an `equals(other)` method decides for itself
 *   - Date by time, RegExp by source and flags, Map and Set by entries
 *   - Arrays compare element-wise
 *   - Other objects are equal when they share a prototype and their own
 *     enumerable fields are value-equal
 *   - Class instances with no own enumerable fields compare by identity;
 *     their state may live in `#private` fields that cannot be inspected
 *
 * Two `new Progress(10)` instances are the same state; `Idle` and
 * `Loading` never are. Field-less states that should compare equal across
 * instances define `equals`.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  if (hasEquals(a)) return a.equals(b);
  const proto: unknown = Object.getPrototypeOf(a);
  if (proto !== Object.getPrototypeOf(b)) return false;

  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (a instanceof RegExp && b instanceof RegExp) {
    return a.source === b.source && a.flags === b.flags;
  }
  if (a instanceof Map && b instanceof Map) return entriesEqual(a, b);
  if (a instanceof Set && b instanceof Set) return membersEqual(a, b);

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valueEquals(item, b[i]));
  }

  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;
  if (keysA.length === 0 && proto !== Object.prototype && proto !== null) return false;
  return keysA.every(
    (key) =>
      Object.prototype.hasOwnProperty.call(b, key) &&
      valueEquals(Reflect.get(a, key), Reflect.get(b, key))
  );
}

/**
 * Branded type for canonical token identifiers.
 * Prevents accidental use of raw strings as slot keys.
 */
export type CanonicalId = string & { __brand: 'CanonicalId' };

/**
 * Phantom type brand tying a token to the value it stands for.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Runtime stand-in for a value type.
 *
 * Providers publish values under tokens and dependents declare slots by
 * token. The phantom parameter `T` is what makes `resolver.value(node, ConfigT)`
 * come back as a `Config` without a cast at the call site.
 *
 * @template T - The type of value published under this token
 */
export interface Token<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'token';

  /** Unique canonical identifier (val_1, val_2, ...) */
  readonly id: CanonicalId;

  /** Human-readable label for diagnostics */
  readonly label: string;

  readonly [TOKEN_BRAND]: T;
}

let _tokCounter = 0;

/**
 * Create a new value token.
 *
 * @example
 * ```typescript
 * const AudioBusT = token<AudioBus>('AudioBus');
 * const ThemeT = token<Theme>('Theme');
 * ```
 */
export function token<T = unknown>(label?: string): Token<T> {
  const t = {
    kind: 'token',
    id: `val_${++_tokCounter}` as CanonicalId,
    label: label ?? 'Token',
  } as Token<T>;
  return Object.freeze(t);
}

/**
 * Runtime guard for public inputs that must be tokens.
 */
export function isToken(x: unknown): x is Token<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Token).kind === 'token' &&
    typeof (x as Token).id === 'string' &&
    typeof (x as Token).label === 'string'
  );
}

/**
 * Create several tokens sharing a label prefix.
 *
 * @example
 * ```typescript
 * const Level = tokenGroup('Level', {
 *   Map: null as unknown as TileMap,
 *   Spawner: null as unknown as Spawner,
 * });
 * // Level.Map: Token<TileMap>, labelled 'LevelMap'
 * ```
 */
export function tokenGroup<T extends Record<string, unknown>>(
  prefix: string,
  shape: T
): { [K in keyof T]: Token<T[K]> } {
  const group = {} as { [K in keyof T]: Token<T[K]> };
  for (const key of Object.keys(shape) as Array<keyof T>) {
    group[key] = token<T[typeof key]>(`${prefix}${String(key)}`);
  }
  return group;
}

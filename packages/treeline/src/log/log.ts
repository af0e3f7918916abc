/**
 * Thrown by {@link Log.assert} when its condition does not hold.
 */
export class AssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssertionError';
  }
}

/**
 * Output sink for runtime diagnostics.
 *
 * Components take a `log` option; anything with these methods works, so a
 * host can route messages into its own console or test spies.
 */
export interface Log {
  print(message: string): void;
  warn(message: string): void;
  error(message: string): void;

  /** Logs `message` as an error and throws {@link AssertionError} if `condition` is false. */
  assert(condition: boolean, message: string): asserts condition;

  /**
   * Run `call` and return its result. A thrown error is logged, handed to
   * `onError`, then rethrown.
   */
  run<T>(call: () => T, onError?: (error: unknown) => void): T;

  /**
   * Run `call`, returning `fallback` instead if it throws. The error is
   * logged as a warning and not rethrown.
   */
  always<T>(call: () => T, fallback: T): T;
}

const errorText = (error: unknown): string =>
  error instanceof Error ? (error.stack ?? `${error.name}: ${error.message}`) : String(error);

/**
 * Default log writing to the console with a `[prefix]` tag.
 */
export class ConsoleLog implements Log {
  constructor(private readonly prefix = 'treeline') {}

  print(message: string): void {
    console.log(`[${this.prefix}] ${message}`);
  }

  warn(message: string): void {
    console.warn(`[${this.prefix}] ${message}`);
  }

  error(message: string): void {
    console.error(`[${this.prefix}] ${message}`);
  }

  assert(condition: boolean, message: string): asserts condition {
    if (!condition) {
      this.error(message);
      throw new AssertionError(message);
    }
  }

  run<T>(call: () => T, onError?: (error: unknown) => void): T {
    try {
      return call();
    } catch (e) {
      this.error('An error occurred.');
      this.error(errorText(e));
      onError?.(e);
      throw e;
    }
  }

  always<T>(call: () => T, fallback: T): T {
    try {
      return call();
    } catch (e) {
      this.warn(`An error occurred. Using fallback value \`${String(fallback)}\`.`);
      this.warn(errorText(e));
      return fallback;
    }
  }
}

/**
 * Log that discards messages but keeps assert/run/always semantics.
 */
export const silentLog: Log = {
  print: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  assert(condition: boolean, message: string): asserts condition {
    if (!condition) throw new AssertionError(message);
  },
  run: (call) => call(),
  always: (call, fallback) => {
    try {
      return call();
    } catch {
      return fallback;
    }
  },
};

export const defaultLog: Log = new ConsoleLog();

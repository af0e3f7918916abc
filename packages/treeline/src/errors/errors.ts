const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Render a state or token-like value for error messages.
 *
 * Class instances print as their constructor name plus fields, plain values
 * go through JSON, and anything unserializable falls back to String().
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value !== 'object' || value === null) return String(value);

  const ctorName = Object.getPrototypeOf(value)?.constructor?.name;
  let body: string;
  try {
    body = JSON.stringify(value);
  } catch {
    body = String(value);
  }
  if (ctorName && ctorName !== 'Object' && ctorName !== 'Array') {
    return body === '{}' ? ctorName : `${ctorName} ${body}`;
  }
  return body;
}

/**
 * No ancestor and no fallback registry entry publishes the requested token.
 */
export class ProviderNotFoundError extends Error {
  constructor(
    public token: string,
    public ancestorsSearched: number,
    public nodeName?: string
  ) {
    const from = nodeName ? ` (requested by '${nodeName}')` : '';
    const dev = [
      `No provider found for '${token}'${from}.`,
      '',
      `Searched ${ancestorsSearched} ancestor(s) and the fallback registry.`,
      '',
      'To fix this:',
      `  1. Call provide(node, ${token}, () => value) on an ancestor of the dependent`,
      `  2. Or register a global provider: FallbackRegistry.global().register(node)`,
      `  3. Check that the dependent is attached to the tree before resolving`,
    ];
    super(format(`No provider found for '${token}'${from}.`, dev));
    this.name = 'ProviderNotFoundError';
  }
}

/**
 * Lifecycle gating was requested for a node that declares no slots.
 */
export class NoDependencySlotsError extends Error {
  constructor(public nodeName: string) {
    const dev = [
      `'${nodeName}' does not declare any dependencies.`,
      '',
      'attachAndWait() needs at least one slot to wait for.',
      '',
      'To fix this:',
      `  1. Declare slots while constructing the node: dependent(this).need(SomeT)`,
      `  2. Or pass the tokens explicitly: gate.attachAndWait(node, onReady, [SomeT])`,
    ];
    super(format(`'${nodeName}' does not declare any dependencies.`, dev));
    this.name = 'NoDependencySlotsError';
  }
}

/**
 * A cached binding no longer matches the token it was bound for.
 *
 * Seeing this means a slot or provider table was corrupted; it is a bug, not
 * a configuration problem.
 */
export class UnexpectedBindingTypeError extends Error {
  constructor(
    public token: string,
    public reason: string
  ) {
    const dev = [
      'Unexpected binding type',
      '',
      `Binding for '${token}' is invalid: ${reason}.`,
      '',
      'Slots are only bound to nodes that provide their token. If a provider',
      'stopped publishing a token, invalidate its dependents so they re-resolve.',
    ];
    super(format(`Unexpected binding for '${token}': ${reason}.`, dev));
    this.name = 'UnexpectedBindingTypeError';
  }
}

/**
 * A state rejected the requested next state.
 */
export class InvalidStateTransitionError<S = unknown> extends Error {
  constructor(
    public current: S,
    public desired: S
  ) {
    const from = describeValue(current);
    const to = describeValue(desired);
    const dev = [
      `Invalid state transition between ${from} and ${to}.`,
      '',
      `${from}.canTransitionTo(${to}) returned false.`,
      'Transitions queued after this one were discarded.',
    ];
    super(format(`Invalid state transition between ${from} and ${to}.`, dev));
    this.name = 'InvalidStateTransitionError';
  }
}

export class InvalidTokenError extends Error {
  constructor(public token: unknown) {
    let tokenString: string;
    try {
      tokenString = JSON.stringify(token) ?? String(token);
    } catch {
      tokenString = String(token);
    }

    const dev = [
      'Invalid token parameter',
      '',
      `Expected a Token created with token<T>('Label').`,
      '',
      'Received:',
      `  ${tokenString}`,
    ];
    super(format('Invalid token parameter.', dev));
    this.name = 'InvalidTokenError';
  }
}

/**
 * Rejected change to the built-in Node tree.
 */
export class TreeStructureError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid tree operation', '', `Cannot change the tree: ${reason}.`];
    super(format(`Invalid tree operation: ${reason}.`, dev));
    this.name = 'TreeStructureError';
  }
}

/* Machine
 *
 * Queued, order-preserving state machine.
 *
 * update() appends to a pending queue. If no drain is running, it starts
 * one: each queued state is compared with the current state (equal -> skip),
 * checked against the transition predicate, applied, and announced to every
 * observer before the next one is taken. Observers may call update() during
 * an announcement; because a drain is already running, the call only
 * enqueues, and the same loop applies it next. Nothing recurses, so chains
 * of re-entrant transitions keep a flat stack.
 *
 * A rejected transition ends the drain: the queue is discarded and
 * InvalidStateTransitionError is thrown to whoever started the drain.
 * Transitions applied before it stay applied.
 *
 * States:
 * ```typescript
 * type Door = Closed | Open;
 * class Closed { canTransitionTo(next: Door) { return next instanceof Open; } }
 * class Open { canTransitionTo(next: Door) { return next instanceof Closed; } }
 *
 * const door = new Machine<Door>(new Closed(), (s) => render(s));
 * door.update(new Open());
 * ```
 */

import { describeValue, InvalidStateTransitionError } from '../errors/errors.js';
import { defaultLog, type Log } from '../log/log.js';
import { valueEquals, type Equality } from './equality.js';

/**
 * Optional shape of machine states. A state without `canTransitionTo`
 * accepts every transition.
 */
export interface MachineState<S> {
  canTransitionTo?(next: S): boolean;
}

export type MachineListener<S> = (state: S) => void;

export interface MachineOptions<S> {
  /**
   * State equality; equal states are skipped without announcing.
   *
   * @default valueEquals
   */
  equals?: Equality<S>;

  /**
   * Transition predicate used instead of the states' own `canTransitionTo`.
   */
  canTransition?: (from: S, to: S) => boolean;

  /**
   * Receives a warning when a transition is rejected.
   *
   * @default defaultLog
   */
  log?: Log;
}

/**
 * Observe-only view. Hand this out when callers may watch but not drive the
 * machine.
 */
export interface ReadOnlyMachine<S> {
  readonly state: S;
  onChanged(listener: MachineListener<S>): () => void;
  offChanged(listener: MachineListener<S>): boolean;
}

function hasPredicate<S>(state: unknown): state is Required<MachineState<S>> {
  return (
    typeof state === 'object' &&
    state !== null &&
    typeof (state as MachineState<S>).canTransitionTo === 'function'
  );
}

function stateAllows<S>(from: S, to: S): boolean {
  return hasPredicate<S>(from) ? from.canTransitionTo(to) : true;
}

export class Machine<S> implements ReadOnlyMachine<S> {
  private current: S;
  private readonly queue: S[] = [];
  private busy = false;
  private readonly listeners: MachineListener<S>[] = [];

  private readonly equals: Equality<S>;
  private readonly canTransition: (from: S, to: S) => boolean;
  private readonly log: Log;

  /**
   * Create a machine and announce `initial` once.
   *
   * @param initial - Initial state; there is no implicit empty state
   * @param onChanged - Optional first observer, receives the initial announcement
   */
  constructor(initial: S, onChanged?: MachineListener<S>, options: MachineOptions<S> = {}) {
    this.current = initial;
    this.equals = options.equals ?? valueEquals;
    this.canTransition = options.canTransition ?? stateAllows;
    this.log = options.log ?? defaultLog;
    if (onChanged) this.listeners.push(onChanged);
    this.announce();
  }

  get state(): S {
    return this.current;
  }

  /** True while a drain loop is running */
  get isBusy(): boolean {
    return this.busy;
  }

  /** Transitions queued but not yet applied */
  get pending(): number {
    return this.queue.length;
  }

  onChanged(listener: MachineListener<S>): () => void {
    this.listeners.push(listener);
    return () => {
      this.offChanged(listener);
    };
  }

  offChanged(listener: MachineListener<S>): boolean {
    const index = this.listeners.indexOf(listener);
    if (index === -1) return false;
    this.listeners.splice(index, 1);
    return true;
  }

  /**
   * Request a transition to `next`.
   *
   * @throws {InvalidStateTransitionError} if a queued transition is rejected
   *   while this call is draining; later queued transitions are discarded
   */
  update(next: S): void {
    this.queue.push(next);
    if (this.busy) return;
    this.drain();
  }

  /**
   * Announce the current state to every observer. update() calls this after
   * each applied transition; call it directly to force a re-broadcast.
   */
  announce(): void {
    if (this.busy) {
      this.notify();
      return;
    }
    this.drain(true);
  }

  private notify(): void {
    const state = this.current;
    for (const listener of this.listeners.slice()) listener(state);
  }

  private drain(announceFirst = false): void {
    this.busy = true;
    try {
      if (announceFirst) this.notify();
      while (this.queue.length > 0) {
        const desired = this.queue[0];
        this.queue.shift();
        if (this.equals(this.current, desired)) continue;

        if (!this.canTransition(this.current, desired)) {
          const dropped = this.queue.length;
          this.log.warn(
            `Rejected transition ${describeValue(this.current)} -> ${describeValue(desired)}; ` +
              `${dropped} queued transition(s) dropped.`
          );
          throw new InvalidStateTransitionError(this.current, desired);
        }

        this.current = desired;
        this.notify();
      }
    } catch (e) {
      this.queue.length = 0;
      throw e;
    } finally {
      this.busy = false;
    }
  }
}

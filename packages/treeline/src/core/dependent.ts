/* Dependent
 *
 * Per-node record of declared dependencies and their slots, kept in a
 * module-level WeakRegistry so tree nodes need not carry it.
 *
 * Declarations vs. slots:
 *  - Declarations (need()) are made once, while the node is constructed,
 *    and survive re-activation.
 *  - Slots hold resolved bindings. They are dropped by reset() whenever the
 *    node's position in the tree may have changed, and recreated lazily by
 *    the resolver.
 *
 * Usage:
 * ```typescript
 * class Hud extends Node {
 *   constructor() {
 *     super('Hud');
 *     dependent(this).need(ThemeT).need(PlayerT);
 *   }
 * }
 * ```
 */

import { InvalidTokenError } from '../errors/errors.js';
import type { TreeNode } from '../types/types.js';
import { DependencySlot } from './slot.js';
import { isToken, type CanonicalId, type Token } from './token.js';
import { WeakRegistry } from './weak-registry.js';

/**
 * What a dependent keeps of its lifecycle-gate attachment: enough to cancel
 * it when the node is invalidated or attached again.
 */
export interface PendingAttachment {
  readonly pending: number;
  readonly isReady: boolean;
  readonly isCancelled: boolean;
  cancel(): void;
}

export class Dependent {
  private readonly declared: Token[] = [];

  /**
   * Slot bindings keyed by token id. Lazily allocated on first slotFor().
   */
  private slots?: Map<CanonicalId, DependencySlot>;

  /**
   * Most recent gate attachment, if any.
   *
   * @internal Managed by LifecycleGate
   */
  attachment?: PendingAttachment;

  constructor(readonly node: TreeNode) {}

  /**
   * Declare a slot for `token`. Declaring the same token twice is a no-op.
   *
   * @throws {InvalidTokenError} if `token` is not a Token
   */
  need(token: Token): this {
    if (!isToken(token)) throw new InvalidTokenError(token);
    if (!this.declared.some((t) => t.id === token.id)) this.declared.push(token);
    return this;
  }

  /** Declared tokens, in declaration order */
  get tokens(): readonly Token[] {
    return this.declared;
  }

  slot<T>(token: Token<T>): DependencySlot<T> | undefined {
    // Keyed by token id, so the slot was created for this token
    return this.slots?.get(token.id) as DependencySlot<T> | undefined;
  }

  slotFor<T>(token: Token<T>): DependencySlot<T> {
    const existing = this.slot(token);
    if (existing) return existing;
    const slot = new DependencySlot(token);
    (this.slots ??= new Map()).set(token.id, slot);
    return slot;
  }

  /** Number of slots currently allocated (bound or not) */
  get slotCount(): number {
    return this.slots?.size ?? 0;
  }

  /**
   * Drop every slot binding. Declarations are kept.
   */
  reset(): void {
    if (!this.slots) return;
    for (const slot of this.slots.values()) slot.clear();
    this.slots = undefined;
  }
}

const dependents = new WeakRegistry<TreeNode, Dependent>((node) => new Dependent(node));

/**
 * The dependent record for `node`, created on first use.
 */
export function dependent(node: TreeNode): Dependent {
  return dependents.getOrCreate(node);
}

export function isDependent(node: TreeNode): boolean {
  return dependents.has(node);
}

/**
 * Read another node's slot for `token` without creating any state.
 */
export function peekSlot<T>(node: TreeNode, token: Token<T>): DependencySlot<T> | undefined {
  return dependents.get(node)?.slot(token);
}

/**
 * @internal Called by release() when a node is destroyed
 */
export function forgetDependent(node: TreeNode): boolean {
  const record = dependents.get(node);
  if (!record) return false;
  record.attachment?.cancel();
  record.reset();
  return dependents.delete(node);
}

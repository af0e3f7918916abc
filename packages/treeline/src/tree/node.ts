/* Node
 *
 * Minimal host tree for applications without an engine of their own, and
 * the tree the test suite runs against.
 *
 * Activation:
 *  activate() visits descendants before ancestors (post-order) and calls
 *  ready() on each. Dependents attach in ready(); providers publish in
 *  ready(). Because children are ready first, a dependent normally attaches
 *  before the providers above it publish.
 *
 * Structure changes:
 *  - removeChild() invalidates the removed subtree (slots reset, pending
 *    attachments cancelled, providers must publish again)
 *  - addChild() of a detached subtree that was activated or has resolved
 *    slots invalidates it the same way
 *  - destroy() detaches and releases the side-table state of the subtree
 */

import { dependent, isDependent } from '../core/dependent.js';
import { release, invalidate } from '../core/release.js';
import { TreeStructureError } from '../errors/errors.js';
import type { TreeNode } from '../types/types.js';

export class Node implements TreeNode {
  private _parent: Node | null = null;
  private readonly _children: Node[] = [];
  private _activated = false;
  private _destroyed = false;
  private destroyListeners?: Set<(node: Node) => void>;

  constructor(public name: string = 'Node') {}

  get parent(): Node | null {
    return this._parent;
  }

  get children(): ReadonlyArray<Node> {
    return this._children;
  }

  get isActivated(): boolean {
    return this._activated;
  }

  get isDestroyed(): boolean {
    return this._destroyed;
  }

  get root(): Node {
    let current: Node = this;
    while (current._parent) current = current._parent;
    return current;
  }

  /** Names from the root down to this node */
  get path(): string[] {
    const names: string[] = [];
    for (let current: Node | null = this; current; current = current._parent) {
      names.unshift(current.name);
    }
    return names;
  }

  *ancestors(): IterableIterator<Node> {
    for (let current = this._parent; current; current = current._parent) yield current;
  }

  /** This node and its descendants, children before parents */
  *subtree(): IterableIterator<Node> {
    for (const child of this._children) yield* child.subtree();
    yield this;
  }

  /**
   * Attach `child`, detaching it from its current parent first.
   *
   * @throws {TreeStructureError} if the child is destroyed, or is this node
   *   or one of its ancestors
   */
  addChild<C extends Node>(child: C): C {
    const node: Node = child;
    if (node._destroyed || this._destroyed) {
      throw new TreeStructureError(`cannot attach '${node.name}': node is destroyed`);
    }
    if (node === this || [...this.ancestors()].includes(node)) {
      throw new TreeStructureError(`'${node.name}' is '${this.name}' or one of its ancestors`);
    }
    if (node._parent) node._parent.removeChild(node);
    else if (node.hasResolutionState()) node.invalidateSubtree();
    this._children.push(node);
    node._parent = this;
    return child;
  }

  removeChild(child: Node): boolean {
    const index = this._children.indexOf(child);
    if (index === -1) return false;
    this._children.splice(index, 1);
    child._parent = null;
    child.invalidateSubtree();
    return true;
  }

  /** Whether anything in this subtree was activated or has resolved a slot */
  private hasResolutionState(): boolean {
    for (const node of this.subtree()) {
      if (node._activated) return true;
      if (isDependent(node) && dependent(node).slotCount > 0) return true;
    }
    return false;
  }

  private invalidateSubtree(): void {
    for (const node of this.subtree()) {
      invalidate(node);
      node._activated = false;
    }
  }

  /**
   * Run the activation walk over this subtree. Already-activated nodes are
   * skipped, so activating a parent after adding a child only readies the
   * new child.
   */
  activate(): void {
    for (const child of this._children.slice()) child.activate();
    if (this._activated) return;
    this._activated = true;
    this.ready();
  }

  /**
   * Activation hook. Subclasses publish or attach here.
   */
  protected ready(): void {}

  /**
   * Called with this node once it is destroyed.
   *
   * @returns Function removing the listener
   */
  onDestroyed(listener: (node: Node) => void): () => void {
    (this.destroyListeners ??= new Set()).add(listener);
    return () => this.destroyListeners?.delete(listener);
  }

  /**
   * Detach this node and destroy its subtree, releasing all side-table
   * state. Idempotent.
   */
  destroy(): void {
    if (this._destroyed) return;
    this._parent?.removeChild(this);
    for (const child of this._children.slice()) child.destroy();
    this._destroyed = true;
    release(this);
    const listeners = this.destroyListeners;
    this.destroyListeners = undefined;
    if (listeners) for (const listener of listeners) listener(this);
  }
}

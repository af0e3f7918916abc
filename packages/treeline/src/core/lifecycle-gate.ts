/* LifecycleGate
 *
 * Fires a dependent's ready callback once, after every provider its slots
 * resolve to has published.
 *
 * Flow per attachAndWait():
 *  1. Cancel the node's previous attachment and reset its slots
 *  2. Resolve each slot's provider
 *  3. Published providers count down immediately; the rest get a one-shot
 *     listener that unsubscribes itself and counts down
 *  4. When the countdown hits zero, onReady(node) runs exactly once
 *
 * Ordering:
 *  The gate does not schedule anything. Hosts activate descendants before
 *  ancestors, so a dependent usually attaches before its providers publish;
 *  the countdown makes the result independent of that order.
 */

import { NoDependencySlotsError } from '../errors/errors.js';
import { defaultLog, type Log } from '../log/log.js';
import type { GateOptions, PublishListener, ReadyCallback, TreeNode } from '../types/types.js';
import { dependent, type PendingAttachment } from './dependent.js';
import { hasPublished, listen, stopListening } from './provider.js';
import { Resolver } from './resolver.js';
import type { Token } from './token.js';

/**
 * Handle for one attachAndWait() call.
 */
export class Attachment<N extends TreeNode = TreeNode> implements PendingAttachment {
  private remaining: number;
  private fired = false;
  private cancelled = false;
  private readonly listeners: Array<{ provider: TreeNode; listener: PublishListener }> = [];

  constructor(
    readonly node: N,
    readonly tokens: readonly Token[],
    private readonly onReady: ReadyCallback<N>
  ) {
    this.remaining = tokens.length;
  }

  /** Slots whose provider has not published yet */
  get pending(): number {
    return this.remaining;
  }

  get isReady(): boolean {
    return this.fired;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Remove every listener still registered. The ready callback will not fire.
   */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    for (const { provider, listener } of this.listeners) stopListening(provider, listener);
    this.listeners.length = 0;
  }

  /** @internal */
  wait(provider: TreeNode): void {
    if (hasPublished(provider)) {
      this.countDown();
      return;
    }
    const listener: PublishListener = () => {
      stopListening(provider, listener);
      const index = this.listeners.findIndex((l) => l.listener === listener);
      if (index !== -1) this.listeners.splice(index, 1);
      this.countDown();
    };
    this.listeners.push({ provider, listener });
    listen(provider, listener);
  }

  private countDown(): void {
    if (this.cancelled || this.remaining === 0) return;
    this.remaining--;
    if (this.remaining === 0 && !this.fired) {
      this.fired = true;
      this.onReady(this.node);
    }
  }
}

export class LifecycleGate {
  private readonly log: Log;

  constructor(
    readonly resolver: Resolver = new Resolver(),
    options: GateOptions = {}
  ) {
    this.log = options.log ?? defaultLog;
  }

  /**
   * Resolve every slot of `node` and call `onReady` once all of their
   * providers have published. If they all have already, `onReady` runs
   * before this returns.
   *
   * @param node - Dependent node
   * @param onReady - Ready callback, invoked at most once per attachment
   * @param tokens - Slots to wait for; defaults to the node's declared tokens
   * @throws {NoDependencySlotsError} if there is nothing to wait for
   * @throws {ProviderNotFoundError} if a slot cannot be resolved; no
   *   listeners are left behind in that case
   *
   * @example
   * ```typescript
   * class Hud extends Node {
   *   constructor(private readonly gate: LifecycleGate) {
   *     super('Hud');
   *     dependent(this).need(ThemeT);
   *   }
   *   protected override ready() {
   *     this.gate.attachAndWait(this, () => this.applyTheme());
   *   }
   * }
   * ```
   */
  attachAndWait<N extends TreeNode>(
    node: N,
    onReady: ReadyCallback<N>,
    tokens?: readonly Token[]
  ): Attachment<N> {
    const record = dependent(node);
    const wanted = tokens ?? record.tokens;
    if (wanted.length === 0) {
      throw new NoDependencySlotsError(node.name ?? node.constructor.name);
    }

    const previous = record.attachment;
    if (previous && !previous.isReady && !previous.isCancelled) {
      this.log.warn(
        `Re-attaching '${node.name ?? 'anonymous'}' with ${previous.pending} slot(s) still pending; ` +
          'previous attachment cancelled.'
      );
    }
    previous?.cancel();
    record.reset();

    const attachment = new Attachment(node, wanted, onReady);
    record.attachment = attachment;

    try {
      for (const token of wanted) {
        attachment.wait(this.resolver.resolve(node, token));
      }
    } catch (e) {
      attachment.cancel();
      throw e;
    }
    return attachment;
  }

  /**
   * Cancel the pending attachment of `node`, if any.
   */
  detach(node: TreeNode): boolean {
    const record = dependent(node);
    const attachment = record.attachment;
    if (!attachment || attachment.isCancelled) return false;
    attachment.cancel();
    record.attachment = undefined;
    return true;
  }
}

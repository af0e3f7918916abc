import type { TreeNode } from '../types/types.js';
import { dependent, forgetDependent, isDependent } from './dependent.js';
import { forgetProvider, unpublish } from './provider.js';

/**
 * Mark `node`'s resolution context as stale.
 *
 * Its slot bindings are dropped, a pending gate attachment is cancelled, and
 * if it is a provider it must publish again. Hosts call this when a node
 * leaves its position in the tree.
 */
export function invalidate(node: TreeNode): void {
  if (isDependent(node)) {
    const record = dependent(node);
    record.attachment?.cancel();
    record.attachment = undefined;
    record.reset();
  }
  unpublish(node);
}

/**
 * Delete every side-table entry for `node`. Hosts call this from their
 * destruction notification; the entries would otherwise linger until the
 * node is collected.
 */
export function release(node: TreeNode): void {
  forgetDependent(node);
  forgetProvider(node);
}

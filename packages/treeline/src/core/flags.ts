/*
 * Slot flag bits
 * --------------
 * Compact state stored in DependencySlot.flags.
 *
 *   Bit 0:     Bound (a provider reference is cached)
 *   Bits 1-2:  Binding source (tree / borrowed / fallback)
 *   Bits 3-31: Reserved
 */

import { SlotSource } from '../types/types.js';

export const FLAG_BOUND = 1 << 0;

export const SOURCE_TREE = 0b01 << 1;
export const SOURCE_BORROWED = 0b10 << 1;
export const SOURCE_FALLBACK = 0b11 << 1;

/**
 * Mask extracting the source bits: `flags & SOURCE_MASK`.
 */
export const SOURCE_MASK = 0b11 << 1;

export function sourceToFlag(source: SlotSource): number {
  switch (source) {
    case SlotSource.Tree:
      return SOURCE_TREE;
    case SlotSource.Borrowed:
      return SOURCE_BORROWED;
    case SlotSource.Fallback:
      return SOURCE_FALLBACK;
  }
}

export function flagToSource(flags: number): SlotSource | undefined {
  switch (flags & SOURCE_MASK) {
    case SOURCE_TREE:
      return SlotSource.Tree;
    case SOURCE_BORROWED:
      return SlotSource.Borrowed;
    case SOURCE_FALLBACK:
      return SlotSource.Fallback;
    default:
      return undefined;
  }
}

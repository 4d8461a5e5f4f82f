/**
 * An entered block on the reader's stack.
 */
import type { BlockTag } from '../constants/block-tags.js';

export interface Block {
  readonly tag: BlockTag;
  /** Absolute stream position where the block's payload ends. */
  readonly endOffset: number;
}

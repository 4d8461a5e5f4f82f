/**
 * Sequential reader over a HIP byte stream with a stack of nested blocks.
 *
 * Every block is `tag: u32 | length: u32 | payload`, big-endian. Leaving a block
 * always seeks to its declared end, so unread trailing fields are skipped.
 */
import { HIP_STRING_SIZE, MAX_BLOCK_DEPTH, formatBlockTag } from './constants/block-tags.js';
import type { BlockTag } from './constants/block-tags.js';
import { HipIoError, HipStructureError } from './errors.js';
import type { Block } from './types/block.js';

export interface BlockReaderOptions {
  /** Log each entered block as `TAG: length`, indented by depth. */
  readonly trace?: boolean;
}

export class BlockReader {
  private readonly buffer: Buffer;
  private readonly stack: Block[] = [];
  private readonly trace: boolean;
  private offset = 0;

  constructor(buffer: Buffer, { trace = false }: BlockReaderOptions = {}) {
    this.buffer = buffer;
    this.trace = trace;
  }

  /** Absolute stream position of the cursor. */
  get position(): number {
    return this.offset;
  }

  /** Number of blocks currently entered. */
  get depth(): number {
    return this.stack.length;
  }

  /** End offset of the current region: the innermost block, or the whole stream. */
  get regionEnd(): number {
    const top: Block | undefined = this.stack[this.stack.length - 1];
    return top ? top.endOffset : this.buffer.length;
  }

  /** Slash-separated tags of the entered blocks, outermost first. */
  get blockPath(): string {
    return this.stack.map((block: Block) => formatBlockTag(block.tag)).join('/');
  }

  hasRemaining(): boolean {
    return this.offset < this.regionEnd;
  }

  readU32(): number {
    if (this.offset + 4 > this.buffer.length) {
      throw this.ioError(`Unexpected end of stream reading u32 at offset ${this.offset}`);
    }
    const value: number = this.buffer.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  /**
   * Reads a NUL-terminated string stored in a field of `maxLength` bytes.
   * Characters past `maxLength - 1` are consumed up to the terminator but not kept,
   * and one padding byte follows when the consumed length is odd.
   */
  readBoundedString(maxLength: number = HIP_STRING_SIZE): string {
    const start: number = this.offset;
    const terminator: number = this.buffer.indexOf(0, start);
    if (terminator === -1) {
      throw this.ioError(`Unterminated string at offset ${start}`);
    }
    const keep: number = Math.min(terminator - start, Math.max(maxLength - 1, 0));
    const value: string = this.buffer.toString('latin1', start, start + keep);
    const consumed: number = terminator - start + 1;
    this.offset = terminator + 1;
    if (consumed & 1) {
      this.offset += 1;
    }
    return value;
  }

  /** Copies `length` bytes into a new buffer owned by the caller. */
  readBytes(length: number): Buffer {
    if (this.offset + length > this.buffer.length) {
      throw this.ioError(`Unexpected end of stream reading ${length} bytes at offset ${this.offset}`);
    }
    const bytes: Buffer = Buffer.from(this.buffer.subarray(this.offset, this.offset + length));
    this.offset += length;
    return bytes;
  }

  skip(length: number): void {
    this.offset += length;
  }

  /**
   * Enters the next child block of the current region.
   * @returns The child's tag, or null when the region has no bytes left
   * @throws {HipStructureError} If the stack is full or a nested child overruns its parent
   * @throws {HipIoError} If the block header is truncated or a top-level block runs past the stream
   */
  enterBlock(): BlockTag | null {
    const parentEnd: number = this.regionEnd;
    if (this.offset >= parentEnd) {
      return null;
    }
    if (this.stack.length >= MAX_BLOCK_DEPTH) {
      throw this.structureError(`Maximum block depth of ${MAX_BLOCK_DEPTH} exceeded`);
    }

    const tag: BlockTag = this.readU32();
    const length: number = this.readU32();
    const endOffset: number = this.offset + length;
    if (endOffset > parentEnd) {
      if (this.stack.length === 0) {
        throw this.ioError(`Block ${formatBlockTag(tag)} ends at ${endOffset}, past the end of the stream at ${parentEnd}`);
      }
      throw this.structureError(`Block ${formatBlockTag(tag)} ends at ${endOffset}, past its parent's end at ${parentEnd}`);
    }

    if (this.trace) {
      console.log(`${'  '.repeat(this.stack.length)}${formatBlockTag(tag)}: ${length}`);
    }

    this.stack.push({ tag, endOffset });
    return tag;
  }

  /** Leaves the innermost block and seeks to its end. */
  exitBlock(): void {
    const block: Block | undefined = this.stack.pop();
    if (!block) {
      throw this.structureError('exitBlock called with no open block');
    }
    this.offset = block.endOffset;
  }

  ioError(message: string, cause?: unknown): HipIoError {
    return new HipIoError(message, this.blockPath, this.stack.length, cause);
  }

  structureError(message: string): HipStructureError {
    return new HipStructureError(message, this.blockPath, this.stack.length);
  }
}

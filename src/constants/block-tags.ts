/**
 * Four-character block tags used by HIP archives.
 */

/** Numeric tag as stored in the stream (big-endian ASCII). */
export type BlockTag = number;

/**
 * Packs a four-character code into its big-endian u32 form.
 * @throws {RangeError} If the code is not exactly four characters
 */
export function blockTag(code: string): BlockTag {
  if (code.length !== 4) {
    throw new RangeError(`Block tag must be four characters: "${code}"`);
  }
  return ((code.charCodeAt(0) << 24) | (code.charCodeAt(1) << 16) | (code.charCodeAt(2) << 8) | code.charCodeAt(3)) >>> 0;
}

/** Unpacks a tag back into its four-character code. */
export function formatBlockTag(tag: BlockTag): string {
  return String.fromCharCode((tag >>> 24) & 0xff, (tag >>> 16) & 0xff, (tag >>> 8) & 0xff, tag & 0xff);
}

export const HIPA: BlockTag = blockTag('HIPA');
export const PACK: BlockTag = blockTag('PACK');
export const PVER: BlockTag = blockTag('PVER');
export const PFLG: BlockTag = blockTag('PFLG');
export const PCNT: BlockTag = blockTag('PCNT');
export const PCRT: BlockTag = blockTag('PCRT');
export const PMOD: BlockTag = blockTag('PMOD');
export const PLAT: BlockTag = blockTag('PLAT');
export const DICT: BlockTag = blockTag('DICT');
export const ATOC: BlockTag = blockTag('ATOC');
export const AINF: BlockTag = blockTag('AINF');
export const AHDR: BlockTag = blockTag('AHDR');
export const ADBG: BlockTag = blockTag('ADBG');
export const LTOC: BlockTag = blockTag('LTOC');
export const LINF: BlockTag = blockTag('LINF');
export const LHDR: BlockTag = blockTag('LHDR');
export const LDBG: BlockTag = blockTag('LDBG');
export const STRM: BlockTag = blockTag('STRM');
export const DHDR: BlockTag = blockTag('DHDR');
export const DPAK: BlockTag = blockTag('DPAK');

/** Maximum nesting depth of the block stack. */
export const MAX_BLOCK_DEPTH = 8;

/** Storage size of every fixed-width string field, terminator included. */
export const HIP_STRING_SIZE = 32;

/**
 * hipdiff - Main entry point
 *
 * Decodes HIP archives and computes structural diffs between them.
 */

export { HipBinary } from './hip-binary.js';
export { BlockReader } from './block-reader.js';
export type { BlockReaderOptions } from './block-reader.js';
export { blockTag, formatBlockTag, MAX_BLOCK_DEPTH, HIP_STRING_SIZE } from './constants/block-tags.js';
export type { BlockTag } from './constants/block-tags.js';
export { HipDecodeError, HipIoError, HipStructureError, ReportConfigError } from './errors.js';

export { diffPackages, isEmptyDiff, DEFAULT_DIFF_OPTIONS } from './diff.js';
export { renderDiffReport, DEFAULT_COLUMN_WIDTH } from './report.js';
export type { ReportOptions } from './report.js';

export type * from './types/hip-package.js';
export type * from './types/diff-result.js';

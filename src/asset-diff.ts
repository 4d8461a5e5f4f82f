/**
 * Asset reconciliation. Assets are matched by ID, so table order does not matter.
 */
import assert from 'node:assert/strict';
import { HipBinary } from './hip-binary.js';
import type {
  AssetCrossReference, AssetDiff, AssetField, CountedDiff, DiffCounts, DiffOptions, FieldChange,
} from './types/diff-result.js';
import type { AssetEntry, HipPackage } from './types/hip-package.js';
import { ZERO_COUNTS, addCounts, countOf } from './utils/diff-counts.js';
import { decimal, hex8 } from './utils/format.js';

export interface AssetDiffOutput {
  readonly diffs: AssetDiff[];
  readonly crossReference: AssetCrossReference;
}

interface AssetPair {
  baseline?: AssetEntry;
  modified?: AssetEntry;
}

type AssetDiffSwitches = Pick<DiffOptions, 'detailed' | 'trustChecksums' | 'includeOffsets' | 'includePluses'>;

/** Short content digest shown when only the payload bytes differ. */
function payloadDigest(pkg: HipPackage, asset: AssetEntry): string {
  return `sha256:${HipBinary.hashPayload({ payload: HipBinary.payload({ pkg, asset }) }).slice(0, 12)}`;
}

function isDataChanged(
  baseline: HipPackage,
  modified: HipPackage,
  before: AssetEntry,
  after: AssetEntry,
  trustChecksums: boolean
): boolean {
  if (trustChecksums) {
    return before.debug.checksum !== after.debug.checksum;
  }
  if (before.size !== after.size) {
    return true;
  }
  return !HipBinary.payload({ pkg: baseline, asset: before }).equals(HipBinary.payload({ pkg: modified, asset: after }));
}

/**
 * Lists the fields that differ between two matched assets, in AHDR then ADBG order.
 */
function compareAssets(
  baseline: HipPackage,
  modified: HipPackage,
  before: AssetEntry,
  after: AssetEntry,
  options: AssetDiffSwitches
): FieldChange<AssetField>[] {
  assert.equal(before.id, after.id, 'matched assets must share an ID');

  const fields: FieldChange<AssetField>[] = [];
  const push = (field: AssetField, left: string, right: string): void => {
    fields.push({ field, before: left, after: right });
  };

  if (before.type !== after.type) push('type', hex8(before.type), hex8(after.type));
  if (options.includeOffsets && before.offset !== after.offset) push('offset', decimal(before.offset), decimal(after.offset));
  if (before.size !== after.size) push('size', decimal(before.size), decimal(after.size));
  if (options.includePluses && before.plus !== after.plus) push('plus', decimal(before.plus), decimal(after.plus));
  if (before.flags !== after.flags) push('flags', hex8(before.flags), hex8(after.flags));
  if (isDataChanged(baseline, modified, before, after, options.trustChecksums)) {
    if (options.trustChecksums) {
      push('data', hex8(before.debug.checksum), hex8(after.debug.checksum));
    } else {
      push('data', payloadDigest(baseline, before), payloadDigest(modified, after));
    }
  }
  if (before.debug.align !== after.debug.align) push('align', decimal(before.debug.align), decimal(after.debug.align));
  if (before.debug.name !== after.debug.name) push('name', before.debug.name, after.debug.name);
  if (before.debug.filename !== after.debug.filename) push('filename', before.debug.filename, after.debug.filename);
  if (before.debug.checksum !== after.debug.checksum) push('checksum', hex8(before.debug.checksum), hex8(after.debug.checksum));

  return fields;
}

/**
 * Matches assets by ID and classifies each as added, removed or changed.
 * Results are ordered by ascending asset ID. The IDs present on only one side
 * are returned for the layer pass.
 */
export function diffAssets(
  baseline: HipPackage,
  modified: HipPackage,
  options: AssetDiffSwitches
): CountedDiff<AssetDiffOutput> {
  const pairs = new Map<number, AssetPair>();
  for (const asset of baseline.assets) {
    pairs.set(asset.id, { baseline: asset });
  }
  for (const asset of modified.assets) {
    const pair: AssetPair | undefined = pairs.get(asset.id);
    if (pair) {
      pair.modified = asset;
    } else {
      pairs.set(asset.id, { modified: asset });
    }
  }

  const diffs: AssetDiff[] = [];
  const addedIds = new Set<number>();
  const removedIds = new Set<number>();
  let counts: DiffCounts = ZERO_COUNTS;

  const sorted: [number, AssetPair][] = [...pairs.entries()].sort(([a]: [number, AssetPair], [b]: [number, AssetPair]) => a - b);
  for (const [id, { baseline: before, modified: after }] of sorted) {
    if (after && !before) {
      diffs.push({ kind: 'added', asset: after });
      addedIds.add(id);
      counts = addCounts(counts, countOf('added'));
    } else if (before && !after) {
      diffs.push({ kind: 'removed', asset: before });
      removedIds.add(id);
      counts = addCounts(counts, countOf('removed'));
    } else if (before && after) {
      const fields: FieldChange<AssetField>[] = compareAssets(baseline, modified, before, after, options);
      if (fields.length > 0) {
        diffs.push({ kind: 'changed', before, after, fields: options.detailed ? fields : [] });
        counts = addCounts(counts, countOf('changed'));
      }
    }
  }

  return { value: { diffs, crossReference: { addedIds, removedIds } }, counts };
}

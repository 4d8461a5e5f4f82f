/**
 * Structural diff of two decoded HIP archives.
 */
import { diffAssets } from './asset-diff.js';
import type { AssetDiffOutput } from './asset-diff.js';
import { diffLayers } from './layer-diff.js';
import { diffMetadata } from './metadata-diff.js';
import type { CountedDiff, DiffCounts, DiffOptions, HipDiffResult, LayerDiff, MetadataSection } from './types/diff-result.js';
import type { HipPackage } from './types/hip-package.js';
import { ZERO_COUNTS, addCounts } from './utils/diff-counts.js';

export const DEFAULT_DIFF_OPTIONS: DiffOptions = {
  assetsOnly: false,
  detailed: false,
  trustChecksums: false,
  includeOffsets: false,
  includePluses: false,
};

/**
 * Compares a baseline archive against a modified one.
 *
 * Passes run metadata, assets, then layers, and their counts are summed in
 * that order. The layer pass consumes the asset pass's added/removed IDs so an
 * asset created or deleted outright is reported once.
 *
 * @param baseline - The original archive
 * @param modified - The archive to compare against it
 * @param options - Switches; omitted ones are off
 */
export function diffPackages(
  baseline: HipPackage,
  modified: HipPackage,
  options: Partial<DiffOptions> = {}
): HipDiffResult {
  const resolved: DiffOptions = { ...DEFAULT_DIFF_OPTIONS, ...options };
  let counts: DiffCounts = ZERO_COUNTS;

  let metadata: MetadataSection[] = [];
  if (!resolved.assetsOnly) {
    const pass: CountedDiff<MetadataSection[]> = diffMetadata(baseline, modified);
    metadata = pass.value;
    counts = addCounts(counts, pass.counts);
  }

  const assetPass: CountedDiff<AssetDiffOutput> = diffAssets(baseline, modified, resolved);
  counts = addCounts(counts, assetPass.counts);

  let layers: LayerDiff[] = [];
  if (!resolved.assetsOnly) {
    const pass: CountedDiff<LayerDiff[]> = diffLayers(baseline, modified, assetPass.value.crossReference);
    layers = pass.value;
    counts = addCounts(counts, pass.counts);
  }

  return { options: resolved, metadata, assets: assetPass.value.diffs, layers, counts };
}

/** True when the result holds no differences at all. */
export function isEmptyDiff(result: HipDiffResult): boolean {
  return result.counts.additions === 0 && result.counts.deletions === 0 && result.counts.modifications === 0;
}

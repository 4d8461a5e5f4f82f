/**
 * Layer reconciliation.
 *
 * Layers carry no identity of their own, so they are grouped by type and paired by
 * position within each group. Reordering same-type layers, or inserting one in the
 * middle of a group, therefore shows up as a run of per-layer changes.
 */
import type {
  AssetCrossReference, AssetRef, CountedDiff, DiffCounts, FieldChange, LayerDiff, LayerField,
} from './types/diff-result.js';
import type { AssetEntry, HipPackage, LayerEntry } from './types/hip-package.js';
import { ZERO_COUNTS, addCounts, countOf } from './utils/diff-counts.js';
import { decimal } from './utils/format.js';

interface TypeGroup {
  readonly baseline: number[];
  readonly modified: number[];
}

/**
 * Resolves asset IDs to their debug names within one package.
 */
class AssetNames {
  private readonly names: Map<number, string>;

  constructor(pkg: HipPackage) {
    this.names = new Map(pkg.assets.map((asset: AssetEntry): [number, string] => [asset.id, asset.debug.name]));
  }

  ref(id: number): AssetRef {
    return { id, name: this.names.get(id) ?? null };
  }
}

function groupByType(baseline: HipPackage, modified: HipPackage): [number, TypeGroup][] {
  const groups = new Map<number, TypeGroup>();
  const groupFor = (type: number): TypeGroup => {
    let group: TypeGroup | undefined = groups.get(type);
    if (!group) {
      group = { baseline: [], modified: [] };
      groups.set(type, group);
    }
    return group;
  };
  baseline.layers.forEach((layer: LayerEntry, index: number) => groupFor(layer.type).baseline.push(index));
  modified.layers.forEach((layer: LayerEntry, index: number) => groupFor(layer.type).modified.push(index));
  return [...groups.entries()].sort(([a]: [number, TypeGroup], [b]: [number, TypeGroup]) => a - b);
}

/**
 * IDs in `ids` that are not in `other` and not in `excluded`, without repeats, in layer order.
 */
function membershipDelta(ids: readonly number[], other: ReadonlySet<number>, excluded: ReadonlySet<number>): number[] {
  return [...new Set(ids)].filter((id: number) => !other.has(id) && !excluded.has(id));
}

function diffLayerPair(
  before: LayerEntry,
  after: LayerEntry,
  beforeIndex: number,
  afterIndex: number,
  baselineNames: AssetNames,
  modifiedNames: AssetNames,
  crossReference: AssetCrossReference
): CountedDiff<LayerDiff | null> {
  const addedMembers: AssetRef[] = membershipDelta(after.assetIds, new Set(before.assetIds), crossReference.addedIds)
    .map((id: number) => modifiedNames.ref(id));
  const removedMembers: AssetRef[] = membershipDelta(before.assetIds, new Set(after.assetIds), crossReference.removedIds)
    .map((id: number) => baselineNames.ref(id));
  const fields: FieldChange<LayerField>[] = [];
  if (before.debug.misc !== after.debug.misc) {
    fields.push({ field: 'misc', before: decimal(before.debug.misc), after: decimal(after.debug.misc) });
  }

  if (addedMembers.length === 0 && removedMembers.length === 0 && fields.length === 0) {
    return { value: null, counts: ZERO_COUNTS };
  }
  return {
    value: { kind: 'changed', type: before.type, beforeIndex, afterIndex, addedMembers, removedMembers, fields },
    counts: { additions: addedMembers.length, deletions: removedMembers.length, modifications: 1 },
  };
}

/**
 * Pairs layers per type by position and classifies each pair.
 * Membership changes caused by an asset being added or removed outright are
 * left out; the asset pass already reports them.
 */
export function diffLayers(
  baseline: HipPackage,
  modified: HipPackage,
  crossReference: AssetCrossReference
): CountedDiff<LayerDiff[]> {
  const baselineNames = new AssetNames(baseline);
  const modifiedNames = new AssetNames(modified);
  const diffs: LayerDiff[] = [];
  let counts: DiffCounts = ZERO_COUNTS;

  for (const [, group] of groupByType(baseline, modified)) {
    const pairCount: number = Math.max(group.baseline.length, group.modified.length);
    for (let i = 0; i < pairCount; i++) {
      const beforeIndex: number | undefined = group.baseline[i];
      const afterIndex: number | undefined = group.modified[i];

      if (beforeIndex === undefined && afterIndex !== undefined) {
        const layer: LayerEntry = modified.layers[afterIndex];
        const members: AssetRef[] = layer.assetIds
          .filter((id: number) => !crossReference.addedIds.has(id))
          .map((id: number) => modifiedNames.ref(id));
        diffs.push({ kind: 'added', layer, index: afterIndex, members });
        counts = addCounts(counts, countOf('added'));
      } else if (afterIndex === undefined && beforeIndex !== undefined) {
        const layer: LayerEntry = baseline.layers[beforeIndex];
        const members: AssetRef[] = layer.assetIds
          .filter((id: number) => !crossReference.removedIds.has(id))
          .map((id: number) => baselineNames.ref(id));
        diffs.push({ kind: 'removed', layer, index: beforeIndex, members });
        counts = addCounts(counts, countOf('removed'));
      } else if (beforeIndex !== undefined && afterIndex !== undefined) {
        const pair: CountedDiff<LayerDiff | null> = diffLayerPair(
          baseline.layers[beforeIndex],
          modified.layers[afterIndex],
          beforeIndex,
          afterIndex,
          baselineNames,
          modifiedNames,
          crossReference
        );
        if (pair.value) {
          diffs.push(pair.value);
          counts = addCounts(counts, pair.counts);
        }
      }
    }
  }

  return { value: diffs, counts };
}

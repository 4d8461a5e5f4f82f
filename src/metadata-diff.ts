/**
 * Field-by-field comparison of the PACK metadata and directory info scalars.
 */
import type { CountedDiff, DiffCounts, MetadataEntry, MetadataSection, MetadataSectionId } from './types/diff-result.js';
import type { HipPackage, PackagePlatform } from './types/hip-package.js';
import { ZERO_COUNTS, addCounts, countOf } from './utils/diff-counts.js';
import { decimal, hex, hex8, normalizeText, quoted } from './utils/format.js';

/**
 * Collects the entries of one section.
 */
class SectionBuilder {
  private readonly entries: MetadataEntry[] = [];

  constructor(private readonly id: MetadataSectionId, private readonly title: string) {}

  /** Adds a changed entry when the two values differ. */
  compare<T>(field: string, before: T, after: T, format: (value: T) => string): this {
    if (before !== after) {
      this.entries.push({ kind: 'changed', field, before: format(before), after: format(after) });
    }
    return this;
  }

  added(field: string, after: string): this {
    this.entries.push({ kind: 'added', field, after });
    return this;
  }

  removed(field: string, before: string): this {
    this.entries.push({ kind: 'removed', field, before });
    return this;
  }

  build(): MetadataSection {
    return { id: this.id, title: this.title, entries: this.entries };
  }
}

const text = (value: string): string => quoted(normalizeText(value));

function diffPlatform(baseline: PackagePlatform | null, modified: PackagePlatform | null): MetadataSection {
  const section = new SectionBuilder('platform', 'PLAT');
  if (baseline && !modified) {
    section.removed('id', hex8(baseline.id));
    baseline.strings.forEach((value: string, index: number) => section.removed(`strings[${index}]`, text(value)));
  } else if (!baseline && modified) {
    section.added('id', hex8(modified.id));
    modified.strings.forEach((value: string, index: number) => section.added(`strings[${index}]`, text(value)));
  } else if (baseline && modified) {
    section.compare('id', baseline.id, modified.id, hex8);
    const stringCount: number = Math.max(baseline.strings.length, modified.strings.length);
    for (let i = 0; i < stringCount; i++) {
      const before: string | undefined = baseline.strings[i];
      const after: string | undefined = modified.strings[i];
      const field = `strings[${i}]`;
      if (before === undefined && after !== undefined) {
        section.added(field, text(after));
      } else if (after === undefined && before !== undefined) {
        section.removed(field, text(before));
      } else if (before !== undefined && after !== undefined) {
        section.compare(field, normalizeText(before), normalizeText(after), quoted);
      }
    }
  }
  return section.build();
}

/**
 * Compares every metadata group, in declaration order.
 * Each entry counts once toward the totals.
 */
export function diffMetadata(baseline: HipPackage, modified: HipPackage): CountedDiff<MetadataSection[]> {
  const sections: MetadataSection[] = [
    new SectionBuilder('version', 'PVER')
      .compare('subVersion', baseline.version.subVersion, modified.version.subVersion, hex)
      .compare('clientVersion', baseline.version.clientVersion, modified.version.clientVersion, hex)
      .compare('compatVersion', baseline.version.compatVersion, modified.version.compatVersion, hex)
      .build(),
    new SectionBuilder('flags', 'PFLG')
      .compare('flags', baseline.flags, modified.flags, hex)
      .build(),
    new SectionBuilder('counts', 'PCNT')
      .compare('assetCount', baseline.counts.assetCount, modified.counts.assetCount, decimal)
      .compare('layerCount', baseline.counts.layerCount, modified.counts.layerCount, decimal)
      .compare('maxAssetSize', baseline.counts.maxAssetSize, modified.counts.maxAssetSize, decimal)
      .compare('maxLayerSize', baseline.counts.maxLayerSize, modified.counts.maxLayerSize, decimal)
      .compare('maxXformAssetSize', baseline.counts.maxXformAssetSize, modified.counts.maxXformAssetSize, decimal)
      .build(),
    new SectionBuilder('creation', 'PCRT')
      .compare('time', baseline.creation.time, modified.creation.time, decimal)
      .compare('note', normalizeText(baseline.creation.note), normalizeText(modified.creation.note), quoted)
      .build(),
    new SectionBuilder('modification', 'PMOD')
      .compare('time', baseline.modification.time, modified.modification.time, decimal)
      .build(),
    diffPlatform(baseline.platform, modified.platform),
    new SectionBuilder('miscInfo', 'AINF/LINF')
      .compare('ainf', baseline.miscInfo.asset, modified.miscInfo.asset, decimal)
      .compare('linf', baseline.miscInfo.layer, modified.miscInfo.layer, decimal)
      .build(),
  ];

  const counts: DiffCounts = sections
    .flatMap((section: MetadataSection) => section.entries)
    .reduce((total: DiffCounts, entry: MetadataEntry) => addCounts(total, countOf(entry.kind)), ZERO_COUNTS);

  return { value: sections, counts };
}

/**
 * Structured result of comparing two HIP archives.
 */
import type { AssetEntry, LayerEntry } from './hip-package.js';

export type DiffKind = 'added' | 'removed' | 'changed';

/**
 * Switches controlling a diff run. All default to false.
 */
export interface DiffOptions {
  /** Compare assets only; metadata and layer sections stay empty. */
  readonly assetsOnly: boolean;
  /** Record per-field changes for modified assets. */
  readonly detailed: boolean;
  /** Decide payload changes from stored checksums without reading payload bytes. */
  readonly trustChecksums: boolean;
  readonly includeOffsets: boolean;
  readonly includePluses: boolean;
}

export interface DiffCounts {
  readonly additions: number;
  readonly deletions: number;
  readonly modifications: number;
}

/**
 * A value produced by one diff pass together with the counts it contributes.
 */
export interface CountedDiff<T> {
  readonly value: T;
  readonly counts: DiffCounts;
}

export type MetadataSectionId =
  | 'version'
  | 'flags'
  | 'counts'
  | 'creation'
  | 'modification'
  | 'platform'
  | 'miscInfo';

/**
 * One line of a metadata section. `before` is absent for additions, `after` for removals.
 */
export interface MetadataEntry {
  readonly kind: DiffKind;
  readonly field: string;
  readonly before?: string;
  readonly after?: string;
}

export interface MetadataSection {
  readonly id: MetadataSectionId;
  /** Block tag the section was read from, e.g. `PVER`. */
  readonly title: string;
  readonly entries: readonly MetadataEntry[];
}

export type AssetField =
  | 'type'
  | 'offset'
  | 'size'
  | 'plus'
  | 'flags'
  | 'data'
  | 'align'
  | 'name'
  | 'filename'
  | 'checksum';

export interface FieldChange<F extends string = string> {
  readonly field: F;
  readonly before: string;
  readonly after: string;
}

export type AssetDiff =
  | { readonly kind: 'added'; readonly asset: AssetEntry }
  | { readonly kind: 'removed'; readonly asset: AssetEntry }
  | {
      readonly kind: 'changed';
      readonly before: AssetEntry;
      readonly after: AssetEntry;
      /** Empty unless the diff ran in detailed mode. */
      readonly fields: readonly FieldChange<AssetField>[];
    };

/**
 * Asset referenced by a layer. `name` is null when the ID is not in the asset table.
 */
export interface AssetRef {
  readonly id: number;
  readonly name: string | null;
}

export type LayerField = 'misc';

export type LayerDiff =
  | { readonly kind: 'added'; readonly layer: LayerEntry; readonly index: number; readonly members: readonly AssetRef[] }
  | { readonly kind: 'removed'; readonly layer: LayerEntry; readonly index: number; readonly members: readonly AssetRef[] }
  | {
      readonly kind: 'changed';
      readonly type: number;
      readonly beforeIndex: number;
      readonly afterIndex: number;
      readonly addedMembers: readonly AssetRef[];
      readonly removedMembers: readonly AssetRef[];
      readonly fields: readonly FieldChange<LayerField>[];
    };

/**
 * Asset IDs that only exist on one side, handed from the asset pass to the layer pass.
 */
export interface AssetCrossReference {
  readonly addedIds: ReadonlySet<number>;
  readonly removedIds: ReadonlySet<number>;
}

export interface HipDiffResult {
  readonly options: DiffOptions;
  readonly metadata: readonly MetadataSection[];
  readonly assets: readonly AssetDiff[];
  readonly layers: readonly LayerDiff[];
  readonly counts: DiffCounts;
}

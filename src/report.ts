/**
 * Two-column text rendering of a diff result.
 */
import { ReportConfigError } from './errors.js';
import type {
  AssetDiff,
  AssetField,
  AssetRef,
  DiffKind,
  FieldChange,
  HipDiffResult,
  LayerDiff,
  LayerField,
  MetadataEntry,
} from './types/diff-result.js';
import type { AssetEntry, LayerEntry } from './types/hip-package.js';
import { decimal, hex8, quoted } from './utils/format.js';

export const DEFAULT_COLUMN_WIDTH = 50;

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const RESET = '\x1b[0m';

const ADBG_FIELDS: ReadonlySet<AssetField> = new Set<AssetField>(['align', 'name', 'filename', 'checksum']);

const LAYER_FIELD_LABELS: Record<LayerField, string> = {
  misc: 'ldbg',
};

const KIND_COLORS: Record<DiffKind, string> = {
  added: GREEN,
  removed: RED,
  changed: YELLOW,
};

export interface ReportOptions {
  readonly leftTitle: string;
  readonly rightTitle: string;
  /** Minimum width of each column; grows to fit the titles. */
  readonly columnWidth?: number;
  readonly color?: boolean;
}

/** A report line before column layout: left and right cell text. */
interface ReportRow {
  readonly kind: DiffKind;
  readonly left: string;
  readonly right: string;
}

/**
 * Emits rows for one side of an added/removed entity.
 */
function sideRows(kind: 'added' | 'removed', texts: readonly string[]): ReportRow[] {
  return texts.map((text: string): ReportRow => (kind === 'added' ? { kind, left: '', right: text } : { kind, left: text, right: '' }));
}

function metadataRow(entry: MetadataEntry): ReportRow {
  const label = `  ${entry.field}: `;
  return {
    kind: entry.kind,
    left: entry.before === undefined ? '' : `${label}${entry.before}`,
    right: entry.after === undefined ? '' : `${label}${entry.after}`,
  };
}

function assetDetailLines(asset: AssetEntry): string[] {
  return [
    `  AHDR (${asset.debug.name})`,
    `    id: ${hex8(asset.id)}`,
    `    type: ${hex8(asset.type)}`,
    `    offset: ${decimal(asset.offset)}`,
    `    size: ${decimal(asset.size)}`,
    `    plus: ${decimal(asset.plus)}`,
    `    flags: ${hex8(asset.flags)}`,
    '    ADBG',
    `      align: ${decimal(asset.debug.align)}`,
    `      name: ${asset.debug.name}`,
    `      filename: ${asset.debug.filename}`,
    `      checksum: ${hex8(asset.debug.checksum)}`,
  ];
}

function changeRow(label: string, change: FieldChange<AssetField | LayerField>, indent: string): ReportRow {
  return { kind: 'changed', left: `${indent}${label}: ${change.before}`, right: `${indent}${label}: ${change.after}` };
}

/** Header field rows, then the ADBG sub-header and its rows when a debug field changed. */
function assetFieldRows(fields: readonly FieldChange<AssetField>[]): ReportRow[] {
  const header = fields.filter((change) => !ADBG_FIELDS.has(change.field));
  const debug = fields.filter((change) => ADBG_FIELDS.has(change.field));
  const rows: ReportRow[] = header.map((change) => changeRow(change.field, change, '    '));
  if (debug.length > 0) {
    rows.push({ kind: 'changed', left: '    ADBG', right: '    ADBG' });
    rows.push(...debug.map((change) => changeRow(change.field, change, '      ')));
  }
  return rows;
}

function assetRows(diff: AssetDiff, detailed: boolean): ReportRow[] {
  switch (diff.kind) {
    case 'added':
    case 'removed':
      return sideRows(diff.kind, detailed ? assetDetailLines(diff.asset) : [`  ${diff.asset.debug.name}`]);
    case 'changed': {
      if (!detailed) {
        return [{ kind: 'changed', left: `  ${diff.before.debug.name}`, right: `  ${diff.after.debug.name}` }];
      }
      return [
        { kind: 'changed', left: `  AHDR (${diff.before.debug.name})`, right: `  AHDR (${diff.after.debug.name})` },
        ...assetFieldRows(diff.fields),
      ];
    }
  }
}

function memberText(ref: AssetRef): string {
  return ref.name ?? hex8(ref.id);
}

function layerSideLines(layer: LayerEntry, members: readonly AssetRef[]): string[] {
  return [
    `  LHDR (${decimal(layer.type)})`,
    `    type: ${decimal(layer.type)}`,
    ...members.map((ref: AssetRef) => `    ${memberText(ref)}`),
    '    LDBG',
    `      ldbg: ${decimal(layer.debug.misc)}`,
  ];
}

function layerRows(diff: LayerDiff): ReportRow[] {
  switch (diff.kind) {
    case 'added':
    case 'removed':
      return sideRows(diff.kind, layerSideLines(diff.layer, diff.members));
    case 'changed': {
      const title = `  LHDR (${decimal(diff.type)})`;
      const rows: ReportRow[] = [
        { kind: 'changed', left: title, right: title },
        ...diff.addedMembers.map((ref: AssetRef): ReportRow => ({ kind: 'added', left: '', right: `    ${quoted(memberText(ref))}` })),
        ...diff.removedMembers.map((ref: AssetRef): ReportRow => ({ kind: 'removed', left: `    ${quoted(memberText(ref))}`, right: '' })),
      ];
      if (diff.fields.length > 0) {
        rows.push({ kind: 'changed', left: '    LDBG', right: '    LDBG' });
        rows.push(...diff.fields.map((change): ReportRow => changeRow(LAYER_FIELD_LABELS[change.field], change, '      ')));
      }
      return rows;
    }
  }
}

/**
 * Renders a diff result as report lines, without trailing newlines.
 *
 * @throws {ReportConfigError} If `columnWidth` is not a positive integer
 */
export function renderDiffReport(result: HipDiffResult, options: ReportOptions): string[] {
  const requested: number = options.columnWidth ?? DEFAULT_COLUMN_WIDTH;
  if (!Number.isInteger(requested) || requested <= 0) {
    throw new ReportConfigError(`Column width must be a positive integer, got ${requested}`);
  }
  const width: number = Math.max(requested, options.leftTitle.length + 1, options.rightTitle.length + 1);
  const color: boolean = options.color ?? true;

  const lines: string[] = [];
  const line = (left: string, right: string): string => `${left.padEnd(width)}${right.padEnd(width)}`;
  const title = (text: string, count?: number): void => {
    const label: string = count === undefined ? text : `${text} (${count})`;
    lines.push(line(label, label));
  };
  const rows = (entries: readonly ReportRow[]): void => {
    for (const row of entries) {
      const text: string = line(row.left, row.right);
      lines.push(color ? `${KIND_COLORS[row.kind]}${text}${RESET}` : text);
    }
  };
  const group = <T>(label: string, items: readonly T[], render: (item: T) => ReportRow[]): void => {
    if (items.length > 0) {
      title(label, items.length);
      rows(items.flatMap(render));
    }
  };

  lines.push(line(options.leftTitle, options.rightTitle));
  lines.push('='.repeat(width * 2));

  for (const section of result.metadata) {
    if (section.entries.length > 0) {
      title(section.title);
      rows(section.entries.map(metadataRow));
    }
  }

  const detailed: boolean = result.options.detailed;
  const assetRender = (diff: AssetDiff): ReportRow[] => assetRows(diff, detailed);
  group('Added assets', result.assets.filter((diff: AssetDiff) => diff.kind === 'added'), assetRender);
  group('Deleted assets', result.assets.filter((diff: AssetDiff) => diff.kind === 'removed'), assetRender);
  group('Modified assets', result.assets.filter((diff: AssetDiff) => diff.kind === 'changed'), assetRender);
  group('Added layers', result.layers.filter((diff: LayerDiff) => diff.kind === 'added'), layerRows);
  group('Deleted layers', result.layers.filter((diff: LayerDiff) => diff.kind === 'removed'), layerRows);
  group('Modified layers', result.layers.filter((diff: LayerDiff) => diff.kind === 'changed'), layerRows);

  lines.push('');
  lines.push(`${result.counts.additions} addition(s), ${result.counts.deletions} deletion(s), ${result.counts.modifications} modification(s)`);
  return lines;
}

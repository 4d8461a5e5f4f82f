import { describe, expect, it } from 'vitest';
import { diffPackages } from './diff.js';
import { ReportConfigError } from './errors.js';
import { HipBinary } from './hip-binary.js';
import { renderDiffReport } from './report.js';
import { buildHip } from './test-support/hip-builder.js';
import type { HipFixture } from './test-support/hip-builder.js';
import type { HipPackage } from './types/hip-package.js';

function load(fixture: HipFixture): HipPackage {
  return HipBinary.decode({ buffer: buildHip(fixture) });
}

const baseline = load({ assets: [{ id: 1, payload: 'a', name: 'one' }], layers: [{ type: 1, assetIds: [1] }] });
const modified = load({
  assets: [
    { id: 1, payload: 'a', name: 'one' },
    { id: 2, payload: 'b', name: 'two' },
  ],
  layers: [{ type: 1, assetIds: [1, 2] }],
});

describe('renderDiffReport', () => {
  it('lays out sections in two columns with a totals line', () => {
    const lines = renderDiffReport(diffPackages(baseline, modified), {
      leftTitle: 'a.hip',
      rightTitle: 'b.hip',
      columnWidth: 10,
      color: false,
    });

    expect(lines).toEqual([
      'a.hip     b.hip     ',
      '====================',
      'PCNT      PCNT      ',
      '  assetCount: 1  assetCount: 2',
      'Added assets (1)Added assets (1)',
      '            two     ',
      '',
      '1 addition(s), 0 deletion(s), 1 modification(s)',
    ]);
  });

  it('colours rows by kind', () => {
    const lines = renderDiffReport(diffPackages(baseline, modified), {
      leftTitle: 'a.hip',
      rightTitle: 'b.hip',
      columnWidth: 10,
    });

    expect(lines[3]).toBe('\x1b[33m  assetCount: 1  assetCount: 2\x1b[0m');
    expect(lines[5]).toBe('\x1b[32m            two     \x1b[0m');
  });

  it('widens the columns to fit the titles', () => {
    const lines = renderDiffReport(diffPackages(baseline, baseline), {
      leftTitle: 'x'.repeat(12),
      rightTitle: 'b.hip',
      columnWidth: 5,
      color: false,
    });

    expect(lines).toEqual([
      `${'x'.repeat(12)} b.hip        `,
      '='.repeat(26),
      '',
      '0 addition(s), 0 deletion(s), 0 modification(s)',
    ]);
  });

  it('prints full headers for added assets in detailed mode', () => {
    const lines = renderDiffReport(diffPackages(baseline, modified, { detailed: true, assetsOnly: true }), {
      leftTitle: 'a',
      rightTitle: 'b',
      columnWidth: 4,
      color: false,
    });

    expect(lines.slice(2, 8)).toEqual([
      'Added assets (1)Added assets (1)',
      '      AHDR (two)',
      '        id: 0x00000002',
      '        type: 0x54455854',
      `        offset: ${modified.assets[1].offset}`,
      '        size: 1',
    ]);
  });

  it('prints layer membership changes', () => {
    const assets = [
      { id: 1, payload: 'a', name: 'one' },
      { id: 2, payload: 'b', name: 'two' },
    ];
    const before = load({ assets, layers: [{ type: 1, assetIds: [1, 2] }, { type: 2, assetIds: [] }] });
    const after = load({ assets, layers: [{ type: 1, assetIds: [1] }, { type: 2, assetIds: [2] }] });

    const lines = renderDiffReport(diffPackages(before, after), {
      leftTitle: 'a',
      rightTitle: 'b',
      columnWidth: 12,
      color: false,
    });

    expect(lines).toEqual([
      'a           b           ',
      '========================',
      'Modified layers (2)Modified layers (2)',
      '  LHDR (1)    LHDR (1)  ',
      '    "two"               ',
      '  LHDR (2)    LHDR (2)  ',
      '                "two"   ',
      '',
      '1 addition(s), 1 deletion(s), 2 modification(s)',
    ]);
  });

  it('groups changed debug fields under an ADBG sub-header', () => {
    const before = load({ assets: [{ id: 1, payload: 'a', name: 'one' }], layers: [{ type: 1, assetIds: [1] }] });
    const after = load({ assets: [{ id: 1, payload: 'a', name: 'uno', flags: 4 }], layers: [{ type: 1, assetIds: [1] }] });

    const lines = renderDiffReport(diffPackages(before, after, { detailed: true, assetsOnly: true }), {
      leftTitle: 'a',
      rightTitle: 'b',
      columnWidth: 12,
      color: false,
    });

    expect(lines).toEqual([
      'a           b           ',
      '========================',
      'Modified assets (1)Modified assets (1)',
      '  AHDR (one)  AHDR (uno)',
      '    flags: 0x00000000    flags: 0x00000004',
      '    ADBG        ADBG    ',
      '      name: one      name: uno',
      '',
      '0 addition(s), 0 deletion(s), 1 modification(s)',
    ]);
  });

  it('prints a changed layer debug value under LDBG', () => {
    const assets = [{ id: 1, payload: 'a', name: 'one' }];
    const before = load({ assets, layers: [{ type: 1, assetIds: [1] }] });
    const after = load({ assets, layers: [{ type: 1, assetIds: [1], misc: 3 }] });

    const lines = renderDiffReport(diffPackages(before, after), {
      leftTitle: 'a',
      rightTitle: 'b',
      columnWidth: 12,
      color: false,
    });

    expect(lines).toEqual([
      'a           b           ',
      '========================',
      'Modified layers (1)Modified layers (1)',
      '  LHDR (1)    LHDR (1)  ',
      '    LDBG        LDBG    ',
      '      ldbg: 0      ldbg: 3',
      '',
      '0 addition(s), 0 deletion(s), 1 modification(s)',
    ]);
  });

  it.each([0, -3, 2.5])('rejects a column width of %d', (columnWidth) => {
    expect(() =>
      renderDiffReport(diffPackages(baseline, baseline), { leftTitle: 'a', rightTitle: 'b', columnWidth })
    ).toThrow(ReportConfigError);
  });
});

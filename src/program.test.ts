import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommanderError } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createProgram, runDiff } from './program.js';
import type { CliOptions } from './program.js';
import { buildHip } from './test-support/hip-builder.js';

const options: CliOptions = {
  assetsOnly: false,
  detailed: false,
  checksums: false,
  offsets: false,
  pluses: false,
  width: 50,
  color: false,
  trace: false,
};

describe('runDiff', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hipdiff-cli-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('prints a report for two archives', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const original = join(dir, 'original.hip');
    const modified = join(dir, 'modified.hip');
    await writeFile(original, buildHip({ assets: [{ id: 1, payload: 'a' }], layers: [{ type: 1, assetIds: [1] }] }));
    await writeFile(modified, buildHip({ assets: [{ id: 1, payload: 'b' }], layers: [{ type: 1, assetIds: [1] }] }));

    await expect(runDiff(original, modified, options)).resolves.toBe(true);

    const width = Math.max(50, original.length + 1, modified.length + 1);
    const printed = log.mock.calls.map((call) => call[0]);
    expect(printed[0]).toBe(`${original.padEnd(width)}${modified.padEnd(width)}`);
    expect(printed[1]).toBe('='.repeat(width * 2));
    expect(printed[2]).toBe(`${'Modified assets (1)'.padEnd(width)}${'Modified assets (1)'.padEnd(width)}`);
    expect(printed[3]).toBe(`${'  asset_1'.padEnd(width)}${'  asset_1'.padEnd(width)}`);
    expect(printed[printed.length - 1]).toBe('0 addition(s), 0 deletion(s), 1 modification(s)');
  });

  it('reports an unreadable archive and returns false', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const missing = join(dir, 'missing.hip');

    await expect(runDiff(missing, missing, options)).resolves.toBe(false);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe(`❌ Could not read file '${missing}':`);
  });
});

describe('createProgram', () => {
  it('rejects a non-positive column width', async () => {
    const program = createProgram().exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });

    await expect(program.parseAsync(['-w', '0', 'a.hip', 'b.hip'], { from: 'user' })).rejects.toBeInstanceOf(CommanderError);
  });

  it('maps flags onto options', () => {
    const program = createProgram();
    program.parseOptions(['-a', '-d', '-c', '-o', '-p', '--no-color', '-w', '72']);

    expect(program.opts()).toEqual({
      assetsOnly: true,
      detailed: true,
      checksums: true,
      offsets: true,
      pluses: true,
      width: 72,
      color: false,
      trace: false,
    });
  });
});

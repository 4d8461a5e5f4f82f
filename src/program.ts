/**
 * hipdiff command definition.
 */
import { Command, InvalidArgumentError } from 'commander';
import { diffPackages } from './diff.js';
import { HipBinary } from './hip-binary.js';
import { DEFAULT_COLUMN_WIDTH, renderDiffReport } from './report.js';
import type { HipPackage } from './types/hip-package.js';

// Version is set at build time
const version = '0.1.0';

export interface CliOptions {
  readonly assetsOnly: boolean;
  readonly detailed: boolean;
  readonly checksums: boolean;
  readonly offsets: boolean;
  readonly pluses: boolean;
  readonly width: number;
  readonly color: boolean;
  readonly trace: boolean;
}

function parseColumnWidth(value: string): number {
  const width: number = Number(value);
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidArgumentError('Column width must be a positive integer.');
  }
  return width;
}

async function readPackage(filePath: string, trace: boolean): Promise<HipPackage | null> {
  try {
    return await HipBinary.read({ filePath, trace });
  } catch (error) {
    console.error(`❌ Could not read file '${filePath}':`, error instanceof Error ? error.message : String(error));
    return null;
  }
}

/**
 * Decodes both archives, diffs them and prints the report.
 * @returns false when either archive could not be decoded
 */
export async function runDiff(originalPath: string, modifiedPath: string, options: CliOptions): Promise<boolean> {
  const original: HipPackage | null = await readPackage(originalPath, options.trace);
  if (!original) {
    return false;
  }
  const modified: HipPackage | null = await readPackage(modifiedPath, options.trace);
  if (!modified) {
    return false;
  }

  const result = diffPackages(original, modified, {
    assetsOnly: options.assetsOnly,
    detailed: options.detailed,
    trustChecksums: options.checksums,
    includeOffsets: options.offsets,
    includePluses: options.pluses,
  });

  const lines: string[] = renderDiffReport(result, {
    leftTitle: originalPath,
    rightTitle: modifiedPath,
    columnWidth: options.width,
    color: options.color,
  });
  for (const line of lines) {
    console.log(line);
  }
  return true;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('hipdiff')
    .description('Structural diff of two HIP/HOP archives')
    .version(version)
    .argument('<original>', 'Original HIP file')
    .argument('<modified>', 'Modified HIP file')
    .option('-a, --assets-only', 'Only show asset diffs', false)
    .option('-d, --detailed', 'Detailed asset diffs (AHDR and ADBG chunks)', false)
    .option('-c, --checksums', 'Ignore asset data if checksum matches', false)
    .option('-o, --offsets', 'Diff asset offsets', false)
    .option('-p, --pluses', 'Diff asset pluses', false)
    .option('-w, --width <width>', 'Column width', parseColumnWidth, DEFAULT_COLUMN_WIDTH)
    .option('--no-color', 'Disable colored output')
    .option('--trace', 'Print every block while decoding', false)
    .action(async (originalPath: string, modifiedPath: string, options: CliOptions) => {
      const ok: boolean = await runDiff(originalPath, modifiedPath, options);
      if (!ok) {
        process.exit(1);
      }
    });

  return program;
}

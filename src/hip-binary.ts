/**
 * HIP archive decoding.
 */
import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { BlockReader } from './block-reader.js';
import {
  ADBG, AHDR, AINF, ATOC, DHDR, DICT, DPAK, HIPA, LDBG, LHDR, LINF, LTOC,
  PACK, PCNT, PCRT, PFLG, PLAT, PMOD, PVER, STRM,
} from './constants/block-tags.js';
import type { BlockTag } from './constants/block-tags.js';
import { HipIoError } from './errors.js';
import type {
  AssetDebugInfo, AssetEntry, HipPackage, LayerDebugInfo, LayerEntry, PackageCounts, PackageCreation,
  PackageData, PackageMiscInfo, PackageModification, PackagePlatform, PackageStreamInfo, PackageVersion,
} from './types/hip-package.js';

type BlockHandlers = ReadonlyMap<BlockTag, () => void>;

/**
 * Mutable state filled in while walking the stream.
 */
interface DecodeState {
  version: PackageVersion;
  flags: number;
  counts: PackageCounts;
  creation: PackageCreation;
  modification: PackageModification;
  platform: PackagePlatform | null;
  miscInfo: PackageMiscInfo;
  stream: PackageStreamInfo;
  readonly assets: AssetEntry[];
  readonly layers: LayerEntry[];
  data: PackageData | null;
}

const EMPTY_ASSET_DEBUG: AssetDebugInfo = { align: 0, name: '', filename: '', checksum: 0 };
const EMPTY_LAYER_DEBUG: LayerDebugInfo = { misc: 0 };

function createState(): DecodeState {
  return {
    version: { subVersion: 0, clientVersion: 0, compatVersion: 0 },
    flags: 0,
    counts: { assetCount: 0, layerCount: 0, maxAssetSize: 0, maxLayerSize: 0, maxXformAssetSize: 0 },
    creation: { time: 0, note: '' },
    modification: { time: 0 },
    platform: null,
    miscInfo: { asset: 0, layer: 0 },
    stream: { header: 0, padAmount: 0 },
    assets: [],
    layers: [],
    data: null,
  };
}

/**
 * Walks the children of the current block, dispatching known tags.
 * Unknown tags are skipped by exitBlock's seek.
 */
function readChildren(reader: BlockReader, handlers: BlockHandlers): void {
  let tag: BlockTag | null;
  while ((tag = reader.enterBlock()) !== null) {
    handlers.get(tag)?.();
    reader.exitBlock();
  }
}

function readPack(reader: BlockReader, state: DecodeState): void {
  readChildren(reader, new Map([
    [PVER, () => {
      state.version = { subVersion: reader.readU32(), clientVersion: reader.readU32(), compatVersion: reader.readU32() };
    }],
    [PFLG, () => {
      state.flags = reader.readU32();
    }],
    [PCNT, () => {
      state.counts = {
        assetCount: reader.readU32(),
        layerCount: reader.readU32(),
        maxAssetSize: reader.readU32(),
        maxLayerSize: reader.readU32(),
        maxXformAssetSize: reader.readU32(),
      };
    }],
    [PCRT, () => {
      state.creation = { time: reader.readU32(), note: reader.readBoundedString() };
    }],
    [PMOD, () => {
      state.modification = { time: reader.readU32() };
    }],
    [PLAT, () => {
      const id: number = reader.readU32();
      const strings: string[] = [];
      while (reader.hasRemaining()) {
        strings.push(reader.readBoundedString());
      }
      state.platform = { id, strings };
    }],
  ]));
}

function readAssetHeader(reader: BlockReader): AssetEntry {
  const id: number = reader.readU32();
  const type: number = reader.readU32();
  const offset: number = reader.readU32();
  const size: number = reader.readU32();
  const plus: number = reader.readU32();
  const flags: number = reader.readU32();
  let debug: AssetDebugInfo = EMPTY_ASSET_DEBUG;
  readChildren(reader, new Map([
    [ADBG, () => {
      debug = {
        align: reader.readU32(),
        name: reader.readBoundedString(),
        filename: reader.readBoundedString(),
        checksum: reader.readU32(),
      };
    }],
  ]));
  return { id, type, offset, size, plus, flags, debug };
}

function readLayerHeader(reader: BlockReader): LayerEntry {
  const type: number = reader.readU32();
  const assetCount: number = reader.readU32();
  const assetIds: number[] = [];
  for (let i = 0; i < assetCount; i++) {
    assetIds.push(reader.readU32());
  }
  let debug: LayerDebugInfo = EMPTY_LAYER_DEBUG;
  readChildren(reader, new Map([
    [LDBG, () => {
      debug = { misc: reader.readU32() };
    }],
  ]));
  return { type, assetIds, debug };
}

function readAssetDirectory(reader: BlockReader, state: DecodeState): void {
  let found = 0;
  readChildren(reader, new Map([
    [AINF, () => {
      state.miscInfo = { ...state.miscInfo, asset: reader.readU32() };
    }],
    [AHDR, () => {
      state.assets.push(readAssetHeader(reader));
      found += 1;
    }],
  ]));
  if (found !== state.counts.assetCount) {
    throw reader.structureError(`Asset directory holds ${found} assets, PCNT declares ${state.counts.assetCount}`);
  }
}

function readLayerDirectory(reader: BlockReader, state: DecodeState): void {
  let found = 0;
  let assetRefs = 0;
  readChildren(reader, new Map([
    [LINF, () => {
      state.miscInfo = { ...state.miscInfo, layer: reader.readU32() };
    }],
    [LHDR, () => {
      const layer: LayerEntry = readLayerHeader(reader);
      state.layers.push(layer);
      assetRefs += layer.assetIds.length;
      found += 1;
    }],
  ]));
  if (found !== state.counts.layerCount) {
    throw reader.structureError(`Layer directory holds ${found} layers, PCNT declares ${state.counts.layerCount}`);
  }
  if (assetRefs !== state.counts.assetCount) {
    throw reader.structureError(`Layers reference ${assetRefs} assets, PCNT declares ${state.counts.assetCount}`);
  }
}

function readDictionary(reader: BlockReader, state: DecodeState): void {
  readChildren(reader, new Map([
    [ATOC, () => readAssetDirectory(reader, state)],
    [LTOC, () => readLayerDirectory(reader, state)],
  ]));
}

function readDataPack(reader: BlockReader, state: DecodeState): void {
  if (state.counts.assetCount === 0) {
    return;
  }
  const padAmount: number = reader.readU32();
  reader.skip(padAmount);
  const start: number = reader.position;
  const length: number = reader.regionEnd - start;
  if (length < 0) {
    throw reader.structureError(`DPAK padding of ${padAmount} bytes runs past the end of the block`);
  }
  state.stream = { ...state.stream, padAmount };
  state.data = { start, bytes: reader.readBytes(length) };
}

function readStream(reader: BlockReader, state: DecodeState): void {
  readChildren(reader, new Map([
    [DHDR, () => {
      state.stream = { ...state.stream, header: reader.readU32() };
    }],
    [DPAK, () => readDataPack(reader, state)],
  ]));
}

/**
 * Checks the decoded tables against PCNT and the payload region.
 * @throws {HipStructureError} If a table is missing entries, DPAK is missing, or a payload falls outside DPAK
 */
function validateState(reader: BlockReader, state: DecodeState): void {
  if (state.assets.length !== state.counts.assetCount) {
    throw reader.structureError(`Decoded ${state.assets.length} assets, PCNT declares ${state.counts.assetCount}`);
  }
  if (state.layers.length !== state.counts.layerCount) {
    throw reader.structureError(`Decoded ${state.layers.length} layers, PCNT declares ${state.counts.layerCount}`);
  }
  const data: PackageData | null = state.data;
  if (!data) {
    if (state.counts.assetCount > 0) {
      throw reader.structureError(`${state.counts.assetCount} assets declared but no DPAK data`);
    }
    return;
  }
  for (const asset of state.assets) {
    const relative: number = asset.offset - data.start;
    if (relative < 0 || relative + asset.size > data.bytes.length) {
      throw reader.structureError(
        `Asset 0x${asset.id.toString(16).toUpperCase().padStart(8, '0')} payload extends beyond DPAK data: offset=${asset.offset}, size=${asset.size}, dataStart=${data.start}, dataSize=${data.bytes.length}`
      );
    }
  }
}

/**
 * Decodes a complete archive from a buffer.
 * The first top-level block must be the HIPA marker.
 */
function buildPackage(buffer: Buffer, trace: boolean): HipPackage {
  const reader = new BlockReader(buffer, { trace });
  const state: DecodeState = createState();
  const handlers: BlockHandlers = new Map([
    [PACK, () => readPack(reader, state)],
    [DICT, () => readDictionary(reader, state)],
    [STRM, () => readStream(reader, state)],
  ]);

  let valid = false;
  let tag: BlockTag | null;
  while ((tag = reader.enterBlock()) !== null) {
    if (tag === HIPA) {
      valid = true;
    } else {
      handlers.get(tag)?.();
    }
    reader.exitBlock();
    if (!valid) {
      break;
    }
  }
  if (!valid) {
    throw reader.structureError('Not a HIP archive: missing HIPA marker');
  }

  validateState(reader, state);

  return {
    version: state.version,
    flags: state.flags,
    counts: state.counts,
    creation: state.creation,
    modification: state.modification,
    platform: state.platform,
    miscInfo: state.miscInfo,
    stream: state.stream,
    assets: state.assets,
    layers: state.layers,
    data: state.data ?? { start: 0, bytes: Buffer.alloc(0) },
  };
}

/**
 * HIP archive binary access.
 */
export class HipBinary {
  /**
   * Reads and decodes an archive from disk.
   *
   * @param filePath - Path to the .HIP/.HOP file
   * @param trace - Log every block as it is entered
   * @throws {HipIoError} If the file cannot be read or is truncated
   * @throws {HipStructureError} If the archive is malformed
   */
  static async read({ filePath, trace = false }: { readonly filePath: string; readonly trace?: boolean }): Promise<HipPackage> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new HipIoError(`Could not open ${filePath}: ${error instanceof Error ? error.message : String(error)}`, '', 0, error);
    }
    return buildPackage(buffer, trace);
  }

  /**
   * Decodes an archive held in memory. No partial package is returned on failure.
   */
  static decode({ buffer, trace = false }: { readonly buffer: Buffer; readonly trace?: boolean }): HipPackage {
    return buildPackage(buffer, trace);
  }

  /**
   * Returns a view of an asset's payload within the package's DPAK data.
   * Empty when the package declares no assets.
   */
  static payload({ pkg, asset }: { readonly pkg: HipPackage; readonly asset: AssetEntry }): Buffer {
    if (pkg.data.bytes.length === 0) {
      return pkg.data.bytes;
    }
    const start: number = asset.offset - pkg.data.start;
    return pkg.data.bytes.subarray(start, start + asset.size);
  }

  /**
   * Computes the SHA256 hex digest of a payload.
   */
  static hashPayload({ payload }: { readonly payload: Buffer }): string {
    return createHash('sha256').update(payload).digest('hex');
  }
}

/**
 * Big-endian block writer for building synthetic HIP archives in tests.
 */
import { blockTag } from '../constants/block-tags.js';
import type { PackageCounts, PackageCreation, PackagePlatform, PackageVersion } from '../types/hip-package.js';

export class HipWriter {
  private buffer: Buffer;
  private offset: number;

  constructor() {
    this.buffer = Buffer.alloc(256); // Start small, will grow as needed
    this.offset = 0;
  }

  get position(): number {
    return this.offset;
  }

  writeU32(value: number): this {
    this.ensureCapacity(4);
    this.buffer.writeUInt32BE(value >>> 0, this.offset);
    this.offset += 4;
    return this;
  }

  /** Writes the string, its terminator, and a pad byte when the two together are odd-sized. */
  writeString(value: string): this {
    const bytes = Buffer.from(value, 'latin1');
    this.writeBytes(bytes);
    this.writeBytes(Buffer.from([0]));
    if ((bytes.length + 1) & 1) {
      this.writeBytes(Buffer.from([0]));
    }
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  patchU32(at: number, value: number): this {
    this.buffer.writeUInt32BE(value >>> 0, at);
    return this;
  }

  /** Writes `code`, a length placeholder, the body, then patches the length. */
  block(code: string, body?: () => void): this {
    this.writeU32(blockTag(code));
    const lengthAt: number = this.offset;
    this.writeU32(0);
    body?.();
    return this.patchU32(lengthAt, this.offset - lengthAt - 4);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }
}

export interface AssetFixture {
  readonly id: number;
  readonly payload: string | Buffer;
  readonly type?: number;
  /** Overrides the size written to AHDR; defaults to the payload length. */
  readonly size?: number;
  readonly plus?: number;
  readonly flags?: number;
  readonly align?: number;
  readonly name?: string;
  readonly filename?: string;
  readonly checksum?: number;
  /** Omit the ADBG sub-block. */
  readonly noDebug?: boolean;
}

export interface LayerFixture {
  readonly type: number;
  readonly assetIds: readonly number[];
  readonly misc?: number;
  readonly noDebug?: boolean;
}

export interface HipFixture {
  readonly version?: PackageVersion;
  readonly flags?: number;
  /** Fields left out are derived from the asset and layer lists. */
  readonly counts?: Partial<PackageCounts>;
  readonly creation?: PackageCreation;
  readonly modificationTime?: number;
  readonly platform?: PackagePlatform | null;
  readonly ainf?: number;
  readonly linf?: number;
  readonly dhdr?: number;
  readonly padAmount?: number;
  readonly assets?: readonly AssetFixture[];
  readonly layers?: readonly LayerFixture[];
  /** Leave out the STRM block entirely. */
  readonly noStream?: boolean;
}

function payloadBytes(payload: string | Buffer): Buffer {
  return typeof payload === 'string' ? Buffer.from(payload, 'latin1') : payload;
}

/**
 * Builds a complete archive: HIPA, PACK, DICT, STRM. Asset offsets are patched
 * to the absolute position of each payload inside DPAK.
 */
export function buildHip(fixture: HipFixture = {}): Buffer {
  const assets: readonly AssetFixture[] = fixture.assets ?? [];
  const layers: readonly LayerFixture[] = fixture.layers ?? [];
  const version: PackageVersion = fixture.version ?? { subVersion: 2, clientVersion: 0x000a000f, compatVersion: 1 };
  const creation: PackageCreation = fixture.creation ?? { time: 1000, note: 'Tue Jan 01 00:00:00 2002\n' };
  const padAmount: number = fixture.padAmount ?? 4;
  const writer = new HipWriter();

  writer.block('HIPA');
  writer.block('PACK', () => {
    writer.block('PVER', () => {
      writer.writeU32(version.subVersion).writeU32(version.clientVersion).writeU32(version.compatVersion);
    });
    writer.block('PFLG', () => writer.writeU32(fixture.flags ?? 0x2e));
    writer.block('PCNT', () => {
      writer
        .writeU32(fixture.counts?.assetCount ?? assets.length)
        .writeU32(fixture.counts?.layerCount ?? layers.length)
        .writeU32(fixture.counts?.maxAssetSize ?? 0)
        .writeU32(fixture.counts?.maxLayerSize ?? 0)
        .writeU32(fixture.counts?.maxXformAssetSize ?? 0);
    });
    writer.block('PCRT', () => writer.writeU32(creation.time).writeString(creation.note));
    writer.block('PMOD', () => writer.writeU32(fixture.modificationTime ?? 2000));
    const platform: PackagePlatform | null | undefined = fixture.platform;
    if (platform) {
      writer.block('PLAT', () => {
        writer.writeU32(platform.id);
        for (const value of platform.strings) {
          writer.writeString(value);
        }
      });
    }
  });

  const offsetFields: number[] = [];
  writer.block('DICT', () => {
    writer.block('ATOC', () => {
      writer.block('AINF', () => writer.writeU32(fixture.ainf ?? 0));
      for (const asset of assets) {
        writer.block('AHDR', () => {
          writer.writeU32(asset.id).writeU32(asset.type ?? 0x54455854);
          offsetFields.push(writer.position);
          writer
            .writeU32(0)
            .writeU32(asset.size ?? payloadBytes(asset.payload).length)
            .writeU32(asset.plus ?? 0)
            .writeU32(asset.flags ?? 0);
          if (!asset.noDebug) {
            writer.block('ADBG', () => {
              writer
                .writeU32(asset.align ?? 0)
                .writeString(asset.name ?? `asset_${asset.id.toString(16)}`)
                .writeString(asset.filename ?? '')
                .writeU32(asset.checksum ?? 0);
            });
          }
        });
      }
    });
    writer.block('LTOC', () => {
      writer.block('LINF', () => writer.writeU32(fixture.linf ?? 0));
      for (const layer of layers) {
        writer.block('LHDR', () => {
          writer.writeU32(layer.type).writeU32(layer.assetIds.length);
          for (const id of layer.assetIds) {
            writer.writeU32(id);
          }
          if (!layer.noDebug) {
            writer.block('LDBG', () => writer.writeU32(layer.misc ?? 0));
          }
        });
      }
    });
  });

  if (fixture.noStream) {
    return writer.toBuffer();
  }

  const payloadOffsets: number[] = [];
  writer.block('STRM', () => {
    writer.block('DHDR', () => writer.writeU32(fixture.dhdr ?? 0xffffffff));
    writer.block('DPAK', () => {
      writer.writeU32(padAmount).writeBytes(Buffer.alloc(padAmount, 0x33));
      for (const asset of assets) {
        payloadOffsets.push(writer.position);
        writer.writeBytes(payloadBytes(asset.payload));
      }
    });
  });

  offsetFields.forEach((at: number, index: number) => writer.patchU32(at, payloadOffsets[index]));
  return writer.toBuffer();
}

/**
 * Decoded HIP archive. Built once by HipBinary.decode and read-only afterwards.
 */

/** PVER */
export interface PackageVersion {
  readonly subVersion: number;
  readonly clientVersion: number;
  readonly compatVersion: number;
}

/** PCNT */
export interface PackageCounts {
  readonly assetCount: number;
  readonly layerCount: number;
  readonly maxAssetSize: number;
  readonly maxLayerSize: number;
  readonly maxXformAssetSize: number;
}

/** PCRT */
export interface PackageCreation {
  readonly time: number;
  readonly note: string;
}

/** PMOD */
export interface PackageModification {
  readonly time: number;
}

/** PLAT */
export interface PackagePlatform {
  readonly id: number;
  readonly strings: readonly string[];
}

/**
 * Reserved scalar stored once per directory section.
 */
export interface PackageMiscInfo {
  /** AINF */
  readonly asset: number;
  /** LINF */
  readonly layer: number;
}

/** DHDR scalar and DPAK padding length. */
export interface PackageStreamInfo {
  readonly header: number;
  readonly padAmount: number;
}

/** ADBG */
export interface AssetDebugInfo {
  readonly align: number;
  readonly name: string;
  readonly filename: string;
  readonly checksum: number;
}

/**
 * AHDR entry. `id` is unique within a package and is the diff identity key.
 */
export interface AssetEntry {
  readonly id: number;
  readonly type: number;
  /** Absolute stream offset of the payload. */
  readonly offset: number;
  readonly size: number;
  readonly plus: number;
  readonly flags: number;
  readonly debug: AssetDebugInfo;
}

/** LDBG */
export interface LayerDebugInfo {
  readonly misc: number;
}

/**
 * LHDR entry. Layers have no identity of their own; `type` is shared by many.
 */
export interface LayerEntry {
  readonly type: number;
  /** IDs of the assets this layer holds, in stream order. */
  readonly assetIds: readonly number[];
  readonly debug: LayerDebugInfo;
}

/**
 * Contiguous DPAK payload region.
 */
export interface PackageData {
  /** Absolute stream offset of `bytes[0]`. */
  readonly start: number;
  readonly bytes: Buffer;
}

export interface HipPackage {
  readonly version: PackageVersion;
  readonly flags: number;
  readonly counts: PackageCounts;
  readonly creation: PackageCreation;
  readonly modification: PackageModification;
  readonly platform: PackagePlatform | null;
  readonly miscInfo: PackageMiscInfo;
  readonly stream: PackageStreamInfo;
  readonly assets: readonly AssetEntry[];
  readonly layers: readonly LayerEntry[];
  readonly data: PackageData;
}

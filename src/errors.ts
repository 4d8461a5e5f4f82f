/**
 * Error types raised while decoding HIP archives and rendering diff reports.
 */

/**
 * Base class for decode failures. Carries the block path (e.g. `DICT/ATOC/AHDR`)
 * and nesting depth at which decoding stopped.
 */
export class HipDecodeError extends Error {
  constructor(
    message: string,
    public readonly blockPath: string,
    public readonly depth: number,
    public readonly cause?: unknown
  ) {
    super(blockPath ? `${message} (in ${blockPath}, depth ${depth})` : message);
    this.name = 'HipDecodeError';
  }
}

/** The stream ended early or could not be read. */
export class HipIoError extends HipDecodeError {
  constructor(message: string, blockPath: string, depth: number, cause?: unknown) {
    super(message, blockPath, depth, cause);
    this.name = 'HipIoError';
  }
}

/** The stream was readable but its structure is inconsistent. */
export class HipStructureError extends HipDecodeError {
  constructor(message: string, blockPath: string, depth: number) {
    super(message, blockPath, depth);
    this.name = 'HipStructureError';
  }
}

/**
 * Invalid presentation settings.
 */
export class ReportConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportConfigError';
  }
}

/**
 * Display formatting for diff values.
 */

/** `0x%X` */
export function hex(value: number): string {
  return `0x${(value >>> 0).toString(16).toUpperCase()}`;
}

/** `0x%08X` */
export function hex8(value: number): string {
  return `0x${(value >>> 0).toString(16).toUpperCase().padStart(8, '0')}`;
}

export function decimal(value: number): string {
  return String(value);
}

export function quoted(value: string): string {
  return `"${value}"`;
}

/**
 * Strips one trailing newline left over from tool-written text fields.
 */
export function normalizeText(value: string): string {
  return value.endsWith('\n') ? value.slice(0, -1) : value;
}

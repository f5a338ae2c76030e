/**
 * A record without prototype, safe to fill with client-chosen keys such as `__proto__`.
 */
export function emptyRecord<T>(): Record<string, T> {
  return Object.create(null);
}

const EDGE_WHITESPACE = /^[ \t\n\r\0\x0B]+|[ \t\n\r\0\x0B]+$/g;

/**
 * Trims ASCII whitespace and NUL, leaving other unicode spaces intact.
 */
export function trimValue(value: string): string {
  return value.replace(EDGE_WHITESPACE, '');
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

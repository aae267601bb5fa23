const UNSAFE_CHARACTERS = /[^0-9A-Za-z_]/g;

/**
 * Turn a header into a plain SQL identifier: trimmed, spaces replaced by `_`,
 * anything outside `[0-9A-Za-z_]` removed, and prefixed with `_` when the
 * result is empty or starts with a digit.
 */
export function normalizeIdentifier(name: string): string {
  const cleaned = name.trim().replaceAll(' ', '_').replace(UNSAFE_CHARACTERS, '');
  return cleaned === '' || /^\d/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/** Case-insensitive, order-sensitive comparison of two column lists. */
export function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name.toLowerCase() === b[i]?.toLowerCase());
}

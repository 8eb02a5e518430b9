// ============================================================
// Object Forge - Deduplicator / Sorter
// ============================================================

/**
 * Case-sensitive comparison by UTF-16 code units, the same order
 * `Array.prototype.sort` uses without a comparator. Uppercase letters
 * sort before lowercase ones and the result never depends on locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Removes duplicates and returns the names in ascending order.
 * Adjacent entries of the result are strictly increasing.
 */
export function sortUnique(names: Iterable<string>): string[] {
  return [...new Set(names)].sort(compareNames);
}

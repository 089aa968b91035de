/**
 * Collection helpers shared by the loader and the synthesizer.
 */

/**
 * Collapse names that are equal after case-folding.
 *
 * The first spelling seen wins; the result is sorted so that equal sets
 * always serialize identically.
 */
export function uniqueCaseFolded(names: Iterable<string>): string[] {
  const seen = new Map<string, string>();
  for (const raw of names) {
    const name = raw.trim();
    if (name === '') continue;
    const key = name.toLowerCase();
    if (!seen.has(key)) {
      seen.set(key, name);
    }
  }
  return [...seen.values()].sort((a, b) => compareStrings(a.toLowerCase(), b.toLowerCase()));
}

/**
 * Locale-independent string comparison for deterministic sorting.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Array utilities
 */

/**
 * Removes duplicate elements from an array, keeping first-seen order
 */
export function uniq<T>(arr: readonly T[]): T[] {
  return Array.from(new Set(arr));
}

/**
 * Removes elements whose key was already seen, keeping the first occurrence
 */
export function uniqBy<T>(arr: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of arr) {
    const k = key(item);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(item);
  }
  return out;
}

/**
 * Splits an array into consecutive chunks of at most `size` elements
 */
export function chunk<T>(arr: readonly T[], size: number): T[][] {
  const n = Math.max(1, Math.floor(size));
  const out: T[][] = [];
  for (let i = 0; i < arr.length; i += n) {
    out.push(arr.slice(i, i + n));
  }
  return out;
}

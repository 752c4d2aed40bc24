/**
 * Jaccard similarity = |A ∩ B| / |A ∪ B|
 *
 * Two empty sets are identical (1); one empty set shares nothing (0).
 */
export function jaccard<T>(setA: ReadonlySet<T>, setB: ReadonlySet<T>): number {
  if (setA.size === 0 && setB.size === 0) {
    return 1;
  }

  if (setA.size === 0 || setB.size === 0) {
    return 0;
  }

  let intersectionSize = 0;
  for (const item of setA) {
    if (setB.has(item)) {
      intersectionSize++;
    }
  }

  return intersectionSize / (setA.size + setB.size - intersectionSize);
}

/**
 * Token-overlap ratio between two token lists.
 */
export function tokenOverlap(tokensA: readonly string[], tokensB: readonly string[]): number {
  return jaccard(new Set(tokensA), new Set(tokensB));
}

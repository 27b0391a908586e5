/**
 * Indices missing between the lowest and highest received index.
 * Duplicates, negatives and non-integers are ignored.
 */
export function findMissingIndices(indices: readonly number[]): number[] {
  const present = new Set(indices.filter((index) => Number.isInteger(index) && index >= 0));
  if (present.size === 0) {
    return [];
  }

  const lowest = Math.min(...present);
  const highest = Math.max(...present);
  const missing: number[] = [];
  for (let index = lowest + 1; index < highest; index++) {
    if (!present.has(index)) {
      missing.push(index);
    }
  }
  return missing;
}

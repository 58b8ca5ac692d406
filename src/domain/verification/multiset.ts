// Label multisets
// Pure functions only - counts are compared key by key, never by sorting

export type Multiset = Map<string, number>;

export function toMultiset(items: Iterable<string>): Multiset {
  const counts: Multiset = new Map();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return counts;
}

export function multisetEquals(a: Multiset, b: Multiset): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [item, count] of a) {
    if (b.get(item) !== count) {
      return false;
    }
  }
  return true;
}

/**
 * Items that occur more often in `a` than in `b`, one entry per surplus occurrence.
 * Order follows first appearance in `a`.
 */
export function multisetDifference(a: Multiset, b: Multiset): string[] {
  const surplus: string[] = [];
  for (const [item, count] of a) {
    const extra = count - (b.get(item) ?? 0);
    for (let i = 0; i < extra; i++) {
      surplus.push(item);
    }
  }
  return surplus;
}

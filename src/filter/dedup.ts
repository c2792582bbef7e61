import type { CandidateRecord } from "../sources/types.js";

export function nameKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Keeps the first item for each case-insensitive, trimmed name. Callers
 * order the input first, so "first" means highest ranked.
 */
export function dedupByName<T>(
  items: T[],
  recordOf: (item: T) => CandidateRecord
): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];

  for (const item of items) {
    const key = nameKey(recordOf(item).name);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(item);
  }

  return kept;
}

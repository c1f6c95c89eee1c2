/**
 * Multifeed — Result Merging
 *
 * Combines per-source pages into one ordered, deduplicated page.
 * Each source's own relevance order is kept; sources are interleaved
 * rank by rank in configuration order.
 */

import type { PackageIdentity, PackageItem } from '../types';

/**
 * Items from one source, in that source's relevance order.
 */
export interface SourceItems {
  sourceId: string;
  items: readonly PackageItem[];
}

export interface MergeOptions {
  /** More than one source took part; clears every prefix-reserved flag */
  multiSource: boolean;
}

export interface MergeResult {
  items: PackageItem[];
  duplicateCount: number;
}

/**
 * Dedup key for a package. Ids compare case-insensitively; the version is
 * not part of the key, so one package id appears once per page.
 */
export function identityKey(identity: PackageIdentity): string {
  return identity.id.toLowerCase();
}

/**
 * Merge source pages. `sources` must be in priority order (first wins).
 *
 * When several sources return the same package id, only the copy from the
 * highest-priority source is kept, at the rank that source gave it.
 */
export function mergeSourceItems(sources: readonly SourceItems[], options: MergeOptions): MergeResult {
  // Dedup key -> index of the source whose copy is kept
  const owner = new Map<string, number>();
  sources.forEach((source, sourceIndex) => {
    for (const item of source.items) {
      const key = identityKey(item.identity);
      if (!owner.has(key)) owner.set(key, sourceIndex);
    }
  });

  const depth = sources.reduce((max, s) => Math.max(max, s.items.length), 0);
  const items: PackageItem[] = [];
  const emitted = new Set<string>();
  let duplicateCount = 0;

  for (let rank = 0; rank < depth; rank++) {
    sources.forEach((source, sourceIndex) => {
      const item = source.items[rank];
      if (!item) return;

      const key = identityKey(item.identity);
      if (owner.get(key) !== sourceIndex || emitted.has(key)) {
        duplicateCount++;
        return;
      }

      emitted.add(key);
      items.push(options.multiSource && item.prefixReserved ? { ...item, prefixReserved: false } : item);
    });
  }

  return { items, duplicateCount };
}

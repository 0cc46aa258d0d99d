import type { CatalogItem } from '@root/types/catalog.types.js'

/**
 * Canonical key used for every dedup, diff and eviction decision.
 *
 * Always the catalog-assigned identifier: two recordings can share a title and
 * artist, so a derived display string would merge distinct tracks.
 */
export function canonicalKey(item: Pick<CatalogItem, 'key'>): string {
  return item.key
}

export function keySet(items: readonly Pick<CatalogItem, 'key'>[]): Set<string> {
  return new Set(items.map(canonicalKey))
}

/**
 * Items of `source` whose key is absent from `existing`, in source order
 */
export function differenceByKey<T extends Pick<CatalogItem, 'key'>>(
  source: readonly T[],
  existing: readonly Pick<CatalogItem, 'key'>[],
): T[] {
  const existingKeys = keySet(existing)
  return source.filter((item) => !existingKeys.has(canonicalKey(item)))
}

import type { RawItem } from '../types/adapter';
import type { DatePartition, NewsItem } from '../types/news';
import { toUtcIso } from '../utils/timestamps';
import { fingerprint } from './fingerprint';

export interface MergeCounts {
  added: number;
  updated: number;
  skipped: number;
}

export interface MergeOptions {
  /** Overwrite items already in the partition with the fresh extraction */
  force: boolean;
}

export function emptyCounts(): MergeCounts {
  return { added: 0, updated: 0, skipped: 0 };
}

export function addCounts(a: MergeCounts, b: MergeCounts): MergeCounts {
  return {
    added: a.added + b.added,
    updated: a.updated + b.updated,
    skipped: a.skipped + b.skipped
  };
}

/**
 * Persisted record for one parsed item
 */
export function toNewsItem(raw: RawItem, source: string): NewsItem {
  const guid = raw.guid?.trim() ?? '';
  const link = raw.link?.trim() ?? '';
  const title = raw.title.trim();

  return {
    item_id: fingerprint({ guid, link, source, title, publishedAt: raw.publishedAt }),
    source,
    title,
    summary: raw.summary,
    link,
    guid: guid || link,
    image: raw.image ?? null,
    published_at: toUtcIso(raw.publishedAt)
  };
}

/**
 * Links already folded into a cluster master by an earlier clustering pass
 */
function absorbedLinks(partition: DatePartition): Set<string> {
  const links = new Set<string>();
  for (const item of Object.values(partition)) {
    for (const source of item.sources ?? []) {
      if (source.link && source.link !== item.link) links.add(source.link);
    }
  }
  return links;
}

/**
 * Merge fresh items into a loaded partition, in place.
 *
 * New fingerprints are added. Known ones are skipped, or with `force`
 * overwritten field by field; clustering annotations on the stored record
 * survive the overwrite. Items whose link a cluster master already absorbed
 * are skipped, so clustering does not resurrect them. A fingerprint seen
 * twice in one batch counts once.
 */
export function mergeIntoPartition(
  partition: DatePartition,
  items: NewsItem[],
  { force }: MergeOptions
): MergeCounts {
  const counts = emptyCounts();
  const touched = new Set<string>();
  const absorbed = absorbedLinks(partition);

  for (const item of items) {
    if (touched.has(item.item_id)) {
      counts.skipped++;
      continue;
    }
    touched.add(item.item_id);

    const existing = partition[item.item_id];
    if (!existing && item.link && absorbed.has(item.link)) {
      counts.skipped++;
    } else if (!existing) {
      partition[item.item_id] = item;
      counts.added++;
    } else if (force) {
      partition[item.item_id] = { ...existing, ...item };
      counts.updated++;
    } else {
      counts.skipped++;
    }
  }

  return counts;
}

/**
 * Ingestion run
 *
 * 1. Fans source URLs out to their parsers (bounded by CONCURRENCY_LIMIT)
 * 2. Turns each RawItem into a fingerprinted NewsItem
 * 3. Groups items by local publication date
 * 4. Merges each date's batch into its partition once, under that
 *    partition's single-writer lock
 *
 * An item_id lives in one partition only. An item already stored under
 * another date is skipped, or with `force` moved to its new date.
 */

import pLimit from 'p-limit';
import type { ParserRegistry } from '../adapters';
import type { EnvironmentConfig } from '../config/environment';
import { MergeCounts, addCounts, emptyCounts, mergeIntoPartition, toNewsItem } from '../ingestion/dedup';
import type { PartitionStore, StoredLocation } from '../storage/partitionStore';
import type { ParseFault, SourceConfig } from '../types/adapter';
import type { NewsItem } from '../types/news';
import { localDateKey, sortDateKeysDescending } from '../utils/dates';
import { describeError } from '../utils/http';
import { logger } from '../utils/logger';

export interface IngestionOptions {
  config: EnvironmentConfig;
  registry: ParserRegistry;
  store: PartitionStore;
  /** Overwrite items already stored instead of skipping them */
  force?: boolean;
}

export interface IngestionStats extends MergeCounts {
  sourcesProcessed: number;
  urlsProcessed: number;
  itemsParsed: number;
  faults: ParseFault[];
  /** Partition dates written in this run, newest first */
  partitions: string[];
  startTime: number;
  endTime?: number;
}

interface FetchUnit {
  source: SourceConfig;
  url: string;
}

interface DatedItem {
  date: string;
  item: NewsItem;
}

async function collectUnit(
  { source, url }: FetchUnit,
  registry: ParserRegistry,
  timeZone: string,
  faults: ParseFault[]
): Promise<DatedItem[]> {
  const log = logger.child(source.name);
  const report = (fault: ParseFault) => {
    faults.push(fault);
    log.warn(`${fault.stage} fault: ${fault.message}`, { url: fault.url });
  };

  const collected: DatedItem[] = [];

  try {
    const parser = registry.get(source.type);
    for await (const raw of parser.parse(url, { source: source.name, sourceType: source.type, report })) {
      collected.push({
        date: localDateKey(raw.publishedAt, timeZone),
        item: toNewsItem(raw, source.name)
      });
    }
  } catch (error) {
    // Parsers report their own faults; this catches anything they let escape
    report({ source: source.name, url, stage: 'fetch', message: describeError(error) });
  }

  log.debug(`Parsed ${collected.length} items`, { url });
  return collected;
}

interface DateBatch {
  items: NewsItem[];
  /** Stored records leaving another partition for this date */
  relocated: StoredLocation[];
}

async function removeRelocated(store: PartitionStore, moved: StoredLocation[]): Promise<void> {
  const byDate = new Map<string, string[]>();
  for (const { date, item } of moved) {
    byDate.set(date, [...(byDate.get(date) ?? []), item.item_id]);
  }

  await Promise.all(
    Array.from(byDate.entries()).map(([date, ids]) =>
      store
        .update(date, partition => {
          for (const id of ids) delete partition[id];
        })
        .catch((error: unknown) => {
          logger.error(`Could not remove moved items from partition ${date}`, error, { ids });
        })
    )
  );
}

/**
 * Main ingestion workflow function
 */
export async function runIngestion(sources: SourceConfig[], options: IngestionOptions): Promise<IngestionStats> {
  const { config, registry, store, force = false } = options;
  const limit = pLimit(config.ingestion.concurrencyLimit);

  const stats: IngestionStats = {
    ...emptyCounts(),
    sourcesProcessed: 0,
    urlsProcessed: 0,
    itemsParsed: 0,
    faults: [],
    partitions: [],
    startTime: Date.now()
  };

  const units: FetchUnit[] = sources.flatMap(source => source.urls.map(url => ({ source, url })));
  logger.info(`Starting ingestion: ${sources.length} sources, ${units.length} URLs${force ? ' (force update)' : ''}`);

  const results = await Promise.all(
    units.map(unit => limit(() => collectUnit(unit, registry, config.news.timeZone, stats.faults)))
  );

  stats.sourcesProcessed = sources.length;
  stats.urlsProcessed = units.length;

  const stored = await store.locateAll();
  const placed = new Map<string, string>();
  let totals = emptyCounts();

  // Config order, then feed order, so merges are deterministic
  const byDate = new Map<string, DateBatch>();
  for (const dated of results.flat()) {
    stats.itemsParsed++;
    const { date, item } = dated;

    // First date seen in this run wins for an id parsed twice
    const target = placed.get(item.item_id) ?? date;
    placed.set(item.item_id, target);

    const elsewhere = stored.get(item.item_id);
    let relocated: StoredLocation | undefined;
    if (elsewhere && elsewhere.date !== target) {
      if (!force) {
        totals.skipped++;
        continue;
      }
      relocated = elsewhere;
    }

    let batch = byDate.get(target);
    if (!batch) {
      batch = { items: [], relocated: [] };
      byDate.set(target, batch);
    }
    batch.items.push(item);
    if (relocated && !batch.relocated.some(moved => moved.item.item_id === item.item_id)) {
      batch.relocated.push(relocated);
    }
  }

  const merges = await Promise.all(
    Array.from(byDate.entries()).map(([date, batch]) =>
      store.update(date, partition => {
        // Moved records arrive with their stored annotations, then take the fresh fields
        for (const { item } of batch.relocated) {
          partition[item.item_id] ??= item;
        }
        return mergeIntoPartition(partition, batch.items, { force });
      })
        .then(
          async counts => {
            await removeRelocated(store, batch.relocated);
            return { date, counts };
          },
          (error: unknown) => {
            logger.error(`Could not write partition ${date}`, error);
            return { date, counts: emptyCounts() };
          }
        )
    )
  );

  for (const { date, counts } of merges) {
    totals = addCounts(totals, counts);
    logger.debug(`Partition ${date}: +${counts.added} new, ${counts.updated} updated, ${counts.skipped} seen`);
  }
  Object.assign(stats, totals);
  stats.partitions = sortDateKeysDescending(byDate.keys());

  stats.endTime = Date.now();
  logger.info('Ingestion run completed', {
    added: stats.added,
    updated: stats.updated,
    skipped: stats.skipped,
    faults: stats.faults.length,
    partitions: stats.partitions,
    duration: `${stats.endTime - stats.startTime}ms`
  });

  return stats;
}

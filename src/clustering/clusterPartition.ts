/**
 * Clustering pass over stored partitions
 *
 * Near-duplicate stories from different sources collapse into one master
 * record that lists every source. Non-master members are removed from the
 * partition. Runs after ingestion; never concurrently with a merge into the
 * same partition (both go through the store's per-partition writer).
 */

import type { PartitionStore } from '../storage/partitionStore';
import type { ClusterSource, DatePartition, NewsItem } from '../types/news';
import type { Summarizer } from '../summarize/summarizer';
import { buildClusterPrompt } from '../summarize/prompts';
import { describeError } from '../utils/http';
import { logger } from '../utils/logger';
import { DEFAULT_CLUSTER_THRESHOLD, clusterItems } from './clusterItems';

const log = logger.child('cluster');

export interface ClusterPassOptions {
  threshold: number;
  summarizer?: Summarizer | null;
}

export interface PartitionClusterStats {
  date: string;
  itemsBefore: number;
  itemsAfter: number;
  multiSourceClusters: number;
  summariesWritten: number;
}

/**
 * Sources a member contributes: its own (source, link), or the list it
 * already carries from an earlier pass
 */
function memberSources(item: NewsItem): ClusterSource[] {
  return item.sources && item.sources.length > 0
    ? item.sources
    : [{ name: item.source, link: item.link }];
}

function mergeSources(members: NewsItem[]): ClusterSource[] {
  const seen = new Set<string>();
  const merged: ClusterSource[] = [];
  for (const member of members) {
    for (const source of memberSources(member)) {
      const key = `${source.name}\u0000${source.link}`;
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push({ name: source.name, link: source.link });
    }
  }
  return merged;
}

async function synthesize(
  master: NewsItem,
  members: NewsItem[],
  summarizer: Summarizer
): Promise<string | undefined> {
  try {
    log.info(`Synthesizing cluster: ${master.title.slice(0, 50)}... (${members.length} items)`);
    return await summarizer.summarize(buildClusterPrompt(master.title, members));
  } catch (error) {
    log.warn('Cluster summary failed, saving master without it', { item_id: master.item_id, error: describeError(error) });
    return undefined;
  }
}

/**
 * Collapse `items` according to index groups from `clusterItems`.
 * Masters keep their position order. `cluster_count` is the number of
 * stories folded into the master; the summarizer runs for clusters of more
 * than one story that either grew in this pass or lack a summary.
 */
export async function collapseClusters(
  items: NewsItem[],
  groups: number[][],
  summarizer?: Summarizer | null
): Promise<{ masters: NewsItem[]; multiSourceClusters: number; summariesWritten: number }> {
  const masters: NewsItem[] = [];
  let multiSourceClusters = 0;
  let summariesWritten = 0;

  for (const group of groups) {
    const members = group.map(index => items[index]);
    // Masters from an earlier pass carry their members forward
    const count = members.reduce((sum, member) => sum + (member.cluster_count ?? 1), 0);
    const master: NewsItem = {
      ...members[0],
      sources: mergeSources(members),
      cluster_count: count
    };

    if (count > 1) {
      multiSourceClusters++;
      const absorbedNew = members.length > 1;
      if (summarizer && (absorbedNew || !master.ai_summary)) {
        const summary = await synthesize(master, members, summarizer);
        if (summary) {
          master.ai_summary = summary;
          summariesWritten++;
        }
      }
    }

    masters.push(master);
  }

  return { masters, multiSourceClusters, summariesWritten };
}

/**
 * Cluster one partition's items, replacing its content with the masters
 */
export async function clusterPartitionItems(
  partition: DatePartition,
  { threshold, summarizer }: ClusterPassOptions
): Promise<Omit<PartitionClusterStats, 'date'>> {
  const items = Object.values(partition);
  const itemsBefore = items.length;

  let masters: NewsItem[];
  let multiSourceClusters = 0;
  let summariesWritten = 0;

  if (items.length < 2) {
    masters = items.map(item => ({ ...item, cluster_count: item.cluster_count ?? 1 }));
  } else {
    const groups = clusterItems(items, { threshold });
    ({ masters, multiSourceClusters, summariesWritten } = await collapseClusters(items, groups, summarizer));
  }

  for (const key of Object.keys(partition)) {
    delete partition[key];
  }
  for (const master of masters) {
    partition[master.item_id] = master;
  }

  return { itemsBefore, itemsAfter: masters.length, multiSourceClusters, summariesWritten };
}

export async function clusterPartition(
  store: PartitionStore,
  date: string,
  options: ClusterPassOptions
): Promise<PartitionClusterStats> {
  const stats = await store.update(date, partition => clusterPartitionItems(partition, options));
  if (stats.itemsBefore !== stats.itemsAfter) {
    log.info(`${date}: ${stats.itemsBefore} items -> ${stats.itemsAfter} (${stats.multiSourceClusters} multi-source)`);
  }
  return { date, ...stats };
}

/**
 * Cluster every stored partition (or just `dates`), one at a time
 */
export async function clusterAllPartitions(
  store: PartitionStore,
  options: Partial<ClusterPassOptions> & { dates?: string[] } = {}
): Promise<PartitionClusterStats[]> {
  const dates = options.dates ?? await store.listPartitionDates();
  const passOptions: ClusterPassOptions = {
    threshold: options.threshold ?? DEFAULT_CLUSTER_THRESHOLD,
    summarizer: options.summarizer ?? null
  };

  const results: PartitionClusterStats[] = [];
  for (const date of dates) {
    results.push(await clusterPartition(store, date, passOptions));
  }

  log.info(`Clustered ${results.length} partition(s)`);
  return results;
}

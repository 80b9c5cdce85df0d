/**
 * Date-partitioned news store
 *
 * One JSON file per local calendar date (`MM-DD-YYYY.json`) mapping
 * item_id -> NewsItem. Partitions are independent files; writes to the same
 * partition go through a single-writer queue.
 */

import { readFile, readdir } from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import type { DatePartition, NewsItem } from '../types/news';
import { parseDateKey, sortDateKeysDescending } from '../utils/dates';
import { logger } from '../utils/logger';
import { writeFileAtomic } from './atomicWrite';

const log = logger.child('store');

const ClusterSourceSchema = z.object({
  name: z.string(),
  link: z.string()
});

export const NewsItemSchema = z
  .object({
    item_id: z.string().min(1),
    source: z.string(),
    title: z.string(),
    summary: z.string().default(''),
    link: z.string().default(''),
    guid: z.string().default(''),
    image: z.string().nullable().default(null),
    published_at: z.string(),
    sources: z.array(ClusterSourceSchema).optional(),
    cluster_count: z.number().int().positive().optional(),
    ai_summary: z.string().optional()
  })
  .passthrough();

/**
 * Newest first; equal instants fall back to item_id so output is stable
 */
export function compareByPublishedDesc(a: NewsItem, b: NewsItem): number {
  if (a.published_at !== b.published_at) {
    return a.published_at < b.published_at ? 1 : -1;
  }
  return a.item_id < b.item_id ? -1 : a.item_id > b.item_id ? 1 : 0;
}

/**
 * Compact on-disk form. Same logical content always yields the same string.
 */
export function serializePartition(partition: DatePartition): string {
  const items = Object.values(partition).sort(compareByPublishedDesc);
  return JSON.stringify(Object.fromEntries(items.map(item => [item.item_id, item])));
}

/**
 * Decode a partition document. Anything that is not an object of items reads
 * as empty; individual malformed entries are logged and left out.
 */
export function parsePartition(text: string, label = 'partition'): DatePartition {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    log.warn(`${label} is not valid JSON, treating as empty`, { error: error instanceof Error ? error.message : String(error) });
    return {};
  }

  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    log.warn(`${label} is not an object, treating as empty`);
    return {};
  }

  const partition: DatePartition = {};
  for (const [key, value] of Object.entries(raw)) {
    const parsed = NewsItemSchema.safeParse(value);
    if (!parsed.success) {
      log.warn(`${label}: dropping malformed entry ${key}`);
      continue;
    }
    partition[parsed.data.item_id] = parsed.data;
  }
  return partition;
}

// fs errors may come from another realm, so match on shape rather than instanceof
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export interface StoredLocation {
  date: string;
  item: NewsItem;
}

export class PartitionStore {
  private readonly writers = new Map<string, pLimit.Limit>();

  constructor(readonly dir: string) {}

  pathFor(date: string): string {
    return path.join(this.dir, `${date}.json`);
  }

  /**
   * Never throws for absent or corrupt files: both read as an empty partition
   */
  async load(date: string): Promise<DatePartition> {
    let text: string;
    try {
      text = await readFile(this.pathFor(date), 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        log.warn(`Could not read partition ${date}, treating as empty`, { error: error instanceof Error ? error.message : String(error) });
      }
      return {};
    }
    return parsePartition(text, `partition ${date}`);
  }

  /**
   * Replace the partition file, queued behind any pending update of that date
   */
  async save(date: string, partition: DatePartition): Promise<void> {
    await this.writerFor(date)(() => this.write(date, partition));
  }

  /**
   * Load, mutate and save one partition as a single critical section.
   * Calls for the same date run one at a time; other dates run freely.
   */
  async update<T>(date: string, mutate: (partition: DatePartition) => T | Promise<T>): Promise<T> {
    return this.writerFor(date)<[], T>(async () => {
      const partition = await this.load(date);
      const result = await mutate(partition);
      await this.write(date, partition);
      return result;
    });
  }

  /**
   * Where each stored item lives, across every partition
   */
  async locateAll(): Promise<Map<string, StoredLocation>> {
    const locations = new Map<string, StoredLocation>();
    for (const date of await this.listPartitionDates()) {
      for (const item of Object.values(await this.load(date))) {
        if (!locations.has(item.item_id)) locations.set(item.item_id, { date, item });
      }
    }
    return locations;
  }

  /**
   * Dates of the partition files present, newest first
   */
  async listPartitionDates(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const keys = names
      .filter(name => name.endsWith('.json'))
      .map(name => name.slice(0, -'.json'.length))
      .filter(key => parseDateKey(key) !== null);
    return sortDateKeysDescending(keys);
  }

  // A crash mid-write leaves the old file intact
  private async write(date: string, partition: DatePartition): Promise<void> {
    await writeFileAtomic(this.pathFor(date), serializePartition(partition));
  }

  private writerFor(date: string): pLimit.Limit {
    let writer = this.writers.get(date);
    if (!writer) {
      writer = pLimit(1);
      this.writers.set(date, writer);
    }
    return writer;
  }
}

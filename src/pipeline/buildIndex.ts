/**
 * Index and latest-pointer builder
 *
 * Everything here is derived from the partition files present in the news
 * directory and can be rebuilt at any time.
 */

import { mkdir, readdir } from 'fs/promises';
import path from 'path';
import { PartitionStore, compareByPublishedDesc } from '../storage/partitionStore';
import { writeJsonFile } from '../storage/atomicWrite';
import type { IndexManifest, LatestFile } from '../types/news';
import { parseDateKey, sortDateKeysDescending } from '../utils/dates';
import { logger } from '../utils/logger';

export const INDEX_FILE = 'index.json';
export const LATEST_FILE = 'latest.json';

const DIGEST_FILE = /^digest-(.+)\.json$/;

/**
 * Manifest for a directory listing: partition dates and digest dates, both
 * newest first, invalid names left out
 */
export function manifestFromFileNames(names: string[]): IndexManifest {
  const dates: string[] = [];
  const digests: string[] = [];

  for (const name of names) {
    if (!name.endsWith('.json') || name === INDEX_FILE) continue;

    const digest = name.match(DIGEST_FILE);
    if (digest) {
      if (parseDateKey(digest[1])) digests.push(digest[1]);
      continue;
    }

    const key = name.slice(0, -'.json'.length);
    if (parseDateKey(key)) dates.push(key);
  }

  return {
    dates: sortDateKeysDescending(dates),
    digests: sortDateKeysDescending(digests)
  };
}

/**
 * Build `index.json` from the files in `newsDir`
 */
export async function buildIndex(newsDir: string): Promise<IndexManifest> {
  await mkdir(newsDir, { recursive: true });
  const manifest = manifestFromFileNames(await readdir(newsDir));
  await writeJsonFile(path.join(newsDir, INDEX_FILE), manifest);
  logger.info(`Index built with ${manifest.dates.length} date(s) and ${manifest.digests.length} digest(s).`);
  return manifest;
}

/**
 * Write `latest.json` from the newest partition. Returns null (and writes
 * nothing) when there are no partitions yet.
 */
export async function writeLatest(newsDir: string, now: Date = new Date()): Promise<LatestFile | null> {
  const store = new PartitionStore(newsDir);
  const [newest] = await store.listPartitionDates();
  if (!newest) {
    logger.info('No partitions yet; latest.json not written');
    return null;
  }

  const partition = await store.load(newest);
  const latest: LatestFile = {
    generated_at: now.toISOString(),
    date: newest,
    items: Object.values(partition).sort(compareByPublishedDesc)
  };

  await writeJsonFile(path.join(newsDir, LATEST_FILE), latest);
  logger.info(`latest.json points at ${newest} (${latest.items.length} items)`);
  return latest;
}

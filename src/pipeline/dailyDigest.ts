/**
 * Daily "catch up" digest
 *
 * Takes the most-covered stories of today and yesterday (local time), asks
 * the summarizer for a short timeline, and writes `digest-MM-DD-YYYY.json`
 * plus `digest.json`. Failures are logged and leave existing digests alone.
 */

import path from 'path';
import { z } from 'zod';
import { PartitionStore } from '../storage/partitionStore';
import { writeJsonFile } from '../storage/atomicWrite';
import type { Summarizer } from '../summarize/summarizer';
import { DigestHeadline, buildDigestPrompt } from '../summarize/prompts';
import type { DigestFile } from '../types/news';
import { addDays, calendarDateIn, formatDateKey } from '../utils/dates';
import { describeError } from '../utils/http';
import { logger } from '../utils/logger';

const log = logger.child('digest');

export const HEADLINES_PER_DAY = 15;

const DigestResponseSchema = z.object({
  summary: z.string().default(''),
  timeline: z
    .array(
      z.object({
        time: z.string().default(''),
        title: z.string().default(''),
        content: z.string().default(''),
        sources: z.array(z.object({ name: z.string(), link: z.string() })).default([])
      })
    )
    .default([])
});

export interface DigestOptions {
  newsDir: string;
  timeZone: string;
  summarizer: Summarizer | null;
  now?: Date;
}

/**
 * Model output to an object: tolerates ```json fences around the payload
 */
export function parseDigestResponse(raw: string): z.infer<typeof DigestResponseSchema> {
  const json = raw.replace(/```json\s*|\s*```/g, '').trim();
  return DigestResponseSchema.parse(JSON.parse(json));
}

/**
 * Top headlines of `dates`, each day ranked by how many sources covered it
 */
export async function collectHeadlines(store: PartitionStore, dates: string[]): Promise<DigestHeadline[]> {
  const headlines: DigestHeadline[] = [];
  for (const date of dates) {
    const items = Object.values(await store.load(date));
    items.sort((a, b) => (b.cluster_count ?? 0) - (a.cluster_count ?? 0));
    for (const item of items.slice(0, HEADLINES_PER_DAY)) {
      headlines.push({ title: item.title, source: item.source, link: item.link });
    }
  }
  return headlines;
}

export async function generateDigest({ newsDir, timeZone, summarizer, now = new Date() }: DigestOptions): Promise<DigestFile | null> {
  const today = calendarDateIn(now, timeZone);
  const todayKey = formatDateKey(today);
  const yesterdayKey = formatDateKey(addDays(today, -1));

  const store = new PartitionStore(newsDir);
  const headlines = await collectHeadlines(store, [todayKey, yesterdayKey]);
  if (headlines.length === 0) {
    log.info(`No items for ${todayKey} or ${yesterdayKey}; skipping digest`);
    return null;
  }

  if (!summarizer) {
    log.info('No summarizer configured; skipping digest');
    return null;
  }

  try {
    const raw = await summarizer.summarize(buildDigestPrompt(headlines), { json: true });
    const result = parseDigestResponse(raw);

    const digest: DigestFile = {
      date: todayKey,
      summary: result.summary,
      timeline: result.timeline,
      updated: now.toISOString()
    };

    await writeJsonFile(path.join(newsDir, `digest-${todayKey}.json`), digest);
    await writeJsonFile(path.join(newsDir, 'digest.json'), digest);
    log.info(`Digest for ${todayKey} written (${digest.timeline.length} timeline entries)`);
    return digest;
  } catch (error) {
    log.error('Error generating digest', describeError(error));
    return null;
  }
}

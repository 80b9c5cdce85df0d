/**
 * Full pipeline: ingest -> cluster -> digest -> index/latest
 */

import type { ParserRegistry } from '../adapters';
import { PartitionClusterStats, clusterAllPartitions } from '../clustering/clusterPartition';
import type { EnvironmentConfig } from '../config/environment';
import type { PartitionStore } from '../storage/partitionStore';
import type { Summarizer } from '../summarize/summarizer';
import type { SourceConfig } from '../types/adapter';
import type { DigestFile, IndexManifest } from '../types/news';
import { describeError } from '../utils/http';
import { logger } from '../utils/logger';
import { buildIndex, writeLatest } from './buildIndex';
import { generateDigest } from './dailyDigest';
import { IngestionStats, runIngestion } from './runIngestion';

export interface PipelineOptions {
  config: EnvironmentConfig;
  registry: ParserRegistry;
  store: PartitionStore;
  summarizer: Summarizer | null;
  force?: boolean;
  now?: Date;
}

export interface PipelineResult {
  ingestion: IngestionStats;
  clustering: PartitionClusterStats[];
  digest: DigestFile | null;
  index: IndexManifest | null;
  duration: number;
}

export async function runPipeline(sources: SourceConfig[], options: PipelineOptions): Promise<PipelineResult> {
  const { config, registry, store, summarizer, force = false, now } = options;
  const startTime = Date.now();

  const ingestion = await runIngestion(sources, { config, registry, store, force });

  const clustering = await clusterAllPartitions(store, {
    threshold: config.clustering.threshold,
    summarizer,
    dates: ingestion.partitions
  });

  const digest = await generateDigest({
    newsDir: store.dir,
    timeZone: config.news.timeZone,
    summarizer,
    now
  });

  let index: IndexManifest | null = null;
  try {
    index = await buildIndex(store.dir);
    await writeLatest(store.dir, now);
  } catch (error) {
    logger.error('Index build failed; partitions are still up to date', describeError(error));
  }

  return { ingestion, clustering, digest, index, duration: Date.now() - startTime };
}

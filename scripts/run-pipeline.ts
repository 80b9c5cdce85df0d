#!/usr/bin/env tsx

/**
 * Runner for the news pipeline
 * Loads environment variables, crawls every configured source, clusters,
 * writes the digest and rebuilds index.json / latest.json
 *
 * Usage: tsx scripts/run-pipeline.ts [--config sources.json] [--force]
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';

const projectRoot = path.resolve(__dirname, '..');

dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { createParserRegistry } from '../src/adapters';
import { EnvironmentConfig, loadEnvironmentConfig } from '../src/config/environment';
import { loadSourcesConfig } from '../src/config/sources';
import { runPipeline } from '../src/pipeline/runPipeline';
import { PartitionStore } from '../src/storage/partitionStore';
import { createSummarizer } from '../src/summarize/summarizer';
import { setLogLevel } from '../src/utils/logger';
import type { SourceConfig } from '../src/types/adapter';

interface CliArgs {
  configPath: string;
  force: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { configPath: path.join(projectRoot, 'sources.json'), force: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--force') {
      args.force = true;
    } else if (arg === '--config') {
      const value = argv[++i];
      if (!value) throw new Error('--config needs a path');
      args.configPath = path.resolve(value);
    } else if (arg.startsWith('--config=')) {
      args.configPath = path.resolve(arg.slice('--config='.length));
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

async function main() {
  let args: CliArgs;
  let config: EnvironmentConfig;
  let sources: SourceConfig[];

  try {
    args = parseArgs(process.argv.slice(2));
    config = loadEnvironmentConfig();
    sources = await loadSourcesConfig(args.configPath);
  } catch (error) {
    console.error('💥 Configuration error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  setLogLevel(config.logging.level);

  console.log('🚀 Starting news pipeline\n');
  console.log('═'.repeat(80));

  const result = await runPipeline(sources, {
    config,
    registry: createParserRegistry({
      fetch: { timeoutMs: config.ingestion.fetchTimeoutMs, retries: config.ingestion.fetchRetries },
      articleConcurrency: config.ingestion.articleConcurrency
    }),
    store: new PartitionStore(path.resolve(projectRoot, config.news.outputDir)),
    summarizer: createSummarizer(config.summarizer),
    force: args.force
  });

  const { ingestion } = result;
  console.log('\n' + '═'.repeat(80));
  console.log('📊 Results:');
  console.log(`   • Sources processed: ${ingestion.sourcesProcessed} (${ingestion.urlsProcessed} URLs)`);
  console.log(`   • Items parsed: ${ingestion.itemsParsed}`);
  console.log(`   • Added: ${ingestion.added}`);
  console.log(`   • Updated: ${ingestion.updated}`);
  console.log(`   • Skipped: ${ingestion.skipped}`);
  console.log(`   • Faults: ${ingestion.faults.length}`);
  console.log(`   • Partitions touched: ${ingestion.partitions.join(', ') || 'none'}`);
  console.log(`   • Multi-source clusters: ${result.clustering.reduce((sum, stats) => sum + stats.multiSourceClusters, 0)}`);
  console.log(`   • Digest: ${result.digest ? result.digest.date : 'not written'}`);
  console.log(`   • Duration: ${result.duration}ms`);
}

main().catch(error => {
  console.error('\n💥 PIPELINE FAILED');
  console.error('Error:', error);
  process.exitCode = 1;
});

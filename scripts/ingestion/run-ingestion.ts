#!/usr/bin/env node

/**
 * Fetch Google News headlines for a topic and upsert the first new article
 * into the Supabase `news` table.
 *
 * Exits 0 when an article was stored, 1 when nothing new was ingested or the
 * configuration is incomplete.
 */

// Load environment variables from .env.local or .env in the working directory
import dotenv from 'dotenv';
import path from 'path';
import { parseArgs } from 'util';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import {
  ConfigurationError,
  loadEnvironmentConfig,
  type ConfigOverrides,
  type EnvironmentConfig
} from '../../src/config/environment';
import { ingestTopic, type IngestionStages } from '../../src/agents/runIngestion';
import { logger } from '../../src/utils/logger';

const USAGE = `Usage: run-ingestion [options]

  --supabase-url <url>   Supabase project URL (or SUPABASE_URL env)
  --supabase-key <key>   Supabase service or anon key (or SUPABASE_KEY env)
  --topic-id <id>        Google News topic ID (or TOPIC_ID env)
  --title <title>        Topic title; used for the JSON filename (default: alhilal)
  --limit <n>            Max number of entries to process (default: 50)
  -h, --help             Show this help`;

export function parseCliArgs(argv: string[]): ConfigOverrides & { help: boolean } {
  const { values } = parseArgs({
    args: argv,
    options: {
      'supabase-url': { type: 'string' },
      'supabase-key': { type: 'string' },
      'topic-id': { type: 'string' },
      title: { type: 'string' },
      limit: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true
  });

  let limit: number | undefined;
  if (values.limit !== undefined) {
    limit = parseInt(values.limit, 10);
    if (!Number.isFinite(limit)) {
      throw new Error(`--limit must be an integer, got "${values.limit}"`);
    }
  }

  return {
    supabaseUrl: values['supabase-url'],
    supabaseKey: values['supabase-key'],
    topicId: values['topic-id'],
    title: values.title,
    limit,
    help: values.help ?? false
  };
}

/**
 * Run one ingestion from command-line arguments and return the exit code:
 * 0 when an article was stored, 1 when nothing was or the configuration
 * is incomplete.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  stages?: IngestionStages
): Promise<number> {
  const { help, ...overrides } = parseCliArgs(argv);
  if (help) {
    console.log(USAGE);
    return 0;
  }

  let config: EnvironmentConfig;
  try {
    config = loadEnvironmentConfig(overrides, env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
  logger.setLevel(config.logging.level);

  logger.info('Starting fetch and upsert workflow...');
  const result = await ingestTopic(config, stages);
  logger.info('Done.', { processed: result.processed, entries: result.entryCount, headlines: result.headlinesPath });

  return result.processed > 0 ? 0 : 1;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch(error => {
      logger.error('Ingestion run failed', error);
      process.exit(1);
    });
}

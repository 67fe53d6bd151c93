/**
 * Topic ingestion pipeline
 *
 * For each headline entry, in feed order and one at a time:
 * 1. Resolves the headline link to the article it redirects to
 * 2. Extracts the article (quality-gated)
 * 3. Normalizes its publish date
 * 4. Builds the `news` row
 * 5. Upserts it into Supabase
 *
 * The run stops at the first successful upsert.
 */

import { createClient } from '@supabase/supabase-js';
import { resolveFinalUrl } from './tools/redirect-resolver';
import { extractArticle } from './tools/article-extractor';
import { buildNewsRecord, normalizePublishDate } from './tools/ingestion-helpers';
import { supabaseNewsTable, upsertNewsRecord } from './tools/news-store';
import { getSentenceTokenizer } from './tools/summarizer';
import {
  extractFeedEntries,
  fetchTopicHeadlines,
  saveTopicHeadlinesToJson
} from '../adapters/google-news';
import type { EnvironmentConfig } from '../config/environment';
import { logger } from '../utils/logger';
import type { ExtractedArticle, FeedEntry, NewsRecord, UpsertOutcome } from '../types/news';

export interface IngestionStages {
  resolve(url: string): Promise<string | null>;
  extract(url: string): Promise<ExtractedArticle | null>;
  persist(record: NewsRecord): Promise<UpsertOutcome>;
  now?: () => Date;
}

export interface TopicIngestionResult {
  processed: number;
  headlinesPath: string;
  entryCount: number;
}

/**
 * Wire the real adapters for one run. One Supabase client is shared by every
 * upsert of the run.
 */
export function createIngestionStages(config: EnvironmentConfig): IngestionStages {
  logger.info(`[4/5] Connecting to Supabase: ${config.supabase.url}`);
  const client = createClient(config.supabase.url, config.supabase.key, {
    auth: { persistSession: false }
  });
  const table = supabaseNewsTable(client, config.supabase.newsTable);
  const tokenizer = getSentenceTokenizer(config.googleNews.lang);

  return {
    resolve: (url) =>
      resolveFinalUrl(url, {
        executablePath: config.browser.executablePath,
        settleMs: config.browser.settleMs,
        navigationTimeoutMs: config.browser.navigationTimeoutMs
      }),
    extract: (url) =>
      extractArticle(url, {
        fetchTimeoutMs: config.extraction.fetchTimeoutMs,
        userAgent: config.extraction.userAgent,
        tokenizer
      }),
    persist: (record) => upsertNewsRecord(table, record)
  };
}

/**
 * Process entries until one article is stored.
 * Returns the number of upserted articles (0 or 1).
 */
export async function runIngestion(
  entries: FeedEntry[],
  topicId: string,
  limit: number,
  stages: IngestionStages
): Promise<number> {
  const selected = entries.slice(0, Math.max(0, limit));
  let processed = 0;

  for (const [index, entry] of selected.entries()) {
    logger.info(`[5/5] Processing entry ${index + 1}/${selected.length}`);

    if (!entry.link) {
      logger.info('Skipping entry: no link');
      continue;
    }

    const resolved = await stages.resolve(entry.link);
    const articleUrl = resolved ?? entry.link;

    const article = await stages.extract(articleUrl);
    if (!article) {
      logger.info('Skipped: could not retrieve full article');
      continue;
    }

    const normalizedDate = normalizePublishDate(article.publishDate, stages.now);
    const record = buildNewsRecord(article, normalizedDate, topicId, entry.sourceHref, entry.sourceTitle);

    const outcome = await stages.persist(record);
    if (outcome === 'success') {
      processed += 1;
      logger.info('Successfully upserted first article, stopping as requested.');
      break;
    }
  }

  logger.info(`Completed. Total upserted articles: ${processed}`);
  return processed;
}

/**
 * Full run for one topic: fetch headlines, keep the raw payload on disk,
 * then ingest.
 */
export async function ingestTopic(
  config: EnvironmentConfig,
  stages?: IngestionStages
): Promise<TopicIngestionResult> {
  const headlines = await fetchTopicHeadlines(config.topic.id, {
    lang: config.googleNews.lang,
    country: config.googleNews.country,
    timeoutMs: config.extraction.fetchTimeoutMs
  });
  const headlinesPath = await saveTopicHeadlinesToJson(headlines, config.topic.title, config.googleNews.outputDir);
  const entries = extractFeedEntries(headlines);

  const processed = await runIngestion(
    entries,
    config.topic.id,
    config.topic.limit,
    stages ?? createIngestionStages(config)
  );
  return { processed, headlinesPath, entryCount: entries.length };
}

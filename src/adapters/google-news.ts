import Parser from 'rss-parser';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_FETCH_TIMEOUT_MS } from '../config/environment';
import { logger } from '../utils/logger';
import type { FeedEntry } from '../types/news';

const GOOGLE_NEWS_TOPIC_URL = 'https://news.google.com/rss/topics';

// <source url="https://publisher.example">Publisher</source> as parsed by xml2js
interface RSSSource {
  _?: string;
  $?: { url?: string };
}

interface RSSFeed {
  lastBuildDate?: string;
}

interface RSSItem {
  title?: string;
  link?: string;
  pubDate?: string;
  guid?: string;
  source?: RSSSource | string;
}

export interface HeadlineSource {
  href: string | null;
  title: string | null;
}

export interface HeadlineEntry {
  id: string | null;
  title: string | null;
  link: string | null;
  published: string | null;
  source: HeadlineSource | null;
}

/**
 * Raw topic payload; also the shape of the JSON audit file
 */
export interface TopicHeadlines {
  feed: {
    title: string | null;
    link: string | null;
    updated: string | null;
  };
  entries: HeadlineEntry[];
}

export interface TopicFeedOptions {
  lang?: string;
  country?: string;
  timeoutMs?: number;
}

export function buildTopicFeedUrl(topicId: string, lang = 'ar', country = 'SA'): string {
  const params = new URLSearchParams({
    hl: lang,
    gl: country,
    ceid: `${country}:${lang}`
  });
  return `${GOOGLE_NEWS_TOPIC_URL}/${encodeURIComponent(topicId)}?${params.toString()}`;
}

function normalizeSource(source: RSSItem['source']): HeadlineSource | null {
  if (!source) {
    return null;
  }
  if (typeof source === 'string') {
    return { href: null, title: source.trim() || null };
  }
  return {
    href: source.$?.url?.trim() || null,
    title: source._?.trim() || null
  };
}

/**
 * Parse a topic RSS document into the raw headline payload
 */
export async function parseTopicFeed(xml: string): Promise<TopicHeadlines> {
  const parser = new Parser<RSSFeed, RSSItem>({
    customFields: { item: ['source'] }
  });
  const feed = await parser.parseString(xml);

  return {
    feed: {
      title: feed.title ?? null,
      link: feed.link ?? null,
      updated: feed.lastBuildDate ?? null
    },
    entries: feed.items.map(item => ({
      id: item.guid ?? null,
      title: item.title?.trim() ?? null,
      link: item.link?.trim() ?? null,
      published: item.pubDate ?? null,
      source: normalizeSource(item.source)
    }))
  };
}

/**
 * Fetch the current headlines of a Google News topic
 */
export async function fetchTopicHeadlines(topicId: string, options: TopicFeedOptions = {}): Promise<TopicHeadlines> {
  const url = buildTopicFeedUrl(topicId, options.lang, options.country);
  logger.info(`[1/5] Fetching Google News headlines for topic: ${topicId}`);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS);
  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: { Accept: 'application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.1' }
    });
    if (!response.ok) {
      throw new Error(`Google News topic feed request failed: ${response.status} ${response.statusText}`);
    }
    return await parseTopicFeed(await response.text());
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Write the raw payload next to the run for auditing. Returns the file path.
 */
export async function saveTopicHeadlinesToJson(
  headlines: TopicHeadlines,
  basename: string,
  outputDir: string
): Promise<string> {
  const filePath = path.join(outputDir, `${basename}.json`);
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(headlines, null, 4), 'utf-8');
  logger.info(`[2/5] Saved raw headlines JSON to: ${filePath}`);
  return filePath;
}

// Each field degrades to null on its own
const sourceSchema = z
  .object({
    href: z.string().nullish().catch(null),
    title: z.string().nullish().catch(null)
  })
  .nullish()
  .catch(null);

const entrySchema = z.object({
  link: z.string().nullish().catch(null),
  source: sourceSchema
});

const payloadSchema = z.object({
  entries: z.array(z.unknown()).default([])
});

/**
 * Reduce a headline payload to pipeline entries. Entries without a usable
 * link are kept (the pipeline skips them); malformed link or source fields
 * become absent values.
 */
export function extractFeedEntries(payload: unknown): FeedEntry[] {
  const parsedPayload = payloadSchema.safeParse(payload);
  if (!parsedPayload.success) {
    logger.warn('Headline payload has no entries list');
    return [];
  }

  const entries = parsedPayload.data.entries.map((raw): FeedEntry => {
    const entry = entrySchema.safeParse(raw);
    if (!entry.success) {
      return { link: null, sourceHref: null, sourceTitle: null };
    }
    const { link, source } = entry.data;
    return {
      link: link ?? null,
      sourceHref: source?.href ?? null,
      sourceTitle: source?.title ?? null
    };
  });

  logger.info(`[3/5] Extracted ${entries.length} entries from headlines`);
  return entries;
}

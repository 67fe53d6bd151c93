/**
 * Downloads an article page and turns it into structured content:
 * title, cleaned markup, plain text, lead image, raw publish date,
 * canonical URL and an optional extractive summary.
 */

import * as cheerio from 'cheerio';
import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { passesQualityGate } from './ingestion-helpers';
import { getSentenceTokenizer, summarize, type SentenceTokenizer } from './summarizer';
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../../config/environment';
import { logger, errorMessage } from '../../utils/logger';
import type { ExtractedArticle } from '../../types/news';

export interface ExtractOptions {
  fetchTimeoutMs?: number;
  userAgent?: string;
  tokenizer?: SentenceTokenizer;
}

interface PageMetadata {
  canonicalUrl: string | null;
  topImage: string | null;
  publishDate: string | null;
  title: string | null;
}

const PUBLISH_DATE_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[property="og:published_time"]',
  'meta[name="pubdate"]',
  'meta[name="publishdate"]',
  'meta[name="date"]',
  'meta[itemprop="datePublished"]'
];

async function downloadPage(url: string, timeoutMs: number, userAgent: string): Promise<{ html: string; finalUrl: string }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml'
      }
    });

    if (!response.ok) {
      throw new Error(`HTTP error! status: ${response.status}`);
    }

    const html = await response.text();
    return { html, finalUrl: response.url || url };
  } finally {
    clearTimeout(timeout);
  }
}

function absoluteUrl(value: string | undefined, base: string): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return null;
  }
}

function findJsonLdDate(node: unknown): string | null {
  if (Array.isArray(node)) {
    for (const child of node) {
      const found = findJsonLdDate(child);
      if (found) return found;
    }
    return null;
  }
  if (node && typeof node === 'object') {
    const record: Record<string, unknown> = { ...node };
    if (typeof record.datePublished === 'string') {
      return record.datePublished;
    }
    return findJsonLdDate(record['@graph'] ?? null);
  }
  return null;
}

/**
 * Read head metadata before Readability rewrites the document
 */
export function readPageMetadata(html: string, pageUrl: string): PageMetadata {
  const $ = cheerio.load(html);
  const meta = (selector: string) => $(selector).first().attr('content');

  let publishDate: string | null = null;
  for (const selector of PUBLISH_DATE_SELECTORS) {
    const value = meta(selector)?.trim();
    if (value) {
      publishDate = value;
      break;
    }
  }

  if (!publishDate) {
    $('script[type="application/ld+json"]').each((_, element) => {
      if (publishDate) return;
      try {
        publishDate = findJsonLdDate(JSON.parse($(element).text()));
      } catch {
        // Malformed JSON-LD blocks are common; move on to the next one
      }
    });
  }

  if (!publishDate) {
    publishDate = $('time[datetime]').first().attr('datetime')?.trim() || null;
  }

  return {
    canonicalUrl:
      absoluteUrl($('link[rel="canonical"]').first().attr('href'), pageUrl) ??
      absoluteUrl(meta('meta[property="og:url"]'), pageUrl),
    topImage:
      absoluteUrl(meta('meta[property="og:image"]'), pageUrl) ??
      absoluteUrl(meta('meta[name="twitter:image"]'), pageUrl),
    publishDate,
    title: meta('meta[property="og:title"]')?.trim() || $('title').first().text().trim() || null
  };
}

/**
 * Download and parse the article at `url`.
 * Returns null when the page cannot be fetched or parsed, or when the
 * extracted markup is too short to be a real article.
 */
export async function extractArticle(url: string, options: ExtractOptions = {}): Promise<ExtractedArticle | null> {
  logger.info(`Fetching article for link: ${url}`);

  try {
    const { html, finalUrl } = await downloadPage(
      url,
      options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      options.userAgent ?? DEFAULT_USER_AGENT
    );

    const metadata = readPageMetadata(html, finalUrl);

    const dom = new JSDOM(html, { url: finalUrl });
    let parsed: ReturnType<Readability['parse']>;
    try {
      parsed = new Readability(dom.window.document).parse();
    } finally {
      dom.window.close();
    }
    if (!parsed) {
      logger.warn('Skipped: could not parse article content', { url: finalUrl });
      return null;
    }

    const articleHtml = parsed.content ?? '';
    const articleText = parsed.textContent?.trim() ?? '';
    const title = parsed.title?.trim() || metadata.title || '';

    if (!passesQualityGate(articleHtml)) {
      logger.info('Skipped: too short', { url: finalUrl, htmlLength: articleHtml.length });
      return null;
    }

    let summary: string | null = null;
    try {
      summary = summarize(title, articleText, options.tokenizer ?? getSentenceTokenizer());
    } catch (error) {
      logger.warn(`Summary generation failed: ${errorMessage(error)}`);
    }

    logger.info(`Parsed article: '${title.slice(0, 60)}...' (HTML length ok)`);

    return {
      title,
      articleHtml,
      articleText,
      topImage: metadata.topImage,
      publishDate: metadata.publishDate,
      url: metadata.canonicalUrl ?? finalUrl,
      summary
    };
  } catch (error) {
    const message = error instanceof Error && error.name === 'AbortError' ? 'Request timeout' : errorMessage(error);
    logger.warn(`Failed to parse article: ${message}`, { url });
    return null;
  }
}

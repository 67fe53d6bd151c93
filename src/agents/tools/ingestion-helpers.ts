/**
 * Ingestion Helper Functions
 * Pure functions that handle the core ingestion pipeline logic
 */

import type { ExtractedArticle, NewsRecord, RawPublishDate } from '../../types/news';

// Anything at or below this many characters of article markup is a stub,
// paywall teaser or error page
export const MIN_ARTICLE_HTML_LENGTH = 500;

const CLEARBIT_LOGO_BASE = 'https://logo.clearbit.com/';

// Postgres timestamptz and plain ISO 8601 only take four-digit years
const MIN_YEAR = 0;
const MAX_YEAR = 9999;

function toIsoString(date: Date): string | null {
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  const year = date.getUTCFullYear();
  return year < MIN_YEAR || year > MAX_YEAR ? null : date.toISOString();
}

function parseRawDate(raw: Exclude<RawPublishDate, null | undefined>): string | null {
  if (raw instanceof Date) {
    return toIsoString(raw);
  }

  if (typeof raw === 'number') {
    // Epoch seconds vs milliseconds
    return Number.isFinite(raw) ? toIsoString(new Date(raw < 1e12 ? raw * 1000 : raw)) : null;
  }

  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }
  if (/^\d{10}$/.test(trimmed)) {
    return toIsoString(new Date(Number(trimmed) * 1000));
  }
  if (/^\d{13}$/.test(trimmed)) {
    return toIsoString(new Date(Number(trimmed)));
  }

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : toIsoString(new Date(parsed));
}

/**
 * Convert whatever the page exposed as a publish date into ISO 8601.
 * Falls back to the current time when the value is absent or unparseable.
 */
export function normalizePublishDate(raw?: RawPublishDate, now: () => Date = () => new Date()): string {
  if (raw === null || raw === undefined) {
    return now().toISOString();
  }
  try {
    return parseRawDate(raw) ?? now().toISOString();
  } catch {
    return now().toISOString();
  }
}

/**
 * True when the extracted markup is long enough to be a real article
 */
export function passesQualityGate(html: string | null | undefined): boolean {
  try {
    if (typeof html !== 'string') {
      return false;
    }
    return html.length > MIN_ARTICLE_HTML_LENGTH;
  } catch {
    return false;
  }
}

export function sourceLogoUrl(sourceHref: string | null): string | null {
  return sourceHref ? `${CLEARBIT_LOGO_BASE}${sourceHref}` : null;
}

/**
 * Build a `news` row from an extracted article and its feed attribution
 */
export function buildNewsRecord(
  article: ExtractedArticle,
  normalizedDate: string,
  topicId: string,
  sourceHref: string | null,
  sourceTitle: string | null
): NewsRecord {
  return {
    news_title: article.title,
    news_articlehtml: article.articleHtml,
    news_articletext: article.articleText,
    news_topimg: article.topImage,
    news_date: normalizedDate,
    news_url: article.url,
    news_summary: article.summary,
    news_topicid: topicId,
    news_source_href: sourceHref || null,
    news_source_title: sourceTitle || null,
    news_source_logo: sourceLogoUrl(sourceHref || null)
  };
}

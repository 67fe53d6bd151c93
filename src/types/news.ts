// Shapes that flow through the topic ingestion pipeline

/**
 * One candidate headline from the topic feed.
 * `sourceHref` is the publisher's site (e.g. "https://www.example.com"),
 * `sourceTitle` its display name.
 */
export interface FeedEntry {
  link: string | null;
  sourceHref: string | null;
  sourceTitle: string | null;
}

// Whatever the page exposed as its publish date, before normalization
export type RawPublishDate = string | number | Date | null | undefined;

export interface ExtractedArticle {
  title: string;
  articleHtml: string;       // Cleaned article markup (quality-gated)
  articleText: string;       // Plain text of the article body
  topImage: string | null;   // Primary image URL, if the page declared one
  publishDate: RawPublishDate;
  url: string;               // Canonical URL of the article
  summary: string | null;    // Extractive summary, best effort
}

/**
 * Row written to the `news` table. Column names match the existing table.
 */
export interface NewsRecord {
  news_title: string;
  news_articlehtml: string;
  news_articletext: string;
  news_topimg: string | null;
  news_date: string;         // ISO 8601, never empty
  news_url: string;
  news_summary: string | null;
  news_topicid: string;
  news_source_href: string | null;
  news_source_title: string | null;
  news_source_logo: string | null;
}

export type UpsertOutcome = 'success' | 'duplicate' | 'failed';

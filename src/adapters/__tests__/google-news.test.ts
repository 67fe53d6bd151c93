import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  buildTopicFeedUrl,
  extractFeedEntries,
  fetchTopicHeadlines,
  parseTopicFeed,
  saveTopicHeadlinesToJson,
  type TopicHeadlines
} from '../google-news';

const TOPIC_XML = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example topic - Google News</title>
    <link>https://news.google.com/topics/CAAqTEST?hl=ar&amp;gl=SA&amp;ceid=SA:ar</link>
    <lastBuildDate>Fri, 01 Mar 2024 12:00:00 GMT</lastBuildDate>
    <item>
      <title>Stadium expansion approved - Example News</title>
      <link>https://news.google.com/rss/articles/CBMiabc?oc=5</link>
      <guid isPermaLink="false">CBMiabc</guid>
      <pubDate>Fri, 01 Mar 2024 10:00:00 GMT</pubDate>
      <source url="https://news.example.com">Example News</source>
    </item>
    <item>
      <title>Untitled source</title>
      <link>https://news.google.com/rss/articles/CBMidef?oc=5</link>
      <guid isPermaLink="false">CBMidef</guid>
      <pubDate>Fri, 01 Mar 2024 09:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

describe('buildTopicFeedUrl', () => {
  it('builds the localized topic feed address', () => {
    expect(buildTopicFeedUrl('CAAqTEST', 'ar', 'SA')).toBe(
      'https://news.google.com/rss/topics/CAAqTEST?hl=ar&gl=SA&ceid=SA%3Aar'
    );
  });
});

describe('parseTopicFeed', () => {
  it('keeps links and source attribution of each item', async () => {
    const headlines = await parseTopicFeed(TOPIC_XML);

    expect(headlines.feed).toEqual({
      title: 'Example topic - Google News',
      link: 'https://news.google.com/topics/CAAqTEST?hl=ar&gl=SA&ceid=SA:ar',
      updated: 'Fri, 01 Mar 2024 12:00:00 GMT'
    });
    expect(headlines.entries).toEqual([
      {
        id: 'CBMiabc',
        title: 'Stadium expansion approved - Example News',
        link: 'https://news.google.com/rss/articles/CBMiabc?oc=5',
        published: 'Fri, 01 Mar 2024 10:00:00 GMT',
        source: { href: 'https://news.example.com', title: 'Example News' }
      },
      {
        id: 'CBMidef',
        title: 'Untitled source',
        link: 'https://news.google.com/rss/articles/CBMidef?oc=5',
        published: 'Fri, 01 Mar 2024 09:00:00 GMT',
        source: null
      }
    ]);
  });
});

describe('fetchTopicHeadlines', () => {
  it('requests the topic feed and parses it', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response(TOPIC_XML, { status: 200 }));

    const headlines = await fetchTopicHeadlines('CAAqTEST', { lang: 'en', country: 'US' });

    expect(fetchSpy.mock.calls[0][0]).toBe('https://news.google.com/rss/topics/CAAqTEST?hl=en&gl=US&ceid=US%3Aen');
    expect(headlines.entries).toHaveLength(2);
  });

  it('throws when the feed cannot be fetched', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('', { status: 503, statusText: 'Service Unavailable' }));

    await expect(fetchTopicHeadlines('CAAqTEST')).rejects.toThrow(
      'Google News topic feed request failed: 503 Service Unavailable'
    );
  });
});

describe('extractFeedEntries', () => {
  it('maps entries to links and attribution', () => {
    const payload = {
      entries: [
        { link: 'https://news.google.com/rss/articles/1', source: { href: 'https://a.example.com', title: 'A' } },
        { link: 'https://news.google.com/rss/articles/2' }
      ]
    };

    expect(extractFeedEntries(payload)).toEqual([
      { link: 'https://news.google.com/rss/articles/1', sourceHref: 'https://a.example.com', sourceTitle: 'A' },
      { link: 'https://news.google.com/rss/articles/2', sourceHref: null, sourceTitle: null }
    ]);
  });

  it('degrades malformed entries and sources to absent values', () => {
    const payload = {
      entries: [
        { link: 'https://news.google.com/rss/articles/3', source: 'not an object' },
        { link: 42 },
        'garbage'
      ]
    };

    expect(extractFeedEntries(payload)).toEqual([
      { link: 'https://news.google.com/rss/articles/3', sourceHref: null, sourceTitle: null },
      { link: null, sourceHref: null, sourceTitle: null },
      { link: null, sourceHref: null, sourceTitle: null }
    ]);
  });

  it('keeps the well-formed source field when the other one is malformed', () => {
    const payload = {
      entries: [
        { link: 'https://news.google.com/rss/articles/4', source: { href: 'https://b.example.com', title: 7 } },
        { link: 'https://news.google.com/rss/articles/5', source: { href: ['x'], title: 'C' } },
        { link: 99, source: { href: 'https://d.example.com', title: 'D' } }
      ]
    };

    expect(extractFeedEntries(payload)).toEqual([
      { link: 'https://news.google.com/rss/articles/4', sourceHref: 'https://b.example.com', sourceTitle: null },
      { link: 'https://news.google.com/rss/articles/5', sourceHref: null, sourceTitle: 'C' },
      { link: null, sourceHref: 'https://d.example.com', sourceTitle: 'D' }
    ]);
  });

  it('returns no entries for a payload without an entries list', () => {
    expect(extractFeedEntries({})).toEqual([]);
    expect(extractFeedEntries({ entries: 'nope' })).toEqual([]);
    expect(extractFeedEntries(null)).toEqual([]);
  });
});

describe('saveTopicHeadlinesToJson', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'headlines-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the payload as indented UTF-8 JSON named after the topic', async () => {
    const headlines: TopicHeadlines = {
      feed: { title: 'الهلال', link: null, updated: null },
      entries: [{ id: '1', title: 'خبر', link: 'https://news.google.com/rss/articles/1', published: null, source: null }]
    };

    const filePath = await saveTopicHeadlinesToJson(headlines, 'alhilal', dir);

    expect(filePath).toBe(path.join(dir, 'alhilal.json'));
    const written = await readFile(filePath, 'utf-8');
    expect(written).toBe(JSON.stringify(headlines, null, 4));
    expect(written).toContain('الهلال');
  });
});

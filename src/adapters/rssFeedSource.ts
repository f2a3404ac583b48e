import Parser from 'rss-parser';
import type { FeedEntry, FeedFetchResult, FeedSource } from '../types/adapter';
import { errorMessage } from '../llm/gateway';

const USER_AGENT = 'feed-synthesizer/1.0';

type RssFeed = {
  title?: string;
  link?: string;
};

type RssItem = {
  id?: string;
  updated?: string;
  contentEncoded?: string;
  author?: unknown;
};

export type ParsedFeed = Parser.Output<RssItem> & RssFeed;
export type ParsedItem = Parser.Item & RssItem;

function createParser(timeoutSeconds: number): Parser<RssFeed, RssItem> {
  return new Parser<RssFeed, RssItem>({
    timeout: timeoutSeconds * 1000,
    headers: { 'User-Agent': USER_AGENT },
    customFields: {
      item: [
        ['content:encoded', 'contentEncoded'],
        ['author', 'author'],
        ['updated', 'updated']
      ]
    }
  });
}

// Atom authors arrive as { name: [...] }, RSS authors as plain strings
function authorOf(item: ParsedItem): string | undefined {
  if (item.creator) return item.creator;
  if (typeof item.author === 'string') return item.author;
  if (item.author && typeof item.author === 'object' && 'name' in item.author) {
    const name = item.author.name;
    if (typeof name === 'string') return name;
    if (Array.isArray(name) && typeof name[0] === 'string') return name[0];
  }
  return undefined;
}

export function toFeedEntry(item: ParsedItem): FeedEntry {
  const categories: unknown[] = item.categories ?? [];
  return {
    id: item.guid || item.id,
    title: item.title,
    link: item.link,
    published: item.pubDate || item.isoDate,
    updated: item.updated,
    summary: item.summary || item.content || item.contentSnippet,
    content: item.contentEncoded || item.content,
    author: authorOf(item),
    tags: categories.filter((category): category is string => typeof category === 'string')
  };
}

export function toFetchResult(feed: ParsedFeed, fetchedAt: Date): FeedFetchResult {
  return {
    success: true,
    feedTitle: feed.title ?? '',
    feedLink: feed.link ?? '',
    entries: feed.items.map(toFeedEntry),
    fetchedAt: fetchedAt.toISOString()
  };
}

export function describeFetchError(error: unknown, timeoutSeconds: number): string {
  const message = errorMessage(error);
  if (/timed out/i.test(message)) {
    return `Timeout fetching feed (>${timeoutSeconds}s)`;
  }
  return `Request failed: ${message}`;
}

/**
 * FeedSource backed by rss-parser (RSS 0.9x/1.0/2.0 and Atom)
 */
export class RssFeedSource implements FeedSource {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async fetch(url: string, timeoutSeconds: number): Promise<FeedFetchResult> {
    try {
      const feed = await createParser(timeoutSeconds).parseURL(url);
      return toFetchResult(feed, this.now());
    } catch (error) {
      return { success: false, error: describeFetchError(error, timeoutSeconds) };
    }
  }

  async parse(xml: string): Promise<FeedFetchResult> {
    try {
      const feed = await createParser(30).parseString(xml);
      return toFetchResult(feed, this.now());
    } catch (error) {
      return { success: false, error: `Failed to parse feed: ${errorMessage(error)}` };
    }
  }
}

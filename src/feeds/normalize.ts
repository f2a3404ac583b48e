import type { FeedConfig, FeedEntry } from '../types/adapter';
import type { Article } from '../types/analysis';
import { parseFeedDate, toTimestamp } from '../utils/dates';
import { shortHash } from '../utils/hash';
import { cleanHtml } from '../utils/html';

/**
 * Identity of an article: hash of its link, else of the feed-provided id.
 */
export function articleId(entry: FeedEntry, feed: FeedConfig): string {
  const key = entry.link || entry.id || `${feed.url}#${entry.title ?? ''}`;
  return shortHash(key, 12);
}

export function normalizeEntry(entry: FeedEntry, feed: FeedConfig): Article {
  const summary = cleanHtml(entry.summary);
  // Full content when the feed carries it, otherwise the summary stands in
  const content = entry.content ? cleanHtml(entry.content) : summary;

  return {
    id: articleId(entry, feed),
    title: cleanHtml(entry.title) || 'Untitled',
    link: entry.link ?? '',
    publishedAt: parseFeedDate(entry.published || entry.updated),
    summary,
    content,
    author: entry.author?.trim() || 'Unknown',
    tags: entry.tags.filter((tag) => tag.length > 0),
    feedName: feed.name,
    feedId: feed.id,
    feedTags: [...feed.tags]
  };
}

/**
 * Keep an article unless its date parses and falls before the cutoff.
 */
export function isWithinWindow(article: Article, since: Date): boolean {
  const published = toTimestamp(article.publishedAt);
  return published === null || published >= since.getTime();
}

/**
 * Newest first; articles without a parseable date sink to the end in their
 * original relative order.
 */
export function sortNewestFirst(articles: readonly Article[]): Article[] {
  const sortKey = (article: Article) => toTimestamp(article.publishedAt) ?? Number.NEGATIVE_INFINITY;
  return [...articles].sort((a, b) => {
    const left = sortKey(a);
    const right = sortKey(b);
    if (left === right) return 0;
    return left < right ? 1 : -1;
  });
}

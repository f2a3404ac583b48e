/**
 * FeedAggregator - fetches every configured source, one at a time
 *
 * A failing source is recorded and skipped; the others still contribute.
 */

import type { FeedConfig, FeedSource } from '../types/adapter';
import type { AggregationResult, Article, FeedError } from '../types/analysis';
import { logger as rootLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { isWithinWindow, normalizeEntry, sortNewestFirst } from './normalize';

export interface FetchAllOptions {
  since?: Date | null;
  tags?: string[] | null;
}

export interface FeedAggregatorOptions {
  source: FeedSource;
  feeds: FeedConfig[];
  timeoutSeconds?: number;
  logger?: Logger;
}

export function selectFeedsByTags(feeds: readonly FeedConfig[], tags?: string[] | null): FeedConfig[] {
  if (!tags || tags.length === 0) return [...feeds];
  return feeds.filter((feed) => feed.tags.some((tag) => tags.includes(tag)));
}

export class FeedAggregator {
  private readonly log: Logger;

  constructor(private readonly options: FeedAggregatorOptions) {
    this.log = (options.logger ?? rootLogger).child('aggregator');
  }

  async fetchAll({ since, tags }: FetchAllOptions = {}): Promise<AggregationResult> {
    const feeds = selectFeedsByTags(this.options.feeds, tags);
    const timeoutSeconds = this.options.timeoutSeconds ?? 30;

    const articles: Article[] = [];
    const errors: FeedError[] = [];
    let feedsSucceeded = 0;

    for (const feed of feeds) {
      this.log.info(`Fetching feed: ${feed.name} (${feed.url})`);
      const result = await this.options.source.fetch(feed.url, timeoutSeconds);

      if (!result.success) {
        this.log.warn(`Feed error: ${feed.name} - ${result.error}`);
        errors.push({ feed: feed.name || feed.url, error: result.error });
        continue;
      }

      feedsSucceeded++;
      for (const entry of result.entries) {
        const article = normalizeEntry(entry, feed);
        if (since && !isWithinWindow(article, since)) continue;
        articles.push(article);
      }
    }

    const sorted = sortNewestFirst(articles);
    this.log.info(`Fetched ${sorted.length} articles from ${feedsSucceeded}/${feeds.length} feeds`);

    return {
      articles: sorted,
      errors,
      stats: {
        feedsTotal: feeds.length,
        feedsSucceeded,
        articlesTotal: sorted.length
      }
    };
  }
}

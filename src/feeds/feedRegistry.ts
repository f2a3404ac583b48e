/**
 * feeds.json - the list of configured sources
 */

import { z } from 'zod';
import type { FeedConfig } from '../types/adapter';
import { isMissing, readJsonFile, writeJsonFile } from '../utils/files';
import { shortHash } from '../utils/hash';
import { logger } from '../utils/logger';

const feedSchema = z.object({
  id: z.string(),
  url: z.string().url(),
  name: z.string(),
  tags: z.array(z.string()).default([]),
  added: z.string()
});

const feedsFileSchema = z.object({
  feeds: z.array(feedSchema).default([])
});

export type RegistryResult = { success: true; message: string; feed: FeedConfig } | { success: false; message: string };

/**
 * "https://www.example.com/rss" -> "example"
 */
export function nameFromUrl(url: string): string {
  const host = new URL(url).hostname;
  return host.replace(/^www\./, '').replace(/\.(com|org)$/, '');
}

function matches(feed: FeedConfig, identifier: string): boolean {
  return feed.id === identifier || feed.name.toLowerCase() === identifier.toLowerCase() || feed.url === identifier;
}

export class FeedRegistry {
  private readonly log = logger.child('feeds');

  constructor(
    private readonly feedsFile: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async list(): Promise<FeedConfig[]> {
    try {
      return feedsFileSchema.parse(await readJsonFile(this.feedsFile)).feeds;
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  async find(identifier: string): Promise<FeedConfig | undefined> {
    return (await this.list()).find((feed) => matches(feed, identifier));
  }

  async add(url: string, name?: string, tags: string[] = []): Promise<RegistryResult> {
    const parsedUrl = z.string().url().safeParse(url);
    if (!parsedUrl.success) {
      return { success: false, message: `Not a valid URL: ${url}` };
    }

    const feeds = await this.list();
    if (feeds.some((feed) => feed.url === url)) {
      return { success: false, message: `Feed already exists: ${url}` };
    }

    const feed: FeedConfig = {
      id: shortHash(url, 8),
      url,
      name: name?.trim() || nameFromUrl(url),
      tags: [...new Set(tags)],
      added: this.now().toISOString()
    };

    await writeJsonFile(this.feedsFile, { feeds: [...feeds, feed] });
    this.log.info(`Added feed: ${feed.name} (${url})`);
    return { success: true, message: `Added feed: ${feed.name} (ID: ${feed.id})`, feed };
  }

  async remove(identifier: string): Promise<RegistryResult> {
    const feeds = await this.list();
    const removed = feeds.find((feed) => matches(feed, identifier));
    if (!removed) {
      return { success: false, message: `Feed not found: ${identifier}` };
    }

    await writeJsonFile(this.feedsFile, { feeds: feeds.filter((feed) => feed !== removed) });
    this.log.info(`Removed feed: ${identifier}`);
    return { success: true, message: `Removed feed: ${removed.name}`, feed: removed };
  }
}

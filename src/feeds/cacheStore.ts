/**
 * File-based snapshot cache for fetched articles.
 * One JSON file per filter fingerprint; a save replaces the whole file.
 * Staleness is the caller's decision: age() only reports it.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Article, CacheSnapshot } from '../types/analysis';
import { isMissing, readJsonFile, writeJsonFile } from '../utils/files';
import { shortHash } from '../utils/hash';
import { logger } from '../utils/logger';

export const UNFILTERED_SENTINEL = 'all';

const articleSchema = z.object({
  id: z.string(),
  title: z.string(),
  link: z.string(),
  publishedAt: z.string().nullable(),
  summary: z.string(),
  content: z.string(),
  author: z.string(),
  tags: z.array(z.string()),
  feedName: z.string(),
  feedId: z.string(),
  feedTags: z.array(z.string())
});

const snapshotSchema = z.object({
  capturedAt: z.string().datetime(),
  articleCount: z.number().int().nonnegative(),
  articles: z.array(articleSchema)
});

/**
 * Same tag set, same slot: order and duplicates do not matter.
 */
export function cacheFingerprint(tags?: readonly string[] | null): string {
  const normalized = [...new Set((tags ?? []).map((tag) => tag.trim()).filter(Boolean))].sort();
  const key = normalized.length > 0 ? normalized.join(',') : UNFILTERED_SENTINEL;
  return `feed_analysis_${shortHash(key, 8)}`;
}

export class CacheStore {
  private readonly log = logger.child('cache');

  constructor(
    private readonly cacheDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  fingerprint(tags?: readonly string[] | null): string {
    return cacheFingerprint(tags);
  }

  pathFor(fingerprint: string): string {
    return path.join(this.cacheDir, `${fingerprint}.json`);
  }

  async load(fingerprint: string): Promise<CacheSnapshot | null> {
    const file = this.pathFor(fingerprint);
    try {
      const parsed = snapshotSchema.safeParse(await readJsonFile(file));
      if (!parsed.success) {
        this.log.warn(`Ignoring malformed cache file ${file}`, { issues: parsed.error.issues.length });
        return null;
      }
      return parsed.data;
    } catch (error) {
      if (isMissing(error)) return null;
      this.log.warn(`Could not read cache file ${file}`, { error: String(error) });
      return null;
    }
  }

  /**
   * Milliseconds since the snapshot was captured, or null when there is none.
   */
  async age(fingerprint: string): Promise<number | null> {
    const snapshot = await this.load(fingerprint);
    if (!snapshot) return null;
    return this.now().getTime() - Date.parse(snapshot.capturedAt);
  }

  async save(fingerprint: string, articles: readonly Article[]): Promise<string> {
    const file = this.pathFor(fingerprint);
    const snapshot: CacheSnapshot = {
      capturedAt: this.now().toISOString(),
      articleCount: articles.length,
      articles: [...articles]
    };

    // Readers only ever see a complete snapshot
    const temp = `${file}.${process.pid}.tmp`;
    await writeJsonFile(temp, snapshot);
    await fs.rename(temp, file);

    this.log.info(`Cached ${articles.length} articles to ${file}`);
    return file;
  }
}

/**
 * FeedAnalyzer - end-to-end flow from configured feeds to a rendered report
 *
 * load articles (cache or fetch) -> cluster -> agent pipeline -> synthesis -> report
 */

import { buildAnalysisInput } from '../analysis/analysisInput';
import { TopicClusterer } from '../analysis/topicClusterer';
import { sinceError } from '../config/runOptions';
import type { CacheStore } from '../feeds/cacheStore';
import { FeedAggregator } from '../feeds/feedAggregator';
import type { FeedRegistry } from '../feeds/feedRegistry';
import { isWithinWindow } from '../feeds/normalize';
import type { PresetStore } from '../feeds/presetStore';
import type { RetryPolicy } from '../llm/callWithRetry';
import type { LanguageModelGateway } from '../llm/gateway';
import { buildReport } from '../report/reportBuilder';
import type { FeedSource } from '../types/adapter';
import type { Article, Cluster, FeedError, Persona } from '../types/analysis';
import { parseSince } from '../utils/dates';
import { logger as rootLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { runAnalysis } from './runAnalysis';

export const DEFAULT_QUERY = 'What are the key insights, trends, and implications from this news?';
export const NO_ARTICLES = "No articles found. Add feeds with 'feeds add <url>'";

export interface AnalyzerConfig {
  source: FeedSource;
  registry: Pick<FeedRegistry, 'list'>;
  cache: CacheStore;
  presets: Pick<PresetStore, 'load'>;
  gateway: LanguageModelGateway | null;
  persona: Persona;
  clusterer?: TopicClusterer;
  maxClusters?: number;
  feedTimeoutSeconds?: number;
  cacheMaxAgeHours?: number;
  maxTokens?: number;
  llmTimeoutSeconds?: number;
  agentTemperature?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  now?: () => Date;
  onProgress?: (message: string) => void;
}

export interface LoadOptions {
  since?: Date | null;
  tags?: string[] | null;
  useCache?: boolean;
  maxAgeHours?: number;
}

export interface LoadedArticles {
  articles: Article[];
  errors: FeedError[];
  fromCache: boolean;
}

export interface AnalyzeOptions {
  query?: string;
  since?: string;
  tags?: string[];
  preset?: string;
  useCache?: boolean;
  maxAgeHours?: number;
}

export type AnalyzeResult =
  | {
      success: true;
      report: string;
      clusters: Cluster[];
      articleCount: number;
      clusterCount: number;
      synthesis: string;
    }
  | { success: false; error: string };

export class FeedAnalyzer {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly clusterer: TopicClusterer;

  constructor(private readonly config: AnalyzerConfig) {
    this.log = (config.logger ?? rootLogger).child('analyzer');
    this.now = config.now ?? (() => new Date());
    this.clusterer = config.clusterer ?? new TopicClusterer();
  }

  /**
   * Cached snapshot when it is younger than maxAgeHours, otherwise a fresh
   * fetch that replaces it. Snapshots hold the unfiltered fetch for their tag
   * slot; `since` is applied on the way out, whichever path supplied them.
   */
  async loadArticles({ since, tags, useCache = true, maxAgeHours }: LoadOptions = {}): Promise<LoadedArticles> {
    const maxAgeMs = (maxAgeHours ?? this.config.cacheMaxAgeHours ?? 1) * 3_600_000;
    const fingerprint = this.config.cache.fingerprint(tags);
    const inWindow = (articles: Article[]) => (since ? articles.filter((article) => isWithinWindow(article, since)) : articles);

    if (useCache) {
      const age = await this.config.cache.age(fingerprint);
      if (age !== null && age < maxAgeMs) {
        const snapshot = await this.config.cache.load(fingerprint);
        if (snapshot) {
          this.log.info(`Using cached articles (age: ${Math.round(age / 60_000)}m)`);
          return { articles: inWindow(snapshot.articles), errors: [], fromCache: true };
        }
      }
    }

    const aggregator = new FeedAggregator({
      source: this.config.source,
      feeds: await this.config.registry.list(),
      timeoutSeconds: this.config.feedTimeoutSeconds,
      logger: this.config.logger
    });
    const result = await aggregator.fetchAll({ tags });

    if (useCache) {
      await this.config.cache.save(fingerprint, result.articles);
    }

    return { articles: inWindow(result.articles), errors: result.errors, fromCache: false };
  }

  async analyze(options: AnalyzeOptions = {}): Promise<AnalyzeResult> {
    let query = options.query?.trim() ?? '';
    let tags = options.tags;

    if (options.preset) {
      const preset = await this.config.presets.load(options.preset);
      if (!preset) {
        return { success: false, error: `Preset not found: ${options.preset}` };
      }
      if (!query && preset.query) query = preset.query;
      if (preset.tags.length > 0) tags = preset.tags;
    }

    if (!query) query = DEFAULT_QUERY;

    let since: Date | null = null;
    if (options.since) {
      since = parseSince(options.since, this.now());
      if (!since) {
        return { success: false, error: sinceError(options.since) };
      }
    }

    this.log.info(`Starting feed analysis with query: ${query}`);
    this.config.onProgress?.('Loading articles...');

    const { articles, errors } = await this.loadArticles({
      since,
      tags,
      useCache: options.useCache,
      maxAgeHours: options.maxAgeHours
    });
    errors.forEach((error) => this.log.warn(`Feed error: ${error.feed} - ${error.error}`));

    if (articles.length === 0) {
      return { success: false, error: NO_ARTICLES };
    }

    const clusters = this.clusterer.cluster(articles, this.config.maxClusters);
    this.log.info(`Created ${clusters.length} topic clusters from ${articles.length} articles`);

    const run = await runAnalysis(
      { query, context: buildAnalysisInput(query, clusters, this.now()) },
      {
        gateway: this.config.gateway,
        persona: this.config.persona,
        maxTokens: this.config.maxTokens,
        timeoutSeconds: this.config.llmTimeoutSeconds,
        agentTemperature: this.config.agentTemperature,
        retryPolicy: this.config.retryPolicy,
        logger: this.config.logger,
        now: this.now,
        onProgress: this.config.onProgress
      }
    );

    if (!run.success) {
      return { success: false, error: run.error };
    }

    const report = buildReport({
      query,
      clusters,
      synthesis: run.synthesis,
      auditTrail: run.auditTrail,
      articles,
      generatedAt: this.now(),
      details: run.details
    });

    return {
      success: true,
      report,
      clusters,
      articleCount: articles.length,
      clusterCount: clusters.length,
      synthesis: run.synthesis
    };
  }
}

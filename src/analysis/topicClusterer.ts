/**
 * TopicClusterer - groups articles by keyword overlap, no external model
 *
 * Single greedy pass in input order. Each unassigned article seeds a cluster;
 * every later unassigned article sharing enough keywords with the cluster's
 * accumulated keyword set joins it and widens that set for the candidates
 * after it. The result is a partition, and it depends on input order.
 */

import stopwordList from '../../data/stopwords.json';
import type { Article, Cluster } from '../types/analysis';

export const DEFAULT_TOPIC = 'General News';

export interface ClustererOptions {
  keywordLimit: number;
  minSharedKeywords: number;
  labelKeywordCount: number;
  minTokenLength: number;
  clusterKeywordCap: number;
  stopWords: ReadonlySet<string>;
}

export const DEFAULT_CLUSTERER_OPTIONS: ClustererOptions = {
  keywordLimit: 10,
  minSharedKeywords: 2,
  labelKeywordCount: 3,
  minTokenLength: 3,
  clusterKeywordCap: 10,
  stopWords: new Set(stopwordList)
};

function titleCase(text: string): string {
  return text.replace(/[a-z]+/gi, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export class TopicClusterer {
  private readonly options: ClustererOptions;
  private readonly tokenPattern: RegExp;

  constructor(options: Partial<ClustererOptions> = {}) {
    this.options = { ...DEFAULT_CLUSTERER_OPTIONS, ...options };
    // Unicode-aware word edges: "café" is one token, never "caf"
    this.tokenPattern = new RegExp(
      `(?<![\\p{L}\\p{N}_])[a-z]{${this.options.minTokenLength},}(?![\\p{L}\\p{N}_])`,
      'gu'
    );
  }

  /**
   * Most frequent non-stop-word tokens, ties broken by first occurrence.
   */
  extractKeywords(text: string, limit: number = this.options.keywordLimit): string[] {
    const counts = new Map<string, number>();
    for (const token of text.toLowerCase().match(this.tokenPattern) ?? []) {
      if (this.options.stopWords.has(token)) continue;
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit)
      .map(([word]) => word);
  }

  /**
   * The greedy pass on its own: every article lands in exactly one cluster,
   * clusters in creation order, nothing dropped.
   */
  partition(articles: readonly Article[]): Cluster[] {
    const keywordSets = articles.map(
      (article) => new Set(this.extractKeywords(`${article.title} ${article.summary} ${article.content}`))
    );
    const used = new Set<number>();
    const clusters: Cluster[] = [];

    articles.forEach((seed, i) => {
      if (used.has(i)) return;
      used.add(i);

      const members = [seed];
      const keywords = new Set(keywordSets[i]);

      for (let j = i + 1; j < articles.length; j++) {
        if (used.has(j)) continue;
        const shared = [...keywordSets[j]].filter((word) => keywords.has(word)).length;
        if (shared < this.options.minSharedKeywords) continue;

        members.push(articles[j]);
        keywordSets[j].forEach((word) => keywords.add(word));
        used.add(j);
      }

      clusters.push({
        topic: this.label(members),
        keywords: [...keywords].slice(0, this.options.clusterKeywordCap),
        articles: members,
        articleCount: members.length
      });
    });

    return clusters;
  }

  /**
   * Largest clusters first; those past maxClusters are dropped, not merged.
   */
  cluster(articles: readonly Article[], maxClusters = 10): Cluster[] {
    if (articles.length === 0) return [];
    return this.partition(articles)
      .sort((a, b) => b.articleCount - a.articleCount)
      .slice(0, maxClusters);
  }

  label(members: readonly Article[]): string {
    const text = members.map((article) => `${article.title} ${article.summary}`).join(' ');
    const top = this.extractKeywords(text, this.options.labelKeywordCount);
    return top.length > 0 ? titleCase(top.join(' / ')) : DEFAULT_TOPIC;
  }
}

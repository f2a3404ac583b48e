export interface Article {
  id: string;                    // md5 of link (or entry id), 12 hex chars
  title: string;
  link: string;
  publishedAt: string | null;    // Normalized ISO timestamp, or the raw string when unparseable
  summary: string;
  content: string;
  author: string;
  tags: string[];                // Entry categories
  feedName: string;
  feedId: string;
  feedTags: string[];
}

export interface Cluster {
  topic: string;
  keywords: string[];
  articles: Article[];
  articleCount: number;
}

export interface CacheSnapshot {
  capturedAt: string;
  articleCount: number;
  articles: Article[];
}

export interface AgentSpec {
  role: string;
  perspective: string;
  prompt: string;
}

export interface Persona {
  name: string;
  agents: AgentSpec[];
}

export type AgentResult =
  | { role: string; success: true; output: string }
  | { role: string; success: false; error: string };

export interface AgentInsight {
  role: string;
  output: string;
}

/**
 * What a finished run reports about itself alongside the synthesis.
 */
export interface RunDetails {
  persona: string;
  agentCount: number;            // Agents that produced output
  provider: string;
  model: string;
  elapsedMs: number;
  perspectives: AgentInsight[];  // Successful outputs in execution order
}

export interface AnalysisQuery {
  query: string;
  context?: string;
}

export interface FeedError {
  feed: string;
  error: string;
}

export interface AggregationStats {
  feedsTotal: number;
  feedsSucceeded: number;
  articlesTotal: number;
}

export interface AggregationResult {
  articles: Article[];
  errors: FeedError[];
  stats: AggregationStats;
}

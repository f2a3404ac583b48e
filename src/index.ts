export { RssFeedSource, toFeedEntry } from './adapters/rssFeedSource';
export { askQuestion } from './agents/askQuestion';
export type { QuestionResult } from './agents/askQuestion';
export { AgentPipeline, ALL_AGENTS_FAILED } from './agents/agentPipeline';
export type { PipelineOutcome, PipelineState } from './agents/agentPipeline';
export { AuditTrail } from './agents/auditTrail';
export type { AuditEvent, AuditEventType } from './agents/auditTrail';
export { FeedAnalyzer, DEFAULT_QUERY } from './agents/feedAnalyzer';
export type { AnalyzeOptions, AnalyzeResult, AnalyzerConfig } from './agents/feedAnalyzer';
export { DEFAULT_PERSONA, PersonaStore } from './agents/personaStore';
export { runAnalysis, runSingleAgent } from './agents/runAnalysis';
export type { AnalysisRunResult } from './agents/runAnalysis';
export { Synthesizer } from './agents/synthesizer';
export { buildAnalysisInput, summarizeCluster } from './analysis/analysisInput';
export { TopicClusterer } from './analysis/topicClusterer';
export { loadEnvironmentConfig } from './config/environment';
export type { EnvironmentConfig, LlmConfig } from './config/environment';
export { CacheStore, cacheFingerprint } from './feeds/cacheStore';
export { FeedAggregator } from './feeds/feedAggregator';
export { FeedRegistry } from './feeds/feedRegistry';
export { PresetStore } from './feeds/presetStore';
export { callWithRetry, DEFAULT_RETRY_POLICY } from './llm/callWithRetry';
export type { RetryPolicy } from './llm/callWithRetry';
export { createGateway } from './llm/createGateway';
export type { ChatMessage, CompletionResult, LanguageModelGateway } from './llm/gateway';
export { buildQuestionReport, buildReport } from './report/reportBuilder';
export { writeReport } from './report/reportWriter';
export type { FeedConfig, FeedEntry, FeedFetchResult, FeedSource } from './types/adapter';
export type {
  AgentInsight,
  AgentResult,
  AgentSpec,
  AggregationResult,
  AnalysisQuery,
  Article,
  CacheSnapshot,
  Cluster,
  FeedError,
  Persona,
  RunDetails
} from './types/analysis';
export { parseSince } from './utils/dates';
export { logger } from './utils/logger';

/**
 * ReportBuilder - renders the final markdown document
 *
 * Pure: same inputs, same output. The generated timestamp is an input.
 */

import type { Article, Cluster, RunDetails } from '../types/analysis';

export const LINKED_TITLES_PER_CLUSTER = 3;

export interface ReportInput {
  query: string;
  clusters: readonly Cluster[];
  synthesis: string;
  auditTrail: string;
  articles: readonly Article[];
  generatedAt: Date;
  details?: RunDetails;
}

export interface QuestionReportInput {
  query: string;
  synthesis: string;
  auditTrail: string;
  details: RunDetails;
  generatedAt: Date;
}

export function distinctSources(articles: readonly Article[]): string[] {
  return [...new Set(articles.map((article) => article.feedName || 'Unknown'))].sort();
}

function renderCluster(cluster: Cluster, position: number): string[] {
  const lines = [`\n### ${position}. ${cluster.topic}`, `*${cluster.articleCount} articles*\n`];

  for (const article of cluster.articles.slice(0, LINKED_TITLES_PER_CLUSTER)) {
    lines.push(`- [${article.title || 'Untitled'}](${article.link || '#'})`);
  }

  if (cluster.articleCount > LINKED_TITLES_PER_CLUSTER) {
    lines.push(`- *...and ${cluster.articleCount - LINKED_TITLES_PER_CLUSTER} more*`);
  }

  return lines;
}

function renderDetails(details: RunDetails): string[] {
  return [
    `- **Persona:** ${details.persona}`,
    `- **Agents:** ${details.agentCount}`,
    `- **LLM:** ${details.provider} (${details.model})`,
    `- **Processing Time:** ${(details.elapsedMs / 1000).toFixed(1)}s`
  ];
}

// Every successful agent output, raw, in execution order
function renderPerspectives(details: RunDetails): string[] {
  const body = details.perspectives.map((insight) => `### ${insight.role}\n${insight.output}\n`).join('\n');
  return ['## Individual Agent Perspectives\n', body || '_No agent produced output._', '\n---\n'];
}

function renderAuditTrail(auditTrail: string): string[] {
  return ['## Audit Trail\n', `\`\`\`\n${auditTrail}\n\`\`\`\n`];
}

export function buildReport({ query, clusters, synthesis, auditTrail, articles, generatedAt, details }: ReportInput): string {
  const parts = [
    '# Feed Analysis Report\n',
    `- **Generated:** ${generatedAt.toISOString()}`,
    `- **Query:** ${query}`,
    `- **Articles Analyzed:** ${articles.length}`,
    `- **Topic Clusters:** ${clusters.length}`,
    ...(details ? renderDetails(details) : []),
    '\n---\n',
    '## Executive Summary\n',
    synthesis,
    '\n---\n',
    ...(details ? renderPerspectives(details) : []),
    '## Topics Covered\n'
  ];

  clusters.forEach((cluster, index) => parts.push(...renderCluster(cluster, index + 1)));

  parts.push('\n---\n');
  parts.push('## Sources\n');
  parts.push(...distinctSources(articles).map((source) => `- ${source}`));

  parts.push('\n---\n');
  parts.push(...renderAuditTrail(auditTrail));

  return parts.join('\n');
}

/**
 * Report for a question asked without feeds: no clusters, no sources.
 */
export function buildQuestionReport({ query, synthesis, auditTrail, details, generatedAt }: QuestionReportInput): string {
  return [
    '# Analysis Report\n',
    `- **Generated:** ${generatedAt.toISOString()}`,
    `- **Query:** ${query}`,
    ...renderDetails(details),
    '\n---\n',
    '## Synthesis\n',
    synthesis,
    '\n---\n',
    ...renderPerspectives(details),
    ...renderAuditTrail(auditTrail)
  ].join('\n');
}

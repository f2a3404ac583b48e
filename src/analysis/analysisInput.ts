/**
 * Turns clusters into the grouped text the agent pipeline reads as context.
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import type { Cluster } from '../types/analysis';

dayjs.extend(utc);

export const ARTICLES_PER_CLUSTER = 5;
export const EXCERPT_LENGTH = 500;

export function summarizeCluster(cluster: Cluster): string {
  const { articles, topic } = cluster;
  const parts = [`## Topic: ${topic}\n`, `*${articles.length} articles in this cluster*\n`];

  articles.slice(0, ARTICLES_PER_CLUSTER).forEach((article, index) => {
    parts.push(`\n### Article ${index + 1}: ${article.title}`);
    parts.push(`*Source: ${article.feedName || 'Unknown'}*`);
    if (article.publishedAt) {
      parts.push(`*Published: ${article.publishedAt.slice(0, 10)}*`);
    }

    let excerpt = article.summary || article.content;
    if (excerpt.length > EXCERPT_LENGTH) {
      excerpt = `${excerpt.slice(0, EXCERPT_LENGTH)}...`;
    }
    parts.push(`\n${excerpt}\n`);
  });

  if (articles.length > ARTICLES_PER_CLUSTER) {
    parts.push(`\n*...and ${articles.length - ARTICLES_PER_CLUSTER} more articles on this topic*`);
  }

  return parts.join('\n');
}

export function buildAnalysisInput(query: string, clusters: readonly Cluster[], now: Date = new Date()): string {
  const parts = [
    '# Feed Analysis Request\n',
    `**Query:** ${query}\n`,
    `**Date:** ${dayjs.utc(now).format('YYYY-MM-DD HH:mm')} UTC\n`,
    `**Topics:** ${clusters.length} clusters identified\n`,
    '\n---\n',
    '# News Summary by Topic\n'
  ];

  for (const cluster of clusters) {
    parts.push(summarizeCluster(cluster));
    parts.push('\n---\n');
  }

  parts.push('\n# Analysis Request\n');
  parts.push(`Based on the above news summary, please analyze: **${query}**\n`);

  return parts.join('\n');
}

import { makeArticle } from '../../__tests__/fakes';
import type { Cluster } from '../../types/analysis';
import { buildAnalysisInput, summarizeCluster } from '../analysisInput';

const clusterOf = (topic: string, articles = [makeArticle()]): Cluster => ({
  topic,
  keywords: [],
  articles,
  articleCount: articles.length
});

describe('summarizeCluster', () => {
  it('should list each article with its source, date and excerpt', () => {
    const cluster = clusterOf('Solar / Wind', [
      makeArticle({
        title: 'Solar record',
        feedName: 'Alpha',
        publishedAt: '2024-03-05T00:00:00.000Z',
        summary: 'Panels everywhere.'
      })
    ]);

    expect(summarizeCluster(cluster)).toBe(
      '## Topic: Solar / Wind\n\n' +
        '*1 articles in this cluster*\n\n\n' +
        '### Article 1: Solar record\n' +
        '*Source: Alpha*\n' +
        '*Published: 2024-03-05*\n\n' +
        'Panels everywhere.\n'
    );
  });

  it('should use the content when there is no summary and skip missing dates', () => {
    const cluster = clusterOf('Grid', [makeArticle({ title: 'Grid upgrade', content: 'Body text only.' })]);

    const summary = summarizeCluster(cluster);

    expect(summary).toContain('\nBody text only.\n');
    expect(summary).not.toContain('*Published:');
  });

  it('should cap excerpts and the number of listed articles', () => {
    const articles = Array.from({ length: 7 }, (_, i) =>
      makeArticle({ id: `a${i}`, title: `Story ${i + 1}`, summary: 'x'.repeat(600) })
    );

    const summary = summarizeCluster(clusterOf('Busy', articles));

    expect(summary.match(/### Article \d+:/g)).toHaveLength(5);
    expect(summary).toContain(`\n${'x'.repeat(500)}...\n`);
    expect(summary).not.toContain('Story 6');
    expect(summary.endsWith('\n*...and 2 more articles on this topic*')).toBe(true);
  });
});

describe('buildAnalysisInput', () => {
  it('should frame the grouped summary with the query and date', () => {
    const input = buildAnalysisInput('What moved energy prices?', [clusterOf('Grid')], new Date('2024-03-10T12:34:56.000Z'));

    expect(
      input.startsWith(
        '# Feed Analysis Request\n\n' +
          '**Query:** What moved energy prices?\n\n' +
          '**Date:** 2024-03-10 12:34 UTC\n\n' +
          '**Topics:** 1 clusters identified\n\n' +
          '\n---\n\n' +
          '# News Summary by Topic\n\n' +
          '## Topic: Grid\n'
      )
    ).toBe(true);
    expect(
      input.endsWith('\n# Analysis Request\n\nBased on the above news summary, please analyze: **What moved energy prices?**\n')
    ).toBe(true);
  });
});

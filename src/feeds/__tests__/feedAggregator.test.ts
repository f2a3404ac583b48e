import { FakeFeedSource, feedResult, makeArticle, makeFeed } from '../../__tests__/fakes';
import { shortHash } from '../../utils/hash';
import { FeedAggregator, selectFeedsByTags } from '../feedAggregator';
import { articleId, isWithinWindow, normalizeEntry, sortNewestFirst } from '../normalize';

const alpha = makeFeed({ id: 'alpha001', url: 'https://alpha.test/rss', name: 'Alpha', tags: ['tech'] });
const beta = makeFeed({ id: 'beta0001', url: 'https://beta.test/rss', name: 'Beta', tags: ['energy'] });
const gamma = makeFeed({ id: 'gamma001', url: 'https://gamma.test/rss', name: 'Gamma', tags: ['tech', 'ai'] });

describe('normalizeEntry', () => {
  it('should clean markup and fill defaults', () => {
    const article = normalizeEntry(
      {
        title: '<b>Big</b> news',
        link: 'https://news.test/big',
        summary: '<p>Short &amp; sweet</p>',
        published: 'Mon, 15 Jan 2024 10:30:00 GMT',
        tags: ['launch', '']
      },
      alpha
    );

    expect(article).toEqual({
      id: shortHash('https://news.test/big', 12),
      title: 'Big news',
      link: 'https://news.test/big',
      publishedAt: '2024-01-15T10:30:00.000Z',
      summary: 'Short & sweet',
      content: 'Short & sweet',
      author: 'Unknown',
      tags: ['launch'],
      feedName: 'Alpha',
      feedId: 'alpha001',
      feedTags: ['tech']
    });
  });

  it('should fall back to the updated date and the Untitled title', () => {
    const article = normalizeEntry({ updated: '2024-01-15', tags: [] }, alpha);

    expect(article.title).toBe('Untitled');
    expect(article.publishedAt).toBe('2024-01-15T00:00:00.000Z');
  });
});

describe('articleId', () => {
  it('should prefer the link, then the entry id', () => {
    expect(articleId({ link: 'https://news.test/a', id: 'guid-1', tags: [] }, alpha)).toBe(
      shortHash('https://news.test/a', 12)
    );
    expect(articleId({ id: 'guid-1', tags: [] }, alpha)).toBe(shortHash('guid-1', 12));
    expect(articleId({ title: 'Headline', tags: [] }, alpha)).toBe(shortHash('https://alpha.test/rss#Headline', 12));
  });
});

describe('isWithinWindow', () => {
  const since = new Date('2024-03-01T00:00:00.000Z');

  it('should only drop articles whose date parses and precedes the cutoff', () => {
    expect(isWithinWindow(makeArticle({ publishedAt: '2024-02-01T00:00:00.000Z' }), since)).toBe(false);
    expect(isWithinWindow(makeArticle({ publishedAt: '2024-03-01T00:00:00.000Z' }), since)).toBe(true);
    expect(isWithinWindow(makeArticle({ publishedAt: 'not-a-date' }), since)).toBe(true);
    expect(isWithinWindow(makeArticle({ publishedAt: null }), since)).toBe(true);
  });
});

describe('sortNewestFirst', () => {
  it('should sort dated articles descending and keep undated ones last in order', () => {
    const sorted = sortNewestFirst([
      makeArticle({ id: 'undated', publishedAt: null }),
      makeArticle({ id: 'older', publishedAt: '2024-01-01T00:00:00.000Z' }),
      makeArticle({ id: 'garbled', publishedAt: 'not-a-date' }),
      makeArticle({ id: 'newer', publishedAt: '2024-02-01T00:00:00.000Z' })
    ]);

    expect(sorted.map((article) => article.id)).toEqual(['newer', 'older', 'undated', 'garbled']);
  });
});

describe('selectFeedsByTags', () => {
  it('should keep every feed when no tags are given', () => {
    expect(selectFeedsByTags([alpha, beta], [])).toEqual([alpha, beta]);
    expect(selectFeedsByTags([alpha, beta], null)).toEqual([alpha, beta]);
  });

  it('should keep feeds whose tags intersect the filter', () => {
    expect(selectFeedsByTags([alpha, beta, gamma], ['ai', 'energy'])).toEqual([beta, gamma]);
  });
});

describe('FeedAggregator', () => {
  const source = () =>
    new FakeFeedSource({
      [alpha.url]: feedResult([
        { title: 'Old alpha story', link: 'https://alpha.test/old', published: '2024-02-01T00:00:00Z', tags: [] },
        { title: 'New alpha story', link: 'https://alpha.test/new', published: '2024-03-05T00:00:00Z', tags: [] },
        { title: 'Undated alpha story', link: 'https://alpha.test/undated', tags: [] }
      ]),
      [beta.url]: { success: false, error: 'Timeout fetching feed (>30s)' },
      [gamma.url]: feedResult([
        { title: 'Garbled gamma story', link: 'https://gamma.test/garbled', published: 'not-a-date', tags: [] },
        { title: 'Fresh gamma story', link: 'https://gamma.test/fresh', published: '2024-03-06T00:00:00Z', tags: [] }
      ])
    });

  it('should record a failing source and keep aggregating the rest', async () => {
    const aggregator = new FeedAggregator({ source: source(), feeds: [alpha, beta, gamma] });

    const result = await aggregator.fetchAll();

    expect(result.errors).toEqual([{ feed: 'Beta', error: 'Timeout fetching feed (>30s)' }]);
    expect(result.stats).toEqual({ feedsTotal: 3, feedsSucceeded: 2, articlesTotal: 5 });
    expect(result.articles.map((article) => article.title)).toEqual([
      'Fresh gamma story',
      'New alpha story',
      'Old alpha story',
      'Undated alpha story',
      'Garbled gamma story'
    ]);
  });

  it('should drop only articles dated before the since cutoff', async () => {
    const aggregator = new FeedAggregator({ source: source(), feeds: [alpha, beta, gamma] });

    const result = await aggregator.fetchAll({ since: new Date('2024-03-01T00:00:00.000Z') });

    expect(result.articles.map((article) => article.title)).toEqual([
      'Fresh gamma story',
      'New alpha story',
      'Undated alpha story',
      'Garbled gamma story'
    ]);
    expect(result.stats.articlesTotal).toBe(4);
  });

  it('should only fetch sources matching the tag filter', async () => {
    const fake = source();
    const aggregator = new FeedAggregator({ source: fake, feeds: [alpha, beta, gamma] });

    const result = await aggregator.fetchAll({ tags: ['ai'] });

    expect(fake.requested).toEqual([gamma.url]);
    expect(result.stats).toEqual({ feedsTotal: 1, feedsSucceeded: 1, articlesTotal: 2 });
  });
});

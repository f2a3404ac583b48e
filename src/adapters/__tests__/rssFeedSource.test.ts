import { describeFetchError, RssFeedSource, toFeedEntry } from '../rssFeedSource';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Test Channel</title>
    <link>https://feeds.test/</link>
    <description>Placeholder channel</description>
    <item>
      <title>First story</title>
      <link>https://feeds.test/first</link>
      <guid>guid-1</guid>
      <pubDate>Mon, 15 Jan 2024 10:30:00 GMT</pubDate>
      <description>&lt;p&gt;Short summary&lt;/p&gt;</description>
      <content:encoded><![CDATA[<p>Full body</p>]]></content:encoded>
      <dc:creator>Jane Writer</dc:creator>
      <category>energy</category>
    </item>
  </channel>
</rss>`;

describe('RssFeedSource', () => {
  const fetchedAt = new Date('2024-03-10T12:00:00.000Z');

  it('should map an RSS document to feed entries', async () => {
    const source = new RssFeedSource(() => fetchedAt);

    const result = await source.parse(RSS);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.feedTitle).toBe('Test Channel');
    expect(result.fetchedAt).toBe('2024-03-10T12:00:00.000Z');
    expect(result.entries).toHaveLength(1);
    expect(result.entries[0]).toMatchObject({
      id: 'guid-1',
      title: 'First story',
      link: 'https://feeds.test/first',
      published: 'Mon, 15 Jan 2024 10:30:00 GMT',
      summary: '<p>Short summary</p>',
      content: '<p>Full body</p>',
      author: 'Jane Writer',
      tags: ['energy']
    });
  });

  it('should report documents that are not feeds', async () => {
    const result = await new RssFeedSource().parse('this is not a feed');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toMatch(/^Failed to parse feed: /);
  });
});

describe('toFeedEntry', () => {
  it('should read Atom style authors and drop non-string categories', () => {
    const entry = toFeedEntry({
      id: 'urn:entry:1',
      title: 'Atom entry',
      isoDate: '2024-01-15T10:30:00.000Z',
      updated: '2024-01-16T08:00:00Z',
      author: { name: ['Ada'] },
      categories: ['solar']
    });

    expect(entry).toEqual({
      id: 'urn:entry:1',
      title: 'Atom entry',
      link: undefined,
      published: '2024-01-15T10:30:00.000Z',
      updated: '2024-01-16T08:00:00Z',
      summary: undefined,
      content: undefined,
      author: 'Ada',
      tags: ['solar']
    });
  });
});

describe('describeFetchError', () => {
  it('should name timeouts with the configured bound', () => {
    expect(describeFetchError(new Error('Request timed out after 30000ms'), 30)).toBe('Timeout fetching feed (>30s)');
  });

  it('should prefix other failures', () => {
    expect(describeFetchError(new Error('Status code 404'), 30)).toBe('Request failed: Status code 404');
  });
});

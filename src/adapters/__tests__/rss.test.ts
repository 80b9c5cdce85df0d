import { mockFetchRoutes } from '../../__tests__/helpers';
import { MarketTimesParser } from '../markettimes';
import { GenericFeedParser, textOf } from '../rss';
import { VietstockParser } from '../vietstock';
import { collect } from './collect';

const FETCH = { timeoutMs: 1000, retries: 0 };

const rss = (items: string) => `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:media="http://search.yahoo.com/mrss/" xmlns:content="http://purl.org/rss/1.0/modules/content/" xmlns:dc="http://purl.org/dc/elements/1.1/">
<channel>
<title>Test feed</title>
<link>https://news.example/</link>
<description>Feed</description>
${items}
</channel>
</rss>`;

describe('textOf', () => {
  it('should read strings, text nodes and arrays', () => {
    expect(textOf('  a ')).toBe('a');
    expect(textOf({ _: 'b', $: { isPermaLink: 'false' } })).toBe('b');
    expect(textOf(['c', 'd'])).toBe('c');
    expect(textOf('   ')).toBeUndefined();
    expect(textOf(42)).toBeUndefined();
  });
});

describe('GenericFeedParser', () => {
  const url = 'https://news.example/rss';

  it('should extract items and report entries it cannot use', async () => {
    mockFetchRoutes({
      [url]: rss(`
<item>
  <title>Fed raises rates</title>
  <link>https://news.example/fed</link>
  <guid isPermaLink="false">fed-001</guid>
  <description><![CDATA[<p>Rates <b>up</b></p><img src="https://img.example/desc.jpg">]]></description>
  <pubDate>Mon, 19 Oct 2026 08:30:00 +0700</pubDate>
  <media:content url="https://img.example/media.jpg" medium="image"/>
</item>
<item>
  <title>Undated item</title>
  <link>https://news.example/undated</link>
  <description>Plain</description>
</item>
<item>
  <description>Neither title nor link</description>
</item>`)
    });

    const before = Date.now();
    const { items, faults } = await collect(new GenericFeedParser(FETCH), url);

    expect(items).toHaveLength(2);
    expect(items[0]).toEqual({
      guid: 'fed-001',
      link: 'https://news.example/fed',
      title: 'Fed raises rates',
      summary: 'Rates up',
      publishedAt: new Date('2026-10-19T01:30:00Z'),
      image: 'https://img.example/media.jpg'
    });
    expect(items[1].guid).toBe('https://news.example/undated');
    expect(items[1].summary).toBe('Plain');
    expect(items[1].image).toBeUndefined();
    expect(items[1].publishedAt.getTime()).toBeGreaterThanOrEqual(before);

    expect(faults).toEqual([
      { source: 'Test', url, stage: 'entry', message: 'entry 3: missing title and link' }
    ]);
  });

  it('should read Atom entries', async () => {
    const atomUrl = 'https://news.example/atom';
    mockFetchRoutes({
      [atomUrl]: `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom</title>
  <entry>
    <id>tag:news.example,2026:1</id>
    <title>Atom headline</title>
    <link href="https://news.example/atom-1"/>
    <updated>2026-10-19T03:00:00Z</updated>
    <summary>Atom summary</summary>
  </entry>
</feed>`
    });

    const { items, faults } = await collect(new GenericFeedParser(FETCH), atomUrl);

    expect(faults).toEqual([]);
    expect(items).toEqual([{
      guid: 'tag:news.example,2026:1',
      link: 'https://news.example/atom-1',
      title: 'Atom headline',
      summary: 'Atom summary',
      publishedAt: new Date('2026-10-19T03:00:00Z'),
      image: undefined
    }]);
  });

  it('should report a failed fetch and yield nothing', async () => {
    mockFetchRoutes({ [url]: 500 });
    const { items, faults } = await collect(new GenericFeedParser(FETCH), url);

    expect(items).toEqual([]);
    expect(faults).toEqual([
      { source: 'Test', url, stage: 'fetch', message: `HTTP 500: Error (${url})` }
    ]);
  });

  it('should report a document that is not a feed', async () => {
    mockFetchRoutes({ [url]: 'this is not xml' });
    const { items, faults } = await collect(new GenericFeedParser(FETCH), url);

    expect(items).toEqual([]);
    expect(faults).toHaveLength(1);
    expect(faults[0].stage).toBe('fetch');
  });
});

describe('VietstockParser', () => {
  const url = 'https://vietstock.example/chung-khoan.rss';

  it('should strip the thumbnail lead and byline and read local dates', async () => {
    mockFetchRoutes({
      [url]: rss(`
<item>
  <title><![CDATA[Cổ phiếu ngân hàng tăng mạnh]]></title>
  <link>https://vietstock.example/2026/10/co-phieu-ngan-hang.htm</link>
  <description><![CDATA[<a href="https://vietstock.example/x.htm"><img src="https://img.vietstock.example/t.jpg"></a><br />(Vietstock) - Nhóm ngân hàng dẫn dắt thị trường]]></description>
  <pubDate>2026-10-19 08:30:00</pubDate>
</item>`)
    });

    const { items, faults } = await collect(new VietstockParser(FETCH), url, 'Vietstock');

    expect(faults).toEqual([]);
    expect(items).toEqual([{
      guid: 'https://vietstock.example/2026/10/co-phieu-ngan-hang.htm',
      link: 'https://vietstock.example/2026/10/co-phieu-ngan-hang.htm',
      title: 'Cổ phiếu ngân hàng tăng mạnh',
      summary: 'Nhóm ngân hàng dẫn dắt thị trường',
      publishedAt: new Date('2026-10-19T01:30:00Z'),
      image: 'https://img.vietstock.example/t.jpg'
    }]);
  });

  it('should truncate long summaries on a word boundary', async () => {
    mockFetchRoutes({
      [url]: rss(`
<item>
  <title>Long</title>
  <link>https://vietstock.example/long.htm</link>
  <description>${'word '.repeat(100)}</description>
</item>`)
    });

    const { items } = await collect(new VietstockParser(FETCH), url);
    expect(items[0].summary).toBe(`${'word '.repeat(59)}word...`);
  });
});

describe('MarketTimesParser', () => {
  const url = 'https://markettimes.example/rss';

  it('should fall back to content:encoded for summary and image', async () => {
    mockFetchRoutes({
      [url]: rss(`
<item>
  <title>Lãi suất giảm</title>
  <link>https://markettimes.example/lai-suat-giam-123.html</link>
  <guid>mt-123</guid>
  <content:encoded><![CDATA[<p>Ngân hàng <em>giảm</em> lãi suất</p><img src="https://img.markettimes.example/c.jpg">]]></content:encoded>
  <pubDate>Mon, 19 Oct 2026 09:00:00 +0700</pubDate>
</item>
<item>
  <title>Tỷ giá ổn định</title>
  <link>https://markettimes.example/ty-gia-456.html</link>
  <description>Tỷ giá trung tâm đi ngang</description>
  <content:encoded><![CDATA[<p>Full body</p><img src="https://img.markettimes.example/body.jpg">]]></content:encoded>
  <media:thumbnail url="https://img.markettimes.example/thumb.jpg"/>
  <pubDate>Mon, 19 Oct 2026 10:00:00 +0700</pubDate>
</item>`)
    });

    const { items, faults } = await collect(new MarketTimesParser(FETCH), url, 'MarketTimes');

    expect(faults).toEqual([]);
    expect(items.map(item => [item.guid, item.summary, item.image])).toEqual([
      ['mt-123', 'Ngân hàng giảm lãi suất', 'https://img.markettimes.example/c.jpg'],
      ['https://markettimes.example/ty-gia-456.html', 'Tỷ giá trung tâm đi ngang', 'https://img.markettimes.example/thumb.jpg']
    ]);
    expect(items[1].publishedAt.toISOString()).toBe('2026-10-19T03:00:00.000Z');
  });
});

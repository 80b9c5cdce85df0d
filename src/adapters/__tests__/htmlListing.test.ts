import { mockFetchRoutes } from '../../__tests__/helpers';
import { CafefParser } from '../cafef';
import { VneconomyParser } from '../vneconomy';
import { collect } from './collect';

const OPTIONS = { fetch: { timeoutMs: 1000, retries: 0 }, articleConcurrency: 2 };

const LISTING_URL = 'https://cafef.vn/thi-truong-chung-khoan.chn';
const BANKS_URL = 'https://cafef.vn/co-phieu-ngan-hang-tang-188261019083012345.chn';
const GOLD_URL = 'https://cafef.vn/vang-giam-188261019091500001.chn';
const BROKEN_URL = 'https://cafef.vn/bai-loi-188261019100000002.chn';

const LISTING = `<html><body>
<div class="menu"><a href="/menu-link-1234567890123.chn">Nav</a></div>
<div class="list-main">
  <a href="/co-phieu-ngan-hang-tang-188261019083012345.chn">Cổ phiếu</a>
  <a href="https://cafef.vn/co-phieu-ngan-hang-tang-188261019083012345.chn#comments">Bình luận</a>
  <a href="/vang-giam-188261019091500001.chn">Vàng</a>
  <a href="/chuyen-muc.chn">Chuyên mục</a>
  <a href="mailto:toasoan@cafef.vn">Liên hệ</a>
  <a href="/bai-loi-188261019100000002.chn">Lỗi</a>
</div>
</body></html>`;

const BANKS_ARTICLE = `<html><head>
<title>Fallback title</title>
<meta property="og:title" content="Cổ phiếu ngân hàng tăng mạnh">
<meta name="description" content="Nhóm ngân hàng dẫn dắt thị trường.">
<meta property="og:image" content="/images/bank.jpg">
</head><body>
<h1 class="title">Cổ phiếu ngân hàng tăng mạnh</h1>
<span class="pdate">19-10-2026 - 08:30 AM</span>
</body></html>`;

const GOLD_ARTICLE = `<html><head><title>Giá vàng | CafeF</title></head><body>
<h1 class="title">Giá vàng giảm</h1>
<h2 class="sapo">Vàng <b>giảm</b> sâu</h2>
<time datetime="2026-10-19T09:15:00+07:00">9:15</time>
</body></html>`;

describe('CafefParser', () => {
  const parser = new CafefParser(OPTIONS);

  it('should discover article links inside the listing container only', () => {
    expect(parser.discoverArticleUrls(LISTING, LISTING_URL)).toEqual([BANKS_URL, GOLD_URL, BROKEN_URL]);
  });

  it('should extract every article and report the one that fails', async () => {
    mockFetchRoutes({
      [LISTING_URL]: LISTING,
      [BANKS_URL]: BANKS_ARTICLE,
      [GOLD_URL]: GOLD_ARTICLE,
      [BROKEN_URL]: 500
    });

    const { items, faults } = await collect(parser, LISTING_URL, 'CafeF');

    expect(items).toEqual([
      {
        link: BANKS_URL,
        title: 'Cổ phiếu ngân hàng tăng mạnh',
        summary: 'Nhóm ngân hàng dẫn dắt thị trường.',
        publishedAt: new Date('2026-10-19T01:30:00Z'),
        image: 'https://cafef.vn/images/bank.jpg'
      },
      {
        link: GOLD_URL,
        title: 'Giá vàng giảm',
        summary: 'Vàng giảm sâu',
        publishedAt: new Date('2026-10-19T02:15:00Z'),
        image: undefined
      }
    ]);
    expect(faults).toEqual([
      { source: 'CafeF', url: BROKEN_URL, stage: 'article', message: `HTTP 500: Error (${BROKEN_URL})` }
    ]);
  });

  it('should report a listing with no article links', async () => {
    mockFetchRoutes({ [LISTING_URL]: '<html><body><div class="list-main"><p>Trống</p></div></body></html>' });

    const { items, faults } = await collect(parser, LISTING_URL, 'CafeF');

    expect(items).toEqual([]);
    expect(faults).toEqual([
      { source: 'CafeF', url: LISTING_URL, stage: 'listing', message: 'no article links found in listing container' }
    ]);
  });

  it('should report a listing that cannot be fetched', async () => {
    const fetchMock = mockFetchRoutes({ [LISTING_URL]: 404 });

    const { faults } = await collect(parser, LISTING_URL, 'CafeF');

    expect(faults).toEqual([
      { source: 'CafeF', url: LISTING_URL, stage: 'listing', message: `HTTP 404: Error (${LISTING_URL})` }
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should fail an article page without any title', () => {
    expect(parser.extractArticle('<html><body><p>no heading</p></body></html>', BANKS_URL))
      .toEqual({ ok: false, reason: 'missing title' });
  });
});

describe('VneconomyParser', () => {
  const parser = new VneconomyParser(OPTIONS);

  it('should accept single-segment .htm article paths', () => {
    const listing = `<div class="layout-content">
      <a href="/gia-vang-hom-nay.htm">Giá vàng</a>
      <a href="/chung-khoan/bai-viet.htm">Nested</a>
      <a href="/Tin-Moi.htm">Uppercase</a>
      <a href="https://vneconomy.vn/ty-gia.htm?utm_source=home">Tỷ giá</a>
    </div>`;

    expect(parser.discoverArticleUrls(listing, 'https://vneconomy.vn/chung-khoan.htm')).toEqual([
      'https://vneconomy.vn/gia-vang-hom-nay.htm',
      'https://vneconomy.vn/ty-gia.htm?utm_source=home'
    ]);
  });

  it('should read the printed date in local time', () => {
    const html = `<html><head><meta property="og:title" content="Tỷ giá ổn định"></head>
      <body><div class="detail__meta">19/10/2026 14:05</div></body></html>`;
    const result = parser.extractArticle(html, 'https://vneconomy.vn/ty-gia.htm');

    expect(result).toEqual({
      ok: true,
      value: {
        link: 'https://vneconomy.vn/ty-gia.htm',
        title: 'Tỷ giá ổn định',
        summary: '',
        publishedAt: new Date('2026-10-19T07:05:00Z'),
        image: undefined
      }
    });
  });
});

import * as cheerio from 'cheerio';
import pLimit from 'p-limit';
import type { Extraction, FeedParser, ParseContext, RawItem } from '../types/adapter';
import { absoluteUrl, cleanHtmlText, stripCdataMarkers, truncateText } from '../utils/html';
import { DEFAULT_FETCH_OPTIONS, FetchOptions, describeError, fetchText } from '../utils/http';
import { logger } from '../utils/logger';
import { TextualCandidate, resolvePublished } from '../utils/timestamps';

export interface ListingPolicy {
  /** Region of the listing page that holds article links (keeps nav/footer out) */
  containerSelector: string;
  /** Matched against the resolved URL's pathname */
  articlePattern: RegExp;
  titleSelectors: string[];
  summarySelectors: string[];
  dateSelectors: string[];
  /** Assumed for zone-less dates printed on the page */
  siteOffset: string;
  maxArticles: number;
  summaryMaxLength: number;
}

export interface HtmlListingOptions {
  fetch: FetchOptions;
  articleConcurrency: number;
}

export const DEFAULT_LISTING_OPTIONS: HtmlListingOptions = {
  fetch: DEFAULT_FETCH_OPTIONS,
  articleConcurrency: 4
};

function metaContent($: cheerio.CheerioAPI, selectors: string[]): string | undefined {
  for (const selector of selectors) {
    const value = $(selector).first().attr('content')?.trim();
    if (value) return value;
  }
  return undefined;
}

function firstText($: cheerio.CheerioAPI, selectors: string[]): string | undefined {
  for (const selector of selectors) {
    const value = $(selector).first().text().replace(/\s+/g, ' ').trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Crawls a listing page, then fetches and extracts each linked article.
 * Subclasses supply the site policy only.
 */
export abstract class HtmlListingParser implements FeedParser {
  abstract readonly type: string;
  protected abstract readonly policy: ListingPolicy;

  protected readonly log = logger.child('listing');

  constructor(protected readonly options: HtmlListingOptions = DEFAULT_LISTING_OPTIONS) {}

  async *parse(url: string, ctx: ParseContext): AsyncIterable<RawItem> {
    let listingHtml: string;
    try {
      listingHtml = await fetchText(url, this.options.fetch);
    } catch (error) {
      ctx.report({ source: ctx.source, url, stage: 'listing', message: describeError(error) });
      return;
    }

    const articleUrls = this.discoverArticleUrls(listingHtml, url);
    if (articleUrls.length === 0) {
      ctx.report({ source: ctx.source, url, stage: 'listing', message: 'no article links found in listing container' });
      return;
    }

    this.log.debug(`${ctx.source}: ${articleUrls.length} article links`, { url });

    // Fetches start together (bounded); results are yielded in listing order
    const limit = pLimit(this.options.articleConcurrency);
    const tasks = articleUrls.map(articleUrl => limit(() => this.fetchArticle(articleUrl)));

    for (const [index, task] of tasks.entries()) {
      const result = await task;
      if (result.ok) {
        yield result.value;
      } else {
        ctx.report({ source: ctx.source, url: articleUrls[index], stage: 'article', message: result.reason });
      }
    }
  }

  /**
   * Absolute, de-duplicated article URLs found inside the listing container
   */
  discoverArticleUrls(html: string, baseUrl: string): string[] {
    const $ = cheerio.load(html);
    const container = $(this.policy.containerSelector);
    const urls = new Set<string>();

    container.find('a[href]').each((_, el) => {
      const resolved = absoluteUrl($(el).attr('href'), baseUrl);
      if (!resolved) return;
      if (!this.policy.articlePattern.test(new URL(resolved).pathname)) return;
      urls.add(resolved);
    });

    return Array.from(urls).slice(0, this.policy.maxArticles);
  }

  private async fetchArticle(articleUrl: string): Promise<Extraction<RawItem>> {
    try {
      const html = await fetchText(articleUrl, this.options.fetch);
      return this.extractArticle(html, articleUrl);
    } catch (error) {
      return { ok: false, reason: describeError(error) };
    }
  }

  extractArticle(html: string, articleUrl: string): Extraction<RawItem> {
    const $ = cheerio.load(html);

    const title = metaContent($, ['meta[property="og:title"]', 'meta[name="title"]'])
      ?? firstText($, [...this.policy.titleSelectors, 'title']);
    if (!title) {
      return { ok: false, reason: 'missing title' };
    }

    const rawSummary = metaContent($, ['meta[name="description"]', 'meta[property="og:description"]'])
      ?? firstText($, this.policy.summarySelectors)
      ?? '';
    const summary = truncateText(stripCdataMarkers(cleanHtmlText(rawSummary)), this.policy.summaryMaxLength);

    const image = absoluteUrl(metaContent($, ['meta[property="og:image"]', 'meta[name="twitter:image"]']), articleUrl) ?? undefined;

    const offset = this.policy.siteOffset;
    const textual: TextualCandidate[] = [
      { value: metaContent($, ['meta[property="article:published_time"]', 'meta[itemprop="datePublished"]']), offset },
      { value: $('time[datetime]').first().attr('datetime'), offset },
      { value: firstText($, this.policy.dateSelectors), offset }
    ];

    return {
      ok: true,
      value: {
        link: articleUrl,
        title: cleanHtmlText(title),
        summary,
        publishedAt: resolvePublished(textual).date,
        image
      }
    };
  }
}

import Parser from 'rss-parser';
import type { Extraction, FeedParser, ParseContext, RawItem } from '../types/adapter';
import { cleanHtmlText, imageFromHtml } from '../utils/html';
import { DEFAULT_FETCH_OPTIONS, FetchOptions, describeError, fetchText } from '../utils/http';
import { logger } from '../utils/logger';
import { TextualCandidate, resolvePublished } from '../utils/timestamps';

// Fields rss-parser does not map by default. Values stay `unknown` because
// xml2js hands back strings, arrays or attribute objects depending on markup.
export interface FeedEntryExtras {
  id?: unknown;
  description?: unknown;
  published?: unknown;
  updated?: unknown;
  dcDate?: unknown;
  contentEncoded?: unknown;
  mediaContent?: unknown;
  mediaThumbnail?: unknown;
}

export type FeedEntry = FeedEntryExtras & Parser.Item;

/**
 * Text of an xml2js node: plain strings, `{ _: text }` nodes, first array element
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }
  if (Array.isArray(value)) {
    return textOf(value[0]);
  }
  if (value && typeof value === 'object' && '_' in value) {
    return textOf(value._);
  }
  return undefined;
}

function firstNonEmpty(...values: unknown[]): string | undefined {
  for (const value of values) {
    const text = textOf(value);
    if (text) return text;
  }
  return undefined;
}

function mediaUrl(node: unknown): string | undefined {
  const nodes: unknown[] = Array.isArray(node) ? node : [node];
  for (const entry of nodes) {
    if (entry && typeof entry === 'object' && '$' in entry) {
      const attrs = entry.$;
      if (attrs && typeof attrs === 'object' && 'url' in attrs && typeof attrs.url === 'string' && attrs.url.trim()) {
        return attrs.url.trim();
      }
    }
  }
  return undefined;
}

/**
 * media:content, then media:thumbnail, then an image enclosure
 */
export function firstMediaUrl(entry: FeedEntry): string | undefined {
  const media = mediaUrl(entry.mediaContent) ?? mediaUrl(entry.mediaThumbnail);
  if (media) return media;
  const enclosure = entry.enclosure;
  if (enclosure?.url && (!enclosure.type || enclosure.type.startsWith('image/'))) {
    return enclosure.url.trim();
  }
  return undefined;
}

/**
 * Default parser for standard RSS/Atom feeds. Site variants override the
 * protected field extractors; the fetch/iterate/report loop stays here.
 */
export class GenericFeedParser implements FeedParser {
  readonly type: string = 'rss';

  /** Offset assumed for zone-less textual dates; UTC when unset */
  protected readonly siteOffset?: string;

  protected readonly log = logger.child('feed');

  private readonly parser = new Parser<Record<string, unknown>, FeedEntryExtras>({
    customFields: {
      item: [
        'id',
        'description',
        'published',
        'updated',
        ['dc:date', 'dcDate'],
        ['content:encoded', 'contentEncoded'],
        ['media:content', 'mediaContent', { keepArray: true }],
        ['media:thumbnail', 'mediaThumbnail', { keepArray: true }]
      ]
    }
  });

  constructor(protected readonly fetchOptions: FetchOptions = DEFAULT_FETCH_OPTIONS) {}

  async *parse(url: string, ctx: ParseContext): AsyncIterable<RawItem> {
    let entries: FeedEntry[];
    try {
      const xml = await fetchText(url, { ...this.fetchOptions, accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8' });
      const feed = await this.parser.parseString(xml);
      entries = feed.items ?? [];
    } catch (error) {
      ctx.report({ source: ctx.source, url, stage: 'fetch', message: describeError(error) });
      return;
    }

    this.log.debug(`${ctx.source}: ${entries.length} entries`, { url });

    for (const [index, entry] of entries.entries()) {
      let result: Extraction<RawItem>;
      try {
        result = this.extract(entry);
      } catch (error) {
        result = { ok: false, reason: describeError(error) };
      }

      if (result.ok) {
        yield result.value;
      } else {
        ctx.report({ source: ctx.source, url, stage: 'entry', message: `entry ${index + 1}: ${result.reason}` });
      }
    }
  }

  /**
   * One feed entry to a RawItem; entries with neither title nor link are skipped
   */
  extract(entry: FeedEntry): Extraction<RawItem> {
    const title = this.entryTitle(entry);
    const link = firstNonEmpty(entry.link);
    if (!title && !link) {
      return { ok: false, reason: 'missing title and link' };
    }

    return {
      ok: true,
      value: {
        guid: this.entryGuid(entry),
        link,
        title: title ?? '',
        summary: this.entrySummary(entry),
        publishedAt: this.entryPublished(entry),
        image: this.entryImage(entry)
      }
    };
  }

  protected entryTitle(entry: FeedEntry): string | undefined {
    const title = firstNonEmpty(entry.title);
    return title ? cleanHtmlText(title) || undefined : undefined;
  }

  protected entryGuid(entry: FeedEntry): string | undefined {
    return firstNonEmpty(entry.id, entry.guid, entry.link);
  }

  /** Short description wins over full content */
  protected shortDescription(entry: FeedEntry): string | undefined {
    return firstNonEmpty(entry.summary, entry.description);
  }

  protected richContent(entry: FeedEntry): string | undefined {
    return firstNonEmpty(entry.contentEncoded);
  }

  protected entrySummary(entry: FeedEntry): string {
    return cleanHtmlText(this.shortDescription(entry));
  }

  protected entryImage(entry: FeedEntry): string | undefined {
    return firstMediaUrl(entry) ?? imageFromHtml(this.shortDescription(entry));
  }

  protected textualDates(entry: FeedEntry): TextualCandidate[] {
    const offset = this.siteOffset;
    return [
      { value: firstNonEmpty(entry.pubDate), offset },
      { value: firstNonEmpty(entry.published), offset },
      { value: firstNonEmpty(entry.updated), offset },
      { value: firstNonEmpty(entry.dcDate), offset }
    ];
  }

  protected entryPublished(entry: FeedEntry): Date {
    return resolvePublished(this.textualDates(entry), [entry.isoDate]).date;
  }
}

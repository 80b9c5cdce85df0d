import type { FeedEntry } from './rss';
import { GenericFeedParser, firstMediaUrl, textOf } from './rss';
import { cleanHtmlText, imageFromHtml } from '../utils/html';

/**
 * MarketTimes (OneCMS) ships full HTML in <content:encoded> next to a plain
 * <description>.
 */
export class MarketTimesParser extends GenericFeedParser {
  readonly type = 'markettimes';

  protected entryGuid(entry: FeedEntry): string | undefined {
    return textOf(entry.guid) ?? textOf(entry.id) ?? textOf(entry.link);
  }

  protected entrySummary(entry: FeedEntry): string {
    const description = this.shortDescription(entry);
    return description ? cleanHtmlText(description) : cleanHtmlText(this.richContent(entry));
  }

  // media:* > <img> in content:encoded > <img> in description
  protected entryImage(entry: FeedEntry): string | undefined {
    return firstMediaUrl(entry)
      ?? imageFromHtml(this.richContent(entry))
      ?? imageFromHtml(this.shortDescription(entry));
  }
}

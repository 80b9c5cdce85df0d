import type { FeedEntry } from './rss';
import { GenericFeedParser } from './rss';
import {
  cleanHtmlText,
  stripBylinePrefix,
  stripCdataMarkers,
  stripLeadingBreakSegment,
  truncateText
} from '../utils/html';
import { VIETNAM_OFFSET } from '../utils/timestamps';

export const VIETSTOCK_SUMMARY_LENGTH = 300;

/**
 * Vietstock descriptions open with a linked thumbnail and a <br> before the
 * text, often followed by a "(Vietstock) - " byline. Feed dates without a zone
 * are Hanoi time.
 */
export class VietstockParser extends GenericFeedParser {
  readonly type = 'vietstock';
  protected readonly siteOffset = VIETNAM_OFFSET;

  protected entrySummary(entry: FeedEntry): string {
    const description = this.shortDescription(entry);
    if (!description) return '';

    const text = stripBylinePrefix(cleanHtmlText(stripLeadingBreakSegment(description)));
    return truncateText(stripCdataMarkers(text).trim(), VIETSTOCK_SUMMARY_LENGTH);
  }
}

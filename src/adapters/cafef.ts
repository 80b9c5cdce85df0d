import { HtmlListingParser, ListingPolicy } from './htmlListing';
import { VIETNAM_OFFSET } from '../utils/timestamps';

/**
 * CafeF category pages. Article URLs end in a numeric id plus ".chn";
 * the page prints "19-10-2026 - 08:30 AM" style dates in local time.
 */
export class CafefParser extends HtmlListingParser {
  readonly type = 'cafef';

  protected readonly policy: ListingPolicy = {
    containerSelector: '.list-main, .list-section, #LoadListNormal',
    articlePattern: /-\d{10,}\.chn$/,
    titleSelectors: ['h1.title', 'h1'],
    summarySelectors: ['h2.sapo', '.sapo'],
    dateSelectors: ['.pdate', '[data-role="publishdate"]'],
    siteOffset: VIETNAM_OFFSET,
    maxArticles: 30,
    summaryMaxLength: 300
  };
}

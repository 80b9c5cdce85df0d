import { HtmlListingParser, ListingPolicy } from './htmlListing';
import { VIETNAM_OFFSET } from '../utils/timestamps';

/**
 * VnEconomy section pages; articles live at a single-segment "/slug.htm" path.
 */
export class VneconomyParser extends HtmlListingParser {
  readonly type = 'vneconomy';

  protected readonly policy: ListingPolicy = {
    containerSelector: 'main .featured-row, main .list-story, .layout-content',
    articlePattern: /^\/[a-z0-9-]+\.htm$/,
    titleSelectors: ['h1.detail__title', 'h1'],
    summarySelectors: ['.detail__summary', 'h2.detail__summary'],
    dateSelectors: ['.detail__meta', '.date'],
    siteOffset: VIETNAM_OFFSET,
    maxArticles: 30,
    summaryMaxLength: 300
  };
}

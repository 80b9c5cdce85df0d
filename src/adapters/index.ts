import type { FeedParser } from '../types/adapter';
import type { FetchOptions } from '../utils/http';
import { CafefParser } from './cafef';
import { MarketTimesParser } from './markettimes';
import { GenericFeedParser } from './rss';
import { VietstockParser } from './vietstock';
import { VneconomyParser } from './vneconomy';

export interface ParserOptions {
  fetch: FetchOptions;
  articleConcurrency: number;
}

/**
 * Dispatch table from a source's `type` tag to its parser. Unknown tags get
 * the fallback parser (generic RSS/Atom).
 */
export class ParserRegistry {
  private readonly parsers = new Map<string, FeedParser>();

  constructor(private readonly fallbackType = 'rss') {}

  register(parser: FeedParser): this {
    this.parsers.set(parser.type, parser);
    return this;
  }

  types(): string[] {
    return Array.from(this.parsers.keys());
  }

  get(type: string): FeedParser {
    const parser = this.parsers.get(type) ?? this.parsers.get(this.fallbackType);
    if (!parser) {
      throw new Error(`No parser registered for "${type}" and no "${this.fallbackType}" fallback`);
    }
    return parser;
  }
}

export function createParserRegistry(options: ParserOptions): ParserRegistry {
  return new ParserRegistry()
    .register(new GenericFeedParser(options.fetch))
    .register(new VietstockParser(options.fetch))
    .register(new MarketTimesParser(options.fetch))
    .register(new CafefParser(options))
    .register(new VneconomyParser(options));
}

export { GenericFeedParser } from './rss';
export { VietstockParser } from './vietstock';
export { MarketTimesParser } from './markettimes';
export { HtmlListingParser } from './htmlListing';
export { CafefParser } from './cafef';
export { VneconomyParser } from './vneconomy';

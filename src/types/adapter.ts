// Records and contracts shared by every parser variant in src/adapters

export interface RawItem {
  guid?: string;              // RSS guid / Atom id, trimmed
  link?: string;              // Absolute article URL
  title: string;
  summary: string;            // Plain text, HTML stripped and whitespace collapsed
  publishedAt: Date;          // Resolved instant (see utils/timestamps)
  image?: string;             // Absolute image URL
}

export type FaultStage = 'fetch' | 'listing' | 'article' | 'entry';

export interface ParseFault {
  source: string;
  url: string;
  stage: FaultStage;
  message: string;
}

export interface ParseContext {
  source: string;             // Display name from the source config
  sourceType: string;         // Parser tag the source was configured with
  report: (fault: ParseFault) => void;
}

export interface FeedParser {
  readonly type: string;
  parse(url: string, ctx: ParseContext): AsyncIterable<RawItem>;
}

export interface SourceConfig {
  name: string;
  type: string;
  urls: string[];
}

/**
 * Outcome of extracting one entry or article. Failures are reported and the
 * stream moves on; they never abort the enclosing iteration.
 */
export type Extraction<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

/**
 * HTML text helpers used when turning feed fields and article pages into
 * plain-text summaries
 */

import * as cheerio from 'cheerio';

/**
 * Strip tags and collapse whitespace. Block boundaries become spaces so
 * "<p>a</p><p>b</p>" reads "a b".
 */
export function cleanHtmlText(html: string | null | undefined): string {
  if (!html) return '';
  const $ = cheerio.load(`<div id="__root">${html}</div>`);
  const root = $('#__root');
  root.find('script, style').remove();
  root.find('br, p, div, li, h1, h2, h3, h4, h5, h6, td').each((_, el) => {
    $(el).before(' ').after(' ');
  });
  return root.text().replace(/\s+/g, ' ').trim();
}

/**
 * `src` of the first <img> in an HTML fragment
 */
export function imageFromHtml(html: string | null | undefined): string | undefined {
  if (!html) return undefined;
  const $ = cheerio.load(html);
  const src = $('img').first().attr('src')?.trim();
  return src ? src : undefined;
}

/**
 * Drop residual "]]>" CDATA terminators that some feeds leak into text
 */
export function stripCdataMarkers(text: string): string {
  return text.replace(/\]\]>/g, '').replace(/<!\[CDATA\[/g, '');
}

/**
 * Cut on a word boundary when one exists near the limit and append "..."
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  const body = lastSpace > maxLength * 0.6 ? cut.slice(0, lastSpace) : cut;
  return `${body.trimEnd()}...`;
}

/**
 * Remove everything up to and including the first <br>, the shape used by
 * descriptions that lead with a thumbnail link before the text
 */
export function stripLeadingBreakSegment(html: string): string {
  const match = html.match(/<br\s*\/?>/i);
  if (!match || match.index === undefined) return html;
  const lead = html.slice(0, match.index);
  // Only strip when the lead is markup or a short byline, never real prose
  if (cleanHtmlText(lead).length > 80) return html;
  return html.slice(match.index + match[0].length);
}

/**
 * "(Vietstock) - Text" → "Text"
 */
export function stripBylinePrefix(text: string): string {
  return text.replace(/^\s*\([^()]{1,40}\)\s*[-–—:]\s*/, '');
}

/**
 * Resolve `href` against `base`; null for non-http(s) or malformed values
 */
export function absoluteUrl(href: string | undefined, base: string): string | null {
  if (!href) return null;
  try {
    const url = new URL(href.trim(), base);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

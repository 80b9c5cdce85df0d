import type { NewsItem } from '../types/news';

export interface DigestHeadline {
  title: string;
  source: string;
  link: string;
}

export function buildClusterPrompt(masterTitle: string, members: Pick<NewsItem, 'title' | 'summary'>[]): string {
  const context = members
    .map(member => `Title: ${member.title}\nSummary: ${member.summary}`)
    .join('\n---\n');

  return `You are a news editor. Write one synthesized summary for the group of articles below, which all report the same story.
Main headline: ${masterTitle}

Source material:
${context}

Requirements:
1. Write in the language of the articles, 3-4 sentences.
2. Focus on the core event and the most important figures and details across all sources.
3. Do not name the publications in the summary.
4. Use a modern news style.`;
}

export function buildDigestPrompt(headlines: DigestHeadline[]): string {
  const lines = headlines
    .map(headline => `- ${headline.title} (Source: ${headline.source}, Link: ${headline.link})`)
    .join('\n');

  return `You are a professional news editor. Analyse the headlines below and produce a "catch up" timeline of the day as JSON.

Content:
1. "summary": one very short sentence (about 20 words) covering the whole day.
2. "timeline": the 4-6 most important events. Each event has:
   - "time": a time marker or ordering label (e.g. "This morning", "10:00", "Highlight").
   - "title": a short event title.
   - "content": 1-2 sentences with the key facts.
   - "sources": a list of {"name": "Publication", "link": "url"} objects.

Rules:
- Write in the language of the headlines.
- Cite sources using the exact links from the input.
- Return JSON only.

Headlines:
${lines}

JSON schema:
{
  "summary": "...",
  "timeline": [
    {"time": "...", "title": "...", "content": "...", "sources": [{"name": "...", "link": "..."}]}
  ]
}`;
}

// On-disk shapes under the news output directory

export interface ClusterSource {
  name: string;
  link: string;
}

export interface NewsItem {
  item_id: string;            // SHA-1 fingerprint, immutable once assigned
  source: string;
  title: string;
  summary: string;
  link: string;
  guid: string;               // Falls back to link
  image: string | null;
  published_at: string;       // UTC, e.g. "2026-10-19T01:30:00+00:00"
  sources?: ClusterSource[];  // Set by the clustering pass
  cluster_count?: number;
  ai_summary?: string;
}

export type DatePartition = Record<string, NewsItem>;

export interface IndexManifest {
  dates: string[];
  digests: string[];
}

export interface LatestFile {
  generated_at: string;
  date: string;
  items: NewsItem[];
}

export interface DigestTimelineEntry {
  time: string;
  title: string;
  content: string;
  sources: ClusterSource[];
}

export interface DigestFile {
  date: string;
  summary: string;
  timeline: DigestTimelineEntry[];
  updated: string;
}

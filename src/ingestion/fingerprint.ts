import CryptoJS from 'crypto-js';
import { toUtcIso } from '../utils/timestamps';

export interface FingerprintInput {
  guid?: string;
  link?: string;
  source: string;
  title: string;
  publishedAt: Date;
}

/**
 * Identity key of a news item: SHA-1 hex of the guid, else the link, else
 * source + title + publication instant. Stored partitions are keyed by this
 * value, so the algorithm and the instant format must never change.
 */
export function fingerprint({ guid, link, source, title, publishedAt }: FingerprintInput): string {
  const basis = guid?.trim() || link?.trim() || `${source}${title}${toUtcIso(publishedAt)}`;
  return CryptoJS.SHA1(basis).toString(CryptoJS.enc.Hex);
}

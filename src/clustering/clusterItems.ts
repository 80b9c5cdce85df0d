import { TfidfVectorizer, cosineSimilarity } from './tfidf';

export const DEFAULT_CLUSTER_THRESHOLD = 0.75;

export interface ClusterItemsOptions {
  /** Items join a cluster only when similarity is strictly greater than this */
  threshold: number;
}

/**
 * Greedy single pass in input order. Each unassigned item seeds a cluster and
 * absorbs every later unassigned item whose title similarity to the seed
 * exceeds the threshold. Members are compared with the seed only, never with
 * each other. Returns index groups; the first index of each is the seed.
 */
export function clusterItems<T extends { title: string }>(
  items: T[],
  { threshold }: ClusterItemsOptions = { threshold: DEFAULT_CLUSTER_THRESHOLD }
): number[][] {
  if (items.length < 2) {
    return items.map((_, index) => [index]);
  }

  const vectors = new TfidfVectorizer().fitTransform(items.map(item => item.title));
  const assigned = new Array<boolean>(items.length).fill(false);
  const clusters: number[][] = [];

  for (let seed = 0; seed < items.length; seed++) {
    if (assigned[seed]) continue;
    assigned[seed] = true;
    const cluster = [seed];

    for (let other = seed + 1; other < items.length; other++) {
      if (assigned[other]) continue;
      if (cosineSimilarity(vectors[seed], vectors[other]) > threshold) {
        cluster.push(other);
        assigned[other] = true;
      }
    }

    clusters.push(cluster);
  }

  return clusters;
}

/**
 * TF-IDF vectors over short texts (headlines) and cosine similarity.
 *
 * Tokens are runs of two or more letters/digits/underscores, lowercased.
 * idf = ln((1 + n) / (1 + df)) + 1, raw term counts, rows L2-normalized.
 */

export type SparseVector = Map<string, number>;

const TOKEN = /[\p{L}\p{N}_]+/gu;

export function tokenize(text: string): string[] {
  const matches = text.toLowerCase().match(TOKEN) ?? [];
  return matches.filter(token => token.length >= 2);
}

function termCounts(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function l2Normalize(vector: SparseVector): SparseVector {
  let sumSquares = 0;
  for (const value of vector.values()) {
    sumSquares += value * value;
  }
  if (sumSquares === 0) return vector;
  const norm = Math.sqrt(sumSquares);
  const normalized: SparseVector = new Map();
  for (const [term, value] of vector) {
    normalized.set(term, value / norm);
  }
  return normalized;
}

export class TfidfVectorizer {
  private idf = new Map<string, number>();

  get vocabularySize(): number {
    return this.idf.size;
  }

  idfOf(term: string): number | undefined {
    return this.idf.get(term);
  }

  fitTransform(documents: string[]): SparseVector[] {
    const counted = documents.map(doc => termCounts(tokenize(doc)));

    const documentFrequency = new Map<string, number>();
    for (const counts of counted) {
      for (const term of counts.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const n = documents.length;
    this.idf = new Map();
    for (const [term, df] of documentFrequency) {
      this.idf.set(term, Math.log((1 + n) / (1 + df)) + 1);
    }

    return counted.map(counts => {
      const weighted: SparseVector = new Map();
      for (const [term, count] of counts) {
        weighted.set(term, count * (this.idf.get(term) ?? 0));
      }
      return l2Normalize(weighted);
    });
  }
}

/**
 * Cosine of the angle between two sparse vectors; 0 when either is empty
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, value] of small) {
    const other = large.get(term);
    if (other !== undefined) dot += value * other;
  }
  if (dot === 0) return 0;

  let normA = 0;
  for (const value of a.values()) normA += value * value;
  let normB = 0;
  for (const value of b.values()) normB += value * value;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

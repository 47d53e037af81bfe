/**
 * Text similarity used by the selector.
 *
 * The scorer is async so an embedding-backed implementation can be injected;
 * the default is a bag-of-words cosine that runs in process.
 */

export interface SimilarityScorer {
  /** Returns a value in [0, 1]. */
  similarity(text: string, reference: string): Promise<number>;
}

export type TermVector = ReadonlyMap<string, number>;

export function tokenize(text: string, stopwords: ReadonlySet<string>): string[] {
  const out: string[] = [];
  for (const raw of text.toLowerCase().match(/[a-z']+/g) ?? []) {
    const word = raw.replace(/'s$/, '').replace(/'/g, '');
    if (!word || stopwords.has(word)) continue;
    // crude plural folding so "stars" and "star" share a term
    out.push(word.length > 3 && word.endsWith('s') && !word.endsWith('ss') ? word.slice(0, -1) : word);
  }
  return out;
}

export function termVector(text: string, stopwords: ReadonlySet<string>): TermVector {
  const counts = new Map<string, number>();
  for (const token of tokenize(text, stopwords)) counts.set(token, (counts.get(token) ?? 0) + 1);
  return counts;
}

export function cosine(a: TermVector, b: TermVector): number {
  if (a.size === 0 || b.size === 0) return 0;
  let dot = 0;
  for (const [term, count] of a) dot += count * (b.get(term) ?? 0);
  if (dot === 0) return 0;
  let normA = 0;
  for (const count of a.values()) normA += count * count;
  let normB = 0;
  for (const count of b.values()) normB += count * count;
  return dot / Math.sqrt(normA * normB);
}

export class BagOfWordsScorer implements SimilarityScorer {
  constructor(private readonly stopwords: ReadonlySet<string>) {}

  textSimilarity(a: string, b: string): number {
    return cosine(termVector(a, this.stopwords), termVector(b, this.stopwords));
  }

  async similarity(text: string, reference: string): Promise<number> {
    return this.textSimilarity(text, reference);
  }
}

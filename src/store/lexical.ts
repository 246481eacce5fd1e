/**
 * BM25 term matching for the in-process store. Mirrors the defaults of
 * Lucene-based engines (k1 = 1.2, b = 0.75, idf = ln(1 + (N - n + 0.5) / (n + 0.5)))
 * so rankings are comparable to an Elasticsearch `match` query on a standard
 * analyzer, minus stemming and stop words.
 */

const K1 = 1.2;
const B = 0.75;

/**
 * Lowercase and split on anything that is not a letter, digit or underscore.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((t) => t.length > 0);
}

/** Per-document statistics kept alongside the text. */
export interface TermStats {
  /** term -> occurrences */
  readonly freqs: ReadonlyMap<string, number>;
  readonly length: number;
}

export function termStats(text: string): TermStats {
  const tokens = tokenize(text);
  const freqs = new Map<string, number>();
  for (const t of tokens) freqs.set(t, (freqs.get(t) ?? 0) + 1);
  return { freqs, length: tokens.length };
}

/**
 * Score every document against the query terms (OR semantics). Documents
 * sharing no term with the query are absent from the result.
 *
 * @returns id -> BM25 score (> 0)
 */
export function bm25(query: string, docs: ReadonlyMap<string, TermStats>): Map<string, number> {
  const scores = new Map<string, number>();
  const n = docs.size;
  if (n === 0) return scores;

  const terms = Array.from(new Set(tokenize(query)));
  if (!terms.length) return scores;

  let totalLength = 0;
  for (const stats of docs.values()) totalLength += stats.length;
  const avgLength = totalLength / n || 1;

  for (const term of terms) {
    let df = 0;
    for (const stats of docs.values()) if (stats.freqs.has(term)) df++;
    if (df === 0) continue;
    const idf = Math.log(1 + (n - df + 0.5) / (df + 0.5));
    for (const [id, stats] of docs) {
      const tf = stats.freqs.get(term);
      if (!tf) continue;
      const norm = tf + K1 * (1 - B + (B * stats.length) / avgLength);
      scores.set(id, (scores.get(id) ?? 0) + (idf * (tf * (K1 + 1))) / norm);
    }
  }
  return scores;
}

import type { Term, TermFrequencies } from "../types.js";

/**
 * Relative frequency of each distinct term: occurrences / kept tokens.
 * Both maps keep first-seen order, which the ranker uses for tie-breaks.
 */
export function computeTf(tokens: Iterable<Term>): TermFrequencies {
  const counts = new Map<Term, number>();
  let totalTokens = 0;

  for (const term of tokens) {
    totalTokens++;
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }

  const tf = new Map<Term, number>();
  for (const [term, count] of counts) {
    tf.set(term, count / totalTokens);
  }

  return { totalTokens, counts, tf };
}

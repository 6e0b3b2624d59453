import type { Term } from "../types.js";
import type { CorpusStats } from "../corpusStats.js";

/**
 * Smoothed inverse document frequency: ln((N + 1) / (df + 1)).
 *
 * Stays finite for df = 0 and is 0 only when df = N. With df <= N the result
 * lies in [0, ln(N + 1)].
 */
export function smoothedIdf(docCount: number, docFreq: number): number {
  return Math.log((docCount + 1) / (docFreq + 1));
}

/** IDF of `term` given its corpus figures; the value depends on the counts alone. */
export function computeIdf(_term: Term, docCount: number, docFreq: number): number {
  return smoothedIdf(docCount, docFreq);
}

/**
 * Binds the IDF formula to a corpus. N is read once at construction so every
 * term of one analysis sees the same document count.
 */
export class IdfCalculator {
  private readonly docCount: number;

  constructor(private readonly corpus: CorpusStats) {
    this.docCount = corpus.documentCount();
  }

  get documentCount(): number {
    return this.docCount;
  }

  idf(term: Term): number {
    return smoothedIdf(this.docCount, this.corpus.documentFrequency(term));
  }
}

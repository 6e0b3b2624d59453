import type { DocId, Term } from "./types.js";

/**
 * Read side of the corpus statistics store.
 *
 * Callers must not let the store change while one analysis reads it.
 */
export interface CorpusStats {
  /** Documents in the corpus, not counting the one being analyzed. */
  documentCount(): number;
  /** Documents containing `term` at least once. Never exceeds `documentCount()`. */
  documentFrequency(term: Term): number;
}

/**
 * Write side: records a finished document's contribution.
 *
 * Contract notes:
 * - adds one to the document count and one to the df of each distinct term
 * - at most once per docId; a repeated id returns false and changes nothing
 */
export interface CorpusWriter {
  registerDocument(docId: DocId, terms: Iterable<Term>): boolean;
}

export interface CorpusSummary {
  documentCount: number;
  vocabularySize: number;
}

/** A store the service can both read during analysis and write after it. */
export interface CorpusStore extends CorpusStats, CorpusWriter {
  summary(): CorpusSummary;
}

/** Shared core types used by module contracts. */

export type DocId = string;
export type Term = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position among kept tokens (token index, not character offset). */
  position: number;
  /** Character offsets into the source text. */
  startOffset: number;
  endOffset: number;
}

/** Per-document term statistics produced by the TF calculator. */
export interface TermFrequencies {
  /** number of kept tokens in the document */
  totalTokens: number;
  /** occurrences per distinct term, in first-seen order */
  counts: Map<Term, number>;
  /** counts(term) / totalTokens, in first-seen order */
  tf: Map<Term, number>;
}

/** One row of an analysis result table. */
export interface RankedTerm {
  term: Term;
  tf: number;
  idf: number;
  tfidf: number;
}

export interface DocumentAnalysis {
  totalTokens: number;
  /** distinct terms in first-seen order; this is what gets registered with the corpus */
  terms: Term[];
  results: RankedTerm[];
  /** corpus size the IDF values were computed against */
  corpusDocumentCount: number;
}

import type { RankedTerm, Term } from "./types.js";

export type IdfLookup = (term: Term) => number;

/**
 * Joins per-document TF with corpus IDF and keeps the best `topN` terms.
 *
 * Order: idf descending, ties broken by the iteration order of `tf`
 * (first occurrence in the document).
 */
export interface Ranker {
  rank(tf: ReadonlyMap<Term, number>, idfOf: IdfLookup, topN: number): RankedTerm[];
}

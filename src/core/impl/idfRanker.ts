import type { RankedTerm, Term } from "../types.js";
import type { TopKSelector } from "../heap.js";
import type { IdfLookup, Ranker } from "../ranker.js";
import { HeapTopKSelector } from "./topK.js";

interface Candidate {
  row: RankedTerm;
  /** first-seen index, the secondary sort key */
  order: number;
}

function byIdfDesc(a: Candidate, b: Candidate): number {
  return b.row.idf - a.row.idf || a.order - b.order;
}

/**
 * Ranks a document's terms by rarity in the corpus.
 *
 * Every candidate carries its first-seen index, so equal IDF values come out
 * in document order regardless of how the selector shuffles them.
 */
export class IdfRanker implements Ranker {
  constructor(private readonly selector: TopKSelector<Candidate> = new HeapTopKSelector<Candidate>()) {}

  rank(tf: ReadonlyMap<Term, number>, idfOf: IdfLookup, topN: number): RankedTerm[] {
    if (tf.size === 0 || topN <= 0) return [];

    const candidates: Candidate[] = [];
    let order = 0;
    for (const [term, termTf] of tf) {
      const idf = idfOf(term);
      candidates.push({ row: { term, tf: termTf, idf, tfidf: termTf * idf }, order: order++ });
    }

    return this.selector.topK(candidates, topN, byIdfDesc).map((c) => c.row);
  }
}

const defaultRanker = new IdfRanker();

export function rank(tf: ReadonlyMap<Term, number>, idfOf: IdfLookup, topN: number): RankedTerm[] {
  return defaultRanker.rank(tf, idfOf, topN);
}

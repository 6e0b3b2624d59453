import type { DocId, Term } from "../types.js";
import type { CorpusStore, CorpusSummary } from "../corpusStats.js";

/**
 * In-memory corpus statistics.
 *
 * Data structure:
 * - term -> number of registered documents containing it
 * - set of registered doc ids (guards against double registration)
 *
 * Counts only grow; there is no removal.
 */
export class MemoryCorpusStore implements CorpusStore {
  private readonly termToDocCount = new Map<Term, number>();
  private readonly docs = new Set<DocId>();

  registerDocument(docId: DocId, terms: Iterable<Term>): boolean {
    if (this.docs.has(docId)) return false;
    this.docs.add(docId);

    for (const term of new Set(terms)) {
      this.termToDocCount.set(term, (this.termToDocCount.get(term) ?? 0) + 1);
    }
    return true;
  }

  hasDocument(docId: DocId): boolean {
    return this.docs.has(docId);
  }

  documentCount(): number {
    return this.docs.size;
  }

  documentFrequency(term: Term): number {
    return this.termToDocCount.get(term) ?? 0;
  }

  vocabularySize(): number {
    return this.termToDocCount.size;
  }

  summary(): CorpusSummary {
    return { documentCount: this.documentCount(), vocabularySize: this.vocabularySize() };
  }
}

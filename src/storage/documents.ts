import type { DocId, RankedTerm, Term } from "../core/types.js";

export interface DocumentRecord {
  id: DocId;
  filename: string;
  /** uploaded text as analyzed */
  text: string;
  /** characters in the uploaded text */
  contentLength: number;
  /** kept tokens after filtering */
  totalTokens: number;
  distinctTerms: number;
  /** distinct terms in first-seen order, as registered with the corpus */
  terms: Term[];
  createdAt: Date;
  /** corpus size the IDF values were computed against */
  corpusDocumentCount: number;
  results: RankedTerm[];
}

export type DocumentSummary = Omit<DocumentRecord, "results" | "text" | "terms">;

export interface DocumentRepository {
  save(record: DocumentRecord): void;
  get(id: DocId): DocumentRecord | undefined;
  /** newest first */
  recent(limit: number): DocumentRecord[];
}

export class MemoryDocumentRepository implements DocumentRepository {
  private readonly byId = new Map<DocId, DocumentRecord>();

  save(record: DocumentRecord): void {
    this.byId.set(record.id, record);
  }

  get(id: DocId): DocumentRecord | undefined {
    return this.byId.get(id);
  }

  recent(limit: number): DocumentRecord[] {
    if (limit <= 0) return [];
    // Map keeps insertion order, which is upload order
    return Array.from(this.byId.values()).slice(-limit).reverse();
  }
}

export function toSummary(record: DocumentRecord): DocumentSummary {
  const { results: _results, text: _text, terms: _terms, ...summary } = record;
  return summary;
}

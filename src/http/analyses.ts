import { randomUUID } from "node:crypto";

import type { DocId, RankedTerm } from "../core/types.js";
import type { CorpusStore, CorpusSummary } from "../core/corpusStats.js";
import type { AnalyzerConfig } from "../core/config.js";
import { MemoryCorpusStore, TfIdfAnalyzer } from "../core/impl/index.js";
import {
  MemoryDocumentRepository,
  toSummary,
  type DocumentRecord,
  type DocumentRepository,
  type DocumentSummary,
} from "../storage/documents.js";
import { MemoryMetricsRepository, type MetricsRepository, type MetricsSummary } from "../storage/metrics.js";
import { silentLogger, type Logger } from "../logger.js";

export interface SubmitInput {
  filename: string;
  text: string;
}

export interface AnalysisOutcome {
  document: DocumentSummary;
  corpus: CorpusSummary;
  results: RankedTerm[];
}

export interface AnalysisService {
  submit(input: SubmitInput): AnalysisOutcome;
  get(id: DocId): DocumentRecord | undefined;
  recent(limit: number): DocumentSummary[];
  metrics(): MetricsSummary;
  corpus(): CorpusSummary;
}

export interface AnalysesOptions {
  config: AnalyzerConfig;
  logger?: Logger;
  corpus?: CorpusStore;
  documents?: DocumentRepository;
  metrics?: MetricsRepository;
  now?: () => Date;
  newId?: () => DocId;
}

/**
 * Upload pipeline around the analyzer: metrics bookkeeping, analysis against the
 * current corpus, then registration of the document's terms.
 *
 * `submit` is synchronous from the corpus read to the corpus write, so requests
 * handled on the same event loop never interleave inside that window.
 */
export function createInMemoryAnalyses(opts: AnalysesOptions): AnalysisService {
  const analyzer = new TfIdfAnalyzer({ config: opts.config });
  const corpus = opts.corpus ?? new MemoryCorpusStore();
  const documents = opts.documents ?? new MemoryDocumentRepository();
  const metrics = opts.metrics ?? new MemoryMetricsRepository();
  const log = (opts.logger ?? silentLogger()).child({ module: "analyses" });
  const now = opts.now ?? (() => new Date());
  const newId = opts.newId ?? (() => randomUUID());

  return {
    submit({ filename, text }) {
      const entry = metrics.start(text.length, now());

      try {
        const analysis = analyzer.analyze(text, corpus);
        const id = newId();
        if (!corpus.registerDocument(id, analysis.terms)) {
          throw new Error(`document ${id} is already part of the corpus`);
        }

        const record: DocumentRecord = {
          id,
          filename,
          text,
          contentLength: text.length,
          totalTokens: analysis.totalTokens,
          distinctTerms: analysis.terms.length,
          terms: analysis.terms,
          createdAt: now(),
          corpusDocumentCount: analysis.corpusDocumentCount,
          results: analysis.results,
        };
        documents.save(record);

        const done = metrics.finish(entry.id, "completed", now(), id);
        log.info(
          {
            documentId: id,
            filename,
            totalTokens: record.totalTokens,
            distinctTerms: record.distinctTerms,
            corpusDocumentCount: record.corpusDocumentCount,
            processingTime: done?.processingTime,
          },
          "document analyzed",
        );

        return { document: toSummary(record), corpus: corpus.summary(), results: record.results };
      } catch (e) {
        metrics.finish(entry.id, "failed", now());
        log.error({ err: e, filename }, "document analysis failed");
        throw e;
      }
    },
    get(id) {
      return documents.get(id);
    },
    recent(limit) {
      return documents.recent(limit).map(toSummary);
    },
    metrics() {
      return metrics.summary();
    },
    corpus() {
      return corpus.summary();
    },
  };
}

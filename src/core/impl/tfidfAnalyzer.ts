import type { DocumentAnalysis, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { Ranker } from "../ranker.js";
import type { CorpusStats } from "../corpusStats.js";
import type { AnalyzerConfig } from "../config.js";
import { SegmenterTokenizer } from "./segmenterTokenizer.js";
import { IdfRanker } from "./idfRanker.js";
import { IdfCalculator } from "./idf.js";
import { computeTf } from "./termFrequency.js";

export interface AnalyzerDeps {
  config: AnalyzerConfig;
  tokenizer?: Tokenizer;
  ranker?: Ranker;
}

/**
 * text -> tokens -> TF -> IDF against the corpus -> top terms.
 *
 * Reads the corpus, never writes it. The caller registers `terms` afterwards,
 * so a document does not count towards its own N or df.
 */
export class TfIdfAnalyzer {
  private readonly tokenizer: Tokenizer;
  private readonly ranker: Ranker;
  private readonly topN: number;

  constructor(deps: AnalyzerDeps) {
    this.tokenizer = deps.tokenizer ?? new SegmenterTokenizer(deps.config);
    this.ranker = deps.ranker ?? new IdfRanker();
    this.topN = deps.config.topWordsCount;
  }

  analyze(text: string, corpus: CorpusStats): DocumentAnalysis {
    const terms: Term[] = [];
    for (const tok of this.tokenizer.tokenize(text)) terms.push(tok.term);

    const { totalTokens, tf } = computeTf(terms);
    const idf = new IdfCalculator(corpus);
    const results = this.ranker.rank(tf, (term) => idf.idf(term), this.topN);

    return {
      totalTokens,
      terms: Array.from(tf.keys()),
      results,
      corpusDocumentCount: idf.documentCount,
    };
  }
}

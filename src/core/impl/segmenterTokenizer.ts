import type { Term, Token } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import { resolveAnalyzerConfig, type AnalyzerConfig } from "../config.js";

type TokenizerConfig = Pick<AnalyzerConfig, "locale" | "stopWords">;

interface Span {
  text: string;
  start: number;
  end: number;
}

const FORMAT_CHARS = /\p{Cf}/gu;
const LETTER = /\p{L}/u;
const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;
const HYPHENS = new Set(["-", "\u2010", "\u2011"]);

function isPunctuationOnly(term: string): boolean {
  return !LETTER_OR_DIGIT.test(term);
}

/** digits with separators (`2024`, `3,14`, `10-12`): anything with a digit and no letter */
function isNumeric(term: string): boolean {
  return !LETTER.test(term);
}

/**
 * Word tokenizer on top of Intl.Segmenter:
 * - keeps word-like segments, glues `word-word` compounds back together
 * - strips format characters (zero-width joiners, word joiners), lowercases
 * - drops punctuation, numbers and stop words
 * - no stemming
 */
export class SegmenterTokenizer implements Tokenizer {
  private readonly segmenter: Intl.Segmenter;
  private readonly locale: string;
  private readonly stopWords: ReadonlySet<string>;

  constructor(config: TokenizerConfig) {
    this.locale = config.locale;
    this.stopWords = config.stopWords;
    this.segmenter = new Intl.Segmenter(config.locale, { granularity: "word" });
  }

  tokenize(text: string): Iterable<Token> {
    return { [Symbol.iterator]: () => this.scan(text) };
  }

  private *scan(text: string): Generator<Token> {
    let position = 0;

    for (const word of this.words(text)) {
      const term = word.text.replace(FORMAT_CHARS, "").toLocaleLowerCase(this.locale);
      if (!term) continue;
      if (isPunctuationOnly(term) || isNumeric(term)) continue;
      if (this.stopWords.has(term)) continue;

      yield { term, position, startOffset: word.start, endOffset: word.end };
      position++;
    }
  }

  private *words(text: string): Generator<Span> {
    let pending: Span | undefined;
    let hyphen: string | undefined;

    for (const seg of this.segmenter.segment(text)) {
      const start = seg.index;
      const end = start + seg.segment.length;

      if (seg.isWordLike) {
        if (pending && hyphen !== undefined) {
          pending = { text: pending.text + hyphen + seg.segment, start: pending.start, end };
          hyphen = undefined;
          continue;
        }
        if (pending) yield pending;
        pending = { text: seg.segment, start, end };
        continue;
      }

      // a lone hyphen directly between two words
      if (pending && hyphen === undefined && HYPHENS.has(seg.segment)) {
        hyphen = seg.segment;
        continue;
      }

      if (pending) yield pending;
      pending = undefined;
      hyphen = undefined;
    }

    if (pending) yield pending;
  }
}

/** Tokenizes `text` into terms with the given (or default) settings. */
export function tokenize(text: string, config: TokenizerConfig = resolveAnalyzerConfig()): Term[] {
  const out: Term[] = [];
  for (const tok of new SegmenterTokenizer(config).tokenize(text)) out.push(tok.term);
  return out;
}

import { z } from "zod";

import { ConfigError, issuesFromZod } from "./errors.js";
import { defaultStopWords, stopWordSchema } from "./stopWords.js";

export const DEFAULT_TOP_WORDS_COUNT = 50;
export const DEFAULT_LOCALE = "ru";

export interface AnalyzerConfig {
  readonly stopWords: ReadonlySet<string>;
  /** how many terms an analysis returns */
  readonly topWordsCount: number;
  /** locale handed to Intl.Segmenter */
  readonly locale: string;
}

export interface AnalyzerConfigInput {
  stopWords?: Iterable<string>;
  topWordsCount?: number;
  locale?: string;
}

function isSegmenterLocale(locale: string): boolean {
  try {
    return Intl.Segmenter.supportedLocalesOf([locale]).length > 0;
  } catch {
    // RangeError for malformed language tags
    return false;
  }
}

const configSchema = z.object({
  topWordsCount: z.number().int("must be an integer").min(1, "must be at least 1").default(DEFAULT_TOP_WORDS_COUNT),
  locale: z.string().min(1).refine(isSegmenterLocale, "is not supported by Intl.Segmenter").default(DEFAULT_LOCALE),
  stopWords: z.array(stopWordSchema).optional(),
});

/**
 * Validates analyzer settings once. The returned object is frozen and shared by
 * every analysis; omitted stop words fall back to the bundled Russian list.
 */
export function resolveAnalyzerConfig(input: AnalyzerConfigInput = {}): AnalyzerConfig {
  const parsed = configSchema.safeParse({
    topWordsCount: input.topWordsCount,
    locale: input.locale,
    stopWords: input.stopWords === undefined ? undefined : Array.from(input.stopWords),
  });
  if (!parsed.success) {
    throw new ConfigError("invalid analyzer configuration", issuesFromZod(parsed.error));
  }

  const { topWordsCount, locale, stopWords } = parsed.data;
  return Object.freeze({
    topWordsCount,
    locale,
    // lowercased the way the tokenizer lowercases text
    stopWords: stopWords ? new Set(stopWords.map((w) => w.toLocaleLowerCase(locale))) : defaultStopWords(),
  });
}

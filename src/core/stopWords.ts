import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigError, errorMessage, issuesFromZod } from "./errors.js";

export const DEFAULT_STOP_WORDS_FILE = fileURLToPath(new URL("../../data/stopwords-ru.json", import.meta.url));

export const stopWordSchema = z
  .string()
  .min(1, "must be non-empty")
  .regex(/^\S+$/u, "must not contain whitespace");

const stopWordListSchema = z.array(stopWordSchema);

let defaultSet: ReadonlySet<string> | undefined;

/** Validates a decoded stop-word list (an array of single words). Case is left to the analyzer config. */
export function parseStopWords(value: unknown, source = "stop words"): ReadonlySet<string> {
  const parsed = stopWordListSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`invalid ${source}`, issuesFromZod(parsed.error));
  }
  return new Set(parsed.data);
}

export function loadStopWords(file: string): ReadonlySet<string> {
  let raw: string;
  try {
    raw = readFileSync(file, "utf8");
  } catch (e) {
    throw new ConfigError(`cannot read stop-word file ${file}: ${errorMessage(e)}`);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`stop-word file ${file} is not valid JSON: ${errorMessage(e)}`);
  }
  return parseStopWords(decoded, `stop-word file ${file}`);
}

/** Russian stop words shipped with the project, read once. */
export function defaultStopWords(): ReadonlySet<string> {
  defaultSet ??= loadStopWords(DEFAULT_STOP_WORDS_FILE);
  return defaultSet;
}

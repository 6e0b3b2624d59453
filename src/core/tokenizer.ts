import type { Token } from "./types.js";

/**
 * Turns text into a stream of normalized tokens.
 *
 * Contract notes:
 * - deterministic for a given input and configuration
 * - every call returns a fresh iterable; iterating it again restarts from the first token
 * - empty input yields nothing
 */
export interface Tokenizer {
  tokenize(text: string): Iterable<Token>;
}

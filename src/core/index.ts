export type * from "./types.js";
export type * from "./tokenizer.js";
export type * from "./ranker.js";
export type * from "./heap.js";
export type * from "./corpusStats.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./stopWords.js";
export * from "./impl/index.js";

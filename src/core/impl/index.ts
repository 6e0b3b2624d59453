export * from "./segmenterTokenizer.js";
export * from "./termFrequency.js";
export * from "./idf.js";
export * from "./topK.js";
export * from "./idfRanker.js";
export * from "./memoryCorpusStore.js";
export * from "./tfidfAnalyzer.js";

import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { ConfigError } from "../errors.js";
import { resolveAnalyzerConfig } from "../config.js";
import { defaultStopWords, loadStopWords, parseStopWords } from "../stopWords.js";
import { tokenize } from "../impl/segmenterTokenizer.js";

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error("expected a ConfigError");
}

describe("resolveAnalyzerConfig", () => {
  it("fills in defaults", () => {
    const config = resolveAnalyzerConfig();
    expect(config.topWordsCount).toBe(50);
    expect(config.locale).toBe("ru");
    expect(config.stopWords).toBe(defaultStopWords());
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("lowercases custom stop words", () => {
    const config = resolveAnalyzerConfig({ stopWords: ["И", "да"], topWordsCount: 5 });
    expect(Array.from(config.stopWords)).toEqual(["и", "да"]);
    expect(config.topWordsCount).toBe(5);
  });

  it("lowercases stop words with the configured locale", () => {
    const config = resolveAnalyzerConfig({ locale: "tr", stopWords: ["I"] });
    expect(Array.from(config.stopWords)).toEqual(["ı"]);
    expect(tokenize("I love", config)).toEqual(["love"]);
  });

  it("lowercases stop words read from a file", () => {
    const dir = mkdtempSync(join(tmpdir(), "stopwords-"));
    const file = join(dir, "upper.json");
    writeFileSync(file, JSON.stringify(["КОТ"]));
    expect(resolveAnalyzerConfig({ stopWords: loadStopWords(file) }).stopWords.has("кот")).toBe(true);
  });

  it("rejects a non-positive or fractional top-N", () => {
    expect(configError(() => resolveAnalyzerConfig({ topWordsCount: 0 })).issues).toEqual([
      { path: "topWordsCount", message: "must be at least 1" },
    ]);
    expect(configError(() => resolveAnalyzerConfig({ topWordsCount: 2.5 })).issues).toEqual([
      { path: "topWordsCount", message: "must be an integer" },
    ]);
  });

  it("rejects malformed stop words", () => {
    const err = configError(() => resolveAnalyzerConfig({ stopWords: ["ok", "two words", "x\ty"] }));
    expect(err.issues.map((i) => i.path)).toEqual(["stopWords.1", "stopWords.2"]);
  });

  it("rejects a locale Intl.Segmenter cannot take", () => {
    const err = configError(() => resolveAnalyzerConfig({ locale: "!!" }));
    expect(err.issues).toEqual([{ path: "locale", message: "is not supported by Intl.Segmenter" }]);
  });
});

describe("stop words", () => {
  it("ships the Russian list", () => {
    const words = defaultStopWords();
    expect(words.size).toBe(151);
    expect(words.has("и")).toBe(true);
    expect(words.has("между")).toBe(true);
    expect(words.has("кот")).toBe(false);
  });

  it("validates decoded lists", () => {
    expect(parseStopWords(["А", "но"])).toEqual(new Set(["А", "но"]));
    expect(() => parseStopWords("и, но")).toThrow(ConfigError);
    expect(() => parseStopWords([1, 2])).toThrow(ConfigError);
  });

  it("loads a list from a JSON file", () => {
    const dir = mkdtempSync(join(tmpdir(), "stopwords-"));
    const good = join(dir, "good.json");
    const bad = join(dir, "bad.json");
    writeFileSync(good, JSON.stringify(["кот", "пёс"]));
    writeFileSync(bad, "[\"кот\",");

    expect(loadStopWords(good)).toEqual(new Set(["кот", "пёс"]));
    expect(() => loadStopWords(bad)).toThrow(/not valid JSON/);
    expect(() => loadStopWords(join(dir, "missing.json"))).toThrow(/cannot read stop-word file/);
  });
});

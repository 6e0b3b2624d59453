import { describe, expect, it } from "vitest";
import { SegmenterTokenizer, tokenize } from "../segmenterTokenizer.js";
import { resolveAnalyzerConfig } from "../../config.js";

const noStopWords = resolveAnalyzerConfig({ stopWords: [] });

function terms(text: string, config = noStopWords): string[] {
  return tokenize(text, config);
}

describe("SegmenterTokenizer", () => {
  it("splits on word boundaries and lowercases", () => {
    expect(terms("Кот сидит на окне. Кот смотрит!")).toEqual(["кот", "сидит", "на", "окне", "кот", "смотрит"]);
  });

  it("removes stop words from the default Russian list", () => {
    expect(tokenize("Кот сидит на окне")).toEqual(["кот", "сидит", "окне"]);
  });

  it("drops numbers but keeps alphanumeric words", () => {
    expect(terms("В 2024 году 3,14 и covid19")).toEqual(["в", "году", "и", "covid19"]);
  });

  it("keeps hyphenated compounds and drops dashes and quotes", () => {
    expect(terms("кто-то пришёл — «тихо»")).toEqual(["кто-то", "пришёл", "тихо"]);
  });

  it("treats mixed-script words as regular tokens", () => {
    expect(terms("Hello МИР")).toEqual(["hello", "мир"]);
  });

  it("strips invisible format characters", () => {
    expect(terms("\u2060слово")).toEqual(["слово"]);
  });

  it("yields nothing for empty, blank or punctuation-only text", () => {
    expect(terms("")).toEqual([]);
    expect(terms("   \n\t ")).toEqual([]);
    expect(terms("!!! ... ,,, -- 42")).toEqual([]);
  });

  it("reports positions and source offsets", () => {
    const tokens = Array.from(new SegmenterTokenizer(noStopWords).tokenize("Кот, пёс"));
    expect(tokens).toEqual([
      { term: "кот", position: 0, startOffset: 0, endOffset: 3 },
      { term: "пёс", position: 1, startOffset: 5, endOffset: 8 },
    ]);
  });

  it("returns a restartable sequence and is deterministic", () => {
    const tokenizer = new SegmenterTokenizer(noStopWords);
    const seq = tokenizer.tokenize("один два три");
    const first = Array.from(seq, (t) => t.term);
    const second = Array.from(seq, (t) => t.term);
    expect(first).toEqual(["один", "два", "три"]);
    expect(second).toEqual(first);
    expect(terms("один два три")).toEqual(first);
  });
});

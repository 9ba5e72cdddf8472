import { describe, expect, it } from "vitest";
import { createTokenizer, normalizeText, questionPrefix, resolveTokenizerCapability } from "../src/utils/text.js";
import { cosineSimilarity, toSimilarity, toVectorLiteral } from "../src/utils/vector.js";

describe("text utils", () => {
  it("normalizes line endings and tabs", () => {
    expect(normalizeText("  a\r\nb\tc  ")).toBe("a\nb c");
  });

  it("shortens long questions for log lines", () => {
    expect(questionPrefix("a".repeat(45))).toBe(`${"a".repeat(40)}...`);
    expect(questionPrefix("where  is\nit")).toBe("where is it");
  });

  it("lowercases latin words and splits CJK runs into bigrams", () => {
    const tokenizer = createTokenizer("basic");
    expect(tokenizer.tokenize("Hello, World 42")).toEqual(["hello", "world", "42"]);
    expect(tokenizer.tokenize("abc東京都")).toEqual(["abc", "東京", "京都"]);
    expect(tokenizer.tokenize("東")).toEqual(["東"]);
  });

  it("keeps word-like segments only with the segmenter", () => {
    const tokenizer = createTokenizer("segmenter");
    expect(tokenizer.capability).toBe("segmenter");
    expect(tokenizer.tokenize("Hello, world!")).toEqual(["hello", "world"]);
  });

  it("resolves the tokenizer capability once", () => {
    expect(resolveTokenizerCapability("basic")).toBe("basic");
    expect(resolveTokenizerCapability("auto")).toBe("segmenter");
  });

  it("clamps cosine similarity into [0, 1]", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(toSimilarity(-0.5)).toBe(0);
    expect(toSimilarity(Number.NaN)).toBe(0);
    expect(toVectorLiteral([0.5, 1])).toBe("[0.5,1]");
  });
});

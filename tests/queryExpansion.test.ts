import { describe, expect, it } from "vitest";
import {
  distinctVariants,
  expandQuery,
  generateHypotheticalPassage,
  stripCodeFence,
} from "../src/pipelines/queryExpansion.js";
import { FakeGenerator } from "./helpers/fakes.js";

describe("query expansion", () => {
  it("parses fenced JSON from the model", async () => {
    const generator = new FakeGenerator({
      reply: () =>
        '```json\n{"keywords": [" refund ", "policy", "refund"], "queries": ["How do refunds work?"], "hyde_hint": "A refund policy section"}\n```',
    });

    expect(await expandQuery(generator, "refund rules?")).toEqual({
      keywords: ["refund", "policy"],
      queries: ["How do refunds work?"],
      hydeHint: "A refund policy section",
    });
  });

  it("falls back to the question when the output is malformed", async () => {
    const generator = new FakeGenerator({ reply: () => "Sure! Here are some keywords: refund, policy" });

    expect(await expandQuery(generator, "refund rules?")).toEqual({
      keywords: ["refund rules?"],
      queries: ["refund rules?"],
      hydeHint: "refund rules?",
    });
  });

  it("falls back when the model call fails", async () => {
    const generator = new FakeGenerator({
      reply: () => {
        throw new Error("model timeout");
      },
    });

    expect((await expandQuery(generator, "q")).keywords).toEqual(["q"]);
    expect(await generateHypotheticalPassage(generator, "q", "hint")).toBeNull();
  });

  it("treats an empty hypothetical passage as none", async () => {
    expect(await generateHypotheticalPassage(new FakeGenerator({ reply: () => "   " }), "q", "hint")).toBeNull();
  });

  it("keeps at most two paraphrases that differ from the question", () => {
    expect(distinctVariants("q", ["q", " a ", "a", "", "b", "c"])).toEqual(["a", "b"]);
  });

  it("strips a code fence and leaves plain text alone", () => {
    expect(stripCodeFence("```sql\nSELECT 1\n```")).toBe("SELECT 1");
    expect(stripCodeFence("  SELECT 2 ")).toBe("SELECT 2");
  });
});

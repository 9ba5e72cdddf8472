import registerDebug from "debug";
import { z } from "zod";
import { describeError } from "../domain/errors.js";
import { GenerationClient } from "../infra/ai/types.js";
import { questionPrefix } from "../utils/text.js";

const debugExpansion = registerDebug("kbqa:expansion");

export interface QueryExpansion {
  keywords: string[];
  queries: string[];
  hydeHint: string;
}

const expansionSchema = z.object({
  keywords: z.array(z.string()),
  queries: z.array(z.string()),
  hyde_hint: z.string(),
});

const EXPANSION_INSTRUCTIONS = [
  "You optimise search queries for a knowledge base built from database records and documents.",
  "Reply with JSON only, no prose, in exactly this shape:",
  '{"keywords": ["..."], "queries": ["..."], "hyde_hint": "..."}',
  "keywords: 2-5 core terms for exact full-text matching.",
  "queries: 3 paraphrases of the question with the same meaning.",
  "hyde_hint: one sentence describing what a matching record or passage would contain.",
].join("\n");

const HYDE_INSTRUCTIONS = [
  "Write a short passage (50-100 words) that would answer the question if it existed in the knowledge base,",
  "written as if it were a real record or document excerpt. Output the passage only.",
].join(" ");

export function fallbackExpansion(question: string): QueryExpansion {
  return { keywords: [question], queries: [question], hydeHint: question };
}

/** Never throws: malformed output or a transport error yields the question itself on every path. */
export async function expandQuery(
  generator: GenerationClient,
  question: string,
  signal?: AbortSignal,
): Promise<QueryExpansion> {
  try {
    const raw = await generator.complete(
      [
        { role: "system", content: EXPANSION_INSTRUCTIONS },
        { role: "user", content: `Question: ${question}` },
      ],
      signal,
    );
    const parsed = expansionSchema.parse(JSON.parse(stripCodeFence(raw)));
    const keywords = cleanList(parsed.keywords);
    const queries = cleanList(parsed.queries);
    return {
      keywords: keywords.length > 0 ? keywords : [question],
      queries: queries.length > 0 ? queries : [question],
      hydeHint: parsed.hyde_hint.trim() || question,
    };
  } catch (error) {
    debugExpansion(`expansion failed for "${questionPrefix(question)}": ${describeError(error)}`);
    return fallbackExpansion(question);
  }
}

/** Returns null when no usable passage came back. */
export async function generateHypotheticalPassage(
  generator: GenerationClient,
  question: string,
  hint: string,
  signal?: AbortSignal,
): Promise<string | null> {
  try {
    const passage = await generator.complete(
      [
        { role: "system", content: HYDE_INSTRUCTIONS },
        { role: "user", content: `Question: ${question}\nHint: ${hint}` },
      ],
      signal,
    );
    return passage.trim() || null;
  } catch (error) {
    debugExpansion(`hyde failed for "${questionPrefix(question)}": ${describeError(error)}`);
    return null;
  }
}

/** Up to `limit` paraphrases that differ from the question, first occurrence wins. */
export function distinctVariants(question: string, queries: string[], limit = 2): string[] {
  const seen = new Set([question.trim()]);
  const variants: string[] = [];
  for (const query of queries) {
    const trimmed = query.trim();
    if (!trimmed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    variants.push(trimmed);
    if (variants.length >= limit) {
      break;
    }
  }
  return variants;
}

export function stripCodeFence(text: string): string {
  const fenced = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/.exec(text);
  return (fenced ? fenced[1] : text).trim();
}

function cleanList(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))];
}

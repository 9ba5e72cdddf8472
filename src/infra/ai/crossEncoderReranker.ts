import { z } from "zod";
import { Reranker } from "./types.js";

interface CrossEncoderRerankerOptions {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

const rerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    }),
  ),
});

/** Below any score a cross-encoder returns, and still a number once serialised to JSON. */
export const OMITTED_DOCUMENT_SCORE = -1_000_000;

/**
 * Scores (query, document) pairs against a cross-encoder served behind a Cohere/Jina style
 * `/rerank` endpoint. Documents the service leaves out of its results get `OMITTED_DOCUMENT_SCORE`.
 */
export class CrossEncoderReranker implements Reranker {
  constructor(private readonly options: CrossEncoderRerankerOptions) {}

  async rerank(query: string, documents: string[]): Promise<number[]> {
    if (documents.length === 0) {
      return [];
    }

    const response = await fetch(`${this.options.baseUrl.replace(/\/+$/, "")}/rerank`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.model,
        query,
        documents,
        top_n: documents.length,
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
    });

    if (!response.ok) {
      throw new Error(`Rerank failed (${response.status}): ${await response.text()}`);
    }

    const data = rerankResponseSchema.parse(await response.json());
    const scores = new Array<number>(documents.length).fill(OMITTED_DOCUMENT_SCORE);
    for (const result of data.results) {
      if (result.index < documents.length) {
        scores[result.index] = result.relevance_score;
      }
    }
    return scores;
  }
}

import registerDebug from "debug";
import { describeError } from "../domain/errors.js";
import {
  CandidateSource,
  ChunkRecord,
  PipelineStep,
  RetrievalPath,
  RetrievedChunk,
  VectorHit,
} from "../domain/types.js";
import { Reranker } from "../infra/ai/types.js";
import { LexicalIndex } from "../services/lexicalIndex.js";
import { VectorIndex } from "../services/vectorIndex.js";
import { questionPrefix } from "../utils/text.js";
import { QueryExpansion, distinctVariants } from "./queryExpansion.js";

const debugFusion = registerDebug("kbqa:fusion");
const debugFusionError = registerDebug("kbqa:fusion:error");

const SUBSTRING_SIMILARITY = 0.99;

export interface RetrievalFusionDeps {
  vectorIndex: VectorIndex;
  lexicalIndex: LexicalIndex;
  reranker: Reranker | null;
  candidateMultiplier: number;
}

export interface FusionInput {
  question: string;
  dataSourceId: string | null;
  topK: number;
  expansion: QueryExpansion;
  hydePassage: string | null;
}

export interface FusionResult {
  chunks: RetrievedChunk[];
  poolSize: number;
  lexicalHits: number;
  maxVectorSimilarity: number;
  reranked: boolean;
  trace: PipelineStep[];
}

export class RetrievalFusion {
  constructor(private readonly deps: RetrievalFusionDeps) {}

  get rerankerEnabled(): boolean {
    return this.deps.reranker !== null;
  }

  candidatePoolSize(topK: number): number {
    return topK * (this.deps.reranker ? this.deps.candidateMultiplier : 1);
  }

  async retrieve(input: FusionInput): Promise<FusionResult> {
    const trace: PipelineStep[] = [];
    const poolSize = this.candidatePoolSize(input.topK);

    const vectorHits = await this.searchVectorPaths(input, poolSize, trace);
    const lexical = await this.searchLexical(input, trace);

    const merged = mergeCandidates(lexical, vectorHits);
    // Measured before truncation: lexical hits can fill the pool and push every vector hit out.
    const maxSimilarity = maxVectorSimilarity(merged);
    const pool = merged.slice(0, poolSize);
    trace.push({
      step: "merge",
      candidates: pool.length,
      maxSimilarity: Math.round(maxSimilarity * 1000) / 1000,
      lexicalHits: lexical.length,
    });

    const ranked = await rerankCandidates(this.deps.reranker, input.question, pool, input.topK);
    if (ranked.step) {
      trace.push(ranked.step);
    }
    debugFusion(
      `"${questionPrefix(input.question)}" -> ${ranked.chunks.length} chunks (pool ${pool.length}, max ${maxSimilarity.toFixed(3)})`,
    );

    return {
      chunks: ranked.chunks,
      poolSize,
      lexicalHits: lexical.length,
      maxVectorSimilarity: maxSimilarity,
      reranked: ranked.reranked,
      trace,
    };
  }

  /** Question first, then paraphrases, then the HyDE passage; the first path to surface a chunk keeps it. */
  private async searchVectorPaths(
    input: FusionInput,
    poolSize: number,
    trace: PipelineStep[],
  ): Promise<RetrievedChunk[]> {
    const seen = new Set<string>();
    const collected: RetrievedChunk[] = [];
    const collect = (hits: VectorHit[], path: RetrievalPath) => {
      for (const hit of hits) {
        if (seen.has(hit.chunk.id)) {
          continue;
        }
        seen.add(hit.chunk.id);
        collected.push(toRetrieved(hit.chunk, hit.similarity, "vector", path));
      }
      trace.push({ step: "vector_search", path, hits: hits.length });
    };

    collect(await this.searchVector(input.question, input.dataSourceId, poolSize), "question");

    for (const variant of distinctVariants(input.question, input.expansion.queries)) {
      try {
        collect(await this.searchVector(variant, input.dataSourceId, poolSize), "variant");
      } catch (error) {
        this.logSoftFailure("variant_search", input, error);
      }
    }

    if (input.hydePassage) {
      try {
        collect(await this.searchVector(input.hydePassage, input.dataSourceId, poolSize), "hyde");
      } catch (error) {
        this.logSoftFailure("hyde_search", input, error);
      }
    }

    return collected;
  }

  private async searchVector(text: string, dataSourceId: string | null, topK: number): Promise<VectorHit[]> {
    const embedding = await this.deps.vectorIndex.embedQuery(text);
    return this.deps.vectorIndex.search(embedding, { topK, dataSourceId });
  }

  private async searchLexical(input: FusionInput, trace: PipelineStep[]): Promise<RetrievedChunk[]> {
    const keywords = input.expansion.keywords;
    const limit = input.topK * 2;

    if (!input.dataSourceId) {
      const matches = await this.deps.lexicalIndex.searchSubstring(keywords, limit);
      trace.push({ step: "keyword_search", hits: matches.length });
      return matches.map((chunk) => toRetrieved(chunk, SUBSTRING_SIMILARITY, "keyword", "substring"));
    }

    const query = keywords.join(" ");
    try {
      const hits = await this.deps.lexicalIndex.search(input.dataSourceId, query, limit);
      trace.push({ step: "bm25_search", hits: hits.length, query: query.slice(0, 50) });
      return hits.map((hit) => ({
        ...toRetrieved(hit.chunk, hit.similarity, "bm25", "lexical"),
        bm25Score: hit.score,
      }));
    } catch (error) {
      this.logSoftFailure("bm25_search", input, error);
      const matches = await this.deps.lexicalIndex.searchSubstring(keywords, limit, input.dataSourceId);
      trace.push({ step: "keyword_search", hits: matches.length });
      return matches.map((chunk) => toRetrieved(chunk, SUBSTRING_SIMILARITY, "keyword", "substring"));
    }
  }

  private logSoftFailure(step: string, input: FusionInput, error: unknown): void {
    debugFusionError(
      `${step} failed (data source ${input.dataSourceId ?? "none"}, "${questionPrefix(input.question)}"): ${describeError(error)}`,
    );
  }
}

/**
 * Lexical hits go in first, then vector hits by descending similarity, each chunk once.
 * Non-vector sources sort ahead of vector ones; the sort is stable, so equal keys keep
 * fusion order.
 */
export function mergeCandidates(
  lexical: RetrievedChunk[],
  vector: RetrievedChunk[],
  poolSize = Number.POSITIVE_INFINITY,
): RetrievedChunk[] {
  const seen = new Set<string>();
  const merged: RetrievedChunk[] = [];

  for (const item of lexical) {
    if (!seen.has(item.chunkId)) {
      seen.add(item.chunkId);
      merged.push(item);
    }
  }
  for (const item of [...vector].sort((a, b) => b.similarity - a.similarity)) {
    if (!seen.has(item.chunkId)) {
      seen.add(item.chunkId);
      merged.push(item);
    }
  }

  merged.sort((a, b) => {
    const priority = sourcePriority(b.source) - sourcePriority(a.source);
    return priority !== 0 ? priority : b.similarity - a.similarity;
  });
  return merged.slice(0, Math.max(0, poolSize));
}

/** Lexical similarities are normalised per query and say nothing about semantic closeness. */
export function maxVectorSimilarity(chunks: RetrievedChunk[]): number {
  let max = 0;
  for (const chunk of chunks) {
    if (chunk.source === "vector" && chunk.similarity > max) {
      max = chunk.similarity;
    }
  }
  return max;
}

export interface RerankOutcome {
  chunks: RetrievedChunk[];
  reranked: boolean;
  step: PipelineStep | null;
}

/** A failing reranker leaves fusion order in place, cut to `topK`. */
export async function rerankCandidates(
  reranker: Reranker | null,
  question: string,
  pool: RetrievedChunk[],
  topK: number,
): Promise<RerankOutcome> {
  if (!reranker || pool.length === 0) {
    return { chunks: pool.slice(0, topK), reranked: false, step: null };
  }

  try {
    const scores = await reranker.rerank(
      question,
      pool.map((chunk) => chunk.text),
    );
    if (scores.length !== pool.length) {
      throw new Error(`Reranker returned ${scores.length} scores for ${pool.length} candidates.`);
    }
    const chunks = pool
      .map((chunk, index) => ({ ...chunk, rerankScore: scores[index] }))
      .sort((a, b) => b.rerankScore - a.rerankScore)
      .slice(0, topK);
    return {
      chunks,
      reranked: true,
      step: { step: "rerank", input: pool.length, output: chunks.length },
    };
  } catch (error) {
    debugFusionError(`rerank failed for "${questionPrefix(question)}": ${describeError(error)}`);
    return {
      chunks: pool.slice(0, topK),
      reranked: false,
      step: { step: "rerank", input: pool.length, output: Math.min(pool.length, topK), error: describeError(error) },
    };
  }
}

function sourcePriority(source: CandidateSource): number {
  return source === "vector" ? 0 : 1;
}

function toRetrieved(
  chunk: ChunkRecord,
  similarity: number,
  source: CandidateSource,
  retrievedBy: RetrievalPath,
): RetrievedChunk {
  return {
    chunkId: chunk.id,
    dataSourceId: chunk.dataSourceId,
    text: chunk.text,
    locator: chunk.locator,
    metadata: chunk.metadata,
    similarity,
    source,
    retrievedBy,
  };
}

import registerDebug from "debug";
import { KnowledgeStore } from "../domain/knowledgeStore.js";
import { ChunkRecord } from "../domain/types.js";
import { Tokenizer } from "../utils/text.js";

const debugLexical = registerDebug("kbqa:lexical");

const BM25_K1 = 1.2;
const BM25_B = 0.75;
const MAX_LEXICAL_SIMILARITY = 0.99;

interface LexicalDocument {
  chunk: ChunkRecord;
  tf: Map<string, number>;
  docLength: number;
}

interface LexicalCorpus {
  documents: LexicalDocument[];
  docFreq: Map<string, number>;
  avgDocLength: number;
}

export interface LexicalHit {
  chunk: ChunkRecord;
  score: number;
  /** Raw score over the best score of this query, scaled into (0, 0.99]. */
  similarity: number;
}

export interface LexicalIndexDeps {
  store: KnowledgeStore;
  tokenizer: Tokenizer;
}

/**
 * Per data source BM25 corpora built from the stored chunks on first query. `invalidate`
 * drops a corpus and bumps its generation so that a build started before the invalidation
 * is handed to its own caller but never cached.
 */
export class LexicalIndex {
  private readonly corpora = new Map<string, LexicalCorpus>();

  private readonly pending = new Map<string, Promise<LexicalCorpus>>();

  private readonly generations = new Map<string, number>();

  constructor(private readonly deps: LexicalIndexDeps) {}

  get tokenizer(): Tokenizer {
    return this.deps.tokenizer;
  }

  has(dataSourceId: string): boolean {
    return this.corpora.has(dataSourceId);
  }

  invalidate(dataSourceId: string): void {
    this.corpora.delete(dataSourceId);
    this.pending.delete(dataSourceId);
    this.generations.set(dataSourceId, this.generation(dataSourceId) + 1);
    debugLexical(`invalidated ${dataSourceId}`);
  }

  async search(dataSourceId: string, query: string, limit: number): Promise<LexicalHit[]> {
    const queryTokens = [...new Set(this.deps.tokenizer.tokenize(query))];
    if (queryTokens.length === 0 || limit <= 0) {
      return [];
    }

    const corpus = await this.resolveCorpus(dataSourceId);
    if (corpus.documents.length === 0) {
      return [];
    }

    const scored: Array<{ chunk: ChunkRecord; score: number }> = [];
    for (const doc of corpus.documents) {
      let score = 0;
      for (const token of queryTokens) {
        const tf = doc.tf.get(token) ?? 0;
        if (tf === 0) {
          continue;
        }
        const df = corpus.docFreq.get(token) ?? 0;
        const idf = Math.log(1 + (corpus.documents.length - df + 0.5) / (df + 0.5));
        const numerator = tf * (BM25_K1 + 1);
        const denominator =
          tf + BM25_K1 * (1 - BM25_B + BM25_B * (doc.docLength / Math.max(corpus.avgDocLength, 1e-9)));
        score += idf * (numerator / Math.max(denominator, 1e-9));
      }
      if (score > 0) {
        scored.push({ chunk: doc.chunk, score });
      }
    }

    scored.sort((a, b) => b.score - a.score);
    const top = scored.slice(0, limit);
    const best = top[0]?.score ?? 0;
    return top.map((hit) => ({
      ...hit,
      similarity: (hit.score / best) * MAX_LEXICAL_SIMILARITY,
    }));
  }

  /**
   * Unscoped questions have no corpus to rank against, so they match stored text directly.
   * Also the fallback when a scoped BM25 query fails.
   */
  async searchSubstring(keywords: string[], limit: number, dataSourceId: string | null = null): Promise<ChunkRecord[]> {
    if (limit <= 0) {
      return [];
    }
    return this.deps.store.searchText({ keywords, limit, dataSourceId });
  }

  private resolveCorpus(dataSourceId: string): Promise<LexicalCorpus> {
    const cached = this.corpora.get(dataSourceId);
    if (cached) {
      return Promise.resolve(cached);
    }
    const inFlight = this.pending.get(dataSourceId);
    if (inFlight) {
      return inFlight;
    }

    const generation = this.generation(dataSourceId);
    const build = this.build(dataSourceId)
      .then((corpus) => {
        if (this.generation(dataSourceId) === generation) {
          this.corpora.set(dataSourceId, corpus);
        }
        return corpus;
      })
      .finally(() => {
        if (this.pending.get(dataSourceId) === build) {
          this.pending.delete(dataSourceId);
        }
      });
    this.pending.set(dataSourceId, build);
    return build;
  }

  private async build(dataSourceId: string): Promise<LexicalCorpus> {
    const chunks = await this.deps.store.listChunks(dataSourceId);
    const documents: LexicalDocument[] = [];
    const docFreq = new Map<string, number>();
    let totalDocLength = 0;

    for (const chunk of chunks) {
      const tokens = this.deps.tokenizer.tokenize(chunk.text);
      if (tokens.length === 0) {
        continue;
      }
      const tf = new Map<string, number>();
      for (const token of tokens) {
        tf.set(token, (tf.get(token) ?? 0) + 1);
      }
      for (const token of tf.keys()) {
        docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
      }
      totalDocLength += tokens.length;
      documents.push({ chunk, tf, docLength: tokens.length });
    }

    debugLexical(`built ${dataSourceId}: ${documents.length} documents, ${docFreq.size} terms`);
    return {
      documents,
      docFreq,
      avgDocLength: documents.length > 0 ? totalDocLength / documents.length : 0,
    };
  }

  private generation(dataSourceId: string): number {
    return this.generations.get(dataSourceId) ?? 0;
  }
}

import { KnowledgeStore } from "../domain/knowledgeStore.js";
import { VectorHit, VectorRecord } from "../domain/types.js";
import { EmbeddingProvider } from "../infra/ai/types.js";
import { EmbeddingCache } from "../infra/cache/embeddingCache.js";

export interface VectorIndexDeps {
  store: KnowledgeStore;
  embedder: EmbeddingProvider;
  cache: EmbeddingCache;
}

export interface VectorSearchOptions {
  topK: number;
  /** Omitted or null searches every data source. */
  dataSourceId?: string | null;
}

export class VectorIndex {
  constructor(private readonly deps: VectorIndexDeps) {}

  get dimension(): number {
    return this.deps.embedder.dimension;
  }

  /** Sync-time batch embedding. Goes straight to the provider; the cache is for queries. */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const embeddings = await this.deps.embedder.embedBatch(texts);
    if (embeddings.length !== texts.length) {
      throw new Error(`Embedding provider returned ${embeddings.length} vectors for ${texts.length} texts.`);
    }
    return embeddings;
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.deps.cache.getOrCompute(text, async (value) => {
      const [embedding] = await this.deps.embedder.embedBatch([value]);
      if (!embedding || embedding.length === 0) {
        throw new Error("Embedding provider returned no vector for the query.");
      }
      return embedding;
    });
  }

  async store(vectors: VectorRecord[]): Promise<void> {
    await this.deps.store.insertVectors(vectors);
  }

  /** An empty scope returns no hits; similarity is never invented for it. */
  async search(embedding: number[], options: VectorSearchOptions): Promise<VectorHit[]> {
    if (options.topK <= 0) {
      return [];
    }
    const count = await this.deps.store.countVectors(options.dataSourceId ?? null);
    if (count === 0) {
      return [];
    }
    return this.deps.store.searchVectors({
      embedding,
      topK: options.topK,
      dataSourceId: options.dataSourceId ?? null,
    });
  }
}

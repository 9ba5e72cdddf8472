import { randomUUID } from "node:crypto";
import { DimensionMismatchError } from "../../domain/errors.js";
import {
  CreateDataSourceInput,
  KnowledgeStore,
  ListQaRecordsInput,
  TextSearchInput,
  VectorSearchInput,
} from "../../domain/knowledgeStore.js";
import {
  ChunkRecord,
  DataSourceRecord,
  NewChunk,
  NewQaRecord,
  QaRecord,
  SyncStatePatch,
  VectorHit,
  VectorRecord,
} from "../../domain/types.js";
import { cosineSimilarity, toSimilarity } from "../../utils/vector.js";

export interface InMemoryKnowledgeStoreOptions {
  /** When set, every inserted vector must have exactly this many components. */
  vectorDimension?: number;
  now?: () => Date;
}

/** Single-process store for tests and demos. Nothing survives a restart. */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly dataSources = new Map<string, DataSourceRecord>();

  private readonly chunksByDataSource = new Map<string, ChunkRecord[]>();

  private readonly chunkById = new Map<string, ChunkRecord>();

  private readonly vectorByChunkId = new Map<string, number[]>();

  private readonly qaRecords: QaRecord[] = [];

  private readonly now: () => Date;

  constructor(private readonly options: InMemoryKnowledgeStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async createDataSource(input: CreateDataSourceInput): Promise<DataSourceRecord> {
    const record: DataSourceRecord = {
      id: randomUUID(),
      name: input.name,
      kind: input.descriptor.kind,
      descriptor: input.descriptor,
      chunkStrategy: input.chunkStrategy ?? null,
      syncState: "pending",
      syncProgress: 0,
      lastSyncedAt: null,
      lastError: null,
      ownerId: input.ownerId ?? null,
      createdAt: this.now().toISOString(),
    };
    this.dataSources.set(record.id, record);
    return { ...record };
  }

  async getDataSource(id: string): Promise<DataSourceRecord | null> {
    const record = this.dataSources.get(id);
    return record ? { ...record } : null;
  }

  async listDataSources(ownerId?: string | null): Promise<DataSourceRecord[]> {
    return [...this.dataSources.values()]
      .filter((record) => !ownerId || record.ownerId === ownerId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((record) => ({ ...record }));
  }

  async deleteDataSource(id: string): Promise<boolean> {
    if (!this.dataSources.has(id)) {
      return false;
    }
    await this.deleteChunks(id);
    this.dataSources.delete(id);
    return true;
  }

  async updateSyncState(id: string, patch: SyncStatePatch): Promise<void> {
    const record = this.dataSources.get(id);
    if (!record) {
      return;
    }
    this.dataSources.set(id, { ...record, ...patch });
  }

  async deleteChunks(dataSourceId: string): Promise<number> {
    const chunks = this.chunksByDataSource.get(dataSourceId) ?? [];
    for (const chunk of chunks) {
      this.chunkById.delete(chunk.id);
      this.vectorByChunkId.delete(chunk.id);
    }
    this.chunksByDataSource.delete(dataSourceId);
    return chunks.length;
  }

  async insertChunks(dataSourceId: string, chunks: NewChunk[]): Promise<ChunkRecord[]> {
    const existing = this.chunksByDataSource.get(dataSourceId) ?? [];
    const inserted = chunks.map((chunk) => ({
      ...chunk,
      id: randomUUID(),
      dataSourceId,
    }));
    for (const chunk of inserted) {
      this.chunkById.set(chunk.id, chunk);
    }
    this.chunksByDataSource.set(dataSourceId, [...existing, ...inserted]);
    return inserted;
  }

  async listChunks(dataSourceId: string): Promise<ChunkRecord[]> {
    return [...(this.chunksByDataSource.get(dataSourceId) ?? [])];
  }

  async countChunks(dataSourceId: string): Promise<number> {
    return this.chunksByDataSource.get(dataSourceId)?.length ?? 0;
  }

  async insertVectors(vectors: VectorRecord[]): Promise<void> {
    const expected = this.options.vectorDimension;
    for (const vector of vectors) {
      if (expected !== undefined && vector.embedding.length !== expected) {
        throw new DimensionMismatchError(expected, vector.embedding.length);
      }
      if (!this.chunkById.has(vector.chunkId)) {
        throw new Error(`Cannot store a vector for unknown chunk ${vector.chunkId}.`);
      }
    }
    for (const vector of vectors) {
      this.vectorByChunkId.set(vector.chunkId, vector.embedding);
    }
  }

  async countVectors(dataSourceId?: string | null): Promise<number> {
    if (!dataSourceId) {
      return this.vectorByChunkId.size;
    }
    return (this.chunksByDataSource.get(dataSourceId) ?? []).filter((chunk) =>
      this.vectorByChunkId.has(chunk.id),
    ).length;
  }

  async searchVectors(input: VectorSearchInput): Promise<VectorHit[]> {
    const hits: VectorHit[] = [];
    for (const chunk of this.scopedChunks(input.dataSourceId)) {
      const embedding = this.vectorByChunkId.get(chunk.id);
      if (!embedding) {
        continue;
      }
      hits.push({
        chunk,
        similarity: toSimilarity(cosineSimilarity(input.embedding, embedding)),
      });
    }
    return hits.sort((a, b) => b.similarity - a.similarity).slice(0, Math.max(0, input.topK));
  }

  async searchText(input: TextSearchInput): Promise<ChunkRecord[]> {
    const needles = input.keywords.map((keyword) => keyword.trim().toLowerCase()).filter(Boolean);
    if (needles.length === 0) {
      return [];
    }

    const matches: ChunkRecord[] = [];
    for (const chunk of this.scopedChunks(input.dataSourceId)) {
      const haystack = chunk.text.toLowerCase();
      if (needles.some((needle) => haystack.includes(needle))) {
        matches.push(chunk);
        if (matches.length >= input.limit) {
          break;
        }
      }
    }
    return matches;
  }

  async saveQaRecord(record: NewQaRecord): Promise<QaRecord> {
    const saved: QaRecord = Object.freeze({
      ...record,
      id: randomUUID(),
      createdAt: this.now().toISOString(),
    });
    this.qaRecords.push(saved);
    return saved;
  }

  async listQaRecords(input: ListQaRecordsInput = {}): Promise<QaRecord[]> {
    const limit = input.limit && input.limit > 0 ? input.limit : 50;
    return this.qaRecords
      .filter((record) => !input.userId || record.userId === input.userId)
      .filter((record) => !input.dataSourceId || record.dataSourceId === input.dataSourceId)
      .slice()
      .reverse()
      .slice(0, limit);
  }

  async close(): Promise<void> {}

  private *scopedChunks(dataSourceId?: string | null): Iterable<ChunkRecord> {
    if (dataSourceId) {
      yield* this.chunksByDataSource.get(dataSourceId) ?? [];
      return;
    }
    for (const chunks of this.chunksByDataSource.values()) {
      yield* chunks;
    }
  }
}

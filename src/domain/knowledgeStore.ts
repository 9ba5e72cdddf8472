import {
  ChunkRecord,
  ChunkStrategy,
  DataSourceRecord,
  NewChunk,
  NewQaRecord,
  QaRecord,
  SourceDescriptor,
  SyncStatePatch,
  VectorHit,
  VectorRecord,
} from "./types.js";

export interface CreateDataSourceInput {
  name: string;
  descriptor: SourceDescriptor;
  chunkStrategy?: ChunkStrategy | null;
  ownerId?: string | null;
}

export interface VectorSearchInput {
  embedding: number[];
  topK: number;
  /** Absent means a global search across every data source. */
  dataSourceId?: string | null;
}

export interface TextSearchInput {
  keywords: string[];
  limit: number;
  dataSourceId?: string | null;
}

export interface ListQaRecordsInput {
  userId?: string | null;
  dataSourceId?: string | null;
  limit?: number;
}

/**
 * Durable storage for data sources, their chunks and vectors, and the QA audit trail.
 * Deleting a data source cascades to its chunks and vectors; deleting chunks cascades to vectors.
 */
export interface KnowledgeStore {
  createDataSource(input: CreateDataSourceInput): Promise<DataSourceRecord>;
  getDataSource(id: string): Promise<DataSourceRecord | null>;
  listDataSources(ownerId?: string | null): Promise<DataSourceRecord[]>;
  deleteDataSource(id: string): Promise<boolean>;
  updateSyncState(id: string, patch: SyncStatePatch): Promise<void>;

  deleteChunks(dataSourceId: string): Promise<number>;
  insertChunks(dataSourceId: string, chunks: NewChunk[]): Promise<ChunkRecord[]>;
  listChunks(dataSourceId: string): Promise<ChunkRecord[]>;
  countChunks(dataSourceId: string): Promise<number>;

  insertVectors(vectors: VectorRecord[]): Promise<void>;
  countVectors(dataSourceId?: string | null): Promise<number>;
  searchVectors(input: VectorSearchInput): Promise<VectorHit[]>;
  searchText(input: TextSearchInput): Promise<ChunkRecord[]>;

  saveQaRecord(record: NewQaRecord): Promise<QaRecord>;
  listQaRecords(input?: ListQaRecordsInput): Promise<QaRecord[]>;

  close(): Promise<void>;
}

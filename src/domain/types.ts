export type DataSourceKind = "database" | "file" | "web";

export type DatabaseEngine = "postgresql" | "mysql" | "sqlite";

export type ChunkStrategy = "fixed" | "paragraph" | "sentence" | "smart";

export type SyncState = "pending" | "syncing" | "synced" | "error";

export interface TableConfig {
  table: string;
  columns?: string[] | null;
}

export interface DatabaseDescriptor {
  kind: "database";
  engine: DatabaseEngine;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
  /** SQLite only. */
  filePath?: string;
  tables?: TableConfig[];
}

export interface FileDescriptor {
  kind: "file";
  directory: string;
  /** Restricts the sync to these file names inside `directory`. */
  files?: string[];
}

export interface WebDescriptor {
  kind: "web";
  urls: string[];
}

export type SourceDescriptor = DatabaseDescriptor | FileDescriptor | WebDescriptor;

export interface DataSourceRecord {
  id: string;
  name: string;
  kind: DataSourceKind;
  descriptor: SourceDescriptor;
  chunkStrategy: ChunkStrategy | null;
  syncState: SyncState;
  syncProgress: number;
  lastSyncedAt: string | null;
  lastError: string | null;
  ownerId: string | null;
  createdAt: string;
}

export interface SyncStatePatch {
  syncState?: SyncState;
  syncProgress?: number;
  lastSyncedAt?: string | null;
  lastError?: string | null;
}

/** Table + row id for database rows, file name + chunk offset for documents, URL for pages. */
export interface SourceLocator {
  unit: string;
  rowId: string | null;
}

export interface ChunkRecord {
  id: string;
  dataSourceId: string;
  locator: SourceLocator;
  index: number;
  text: string;
  metadata: Record<string, unknown>;
}

export interface NewChunk {
  locator: SourceLocator;
  index: number;
  text: string;
  metadata: Record<string, unknown>;
}

export interface VectorRecord {
  chunkId: string;
  embedding: number[];
}

export interface VectorHit {
  chunk: ChunkRecord;
  similarity: number;
}

/** Vector search and substring search never change the meaning of `source`; HyDE hits are still vector hits. */
export type CandidateSource = "vector" | "bm25" | "keyword";

export type RetrievalPath = "question" | "variant" | "hyde" | "lexical" | "substring";

export interface RetrievedChunk {
  chunkId: string;
  dataSourceId: string;
  text: string;
  locator: SourceLocator;
  metadata: Record<string, unknown>;
  similarity: number;
  source: CandidateSource;
  retrievedBy: RetrievalPath;
  bm25Score?: number;
  rerankScore?: number;
}

export interface PipelineStep {
  step: string;
  [detail: string]: unknown;
}

export interface ConversationTurn {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface QaRecord {
  readonly id: string;
  readonly userId: string | null;
  readonly dataSourceId: string | null;
  readonly question: string;
  readonly answer: string;
  readonly chunks: ReadonlyArray<{
    readonly chunkId: string;
    readonly similarity: number;
    readonly source: CandidateSource;
    readonly unit: string;
    readonly rerankScore: number | null;
  }>;
  readonly trace: ReadonlyArray<PipelineStep>;
  readonly details: Readonly<Record<string, unknown>>;
  readonly createdAt: string;
}

export type NewQaRecord = Omit<QaRecord, "id" | "createdAt">;

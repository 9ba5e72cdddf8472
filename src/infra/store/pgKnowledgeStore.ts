import { randomUUID } from "node:crypto";
import registerDebug from "debug";
import { Pool } from "pg";
import { z } from "zod";
import { DimensionMismatchError } from "../../domain/errors.js";
import {
  CreateDataSourceInput,
  KnowledgeStore,
  ListQaRecordsInput,
  TextSearchInput,
  VectorSearchInput,
} from "../../domain/knowledgeStore.js";
import {
  chunkStrategySchema,
  pipelineStepSchema,
  qaChunkRefSchema,
  sourceDescriptorSchema,
  syncStateSchema,
} from "../../domain/schemas.js";
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
import { toSimilarity, toVectorLiteral } from "../../utils/vector.js";

const debugStore = registerDebug("kbqa:store:pg");

interface PgDataSourceRow {
  id: string;
  name: string;
  descriptor: unknown;
  chunk_strategy: string | null;
  sync_state: string;
  sync_progress: number;
  last_synced_at: Date | null;
  last_error: string | null;
  owner_id: string | null;
  created_at: Date;
}

interface PgChunkRow {
  id: string;
  data_source_id: string;
  unit: string;
  row_id: string | null;
  chunk_index: number;
  chunk_text: string;
  metadata: Record<string, unknown> | null;
}

interface PgQaRecordRow {
  id: string;
  user_id: string | null;
  data_source_id: string | null;
  question: string;
  answer: string;
  chunks: unknown;
  trace: unknown;
  details: Record<string, unknown> | null;
  created_at: Date;
}

export interface PgKnowledgeStoreOptions {
  vectorDimension: number;
  /** Drop stored vectors and mark every data source pending when the dimension changed. */
  reembedOnDimensionChange?: boolean;
}

const CHUNK_COLUMNS = "id, data_source_id, unit, row_id, chunk_index, chunk_text, metadata";

export class PgKnowledgeStore implements KnowledgeStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly options: PgKnowledgeStoreOptions,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS data_sources (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        kind TEXT NOT NULL,
        descriptor JSONB NOT NULL,
        chunk_strategy TEXT,
        sync_state TEXT NOT NULL DEFAULT 'pending',
        sync_progress INTEGER NOT NULL DEFAULT 0,
        last_synced_at TIMESTAMPTZ,
        last_error TEXT,
        owner_id TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS document_chunks (
        id TEXT PRIMARY KEY,
        data_source_id TEXT NOT NULL REFERENCES data_sources(id) ON DELETE CASCADE,
        unit TEXT NOT NULL,
        row_id TEXT,
        chunk_index INTEGER NOT NULL,
        chunk_text TEXT NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb
      )
    `);
    await this.ensureVectorTable();
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS qa_records (
        id TEXT PRIMARY KEY,
        user_id TEXT,
        data_source_id TEXT,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        chunks JSONB NOT NULL,
        trace JSONB NOT NULL,
        details JSONB NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_document_chunks_ds ON document_chunks(data_source_id)`,
    );
    await this.pool.query(`CREATE INDEX IF NOT EXISTS idx_qa_records_user ON qa_records(user_id)`);

    this.initialized = true;
  }

  async createDataSource(input: CreateDataSourceInput): Promise<DataSourceRecord> {
    const result = await this.pool.query<PgDataSourceRow>(
      `
        INSERT INTO data_sources (id, name, kind, descriptor, chunk_strategy, owner_id)
        VALUES ($1, $2, $3, $4::jsonb, $5, $6)
        RETURNING *
      `,
      [
        randomUUID(),
        input.name,
        input.descriptor.kind,
        JSON.stringify(input.descriptor),
        input.chunkStrategy ?? null,
        input.ownerId ?? null,
      ],
    );
    return toDataSourceRecord(result.rows[0]);
  }

  async getDataSource(id: string): Promise<DataSourceRecord | null> {
    const result = await this.pool.query<PgDataSourceRow>(`SELECT * FROM data_sources WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toDataSourceRecord(row) : null;
  }

  async listDataSources(ownerId?: string | null): Promise<DataSourceRecord[]> {
    const result = await this.pool.query<PgDataSourceRow>(
      `SELECT * FROM data_sources WHERE ($1::text IS NULL OR owner_id = $1) ORDER BY created_at ASC`,
      [ownerId ?? null],
    );
    return result.rows.map(toDataSourceRecord);
  }

  async deleteDataSource(id: string): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM data_sources WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async updateSyncState(id: string, patch: SyncStatePatch): Promise<void> {
    const assignments: string[] = [];
    const values: unknown[] = [id];
    const set = (column: string, value: unknown) => {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    };

    if (patch.syncState !== undefined) {
      set("sync_state", patch.syncState);
    }
    if (patch.syncProgress !== undefined) {
      set("sync_progress", patch.syncProgress);
    }
    if (patch.lastSyncedAt !== undefined) {
      set("last_synced_at", patch.lastSyncedAt);
    }
    if (patch.lastError !== undefined) {
      set("last_error", patch.lastError);
    }
    if (assignments.length === 0) {
      return;
    }

    await this.pool.query(`UPDATE data_sources SET ${assignments.join(", ")} WHERE id = $1`, values);
  }

  async deleteChunks(dataSourceId: string): Promise<number> {
    const result = await this.pool.query(`DELETE FROM document_chunks WHERE data_source_id = $1`, [
      dataSourceId,
    ]);
    return result.rowCount ?? 0;
  }

  async insertChunks(dataSourceId: string, chunks: NewChunk[]): Promise<ChunkRecord[]> {
    if (chunks.length === 0) {
      return [];
    }

    const inserted: ChunkRecord[] = chunks.map((chunk) => ({ ...chunk, id: randomUUID(), dataSourceId }));
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const chunk of inserted) {
        await client.query(
          `
            INSERT INTO document_chunks (${CHUNK_COLUMNS})
            VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)
          `,
          [
            chunk.id,
            dataSourceId,
            chunk.locator.unit,
            chunk.locator.rowId,
            chunk.index,
            chunk.text,
            JSON.stringify(chunk.metadata),
          ],
        );
      }
      await client.query("COMMIT");
      return inserted;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async listChunks(dataSourceId: string): Promise<ChunkRecord[]> {
    const result = await this.pool.query<PgChunkRow>(
      `SELECT ${CHUNK_COLUMNS} FROM document_chunks WHERE data_source_id = $1 ORDER BY unit ASC, chunk_index ASC, id ASC`,
      [dataSourceId],
    );
    return result.rows.map(toChunkRecord);
  }

  async countChunks(dataSourceId: string): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM document_chunks WHERE data_source_id = $1`,
      [dataSourceId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async insertVectors(vectors: VectorRecord[]): Promise<void> {
    if (vectors.length === 0) {
      return;
    }
    for (const vector of vectors) {
      if (vector.embedding.length !== this.options.vectorDimension) {
        throw new DimensionMismatchError(this.options.vectorDimension, vector.embedding.length);
      }
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const vector of vectors) {
        await client.query(
          `
            INSERT INTO document_vectors (chunk_id, embedding)
            VALUES ($1, $2::vector)
            ON CONFLICT (chunk_id) DO UPDATE SET embedding = EXCLUDED.embedding
          `,
          [vector.chunkId, toVectorLiteral(vector.embedding)],
        );
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async countVectors(dataSourceId?: string | null): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `
        SELECT COUNT(*)::text AS count
        FROM document_vectors dv
        JOIN document_chunks dc ON dc.id = dv.chunk_id
        WHERE ($1::text IS NULL OR dc.data_source_id = $1)
      `,
      [dataSourceId ?? null],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async searchVectors(input: VectorSearchInput): Promise<VectorHit[]> {
    const result = await this.pool.query<PgChunkRow & { distance: number }>(
      `
        SELECT dc.id, dc.data_source_id, dc.unit, dc.row_id, dc.chunk_index, dc.chunk_text, dc.metadata,
          (dv.embedding <=> $1::vector) AS distance
        FROM document_vectors dv
        JOIN document_chunks dc ON dc.id = dv.chunk_id
        WHERE ($2::text IS NULL OR dc.data_source_id = $2)
        ORDER BY dv.embedding <=> $1::vector
        LIMIT $3
      `,
      [toVectorLiteral(input.embedding), input.dataSourceId ?? null, input.topK],
    );

    return result.rows.map((row) => ({
      chunk: toChunkRecord(row),
      similarity: toSimilarity(1 - Number(row.distance)),
    }));
  }

  async searchText(input: TextSearchInput): Promise<ChunkRecord[]> {
    const patterns = input.keywords
      .map((keyword) => keyword.trim())
      .filter(Boolean)
      .map((keyword) => `%${keyword.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`);
    if (patterns.length === 0) {
      return [];
    }

    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT ${CHUNK_COLUMNS}
        FROM document_chunks
        WHERE chunk_text ILIKE ANY($1::text[])
          AND ($2::text IS NULL OR data_source_id = $2)
        ORDER BY data_source_id, unit, chunk_index
        LIMIT $3
      `,
      [patterns, input.dataSourceId ?? null, input.limit],
    );
    return result.rows.map(toChunkRecord);
  }

  async saveQaRecord(record: NewQaRecord): Promise<QaRecord> {
    const result = await this.pool.query<PgQaRecordRow>(
      `
        INSERT INTO qa_records (id, user_id, data_source_id, question, answer, chunks, trace, details)
        VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7::jsonb, $8::jsonb)
        RETURNING *
      `,
      [
        randomUUID(),
        record.userId,
        record.dataSourceId,
        record.question,
        record.answer,
        JSON.stringify(record.chunks),
        JSON.stringify(record.trace),
        JSON.stringify(record.details),
      ],
    );
    return toQaRecord(result.rows[0]);
  }

  async listQaRecords(input: ListQaRecordsInput = {}): Promise<QaRecord[]> {
    const result = await this.pool.query<PgQaRecordRow>(
      `
        SELECT * FROM qa_records
        WHERE ($1::text IS NULL OR user_id = $1)
          AND ($2::text IS NULL OR data_source_id = $2)
        ORDER BY created_at DESC
        LIMIT $3
      `,
      [input.userId ?? null, input.dataSourceId ?? null, input.limit && input.limit > 0 ? input.limit : 50],
    );
    return result.rows.map(toQaRecord);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /**
   * pgvector stores the declared dimension as the column's type modifier. A mismatch means
   * every stored vector is unusable with the active embedding model.
   */
  private async ensureVectorTable(): Promise<void> {
    const dimension = this.options.vectorDimension;
    const existing = await this.pool.query<{ dimension: number }>(
      `
        SELECT a.atttypmod AS dimension
        FROM pg_attribute a
        WHERE a.attrelid = to_regclass('document_vectors') AND a.attname = 'embedding'
      `,
    );
    const current = existing.rows[0]?.dimension;

    if (current !== undefined && current !== dimension) {
      if (!this.options.reembedOnDimensionChange) {
        throw new DimensionMismatchError(dimension, current);
      }
      debugStore(`vector dimension ${current} -> ${dimension}: dropping vectors, data sources need a re-sync`);
      await this.pool.query(`DROP TABLE document_vectors`);
      await this.pool.query(`DELETE FROM document_chunks`);
      await this.pool.query(
        `UPDATE data_sources SET sync_state = 'pending', sync_progress = 0, last_error = $1`,
        ["Embedding dimension changed; re-sync required."],
      );
    }

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS document_vectors (
        chunk_id TEXT PRIMARY KEY REFERENCES document_chunks(id) ON DELETE CASCADE,
        embedding VECTOR(${dimension}) NOT NULL
      )
    `);
  }
}

function toDataSourceRecord(row: PgDataSourceRow): DataSourceRecord {
  const descriptor = sourceDescriptorSchema.parse(row.descriptor);
  return {
    id: row.id,
    name: row.name,
    kind: descriptor.kind,
    descriptor,
    chunkStrategy: chunkStrategySchema.nullable().parse(row.chunk_strategy),
    syncState: syncStateSchema.parse(row.sync_state),
    syncProgress: row.sync_progress,
    lastSyncedAt: row.last_synced_at?.toISOString() ?? null,
    lastError: row.last_error,
    ownerId: row.owner_id,
    createdAt: row.created_at.toISOString(),
  };
}

function toChunkRecord(row: PgChunkRow): ChunkRecord {
  return {
    id: row.id,
    dataSourceId: row.data_source_id,
    locator: { unit: row.unit, rowId: row.row_id },
    index: row.chunk_index,
    text: row.chunk_text,
    metadata: row.metadata ?? {},
  };
}

function toQaRecord(row: PgQaRecordRow): QaRecord {
  return Object.freeze({
    id: row.id,
    userId: row.user_id,
    dataSourceId: row.data_source_id,
    question: row.question,
    answer: row.answer,
    chunks: z.array(qaChunkRefSchema).parse(row.chunks),
    trace: z.array(pipelineStepSchema).parse(row.trace),
    details: row.details ?? {},
    createdAt: row.created_at.toISOString(),
  });
}

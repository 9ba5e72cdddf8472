import registerDebug from "debug";
import { describeError, NotFoundError, SyncInProgressError } from "../domain/errors.js";
import { KnowledgeStore } from "../domain/knowledgeStore.js";
import { DataSourceRecord, NewChunk, SyncState } from "../domain/types.js";
import { LexicalIndex } from "./lexicalIndex.js";
import { acquireSource, AcquiredSource, defaultChunkStrategy, SourceUnitDeps } from "./sourceUnits.js";
import { VectorIndex } from "./vectorIndex.js";

const debugSync = registerDebug("kbqa:sync");
const debugSyncError = registerDebug("kbqa:sync:error");

const ACQUIRED_PROGRESS = 5;
const UNITS_START_PROGRESS = 10;
const UNITS_PROGRESS_SPAN = 80;
const EMBEDDING_BATCH_SIZE = 64;

export interface SyncProgressEvent {
  dataSourceId: string;
  state: SyncState;
  progress: number;
}

/** Anything whose cached answers depend on a data source's current index state. */
export interface VersionedCache {
  bumpVersion(dataSourceId: string): number;
}

export interface SyncPipelineDeps extends SourceUnitDeps {
  store: KnowledgeStore;
  vectorIndex: VectorIndex;
  lexicalIndex: LexicalIndex;
  versions: VersionedCache;
  chunkSize: number;
  chunkOverlap: number;
  onProgress?: (event: SyncProgressEvent) => void;
  now?: () => Date;
}

export interface SyncStatus {
  dataSourceId: string;
  state: SyncState;
  progress: number;
  error: string | null;
  chunkCount: number;
  lastSyncedAt: string | null;
  active: boolean;
}

type SyncOutcome = { ok: true; chunkCount: number } | { ok: false; error: unknown };

/**
 * Drives pending/synced/error -> syncing -> synced/error for one data source at a time.
 * `requestSync` resolves once the run is scheduled; the run itself is detached, owns its
 * source connection and never rejects.
 */
export class SyncPipeline {
  private readonly active = new Map<string, Promise<void>>();

  private readonly now: () => Date;

  constructor(private readonly deps: SyncPipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  isSyncing(dataSourceId: string): boolean {
    return this.active.has(dataSourceId);
  }

  async requestSync(dataSourceId: string): Promise<SyncStatus> {
    if (this.active.has(dataSourceId)) {
      throw new SyncInProgressError(dataSourceId);
    }

    let release: () => void = () => {};
    const claim = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.active.set(dataSourceId, claim);

    let record: DataSourceRecord | null;
    try {
      record = await this.deps.store.getDataSource(dataSourceId);
      if (!record) {
        throw new NotFoundError("DataSource", dataSourceId);
      }
      if (record.syncState === "syncing") {
        debugSync(`${dataSourceId} was left syncing by an earlier process; restarting`);
      }
      await this.deps.store.updateSyncState(dataSourceId, { syncState: "syncing", syncProgress: 0 });
    } catch (error) {
      this.active.delete(dataSourceId);
      release();
      throw error;
    }
    this.emit(dataSourceId, "syncing", 0);

    const started = record;
    const run = this.run(started)
      .catch((error: unknown) => this.recover(dataSourceId, error))
      .finally(() => {
        this.active.delete(dataSourceId);
        release();
      });
    this.active.set(dataSourceId, run);

    return {
      dataSourceId,
      state: "syncing",
      progress: 0,
      error: null,
      chunkCount: 0,
      lastSyncedAt: started.lastSyncedAt,
      active: true,
    };
  }

  async status(dataSourceId: string): Promise<SyncStatus> {
    const record = await this.deps.store.getDataSource(dataSourceId);
    if (!record) {
      throw new NotFoundError("DataSource", dataSourceId);
    }
    return {
      dataSourceId,
      state: record.syncState,
      progress: record.syncProgress,
      error: record.lastError,
      chunkCount: await this.deps.store.countChunks(dataSourceId),
      lastSyncedAt: record.lastSyncedAt,
      active: this.active.has(dataSourceId),
    };
  }

  /** Resolves when the current run for `dataSourceId` (or every run) has finished. */
  async waitForSync(dataSourceId?: string): Promise<void> {
    if (dataSourceId) {
      await this.active.get(dataSourceId);
      return;
    }
    await Promise.all([...this.active.values()]);
  }

  private async run(record: DataSourceRecord): Promise<void> {
    const id = record.id;
    const outcome = await this.execute(record);

    // Derived structures are invalidated before the terminal state becomes visible.
    this.deps.lexicalIndex.invalidate(id);
    const version = this.deps.versions.bumpVersion(id);

    if (outcome.ok) {
      await this.deps.store.updateSyncState(id, {
        syncState: "synced",
        syncProgress: 100,
        lastSyncedAt: this.now().toISOString(),
        lastError: null,
      });
      this.emit(id, "synced", 100);
      debugSync(`${id} synced: ${outcome.chunkCount} chunks, version ${version}`);
      return;
    }

    const message = describeError(outcome.error);
    debugSyncError(`${id} sync failed: ${message}`);
    await this.deps.store.updateSyncState(id, {
      syncState: "error",
      syncProgress: 0,
      lastError: message,
    });
    this.emit(id, "error", 0);
  }

  /** Last-resort transition to `error` when the run itself faulted past `syncing`. */
  private async recover(dataSourceId: string, error: unknown): Promise<void> {
    const message = describeError(error);
    debugSyncError(`unexpected fault syncing ${dataSourceId}: ${message}`);
    try {
      await this.deps.store.updateSyncState(dataSourceId, {
        syncState: "error",
        syncProgress: 0,
        lastError: message,
      });
      this.emit(dataSourceId, "error", 0);
    } catch (updateError) {
      debugSyncError(`${dataSourceId}: could not record the failure: ${describeError(updateError)}`);
    }
  }

  private async execute(record: DataSourceRecord): Promise<SyncOutcome> {
    const id = record.id;
    let source: AcquiredSource | null = null;
    try {
      source = await acquireSource(record, this.deps);
      await this.reportProgress(id, ACQUIRED_PROGRESS);

      await this.deps.store.deleteChunks(id);
      await this.reportProgress(id, UNITS_START_PROGRESS);

      const chunking = {
        strategy: defaultChunkStrategy(record),
        size: this.deps.chunkSize,
        overlap: this.deps.chunkOverlap,
      };

      let chunkCount = 0;
      const total = source.units.length;
      for (const [index, unit] of source.units.entries()) {
        let chunks: NewChunk[] = [];
        try {
          chunks = await unit.load(chunking);
        } catch (error) {
          debugSyncError(`${id}: skipping ${unit.name}: ${describeError(error)}`);
        }
        chunkCount += await this.persist(id, chunks);
        await this.reportProgress(
          id,
          UNITS_START_PROGRESS + Math.floor((UNITS_PROGRESS_SPAN * (index + 1)) / total),
        );
      }

      return { ok: true, chunkCount };
    } catch (error) {
      return { ok: false, error };
    } finally {
      if (source) {
        await source.release().catch((error: unknown) => {
          debugSyncError(`${id}: releasing source failed: ${describeError(error)}`);
        });
      }
    }
  }

  /** Embedding or storage failure here is fatal for the whole run. */
  private async persist(dataSourceId: string, chunks: NewChunk[]): Promise<number> {
    let stored = 0;
    for (let start = 0; start < chunks.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = chunks.slice(start, start + EMBEDDING_BATCH_SIZE);
      const embeddings = await this.deps.vectorIndex.embedBatch(batch.map((chunk) => chunk.text));
      const inserted = await this.deps.store.insertChunks(dataSourceId, batch);
      await this.deps.vectorIndex.store(
        inserted.map((chunk, index) => ({ chunkId: chunk.id, embedding: embeddings[index] })),
      );
      stored += inserted.length;
    }
    return stored;
  }

  private async reportProgress(dataSourceId: string, progress: number): Promise<void> {
    const value = Math.max(0, Math.min(100, progress));
    try {
      await this.deps.store.updateSyncState(dataSourceId, { syncProgress: value });
    } catch (error) {
      debugSyncError(`${dataSourceId}: progress update failed: ${describeError(error)}`);
    }
    this.emit(dataSourceId, "syncing", value);
  }

  private emit(dataSourceId: string, state: SyncState, progress: number): void {
    this.deps.onProgress?.({ dataSourceId, state, progress });
  }
}

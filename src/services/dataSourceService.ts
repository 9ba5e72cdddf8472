import { promises as fs } from "node:fs";
import registerDebug from "debug";
import { NotFoundError, SyncInProgressError } from "../domain/errors.js";
import { CreateDataSourceInput, KnowledgeStore } from "../domain/knowledgeStore.js";
import { DataSourceRecord } from "../domain/types.js";
import { ConnectorFactory } from "../infra/connectors/types.js";
import { LexicalIndex } from "./lexicalIndex.js";
import { resolveFileDirectory, validateDescriptor } from "./sourceUnits.js";
import { SyncPipeline, VersionedCache } from "./syncPipeline.js";

const debugDataSources = registerDebug("kbqa:datasources");

export interface DataSourceServiceDeps {
  store: KnowledgeStore;
  syncPipeline: SyncPipeline;
  lexicalIndex: LexicalIndex;
  versions: VersionedCache;
  connectorFactory: ConnectorFactory;
  uploadDir: string;
}

export class DataSourceService {
  constructor(private readonly deps: DataSourceServiceDeps) {}

  async create(input: CreateDataSourceInput): Promise<DataSourceRecord> {
    validateDescriptor(input.descriptor, this.deps.uploadDir);
    const record = await this.deps.store.createDataSource(input);
    debugDataSources(`created ${record.kind} data source ${record.id} (${record.name})`);
    return record;
  }

  async get(id: string): Promise<DataSourceRecord> {
    const record = await this.deps.store.getDataSource(id);
    if (!record) {
      throw new NotFoundError("DataSource", id);
    }
    return record;
  }

  list(ownerId?: string | null): Promise<DataSourceRecord[]> {
    return this.deps.store.listDataSources(ownerId);
  }

  /** Cascades to chunks and vectors. Refused while a sync for the source is running. */
  async delete(id: string): Promise<void> {
    if (this.deps.syncPipeline.isSyncing(id)) {
      throw new SyncInProgressError(id);
    }
    const deleted = await this.deps.store.deleteDataSource(id);
    if (!deleted) {
      throw new NotFoundError("DataSource", id);
    }
    this.deps.lexicalIndex.invalidate(id);
    this.deps.versions.bumpVersion(id);
    debugDataSources(`deleted data source ${id}`);
  }

  async testConnection(id: string): Promise<boolean> {
    const record = await this.get(id);
    const descriptor = record.descriptor;
    switch (descriptor.kind) {
      case "database":
        return this.deps.connectorFactory(descriptor).testConnection();
      case "file": {
        const directory = resolveFileDirectory(descriptor, this.deps.uploadDir);
        try {
          return (await fs.stat(directory)).isDirectory();
        } catch (error) {
          debugDataSources(`${id}: cannot stat ${directory}: ${String(error)}`);
          return false;
        }
      }
      case "web":
        return descriptor.urls.length > 0;
    }
  }
}

/** Same record with the database password hidden, for handing back to clients. */
export function maskDataSource(record: DataSourceRecord): DataSourceRecord {
  if (record.descriptor.kind !== "database" || record.descriptor.password === undefined) {
    return record;
  }
  return { ...record, descriptor: { ...record.descriptor, password: "******" } };
}

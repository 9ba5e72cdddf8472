import { promises as fs } from "node:fs";
import path from "node:path";
import registerDebug from "debug";
import { InvalidDescriptorError } from "../domain/errors.js";
import {
  ChunkStrategy,
  DatabaseDescriptor,
  DataSourceRecord,
  FileDescriptor,
  NewChunk,
  SourceDescriptor,
  WebDescriptor,
} from "../domain/types.js";
import { ConnectorFactory, SourceConnector } from "../infra/connectors/types.js";
import { Extractor, isSupportedDocumentExtension } from "../infra/parsers/documentLoader.js";
import { selectSmartStrategy, splitIntoChunks } from "../pipelines/chunking.js";
import { renderRow, rowIdentifier } from "../pipelines/rowRendering.js";

const debugUnits = registerDebug("kbqa:sync:units");

export interface ChunkingSettings {
  strategy: ChunkStrategy;
  size: number;
  overlap: number;
}

/** One file, page or table. Failing to load a unit skips it; it never aborts the sync. */
export interface SyncUnit {
  name: string;
  load(chunking: ChunkingSettings): Promise<NewChunk[]>;
}

/** Units of one data source plus whatever live resources reading them needs. */
export interface AcquiredSource {
  units: SyncUnit[];
  release(): Promise<void>;
}

export interface SourceUnitDeps {
  extractor: Extractor;
  connectorFactory: ConnectorFactory;
  uploadDir: string;
}

export function defaultChunkStrategy(record: DataSourceRecord): ChunkStrategy {
  if (record.chunkStrategy) {
    return record.chunkStrategy;
  }
  return record.kind === "database" ? "fixed" : "smart";
}

/** The source's directory, which must be `uploadDir` itself or lie beneath it. */
export function resolveFileDirectory(descriptor: FileDescriptor, uploadDir: string): string {
  return resolveWithin(path.resolve(uploadDir), descriptor.directory);
}

/**
 * Paths of the explicitly listed files. Each must stay inside the source directory and
 * have a supported extension.
 */
export function resolveListedFiles(descriptor: FileDescriptor, uploadDir: string): string[] {
  const directory = resolveFileDirectory(descriptor, uploadDir);
  return (descriptor.files ?? []).map((name) => {
    const resolved = resolveWithin(directory, name);
    if (resolved === directory) {
      throw new InvalidDescriptorError(`File name "${name}" does not name a file`);
    }
    if (!isSupportedDocumentExtension(resolved)) {
      throw new InvalidDescriptorError(`File "${name}" is not a supported document type`);
    }
    return resolved;
  });
}

/** Throws before any I/O when a file descriptor points outside the upload directory. */
export function validateDescriptor(descriptor: SourceDescriptor, uploadDir: string): void {
  if (descriptor.kind === "file") {
    resolveListedFiles(descriptor, uploadDir);
  }
}

function resolveWithin(root: string, relative: string): string {
  const resolved = path.resolve(root, relative);
  const offset = path.relative(root, resolved);
  if (offset === ".." || offset.startsWith(`..${path.sep}`) || path.isAbsolute(offset)) {
    throw new InvalidDescriptorError(`Path "${relative}" escapes the upload directory`);
  }
  return resolved;
}

export async function acquireSource(record: DataSourceRecord, deps: SourceUnitDeps): Promise<AcquiredSource> {
  const descriptor = record.descriptor;
  switch (descriptor.kind) {
    case "file":
      return acquireFiles(descriptor, deps);
    case "web":
      return acquirePages(descriptor, deps);
    case "database":
      return acquireTables(descriptor, deps);
  }
}

async function acquireFiles(descriptor: FileDescriptor, deps: SourceUnitDeps): Promise<AcquiredSource> {
  const directory = resolveFileDirectory(descriptor, deps.uploadDir);
  const files = descriptor.files?.length
    ? resolveListedFiles(descriptor, deps.uploadDir)
    : (await fs.readdir(directory, { withFileTypes: true }))
        .filter((entry) => entry.isFile() && isSupportedDocumentExtension(entry.name))
        .map((entry) => path.join(directory, entry.name))
        .sort((a, b) => a.localeCompare(b));

  return {
    units: files.map((file) => {
      const name = path.relative(directory, file);
      return {
        name,
        load: (chunking) => loadDocumentUnit(deps.extractor, file, name, chunking),
      };
    }),
    release: async () => {},
  };
}

async function acquirePages(descriptor: WebDescriptor, deps: SourceUnitDeps): Promise<AcquiredSource> {
  return {
    units: descriptor.urls.map((url) => ({
      name: url,
      load: (chunking) => loadDocumentUnit(deps.extractor, url, url, chunking),
    })),
    release: async () => {},
  };
}

async function acquireTables(descriptor: DatabaseDescriptor, deps: SourceUnitDeps): Promise<AcquiredSource> {
  const connector = deps.connectorFactory(descriptor);
  try {
    await connector.connect();
    const tables = descriptor.tables?.length
      ? descriptor.tables
      : (await connector.listTables()).map((table) => ({ table, columns: null }));

    return {
      units: tables.map((config) => ({
        name: config.table,
        load: (chunking) => loadTableUnit(connector, config.table, config.columns ?? null, chunking),
      })),
      release: () => connector.close(),
    };
  } catch (error) {
    await closeQuietly(connector);
    throw error;
  }
}

async function loadDocumentUnit(
  extractor: Extractor,
  locator: string,
  unit: string,
  chunking: ChunkingSettings,
): Promise<NewChunk[]> {
  const text = await extractor.extract(locator);
  const strategy = chunking.strategy === "smart" ? selectSmartStrategy(text) : chunking.strategy;
  const pieces = splitIntoChunks(text, { ...chunking, strategy });
  debugUnits(`${unit}: ${pieces.length} chunks (${strategy})`);
  return pieces.map((piece, index) => ({
    locator: { unit, rowId: null },
    index,
    text: piece,
    metadata: { unit, chunkIndex: index, strategy },
  }));
}

async function loadTableUnit(
  connector: SourceConnector,
  table: string,
  columns: string[] | null,
  chunking: ChunkingSettings,
): Promise<NewChunk[]> {
  const rows = await connector.fetchRows(table, columns);
  debugUnits(`table ${table}: ${rows.length} rows`);

  const chunks: NewChunk[] = [];
  for (const row of rows) {
    const rowId = rowIdentifier(row);
    splitIntoChunks(renderRow(table, row), chunking).forEach((piece, index) => {
      chunks.push({
        locator: { unit: table, rowId },
        index,
        text: piece,
        metadata: { table, rowId },
      });
    });
  }
  return chunks;
}

async function closeQuietly(connector: SourceConnector): Promise<void> {
  try {
    await connector.close();
  } catch (error) {
    debugUnits(`closing ${connector.engine} connector failed: ${String(error)}`);
  }
}

import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InvalidDescriptorError, NotFoundError, SyncInProgressError } from "../src/domain/errors.js";
import { EmbeddingCache } from "../src/infra/cache/embeddingCache.js";
import { ResultCache } from "../src/infra/cache/resultCache.js";
import { InMemoryKnowledgeStore } from "../src/infra/store/inMemoryKnowledgeStore.js";
import { DataSourceService, maskDataSource } from "../src/services/dataSourceService.js";
import { LexicalIndex } from "../src/services/lexicalIndex.js";
import { SyncPipeline } from "../src/services/syncPipeline.js";
import { VectorIndex } from "../src/services/vectorIndex.js";
import { createTokenizer } from "../src/utils/text.js";
import { FakeConnector, FakeEmbedder, FakeExtractor } from "./helpers/fakes.js";

const TMP_DIR = path.resolve(".tmp-tests", "datasource-service");

function setup() {
  const store = new InMemoryKnowledgeStore();
  const lexicalIndex = new LexicalIndex({ store, tokenizer: createTokenizer("basic") });
  const versions = new ResultCache<string>({ enabled: true, capacity: 10, ttlSeconds: 60 });
  const connectorFactory = () => new FakeConnector({ customers: [{ id: 1, name: "Ada" }] });
  const syncPipeline = new SyncPipeline({
    store,
    vectorIndex: new VectorIndex({
      store,
      embedder: new FakeEmbedder(4),
      cache: new EmbeddingCache({ enabled: false, capacity: 1 }),
    }),
    lexicalIndex,
    versions,
    extractor: new FakeExtractor({}),
    connectorFactory,
    uploadDir: TMP_DIR,
    chunkSize: 200,
    chunkOverlap: 20,
  });
  const service = new DataSourceService({
    store,
    syncPipeline,
    lexicalIndex,
    versions,
    connectorFactory,
    uploadDir: TMP_DIR,
  });
  return { store, service, syncPipeline, versions };
}

describe("DataSourceService", () => {
  afterEach(async () => {
    await fs.rm(TMP_DIR, { recursive: true, force: true });
  });

  it("hides database passwords from returned records", async () => {
    const { service } = setup();
    const record = await service.create({
      name: "crm",
      descriptor: { kind: "database", engine: "postgresql", host: "db", username: "reader", password: "test-secret" },
    });

    const masked = maskDataSource(record);
    expect(masked.descriptor).toMatchObject({ kind: "database", username: "reader", password: "******" });
    expect(record.descriptor).toMatchObject({ password: "test-secret" });
  });

  it("deletes a data source with its chunks and bumps its version", async () => {
    const { store, service, syncPipeline, versions } = setup();
    const record = await service.create({ name: "crm", descriptor: { kind: "database", engine: "postgresql" } });
    await syncPipeline.requestSync(record.id);
    await syncPipeline.waitForSync(record.id);
    expect(await store.countChunks(record.id)).toBe(1);

    await service.delete(record.id);

    expect(await store.countChunks(record.id)).toBe(0);
    expect(versions.getVersion(record.id)).toBe(2);
    await expect(service.get(record.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.delete(record.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("refuses to delete a data source while it syncs", async () => {
    const { service, syncPipeline } = setup();
    const record = await service.create({ name: "crm", descriptor: { kind: "database", engine: "postgresql" } });

    const started = syncPipeline.requestSync(record.id);
    await expect(service.delete(record.id)).rejects.toBeInstanceOf(SyncInProgressError);
    await started;
    await syncPipeline.waitForSync(record.id);
  });

  it("checks that a file source directory exists", async () => {
    const { service } = setup();
    const record = await service.create({ name: "docs", descriptor: { kind: "file", directory: "manuals" } });

    expect(await service.testConnection(record.id)).toBe(false);
    await fs.mkdir(path.join(TMP_DIR, "manuals"), { recursive: true });
    expect(await service.testConnection(record.id)).toBe(true);
  });

  it("refuses file sources that reach outside the upload directory", async () => {
    const { service } = setup();

    await expect(
      service.create({ name: "etc", descriptor: { kind: "file", directory: "../../etc" } }),
    ).rejects.toBeInstanceOf(InvalidDescriptorError);
    await expect(
      service.create({ name: "abs", descriptor: { kind: "file", directory: "/var/lib" } }),
    ).rejects.toBeInstanceOf(InvalidDescriptorError);
    await expect(
      service.create({ name: "hop", descriptor: { kind: "file", directory: "manuals", files: ["../../secrets.md"] } }),
    ).rejects.toBeInstanceOf(InvalidDescriptorError);
    expect(await service.list()).toEqual([]);
  });

  it("lists data sources by owner", async () => {
    const { service } = setup();
    await service.create({ name: "a", descriptor: { kind: "web", urls: ["https://example.com"] }, ownerId: "u1" });
    await service.create({ name: "b", descriptor: { kind: "web", urls: ["https://example.org"] }, ownerId: "u2" });

    expect((await service.list("u1")).map((record) => record.name)).toEqual(["a"]);
    expect(await service.list()).toHaveLength(2);
  });
});

import path from "node:path";
import { describe, expect, it } from "vitest";
import { NotFoundError, SyncInProgressError } from "../src/domain/errors.js";
import { SourceDescriptor } from "../src/domain/types.js";
import { EmbeddingCache } from "../src/infra/cache/embeddingCache.js";
import { ResultCache } from "../src/infra/cache/resultCache.js";
import { ConnectorFactory } from "../src/infra/connectors/types.js";
import { InMemoryKnowledgeStore } from "../src/infra/store/inMemoryKnowledgeStore.js";
import { LexicalIndex } from "../src/services/lexicalIndex.js";
import { SyncPipeline, SyncProgressEvent } from "../src/services/syncPipeline.js";
import { VectorIndex } from "../src/services/vectorIndex.js";
import { createTokenizer } from "../src/utils/text.js";
import { FakeConnector, FakeEmbedder, FakeExtractor } from "./helpers/fakes.js";

const UPLOAD_DIR = path.resolve(".tmp-tests", "uploads");
const GUIDE = "First paragraph.\n\nSecond paragraph.\n\nThird paragraph.";

function fileLocator(name: string): string {
  return path.join(UPLOAD_DIR, "manuals", name);
}

function setup(options: {
  texts?: Record<string, string | Error>;
  connectorFactory?: ConnectorFactory;
  embedder?: FakeEmbedder;
  chunkSize?: number;
} = {}) {
  const store = new InMemoryKnowledgeStore({ vectorDimension: 4 });
  const embedder = options.embedder ?? new FakeEmbedder(4);
  const vectorIndex = new VectorIndex({
    store,
    embedder,
    cache: new EmbeddingCache({ enabled: true, capacity: 10 }),
  });
  const lexicalIndex = new LexicalIndex({ store, tokenizer: createTokenizer("basic") });
  const versions = new ResultCache<string>({ enabled: true, capacity: 10, ttlSeconds: 60 });
  const events: SyncProgressEvent[] = [];
  const pipeline = new SyncPipeline({
    store,
    vectorIndex,
    lexicalIndex,
    versions,
    extractor: new FakeExtractor(options.texts ?? { [fileLocator("guide.md")]: GUIDE }),
    connectorFactory:
      options.connectorFactory ??
      (() => {
        throw new Error("no database in this test");
      }),
    uploadDir: UPLOAD_DIR,
    chunkSize: options.chunkSize ?? 20,
    chunkOverlap: 2,
    onProgress: (event) => events.push(event),
    now: () => new Date("2026-03-04T05:06:07.000Z"),
  });

  const createSource = (descriptor: SourceDescriptor) => store.createDataSource({ name: "source", descriptor });
  return { store, embedder, lexicalIndex, versions, events, pipeline, createSource };
}

describe("SyncPipeline", () => {
  it("indexes a file source and reports monotonic progress", async () => {
    const { store, events, pipeline, createSource, versions, lexicalIndex } = setup();
    const source = await createSource({ kind: "file", directory: "manuals", files: ["guide.md"] });

    const started = await pipeline.requestSync(source.id);
    expect(started).toMatchObject({ state: "syncing", progress: 0, active: true });
    await pipeline.waitForSync(source.id);

    expect(events.map((event) => event.progress)).toEqual([0, 5, 10, 90, 100]);
    expect(events.at(-1)?.state).toBe("synced");
    expect(await pipeline.status(source.id)).toEqual({
      dataSourceId: source.id,
      state: "synced",
      progress: 100,
      error: null,
      chunkCount: 3,
      lastSyncedAt: "2026-03-04T05:06:07.000Z",
      active: false,
    });
    expect(await store.countVectors(source.id)).toBe(3);

    const stored = await store.listChunks(source.id);
    expect(stored.map((chunk) => chunk.text)).toEqual(["First paragraph.", "Second paragraph.", "Third paragraph."]);
    expect(stored[1].locator).toEqual({ unit: "guide.md", rowId: null });
    expect(stored[1].metadata).toEqual({ unit: "guide.md", chunkIndex: 1, strategy: "paragraph" });

    expect(versions.getVersion(source.id)).toBe(1);
    expect(lexicalIndex.has(source.id)).toBe(false);
  });

  it("rejects a second sync while one is running", async () => {
    const { pipeline, createSource, versions } = setup();
    const source = await createSource({ kind: "file", directory: "manuals", files: ["guide.md"] });

    const first = pipeline.requestSync(source.id);
    await expect(pipeline.requestSync(source.id)).rejects.toBeInstanceOf(SyncInProgressError);
    await first;
    await pipeline.waitForSync(source.id);

    expect(pipeline.isSyncing(source.id)).toBe(false);
    expect(versions.getVersion(source.id)).toBe(1);
  });

  it("replaces the previous chunks on re-sync", async () => {
    const { store, pipeline, createSource } = setup();
    const source = await createSource({ kind: "file", directory: "manuals", files: ["guide.md"] });

    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);
    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);

    expect(await store.countChunks(source.id)).toBe(3);
    expect(await store.countVectors(source.id)).toBe(3);
  });

  it("skips a unit that fails to load", async () => {
    const { events, pipeline, createSource } = setup({
      texts: {
        [fileLocator("broken.pdf")]: new Error("bad xref table"),
        [fileLocator("guide.md")]: GUIDE,
      },
    });
    const source = await createSource({ kind: "file", directory: "manuals", files: ["broken.pdf", "guide.md"] });

    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);

    expect(events.map((event) => event.progress)).toEqual([0, 5, 10, 50, 90, 100]);
    expect(await pipeline.status(source.id)).toMatchObject({ state: "synced", chunkCount: 3 });
  });

  it("renders database rows and closes the connection", async () => {
    const connector = new FakeConnector({
      orders: [
        { id: 1, status: "paid" },
        { id: 2, status: null },
      ],
    });
    const { store, pipeline, createSource } = setup({ connectorFactory: () => connector, chunkSize: 200 });
    const source = await createSource({ kind: "database", engine: "postgresql", database: "shop" });

    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);

    const stored = await store.listChunks(source.id);
    expect(stored.map((chunk) => [chunk.text, chunk.locator.rowId])).toEqual([
      ["Table orders record: id=1, status=paid", "1"],
      ["Table orders record: id=2", "2"],
    ]);
    expect(connector.connectCount).toBe(1);
    expect(connector.closeCount).toBe(1);
  });

  it("records a failed sync and still bumps the version", async () => {
    const { events, pipeline, createSource, versions } = setup({
      connectorFactory: () => {
        throw new Error("connection refused");
      },
    });
    const source = await createSource({ kind: "database", engine: "mysql", host: "db.internal" });

    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);

    expect(await pipeline.status(source.id)).toMatchObject({
      state: "error",
      progress: 0,
      error: "connection refused",
      chunkCount: 0,
    });
    expect(events.map((event) => [event.state, event.progress])).toEqual([
      ["syncing", 0],
      ["error", 0],
    ]);
    expect(versions.getVersion(source.id)).toBe(1);
  });

  it("fails the run when embedding fails", async () => {
    const embedder = new FakeEmbedder(4);
    embedder.failWith = new Error("embedding backend unavailable");
    const { pipeline, createSource } = setup({ embedder });
    const source = await createSource({ kind: "file", directory: "manuals", files: ["guide.md"] });

    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);

    expect(await pipeline.status(source.id)).toMatchObject({
      state: "error",
      error: "embedding backend unavailable",
      chunkCount: 0,
    });
  });

  it("fails the run when the directory lies outside the upload root", async () => {
    const { pipeline, createSource } = setup();
    const source = await createSource({ kind: "file", directory: "../elsewhere", files: ["guide.md"] });

    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);

    expect(await pipeline.status(source.id)).toMatchObject({
      state: "error",
      error: 'Path "../elsewhere" escapes the upload directory',
      chunkCount: 0,
    });
  });

  it("restarts a source left in the syncing state by an earlier process", async () => {
    const { store, pipeline, createSource } = setup();
    const source = await createSource({ kind: "file", directory: "manuals", files: ["guide.md"] });
    await store.updateSyncState(source.id, { syncState: "syncing", syncProgress: 40 });

    await pipeline.requestSync(source.id);
    await pipeline.waitForSync(source.id);

    expect((await pipeline.status(source.id)).state).toBe("synced");
  });

  it("rejects unknown data sources without holding a claim", async () => {
    const { pipeline } = setup();
    await expect(pipeline.requestSync("missing")).rejects.toBeInstanceOf(NotFoundError);
    expect(pipeline.isSyncing("missing")).toBe(false);
  });
});

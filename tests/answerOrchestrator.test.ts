import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { buildServices } from "../src/app.js";
import { NotFoundError } from "../src/domain/errors.js";
import { InMemoryKnowledgeStore } from "../src/infra/store/inMemoryKnowledgeStore.js";
import { AnswerStreamEvent } from "../src/services/answerOrchestrator.js";
import { collect, FakeConnector, FakeEmbedder, FakeExtractor, FakeGenerator, testConfig } from "./helpers/fakes.js";

const UPLOAD_DIR = path.resolve(".tmp-tests", "uploads");
const FAQ = "Refunds take five days.\n\nShipping is free.";
const QUESTION = "How long do refunds take?";

async function setup(options: { generator?: FakeGenerator; connector?: FakeConnector } = {}) {
  const config = testConfig({ uploadDir: UPLOAD_DIR, chunkSize: 200 });
  const store = new InMemoryKnowledgeStore({ vectorDimension: 4 });
  const generator = options.generator ?? new FakeGenerator({ reply: () => "Refunds take five days [1]." });
  const connector = options.connector ?? new FakeConnector({});
  const services = buildServices({
    config,
    store,
    ai: { embedder: new FakeEmbedder(4), generator, reranker: null },
    extractor: new FakeExtractor({ [path.join(UPLOAD_DIR, "docs", "faq.md")]: FAQ }),
    connectorFactory: () => connector,
  });

  const source = await services.dataSources.create({
    name: "faq",
    descriptor: { kind: "file", directory: "docs", files: ["faq.md"] },
  });
  const sync = async (id: string) => {
    await services.syncPipeline.requestSync(id);
    await services.syncPipeline.waitForSync(id);
  };
  await sync(source.id);

  return { services, store, generator, dataSourceId: source.id, sync };
}

const plain = { enableRewrite: false, enableHyde: false };

describe("AnswerOrchestrator", () => {
  it("answers from retrieved chunks and records the exchange", async () => {
    const { services, store, dataSourceId } = await setup();

    const result = await services.orchestrator.ask({ question: QUESTION, dataSourceId, userId: "u1", ...plain });

    expect(result.answer).toBe("Refunds take five days [1].");
    expect(result.chunks.map((chunk) => [chunk.text, chunk.source])).toEqual([[FAQ, "bm25"]]);
    expect(result.citations[0]).toMatchObject({ unit: "faq.md", source: "bm25" });
    expect(result.fallbackUsed).toBe(false);
    expect(result.pipelineTrace.map((step) => step.step)).toEqual(["vector_search", "bm25_search", "merge"]);

    const [record] = await store.listQaRecords({ userId: "u1" });
    expect(record.question).toBe(QUESTION);
    expect(record.chunks).toHaveLength(1);
    expect(record.details).toEqual({
      mode: "rag",
      stream: false,
      topK: 5,
      fallbackUsed: false,
      rerankerEnabled: false,
      hasHistory: false,
    });
  });

  it("keeps the audit trace apart from the trace handed back", async () => {
    const { services, store, dataSourceId } = await setup();

    const result = await services.orchestrator.ask({ question: QUESTION, dataSourceId, ...plain });
    result.pipelineTrace.push({ step: "edited" });
    result.pipelineTrace[0].step = "renamed";

    const [record] = await store.listQaRecords();
    expect(record.trace.map((step) => step.step)).toEqual(["vector_search", "bm25_search", "merge"]);
  });

  it("records the rewrite and HyDE steps when enabled", async () => {
    const generator = new FakeGenerator({
      reply: (messages) =>
        messages[0].content.startsWith("You optimise")
          ? '{"keywords": ["refunds"], "queries": ["refund duration"], "hyde_hint": "refund timing"}'
          : "Refunds are processed within five days.",
    });
    const { services, dataSourceId } = await setup({ generator });

    const result = await services.orchestrator.ask({ question: QUESTION, dataSourceId });

    expect(result.pipelineTrace[0]).toEqual({
      step: "query_rewrite",
      keywords: ["refunds"],
      variants: ["refund duration"],
    });
    expect(result.pipelineTrace[1]).toEqual({ step: "hyde", document: "Refunds are processed within five days." });
    expect(result.pipelineTrace).toContainEqual({ step: "vector_search", path: "variant", hits: 1 });
  });

  it("serves a repeated question from the cache until the source is re-synced", async () => {
    const { services, generator, dataSourceId, sync } = await setup();

    const first = await services.orchestrator.ask({ question: QUESTION, dataSourceId, ...plain });
    const second = await services.orchestrator.ask({ question: QUESTION, dataSourceId, ...plain });
    expect(second).toBe(first);
    expect(generator.completeCalls).toHaveLength(1);

    await sync(dataSourceId);
    const third = await services.orchestrator.ask({ question: QUESTION, dataSourceId, ...plain });
    expect(third).not.toBe(first);
    expect(generator.completeCalls).toHaveLength(2);
  });

  it("bypasses the cache for questions with history", async () => {
    const { services, generator, dataSourceId } = await setup();
    const history = [{ role: "user" as const, content: "We talked about shipping." }];

    await services.orchestrator.ask({ question: QUESTION, dataSourceId, history, ...plain });
    await services.orchestrator.ask({ question: QUESTION, dataSourceId, history, ...plain });
    await services.orchestrator.ask({ question: QUESTION, dataSourceId, ...plain });

    expect(generator.completeCalls).toHaveLength(3);
    expect(generator.completeCalls[0][1]).toEqual({ role: "user", content: "We talked about shipping." });
  });

  it("still answers when the audit record cannot be saved", async () => {
    const { services, store, dataSourceId } = await setup();
    vi.spyOn(store, "saveQaRecord").mockRejectedValue(new Error("disk full"));

    const result = await services.orchestrator.ask({ question: QUESTION, dataSourceId, ...plain });

    expect(result.answer).toBe("Refunds take five days [1].");
  });

  it("rejects an unknown data source", async () => {
    const { services } = await setup();
    await expect(services.orchestrator.ask({ question: QUESTION, dataSourceId: "missing", ...plain })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(await collect(services.orchestrator.askStream({ question: QUESTION, dataSourceId: "missing", ...plain }))).toEqual([
      { type: "error", message: "DataSource not found: missing" },
    ]);
  });

  it("queries the live database when retrieval finds nothing", async () => {
    const connector = new FakeConnector({ orders: [{ id: 7, total: 40 }] }, [{ id: 7, total: 40 }]);
    const generator = new FakeGenerator({
      reply: (messages) => (messages[0].content.includes("SQL query") ? "SELECT id, total FROM orders LIMIT 10" : "40"),
    });
    const { services } = await setup({ generator, connector });
    const shop = await services.dataSources.create({
      name: "shop",
      descriptor: { kind: "database", engine: "postgresql", database: "shop" },
    });

    const result = await services.orchestrator.ask({ question: "largest order total?", dataSourceId: shop.id, ...plain });

    expect(result.fallbackUsed).toBe(true);
    expect(result.chunks).toEqual([]);
    expect(result.pipelineTrace.at(-1)).toEqual({ step: "sql_fallback", generated: true, rows: 1 });
    expect(generator.completeCalls.at(-1)?.[1].content).toBe(
      "Knowledge-base passages:\n[Structured query results]\n  id=7, total=40\n\nQuestion:\nlargest order total?",
    );
  });

  it("streams retrieval, tokens and a final answer", async () => {
    const generator = new FakeGenerator({ tokens: ["Refunds", " take", " five days."] });
    const { services, store, dataSourceId } = await setup({ generator });

    const events = await collect(services.orchestrator.askStream({ question: QUESTION, dataSourceId, ...plain }));

    expect(events.map((event) => event.type)).toEqual(["retrieval_done", "token", "token", "token", "done"]);
    expect(events.at(-1)).toEqual({ type: "done", answer: "Refunds take five days." });
    const [record] = await store.listQaRecords();
    expect(record.answer).toBe("Refunds take five days.");
    expect(record.details).toMatchObject({ mode: "rag", stream: true });
  });

  it("stops generation when the consumer goes away", async () => {
    const generator = new FakeGenerator({ tokens: ["a", "b", "c", "d"] });
    const { services, store, dataSourceId } = await setup({ generator });

    const received: AnswerStreamEvent[] = [];
    for await (const event of services.orchestrator.askStream({ question: QUESTION, dataSourceId, ...plain })) {
      received.push(event);
      if (received.length === 3) {
        break;
      }
    }

    expect(received.map((event) => event.type)).toEqual(["retrieval_done", "token", "token"]);
    expect(generator.streamClosed).toBe(true);
    expect(generator.lastSignal?.aborted).toBe(true);
    expect(await store.listQaRecords()).toEqual([]);
  });

  it("stops when the caller aborts", async () => {
    const generator = new FakeGenerator({ tokens: ["a", "b", "c"] });
    const { services, store, dataSourceId } = await setup({ generator });
    const controller = new AbortController();

    const received: AnswerStreamEvent[] = [];
    for await (const event of services.orchestrator.askStream({ question: QUESTION, dataSourceId, ...plain }, controller.signal)) {
      received.push(event);
      if (event.type === "token") {
        controller.abort();
      }
    }

    expect(received.map((event) => event.type)).toEqual(["retrieval_done", "token"]);
    expect(generator.streamClosed).toBe(true);
    expect(await store.listQaRecords()).toEqual([]);
  });

  it("skips the remaining model calls when the caller aborts during retrieval", async () => {
    const controller = new AbortController();
    const generator = new FakeGenerator({
      reply: () => {
        controller.abort();
        return '{"keywords": ["refunds"], "queries": [], "hyde_hint": "refund timing"}';
      },
      tokens: ["never"],
    });
    const { services, store, dataSourceId } = await setup({ generator });

    const events = await collect(services.orchestrator.askStream({ question: QUESTION, dataSourceId }, controller.signal));

    expect(events).toEqual([]);
    expect(generator.completeCalls).toHaveLength(1);
    expect(generator.completeSignals[0]).toBe(controller.signal);
    expect(generator.streamCalls).toEqual([]);
    expect(await store.listQaRecords()).toEqual([]);
  });

  it("ends the stream with an error event when generation fails", async () => {
    const generator = new FakeGenerator({ tokens: ["partial"], streamError: new Error("stream reset") });
    const { services, dataSourceId } = await setup({ generator });

    const events = await collect(services.orchestrator.askStream({ question: QUESTION, dataSourceId, ...plain }));

    expect(events.slice(1)).toEqual([
      { type: "token", token: "partial" },
      { type: "error", message: "stream reset" },
    ]);
  });

  it("chats without retrieval", async () => {
    const generator = new FakeGenerator({ reply: () => "Hello!", tokens: ["Hel", "lo"] });
    const { services, store } = await setup({ generator });

    const result = await services.orchestrator.chat({ question: "hi", userId: "u9" });
    expect(result).toMatchObject({ answer: "Hello!", chunks: [], pipelineTrace: [], dataSourceId: null });

    const events = await collect(services.orchestrator.chatStream({ question: "hi again" }));
    expect(events[0]).toEqual({ type: "retrieval_done", chunks: [], trace: [] });
    expect(events.at(-1)).toEqual({ type: "done", answer: "Hello" });

    const records = await store.listQaRecords();
    expect(records.map((record) => record.details)).toEqual([
      { mode: "chat", stream: true, hasHistory: false },
      { mode: "chat", stream: false, hasHistory: false },
    ]);
  });
});

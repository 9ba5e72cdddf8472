import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { AppServices, buildServices } from "../src/app.js";
import { InMemoryKnowledgeStore } from "../src/infra/store/inMemoryKnowledgeStore.js";
import { createMcpServer } from "../src/mcpServer.js";
import { FakeConnector, FakeEmbedder, FakeExtractor, FakeGenerator, testConfig } from "./helpers/fakes.js";

const UPLOAD_DIR = path.resolve(".tmp-tests", "uploads");

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })).min(1),
});

const dataSourceSchema = z.object({
  id: z.string(),
  syncState: z.string(),
  descriptor: z.record(z.unknown()),
});

let client: Client | null = null;
let services: AppServices | null = null;

async function connect() {
  services = buildServices({
    config: testConfig({ uploadDir: UPLOAD_DIR }),
    store: new InMemoryKnowledgeStore({ vectorDimension: 4 }),
    ai: { embedder: new FakeEmbedder(4), generator: new FakeGenerator({ reply: () => "Five days." }), reranker: null },
    extractor: new FakeExtractor({ [path.join(UPLOAD_DIR, "docs", "faq.md")]: "Refunds take five days." }),
    connectorFactory: () => new FakeConnector({}),
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await createMcpServer(services).connect(serverTransport);
  client = new Client({ name: "tools-test", version: "0.0.0" });
  await client.connect(clientTransport);
  return { client, services };
}

async function call(target: Client, name: string, args: Record<string, unknown>) {
  const result = toolResultSchema.parse(await target.callTool({ name, arguments: args }));
  return { isError: result.isError ?? false, payload: z.record(z.unknown()).parse(JSON.parse(result.content[0].text)) };
}

describe("MCP tools", () => {
  afterEach(async () => {
    await client?.close();
    await services?.close();
    client = null;
    services = null;
  });

  it("lists every tool", async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask_question",
      "chat",
      "create_data_source",
      "delete_data_source",
      "health_check",
      "list_data_sources",
      "list_qa_history",
      "sync_data_source",
      "sync_status",
      "test_data_source_connection",
    ]);
  });

  it("creates, syncs and queries a data source", async () => {
    const { client, services } = await connect();

    const created = await call(client, "create_data_source", {
      name: "faq",
      descriptor: { kind: "file", directory: "docs", files: ["faq.md"] },
    });
    const source = dataSourceSchema.parse(created.payload.data_source);
    expect(source.syncState).toBe("pending");

    const sync = await call(client, "sync_data_source", { data_source_id: source.id });
    expect(sync.payload.status).toMatchObject({ state: "syncing", active: true });
    await services.syncPipeline.waitForSync(source.id);

    const status = await call(client, "sync_status", { data_source_id: source.id });
    expect(status.payload.status).toMatchObject({ state: "synced", progress: 100, chunkCount: 1 });

    const answer = await call(client, "ask_question", {
      question: "How long do refunds take?",
      data_source_id: source.id,
      enable_rewrite: false,
      enable_hyde: false,
    });
    expect(answer.isError).toBe(false);
    expect(answer.payload.answer).toBe("Five days.");

    const history = await call(client, "list_qa_history", {});
    expect(history.payload.records).toHaveLength(1);
  });

  it("masks passwords in listed data sources", async () => {
    const { client } = await connect();
    await call(client, "create_data_source", {
      name: "crm",
      descriptor: { kind: "database", engine: "mysql", host: "db", password: "test-secret" },
    });

    const listed = await call(client, "list_data_sources", {});
    const [source] = z.array(dataSourceSchema).parse(listed.payload.data_sources);
    expect(source.descriptor.password).toBe("******");
  });

  it("reports service errors as tool errors", async () => {
    const { client } = await connect();

    const missing = await call(client, "sync_status", { data_source_id: "missing" });
    expect(missing).toEqual({
      isError: true,
      payload: { error: "not_found", message: "DataSource not found: missing" },
    });
  });

  it("refuses a second sync of the same source", async () => {
    const { client, services } = await connect();
    const created = await call(client, "create_data_source", {
      name: "faq",
      descriptor: { kind: "file", directory: "docs", files: ["faq.md"] },
    });
    const source = dataSourceSchema.parse(created.payload.data_source);

    const results = await Promise.all([
      call(client, "sync_data_source", { data_source_id: source.id }),
      call(client, "sync_data_source", { data_source_id: source.id }),
    ]);
    await services.syncPipeline.waitForSync(source.id);

    const rejected = results.filter((result) => result.isError);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].payload.error).toBe("sync_in_progress");
  });
});

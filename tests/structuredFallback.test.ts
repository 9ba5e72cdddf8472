import { describe, expect, it } from "vitest";
import { DataSourceRecord, SourceDescriptor } from "../src/domain/types.js";
import {
  CANNOT_GENERATE,
  generateStructuredQuery,
  shouldTriggerFallback,
  StructuredFallback,
} from "../src/pipelines/structuredFallback.js";
import { FakeConnector, FakeGenerator } from "./helpers/fakes.js";

function dataSource(descriptor: SourceDescriptor): DataSourceRecord {
  return {
    id: "ds-1",
    name: "shop",
    kind: descriptor.kind,
    descriptor,
    chunkStrategy: null,
    syncState: "synced",
    syncProgress: 100,
    lastSyncedAt: null,
    lastError: null,
    ownerId: null,
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

const database = dataSource({ kind: "database", engine: "postgresql", database: "shop" });

describe("structured fallback", () => {
  it("triggers for a database source with weak similarity and no lexical hits", () => {
    expect(shouldTriggerFallback({ dataSource: database, lexicalHits: 0, maxVectorSimilarity: 0.3 })).toBe(true);
  });

  it("is vetoed by any lexical hit", () => {
    expect(shouldTriggerFallback({ dataSource: database, lexicalHits: 1, maxVectorSimilarity: 0.3 })).toBe(false);
  });

  it("needs similarity below the threshold", () => {
    expect(shouldTriggerFallback({ dataSource: database, lexicalHits: 0, maxVectorSimilarity: 0.45 })).toBe(false);
  });

  it("never triggers for unscoped questions or non-database sources", () => {
    expect(shouldTriggerFallback({ dataSource: null, lexicalHits: 0, maxVectorSimilarity: 0 })).toBe(false);
    const web = dataSource({ kind: "web", urls: ["https://example.com"] });
    expect(shouldTriggerFallback({ dataSource: web, lexicalHits: 0, maxVectorSimilarity: 0 })).toBe(false);
  });

  it("runs the generated query and closes the connection", async () => {
    const connector = new FakeConnector(
      { orders: [{ id: 1, total: 40 }] },
      [{ id: 1, total: 40 }],
    );
    const generator = new FakeGenerator({ reply: () => "```sql\nSELECT id, total FROM orders LIMIT 10\n```" });
    const fallback = new StructuredFallback({ generator, connectorFactory: () => connector });

    const result = await fallback.run(database, "largest order?");

    expect(result).toEqual({
      rows: [{ id: 1, total: 40 }],
      query: "SELECT id, total FROM orders LIMIT 10",
      step: { step: "sql_fallback", generated: true, rows: 1 },
    });
    expect(connector.queries).toEqual(["SELECT id, total FROM orders LIMIT 10"]);
    expect(connector.closeCount).toBe(1);
    expect(generator.completeCalls[0][1].content).toBe(
      "Schema:\nTable orders: columns id, total\n\nQuestion: largest order?",
    );
  });

  it("returns no rows when the model cannot write a query", async () => {
    const connector = new FakeConnector({ orders: [{ id: 1 }] });
    const fallback = new StructuredFallback({
      generator: new FakeGenerator({ reply: () => CANNOT_GENERATE }),
      connectorFactory: () => connector,
    });

    const result = await fallback.run(database, "what is the weather?");

    expect(result.rows).toEqual([]);
    expect(result.step).toEqual({ step: "sql_fallback", generated: false, rows: 0 });
    expect(connector.queries).toEqual([]);
    expect(connector.closeCount).toBe(1);
  });

  it("turns generation failures into an empty result", async () => {
    const connector = new FakeConnector({ orders: [{ id: 1 }] });
    const fallback = new StructuredFallback({
      generator: new FakeGenerator({
        reply: () => {
          throw new Error("model offline");
        },
      }),
      connectorFactory: () => connector,
    });

    const result = await fallback.run(database, "q");

    expect(result).toEqual({ rows: [], query: null, step: { step: "sql_fallback", error: "model offline", rows: 0 } });
    expect(connector.closeCount).toBe(1);
  });

  it("asks for nothing when there is no schema", async () => {
    const generator = new FakeGenerator();
    expect(await generateStructuredQuery(generator, "q", [], "sqlite")).toBeNull();
    expect(generator.completeCalls).toHaveLength(0);
  });
});

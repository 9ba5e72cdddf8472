import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { chunkStrategySchema, sourceDescriptorSchema } from "../domain/schemas.js";
import { DataSourceService, maskDataSource } from "../services/dataSourceService.js";
import { runTool } from "./toolResult.js";

export function registerDataSourceTools(server: McpServer, dataSources: DataSourceService) {
  server.registerTool(
    "create_data_source",
    {
      title: "Create Data Source",
      description:
        "Registers a database, file directory or web data source. It starts in the pending state; call sync_data_source to index it.",
      inputSchema: {
        name: z.string().min(1).describe("Display name"),
        descriptor: sourceDescriptorSchema.describe(
          "Connection details: {kind:'database', engine, ...}, {kind:'file', directory} or {kind:'web', urls}",
        ),
        chunk_strategy: chunkStrategySchema.optional().describe("Defaults to smart for documents, fixed for tables"),
        owner_id: z.string().optional().describe("Owning user"),
      },
    },
    async ({ name, descriptor, chunk_strategy, owner_id }) =>
      runTool("create_data_source", async () => {
        const record = await dataSources.create({
          name,
          descriptor,
          chunkStrategy: chunk_strategy ?? null,
          ownerId: owner_id ?? null,
        });
        return { data_source: maskDataSource(record) };
      }),
  );

  server.registerTool(
    "list_data_sources",
    {
      title: "List Data Sources",
      description: "Lists data sources with their sync state.",
      inputSchema: {
        owner_id: z.string().optional().describe("Only sources owned by this user"),
      },
    },
    async ({ owner_id }) =>
      runTool("list_data_sources", async () => {
        const records = await dataSources.list(owner_id ?? null);
        return { data_sources: records.map(maskDataSource) };
      }),
  );

  server.registerTool(
    "delete_data_source",
    {
      title: "Delete Data Source",
      description: "Deletes a data source together with its chunks and vectors.",
      inputSchema: {
        data_source_id: z.string().min(1),
      },
    },
    async ({ data_source_id }) =>
      runTool("delete_data_source", async () => {
        await dataSources.delete(data_source_id);
        return { deleted: data_source_id };
      }),
  );

  server.registerTool(
    "test_data_source_connection",
    {
      title: "Test Data Source Connection",
      description: "Checks that a data source's database or directory is reachable.",
      inputSchema: {
        data_source_id: z.string().min(1),
      },
    },
    async ({ data_source_id }) =>
      runTool("test_data_source_connection", async () => ({
        data_source_id,
        ok: await dataSources.testConnection(data_source_id),
      })),
  );
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SyncPipeline } from "../services/syncPipeline.js";
import { runTool } from "./toolResult.js";

export function registerSyncTools(server: McpServer, syncPipeline: SyncPipeline) {
  server.registerTool(
    "sync_data_source",
    {
      title: "Sync Data Source",
      description:
        "Starts re-indexing a data source in the background and returns immediately. Rejected while a sync for the same source is running.",
      inputSchema: {
        data_source_id: z.string().min(1),
      },
    },
    async ({ data_source_id }) =>
      runTool("sync_data_source", async () => ({ status: await syncPipeline.requestSync(data_source_id) })),
  );

  server.registerTool(
    "sync_status",
    {
      title: "Sync Status",
      description: "Returns sync state, progress (0-100), last error and chunk count of a data source.",
      inputSchema: {
        data_source_id: z.string().min(1),
      },
    },
    async ({ data_source_id }) =>
      runTool("sync_status", async () => ({ status: await syncPipeline.status(data_source_id) })),
  );
}

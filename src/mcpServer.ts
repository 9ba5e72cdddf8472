import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { AppServices } from "./app.js";
import { registerDataSourceTools } from "./tools/dataSourceTools.js";
import { registerQuestionTools } from "./tools/questionTools.js";
import { registerSyncTools } from "./tools/syncTools.js";
import { jsonResult } from "./tools/toolResult.js";

export const SERVER_NAME = "kbqa-core";
export const SERVER_VERSION = "0.1.0";

/** One MCP server per session; every session shares the same services. */
export function createMcpServer(services: AppServices): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns server status and the configured providers.",
      inputSchema: {},
    },
    async () =>
      jsonResult({
        ok: true,
        store: services.config.store,
        embeddingProvider: services.config.embeddingProvider,
        generationProvider: services.config.generationProvider,
        rerankerEnabled: services.config.enableReranker,
      }),
  );

  registerDataSourceTools(server, services.dataSources);
  registerSyncTools(server, services.syncPipeline);
  registerQuestionTools(server, services.orchestrator, services.store);

  return server;
}

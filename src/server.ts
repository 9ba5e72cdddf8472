#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import registerDebug from "debug";
import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { MCP_PATH, startHttpServer } from "./http/httpServer.js";
import { createMcpServer } from "./mcpServer.js";

const debugServer = registerDebug("kbqa:server");
const debugServerError = registerDebug("kbqa:server:error");

async function main() {
  const config = loadConfig();
  registerDebug.enable(config.logNamespaces);

  const services = await createApp(config);
  const shutdownTasks: Array<() => Promise<void>> = [() => services.close()];

  if (config.transport === "http") {
    shutdownTasks.unshift(await startHttpServer({ host: config.host, port: config.port, services }));
    debugServer(`MCP endpoint at http://${config.host}:${config.port}${MCP_PATH}`);
  } else {
    await createMcpServer(services).connect(new StdioServerTransport());
    debugServer("MCP server connected over stdio");
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      debugServer(`${signal} received, shutting down`);
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          debugServerError(`shutdown failed: ${describeError(error)}`);
          process.exit(1);
        },
      );
    });
  }
}

main().catch((error: unknown) => {
  if (!debugServerError.enabled) {
    registerDebug.enable("kbqa:server:error");
  }
  debugServerError(`failed to start: ${describeError(error)}`);
  process.exit(1);
});

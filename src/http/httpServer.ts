import { createServer, IncomingMessage, ServerResponse } from "node:http";
import registerDebug from "debug";
import { AppServices } from "../app.js";
import { describeError } from "../domain/errors.js";
import { createMcpServer } from "../mcpServer.js";
import { handleAskStream } from "./askStream.js";
import { McpSessionRegistry } from "./mcpSessions.js";
import { httpStatusFor, readJsonBody, writeJson } from "./responses.js";

export const MCP_PATH = "/mcp";
export const ASK_STREAM_PATH = "/api/ask-stream";

const debugHttp = registerDebug("kbqa:http");

export interface HttpServerOptions {
  host: string;
  port: number;
  services: AppServices;
}

/** Resolves once listening; the returned function closes every session, then the server. */
export async function startHttpServer(options: HttpServerOptions): Promise<() => Promise<void>> {
  const sessions = new McpSessionRegistry(() => createMcpServer(options.services));

  const httpServer = createServer((req, res) => {
    route(req, res, sessions, options.services).catch((error: unknown) => {
      debugHttp(`${req.method ?? "?"} ${req.url ?? "/"} failed: ${describeError(error)}`);
      if (!res.headersSent) {
        writeJson(res, httpStatusFor(error), { error: describeError(error) });
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => resolve());
  });
  debugHttp(`listening on http://${options.host}:${options.port}`);

  return async () => {
    await sessions.closeAll();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  };
}

async function route(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: McpSessionRegistry,
  services: AppServices,
): Promise<void> {
  const { pathname } = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  switch (pathname) {
    case "/healthz":
      writeJson(res, 200, { ok: true, sessions: sessions.size });
      return;

    case ASK_STREAM_PATH:
      if (req.method !== "POST") {
        writeJson(res, 405, { error: "Method not allowed" });
        return;
      }
      await handleAskStream(await readJsonBody(req), res, services.orchestrator);
      return;

    case MCP_PATH:
      if (req.method === "POST") {
        await sessions.handlePost(req, res, await readJsonBody(req));
      } else if (req.method === "GET" || req.method === "DELETE") {
        await sessions.handleSessionRequest(req, res);
      } else {
        writeJson(res, 405, { error: "Method not allowed" });
      }
      return;

    default:
      writeJson(res, 404, { error: "Not found" });
  }
}

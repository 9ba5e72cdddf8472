import { randomUUID } from "node:crypto";
import { IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import registerDebug from "debug";
import { describeError } from "../domain/errors.js";
import { writeJson } from "./responses.js";

const debugSessions = registerDebug("kbqa:http:sessions");

interface Session {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/** Streamable HTTP sessions keyed by `mcp-session-id`, each with its own MCP server. */
export class McpSessionRegistry {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly serverFactory: () => McpServer) {}

  get size(): number {
    return this.sessions.size;
  }

  /** Routes to an existing session, or opens one for an initialize request. */
  async handlePost(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const sessionId = sessionIdOf(req);
    if (sessionId) {
      const session = this.sessions.get(sessionId);
      if (!session) {
        writeRpcError(res, 404, -32001, "Session not found");
        return;
      }
      await session.transport.handleRequest(req, res, body);
      return;
    }

    if (!isInitializeRequest(body)) {
      writeRpcError(res, 400, -32000, "Initialize request is required when session is not established");
      return;
    }
    await this.open(req, res, body);
  }

  /** GET opens the server-to-client stream, DELETE ends the session. */
  async handleSessionRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = sessionIdOf(req);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Missing or invalid mcp-session-id");
      return;
    }
    await session.transport.handleRequest(req, res);
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(
      open.map(async ({ server, transport }) => {
        await transport.close();
        await server.close();
      }),
    );
  }

  private async open(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const server = this.serverFactory();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        this.sessions.set(id, { server, transport });
        debugSessions(`opened ${id} (${this.sessions.size} active)`);
      },
    });

    transport.onclose = () => {
      const id = transport.sessionId;
      if (!id || !this.sessions.delete(id)) {
        return;
      }
      debugSessions(`closed ${id}`);
      server.close().catch((error: unknown) => {
        debugSessions(`closing server for ${id} failed: ${describeError(error)}`);
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }
}

function sessionIdOf(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  if (Array.isArray(header)) {
    return header[0] ?? null;
  }
  return header || null;
}

function writeRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeStore } from "../domain/knowledgeStore.js";
import { conversationTurnSchema } from "../domain/schemas.js";
import { AnswerOrchestrator } from "../services/answerOrchestrator.js";
import { runTool } from "./toolResult.js";

export function registerQuestionTools(server: McpServer, orchestrator: AnswerOrchestrator, store: KnowledgeStore) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description:
        "Answers a question from the indexed data sources using hybrid vector and BM25 retrieval, and returns the supporting chunks and pipeline trace.",
      inputSchema: {
        question: z.string().min(1).describe("Question to answer"),
        data_source_id: z.string().optional().describe("Restrict retrieval to one data source"),
        top_k: z.number().int().min(1).max(20).optional().describe("Chunks passed to the model (default 5)"),
        enable_rewrite: z.boolean().optional().describe("Query rewriting and keyword extraction (default true)"),
        enable_hyde: z.boolean().optional().describe("Hypothetical-document retrieval (default true)"),
        enable_fallback: z.boolean().optional().describe("Structured query fallback for database sources (default true)"),
        user_id: z.string().optional(),
        history: z.array(conversationTurnSchema).optional().describe("Earlier conversation turns"),
      },
    },
    async (input) =>
      runTool("ask_question", () =>
        orchestrator.ask({
          question: input.question,
          dataSourceId: input.data_source_id ?? null,
          topK: input.top_k,
          enableRewrite: input.enable_rewrite,
          enableHyde: input.enable_hyde,
          enableFallback: input.enable_fallback,
          userId: input.user_id ?? null,
          history: input.history,
        }),
      ),
  );

  server.registerTool(
    "chat",
    {
      title: "Chat",
      description: "Talks to the language model directly, without retrieval.",
      inputSchema: {
        question: z.string().min(1),
        user_id: z.string().optional(),
        history: z.array(conversationTurnSchema).optional(),
      },
    },
    async ({ question, user_id, history }) =>
      runTool("chat", () => orchestrator.chat({ question, userId: user_id ?? null, history })),
  );

  server.registerTool(
    "list_qa_history",
    {
      title: "List QA History",
      description: "Lists recorded questions and answers, newest first.",
      inputSchema: {
        user_id: z.string().optional(),
        data_source_id: z.string().optional(),
        limit: z.number().int().min(1).max(200).optional(),
      },
    },
    async ({ user_id, data_source_id, limit }) =>
      runTool("list_qa_history", async () => ({
        records: await store.listQaRecords({
          userId: user_id ?? null,
          dataSourceId: data_source_id ?? null,
          limit,
        }),
      })),
  );
}

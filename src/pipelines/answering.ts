import { ConversationTurn, RetrievedChunk } from "../domain/types.js";
import { ChatMessage } from "../infra/ai/types.js";
import { SourceRow } from "../infra/connectors/types.js";
import { formatValue } from "./rowRendering.js";

export const ANSWER_HISTORY_TURNS = 10;
export const CHAT_HISTORY_TURNS = 20;
export const MAX_FALLBACK_ROWS_IN_CONTEXT = 10;
export const NO_CONTEXT = "(no relevant content found)";

export const ANSWER_SYSTEM_PROMPT = [
  "You are a knowledge-base question answering assistant.",
  "Answer from the numbered knowledge-base passages in the user's message; they may come from database records, uploaded documents or web pages.",
  "If the passages do not contain the answer, say so instead of guessing.",
  "Keep the answer concise and cite passages like [1], [2].",
].join(" ");

export const CHAT_SYSTEM_PROMPT = [
  "You are a helpful, knowledgeable assistant.",
  "Answer using the conversation so far and give accurate, useful replies.",
].join(" ");

export interface Citation {
  chunkId: string;
  unit: string;
  rowId: string | null;
  source: RetrievedChunk["source"];
  score: number;
  snippet: string;
}

export function buildContext(chunks: RetrievedChunk[], fallbackRows: SourceRow[] = []): string {
  const parts: string[] = [];

  chunks.forEach((chunk, index) => {
    parts.push(`[${index + 1}] ${describeRetrieval(chunk)} | source: ${chunk.locator.unit}\n${chunk.text}\n`);
  });

  if (fallbackRows.length > 0) {
    parts.push("[Structured query results]");
    for (const row of fallbackRows.slice(0, MAX_FALLBACK_ROWS_IN_CONTEXT)) {
      parts.push(
        "  " +
          Object.entries(row)
            .map(([column, value]) => `${column}=${value === null || value === undefined ? "null" : formatValue(value)}`)
            .join(", "),
      );
    }
  }

  return parts.length > 0 ? parts.join("\n") : NO_CONTEXT;
}

export function describeRetrieval(chunk: RetrievedChunk): string {
  let label: string;
  switch (chunk.source) {
    case "bm25":
      label = `BM25 ${(chunk.bm25Score ?? 0).toFixed(2)}`;
      break;
    case "keyword":
      label = "keyword match";
      break;
    case "vector":
      label = `semantic ${Math.round(chunk.similarity * 100)}%`;
      break;
  }
  if (chunk.rerankScore !== undefined) {
    label += ` | rerank ${chunk.rerankScore.toFixed(3)}`;
  }
  return label;
}

export function buildAnswerMessages(
  question: string,
  context: string,
  history: ConversationTurn[] = [],
): ChatMessage[] {
  return [
    { role: "system", content: ANSWER_SYSTEM_PROMPT },
    ...recentTurns(history, ANSWER_HISTORY_TURNS),
    {
      role: "user",
      content: `Knowledge-base passages:\n${context}\n\nQuestion:\n${question}`,
    },
  ];
}

export function buildChatMessages(question: string, history: ConversationTurn[] = []): ChatMessage[] {
  return [
    { role: "system", content: CHAT_SYSTEM_PROMPT },
    ...recentTurns(history, CHAT_HISTORY_TURNS),
    { role: "user", content: question },
  ];
}

/** Last `limit` turns, keeping only non-empty user and assistant messages. */
export function recentTurns(history: ConversationTurn[], limit: number): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const turn of history.slice(-limit)) {
    if ((turn.role === "user" || turn.role === "assistant") && turn.content.trim()) {
      messages.push({ role: turn.role, content: turn.content });
    }
  }
  return messages;
}

export function toCitations(chunks: RetrievedChunk[]): Citation[] {
  return chunks.map((chunk) => ({
    chunkId: chunk.chunkId,
    unit: chunk.locator.unit,
    rowId: chunk.locator.rowId,
    source: chunk.source,
    score: Number((chunk.rerankScore ?? chunk.similarity).toFixed(4)),
    snippet: summarizeChunk(chunk.text),
  }));
}

function summarizeChunk(text: string): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= 280) {
    return normalized;
  }
  return `${normalized.slice(0, 277)}...`;
}

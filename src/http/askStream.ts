import { ServerResponse } from "node:http";
import registerDebug from "debug";
import { z } from "zod";
import { describeError } from "../domain/errors.js";
import { conversationTurnSchema } from "../domain/schemas.js";
import { AnswerOrchestrator, AnswerStreamEvent } from "../services/answerOrchestrator.js";

const debugStream = registerDebug("kbqa:http:stream");

export const askStreamRequestSchema = z.object({
  question: z.string().min(1),
  mode: z.enum(["rag", "chat"]).default("rag"),
  data_source_id: z.string().optional(),
  top_k: z.number().int().min(1).max(20).optional(),
  enable_rewrite: z.boolean().optional(),
  enable_hyde: z.boolean().optional(),
  enable_fallback: z.boolean().optional(),
  user_id: z.string().optional(),
  history: z.array(conversationTurnSchema).optional(),
});

export type AskStreamRequest = z.infer<typeof askStreamRequestSchema>;

export interface EventSink {
  write(chunk: string): unknown;
  end(): unknown;
}

export function formatSseEvent(event: AnswerStreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

/**
 * Writes each event as one SSE frame. Once `signal` aborts nothing more is written and the
 * event source is closed, which cancels its generation.
 */
export async function pipeAnswerStream(
  events: AsyncIterable<AnswerStreamEvent>,
  sink: EventSink,
  signal: AbortSignal,
): Promise<void> {
  for await (const event of events) {
    if (signal.aborted) {
      return;
    }
    sink.write(formatSseEvent(event));
  }
  if (!signal.aborted) {
    sink.end();
  }
}

export function openAnswerStream(
  orchestrator: AnswerOrchestrator,
  request: AskStreamRequest,
  signal: AbortSignal,
): AsyncGenerator<AnswerStreamEvent> {
  const history = request.history ?? [];
  const userId = request.user_id ?? null;
  if (request.mode === "chat") {
    return orchestrator.chatStream({ question: request.question, userId, history }, signal);
  }
  return orchestrator.askStream(
    {
      question: request.question,
      dataSourceId: request.data_source_id ?? null,
      topK: request.top_k,
      enableRewrite: request.enable_rewrite,
      enableHyde: request.enable_hyde,
      enableFallback: request.enable_fallback,
      userId,
      history,
    },
    signal,
  );
}

/** POST /api/ask-stream. A client that disconnects aborts the generation. */
export async function handleAskStream(
  body: unknown,
  res: ServerResponse,
  orchestrator: AnswerOrchestrator,
): Promise<void> {
  const request = askStreamRequestSchema.parse(body);
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      debugStream("client disconnected before the stream finished");
      controller.abort();
    }
  });

  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
  });

  try {
    await pipeAnswerStream(openAnswerStream(orchestrator, request, controller.signal), res, controller.signal);
  } catch (error) {
    debugStream(`stream failed: ${describeError(error)}`);
    if (!res.writableEnded) {
      res.end(formatSseEvent({ type: "error", message: describeError(error) }));
    }
  }
}

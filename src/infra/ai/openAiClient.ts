import registerDebug from "debug";
import { z } from "zod";
import { readLines } from "./streaming.js";
import { ChatMessage, EmbeddingProvider, GenerationClient } from "./types.js";

const debugOpenAi = registerDebug("kbqa:ai:openai");

interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  dimension: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

const chatChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({
        content: z.string().nullish(),
      }),
    }),
  ),
});

const EMBEDDING_BATCH_SIZE = 64;

export class OpenAiClient implements EmbeddingProvider, GenerationClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  get dimension(): number {
    return this.options.dimension;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBEDDING_BATCH_SIZE);
      embeddings.push(...(await this.embedOnce(batch)));
    }
    return embeddings;
  }

  async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const response = await this.post("/chat/completions", this.buildChatRequest(messages, false), signal);
    if (!response.ok) {
      throw new Error(`OpenAI chat failed (${response.status}): ${await response.text()}`);
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.choices[0]?.message.content?.trim() ?? "";
  }

  async *completeStream(messages: ChatMessage[], signal?: AbortSignal): AsyncGenerator<string> {
    const response = await this.post("/chat/completions", this.buildChatRequest(messages, true), signal);
    if (!response.ok) {
      throw new Error(`OpenAI chat stream failed (${response.status}): ${await response.text()}`);
    }
    if (!response.body) {
      throw new Error("OpenAI chat stream returned empty body.");
    }

    for await (const line of readLines(response.body)) {
      const trimmed = line.trim();
      if (!trimmed.startsWith("data:")) {
        continue;
      }
      const payload = trimmed.slice("data:".length).trim();
      if (payload === "[DONE]") {
        return;
      }
      const chunk = chatChunkSchema.parse(JSON.parse(payload));
      const token = chunk.choices[0]?.delta.content ?? "";
      if (token) {
        yield token;
      }
    }
  }

  private async embedOnce(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.post("/embeddings", {
      model: this.options.embeddingModel,
      input: texts,
      dimensions: this.options.dimension,
    });
    if (!response.ok) {
      throw new Error(`OpenAI embeddings failed (${response.status}): ${await response.text()}`);
    }

    const data = embeddingResponseSchema.parse(await response.json());
    debugOpenAi(`embedded ${texts.length} texts`);
    return data.data.sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  private buildChatRequest(messages: ChatMessage[], stream: boolean) {
    return {
      model: this.options.chatModel,
      temperature: 0.2,
      stream,
      messages,
    };
  }

  private post(path: string, body: unknown, signal?: AbortSignal): Promise<Response> {
    return fetch(`${this.options.baseUrl.replace(/\/+$/, "")}${path}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal,
    });
  }
}

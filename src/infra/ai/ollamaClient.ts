import { z } from "zod";
import { readLines } from "./streaming.js";
import { ChatMessage, EmbeddingProvider, GenerationClient } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  dimension: number;
}

const embeddingSchema = z.object({
  embedding: z.array(z.number()).default([]),
});

const chatChunkSchema = z.object({
  message: z.object({ content: z.string().default("") }).optional(),
  done: z.boolean().default(false),
});

/** Ollama embeds one prompt per request, so batches fan out over a few parallel requests. */
const PARALLEL_EMBEDDINGS = 4;

const GENERATION_OPTIONS = { temperature: 0.1, top_p: 0.9 };

export class OllamaClient implements EmbeddingProvider, GenerationClient {
  constructor(private readonly options: OllamaClientOptions) {}

  get dimension(): number {
    return this.options.dimension;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (let start = 0; start < texts.length; start += PARALLEL_EMBEDDINGS) {
      const slice = texts.slice(start, start + PARALLEL_EMBEDDINGS);
      results.push(...(await Promise.all(slice.map((text) => this.embed(text)))));
    }
    return results;
  }

  async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const response = await this.post("/api/chat", this.chatBody(messages, false), signal);
    const { message } = chatChunkSchema.parse(await response.json());
    return (message?.content ?? "").trim();
  }

  async *completeStream(messages: ChatMessage[], signal?: AbortSignal): AsyncGenerator<string> {
    const response = await this.post("/api/chat", this.chatBody(messages, true), signal);
    if (!response.body) {
      throw new Error("Ollama /api/chat streamed no body");
    }

    for await (const line of readLines(response.body)) {
      if (!line.trim()) {
        continue;
      }
      const chunk = chatChunkSchema.parse(JSON.parse(line));
      if (chunk.message?.content) {
        yield chunk.message.content;
      }
      if (chunk.done) {
        return;
      }
    }
  }

  private async embed(text: string): Promise<number[]> {
    const response = await this.post("/api/embeddings", { model: this.options.embeddingModel, prompt: text });
    const { embedding } = embeddingSchema.parse(await response.json());
    if (embedding.length === 0) {
      throw new Error(`Ollama model ${this.options.embeddingModel} returned an empty embedding`);
    }
    return embedding;
  }

  private chatBody(messages: ChatMessage[], stream: boolean) {
    return {
      model: this.options.chatModel,
      messages,
      stream,
      keep_alive: "30m",
      options: GENERATION_OPTIONS,
    };
  }

  /** Rejects on any non-2xx status with the response text attached. */
  private async post(path: string, body: unknown, signal?: AbortSignal): Promise<Response> {
    const response = await fetch(`${this.options.baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Ollama ${path} failed (${response.status}): ${await response.text()}`);
    }
    return response;
  }
}

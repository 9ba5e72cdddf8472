export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface EmbeddingProvider {
  readonly dimension: number;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Blocking and streaming chat completion. `completeStream` stops reading from the backend as
 * soon as `signal` aborts or the consumer stops iterating.
 */
export interface GenerationClient {
  complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
  completeStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string>;
}

export interface Reranker {
  /** One relevance score per document, in input order. */
  rerank(query: string, documents: string[]): Promise<number[]>;
}

import { AppConfig, AiProvider } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { CrossEncoderReranker } from "./crossEncoderReranker.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { EmbeddingProvider, GenerationClient, Reranker } from "./types.js";

export interface AiClients {
  embedder: EmbeddingProvider;
  generator: GenerationClient;
  reranker: Reranker | null;
}

export function createAiClients(config: AppConfig): AiClients {
  return {
    embedder: createClient(config, config.embeddingProvider),
    generator: createClient(config, config.generationProvider),
    reranker:
      config.enableReranker && config.rerankerUrl
        ? new CrossEncoderReranker({ baseUrl: config.rerankerUrl, model: config.rerankerModel })
        : null,
  };
}

function createClient(config: AppConfig, provider: AiProvider): OpenAiClient | OllamaClient {
  if (provider === "openai") {
    if (!config.openaiApiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      embeddingModel: config.openaiEmbeddingModel,
      chatModel: config.openaiChatModel,
      dimension: config.vectorDimension,
    });
  }
  return new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    chatModel: config.ollamaChatModel,
    embeddingModel: config.ollamaEmbeddingModel,
    dimension: config.vectorDimension,
  });
}

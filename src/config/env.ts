import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const booleanFlag = z
  .enum(["true", "false"])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === "true"));

const envSchema = z.object({
  STORE: z.enum(["memory", "postgres"]).default("memory"),
  DATABASE_URL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).optional(),
  GENERATION_PROVIDER: z.enum(["openai", "ollama"]).optional(),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("bge-m3"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1024),
  REEMBED_ON_DIMENSION_CHANGE: booleanFlag,
  ENABLE_RERANKER: booleanFlag,
  RERANKER_URL: z.string().optional(),
  RERANKER_MODEL: z.string().default("BAAI/bge-reranker-base"),
  RERANKER_CANDIDATE_MULTIPLIER: z.coerce.number().int().min(1).max(10).default(3),
  ENABLE_EMBEDDING_CACHE: booleanFlag,
  EMBEDDING_CACHE_SIZE: z.coerce.number().int().positive().default(2000),
  ENABLE_RESULT_CACHE: booleanFlag,
  RESULT_CACHE_SIZE: z.coerce.number().int().positive().default(200),
  RESULT_CACHE_TTL: z.coerce.number().int().positive().default(300),
  CHUNK_SIZE: z.coerce.number().int().min(32).default(512),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(64),
  LEXICAL_TOKENIZER: z.enum(["auto", "segmenter", "basic"]).default("auto"),
  UPLOAD_DIR: z.string().default("uploads"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_NAMESPACES: z.string().default("kbqa:*"),
});

export type AiProvider = "openai" | "ollama";

export interface AppConfig {
  store: "memory" | "postgres";
  databaseUrl: string | null;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  embeddingProvider: AiProvider;
  generationProvider: AiProvider;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  vectorDimension: number;
  reembedOnDimensionChange: boolean;
  enableReranker: boolean;
  rerankerUrl: string | null;
  rerankerModel: string;
  rerankerCandidateMultiplier: number;
  enableEmbeddingCache: boolean;
  embeddingCacheSize: number;
  enableResultCache: boolean;
  resultCacheSize: number;
  resultCacheTtlSeconds: number;
  chunkSize: number;
  chunkOverlap: number;
  lexicalTokenizer: "auto" | "segmenter" | "basic";
  uploadDir: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
  logNamespaces: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.STORE === "postgres" && !parsed.DATABASE_URL) {
    throw new ConfigurationError("STORE=postgres requires DATABASE_URL.");
  }

  const defaultProvider: AiProvider = parsed.OPENAI_API_KEY ? "openai" : "ollama";
  const embeddingProvider = parsed.EMBEDDING_PROVIDER ?? defaultProvider;
  const generationProvider = parsed.GENERATION_PROVIDER ?? defaultProvider;

  if (
    (embeddingProvider === "openai" || generationProvider === "openai") &&
    !parsed.OPENAI_API_KEY
  ) {
    throw new ConfigurationError("The openai provider requires OPENAI_API_KEY.");
  }

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigurationError("CHUNK_OVERLAP must be smaller than CHUNK_SIZE.");
  }

  const enableReranker = (parsed.ENABLE_RERANKER ?? true) && Boolean(parsed.RERANKER_URL);

  return {
    store: parsed.STORE,
    databaseUrl: parsed.DATABASE_URL ?? null,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    embeddingProvider,
    generationProvider,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    vectorDimension: parsed.VECTOR_DIMENSION,
    reembedOnDimensionChange: parsed.REEMBED_ON_DIMENSION_CHANGE ?? false,
    enableReranker,
    rerankerUrl: parsed.RERANKER_URL ?? null,
    rerankerModel: parsed.RERANKER_MODEL,
    rerankerCandidateMultiplier: parsed.RERANKER_CANDIDATE_MULTIPLIER,
    enableEmbeddingCache: parsed.ENABLE_EMBEDDING_CACHE ?? true,
    embeddingCacheSize: parsed.EMBEDDING_CACHE_SIZE,
    enableResultCache: parsed.ENABLE_RESULT_CACHE ?? true,
    resultCacheSize: parsed.RESULT_CACHE_SIZE,
    resultCacheTtlSeconds: parsed.RESULT_CACHE_TTL,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    lexicalTokenizer: parsed.LEXICAL_TOKENIZER,
    uploadDir: parsed.UPLOAD_DIR,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logNamespaces: parsed.LOG_NAMESPACES,
  };
}

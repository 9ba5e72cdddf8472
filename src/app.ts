import registerDebug from "debug";
import { AppConfig } from "./config/env.js";
import { KnowledgeStore } from "./domain/knowledgeStore.js";
import { AiClients, createAiClients } from "./infra/ai/createAiClients.js";
import { EmbeddingCache } from "./infra/cache/embeddingCache.js";
import { ResultCache } from "./infra/cache/resultCache.js";
import { createConnector } from "./infra/connectors/createConnector.js";
import { ConnectorFactory } from "./infra/connectors/types.js";
import { DocumentExtractor, Extractor } from "./infra/parsers/documentLoader.js";
import { createKnowledgeStore } from "./infra/store/createKnowledgeStore.js";
import { RetrievalFusion } from "./pipelines/retrievalFusion.js";
import { StructuredFallback } from "./pipelines/structuredFallback.js";
import { AnswerOrchestrator, AskResult } from "./services/answerOrchestrator.js";
import { DataSourceService } from "./services/dataSourceService.js";
import { LexicalIndex } from "./services/lexicalIndex.js";
import { SyncPipeline, SyncProgressEvent } from "./services/syncPipeline.js";
import { VectorIndex } from "./services/vectorIndex.js";
import { createTokenizer, resolveTokenizerCapability } from "./utils/text.js";

const debugApp = registerDebug("kbqa:app");

export interface ServiceDeps {
  config: AppConfig;
  store: KnowledgeStore;
  ai: AiClients;
  connectorFactory?: ConnectorFactory;
  extractor?: Extractor;
  onProgress?: (event: SyncProgressEvent) => void;
}

export interface AppServices {
  config: AppConfig;
  store: KnowledgeStore;
  resultCache: ResultCache<AskResult>;
  embeddingCache: EmbeddingCache;
  vectorIndex: VectorIndex;
  lexicalIndex: LexicalIndex;
  syncPipeline: SyncPipeline;
  dataSources: DataSourceService;
  orchestrator: AnswerOrchestrator;
  /** Waits for running syncs, then releases the store. */
  close(): Promise<void>;
}

export function buildServices(deps: ServiceDeps): AppServices {
  const { config, store, ai } = deps;
  const connectorFactory = deps.connectorFactory ?? createConnector;
  const extractor = deps.extractor ?? new DocumentExtractor();

  const capability = resolveTokenizerCapability(config.lexicalTokenizer);
  debugApp(`lexical tokenizer: ${capability}`);

  const embeddingCache = new EmbeddingCache({
    enabled: config.enableEmbeddingCache,
    capacity: config.embeddingCacheSize,
  });
  const resultCache = new ResultCache<AskResult>({
    enabled: config.enableResultCache,
    capacity: config.resultCacheSize,
    ttlSeconds: config.resultCacheTtlSeconds,
  });

  const vectorIndex = new VectorIndex({ store, embedder: ai.embedder, cache: embeddingCache });
  const lexicalIndex = new LexicalIndex({ store, tokenizer: createTokenizer(capability) });

  const syncPipeline = new SyncPipeline({
    store,
    vectorIndex,
    lexicalIndex,
    versions: resultCache,
    extractor,
    connectorFactory,
    uploadDir: config.uploadDir,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    onProgress: deps.onProgress,
  });

  const dataSources = new DataSourceService({
    store,
    syncPipeline,
    lexicalIndex,
    versions: resultCache,
    connectorFactory,
    uploadDir: config.uploadDir,
  });

  const orchestrator = new AnswerOrchestrator({
    store,
    generator: ai.generator,
    fusion: new RetrievalFusion({
      vectorIndex,
      lexicalIndex,
      reranker: ai.reranker,
      candidateMultiplier: config.rerankerCandidateMultiplier,
    }),
    fallback: new StructuredFallback({ generator: ai.generator, connectorFactory }),
    resultCache,
  });

  return {
    config,
    store,
    resultCache,
    embeddingCache,
    vectorIndex,
    lexicalIndex,
    syncPipeline,
    dataSources,
    orchestrator,
    async close() {
      await syncPipeline.waitForSync();
      await store.close();
    },
  };
}

export async function createApp(config: AppConfig): Promise<AppServices> {
  const ai = createAiClients(config);
  const store = await createKnowledgeStore(config);
  debugApp(
    `store=${config.store} embeddings=${config.embeddingProvider} generation=${config.generationProvider} ` +
      `reranker=${config.enableReranker ? "on" : "off"}`,
  );
  return buildServices({ config, store, ai });
}

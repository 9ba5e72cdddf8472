import registerDebug from "debug";
import { describeError, NotFoundError } from "../domain/errors.js";
import { KnowledgeStore } from "../domain/knowledgeStore.js";
import {
  ConversationTurn,
  DataSourceRecord,
  NewQaRecord,
  PipelineStep,
  RetrievedChunk,
} from "../domain/types.js";
import { ChatMessage, GenerationClient } from "../infra/ai/types.js";
import { ResultCache } from "../infra/cache/resultCache.js";
import { SourceRow } from "../infra/connectors/types.js";
import {
  buildAnswerMessages,
  buildChatMessages,
  buildContext,
  Citation,
  toCitations,
} from "../pipelines/answering.js";
import { expandQuery, fallbackExpansion, generateHypotheticalPassage } from "../pipelines/queryExpansion.js";
import { RetrievalFusion } from "../pipelines/retrievalFusion.js";
import { shouldTriggerFallback, StructuredFallback } from "../pipelines/structuredFallback.js";
import { questionPrefix } from "../utils/text.js";

const debugAnswer = registerDebug("kbqa:answer");
const debugAnswerError = registerDebug("kbqa:answer:error");

export const DEFAULT_TOP_K = 5;

export interface AskOptions {
  question: string;
  dataSourceId?: string | null;
  topK?: number;
  enableRewrite?: boolean;
  enableHyde?: boolean;
  enableFallback?: boolean;
  userId?: string | null;
  history?: ConversationTurn[];
}

export interface ChatOptions {
  question: string;
  userId?: string | null;
  history?: ConversationTurn[];
}

export interface AskResult {
  question: string;
  answer: string;
  dataSourceId: string | null;
  chunks: RetrievedChunk[];
  citations: Citation[];
  pipelineTrace: PipelineStep[];
  fallbackUsed: boolean;
}

export type AnswerStreamEvent =
  | { type: "retrieval_done"; chunks: RetrievedChunk[]; trace: PipelineStep[] }
  | { type: "token"; token: string }
  | { type: "done"; answer: string }
  | { type: "error"; message: string };

export interface AnswerOrchestratorDeps {
  store: KnowledgeStore;
  generator: GenerationClient;
  fusion: RetrievalFusion;
  fallback: StructuredFallback;
  resultCache: ResultCache<AskResult>;
}

interface RetrievalOutcome {
  chunks: RetrievedChunk[];
  fallbackRows: SourceRow[];
  fallbackUsed: boolean;
  trace: PipelineStep[];
}

interface ResolvedAsk {
  question: string;
  dataSourceId: string | null;
  topK: number;
  enableRewrite: boolean;
  enableHyde: boolean;
  enableFallback: boolean;
  userId: string | null;
  history: ConversationTurn[];
}

export class AnswerOrchestrator {
  constructor(private readonly deps: AnswerOrchestratorDeps) {}

  /**
   * Questions without history are served from the result cache when the data source has not
   * been re-synced since. Conversation history changes what the question means, so it
   * bypasses the cache in both directions.
   */
  async ask(options: AskOptions): Promise<AskResult> {
    const request = resolveAsk(options);
    const useCache = request.history.length === 0;
    const cacheKey = this.deps.resultCache.buildKey(request);

    if (useCache) {
      const cached = this.deps.resultCache.get(cacheKey);
      if (cached) {
        debugAnswer(`cache hit for "${questionPrefix(request.question)}"`);
        return cached;
      }
    }

    const retrieval = await this.retrieve(request);
    const context = buildContext(retrieval.chunks, retrieval.fallbackRows);
    const answer = await this.deps.generator.complete(buildAnswerMessages(request.question, context, request.history));

    const result: AskResult = {
      question: request.question,
      answer,
      dataSourceId: request.dataSourceId,
      chunks: retrieval.chunks,
      citations: toCitations(retrieval.chunks),
      pipelineTrace: retrieval.trace,
      fallbackUsed: retrieval.fallbackUsed,
    };

    await this.audit(request, answer, retrieval, { mode: "rag", stream: false });
    if (useCache) {
      this.deps.resultCache.set(cacheKey, result);
    }
    return result;
  }

  /**
   * `retrieval_done`, then `token`s, then `done`; or `error` at any point, which ends the
   * stream. Stopping iteration early, or aborting `signal`, cancels the in-flight generation.
   */
  async *askStream(options: AskOptions, signal?: AbortSignal): AsyncGenerator<AnswerStreamEvent> {
    const request = resolveAsk(options);

    let retrieval: RetrievalOutcome;
    try {
      retrieval = await this.retrieve(request, signal);
    } catch (error) {
      if (signal?.aborted) {
        debugAnswer(`"${questionPrefix(request.question)}" aborted during retrieval`);
        return;
      }
      debugAnswerError(`retrieval failed for "${questionPrefix(request.question)}": ${describeError(error)}`);
      yield { type: "error", message: describeError(error) };
      return;
    }

    yield { type: "retrieval_done", chunks: retrieval.chunks, trace: retrieval.trace };

    const context = buildContext(retrieval.chunks, retrieval.fallbackRows);
    yield* this.streamGeneration(
      buildAnswerMessages(request.question, context, request.history),
      (answer) => this.audit(request, answer, retrieval, { mode: "rag", stream: true }),
      signal,
    );
  }

  async chat(options: ChatOptions): Promise<AskResult> {
    const history = options.history ?? [];
    const answer = await this.deps.generator.complete(buildChatMessages(options.question, history));
    await this.auditChat(options, answer, false);
    return {
      question: options.question,
      answer,
      dataSourceId: null,
      chunks: [],
      citations: [],
      pipelineTrace: [],
      fallbackUsed: false,
    };
  }

  async *chatStream(options: ChatOptions, signal?: AbortSignal): AsyncGenerator<AnswerStreamEvent> {
    yield { type: "retrieval_done", chunks: [], trace: [] };
    yield* this.streamGeneration(
      buildChatMessages(options.question, options.history ?? []),
      (answer) => this.auditChat(options, answer, true),
      signal,
    );
  }

  private async *streamGeneration(
    messages: ChatMessage[],
    onComplete: (answer: string) => Promise<void>,
    signal?: AbortSignal,
  ): AsyncGenerator<AnswerStreamEvent> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    let tokens: AsyncIterator<string> | null = null;
    try {
      let answer = "";
      try {
        tokens = this.deps.generator.completeStream(messages, controller.signal)[Symbol.asyncIterator]();
        while (!controller.signal.aborted) {
          const next = await tokens.next();
          if (next.done) {
            break;
          }
          answer += next.value;
          yield { type: "token", token: next.value };
        }
      } catch (error) {
        if (controller.signal.aborted) {
          return;
        }
        debugAnswerError(`generation stream failed: ${describeError(error)}`);
        yield { type: "error", message: describeError(error) };
        return;
      }

      if (controller.signal.aborted) {
        return;
      }
      // Recorded before `done` so a consumer that stops right after it still leaves an audit entry.
      await onComplete(answer);
      yield { type: "done", answer };
    } finally {
      controller.abort();
      signal?.removeEventListener("abort", forwardAbort);
      if (tokens?.return) {
        await tokens.return().catch((error: unknown) => {
          debugAnswerError(`closing generation stream failed: ${describeError(error)}`);
        });
      }
    }
  }

  /** An aborted `signal` stops the run at the next stage boundary and reaches the model calls. */
  private async retrieve(request: ResolvedAsk, signal?: AbortSignal): Promise<RetrievalOutcome> {
    const dataSource = await this.resolveDataSource(request.dataSourceId);
    const trace: PipelineStep[] = [];

    const expansion = request.enableRewrite
      ? await expandQuery(this.deps.generator, request.question, signal)
      : fallbackExpansion(request.question);
    if (request.enableRewrite) {
      trace.push({ step: "query_rewrite", keywords: expansion.keywords, variants: expansion.queries });
    }
    signal?.throwIfAborted();

    let hydePassage: string | null = null;
    if (request.enableHyde) {
      hydePassage = await generateHypotheticalPassage(
        this.deps.generator,
        request.question,
        expansion.hydeHint,
        signal,
      );
      trace.push(hydePassage ? { step: "hyde", document: hydePassage.slice(0, 80) } : { step: "hyde", skipped: true });
    }
    signal?.throwIfAborted();

    const fusion = await this.deps.fusion.retrieve({
      question: request.question,
      dataSourceId: request.dataSourceId,
      topK: request.topK,
      expansion,
      hydePassage,
    });
    trace.push(...fusion.trace);

    let fallbackRows: SourceRow[] = [];
    if (
      dataSource &&
      request.enableFallback &&
      shouldTriggerFallback({
        dataSource,
        lexicalHits: fusion.lexicalHits,
        maxVectorSimilarity: fusion.maxVectorSimilarity,
      })
    ) {
      debugAnswer(
        `structured fallback for "${questionPrefix(request.question)}" (max similarity ${fusion.maxVectorSimilarity.toFixed(3)})`,
      );
      const fallback = await this.deps.fallback.run(dataSource, request.question);
      trace.push(fallback.step);
      fallbackRows = fallback.rows;
    }

    return {
      chunks: fusion.chunks,
      fallbackRows,
      fallbackUsed: fallbackRows.length > 0,
      trace,
    };
  }

  private async resolveDataSource(dataSourceId: string | null): Promise<DataSourceRecord | null> {
    if (!dataSourceId) {
      return null;
    }
    const record = await this.deps.store.getDataSource(dataSourceId);
    if (!record) {
      throw new NotFoundError("DataSource", dataSourceId);
    }
    return record;
  }

  private async audit(
    request: ResolvedAsk,
    answer: string,
    retrieval: RetrievalOutcome,
    details: { mode: "rag"; stream: boolean },
  ): Promise<void> {
    await this.saveRecord({
      userId: request.userId,
      dataSourceId: request.dataSourceId,
      question: request.question,
      answer,
      chunks: retrieval.chunks.map((chunk) => ({
        chunkId: chunk.chunkId,
        similarity: chunk.similarity,
        source: chunk.source,
        unit: chunk.locator.unit,
        rerankScore: chunk.rerankScore ?? null,
      })),
      // Copied: the caller owns the returned trace.
      trace: retrieval.trace.map((step) => ({ ...step })),
      details: {
        ...details,
        topK: request.topK,
        fallbackUsed: retrieval.fallbackUsed,
        rerankerEnabled: this.deps.fusion.rerankerEnabled,
        hasHistory: request.history.length > 0,
      },
    });
  }

  private async auditChat(options: ChatOptions, answer: string, stream: boolean): Promise<void> {
    await this.saveRecord({
      userId: options.userId ?? null,
      dataSourceId: null,
      question: options.question,
      answer,
      chunks: [],
      trace: [],
      details: { mode: "chat", stream, hasHistory: (options.history ?? []).length > 0 },
    });
  }

  /** The audit trail never fails an answer. */
  private async saveRecord(record: NewQaRecord): Promise<void> {
    try {
      await this.deps.store.saveQaRecord(record);
    } catch (error) {
      debugAnswerError(
        `saving QA record failed (data source ${record.dataSourceId ?? "none"}, "${questionPrefix(record.question)}"): ${describeError(error)}`,
      );
    }
  }
}

function resolveAsk(options: AskOptions): ResolvedAsk {
  return {
    question: options.question,
    dataSourceId: options.dataSourceId ?? null,
    topK: Math.max(1, Math.floor(options.topK ?? DEFAULT_TOP_K)),
    enableRewrite: options.enableRewrite ?? true,
    enableHyde: options.enableHyde ?? true,
    enableFallback: options.enableFallback ?? true,
    userId: options.userId ?? null,
    history: options.history ?? [],
  };
}

import registerDebug from "debug";
import { describeError } from "../domain/errors.js";
import { DatabaseDescriptor, DataSourceRecord, PipelineStep } from "../domain/types.js";
import { GenerationClient } from "../infra/ai/types.js";
import { ConnectorFactory, SourceConnector, SourceRow } from "../infra/connectors/types.js";
import { questionPrefix } from "../utils/text.js";
import { stripCodeFence } from "./queryExpansion.js";

const debugFallback = registerDebug("kbqa:fallback");
const debugFallbackError = registerDebug("kbqa:fallback:error");

export const FALLBACK_SIMILARITY_THRESHOLD = 0.45;
export const MAX_SCHEMA_TABLES = 20;
export const FALLBACK_ROW_LIMIT = 10;
export const CANNOT_GENERATE = "CANNOT_GENERATE";

export interface TableSchema {
  table: string;
  columns: string[];
}

export interface FallbackSignal {
  dataSource: DataSourceRecord | null;
  lexicalHits: number;
  maxVectorSimilarity: number;
}

export interface FallbackResult {
  rows: SourceRow[];
  query: string | null;
  step: PipelineStep;
}

/**
 * Every condition must hold: a scoped database source, no lexical hit, and weak vector
 * similarity. Lexical hits veto the fallback whatever the similarity.
 */
export function shouldTriggerFallback(signal: FallbackSignal): boolean {
  return (
    signal.dataSource !== null &&
    signal.dataSource.kind === "database" &&
    signal.lexicalHits === 0 &&
    signal.maxVectorSimilarity < FALLBACK_SIMILARITY_THRESHOLD
  );
}

export interface StructuredFallbackDeps {
  generator: GenerationClient;
  connectorFactory: ConnectorFactory;
}

/**
 * Generates one query from the source's schema and runs it against the live source.
 * The generated text is executed as is; nothing checks what it does beyond asking for a
 * row limit in the prompt.
 */
export class StructuredFallback {
  constructor(private readonly deps: StructuredFallbackDeps) {}

  /** Never throws. Any failure yields no rows. */
  async run(dataSource: DataSourceRecord, question: string): Promise<FallbackResult> {
    const descriptor = dataSource.descriptor;
    if (descriptor.kind !== "database") {
      return { rows: [], query: null, step: { step: "sql_fallback", skipped: "not a database source" } };
    }

    const connector = this.deps.connectorFactory(descriptor);
    let query: string | null = null;
    try {
      await connector.connect();
      const schemas = await enumerateSchemas(connector);
      query = await generateStructuredQuery(this.deps.generator, question, schemas, descriptor.engine);
      if (!query) {
        debugFallback(`no query generated for "${questionPrefix(question)}"`);
        return { rows: [], query: null, step: { step: "sql_fallback", generated: false, rows: 0 } };
      }

      debugFallback(`running generated query on ${dataSource.id}: ${query}`);
      const rows = await connector.runQuery(query);
      return { rows, query, step: { step: "sql_fallback", generated: true, rows: rows.length } };
    } catch (error) {
      debugFallbackError(
        `fallback failed (data source ${dataSource.id}, "${questionPrefix(question)}"): ${describeError(error)}`,
      );
      return { rows: [], query, step: { step: "sql_fallback", error: describeError(error), rows: 0 } };
    } finally {
      await connector.close().catch((error: unknown) => {
        debugFallbackError(`closing connector for ${dataSource.id} failed: ${describeError(error)}`);
      });
    }
  }
}

/** Tables whose columns cannot be read are left out. */
export async function enumerateSchemas(connector: SourceConnector): Promise<TableSchema[]> {
  const tables = (await connector.listTables()).slice(0, MAX_SCHEMA_TABLES);
  const schemas: TableSchema[] = [];
  for (const table of tables) {
    try {
      schemas.push({ table, columns: await connector.listColumns(table) });
    } catch (error) {
      debugFallbackError(`cannot list columns of ${table}: ${describeError(error)}`);
    }
  }
  return schemas;
}

/** Null for the sentinel or an empty reply. Generation errors propagate. */
export async function generateStructuredQuery(
  generator: GenerationClient,
  question: string,
  schemas: TableSchema[],
  engine: DatabaseDescriptor["engine"],
): Promise<string | null> {
  if (schemas.length === 0) {
    return null;
  }

  const schemaText = schemas.map((schema) => `Table ${schema.table}: columns ${schema.columns.join(", ")}`).join("\n");
  const raw = await generator.complete([
    {
      role: "system",
      content: [
        `You are a ${engine} expert. Write one SQL query that answers the user's question.`,
        "Output the SQL only, without explanation.",
        `Always add LIMIT ${FALLBACK_ROW_LIMIT}. Use LIKE '%term%' for fuzzy matches.`,
        `If no valid query can answer the question, output ${CANNOT_GENERATE}.`,
      ].join("\n"),
    },
    { role: "user", content: `Schema:\n${schemaText}\n\nQuestion: ${question}` },
  ]);

  const sql = stripCodeFence(raw).replace(/^sql\s+/i, "").trim();
  if (!sql || sql.includes(CANNOT_GENERATE)) {
    return null;
  }
  return sql;
}

import { DatabaseDescriptor } from "../../domain/types.js";

export type SourceRow = Record<string, unknown>;

/**
 * One live connection to a database-backed data source. Callers own the lifecycle:
 * `connect` before use, `close` on every exit path.
 */
export interface SourceConnector {
  readonly engine: DatabaseDescriptor["engine"];
  connect(): Promise<void>;
  close(): Promise<void>;
  /** Opens and closes its own connection; never throws. */
  testConnection(): Promise<boolean>;
  listTables(): Promise<string[]>;
  listColumns(table: string): Promise<string[]>;
  fetchRows(table: string, columns?: string[] | null): Promise<SourceRow[]>;
  /** Executes caller-supplied query text as is. Used by the structured-query fallback. */
  runQuery(sql: string): Promise<SourceRow[]>;
}

export type ConnectorFactory = (descriptor: DatabaseDescriptor) => SourceConnector;

export function quoteIdentifier(name: string, quote: '"' | "`" = '"'): string {
  return `${quote}${name.split(quote).join(quote + quote)}${quote}`;
}

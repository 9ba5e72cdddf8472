import Database from "better-sqlite3";
import registerDebug from "debug";
import { DatabaseDescriptor } from "../../domain/types.js";
import { quoteIdentifier, SourceConnector, SourceRow } from "./types.js";

const debugConnector = registerDebug("kbqa:connector:sqlite");

export class SqliteConnector implements SourceConnector {
  readonly engine = "sqlite" as const;

  private db: Database.Database | null = null;

  constructor(private readonly descriptor: DatabaseDescriptor) {}

  async connect(): Promise<void> {
    if (this.db) {
      return;
    }
    const filePath = this.descriptor.filePath ?? this.descriptor.database;
    if (!filePath) {
      throw new Error("SQLite data sources need a filePath.");
    }
    this.db = new Database(filePath, { readonly: true, fileMustExist: true });
  }

  async close(): Promise<void> {
    const db = this.db;
    this.db = null;
    db?.close();
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.connect();
      this.requireDb().prepare("SELECT 1").get();
      return true;
    } catch (error) {
      debugConnector(`connection test failed: ${String(error)}`);
      return false;
    } finally {
      await this.close();
    }
  }

  async listTables(): Promise<string[]> {
    return this.requireDb()
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`,
      )
      .all()
      .map((row) => row.name);
  }

  async listColumns(table: string): Promise<string[]> {
    return this.requireDb()
      .prepare<[], { name: string }>(`PRAGMA table_info(${quoteIdentifier(table)})`)
      .all()
      .map((row) => row.name);
  }

  async fetchRows(table: string, columns?: string[] | null): Promise<SourceRow[]> {
    const projection = columns?.length ? columns.map((column) => quoteIdentifier(column)).join(", ") : "*";
    return this.requireDb()
      .prepare<[], SourceRow>(`SELECT ${projection} FROM ${quoteIdentifier(table)}`)
      .all();
  }

  async runQuery(sql: string): Promise<SourceRow[]> {
    const statement = this.requireDb().prepare<[], SourceRow>(sql);
    if (!statement.reader) {
      throw new Error("Only row-returning statements can run against a SQLite source.");
    }
    return statement.all();
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error("SQLite connector is not connected.");
    }
    return this.db;
  }
}

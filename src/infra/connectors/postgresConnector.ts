import { Client } from "pg";
import registerDebug from "debug";
import { DatabaseDescriptor } from "../../domain/types.js";
import { quoteIdentifier, SourceConnector, SourceRow } from "./types.js";

const debugConnector = registerDebug("kbqa:connector:postgres");

export class PostgresConnector implements SourceConnector {
  readonly engine = "postgresql" as const;

  private client: Client | null = null;

  constructor(private readonly descriptor: DatabaseDescriptor) {}

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }
    const client = new Client({
      host: this.descriptor.host,
      port: this.descriptor.port ?? 5432,
      database: this.descriptor.database,
      user: this.descriptor.username,
      password: this.descriptor.password,
    });
    await client.connect();
    this.client = client;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.end();
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.connect();
      await this.requireClient().query("SELECT 1");
      return true;
    } catch (error) {
      debugConnector(`connection test failed: ${String(error)}`);
      return false;
    } finally {
      await this.close();
    }
  }

  async listTables(): Promise<string[]> {
    const result = await this.requireClient().query<{ tablename: string }>(
      `SELECT tablename FROM pg_tables WHERE schemaname = 'public' ORDER BY tablename`,
    );
    return result.rows.map((row) => row.tablename);
  }

  async listColumns(table: string): Promise<string[]> {
    const result = await this.requireClient().query<{ column_name: string }>(
      `
        SELECT column_name FROM information_schema.columns
        WHERE table_schema = 'public' AND table_name = $1
        ORDER BY ordinal_position
      `,
      [table],
    );
    return result.rows.map((row) => row.column_name);
  }

  async fetchRows(table: string, columns?: string[] | null): Promise<SourceRow[]> {
    const projection = columns?.length ? columns.map((column) => quoteIdentifier(column)).join(", ") : "*";
    const result = await this.requireClient().query<SourceRow>(
      `SELECT ${projection} FROM ${quoteIdentifier(table)}`,
    );
    return result.rows;
  }

  async runQuery(sql: string): Promise<SourceRow[]> {
    const result = await this.requireClient().query<SourceRow>(sql);
    return result.rows;
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error("PostgreSQL connector is not connected.");
    }
    return this.client;
  }
}

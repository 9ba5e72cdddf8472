import mysql, { Connection, RowDataPacket } from "mysql2/promise";
import registerDebug from "debug";
import { DatabaseDescriptor } from "../../domain/types.js";
import { quoteIdentifier, SourceConnector, SourceRow } from "./types.js";

const debugConnector = registerDebug("kbqa:connector:mysql");

export class MysqlConnector implements SourceConnector {
  readonly engine = "mysql" as const;

  private connection: Connection | null = null;

  constructor(private readonly descriptor: DatabaseDescriptor) {}

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }
    this.connection = await mysql.createConnection({
      host: this.descriptor.host,
      port: this.descriptor.port ?? 3306,
      database: this.descriptor.database,
      user: this.descriptor.username,
      password: this.descriptor.password,
      charset: "utf8mb4",
    });
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await connection.end();
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.connect();
      await this.requireConnection().query("SELECT 1");
      return true;
    } catch (error) {
      debugConnector(`connection test failed: ${String(error)}`);
      return false;
    } finally {
      await this.close();
    }
  }

  async listTables(): Promise<string[]> {
    const [rows] = await this.requireConnection().query<RowDataPacket[]>(
      `SELECT table_name AS name FROM information_schema.tables
       WHERE table_schema = DATABASE() AND table_type = 'BASE TABLE'
       ORDER BY table_name`,
    );
    return rows.map((row) => String(row.name));
  }

  async listColumns(table: string): Promise<string[]> {
    const [rows] = await this.requireConnection().query<RowDataPacket[]>(
      `SELECT column_name AS name FROM information_schema.columns
       WHERE table_schema = DATABASE() AND table_name = ?
       ORDER BY ordinal_position`,
      [table],
    );
    return rows.map((row) => String(row.name));
  }

  async fetchRows(table: string, columns?: string[] | null): Promise<SourceRow[]> {
    const projection = columns?.length
      ? columns.map((column) => quoteIdentifier(column, "`")).join(", ")
      : "*";
    const [rows] = await this.requireConnection().query<RowDataPacket[]>(
      `SELECT ${projection} FROM ${quoteIdentifier(table, "`")}`,
    );
    return rows.map((row) => ({ ...row }));
  }

  async runQuery(sql: string): Promise<SourceRow[]> {
    const [rows] = await this.requireConnection().query<RowDataPacket[]>(sql);
    return rows.map((row) => ({ ...row }));
  }

  private requireConnection(): Connection {
    if (!this.connection) {
      throw new Error("MySQL connector is not connected.");
    }
    return this.connection;
  }
}

import { DatabaseDescriptor } from "../../domain/types.js";
import { MysqlConnector } from "./mysqlConnector.js";
import { PostgresConnector } from "./postgresConnector.js";
import { SqliteConnector } from "./sqliteConnector.js";
import { SourceConnector } from "./types.js";

export function createConnector(descriptor: DatabaseDescriptor): SourceConnector {
  switch (descriptor.engine) {
    case "postgresql":
      return new PostgresConnector(descriptor);
    case "mysql":
      return new MysqlConnector(descriptor);
    case "sqlite":
      return new SqliteConnector(descriptor);
  }
}

import { AppConfig } from "../../config/env.js";
import { KnowledgeStore } from "../../domain/knowledgeStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryKnowledgeStore } from "./inMemoryKnowledgeStore.js";
import { PgKnowledgeStore } from "./pgKnowledgeStore.js";

export async function createKnowledgeStore(config: AppConfig): Promise<KnowledgeStore> {
  if (config.store === "memory") {
    return new InMemoryKnowledgeStore({ vectorDimension: config.vectorDimension });
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when STORE=postgres.");
  }

  const store = new PgKnowledgeStore(createPostgresPool(config.databaseUrl), {
    vectorDimension: config.vectorDimension,
    reembedOnDimensionChange: config.reembedOnDimensionChange,
  });
  try {
    await store.initialize();
  } catch (error) {
    await store.close();
    throw error;
  }
  return store;
}

import { z } from "zod";

export const chunkStrategySchema = z.enum(["fixed", "paragraph", "sentence", "smart"]);

export const syncStateSchema = z.enum(["pending", "syncing", "synced", "error"]);

export const tableConfigSchema = z.object({
  table: z.string().min(1),
  columns: z.array(z.string().min(1)).nullish(),
});

export const databaseDescriptorSchema = z.object({
  kind: z.literal("database"),
  engine: z.enum(["postgresql", "mysql", "sqlite"]),
  host: z.string().optional(),
  port: z.number().int().positive().optional(),
  database: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  filePath: z.string().optional(),
  tables: z.array(tableConfigSchema).optional(),
});

export const fileDescriptorSchema = z.object({
  kind: z.literal("file"),
  directory: z.string().min(1),
  files: z.array(z.string().min(1)).optional(),
});

export const webDescriptorSchema = z.object({
  kind: z.literal("web"),
  urls: z.array(z.string().url()).min(1),
});

export const sourceDescriptorSchema = z.discriminatedUnion("kind", [
  databaseDescriptorSchema,
  fileDescriptorSchema,
  webDescriptorSchema,
]);

export const pipelineStepSchema = z.object({ step: z.string() }).passthrough();

export const qaChunkRefSchema = z.object({
  chunkId: z.string(),
  similarity: z.number(),
  source: z.enum(["vector", "bm25", "keyword"]),
  unit: z.string(),
  rerankScore: z.number().nullable(),
});

export const conversationTurnSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
});

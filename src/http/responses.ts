import { ServerResponse } from "node:http";
import { ZodError } from "zod";
import { describeError, InvalidDescriptorError, NotFoundError, SyncInProgressError } from "../domain/errors.js";

export class InvalidBodyError extends Error {
  constructor(detail: string) {
    super(`Invalid JSON body: ${detail}`);
    this.name = "InvalidBodyError";
  }
}

export function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

/** An empty body reads as `{}`. */
export async function readJsonBody(req: AsyncIterable<Buffer | string>): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidBodyError(describeError(error));
  }
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof ZodError || error instanceof InvalidBodyError || error instanceof InvalidDescriptorError) {
    return 400;
  }
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof SyncInProgressError) {
    return 409;
  }
  return 500;
}

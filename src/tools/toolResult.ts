import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import registerDebug from "debug";
import { describeError, InvalidDescriptorError, NotFoundError, SyncInProgressError } from "../domain/errors.js";

const debugTools = registerDebug("kbqa:tools:error");

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export function errorResult(tool: string, error: unknown): CallToolResult {
  debugTools(`${tool} failed: ${describeError(error)}`);
  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify({ error: errorCode(error), message: describeError(error) }, null, 2),
      },
    ],
  };
}

/** Runs a tool body, turning thrown errors into an `isError` result. */
export async function runTool(tool: string, body: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return jsonResult(await body());
  } catch (error) {
    return errorResult(tool, error);
  }
}

function errorCode(error: unknown): string {
  if (error instanceof NotFoundError) {
    return "not_found";
  }
  if (error instanceof SyncInProgressError) {
    return "sync_in_progress";
  }
  if (error instanceof InvalidDescriptorError) {
    return "invalid_descriptor";
  }
  return "internal_error";
}

import registerDebug from "debug";

const debugStream = registerDebug("kbqa:ai:stream");

/** Yields complete lines from a byte stream and releases the reader on every exit path. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        break;
      }
      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        yield line;
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield buffer;
    }
  } finally {
    await reader.cancel().catch((error: unknown) => {
      debugStream(`reader cancel failed: ${String(error)}`);
    });
    reader.releaseLock();
  }
}

/**
 * Server-sent event reader
 *
 * Decodes a `text/event-stream` body into frames as bytes arrive, without
 * buffering the whole response. The reader is cancelled whenever iteration
 * stops early, so abandoning the generator releases the connection.
 */

export interface SSEFrame {
  /** Value of the `event:` field, if the frame had one */
  event?: string;
  /** `data:` lines joined with "\n" */
  data: string;
}

export const SSE_DONE = "[DONE]";

/**
 * Iterate SSE frames from a response body.
 */
export async function* readSSE(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<SSEFrame, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let event: string | undefined;
  let data: string[] = [];
  let finished = false;

  const takeFrame = (): SSEFrame | null => {
    if (data.length === 0) {
      event = undefined;
      return null;
    }
    const frame: SSEFrame = { event, data: data.join("\n") };
    event = undefined;
    data = [];
    return frame;
  };

  try {
    while (true) {
      const { done, value } = await reader.read().catch((error: unknown) => {
        // An errored stream needs no cancel
        finished = true;
        throw error;
      });
      if (done) {
        finished = true;
        buffer += decoder.decode();
      } else {
        buffer += decoder.decode(value, { stream: true });
      }

      const lines = buffer.split("\n");
      // Keep the last incomplete line in the buffer
      buffer = done ? "" : lines.pop() ?? "";

      for (const rawLine of lines) {
        const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

        if (line === "") {
          const frame = takeFrame();
          if (frame) yield frame;
          continue;
        }
        if (line.startsWith(":")) continue; // comment / keep-alive

        const colon = line.indexOf(":");
        const field = colon === -1 ? line : line.slice(0, colon);
        let value = colon === -1 ? "" : line.slice(colon + 1);
        if (value.startsWith(" ")) value = value.slice(1);

        if (field === "data") {
          data.push(value);
        } else if (field === "event") {
          event = value;
        }
      }

      if (done) {
        const frame = takeFrame();
        if (frame) yield frame;
        return;
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        console.error("[sse] Failed to cancel response body:", error);
      });
    }
    reader.releaseLock();
  }
}

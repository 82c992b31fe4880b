import { describe, it, expect, vi } from "vitest";
import { readSSE, type SSEFrame } from "./sse";

function streamOf(chunks: string[], onCancel?: () => void): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let next = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[next++];
      if (chunk === undefined) {
        controller.close();
      } else {
        controller.enqueue(encoder.encode(chunk));
      }
    },
    cancel() {
      onCancel?.();
    },
  });
}

async function collect(body: ReadableStream<Uint8Array>): Promise<SSEFrame[]> {
  const frames: SSEFrame[] = [];
  for await (const frame of readSSE(body)) frames.push(frame);
  return frames;
}

describe("readSSE", () => {
  it("splits frames on blank lines", async () => {
    const frames = await collect(streamOf(["data: one\n\ndata: two\n\n"]));

    expect(frames).toEqual([
      { event: undefined, data: "one" },
      { event: undefined, data: "two" },
    ]);
  });

  it("reassembles lines split across chunks", async () => {
    const frames = await collect(streamOf(["event: message_st", "art\nda", 'ta: {"a":', "1}\n", "\n"]));

    expect(frames).toEqual([{ event: "message_start", data: '{"a":1}' }]);
  });

  it("handles CRLF line endings", async () => {
    const frames = await collect(streamOf(["event: ping\r\ndata: {}\r\n\r\n"]));

    expect(frames).toEqual([{ event: "ping", data: "{}" }]);
  });

  it("joins multi-line data and skips comments", async () => {
    const frames = await collect(streamOf([": keep-alive\n\ndata: first\ndata: second\n\n"]));

    expect(frames).toEqual([{ event: undefined, data: "first\nsecond" }]);
  });

  it("does not emit a frame for an event line without data", async () => {
    const frames = await collect(streamOf(["event: orphan\n\ndata: x\n\n"]));

    expect(frames).toEqual([{ event: undefined, data: "x" }]);
  });

  it("flushes a final frame without a trailing blank line", async () => {
    const frames = await collect(streamOf(["data: [DONE]"]));

    expect(frames).toEqual([{ event: undefined, data: "[DONE]" }]);
  });

  it("decodes multi-byte characters split between chunks", async () => {
    const bytes = new TextEncoder().encode("data: héllo\n\n");
    const split = bytes.indexOf(0xc3) + 1;
    let sent = 0;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (sent === 0) controller.enqueue(bytes.slice(0, split));
        else if (sent === 1) controller.enqueue(bytes.slice(split));
        else controller.close();
        sent += 1;
      },
    });

    expect(await collect(body)).toEqual([{ event: undefined, data: "héllo" }]);
  });

  it("cancels the body when iteration stops early", async () => {
    const onCancel = vi.fn();
    const body = streamOf(["data: a\n\n", "data: b\n\n", "data: c\n\n"], onCancel);

    for await (const frame of readSSE(body)) {
      expect(frame.data).toBe("a");
      break;
    }

    expect(onCancel).toHaveBeenCalledTimes(1);
  });

  it("does not cancel a body that was fully read", async () => {
    const onCancel = vi.fn();

    await collect(streamOf(["data: a\n\n"], onCancel));

    expect(onCancel).not.toHaveBeenCalled();
  });
});

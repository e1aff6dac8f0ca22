import { describe, it, expect } from "vitest";
import { decodeStreamChunk, encodeStreamChunk, prettyPrint } from "../src/services/codec.js";
import {
  decodeChunkLines,
  decodeChunkStream,
  parseChunkLine,
} from "../src/services/chunkStream.js";
import { ApiError, DecodeError, StreamError } from "../src/errors.js";
import type { StreamChunk } from "../src/types/stream.js";
import { isErrorResponseBody } from "../src/types/api-error.js";
import { captureAsyncError, captureError } from "./helpers/errors.js";

const MESSAGE_START =
  '{"type":"message_start","message":{"id":"msg_1","type":"message","role":"assistant","content":[],"model":"claude-3-haiku-20240307","stop_reason":null,"stop_sequence":null,"usage":{"input_tokens":25,"output_tokens":1}}}';

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) {
    out.push(item);
  }
  return out;
}

// ── Chunk codec ─────────────────────────────────────────────────────────────

describe("stream chunk codec", () => {
  it("decodes message_start with a null stop reason", () => {
    const chunk = decodeStreamChunk(MESSAGE_START);
    expect(chunk.type).toBe("message_start");
    if (chunk.type !== "message_start") return;
    expect(chunk.message.id).toBe("msg_1");
    expect(chunk.message.stop_reason).toBeNull();
    expect(chunk.message.content).toEqual([]);
  });

  it("encodes message_start back to the same JSON", () => {
    expect(encodeStreamChunk(decodeStreamChunk(MESSAGE_START))).toBe(MESSAGE_START);
  });

  it("encodes a content_block_delta", () => {
    const chunk: StreamChunk = {
      type: "content_block_delta",
      index: 0,
      delta: { type: "text_delta", text: "Hello" },
    };
    expect(encodeStreamChunk(chunk)).toBe(
      '{"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hello"}}',
    );
  });

  it("decodes a message_delta", () => {
    expect(
      decodeStreamChunk(
        '{"type":"message_delta","delta":{"stop_reason":"end_turn","stop_sequence":null},"usage":{"output_tokens":15}}',
      ),
    ).toEqual({
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: { output_tokens: 15 },
    });
  });

  it("decodes the payload-free chunks", () => {
    expect(decodeStreamChunk('{"type":"ping"}')).toEqual({ type: "ping" });
    expect(decodeStreamChunk('{"type":"message_stop"}')).toEqual({ type: "message_stop" });
    expect(decodeStreamChunk('{"type":"content_block_stop","index":2}')).toEqual({
      type: "content_block_stop",
      index: 2,
    });
  });

  it("rejects an unknown chunk type", () => {
    const err = captureError(DecodeError, () =>
      decodeStreamChunk('{"type":"content_block_pause","index":0}'),
    );
    expect(err.issues[0]?.path).toBe("type");
    expect(err.issues[0]?.code).toBe("invalid_union_discriminator");
  });

  it("rejects a negative block index", () => {
    const err = captureError(DecodeError, () =>
      decodeStreamChunk('{"type":"content_block_stop","index":-1}'),
    );
    expect(err.issues[0]?.path).toBe("index");
  });

  it("rejects an image block in content_block_start", () => {
    expect(() =>
      decodeStreamChunk(
        '{"type":"content_block_start","index":0,"content_block":{"type":"image","source":{"type":"base64","media_type":"image/png","data":"AA=="}}}',
      ),
    ).toThrow(DecodeError);
  });

  it("pretty-prints a chunk", () => {
    expect(prettyPrint({ type: "content_block_stop", index: 0 })).toBe(
      '{\n  "type": "content_block_stop",\n  "index": 0\n}',
    );
  });
});

// ── SSE lines ───────────────────────────────────────────────────────────────

describe("parseChunkLine", () => {
  it("decodes a data line", () => {
    expect(parseChunkLine('data: {"type":"ping"}')).toEqual({ type: "ping" });
  });

  it("accepts a data line without a space and with a trailing carriage return", () => {
    expect(parseChunkLine('data:{"type":"message_stop"}\r')).toEqual({ type: "message_stop" });
  });

  it("skips event names, comments and blank lines", () => {
    expect(parseChunkLine("event: ping")).toBeUndefined();
    expect(parseChunkLine(": keep-alive")).toBeUndefined();
    expect(parseChunkLine("")).toBeUndefined();
  });

  it("fails on a data line that is not JSON", () => {
    const err = captureError(StreamError, () => parseChunkLine("data: {not json"));
    expect(err.code).toBe("invalid_chunk_json");
    expect(err.message).toBe("Stream chunk is not valid JSON: {not json");
  });

  it("fails on an unknown chunk, keeping the decode error as the cause", () => {
    const err = captureError(StreamError, () => parseChunkLine('data: {"type":"mystery"}'));
    expect(err.code).toBe("invalid_chunk");
    expect(err.cause).toBeInstanceOf(DecodeError);
  });

  it("turns an error event into an ApiError", () => {
    const err = captureError(ApiError, () =>
      parseChunkLine('data: {"type":"error","error":{"type":"overloaded_error","message":"Overloaded"}}'),
    );
    expect(err.errorType).toBe("overloaded_error");
    expect(err.message).toBe("overloaded_error: Overloaded");
    expect(err.body.error.message).toBe("Overloaded");
  });

  it("reports an error event with an unknown error type as an invalid chunk", () => {
    const err = captureError(StreamError, () =>
      parseChunkLine('data: {"type":"error","error":{"type":"request_too_large","message":"big"}}'),
    );
    expect(err.code).toBe("invalid_chunk");
    expect(err.cause).toBeInstanceOf(DecodeError);
  });

  it("reports a malformed error event as an invalid chunk", () => {
    const err = captureError(StreamError, () => parseChunkLine('data: {"type":"error"}'));
    expect(err.code).toBe("invalid_chunk");
  });
});

describe("isErrorResponseBody", () => {
  it("narrows error payloads", () => {
    const payload: unknown = JSON.parse('{"type":"error","error":{"type":"api_error","message":"x"}}');
    expect(isErrorResponseBody(payload)).toBe(true);
    if (isErrorResponseBody(payload)) {
      expect(payload.type).toBe("error");
    }
  });

  it("ignores chunks and non-objects", () => {
    expect(isErrorResponseBody({ type: "ping" })).toBe(false);
    expect(isErrorResponseBody(null)).toBe(false);
    expect(isErrorResponseBody("error")).toBe(false);
  });
});

describe("decodeChunkLines", () => {
  it("yields chunks in order and drops non-data lines", async () => {
    const lines = [
      "event: message_start",
      `data: ${MESSAGE_START}`,
      "",
      "event: content_block_delta",
      'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hi"}}',
      "",
      "event: message_stop",
      'data: {"type":"message_stop"}',
      "",
    ];
    const chunks = await collect(decodeChunkLines(fromArray(lines)));
    expect(chunks.map((chunk) => chunk.type)).toEqual([
      "message_start",
      "content_block_delta",
      "message_stop",
    ]);
  });

  it("stops with the first malformed chunk", async () => {
    const lines = ['data: {"type":"ping"}', "data: oops"];
    const err = await captureAsyncError(StreamError, () => collect(decodeChunkLines(fromArray(lines))));
    expect(err.code).toBe("invalid_chunk_json");
  });
});

describe("decodeChunkStream", () => {
  it("decodes events an external client already parsed", async () => {
    const events: unknown[] = [
      { type: "ping" },
      { type: "content_block_stop", index: 0 },
    ];
    expect(await collect(decodeChunkStream(fromArray(events)))).toEqual([
      { type: "ping" },
      { type: "content_block_stop", index: 0 },
    ]);
  });

  it("rejects events the model does not cover", async () => {
    const events: unknown[] = [
      { type: "content_block_start", index: 0, content_block: { type: "tool_use", id: "t1", name: "lookup", input: {} } },
    ];
    const err = await captureAsyncError(StreamError, () => collect(decodeChunkStream(fromArray(events))));
    expect(err.code).toBe("invalid_chunk");
  });
});

import { logger } from "../config/logger.js";
import { ApiError, DecodeError, StreamError } from "../errors.js";
import { errorResponseBodySchema, isErrorResponseBody } from "../types/api-error.js";
import { streamChunkSchema } from "../types/stream.js";
import type { StreamChunk } from "../types/stream.js";
import { decodeValue } from "./codec.js";

const DATA_PREFIX = "data:";

/**
 * Decodes one already-parsed event payload. An `error` event becomes an
 * `ApiError`; anything else that is not a known chunk becomes a `StreamError`.
 */
export function decodeChunk(payload: unknown): StreamChunk {
  try {
    if (isErrorResponseBody(payload)) {
      throw new ApiError(decodeValue(errorResponseBodySchema, payload, "stream error event"));
    }
    return decodeValue(streamChunkSchema, payload, "stream chunk");
  } catch (err) {
    if (!(err instanceof DecodeError)) throw err;
    logger.warn({
      action: "chunk_decode_failed",
      error: err.message,
    });
    throw new StreamError(err.message, "invalid_chunk", { cause: err });
  }
}

/**
 * Decodes a single server-sent-event line. Only `data:` lines carry a chunk;
 * `event:` lines, comments and blank lines yield `undefined`.
 */
export function parseChunkLine(line: string): StreamChunk | undefined {
  const trimmed = line.replace(/\r$/, "");
  if (!trimmed.startsWith(DATA_PREFIX)) {
    return undefined;
  }

  const data = trimmed.slice(DATA_PREFIX.length).trimStart();
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (err) {
    logger.warn({
      action: "chunk_decode_failed",
      error: "invalid JSON",
      data,
    });
    throw new StreamError(`Stream chunk is not valid JSON: ${data}`, "invalid_chunk_json", { cause: err });
  }

  return decodeChunk(payload);
}

/** Decodes an async sequence of SSE lines, in order, skipping lines without a chunk. */
export async function* decodeChunkLines(
  lines: AsyncIterable<string>,
): AsyncGenerator<StreamChunk> {
  for await (const line of lines) {
    const chunk = parseChunkLine(line);
    if (chunk) yield chunk;
  }
}

/** Decodes events an external streaming client has already parsed from JSON. */
export async function* decodeChunkStream(
  events: AsyncIterable<unknown>,
): AsyncGenerator<StreamChunk> {
  for await (const event of events) {
    yield decodeChunk(event);
  }
}

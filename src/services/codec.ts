import type { z } from "zod";
import { DecodeError, ValidationError } from "../errors.js";
import { contentBlockSchema } from "../types/content.js";
import type { ContentBlock } from "../types/content.js";
import {
  messagesRequestBodySchema,
  messagesResponseBodySchema,
} from "../types/messages.js";
import type { MessagesRequestBody, MessagesResponseBody } from "../types/messages.js";
import { streamChunkSchema } from "../types/stream.js";
import type { StreamChunk } from "../types/stream.js";
import { errorResponseBodySchema } from "../types/api-error.js";
import type { ErrorResponseBody } from "../types/api-error.js";

// ── Generic encode/decode ───────────────────────────────────────────────────

export function parseJson(json: string, target: string): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    throw new DecodeError(
      target,
      [{ path: "", code: "invalid_json", message: err instanceof Error ? err.message : String(err) }],
      { cause: err },
    );
  }
}

/** Checks an already-parsed value against `schema`. */
export function decodeValue<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  target = "value",
): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw DecodeError.fromZod(target, parsed.error);
  }
  return parsed.data;
}

export function decode<S extends z.ZodTypeAny>(
  schema: S,
  json: string,
  target = "value",
): z.output<S> {
  return decodeValue(schema, parseJson(json, target), target);
}

/** Throws `ValidationError` when `value` is outside what `schema` accepts. */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  value: z.input<S>,
  target = "value",
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZod(target, parsed.error);
  }
  return parsed.data;
}

export function encode<S extends z.ZodTypeAny>(
  schema: S,
  value: z.input<S>,
  target = "value",
): string {
  return JSON.stringify(validate(schema, value, target));
}

/**
 * Human-readable rendering for logs and debugging. Bare strings (enum values
 * such as `end_turn`) render as themselves, everything else as indented JSON.
 */
export function prettyPrint(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value, null, 2);
}

// ── Per-family shorthands ───────────────────────────────────────────────────

export function encodeRequestBody(body: MessagesRequestBody): string {
  return encode(messagesRequestBodySchema, body, "request body");
}

export function decodeRequestBody(json: string): MessagesRequestBody {
  return decode(messagesRequestBodySchema, json, "request body");
}

export function encodeResponseBody(body: MessagesResponseBody): string {
  return encode(messagesResponseBodySchema, body, "response body");
}

export function decodeResponseBody(json: string): MessagesResponseBody {
  return decode(messagesResponseBodySchema, json, "response body");
}

export function encodeStreamChunk(chunk: StreamChunk): string {
  return encode(streamChunkSchema, chunk, "stream chunk");
}

export function decodeStreamChunk(json: string): StreamChunk {
  return decode(streamChunkSchema, json, "stream chunk");
}

export function encodeContentBlock(block: ContentBlock): string {
  return encode(contentBlockSchema, block, "content block");
}

export function decodeContentBlock(json: string): ContentBlock {
  return decode(contentBlockSchema, json, "content block");
}

export function encodeErrorResponse(body: ErrorResponseBody): string {
  return encode(errorResponseBodySchema, body, "error response");
}

export function decodeErrorResponse(json: string): ErrorResponseBody {
  return decode(errorResponseBodySchema, json, "error response");
}

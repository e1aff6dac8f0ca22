// ── Streaming events ────────────────────────────────────────────────────────
// One server-sent event of a streamed Messages response, tagged by `type`.

import { z } from "zod";
import { stopReasonSchema, stopSequenceSchema, deltaUsageSchema } from "./common.js";
import { textContentBlockSchema, textDeltaContentBlockSchema } from "./content.js";
import { messagesResponseBodySchema } from "./messages.js";

export const STREAM_CHUNK_TYPES = [
  "message_start",
  "content_block_start",
  "ping",
  "content_block_delta",
  "content_block_stop",
  "message_delta",
  "message_stop",
] as const;
export const streamChunkTypeSchema = z.enum(STREAM_CHUNK_TYPES);
export type StreamChunkType = z.infer<typeof streamChunkTypeSchema>;

const blockIndexSchema = z.number().int().nonnegative();

export const messageStartChunkSchema = z.object({
  type: z.literal("message_start"),
  message: messagesResponseBodySchema,
});
export type MessageStartChunk = z.infer<typeof messageStartChunkSchema>;

export const contentBlockStartChunkSchema = z.object({
  type: z.literal("content_block_start"),
  index: blockIndexSchema,
  content_block: textContentBlockSchema,
});
export type ContentBlockStartChunk = z.infer<typeof contentBlockStartChunkSchema>;

export const pingChunkSchema = z.object({
  type: z.literal("ping"),
});
export type PingChunk = z.infer<typeof pingChunkSchema>;

export const contentBlockDeltaChunkSchema = z.object({
  type: z.literal("content_block_delta"),
  index: blockIndexSchema,
  delta: textDeltaContentBlockSchema,
});
export type ContentBlockDeltaChunk = z.infer<typeof contentBlockDeltaChunkSchema>;

export const contentBlockStopChunkSchema = z.object({
  type: z.literal("content_block_stop"),
  index: blockIndexSchema,
});
export type ContentBlockStopChunk = z.infer<typeof contentBlockStopChunkSchema>;

export const streamStopSchema = z.object({
  stop_reason: stopReasonSchema.nullable(),
  stop_sequence: stopSequenceSchema.nullable(),
});
export type StreamStop = z.infer<typeof streamStopSchema>;

export const messageDeltaChunkSchema = z.object({
  type: z.literal("message_delta"),
  delta: streamStopSchema,
  usage: deltaUsageSchema,
});
export type MessageDeltaChunk = z.infer<typeof messageDeltaChunkSchema>;

export const messageStopChunkSchema = z.object({
  type: z.literal("message_stop"),
});
export type MessageStopChunk = z.infer<typeof messageStopChunkSchema>;

export const streamChunkSchema = z.discriminatedUnion("type", [
  messageStartChunkSchema,
  contentBlockStartChunkSchema,
  pingChunkSchema,
  contentBlockDeltaChunkSchema,
  contentBlockStopChunkSchema,
  messageDeltaChunkSchema,
  messageStopChunkSchema,
]);
export type StreamChunk = z.infer<typeof streamChunkSchema>;

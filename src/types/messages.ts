// ── Messages API request/response bodies ────────────────────────────────────
// Wire format for POST /v1/messages. Field names match the API exactly.

import { z } from "zod";
import { claudeModelSchema, getMaxTokens } from "../config/models.js";
import {
  roleSchema,
  stopReasonSchema,
  stopSequenceSchema,
  maxTokensSchema,
  temperatureSchema,
  topPSchema,
  topKSchema,
  systemPromptSchema,
  metadataSchema,
  usageSchema,
} from "./common.js";
import { contentSchema } from "./content.js";
import type { Content } from "./content.js";

export const messageSchema = z.object({
  role: roleSchema,
  content: contentSchema,
});
export type Message = z.infer<typeof messageSchema>;

export function userMessage(content: Content): Message {
  return { role: "user", content };
}

export function assistantMessage(content: Content): Message {
  return { role: "assistant", content };
}

// ── Request ─────────────────────────────────────────────────────────────────

export const messagesRequestBodyFields = z.object({
  model: claudeModelSchema,
  messages: z.array(messageSchema).min(1, "messages must be a non-empty array"),
  system: systemPromptSchema.optional(),
  max_tokens: maxTokensSchema,
  metadata: metadataSchema.optional(),
  stop_sequences: z.array(stopSequenceSchema).optional(),
  stream: z.boolean().optional(),
  temperature: temperatureSchema.optional(),
  top_p: topPSchema.optional(),
  top_k: topKSchema.optional(),
});

export const messagesRequestBodySchema = messagesRequestBodyFields.superRefine(
  (body, ctx) => {
    const ceiling = getMaxTokens(body.model);
    if (body.max_tokens > ceiling) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["max_tokens"],
        message: `max_tokens must be at most ${ceiling} for ${body.model}`,
      });
    }
  },
);
export type MessagesRequestBody = z.infer<typeof messagesRequestBodySchema>;

// ── Response ────────────────────────────────────────────────────────────────

export const MESSAGE_OBJECT_TYPES = ["message"] as const;
export const messageObjectTypeSchema = z.enum(MESSAGE_OBJECT_TYPES);
export type MessageObjectType = z.infer<typeof messageObjectTypeSchema>;

export const DEFAULT_MESSAGE_OBJECT_TYPE: MessageObjectType = "message";

/**
 * A generated message.
 *
 * `stop_reason` is always set in non-streaming responses. In a stream it is
 * `null` inside `message_start` and arrives later in `message_delta`.
 *
 * Token counts in `usage` do not map one-to-one onto the visible content:
 * `output_tokens` is non-zero even for an empty reply.
 */
export const messagesResponseBodySchema = z.object({
  id: z.string(),
  type: messageObjectTypeSchema,
  role: roleSchema,
  content: contentSchema,
  model: claudeModelSchema,
  stop_reason: stopReasonSchema.nullable(),
  stop_sequence: stopSequenceSchema.nullable(),
  usage: usageSchema,
});
export type MessagesResponseBody = z.infer<typeof messagesResponseBodySchema>;

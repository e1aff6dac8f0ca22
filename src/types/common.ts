import { z } from "zod";

// ── Enumerations ────────────────────────────────────────────────────────────

export const ROLES = ["user", "assistant"] as const;
export const roleSchema = z.enum(ROLES);
export type Role = z.infer<typeof roleSchema>;

/**
 * Why the model stopped generating.
 *
 * - `end_turn`: the model reached a natural stopping point
 * - `max_tokens`: the requested `max_tokens` or the model's maximum was exceeded
 * - `stop_sequence`: one of the caller's custom stop sequences was generated
 */
export const STOP_REASONS = ["end_turn", "max_tokens", "stop_sequence"] as const;
export const stopReasonSchema = z.enum(STOP_REASONS);
export type StopReason = z.infer<typeof stopReasonSchema>;

export const stopSequenceSchema = z.string();
export type StopSequence = z.infer<typeof stopSequenceSchema>;

// ── Sampling parameters ─────────────────────────────────────────────────────

export const maxTokensSchema = z.number().int().positive();
export const temperatureSchema = z.number().min(0).max(1);
export const topPSchema = z.number().min(0).max(1);
export const topKSchema = z.number().int().nonnegative();
export const systemPromptSchema = z.string();

export type MaxTokens = z.infer<typeof maxTokensSchema>;
export type Temperature = z.infer<typeof temperatureSchema>;
export type TopP = z.infer<typeof topPSchema>;
export type TopK = z.infer<typeof topKSchema>;
export type SystemPrompt = z.infer<typeof systemPromptSchema>;

// ── Metadata ────────────────────────────────────────────────────────────────

export const userIdSchema = z.string();
export type UserId = z.infer<typeof userIdSchema>;

/** Request metadata. `user_id` should be an opaque identifier, never a name or email. */
export const metadataSchema = z.object({
  user_id: userIdSchema.optional(),
});
export type Metadata = z.infer<typeof metadataSchema>;

// ── Usage ───────────────────────────────────────────────────────────────────

const tokenCountSchema = z.number().int().nonnegative();

export const usageSchema = z.object({
  input_tokens: tokenCountSchema,
  output_tokens: tokenCountSchema,
});
export type Usage = z.infer<typeof usageSchema>;

/** Usage reported by a stream's `message_delta` event; cumulative output tokens only. */
export const deltaUsageSchema = z.object({
  output_tokens: tokenCountSchema,
});
export type DeltaUsage = z.infer<typeof deltaUsageSchema>;

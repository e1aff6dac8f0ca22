import { z } from "zod";

export const CONTENT_TYPES = ["text", "image", "text_delta"] as const;
export const contentTypeSchema = z.enum(CONTENT_TYPES);
export type ContentType = z.infer<typeof contentTypeSchema>;

export const IMAGE_MEDIA_TYPES = ["image/jpeg", "image/png", "image/gif", "image/webp"] as const;
export const imageMediaTypeSchema = z.enum(IMAGE_MEDIA_TYPES);
export type ImageMediaType = z.infer<typeof imageMediaTypeSchema>;

export const IMAGE_SOURCE_TYPES = ["base64"] as const;
export const imageSourceTypeSchema = z.enum(IMAGE_SOURCE_TYPES);
export type ImageSourceType = z.infer<typeof imageSourceTypeSchema>;

// ── Blocks ──────────────────────────────────────────────────────────────────

export const textContentBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});
export type TextContentBlock = z.infer<typeof textContentBlockSchema>;

export const imageContentSourceSchema = z.object({
  type: imageSourceTypeSchema,
  media_type: imageMediaTypeSchema,
  data: z.string(),
});
export type ImageContentSource = z.infer<typeof imageContentSourceSchema>;

export const imageContentBlockSchema = z.object({
  type: z.literal("image"),
  source: imageContentSourceSchema,
});
export type ImageContentBlock = z.infer<typeof imageContentBlockSchema>;

/** Incremental text carried by a stream's `content_block_delta` event. */
export const textDeltaContentBlockSchema = z.object({
  type: z.literal("text_delta"),
  text: z.string(),
});
export type TextDeltaContentBlock = z.infer<typeof textDeltaContentBlockSchema>;

export const contentBlockSchema = z.discriminatedUnion("type", [
  textContentBlockSchema,
  imageContentBlockSchema,
  textDeltaContentBlockSchema,
]);
export type ContentBlock = z.infer<typeof contentBlockSchema>;

/** Either a plain string or a list of blocks; the wire form is untagged. */
export const contentSchema = z.union([z.string(), z.array(contentBlockSchema)]);
export type Content = z.infer<typeof contentSchema>;

// ── Constructors ────────────────────────────────────────────────────────────

export function textBlock(text: string): TextContentBlock {
  return { type: "text", text };
}

/** `data` is the base64-encoded image, passed through untouched. */
export function imageBlock(mediaType: ImageMediaType, data: string): ImageContentBlock {
  return {
    type: "image",
    source: { type: "base64", media_type: mediaType, data },
  };
}

export function textDeltaBlock(text: string): TextDeltaContentBlock {
  return { type: "text_delta", text };
}

/** Concatenated text of a content value; image blocks contribute nothing. */
export function contentText(content: Content): string {
  if (typeof content === "string") return content;
  return content
    .map((block) => (block.type === "image" ? "" : block.text))
    .join("");
}

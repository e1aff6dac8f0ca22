// ── Interop with the official SDK ───────────────────────────────────────────
// The SDK owns the HTTP transport; these helpers shape our bodies into its
// params and check what it hands back.

import type {
  ImageBlockParam,
  Message as SdkMessage,
  MessageCreateParamsNonStreaming,
  MessageCreateParamsStreaming,
  MessageParam,
  TextBlockParam,
} from "@anthropic-ai/sdk/resources/messages";
import { ValidationError } from "../errors.js";
import type { ContentBlock } from "../types/content.js";
import { messagesResponseBodySchema } from "../types/messages.js";
import type { Message, MessagesRequestBody, MessagesResponseBody } from "../types/messages.js";
import { decodeValue } from "./codec.js";

function toBlockParam(block: ContentBlock): TextBlockParam | ImageBlockParam {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "image":
      return {
        type: "image",
        source: {
          type: "base64",
          media_type: block.source.media_type,
          data: block.source.data,
        },
      };
    case "text_delta":
      throw new ValidationError(
        "messages.content",
        "text_delta blocks only occur in streamed responses",
      );
  }
}

export function toMessageParam(message: Message): MessageParam {
  return {
    role: message.role,
    content: typeof message.content === "string"
      ? message.content
      : message.content.map(toBlockParam),
  };
}

function baseParams(body: MessagesRequestBody) {
  return {
    model: body.model,
    messages: body.messages.map(toMessageParam),
    max_tokens: body.max_tokens,
    ...(body.system != null && { system: body.system }),
    ...(body.temperature != null && { temperature: body.temperature }),
    ...(body.top_p != null && { top_p: body.top_p }),
    ...(body.top_k != null && { top_k: body.top_k }),
    ...(body.stop_sequences != null && { stop_sequences: body.stop_sequences }),
    ...(body.metadata != null && { metadata: body.metadata }),
  };
}

/** SDK create params; streaming or not as `body.stream` says. */
export function toMessageCreateParams(
  body: MessagesRequestBody & { stream: true },
): MessageCreateParamsStreaming;
export function toMessageCreateParams(
  body: MessagesRequestBody,
): MessageCreateParamsNonStreaming | MessageCreateParamsStreaming;
export function toMessageCreateParams(
  body: MessagesRequestBody,
): MessageCreateParamsNonStreaming | MessageCreateParamsStreaming {
  if (body.stream) {
    return toMessageCreateParamsStreaming(body);
  }
  return { ...baseParams(body), stream: false };
}

export function toMessageCreateParamsStreaming(
  body: MessagesRequestBody,
): MessageCreateParamsStreaming {
  return { ...baseParams(body), stream: true };
}

/** Checks a message returned by the SDK against our response model. */
export function fromSdkMessage(message: SdkMessage): MessagesResponseBody {
  return decodeValue(messagesResponseBodySchema, message, "SDK message");
}

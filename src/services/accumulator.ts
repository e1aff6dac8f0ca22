import { logger } from "../config/logger.js";
import { StreamError } from "../errors.js";
import { textBlock } from "../types/content.js";
import type { TextContentBlock } from "../types/content.js";
import type { MessagesResponseBody } from "../types/messages.js";
import type { StreamChunk } from "../types/stream.js";

/**
 * Folds stream chunks into the message a non-streaming request would have
 * returned. Text is collected per block index; `message_delta` supplies the
 * stop reason and the final output token count.
 */
export class MessageAccumulator {
  private message: MessagesResponseBody | undefined;
  private readonly blocks = new Map<number, string>();

  push(chunk: StreamChunk): void {
    if (chunk.type === "ping") return;

    if (chunk.type === "message_start") {
      this.message = { ...chunk.message, usage: { ...chunk.message.usage } };
      this.blocks.clear();
      return;
    }

    const message = this.requireMessage(chunk.type);

    switch (chunk.type) {
      case "content_block_start":
        this.blocks.set(chunk.index, chunk.content_block.text);
        break;
      case "content_block_delta":
        this.blocks.set(chunk.index, (this.blocks.get(chunk.index) ?? "") + chunk.delta.text);
        break;
      case "message_delta":
        message.stop_reason = chunk.delta.stop_reason;
        message.stop_sequence = chunk.delta.stop_sequence;
        message.usage.output_tokens = chunk.usage.output_tokens;
        break;
      case "content_block_stop":
      case "message_stop":
        break;
    }
  }

  finish(): MessagesResponseBody {
    const message = this.requireMessage("end of stream");

    const usage = { ...message.usage };
    const result: MessagesResponseBody = this.blocks.size > 0
      ? { ...message, content: this.collectBlocks(), usage }
      : { ...message, usage };

    logger.debug({
      action: "stream_accumulated",
      id: result.id,
      model: result.model,
      blocks: this.blocks.size,
      outputTokens: result.usage.output_tokens,
    });

    return result;
  }

  private collectBlocks(): TextContentBlock[] {
    return [...this.blocks.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, text]) => textBlock(text));
  }

  private requireMessage(step: string): MessagesResponseBody {
    if (!this.message) {
      throw new StreamError(
        `Received ${step} before message_start`,
        "missing_message_start",
      );
    }
    return this.message;
  }
}

export async function accumulateChunks(
  chunks: AsyncIterable<StreamChunk> | Iterable<StreamChunk>,
): Promise<MessagesResponseBody> {
  const accumulator = new MessageAccumulator();
  for await (const chunk of chunks) {
    accumulator.push(chunk);
  }
  return accumulator.finish();
}

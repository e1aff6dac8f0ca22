import { config } from "../config/index.js";
import { getMaxTokens } from "../config/models.js";
import type { ClaudeModel } from "../config/models.js";
import { ValidationError } from "../errors.js";
import {
  maxTokensSchema,
  temperatureSchema,
  topPSchema,
  topKSchema,
} from "../types/common.js";
import type { MaxTokens, Temperature, TopK, TopP } from "../types/common.js";
import { messagesRequestBodySchema } from "../types/messages.js";
import type { MessagesRequestBody } from "../types/messages.js";
import { validate } from "./codec.js";

// ── Parameter validators ────────────────────────────────────────────────────

export function validateMaxTokens(value: number, model: ClaudeModel): MaxTokens {
  const maxTokens = validate(maxTokensSchema, value, "max_tokens");
  const ceiling = getMaxTokens(model);
  if (maxTokens > ceiling) {
    throw new ValidationError(
      "max_tokens",
      `${maxTokens} exceeds the ${ceiling} token limit of ${model}`,
    );
  }
  return maxTokens;
}

export function validateTemperature(value: number): Temperature {
  return validate(temperatureSchema, value, "temperature");
}

export function validateTopP(value: number): TopP {
  return validate(topPSchema, value, "top_p");
}

export function validateTopK(value: number): TopK {
  return validate(topKSchema, value, "top_k");
}

// ── Request body ────────────────────────────────────────────────────────────

export type RequestBodyInit = Omit<MessagesRequestBody, "model" | "max_tokens"> & {
  model?: ClaudeModel;
  max_tokens?: number;
};

/**
 * Builds a request body, taking `model` and `max_tokens` from the configured
 * defaults when the caller leaves them out.
 */
export function createRequestBody(init: RequestBodyInit): MessagesRequestBody {
  const body: MessagesRequestBody = {
    ...init,
    model: init.model ?? config.defaults.model,
    max_tokens: init.max_tokens ?? config.defaults.maxTokens,
  };
  return validate(messagesRequestBodySchema, body, "request body");
}

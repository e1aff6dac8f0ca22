export * from "./types/index.js";
export {
  CLAUDE_MODELS,
  MODEL_CATALOG,
  claudeModelSchema,
  getMaxTokens,
  getModel,
  isClaudeModel,
} from "./config/models.js";
export type { ClaudeModel, ModelDefinition, ModelFamily } from "./config/models.js";
export { config, loadConfig } from "./config/index.js";
export type { Config } from "./config/index.js";
export { logger } from "./config/logger.js";
export {
  ApiError,
  ConfigError,
  DecodeError,
  MessagesError,
  StreamError,
  ValidationError,
} from "./errors.js";
export type { Issue, StreamErrorCode } from "./errors.js";
export * from "./services/codec.js";
export * from "./services/requestBuilder.js";
export * from "./services/chunkStream.js";
export * from "./services/accumulator.js";
export * from "./services/anthropic.js";

import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { claudeModelSchema } from "./models.js";

const envSchema = z.object({
  // NODE_ENV belongs to the host app; values we do not know fall back to development.
  NODE_ENV: z.enum(["development", "production", "test"]).catch("development"),
  LOG_LEVEL: z.string().default("info"),
  CLAUDE_DEFAULT_MODEL: claudeModelSchema.default("claude-3-sonnet-20240229"),
  CLAUDE_DEFAULT_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
});

export type Config = ReturnType<typeof loadConfig>;

export function loadConfig(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }

  return {
    env: parsed.data.NODE_ENV,
    logLevel: parsed.data.LOG_LEVEL,
    defaults: {
      model: parsed.data.CLAUDE_DEFAULT_MODEL,
      maxTokens: parsed.data.CLAUDE_DEFAULT_MAX_TOKENS,
    },
  } as const;
}

export const config = loadConfig(process.env);

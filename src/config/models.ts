import { z } from "zod";

export const CLAUDE_MODELS = [
  "claude-3-opus-20240229",
  "claude-3-sonnet-20240229",
  "claude-3-haiku-20240307",
  "claude-2.1",
  "claude-2.0",
  "claude-instant-1.2",
] as const;

export type ClaudeModel = (typeof CLAUDE_MODELS)[number];

export const claudeModelSchema = z.enum(CLAUDE_MODELS);

export type ModelFamily = "claude-3" | "claude-2" | "claude-instant";

export interface ModelDefinition {
  id: ClaudeModel;
  displayName: string;
  family: ModelFamily;
  maxTokens: number; // output-token ceiling for a single request
}

export const MODEL_CATALOG: Record<ClaudeModel, ModelDefinition> = {
  "claude-3-opus-20240229": {
    id: "claude-3-opus-20240229",
    displayName: "Claude 3 Opus",
    family: "claude-3",
    maxTokens: 4096,
  },
  "claude-3-sonnet-20240229": {
    id: "claude-3-sonnet-20240229",
    displayName: "Claude 3 Sonnet",
    family: "claude-3",
    maxTokens: 4096,
  },
  "claude-3-haiku-20240307": {
    id: "claude-3-haiku-20240307",
    displayName: "Claude 3 Haiku",
    family: "claude-3",
    maxTokens: 4096,
  },
  "claude-2.1": {
    id: "claude-2.1",
    displayName: "Claude 2.1",
    family: "claude-2",
    maxTokens: 4096,
  },
  "claude-2.0": {
    id: "claude-2.0",
    displayName: "Claude 2.0",
    family: "claude-2",
    maxTokens: 4096,
  },
  "claude-instant-1.2": {
    id: "claude-instant-1.2",
    displayName: "Claude Instant 1.2",
    family: "claude-instant",
    maxTokens: 4096,
  },
};

export function isClaudeModel(value: unknown): value is ClaudeModel {
  return claudeModelSchema.safeParse(value).success;
}

export function getModel(id: string): ModelDefinition | undefined {
  return isClaudeModel(id) ? MODEL_CATALOG[id] : undefined;
}

export function getMaxTokens(id: ClaudeModel): number {
  return MODEL_CATALOG[id].maxTokens;
}

import type { ZodError } from "zod";
import type { ApiErrorType, ErrorResponseBody } from "./types/api-error.js";

export interface Issue {
  path: string;
  code: string;
  message: string;
}

export function issuesFromZod(error: ZodError): Issue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    code: issue.code,
    message: issue.message,
  }));
}

function formatIssues(issues: Issue[]): string {
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");
}

export class MessagesError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MessagesError";
  }
}

/** Thrown when JSON text or a raw value does not match the expected wire shape. */
export class DecodeError extends MessagesError {
  constructor(
    public target: string,
    public issues: Issue[],
    options?: { cause?: unknown },
  ) {
    super(`Failed to decode ${target}: ${formatIssues(issues)}`, "decode_error", options);
    this.name = "DecodeError";
  }

  static fromZod(target: string, error: ZodError): DecodeError {
    return new DecodeError(target, issuesFromZod(error), { cause: error });
  }
}

/** Thrown when a value is well-formed but outside the range the API accepts. */
export class ValidationError extends MessagesError {
  constructor(
    public field: string,
    message: string,
    public issues: Issue[] = [],
  ) {
    super(`Invalid ${field}: ${message}`, "validation_error");
    this.name = "ValidationError";
  }

  static fromZod(target: string, error: ZodError): ValidationError {
    const issues = issuesFromZod(error);
    const first = issues[0];
    const field = first?.path ? `${target}.${first.path}` : target;
    return new ValidationError(field, formatIssues(issues), issues);
  }
}

export type StreamErrorCode =
  | "invalid_chunk_json"
  | "invalid_chunk"
  | "missing_message_start";

export class StreamError extends MessagesError {
  constructor(
    message: string,
    code: StreamErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = "StreamError";
  }
}

/** An error body returned by the API, either as a response or as a stream `error` event. */
export class ApiError extends MessagesError {
  public errorType: ApiErrorType;

  constructor(public body: ErrorResponseBody) {
    super(`${body.error.type}: ${body.error.message}`, body.error.type);
    this.name = "ApiError";
    this.errorType = body.error.type;
  }
}

export class ConfigError extends MessagesError {
  constructor(public fieldErrors: Record<string, string[] | undefined>) {
    const detail = Object.entries(fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`)
      .join("; ");
    super(`Invalid environment variables: ${detail}`, "config_error");
    this.name = "ConfigError";
  }
}

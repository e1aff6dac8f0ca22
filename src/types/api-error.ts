import { z } from "zod";

export const API_ERROR_TYPES = [
  "invalid_request_error",
  "authentication_error",
  "permission_error",
  "not_found_error",
  "rate_limit_error",
  "api_error",
  "overloaded_error",
] as const;
export const apiErrorTypeSchema = z.enum(API_ERROR_TYPES);
export type ApiErrorType = z.infer<typeof apiErrorTypeSchema>;

/** Body of a non-2xx response, and payload of a stream `error` event. */
export const errorResponseBodySchema = z.object({
  type: z.literal("error"),
  error: z.object({
    type: apiErrorTypeSchema,
    message: z.string(),
  }),
});
export type ErrorResponseBody = z.infer<typeof errorResponseBodySchema>;

export function isErrorResponseBody(value: unknown): value is { type: "error" } {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "error"
  );
}

import { z } from "zod";
import type { ApiError, ApiErrorKind, ParseOutcome } from "../types";
import { extractError } from "../error";

/* ─── Zod schemas for the two response shapes ─── */
const ErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string(),
  }),
});

const DataResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

/** Tags are the API's wire values and are matched verbatim. */
export function classifyApiErrorType(type: string): ApiErrorKind {
  switch (type) {
    case "invalid_request_error":
      return "token_limit";
    case "server error":
      return "server_error";
    default:
      return "unknown";
  }
}

/**
 * Classify a raw response body. The error shape is checked before the
 * data shape, so a body carrying both is an error.
 */
export function parseResponse(raw: string): ParseOutcome {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return {
      kind: "malformed",
      cause: "syntax",
      reason: `invalid JSON: ${extractError(err)}`,
      raw,
    };
  }

  const asError = ErrorResponseSchema.safeParse(json);
  if (asError.success) {
    const { message, type } = asError.data.error;
    const error: ApiError = { message, type, kind: classifyApiErrorType(type) };
    return { kind: "api_error", error };
  }

  const asData = DataResponseSchema.safeParse(json);
  if (asData.success) {
    return { kind: "embeddings", embeddings: asData.data.data };
  }

  return {
    kind: "malformed",
    cause: "schema",
    reason: "response matches neither error nor data schema",
    raw,
  };
}

import type { ApiErrorKind } from "./types";

export type EmbeddingErrorKind =
  | ApiErrorKind
  | "malformed"
  | "transport"
  | "credential"
  | "config";

/** Terminal failure of an embedding operation, tagged with where it came from. */
export class EmbeddingError extends Error {
  readonly kind: EmbeddingErrorKind;

  constructor(kind: EmbeddingErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EmbeddingError";
    this.kind = kind;
  }
}

/** The request never produced a response body (connection, timeout, abort). */
export class TransportError extends EmbeddingError {
  constructor(message: string, options?: ErrorOptions) {
    super("transport", message, options);
    this.name = "TransportError";
  }
}

export class MissingCredentialError extends EmbeddingError {
  readonly variable: string | null;

  constructor(variable: string | null) {
    super(
      "credential",
      variable
        ? `${variable} is not set`
        : "API key must be a non-empty string",
    );
    this.name = "MissingCredentialError";
    this.variable = variable;
  }
}

export class ConfigError extends EmbeddingError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export function extractError(err: unknown, fallback?: string): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
  ) {
    return err.message;
  }
  return fallback || "Unknown error";
}

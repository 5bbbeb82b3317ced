/* ─── Inputs & results ─── */

/** Ordered texts sent together in a single request. */
export type InputBatch = readonly string[];

export interface IndexedEmbedding {
  /** Position of the input within the batch that was embedded */
  index: number;
  embedding: number[];
}

/* ─── API errors ─── */

export type ApiErrorKind = "server_error" | "token_limit" | "unknown";

export interface ApiError {
  message: string;
  /** Raw `type` tag as sent by the API */
  type: string;
  kind: ApiErrorKind;
}

/* ─── Classifier outcome ─── */

export type ParseOutcome =
  | {
      kind: "malformed";
      /** "syntax": body is not JSON; "schema": JSON of an unexpected shape */
      cause: "syntax" | "schema";
      reason: string;
      raw: string;
    }
  | { kind: "api_error"; error: ApiError }
  | { kind: "embeddings"; embeddings: IndexedEmbedding[] };

/* ─── Session ─── */

export interface SessionContext {
  readonly apiKey: string;
  readonly model: string;
  readonly baseURL?: string;
  readonly timeoutMs: number;
}

export interface SessionOptions {
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
}

/* ─── Engine ─── */

export interface EmbeddingTransport {
  /** Resolves with the raw response body; rejects with a TransportError */
  send(batch: InputBatch, session: SessionContext): Promise<string>;
}

export interface EmbedContext {
  session: SessionContext;
  transport: EmbeddingTransport;
}

export interface EmbedAllOptions {
  gas?: number;
  batchSize?: number;
  concurrency?: number;
  trace?: boolean;
  /** Fail on the first unsuccessful batch instead of dropping it */
  strict?: boolean;
}

/* ─── Embeddings ─── */
import { z } from "zod";
import { DEFAULTS } from "../config";
import { ConfigError, EmbeddingError, extractError } from "../error";
import { logger } from "../logger";
import { asyncMergeMap } from "../rxops";
import type {
  ApiError,
  EmbedAllOptions,
  EmbedContext,
  IndexedEmbedding,
  InputBatch,
} from "../types";
import { parseResponse } from "./classifier";
import { createOpenAITransport } from "./transport";

const log = logger("openai:embeddings");
const tracer = logger("embed:trace", { force: true });

const EmbedAllOptionsSchema = z.object({
  gas: z.number().int().nonnegative().default(DEFAULTS.gas),
  batchSize: z.number().int().positive().default(DEFAULTS.batchSize),
  concurrency: z.number().int().positive().default(DEFAULTS.concurrency),
  trace: z.boolean().default(false),
  strict: z.boolean().default(false),
});

function note(trace: boolean, msg: string, data?: Record<string, unknown>) {
  if (trace) tracer.info(msg, data);
}

/** Send once, classify once. Any non-success outcome rejects. */
export async function embedBatch(
  ctx: EmbedContext,
  batch: InputBatch,
): Promise<IndexedEmbedding[]> {
  const raw = await ctx.transport.send(batch, ctx.session);
  const outcome = parseResponse(raw);

  switch (outcome.kind) {
    case "embeddings":
      return outcome.embeddings;
    case "api_error":
      throw new EmbeddingError(
        outcome.error.kind,
        `${outcome.error.kind}: ${outcome.error.message}`,
      );
    case "malformed":
      throw new EmbeddingError(
        "malformed",
        `malformed response: ${outcome.reason}`,
      );
  }
}

/**
 * Best-effort embedding of one batch. Never rejects: batches that cannot
 * be embedded are dropped and the result may be partial.
 *
 * - server errors retry the same batch, one unit of `gas` per retry
 * - token-limit errors split the batch in two; splitting costs no gas
 * - anything else drops the batch
 *
 * Every returned `index` addresses a position in `batch`.
 */
export async function embedBatchResilient(
  ctx: EmbedContext,
  batch: InputBatch,
  gas: number,
  trace = false,
): Promise<IndexedEmbedding[]> {
  if (!Number.isFinite(gas) || gas <= 0) {
    note(trace, "gas exhausted, giving up", { batchSize: batch.length });
    return [];
  }
  if (batch.length === 0) {
    note(trace, "empty batch, nothing to do");
    return [];
  }

  let raw: string;
  try {
    raw = await ctx.transport.send(batch, ctx.session);
  } catch (err) {
    log.debug("transport failed", { error: extractError(err) });
    note(trace, "transport failure, dropping batch", {
      batchSize: batch.length,
      error: extractError(err),
    });
    return [];
  }

  const outcome = parseResponse(raw);
  switch (outcome.kind) {
    case "embeddings":
      note(trace, "batch embedded", { count: outcome.embeddings.length });
      return outcome.embeddings;
    case "malformed":
      note(trace, "could not parse response, dropping batch", {
        batchSize: batch.length,
        reason: outcome.reason,
      });
      return [];
    case "api_error":
      return recover(ctx, batch, gas, trace, outcome.error);
  }
}

async function recover(
  ctx: EmbedContext,
  batch: InputBatch,
  gas: number,
  trace: boolean,
  error: ApiError,
): Promise<IndexedEmbedding[]> {
  switch (error.kind) {
    case "server_error":
      note(trace, "server error, retrying", {
        gasLeft: gas - 1,
        message: error.message,
      });
      return embedBatchResilient(ctx, batch, gas - 1, trace);

    case "token_limit": {
      if (batch.length === 1) {
        note(trace, "token limit on a single input, dropping it", {
          message: error.message,
        });
        return [];
      }

      const mid = Math.floor(batch.length / 2);
      const head = batch.slice(0, mid);
      const tail = batch.slice(mid);
      note(trace, "token limit, splitting batch", {
        batchSize: batch.length,
        newSizes: [head.length, tail.length],
      });

      const [first, second] = await Promise.all([
        embedBatchResilient(ctx, head, gas, trace),
        embedBatchResilient(ctx, tail, gas, trace),
      ]);
      // indices outside a half would land on a sibling's inputs once shifted
      return [
        ...first.filter((e) => e.index < head.length),
        ...second
          .filter((e) => e.index < tail.length)
          .map((e) => ({ index: e.index + mid, embedding: e.embedding })),
      ];
    }

    case "unknown":
      note(trace, "unrecognised API error, dropping batch", {
        type: error.type,
        message: error.message,
      });
      return [];
  }
}

/**
 * Embed any number of texts. Texts are sent in batches of `batchSize`,
 * `concurrency` batches at a time. The result is aligned with `texts`;
 * inputs that could not be embedded are `null`.
 */
export async function embedAll(
  ctx: EmbedContext,
  texts: InputBatch,
  opts: EmbedAllOptions = {},
): Promise<Array<number[] | null>> {
  const parsed = EmbedAllOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new ConfigError(`${issue.path.join(".")}: ${issue.message}`);
  }
  const { gas, batchSize, concurrency, trace, strict } = parsed.data;

  const results: Array<number[] | null> = new Array(texts.length).fill(null);
  if (texts.length === 0) return results;

  const batches: Array<{ offset: number; texts: InputBatch }> = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    batches.push({ offset: i, texts: texts.slice(i, i + batchSize) });
  }

  log.info("embedding started", {
    totalTexts: texts.length,
    batches: batches.length,
    batchSize,
    strict,
  });

  const done = log.time("embedAll");
  const embedded = await asyncMergeMap(
    batches,
    (b) =>
      strict
        ? embedBatch(ctx, b.texts)
        : embedBatchResilient(ctx, b.texts, gas, trace),
    concurrency,
  );

  embedded.forEach((embeddings, i) => {
    const { offset, texts: batchTexts } = batches[i];
    for (const { index, embedding } of embeddings) {
      if (index < batchTexts.length) results[offset + index] = embedding;
    }
  });

  const count = results.filter((r) => r !== null).length;
  done({ embedded: count, dropped: texts.length - count });

  return results;
}

export interface Embedder {
  embedBatch(batch: InputBatch): Promise<IndexedEmbedding[]>;
  embedBatchResilient(
    batch: InputBatch,
    gas: number,
    trace?: boolean,
  ): Promise<IndexedEmbedding[]>;
  embedAll(
    texts: InputBatch,
    opts?: EmbedAllOptions,
  ): Promise<Array<number[] | null>>;
}

/** Bind the embedding operations to one session (OpenAI transport by default). */
export function createEmbedder(
  session: EmbedContext["session"],
  transport: EmbedContext["transport"] = createOpenAITransport(),
): Embedder {
  const ctx: EmbedContext = { session, transport };
  return {
    embedBatch: (batch) => embedBatch(ctx, batch),
    embedBatchResilient: (batch, gas, trace) =>
      embedBatchResilient(ctx, batch, gas, trace),
    embedAll: (texts, opts) => embedAll(ctx, texts, opts),
  };
}

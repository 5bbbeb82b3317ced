import OpenAI, { type ClientOptions } from "openai";
import { TransportError, extractError } from "../error";
import { logger } from "../logger";
import type { EmbeddingTransport, InputBatch, SessionContext } from "../types";

const log = logger("openai:transport");

export interface OpenAITransportOptions {
  /** Replaces the global fetch used by the SDK */
  fetch?: ClientOptions["fetch"];
}

/**
 * Transport backed by the OpenAI SDK. SDK-level retries are off: retry
 * and split decisions belong to the batch engine.
 */
export function createOpenAITransport(
  opts: OpenAITransportOptions = {},
): EmbeddingTransport {
  const clients = new WeakMap<SessionContext, OpenAI>();

  function getOpenAI(session: SessionContext) {
    let client = clients.get(session);
    if (!client) {
      client = new OpenAI({
        apiKey: session.apiKey,
        baseURL: session.baseURL,
        timeout: session.timeoutMs,
        maxRetries: 0,
        fetch: opts.fetch,
      });
      clients.set(session, client);
    }
    return client;
  }

  async function send(batch: InputBatch, session: SessionContext) {
    try {
      const res = await getOpenAI(session)
        .embeddings.create({
          model: session.model,
          input: [...batch],
          encoding_format: "float",
        })
        .asResponse();
      return await res.text();
    } catch (err) {
      // HTTP errors still carry a body for the classifier
      if (err instanceof OpenAI.APIError && err.status !== undefined) {
        log.debug("api responded with an error status", {
          status: err.status,
          batchSize: batch.length,
        });
        return err.error !== undefined
          ? JSON.stringify({ error: err.error })
          : err.message;
      }

      throw new TransportError(`embedding request failed: ${extractError(err)}`, {
        cause: err,
      });
    }
  }

  return { send };
}

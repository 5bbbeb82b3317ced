// Test fixture: scripted transport for engine tests.
//
// Each call is recorded; the responder decides the raw body (or throws)
// from the batch and the 1-based number of times that exact batch was sent.

import { vi, type Mock } from "vitest";
import type { EmbeddingTransport, InputBatch } from "../types";

export type Responder = (batch: InputBatch, attempt: number) => string;

export interface FakeTransport extends EmbeddingTransport {
  calls: InputBatch[];
  send: Mock<EmbeddingTransport["send"]>;
}

export function fakeTransport(respond: Responder): FakeTransport {
  const calls: InputBatch[] = [];
  const attempts = new Map<string, number>();

  const send = vi.fn<EmbeddingTransport["send"]>(async (batch) => {
    calls.push(batch);
    const key = JSON.stringify(batch);
    const attempt = (attempts.get(key) ?? 0) + 1;
    attempts.set(key, attempt);
    return respond(batch, attempt);
  });

  return { calls, send };
}

/** Vector derived from the text, so results can be traced back to inputs. */
export function vectorFor(text: string): number[] {
  return [text.length, text.charCodeAt(0)];
}

export function dataBody(batch: InputBatch): string {
  return JSON.stringify({
    data: batch.map((text, index) => ({ index, embedding: vectorFor(text) })),
  });
}

export function errorBody(type: string, message = "boom"): string {
  return JSON.stringify({ error: { message, type } });
}

export const SERVER_ERROR = errorBody("server error");
export const TOKEN_LIMIT = errorBody("invalid_request_error", "too many tokens");

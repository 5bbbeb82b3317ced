import { describe, it, expect, vi } from "vitest";
import { createOpenAITransport } from "../openai/transport";
import { parseResponse } from "../openai/classifier";
import { TransportError } from "../error";
import { createSession } from "../session";

const session = createSession("test-secret", {
  model: "test-embedding-model",
  baseURL: "http://embeddings.test/v1",
});

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("createOpenAITransport", () => {
  it("posts the model and batch and returns the raw body", async () => {
    const body = {
      object: "list",
      data: [{ object: "embedding", index: 0, embedding: [0.5, 0.25] }],
    };
    const fetch = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) =>
        jsonResponse(body),
    );
    const transport = createOpenAITransport({ fetch });

    const raw = await transport.send(["hello"], session);

    expect(raw).toBe(JSON.stringify(body));
    expect(fetch).toHaveBeenCalledTimes(1);

    const [url, init] = fetch.mock.calls[0];
    expect(String(url)).toBe("http://embeddings.test/v1/embeddings");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("authorization")).toBe(
      "Bearer test-secret",
    );
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-embedding-model",
      input: ["hello"],
      encoding_format: "float",
    });
  });

  it("hands back the error body of a failed request without retrying", async () => {
    const fetch = vi.fn(async () =>
      jsonResponse({ error: { message: "boom", type: "server error" } }, 500),
    );
    const transport = createOpenAITransport({ fetch });

    const raw = await transport.send(["hello"], session);

    expect(raw).toBe('{"error":{"message":"boom","type":"server error"}}');
    expect(parseResponse(raw)).toEqual({
      kind: "api_error",
      error: { message: "boom", type: "server error", kind: "server_error" },
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("keeps the error fields of a rejected request", async () => {
    const fetch = vi.fn(async () =>
      jsonResponse(
        {
          error: {
            message: "too many tokens",
            type: "invalid_request_error",
            param: null,
            code: null,
          },
        },
        400,
      ),
    );
    const transport = createOpenAITransport({ fetch });

    const outcome = parseResponse(await transport.send(["hello"], session));

    expect(outcome).toEqual({
      kind: "api_error",
      error: {
        message: "too many tokens",
        type: "invalid_request_error",
        kind: "token_limit",
      },
    });
  });

  it("returns something the classifier rejects for a non-JSON error page", async () => {
    const fetch = vi.fn(
      async () => new Response("Bad Gateway", { status: 502 }),
    );
    const transport = createOpenAITransport({ fetch });

    const outcome = parseResponse(await transport.send(["hello"], session));

    expect(outcome.kind).toBe("malformed");
  });

  it("fails with a TransportError when the request cannot be made", async () => {
    const fetch = vi.fn(async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    const transport = createOpenAITransport({ fetch });

    const err = await transport
      .send(["hello"], session)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ kind: "transport" });
  });
});

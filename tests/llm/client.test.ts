import { afterEach, describe, expect, test, vi } from "vitest";

import { LlmClient, parseProviderError, parseUsage } from "../../src/llm/client";
import { LlmError } from "../../src/utils/errors";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    headers: { "Content-Type": "application/json" },
    status,
  });
}

function createClient(): LlmClient {
  return new LlmClient({
    apiKey: "test-secret",
    baseUrl: "https://llm.example.test/api/v1/",
    model: "test-model",
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("llm client", () => {
  test("posts the conversation and returns content with usage", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({
        choices: [{ message: { content: "{\"script\":\"print(1)\"}" } }],
        usage: { completion_tokens: 4, prompt_tokens: 10 },
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await createClient().chat({
      messages: [{ content: "hello", role: "user" }],
      responseFormat: { name: "script_proposal", schema: { type: "object" }, strict: true, type: "json_schema" },
    });

    expect(response).toEqual({
      content: "{\"script\":\"print(1)\"}",
      usage: { inputTokens: 10, outputTokens: 4, totalTokens: 14 },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("https://llm.example.test/api/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      messages: [{ content: "hello", role: "user" }],
      model: "test-model",
      response_format: {
        json_schema: { name: "script_proposal", schema: { type: "object" }, strict: true },
        type: "json_schema",
      },
    });
  });

  test("classifies HTTP failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: { code: 429, message: "Rate limit exceeded" } }, 429))
    );

    const failure = await createClient()
      .chat({ messages: [{ content: "hello", role: "user" }] })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LlmError);
    if (failure instanceof LlmError) {
      expect(failure.errorClass).toBe("rate_limit");
      expect(failure.statusCode).toBe(429);
      expect(failure.providerCode).toBe("429");
      expect(failure.providerMessage).toBe("Rate limit exceeded");
    }
  });

  test("reports provider errors returned with a 200 status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({ error: { code: "bad_request", message: "response_format is not supported" } })
      )
    );

    const failure = await createClient()
      .chat({ messages: [{ content: "hello", role: "user" }] })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LlmError);
    if (failure instanceof LlmError) {
      expect(failure.message).toBe("LLM API error: response_format is not supported");
      expect(failure.errorClass).toBe("response_format_unsupported");
    }
  });

  test("missing content is a malformed response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })));

    const failure = await createClient()
      .chat({ messages: [{ content: "hello", role: "user" }] })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LlmError);
    if (failure instanceof LlmError) {
      expect(failure.message).toBe("LLM response missing content");
      expect(failure.errorClass).toBe("malformed_response");
    }
  });

  test("network failures are wrapped in LlmError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    const failure = await createClient()
      .chat({ messages: [{ content: "hello", role: "user" }] })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LlmError);
    if (failure instanceof LlmError) {
      expect(failure.message).toBe("Failed to call LLM: fetch failed");
      expect(failure.cause).toBeInstanceOf(TypeError);
    }
  });
});

describe("provider payload parsing", () => {
  test("falls back to the raw body for non-JSON errors", () => {
    expect(parseProviderError("  upstream unavailable  ", 503)).toEqual({
      errorClass: "other",
      providerCode: undefined,
      providerMessage: "upstream unavailable",
      responseBody: "upstream unavailable",
    });
  });

  test("derives missing token counts", () => {
    expect(parseUsage({ completion_tokens: 3, total_tokens: 10 })).toEqual({
      inputTokens: 7,
      outputTokens: 3,
      totalTokens: 10,
    });
    expect(parseUsage({})).toBeUndefined();
    expect(parseUsage("nope")).toBeUndefined();
  });
});

import { describe, expect, test } from "vitest";

import { classifyProviderError } from "../../src/llm/compat";

describe("provider error classification", () => {
  test("detects rate limits by status and by message", () => {
    expect(classifyProviderError({ statusCode: 429 })).toBe("rate_limit");
    expect(classifyProviderError({ providerMessage: "Too many requests, slow down" })).toBe("rate_limit");
  });

  test("detects unsupported response formats first", () => {
    expect(
      classifyProviderError({ responseFormatUnsupported: true, statusCode: 429 })
    ).toBe("response_format_unsupported");
  });

  test("detects invalid message shapes on 400 responses", () => {
    expect(
      classifyProviderError({ providerMessage: "Invalid message role at messages[2]", statusCode: 400 })
    ).toBe("invalid_message_shape");
  });

  test("falls back to other", () => {
    expect(classifyProviderError({})).toBe("other");
    expect(classifyProviderError({ providerMessage: "Internal server error", statusCode: 500 })).toBe("other");
  });
});

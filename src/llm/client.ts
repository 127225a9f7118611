import { z } from "zod";

import type { LlmChatClient, LlmRequest, LlmResponse, LlmUsage } from "./types";

import { LlmError } from "../utils/errors";
import { log } from "../utils/logger";
import { classifyProviderError, type LlmProviderErrorClass } from "./compat";

export const DEFAULT_OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export type LlmClientOptions = {
  apiKey: string;
  baseUrl?: string;
  model: string;
};

const providerCodeSchema = z.union([z.number(), z.string()]);

const openRouterUsageSchema = z.object({
  completion_tokens: z.number().optional(),
  prompt_tokens: z.number().optional(),
  total_tokens: z.number().optional(),
});

const openRouterChatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
  error: z
    .object({
      code: providerCodeSchema.optional(),
      message: z.string().optional(),
    })
    .optional(),
  usage: z.unknown().optional(),
});

const providerErrorBodySchema = z.object({
  error: z
    .object({
      code: providerCodeSchema.optional(),
      message: z.string().optional(),
    })
    .optional(),
});

type ParsedProviderError = {
  errorClass: LlmProviderErrorClass;
  providerCode?: string;
  providerMessage?: string;
  responseBody?: string;
};

function parseNonNegativeInteger(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) {
    return undefined;
  }

  const parsed = Math.trunc(value);
  if (parsed < 0) {
    return undefined;
  }

  return parsed;
}

export function parseUsage(rawUsage: unknown): LlmUsage | undefined {
  const usageParse = openRouterUsageSchema.safeParse(rawUsage);
  if (!usageParse.success) {
    return undefined;
  }

  const usage = usageParse.data;
  let inputTokens = parseNonNegativeInteger(usage.prompt_tokens);
  let outputTokens = parseNonNegativeInteger(usage.completion_tokens);
  let totalTokens = parseNonNegativeInteger(usage.total_tokens);

  if (inputTokens === undefined && outputTokens === undefined && totalTokens === undefined) {
    return undefined;
  }

  if (inputTokens === undefined && totalTokens !== undefined && outputTokens !== undefined) {
    inputTokens = Math.max(0, totalTokens - outputTokens);
  }

  if (outputTokens === undefined && totalTokens !== undefined && inputTokens !== undefined) {
    outputTokens = Math.max(0, totalTokens - inputTokens);
  }

  inputTokens ??= 0;
  outputTokens ??= 0;
  totalTokens ??= inputTokens + outputTokens;

  return {
    inputTokens,
    outputTokens,
    totalTokens,
  };
}

function normalizeProviderCode(code: number | string | undefined): string | undefined {
  if (code === undefined) {
    return undefined;
  }

  const normalized = String(code).trim();
  return normalized.length > 0 ? normalized : undefined;
}

function isResponseFormatUnsupported(input: {
  providerCode?: string;
  providerMessage?: string;
}): boolean {
  const haystack = `${input.providerCode ?? ""} ${input.providerMessage ?? ""}`.toLowerCase();
  if (!haystack.trim()) {
    return false;
  }

  return (
    (haystack.includes("response_format") || haystack.includes("json_schema")) &&
    (haystack.includes("unsupported") ||
      haystack.includes("not supported") ||
      haystack.includes("invalid"))
  );
}

function parseJsonSafely(rawBody: string): unknown {
  try {
    return JSON.parse(rawBody);
  } catch {
    return undefined;
  }
}

export function parseProviderError(rawBody: string, statusCode?: number): ParsedProviderError {
  const fallbackMessage = rawBody.trim();
  const bodyParse = providerErrorBodySchema.safeParse(parseJsonSafely(rawBody));
  const providerCode = bodyParse.success ? normalizeProviderCode(bodyParse.data.error?.code) : undefined;
  const parsedMessage = bodyParse.success ? bodyParse.data.error?.message?.trim() : undefined;
  const providerMessage = parsedMessage || fallbackMessage || undefined;

  return {
    errorClass: classifyProviderError({
      providerCode,
      providerMessage,
      responseFormatUnsupported: isResponseFormatUnsupported({ providerCode, providerMessage }),
      statusCode,
    }),
    providerCode,
    providerMessage,
    responseBody: fallbackMessage || undefined,
  };
}

function buildChatRequestBody(model: string, request: LlmRequest): Record<string, unknown> {
  return {
    messages: request.messages,
    model,
    ...(request.responseFormat
      ? {
        response_format: {
          json_schema: {
            name: request.responseFormat.name,
            schema: request.responseFormat.schema,
            strict: request.responseFormat.strict,
          },
          type: "json_schema",
        },
      }
      : {}),
  };
}

export class LlmClient implements LlmChatClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(options: LlmClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPENROUTER_BASE_URL).replace(/\/+$/u, "");
    this.model = options.model;
  }

  async chat(request: LlmRequest): Promise<LlmResponse> {
    log(`Calling LLM with model: ${this.model}`);

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        body: JSON.stringify(buildChatRequestBody(this.model, request)),
        headers: this.getRequestHeaders(),
        method: "POST",
      });

      if (!response.ok) {
        const errorText = await response.text();
        const parsedError = parseProviderError(errorText, response.status);
        throw new LlmError(
          `LLM API request failed: ${response.status} ${response.statusText}. ${parsedError.providerMessage ?? "Unknown provider error"}`,
          undefined,
          {
            ...parsedError,
            statusCode: response.status,
          }
        );
      }

      const dataParse = openRouterChatResponseSchema.safeParse(await response.json());
      if (!dataParse.success) {
        throw new LlmError("LLM response has an unexpected shape", dataParse.error, {
          errorClass: "malformed_response",
        });
      }
      const data = dataParse.data;

      if (data.error) {
        const providerCode = normalizeProviderCode(data.error.code);
        const providerMessage = data.error.message ?? "Unknown error";
        throw new LlmError(`LLM API error: ${providerMessage}`, undefined, {
          errorClass: classifyProviderError({
            providerCode,
            providerMessage,
            responseFormatUnsupported: isResponseFormatUnsupported({
              providerCode,
              providerMessage,
            }),
          }),
          providerCode,
          providerMessage,
        });
      }

      const content = data.choices?.[0]?.message?.content;
      if (!content) {
        throw new LlmError("LLM response missing content", undefined, {
          errorClass: "malformed_response",
        });
      }

      return {
        content,
        usage: parseUsage(data.usage),
      };
    } catch (error) {
      if (error instanceof LlmError) {
        throw error;
      }
      throw new LlmError(`Failed to call LLM: ${error instanceof Error ? error.message : "Unknown error"}`, error);
    }
  }

  private getRequestHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "Content-Type": "application/json",
      "X-Title": "scriptwright",
    };
  }
}

export type LlmRole = "assistant" | "system" | "user";

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

export interface LlmResponseFormatJsonSchema {
  type: "json_schema";
  name: string;
  strict: boolean;
  schema: Record<string, unknown>;
}

export interface LlmRequest {
  messages: LlmMessage[];
  responseFormat?: LlmResponseFormatJsonSchema;
}

export interface LlmUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LlmResponse {
  content: string;
  usage?: LlmUsage;
}

export interface LlmChatClient {
  chat(request: LlmRequest): Promise<LlmResponse>;
}

import type { ProposalOutputMode } from "../config/env";
import type { LlmChatClient, LlmRequest } from "../llm/types";
import type { Proposal } from "../types/agent";

import { buildProposalPrompt } from "../prompts/proposer";
import { buildSystemPrompt } from "../prompts/system";
import { log } from "../utils/logger";
import { Memory } from "./memory";
import { parseProposalContent } from "./proposal/parser";
import { PROPOSAL_RESPONSE_FORMAT_NAME, PROPOSAL_RESPONSE_JSON_SCHEMA } from "./proposal/schema";

/**
 * Produces (or repairs) a script for a goal. Implementations may keep
 * conversational context between calls of one session.
 */
export interface ModelProxy {
  propose(goal: string, lastOutput?: string): Promise<Proposal>;
}

export type LlmModelProxyOptions = {
  outputLimitChars: number;
  outputMode: ProposalOutputMode;
  platform?: string;
  runnerLabel?: string;
};

export class LlmModelProxy implements ModelProxy {
  private readonly client: LlmChatClient;
  private readonly memory = new Memory();
  private readonly options: LlmModelProxyOptions;

  constructor(client: LlmChatClient, options: LlmModelProxyOptions) {
    this.client = client;
    this.options = options;
  }

  async propose(goal: string, lastOutput?: string): Promise<Proposal> {
    if (!this.memory.hasMessages()) {
      this.memory.addMessage(
        "system",
        buildSystemPrompt({
          platform: this.options.platform,
          runnerLabel: this.options.runnerLabel,
          structuredOutput: this.options.outputMode === "schema",
        })
      );
    }

    this.memory.addMessage(
      "user",
      buildProposalPrompt({
        goal,
        lastOutput,
        outputLimitChars: this.options.outputLimitChars,
      })
    );

    const request: LlmRequest = {
      messages: this.memory.getMessages(),
      ...(this.options.outputMode === "schema"
        ? {
          responseFormat: {
            name: PROPOSAL_RESPONSE_FORMAT_NAME,
            schema: PROPOSAL_RESPONSE_JSON_SCHEMA,
            strict: true,
            type: "json_schema" as const,
          },
        }
        : {}),
    };

    const response = await this.client.chat(request);
    this.memory.addMessage("assistant", response.content);
    if (response.usage) {
      log(
        `Proposal tokens: ${response.usage.totalTokens} (conversation ~${this.memory.estimateTokenCount()} tokens)`
      );
    }

    return parseProposalContent(response.content);
  }
}

import type { Environment, ProposalOutputMode } from "../config/env";

import { ValidationError } from "../utils/errors";

export type ScriptRunnerConfig = {
  args: string[];
  command: string;
  extension: string;
};

export type AgentConfig = {
  confirmExecution: boolean;
  llmApiKey: string;
  llmBaseUrl: string;
  llmModel: string;
  llmProvider: "openrouter";
  maxIterations: number;
  outputLimitChars: number;
  proposalOutputMode: ProposalOutputMode;
  scriptRunner: ScriptRunnerConfig;
  verbose: boolean;
};

export type AgentConfigOverrides = {
  apiKey?: string;
  confirmExecution?: boolean;
  maxIterations?: number;
  model?: string;
  verbose?: boolean;
};

export function getAgentConfig(env: Environment, overrides: AgentConfigOverrides = {}): AgentConfig {
  const llmApiKey = overrides.apiKey ?? env.OPENROUTER_API_KEY;
  if (!llmApiKey) {
    throw new ValidationError("Missing API key: set OPENROUTER_API_KEY or pass --api-key");
  }

  return {
    confirmExecution: overrides.confirmExecution || env.AGENT_CONFIRM_EXECUTION,
    llmApiKey,
    llmBaseUrl: env.OPENROUTER_BASE_URL,
    llmModel: overrides.model ?? env.OPENROUTER_MODEL,
    llmProvider: env.LLM_PROVIDER,
    maxIterations: overrides.maxIterations ?? env.AGENT_MAX_ITERATIONS,
    outputLimitChars: env.AGENT_OUTPUT_LIMIT_CHARS,
    proposalOutputMode: env.AGENT_PROPOSAL_OUTPUT_MODE,
    scriptRunner: {
      args: env.AGENT_SCRIPT_RUNNER_ARGS,
      command: env.AGENT_SCRIPT_RUNNER,
      extension: env.AGENT_SCRIPT_EXTENSION,
    },
    verbose: overrides.verbose || env.AGENT_VERBOSE,
  };
}

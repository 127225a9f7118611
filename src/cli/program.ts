import { Command, InvalidArgumentError } from "commander";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { AgentConfig } from "../types/config";

import { runConvergenceLoop } from "../agent/loop";
import { LlmModelProxy } from "../agent/model-proxy";
import { loadEnvironment } from "../config/env";
import { LlmClient } from "../llm/client";
import { createScriptExecutor, getRunnerLabel } from "../tools/script";
import { getAgentConfig } from "../types/config";
import { createStreamSink } from "../ui/output-sink";
import { createPlainLoopObserver } from "../ui/plain-observer";
import { initializeLogger, logError } from "../utils/logger";
import { createReadlineConfirmation } from "./confirm";

export type CliOptions = {
  apiKey?: string;
  control?: boolean;
  maxIterations?: number;
  model?: string;
  verbose?: boolean;
};

export function parseMaxIterations(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function buildGoal(instructions: string[]): string {
  return instructions.join(" ").trim();
}

export function resolveCliConfig(
  options: CliOptions,
  environment: Record<string, string | undefined> = process.env
): AgentConfig {
  return getAgentConfig(loadEnvironment(environment), {
    apiKey: options.apiKey,
    confirmExecution: options.control,
    maxIterations: options.maxIterations,
    model: options.model,
    verbose: options.verbose,
  });
}

async function runGoal(goal: string, config: AgentConfig): Promise<boolean> {
  const client = new LlmClient({
    apiKey: config.llmApiKey,
    baseUrl: config.llmBaseUrl,
    model: config.llmModel,
  });
  const modelProxy = new LlmModelProxy(client, {
    outputLimitChars: config.outputLimitChars,
    outputMode: config.proposalOutputMode,
    platform: process.platform,
    runnerLabel: getRunnerLabel(config.scriptRunner),
  });
  const executor = createScriptExecutor({ runner: config.scriptRunner });
  const observer = createPlainLoopObserver(createStreamSink(output), { verbose: config.verbose });
  const rl = config.confirmExecution ? createInterface({ input, output }) : undefined;

  try {
    const result = await runConvergenceLoop({
      confirmExecution: rl ? createReadlineConfirmation(rl) : undefined,
      executor,
      goal,
      maxIterations: config.maxIterations,
      modelProxy,
      observer,
    });
    return result.success;
  } finally {
    rl?.close();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("scriptwright")
    .description("Generate and run scripts based on natural language instructions")
    .version("0.1.0")
    .argument("<instructions...>", "What the script should accomplish")
    .option("-v, --verbose", "Show detailed execution information")
    .option("-c, --control", "Prompt for permission before each execution")
    .option("-m, --model <model>", "Model identifier to use")
    .option("--api-key <key>", "API key for the model service")
    .option(
      "-i, --max-iterations <count>",
      "Maximum number of script generation iterations",
      parseMaxIterations
    )
    .action(async (instructions: string[], options: CliOptions) => {
      try {
        const config = resolveCliConfig(options);
        initializeLogger(config);

        const success = await runGoal(buildGoal(instructions), config);
        process.exit(success ? 0 : 1);
      } catch (error) {
        console.error(
          "\n❌ Fatal error:",
          error instanceof Error ? error.message : String(error)
        );
        logError("Run aborted", error);
        process.exit(1);
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

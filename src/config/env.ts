import { z } from "zod";

import { ValidationError } from "../utils/errors";

export const PROPOSAL_OUTPUT_MODES = ["prompt_only", "schema"] as const;

export type ProposalOutputMode = (typeof PROPOSAL_OUTPUT_MODES)[number];

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_MODEL = "openai/gpt-4o";

const ENV_BOOLEAN_TRUE_VALUES = new Set(["1", "on", "true", "yes"]);
const ENV_BOOLEAN_FALSE_VALUES = new Set(["", "0", "false", "no", "off"]);
const ENV_BOOLEAN_ALLOWED_VALUES = "true, false, 1, 0, yes, no, on, off, or empty string";

function createEnvBooleanSchema(defaultValue: boolean): z.ZodType<boolean> {
  return z.string().optional().transform((rawValue, context) => {
    if (rawValue === undefined) {
      return defaultValue;
    }

    const normalized = rawValue.trim().toLowerCase();
    if (ENV_BOOLEAN_TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (ENV_BOOLEAN_FALSE_VALUES.has(normalized)) {
      return false;
    }

    context.addIssue({
      code: "custom",
      message: `Invalid boolean value "${rawValue}". Expected one of: ${ENV_BOOLEAN_ALLOWED_VALUES}.`,
    });
    return z.NEVER;
  });
}

// dotenv loads `KEY=` as "", which means unset here.
const optionalSecretSchema = z
  .string()
  .optional()
  .transform((value) => (value === "" ? undefined : value));

const runnerArgumentListSchema = z.string().default("run").transform((value) =>
  value
    .split(";;")
    .map((argument) => argument.trim())
    .filter((argument) => argument.length > 0)
);

export const envSchema = z.object({
  AGENT_CONFIRM_EXECUTION: createEnvBooleanSchema(false),
  AGENT_MAX_ITERATIONS: z.coerce.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  AGENT_OUTPUT_LIMIT_CHARS: z.coerce.number().int().positive().default(8000),
  AGENT_PROPOSAL_OUTPUT_MODE: z.enum(PROPOSAL_OUTPUT_MODES).default("schema"),
  AGENT_SCRIPT_EXTENSION: z.string().regex(/^\.[\w.-]+$/u).default(".py"),
  AGENT_SCRIPT_RUNNER: z.string().min(1).default("uv"),
  AGENT_SCRIPT_RUNNER_ARGS: runnerArgumentListSchema,
  AGENT_VERBOSE: createEnvBooleanSchema(false),
  LLM_PROVIDER: z.literal("openrouter").default("openrouter"),

  OPENROUTER_API_KEY: optionalSecretSchema,
  OPENROUTER_BASE_URL: z.url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_MODEL: z.string().min(1).default(DEFAULT_MODEL),
});

export type Environment = z.infer<typeof envSchema>;

export function parseEnvironment(input: Record<string, string | undefined>) {
  return envSchema.safeParse(input);
}

export function loadEnvironment(
  input: Record<string, string | undefined> = process.env
): Environment {
  const parsed = parseEnvironment(input);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid environment configuration:\n${z.prettifyError(parsed.error)}`,
      parsed.error
    );
  }

  return parsed.data;
}

import { z } from "zod";

export const proposalResponseSchema = z.object({
  goalAttained: z.boolean().default(false),
  messageToUser: z.string(),
  sawLastOutput: z.boolean().default(false),
  script: z.string(),
});

export type ProposalStructuredResponse = z.infer<typeof proposalResponseSchema>;

export const PROPOSAL_RESPONSE_JSON_SCHEMA: Record<string, unknown> = {
  additionalProperties: false,
  properties: {
    goalAttained: {
      description: "True only when the last terminal output shows the goal was attained.",
      type: "boolean",
    },
    messageToUser: {
      description: "Short message for the user; a summary of the output once the goal is attained.",
      type: "string",
    },
    sawLastOutput: {
      description: "True only when a non-empty last terminal output was provided and reviewed.",
      type: "boolean",
    },
    script: {
      description: "Complete runnable script including its inline dependency metadata.",
      type: "string",
    },
  },
  required: ["script", "messageToUser", "goalAttained", "sawLastOutput"],
  type: "object",
};

export const PROPOSAL_RESPONSE_FORMAT_NAME = "script_proposal";

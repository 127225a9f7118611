import type { Proposal } from "../../types/agent";

import { LlmError } from "../../utils/errors";
import { proposalResponseSchema } from "./schema";

export type ProposalCorrection = "saw_last_output_without_output";

export type NormalizedProposal = {
  corrections: ProposalCorrection[];
  proposal: Proposal;
};

const INVALID_CONTENT_PREVIEW_CHARS = 400;

function extractJsonPayload(content: string): unknown {
  const trimmedContent = content.trim();

  try {
    return JSON.parse(trimmedContent);
  } catch {
    // Keep trying alternative extraction formats.
  }

  const fencedJsonMatch = trimmedContent.match(/```(?:json)?\s*([\s\S]*?)```/iu);
  if (fencedJsonMatch?.[1]) {
    try {
      return JSON.parse(fencedJsonMatch[1]);
    } catch {
      // Keep trying.
    }
  }

  const jsonMatch = trimmedContent.match(/\{[\s\S]*\}/u);
  if (jsonMatch?.[0]) {
    try {
      return JSON.parse(jsonMatch[0]);
    } catch {
      return null;
    }
  }

  return null;
}

function previewContent(content: string): string {
  const compactContent = content.replace(/\s+/gu, " ").trim();
  return compactContent.length > INVALID_CONTENT_PREVIEW_CHARS
    ? `${compactContent.slice(0, INVALID_CONTENT_PREVIEW_CHARS)}...`
    : compactContent;
}

export function parseProposalContent(content: string): Proposal {
  const payload = extractJsonPayload(content);
  const parsed = proposalResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new LlmError(
      `LLM response did not match the proposal schema: ${previewContent(content)}`,
      parsed.error,
      {
        errorClass: "malformed_response",
        responseBody: content,
      }
    );
  }

  return {
    goalAttained: parsed.data.goalAttained,
    messageToUser: parsed.data.messageToUser,
    sawLastOutput: parsed.data.sawLastOutput,
    script: parsed.data.script,
  };
}

/**
 * A proposal cannot have seen output that was never supplied, whatever the
 * model claims.
 */
export function normalizeProposal(proposal: Proposal, lastOutput?: string): NormalizedProposal {
  if (proposal.sawLastOutput && !lastOutput) {
    return {
      corrections: ["saw_last_output_without_output"],
      proposal: {
        ...proposal,
        sawLastOutput: false,
      },
    };
  }

  return {
    corrections: [],
    proposal,
  };
}

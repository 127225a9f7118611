import { describe, expect, test } from "vitest";

import { normalizeProposal, parseProposalContent } from "../../src/agent/proposal/parser";
import { LlmError } from "../../src/utils/errors";

describe("proposal parser", () => {
  test("parses strict JSON", () => {
    const proposal = parseProposalContent(
      JSON.stringify({
        goalAttained: false,
        messageToUser: "Running a first attempt.",
        sawLastOutput: false,
        script: "print('hello')",
      })
    );

    expect(proposal).toEqual({
      goalAttained: false,
      messageToUser: "Running a first attempt.",
      sawLastOutput: false,
      script: "print('hello')",
    });
  });

  test("extracts JSON from a fenced block and defaults missing flags to false", () => {
    const proposal = parseProposalContent(
      "Here you go:\n```json\n{\"script\":\"print(1)\",\"messageToUser\":\"hi\"}\n```"
    );

    expect(proposal).toEqual({
      goalAttained: false,
      messageToUser: "hi",
      sawLastOutput: false,
      script: "print(1)",
    });
  });

  test("extracts the first JSON object surrounded by prose", () => {
    const proposal = parseProposalContent(
      "Sure. {\"script\":\"print(2)\",\"messageToUser\":\"ok\",\"goalAttained\":true,\"sawLastOutput\":true} Thanks."
    );

    expect(proposal.goalAttained).toBe(true);
    expect(proposal.script).toBe("print(2)");
  });

  test("rejects content without a valid proposal", () => {
    expect(() => parseProposalContent("I cannot help with that.")).toThrow(LlmError);

    try {
      parseProposalContent("{\"script\": 42}");
      throw new Error("expected parse failure");
    } catch (error) {
      expect(error).toBeInstanceOf(LlmError);
      if (error instanceof LlmError) {
        expect(error.errorClass).toBe("malformed_response");
        expect(error.responseBody).toBe("{\"script\": 42}");
      }
    }
  });

  test("forces sawLastOutput to false when no output was supplied", () => {
    const claimed = {
      goalAttained: true,
      messageToUser: "done",
      sawLastOutput: true,
      script: "print(1)",
    };

    expect(normalizeProposal(claimed)).toEqual({
      corrections: ["saw_last_output_without_output"],
      proposal: { ...claimed, sawLastOutput: false },
    });
    expect(normalizeProposal(claimed, "")).toEqual({
      corrections: ["saw_last_output_without_output"],
      proposal: { ...claimed, sawLastOutput: false },
    });
    expect(normalizeProposal(claimed, "1\n")).toEqual({
      corrections: [],
      proposal: claimed,
    });
  });
});

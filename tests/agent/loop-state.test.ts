import { describe, expect, test } from "vitest";

import type { Proposal } from "../../src/types/agent";

import {
  beginIteration,
  createInitialLoopState,
  hasReachedIterationLimit,
  isGoalAttained,
  recordExecution,
} from "../../src/agent/state";

const attainedProposal: Proposal = {
  goalAttained: true,
  messageToUser: "done",
  sawLastOutput: true,
  script: "print('x')",
};

describe("loop state", () => {
  test("starts empty", () => {
    expect(createInitialLoopState()).toEqual({
      executionCount: 0,
      iterationCount: 0,
      lastExecution: null,
      phase: "start",
    });
  });

  test("recording an execution overwrites the previous record", () => {
    const first = recordExecution(beginIteration(createInitialLoopState()), {
      exitStatus: 1,
      output: "Error:\nboom",
    });
    const second = recordExecution(beginIteration(first), { exitStatus: 0, output: "ok" });

    expect(second.iterationCount).toBe(2);
    expect(second.executionCount).toBe(2);
    expect(second.lastExecution).toEqual({ exitStatus: 0, output: "ok" });
    expect(second.phase).toBe("evaluating");
  });

  test("iteration limit is reached on the final allotted iteration", () => {
    const state = beginIteration(beginIteration(createInitialLoopState()));
    expect(hasReachedIterationLimit(state, 3)).toBe(false);
    expect(hasReachedIterationLimit(beginIteration(state), 3)).toBe(true);
  });

  test("goal attainment requires every condition", () => {
    const executed = recordExecution(beginIteration(createInitialLoopState()), {
      exitStatus: 0,
      output: "ok",
    });
    const failed = recordExecution(beginIteration(createInitialLoopState()), {
      exitStatus: 2,
      output: "Error:\nboom",
    });

    expect(isGoalAttained(attainedProposal, executed)).toBe(true);
    expect(isGoalAttained(attainedProposal, createInitialLoopState())).toBe(false);
    expect(isGoalAttained(attainedProposal, failed)).toBe(false);
    expect(isGoalAttained({ ...attainedProposal, sawLastOutput: false }, executed)).toBe(false);
    expect(isGoalAttained({ ...attainedProposal, goalAttained: false }, executed)).toBe(false);
  });
});

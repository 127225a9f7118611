import type { ExecutionRecord, LoopPhase, LoopState, Proposal } from "../types/agent";

export function createInitialLoopState(): LoopState {
  return {
    executionCount: 0,
    iterationCount: 0,
    lastExecution: null,
    phase: "start",
  };
}

export function beginIteration(state: LoopState): LoopState {
  return {
    ...state,
    iterationCount: state.iterationCount + 1,
    phase: "proposing",
  };
}

export function transitionPhase(state: LoopState, phase: LoopPhase): LoopState {
  return {
    ...state,
    phase,
  };
}

export function recordExecution(state: LoopState, record: ExecutionRecord): LoopState {
  return {
    ...state,
    executionCount: state.executionCount + 1,
    lastExecution: record,
    phase: "evaluating",
  };
}

/**
 * The last allotted iteration is spent on this check instead of one more
 * execution, so `maxIterations = N` allows at most `N - 1` executions.
 */
export function hasReachedIterationLimit(state: LoopState, maxIterations: number): boolean {
  return state.iterationCount >= maxIterations;
}

/**
 * Success needs every one of: a previous execution, a zero exit status, and a
 * proposal claiming both that it saw that output and that the goal is met.
 */
export function isGoalAttained(proposal: Proposal, state: LoopState): boolean {
  const lastExecution = state.lastExecution;
  if (!lastExecution) {
    return false;
  }

  return lastExecution.exitStatus === 0 && proposal.sawLastOutput && proposal.goalAttained;
}

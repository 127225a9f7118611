import type { ScriptExecutor } from "../tools/script";
import type { LoopOutcome, LoopResult, LoopState, Proposal } from "../types/agent";
import type { ModelProxy } from "./model-proxy";
import type { LoopObserver } from "./observer";

import { ValidationError } from "../utils/errors";
import { logIteration } from "../utils/logger";
import { normalizeProposal } from "./proposal/parser";
import {
  beginIteration,
  createInitialLoopState,
  hasReachedIterationLimit,
  isGoalAttained,
  recordExecution,
  transitionPhase,
} from "./state";

export const CANCELLED_MESSAGE = "Execution cancelled";

export type ExecutionConfirmation = (input: {
  iteration: number;
  proposal: Proposal;
}) => Promise<boolean>;

export interface ConvergenceLoopOptions {
  confirmExecution?: ExecutionConfirmation;
  executor: ScriptExecutor;
  goal: string;
  maxIterations: number;
  modelProxy: ModelProxy;
  observer?: LoopObserver;
}

export function buildExhaustedMessage(maxIterations: number): string {
  return `Maximum iterations (${maxIterations}) reached without success`;
}

function finish(
  state: LoopState,
  finalState: LoopOutcome,
  message: string,
  observer?: LoopObserver
): LoopResult {
  const result: LoopResult = {
    finalState,
    message,
    state: transitionPhase(state, finalState),
    success: finalState === "succeeded",
  };
  observer?.onFinish?.(result);
  return result;
}

/**
 * Proposes, executes and re-proposes until the model confirms the goal after
 * seeing a successful run, the iteration budget runs out, or the operator
 * declines an execution. Model and runner failures propagate to the caller.
 */
export async function runConvergenceLoop(options: ConvergenceLoopOptions): Promise<LoopResult> {
  const { confirmExecution, executor, goal, maxIterations, modelProxy, observer } = options;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new ValidationError(`maxIterations must be a positive integer, received ${String(maxIterations)}`);
  }

  let state = createInitialLoopState();

  while (true) {
    state = beginIteration(state);
    const iteration = state.iterationCount;
    observer?.onIterationStart?.({ iteration, maxIterations });

    if (hasReachedIterationLimit(state, maxIterations)) {
      logIteration(iteration, "iteration limit reached");
      return finish(state, "exhausted", buildExhaustedMessage(maxIterations), observer);
    }

    const lastOutput = state.lastExecution?.output;
    const { corrections, proposal } = normalizeProposal(
      await modelProxy.propose(goal, lastOutput),
      lastOutput
    );
    if (corrections.length > 0) {
      logIteration(iteration, `proposal corrected: ${corrections.join(", ")}`);
    }
    observer?.onProposal?.({ corrections, iteration, proposal });

    // Judged against the previous iteration's execution, before this script runs.
    if (isGoalAttained(proposal, state)) {
      logIteration(iteration, "goal attained");
      return finish(state, "succeeded", proposal.messageToUser, observer);
    }

    if (confirmExecution) {
      state = transitionPhase(state, "confirming");
      observer?.onConfirmationRequested?.({ iteration, script: proposal.script });
      const approved = await confirmExecution({ iteration, proposal });
      if (!approved) {
        return finish(state, "cancelled", CANCELLED_MESSAGE, observer);
      }
    }

    state = transitionPhase(state, "executing");
    observer?.onExecutionStart?.({ iteration, script: proposal.script });
    const record = await executor.run(proposal.script);
    state = recordExecution(state, record);
    logIteration(iteration, `script exited with status ${record.exitStatus}`);
    observer?.onExecutionResult?.({ iteration, proposal, record });
  }
}

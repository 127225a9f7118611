import type { ExecutionRecord, LoopResult, Proposal } from "../types/agent";
import type { ProposalCorrection } from "./proposal/parser";

export interface LoopIterationStartEvent {
  iteration: number;
  maxIterations: number;
}

export interface LoopProposalEvent {
  corrections: ProposalCorrection[];
  iteration: number;
  proposal: Proposal;
}

export interface LoopConfirmationEvent {
  iteration: number;
  script: string;
}

export interface LoopExecutionStartEvent {
  iteration: number;
  script: string;
}

export interface LoopExecutionResultEvent {
  iteration: number;
  proposal: Proposal;
  record: ExecutionRecord;
}

export interface LoopObserver {
  onConfirmationRequested?: (event: LoopConfirmationEvent) => void;
  onExecutionResult?: (event: LoopExecutionResultEvent) => void;
  onExecutionStart?: (event: LoopExecutionStartEvent) => void;
  onFinish?: (result: LoopResult) => void;
  onIterationStart?: (event: LoopIterationStartEvent) => void;
  onProposal?: (event: LoopProposalEvent) => void;
}

export type LoopPhase =
  | "cancelled"
  | "confirming"
  | "evaluating"
  | "executing"
  | "exhausted"
  | "proposing"
  | "start"
  | "succeeded";

export type LoopOutcome = Extract<LoopPhase, "cancelled" | "exhausted" | "succeeded">;

export interface ExecutionRecord {
  exitStatus: number;
  output: string;
}

export interface Proposal {
  goalAttained: boolean;
  messageToUser: string;
  sawLastOutput: boolean;
  script: string;
}

export interface LoopState {
  executionCount: number;
  iterationCount: number;
  lastExecution: ExecutionRecord | null;
  phase: LoopPhase;
}

export interface LoopResult {
  finalState: LoopOutcome;
  message: string;
  state: LoopState;
  success: boolean;
}

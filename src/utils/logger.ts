import type { ExecutionRecord } from "../types/agent";

type LoggerConfig = {
  verbose: boolean;
};

let config: LoggerConfig | null = null;

export function initializeLogger(loggerConfig: LoggerConfig): void {
  config = loggerConfig;
}

function shouldLog(): boolean {
  return config?.verbose ?? false;
}

export function log(message: string): void {
  if (shouldLog()) {
    console.log(`[LOG] ${message}`);
  }
}

export function logError(message: string, error?: unknown): void {
  console.error(`[ERROR] ${message}`);
  if (error instanceof Error && shouldLog()) {
    console.error(error.stack);
  }
}

export function logIteration(iteration: number, message: string): void {
  if (shouldLog()) {
    console.log(`[ITERATION ${iteration}] ${message}`);
  }
}

export function logExecution(record: ExecutionRecord): void {
  if (shouldLog()) {
    const status = record.exitStatus === 0 ? "✓" : "✗";
    console.log(`[EXECUTION] ${status} exit=${record.exitStatus} ${record.output.slice(0, 100)}`);
  }
}

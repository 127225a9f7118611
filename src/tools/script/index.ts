import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { ExecutionRecord } from "../../types/agent";
import type { ScriptRunnerConfig } from "../../types/config";

import { RunnerUnavailableError } from "../../utils/errors";
import { log, logExecution } from "../../utils/logger";
import { runSpawnedProcess } from "./process-lifecycle";

export const ERROR_OUTPUT_PREFIX = "Error:\n";
export const SIGNALLED_EXIT_STATUS = -1;

const ARTIFACT_DIRECTORY_PREFIX = "scriptwright-";

export interface ScriptExecutor {
  run(script: string): Promise<ExecutionRecord>;
}

export type ScriptExecutorOptions = {
  runner: ScriptRunnerConfig;
  tempRoot?: string;
  workingDirectory?: string;
};

export function getRunnerLabel(runner: ScriptRunnerConfig): string {
  return [runner.command, ...runner.args, `<script${runner.extension}>`].join(" ");
}

export async function runScript(script: string, options: ScriptExecutorOptions): Promise<ExecutionRecord> {
  const { runner } = options;
  const artifactDirectory = await mkdtemp(join(options.tempRoot ?? tmpdir(), ARTIFACT_DIRECTORY_PREFIX));
  const scriptPath = join(artifactDirectory, `script${runner.extension}`);

  try {
    await writeFile(scriptPath, script, "utf8");
    log(`Running ${runner.command} ${[...runner.args, scriptPath].join(" ")}`);

    let result: Awaited<ReturnType<typeof runSpawnedProcess>>;
    try {
      result = await runSpawnedProcess({
        args: [...runner.args, scriptPath],
        executable: runner.command,
        workingDirectory: options.workingDirectory ?? process.cwd(),
      });
    } catch (error) {
      throw new RunnerUnavailableError(
        `Unable to launch script runner "${runner.command}": ${error instanceof Error ? error.message : String(error)}`,
        runner.command,
        error
      );
    }

    const exitStatus = result.exitCode ?? SIGNALLED_EXIT_STATUS;
    log(
      `Runner exited with ${String(exitStatus)}${result.signal ? ` (${result.signal})` : ""} after ${String(result.durationMs)}ms`
    );
    const record: ExecutionRecord = {
      exitStatus,
      output: exitStatus === 0 ? result.stdout : `${ERROR_OUTPUT_PREFIX}${result.stderr}`,
    };
    logExecution(record);
    return record;
  } finally {
    await rm(artifactDirectory, { force: true, recursive: true });
  }
}

export function createScriptExecutor(options: ScriptExecutorOptions): ScriptExecutor {
  return {
    run: (script) => runScript(script, options),
  };
}

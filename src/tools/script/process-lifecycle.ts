import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable } from "node:stream";

type ProcessSignal = Exclude<Parameters<typeof process.kill>[1], number | undefined>;

export interface SpawnedProcessResult {
  durationMs: number;
  exitCode: null | number;
  signal: null | ProcessSignal;
  stderr: string;
  stdout: string;
}

function collectStreamOutput(stream: Readable): Promise<string> {
  return new Promise((resolveOutput, rejectOutput) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk) => {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    });
    stream.on("error", rejectOutput);
    stream.on("end", () => {
      resolveOutput(Buffer.concat(chunks).toString("utf8"));
    });
  });
}

/**
 * Runs an executable without a shell and waits for it to close. Rejects only
 * when the process cannot be started; a non-zero exit resolves normally.
 */
export async function runSpawnedProcess(input: {
  args: string[];
  executable: string;
  workingDirectory: string;
}): Promise<SpawnedProcessResult> {
  // stdin is closed: a script that prompts reads EOF.
  const processHandle: ChildProcessByStdio<null, Readable, Readable> = spawn(
    input.executable,
    input.args,
    {
      cwd: input.workingDirectory,
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    }
  );

  const startedAt = Date.now();

  const exitPromise = new Promise<{ exitCode: null | number; signal: null | ProcessSignal }>(
    (resolveExit, rejectExit) => {
      processHandle.once("error", (error) => {
        rejectExit(error);
      });
      processHandle.once("close", (exitCode, signal) => {
        resolveExit({
          exitCode,
          signal,
        });
      });
    }
  );

  const [exitInfo, stdout, stderr] = await Promise.all([
    exitPromise,
    collectStreamOutput(processHandle.stdout),
    collectStreamOutput(processHandle.stderr),
  ]);

  return {
    durationMs: Math.max(0, Date.now() - startedAt),
    exitCode: exitInfo.exitCode,
    signal: exitInfo.signal,
    stderr,
    stdout,
  };
}

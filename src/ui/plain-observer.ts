import type { LoopObserver } from "../agent/observer";
import type { OutputSink } from "./output-sink";

import { withTrailingNewline } from "./output-sink";

export type PlainObserverOptions = {
  verbose: boolean;
};

/**
 * Quiet mode prints only the final output on success and the terminal notice
 * otherwise. Verbose mode also echoes every script, its raw output and the
 * model's message.
 */
export function createPlainLoopObserver(sink: OutputSink, options: PlainObserverOptions): LoopObserver {
  let confirmedIteration: number | undefined;

  return {
    onConfirmationRequested: (event) => {
      confirmedIteration = event.iteration;
      sink.write(`\n[script:proposed:iteration:${String(event.iteration)}]\n${withTrailingNewline(event.script)}`);
    },
    onExecutionResult: (event) => {
      if (!options.verbose) {
        return;
      }
      sink.write(`\n[output:exit:${String(event.record.exitStatus)}]\n${withTrailingNewline(event.record.output)}`);
      if (event.proposal.messageToUser) {
        sink.write(`\n${withTrailingNewline(event.proposal.messageToUser)}`);
      }
    },
    onExecutionStart: (event) => {
      // The confirmation prompt already echoed this script.
      if (!options.verbose || confirmedIteration === event.iteration) {
        return;
      }
      sink.write(`\n[script:iteration:${String(event.iteration)}]\n${withTrailingNewline(event.script)}`);
    },
    onFinish: (result) => {
      if (result.finalState !== "succeeded") {
        sink.write(withTrailingNewline(result.message));
        return;
      }

      if (options.verbose) {
        sink.write(`Success\n${withTrailingNewline(result.message)}`);
        return;
      }

      sink.write(withTrailingNewline(result.state.lastExecution?.output ?? ""));
    },
  };
}

export interface ProposalPromptInput {
  goal: string;
  lastOutput?: string;
  outputLimitChars: number;
}

export function truncateOutput(output: string, limitChars: number): string {
  if (output.length <= limitChars) {
    return output;
  }

  const remaining = output.length - limitChars;
  return `${output.slice(0, limitChars)}\n...[truncated ${String(remaining)} chars]`;
}

export function buildProposalPrompt(input: ProposalPromptInput): string {
  const lastOutput = input.lastOutput ? truncateOutput(input.lastOutput, input.outputLimitChars) : "";

  return `Create or modify a Python script based on the goal and the previous output.

If the last output is not empty, analyze it for errors and make the necessary corrections.
Return the script together with whether you have seen the last terminal output, whether the goal was attained, and a message to the user.

Goal: '${input.goal}'
Last Output: \`\`\`${lastOutput}\`\`\`

If Last Output is empty, meaning there is nothing within the triple backticks, sawLastOutput is false.
If the goal was attained and you have seen the last terminal output, messageToUser should be a summary of the terminal output.`;
}

export interface OutputSink {
  write: (text: string) => void;
}

export function createStreamSink(stream: NodeJS.WritableStream = process.stdout): OutputSink {
  return {
    write: (text) => {
      stream.write(text);
    },
  };
}

export function withTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}

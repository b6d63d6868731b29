import type { PublishSink } from "@barline/core";

export type LineStream = Readonly<{
  write: (chunk: string) => unknown;
}>;

/** One status line per render, for piping into bars that read stdin. */
export function createLineSink(stream: LineStream = process.stdout): PublishSink {
  return Object.freeze({
    publish(line: string): void {
      stream.write(`${line}\n`);
    },
  });
}

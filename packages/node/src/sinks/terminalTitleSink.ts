import { BarlineError, type PublishSink } from "@barline/core";

export type TitleStream = Readonly<{
  write: (chunk: string) => unknown;
  isTTY?: boolean;
}>;

export type TerminalTitleSinkOptions = Readonly<{
  stream?: TitleStream;
  /** Write even when the stream is not a TTY. */
  force?: boolean;
}>;

const OSC_SET_TITLE = "\u001b]2;";
const BEL = "\u0007";

/** C0 and C1 controls would end or corrupt the OSC sequence. */
export function sanitizeTitle(line: string): string {
  return line.replace(/[\u0000-\u001f\u007f-\u009f]/g, " ");
}

export function encodeTitleSequence(line: string): string {
  return `${OSC_SET_TITLE}${sanitizeTitle(line)}${BEL}`;
}

export function createTerminalTitleSink(opts: TerminalTitleSinkOptions = {}): PublishSink {
  const stream = opts.stream ?? process.stdout;
  if (opts.force !== true && stream.isTTY !== true) {
    throw new BarlineError("BARLINE_SINK_OPEN", "terminal title sink needs a TTY on stdout");
  }
  return Object.freeze({
    publish(line: string): void {
      stream.write(encodeTitleSequence(line));
    },
  });
}

import type { PublishSink } from "@barline/core";
import type { SinkKind } from "../config/daemonConfig.js";
import { type LineStream, createLineSink } from "./lineSink.js";
import { type TitleStream, createTerminalTitleSink } from "./terminalTitleSink.js";
import { type XRootSinkOptions, createXRootSink } from "./xrootSink.js";

export { createLineSink, type LineStream } from "./lineSink.js";
export {
  createTerminalTitleSink,
  encodeTitleSequence,
  sanitizeTitle,
  type TerminalTitleSinkOptions,
  type TitleStream,
} from "./terminalTitleSink.js";
export { createXRootSink, type XRootSinkOptions } from "./xrootSink.js";

export type OpenPublishSinkOptions = Readonly<{
  env?: Readonly<Record<string, string | undefined>>;
  stdout?: LineStream & TitleStream;
  exec?: XRootSinkOptions["exec"];
}>;

/**
 * Open the configured sink. `auto` prefers the X root window when a display
 * is available and falls back to stdout lines.
 * Throws BARLINE_SINK_OPEN when the chosen surface is unavailable.
 */
export function openPublishSink(kind: SinkKind, opts: OpenPublishSinkOptions = {}): PublishSink {
  const env = opts.env ?? process.env;
  const stdout = opts.stdout ?? process.stdout;
  switch (kind) {
    case "xroot":
      return createXRootSink({ env, exec: opts.exec });
    case "title":
      return createTerminalTitleSink({ stream: stdout });
    case "stdout":
      return createLineSink(stdout);
    case "auto": {
      const display = env["DISPLAY"];
      if (display !== undefined && display.trim().length > 0) {
        return createXRootSink({ env, exec: opts.exec });
      }
      return createLineSink(stdout);
    }
  }
}

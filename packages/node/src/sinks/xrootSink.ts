import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { BarlineError, type PublishSink } from "@barline/core";

type EnvMap = Readonly<Record<string, string | undefined>>;

export type XRootSinkOptions = Readonly<{
  env?: EnvMap;
  /** Runs `xsetroot -name <line>`; injectable for tests. */
  exec?: ((file: string, args: readonly string[]) => Promise<unknown>) | undefined;
}>;

const execFileAsync = promisify(execFile);

/**
 * Publishes the status line as the X root window name, which is where dwm
 * and similar window managers read their bar text.
 */
export function createXRootSink(opts: XRootSinkOptions = {}): PublishSink {
  const env = opts.env ?? process.env;
  const display = env["DISPLAY"];
  if (display === undefined || display.trim().length === 0) {
    throw new BarlineError("BARLINE_SINK_OPEN", "cannot open display: DISPLAY is not set");
  }
  const exec =
    opts.exec ??
    ((file: string, args: readonly string[]) =>
      execFileAsync(file, args, { env: { ...process.env, DISPLAY: display } }));

  return Object.freeze({
    async publish(line: string): Promise<void> {
      await exec("xsetroot", ["-name", line]);
    },
  });
}

import { describeThrown } from "@barline/core";
import {
  type DaemonConfigOverrides,
  type SinkKind,
  resolveDaemonConfig,
} from "../config/daemonConfig.js";
import { createLogger } from "../log/logger.js";
import { EXIT_FATAL, type StatusDaemonOptions, createStatusDaemon } from "./statusDaemon.js";

type EnvMap = Readonly<Record<string, string | undefined>>;

export const DAEMON_USAGE = [
  "Usage: barlined [--socket <path>] [--sink auto|xroot|title|stdout]",
  "",
  "Environment: BARLINE_SOCKET, BARLINE_SINK, BARLINE_SHELL, BARLINE_LOG_LEVEL, BARLINE_LOG_FORMAT",
].join("\n");

export type DaemonMainDeps = Readonly<{
  env?: EnvMap;
  writeErr?: (line: string) => void;
  writeOut?: (line: string) => void;
  /** Extra daemon wiring (runner, sink, hooks); config always comes from argv/env. */
  daemon?: Omit<StatusDaemonOptions, "config">;
}>;

type ParsedArgs =
  | Readonly<{ kind: "run"; overrides: DaemonConfigOverrides }>
  | Readonly<{ kind: "help" }>
  | Readonly<{ kind: "error"; message: string }>;

export function parseDaemonArgs(argv: readonly string[]): ParsedArgs {
  let socketPath: string | undefined;
  let sink: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") return { kind: "help" };
    if (arg === "--socket" || arg === "--sink") {
      const value = argv[i + 1];
      if (value === undefined) return { kind: "error", message: `missing value for ${arg}` };
      if (arg === "--socket") socketPath = value;
      else sink = value;
      i++;
      continue;
    }
    return { kind: "error", message: `unknown argument: ${String(arg)}` };
  }
  const overrides: { socketPath?: string; sink?: SinkKind } = {};
  if (socketPath !== undefined) overrides.socketPath = socketPath;
  if (sink !== undefined) {
    if (sink !== "auto" && sink !== "xroot" && sink !== "title" && sink !== "stdout") {
      return { kind: "error", message: `unknown sink: ${sink}` };
    }
    overrides.sink = sink;
  }
  return { kind: "run", overrides };
}

/** Returns the process exit code. */
export async function runDaemon(argv: readonly string[], deps: DaemonMainDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const writeErr = deps.writeErr ?? ((line: string) => process.stderr.write(`${line}\n`));
  const writeOut = deps.writeOut ?? ((line: string) => process.stdout.write(`${line}\n`));

  const parsed = parseDaemonArgs(argv);
  if (parsed.kind === "help") {
    writeOut(DAEMON_USAGE);
    return 0;
  }
  if (parsed.kind === "error") {
    writeErr(`barlined: ${parsed.message}`);
    writeErr(DAEMON_USAGE);
    return 2;
  }

  let config: ReturnType<typeof resolveDaemonConfig>;
  try {
    config = resolveDaemonConfig(env, parsed.overrides);
  } catch (e: unknown) {
    writeErr(`barlined: ${describeThrown(e)}`);
    return EXIT_FATAL;
  }

  const logger =
    deps.daemon?.logger ??
    createLogger({
      scope: "daemon",
      level: config.logLevel,
      format: config.logFormat,
      write: writeErr,
    });
  try {
    const daemon = createStatusDaemon({ ...deps.daemon, config, logger });
    return await daemon.run();
  } catch (e: unknown) {
    logger.log({ level: "error", message: "startup failed", fields: { error: describeThrown(e) } });
    return EXIT_FATAL;
  }
}

import { tmpdir } from "node:os";
import { isAbsolute, join } from "node:path";
import { BarlineError } from "@barline/core";
import { type LoggerFormat, type LoggerLevel, isLoggerLevel } from "../log/logger.js";

type EnvMap = Readonly<Record<string, string | undefined>>;

export type SinkKind = "auto" | "xroot" | "title" | "stdout";

export type DaemonConfig = Readonly<{
  /** Filesystem path of the request socket. */
  socketPath: string;
  sink: SinkKind;
  /** Shell used for `-c <command>`. */
  shell: string;
  logLevel: LoggerLevel;
  logFormat: LoggerFormat;
}>;

export type DaemonConfigOverrides = Partial<DaemonConfig>;

export const SOCKET_FILE_NAME = "barline.sock";
const SINK_KINDS: readonly SinkKind[] = Object.freeze(["auto", "xroot", "title", "stdout"]);

function invalidConfig(detail: string): never {
  throw new BarlineError("BARLINE_INVALID_CONFIG", detail);
}

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envLower(env: EnvMap, key: string): string | undefined {
  return envText(env, key)?.toLowerCase();
}

function isSinkKind(v: string): v is SinkKind {
  return SINK_KINDS.some((k) => k === v);
}

export function defaultSocketPath(env: EnvMap): string {
  const runtimeDir = envText(env, "XDG_RUNTIME_DIR");
  return join(runtimeDir ?? tmpdir(), SOCKET_FILE_NAME);
}

/**
 * Resolve daemon settings from the environment. Explicit overrides win;
 * every value is validated once here.
 */
export function resolveDaemonConfig(
  env: EnvMap = process.env,
  overrides: DaemonConfigOverrides = {},
): DaemonConfig {
  const socketPath = overrides.socketPath ?? envText(env, "BARLINE_SOCKET") ?? defaultSocketPath(env);
  if (!isAbsolute(socketPath)) invalidConfig(`socket path must be absolute: ${socketPath}`);

  const sinkRaw = overrides.sink ?? envLower(env, "BARLINE_SINK") ?? "auto";
  if (!isSinkKind(sinkRaw)) {
    invalidConfig(`BARLINE_SINK must be one of ${SINK_KINDS.join(", ")}: ${sinkRaw}`);
  }

  const shell = overrides.shell ?? envText(env, "BARLINE_SHELL") ?? "/bin/sh";
  if (!isAbsolute(shell)) invalidConfig(`shell must be an absolute path: ${shell}`);

  const levelRaw = overrides.logLevel ?? envLower(env, "BARLINE_LOG_LEVEL") ?? "info";
  if (!isLoggerLevel(levelRaw)) invalidConfig(`unknown log level: ${levelRaw}`);

  const formatRaw = overrides.logFormat ?? envLower(env, "BARLINE_LOG_FORMAT") ?? "text";
  if (formatRaw !== "text" && formatRaw !== "json") {
    invalidConfig(`BARLINE_LOG_FORMAT must be text or json: ${formatRaw}`);
  }

  return Object.freeze({
    socketPath,
    sink: sinkRaw,
    shell,
    logLevel: levelRaw,
    logFormat: formatRaw,
  });
}

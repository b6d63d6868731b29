import { describeThrown, parseRequestId } from "@barline/core";
import { defaultSocketPath } from "../config/daemonConfig.js";
import { sendRequest } from "./sendRequest.js";

type EnvMap = Readonly<Record<string, string | undefined>>;

export const CLIENT_USAGE = "Usage: barline <request-id>";

export const EXIT_SENT = 0;
export const EXIT_SEND_FAILED = 1;
export const EXIT_USAGE = 2;

export type ClientDeps = Readonly<{
  env?: EnvMap;
  writeErr?: (line: string) => void;
  send?: (path: string, id: number) => Promise<void>;
}>;

export function resolveClientSocketPath(env: EnvMap): string {
  const explicit = env["BARLINE_SOCKET"]?.trim();
  return explicit !== undefined && explicit.length > 0 ? explicit : defaultSocketPath(env);
}

/** Thin client: one decimal id in, four bytes out. Returns the exit code. */
export async function runClient(argv: readonly string[], deps: ClientDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const writeErr = deps.writeErr ?? ((line: string) => process.stderr.write(`${line}\n`));
  const send = deps.send ?? sendRequest;

  const [arg, ...rest] = argv;
  if (arg === undefined || rest.length > 0) {
    writeErr(CLIENT_USAGE);
    return EXIT_USAGE;
  }

  const id = parseRequestId(arg);
  if (id === null) {
    writeErr(`barline: cannot convert '${arg}' to an unsigned 32-bit request id`);
    return EXIT_USAGE;
  }

  const path = resolveClientSocketPath(env);
  try {
    await send(path, id);
  } catch (e: unknown) {
    writeErr(`barline: cannot reach daemon at ${path}: ${describeThrown(e)}`);
    return EXIT_SEND_FAILED;
  }
  return EXIT_SENT;
}

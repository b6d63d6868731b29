/**
 * Shell command primitives.
 *
 * - capture: blocking from the dispatcher's point of view; resolves once the
 *   process exits with the first line of stdout (newline included), capped.
 * - detached: fire-and-forget; the process is unref'd and never awaited.
 *
 * Only failure to create the process is an error. Exit status is ignored.
 */

import { spawn } from "node:child_process";
import {
  BarlineError,
  type CommandRunner,
  type DetachedRunner,
  describeThrown,
} from "@barline/core";

const NEWLINE = 0x0a;

export type ShellRunnerOptions = Readonly<{
  shell?: string;
  env?: NodeJS.ProcessEnv;
}>;

export type DetachedRunnerOptions = ShellRunnerOptions &
  Readonly<{
    /** Receives spawn failures; the command itself is never awaited. */
    onError: (error: BarlineError) => void;
  }>;

function spawnFailed(command: string, cause: unknown): BarlineError {
  return new BarlineError(
    "BARLINE_SPAWN_FAILED",
    `cannot run "${command}": ${describeThrown(cause)}`,
    { cause },
  );
}

export function createCaptureRunner(opts: ShellRunnerOptions = {}): CommandRunner {
  const shell = opts.shell ?? "/bin/sh";

  return Object.freeze({
    capture(command: string, maxBytes: number): Promise<Uint8Array> {
      return new Promise<Uint8Array>((resolve, reject) => {
        let child: ReturnType<typeof spawnCapture>;
        try {
          child = spawnCapture(shell, command, opts.env);
        } catch (e: unknown) {
          reject(spawnFailed(command, e));
          return;
        }

        const chunks: Buffer[] = [];
        let size = 0;
        let lineDone = maxBytes <= 0;
        let settled = false;

        child.stdout.on("data", (chunk: Buffer) => {
          // Keep draining after the first line so the child never blocks on a full pipe.
          if (lineDone) return;
          const nl = chunk.indexOf(NEWLINE);
          const wanted = nl === -1 ? chunk.length : nl + 1;
          const take = Math.min(wanted, maxBytes - size);
          if (take > 0) {
            chunks.push(chunk.subarray(0, take));
            size += take;
          }
          if (nl !== -1 || size >= maxBytes) lineDone = true;
        });

        child.once("error", (err: Error) => {
          if (settled) return;
          settled = true;
          reject(spawnFailed(command, err));
        });

        child.once("close", () => {
          if (settled) return;
          settled = true;
          resolve(Buffer.concat(chunks, size));
        });
      });
    },
  });
}

function spawnCapture(shell: string, command: string, env: NodeJS.ProcessEnv | undefined) {
  return spawn(shell, ["-c", command], {
    stdio: ["ignore", "pipe", "ignore"],
    env: env ?? process.env,
  });
}

export function createDetachedRunner(opts: DetachedRunnerOptions): DetachedRunner {
  const shell = opts.shell ?? "/bin/sh";

  return Object.freeze({
    launch(command: string): void {
      try {
        const child = spawn(shell, ["-c", command], {
          detached: true,
          stdio: "ignore",
          env: opts.env ?? process.env,
        });
        child.once("error", (err: Error) => {
          opts.onError(spawnFailed(command, err));
        });
        child.unref();
      } catch (e: unknown) {
        opts.onError(spawnFailed(command, e));
      }
    },
  });
}

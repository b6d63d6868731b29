import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CommandRunner, DetachedRunner, LogEvent, PublishSink } from "@barline/core";

const encoder = new TextEncoder();

export type RecordingSink = PublishSink &
  Readonly<{
    lines: readonly string[];
    last: () => string | undefined;
  }>;

/** Publish sink that keeps every line in memory. */
export function createRecordingSink(): RecordingSink {
  const lines: string[] = [];
  return Object.freeze({
    lines,
    publish(line: string): void {
      lines.push(line);
    },
    last(): string | undefined {
      return lines[lines.length - 1];
    },
  });
}

export type ScriptedRunner = CommandRunner &
  Readonly<{
    calls: readonly string[];
  }>;

/**
 * Runner that answers from a command -> output table instead of spawning.
 * Unknown commands produce no output. Outputs are cut like the real runner:
 * through the first newline, capped at `maxBytes`.
 */
export function createScriptedRunner(
  outputs: Readonly<Record<string, string | (() => string)>> = {},
): ScriptedRunner {
  const calls: string[] = [];
  return Object.freeze({
    calls,
    async capture(command: string, maxBytes: number): Promise<Uint8Array> {
      calls.push(command);
      const entry = outputs[command];
      const text = typeof entry === "function" ? entry() : (entry ?? "");
      const bytes = encoder.encode(text);
      const nl = bytes.indexOf(0x0a);
      const end = nl === -1 ? bytes.length : nl + 1;
      return bytes.subarray(0, Math.min(end, maxBytes));
    },
  });
}

export type RecordingDetachedRunner = DetachedRunner &
  Readonly<{
    launched: readonly string[];
  }>;

export function createRecordingDetachedRunner(): RecordingDetachedRunner {
  const launched: string[] = [];
  return Object.freeze({
    launched,
    launch(command: string): void {
      launched.push(command);
    },
  });
}

export type LogCapture = Readonly<{
  events: readonly LogEvent[];
  log: (event: LogEvent) => void;
  messages: (level?: LogEvent["level"]) => readonly string[];
}>;

export function createLogCapture(): LogCapture {
  const events: LogEvent[] = [];
  return Object.freeze({
    events,
    log(event: LogEvent): void {
      events.push(event);
    },
    messages(level?: LogEvent["level"]): readonly string[] {
      return events.filter((e) => level === undefined || e.level === level).map((e) => e.message);
    },
  });
}

export async function withTempDir<T>(run: (dir: string) => Promise<T> | T): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), "barline-test-"));
  try {
    return await run(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

/** Poll `predicate` until it holds; rejects after `timeoutMs`. */
export async function waitFor(
  predicate: () => boolean,
  what = "condition",
  timeoutMs = 2000,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`waitFor(${what}) timed out after ${String(timeoutMs)}ms`);
    }
    await new Promise<void>((resolve) => {
      setTimeout(resolve, 5);
    });
  }
}

import assert from "node:assert/strict";
import test from "node:test";
import { createLogger, formatTextLine, isLoggerLevel } from "../log/logger.js";

test("formatTextLine appends fields and quotes values with spaces", () => {
  const line = formatTextLine("daemon", {
    level: "warn",
    message: "publish failed",
    fields: { error: "Error: no display", code: 1, ok: false, empty: "" },
  });
  assert.equal(
    line,
    'barline[daemon] warn: publish failed error="Error: no display" code=1 ok=false empty=""',
  );
});

test("createLogger drops events below its level", () => {
  const lines: string[] = [];
  const logger = createLogger({ scope: "daemon", level: "warn", write: (l) => lines.push(l) });
  logger.log({ level: "debug", message: "dispatch" });
  logger.log({ level: "info", message: "started" });
  logger.log({ level: "warn", message: "short request dropped", fields: { received: 2 } });
  logger.log({ level: "error", message: "fatal" });
  assert.deepEqual(lines, [
    "barline[daemon] warn: short request dropped received=2",
    "barline[daemon] error: fatal",
  ]);
});

test("silent level writes nothing", () => {
  const lines: string[] = [];
  const logger = createLogger({ scope: "daemon", level: "silent", write: (l) => lines.push(l) });
  logger.log({ level: "error", message: "fatal" });
  assert.deepEqual(lines, []);
});

test("child loggers extend the scope and share the sink", () => {
  const lines: string[] = [];
  const logger = createLogger({ scope: "daemon", level: "debug", write: (l) => lines.push(l) });
  const child = logger.child("channel");
  assert.equal(child.scope, "daemon:channel");
  assert.equal(child.level, "debug");
  child.log({ level: "info", message: "listening", fields: { path: "/tmp/barline.sock" } });
  assert.deepEqual(lines, ["barline[daemon:channel] info: listening path=/tmp/barline.sock"]);
});

test("json format emits one object per line", () => {
  const lines: string[] = [];
  const logger = createLogger({
    scope: "daemon",
    format: "json",
    write: (l) => lines.push(l),
    now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
  });
  logger.log({ level: "info", message: "started", fields: { requests: 7 } });
  assert.equal(lines.length, 1);
  assert.deepEqual(JSON.parse(lines[0] ?? ""), {
    ts: "2024-01-02T03:04:05.000Z",
    pid: process.pid,
    level: "info",
    scope: "daemon",
    message: "started",
    requests: 7,
  });
});

test("isLoggerLevel accepts only known levels", () => {
  assert.equal(isLoggerLevel("debug"), true);
  assert.equal(isLoggerLevel("silent"), true);
  assert.equal(isLoggerLevel("trace"), false);
  assert.equal(isLoggerLevel("INFO"), false);
});

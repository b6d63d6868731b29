import assert from "node:assert/strict";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { isBarlineError } from "@barline/core";
import { defaultSocketPath, resolveDaemonConfig } from "../config/daemonConfig.js";

test("defaults come from XDG_RUNTIME_DIR", () => {
  const config = resolveDaemonConfig({ XDG_RUNTIME_DIR: "/run/user/1000" });
  assert.deepEqual(config, {
    socketPath: "/run/user/1000/barline.sock",
    sink: "auto",
    shell: "/bin/sh",
    logLevel: "info",
    logFormat: "text",
  });
});

test("defaultSocketPath falls back to the temp dir", () => {
  assert.equal(defaultSocketPath({}), join(tmpdir(), "barline.sock"));
  assert.equal(defaultSocketPath({ XDG_RUNTIME_DIR: "   " }), join(tmpdir(), "barline.sock"));
});

test("environment values are trimmed and lowercased where relevant", () => {
  const config = resolveDaemonConfig({
    BARLINE_SOCKET: " /tmp/bar.sock ",
    BARLINE_SINK: "STDOUT",
    BARLINE_SHELL: "/bin/bash",
    BARLINE_LOG_LEVEL: "Debug",
    BARLINE_LOG_FORMAT: "JSON",
  });
  assert.deepEqual(config, {
    socketPath: "/tmp/bar.sock",
    sink: "stdout",
    shell: "/bin/bash",
    logLevel: "debug",
    logFormat: "json",
  });
});

test("overrides win over the environment", () => {
  const config = resolveDaemonConfig(
    { BARLINE_SOCKET: "/tmp/env.sock", BARLINE_SINK: "xroot" },
    { socketPath: "/tmp/flag.sock", sink: "title" },
  );
  assert.equal(config.socketPath, "/tmp/flag.sock");
  assert.equal(config.sink, "title");
});

test("invalid values are rejected with BARLINE_INVALID_CONFIG", () => {
  const cases: Readonly<Record<string, string>>[] = [
    { BARLINE_SOCKET: "relative.sock" },
    { BARLINE_SINK: "lemonbar" },
    { BARLINE_SHELL: "sh" },
    { BARLINE_LOG_LEVEL: "trace" },
    { BARLINE_LOG_FORMAT: "xml" },
  ];
  for (const env of cases) {
    assert.throws(
      () => resolveDaemonConfig({ XDG_RUNTIME_DIR: "/run/user/1000", ...env }),
      (e: unknown) => isBarlineError(e, "BARLINE_INVALID_CONFIG"),
    );
  }
});

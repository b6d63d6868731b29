import assert from "node:assert/strict";
import net from "node:net";
import { join } from "node:path";
import test from "node:test";
import { decodeRequest } from "@barline/core";
import { waitFor, withTempDir } from "@barline/testkit";
import { CLIENT_USAGE, resolveClientSocketPath, runClient } from "../client/clientMain.js";
import { sendRequest } from "../client/sendRequest.js";

type SendCall = Readonly<{ path: string; id: number }>;

function recordingSend(fail?: Error): {
  calls: SendCall[];
  send: (path: string, id: number) => Promise<void>;
} {
  const calls: SendCall[] = [];
  return {
    calls,
    send: async (path, id) => {
      calls.push({ path, id });
      if (fail) throw fail;
    },
  };
}

test("runClient sends the parsed id to the configured socket", async () => {
  const { calls, send } = recordingSend();
  const errs: string[] = [];
  const code = await runClient(["6"], {
    env: { BARLINE_SOCKET: "/tmp/bar.sock" },
    writeErr: (l) => errs.push(l),
    send,
  });
  assert.equal(code, 0);
  assert.deepEqual(calls, [{ path: "/tmp/bar.sock", id: 6 }]);
  assert.deepEqual(errs, []);
});

test("runClient prints usage for a wrong argument count", async () => {
  for (const argv of [[], ["1", "2"]]) {
    const { calls, send } = recordingSend();
    const errs: string[] = [];
    const code = await runClient(argv, { env: {}, writeErr: (l) => errs.push(l), send });
    assert.equal(code, 2);
    assert.deepEqual(errs, [CLIENT_USAGE]);
    assert.deepEqual(calls, []);
  }
});

test("runClient rejects ids that are not unsigned 32-bit integers", async () => {
  for (const arg of ["-1", "abc", "4294967296", "1.5", ""]) {
    const { calls, send } = recordingSend();
    const errs: string[] = [];
    const code = await runClient([arg], { env: {}, writeErr: (l) => errs.push(l), send });
    assert.equal(code, 2);
    assert.deepEqual(errs, [
      `barline: cannot convert '${arg}' to an unsigned 32-bit request id`,
    ]);
    assert.deepEqual(calls, []);
  }
});

test("runClient reports an unreachable daemon", async () => {
  const { send } = recordingSend(new Error("connect ENOENT"));
  const errs: string[] = [];
  const code = await runClient(["0"], {
    env: { XDG_RUNTIME_DIR: "/run/user/1000" },
    writeErr: (l) => errs.push(l),
    send,
  });
  assert.equal(code, 1);
  assert.deepEqual(errs, [
    "barline: cannot reach daemon at /run/user/1000/barline.sock: Error: connect ENOENT",
  ]);
});

test("resolveClientSocketPath prefers BARLINE_SOCKET", () => {
  assert.equal(
    resolveClientSocketPath({ BARLINE_SOCKET: "/tmp/x.sock", XDG_RUNTIME_DIR: "/run/user/1" }),
    "/tmp/x.sock",
  );
  assert.equal(
    resolveClientSocketPath({ XDG_RUNTIME_DIR: "/run/user/1" }),
    "/run/user/1/barline.sock",
  );
});

test("sendRequest writes exactly four little-endian bytes", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "bar.sock");
    const received: Uint8Array[] = [];
    const server = net.createServer((socket) => {
      const chunks: Buffer[] = [];
      socket.on("data", (chunk: Buffer) => chunks.push(chunk));
      socket.on("end", () => {
        received.push(Uint8Array.from(Buffer.concat(chunks)));
        socket.destroy();
      });
    });
    await new Promise<void>((resolve) => server.listen(path, resolve));
    try {
      await sendRequest(path, 0x0a0b0c0d);
      await waitFor(() => received.length === 1, "payload");
      assert.deepEqual(Array.from(received[0] ?? []), [0x0d, 0x0c, 0x0b, 0x0a]);
      assert.equal(decodeRequest(received[0] ?? new Uint8Array(0)), 0x0a0b0c0d);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

test("sendRequest rejects when nothing listens", async () => {
  await withTempDir(async (dir) => {
    await assert.rejects(() => sendRequest(join(dir, "missing.sock"), 1));
  });
});

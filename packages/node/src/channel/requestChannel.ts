/**
 * Local request channel: a Unix-domain stream socket at a well-known path.
 *
 * Connection discipline: a client connects, writes one 4-byte little-endian
 * request id and disconnects. The daemon closes the connection once the
 * request has been dispatched. Requests are handled strictly one at a time,
 * in arrival order.
 */

import { lstatSync, rmSync } from "node:fs";
import net from "node:net";
import {
  BarlineError,
  type LogSink,
  REQUEST_BYTES,
  decodeRequest,
  describeThrown,
  makeLogSink,
} from "@barline/core";

export type RequestVerdict = "continue" | "stop";

export type RequestChannelOptions = Readonly<{
  path: string;
  /** Runs one request to completion; "stop" closes the channel afterwards. */
  onRequest: (id: number) => Promise<RequestVerdict>;
  /** Receives a rejection from `onRequest`. The connection is closed either way. */
  onError: (error: unknown) => void;
  log?: LogSink;
}>;

export type RequestChannelStats = Readonly<{
  accepted: number;
  dispatched: number;
  dropped: number;
}>;

export type RequestChannel = Readonly<{
  path: string;
  /** Stop accepting, drop queued requests, unlink the socket. Idempotent. */
  close: () => Promise<void>;
  /** Synchronous unlink for `process.on("exit")`; no-op once released. */
  releaseSync: () => void;
  isClosed: () => boolean;
  /** Resolves after the channel has been closed and released. */
  closed: Promise<void>;
  stats: () => RequestChannelStats;
}>;

function errnoCode(error: unknown): string | null {
  if (!error || typeof error !== "object" || !("code" in error)) return null;
  const code = error.code;
  return typeof code === "string" ? code : null;
}

function bindFailed(path: string, cause: unknown): BarlineError {
  return new BarlineError(
    "BARLINE_CHANNEL_BIND",
    `cannot listen on ${path}: ${describeThrown(cause)}`,
    { cause },
  );
}

function listen(server: net.Server, path: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = (): void => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(path);
  });
}

/** True when something accepts connections on `path`. */
export function probeSocket(path: string): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const probe = net.connect(path);
    probe.once("connect", () => {
      probe.destroy();
      resolve(true);
    });
    probe.once("error", (err: Error) => {
      probe.destroy();
      const code = errnoCode(err);
      resolve(code !== "ECONNREFUSED" && code !== "ENOENT");
    });
  });
}

function isSocketFile(path: string): boolean {
  try {
    return lstatSync(path).isSocket();
  } catch {
    return false;
  }
}

export async function openRequestChannel(opts: RequestChannelOptions): Promise<RequestChannel> {
  const log = makeLogSink(opts.log);
  const path = opts.path;
  const sockets = new Set<net.Socket>();
  let closed = false;
  let released = false;
  let closing: Promise<void> | null = null;
  let pending: Promise<void> = Promise.resolve();
  let accepted = 0;
  let dispatched = 0;
  let dropped = 0;

  let resolveClosed: () => void = () => {};
  const closedPromise = new Promise<void>((resolve) => {
    resolveClosed = resolve;
  });

  const server = net.createServer();

  try {
    await listen(server, path);
  } catch (e: unknown) {
    if (errnoCode(e) !== "EADDRINUSE" || !isSocketFile(path) || (await probeSocket(path))) {
      throw bindFailed(path, e);
    }
    log({ level: "warn", message: "removing stale socket", fields: { path } });
    rmSync(path, { force: true });
    try {
      await listen(server, path);
    } catch (retryErr: unknown) {
      throw bindFailed(path, retryErr);
    }
  }

  function releaseSync(): void {
    if (released) return;
    released = true;
    try {
      rmSync(path, { force: true });
    } catch (e: unknown) {
      log({
        level: "warn",
        message: "cannot remove socket",
        fields: { path, error: describeThrown(e) },
      });
    }
  }

  function close(): Promise<void> {
    if (closing !== null) return closing;
    closed = true;
    closing = new Promise<void>((resolve) => {
      for (const socket of sockets) socket.destroy();
      sockets.clear();
      server.close(() => {
        resolve();
      });
    }).then(() => {
      releaseSync();
      log({ level: "debug", message: "channel closed", fields: { path } });
      resolveClosed();
    });
    return closing;
  }

  async function dispatch(id: number, socket: net.Socket): Promise<void> {
    if (closed) {
      dropped++;
      socket.destroy();
      return;
    }
    let verdict: RequestVerdict = "continue";
    try {
      verdict = await opts.onRequest(id);
      dispatched++;
    } catch (e: unknown) {
      socket.destroy();
      opts.onError(e);
      return;
    }
    socket.destroy();
    if (verdict === "stop") await close();
  }

  server.on("connection", (socket: net.Socket) => {
    if (closed) {
      socket.destroy();
      return;
    }
    accepted++;
    sockets.add(socket);
    socket.once("close", () => {
      sockets.delete(socket);
    });
    socket.on("error", (err: Error) => {
      log({ level: "debug", message: "connection error", fields: { error: describeThrown(err) } });
    });

    let received = new Uint8Array(0);
    let queued = false;

    socket.on("data", (chunk: Buffer) => {
      if (queued) return;
      const next = new Uint8Array(received.length + chunk.length);
      next.set(received, 0);
      next.set(chunk, received.length);
      received = next;
      const id = decodeRequest(received);
      if (id === null) return;
      queued = true;
      socket.pause();
      pending = pending.then(() => dispatch(id, socket));
    });

    socket.once("end", () => {
      if (queued) return;
      dropped++;
      log({
        level: "warn",
        message: "short request dropped",
        fields: { received: received.length, needed: REQUEST_BYTES },
      });
      socket.destroy();
    });
  });

  server.on("error", (err: Error) => {
    log({ level: "error", message: "channel error", fields: { error: describeThrown(err) } });
  });

  log({ level: "info", message: "listening", fields: { path } });

  return Object.freeze({
    path,
    close,
    releaseSync,
    isClosed: () => closed,
    closed: closedPromise,
    stats: () => Object.freeze({ accepted, dispatched, dropped }),
  });
}

/**
 * Daemon lifecycle.
 *
 * Startup order: bind the request channel, install signal handling, open the
 * publish sink, run every external and toggle action once, render. Requests
 * that arrive before the initial render are held, then handled in order.
 *
 * Every shutdown path (request 0, SIGINT/SIGTERM/SIGHUP, a fatal error)
 * closes the channel and unlinks its socket exactly once. A `process.on
 * ("exit")` hook covers exits that bypass the normal path.
 */

import {
  type ActionTableDefinition,
  BarlineError,
  type CommandRunner,
  type DetachedRunner,
  type Dispatcher,
  type FieldStore,
  type PublishSink,
  type StatusRenderer,
  createActionRegistry,
  createDispatcher,
  createFieldStore,
  createRenderer,
  createRunState,
  describeThrown,
} from "@barline/core";
import { type RequestChannel, openRequestChannel } from "../channel/requestChannel.js";
import type { DaemonConfig } from "../config/daemonConfig.js";
import { createCaptureRunner, createDetachedRunner } from "../exec/shellRunner.js";
import { type Logger, createLogger } from "../log/logger.js";
import { openPublishSink } from "../sinks/index.js";
import { createDefaultActionTable } from "./defaultTable.js";

export type DaemonState = "created" | "starting" | "running" | "stopping" | "stopped";

export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = Object.freeze([
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
]);

export type ProcessHooks = Readonly<{
  onSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  offSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  onExit: (handler: () => void) => void;
  offExit: (handler: () => void) => void;
}>;

export const nodeProcessHooks: ProcessHooks = Object.freeze({
  onSignal: (signal: NodeJS.Signals, handler: () => void) => {
    process.on(signal, handler);
  },
  offSignal: (signal: NodeJS.Signals, handler: () => void) => {
    process.off(signal, handler);
  },
  onExit: (handler: () => void) => {
    process.on("exit", handler);
  },
  offExit: (handler: () => void) => {
    process.off("exit", handler);
  },
});

export type StatusDaemonOptions = Readonly<{
  config: DaemonConfig;
  table?: ActionTableDefinition;
  runner?: CommandRunner;
  detached?: DetachedRunner;
  /** Opened from `config.sink` when omitted. */
  sink?: PublishSink;
  logger?: Logger;
  processHooks?: ProcessHooks;
}>;

export type StatusDaemon = Readonly<{
  start: () => Promise<void>;
  /** start(), then resolve with the exit code once the daemon has stopped. */
  run: () => Promise<number>;
  stop: (reason?: string) => Promise<number>;
  state: () => DaemonState;
  /** Resolves with the exit code after shutdown completes. */
  done: Promise<number>;
  fields: FieldStore;
  renderer: StatusRenderer;
  dispatcher: Dispatcher;
  /** Fatal error that ended the daemon, if any. */
  failure: () => unknown;
}>;

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;

export function createStatusDaemon(opts: StatusDaemonOptions): StatusDaemon {
  const config = opts.config;
  const logger =
    opts.logger ??
    createLogger({ scope: "daemon", level: config.logLevel, format: config.logFormat });
  const hooks = opts.processHooks ?? nodeProcessHooks;
  const log = logger.log;

  const registry = createActionRegistry(opts.table ?? createDefaultActionTable());
  const fields = createFieldStore(registry.fields);
  const runState = createRunState();
  const runner = opts.runner ?? createCaptureRunner({ shell: config.shell });
  const detached =
    opts.detached ??
    createDetachedRunner({
      shell: config.shell,
      onError: (err) => {
        fatal(err);
      },
    });

  let sink: PublishSink | null = opts.sink ?? null;
  const renderer = createRenderer({
    fields,
    sink: {
      publish(line: string): void | Promise<void> {
        return sink?.publish(line);
      },
    },
    log: logger.child("render").log,
  });
  const dispatcher = createDispatcher({
    registry,
    fields,
    runner,
    detached,
    runState,
    renderer,
    log: logger.child("dispatch").log,
  });

  let state: DaemonState = "created";
  let channel: RequestChannel | null = null;
  let stopping: Promise<number> | null = null;
  let failure: unknown = undefined;

  // Requests that arrive while startup commands run wait here.
  let resolveInitialized: () => void = () => {};
  const initialized = new Promise<void>((resolve) => {
    resolveInitialized = resolve;
  });

  let resolveDone: (code: number) => void = () => {};
  const done = new Promise<number>((resolve) => {
    resolveDone = resolve;
  });

  const signalHandlers = new Map<NodeJS.Signals, () => void>();
  const onExit = (): void => {
    channel?.releaseSync();
  };

  function installProcessHooks(): void {
    for (const signal of TERMINATION_SIGNALS) {
      const handler = (): void => {
        void shutdown(EXIT_OK, signal);
      };
      signalHandlers.set(signal, handler);
      hooks.onSignal(signal, handler);
    }
    hooks.onExit(onExit);
  }

  function removeProcessHooks(): void {
    for (const [signal, handler] of signalHandlers) hooks.offSignal(signal, handler);
    signalHandlers.clear();
    hooks.offExit(onExit);
  }

  function shutdown(code: number, reason: string): Promise<number> {
    if (stopping !== null) return stopping;
    state = "stopping";
    runState.running = false;
    resolveInitialized();
    log({ level: "info", message: "shutting down", fields: { reason, code } });
    stopping = (async () => {
      try {
        await channel?.close();
      } finally {
        channel?.releaseSync();
        removeProcessHooks();
        state = "stopped";
        resolveDone(code);
      }
      return code;
    })();
    return stopping;
  }

  function fatal(error: unknown): void {
    if (failure === undefined) failure = error;
    log({ level: "error", message: "fatal", fields: { error: describeThrown(error) } });
    void shutdown(EXIT_FATAL, "fatal error");
  }

  async function start(): Promise<void> {
    if (state !== "created") {
      throw new BarlineError("BARLINE_INVALID_STATE", `start: daemon is ${state}`);
    }
    state = "starting";

    try {
      channel = await openRequestChannel({
        path: config.socketPath,
        log: logger.child("channel").log,
        onRequest: async (id) => {
          await initialized;
          if (stopping !== null) return "stop";
          const outcome = await dispatcher.handle(id);
          if (outcome.kind !== "terminated") return "continue";
          await shutdown(EXIT_OK, `request ${String(id)}`);
          return "stop";
        },
        onError: fatal,
      });
    } catch (e: unknown) {
      state = "stopped";
      failure = e;
      resolveDone(EXIT_FATAL);
      throw e;
    }

    installProcessHooks();

    try {
      if (sink === null) sink = openPublishSink(config.sink);
      await dispatcher.initialize();
    } catch (e: unknown) {
      failure = e;
      await shutdown(EXIT_FATAL, "startup failed");
      throw e;
    } finally {
      resolveInitialized();
    }

    if (state === "starting") state = "running";
    log({
      level: "info",
      message: "started",
      fields: { socket: config.socketPath, requests: registry.requestCount },
    });
  }

  return Object.freeze({
    start,
    async run(): Promise<number> {
      await start();
      return done;
    },
    stop(reason = "stop requested"): Promise<number> {
      return shutdown(EXIT_OK, reason);
    },
    state: () => state,
    done,
    fields,
    renderer,
    dispatcher,
    failure: () => failure,
  });
}

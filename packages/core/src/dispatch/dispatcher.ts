/**
 * Request dispatch: wire ID -> registered action -> exactly one render.
 *
 * Rules:
 * - An ID outside the request table is logged and dropped: no field write,
 *   no render.
 * - A valid ID always renders once after its action, even when nothing
 *   visible changed.
 * - Only one dispatch runs at a time; overlapping calls are a caller bug.
 */

import { type ActionContext, type RunState, executeAction } from "../actions/execute.js";
import type { ActionRegistry } from "../actions/registry.js";
import type { Action, CommandRunner, DetachedRunner } from "../actions/types.js";
import { BarlineError } from "../errors.js";
import type { FieldStore } from "../fields/fieldStore.js";
import { type LogSink, makeLogSink } from "../log.js";
import type { StatusRenderer } from "../render/statusLine.js";

export type DispatchOutcome =
  | Readonly<{ kind: "rejected"; id: number }>
  | Readonly<{ kind: "handled"; id: number; action: Action }>
  | Readonly<{ kind: "terminated"; id: number; action: Action }>;

export type Dispatcher = Readonly<{
  handle: (id: number) => Promise<DispatchOutcome>;
  /** Run every external and toggle action once, then render. */
  initialize: () => Promise<void>;
  isRunning: () => boolean;
}>;

export type DispatcherOptions = Readonly<{
  registry: ActionRegistry;
  fields: FieldStore;
  runner: CommandRunner;
  detached: DetachedRunner;
  runState: RunState;
  renderer: StatusRenderer;
  log?: LogSink;
}>;

export function createDispatcher(opts: DispatcherOptions): Dispatcher {
  const log = makeLogSink(opts.log);
  const { registry, renderer, runState } = opts;
  const ctx: ActionContext = Object.freeze({
    fields: opts.fields,
    runner: opts.runner,
    detached: opts.detached,
    runState,
  });
  let busy: string | null = null;

  async function exclusive<T>(what: string, run: () => Promise<T>): Promise<T> {
    if (busy !== null) {
      throw new BarlineError("BARLINE_REENTRANT_DISPATCH", `${what}: ${busy} still in flight`);
    }
    busy = what;
    try {
      return await run();
    } finally {
      busy = null;
    }
  }

  return Object.freeze({
    handle(id: number): Promise<DispatchOutcome> {
      return exclusive<DispatchOutcome>(`handle(${String(id)})`, async () => {
        const action = registry.resolve(id);
        if (action === null) {
          log({
            level: "warn",
            message: "request id out of bounds",
            fields: { id, size: registry.requestCount },
          });
          return Object.freeze({ kind: "rejected", id });
        }

        log({ level: "debug", message: "dispatch", fields: { id, action: action.name } });
        await executeAction(action, ctx);
        await renderer.render();

        if (!runState.running) {
          log({ level: "info", message: "terminate requested", fields: { id } });
          return Object.freeze({ kind: "terminated", id, action });
        }
        return Object.freeze({ kind: "handled", id, action });
      });
    },

    initialize(): Promise<void> {
      return exclusive("initialize", async () => {
        for (const action of registry.initialActions()) {
          await executeAction(action, ctx);
        }
        await renderer.render();
      });
    },

    isRunning(): boolean {
      return runState.running;
    },
  });
}

import { type FieldStore, MAX_FIELD_LEN } from "../fields/fieldStore.js";
import type { Action, CommandRunner, DetachedRunner } from "./types.js";

/** Process-wide running flag; only a terminate action clears it. */
export type RunState = { running: boolean };

export type ActionContext = Readonly<{
  fields: FieldStore;
  runner: CommandRunner;
  detached: DetachedRunner;
  runState: RunState;
}>;

export function createRunState(): RunState {
  return { running: true };
}

/**
 * Execute one action to completion. External actions wait for their command;
 * toggle side effects are launched detached.
 */
export async function executeAction(action: Action, ctx: ActionContext): Promise<void> {
  switch (action.kind) {
    case "external": {
      const output = await ctx.runner.capture(action.command, MAX_FIELD_LEN);
      if (action.target !== null) ctx.fields.write(action.target, output);
      return;
    }
    case "toggle": {
      const target = action.target;
      action.procedure.run(
        Object.freeze({
          field: target,
          writeText: (text: string) => {
            ctx.fields.writeText(target, text);
          },
        }),
        ctx.detached,
      );
      return;
    }
    case "composite": {
      if (action.terminate) {
        ctx.runState.running = false;
        return;
      }
      for (const step of action.steps) {
        await executeAction(step, ctx);
      }
      return;
    }
  }
}

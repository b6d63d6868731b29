import { BarlineError } from "../errors.js";
import type { DetachedRunner, FieldWriter, ToggleProcedure } from "./types.js";

export type ToggleState = Readonly<{
  /** Short label written to the target field. */
  label: string;
  /** Command launched (detached) when switching to this state. */
  command: string;
}>;

export type TwoStateToggleOptions = Readonly<{
  states: readonly [ToggleState, ToggleState];
  /**
   * Index before the first run. Each run flips first, so the default of 1
   * makes the first run select `states[0]`.
   */
  initialIndex?: 0 | 1;
}>;

/**
 * Two-state toggle: every run flips the private index, launches the new
 * state's command and writes its label. Running twice restores the label.
 */
export function createTwoStateToggle(opts: TwoStateToggleOptions): ToggleProcedure {
  const states = Object.freeze([opts.states[0], opts.states[1]] as const);
  for (const state of states) {
    if (state.label.length === 0) {
      throw new BarlineError("BARLINE_INVALID_CONFIG", "toggle state label must not be empty");
    }
  }
  let index: 0 | 1 = opts.initialIndex ?? 1;

  return Object.freeze({
    run(target: FieldWriter, detached: DetachedRunner): void {
      index = index === 0 ? 1 : 0;
      const state = states[index];
      if (state.command.length > 0) detached.launch(state.command);
      target.writeText(state.label);
    },
    current(): 0 | 1 {
      return index;
    },
  });
}

import type { FieldId } from "../fields/fieldStore.js";

// =============================================================================
// Execution capabilities
// =============================================================================

/**
 * Blocking "run a shell command, capture its first line" primitive.
 *
 * Resolves with at most `maxBytes` bytes of standard output, stopping after
 * the first newline (which is included when seen). A non-zero exit status is
 * not an error. Rejects with BARLINE_SPAWN_FAILED only when the process
 * cannot be created.
 */
export interface CommandRunner {
  capture(command: string, maxBytes: number): Promise<Uint8Array>;
}

/**
 * Fire-and-forget execution. The caller never waits on the process and its
 * output is discarded.
 */
export interface DetachedRunner {
  launch(command: string): void;
}

/** Write access to exactly one field, handed to toggle procedures. */
export type FieldWriter = Readonly<{
  field: FieldId;
  writeText: (text: string) => void;
}>;

/**
 * A built-in stateful procedure backing a toggle action.
 * `run` must write the target field synchronously.
 */
export type ToggleProcedure = Readonly<{
  run: (target: FieldWriter, detached: DetachedRunner) => void;
  /** Index of the state the last run switched to. */
  current: () => 0 | 1;
}>;

// =============================================================================
// Actions
// =============================================================================

export type ExternalAction = Readonly<{
  kind: "external";
  name: string;
  command: string;
  target: FieldId | null;
}>;

export type ToggleAction = Readonly<{
  kind: "toggle";
  name: string;
  target: FieldId;
  procedure: ToggleProcedure;
}>;

export type CompositeAction = Readonly<{
  kind: "composite";
  name: string;
  steps: readonly Action[];
  /** Clears the run state instead of running steps (always has zero steps). */
  terminate: boolean;
}>;

export type Action = ExternalAction | ToggleAction | CompositeAction;

export type ActionKind = Action["kind"];

// =============================================================================
// Registry definitions
// =============================================================================

export type ExternalActionDef = Readonly<{
  kind: "external";
  name: string;
  command: string;
  /** Field name; omit for a command run only for its effect. */
  target?: string;
}>;

export type ToggleActionDef = Readonly<{
  kind: "toggle";
  name: string;
  target: string;
  procedure: ToggleProcedure;
}>;

export type CompositeActionDef = Readonly<{
  kind: "composite";
  name: string;
  /** Names of actions declared earlier in the table. */
  steps?: readonly string[];
  terminate?: boolean;
}>;

export type ActionDef = ExternalActionDef | ToggleActionDef | CompositeActionDef;

export type ActionTableDefinition = Readonly<{
  fields: readonly string[];
  actions: readonly ActionDef[];
  /** Action names in wire-ID order; entry 0 must be a terminate composite. */
  requests: readonly string[];
}>;

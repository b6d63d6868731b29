/**
 * Immutable action table, built once before the request channel opens.
 *
 * Composite steps may only name actions declared earlier in the table, so the
 * registry is acyclic by construction.
 */

import { BarlineError } from "../errors.js";
import type { FieldId } from "../fields/fieldStore.js";
import type {
  Action,
  ActionDef,
  ActionTableDefinition,
  CompositeAction,
  ExternalAction,
  ToggleAction,
} from "./types.js";

export type ActionRegistry = Readonly<{
  fields: readonly string[];
  actions: readonly Action[];
  /** Wire ID -> action. */
  requests: readonly Action[];
  requestCount: number;
  resolve: (id: number) => Action | null;
  lookup: (name: string) => Action | null;
  /** Every external and toggle action in declaration order. */
  initialActions: () => readonly (ExternalAction | ToggleAction)[];
}>;

function invalidConfig(detail: string): never {
  throw new BarlineError("BARLINE_INVALID_CONFIG", detail);
}

function resolveTarget(fields: ReadonlyMap<string, FieldId>, def: ActionDef, name: string): FieldId {
  const id = fields.get(name);
  if (id === undefined) invalidConfig(`action "${def.name}" targets unknown field "${name}"`);
  return id;
}

function buildAction(
  def: ActionDef,
  fields: ReadonlyMap<string, FieldId>,
  declared: ReadonlyMap<string, Action>,
): Action {
  switch (def.kind) {
    case "external": {
      if (def.command.trim().length === 0) invalidConfig(`action "${def.name}" has an empty command`);
      return Object.freeze({
        kind: "external",
        name: def.name,
        command: def.command,
        target: def.target === undefined ? null : resolveTarget(fields, def, def.target),
      });
    }
    case "toggle": {
      return Object.freeze({
        kind: "toggle",
        name: def.name,
        target: resolveTarget(fields, def, def.target),
        procedure: def.procedure,
      });
    }
    case "composite": {
      const stepNames = def.steps ?? [];
      const terminate = def.terminate === true;
      if (terminate && stepNames.length > 0) {
        invalidConfig(`terminate action "${def.name}" must not have steps`);
      }
      const steps = stepNames.map((stepName) => {
        const step = declared.get(stepName);
        if (step === undefined) {
          invalidConfig(
            `composite "${def.name}" references "${stepName}", which is not declared before it`,
          );
        }
        return step;
      });
      const composite: CompositeAction = {
        kind: "composite",
        name: def.name,
        steps: Object.freeze(steps),
        terminate,
      };
      return Object.freeze(composite);
    }
  }
}

export function createActionRegistry(def: ActionTableDefinition): ActionRegistry {
  const fields = new Map<string, FieldId>();
  def.fields.forEach((name, i) => {
    if (fields.has(name)) invalidConfig(`duplicate field name "${name}"`);
    fields.set(name, i);
  });

  const declared = new Map<string, Action>();
  const actions: Action[] = [];
  for (const actionDef of def.actions) {
    if (actionDef.name.length === 0) invalidConfig("action name must not be empty");
    if (declared.has(actionDef.name)) invalidConfig(`duplicate action name "${actionDef.name}"`);
    const action = buildAction(actionDef, fields, declared);
    declared.set(action.name, action);
    actions.push(action);
  }

  if (def.requests.length === 0) invalidConfig("request table must not be empty");
  const requests = def.requests.map((name, id) => {
    const action = declared.get(name);
    if (action === undefined) invalidConfig(`request ${String(id)} names unknown action "${name}"`);
    return action;
  });
  const first = requests[0];
  if (first === undefined || first.kind !== "composite" || !first.terminate) {
    invalidConfig("request 0 must be a terminate action");
  }

  const initial = Object.freeze(
    actions.filter(
      (a): a is ExternalAction | ToggleAction => a.kind === "external" || a.kind === "toggle",
    ),
  );
  const frozenRequests = Object.freeze(requests);

  return Object.freeze({
    fields: Object.freeze([...def.fields]),
    actions: Object.freeze(actions),
    requests: frozenRequests,
    requestCount: frozenRequests.length,
    resolve(id: number): Action | null {
      if (!Number.isInteger(id) || id < 0) return null;
      return frozenRequests[id] ?? null;
    },
    lookup(name: string): Action | null {
      return declared.get(name) ?? null;
    },
    initialActions(): readonly (ExternalAction | ToggleAction)[] {
      return initial;
    },
  });
}

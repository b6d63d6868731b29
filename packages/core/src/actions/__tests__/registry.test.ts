import { assert, describe, test } from "@barline/testkit";
import { isBarlineError } from "../../errors.js";
import { createActionRegistry } from "../registry.js";
import { createTwoStateToggle } from "../toggle.js";
import type { ActionDef, ActionTableDefinition } from "../types.js";

const FIELDS = ["time", "volume", "lang"] as const;

function table(overrides: Partial<ActionTableDefinition> = {}): ActionTableDefinition {
  const actions: ActionDef[] = [
    { kind: "composite", name: "quit", terminate: true },
    { kind: "external", name: "time", command: "date +%H:%M:%S", target: "time" },
    { kind: "external", name: "volume", command: "vol", target: "volume" },
    {
      kind: "toggle",
      name: "lang",
      target: "lang",
      procedure: createTwoStateToggle({
        states: [
          { label: "US", command: "us" },
          { label: "RO", command: "ro" },
        ],
      }),
    },
    { kind: "composite", name: "refresh", steps: ["time", "volume"] },
  ];
  return {
    fields: FIELDS,
    actions,
    requests: ["quit", "volume", "lang", "refresh"],
    ...overrides,
  };
}

function invalid(e: unknown): boolean {
  return isBarlineError(e, "BARLINE_INVALID_CONFIG");
}

describe("action registry", () => {
  test("maps request ids to actions in table order", () => {
    const registry = createActionRegistry(table());
    assert.equal(registry.requestCount, 4);
    assert.deepEqual(
      registry.requests.map((a) => a.name),
      ["quit", "volume", "lang", "refresh"],
    );
    assert.equal(registry.resolve(2)?.name, "lang");
  });

  test("resolve returns null outside the request table", () => {
    const registry = createActionRegistry(table());
    assert.equal(registry.resolve(4), null);
    assert.equal(registry.resolve(-1), null);
    assert.equal(registry.resolve(1.5), null);
  });

  test("binds targets to field ordinals", () => {
    const registry = createActionRegistry(table());
    const volume = registry.lookup("volume");
    assert.ok(volume !== null && volume.kind === "external");
    assert.equal(volume.target, 1);
    const lang = registry.lookup("lang");
    assert.ok(lang !== null && lang.kind === "toggle");
    assert.equal(lang.target, 2);
  });

  test("external actions without a target have a null target", () => {
    const registry = createActionRegistry(
      table({
        actions: [
          { kind: "composite", name: "quit", terminate: true },
          { kind: "external", name: "beep", command: "true" },
        ],
        requests: ["quit", "beep"],
      }),
    );
    const beep = registry.lookup("beep");
    assert.ok(beep !== null && beep.kind === "external");
    assert.equal(beep.target, null);
  });

  test("composite steps share the registered action objects", () => {
    const registry = createActionRegistry(table());
    const refresh = registry.lookup("refresh");
    assert.ok(refresh !== null && refresh.kind === "composite");
    assert.equal(refresh.steps[0], registry.lookup("time"));
    assert.equal(refresh.steps[1], registry.lookup("volume"));
    assert.equal(refresh.terminate, false);
  });

  test("initial actions are every external and toggle in declaration order", () => {
    const registry = createActionRegistry(table());
    assert.deepEqual(
      registry.initialActions().map((a) => a.name),
      ["time", "volume", "lang"],
    );
  });

  test("the registry is frozen", () => {
    const registry = createActionRegistry(table());
    assert.equal(Object.isFrozen(registry), true);
    assert.equal(Object.isFrozen(registry.requests), true);
    assert.equal(Object.isFrozen(registry.actions), true);
  });

  test("composite steps must be declared earlier", () => {
    assert.throws(
      () =>
        createActionRegistry(
          table({
            actions: [
              { kind: "composite", name: "quit", terminate: true },
              { kind: "composite", name: "loop", steps: ["loop"] },
            ],
            requests: ["quit"],
          }),
        ),
      invalid,
    );
    assert.throws(
      () =>
        createActionRegistry(
          table({
            actions: [
              { kind: "composite", name: "quit", terminate: true },
              { kind: "composite", name: "early", steps: ["late"] },
              { kind: "external", name: "late", command: "date" },
            ],
            requests: ["quit"],
          }),
        ),
      invalid,
    );
  });

  test("request 0 must be a terminate composite", () => {
    assert.throws(() => createActionRegistry(table({ requests: ["volume", "quit"] })), invalid);
    assert.throws(() => createActionRegistry(table({ requests: ["refresh"] })), invalid);
  });

  test("terminate composites cannot have steps", () => {
    assert.throws(
      () =>
        createActionRegistry(
          table({
            actions: [
              { kind: "external", name: "time", command: "date" },
              { kind: "composite", name: "quit", terminate: true, steps: ["time"] },
            ],
            requests: ["quit"],
          }),
        ),
      invalid,
    );
  });

  test("rejects unknown fields, unknown requests and duplicate names", () => {
    assert.throws(
      () =>
        createActionRegistry(
          table({
            actions: [
              { kind: "composite", name: "quit", terminate: true },
              { kind: "external", name: "bat", command: "acpi", target: "battery" },
            ],
            requests: ["quit"],
          }),
        ),
      invalid,
    );
    assert.throws(() => createActionRegistry(table({ requests: ["quit", "nope"] })), invalid);
    assert.throws(
      () =>
        createActionRegistry(
          table({
            actions: [
              { kind: "composite", name: "quit", terminate: true },
              { kind: "composite", name: "quit", terminate: true },
            ],
            requests: ["quit"],
          }),
        ),
      invalid,
    );
    assert.throws(() => createActionRegistry(table({ requests: [] })), invalid);
  });

  test("rejects external actions with a blank command", () => {
    assert.throws(
      () =>
        createActionRegistry(
          table({
            actions: [
              { kind: "composite", name: "quit", terminate: true },
              { kind: "external", name: "blank", command: "  " },
            ],
            requests: ["quit"],
          }),
        ),
      invalid,
    );
  });
});

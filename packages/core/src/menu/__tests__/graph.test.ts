import { assert, describe, test } from "@commwheel/testkit";
import { isCommwheelError } from "../../errors.js";
import { DEFAULT_MENU } from "../defaults.js";
import { buildMenuGraph, parseMenuDefinition } from "../graph.js";

describe("buildMenuGraph", () => {
  test("builds the default menu with one node per submenu", () => {
    const graph = buildMenuGraph(DEFAULT_MENU);
    assert.equal(graph.root.name, "Main");
    assert.equal(graph.root.action, null);
    assert.deepEqual(graph.root.options, [
      "Rocket League",
      "Animations",
      "Combat",
      "Tactics",
      "Social",
      "Strategy",
    ]);
    assert.equal(graph.submenus.size, 6);
    assert.deepEqual(graph.submenu("Tactics")?.action, { kind: "voice-wheel", wheelIndex: 2 });
    assert.deepEqual(graph.submenu("Animations")?.options, ["Truck"]);
    assert.deepEqual(graph.submenu("Rocket League")?.action, { kind: "free-text" });
    assert.equal(graph.submenu("Nope"), undefined);
  });

  test("rejects duplicate main options", () => {
    assert.throws(
      () => buildMenuGraph({ options: ["A", "A"], submenus: {} }),
      (err: unknown) =>
        isCommwheelError(err, "INVALID_PROPS") && err.message === 'duplicate main menu option "A"',
    );
  });

  test("rejects submenus the main menu does not list", () => {
    assert.throws(
      () => buildMenuGraph({ options: ["A"], submenus: { B: { action: "free-text", options: [] } } }),
      (err: unknown) => isCommwheelError(err, "INVALID_PROPS"),
    );
  });

  test("rejects wheel indices that are not digits", () => {
    assert.throws(
      () =>
        buildMenuGraph({
          options: ["A"],
          submenus: { A: { action: "voice-wheel", wheelIndex: 12, options: ["x"] } },
        }),
      (err: unknown) => isCommwheelError(err, "INVALID_PROPS"),
    );
  });

  test("main options without a submenu are allowed", () => {
    const graph = buildMenuGraph({ options: ["Later"], submenus: {} });
    assert.equal(graph.submenu("Later"), undefined);
  });
});

describe("parseMenuDefinition", () => {
  test("decodes a menu file", () => {
    const result = parseMenuDefinition({
      options: ["Chat", "Wheel"],
      submenus: {
        Chat: { action: "free-text", options: ["gg"] },
        Wheel: { action: "voice-wheel", wheelIndex: 5, options: ["a", "b"] },
      },
    });
    assert.deepEqual(result, {
      ok: true,
      value: {
        options: ["Chat", "Wheel"],
        submenus: {
          Chat: { action: "free-text", options: ["gg"] },
          Wheel: { action: "voice-wheel", wheelIndex: 5, options: ["a", "b"] },
        },
      },
    });
  });

  test("submenus may be omitted", () => {
    assert.deepEqual(parseMenuDefinition({ options: [] }), {
      ok: true,
      value: { options: [], submenus: {} },
    });
  });

  test("reports the first structural problem", () => {
    const codeOf = (raw: unknown) => {
      const result = parseMenuDefinition(raw);
      return result.ok ? null : result.error.code;
    };
    assert.equal(codeOf(null), "NOT_AN_OBJECT");
    assert.equal(codeOf({ options: "A" }), "INVALID_OPTIONS");
    assert.equal(codeOf({ options: [], submenus: [] }), "INVALID_SUBMENU");
    assert.equal(codeOf({ options: ["A"], submenus: { A: { action: "free-text" } } }), "INVALID_OPTIONS");
    assert.equal(codeOf({ options: ["A"], submenus: { A: { action: "dance", options: [] } } }), "INVALID_SUBMENU");
    assert.equal(
      codeOf({ options: ["A"], submenus: { A: { action: "voice-wheel", options: [] } } }),
      "INVALID_SUBMENU",
    );
  });
});

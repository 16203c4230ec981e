import { assert, describe, test } from "@commwheel/testkit";
import { NO_MODS, hotkeyToString, hotkeysEqual, parseHotkey } from "../parser.js";

function errorCode(input: string): string | null {
  const result = parseHotkey(input);
  return result.ok ? null : result.error.code;
}

describe("parseHotkey", () => {
  test("parses a bare key", () => {
    assert.deepEqual(parseHotkey("."), { ok: true, value: { key: ".", mods: NO_MODS } });
  });

  test("parses modifiers case-insensitively", () => {
    const result = parseHotkey("Ctrl+Alt+O");
    assert.deepEqual(result, {
      ok: true,
      value: { key: "o", mods: { shift: false, ctrl: true, alt: true, meta: false } },
    });
  });

  test("resolves key and modifier aliases", () => {
    const esc = parseHotkey("esc");
    assert.equal(esc.ok && esc.value.key, "escape");
    const period = parseHotkey("cmd+period");
    assert.equal(period.ok && hotkeyToString(period.value), "meta+.");
  });

  test("accepts the plus key alone and after modifiers", () => {
    const plus = parseHotkey("+");
    assert.equal(plus.ok && plus.value.key, "+");
    const ctrlPlus = parseHotkey("ctrl++");
    assert.equal(ctrlPlus.ok && hotkeyToString(ctrlPlus.value), "ctrl++");
  });

  test("accepts named keys", () => {
    for (const name of ["f1", "f12", "pageup", "space", "enter"]) {
      assert.equal(parseHotkey(name).ok, true, name);
    }
  });

  test("reports malformed input", () => {
    assert.equal(errorCode("  "), "EMPTY_KEY");
    assert.equal(errorCode("ctrl x"), "INVALID_KEY");
    assert.equal(errorCode("ctrl+"), "INVALID_KEY");
    assert.equal(errorCode("shift"), "INVALID_KEY");
    assert.equal(errorCode("f13"), "INVALID_KEY");
    assert.equal(errorCode("hyper+a"), "INVALID_MODIFIER");
    assert.equal(errorCode("ctrl+control+a"), "INVALID_MODIFIER");
  });
});

describe("hotkeyToString", () => {
  test("orders modifiers ctrl, alt, shift, meta", () => {
    const result = parseHotkey("meta+shift+alt+ctrl+k");
    assert.equal(result.ok && hotkeyToString(result.value), "ctrl+alt+shift+meta+k");
  });
});

describe("hotkeysEqual", () => {
  test("compares the key and every modifier", () => {
    const a = { key: "1", mods: NO_MODS };
    assert.equal(hotkeysEqual(a, { key: "1", mods: { ...NO_MODS } }), true);
    assert.equal(hotkeysEqual(a, { key: "1", mods: { ...NO_MODS, alt: true } }), false);
    assert.equal(hotkeysEqual(a, { key: "2", mods: NO_MODS }), false);
  });
});

import { describe, expect, it } from "vitest";
import { LRUStore } from "../src/lib";
import {
  ScriptParseError,
  parseLine,
  parseScript,
  parseValue,
  tokenize,
} from "../src/lib/script/parser";
import { runScript } from "../src/lib/script/runner";

describe("tokenize", () => {
  it("splits on whitespace and keeps quoted strings whole", () => {
    expect(tokenize('set "two words" 2')).toEqual(['set', '"two words"', "2"]);
    expect(tokenize("  get   a ")).toEqual(["get", "a"]);
  });
});

describe("parseValue", () => {
  it("parses JSON tokens and keeps the rest as text", () => {
    expect(parseValue("42")).toBe(42);
    expect(parseValue('"42"')).toBe("42");
    expect(parseValue("true")).toBe(true);
    expect(parseValue("null")).toBeNull();
    expect(parseValue("[1,2]")).toEqual([1, 2]);
    expect(parseValue("apple")).toBe("apple");
  });
});

describe("parseLine", () => {
  it("skips blank lines and comments", () => {
    expect(parseLine("   ", 1)).toBeNull();
    expect(parseLine("# warm up", 2)).toBeNull();
  });

  it("builds operations with their line numbers", () => {
    expect(parseLine("set a 1", 3)).toEqual({
      line: 3,
      source: "set a 1",
      op: { kind: "set", key: "a", value: 1 },
    });
    expect(parseLine("DEL a", 4)?.op).toEqual({ kind: "delete", key: "a" });
    expect(parseLine("resize 2", 5)?.op).toEqual({ kind: "resize", capacity: 2 });
    expect(parseLine("mru", 6)?.op).toEqual({ kind: "mru" });
  });

  it("rejects unknown commands", () => {
    expect(() => parseLine("fetch a", 7)).toThrow('line 7: unknown command "fetch"');
  });

  it("rejects the wrong number of arguments", () => {
    expect(() => parseLine("set a", 8)).toThrow("line 8: set takes 2 arguments, got 1");
    expect(() => parseLine("get", 9)).toThrow("line 9: get takes 1 argument, got 0");
    expect(() => parseLine("lru now", 10)).toThrow("line 10: lru takes 0 arguments, got 1");
  });

  it("rejects array and object keys", () => {
    expect(() => parseLine("set [1,2] x", 12)).toThrow(
      "line 12: keys must be strings, numbers, booleans or null",
    );
    expect(() => parseLine('get {"a":1}', 13)).toThrow(
      "line 13: keys must be strings, numbers, booleans or null",
    );
    expect(parseLine("set k [1,2]", 14)?.op).toEqual({
      kind: "set",
      key: "k",
      value: [1, 2],
    });
  });

  it("requires a number for resize", () => {
    expect(() => parseLine("resize big", 11)).toThrow("line 11: resize expects a number");
  });
});

describe("parseScript", () => {
  it("numbers lines from the source text", () => {
    const parsed = parseScript("# demo\nset a 1\n\nget a\r\n");

    expect(parsed.map((entry) => entry.line)).toEqual([2, 4]);
    expect(parsed[1].op).toEqual({ kind: "get", key: "a" });
  });

  it("reports the first bad line", () => {
    try {
      parseScript("set a 1\nbogus\nalso bogus");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ScriptParseError);
      expect(error).toMatchObject({ line: 2 });
    }
  });
});

describe("runScript", () => {
  it("records values and store errors per step", () => {
    const store = new LRUStore<unknown, unknown>(2);
    const steps = runScript(
      store,
      parseScript(
        ["set a 1", "set b 2", "get a", "set c 3", "peek b", "lru", "mru", "items"].join("\n"),
      ),
    );

    expect(steps).toEqual([
      { line: 1, source: "set a 1", ok: true },
      { line: 2, source: "set b 2", ok: true },
      { line: 3, source: "get a", ok: true, value: 1 },
      { line: 4, source: "set c 3", ok: true },
      { line: 5, source: "peek b", ok: false, error: "KEY_NOT_FOUND" },
      { line: 6, source: "lru", ok: true, value: "a" },
      { line: 7, source: "mru", ok: true, value: "c" },
      {
        line: 8,
        source: "items",
        ok: true,
        value: [
          ["a", 1],
          ["c", 3],
        ],
      },
    ]);
  });

  it("keeps going after a failed step", () => {
    const store = new LRUStore<unknown, unknown>(3);
    const steps = runScript(
      store,
      parseScript("resize 0\nmru\nset x true\nhas x\npop x\nhas x\nclear\nkeys"),
    );

    expect(steps.map((step) => (step.ok ? step.value : step.error))).toEqual([
      "INVALID_CAPACITY",
      "EMPTY_STORE",
      undefined,
      true,
      true,
      false,
      undefined,
      [],
    ]);
    expect(store.capacity).toBe(3);
  });

  it("distinguishes numeric and string keys", () => {
    const store = new LRUStore<unknown, unknown>(4);
    runScript(store, parseScript('set 1 one\nset "1" string-one'));

    expect(store.keys().toArray()).toEqual([1, "1"]);
    expect(store.peek(1)).toBe("one");
  });
});

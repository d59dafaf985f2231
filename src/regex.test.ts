import { describe, expect, it, vi } from "vitest";
import { contains, find } from "./operations.js";
import { RegexSyntaxError } from "./parser/types.js";
import {
  escape,
  fromFlags,
  fromString,
  fromStringWith,
  never,
  Regex,
} from "./regex.js";
import { All } from "./types.js";

describe("Regex", () => {
  describe("compile()", () => {
    it("exposes source, flags and group count", () => {
      const regex = Regex.compile("(a)(?:b)(c)", { caseInsensitive: true });
      expect(regex.source).toBe("(a)(?:b)(c)");
      expect(regex.flags).toBe("i");
      expect(regex.groupCount).toBe(2);
    });

    it("formats like a regex literal", () => {
      const regex = Regex.compile("a+", {
        multiline: true,
        caseInsensitive: true,
      });
      expect(regex.toString()).toBe("/a+/im");
    });

    it("is frozen", () => {
      const regex = Regex.compile("a");
      expect(Object.isFrozen(regex)).toBe(true);
      expect(Object.isFrozen(regex.options)).toBe(true);
    });

    it("throws RegexSyntaxError on invalid patterns", () => {
      expect(() => Regex.compile("(a")).toThrow(RegexSyntaxError);
    });
  });

  describe("tryMatch()", () => {
    it("anchors at the given offset", () => {
      const regex = Regex.compile("b+");
      expect(regex.tryMatch("abbc", 0)).toBeUndefined();
      expect(regex.tryMatch("abbc", 1)).toEqual({
        start: 1,
        end: 3,
        groups: [],
      });
    });

    it("never matches outside the input", () => {
      const regex = Regex.compile("");
      expect(regex.tryMatch("abc", 3)).toEqual({
        start: 3,
        end: 3,
        groups: [],
      });
      expect(regex.tryMatch("abc", 4)).toBeUndefined();
      expect(regex.tryMatch("abc", -1)).toBeUndefined();
      expect(regex.tryMatch("abc", 0.5)).toBeUndefined();
    });

    it("can be reused across inputs", () => {
      const regex = Regex.compile("(\\d+)");
      expect(regex.tryMatch("12", 0)?.groups).toEqual([[0, 2]]);
      expect(regex.tryMatch("x345", 1)?.groups).toEqual([[1, 4]]);
      expect(regex.tryMatch("12", 0)?.groups).toEqual([[0, 2]]);
    });
  });
});

describe("fromStringWith", () => {
  it("compiles with the given options", () => {
    const result = fromStringWith({ caseInsensitive: true }, "abc");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.regex.flags).toBe("i");
      expect(contains(result.regex, "xABCx")).toBe(true);
    }
  });

  it("reports syntax errors as the diagnostic message", () => {
    expect(fromString("(a")).toEqual({
      ok: false,
      error: "Invalid regular expression: /(a/: unterminated group",
    });
  });

  it("applies program size limits", () => {
    expect(fromStringWith({ limits: { maxProgramSize: 10 } }, "a{20}")).toEqual(
      {
        ok: false,
        error: "Invalid regular expression: /a{20}/: pattern too large",
      },
    );
  });

  it("reports deeply nested patterns as an error value", () => {
    const depth = 20_000;
    const result = fromString("(".repeat(depth) + ")".repeat(depth));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.endsWith(": pattern too deeply nested")).toBe(true);
    }
    expect(
      fromStringWith({ limits: { maxNestingDepth: 1 } }, "((a))"),
    ).toEqual({
      ok: false,
      error: "Invalid regular expression: /((a))/: pattern too deeply nested",
    });
  });

  it("logs compiled programs at debug level", () => {
    const logger = { info: vi.fn(), debug: vi.fn() };
    fromStringWith({ logger }, "(a)b");
    expect(logger.debug).toHaveBeenCalledWith("compile", {
      pattern: "(a)b",
      flags: "",
      groups: 1,
      instructions: 5,
    });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("logs rejected patterns at info level", () => {
    const logger = { info: vi.fn(), debug: vi.fn() };
    fromStringWith({ logger }, "a{3,1}");
    expect(logger.info).toHaveBeenCalledWith("syntax error", {
      pattern: "a{3,1}",
      reason: "numbers out of order in {} quantifier",
      position: 1,
    });
    expect(logger.debug).not.toHaveBeenCalled();
  });
});

describe("fromFlags", () => {
  it("reads i, m and s", () => {
    const result = fromFlags("sim", "^a.b$");
    expect(result.ok && result.regex.flags).toBe("ims");
    if (result.ok) {
      expect(contains(result.regex, "x\nA\nB")).toBe(true);
    }
  });

  it("rejects unknown and repeated flags", () => {
    expect(fromFlags("gx", "a")).toEqual({
      ok: false,
      error: "Invalid flags: unknown flag 'g'",
    });
    expect(fromFlags("ii", "a")).toEqual({
      ok: false,
      error: "Invalid flags: duplicate flag 'i'",
    });
  });
});

describe("never", () => {
  it("matches nothing, not even empty input", () => {
    expect(contains(never, "")).toBe(false);
    expect(find(All, never, "abc")).toEqual([]);
  });
});

describe("escape", () => {
  it("escapes syntax characters", () => {
    expect(escape("a.b*c")).toBe("a\\.b\\*c");
    expect(escape("plain text")).toBe("plain text");
  });

  it("produces patterns that match the text literally", () => {
    const text = "(1+1)=[2]? {yes} $5 ^_^ a|b \\ /";
    const result = fromString(escape(text));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(find(All, result.regex, `x${text}x`).map((m) => m.text)).toEqual([
        text,
      ]);
    }
  });
});

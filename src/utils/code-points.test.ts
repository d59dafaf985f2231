import { describe, expect, it } from "vitest";
import {
  codePointWidth,
  isLineTerminator,
  nextCodePointOffset,
  readCodePoint,
} from "./code-points.js";

describe("readCodePoint", () => {
  it("joins surrogate pairs", () => {
    expect(readCodePoint("a😀", 1)).toBe(0x1f600);
  });

  it("reads the low half on its own when starting inside a pair", () => {
    expect(readCodePoint("😀", 1)).toBe(0xde00);
  });

  it("reads lone surrogates as themselves", () => {
    expect(readCodePoint("\ud800x", 0)).toBe(0xd800);
    expect(readCodePoint("\ud800", 0)).toBe(0xd800);
  });
});

describe("codePointWidth", () => {
  it("is two code units above the basic plane", () => {
    expect(codePointWidth(0x41)).toBe(1);
    expect(codePointWidth(0xffff)).toBe(1);
    expect(codePointWidth(0x10000)).toBe(2);
  });
});

describe("nextCodePointOffset", () => {
  it("steps over whole code points", () => {
    expect(nextCodePointOffset("😀b", 0)).toBe(2);
    expect(nextCodePointOffset("😀b", 2)).toBe(3);
  });

  it("steps off the end one unit at a time", () => {
    expect(nextCodePointOffset("ab", 2)).toBe(3);
    expect(nextCodePointOffset("", 0)).toBe(1);
  });
});

describe("isLineTerminator", () => {
  it.each([
    [0x0a, true],
    [0x0d, true],
    [0x2028, true],
    [0x2029, true],
    [0x20, false],
    [0x85, false],
  ])("%i -> %s", (codePoint, expected) => {
    expect(isLineTerminator(codePoint)).toBe(expected);
  });
});

/**
 * Property tests
 *
 * Generates small patterns from a grammar and checks the operations against
 * each other and against the host RegExp run with the u flag, whose syntax
 * and semantics the engine shares for this subset.
 */

import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { contains, find, replace, split } from "./operations.js";
import { fromFlags, fromString, type Regex } from "./regex.js";
import { All, atMost } from "./types.js";

const atom = fc.constantFrom(
  "a",
  "b",
  "A",
  ".",
  "[ab]",
  "[^a]",
  "[a-b1]",
  "\\w",
  "\\W",
  "\\s",
  "\\d",
  "_",
);

const quantifier = fc.constantFrom(
  "",
  "",
  "*",
  "+",
  "?",
  "{2}",
  "{0,1}",
  "{1,2}",
  "*?",
  "+?",
  "??",
  "{1,2}?",
);

const anchor = fc.constantFrom("^", "$", "\\b", "\\B");

const grammar = fc.letrec<{
  alternation: string;
  sequence: string;
  term: string;
}>((tie) => ({
  alternation: fc.oneof(
    { weight: 3, arbitrary: tie("sequence") },
    {
      weight: 1,
      arbitrary: fc
        .tuple(tie("sequence"), tie("sequence"))
        .map(([left, right]) => `${left}|${right}`),
    },
  ),
  sequence: fc
    .array(tie("term"), { maxLength: 3 })
    .map((terms) => terms.join("")),
  term: fc.oneof(
    { maxDepth: 2 },
    fc.tuple(atom, quantifier).map(([a, q]) => a + q),
    anchor,
    fc
      .tuple(tie("alternation"), quantifier)
      .map(([body, q]) => `(${body})${q}`),
    fc
      .tuple(tie("alternation"), quantifier)
      .map(([body, q]) => `(?:${body})${q}`),
  ),
}));

const pattern = fc.oneof(
  { weight: 4, arbitrary: grammar.alternation },
  {
    weight: 1,
    arbitrary: fc
      .tuple(grammar.alternation, grammar.alternation)
      .map(([group, middle]) => `(${group})${middle}\\1`),
  },
);

const flags = fc.constantFrom("", "i", "m", "s", "im");

const input = fc
  .array(fc.constantFrom("a", "b", "A", "B", " ", "\n", "1", "_"), {
    maxLength: 8,
  })
  .map((chars) => chars.join(""));

function compileOrFail(source: string, flagString = ""): Regex {
  const result = fromFlags(flagString, source);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.regex;
}

describe("properties", () => {
  it("contains agrees with find", () => {
    fc.assert(
      fc.property(pattern, flags, input, (source, f, text) => {
        const regex = compileOrFail(source, f);
        expect(contains(regex, text)).toBe(
          find(atMost(1), regex, text).length > 0,
        );
      }),
    );
  });

  it("a bounded find is a prefix of the unbounded one", () => {
    fc.assert(
      fc.property(
        pattern,
        input,
        fc.nat({ max: 5 }),
        (source, text, bound) => {
          const regex = compileOrFail(source);
          const all = find(All, regex, text);
          expect(find(atMost(bound), regex, text)).toEqual(
            all.slice(0, bound),
          );
        },
      ),
    );
  });

  it("numbers matches consecutively from one", () => {
    fc.assert(
      fc.property(pattern, input, (source, text) => {
        const regex = compileOrFail(source);
        const numbers = find(All, regex, text).map((m) => m.number);
        expect(numbers).toEqual(numbers.map((_, i) => i + 1));
      }),
    );
  });

  it("reports one submatch per group", () => {
    fc.assert(
      fc.property(pattern, input, (source, text) => {
        const regex = compileOrFail(source);
        for (const m of find(All, regex, text)) {
          expect(m.submatches).toHaveLength(regex.groupCount);
          expect(text.slice(m.index, m.index + m.text.length)).toBe(m.text);
        }
      }),
    );
  });

  it("split pieces and separators rebuild the input", () => {
    fc.assert(
      fc.property(pattern, input, (source, text) => {
        const regex = compileOrFail(source);
        const pieces = split(All, regex, text);
        const separators = find(All, regex, text).map((m) => m.text);
        expect(pieces).toHaveLength(separators.length + 1);
        let rebuilt = pieces[0];
        separators.forEach((separator, i) => {
          rebuilt += separator + pieces[i + 1];
        });
        expect(rebuilt).toBe(text);
      }),
    );
  });

  it("replacing every match with its own text is the identity", () => {
    fc.assert(
      fc.property(pattern, input, (source, text) => {
        const regex = compileOrFail(source);
        expect(replace(All, regex, (m) => m.text, text)).toBe(text);
      }),
    );
  });

  it("matches like the host RegExp in unicode mode", () => {
    fc.assert(
      fc.property(pattern, flags, input, (source, f, text) => {
        const regex = compileOrFail(source, f);
        const expected = [
          ...text.matchAll(new RegExp(source, `gu${f}`)),
        ].map((m) => ({
          text: m[0],
          index: m.index,
          submatches: m.slice(1),
        }));
        const actual = find(All, regex, text).map((m) => ({
          text: m.text,
          index: m.index,
          submatches: m.submatches,
        }));
        expect(actual).toEqual(expected);
      }),
      { numRuns: 500 },
    );
  });

  it("reports arbitrary pattern text as a value, never by throwing", () => {
    fc.assert(
      fc.property(fc.string(), (source) => {
        const result = fromString(source);
        expect(typeof result.ok).toBe("boolean");
      }),
    );
  });
});

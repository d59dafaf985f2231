/**
 * Character-set predicates over code points.
 *
 * \d, \w and \b use the ASCII definitions; \s follows the JavaScript
 * WhiteSpace and LineTerminator sets. Under case-insensitive matching the
 * word set also takes U+017F and U+212A, which fold to s and k.
 */

import type { CharClassNode, ClassEscapeKind, ClassItem } from "../ast/types.js";
import { codePointWidth, isLineTerminator } from "../utils/code-points.js";

export type CodePointPredicate = (codePoint: number) => boolean;

export function isDigit(codePoint: number): boolean {
  return codePoint >= 0x30 && codePoint <= 0x39;
}

export function isWordChar(codePoint: number): boolean {
  return (
    isDigit(codePoint) ||
    (codePoint >= 0x41 && codePoint <= 0x5a) ||
    (codePoint >= 0x61 && codePoint <= 0x7a) ||
    codePoint === 0x5f
  );
}

export function isWhitespace(codePoint: number): boolean {
  switch (codePoint) {
    case 0x09:
    case 0x0b:
    case 0x0c:
    case 0x20:
    case 0xa0:
    case 0x1680:
    case 0x202f:
    case 0x205f:
    case 0x3000:
    case 0xfeff:
      return true;
  }
  return (
    isLineTerminator(codePoint) || (codePoint >= 0x2000 && codePoint <= 0x200a)
  );
}

/** Word characters under case-insensitive matching */
export function isWordCharIgnoreCase(codePoint: number): boolean {
  return isWordChar(codePoint) || codePoint === 0x17f || codePoint === 0x212a;
}

export function wordPredicate(caseInsensitive: boolean): CodePointPredicate {
  return caseInsensitive ? isWordCharIgnoreCase : isWordChar;
}

function escapePredicate(
  kind: ClassEscapeKind,
  caseInsensitive: boolean,
): CodePointPredicate {
  const isWord = wordPredicate(caseInsensitive);
  switch (kind) {
    case "digit":
      return isDigit;
    case "notDigit":
      return (cp) => !isDigit(cp);
    case "word":
      return isWord;
    case "notWord":
      return (cp) => !isWord(cp);
    case "space":
      return isWhitespace;
    case "notSpace":
      return (cp) => !isWhitespace(cp);
  }
}

// =============================================================================
// Case folding
// =============================================================================

/** Apply a string case mapping only when it maps one code point to one */
function mapSingle(codePoint: number, map: (s: string) => string): number {
  const mapped = map(String.fromCodePoint(codePoint));
  const result = mapped.codePointAt(0);
  if (result === undefined || mapped.length !== codePointWidth(result)) {
    return codePoint;
  }
  return result;
}

const toLower = (s: string) => s.toLowerCase();
const toUpper = (s: string) => s.toUpperCase();

/**
 * Canonical case of a code point: lower case of its upper case, so that
 * characters sharing an upper-case form (s, S, U+017F) fold together.
 */
export function foldCase(codePoint: number): number {
  return mapSingle(mapSingle(codePoint, toUpper), toLower);
}

// No code point at or above this has a case mapping
const CASED_LIMIT = 0x20000;

let unfoldTable: Map<number, number[]> | undefined;

/** Folded code point -> every other code point that folds to it */
function unfoldings(): Map<number, number[]> {
  if (!unfoldTable) {
    unfoldTable = new Map();
    for (let cp = 0; cp < CASED_LIMIT; cp++) {
      if (cp >= 0xd800 && cp <= 0xdfff) {
        continue;
      }
      const folded = foldCase(cp);
      if (folded === cp) {
        continue;
      }
      const others = unfoldTable.get(folded);
      if (others) {
        others.push(cp);
      } else {
        unfoldTable.set(folded, [cp]);
      }
    }
  }
  return unfoldTable;
}

/**
 * Every code point with the same case fold: the code point itself, its
 * fold, then the rest in ascending order.
 */
export function caseVariants(codePoint: number): number[] {
  const folded = foldCase(codePoint);
  const variants = [codePoint];
  for (const candidate of [folded, ...(unfoldings().get(folded) ?? [])]) {
    if (!variants.includes(candidate)) {
      variants.push(candidate);
    }
  }
  return variants;
}

// =============================================================================
// Class compilation
// =============================================================================

function itemPredicate(
  item: ClassItem,
  caseInsensitive: boolean,
): CodePointPredicate {
  if (item.type === "Escape") {
    return escapePredicate(item.kind, caseInsensitive);
  }
  const { from, to } = item;
  return from === to
    ? (cp) => cp === from
    : (cp) => cp >= from && cp <= to;
}

/**
 * Build the membership test for a character class. Under case-insensitive
 * matching a code point belongs when any code point with the same case fold
 * does, the same equivalence literals use.
 */
export function compileClass(
  node: CharClassNode,
  caseInsensitive: boolean,
): CodePointPredicate {
  const predicates = node.items.map((item) =>
    itemPredicate(item, caseInsensitive),
  );
  const contains = (cp: number) => predicates.some((test) => test(cp));
  const member = caseInsensitive
    ? (cp: number) => caseVariants(cp).some(contains)
    : contains;
  return node.negated ? (cp) => !member(cp) : member;
}

export function dotPredicate(dotAll: boolean): CodePointPredicate {
  return dotAll ? () => true : (cp) => !isLineTerminator(cp);
}

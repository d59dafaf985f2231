/**
 * Regular expression parser
 *
 * Recursive descent over the pattern's code points, producing the AST defined
 * in ../ast/types.ts.
 *
 * Grammar:
 *   alternation := sequence ('|' sequence)*
 *   sequence    := term*
 *   term        := atom quantifier?
 *   quantifier  := ('*' | '+' | '?' | '{' m (',' n?)? '}') '?'?
 *   atom        := literal | '.' | '^' | '$' | class | group | escape
 *
 * A '{' that does not open a well-formed quantifier is a literal, as are a
 * lone '}' and ']'.
 */

import type {
  BackReferenceNode,
  CharClassNode,
  ClassEscapeKind,
  ClassItem,
  GroupNode,
  PatternAST,
  RegexNode,
} from "../ast/types.js";
import { type EngineLimits, resolveLimits } from "../limits.js";
import { codePointWidth, readCodePoint } from "../utils/code-points.js";
import { type ParseResult, RegexSyntaxError } from "./types.js";

// Map instead of a plain object so keys like "constructor" never hit the prototype
const CLASS_ESCAPES: Map<string, ClassEscapeKind> = new Map([
  ["d", "digit"],
  ["D", "notDigit"],
  ["w", "word"],
  ["W", "notWord"],
  ["s", "space"],
  ["S", "notSpace"],
]);

const CONTROL_ESCAPES: Map<string, number> = new Map([
  ["n", 0x0a],
  ["t", 0x09],
  ["r", 0x0d],
  ["f", 0x0c],
  ["v", 0x0b],
]);

const isDecimalDigit = (c: string) => c >= "0" && c <= "9";
const isAsciiLetter = (c: string) =>
  (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");
const isHexDigit = (c: string) =>
  isDecimalDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");

function single(codePoint: number): ClassItem {
  return { type: "Range", from: codePoint, to: codePoint };
}

class Parser {
  private pos = 0;
  private groupCount = 0;
  private depth = 0;
  private readonly backReferences: BackReferenceNode[] = [];

  constructor(
    private readonly source: string,
    private readonly maxNestingDepth: number,
  ) {}

  parse(): PatternAST {
    const body = this.parseAlternation();
    if (!this.isEof()) {
      // parseAlternation only stops early on ')'
      throw this.error("unmatched ')'");
    }
    for (const ref of this.backReferences) {
      if (ref.index > this.groupCount) {
        throw this.error(`dangling back-reference \\${ref.index}`, ref.position);
      }
    }
    return { body, groupCount: this.groupCount, source: this.source };
  }

  // ===========================================================================
  // Cursor helpers
  // ===========================================================================

  private isEof(): boolean {
    return this.pos >= this.source.length;
  }

  /** Character at the cursor (plus offset), or "" past the end */
  private peekChar(offset = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  private advance(): number {
    const codePoint = readCodePoint(this.source, this.pos);
    this.pos += codePointWidth(codePoint);
    return codePoint;
  }

  private eat(c: string): boolean {
    if (this.peekChar() === c) {
      this.pos++;
      return true;
    }
    return false;
  }

  private readDigits(): string {
    const start = this.pos;
    while (isDecimalDigit(this.peekChar())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  /** Read exactly `count` hex digits, or return undefined */
  private readHex(count: number): number | undefined {
    const digits = this.source.slice(this.pos, this.pos + count);
    if (digits.length !== count || ![...digits].every(isHexDigit)) {
      return undefined;
    }
    this.pos += count;
    return Number.parseInt(digits, 16);
  }

  private error(reason: string, position = this.pos): RegexSyntaxError {
    return new RegexSyntaxError(this.source, reason, position);
  }

  // ===========================================================================
  // Structure
  // ===========================================================================

  private parseAlternation(): RegexNode {
    const position = this.pos;
    const alternatives = [this.parseSequence()];
    while (this.eat("|")) {
      alternatives.push(this.parseSequence());
    }
    if (alternatives.length === 1) {
      return alternatives[0];
    }
    return { type: "Alternation", position, alternatives };
  }

  private parseSequence(): RegexNode {
    const position = this.pos;
    const elements: RegexNode[] = [];
    while (!this.isEof()) {
      const c = this.peekChar();
      if (c === "|" || c === ")") {
        break;
      }
      elements.push(this.parseTerm());
    }
    if (elements.length === 1) {
      return elements[0];
    }
    return { type: "Sequence", position, elements };
  }

  private parseTerm(): RegexNode {
    const atom = this.parseAtom();
    const quantifierStart = this.pos;
    const bounds = this.parseQuantifier();
    if (!bounds) {
      return atom;
    }
    if (atom.type === "Assertion") {
      throw this.error("nothing to repeat", quantifierStart);
    }
    return {
      type: "Quantifier",
      position: atom.position,
      min: bounds.min,
      max: bounds.max,
      greedy: bounds.greedy,
      child: atom,
    };
  }

  private parseQuantifier():
    | { min: number; max: number; greedy: boolean }
    | undefined {
    let min: number;
    let max: number;
    switch (this.peekChar()) {
      case "*":
        this.pos++;
        min = 0;
        max = Number.POSITIVE_INFINITY;
        break;
      case "+":
        this.pos++;
        min = 1;
        max = Number.POSITIVE_INFINITY;
        break;
      case "?":
        this.pos++;
        min = 0;
        max = 1;
        break;
      case "{": {
        const braces = this.parseBraces();
        if (!braces) {
          return undefined;
        }
        min = braces.min;
        max = braces.max;
        break;
      }
      default:
        return undefined;
    }
    const greedy = !this.eat("?");
    return { min, max, greedy };
  }

  /**
   * {m}, {m,} or {m,n}. Leaves the cursor untouched and returns undefined
   * when the text is not a quantifier.
   */
  private parseBraces(): { min: number; max: number } | undefined {
    const start = this.pos;
    this.pos++; // {
    const low = this.readDigits();
    if (low === "") {
      this.pos = start;
      return undefined;
    }
    const min = Number(low);
    let max = min;
    if (this.eat(",")) {
      const high = this.readDigits();
      max = high === "" ? Number.POSITIVE_INFINITY : Number(high);
    }
    if (!this.eat("}")) {
      this.pos = start;
      return undefined;
    }
    if (max < min) {
      throw this.error("numbers out of order in {} quantifier", start);
    }
    return { min, max };
  }

  // ===========================================================================
  // Atoms
  // ===========================================================================

  private parseAtom(): RegexNode {
    const position = this.pos;
    switch (this.peekChar()) {
      case "^":
        this.pos++;
        return { type: "Assertion", position, kind: "start" };
      case "$":
        this.pos++;
        return { type: "Assertion", position, kind: "end" };
      case ".":
        this.pos++;
        return { type: "Dot", position };
      case "(":
        return this.parseGroup();
      case "[":
        return this.parseClass();
      case "\\":
        return this.parseAtomEscape();
      case "*":
      case "+":
      case "?":
        throw this.error("nothing to repeat");
      case "{":
        if (this.parseBraces()) {
          throw this.error("nothing to repeat", position);
        }
        this.pos++;
        return { type: "Literal", position, codePoint: 0x7b };
    }
    return { type: "Literal", position, codePoint: this.advance() };
  }

  private parseGroup(): GroupNode {
    const position = this.pos;
    if (this.depth >= this.maxNestingDepth) {
      throw this.error("pattern too deeply nested", position);
    }
    this.pos++; // (
    let index: number | null = null;
    if (this.eat("?")) {
      if (!this.eat(":")) {
        const marker = this.peekChar();
        if (marker === "=" || marker === "!" || marker === "<") {
          throw this.error(
            "lookaround assertions and named groups are not supported",
            position,
          );
        }
        throw this.error("invalid group", position);
      }
    } else {
      // Numbered at the opening parenthesis, before any nested group
      index = ++this.groupCount;
    }
    this.depth++;
    const child = this.parseAlternation();
    this.depth--;
    if (!this.eat(")")) {
      throw this.error("unterminated group", position);
    }
    return { type: "Group", position, index, child };
  }

  private parseAtomEscape(): RegexNode {
    const position = this.pos;
    this.pos++; // backslash
    if (this.isEof()) {
      throw this.error("\\ at end of pattern", position);
    }
    const c = this.peekChar();
    if (c === "b" || c === "B") {
      this.pos++;
      return {
        type: "Assertion",
        position,
        kind: c === "b" ? "wordBoundary" : "notWordBoundary",
      };
    }
    if (c >= "1" && c <= "9") {
      const node: BackReferenceNode = {
        type: "BackReference",
        position,
        index: Number(this.readDigits()),
      };
      // Validated once the total group count is known
      this.backReferences.push(node);
      return node;
    }
    const kind = CLASS_ESCAPES.get(c);
    if (kind) {
      this.pos++;
      return {
        type: "CharClass",
        position,
        negated: false,
        items: [{ type: "Escape", kind }],
      };
    }
    if (c === "k") {
      throw this.error("named back-references are not supported", position);
    }
    return {
      type: "Literal",
      position,
      codePoint: this.parseCharacterEscape(position),
    };
  }

  /**
   * Escapes that denote one character. The cursor sits just after the
   * backslash, which is at `position`.
   */
  private parseCharacterEscape(position: number): number {
    const c = this.peekChar();
    const control = CONTROL_ESCAPES.get(c);
    if (control !== undefined) {
      this.pos++;
      return control;
    }
    switch (c) {
      case "0":
        this.pos++;
        if (isDecimalDigit(this.peekChar())) {
          throw this.error("invalid decimal escape", position);
        }
        return 0;
      case "c": {
        const letter = this.peekChar(1);
        if (!isAsciiLetter(letter)) {
          throw this.error("invalid control escape", position);
        }
        this.pos += 2;
        return letter.charCodeAt(0) % 32;
      }
      case "x": {
        this.pos++;
        const value = this.readHex(2);
        if (value === undefined) {
          throw this.error("invalid hexadecimal escape", position);
        }
        return value;
      }
      case "u":
        this.pos++;
        return this.parseUnicodeEscape(position);
      case "p":
      case "P":
        throw this.error("property escapes are not supported", position);
    }
    if (isAsciiLetter(c) || isDecimalDigit(c)) {
      throw this.error(`invalid escape \\${c}`, position);
    }
    return this.advance();
  }

  /** \uHHHH, a \uHHHH\uHHHH surrogate pair, or \u{H...} */
  private parseUnicodeEscape(position: number): number {
    if (this.eat("{")) {
      const close = this.source.indexOf("}", this.pos);
      const digits = close === -1 ? "" : this.source.slice(this.pos, close);
      if (digits.length === 0 || ![...digits].every(isHexDigit)) {
        throw this.error("invalid Unicode escape", position);
      }
      const value = Number.parseInt(digits, 16);
      if (value > 0x10ffff) {
        throw this.error("Unicode escape out of range", position);
      }
      this.pos += digits.length + 1;
      return value;
    }
    const value = this.readHex(4);
    if (value === undefined) {
      throw this.error("invalid Unicode escape", position);
    }
    if (
      value >= 0xd800 &&
      value <= 0xdbff &&
      this.source.startsWith("\\u", this.pos)
    ) {
      const resume = this.pos;
      this.pos += 2;
      const low = this.readHex(4);
      if (low !== undefined && low >= 0xdc00 && low <= 0xdfff) {
        return (value - 0xd800) * 0x400 + (low - 0xdc00) + 0x10000;
      }
      this.pos = resume;
    }
    return value;
  }

  private parseClass(): CharClassNode {
    const position = this.pos;
    this.pos++; // [
    const negated = this.eat("^");
    const items: ClassItem[] = [];
    for (;;) {
      if (this.isEof()) {
        throw this.error("missing terminating ] for character class", position);
      }
      if (this.eat("]")) {
        break;
      }
      const itemStart = this.pos;
      const from = this.parseClassAtom();
      const isRange =
        this.peekChar() === "-" &&
        this.pos + 1 < this.source.length &&
        this.peekChar(1) !== "]";
      if (!isRange) {
        items.push(from);
        continue;
      }
      this.pos++; // -
      const to = this.parseClassAtom();
      if (from.type === "Escape" || to.type === "Escape") {
        throw this.error("invalid character class range", itemStart);
      }
      if (from.from > to.from) {
        throw this.error("range out of order in character class", itemStart);
      }
      items.push({ type: "Range", from: from.from, to: to.from });
    }
    return { type: "CharClass", position, negated, items };
  }

  private parseClassAtom(): ClassItem {
    if (this.peekChar() !== "\\") {
      return single(this.advance());
    }
    const position = this.pos;
    this.pos++; // backslash
    if (this.isEof()) {
      throw this.error("\\ at end of pattern", position);
    }
    const c = this.peekChar();
    const kind = CLASS_ESCAPES.get(c);
    if (kind) {
      this.pos++;
      return { type: "Escape", kind };
    }
    if (c === "b") {
      this.pos++;
      return single(0x08);
    }
    if (c === "-") {
      this.pos++;
      return single(0x2d);
    }
    if (c >= "1" && c <= "9") {
      throw this.error("invalid class escape", position);
    }
    return single(this.parseCharacterEscape(position));
  }
}

/**
 * Parse a pattern into its AST.
 * @throws RegexSyntaxError if the pattern is malformed
 */
export function parsePattern(
  pattern: string,
  limits?: EngineLimits,
): PatternAST {
  return new Parser(pattern, resolveLimits(limits).maxNestingDepth).parse();
}

/**
 * Parse a pattern, reporting syntax errors as a value.
 */
export function parse(pattern: string, limits?: EngineLimits): ParseResult {
  try {
    return { ok: true, ast: parsePattern(pattern, limits) };
  } catch (e) {
    if (e instanceof RegexSyntaxError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/**
 * Abstract Syntax Tree (AST) Types for regular expressions
 *
 * Architecture:
 *   Pattern → Parser → AST → Compiler → Program → VM / Scanner → Matches
 *
 * Every literal and class operates on whole code points. Offsets recorded on
 * nodes are UTF-16 code unit offsets into the pattern source.
 */

// =============================================================================
// BASE TYPES
// =============================================================================

/** Base interface for all AST nodes */
export interface ASTNode {
  type: string;
  /** Offset of the node's first character in the pattern source */
  position: number;
}

export type RegexNode =
  | AlternationNode
  | SequenceNode
  | LiteralNode
  | DotNode
  | CharClassNode
  | AssertionNode
  | GroupNode
  | QuantifierNode
  | BackReferenceNode;

/** Root of a parsed pattern */
export interface PatternAST {
  body: RegexNode;
  /** Number of capturing groups, fixed by the pattern text */
  groupCount: number;
  source: string;
}

// =============================================================================
// STRUCTURE
// =============================================================================

/** a|b|c - alternatives tried left to right */
export interface AlternationNode extends ASTNode {
  type: "Alternation";
  alternatives: RegexNode[];
}

/** Concatenation; an empty sequence matches the empty string */
export interface SequenceNode extends ASTNode {
  type: "Sequence";
  elements: RegexNode[];
}

/** (...) or (?:...) */
export interface GroupNode extends ASTNode {
  type: "Group";
  /** 1-based capture index, or null for a non-capturing group */
  index: number | null;
  child: RegexNode;
}

/** x*, x+, x?, x{m}, x{m,}, x{m,n} and their lazy forms */
export interface QuantifierNode extends ASTNode {
  type: "Quantifier";
  min: number;
  /** Infinity when unbounded */
  max: number;
  greedy: boolean;
  child: RegexNode;
}

// =============================================================================
// ATOMS
// =============================================================================

export interface LiteralNode extends ASTNode {
  type: "Literal";
  codePoint: number;
}

/** . (line terminators excluded unless dotAll) */
export interface DotNode extends ASTNode {
  type: "Dot";
}

export type ClassEscapeKind =
  | "digit"
  | "notDigit"
  | "word"
  | "notWord"
  | "space"
  | "notSpace";

export type ClassItem =
  | { type: "Range"; from: number; to: number }
  | { type: "Escape"; kind: ClassEscapeKind };

/**
 * [...] and [^...]. Standalone \d, \w, \s and their negations are parsed
 * as a one-item class.
 */
export interface CharClassNode extends ASTNode {
  type: "CharClass";
  negated: boolean;
  items: ClassItem[];
}

export type AssertionKind = "start" | "end" | "wordBoundary" | "notWordBoundary";

/** ^, $, \b, \B */
export interface AssertionNode extends ASTNode {
  type: "Assertion";
  kind: AssertionKind;
}

/** \1, \2, ... */
export interface BackReferenceNode extends ASTNode {
  type: "BackReference";
  index: number;
}

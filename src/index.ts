export type {
  AlternationNode,
  AssertionKind,
  AssertionNode,
  BackReferenceNode,
  CharClassNode,
  ClassEscapeKind,
  ClassItem,
  DotNode,
  GroupNode,
  LiteralNode,
  PatternAST,
  QuantifierNode,
  RegexNode,
  SequenceNode,
} from "./ast/types.js";
export { type Matcher, scan } from "./engine/scanner.js";
export type { MatchAttempt, Span } from "./engine/vm.js";
export type { EngineLimits } from "./limits.js";
export {
  contains,
  find,
  type Replacer,
  replace,
  split,
} from "./operations.js";
export {
  type FlagsResult,
  parseFlags,
  type RegexOptions,
} from "./options.js";
export { parse } from "./parser/parser.js";
export { type ParseResult, RegexSyntaxError } from "./parser/types.js";
export {
  type CompileResult,
  escape,
  fromFlags,
  fromString,
  fromStringWith,
  never,
  type PatternOptions,
  Regex,
} from "./regex.js";
export {
  All,
  atMost,
  type Count,
  type Match,
  type RegexLogger,
} from "./types.js";

/**
 * Regex - a compiled pattern
 *
 * Compilation parses the pattern, resolves its options and lowers it to a
 * VM program. The result is frozen and holds no per-match state, so one
 * Regex can serve any number of scans.
 *
 * Matching backtracks. Patterns with nested ambiguous quantifiers, such as
 * /(a+)+b/, take exponential time on inputs that almost match; bound the
 * work with atMost() or an external timeout when patterns are untrusted.
 */

import { compile } from "./compiler/compiler.js";
import type { Program } from "./compiler/program.js";
import type { Matcher } from "./engine/scanner.js";
import { execute, type MatchAttempt } from "./engine/vm.js";
import type { EngineLimits } from "./limits.js";
import {
  formatFlags,
  parseFlags,
  type RegexOptions,
  resolveOptions,
} from "./options.js";
import { parsePattern } from "./parser/parser.js";
import { RegexSyntaxError } from "./parser/types.js";
import type { RegexLogger } from "./types.js";

export interface PatternOptions extends Partial<RegexOptions> {
  /** Compile-time limits; see EngineLimits for defaults */
  limits?: EngineLimits;
  /** Optional logger for compile diagnostics */
  logger?: RegexLogger;
}

export type CompileResult =
  | { ok: true; regex: Regex }
  | { ok: false; error: string };

export class Regex implements Matcher {
  readonly source: string;
  readonly options: Readonly<RegexOptions>;
  private readonly program: Program;

  private constructor(
    source: string,
    options: RegexOptions,
    program: Program,
  ) {
    this.source = source;
    this.options = Object.freeze(options);
    this.program = program;
    Object.freeze(this);
  }

  /**
   * Compile a pattern.
   * @throws RegexSyntaxError if the pattern is malformed or too large
   */
  static compile(pattern: string, options: PatternOptions = {}): Regex {
    const resolved = resolveOptions(options);
    const logger = options.logger;
    try {
      const ast = parsePattern(pattern, options.limits);
      const program = compile(ast, resolved, options.limits);
      logger?.debug("compile", {
        pattern,
        flags: formatFlags(resolved),
        groups: program.groupCount,
        instructions: program.instructions.length,
      });
      return new Regex(pattern, resolved, program);
    } catch (e) {
      if (e instanceof RegexSyntaxError) {
        logger?.info("syntax error", {
          pattern,
          reason: e.reason,
          position: e.position,
        });
      }
      throw e;
    }
  }

  /** Number of capturing groups; every match has this many submatches */
  get groupCount(): number {
    return this.program.groupCount;
  }

  get flags(): string {
    return formatFlags(this.options);
  }

  /**
   * Attempt a match anchored exactly at `start` (no scanning).
   * Offsets outside [0, input.length] never match.
   */
  tryMatch(input: string, start: number): MatchAttempt | undefined {
    if (!Number.isInteger(start) || start < 0 || start > input.length) {
      return undefined;
    }
    return execute(this.program, input, start);
  }

  toString(): string {
    return `/${this.source}/${this.flags}`;
  }
}

/**
 * Compile a pattern with explicit options, reporting syntax errors as a
 * value. The error is the diagnostic message.
 */
export function fromStringWith(
  options: PatternOptions,
  pattern: string,
): CompileResult {
  try {
    return { ok: true, regex: Regex.compile(pattern, options) };
  } catch (e) {
    if (e instanceof RegexSyntaxError) {
      return { ok: false, error: e.message };
    }
    throw e;
  }
}

/** Compile a pattern with default options */
export function fromString(pattern: string): CompileResult {
  return fromStringWith({}, pattern);
}

/**
 * Compile a pattern with options given as a flag string, e.g. "im".
 */
export function fromFlags(flags: string, pattern: string): CompileResult {
  const parsed = parseFlags(flags);
  if (!parsed.ok) {
    return { ok: false, error: parsed.error };
  }
  return fromStringWith(parsed.options, pattern);
}

/** A pattern that matches nothing, not even the empty string */
export const never: Regex = Regex.compile("[]");

const SYNTAX_CHARACTERS = new Set("^$\\.*+?()[]{}|/-");

/**
 * Escape every pattern syntax character so `text` matches literally.
 */
export function escape(text: string): string {
  let result = "";
  for (const c of text) {
    result += SYNTAX_CHARACTERS.has(c) ? `\\${c}` : c;
  }
  return result;
}

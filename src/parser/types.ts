import type { PatternAST } from "../ast/types.js";

export class RegexSyntaxError extends SyntaxError {
  constructor(
    public readonly pattern: string,
    public readonly reason: string,
    public readonly position: number,
  ) {
    super(`Invalid regular expression: /${pattern}/: ${reason}`);
    this.name = "RegexSyntaxError";
  }
}

export type ParseResult =
  | { ok: true; ast: PatternAST }
  | { ok: false; error: RegexSyntaxError };

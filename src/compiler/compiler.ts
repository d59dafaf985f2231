/**
 * Matcher compiler
 *
 * Lowers a parsed pattern into a linear program for the backtracking VM
 * (../engine/vm.ts). Options are resolved here, so instructions carry their
 * own case and line semantics and the VM needs no configuration.
 *
 * Quantifier layout, for x{m,n}:
 *   m mandatory copies of x, then n-m nested optional copies
 *   (x(x(x)?)?)?; when n is unbounded, one loop instead of the copies.
 * Every iteration clears the captures inside x, and every optional
 * iteration is rejected if it consumed nothing.
 */

import type {
  AlternationNode,
  AssertionKind,
  PatternAST,
  QuantifierNode,
  RegexNode,
} from "../ast/types.js";
import { type EngineLimits, resolveLimits } from "../limits.js";
import type { RegexOptions } from "../options.js";
import { RegexSyntaxError } from "../parser/types.js";
import { compileClass, dotPredicate, foldCase } from "./char-set.js";
import {
  endSlot,
  type Instruction,
  type Program,
  type ResolvedAssertion,
  startSlot,
} from "./program.js";

/** First and last capture index inside a node, if it has any */
type GroupRange = { first: number; last: number } | undefined;

function groupRange(node: RegexNode): GroupRange {
  let first = Number.POSITIVE_INFINITY;
  let last = 0;
  const visit = (n: RegexNode): void => {
    switch (n.type) {
      case "Group":
        if (n.index !== null) {
          first = Math.min(first, n.index);
          last = Math.max(last, n.index);
        }
        visit(n.child);
        break;
      case "Quantifier":
        visit(n.child);
        break;
      case "Sequence":
        n.elements.forEach(visit);
        break;
      case "Alternation":
        n.alternatives.forEach(visit);
        break;
    }
  };
  visit(node);
  return last === 0 ? undefined : { first, last };
}

class Compiler {
  private readonly instructions: Instruction[] = [];
  private registerCount = 0;
  private readonly maxProgramSize: number;

  constructor(
    private readonly ast: PatternAST,
    private readonly options: RegexOptions,
    limits: EngineLimits | undefined,
  ) {
    this.maxProgramSize = resolveLimits(limits).maxProgramSize;
  }

  compile(): Program {
    this.emitNode(this.ast.body);
    this.emit({ op: "match" });
    return {
      instructions: this.instructions,
      groupCount: this.ast.groupCount,
      slotCount: 2 * this.ast.groupCount + this.registerCount,
    };
  }

  private tooLarge(position: number): RegexSyntaxError {
    return new RegexSyntaxError(this.ast.source, "pattern too large", position);
  }

  /** Append an instruction and return its address */
  private emit(instruction: Instruction): number {
    if (this.instructions.length >= this.maxProgramSize) {
      throw this.tooLarge(0);
    }
    this.instructions.push(instruction);
    return this.instructions.length - 1;
  }

  private get next(): number {
    return this.instructions.length;
  }

  /** Point a placeholder split at its two continuations */
  private patchSplit(
    address: number,
    preferred: number,
    fallback: number,
  ): void {
    this.instructions[address] = {
      op: "split",
      primary: preferred,
      secondary: fallback,
    };
  }

  private newRegister(): number {
    return 2 * this.ast.groupCount + this.registerCount++;
  }

  private emitNode(node: RegexNode): void {
    switch (node.type) {
      case "Literal": {
        const ignoreCase = this.options.caseInsensitive;
        this.emit({
          op: "char",
          codePoint: ignoreCase ? foldCase(node.codePoint) : node.codePoint,
          ignoreCase,
        });
        break;
      }
      case "Dot":
        this.emit({ op: "class", test: dotPredicate(this.options.dotAll) });
        break;
      case "CharClass":
        this.emit({
          op: "class",
          test: compileClass(node, this.options.caseInsensitive),
        });
        break;
      case "Assertion":
        this.emit({
          op: "assert",
          kind: this.resolveAssertion(node.kind),
          ignoreCase: this.options.caseInsensitive,
        });
        break;
      case "BackReference":
        this.emit({
          op: "backref",
          group: node.index,
          ignoreCase: this.options.caseInsensitive,
        });
        break;
      case "Sequence":
        for (const element of node.elements) {
          this.emitNode(element);
        }
        break;
      case "Alternation":
        this.emitAlternation(node);
        break;
      case "Group":
        if (node.index === null) {
          this.emitNode(node.child);
        } else {
          this.emit({ op: "save", slot: startSlot(node.index) });
          this.emitNode(node.child);
          this.emit({ op: "save", slot: endSlot(node.index) });
        }
        break;
      case "Quantifier":
        this.emitQuantifier(node);
        break;
    }
  }

  private resolveAssertion(kind: AssertionKind): ResolvedAssertion {
    switch (kind) {
      case "start":
        return this.options.multiline ? "lineStart" : "inputStart";
      case "end":
        return this.options.multiline ? "lineEnd" : "inputEnd";
      default:
        return kind;
    }
  }

  /**
   *       split L1, N1
   *   L1: <alt 0>
   *       jump END
   *   N1: split L2, N2
   *   ...
   *   Nk: <alt k>
   *  END:
   */
  private emitAlternation(node: AlternationNode): void {
    const exits: number[] = [];
    const last = node.alternatives.length - 1;
    node.alternatives.forEach((alternative, i) => {
      if (i === last) {
        this.emitNode(alternative);
        return;
      }
      const split = this.emit({ op: "split", primary: 0, secondary: 0 });
      this.emitNode(alternative);
      exits.push(this.emit({ op: "jump", target: 0 }));
      this.patchSplit(split, split + 1, this.next);
    });
    for (const exit of exits) {
      this.instructions[exit] = { op: "jump", target: this.next };
    }
  }

  private emitQuantifier(node: QuantifierNode): void {
    const { min, max, greedy, child } = node;
    const copies = max === Number.POSITIVE_INFINITY ? min + 1 : max;
    // Each copy costs at least one instruction; reject before expanding
    if (copies > this.maxProgramSize) {
      throw this.tooLarge(node.position);
    }
    const groups = groupRange(child);

    for (let i = 0; i < min; i++) {
      this.emitIteration(child, groups, undefined);
    }

    if (max === Number.POSITIVE_INFINITY) {
      const register = this.newRegister();
      const loop = this.emit({ op: "split", primary: 0, secondary: 0 });
      this.emitIteration(child, groups, register);
      this.emit({ op: "jump", target: loop });
      this.setPreference(loop, greedy, loop + 1, this.next);
      return;
    }

    if (max === min) {
      return;
    }
    // Optional copies are nested, never active at once: one register serves all
    const register = this.newRegister();
    const splits: number[] = [];
    for (let i = min; i < max; i++) {
      splits.push(this.emit({ op: "split", primary: 0, secondary: 0 }));
      this.emitIteration(child, groups, register);
    }
    for (const split of splits) {
      this.setPreference(split, greedy, split + 1, this.next);
    }
  }

  private setPreference(
    split: number,
    greedy: boolean,
    body: number,
    exit: number,
  ): void {
    if (greedy) {
      this.patchSplit(split, body, exit);
    } else {
      this.patchSplit(split, exit, body);
    }
  }

  private emitIteration(
    child: RegexNode,
    groups: GroupRange,
    register: number | undefined,
  ): void {
    if (register !== undefined) {
      this.emit({ op: "mark", register });
    }
    if (groups) {
      this.emit({
        op: "clear",
        from: startSlot(groups.first),
        to: endSlot(groups.last) + 1,
      });
    }
    this.emitNode(child);
    if (register !== undefined) {
      this.emit({ op: "progress", register });
    }
  }
}

/**
 * Compile a parsed pattern into a VM program.
 * @throws RegexSyntaxError if the program would exceed the size limit
 */
export function compile(
  ast: PatternAST,
  options: RegexOptions,
  limits?: EngineLimits,
): Program {
  return new Compiler(ast, options, limits).compile();
}

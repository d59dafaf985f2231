/**
 * Backtracking VM
 *
 * Runs a compiled program anchored at one input offset. Choice points and
 * slot writes go on an explicit stack, so deep backtracking costs heap,
 * not call-stack depth. Each call allocates its own slots and stack; the
 * program is never written to.
 *
 * Worst-case time is exponential in the input length for patterns with
 * nested ambiguous quantifiers, as with any backtracking engine.
 */

import {
  type CodePointPredicate,
  foldCase,
  wordPredicate,
} from "../compiler/char-set.js";
import {
  endSlot,
  type Program,
  type ResolvedAssertion,
  startSlot,
} from "../compiler/program.js";
import {
  codePointWidth,
  isLineTerminator,
  readCodePoint,
} from "../utils/code-points.js";

/** Half-open range [start, end) of UTF-16 code unit offsets */
export type Span = readonly [start: number, end: number];

export interface MatchAttempt {
  start: number;
  end: number;
  /** One entry per capturing group; undefined when the group did not participate */
  groups: (Span | undefined)[];
}

type Frame =
  | { kind: "branch"; pc: number; pos: number }
  | { kind: "restore"; slot: number; value: number };

function isWordAt(
  input: string,
  pos: number,
  isWord: CodePointPredicate,
): boolean {
  return pos >= 0 && pos < input.length && isWord(input.charCodeAt(pos));
}

function checkAssertion(
  kind: ResolvedAssertion,
  input: string,
  pos: number,
  ignoreCase: boolean,
): boolean {
  const isWord = wordPredicate(ignoreCase);
  switch (kind) {
    case "inputStart":
      return pos === 0;
    case "lineStart":
      return pos === 0 || isLineTerminator(input.charCodeAt(pos - 1));
    case "inputEnd":
      return pos === input.length;
    case "lineEnd":
      return pos === input.length || isLineTerminator(input.charCodeAt(pos));
    case "wordBoundary":
      return isWordAt(input, pos - 1, isWord) !== isWordAt(input, pos, isWord);
    case "notWordBoundary":
      return isWordAt(input, pos - 1, isWord) === isWordAt(input, pos, isWord);
  }
}

/**
 * Compare input[from, to) against the input at `pos`, code point by code
 * point. Returns the offset after the copy, or -1.
 */
function matchBackReference(
  input: string,
  from: number,
  to: number,
  pos: number,
  ignoreCase: boolean,
): number {
  let src = from;
  let dst = pos;
  while (src < to) {
    if (dst >= input.length) {
      return -1;
    }
    const expected = readCodePoint(input, src);
    const actual = readCodePoint(input, dst);
    const same = ignoreCase
      ? foldCase(expected) === foldCase(actual)
      : expected === actual;
    if (!same) {
      return -1;
    }
    src += codePointWidth(expected);
    dst += codePointWidth(actual);
  }
  return dst;
}

/**
 * Try to match `program` starting exactly at `start`.
 * Returns undefined when no path through the program reaches `match`.
 */
export function execute(
  program: Program,
  input: string,
  start: number,
): MatchAttempt | undefined {
  const { instructions } = program;
  const slots: number[] = new Array(program.slotCount).fill(-1);
  const stack: Frame[] = [];

  const write = (slot: number, value: number): void => {
    if (slots[slot] !== value) {
      stack.push({ kind: "restore", slot, value: slots[slot] });
      slots[slot] = value;
    }
  };

  let pc = 0;
  let pos = start;

  for (;;) {
    const instruction = instructions[pc];
    let ok = true;

    switch (instruction.op) {
      case "char": {
        if (pos >= input.length) {
          ok = false;
          break;
        }
        const codePoint = readCodePoint(input, pos);
        const actual = instruction.ignoreCase ? foldCase(codePoint) : codePoint;
        if (actual !== instruction.codePoint) {
          ok = false;
          break;
        }
        pos += codePointWidth(codePoint);
        pc++;
        break;
      }
      case "class": {
        if (pos >= input.length) {
          ok = false;
          break;
        }
        const codePoint = readCodePoint(input, pos);
        if (!instruction.test(codePoint)) {
          ok = false;
          break;
        }
        pos += codePointWidth(codePoint);
        pc++;
        break;
      }
      case "split":
        stack.push({ kind: "branch", pc: instruction.secondary, pos });
        pc = instruction.primary;
        break;
      case "jump":
        pc = instruction.target;
        break;
      case "save":
        write(instruction.slot, pos);
        if (instruction.slot % 2 === 0) {
          // An open group reads as unset until it closes
          write(instruction.slot + 1, -1);
        }
        pc++;
        break;
      case "clear":
        for (let slot = instruction.from; slot < instruction.to; slot++) {
          write(slot, -1);
        }
        pc++;
        break;
      case "mark":
        write(instruction.register, pos);
        pc++;
        break;
      case "progress":
        if (slots[instruction.register] === pos) {
          ok = false;
          break;
        }
        pc++;
        break;
      case "assert":
        if (
          !checkAssertion(instruction.kind, input, pos, instruction.ignoreCase)
        ) {
          ok = false;
          break;
        }
        pc++;
        break;
      case "backref": {
        const from = slots[startSlot(instruction.group)];
        const to = slots[endSlot(instruction.group)];
        if (from >= 0 && to >= 0) {
          const after = matchBackReference(
            input,
            from,
            to,
            pos,
            instruction.ignoreCase,
          );
          if (after < 0) {
            ok = false;
            break;
          }
          pos = after;
        }
        pc++;
        break;
      }
      case "match": {
        const groups: (Span | undefined)[] = [];
        for (let group = 1; group <= program.groupCount; group++) {
          const from = slots[startSlot(group)];
          const to = slots[endSlot(group)];
          groups.push(from >= 0 && to >= 0 ? [from, to] : undefined);
        }
        return { start, end: pos, groups };
      }
    }

    if (ok) {
      continue;
    }

    // Backtrack: undo slot writes down to the most recent choice point
    let frame = stack.pop();
    while (frame && frame.kind === "restore") {
      slots[frame.slot] = frame.value;
      frame = stack.pop();
    }
    if (!frame) {
      return undefined;
    }
    pc = frame.pc;
    pos = frame.pos;
  }
}

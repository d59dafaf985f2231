/**
 * Instruction set of the backtracking VM.
 *
 * Capture slots and loop registers share one integer array per attempt:
 * group g (1-based) owns slots 2(g-1) and 2(g-1)+1, loop registers follow.
 * A slot holding -1 is unset.
 */

import type { CodePointPredicate } from "./char-set.js";

export type ResolvedAssertion =
  | "inputStart"
  | "lineStart"
  | "inputEnd"
  | "lineEnd"
  | "wordBoundary"
  | "notWordBoundary";

export type Instruction =
  /** Consume one code point equal to `codePoint` (already folded when ignoreCase) */
  | { op: "char"; codePoint: number; ignoreCase: boolean }
  /** Consume one code point accepted by `test` */
  | { op: "class"; test: CodePointPredicate }
  /** Continue at `primary`; on failure resume at `secondary` */
  | { op: "split"; primary: number; secondary: number }
  | { op: "jump"; target: number }
  /** Record the position in a capture slot; a start slot also unsets its end */
  | { op: "save"; slot: number }
  /** Unset capture slots [from, to) */
  | { op: "clear"; from: number; to: number }
  /** Record the position at the start of a loop iteration */
  | { op: "mark"; register: number }
  /** Fail when the iteration since `mark` consumed nothing */
  | { op: "progress"; register: number }
  /** Zero-width test; `ignoreCase` widens the word set used by \b and \B */
  | { op: "assert"; kind: ResolvedAssertion; ignoreCase: boolean }
  /** Consume the text captured by `group`; an unset group matches empty */
  | { op: "backref"; group: number; ignoreCase: boolean }
  | { op: "match" };

export interface Program {
  readonly instructions: readonly Instruction[];
  readonly groupCount: number;
  /** Capture slots plus loop registers */
  readonly slotCount: number;
}

export function startSlot(group: number): number {
  return 2 * (group - 1);
}

export function endSlot(group: number): number {
  return 2 * (group - 1) + 1;
}

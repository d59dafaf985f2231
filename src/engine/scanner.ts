/**
 * Scanning engine
 *
 * Drives anchored attempts across the input and yields non-overlapping
 * matches left to right, the way a global JavaScript regex does under
 * the `u` flag:
 * - after a failed attempt the cursor moves one code point;
 * - after a match it moves to the match end, or one code point past the
 *   start when the match was empty, so empty matches cannot repeat.
 */

import type { Count, Match } from "../types.js";
import { nextCodePointOffset } from "../utils/code-points.js";
import { project } from "./projector.js";
import type { MatchAttempt } from "./vm.js";

/** Anything that can attempt a match anchored at an offset */
export interface Matcher {
  tryMatch(input: string, start: number): MatchAttempt | undefined;
}

export function* scan(
  matcher: Matcher,
  input: string,
  count: Count,
): Generator<Match, void, undefined> {
  const limit = count.kind === "all" ? Number.POSITIVE_INFINITY : count.n;
  if (limit <= 0) {
    return;
  }

  let cursor = 0;
  let number = 0;
  while (cursor <= input.length) {
    const attempt = matcher.tryMatch(input, cursor);
    if (!attempt) {
      cursor = nextCodePointOffset(input, cursor);
      continue;
    }
    number++;
    yield project(attempt, number, input);
    if (number >= limit) {
      return;
    }
    cursor =
      attempt.end === attempt.start
        ? nextCodePointOffset(input, attempt.start)
        : attempt.end;
  }
}

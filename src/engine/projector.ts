import type { Match } from "../types.js";
import type { MatchAttempt } from "./vm.js";

/**
 * Turn the spans of a successful attempt into a match record.
 * `number` is supplied by the scan that found the attempt.
 */
export function project(
  attempt: MatchAttempt,
  number: number,
  input: string,
): Match {
  return {
    text: input.slice(attempt.start, attempt.end),
    index: attempt.start,
    number,
    submatches: attempt.groups.map((span) =>
      span ? input.slice(span[0], span[1]) : undefined,
    ),
  };
}

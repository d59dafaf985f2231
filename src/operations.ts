/**
 * Containment, split, find and replace, each built on one scan.
 *
 * Offsets always refer to the original input: replace and split read the
 * whole match stream against it and assemble their output in a single
 * left-to-right pass.
 */

import { scan } from "./engine/scanner.js";
import type { Regex } from "./regex.js";
import { type Count, type Match, atMost } from "./types.js";

export type Replacer = (match: Match) => string;

/** True when the pattern matches anywhere in the input */
export function contains(regex: Regex, input: string): boolean {
  return !scan(regex, input, atMost(1)).next().done;
}

/**
 * Split the input around matches. With n separators the result has n + 1
 * pieces; the text before the first and after the last match is kept even
 * when empty.
 */
export function split(count: Count, regex: Regex, input: string): string[] {
  const pieces: string[] = [];
  let lastEnd = 0;
  for (const match of scan(regex, input, count)) {
    pieces.push(input.slice(lastEnd, match.index));
    lastEnd = match.index + match.text.length;
  }
  pieces.push(input.slice(lastEnd));
  return pieces;
}

/** All matches in order, up to the count */
export function find(count: Count, regex: Regex, input: string): Match[] {
  return [...scan(regex, input, count)];
}

/**
 * Replace matches with the replacer's result. Unmatched text passes through
 * unchanged.
 */
export function replace(
  count: Count,
  regex: Regex,
  replacer: Replacer,
  input: string,
): string {
  const result: string[] = [];
  let lastEnd = 0;
  for (const match of scan(regex, input, count)) {
    result.push(input.slice(lastEnd, match.index));
    result.push(replacer(match));
    lastEnd = match.index + match.text.length;
  }
  result.push(input.slice(lastEnd));
  return result.join("");
}

/**
 * A match reported by a scan.
 */
export interface Match {
  /** The matched text */
  readonly text: string;
  /** Start offset in UTF-16 code units, the unit of String#slice */
  readonly index: number;
  /** 1-based position of this match within its scan */
  readonly number: number;
  /**
   * Text of each capturing group in declaration order; undefined for a
   * group that did not participate
   */
  readonly submatches: readonly (string | undefined)[];
}

/** How many matches a scan may produce */
export type Count =
  | { readonly kind: "all" }
  | { readonly kind: "atMost"; readonly n: number };

export const All: Count = { kind: "all" };

/**
 * Bound a scan to at most `n` matches. Fractions round down and negative
 * values count as zero.
 */
export function atMost(n: number): Count {
  const bound = Number.isNaN(n) ? 0 : Math.max(0, Math.floor(n));
  return { kind: "atMost", n: bound };
}

/**
 * Logger interface for compile-time diagnostics.
 * Implement this interface to receive engine logs.
 */
export interface RegexLogger {
  /** Log informational messages (rejected patterns) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (compiled program statistics) */
  debug(message: string, data?: Record<string, unknown>): void;
}

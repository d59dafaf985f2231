/**
 * Engine Limits Configuration
 *
 * Bounds applied while parsing and compiling a pattern. Matching itself is
 * not bounded: a backtracking engine can take exponential time on patterns
 * such as /(a*)*b/, and callers that run untrusted patterns should bound the
 * count of matches or wrap the call in their own timeout.
 */

/**
 * Configuration for engine limits.
 * All limits are optional - undefined values use defaults.
 */
export interface EngineLimits {
  /**
   * Maximum number of VM instructions a compiled pattern may hold
   * (default: 100000). Counted quantifiers are expanded into copies of
   * their operand, so /(?:abc){50000}/ exceeds it.
   */
  maxProgramSize?: number;

  /** Maximum depth of nested groups in a pattern (default: 500) */
  maxNestingDepth?: number;
}

const DEFAULT_LIMITS: Required<EngineLimits> = {
  maxProgramSize: 100_000,
  maxNestingDepth: 500,
};

/**
 * Resolve engine limits by merging user-provided limits with defaults.
 */
export function resolveLimits(
  userLimits?: EngineLimits,
): Required<EngineLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS };
  }
  return {
    maxProgramSize: userLimits.maxProgramSize ?? DEFAULT_LIMITS.maxProgramSize,
    maxNestingDepth:
      userLimits.maxNestingDepth ?? DEFAULT_LIMITS.maxNestingDepth,
  };
}

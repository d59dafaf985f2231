/**
 * Pattern options and flag strings.
 */

export interface RegexOptions {
  /** Fold case when comparing characters, classes and backreferences */
  caseInsensitive: boolean;
  /** ^ and $ also match at line terminators */
  multiline: boolean;
  /** . also matches line terminators */
  dotAll: boolean;
}

const DEFAULT_OPTIONS: RegexOptions = {
  caseInsensitive: false,
  multiline: false,
  dotAll: false,
};

export function resolveOptions(
  userOptions?: Partial<RegexOptions>,
): RegexOptions {
  if (!userOptions) {
    return { ...DEFAULT_OPTIONS };
  }
  return {
    caseInsensitive:
      userOptions.caseInsensitive ?? DEFAULT_OPTIONS.caseInsensitive,
    multiline: userOptions.multiline ?? DEFAULT_OPTIONS.multiline,
    dotAll: userOptions.dotAll ?? DEFAULT_OPTIONS.dotAll,
  };
}

export type FlagsResult =
  | { ok: true; options: RegexOptions }
  | { ok: false; error: string };

/**
 * Convert a flag string (i, m, s, u) to options.
 * Matching is always code-point based, so u is accepted and has no effect.
 */
export function parseFlags(flags: string): FlagsResult {
  const options = resolveOptions();
  const seen = new Set<string>();
  for (const flag of flags) {
    if (seen.has(flag)) {
      return { ok: false, error: `Invalid flags: duplicate flag '${flag}'` };
    }
    seen.add(flag);
    switch (flag) {
      case "i":
        options.caseInsensitive = true;
        break;
      case "m":
        options.multiline = true;
        break;
      case "s":
        options.dotAll = true;
        break;
      case "u":
        break;
      default:
        return { ok: false, error: `Invalid flags: unknown flag '${flag}'` };
    }
  }
  return { ok: true, options };
}

/** Canonical flag string for a set of options, in i, m, s order */
export function formatFlags(options: RegexOptions): string {
  let flags = "";
  if (options.caseInsensitive) {
    flags += "i";
  }
  if (options.multiline) {
    flags += "m";
  }
  if (options.dotAll) {
    flags += "s";
  }
  return flags;
}

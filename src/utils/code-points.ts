/**
 * Code point access over UTF-16 strings.
 *
 * A well-formed surrogate pair reads as one code point; a lone surrogate
 * reads as itself.
 */

/** Read the code point starting at `pos`. `pos` must be inside the string. */
export function readCodePoint(text: string, pos: number): number {
  const high = text.charCodeAt(pos);
  if (high >= 0xd800 && high <= 0xdbff && pos + 1 < text.length) {
    const low = text.charCodeAt(pos + 1);
    if (low >= 0xdc00 && low <= 0xdfff) {
      return (high - 0xd800) * 0x400 + (low - 0xdc00) + 0x10000;
    }
  }
  return high;
}

/** Number of UTF-16 code units used by a code point */
export function codePointWidth(codePoint: number): number {
  return codePoint > 0xffff ? 2 : 1;
}

/**
 * Offset of the next code point boundary after `pos`.
 * At or past the end this is `pos + 1`, which lets scanners step off the end.
 */
export function nextCodePointOffset(text: string, pos: number): number {
  if (pos >= text.length) {
    return pos + 1;
  }
  return pos + codePointWidth(readCodePoint(text, pos));
}

export function isLineTerminator(codePoint: number): boolean {
  return (
    codePoint === 0x0a ||
    codePoint === 0x0d ||
    codePoint === 0x2028 ||
    codePoint === 0x2029
  );
}

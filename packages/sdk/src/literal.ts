/**
 * Literal case-insensitive matching
 *
 * User-supplied text never becomes a pattern directly: every value passes
 * through escapeLiteral so that characters such as `.`, `*` or `(` match
 * themselves.
 */

const PATTERN_SPECIALS = /[.*+?^${}()|[\]\\/-]/g;

export type LiteralMatchMode = "exact" | "contains";

/**
 * Escape every pattern metacharacter in a literal
 */
export function escapeLiteral(value: string): string {
  return value.replace(PATTERN_SPECIALS, "\\$&");
}

/**
 * Build a case-insensitive pattern matching `value` literally
 * @param value - User-supplied text
 * @param mode - "exact" matches the whole field, "contains" any substring
 */
export function literalMatch(value: string, mode: LiteralMatchMode): RegExp {
  const escaped = escapeLiteral(value);
  return new RegExp(mode === "exact" ? `^${escaped}$` : escaped, "i");
}

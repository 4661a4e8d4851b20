/**
 * Single-byte, locale-independent character classes (the "C" locale).
 * Anything outside 7-bit ASCII belongs to none of them.
 */

/** A test on one character. */
export type Predicate = (c: string) => boolean;

const SPACE = new Set([" ", "\t", "\n", "\v", "\f", "\r"]);

/** `0`-`9` */
export function isDigit(c: string): boolean {
  return c.length === 1 && c >= "0" && c <= "9";
}

/** `A`-`Z`, `a`-`z` */
export function isAlpha(c: string): boolean {
  return c.length === 1 && ((c >= "a" && c <= "z") || (c >= "A" && c <= "Z"));
}

export function isAlnum(c: string): boolean {
  return isDigit(c) || isAlpha(c);
}

/** Space, tab, newline, vertical tab, form feed, carriage return. */
export function isSpace(c: string): boolean {
  return SPACE.has(c);
}

/**
 * Primitive parsers: the smallest units, looking at one character at a time.
 */

import { isAlnum, isAlpha, isDigit, isSpace, type Predicate } from "./charclass.js";
import { fail, makeParser, ok } from "./combinators.js";
import { END_OF_INPUT } from "./cursor.js";
import type { Parser } from "./types.js";

/**
 * Consume one character if `predicate` accepts it.
 *
 * Fails with `EndOfInput` when no input is left and `ConditionUnsatisfied`
 * when the predicate rejects the character. Either way the cursor does not
 * move.
 */
export function satisfy(predicate: Predicate): Parser {
  return makeParser((c) => {
    const s = c.current();
    if (s === END_OF_INPUT) return fail("EndOfInput");
    if (!predicate(s)) return fail("ConditionUnsatisfied");
    c.advance();
    return ok(s);
  });
}

/** Match a single specific character. */
export function character(ch: string): Parser {
  return satisfy((s) => s === ch);
}

/** Match any single character except `ch`. */
export function exclude(ch: string): Parser {
  return satisfy((s) => s !== ch);
}

/**
 * Match `s` one character at a time.
 *
 * Not atomic: each matching character is consumed before the next is
 * checked, so on a mismatch the matched prefix stays consumed. Wrap in
 * `back` when that matters.
 */
export function string(s: string): Parser {
  return makeParser((c) => {
    for (let i = 0; i < s.length; i++) {
      if (c.current() !== s.charAt(i)) return fail("ConditionUnsatisfied");
      c.advance();
    }
    return ok(s);
  });
}

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

export const anyChar: Parser = satisfy(() => true);

export const digit: Parser = satisfy(isDigit);

export const alphabet: Parser = satisfy(isAlpha);

export const alphanumeric: Parser = satisfy(isAlnum);

export const whitespace: Parser = satisfy(isSpace);

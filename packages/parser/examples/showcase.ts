/**
 * @seqparse/parser Showcase
 *
 * Self-documenting examples of the combinators. Every `invariant` below holds;
 * running the file prints nothing unless one of them breaks.
 *
 * Run: npx vitest run showcase (the showcase test imports this file)
 */

import { invariant } from "@seqparse/core";

import {
  // Primitive parsers
  satisfy, character, exclude, string,
  anyChar, digit, alphabet, alphanumeric, whitespace,

  // Combinators
  seq, alt, rep, many, ignore, back, peek, lazy,

  // Cursors and errors
  cursor, ParseError,

  // Types
  type Parser,
} from "../src/index.js";

// ============================================================================
// 1. PRIMITIVE PARSERS: One Character at a Time
// ============================================================================

// satisfy: consume one character the predicate accepts
const vowel = satisfy((c) => "aeiou".includes(c));
const v1 = vowel.parse("apple");
invariant(v1.ok && v1.value === "a" && v1.pos === 1, "satisfy consumes one character");

// ...and leave the cursor alone when it rejects
const v2 = vowel.parse("pear");
invariant(!v2.ok && v2.kind === "ConditionUnsatisfied" && v2.pos === 0);

// at the end of input the failure kind says so
const v3 = vowel.parse("");
invariant(!v3.ok && v3.kind === "EndOfInput");

// character / exclude: equality and inequality
invariant(character(",").parse(",").ok);
invariant(exclude('"').parse("x").ok && !exclude('"').parse('"').ok);

// character classes are plain ASCII, whatever the locale
invariant(digit.parse("7").ok && !digit.parse("x").ok);
invariant(alphabet.parse("Q").ok && !alphabet.parse("\u00e9").ok);
invariant(alphanumeric.parse("9").ok && whitespace.parse("\t").ok);
invariant(anyChar.parse("?").ok);

// ============================================================================
// 2. STRINGS: Matched Prefixes Stay Consumed
// ============================================================================

const keyword = string("let");
const k1 = keyword.parse("let x");
invariant(k1.ok && k1.pos === 3);

// "le" matched before "t" failed, so the cursor is at 2
const k2 = keyword.parse("lex");
invariant(!k2.ok && k2.pos === 2, "string is not atomic");

// back makes it all-or-nothing
const k3 = back(keyword).parse("lex");
invariant(!k3.ok && k3.pos === 0, "back restores the cursor");

// ============================================================================
// 3. SEQUENCE, ALTERNATION, REPETITION
// ============================================================================

// seq: concatenate values
const pair = seq(character("("), many(digit), character(")"));
invariant(pair.parseAll("(42)") === "(42)");

// ignore: consume without contributing to the value
const inner = seq(ignore(character("(")), many(digit), ignore(character(")")));
invariant(inner.parseAll("(42)") === "42");

// alt: alternatives share the cursor, with no rewind in between
const sameStart = alt(string("ab"), string("ac"));
invariant(!sameStart.parse("ac").ok, "the first alternative already consumed 'a'");

const rewinding = alt(back(string("ab")), string("ac"));
invariant(rewinding.parseAll("ac") === "ac");

// rep: exactly n times
invariant(rep(3, digit).parseAll("123") === "123");
invariant(!rep(3, digit).parse("12").ok);

// many: zero or more, never fails
invariant(many(digit).parseAll("") === "");

// ============================================================================
// 4. LOOKAHEAD AND RECURSION
// ============================================================================

// peek: look without consuming
const c = cursor("=>");
const arrow = peek(string("=>")).run(c);
invariant(arrow.ok && c.position === 0, "peek never moves the cursor");

// lazy: grammars that refer to themselves
const nested: Parser = lazy(() => many(seq(character("["), nested, character("]"))));
invariant(nested.parseAll("[[][[]]]") === "[[][[]]]");

// ============================================================================
// 5. CHAINING
// ============================================================================

const assignment = alphabet
  .and(alphanumeric.many())
  .and(whitespace.many().ignore())
  .and(character("="))
  .back();
invariant(assignment.parse("x1 =").ok);

// ============================================================================
// 6. ERRORS: Only at the Edges
// ============================================================================

try {
  many(digit).parseAll("12a");
  invariant(false, "leftover input is an error for parseAll");
} catch (e) {
  invariant(e instanceof ParseError && e.offset === 2);
}

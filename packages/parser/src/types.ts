/**
 * Core types for @seqparse/parser
 *
 * Defines the parse result, the failure kinds and the parser interface.
 */

import type { Cursor } from "./cursor.js";

/** Why a parser failed. Combinators only ever look at `ok`, never at the kind. */
export type FailureKind = "EndOfInput" | "ConditionUnsatisfied";

export interface ParseSuccess {
  ok: true;
  value: string;
}

export interface ParseFailure {
  ok: false;
  kind: FailureKind;
}

/**
 * Result of running a parser. The cursor it ran on is the other half of the
 * output: on success it sits past the consumed input, on failure it sits
 * wherever the parser stopped (see {@link Parser}).
 */
export type ParseResult = ParseSuccess | ParseFailure;

/** A {@link ParseResult} paired with the cursor offset afterwards, as returned by `parse`. */
export type ParseReport = ParseResult & { pos: number };

/** The single capability every parser implements. */
export type RunFn = (cursor: Cursor) => ParseResult;

/**
 * A parser: a function of a mutable cursor returning a string value or a failure.
 *
 * Atomic parsers (`satisfy` and everything built directly on it) leave the
 * cursor untouched when they fail. Compound parsers (`seq`, `many`, `rep`,
 * `string` longer than one character) may have consumed input before
 * failing, and that input stays consumed. Only `back` and `peek` put the
 * cursor back.
 *
 * The chaining methods are shorthands for the combinators of the same name.
 */
export interface Parser {
  /** Run against `cursor`, advancing it past whatever is consumed. */
  run(cursor: Cursor): ParseResult;

  /** `seq(this, next)` */
  and(next: Parser): Parser;
  /** `alt(this, alternative)`. No rollback between the two. */
  or(alternative: Parser): Parser;
  /** `many(this)` */
  many(): Parser;
  /** `rep(n, this)` */
  rep(n: number): Parser;
  /** `ignore(this)` */
  ignore(): Parser;
  /** `back(this)` */
  back(): Parser;
  /** `peek(this)` */
  peek(): Parser;
  /** `named(label, this)` */
  named(label: string): Parser;

  /** Run on a fresh cursor over `input`, starting at `offset` (default 0). */
  parse(input: string, offset?: number): ParseReport;
  /** Parse the full input, throwing `ParseError` on failure or leftover input. */
  parseAll(input: string): string;
}

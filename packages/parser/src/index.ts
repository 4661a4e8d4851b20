/**
 * @seqparse/parser
 *
 * Parser combinators over a caller-owned cursor, producing string values.
 *
 * Provides:
 * - Primitive parsers (satisfy, character, string, character classes)
 * - Structural combinators (seq, alt, rep, many, ignore, back, peek)
 * - Builder-style chaining on every parser (`a.and(b).or(c).back()`)
 *
 * @module
 */

// Core types
export type {
  FailureKind,
  ParseSuccess,
  ParseFailure,
  ParseResult,
  ParseReport,
  RunFn,
  Parser,
} from "./types.js";

// Cursors
export { END_OF_INPUT, StringCursor, cursor, offsetOf, type Cursor } from "./cursor.js";

// Errors
export { ParseError, CursorMismatchError } from "./errors.js";

// Character classes
export { isDigit, isAlpha, isAlnum, isSpace, type Predicate } from "./charclass.js";

// Primitive parsers
export {
  satisfy,
  character,
  exclude,
  string,
  anyChar,
  digit,
  alphabet,
  alphanumeric,
  whitespace,
} from "./primitives.js";

// Combinators
export {
  makeParser,
  ok,
  fail,
  seq,
  alt,
  rep,
  many,
  ignore,
  back,
  peek,
  lazy,
  named,
} from "./combinators.js";

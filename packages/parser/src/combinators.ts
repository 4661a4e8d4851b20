/**
 * Structural combinators for @seqparse/parser
 *
 * Every combinator returns a `Parser` built by `makeParser`, so the results
 * compose freely. Failure is a value, never an exception, and only `back`
 * and `peek` restore the cursor. In particular `alt` does NOT rewind before
 * trying the next alternative:
 *
 * ```typescript
 * alt(string("ab"), string("ac")).parse("ac");           // fails: 'a' already consumed
 * alt(back(string("ab")), string("ac")).parse("ac");     // { ok: true, value: "ac", pos: 2 }
 * ```
 */

import { getTracer, invariant, shouldTrace } from "@seqparse/core";
import { cursor, offsetOf } from "./cursor.js";
import { ParseError } from "./errors.js";
import type { FailureKind, ParseResult, Parser, RunFn } from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function ok(value: string): ParseResult {
  return { ok: true, value };
}

export function fail(kind: FailureKind): ParseResult {
  return { ok: false, kind };
}

/** Create a Parser from a raw run function. */
export function makeParser(run: RunFn): Parser {
  const parser: Parser = {
    run,
    and: (next) => seq(parser, next),
    or: (alternative) => alt(parser, alternative),
    many: () => many(parser),
    rep: (n) => rep(n, parser),
    ignore: () => ignore(parser),
    back: () => back(parser),
    peek: () => peek(parser),
    named: (label) => named(label, parser),

    parse(input, offset = 0) {
      const c = cursor(input, offset);
      return { ...run(c), pos: c.position };
    },

    parseAll(input) {
      const c = cursor(input);
      const result = run(c);
      if (!result.ok) {
        throw new ParseError(result.kind, c.position);
      }
      if (!c.atEnd()) {
        throw new ParseError("ConditionUnsatisfied", c.position, "end of input");
      }
      return result.value;
    },
  };
  return parser;
}

// ---------------------------------------------------------------------------
// Sequencing and alternation
// ---------------------------------------------------------------------------

/**
 * Run parsers one after another, concatenating their values.
 *
 * No rollback: if a later parser fails, whatever the earlier ones consumed
 * stays consumed, plus whatever the failing one consumed itself.
 */
export function seq(first: Parser, second: Parser, ...rest: Parser[]): Parser {
  const parsers = [first, second, ...rest];
  return makeParser((c) => {
    let value = "";
    for (const p of parsers) {
      const r = p.run(c);
      if (!r.ok) return r;
      value += r.value;
    }
    return ok(value);
  });
}

/**
 * Ordered alternation: the first alternative that succeeds wins.
 *
 * Each alternative starts from wherever the previous one left the cursor,
 * which is only the original position if that alternative is atomic. Wrap
 * compound alternatives in `back` to try them all from the same place.
 * Fails with the last alternative's failure.
 */
export function alt(first: Parser, second: Parser, ...rest: Parser[]): Parser {
  const others = [second, ...rest];
  return makeParser((c) => {
    let result = first.run(c);
    for (const p of others) {
      if (result.ok) return result;
      result = p.run(c);
    }
    return result;
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Exactly `n` repetitions, concatenated. Fails on the first failing
 * repetition, keeping what the earlier ones consumed.
 */
export function rep(n: number, p: Parser): Parser {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`rep() count must be a non-negative integer, got ${n}`);
  }
  return makeParser((c) => {
    let value = "";
    for (let i = 0; i < n; i++) {
      const r = p.run(c);
      if (!r.ok) return r;
      value += r.value;
    }
    return ok(value);
  });
}

/**
 * Zero or more repetitions, concatenated. Always succeeds.
 *
 * The cursor is not rewound after the final, failing attempt, so `p` should
 * be atomic. `p` must also fail eventually: a parser that succeeds without
 * consuming anything makes this loop forever.
 */
export function many(p: Parser): Parser {
  return makeParser((c) => {
    let value = "";
    for (;;) {
      const r = p.run(c);
      if (!r.ok) return ok(value);
      value += r.value;
    }
  });
}

// ---------------------------------------------------------------------------
// Value suppression, backtracking and lookahead
// ---------------------------------------------------------------------------

/** Run `p` for its consumption only; succeeds with `""`. */
export function ignore(p: Parser): Parser {
  return makeParser((c) => {
    const r = p.run(c);
    return r.ok ? ok("") : r;
  });
}

/** All or nothing: on failure the cursor goes back to where `p` started. */
export function back(p: Parser): Parser {
  return makeParser((c) => {
    const saved = c.snapshot();
    const r = p.run(c);
    if (!r.ok) c.restore(saved);
    return r;
  });
}

/** Zero-width lookahead: reports what `p` would do, then puts the cursor back. */
export function peek(p: Parser): Parser {
  return makeParser((c) => {
    const saved = c.snapshot();
    const r = p.run(c);
    c.restore(saved);
    return r;
  });
}

// ---------------------------------------------------------------------------
// Plumbing
// ---------------------------------------------------------------------------

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy(f: () => Parser): Parser {
  let cached: Parser | null = null;
  return makeParser((c) => {
    if (!cached) cached = f();
    return cached.run(c);
  });
}

/**
 * Label `p` for trace logging. With `trace.enabled` set, each invocation
 * logs its start and outcome; otherwise this behaves exactly like `p`.
 * An exception from `p` is logged as `threw` and propagates.
 */
export function named(label: string, p: Parser): Parser {
  invariant(label.length > 0, "Parser label must not be empty");
  return makeParser((c) => {
    if (!shouldTrace(label)) return p.run(c);

    const tracer = getTracer();
    tracer.enter(label, offsetOf(c));
    let outcome = "threw";
    try {
      const r = p.run(c);
      outcome = r.ok ? `ok ${JSON.stringify(r.value)}` : `fail ${r.kind}`;
      return r;
    } finally {
      tracer.exit(label, outcome, offsetOf(c));
    }
  });
}

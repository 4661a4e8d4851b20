import { describe, it, expect, vi } from "vitest";
import {
  alphabet,
  alphanumeric,
  alt,
  anyChar,
  back,
  character,
  cursor,
  digit,
  ignore,
  lazy,
  many,
  peek,
  rep,
  seq,
  string,
  whitespace,
  ParseError,
} from "../index.js";
import type { Parser } from "../types.js";

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

describe("seq", () => {
  it("concatenates the values of its parsers", () => {
    expect(seq(string("ab"), string("cd")).parse("abcdx")).toEqual({
      ok: true,
      value: "abcd",
      pos: 4,
    });
  });

  it("keeps what the first parser consumed when it fails", () => {
    expect(seq(string("ab"), string("cd")).parse("aXcd")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 1,
    });
  });

  it("keeps what both parsers consumed when the second fails", () => {
    expect(seq(string("ab"), string("cd")).parse("abcX")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 3,
    });
  });

  it("takes any number of parsers", () => {
    const p = seq(character("("), many(digit), character(")"));
    expect(p.parse("(42)")).toEqual({ ok: true, value: "(42)", pos: 4 });
  });

  it("drops ignored values from the result", () => {
    const quoted = seq(ignore(character('"')), many(alphanumeric), ignore(character('"')));
    expect(quoted.parse('"abc"')).toEqual({ ok: true, value: "abc", pos: 5 });
  });
});

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

describe("alt", () => {
  it("tries each alternative in turn on a shared cursor", () => {
    const p = alt(string("abc"), string("def"));
    const c = cursor("abcdef");

    expect(p.run(c)).toEqual({ ok: true, value: "abc" });
    expect(c.position).toBe(3);

    expect(p.run(c)).toEqual({ ok: true, value: "def" });
    expect(c.position).toBe(6);

    expect(p.run(c).ok).toBe(false);
  });

  it("returns the first match (ordered)", () => {
    expect(alt(string("a"), string("ab")).parse("ab")).toEqual({ ok: true, value: "a", pos: 1 });
  });

  it("fails with the last alternative's failure", () => {
    expect(alt(string("x"), character("y")).parse("")).toEqual({
      ok: false,
      kind: "EndOfInput",
      pos: 0,
    });
  });

  it("takes any number of alternatives", () => {
    const p = alt(character("a"), character("b"), character("c"));
    expect(p.parse("c")).toEqual({ ok: true, value: "c", pos: 1 });
  });

  it("does not rewind between alternatives", () => {
    // "a" is consumed by the first alternative, so the second starts at "c".
    expect(alt(string("ab"), string("ac")).parse("ac")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 1,
    });
  });

  it("tries both alternatives from the start when the first is wrapped in back", () => {
    expect(alt(back(string("ab")), string("ac")).parse("ac")).toEqual({
      ok: true,
      value: "ac",
      pos: 2,
    });
  });
});

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

describe("rep", () => {
  it("runs the parser exactly n times", () => {
    const p = rep(2, anyChar);
    const c = cursor("abc");

    expect(p.run(c)).toEqual({ ok: true, value: "ab" });
    expect(c.position).toBe(2);
  });

  it("keeps the consumed repetitions when a later one fails", () => {
    const p = rep(2, anyChar);
    const c = cursor("abc", 2);

    expect(p.run(c)).toEqual({ ok: false, kind: "EndOfInput" });
    expect(c.position).toBe(3);
  });

  it("concatenates the individual results in order", () => {
    expect(rep(3, alt(digit, alphabet)).parse("a1bX")).toEqual({
      ok: true,
      value: "a1b",
      pos: 3,
    });
  });

  it("succeeds with an empty string for zero repetitions", () => {
    expect(rep(0, digit).parse("abc")).toEqual({ ok: true, value: "", pos: 0 });
  });

  it("fails when there are fewer than n matches", () => {
    expect(rep(3, digit).parse("12a")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 2,
    });
  });

  it("rejects negative and fractional counts", () => {
    expect(() => rep(-1, digit)).toThrow(RangeError);
    expect(() => rep(1.5, digit)).toThrow(RangeError);
  });
});

describe("many", () => {
  it("collects matches until the parser fails", () => {
    expect(many(digit).parse("123abc")).toEqual({ ok: true, value: "123", pos: 3 });
  });

  it("succeeds with an empty string when the first attempt fails", () => {
    expect(many(digit).parse("abc")).toEqual({ ok: true, value: "", pos: 0 });
    expect(many(digit).parse("")).toEqual({ ok: true, value: "", pos: 0 });
  });

  it("does not rewind after a compound parser fails part way", () => {
    // The third "ab" attempt consumes the final "a" before failing on "c".
    expect(many(string("ab")).parse("ababac")).toEqual({ ok: true, value: "abab", pos: 5 });
  });

  it("stops cleanly when the repeated parser is wrapped in back", () => {
    expect(many(back(string("ab"))).parse("ababac")).toEqual({
      ok: true,
      value: "abab",
      pos: 4,
    });
  });
});

// ---------------------------------------------------------------------------
// Suppression, backtracking and lookahead
// ---------------------------------------------------------------------------

describe("ignore", () => {
  it("consumes input but yields an empty string", () => {
    expect(ignore(string("abc")).parse("abcd")).toEqual({ ok: true, value: "", pos: 3 });
  });

  it("propagates failure unchanged", () => {
    expect(ignore(string("abc")).parse("abx")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 2,
    });
  });
});

describe("back", () => {
  it("restores the cursor when the parser fails", () => {
    expect(back(string("abc")).parse("abx")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 0,
    });
  });

  it("restores to the starting offset, not to zero", () => {
    expect(back(string("abc")).parse("xxabx", 2)).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 2,
    });
  });

  it("passes success through", () => {
    expect(back(string("abc")).parse("abcd")).toEqual({ ok: true, value: "abc", pos: 3 });
  });

  it("fails exactly when the wrapped parser does, leaving the cursor where it started", () => {
    const parsers: Parser[] = [
      seq(string("abc"), many(whitespace), string("=")),
      rep(3, anyChar),
      string("hello"),
    ];
    const inputs = ["abc  x", "ab", "hel", "abc =", "hello", ""];

    for (const p of parsers) {
      for (const input of inputs) {
        const direct = p.parse(input);
        const wrapped = back(p).parse(input);
        if (direct.ok) {
          expect(wrapped).toEqual(direct);
        } else {
          expect(wrapped).toEqual({ ok: false, kind: direct.kind, pos: 0 });
        }
      }
    }
  });
});

describe("peek", () => {
  it("reports success without consuming", () => {
    expect(peek(string("abc")).parse("abcd")).toEqual({ ok: true, value: "abc", pos: 0 });
  });

  it("reports failure without consuming", () => {
    expect(peek(string("abc")).parse("abx")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 0,
    });
  });

  it("leaves the cursor equal to where it started", () => {
    const c = cursor("abc");
    const before = c.snapshot();

    peek(rep(2, anyChar)).run(c);
    expect(c.equals(before)).toBe(true);

    peek(rep(5, anyChar)).run(c);
    expect(c.equals(before)).toBe(true);
  });

  it("works as zero-width lookahead inside a sequence", () => {
    expect(seq(peek(character("a")), anyChar).parse("ab")).toEqual({
      ok: true,
      value: "aa",
      pos: 1,
    });
  });
});

// ---------------------------------------------------------------------------
// lazy
// ---------------------------------------------------------------------------

describe("lazy", () => {
  it("supports recursive grammars", () => {
    const parens: Parser = lazy(() => many(seq(character("("), parens, character(")"))));
    expect(parens.parse("(()())")).toEqual({ ok: true, value: "(()())", pos: 6 });
  });

  it("builds the parser once, on first use", () => {
    const factory = vi.fn(() => digit);
    const p = lazy(factory);
    expect(factory).not.toHaveBeenCalled();

    p.parse("1");
    p.parse("2");
    expect(factory).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Chaining
// ---------------------------------------------------------------------------

describe("chaining methods", () => {
  it("mirror the combinator functions", () => {
    expect(digit.or(alphabet).many().parse("a1-")).toEqual({ ok: true, value: "a1", pos: 2 });
    expect(anyChar.rep(2).parse("abc")).toEqual({ ok: true, value: "ab", pos: 2 });
    expect(character("x").ignore().parse("x")).toEqual({ ok: true, value: "", pos: 1 });
    expect(string("ab").peek().parse("ab")).toEqual({ ok: true, value: "ab", pos: 0 });
  });

  it("compose into a backtracking label parser", () => {
    const label = string("KEY").and(whitespace.many()).and(string("=")).back();

    expect(label.parse("KEY =1")).toEqual({ ok: true, value: "KEY =", pos: 5 });
    expect(label.parse("KEY :1")).toEqual({
      ok: false,
      kind: "ConditionUnsatisfied",
      pos: 0,
    });
  });

  it("share the no-rewind behavior of alt", () => {
    expect(string("ab").or(string("ac")).parse("ac").ok).toBe(false);
    expect(string("ab").back().or(string("ac")).parse("ac").ok).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

describe("parseAll", () => {
  it("returns the value when the whole input is consumed", () => {
    expect(many(digit).parseAll("123")).toBe("123");
  });

  it("throws when input remains", () => {
    expect(() => many(digit).parseAll("12a")).toThrow(
      "Parse failed: condition not satisfied at offset 2 (expected end of input)"
    );
  });

  it("throws a ParseError carrying the failure kind and offset", () => {
    let caught: unknown;
    try {
      string("abc").parseAll("ab");
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(ParseError);
    if (caught instanceof ParseError) {
      expect(caught.name).toBe("ParseError");
      expect(caught.kind).toBe("ConditionUnsatisfied");
      expect(caught.offset).toBe(2);
      expect(caught.message).toBe("Parse failed: condition not satisfied at offset 2");
    }
  });

  it("reports end of input", () => {
    expect(() => anyChar.parseAll("")).toThrow("Parse failed: end of input reached at offset 0");
  });
});

describe("parse", () => {
  it("rejects an offset past the end of the input", () => {
    expect(() => digit.parse("12", 5)).toThrow(RangeError);
  });
});

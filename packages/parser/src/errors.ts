import { unreachable } from "@seqparse/core";
import type { FailureKind } from "./types.js";

function describeFailure(kind: FailureKind): string {
  switch (kind) {
    case "EndOfInput":
      return "end of input reached";
    case "ConditionUnsatisfied":
      return "condition not satisfied";
    default:
      return unreachable(kind);
  }
}

/**
 * Thrown by the entry points that turn a failed {@link ParseResult} into an
 * exception (`parseAll`, client grammars). Parsers themselves never throw it.
 */
export class ParseError extends Error {
  /** Why the parser failed. */
  readonly kind: FailureKind;
  /** Zero-based offset of the cursor when the failure was reported, if known. */
  readonly offset: number | undefined;
  /** What was expected instead, if the caller said. */
  readonly expected: string | undefined;

  constructor(kind: FailureKind, offset?: number, expected?: string) {
    let message = `Parse failed: ${describeFailure(kind)}`;
    if (offset !== undefined) message += ` at offset ${offset}`;
    if (expected !== undefined) message += ` (expected ${expected})`;
    super(message);
    this.name = "ParseError";
    this.kind = kind;
    this.offset = offset;
    this.expected = expected;
  }
}

/** A cursor was asked to restore or compare with a cursor over different input. */
export class CursorMismatchError extends Error {
  constructor(message = "Cursor snapshot does not belong to this input") {
    super(message);
    this.name = "CursorMismatchError";
  }
}

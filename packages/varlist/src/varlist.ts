/**
 * Reader for labelled variable lists such as
 *
 * ```
 * VARIABLES= "var1", "var2" ,"var3" , "var4"
 * ```
 *
 * Built entirely from @seqparse/parser combinators. `label` and `item` are
 * wrapped in `back`, so a failed attempt never leaves the cursor part way
 * through a token.
 */

import {
  alphanumeric,
  back,
  cursor,
  ignore,
  many,
  named,
  seq,
  string,
  whitespace,
  ParseError,
  type Cursor,
} from "@seqparse/parser";

/** `VARIABLES`, optional whitespace, `=`, optional whitespace. Yields the text as written. */
export const label = named(
  "label",
  back(seq(string("VARIABLES"), many(whitespace), string("="), many(whitespace)))
);

const separator = ignore(seq(many(whitespace), many(string(",")), many(whitespace)));

/** One double-quoted alphanumeric name plus any following separator. Yields the bare name. */
export const item = named(
  "item",
  back(seq(ignore(string('"')), many(alphanumeric), ignore(string('"')), separator))
);

export interface VariableList {
  /** The label exactly as written, including its whitespace. */
  label: string;
  variables: string[];
}

/** Read items from `c` until one fails, leaving `c` after the last good item. */
export function readVariables(c: Cursor): string[] {
  const variables: string[] = [];
  for (;;) {
    const r = item.run(c);
    if (!r.ok) return variables;
    variables.push(r.value);
  }
}

/**
 * Parse a complete variable list.
 *
 * @throws ParseError if the label is missing or anything but items follows it
 */
export function parseVariableList(text: string): VariableList {
  const c = cursor(text);

  const head = label.run(c);
  if (!head.ok) {
    throw new ParseError(head.kind, c.position, "VARIABLES=");
  }

  const variables = readVariables(c);
  if (!c.atEnd()) {
    throw new ParseError("ConditionUnsatisfied", c.position, "a quoted variable name");
  }

  return { label: head.value, variables };
}

/**
 * Cursors: positions over a character sequence the caller owns.
 *
 * Parsers only ever read the current character, step forward, and take or
 * restore snapshots; nothing here holds on to the text beyond a reference.
 */

import { CursorMismatchError } from "./errors.js";

/** Read from a cursor with no input left. A NUL in the input reads the same way. */
export const END_OF_INPUT = "\0";

export interface Cursor {
  /** The current character, or {@link END_OF_INPUT}. Does not consume. */
  current(): string;
  /** Move to the next character. No-op at the end. */
  advance(): void;
  /** An independent copy at the same position. */
  snapshot(): Cursor;
  /** Move back (or forward) to the position of a snapshot taken from this cursor. */
  restore(snapshot: Cursor): void;
  /** Same input, same position. */
  equals(other: Cursor): boolean;
}

/** A cursor over an in-memory string, one UTF-16 code unit per character. */
export class StringCursor implements Cursor {
  readonly source: string;
  private offset: number;

  constructor(source: string, offset = 0) {
    if (!Number.isInteger(offset) || offset < 0 || offset > source.length) {
      throw new RangeError(`Cursor offset ${offset} is outside 0..${source.length}`);
    }
    this.source = source;
    this.offset = offset;
  }

  /** Zero-based offset into `source`. */
  get position(): number {
    return this.offset;
  }

  atEnd(): boolean {
    return this.offset >= this.source.length;
  }

  current(): string {
    return this.atEnd() ? END_OF_INPUT : this.source.charAt(this.offset);
  }

  advance(): void {
    if (!this.atEnd()) this.offset++;
  }

  snapshot(): StringCursor {
    return new StringCursor(this.source, this.offset);
  }

  restore(snapshot: Cursor): void {
    if (!(snapshot instanceof StringCursor) || snapshot.source !== this.source) {
      throw new CursorMismatchError();
    }
    this.offset = snapshot.offset;
  }

  equals(other: Cursor): boolean {
    return (
      other instanceof StringCursor && other.source === this.source && other.offset === this.offset
    );
  }
}

/** Create a cursor over `text`, positioned at `offset`. */
export function cursor(text: string, offset = 0): StringCursor {
  return new StringCursor(text, offset);
}

/** The offset of `c` when it is a {@link StringCursor}; other cursors are opaque. */
export function offsetOf(c: Cursor): number | undefined {
  return c instanceof StringCursor ? c.position : undefined;
}

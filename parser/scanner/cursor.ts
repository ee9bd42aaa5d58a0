import {
  describeCharacter,
  equalsIgnoreAsciiCase,
  isAlphaNumeric,
  isControlCharacter,
  isHtmlWhiteSpace
} from './character-codes.js';
import { ParseFailure } from '../parse-error.js';
import { ParseErrorCode } from '../parser-interfaces.js';

export interface Cursor {
  /** The whole source text. */
  readonly text: string;

  /** Current offset into the source. Only ever moves forward. */
  readonly offset: number;

  isAtEnd(): boolean;

  /** Code unit at the offset, or undefined at the end of the document. */
  current(): number | undefined;

  /** Code unit `distance` units past the offset, or undefined past the end. */
  peek(distance: number): number | undefined;

  /** True when the remaining input starts with `literal`. */
  nextMatch(literal: string): boolean;

  /** Like nextMatch, folding ASCII case. */
  nextMatchIgnoreCase(literal: string, distance?: number): boolean;

  advance(): void;
  advanceBy(count: number): void;

  /** Advances over space, LF, CR, TAB and form feed. */
  skipWhiteSpace(): void;

  /**
   * Consumes a non-empty run of ASCII letters and digits.
   * `what` names the expected construct in the failure message.
   */
  consumeAlphaNumeric(what: string): string | ParseFailure;

  /** Source text from `start` up to the offset. */
  sliceFrom(start: number): string;

  /** The current character as it appears in error messages. */
  describeCurrent(): string;

  /** Fails unless the current code unit is `expected`; does not advance. */
  expect(what: string, expected: number): ParseFailure | undefined;

  /** Builds a failure at the current offset. */
  fail(code: ParseErrorCode, message: string): ParseFailure;
}

export function createCursor(text: string): Cursor {
  let pos = 0;
  const end = text.length;

  function isAtEnd(): boolean {
    return pos >= end;
  }

  function current(): number | undefined {
    return pos < end ? text.charCodeAt(pos) : undefined;
  }

  function peek(distance: number): number | undefined {
    const index = pos + distance;
    return index < end ? text.charCodeAt(index) : undefined;
  }

  function nextMatch(literal: string): boolean {
    return text.startsWith(literal, pos);
  }

  function nextMatchIgnoreCase(literal: string, distance = 0): boolean {
    const start = pos + distance;
    if (start + literal.length > end) return false;
    return equalsIgnoreAsciiCase(text.slice(start, start + literal.length), literal);
  }

  function advance(): void {
    pos++;
  }

  function advanceBy(count: number): void {
    pos += count;
  }

  function skipWhiteSpace(): void {
    while (pos < end && isHtmlWhiteSpace(text.charCodeAt(pos))) {
      pos++;
    }
  }

  function describeCurrent(): string {
    return describeCharacter(pos < end ? text.codePointAt(pos) : undefined);
  }

  function fail(code: ParseErrorCode, message: string): ParseFailure {
    return new ParseFailure(code, message, pos);
  }

  // classifies whatever was found instead of the expected character
  function unexpectedCode(): ParseErrorCode {
    if (pos >= end) return ParseErrorCode.UNEXPECTED_END_OF_FILE;
    if (isControlCharacter(text.charCodeAt(pos))) return ParseErrorCode.INVALID_CONTROL_CHARACTER;
    return ParseErrorCode.UNEXPECTED_CHARACTER;
  }

  function consumeAlphaNumeric(what: string): string | ParseFailure {
    const start = pos;
    while (pos < end && isAlphaNumeric(text.charCodeAt(pos))) {
      pos++;
    }
    if (pos === start) {
      return fail(unexpectedCode(), `Expected ${what}, found '${describeCurrent()}'`);
    }
    return text.slice(start, pos);
  }

  function sliceFrom(start: number): string {
    return text.slice(start, pos);
  }

  function expect(what: string, expected: number): ParseFailure | undefined {
    if (current() === expected) return undefined;
    return fail(
      unexpectedCode(),
      `Expected ${what} '${String.fromCharCode(expected)}', found '${describeCurrent()}'`
    );
  }

  return {
    text,
    get offset() {
      return pos;
    },
    isAtEnd,
    current,
    peek,
    nextMatch,
    nextMatchIgnoreCase,
    advance,
    advanceBy,
    skipWhiteSpace,
    consumeAlphaNumeric,
    sliceFrom,
    describeCurrent,
    expect,
    fail
  };
}

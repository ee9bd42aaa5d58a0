import { ParseErrorCode } from './parser-interfaces.js';
import { createPositionMapper } from './position-mapper.js';

/**
 * Failure value returned up the production chain.
 * Productions return it instead of throwing; the first one aborts the parse.
 */
export class ParseFailure {
  constructor(
    readonly code: ParseErrorCode,
    readonly message: string,
    /** Offset in the source where the production gave up */
    readonly offset: number
  ) {}
}

/**
 * A parse failure mapped back to a 1-based line and column of the source.
 */
export class ParseError extends Error {
  readonly code: ParseErrorCode;
  /** Offset in the source string where the problem was detected. */
  readonly offset: number;
  /** 1-based line number. */
  readonly line: number;
  /** 1-based column number. */
  readonly column: number;

  constructor(code: ParseErrorCode, message: string, offset: number, line: number, column: number) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
    this.offset = offset;
    this.line = line;
    this.column = column;
  }

  lineAndColumn(): [line: number, column: number] {
    return [this.line, this.column];
  }

  override toString(): string {
    return `[${this.line}:${this.column}] ${this.message}`;
  }
}

export function createParseError(failure: ParseFailure, source: string): ParseError {
  const { line, column } = createPositionMapper(source).offsetToPosition(failure.offset);
  return new ParseError(failure.code, failure.message, failure.offset, line, column);
}

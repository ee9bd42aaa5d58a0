/**
 * Parser Interfaces and Types
 *
 * Core interfaces for the strict HTML parser.
 */

import type { Document } from './ast-types.js';
import type { ParseError } from './parse-error.js';

/**
 * Parse error codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  /** A specific delimiter was required and something else was found */
  UNEXPECTED_CHARACTER = 'unexpected-character',
  UNEXPECTED_END_OF_FILE = 'unexpected-end-of-file',
  INVALID_CONTROL_CHARACTER = 'invalid-control-character',
  MISMATCHED_CLOSING_TAG = 'mismatched-closing-tag',
  UNCLOSED_ELEMENT = 'unclosed-element',
  UNTERMINATED_COMMENT = 'unterminated-comment',
  UNTERMINATED_DOCTYPE = 'unterminated-doctype',
  UNTERMINATED_FOREIGN_CONTENT = 'unterminated-foreign-content',
  DUPLICATE_ATTRIBUTE = 'duplicate-attribute',
  MALFORMED_COMMENT = 'malformed-comment',
  EXPECTED_DOCTYPE_OR_COMMENT = 'expected-doctype-or-comment',
  DOCUMENT_TOO_LARGE = 'document-too-large',
  NESTING_TOO_DEEP = 'nesting-too-deep'
}

/**
 * Parser creation options
 */
export interface ParserOptions {
  /** Maximum document size to parse, in UTF-16 code units (default: 10MB) */
  maxDocumentSize?: number;

  /** Maximum number of nested elements (default: 1000) */
  maxDepth?: number;

  /** Called with the error whenever a parse fails */
  onDiagnostic?: (error: ParseError) => void;
}

interface ParseResultBase {
  /** Source text that was parsed */
  sourceText: string;

  /** Parse time in milliseconds */
  parseTime: number;
}

/**
 * Result of a parse operation: a complete document, or the first error
 */
export type ParseResult =
  | ParseResultBase & { ok: true; document: Document }
  | ParseResultBase & { ok: false; error: ParseError };

/**
 * Main parser interface
 */
export interface Parser {
  /**
   * Parse a complete document from text
   */
  parseDocument(text: string): ParseResult;
}

/**
 * Position mapping utilities for editor integration
 */
export interface PositionMapper {
  /** Convert offset to a 1-based line/column position */
  offsetToPosition(offset: number): { line: number; column: number };

  /** Convert a 1-based line/column position to an offset */
  positionToOffset(line: number, column: number): number;

  /** Get precomputed line starts array */
  getLineStarts(): readonly number[];

  /** Get total number of lines */
  getLineCount(): number;
}

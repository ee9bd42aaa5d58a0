/**
 * Core Parser Implementation
 *
 * Single-pass recursive descent over a Cursor. Each production either
 * commits forward or returns a ParseFailure; there is no backtracking
 * and the first failure ends the parse.
 */

import {
  ParseErrorCode,
  type Parser,
  type ParserOptions,
  type ParseResult
} from './parser-interfaces.js';

import {
  isForeignElement,
  isVoidElement,
  type Attribute,
  type CommentNode,
  type Document,
  type DoctypeNode,
  type ElementNode,
  type ForeignNode,
  type HtmlNode,
  type TextNode
} from './ast-types.js';

import {
  createAttribute,
  createCommentNode,
  createDocumentNode,
  createDoctypeNode,
  createElementNode,
  createForeignNode,
  createTextNode
} from './ast-factory.js';

import {
  CharacterCodes,
  equalsIgnoreAsciiCase,
  isAttributeNameTerminator,
  isControlCharacter,
  isUnquotedValueTerminator
} from './scanner/character-codes.js';
import { createCursor, type Cursor } from './scanner/cursor.js';
import { ParseFailure, createParseError } from './parse-error.js';

const DEFAULT_MAX_DOCUMENT_SIZE = 10 * 1024 * 1024;
const DEFAULT_MAX_DEPTH = 1000;

/** Returned by the doctype production when `<!` is not followed by DOCTYPE. */
const NOT_A_DOCTYPE = Symbol('not-a-doctype');

/**
 * Core parser implementation class
 */
class CoreParser implements Parser {
  private readonly maxDocumentSize: number;
  private readonly maxDepth: number;
  private readonly onDiagnostic: ParserOptions['onDiagnostic'];

  /** Elements currently open */
  private depth = 0;

  constructor(options?: ParserOptions) {
    this.maxDocumentSize = options?.maxDocumentSize ?? DEFAULT_MAX_DOCUMENT_SIZE;
    this.maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.onDiagnostic = options?.onDiagnostic;
  }

  parseDocument(text: string): ParseResult {
    const startTime = performance.now();
    this.depth = 0;

    const outcome = text.length > this.maxDocumentSize
      ? new ParseFailure(
          ParseErrorCode.DOCUMENT_TOO_LARGE,
          `Document is ${text.length} characters long, limit is ${this.maxDocumentSize}`,
          0)
      : this.parseDocumentRoot(createCursor(text));

    const parseTime = performance.now() - startTime;

    if (outcome instanceof ParseFailure) {
      const error = createParseError(outcome, text);
      this.onDiagnostic?.(error);
      return { ok: false, error, parseTime, sourceText: text };
    }

    return { ok: true, document: outcome, parseTime, sourceText: text };
  }

  /**
   * Parse the document root: strict nodes until end of input
   */
  private parseDocumentRoot(cursor: Cursor): Document | ParseFailure {
    const children: HtmlNode[] = [];

    cursor.skipWhiteSpace();
    while (!cursor.isAtEnd()) {
      const node = this.parseStrictNode(cursor);
      if (node instanceof ParseFailure) return node;
      children.push(node);
      cursor.skipWhiteSpace();
    }

    return createDocumentNode(0, cursor.text.length, children);
  }

  /**
   * Parse any node other than text: doctype, comment or element
   */
  private parseStrictNode(cursor: Cursor): HtmlNode | ParseFailure {
    cursor.skipWhiteSpace();

    const notANode = cursor.expect('start of a node', CharacterCodes.lessThan);
    if (notANode) return notANode;

    switch (cursor.peek(1)) {
      case undefined:
        return cursor.fail(ParseErrorCode.UNEXPECTED_END_OF_FILE, 'Expected something after start of node');

      case CharacterCodes.exclamation: {
        if (cursor.peek(2) === CharacterCodes.minus) {
          return this.parseComment(cursor);
        }
        const doctype = this.parseDoctypeDeclaration(cursor);
        if (doctype === NOT_A_DOCTYPE) {
          return cursor.fail(ParseErrorCode.EXPECTED_DOCTYPE_OR_COMMENT, 'Expected doctype declaration or comment');
        }
        return doctype;
      }

      default:
        return this.parseElement(cursor);
    }
  }

  /**
   * Parse any node, text included
   */
  private parseNode(cursor: Cursor): HtmlNode | ParseFailure {
    if (cursor.current() !== CharacterCodes.lessThan) {
      const text = this.parseText(cursor);
      // the text run stopped at a control character before consuming anything
      if (text.pos === text.end) {
        return cursor.fail(
          ParseErrorCode.INVALID_CONTROL_CHARACTER,
          `Unexpected control character ${cursor.describeCurrent()}`);
      }
      return text;
    }

    return this.parseStrictNode(cursor);
  }

  /**
   * Parse an element, failing instead of recursing past maxDepth
   */
  private parseElement(cursor: Cursor): ElementNode | ParseFailure {
    if (this.depth >= this.maxDepth) {
      return cursor.fail(
        ParseErrorCode.NESTING_TOO_DEEP,
        `Elements are nested more than ${this.maxDepth} deep`);
    }

    this.depth++;
    const element = this.parseElementContent(cursor);
    this.depth--;
    return element;
  }

  /**
   * Parse an element, its attributes, children and closing tag
   */
  private parseElementContent(cursor: Cursor): ElementNode | ParseFailure {
    const start = cursor.offset;
    cursor.advance(); // consume <

    const name = cursor.consumeAlphaNumeric('tag name');
    if (name instanceof ParseFailure) return name;

    cursor.skipWhiteSpace();

    const attributes: Attribute[] = [];
    while (cursor.current() !== CharacterCodes.greaterThan && cursor.current() !== CharacterCodes.slash) {
      const attribute = this.parseAttribute(cursor);
      if (attribute instanceof ParseFailure) return attribute;

      if (attributes.some(existing => existing.name === attribute.name)) {
        return cursor.fail(
          ParseErrorCode.DUPLICATE_ATTRIBUTE,
          `Element has two attributes with the same name '${attribute.name}'`);
      }

      attributes.push(attribute);
      cursor.skipWhiteSpace();
    }

    if (isVoidElement(name)) {
      if (cursor.current() === CharacterCodes.slash) {
        cursor.advance();
      }
      const unclosedVoid = cursor.expect('end of opening tag', CharacterCodes.greaterThan);
      if (unclosedVoid) return unclosedVoid;
      cursor.advance();

      return createElementNode(start, cursor.offset, name, attributes);
    }

    // only void elements may self-close
    const unclosed = cursor.expect('end of opening tag', CharacterCodes.greaterThan);
    if (unclosed) return unclosed;
    cursor.advance();

    const children: HtmlNode[] = [];
    if (isForeignElement(name)) {
      const foreign = this.parseForeignText(cursor, name);
      if (foreign instanceof ParseFailure) return foreign;
      children.push(foreign);
    } else {
      while (!cursor.nextMatch('</')) {
        if (cursor.current() === undefined || cursor.peek(1) === undefined) {
          return cursor.fail(ParseErrorCode.UNCLOSED_ELEMENT, `Expected matching closing tag for ${name}`);
        }
        const child = this.parseNode(cursor);
        if (child instanceof ParseFailure) return child;
        children.push(child);
      }
    }

    cursor.advanceBy(2); // consume </

    const closingName = cursor.consumeAlphaNumeric('closing tag name');
    if (closingName instanceof ParseFailure) return closingName;

    if (!equalsIgnoreAsciiCase(closingName, name)) {
      return cursor.fail(
        ParseErrorCode.MISMATCHED_CLOSING_TAG,
        `Mismatched closing tag: Expected '${name}', found '${closingName}'`);
    }

    cursor.skipWhiteSpace();
    const unterminated = cursor.expect('end of closing tag', CharacterCodes.greaterThan);
    if (unterminated) return unterminated;
    cursor.advance();

    return createElementNode(start, cursor.offset, name, attributes, children);
  }

  /**
   * Parse a single attribute: name, then an optional quoted or unquoted value
   */
  private parseAttribute(cursor: Cursor): Attribute | ParseFailure {
    const start = cursor.offset;

    let ch = cursor.current();
    while (ch !== undefined && !isAttributeNameTerminator(ch)) {
      cursor.advance();
      ch = cursor.current();
    }

    if (ch !== undefined && isControlCharacter(ch)) {
      return cursor.fail(
        ParseErrorCode.INVALID_CONTROL_CHARACTER,
        `Unexpected control character ${cursor.describeCurrent()}`);
    }

    const name = cursor.sliceFrom(start);
    if (!name.length) {
      return cursor.fail(
        ch === undefined ? ParseErrorCode.UNEXPECTED_END_OF_FILE : ParseErrorCode.UNEXPECTED_CHARACTER,
        `Expected attribute name, found '${cursor.describeCurrent()}'`);
    }
    const nameEnd = cursor.offset;

    cursor.skipWhiteSpace();
    if (cursor.isAtEnd()) {
      return cursor.fail(ParseErrorCode.UNEXPECTED_END_OF_FILE, 'Expected something after attribute name');
    }

    if (cursor.current() !== CharacterCodes.equals) {
      return createAttribute(start, nameEnd, name);
    }

    cursor.advance(); // consume =

    const quote = cursor.current();
    if (quote === undefined) {
      return cursor.fail(ParseErrorCode.UNEXPECTED_END_OF_FILE, 'Expected attribute value after =');
    }

    if (quote === CharacterCodes.singleQuote || quote === CharacterCodes.doubleQuote) {
      cursor.advance(); // consume opening quote
      const valueStart = cursor.offset;

      ch = cursor.current();
      while (ch !== undefined && ch !== quote && !isControlCharacter(ch)) {
        cursor.advance();
        ch = cursor.current();
      }

      const unterminated = cursor.expect('value-ending quote', quote);
      if (unterminated) return unterminated;

      const value = cursor.sliceFrom(valueStart);
      cursor.advance(); // consume closing quote
      return createAttribute(start, cursor.offset, name, value);
    }

    const valueStart = cursor.offset;
    ch = cursor.current();
    while (ch !== undefined && !isUnquotedValueTerminator(ch)) {
      cursor.advance();
      ch = cursor.current();
    }

    return createAttribute(start, cursor.offset, name, cursor.sliceFrom(valueStart));
  }

  /**
   * Parse text up to the next '<' or control character; may be empty
   */
  private parseText(cursor: Cursor): TextNode {
    const start = cursor.offset;

    let ch = cursor.current();
    while (ch !== undefined && ch !== CharacterCodes.lessThan && !isControlCharacter(ch)) {
      cursor.advance();
      ch = cursor.current();
    }

    return createTextNode(start, cursor.offset, cursor.sliceFrom(start));
  }

  /**
   * Capture everything up to `</name`, compared ignoring ASCII case.
   * The closing `</` is left for the element to consume.
   */
  private parseForeignText(cursor: Cursor, elementName: string): ForeignNode | ParseFailure {
    const start = cursor.offset;

    while (!cursor.isAtEnd()) {
      if (cursor.nextMatch('</') && cursor.nextMatchIgnoreCase(elementName, 2)) {
        break;
      }
      cursor.advance();
    }

    if (cursor.isAtEnd()) {
      return cursor.fail(ParseErrorCode.UNTERMINATED_FOREIGN_CONTENT, `Expected closing tag </${elementName}>`);
    }

    return createForeignNode(start, cursor.offset, cursor.sliceFrom(start));
  }

  /**
   * Parse a comment: <!-- text -->
   */
  private parseComment(cursor: Cursor): CommentNode | ParseFailure {
    const start = cursor.offset;

    cursor.advanceBy(3); // consume <!-
    const missingDash = cursor.expect('second - in comment declaration', CharacterCodes.minus);
    if (missingDash) return missingDash;
    cursor.advance();

    const contentStart = cursor.offset;

    if (cursor.current() === CharacterCodes.greaterThan || cursor.current() === CharacterCodes.minus) {
      return cursor.fail(ParseErrorCode.MALFORMED_COMMENT, "Comments may not start with '>' or '-'");
    }

    while (!cursor.isAtEnd()) {
      if (cursor.nextMatch('--')) {
        if (cursor.peek(2) === CharacterCodes.greaterThan) break;
        return cursor.fail(ParseErrorCode.MALFORMED_COMMENT, "Comments may not contain '--'");
      }

      const ch = cursor.current();
      if (ch !== undefined && isControlCharacter(ch)) {
        return cursor.fail(
          ParseErrorCode.INVALID_CONTROL_CHARACTER,
          `Unexpected control character ${cursor.describeCurrent()}`);
      }

      cursor.advance();
    }

    if (cursor.isAtEnd()) {
      return cursor.fail(ParseErrorCode.UNTERMINATED_COMMENT, "Expected comment tag closer '-->'");
    }

    const text = cursor.sliceFrom(contentStart);
    cursor.advanceBy(3); // consume -->

    return createCommentNode(start, cursor.offset, text);
  }

  /**
   * Parse <!DOCTYPE ...>. The content is kept verbatim and not interpreted.
   */
  private parseDoctypeDeclaration(cursor: Cursor): DoctypeNode | ParseFailure | typeof NOT_A_DOCTYPE {
    const start = cursor.offset;

    if (!cursor.nextMatchIgnoreCase('DOCTYPE', 2)) {
      return NOT_A_DOCTYPE;
    }

    cursor.advanceBy(9); // consume <!DOCTYPE
    cursor.skipWhiteSpace();

    const contentStart = cursor.offset;
    while (!cursor.isAtEnd() && cursor.current() !== CharacterCodes.greaterThan) {
      cursor.advance();
    }

    if (cursor.isAtEnd()) {
      return cursor.fail(ParseErrorCode.UNTERMINATED_DOCTYPE, "Expected DOCTYPE tag closer '>'");
    }

    const text = cursor.sliceFrom(contentStart);
    cursor.advance(); // consume >

    return createDoctypeNode(start, cursor.offset, text);
  }
}

/**
 * Parser factory function
 */
export function createParser(options?: ParserOptions): Parser {
  return new CoreParser(options);
}

/**
 * Parse a complete HTML document
 */
export function parse(source: string, options?: ParserOptions): ParseResult {
  return createParser(options).parseDocument(source);
}

/**
 * Parse a complete HTML document, throwing the ParseError on failure
 */
export function parseOrThrow(source: string, options?: ParserOptions): Document {
  const result = parse(source, options);
  if (!result.ok) throw result.error;
  return result.document;
}

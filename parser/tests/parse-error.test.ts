import { describe, expect, test, vi } from 'vitest';

import { createParser, parse, parseOrThrow } from '../core-parser.js';
import { ParseError } from '../parse-error.js';
import { ParseErrorCode } from '../parser-interfaces.js';
import { computeLineStarts, createPositionMapper } from '../position-mapper.js';

describe('Position mapping', () => {
  test('line starts follow \\n only', () => {
    expect(computeLineStarts('ab\ncd\n')).toEqual([0, 3, 6]);
    expect(computeLineStarts('a\rb')).toEqual([0]);
  });

  test('offsets map to 1-based line and column', () => {
    const mapper = createPositionMapper('ab\ncd\n');
    expect(mapper.offsetToPosition(0)).toEqual({ line: 1, column: 1 });
    expect(mapper.offsetToPosition(2)).toEqual({ line: 1, column: 3 });
    expect(mapper.offsetToPosition(3)).toEqual({ line: 2, column: 1 });
    expect(mapper.offsetToPosition(4)).toEqual({ line: 2, column: 2 });
    expect(mapper.offsetToPosition(6)).toEqual({ line: 3, column: 1 });
    expect(mapper.getLineCount()).toBe(3);
  });

  test('CRLF keeps \\r on the line it ends', () => {
    const mapper = createPositionMapper('a\r\nb');
    expect(mapper.offsetToPosition(1)).toEqual({ line: 1, column: 2 });
    expect(mapper.offsetToPosition(3)).toEqual({ line: 2, column: 1 });
  });

  test('line and column map back to offsets', () => {
    const mapper = createPositionMapper('ab\ncd\n');
    expect(mapper.positionToOffset(2, 2)).toBe(4);
    expect(mapper.positionToOffset(1, 99)).toBe(2);
    expect(() => mapper.positionToOffset(4, 1)).toThrow(RangeError);
  });
});

describe('Parse errors', () => {
  test('error carries code, offset, line and column', () => {
    const result = parse('<div>\n  <p>x</div>');
    expect(result.ok).toBe(false);
    if (result.ok) return;

    const { error } = result;
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ParseError');
    expect(error.code).toBe(ParseErrorCode.MISMATCHED_CLOSING_TAG);
    expect(error.message).toBe(`Mismatched closing tag: Expected 'p', found 'div'`);
    expect(error.offset).toBe(17);
    expect(error.lineAndColumn()).toEqual([2, 12]);
    expect(error.toString()).toBe(`[2:12] Mismatched closing tag: Expected 'p', found 'div'`);
  });

  test('failed result exposes no document', () => {
    const result = parse('<p>');
    expect(result.ok).toBe(false);
    expect('document' in result).toBe(false);
    expect(result.sourceText).toBe('<p>');
  });

  test('parseOrThrow throws the ParseError', () => {
    expect(() => parseOrThrow('<p>')).toThrow(ParseError);
    expect(() => parseOrThrow('<p>')).toThrow('Expected matching closing tag for p');
  });

  test('parseOrThrow returns the document on success', () => {
    expect(parseOrThrow('<p></p>').children).toHaveLength(1);
  });
});

describe('Parser options', () => {
  test('documents over maxDocumentSize are rejected before scanning', () => {
    const result = parse('<p></p>', { maxDocumentSize: 3 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.DOCUMENT_TOO_LARGE);
    expect(result.error.toString()).toBe('[1:1] Document is 7 characters long, limit is 3');
  });

  test('documents at the limit are parsed', () => {
    expect(parse('<p></p>', { maxDocumentSize: 7 }).ok).toBe(true);
  });

  test('nesting past maxDepth fails at the element that goes too deep', () => {
    const result = parse('<a><b><c></c></b></a>', { maxDepth: 2 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.NESTING_TOO_DEEP);
    expect(result.error.offset).toBe(6);
    expect(result.error.toString()).toBe('[1:7] Elements are nested more than 2 deep');
  });

  test('nesting up to maxDepth is parsed', () => {
    expect(parse('<a><b></b></a>', { maxDepth: 2 }).ok).toBe(true);
  });

  test('deep nesting returns a failed result under the default limit', () => {
    const source = '<div>'.repeat(20000) + '</div>'.repeat(20000);
    const result = parse(source);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.NESTING_TOO_DEEP);
    expect(result.error.offset).toBe(5000);
    expect(result.error.message).toBe('Elements are nested more than 1000 deep');
  });

  test('depth is reset between documents', () => {
    const parser = createParser({ maxDepth: 2 });
    expect(parser.parseDocument('<a><b><c></c></b></a>').ok).toBe(false);
    expect(parser.parseDocument('<a><b></b></a>').ok).toBe(true);
  });

  test('onDiagnostic receives the error of a failed parse', () => {
    const onDiagnostic = vi.fn();
    const parser = createParser({ onDiagnostic });

    expect(parser.parseDocument('<p></p>').ok).toBe(true);
    expect(onDiagnostic).not.toHaveBeenCalled();

    const result = parser.parseDocument('<p></q>');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(onDiagnostic).toHaveBeenCalledTimes(1);
    expect(onDiagnostic).toHaveBeenCalledWith(result.error);
  });

  test('a parser instance can be reused', () => {
    const parser = createParser();
    const first = parser.parseDocument('<a></a>');
    const second = parser.parseDocument('<b></b>');
    expect(first.ok && first.document.children[0]).toMatchObject({ name: 'a' });
    expect(second.ok && second.document.children[0]).toMatchObject({ name: 'b' });
  });
});

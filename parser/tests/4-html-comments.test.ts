import { describe, expect, test } from 'vitest';

import { parse } from '../core-parser.js';
import { ParseErrorCode } from '../parser-interfaces.js';
import { dumpParse } from './testing-harness/verify-ast.js';

describe('HTML Comments', () => {
  test('basic comment', () => {
    expect(dumpParse('<!--x-->', { offsets: true })).toBe(`Comment "x" [0,8)`);
  });

  test('markup inside a comment is not parsed', () => {
    expect(dumpParse('<!-- a <b> c -->')).toBe(`Comment " a <b> c "`);
  });

  test('comment between child nodes', () => {
    expect(dumpParse('<p><!--n-->t</p>')).toBe(
`Element "p"
  Comment "n"
  Text "t"`);
  });

  test('empty comment <!----> is rejected', () => {
    const result = parse('<!---->');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.MALFORMED_COMMENT);
    expect(result.error.toString()).toBe(`[1:5] Comments may not start with '>' or '-'`);
  });

  test('comment starting with > is rejected', () => {
    expect(dumpParse('<!-->')).toBe(`error [1:5] Comments may not start with '>' or '-'`);
  });

  test('comment starting with -> is rejected', () => {
    expect(dumpParse('<!--->')).toBe(`error [1:5] Comments may not start with '>' or '-'`);
  });

  test('inner -- not followed by > is rejected', () => {
    expect(dumpParse('<!--a--b-->')).toBe(`error [1:6] Comments may not contain '--'`);
  });

  test('unterminated comment', () => {
    const result = parse('<!--abc');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.UNTERMINATED_COMMENT);
    expect(result.error.toString()).toBe(`[1:8] Expected comment tag closer '-->'`);
  });

  test('single dash after <!-', () => {
    expect(dumpParse('<!-x-->')).toBe(`error [1:4] Expected second - in comment declaration '-', found 'x'`);
  });

  test('control character inside a comment', () => {
    expect(dumpParse('<!--a\u0001-->')).toBe(
      `error [1:6] Unexpected control character [control character 0x01]`);
  });
});

describe('HTML Doctype', () => {
  test('doctype content is captured verbatim', () => {
    expect(dumpParse('<!DOCTYPE html>', { offsets: true })).toBe(`Doctype "html" [0,15)`);
  });

  test('keyword is matched ignoring case, leading whitespace skipped', () => {
    expect(dumpParse('<!doctype   HTML PUBLIC "x">')).toBe(`Doctype "HTML PUBLIC \\"x\\""`);
  });

  test('unterminated doctype', () => {
    const result = parse('<!DOCTYPE html');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.UNTERMINATED_DOCTYPE);
    expect(result.error.toString()).toBe(`[1:15] Expected DOCTYPE tag closer '>'`);
  });

  test('other declarations are rejected', () => {
    const result = parse('<!ELEMENT x>');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.EXPECTED_DOCTYPE_OR_COMMENT);
    expect(result.error.toString()).toBe('[1:1] Expected doctype declaration or comment');
  });

  test('truncated keyword', () => {
    expect(dumpParse('<!DOC>')).toBe('error [1:1] Expected doctype declaration or comment');
    expect(dumpParse('<!')).toBe('error [1:1] Expected doctype declaration or comment');
  });
});

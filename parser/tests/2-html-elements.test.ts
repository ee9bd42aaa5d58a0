import { describe, expect, test } from 'vitest';

import { parse, parseOrThrow } from '../core-parser.js';
import { isNodeEqual } from '../ast-factory.js';
import { isForeignElement, isVoidElement } from '../ast-types.js';
import { ParseErrorCode } from '../parser-interfaces.js';
import { dumpParse } from './testing-harness/verify-ast.js';

describe('Void elements', () => {
  test('<br>, <br/> and <br /> parse to the same element', () => {
    const plain = parseOrThrow('<br>');
    const slash = parseOrThrow('<br/>');
    const spaced = parseOrThrow('<br />');

    expect(dumpParse('<br />')).toBe(`Element "br"`);
    expect(isNodeEqual(plain, slash)).toBe(true);
    expect(isNodeEqual(plain, spaced)).toBe(true);
  });

  test('void membership ignores case', () => {
    expect(dumpParse('<BR><Img src=x>')).toBe(
`Element "BR"
Element "Img"
  @src="x"`);
  });

  test('void element never looks for a closing tag', () => {
    expect(dumpParse('<p>a<br>b</p>')).toBe(
`Element "p"
  Text "a"
  Element "br"
  Text "b"`);
  });

  test('self-closing void element with attributes', () => {
    expect(dumpParse('<hr bold="yes" italic/>')).toBe(
`Element "hr"
  @bold="yes"
  @italic=""`);
  });

  test('non-void element may not self-close', () => {
    expect(dumpParse('<div/>')).toBe(`error [1:5] Expected end of opening tag '>', found '/'`);
  });

  test('void element missing its >', () => {
    expect(dumpParse('<br/ >')).toBe(`error [1:5] Expected end of opening tag '>', found ' '`);
  });

  test('element set lookups', () => {
    expect(isVoidElement('KEYGEN')).toBe(true);
    expect(isVoidElement('div')).toBe(false);
    expect(isVoidElement('\u212Aeygen')).toBe(false);
    expect(isForeignElement('TextArea')).toBe(true);
    expect(isForeignElement('template')).toBe(false);
  });
});

describe('Foreign elements', () => {
  test('nested tags that do not close the element stay opaque', () => {
    expect(dumpParse('<script>a < b </not-script> still here</script>')).toBe(
`Element "script"
  Foreign "a < b </not-script> still here"`);
  });

  test('closing tag matched ignoring case', () => {
    expect(dumpParse('<STYLE>p{}</style>')).toBe(
`Element "STYLE"
  Foreign "p{}"`);
  });

  test('empty foreign body', () => {
    expect(dumpParse('<script></script>', { offsets: true })).toBe(
`Element "script" [0,17)
  Foreign "" [8,8)`);
  });

  test('markup inside title is not parsed', () => {
    expect(dumpParse('<title>A <b>bold</b> title</title>')).toBe(
`Element "title"
  Foreign "A <b>bold</b> title"`);
  });

  test('control characters are allowed in foreign content', () => {
    expect(dumpParse('<textarea>\u0001</textarea>')).toBe(
`Element "textarea"
  Foreign "\\u0001"`);
  });

  test('svg and math bodies are captured verbatim', () => {
    expect(dumpParse('<svg><g/></svg><math><mi>x</mi></math>')).toBe(
`Element "svg"
  Foreign "<g/>"
Element "math"
  Foreign "<mi>x</mi>"`);
  });

  test('unterminated foreign content', () => {
    const result = parse('<script>alert(1)');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ParseErrorCode.UNTERMINATED_FOREIGN_CONTENT);
    expect(result.error.toString()).toBe('[1:17] Expected closing tag </script>');
  });

  test('closer sharing the element name as a prefix is a mismatch', () => {
    expect(dumpParse('<script>x</scripts>')).toBe(
      `error [1:19] Mismatched closing tag: Expected 'script', found 'scripts'`);
  });
});

/**
 * AST Node Types for the strict HTML parser
 *
 * Nodes are plain frozen objects. Every string field is a slice of the
 * parsed source; `pos`/`end` locate the node in that source (end exclusive).
 */

import { toAsciiLowerCase } from './scanner/character-codes.js';

/**
 * Node kinds - each node type gets a unique identifier
 */
export enum NodeKind {
  Document,
  Element,
  Text,
  Comment,
  Doctype,
  Foreign,
}

/**
 * Base interface for all AST nodes
 */
export interface Node {
  readonly kind: NodeKind;
  readonly pos: number;           // Offset of the first character
  readonly end: number;           // Offset just past the last character
}

/**
 * Document root node
 */
export interface Document extends Node {
  readonly kind: NodeKind.Document;
  readonly children: readonly HtmlNode[];
}

/**
 * Element attribute. `value` is empty for boolean attributes.
 */
export interface Attribute {
  readonly name: string;
  readonly value: string;
  readonly pos: number;
  readonly end: number;
}

/**
 * HTML element node.
 * Void elements have no children; foreign elements have exactly one ForeignNode.
 */
export interface ElementNode extends Node {
  readonly kind: NodeKind.Element;
  readonly name: string;          // Tag name with its original casing
  readonly attributes: readonly Attribute[];
  readonly children: readonly HtmlNode[];
}

/**
 * Run of text without '<' or control characters
 */
export interface TextNode extends Node {
  readonly kind: NodeKind.Text;
  readonly text: string;
}

/**
 * Comment content between <!-- and -->
 */
export interface CommentNode extends Node {
  readonly kind: NodeKind.Comment;
  readonly text: string;
}

/**
 * Raw content between <!DOCTYPE and >, leading whitespace skipped
 */
export interface DoctypeNode extends Node {
  readonly kind: NodeKind.Doctype;
  readonly text: string;
}

/**
 * Unparsed body of script, style, title, textarea, svg or math
 */
export interface ForeignNode extends Node {
  readonly kind: NodeKind.Foreign;
  readonly text: string;
}

/**
 * All node types that can appear in a document tree
 */
export type HtmlNode =
  | ElementNode
  | TextNode
  | CommentNode
  | DoctypeNode
  | ForeignNode;

/**
 * Nodes carrying a raw source span
 */
export type TextualNode = TextNode | CommentNode | DoctypeNode | ForeignNode;

/**
 * Any node, including the document root
 */
export type AnyNode = Document | HtmlNode;

export function isElementNode(node: AnyNode): node is ElementNode {
  return node.kind === NodeKind.Element;
}

export function isTextualNode(node: AnyNode): node is TextualNode {
  return node.kind === NodeKind.Text ||
         node.kind === NodeKind.Comment ||
         node.kind === NodeKind.Doctype ||
         node.kind === NodeKind.Foreign;
}

/**
 * Elements that never have children or a closing tag
 */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area', 'base', 'br', 'col', 'command', 'embed', 'hr', 'img', 'input',
  'keygen', 'link', 'meta', 'param', 'source', 'track', 'wbr'
]);

/**
 * Elements whose body is captured verbatim up to the matching closing tag
 */
export const FOREIGN_ELEMENTS: ReadonlySet<string> = new Set([
  'script', 'style', 'title', 'textarea', 'svg', 'math'
]);

// membership folds ASCII letters only
export function isVoidElement(name: string): boolean {
  return VOID_ELEMENTS.has(toAsciiLowerCase(name));
}

export function isForeignElement(name: string): boolean {
  return FOREIGN_ELEMENTS.has(toAsciiLowerCase(name));
}

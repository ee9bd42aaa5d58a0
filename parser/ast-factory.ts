/**
 * AST Factory Utilities
 *
 * Helper functions for creating and comparing AST nodes.
 * Created nodes are frozen; the parser never touches them after construction.
 */

import {
  NodeKind,
  isTextualNode,
  type AnyNode,
  type Attribute,
  type CommentNode,
  type Document,
  type DoctypeNode,
  type ElementNode,
  type ForeignNode,
  type HtmlNode,
  type TextNode
} from './ast-types.js';

/**
 * Creates a document node
 */
export function createDocumentNode(
  pos: number,
  end: number,
  children: readonly HtmlNode[] = []
): Document {
  const node: Document = {
    kind: NodeKind.Document,
    pos,
    end,
    children: Object.freeze([...children])
  };
  return Object.freeze(node);
}

/**
 * Creates an element node
 */
export function createElementNode(
  pos: number,
  end: number,
  name: string,
  attributes: readonly Attribute[] = [],
  children: readonly HtmlNode[] = []
): ElementNode {
  const node: ElementNode = {
    kind: NodeKind.Element,
    pos,
    end,
    name,
    attributes: Object.freeze([...attributes]),
    children: Object.freeze([...children])
  };
  return Object.freeze(node);
}

/**
 * Creates an attribute
 */
export function createAttribute(pos: number, end: number, name: string, value = ''): Attribute {
  const attribute: Attribute = { name, value, pos, end };
  return Object.freeze(attribute);
}

/**
 * Creates a text node
 */
export function createTextNode(pos: number, end: number, text: string): TextNode {
  const node: TextNode = { kind: NodeKind.Text, pos, end, text };
  return Object.freeze(node);
}

/**
 * Creates a comment node
 */
export function createCommentNode(pos: number, end: number, text: string): CommentNode {
  const node: CommentNode = { kind: NodeKind.Comment, pos, end, text };
  return Object.freeze(node);
}

/**
 * Creates a doctype node
 */
export function createDoctypeNode(pos: number, end: number, text: string): DoctypeNode {
  const node: DoctypeNode = { kind: NodeKind.Doctype, pos, end, text };
  return Object.freeze(node);
}

/**
 * Creates a foreign content node
 */
export function createForeignNode(pos: number, end: number, text: string): ForeignNode {
  const node: ForeignNode = { kind: NodeKind.Foreign, pos, end, text };
  return Object.freeze(node);
}

/**
 * Validates that a node's position is within bounds
 */
export function validateNodePosition(node: AnyNode, sourceLength: number): boolean {
  return node.pos >= 0 &&
         node.end >= node.pos &&
         node.end <= sourceLength;
}

/**
 * Validates that child positions are within parent bounds
 */
export function validateChildPositions(parent: AnyNode, children: readonly AnyNode[]): boolean {
  return children.every(child =>
    child.pos >= parent.pos &&
    child.end <= parent.end
  );
}

/**
 * Structural equality ignoring source offsets
 */
export function isNodeEqual(left: AnyNode, right: AnyNode): boolean {
  if (left.kind === NodeKind.Document) {
    return right.kind === NodeKind.Document &&
           areChildrenEqual(left.children, right.children);
  }

  if (left.kind === NodeKind.Element) {
    return right.kind === NodeKind.Element &&
           left.name === right.name &&
           areAttributesEqual(left.attributes, right.attributes) &&
           areChildrenEqual(left.children, right.children);
  }

  return isTextualNode(right) && right.kind === left.kind && right.text === left.text;
}

function areAttributesEqual(left: readonly Attribute[], right: readonly Attribute[]): boolean {
  return left.length === right.length &&
         left.every((attribute, i) =>
           attribute.name === right[i].name &&
           attribute.value === right[i].value);
}

function areChildrenEqual(left: readonly AnyNode[], right: readonly AnyNode[]): boolean {
  return left.length === right.length &&
         left.every((child, i) => isNodeEqual(child, right[i]));
}

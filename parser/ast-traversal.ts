/**
 * AST Traversal Infrastructure
 *
 * Visitor pattern and utility functions for walking and querying AST trees.
 */

import {
  NodeKind,
  type AnyNode,
  type CommentNode,
  type Document,
  type DoctypeNode,
  type ElementNode,
  type ForeignNode,
  type HtmlNode,
  type TextNode
} from './ast-types.js';
import { equalsIgnoreAsciiCase } from './scanner/character-codes.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

/**
 * Base visitor interface with optional methods for each node type
 */
export interface Visitor {
  /** Generic node visitor (called for all nodes if specific visitor not defined) */
  visitNode?(node: AnyNode, parent?: AnyNode): VisitResult;

  visitDocument?(node: Document, parent?: AnyNode): VisitResult;
  visitElement?(node: ElementNode, parent?: AnyNode): VisitResult;
  visitText?(node: TextNode, parent?: AnyNode): VisitResult;
  visitComment?(node: CommentNode, parent?: AnyNode): VisitResult;
  visitDoctype?(node: DoctypeNode, parent?: AnyNode): VisitResult;
  visitForeign?(node: ForeignNode, parent?: AnyNode): VisitResult;
}

/**
 * Walk AST tree using visitor pattern (top-down)
 */
export function walkAST(root: AnyNode, visitor: Visitor): void {
  walkASTRecursive(root, visitor, undefined);
}

/**
 * Walk AST tree bottom-up (children first, then parent)
 */
export function walkASTBottomUp(root: AnyNode, visitor: Visitor): void {
  walkASTBottomUpRecursive(root, visitor, undefined);
}

/**
 * Internal recursive walker for top-down traversal
 */
function walkASTRecursive(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  const result = callVisitorMethod(node, visitor, parent);

  if (result === VisitResult.Stop) {
    return VisitResult.Stop;
  }

  if (result === VisitResult.Skip) {
    return VisitResult.Continue;
  }

  for (const child of getChildren(node)) {
    if (walkASTRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return VisitResult.Continue;
}

/**
 * Internal recursive walker for bottom-up traversal
 */
function walkASTBottomUpRecursive(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  for (const child of getChildren(node)) {
    if (walkASTBottomUpRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return callVisitorMethod(node, visitor, parent);
}

/**
 * Call the appropriate visitor method based on node kind
 */
function callVisitorMethod(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  let result: VisitResult | undefined;

  switch (node.kind) {
    case NodeKind.Document:
      result = visitor.visitDocument?.(node, parent);
      break;
    case NodeKind.Element:
      result = visitor.visitElement?.(node, parent);
      break;
    case NodeKind.Text:
      result = visitor.visitText?.(node, parent);
      break;
    case NodeKind.Comment:
      result = visitor.visitComment?.(node, parent);
      break;
    case NodeKind.Doctype:
      result = visitor.visitDoctype?.(node, parent);
      break;
    case NodeKind.Foreign:
      result = visitor.visitForeign?.(node, parent);
      break;
  }

  return result ?? visitor.visitNode?.(node, parent) ?? VisitResult.Continue;
}

/**
 * Children of a document or element; empty for every other node
 */
export function getChildren(node: AnyNode): readonly HtmlNode[] {
  return node.kind === NodeKind.Document || node.kind === NodeKind.Element
    ? node.children
    : [];
}

// =============================================================================
// Position-based Query Functions
// =============================================================================

/**
 * Find the deepest node that contains the given offset
 */
export function findNodeAt(root: AnyNode, offset: number): AnyNode | undefined {
  if (offset < root.pos || offset >= root.end) {
    return undefined;
  }

  let result: AnyNode = root;

  walkAST(root, {
    visitNode(node) {
      if (offset >= node.pos && offset < node.end) {
        result = node;
        return VisitResult.Continue;
      }
      return VisitResult.Skip;
    }
  });

  return result;
}

/**
 * Get the path from root to a specific node
 */
export function getNodePath(root: AnyNode, target: AnyNode): AnyNode[] {
  const path: AnyNode[] = [];

  function findPath(node: AnyNode): boolean {
    path.push(node);

    if (node === target) {
      return true;
    }

    for (const child of getChildren(node)) {
      if (findPath(child)) {
        return true;
      }
    }

    path.pop();
    return false;
  }

  return findPath(root) ? path : [];
}

/**
 * Get the parent node of a target node
 */
export function getParent(root: AnyNode, target: AnyNode): AnyNode | undefined {
  const path = getNodePath(root, target);
  return path.length > 1 ? path[path.length - 2] : undefined;
}

/**
 * Get all descendant nodes of a given node, in document order
 */
export function getDescendants(node: AnyNode): HtmlNode[] {
  const descendants: HtmlNode[] = [];

  walkAST(node, {
    visitNode(visited) {
      if (visited !== node && visited.kind !== NodeKind.Document) {
        descendants.push(visited);
      }
      return VisitResult.Continue;
    }
  });

  return descendants;
}

/**
 * All elements with the given tag name, compared ignoring ASCII case
 */
export function getElementsByTagName(root: AnyNode, tagName: string): ElementNode[] {
  const elements: ElementNode[] = [];

  walkAST(root, {
    visitElement(element) {
      if (equalsIgnoreAsciiCase(element.name, tagName)) {
        elements.push(element);
      }
      return VisitResult.Continue;
    }
  });

  return elements;
}

/**
 * Concatenated text and foreign content below a node
 */
export function getTextContent(node: AnyNode): string {
  let text = '';

  walkAST(node, {
    visitText(textNode) {
      text += textNode.text;
      return VisitResult.Continue;
    },
    visitForeign(foreign) {
      text += foreign.text;
      return VisitResult.Continue;
    }
  });

  return text;
}

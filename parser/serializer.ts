import {
  NodeKind,
  isVoidElement,
  type AnyNode,
  type Attribute,
  type ElementNode
} from './ast-types.js';

/**
 * Re-emit a node, or a whole document, as HTML.
 * Parsing the output of a parsed tree gives back a structurally equal tree.
 */
export function serialize(node: AnyNode): string {
  switch (node.kind) {
    case NodeKind.Document:
      return node.children.map(serialize).join('');
    case NodeKind.Element:
      return serializeElement(node);
    case NodeKind.Comment:
      return '<!--' + node.text + '-->';
    case NodeKind.Doctype:
      return '<!DOCTYPE ' + node.text + '>';
    case NodeKind.Text:
    case NodeKind.Foreign:
      return node.text;
  }
}

function serializeElement(element: ElementNode): string {
  const open = '<' + element.name + element.attributes.map(serializeAttribute).join('') + '>';
  if (isVoidElement(element.name)) {
    return open;
  }
  return open + element.children.map(serialize).join('') + '</' + element.name + '>';
}

function serializeAttribute(attribute: Attribute): string {
  if (!attribute.value) {
    return ' ' + attribute.name;
  }

  const hasDouble = attribute.value.includes('"');
  if (hasDouble && attribute.value.includes("'")) {
    throw new Error(`Attribute '${attribute.name}' has a value with both quote characters`);
  }

  const quote = hasDouble ? "'" : '"';
  return ' ' + attribute.name + '=' + quote + attribute.value + quote;
}

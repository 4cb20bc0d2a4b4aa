/**
 * Component Node → HTML
 */

import { MARKER_ATTR, isValidTagName, toAttributes } from '../common/attrs';
import { escapeKey, isTextNode, textOf, type ComponentNode } from '../tree/node';
import { VOID_ELEMENTS, escapeAttr, escapeText } from './escape';

/**
 * Placed between adjacent text nodes so the browser's parser keeps them
 * apart; the client renderer skips comments when indexing.
 */
const TEXT_SEPARATOR = '<!---->';

/**
 * Serialize a tree to HTML. Nodes whose key path is in `markerIds` carry
 * `data-hk="<markerId>"`.
 */
export function renderNodeToString(
  node: ComponentNode,
  markerIds: ReadonlySet<string> = new Set(),
  path: string = escapeKey(node.key)
): string {
  if (isTextNode(node)) return escapeText(textOf(node));

  const tag = node.type;
  if (!isValidTagName(tag)) {
    throw new Error(`Invalid element type "${tag}" at "${path}"`);
  }

  let attrs = '';
  for (const [name, value] of toAttributes(node.props)) {
    attrs += value === true ? ` ${name}` : ` ${name}="${escapeAttr(value)}"`;
  }
  if (markerIds.has(path)) attrs += ` ${MARKER_ATTR}="${escapeAttr(path)}"`;

  if (VOID_ELEMENTS.has(tag)) return `<${tag}${attrs} />`;

  let inner = '';
  let prevWasText = false;
  for (const child of node.children) {
    const isText = isTextNode(child);
    if (isText && prevWasText) inner += TEXT_SEPARATOR;
    inner += renderNodeToString(child, markerIds, `${path}/${escapeKey(child.key)}`);
    prevWasText = isText;
  }

  return `<${tag}${attrs}>${inner}</${tag}>`;
}

/**
 * Component Node: the structural, serializable description of rendered
 * output. Pure value type with no references to live render scopes; used as
 * the hydration comparand and as the server→client wire format.
 */

import { isJsonArray, isJsonValue, type JsonValue } from '../shared/util';

/** Closed set of values a host node may carry as a property */
export type PropValue = JsonValue;

export interface ComponentNode {
  readonly type: string;
  readonly props: Readonly<Record<string, PropValue>>;
  readonly children: readonly ComponentNode[];
  readonly key: string;
}

/** Node type used for text content; its text lives in `props.value` */
export const TEXT_TYPE = '#text';

/** Key of a tree's root node unless a composition root picks another */
export const DEFAULT_ROOT_KEY = 'root';

export const isPropValue = isJsonValue;

export function createNode(
  type: string,
  props: Readonly<Record<string, PropValue>> = {},
  children: readonly ComponentNode[] = [],
  key = '0'
): ComponentNode {
  return Object.freeze({
    type,
    props: Object.freeze({ ...props }),
    children: Object.freeze(children.slice()),
    key,
  });
}

export function textNode(value: string, key: string): ComponentNode {
  return createNode(TEXT_TYPE, { value }, [], key);
}

export function isTextNode(node: ComponentNode): boolean {
  return node.type === TEXT_TYPE;
}

export function textOf(node: ComponentNode): string {
  const value = node.props.value;
  return typeof value === 'string' ? value : '';
}

function propValueEqual(a: PropValue, b: PropValue): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;
  if (isJsonArray(a)) {
    if (!isJsonArray(b) || a.length !== b.length) return false;
    return a.every((v, i) => propValueEqual(v, b[i]));
  }
  if (isJsonArray(b)) return false;
  return propsEqual(a, b);
}

export function propsEqual(
  a: Readonly<Record<string, PropValue>>,
  b: Readonly<Record<string, PropValue>>
): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  for (const k of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, k)) return false;
    if (!propValueEqual(a[k], b[k])) return false;
  }
  return true;
}

/**
 * Full structural equality: types, keys, props, child order and count.
 */
export function treesEqual(a: ComponentNode, b: ComponentNode): boolean {
  if (a === b) return true;
  if (a.type !== b.type || a.key !== b.key) return false;
  if (a.children.length !== b.children.length) return false;
  if (!propsEqual(a.props, b.props)) return false;
  for (let i = 0; i < a.children.length; i++) {
    if (!treesEqual(a.children[i], b.children[i])) return false;
  }
  return true;
}

export function countNodes(node: ComponentNode): number {
  let total = 1;
  for (const child of node.children) total += countNodes(child);
  return total;
}

const KEY_ESCAPES: Readonly<Record<string, string>> = {
  '%': '%25',
  '/': '%2F',
  '>': '%3E',
  '#': '%23',
};

/**
 * Escape the characters that delimit ids: `/` between path segments, `>`
 * for component nesting and `#` before a state slot index.
 */
export function escapeKey(key: string): string {
  return key.replace(/[%/>#]/g, (ch) => KEY_ESCAPES[ch] ?? ch);
}

export function unescapeKey(segment: string): string {
  return segment.replace(/%(25|2F|3E|23)/g, (_, hex: string) =>
    String.fromCharCode(parseInt(hex, 16))
  );
}

/** Marker ids and scope ids are `/`-joined key paths from the root */
export function joinPath(path: readonly string[]): string {
  return path.map(escapeKey).join('/');
}

/** Inverse of `joinPath` */
export function splitPath(id: string): string[] {
  return id.split('/').map(unescapeKey);
}

/**
 * Walk a tree in document order, yielding every node with its key path.
 */
export function* walkTree(
  node: ComponentNode,
  path: readonly string[] = [node.key]
): Generator<{ node: ComponentNode; path: readonly string[] }> {
  yield { node, path };
  for (const child of node.children) {
    yield* walkTree(child, [...path, child.key]);
  }
}

/**
 * Find the node at a key path. The first segment must be the root's key.
 */
export function nodeAtPath(
  root: ComponentNode,
  path: readonly string[]
): ComponentNode | undefined {
  if (path.length === 0 || path[0] !== root.key) return undefined;
  let current: ComponentNode = root;
  for (let i = 1; i < path.length; i++) {
    const next = current.children.find((c) => c.key === path[i]);
    if (!next) return undefined;
    current = next;
  }
  return current;
}

/**
 * Return a copy of `root` with the node at `path` replaced by `replacement`
 * (or removed when `replacement` is null). A path whose parent exists but
 * whose last key does not is treated as an append.
 */
export function replaceAtPath(
  root: ComponentNode,
  path: readonly string[],
  replacement: ComponentNode | null
): ComponentNode | null {
  if (path.length === 0 || path[0] !== root.key) return root;
  if (path.length === 1) return replacement;

  const [, childKey, ...rest] = path;
  const idx = root.children.findIndex((c) => c.key === childKey);
  const children = root.children.slice();

  if (rest.length === 0) {
    if (idx === -1) {
      if (replacement) children.push(replacement);
    } else if (replacement) {
      children[idx] = replacement;
    } else {
      children.splice(idx, 1);
    }
  } else {
    if (idx === -1) return root;
    const updated = replaceAtPath(children[idx], path.slice(1), replacement);
    if (updated) children[idx] = updated;
    else children.splice(idx, 1);
  }

  return createNode(root.type, root.props, children, root.key);
}

/**
 * Common call contracts: Component signatures and element shape
 */

import type { Props } from './props';

export type Component = (props: Props) => Renderable;

/**
 * Plain element description returned by render functions. `type` is either a
 * host tag (`'div'`) or a component function, which gets its own render scope.
 */
export interface VNode {
  type: string | Component;
  props?: Props;
  children?: Child[];
}

export type Child =
  | VNode
  | string
  | number
  | boolean
  | null
  | undefined
  | Child[];

export type Renderable = VNode | string | number | null | undefined | false;

export function isVNode(value: unknown): value is VNode {
  if (value === null || typeof value !== 'object') return false;
  if (!('type' in value)) return false;
  const type: unknown = value.type;
  return typeof type === 'string' || typeof type === 'function';
}

/**
 * Element factory for code that prefers call syntax over object literals.
 *
 * @example
 * ```ts
 * h('button', { onClick: () => count.set(count() + 1) }, `count: ${count()}`)
 * ```
 */
export function h(
  type: string | Component,
  props?: Props | null,
  ...children: Child[]
): VNode {
  const node: VNode = { type };
  if (props) node.props = props;
  if (children.length > 0) node.children = children;
  return node;
}

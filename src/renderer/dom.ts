/**
 * DOM renderer
 *
 * Keeps the last tree handed to it and an index from key path to DOM node.
 * Updates patch attributes, text and children positionally; a node whose
 * type or key changed is rebuilt. Comment nodes (text separators in server
 * markup) are never indexed.
 */

import { MARKER_ATTR, isValidTagName, toAttributes } from '../common/attrs';
import type { EventHandler } from '../common/props';
import { logger } from '../dev/logger';
import {
  isTextNode,
  joinPath,
  replaceAtPath,
  textOf,
  type ComponentNode,
} from '../tree/node';
import type { MarkerHost } from '../hydration/manager';
import type { Renderer } from './types';

const COMMENT_NODE = 8;

interface ListenerEntry {
  current: EventHandler;
  readonly listener: EventListener;
}

function contentNodes(parent: Node): ChildNode[] {
  return Array.from(parent.childNodes).filter(
    (n) => n.nodeType !== COMMENT_NODE
  );
}

/**
 * Form controls expose live state as properties; the attribute only sets the
 * initial value.
 */
function syncFormProperty(el: Element, name: string, value: string | true | null): void {
  if (name === 'value' && 'value' in el) {
    el.value = value === null || value === true ? '' : value;
  } else if (name === 'checked' && 'checked' in el) {
    el.checked = value !== null;
  }
}

export class DomRenderer implements Renderer, MarkerHost {
  private mounted: ComponentNode | null = null;
  private readonly nodes = new Map<string, Node>();
  private readonly listeners = new WeakMap<Element, Map<string, ListenerEntry>>();

  constructor(readonly container: Element) {}

  get tree(): ComponentNode | null {
    return this.mounted;
  }

  /** DOM node currently presenting the node at `path` */
  nodeAt(path: readonly string[]): Node | undefined {
    return this.nodes.get(joinPath(path));
  }

  adopt(tree: ComponentNode): void {
    this.mounted = tree;
    this.reindex();
  }

  hasMarker(markerId: string): boolean {
    if (this.nodes.has(markerId)) return true;
    for (const el of Array.from(this.container.querySelectorAll(`[${MARKER_ATTR}]`))) {
      if (el.getAttribute(MARKER_ATTR) === markerId) return true;
    }
    return false;
  }

  createOrUpdate(node: ComponentNode, path?: readonly string[]): void {
    if (path === undefined) {
      this.updateRoot(node);
    } else {
      this.updateAt(node, path);
    }
    this.reindex();
  }

  remove(path: readonly string[]): void {
    if (!this.mounted) throw new Error('DomRenderer.remove() before anything was rendered');
    const target = this.nodes.get(joinPath(path));
    if (!target || !target.parentNode) {
      throw new Error(`No DOM node at "${joinPath(path)}"`);
    }
    target.parentNode.removeChild(target);
    this.mounted = replaceAtPath(this.mounted, path, null);
    this.reindex();
  }

  bindMarker(
    markerId: string,
    handlers: Readonly<Record<string, EventHandler>>
  ): void {
    const el = this.nodes.get(markerId);
    if (!(el instanceof Element)) {
      // Nothing to detach from a node that is no longer an element
      if (Object.keys(handlers).length === 0) return;
      throw new Error(`No element for hydration marker "${markerId}"`);
    }

    let entries = this.listeners.get(el);
    if (!entries) {
      entries = new Map();
      this.listeners.set(el, entries);
    }

    for (const [eventName, entry] of entries) {
      if (handlers[eventName]) continue;
      el.removeEventListener(eventName, entry.listener);
      entries.delete(eventName);
    }

    for (const [eventName, handler] of Object.entries(handlers)) {
      const existing = entries.get(eventName);
      if (existing) {
        existing.current = handler;
        continue;
      }
      const entry: ListenerEntry = {
        current: handler,
        listener: (event: Event) => {
          try {
            entry.current(event);
          } catch (error) {
            logger.error('[Reweave] Event handler error:', error);
          }
        },
      };
      el.addEventListener(eventName, entry.listener);
      entries.set(eventName, entry);
    }
  }

  private updateRoot(node: ComponentNode): void {
    const prev = this.mounted;
    const dom = prev ? this.nodes.get(joinPath([prev.key])) : undefined;
    if (prev && dom) {
      this.patch(prev, node, dom);
    } else {
      this.container.replaceChildren(this.build(node));
    }
    this.mounted = node;
  }

  private updateAt(node: ComponentNode, path: readonly string[]): void {
    if (!this.mounted) {
      throw new Error('DomRenderer: cannot update a path before a tree is mounted');
    }
    const target = this.nodes.get(joinPath(path));
    if (target) {
      if (target.parentNode) {
        target.parentNode.replaceChild(this.build(node), target);
      }
    } else {
      const parent = this.nodes.get(joinPath(path.slice(0, -1)));
      if (!(parent instanceof Element)) {
        throw new Error(`No DOM node at "${joinPath(path)}" or its parent`);
      }
      parent.appendChild(this.build(node));
    }
    const next = replaceAtPath(this.mounted, path, node);
    if (!next) throw new Error('DomRenderer: replacing the root by path removed it');
    this.mounted = next;
  }

  private build(node: ComponentNode): Node {
    const doc = this.container.ownerDocument;
    if (isTextNode(node)) return doc.createTextNode(textOf(node));

    if (!isValidTagName(node.type)) {
      throw new Error(`Invalid element type "${node.type}"`);
    }
    const el = doc.createElement(node.type);
    for (const [name, value] of toAttributes(node.props)) {
      el.setAttribute(name, value === true ? '' : value);
    }
    for (const child of node.children) el.appendChild(this.build(child));
    return el;
  }

  private patch(prev: ComponentNode, next: ComponentNode, dom: Node): void {
    if (prev.type !== next.type || prev.key !== next.key) {
      dom.parentNode?.replaceChild(this.build(next), dom);
      return;
    }

    if (isTextNode(next)) {
      const text = textOf(next);
      if (dom.textContent !== text) dom.textContent = text;
      return;
    }

    if (!(dom instanceof Element)) {
      dom.parentNode?.replaceChild(this.build(next), dom);
      return;
    }

    const before = new Map(toAttributes(prev.props));
    const after = new Map(toAttributes(next.props));
    for (const name of before.keys()) {
      if (!after.has(name)) {
        dom.removeAttribute(name);
        syncFormProperty(dom, name, null);
      }
    }
    for (const [name, value] of after) {
      if (before.get(name) === value) continue;
      dom.setAttribute(name, value === true ? '' : value);
      syncFormProperty(dom, name, value);
    }

    const domChildren = contentNodes(dom);
    const shared = Math.min(prev.children.length, next.children.length);
    for (let i = 0; i < shared; i++) {
      const child = domChildren[i];
      if (child) {
        this.patch(prev.children[i], next.children[i], child);
      } else {
        dom.appendChild(this.build(next.children[i]));
      }
    }
    for (let i = next.children.length; i < prev.children.length; i++) {
      domChildren[i]?.remove();
    }
    for (let i = shared; i < next.children.length; i++) {
      dom.appendChild(this.build(next.children[i]));
    }
  }

  private reindex(): void {
    this.nodes.clear();
    if (!this.mounted) return;
    const first = contentNodes(this.container)[0];
    if (first) this.index(this.mounted, first, [this.mounted.key]);
  }

  private index(node: ComponentNode, dom: Node, path: readonly string[]): void {
    this.nodes.set(joinPath(path), dom);
    if (isTextNode(node)) return;
    const domChildren = contentNodes(dom);
    node.children.forEach((child, i) => {
      const childDom = domChildren[i];
      if (childDom) this.index(child, childDom, [...path, child.key]);
    });
  }
}

/**
 * Component tree snapshot
 *
 * Walks the rendered output of a scope tree and emits frozen ComponentNodes.
 * Event handlers never enter the tree; every node carrying one becomes an
 * interactive binding keyed by its marker id (the node's key path).
 */

import type { EventHandler } from '../common/props';
import { eventNameFromProp, isHandlerProp } from '../common/props';
import { DuplicateMarkerError } from '../common/errors';
import type { RenderedNode, RenderScope } from '../runtime/scope';
import {
  createNode,
  isPropValue,
  joinPath,
  textNode,
  type ComponentNode,
  type PropValue,
} from './node';

export const PRIORITY_ATTR = 'data-hydration-priority';
export const EVENTS_ATTR = 'data-events';

export interface MarkerBinding {
  readonly markerId: string;
  readonly type: string;
  readonly handlers: Readonly<Record<string, EventHandler>>;
  readonly attributes: Readonly<Record<string, string>>;
}

export interface TreeSnapshot {
  readonly tree: ComponentNode | null;
  /** Interactive nodes in document order */
  readonly bindings: ReadonlyMap<string, MarkerBinding>;
}

export const EMPTY_SNAPSHOT: TreeSnapshot = Object.freeze({
  tree: null,
  bindings: new Map<string, MarkerBinding>(),
});

export function snapshotTree(scope: RenderScope | null): TreeSnapshot {
  if (!scope || !scope.output) return EMPTY_SNAPSHOT;
  const bindings = new Map<string, MarkerBinding>();
  const tree = toNode(scope.output, scope.path, bindings);
  return { tree, bindings };
}

function toNode(
  rendered: RenderedNode,
  path: readonly string[],
  bindings: Map<string, MarkerBinding>
): ComponentNode | null {
  switch (rendered.kind) {
    case 'text':
      return textNode(rendered.value, rendered.key);

    case 'scope': {
      const output = rendered.scope.output;
      return output ? toNode(output, path, bindings) : null;
    }

    case 'host': {
      const props: Record<string, PropValue> = {};
      const handlers: Record<string, EventHandler> = {};

      for (const [name, value] of Object.entries(rendered.props)) {
        if (value === undefined) continue;
        if (isHandlerProp(name, value)) {
          handlers[eventNameFromProp(name)] = value;
          continue;
        }
        if (!isPropValue(value)) {
          throw new Error(
            `Property "${name}" on <${rendered.type}> at "${joinPath(path)}" is not serializable. ` +
              'Host properties must be JSON values or on* event handlers.'
          );
        }
        props[name] = value;
      }

      const events = Object.keys(handlers);
      if (events.length > 0) {
        const markerId = joinPath(path);
        if (bindings.has(markerId)) throw new DuplicateMarkerError(markerId);
        const attributes: Record<string, string> = {
          [EVENTS_ATTR]: events.join(' '),
        };
        const priority = props[PRIORITY_ATTR];
        if (typeof priority === 'string') attributes[PRIORITY_ATTR] = priority;
        bindings.set(markerId, {
          markerId,
          type: rendered.type,
          handlers,
          attributes,
        });
      }

      const children: ComponentNode[] = [];
      for (const child of rendered.children) {
        const node = toNode(child, [...path, child.key], bindings);
        if (node) children.push(node);
      }

      return createNode(rendered.type, props, children, rendered.key);
    }
  }
}

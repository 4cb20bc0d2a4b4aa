import type { EventHandler } from '../../src/common/props';
import type { Renderer } from '../../src/renderer/types';
import type { ComponentNode } from '../../src/tree/node';

export type RendererCall =
  | { op: 'createOrUpdate'; node: ComponentNode; path?: readonly string[] }
  | { op: 'bindMarker'; markerId: string; events: string[] }
  | { op: 'remove'; path: readonly string[] }
  | { op: 'adopt'; tree: ComponentNode };

/**
 * Renderer double that records every call instead of touching a DOM.
 * `failOnPath` makes path-targeted createOrUpdate calls throw, to exercise
 * the hydration manager's apply-failure fallback.
 */
export class RecordingRenderer implements Renderer {
  readonly calls: RendererCall[] = [];
  readonly handlers = new Map<string, Readonly<Record<string, EventHandler>>>();

  constructor(private readonly options: { failOnPath?: boolean; canRemove?: boolean } = {}) {
    if (options.canRemove === false) this.remove = undefined;
  }

  createOrUpdate(node: ComponentNode, path?: readonly string[]): void {
    if (path && this.options.failOnPath) {
      throw new Error(`refusing to patch ${path.join('/')}`);
    }
    this.calls.push(path ? { op: 'createOrUpdate', node, path } : { op: 'createOrUpdate', node });
  }

  bindMarker(markerId: string, handlers: Readonly<Record<string, EventHandler>>): void {
    this.handlers.set(markerId, handlers);
    this.calls.push({ op: 'bindMarker', markerId, events: Object.keys(handlers) });
  }

  remove?: (path: readonly string[]) => void = (path) => {
    this.calls.push({ op: 'remove', path });
  };

  adopt(tree: ComponentNode): void {
    this.calls.push({ op: 'adopt', tree });
  }

  ops(): string[] {
    return this.calls.map((c) => c.op);
  }

  createOrUpdateCalls(): Array<Extract<RendererCall, { op: 'createOrUpdate' }>> {
    const out: Array<Extract<RendererCall, { op: 'createOrUpdate' }>> = [];
    for (const call of this.calls) if (call.op === 'createOrUpdate') out.push(call);
    return out;
  }

  boundMarkers(): string[] {
    const out: string[] = [];
    for (const call of this.calls) if (call.op === 'bindMarker') out.push(call.markerId);
    return out;
  }
}

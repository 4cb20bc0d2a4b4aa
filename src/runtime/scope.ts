/**
 * Render scope
 *
 * One scope per component instance: it owns the component's positional slots
 * (state cells, resources, effects, cleanups), its dependency set and its
 * child scopes.
 *
 * INVARIANTS:
 * - Exactly one scope per (parent, key); the id is the `/`-joined key path of
 *   the scope's output root, with one `>` per component nested directly at
 *   that node
 * - Identity is preserved across re-executions; only a parent re-execution
 *   that no longer produces the same component at that key disposes it
 * - The parent reference is an id resolved through the host's scope table;
 *   a child never keeps its parent alive
 * - A throw inside the render function leaves the previous output and child
 *   scopes untouched
 */

import type { Child, Component, Renderable, VNode } from '../common/component';
import { isVNode } from '../common/component';
import type { Props } from '../common/props';
import { RenderError } from '../common/errors';
import { invariant } from '../dev/invariant';
import { logger } from '../dev/logger';
import { shallowEqual } from '../shared/util';
import { joinPath } from '../tree/node';
import {
  getCurrentScope,
  runInScope,
  type TrackedSource,
  type TrackingScope,
} from './tracker';
import type { Schedulable, Scheduler } from './scheduler';
import type { StateRegistry } from './registry';

export type RenderedNode =
  | {
      kind: 'host';
      type: string;
      key: string;
      props: Readonly<Record<string, unknown>>;
      children: readonly RenderedNode[];
    }
  | { kind: 'text'; value: string; key: string }
  | { kind: 'scope'; scope: RenderScope; key: string };

/**
 * What a scope needs from the composition root that owns it.
 */
export interface ScopeHost {
  readonly scheduler: Scheduler;
  readonly registry: StateRegistry;
  readonly ssr: boolean;
  registerScope(scope: RenderScope): void;
  unregisterScope(scope: RenderScope): void;
  lookupScope(id: string): RenderScope | undefined;
  reportError(error: unknown): void;
  /** Run `run` after the next commit */
  queueEffect(run: () => void): void;
}

export interface ScopeInit {
  id: string;
  key: string;
  path: readonly string[];
  nesting: number;
  depth: number;
  parentId: string | null;
  component: Component;
  props: Props;
}

interface Slot {
  readonly kind: string;
  readonly value: unknown;
  readonly dispose?: () => void;
}

interface ChildPass {
  readonly next: Map<string, RenderScope>;
  readonly created: RenderScope[];
  /** Scopes to execute once the new output is accepted, in document order */
  readonly run: Array<{ scope: RenderScope; props: Props | null }>;
}

type Keyed = { child: VNode | string | number; key: string };

function collectChildren(
  children: readonly Child[],
  prefix: string,
  out: Keyed[]
): void {
  children.forEach((child, i) => {
    if (Array.isArray(child)) {
      collectChildren(child, `${prefix}${i}.`, out);
      return;
    }
    if (
      child === null ||
      child === undefined ||
      typeof child === 'boolean' ||
      child === ''
    ) {
      return;
    }
    const explicit = isVNode(child) ? child.props?.key : undefined;
    out.push({
      child,
      key: explicit !== undefined ? String(explicit) : `${prefix}${i}`,
    });
  });
}

function keyedChildren(children: readonly Child[], parentPath: string): Keyed[] {
  const out: Keyed[] = [];
  collectChildren(children, '', out);
  const seen = new Set<string>();
  for (const { key } of out) {
    if (seen.has(key)) {
      throw new Error(
        `Duplicate key "${key}" among children of "${parentPath}". Sibling keys must be unique.`
      );
    }
    seen.add(key);
  }
  return out;
}

function hostProps(props: Props | undefined): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (!props) return out;
  for (const [name, value] of Object.entries(props)) {
    if (name === 'key' || name === 'children') continue;
    out[name] = value;
  }
  return out;
}

function componentProps(node: VNode): Props {
  const props: Props = { ...node.props };
  delete props.key;
  if (node.children && node.children.length > 0) props.children = node.children;
  return props;
}

export class RenderScope implements TrackingScope, Schedulable {
  readonly id: string;
  readonly key: string;
  /** Key path of this scope's output root */
  readonly path: readonly string[];
  readonly nesting: number;
  readonly depth: number;
  readonly parentId: string | null;
  readonly component: Component;

  private currentProps: Props;
  private readonly dependencies = new Set<TrackedSource>();
  private children = new Map<string, RenderScope>();
  private readonly slots: Slot[] = [];
  private cursor = 0;
  private dirty = false;
  private disposed = false;
  private executions = 0;
  private rendered: RenderedNode | null = null;
  private pendingEffects: Array<() => void> = [];

  constructor(
    private readonly host: ScopeHost,
    init: ScopeInit
  ) {
    this.id = init.id;
    this.key = init.key;
    this.path = init.path;
    this.nesting = init.nesting;
    this.depth = init.depth;
    this.parentId = init.parentId;
    this.component = init.component;
    this.currentProps = init.props;
  }

  get parent(): RenderScope | undefined {
    return this.parentId === null
      ? undefined
      : this.host.lookupScope(this.parentId);
  }

  get props(): Props {
    return this.currentProps;
  }

  get output(): RenderedNode | null {
    return this.rendered;
  }

  get childScopes(): ReadonlyMap<string, RenderScope> {
    return this.children;
  }

  get dependencyCount(): number {
    return this.dependencies.size;
  }

  get executionCount(): number {
    return this.executions;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get registry(): StateRegistry {
    return this.host.registry;
  }

  get isServer(): boolean {
    return this.host.ssr;
  }

  recordDependency(source: TrackedSource): void {
    if (this.dependencies.has(source)) return;
    this.dependencies.add(source);
    source.addReader(this);
  }

  invalidate(): void {
    if (this.disposed || this.dirty) return;
    this.dirty = true;
    this.host.scheduler.enqueue(this);
  }

  cancel(): void {
    this.dirty = false;
  }

  setProps(props: Props): void {
    this.currentProps = props;
  }

  /**
   * Returns the value stored at the next positional slot, creating it on
   * first use.
   */
  useSlot<S>(
    kind: string,
    create: (slotKey: string) => S,
    dispose?: (value: S) => void
  ): S {
    const index = this.cursor++;
    const existing = this.slots[index];
    if (existing) {
      invariant(
        existing.kind === kind,
        `Hook order changed in scope "${this.id}": slot ${index} held ${existing.kind}, now ${kind}. Call hooks unconditionally, in the same order on every render.`
      );
      return existing.value as S;
    }
    const value = create(`${this.id}#${index}`);
    this.slots[index] = {
      kind,
      value,
      dispose: dispose ? () => dispose(value) : undefined,
    };
    return value;
  }

  /**
   * Queue an effect declared by the current execution. It reaches the host
   * only if the execution completes.
   */
  scheduleEffect(run: () => void): void {
    this.pendingEffects.push(run);
  }

  slotValues(kind: string): unknown[] {
    return this.slots.filter((s) => s.kind === kind).map((s) => s.value);
  }

  execute(): void {
    if (this.disposed) return;
    this.dirty = false;
    this.executions++;

    for (const dep of this.dependencies) dep.removeReader(this);
    this.dependencies.clear();
    this.cursor = 0;
    this.pendingEffects = [];

    let result: Renderable;
    try {
      result = runInScope(this, () => this.component(this.currentProps));
    } catch (err) {
      this.pendingEffects = [];
      this.host.reportError(new RenderError(this.id, err));
      return;
    }

    const pass: ChildPass = { next: new Map(), created: [], run: [] };
    let output: RenderedNode | null;
    try {
      output = this.buildRoot(result, pass);
    } catch (err) {
      this.pendingEffects = [];
      this.host.reportError(new RenderError(this.id, err));
      return;
    }

    const previous = this.children;
    for (const [id, child] of previous) {
      if (pass.next.get(id) !== child) child.dispose();
    }
    this.children = pass.next;
    this.rendered = output;

    for (const child of pass.created) this.host.registerScope(child);
    for (const { scope, props } of pass.run) {
      if (props) scope.setProps(props);
      scope.execute();
    }

    // Children queued theirs while executing above
    for (const run of this.pendingEffects) this.host.queueEffect(run);
    this.pendingEffects = [];

    if (this.executions > 1 && this.cursor < this.slots.length) {
      logger.warn(
        `[Reweave] scope "${this.id}" used ${this.cursor} of ${this.slots.length} slots; hooks may be called conditionally`
      );
    }
  }

  dispose(): void {
    if (this.disposed) return;
    for (const child of this.children.values()) child.dispose();
    this.children.clear();

    this.disposed = true;
    this.dirty = false;
    this.pendingEffects = [];
    for (const dep of this.dependencies) dep.removeReader(this);
    this.dependencies.clear();

    for (let i = this.slots.length - 1; i >= 0; i--) {
      const dispose = this.slots[i].dispose;
      if (!dispose) continue;
      try {
        dispose();
      } catch (err) {
        this.host.reportError(err);
      }
    }
    this.host.unregisterScope(this);
  }

  private buildRoot(
    result: Renderable,
    pass: ChildPass
  ): RenderedNode | null {
    if (
      result === null ||
      result === undefined ||
      result === false ||
      result === ''
    ) {
      return null;
    }
    return this.build(result, this.key, this.path, this.nesting + 1, pass);
  }

  private build(
    node: VNode | string | number,
    key: string,
    path: readonly string[],
    nesting: number,
    pass: ChildPass
  ): RenderedNode {
    if (typeof node === 'string' || typeof node === 'number') {
      return { kind: 'text', value: String(node), key };
    }

    const { type } = node;
    if (typeof type === 'function') {
      const scope = this.resolveChild(
        type,
        componentProps(node),
        key,
        path,
        nesting,
        pass
      );
      return { kind: 'scope', scope, key };
    }

    const children: RenderedNode[] = [];
    for (const entry of keyedChildren(node.children ?? [], joinPath(path))) {
      children.push(
        this.build(entry.child, entry.key, [...path, entry.key], 0, pass)
      );
    }
    return { kind: 'host', type, key, props: hostProps(node.props), children };
  }

  private resolveChild(
    component: Component,
    props: Props,
    key: string,
    path: readonly string[],
    nesting: number,
    pass: ChildPass
  ): RenderScope {
    const id = joinPath(path) + '>'.repeat(nesting);
    invariant(!pass.next.has(id), `Two render scopes resolved to id "${id}"`);

    const existing = this.children.get(id);
    if (existing && existing.component === component && !existing.disposed) {
      pass.next.set(id, existing);
      if (!shallowEqual(existing.props, props)) {
        pass.run.push({ scope: existing, props });
      }
      return existing;
    }

    const child = new RenderScope(this.host, {
      id,
      key,
      path,
      nesting,
      depth: this.depth + 1,
      parentId: this.id,
      component,
      props,
    });
    pass.next.set(id, child);
    pass.created.push(child);
    pass.run.push({ scope: child, props: null });
    return child;
  }
}

/**
 * The render scope currently executing, if any.
 */
export function currentRenderScope(): RenderScope | null {
  const scope = getCurrentScope();
  return scope instanceof RenderScope ? scope : null;
}

/**
 * Register a cleanup that runs when the calling component's scope is
 * disposed. Must be called during render.
 */
export function onDispose(cleanup: () => void): void {
  const scope = currentRenderScope();
  if (!scope) {
    throw new Error('onDispose() can only be called during render execution.');
  }
  scope.useSlot(
    'cleanup',
    () => cleanup,
    (fn) => fn()
  );
}

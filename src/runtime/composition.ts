/**
 * Composition root
 *
 * Owns everything one UI tree needs: the scope table, the scheduler, the
 * state registry and any root-level cells. Nothing here is process-wide, so
 * concurrent roots (one per server request, several islands on a page)
 * never share state.
 */

import type { Component } from '../common/component';
import type { Props } from '../common/props';
import { resolveConfig, type RuntimeConfig } from '../common/config';
import { invariant } from '../dev/invariant';
import { debugChannel, logger } from '../dev/logger';
import type { Renderer } from '../renderer/types';
import { DEFAULT_ROOT_KEY, joinPath } from '../tree/node';
import { snapshotTree, type TreeSnapshot } from '../tree/snapshot';
import { StateRegistry } from './registry';
import { Scheduler, type Schedulable } from './scheduler';
import { RenderScope, type ScopeHost } from './scope';
import { StateCell, toState, type State } from './state';
import { captureState, type StateData } from './snapshot';

export interface CompositionOptions extends Partial<RuntimeConfig> {
  registry?: StateRegistry;
  renderer?: Renderer;
  /** Receives render, scheduling and commit errors; defaults to logger.error */
  onError?: (error: unknown) => void;
  /** Server pass: async values must already be available */
  ssr?: boolean;
  rootKey?: string;
}

export class CompositionRoot implements ScopeHost {
  readonly config: RuntimeConfig;
  readonly scheduler: Scheduler;
  readonly registry: StateRegistry;
  readonly ssr: boolean;
  readonly rootKey: string;

  private readonly scopes = new Map<string, RenderScope>();
  private readonly rootCells: Array<{ dispose(): void }> = [];
  private readonly errorHandler: (error: unknown) => void;
  private readonly debug: (...args: unknown[]) => void;
  private rootScope: RenderScope | null = null;
  private renderer: Renderer | null;
  /** Marker ids holding handlers in the presentation, and its root key */
  private boundMarkers = new Set<string>();
  private presentedRoot: string | null = null;
  private effectQueue: Array<() => void> = [];
  private disposed = false;

  constructor(options: CompositionOptions = {}) {
    const { registry, renderer, onError, ssr, rootKey, ...config } = options;
    this.config = resolveConfig(config);
    this.registry = registry ?? new StateRegistry();
    this.renderer = renderer ?? null;
    this.ssr = ssr ?? false;
    this.rootKey = rootKey ?? DEFAULT_ROOT_KEY;
    this.debug = debugChannel(this.config.debug);
    this.errorHandler =
      onError ?? ((err) => logger.error('[Reweave] Composition error:', err));
    this.scheduler = new Scheduler({
      batching: this.config.batching,
      maxReexecutions: this.config.maxReexecutions,
      onError: (err) => this.reportError(err),
      onFlushed: (executed) => this.afterFlush(executed),
    });
  }

  get root(): RenderScope | null {
    return this.rootScope;
  }

  get scopeCount(): number {
    return this.scopes.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Run the first composition pass. Nothing is handed to a renderer yet:
   * the caller decides whether to hydrate, commit, or serialize.
   */
  mount(component: Component, props: Props = {}): TreeSnapshot {
    invariant(!this.disposed, 'mount() called on a disposed composition root');
    invariant(this.rootScope === null, 'mount() called twice on one composition root');

    const scope = new RenderScope(this, {
      id: joinPath([this.rootKey]),
      key: this.rootKey,
      path: [this.rootKey],
      nesting: 0,
      depth: 0,
      parentId: null,
      component,
      props,
    });
    this.rootScope = scope;
    this.registerScope(scope);
    scope.execute();
    const snapshot = this.snapshot();
    // Whoever presents this first snapshot (hydration or the first commit)
    // binds exactly these markers.
    this.boundMarkers = new Set(snapshot.bindings.keys());
    this.presentedRoot = snapshot.tree ? snapshot.tree.key : null;
    return snapshot;
  }

  snapshot(): TreeSnapshot {
    return snapshotTree(this.rootScope);
  }

  /**
   * Start forwarding flushed updates to `renderer`.
   */
  attachRenderer(renderer: Renderer): void {
    this.renderer = renderer;
  }

  /**
   * Hand the current tree to the renderer and rebind every marker. Markers
   * that lost all their handlers are rebound with none; a root that now
   * renders nothing is removed.
   */
  commit(): void {
    if (this.disposed) return;
    const renderer = this.renderer;
    if (renderer) this.present(renderer);
    this.runEffects();
  }

  /**
   * Run the effects queued by executions since the last commit. Called by
   * `commit()`; a caller that presented the tree some other way (hydration)
   * calls it directly.
   */
  runEffects(): void {
    if (this.disposed || this.ssr) return;
    const queue = this.effectQueue;
    this.effectQueue = [];
    for (const run of queue) {
      try {
        run();
      } catch (err) {
        this.reportError(err);
      }
    }
  }

  private present(renderer: Renderer): void {
    try {
      const { tree, bindings } = this.snapshot();
      if (tree) {
        renderer.createOrUpdate(tree);
      } else if (this.presentedRoot !== null) {
        if (!renderer.remove) {
          throw new Error('Renderer cannot remove the root presentation');
        }
        renderer.remove([this.presentedRoot]);
      }
      this.presentedRoot = tree ? tree.key : null;

      for (const binding of bindings.values()) {
        renderer.bindMarker(binding.markerId, binding.handlers);
      }
      for (const markerId of this.boundMarkers) {
        if (bindings.has(markerId)) continue;
        if (renderer.hasMarker && !renderer.hasMarker(markerId)) continue;
        renderer.bindMarker(markerId, {});
      }
      this.boundMarkers = new Set(bindings.keys());
    } catch (err) {
      this.reportError(err);
    }
  }

  /**
   * Root-level state, owned by this root and disposed with it. Reads inside
   * render scopes are tracked like any other cell.
   */
  createCell<T>(initialValue: T): State<T> {
    const cell = new StateCell(initialValue);
    this.rootCells.push(cell);
    return toState(cell);
  }

  flush(): readonly Schedulable[] {
    return this.scheduler.flush();
  }

  batch<T>(fn: () => T): T {
    return this.scheduler.batch(fn);
  }

  waitForFlush(targetVersion?: number, timeoutMs?: number): Promise<void> {
    return this.scheduler.waitForFlush(targetVersion, timeoutMs);
  }

  captureState(): StateData {
    return captureState(this.scopes.values());
  }

  registerScope(scope: RenderScope): void {
    invariant(
      !this.scopes.has(scope.id),
      `Render scope id "${scope.id}" registered twice`
    );
    this.scopes.set(scope.id, scope);
  }

  unregisterScope(scope: RenderScope): void {
    if (this.scopes.get(scope.id) === scope) this.scopes.delete(scope.id);
  }

  lookupScope(id: string): RenderScope | undefined {
    return this.scopes.get(id);
  }

  reportError(error: unknown): void {
    this.errorHandler(error);
  }

  queueEffect(run: () => void): void {
    if (!this.ssr) this.effectQueue.push(run);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.scheduler.dispose();
    this.effectQueue = [];
    this.rootScope?.dispose();
    this.rootScope = null;
    for (const cell of this.rootCells) cell.dispose();
    this.rootCells.length = 0;
    this.scopes.clear();
    this.renderer = null;
  }

  private afterFlush(executed: readonly Schedulable[]): void {
    this.debug(`[Reweave] flushed ${executed.length} scope(s)`);
    if (!this.ssr) this.commit();
  }
}

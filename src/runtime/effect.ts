/**
 * Post-commit effects
 *
 * `effect(fn, deps)` runs `fn` after the composition root has committed the
 * render that declared it. Without `deps` it runs after every such render;
 * with `deps` only when they changed structurally, so `[]` runs once after
 * mount. A function returned from `fn` is its cleanup: it runs before the
 * next run and when the scope is disposed.
 *
 * Effects never run during a server pass. Within one commit, a child's
 * effects run before its parent's.
 */

import { structuralEqual } from '../shared/util';
import { currentRenderScope } from './scope';
import { runInScope } from './tracker';

export type EffectCleanup = () => void;
export type EffectFn = () => void | EffectCleanup;

export class EffectCell {
  private cleanup: EffectCleanup | null = null;
  private lastDeps: readonly unknown[] | undefined;
  private next: { fn: EffectFn; deps: readonly unknown[] | undefined } | null =
    null;
  private disposed = false;

  /**
   * Record the declaration made by the current render. Returns false when
   * the dependencies did not change since the last run.
   */
  schedule(fn: EffectFn, deps: readonly unknown[] | undefined): boolean {
    if (
      deps !== undefined &&
      this.lastDeps !== undefined &&
      structuralEqual(deps, this.lastDeps)
    ) {
      return false;
    }
    this.next = { fn, deps };
    return true;
  }

  run(): void {
    const next = this.next;
    if (this.disposed || !next) return;
    this.next = null;
    this.runCleanup();
    this.lastDeps = next.deps;
    // Effects run outside render: their reads subscribe nothing
    const result = runInScope(null, next.fn);
    if (typeof result === 'function') this.cleanup = result;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.next = null;
    this.runCleanup();
  }

  private runCleanup(): void {
    const cleanup = this.cleanup;
    this.cleanup = null;
    cleanup?.();
  }
}

/**
 * @example
 * ```ts
 * function Clock() {
 *   const now = state(0);
 *   effect(() => {
 *     const id = setInterval(() => now.set((n) => n + 1), 1000);
 *     return () => clearInterval(id);
 *   }, []);
 *   return `${now()}s`;
 * }
 * ```
 */
export function effect(fn: EffectFn, deps?: readonly unknown[]): void {
  const scope = currentRenderScope();
  if (!scope) {
    throw new Error(
      '[Reweave] effect() must be called during component render.'
    );
  }

  const cell = scope.useSlot(
    'effect',
    () => new EffectCell(),
    (c) => c.dispose()
  );
  if (scope.isServer) return;
  if (cell.schedule(fn, deps)) scope.scheduleEffect(() => cell.run());
}

/** Run `fn` once, after the first commit that presents the calling component */
export function onMount(fn: EffectFn): void {
  effect(fn, []);
}

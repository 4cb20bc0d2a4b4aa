import { logger } from '../dev/logger';
import { SSRDataMissingError } from '../common/errors';
import { structuralEqual } from '../shared/util';
import { StateCell } from './state';
import { currentRenderScope } from './scope';
import { untracked } from './tracker';

export type ResourceFn<T> = (opts: { signal: AbortSignal }) => Promise<T> | T;

export interface ResourceSnapshot<T> {
  value: T | null;
  pending: boolean;
  error: Error | null;
  refresh: () => void;
}

interface ResourceState<T> {
  value: T | null;
  pending: boolean;
  error: Error | null;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Async value state machine.
 * - Holds value/pending/error in an internal state cell, so settling the
 *   value invalidates readers exactly like a state write
 * - A new generation (deps change, refresh) aborts the previous signal and
 *   ignores its late settlement
 */
export class ResourceCell<T> {
  private generation = 0;
  private controller: AbortController | null = null;
  private deps: readonly unknown[] | null = null;
  private fn: ResourceFn<T>;
  private readonly cell = new StateCell<ResourceState<T>>({
    value: null,
    pending: true,
    error: null,
  });

  constructor(
    fn: ResourceFn<T>,
    private readonly ssr: boolean
  ) {
    this.fn = fn;
  }

  /** Start on first use, restart when deps change */
  update(fn: ResourceFn<T>, deps: readonly unknown[]): void {
    if (this.deps !== null && structuralEqual(this.deps, deps)) return;
    this.fn = fn;
    this.deps = deps.slice();
    this.start();
  }

  read(): ResourceSnapshot<T> {
    const current = this.cell.read();
    return { ...current, refresh: () => this.refresh() };
  }

  refresh(): void {
    this.start();
  }

  dispose(): void {
    this.generation++;
    this.controller?.abort();
    this.controller = null;
    this.cell.dispose();
  }

  private start(): void {
    const generation = ++this.generation;

    this.controller?.abort();
    const controller = new AbortController();
    this.controller = controller;

    let result: Promise<T> | T;
    try {
      result = untracked(() => this.fn({ signal: controller.signal }));
    } catch (err) {
      this.cell.write({ value: null, pending: false, error: toError(err) });
      return;
    }

    if (!(result instanceof Promise)) {
      this.cell.write({ value: result, pending: false, error: null });
      return;
    }

    if (this.ssr) {
      // During SSR async results are disallowed
      throw new SSRDataMissingError();
    }

    this.cell.write({ value: null, pending: true, error: null });
    void result.then(
      (value) => {
        if (this.generation !== generation) return;
        this.cell.write({ value, pending: false, error: null });
      },
      (err: unknown) => {
        if (this.generation !== generation) return;
        logger.error('[Reweave] Async resource error:', err);
        this.cell.write({ value: null, pending: false, error: toError(err) });
      }
    );
  }
}

/**
 * Declares an async value at the next slot of the executing render scope.
 * The scope renders with `pending: true` until the value settles, then
 * re-executes.
 *
 * @example
 * ```ts
 * function User({ id }: { id: string }) {
 *   const user = resource(({ signal }) => fetchUser(id, signal), [id]);
 *   return user.pending ? 'Loading…' : user.value?.name;
 * }
 * ```
 */
export function resource<T>(
  fn: ResourceFn<T>,
  deps: readonly unknown[] = []
): ResourceSnapshot<T> {
  const scope = currentRenderScope();
  if (!scope) {
    throw new Error(
      '[Reweave] resource() must be called during component render. ' +
        'Do not create resources at module scope or outside render.'
    );
  }

  const cell = scope.useSlot(
    'resource',
    () => new ResourceCell(fn, scope.isServer),
    (r) => r.dispose()
  );
  cell.update(fn, deps);
  return cell.read();
}

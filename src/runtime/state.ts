/**
 * State primitive
 *
 * INVARIANTS ENFORCED:
 * - state() only callable during render (a render scope is current)
 * - state() called unconditionally: slot positions are fixed after first render
 * - state values persist across re-executions of the same scope
 * - writing a structurally equal value is a no-op (no version bump, no invalidation)
 * - a write invalidates exactly the scopes that read the cell in their latest
 *   execution, then clears the reader set; readers re-register on re-execution
 */

import { structuralEqual, hasSameShape } from '../shared/util';
import { logger } from '../dev/logger';
import {
  trackRead,
  type TrackedSource,
  type TrackingScope,
} from './tracker';
import { currentRenderScope } from './scope';
import type { StateRegistry } from './registry';

let nextCellId = 1;

interface PersistTarget {
  readonly key: string;
  readonly registry: StateRegistry;
}

/**
 * A single observable mutable value; the unit of dependency tracking.
 */
export class StateCell<T> implements TrackedSource {
  readonly id = nextCellId++;
  /** Registry key this cell is captured under (slot key or persist key) */
  readonly captureKey: string | null;

  private current: T;
  private currentVersion = 0;
  private readonly readers = new Set<TrackingScope>();
  private disposed = false;
  private readonly persist: PersistTarget | null;

  constructor(
    initialValue: T,
    options: { captureKey?: string; persist?: PersistTarget } = {}
  ) {
    this.current = initialValue;
    this.captureKey = options.captureKey ?? null;
    this.persist = options.persist ?? null;
  }

  get version(): number {
    return this.currentVersion;
  }

  get readerCount(): number {
    return this.readers.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  read(): T {
    if (!this.disposed) trackRead(this);
    return this.current;
  }

  /** Read without registering the current scope as a reader */
  peek(): T {
    return this.current;
  }

  /**
   * Returns true when the write changed the value.
   */
  write(next: T): boolean {
    if (this.disposed) {
      logger.warn(`[Reweave] write to disposed state cell #${this.id} ignored`);
      return false;
    }
    if (structuralEqual(this.current, next)) return false;

    this.current = next;
    this.currentVersion++;

    if (this.readers.size === 0) return true;
    const readers = Array.from(this.readers);
    this.readers.clear();
    for (const reader of readers) reader.invalidate();
    return true;
  }

  addReader(scope: TrackingScope): void {
    if (!this.disposed) this.readers.add(scope);
  }

  removeReader(scope: TrackingScope): void {
    this.readers.delete(scope);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.readers.clear();
    if (this.persist) this.persist.registry.set(this.persist.key, this.current);
  }
}

/**
 * State value holder - callable to read, has set method to update
 * @example
 * const count = state(0);
 * count();           // read: 0
 * count.set(1);      // write: invalidates readers
 */
export interface State<T> {
  (): T;
  set(value: T): void;
  set(updater: (prev: T) => T): void;
  peek(): T;
  readonly version: number;
  readonly cell: StateCell<T>;
}

function isUpdater<T>(arg: T | ((prev: T) => T)): arg is (prev: T) => T {
  return typeof arg === 'function';
}

export function toState<T>(cell: StateCell<T>): State<T> {
  const read = (): T => cell.read();

  // A function argument is always treated as an updater; to store a function
  // as state, wrap it in an object.
  function set(value: T): void;
  function set(updater: (prev: T) => T): void;
  function set(arg: T | ((prev: T) => T)): void {
    const next = isUpdater(arg) ? arg(cell.peek()) : arg;
    cell.write(next);
  }

  const handle = Object.assign(read, {
    set,
    peek: () => cell.peek(),
    cell,
    version: cell.version,
  });
  Object.defineProperty(handle, 'version', { get: () => cell.version });
  return handle;
}

export interface StateOptions<T> {
  /**
   * Registry key that survives teardown: the value is saved when the owning
   * scope is disposed and restored when a scope declares the same key again.
   */
  persistKey?: string;
  /** Decide whether a stored value may seed this cell */
  restore?: (raw: unknown) => raw is T;
}

/**
 * Declares a state cell at the next slot of the executing render scope.
 *
 * IMPORTANT: state() must be called during render, at the top level of the
 * render function, in the same order every time.
 *
 * @example
 * ```ts
 * function Counter() {
 *   const count = state(0);
 *   return { type: 'button', props: { onClick: () => count.set(count() + 1) }, children: [count()] };
 * }
 * ```
 */
export function state<T>(
  initialValue: T,
  options: StateOptions<T> = {}
): State<T> {
  const scope = currentRenderScope();
  if (!scope) {
    throw new Error(
      'state() can only be called during render execution. ' +
        'Move state() calls to the top level of your render function, or use root.createCell() outside render.'
    );
  }

  return scope.useSlot('state', (slotKey) => {
    const registry = scope.registry;
    const accepts =
      options.restore ??
      ((raw: unknown): raw is T => hasSameShape(raw, initialValue));

    let seeded = initialValue;
    const seedKey = options.persistKey ?? slotKey;
    if (registry.has(seedKey)) {
      // Slot seeds come from hydration and apply once; persist keys stay
      const raw = options.persistKey
        ? registry.get(seedKey)
        : registry.take(seedKey);
      if (accepts(raw)) {
        seeded = raw;
      } else {
        logger.warn(
          `[Reweave] stored value for "${seedKey}" does not match the declared initial value; using the initial value`
        );
      }
    }

    const cell = new StateCell(seeded, {
      captureKey: seedKey,
      persist: options.persistKey
        ? { key: options.persistKey, registry }
        : undefined,
    });
    return toState(cell);
  }, (slot) => slot.cell.dispose());
}

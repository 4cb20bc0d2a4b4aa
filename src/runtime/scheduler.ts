/**
 * Serialized update scheduler (no inline execution, explicit flush)
 *
 * Key ideas:
 * - Never execute a scope inline from `enqueue`; invalidations are collected
 *   into a pending set, so a scope invalidated twice executes once.
 * - `flush()` is explicit and non-reentrant. Each pass runs the pending
 *   scopes shallowest first, so a parent re-executes before any of its
 *   descendants and may replace or discard them before they run.
 * - Invalidations raised during a flush join the same flush in a later pass.
 * - A scope may execute at most `maxReexecutions` times per flush; past that
 *   it is cancelled and a SchedulingOverflowError is reported.
 * - `waitForFlush()` is race-free with a monotonic `flushVersion`.
 */

import { assertSchedulingPrecondition, invariant } from '../dev/invariant';
import { logger } from '../dev/logger';
import { SchedulingOverflowError } from '../common/errors';
import { DEFAULT_CONFIG, type BatchingMode } from '../common/config';

export interface Schedulable {
  readonly id: string;
  /** Distance from the root scope; the root is 0 */
  readonly depth: number;
  readonly isDirty: boolean;
  readonly isDisposed: boolean;
  execute(): void;
  /** Drop a pending execution without running it */
  cancel(): void;
}

export interface SchedulerOptions {
  batching?: BatchingMode;
  maxReexecutions?: number;
  onError?: (error: unknown) => void;
  /** Called after a flush that executed at least one scope */
  onFlushed?: (executed: readonly Schedulable[]) => void;
}

export interface SchedulerState {
  queueLength: number;
  running: boolean;
  flushVersion: number;
  batchDepth: number;
}

export class Scheduler {
  private pending = new Set<Schedulable>();

  private running = false;
  private disposed = false;
  private batchDepth = 0;

  // Monotonic flush version increments at end of each flush
  private flushVersion = 0;

  // Best-effort microtask kick scheduling
  private kickScheduled = false;

  // Waiters waiting for flushVersion >= target
  private waiters: Array<{
    target: number;
    resolve: () => void;
    timer: ReturnType<typeof setTimeout>;
  }> = [];

  private readonly batching: BatchingMode;
  private readonly maxReexecutions: number;
  private readonly onError: (error: unknown) => void;
  private readonly onFlushed?: (executed: readonly Schedulable[]) => void;

  constructor(options: SchedulerOptions = {}) {
    this.batching = options.batching ?? DEFAULT_CONFIG.batching;
    this.maxReexecutions =
      options.maxReexecutions ?? DEFAULT_CONFIG.maxReexecutions;
    this.onError =
      options.onError ??
      ((err) => logger.error('[Reweave] Scheduler error:', err));
    this.onFlushed = options.onFlushed;
  }

  enqueue(scope: Schedulable): void {
    assertSchedulingPrecondition(
      typeof scope.execute === 'function',
      'enqueue() requires a schedulable scope'
    );
    if (this.disposed) return;

    this.pending.add(scope);

    if (
      this.batching === 'microtask' &&
      !this.running &&
      !this.kickScheduled &&
      this.batchDepth === 0
    ) {
      this.kickScheduled = true;
      queueMicrotask(() => {
        this.kickScheduled = false;
        if (this.running || this.disposed || this.pending.size === 0) return;
        try {
          this.flush();
        } catch (err) {
          this.onError(err);
        }
      });
    }
  }

  flush(): readonly Schedulable[] {
    invariant(
      !this.running,
      '[Scheduler] flush() called while already running'
    );

    this.running = true;
    const executed: Schedulable[] = [];
    const counts = new Map<Schedulable, number>();

    try {
      while (this.pending.size > 0) {
        // Array.prototype.sort is stable: equal depths keep enqueue order
        const pass = Array.from(this.pending).sort((a, b) => a.depth - b.depth);
        this.pending.clear();

        for (const scope of pass) {
          if (scope.isDisposed || !scope.isDirty) continue;

          const count = (counts.get(scope) ?? 0) + 1;
          if (count > this.maxReexecutions) {
            scope.cancel();
            this.onError(
              new SchedulingOverflowError(scope.id, this.maxReexecutions)
            );
            continue;
          }
          counts.set(scope, count);

          try {
            scope.execute();
          } catch (err) {
            this.onError(err);
          }
          executed.push(scope);
        }
      }
    } finally {
      this.running = false;
      this.flushVersion++;
      this.resolveWaiters();
    }

    if (executed.length > 0 && this.onFlushed) this.onFlushed(executed);
    return executed;
  }

  /**
   * Run `fn` with microtask kicks held back, then flush synchronously.
   */
  batch<T>(fn: () => T): T {
    this.batchDepth++;
    let result: T;
    try {
      result = fn();
    } finally {
      this.batchDepth--;
    }
    if (this.batchDepth === 0 && !this.running) this.flush();
    return result;
  }

  waitForFlush(targetVersion?: number, timeoutMs = 2000): Promise<void> {
    const target =
      typeof targetVersion === 'number' ? targetVersion : this.flushVersion + 1;
    if (this.flushVersion >= target) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w.timer !== timer);
        const diag = this.getState();
        reject(
          new Error(
            `waitForFlush timeout ${timeoutMs}ms: ${JSON.stringify(diag)}`
          )
        );
      }, timeoutMs);

      this.waiters.push({ target, resolve, timer });
    });
  }

  getState(): SchedulerState {
    return {
      queueLength: this.pending.size,
      running: this.running,
      flushVersion: this.flushVersion,
      batchDepth: this.batchDepth,
    };
  }

  dispose(): void {
    this.disposed = true;
    this.pending.clear();
    for (const w of this.waiters) {
      clearTimeout(w.timer);
      w.resolve();
    }
    this.waiters = [];
  }

  private resolveWaiters() {
    if (this.waiters.length === 0) return;
    const ready: Array<() => void> = [];
    const remaining: typeof this.waiters = [];

    for (const w of this.waiters) {
      if (this.flushVersion >= w.target) {
        clearTimeout(w.timer);
        ready.push(w.resolve);
      } else {
        remaining.push(w);
      }
    }

    this.waiters = remaining;
    for (const r of ready) r();
  }
}

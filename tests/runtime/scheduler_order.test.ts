import { describe, it, expect } from 'vitest';
import { SchedulingOverflowError } from '../../src/common/errors';
import { Scheduler, type Schedulable } from '../../src/runtime/scheduler';

class Job implements Schedulable {
  isDirty = false;
  isDisposed = false;
  runs = 0;

  constructor(
    readonly id: string,
    readonly depth: number,
    private readonly log: string[],
    private readonly body?: (job: Job) => void
  ) {}

  mark(scheduler: Scheduler): void {
    this.isDirty = true;
    scheduler.enqueue(this);
  }

  execute(): void {
    this.isDirty = false;
    this.runs++;
    this.log.push(this.id);
    this.body?.(this);
  }

  cancel(): void {
    this.isDirty = false;
  }
}

describe('scheduler (SCHEDULER)', () => {
  it('should execute a scope enqueued twice only once', () => {
    const log: string[] = [];
    const scheduler = new Scheduler({ batching: 'manual' });
    const job = new Job('a', 0, log);

    job.mark(scheduler);
    job.mark(scheduler);
    expect(scheduler.getState().queueLength).toBe(1);

    const executed = scheduler.flush();
    expect(executed).toEqual([job]);
    expect(job.runs).toBe(1);
  });

  it('should run shallower scopes first and keep enqueue order within a depth', () => {
    const log: string[] = [];
    const scheduler = new Scheduler({ batching: 'manual' });

    new Job('grandchild', 2, log).mark(scheduler);
    new Job('root', 0, log).mark(scheduler);
    new Job('child', 1, log).mark(scheduler);
    new Job('root-2', 0, log).mark(scheduler);
    scheduler.flush();

    expect(log).toEqual(['root', 'root-2', 'child', 'grandchild']);
  });

  it('should skip disposed and clean scopes', () => {
    const log: string[] = [];
    const scheduler = new Scheduler({ batching: 'manual' });
    const disposed = new Job('disposed', 0, log);
    const cleaned = new Job('cleaned', 0, log);

    disposed.mark(scheduler);
    disposed.isDisposed = true;
    cleaned.mark(scheduler);
    cleaned.cancel();

    expect(scheduler.flush()).toEqual([]);
    expect(log).toEqual([]);
  });

  it('should fold invalidations raised during a flush into the same flush', () => {
    const log: string[] = [];
    const scheduler = new Scheduler({ batching: 'manual' });
    const b = new Job('b', 1, log);
    const a = new Job('a', 0, log, () => b.mark(scheduler));

    a.mark(scheduler);
    const executed = scheduler.flush();

    expect(executed).toEqual([a, b]);
    expect(scheduler.getState().flushVersion).toBe(1);
  });

  it('should cancel a scope past maxReexecutions and keep flushing the rest', () => {
    const log: string[] = [];
    const errors: unknown[] = [];
    const scheduler = new Scheduler({
      batching: 'manual',
      maxReexecutions: 3,
      onError: (err) => errors.push(err),
    });
    const loop = new Job('loop', 1, log, (job) => job.mark(scheduler));
    const ok = new Job('ok', 1, log);

    loop.mark(scheduler);
    ok.mark(scheduler);
    scheduler.flush();

    expect(loop.runs).toBe(3);
    expect(ok.runs).toBe(1);
    expect(loop.isDirty).toBe(false);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(SchedulingOverflowError);
    expect(errors[0]).toMatchObject({ scopeId: 'loop', limit: 3 });
    expect(scheduler.getState().running).toBe(false);
  });

  it('should report a reentrant flush as an error instead of running it', () => {
    const log: string[] = [];
    const errors: unknown[] = [];
    const scheduler = new Scheduler({
      batching: 'manual',
      onError: (err) => errors.push(err),
    });
    const job = new Job('a', 0, log, () => scheduler.flush());

    job.mark(scheduler);
    scheduler.flush();

    expect(job.runs).toBe(1);
    expect(String(errors[0])).toContain(
      '[Scheduler] flush() called while already running'
    );
  });

  it('should flush on a microtask when batching is microtask', async () => {
    const log: string[] = [];
    const scheduler = new Scheduler({ batching: 'microtask' });
    const job = new Job('a', 0, log);

    job.mark(scheduler);
    expect(job.runs).toBe(0);

    await scheduler.waitForFlush();
    expect(job.runs).toBe(1);
  });

  it('should hold kicks inside batch() and flush once at the end', () => {
    const log: string[] = [];
    const flushed: number[] = [];
    const scheduler = new Scheduler({
      batching: 'microtask',
      onFlushed: (executed) => flushed.push(executed.length),
    });
    const a = new Job('a', 0, log);
    const b = new Job('b', 1, log);

    const result = scheduler.batch(() => {
      a.mark(scheduler);
      b.mark(scheduler);
      return 'done';
    });

    expect(result).toBe('done');
    expect(log).toEqual(['a', 'b']);
    expect(flushed).toEqual([2]);
  });

  it('should reject waitForFlush after the timeout', async () => {
    const scheduler = new Scheduler({ batching: 'manual' });
    await expect(scheduler.waitForFlush(undefined, 10)).rejects.toThrow(
      'waitForFlush timeout 10ms'
    );
  });

  it('should resolve pending waiters on dispose', async () => {
    const scheduler = new Scheduler({ batching: 'manual' });
    const waiting = scheduler.waitForFlush();
    scheduler.dispose();
    await expect(waiting).resolves.toBeUndefined();
  });
});

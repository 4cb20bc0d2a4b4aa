import { describe, it, expect, afterEach, vi } from 'vitest';
import type { Component } from '../../src/common/component';
import { CompositionRoot } from '../../src/runtime/composition';
import { resource } from '../../src/runtime/resource';
import { mountManual, textAt } from '../helpers/test_renderer';

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('resource() (RESOURCE)', () => {
  afterEach(() => vi.restoreAllMocks());

  it('should render pending first and re-execute once the value arrives', async () => {
    let resolveValue: (value: string) => void = () => {};
    const View: Component = () => {
      const r = resource(
        () =>
          new Promise<string>((resolve) => {
            resolveValue = resolve;
          })
      );
      return r.pending ? 'loading' : String(r.value);
    };

    const { root } = mountManual(View);
    expect(textAt(root, ['root'])).toBe('loading');

    resolveValue('done');
    await settle();
    root.flush();

    expect(textAt(root, ['root'])).toBe('done');
    expect(root.root?.executionCount).toBe(2);
  });

  it('should restart and abort the previous run when deps change', () => {
    const root = new CompositionRoot({ batching: 'manual' });
    const id = root.createCell(1);
    const signals: AbortSignal[] = [];

    const View: Component = () => {
      const current = id();
      const r = resource(
        ({ signal }) => {
          signals.push(signal);
          return `item-${current}`;
        },
        [current]
      );
      return String(r.value);
    };
    root.mount(View);

    id.set(2);
    root.flush();

    expect(signals).toHaveLength(2);
    expect(signals[0].aborted).toBe(true);
    expect(signals[1].aborted).toBe(false);
    expect(textAt(root, ['root'])).toBe('item-2');
  });

  it('should not restart when deps are structurally equal', () => {
    const root = new CompositionRoot({ batching: 'manual' });
    const tick = root.createCell(0);
    let runs = 0;

    const View: Component = () => {
      tick();
      resource(() => ++runs, [{ page: 1 }]);
      return 'x';
    };
    root.mount(View);

    tick.set(1);
    root.flush();
    expect(runs).toBe(1);
  });

  it('should ignore a settlement from a superseded run', async () => {
    const root = new CompositionRoot({ batching: 'manual' });
    const id = root.createCell(1);
    const resolvers: Array<(value: string) => void> = [];

    const View: Component = () => {
      const current = id();
      const r = resource(
        () =>
          new Promise<string>((resolve) => {
            resolvers.push(resolve);
          }),
        [current]
      );
      return r.pending ? 'loading' : String(r.value);
    };
    root.mount(View);
    id.set(2);
    root.flush();

    resolvers[0]('stale');
    await settle();
    root.flush();
    expect(textAt(root, ['root'])).toBe('loading');

    resolvers[1]('fresh');
    await settle();
    root.flush();
    expect(textAt(root, ['root'])).toBe('fresh');
  });

  it('should expose a synchronous throw as the error', () => {
    const View: Component = () => {
      const r = resource<number>(() => {
        throw new Error('no data');
      });
      return r.error ? r.error.message : 'ok';
    };

    const { root } = mountManual(View);
    expect(textAt(root, ['root'])).toBe('no data');
  });

  it('should expose a rejection as the error and log it', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const View: Component = () => {
      const r = resource<number>(() => Promise.reject(new Error('offline')));
      return r.error ? `failed: ${r.error.message}` : 'waiting';
    };

    const { root } = mountManual(View);
    await settle();
    root.flush();

    expect(textAt(root, ['root'])).toBe('failed: offline');
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('should abort an in-flight run when its scope is disposed', () => {
    const signals: AbortSignal[] = [];
    const View: Component = () => {
      resource(({ signal }) => {
        signals.push(signal);
        return new Promise<number>(() => {});
      });
      return 'x';
    };

    const { root } = mountManual(View);
    root.dispose();
    expect(signals[0].aborted).toBe(true);
  });

  it('should throw outside render', () => {
    expect(() => resource(() => 1)).toThrow(
      'resource() must be called during component render'
    );
  });
});

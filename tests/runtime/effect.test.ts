import { describe, it, expect } from 'vitest';
import type { Component } from '../../src/common/component';
import { CompositionRoot } from '../../src/runtime/composition';
import { effect, onMount } from '../../src/runtime/effect';
import { state } from '../../src/runtime/state';
import { renderToString } from '../../src/ssr';
import { textOf } from '../../src/tree/node';
import { mountManual, treeOf } from '../helpers/test_renderer';

describe('effects (EFFECT)', () => {
  it('should run after commit and again only when deps change', () => {
    const log: string[] = [];
    const root = new CompositionRoot({ batching: 'manual' });
    const id = root.createCell(1);
    const other = root.createCell(0);
    root.mount(() => {
      const current = id();
      other();
      effect(() => {
        log.push(`run ${current}`);
        return () => log.push(`cleanup ${current}`);
      }, [current]);
      return String(current);
    });

    expect(log).toEqual([]);
    root.commit();
    expect(log).toEqual(['run 1']);

    other.set(1);
    root.flush();
    expect(log).toEqual(['run 1']);

    id.set(2);
    root.flush();
    expect(log).toEqual(['run 1', 'cleanup 1', 'run 2']);

    root.dispose();
    expect(log).toEqual(['run 1', 'cleanup 1', 'run 2', 'cleanup 2']);
  });

  it('should run an effect without deps after every committed execution', () => {
    let runs = 0;
    const root = new CompositionRoot({ batching: 'manual' });
    const n = root.createCell(0);
    root.mount(() => {
      effect(() => {
        runs++;
      });
      return String(n());
    });

    root.commit();
    n.set(1);
    root.flush();
    n.set(2);
    root.flush();
    expect(runs).toBe(3);
  });

  it('should run child effects before their parent and mount effects once', () => {
    const log: string[] = [];
    const Child: Component = () => {
      onMount(() => {
        log.push('child');
      });
      return 'c';
    };
    const { root } = mountManual(() => {
      onMount(() => {
        log.push('parent');
      });
      return { type: 'div', children: [{ type: Child }] };
    });

    root.commit();
    root.commit();
    expect(log).toEqual(['child', 'parent']);
  });

  it('should discard effects declared by a render that threw', () => {
    const log: string[] = [];
    const root = new CompositionRoot({ batching: 'manual', onError: () => {} });
    const broken = root.createCell(false);
    root.mount(() => {
      const b = broken();
      effect(() => {
        log.push(`run ${String(b)}`);
      });
      if (b) throw new Error('boom');
      return 'ok';
    });

    root.commit();
    broken.set(true);
    root.flush();
    expect(log).toEqual(['run false']);
  });

  it('should report a throwing effect and still run the others', () => {
    const log: string[] = [];
    const { root, errors } = mountManual(() => {
      effect(() => {
        throw new Error('effect failed');
      });
      effect(() => {
        log.push('second');
      });
      return 'x';
    });

    root.commit();
    expect(log).toEqual(['second']);
    expect(errors).toHaveLength(1);
    expect(String(errors[0])).toBe('Error: effect failed');
  });

  it('should flush writes made by an effect', async () => {
    const root = new CompositionRoot();
    root.mount(() => {
      const ready = state(false);
      onMount(() => ready.set(true));
      return ready() ? 'ready' : 'waiting';
    });

    root.commit();
    await root.waitForFlush();
    expect(textOf(treeOf(root))).toBe('ready');
    root.dispose();
  });

  it('should never run effects during a server pass', () => {
    let runs = 0;
    const App: Component = () => {
      onMount(() => {
        runs++;
      });
      return { type: 'p', children: ['s'] };
    };

    expect(renderToString(App, { timestamp: 1 }).html).toBe('<p data-hk="root">s</p>');
    expect(runs).toBe(0);
  });

  it('should refuse to declare an effect outside render', () => {
    expect(() => effect(() => {})).toThrow(
      '[Reweave] effect() must be called during component render.'
    );
  });
});

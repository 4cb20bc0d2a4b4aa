/**
 * Scheduler overhead benchmark
 *
 * Measures invalidation, dedup and flush cost on a manually batched root.
 */

import { bench, describe } from 'vitest';
import type { Component } from '../../src/common/component';
import { CompositionRoot } from '../../src/runtime/composition';
import { state, type State } from '../../src/runtime/state';

function mountCounters(count: number): {
  root: CompositionRoot;
  cells: Set<State<number>>;
} {
  const cells = new Set<State<number>>();
  const Counter: Component = () => {
    const value = state(0);
    cells.add(value);
    return { type: 'span', children: [String(value())] };
  };
  const App: Component = () => ({
    type: 'div',
    children: Array.from({ length: count }, (_, i) => ({
      type: Counter,
      props: { key: String(i) },
    })),
  });
  const root = new CompositionRoot({ batching: 'manual' });
  root.mount(App);
  return { root, cells };
}

describe('scheduler overhead', () => {
  const single = mountCounters(1);
  const wide = mountCounters(100);

  bench('flush with nothing pending', () => {
    single.root.flush();
  });

  bench('100 writes to one cell, one flush', () => {
    const [cell] = [...single.cells];
    for (let i = 0; i < 100; i++) cell.set(cell() + 1);
    single.root.flush();
  });

  bench('one write to each of 100 sibling scopes, one flush', () => {
    for (const cell of wide.cells) cell.set(cell() + 1);
    wide.root.flush();
  });
});

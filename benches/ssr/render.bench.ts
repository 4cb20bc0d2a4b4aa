/**
 * SSR render benchmark
 *
 * Measures server rendering plus hydration context serialization.
 */

import { bench, describe } from 'vitest';
import type { Component } from '../../src/common/component';
import { HydrationManager } from '../../src/hydration/manager';
import { CompositionRoot } from '../../src/runtime/composition';
import { renderToString } from '../../src/ssr';
import type { Renderer } from '../../src/renderer/types';

const Simple: Component = () => ({ type: 'div', children: ['hello'] });

const Large: Component = () => ({
  type: 'div',
  children: Array.from({ length: 500 }, (_, i) => ({
    type: 'section',
    props: { key: String(i), onClick: () => {} },
    children: [
      { type: 'h2', children: [String(i)] },
      { type: 'p', children: ['Lorem ipsum dolor sit amet.'] },
    ],
  })),
});

const nullRenderer: Renderer = {
  createOrUpdate() {},
  bindMarker() {},
  remove() {},
  adopt() {},
};

describe('ssr render', () => {
  bench('100 simple component SSRs', () => {
    for (let i = 0; i < 100; i++) renderToString(Simple, { timestamp: 0 });
  });

  bench('large tree SSR', () => {
    renderToString(Large, { timestamp: 0 });
  });
});

describe('hydration', () => {
  const { payload } = renderToString(Large, { timestamp: 0 });

  bench('large tree deserialize, match and adopt', () => {
    const client = new CompositionRoot({ batching: 'manual' });
    const manager = new HydrationManager({ renderer: nullRenderer });
    manager.hydrate(manager.deserializeAndMatch(payload), client.mount(Large));
    client.dispose();
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import {
  h,
  hydrateRoot,
  isVNode,
  isReweaveError,
  renderToString,
  state,
  type Component,
} from '../../src/index';
import { createTestContainer } from '../helpers/test_renderer';

const Counter: Component = () => {
  const count = state(2);
  return h('button', { onClick: () => count.set((n) => n + 1) }, 'n=', count());
};

describe('public API (SMOKE)', () => {
  const { container, cleanup } = createTestContainer();
  afterEach(() => cleanup());

  it('should render on the server and hydrate on the client', async () => {
    const { html, payload } = renderToString(Counter, { timestamp: 1 });
    expect(html).toBe('<button data-hk="root">n=<!---->2</button>');

    container.innerHTML = html;
    const handle = hydrateRoot({ root: container, component: Counter, contextData: payload });
    expect(handle.result.phase).toBe('adopted');

    container.querySelector('button')?.click();
    await handle.composition.waitForFlush();
    expect(container.innerHTML).toBe('<button data-hk="root">n=<!---->3</button>');
    handle.dispose();
  });

  it('should build elements with h', () => {
    expect(h('p', null, 'x')).toEqual({ type: 'p', children: ['x'] });
    expect(isVNode(h('p'))).toBe(true);
    expect(isVNode('p')).toBe(false);
    expect(isReweaveError(new Error('plain'))).toBe(false);
  });
});

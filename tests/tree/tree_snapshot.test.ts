import { describe, it, expect } from 'vitest';
import type { Component } from '../../src/common/component';
import { CompositionRoot } from '../../src/runtime/composition';
import {
  countNodes,
  createNode,
  nodeAtPath,
  escapeKey,
  replaceAtPath,
  splitPath,
  textNode,
  unescapeKey,
  treesEqual,
  walkTree,
} from '../../src/tree/node';
import { EVENTS_ATTR, PRIORITY_ATTR, snapshotTree } from '../../src/tree/snapshot';

function sample() {
  return createNode(
    'ul',
    { class: 'list' },
    [
      createNode('li', {}, [textNode('one', '0')], 'a'),
      createNode('li', {}, [textNode('two', '0')], 'b'),
    ],
    'root'
  );
}

describe('component nodes (TREE)', () => {
  it('should freeze nodes and their props', () => {
    const node = sample();
    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node.props)).toBe(true);
    expect(Object.isFrozen(node.children)).toBe(true);
  });

  it('should compare trees structurally including props and order', () => {
    expect(treesEqual(sample(), sample())).toBe(true);

    const reordered = createNode('ul', { class: 'list' }, sample().children.slice().reverse(), 'root');
    expect(treesEqual(sample(), reordered)).toBe(false);

    const restyled = createNode('ul', { class: 'other' }, sample().children, 'root');
    expect(treesEqual(sample(), restyled)).toBe(false);
  });

  it('should walk in document order with key paths', () => {
    const paths = Array.from(walkTree(sample()), ({ path }) => path.join('/'));
    expect(paths).toEqual(['root', 'root/a', 'root/a/0', 'root/b', 'root/b/0']);
    expect(countNodes(sample())).toBe(5);
  });

  it('should find, replace, append and remove by key path', () => {
    const tree = sample();
    expect(nodeAtPath(tree, ['root', 'b'])?.type).toBe('li');
    expect(nodeAtPath(tree, ['other'])).toBeUndefined();

    const replaced = replaceAtPath(tree, ['root', 'a'], createNode('li', { hidden: true }, [], 'a'));
    expect(nodeAtPath(replaced ?? tree, ['root', 'a'])?.props).toEqual({ hidden: true });
    expect(nodeAtPath(tree, ['root', 'a'])?.props).toEqual({});

    const appended = replaceAtPath(tree, ['root', 'c'], createNode('li', {}, [], 'c'));
    expect(appended?.children.map((c) => c.key)).toEqual(['a', 'b', 'c']);

    const removed = replaceAtPath(tree, ['root', 'a', '0'], null);
    expect(nodeAtPath(removed ?? tree, ['root', 'a'])?.children).toEqual([]);
    expect(replaceAtPath(tree, ['root'], null)).toBeNull();
  });
});

describe('tree snapshot (TREE)', () => {
  it('should strip handlers into bindings keyed by marker id', () => {
    const onClick = () => {};
    const onKeyDown = () => {};
    const App: Component = () => ({
      type: 'form',
      children: [
        { type: 'input', props: { value: 'x', onKeyDown } },
        {
          type: 'button',
          props: { onClick, [PRIORITY_ATTR]: 'critical', title: undefined },
          children: ['Go'],
        },
      ],
    });
    const root = new CompositionRoot({ batching: 'manual' });
    const { tree, bindings } = root.mount(App);

    expect(Array.from(bindings.keys())).toEqual(['root/0', 'root/1']);
    expect(bindings.get('root/0')?.handlers).toEqual({ keydown: onKeyDown });
    expect(bindings.get('root/1')).toEqual({
      markerId: 'root/1',
      type: 'button',
      handlers: { click: onClick },
      attributes: { [EVENTS_ATTR]: 'click', [PRIORITY_ATTR]: 'critical' },
    });
    expect(nodeAtPath(tree ?? sample(), ['root', '1'])?.props).toEqual({
      [PRIORITY_ATTR]: 'critical',
    });
    expect(nodeAtPath(tree ?? sample(), ['root', '0'])?.props).toEqual({ value: 'x' });
  });

  it('should reject host props that cannot be serialized', () => {
    const root = new CompositionRoot({ batching: 'manual' });
    const App: Component = () => ({ type: 'div', props: { when: new Date(0) } });
    expect(() => root.mount(App)).toThrow(
      'Property "when" on <div> at "root" is not serializable'
    );
  });

  it('should flatten nested component output into the host tree', () => {
    const Inner: Component = () => ({ type: 'b', children: ['deep'] });
    const Middle: Component = () => ({ type: Inner });
    const Empty: Component = () => null;
    const App: Component = () => ({
      type: 'p',
      children: [{ type: Middle }, { type: Empty }, 'tail'],
    });
    const root = new CompositionRoot({ batching: 'manual' });
    const { tree } = root.mount(App);

    const expected = createNode(
      'p',
      {},
      [createNode('b', {}, [textNode('deep', '0')], '0'), textNode('tail', '2')],
      'root'
    );
    expect(tree && treesEqual(tree, expected)).toBe(true);
  });

  it('should return an empty snapshot for a root that rendered nothing', () => {
    const root = new CompositionRoot({ batching: 'manual' });
    const snapshot = root.mount(() => null);
    expect(snapshot.tree).toBeNull();
    expect(snapshot.bindings.size).toBe(0);
    expect(snapshotTree(null).tree).toBeNull();
  });
});

describe('marker ids (TREE)', () => {
  it('should keep a key containing a slash apart from a nested path', () => {
    const onClick = () => {};
    const App: Component = () => ({
      type: 'div',
      children: [
        { type: 'a', props: { key: 'docs/api', onClick }, children: ['flat'] },
        {
          type: 'section',
          props: { key: 'docs' },
          children: [{ type: 'a', props: { key: 'api', onClick }, children: ['nested'] }],
        },
      ],
    });
    const root = new CompositionRoot({ batching: 'manual' });
    const { bindings } = root.mount(App);

    expect(Array.from(bindings.keys())).toEqual(['root/docs%2Fapi', 'root/docs/api']);
    expect(splitPath('root/docs%2Fapi')).toEqual(['root', 'docs/api']);
    expect(splitPath('root/docs/api')).toEqual(['root', 'docs', 'api']);
  });

  it('should escape every id delimiter and the escape character itself', () => {
    expect(escapeKey('a/b>c#d')).toBe('a%2Fb%3Ec%23d');
    expect(escapeKey('a%2Fb')).toBe('a%252Fb');
    expect(unescapeKey(escapeKey('a%2Fb'))).toBe('a%2Fb');
    expect(unescapeKey('a%2Fb%3Ec%23d')).toBe('a/b>c#d');
  });
});

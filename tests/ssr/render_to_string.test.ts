import { describe, it, expect } from 'vitest';
import type { Component } from '../../src/common/component';
import { RenderError, SSRDataMissingError } from '../../src/common/errors';
import { StateRegistry } from '../../src/runtime/registry';
import { resource } from '../../src/runtime/resource';
import { state } from '../../src/runtime/state';
import {
  readHydrationPayload,
  renderHydrationScript,
  renderNodeToString,
  renderToString,
} from '../../src/ssr';
import { escapeAttr, escapeText } from '../../src/ssr/escape';
import { createNode, textNode } from '../../src/tree/node';

const Counter: Component = () => {
  const count = state(3);
  return {
    type: 'button',
    props: { class: 'btn', onClick: () => count.set(count() + 1) },
    children: ['Count: ', count()],
  };
};

describe('renderToString (SSR)', () => {
  it('should render markup, markers and captured state', () => {
    const { html, context, payload } = renderToString(Counter, { timestamp: 1 });

    expect(html).toBe('<button class="btn" data-hk="root">Count: <!---->3</button>');
    expect(context.stateData).toEqual({ 'root#0': 3 });
    expect(context.hydrationMarkers).toEqual([
      { id: 'root', type: 'button', attributes: { 'data-events': 'click' } },
    ]);
    expect(context.timestamp).toBe(1);
    expect(JSON.parse(payload)).toEqual({
      componentTree: {
        type: 'button',
        props: { class: 'btn' },
        children: [
          { type: '#text', props: { value: 'Count: ' }, children: [], key: '0' },
          { type: '#text', props: { value: '3' }, children: [], key: '1' },
        ],
        key: 'root',
      },
      stateData: { 'root#0': 3 },
      hydrationMarkers: [
        { id: 'root', type: 'button', attributes: { 'data-events': 'click' } },
      ],
      timestamp: 1,
    });
  });

  it('should produce identical output for identical requests', () => {
    const first = renderToString(Counter, { timestamp: 1 });
    const second = renderToString(Counter, { timestamp: 1 });
    expect(second.payload).toBe(first.payload);
    expect(second.html).toBe(first.html);
  });

  it('should mark nested interactive nodes by key path', () => {
    const Item: Component = (props) => ({
      type: 'li',
      props: { onClick: () => {} },
      children: [String(props.label)],
    });
    const List: Component = () => ({
      type: 'ul',
      children: ['a', 'b'].map((label) => ({ type: Item, props: { key: label, label } })),
    });

    const { html, context } = renderToString(List, { timestamp: 1 });
    expect(html).toBe(
      '<ul data-hk="root"><li data-hk="root/a">a</li><li data-hk="root/b">b</li></ul>'
    );
    expect(context.hydrationMarkers.map((m) => m.id)).toEqual(['root', 'root/a', 'root/b']);
  });

  it('should escape text and attribute values', () => {
    const App: Component = () => ({
      type: 'p',
      props: { title: `say "hi" & 'bye'` },
      children: ['<script>alert(1)</script>'],
    });
    const { html } = renderToString(App, { timestamp: 1 });
    expect(html).toBe(
      '<p title="say &quot;hi&quot; &amp; &#x27;bye&#x27;" data-hk="root">&lt;script&gt;alert(1)&lt;/script&gt;</p>'
    );
  });

  it('should render void elements, boolean attributes and style objects', () => {
    const App: Component = () => ({
      type: 'div',
      props: { style: { fontSize: '12px', background: 'url(evil)' } },
      children: [{ type: 'br' }, { type: 'input', props: { value: 'x', disabled: true, hidden: false } }],
    });
    const { html } = renderToString(App, { timestamp: 1 });
    expect(html).toBe(
      '<div style="font-size:12px;" data-hk="root"><br /><input value="x" disabled /></div>'
    );
  });

  it('should reject Math.random during the server pass and restore it after', () => {
    const App: Component = () => String(Math.random());
    expect(() => renderToString(App, { timestamp: 1 })).toThrow(RenderError);
    expect(() => renderToString(App, { timestamp: 1 })).toThrow(
      'SSR Strict Purity: Math.random is not allowed during server rendering'
    );
    expect(typeof Math.random()).toBe('number');
  });

  it('should throw SSRDataMissingError for async resources', () => {
    const App: Component = () => {
      const r = resource(() => Promise.resolve('late'));
      return String(r.value);
    };
    expect(() => renderToString(App, { timestamp: 1 })).toThrow(SSRDataMissingError);
  });

  it('should render synchronous resources', () => {
    const App: Component = () => {
      const r = resource(() => 'ready');
      return { type: 'span', children: [String(r.value)] };
    };
    expect(renderToString(App, { timestamp: 1 }).html).toBe('<span data-hk="root">ready</span>');
  });

  it('should read persisted values from a per-request registry', () => {
    const App: Component = () => {
      const name = state('anon', { persistKey: 'user' });
      return { type: 'b', children: [name()] };
    };
    const registry = new StateRegistry({ user: 'ada' });
    const { html, context } = renderToString(App, { registry, timestamp: 1 });

    expect(html).toBe('<b data-hk="root">ada</b>');
    expect(context.stateData).toEqual({ user: 'ada' });
  });

  it('should refuse a root that renders nothing', () => {
    expect(() => renderToString(() => null, { timestamp: 1 })).toThrow(
      'renderToString(): the root component rendered nothing'
    );
  });
});

describe('HTML serialization (SSR)', () => {
  it('should reject invalid tag names', () => {
    expect(() => renderNodeToString(createNode('bad tag', {}, [], 'root'))).toThrow(
      'Invalid element type "bad tag" at "root"'
    );
  });

  it('should separate adjacent text nodes only', () => {
    const node = createNode(
      'p',
      {},
      [textNode('a', '0'), textNode('b', '1'), createNode('i', {}, [], '2'), textNode('c', '3')],
      'root'
    );
    expect(renderNodeToString(node)).toBe('<p>a<!---->b<i></i>c</p>');
  });

  it('should escape only the characters that need it', () => {
    expect(escapeText('a < b & c > d "q"')).toBe('a &lt; b &amp; c &gt; d "q"');
    expect(escapeAttr('plain')).toBe('plain');
  });
});

describe('hydration script (SSR)', () => {
  it('should escape closing tags inside the payload', () => {
    const script = renderHydrationScript(JSON.stringify({ s: '</script>&' }));
    expect(script).toBe(
      '<script type="application/json" id="__reweave_hydration__">{"s":"\\u003c/script\\u003e\\u0026"}</script>'
    );
  });

  it('should read back the same payload from a document', () => {
    const payload = JSON.stringify({ s: '</script><b>&\u2028' });
    const holder = document.createElement('div');
    holder.innerHTML = renderHydrationScript(payload);
    document.body.appendChild(holder);
    try {
      const read = readHydrationPayload(document);
      expect(read === null ? null : JSON.parse(read)).toEqual({ s: '</script><b>&\u2028' });
    } finally {
      holder.remove();
    }
  });

  it('should return null when no script is present', () => {
    expect(readHydrationPayload(document)).toBeNull();
  });
});

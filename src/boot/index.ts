/**
 * Client bootstrap and mount
 */

import type { Component } from '../common/component';
import type { Props } from '../common/props';
import type { RuntimeConfig } from '../common/config';
import { DeserializationError } from '../common/errors';
import { CompositionRoot } from '../runtime/composition';
import { StateRegistry } from '../runtime/registry';
import { restoreState } from '../runtime/snapshot';
import {
  HydrationManager,
  type HydrationReporter,
  type HydrationResult,
  type MarkerHost,
} from '../hydration/manager';
import type { HydrationContext } from '../hydration/wire';
import { DomRenderer } from '../renderer/dom';
import type { Renderer } from '../renderer/types';
import { readHydrationPayload } from '../ssr';

export interface RootConfig extends Partial<RuntimeConfig> {
  root: Element | string;
  component: Component;
  props?: Props;
  /** Defaults to a DomRenderer on the root element */
  renderer?: Renderer;
  onError?: (error: unknown) => void;
}

export interface HydrateRootConfig extends RootConfig {
  /**
   * Wire JSON from the server. When omitted, it is read from the
   * `__reweave_hydration__` script in the root element's document.
   */
  contextData?: string | null;
  reporter?: HydrationReporter;
}

export interface MountedRoot {
  readonly root: Element;
  readonly composition: CompositionRoot;
  dispose(): void;
}

export interface HydratedRoot extends MountedRoot {
  readonly result: HydrationResult;
}

function resolveRootElement(root: Element | string): Element {
  const element =
    typeof root === 'string' ? document.getElementById(root) : root;
  if (!element) throw new Error(`Root element not found: ${String(root)}`);
  return element;
}

function markerHostFor(renderer: Renderer): MarkerHost | undefined {
  if (!renderer.hasMarker) return undefined;
  return { hasMarker: (id) => renderer.hasMarker?.(id) === true };
}

function disposer(
  composition: CompositionRoot,
  rootElement: Element,
  ownsRenderer: boolean
): () => void {
  return () => {
    composition.dispose();
    if (ownsRenderer) rootElement.replaceChildren();
  };
}

/**
 * Adopt server markup under `root`: seed state from the server's
 * `stateData`, compose on the client, then let the hydration manager adopt,
 * patch or re-render. A missing or rejected context means a full client
 * render; it is never an error for the caller.
 */
export function hydrateRoot(config: HydrateRootConfig): HydratedRoot {
  const {
    root,
    component,
    props,
    renderer: customRenderer,
    onError,
    contextData,
    reporter,
    ...options
  } = config;
  if (typeof component !== 'function') {
    throw new Error('hydrateRoot: component must be a function');
  }

  const rootElement = resolveRootElement(root);
  const renderer = customRenderer ?? new DomRenderer(rootElement);
  const payload =
    contextData === undefined
      ? readHydrationPayload(rootElement.ownerDocument)
      : contextData;

  const registry = new StateRegistry();
  const composition = new CompositionRoot({ ...options, registry, onError });
  const manager = new HydrationManager({
    renderer,
    reporter,
    policy: composition.config.hydrationPolicy,
    verifyMarkers: composition.config.verifyMarkers,
  });

  let context: HydrationContext | null = null;
  if (payload) {
    try {
      context = manager.deserializeAndMatch(payload, markerHostFor(renderer));
    } catch (err) {
      if (!(err instanceof DeserializationError)) throw err;
    }
  }
  if (context) restoreState(context.stateData, registry);

  let result: HydrationResult;
  try {
    const snapshot = composition.mount(component, props);
    result = context
      ? manager.hydrate(context, snapshot)
      : manager.renderFresh(
          snapshot,
          payload ? 'hydration context rejected' : 'no hydration context'
        );
  } catch (err) {
    composition.dispose();
    throw err;
  }

  composition.attachRenderer(renderer);
  composition.runEffects();

  return {
    root: rootElement,
    composition,
    result,
    dispose: disposer(composition, rootElement, !customRenderer),
  };
}

/**
 * Full client render into `root`, replacing whatever it contains.
 */
export function createRoot(config: RootConfig): MountedRoot {
  const { root, component, props, renderer: customRenderer, onError, ...options } =
    config;
  if (typeof component !== 'function') {
    throw new Error('createRoot: component must be a function');
  }

  const rootElement = resolveRootElement(root);
  const renderer = customRenderer ?? new DomRenderer(rootElement);
  const composition = new CompositionRoot({ ...options, renderer, onError });
  composition.mount(component, props);
  composition.commit();

  return {
    root: rootElement,
    composition,
    dispose: disposer(composition, rootElement, !customRenderer),
  };
}

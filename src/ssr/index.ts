/**
 * Server rendering
 *
 * Each call builds its own composition root, renders once, serializes the
 * hydration context and tears the root down: no state survives between
 * requests.
 */

import type { Component } from '../common/component';
import type { Props } from '../common/props';
import type { RuntimeConfig } from '../common/config';
import { RenderError, SSRDataMissingError } from '../common/errors';
import { CompositionRoot } from '../runtime/composition';
import type { StateRegistry } from '../runtime/registry';
import { serializeHydrationContext } from '../hydration/serialize';
import {
  encodeHydrationContext,
  type HydrationContext,
} from '../hydration/wire';
import { escapeJsonForScript } from './escape';
import { withSSRStrictPurity } from './purity';
import { renderNodeToString } from './render';

export { renderNodeToString } from './render';
export { escapeAttr, escapeText, escapeJsonForScript } from './escape';

export const HYDRATION_SCRIPT_ID = '__reweave_hydration__';

export interface RenderToStringOptions
  extends Partial<Pick<RuntimeConfig, 'maxReexecutions' | 'debug'>> {
  props?: Props;
  /** Persist-key values visible to this request only */
  registry?: StateRegistry;
  /** Defaults to the wall clock at serialization time */
  timestamp?: number;
  rootKey?: string;
}

export interface ServerRenderResult {
  html: string;
  context: HydrationContext;
  /** `context` as wire JSON */
  payload: string;
}

function unwrap(error: unknown): unknown {
  if (error instanceof RenderError && error.cause instanceof SSRDataMissingError) {
    return error.cause;
  }
  return error;
}

export function renderToString(
  component: Component,
  options: RenderToStringOptions = {}
): ServerRenderResult {
  const { props, registry, timestamp, rootKey, ...config } = options;
  const errors: unknown[] = [];
  const root = new CompositionRoot({
    ...config,
    batching: 'manual',
    ssr: true,
    registry,
    rootKey,
    onError: (err) => errors.push(err),
  });

  try {
    const snapshot = withSSRStrictPurity(() => root.mount(component, props));
    if (errors.length > 0) throw unwrap(errors[0]);
    if (!snapshot.tree) {
      throw new Error('renderToString(): the root component rendered nothing');
    }

    const context = serializeHydrationContext(snapshot.tree, {
      stateData: root.captureState(),
      bindings: snapshot.bindings.values(),
      timestamp,
    });
    const markerIds = new Set(context.hydrationMarkers.map((m) => m.id));

    return {
      html: renderNodeToString(snapshot.tree, markerIds),
      context,
      payload: encodeHydrationContext(context),
    };
  } finally {
    root.dispose();
  }
}

/**
 * Inline the payload for `readHydrationPayload` to pick up on the client.
 */
export function renderHydrationScript(payload: string): string {
  return `<script type="application/json" id="${HYDRATION_SCRIPT_ID}">${escapeJsonForScript(payload)}</script>`;
}

export function readHydrationPayload(
  doc: Pick<Document, 'getElementById'>
): string | null {
  const script = doc.getElementById(HYDRATION_SCRIPT_ID);
  return script ? script.textContent : null;
}

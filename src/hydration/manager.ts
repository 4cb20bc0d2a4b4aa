/**
 * Hydration manager
 *
 * Runs the server→client handoff for one root, exactly once:
 *
 *   idle → deserializing → matching → adopted
 *                                   → mismatched → adopted-with-fallback
 *                                                → full-client-render
 *   deserializing → failed (caller falls back to a full client render)
 *
 * Failures degrade locally (a subtree, or the whole root) and are reported;
 * they never leave the presentation half-adopted.
 */

import type { HydrationPolicy } from '../common/config';
import { DEFAULT_CONFIG } from '../common/config';
import {
  DeserializationError,
  HydrationStateError,
  TreeIncompatibleError,
} from '../common/errors';
import { logger } from '../dev/logger';
import type { Renderer } from '../renderer/types';
import type { TreeSnapshot } from '../tree/snapshot';
import { planAdoption, validateTreeCompatibility } from './match';
import { orderByPriority } from './priority';
import {
  deserializeHydrationContext,
  type HydrationContext,
} from './wire';

export type HydrationPhase =
  | 'idle'
  | 'deserializing'
  | 'matching'
  | 'adopted'
  | 'mismatched'
  | 'adopted-with-fallback'
  | 'full-client-render'
  | 'failed';

export type HydrationEvent =
  | { type: 'deserialization-failed'; error: DeserializationError }
  | { type: 'marker-dropped'; markerId: string }
  | { type: 'subtree-mismatch'; error: TreeIncompatibleError }
  | { type: 'apply-failed'; error: unknown }
  | { type: 'full-client-render'; reason: string }
  | { type: 'adopted'; adoptedNodes: number; freshSubtrees: number };

export interface HydrationReporter {
  report(event: HydrationEvent): void;
}

/** Anything that can tell whether a marker's element is present */
export interface MarkerHost {
  hasMarker(markerId: string): boolean;
}

export interface HydrationResult {
  readonly phase: 'adopted' | 'adopted-with-fallback' | 'full-client-render';
  readonly adoptedNodes: number;
  readonly freshSubtrees: number;
  readonly removedSubtrees: number;
  /** Marker ids in the order they were bound */
  readonly boundMarkers: readonly string[];
  readonly mismatches: readonly TreeIncompatibleError[];
}

export interface HydrationManagerOptions {
  renderer: Renderer;
  reporter?: HydrationReporter;
  policy?: HydrationPolicy;
  /** Drop markers whose element the mount point does not contain */
  verifyMarkers?: boolean;
}

export const loggingReporter: HydrationReporter = {
  report(event) {
    switch (event.type) {
      case 'deserialization-failed':
        logger.warn('[Reweave] Hydration context rejected:', event.error.message);
        return;
      case 'marker-dropped':
        logger.warn(
          `[Reweave] Hydration marker "${event.markerId}" not found in the mount point; dropped`
        );
        return;
      case 'subtree-mismatch':
        logger.warn(`[Reweave] ${event.error.message}; rendering that subtree on the client`);
        return;
      case 'apply-failed':
        logger.error('[Reweave] Applying the hydration plan failed:', event.error);
        return;
      case 'full-client-render':
        logger.warn(`[Reweave] Full client render (${event.reason})`);
        return;
      case 'adopted':
        logger.debug(
          `[Reweave] Hydrated: ${event.adoptedNodes} node(s) adopted, ${event.freshSubtrees} rendered fresh`
        );
        return;
    }
  },
};

export class HydrationManager {
  private currentPhase: HydrationPhase = 'idle';
  private readonly renderer: Renderer;
  private readonly reporter: HydrationReporter;
  private readonly policy: HydrationPolicy;
  private readonly verifyMarkers: boolean;

  constructor(options: HydrationManagerOptions) {
    this.renderer = options.renderer;
    this.reporter = options.reporter ?? loggingReporter;
    this.policy = options.policy ?? DEFAULT_CONFIG.hydrationPolicy;
    this.verifyMarkers = options.verifyMarkers ?? DEFAULT_CONFIG.verifyMarkers;
  }

  get phase(): HydrationPhase {
    return this.currentPhase;
  }

  /**
   * Parse and validate the wire JSON. With a mount point, markers whose
   * element is absent are dropped so they are never bound to nothing.
   *
   * @throws DeserializationError (after reporting it); phase becomes `failed`
   */
  deserializeAndMatch(
    contextData: string,
    rootElement?: MarkerHost
  ): HydrationContext {
    if (this.currentPhase !== 'idle') {
      throw new HydrationStateError('deserializeAndMatch', this.currentPhase);
    }
    this.currentPhase = 'deserializing';

    let context: HydrationContext;
    try {
      context = deserializeHydrationContext(contextData);
    } catch (err) {
      this.currentPhase = 'failed';
      if (err instanceof DeserializationError) {
        this.reporter.report({ type: 'deserialization-failed', error: err });
      }
      throw err;
    }

    if (this.verifyMarkers && rootElement) {
      const present = context.hydrationMarkers.filter((marker) => {
        if (rootElement.hasMarker(marker.id)) return true;
        this.reporter.report({ type: 'marker-dropped', markerId: marker.id });
        return false;
      });
      context = { ...context, hydrationMarkers: present };
    }

    this.currentPhase = 'matching';
    return context;
  }

  validateTreeCompatibility(
    serverContext: HydrationContext,
    clientTree: TreeSnapshot['tree']
  ): boolean {
    return validateTreeCompatibility(serverContext, clientTree, this.policy);
  }

  /**
   * Adopt what matches, render the rest fresh, bind every marker. Runs once.
   */
  hydrate(context: HydrationContext, client: TreeSnapshot): HydrationResult {
    if (this.currentPhase !== 'idle' && this.currentPhase !== 'matching') {
      throw new HydrationStateError('hydrate', this.currentPhase);
    }
    this.currentPhase = 'matching';

    const plan = planAdoption(context, client, this.policy);
    const mismatches = plan.fresh.map((f) => f.error);
    for (const error of mismatches) {
      this.reporter.report({ type: 'subtree-mismatch', error });
    }

    if (plan.adoptedNodes === 0) {
      return this.renderFresh(client, 'root mismatch', mismatches);
    }

    this.currentPhase = plan.fullMatch ? 'adopted' : 'mismatched';

    let boundMarkers: string[];
    try {
      this.renderer.adopt?.(context.componentTree);
      for (const entry of plan.fresh) {
        if (entry.mode === 'replace') {
          this.renderer.createOrUpdate(entry.node, entry.path);
        }
      }
      if (plan.removals.length > 0) {
        const remove = this.renderer.remove?.bind(this.renderer);
        if (!remove) {
          throw new Error('Renderer cannot remove server-only subtrees');
        }
        for (let i = plan.removals.length - 1; i >= 0; i--) {
          remove(plan.removals[i]);
        }
      }
      for (const entry of plan.fresh) {
        if (entry.mode === 'append') {
          this.renderer.createOrUpdate(entry.node, entry.path);
        }
      }
      boundMarkers = this.bindAll(client);
    } catch (err) {
      this.reporter.report({ type: 'apply-failed', error: err });
      return this.renderFresh(client, 'apply failed', mismatches);
    }

    const phase = plan.fullMatch ? 'adopted' : 'adopted-with-fallback';
    this.currentPhase = phase;
    this.reporter.report({
      type: 'adopted',
      adoptedNodes: plan.adoptedNodes,
      freshSubtrees: plan.fresh.length,
    });

    return {
      phase,
      adoptedNodes: plan.adoptedNodes,
      freshSubtrees: plan.fresh.length,
      removedSubtrees: plan.removals.length,
      boundMarkers,
      mismatches,
    };
  }

  /**
   * Discard the server presentation and render the client snapshot as a
   * whole. Used for a rejected context and for an unrecoverable mismatch.
   */
  renderFresh(
    client: TreeSnapshot,
    reason: string,
    mismatches: readonly TreeIncompatibleError[] = []
  ): HydrationResult {
    this.currentPhase = 'full-client-render';
    this.reporter.report({ type: 'full-client-render', reason });

    try {
      if (client.tree) this.renderer.createOrUpdate(client.tree);
      const boundMarkers = this.bindAll(client);
      return {
        phase: 'full-client-render',
        adoptedNodes: 0,
        freshSubtrees: client.tree ? 1 : 0,
        removedSubtrees: 0,
        boundMarkers,
        mismatches,
      };
    } catch (err) {
      this.currentPhase = 'failed';
      throw err;
    }
  }

  private bindAll(client: TreeSnapshot): string[] {
    const bound: string[] = [];
    for (const binding of orderByPriority(client.bindings.values())) {
      this.renderer.bindMarker(binding.markerId, binding.handlers);
      bound.push(binding.markerId);
    }
    return bound;
  }
}

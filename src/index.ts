/**
 * Reweave: reactive composition runtime with server-to-client hydration
 *
 * Public API surface.
 */

// Bootstrap
export { hydrateRoot, createRoot } from './boot';
export type {
  RootConfig,
  HydrateRootConfig,
  MountedRoot,
  HydratedRoot,
} from './boot';

// Elements
export { h, isVNode } from './common/component';
export type { Component, VNode, Child, Renderable } from './common/component';
export type { Props, EventHandler } from './common/props';

// State and composition
export { state, toState, StateCell } from './runtime/state';
export type { State, StateOptions } from './runtime/state';
export { resource } from './runtime/resource';
export type { ResourceSnapshot, ResourceFn } from './runtime/resource';
export { onDispose, RenderScope } from './runtime/scope';
export { effect, onMount } from './runtime/effect';
export type { EffectFn, EffectCleanup } from './runtime/effect';
export type { RenderedNode } from './runtime/scope';
export { untracked, getCurrentScope, runInScope } from './runtime/tracker';
export { Scheduler } from './runtime/scheduler';
export type { Schedulable, SchedulerOptions } from './runtime/scheduler';
export { CompositionRoot } from './runtime/composition';
export type { CompositionOptions } from './runtime/composition';
export { StateRegistry } from './runtime/registry';
export { captureState, restoreState } from './runtime/snapshot';
export type { StateData } from './runtime/snapshot';

// Tree snapshot
export {
  createNode,
  textNode,
  treesEqual,
  joinPath,
  splitPath,
  walkTree,
  TEXT_TYPE,
  DEFAULT_ROOT_KEY,
} from './tree/node';
export type { ComponentNode, PropValue } from './tree/node';
export { snapshotTree, PRIORITY_ATTR } from './tree/snapshot';
export type { TreeSnapshot, MarkerBinding } from './tree/snapshot';

// Hydration
export { HydrationManager, loggingReporter } from './hydration/manager';
export type {
  HydrationPhase,
  HydrationEvent,
  HydrationReporter,
  HydrationResult,
  MarkerHost,
} from './hydration/manager';
export {
  deserializeHydrationContext,
  parseHydrationContext,
  encodeHydrationContext,
} from './hydration/wire';
export type { HydrationContext, DOMMarker } from './hydration/wire';
export { serializeHydrationContext } from './hydration/serialize';
export type { SerializeOptions } from './hydration/serialize';
export {
  validateTreeCompatibility,
  findIncompatibility,
  planAdoption,
} from './hydration/match';
export type { AdoptionPlan, FreshEntry } from './hydration/match';
export { orderByPriority, priorityOf } from './hydration/priority';
export type { HydrationPriority } from './hydration/priority';

// Rendering
export { DomRenderer } from './renderer/dom';
export type { Renderer } from './renderer/types';
export {
  renderToString,
  renderHydrationScript,
  readHydrationPayload,
  HYDRATION_SCRIPT_ID,
} from './ssr';
export type { RenderToStringOptions, ServerRenderResult } from './ssr';

// Configuration and errors
export { resolveConfig, DEFAULT_CONFIG } from './common/config';
export type { RuntimeConfig, BatchingMode, HydrationPolicy } from './common/config';
export {
  ReweaveError,
  isReweaveError,
  DeserializationError,
  TreeIncompatibleError,
  DuplicateMarkerError,
  HydrationStateError,
  SchedulingOverflowError,
  RenderError,
  SSRDataMissingError,
} from './common/errors';
export type { ErrorCode } from './common/errors';

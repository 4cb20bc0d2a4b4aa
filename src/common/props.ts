/**
 * Common call contracts: Props
 *
 * This file holds structural types shared across multiple modules.
 */

/**
 * Props accepted by components and elements.
 *
 * Host elements may only carry JSON-compatible values (see `PropValue`) and
 * `on*` event handlers; anything else fails snapshotting. Component props are
 * unrestricted because they never leave the composition.
 */
export interface Props {
  /** Stable identity among siblings */
  key?: string | number;
  [attr: string]: unknown;
}

export type EventHandler = (event: Event) => void;

const HANDLER_PROP_RE = /^on[A-Z]/;

export function isHandlerProp(name: string, value: unknown): value is EventHandler {
  return HANDLER_PROP_RE.test(name) && typeof value === 'function';
}

/** `onClick` → `click`, `onPointerDown` → `pointerdown` */
export function eventNameFromProp(name: string): string {
  return name.slice(2).toLowerCase();
}

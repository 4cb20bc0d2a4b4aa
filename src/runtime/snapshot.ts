/**
 * State snapshot for SSR and hydration
 * Captures every live state cell under its registry key (`<scopeId>#<slot>`
 * or its persist key) so a client can seed the same cells from `stateData`.
 */

import { logger } from '../dev/logger';
import { isJsonValue, type JsonValue } from '../shared/util';
import { StateCell } from './state';
import { StateRegistry } from './registry';
import type { RenderScope } from './scope';

export type StateData = Record<string, JsonValue>;

function isStateHandle(value: unknown): value is { cell: StateCell<unknown> } {
  return (
    typeof value === 'function' &&
    'cell' in value &&
    value.cell instanceof StateCell
  );
}

/**
 * Capture JSON-compatible state from live scopes. Values that cannot cross
 * the wire (functions, class instances, non-finite numbers) are skipped.
 */
export function captureState(scopes: Iterable<RenderScope>): StateData {
  const data: StateData = {};
  for (const scope of scopes) {
    for (const handle of scope.slotValues('state')) {
      if (!isStateHandle(handle)) continue;
      const { cell } = handle;
      if (cell.captureKey === null) continue;
      const value = cell.peek();
      if (isJsonValue(value)) {
        data[cell.captureKey] = value;
      } else {
        logger.debug(
          `[Reweave] state "${cell.captureKey}" is not JSON-compatible; not captured`
        );
      }
    }
  }
  return data;
}

/**
 * Seed a registry from captured state so that state cells declared at the
 * same slots start from the captured values.
 */
export function restoreState(
  stateData: Readonly<Record<string, unknown>>,
  registry: StateRegistry = new StateRegistry()
): StateRegistry {
  for (const [key, value] of Object.entries(stateData)) {
    registry.set(key, value);
  }
  return registry;
}

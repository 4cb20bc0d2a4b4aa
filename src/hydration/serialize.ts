import { DuplicateMarkerError } from '../common/errors';
import type { JsonValue } from '../shared/util';
import { joinPath, type ComponentNode } from '../tree/node';
import type { MarkerBinding } from '../tree/snapshot';
import type { DOMMarker, HydrationContext } from './wire';

export interface SerializeOptions {
  stateData?: Readonly<Record<string, JsonValue>>;
  /** Interactive nodes from the server snapshot, in document order */
  bindings?: Iterable<MarkerBinding>;
  /** Additional markers, appended after the binding markers */
  markers?: readonly DOMMarker[];
  timestamp?: number;
}

/**
 * Build the context a server pass hands to the client. The root node always
 * carries a marker (so the client can locate the mount), followed by one
 * marker per interactive node.
 *
 * @throws DuplicateMarkerError when two markers share an id
 */
export function serializeHydrationContext(
  tree: ComponentNode,
  options: SerializeOptions = {}
): HydrationContext {
  const rootId = joinPath([tree.key]);
  const fromBindings: DOMMarker[] = [];
  for (const binding of options.bindings ?? []) {
    fromBindings.push({
      id: binding.markerId,
      type: binding.type,
      attributes: { ...binding.attributes },
    });
  }

  const markers: DOMMarker[] = [];
  if (!fromBindings.some((m) => m.id === rootId)) {
    markers.push({ id: rootId, type: tree.type, attributes: {} });
  }
  markers.push(...fromBindings, ...(options.markers ?? []));

  const seen = new Set<string>();
  for (const marker of markers) {
    if (seen.has(marker.id)) throw new DuplicateMarkerError(marker.id);
    seen.add(marker.id);
  }

  return {
    componentTree: tree,
    stateData: { ...options.stateData },
    hydrationMarkers: markers,
    timestamp: options.timestamp ?? Date.now(),
  };
}

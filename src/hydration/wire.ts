/**
 * Hydration context wire codec
 *
 * The server embeds one JSON document per root:
 *
 * ```json
 * {
 *   "componentTree": { "type": "div", "props": {}, "children": [], "key": "root" },
 *   "stateData": { "root#0": 3 },
 *   "hydrationMarkers": [{ "id": "root", "type": "div", "attributes": {} }],
 *   "timestamp": 1700000000000
 * }
 * ```
 *
 * `componentTree` and `timestamp` are required. Everything else defaults to
 * empty, and a node without a key gets its sibling index (the root gets
 * `"root"`).
 */

import { z } from 'zod';
import { DeserializationError, DuplicateMarkerError } from '../common/errors';
import type { JsonValue } from '../shared/util';
import {
  createNode,
  DEFAULT_ROOT_KEY,
  type ComponentNode,
  type PropValue,
} from '../tree/node';

export interface DOMMarker {
  readonly id: string;
  readonly type: string;
  readonly attributes: Readonly<Record<string, string>>;
}

export interface HydrationContext {
  readonly componentTree: ComponentNode;
  readonly stateData: Readonly<Record<string, JsonValue>>;
  readonly hydrationMarkers: readonly DOMMarker[];
  /** Epoch milliseconds of the server pass */
  readonly timestamp: number;
}

interface WireNode {
  type: string;
  props?: Record<string, PropValue>;
  children?: WireNode[];
  key?: string | number;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const wireNodeSchema: z.ZodType<WireNode> = z.lazy(() =>
  z.object({
    type: z.string().min(1),
    props: z.record(jsonValueSchema).optional(),
    children: z.array(wireNodeSchema).optional(),
    key: z.union([z.string(), z.number()]).optional(),
  })
);

const markerSchema = z.object({
  id: z.string().min(1, 'marker id must be non-empty'),
  type: z.string(),
  attributes: z.record(z.string()).optional(),
});

export const hydrationContextSchema = z.object({
  componentTree: wireNodeSchema,
  stateData: z.record(jsonValueSchema).optional(),
  hydrationMarkers: z.array(markerSchema).optional(),
  timestamp: z.number().int().nonnegative(),
});

function normalizeNode(wire: WireNode, fallbackKey: string): ComponentNode {
  const key = wire.key === undefined ? fallbackKey : String(wire.key);
  const children = (wire.children ?? []).map((child, i) =>
    normalizeNode(child, String(i))
  );
  return createNode(wire.type, wire.props ?? {}, children, key);
}

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

/**
 * Validate an already-parsed value as a hydration context.
 */
export function parseHydrationContext(value: unknown): HydrationContext {
  const result = hydrationContextSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new DeserializationError(
      'invalid-shape',
      `Invalid hydration context JSON: ${issues.join('; ')}`,
      { issues, cause: result.error }
    );
  }

  const data = result.data;
  const markers: DOMMarker[] = [];
  const seen = new Set<string>();
  for (const marker of data.hydrationMarkers ?? []) {
    if (seen.has(marker.id)) {
      const cause = new DuplicateMarkerError(marker.id);
      throw new DeserializationError(
        'invalid-shape',
        `Invalid hydration context JSON: ${cause.message}`,
        { issues: [`hydrationMarkers: duplicate id "${marker.id}"`], cause }
      );
    }
    seen.add(marker.id);
    markers.push({
      id: marker.id,
      type: marker.type,
      attributes: marker.attributes ?? {},
    });
  }

  return {
    componentTree: normalizeNode(data.componentTree, DEFAULT_ROOT_KEY),
    stateData: data.stateData ?? {},
    hydrationMarkers: markers,
    timestamp: data.timestamp,
  };
}

/**
 * Parse and validate wire JSON. Never returns a partially populated context:
 * anything malformed throws a DeserializationError.
 */
export function deserializeHydrationContext(json: string): HydrationContext {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new DeserializationError(
      'malformed-json',
      `Failed to parse hydration context JSON: ${detail}`,
      { issues: [detail], cause: err }
    );
  }
  return parseHydrationContext(raw);
}

export function encodeHydrationContext(context: HydrationContext): string {
  return JSON.stringify({
    componentTree: context.componentTree,
    stateData: context.stateData,
    hydrationMarkers: context.hydrationMarkers,
    timestamp: context.timestamp,
  });
}

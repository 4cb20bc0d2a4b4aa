/**
 * Marker binding priority
 *
 * A node may carry `data-hydration-priority` to have its handlers bound
 * before (or after) the rest. Unknown or absent values count as `visible`.
 * Ordering is stable, so equal priorities keep document order.
 */

import { PRIORITY_ATTR } from '../tree/snapshot';

export type HydrationPriority = 'critical' | 'visible' | 'near' | 'deferred';

const RANK: Record<HydrationPriority, number> = {
  critical: 0,
  visible: 1,
  near: 2,
  deferred: 3,
};

function isPriority(value: string): value is HydrationPriority {
  return Object.prototype.hasOwnProperty.call(RANK, value);
}

export function priorityOf(
  attributes: Readonly<Record<string, string>>
): HydrationPriority {
  const raw = attributes[PRIORITY_ATTR];
  return raw !== undefined && isPriority(raw) ? raw : 'visible';
}

export function orderByPriority<
  T extends { readonly attributes: Readonly<Record<string, string>> },
>(items: Iterable<T>): T[] {
  return Array.from(items).sort(
    (a, b) => RANK[priorityOf(a.attributes)] - RANK[priorityOf(b.attributes)]
  );
}

/**
 * Small shared utilities
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      if (!isPlainObject(value)) return false;
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Structural equality used for no-op write detection: primitives by
 * `Object.is`, plain arrays and plain objects member-wise, everything else by
 * identity.
 */
export function structuralEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!structuralEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    for (const k of aKeys) {
      if (!Object.prototype.hasOwnProperty.call(b, k)) return false;
      if (!structuralEqual(a[k], b[k])) return false;
    }
    return true;
  }

  return false;
}

/**
 * Shallow prop comparison used to decide whether a reused child scope must
 * re-execute when its parent re-executes.
 */
export function shallowEqual(
  a: Readonly<Record<string, unknown>>,
  b: Readonly<Record<string, unknown>>
): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  for (const k of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, k)) return false;
    if (!Object.is(a[k], b[k])) return false;
  }
  return true;
}

/**
 * Type guard used when restoring a value from a registry: accept the stored
 * value only when it has the same runtime shape as the declared initial value.
 */
export function hasSameShape<T>(candidate: unknown, sample: T): candidate is T {
  if (sample === null || sample === undefined) return candidate === sample;
  if (Array.isArray(sample)) return Array.isArray(candidate);
  if (typeof sample === 'object') {
    return (
      candidate !== null &&
      typeof candidate === 'object' &&
      !Array.isArray(candidate)
    );
  }
  return typeof candidate === typeof sample;
}

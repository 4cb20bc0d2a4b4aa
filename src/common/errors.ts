/**
 * Runtime error taxonomy
 *
 * Every error the runtime raises on purpose carries a stable `code` so
 * callers and reporters can branch without matching on messages.
 */

export type ErrorCode =
  | 'HYDRATION_DESERIALIZATION_FAILED'
  | 'HYDRATION_TREE_INCOMPATIBLE'
  | 'HYDRATION_DUPLICATE_MARKER'
  | 'HYDRATION_INVALID_STATE'
  | 'SCHEDULING_OVERFLOW'
  | 'RENDER_FAILED'
  | 'SSR_DATA_MISSING';

export class ReweaveError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'ReweaveError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isReweaveError(value: unknown): value is ReweaveError {
  return value instanceof ReweaveError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export type DeserializationReason = 'malformed-json' | 'invalid-shape';

/**
 * Malformed or incomplete hydration context. Always recoverable by a full
 * client render of the whole root.
 */
export class DeserializationError extends ReweaveError {
  readonly reason: DeserializationReason;
  readonly issues: readonly string[];

  constructor(
    reason: DeserializationReason,
    message: string,
    options: { issues?: readonly string[]; cause?: unknown } = {}
  ) {
    super('HYDRATION_DESERIALIZATION_FAILED', message, {
      cause: options.cause,
    });
    this.name = 'DeserializationError';
    this.reason = reason;
    this.issues = options.issues ?? [];
  }
}

export type IncompatibilityReason =
  | 'type'
  | 'key'
  | 'text'
  | 'missing-on-server'
  | 'missing-on-client'
  | 'marker-missing';

/**
 * Server and client trees disagree at a node. Recoverable by rendering that
 * subtree fresh.
 */
export class TreeIncompatibleError extends ReweaveError {
  readonly path: string;
  readonly reason: IncompatibilityReason;
  readonly expected: string | null;
  readonly actual: string;

  constructor(
    path: string,
    reason: IncompatibilityReason,
    expected: string | null,
    actual: string
  ) {
    super(
      'HYDRATION_TREE_INCOMPATIBLE',
      `Hydration mismatch at "${path}" (${reason}): server has ${
        expected === null ? 'no node' : `"${expected}"`
      }, client rendered "${actual}"`
    );
    this.name = 'TreeIncompatibleError';
    this.path = path;
    this.reason = reason;
    this.expected = expected;
    this.actual = actual;
  }
}

export class DuplicateMarkerError extends ReweaveError {
  readonly markerId: string;

  constructor(markerId: string) {
    super(
      'HYDRATION_DUPLICATE_MARKER',
      `Duplicate hydration marker id "${markerId}". Marker ids must be unique within one hydration context; give sibling elements distinct keys.`
    );
    this.name = 'DuplicateMarkerError';
    this.markerId = markerId;
  }
}

export class HydrationStateError extends ReweaveError {
  constructor(operation: string, phase: string) {
    super(
      'HYDRATION_INVALID_STATE',
      `${operation}() is not allowed in hydration phase "${phase}". A hydration context is consumed exactly once.`
    );
    this.name = 'HydrationStateError';
  }
}

export class SchedulingOverflowError extends ReweaveError {
  readonly scopeId: string;
  readonly limit: number;

  constructor(scopeId: string, limit: number) {
    super(
      'SCHEDULING_OVERFLOW',
      `Render scope "${scopeId}" re-invalidated itself more than ${limit} times in one flush. ` +
        `This usually means it writes a state cell it also reads during render.`
    );
    this.name = 'SchedulingOverflowError';
    this.scopeId = scopeId;
    this.limit = limit;
  }
}

export class RenderError extends ReweaveError {
  readonly scopeId: string;

  constructor(scopeId: string, cause: unknown) {
    super(
      'RENDER_FAILED',
      `Render function for scope "${scopeId}" threw: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'RenderError';
    this.scopeId = scopeId;
  }
}

export class SSRDataMissingError extends ReweaveError {
  constructor(
    message = 'Server-side rendering requires all data to be available synchronously. This component attempted to use async data during SSR.'
  ) {
    super('SSR_DATA_MISSING', message);
    this.name = 'SSRDataMissingError';
  }
}

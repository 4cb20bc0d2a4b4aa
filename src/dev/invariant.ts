/**
 * Invariant assertion utilities for correctness checking
 *
 * Core principle: fail fast when invariants are violated
 * All functions throw descriptive errors for debugging
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[Reweave Invariant] ${message}${contextStr}`);
  }
}

/**
 * Assert scheduling precondition (not reentering, not after dispose, etc)
 * @internal
 */
export function assertSchedulingPrecondition(
  condition: boolean,
  violationMessage: string
): asserts condition {
  invariant(condition, `[Scheduler Precondition] ${violationMessage}`);
}

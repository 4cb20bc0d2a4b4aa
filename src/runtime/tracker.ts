/**
 * Dependency tracker
 *
 * Holds the dynamic "current scope" slot. Any state read that happens while a
 * render scope executes is attributed to that scope.
 *
 * INVARIANTS:
 * - The slot is restored in `finally`, so it is never left set after a throw
 * - Reads outside any scope (event handlers, effects, tests) are untracked
 */

export interface TrackingScope {
  readonly id: string;
  recordDependency(source: TrackedSource): void;
  invalidate(): void;
}

export interface TrackedSource {
  readonly id: number;
  addReader(scope: TrackingScope): void;
  removeReader(scope: TrackingScope): void;
}

let currentScope: TrackingScope | null = null;
let pausedDepth = 0;

export function getCurrentScope(): TrackingScope | null {
  return currentScope;
}

export function runInScope<T>(scope: TrackingScope | null, fn: () => T): T {
  const prevScope = currentScope;
  const prevPaused = pausedDepth;
  currentScope = scope;
  pausedDepth = 0;
  try {
    return fn();
  } finally {
    currentScope = prevScope;
    pausedDepth = prevPaused;
  }
}

/**
 * Run `fn` inside the current scope without recording any reads.
 */
export function untracked<T>(fn: () => T): T {
  pausedDepth++;
  try {
    return fn();
  } finally {
    pausedDepth--;
  }
}

export function trackRead(source: TrackedSource): void {
  if (currentScope === null || pausedDepth > 0) return;
  currentScope.recordDependency(source);
}

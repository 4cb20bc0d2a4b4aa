// Dev-only SSR strictness guard. Math.random and Date.now are replaced with
// throwing stubs while a server composition pass runs, so output that would
// differ between server and client fails fast instead of mismatching at
// hydration. The stack keeps nested renders from clobbering each other.
const guardStack: Array<{ random: () => number; now: () => number }> = [];

function pushSSRStrictPurityGuard(): void {
  if (process.env.NODE_ENV === 'production') return;
  guardStack.push({ random: Math.random, now: Date.now });
  Math.random = () => {
    throw new Error(
      'SSR Strict Purity: Math.random is not allowed during server rendering. Derive randomness from props or state instead.'
    );
  };
  Date.now = () => {
    throw new Error(
      'SSR Strict Purity: Date.now is not allowed during server rendering. Pass timestamps explicitly through props.'
    );
  };
}

function popSSRStrictPurityGuard(): void {
  if (process.env.NODE_ENV === 'production') return;
  const prev = guardStack.pop();
  if (prev) {
    Math.random = prev.random;
    Date.now = prev.now;
  }
}

export function withSSRStrictPurity<T>(fn: () => T): T {
  pushSSRStrictPurityGuard();
  try {
    return fn();
  } finally {
    popSSRStrictPurityGuard();
  }
}

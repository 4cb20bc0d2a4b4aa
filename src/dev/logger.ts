/**
 * Centralized logger interface
 * - Keeps production builds silent for debug/warn/info messages
 * - `debug` additionally requires REWEAVE_DEBUG=1
 * - Protects against missing `console` in some environments
 */

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

function callConsole(method: ConsoleMethod, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn = console[method];
  if (typeof fn !== 'function') return;
  try {
    fn.apply(console, args);
  } catch {
    // ignore logging errors
  }
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

export function isDebugEnabled(): boolean {
  const flag = process.env.REWEAVE_DEBUG;
  return !isProduction() && (flag === '1' || flag === 'true');
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (!isDebugEnabled()) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    callConsole('error', args);
  },
};

/**
 * Debug channel for an object that carries its own switch, such as a
 * composition root created with `debug: true`. Silent in production.
 */
export function debugChannel(enabled: boolean): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    if (!enabled || isProduction()) return;
    callConsole('debug', args);
  };
}

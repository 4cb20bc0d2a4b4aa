/**
 * Runtime configuration
 *
 * Explicit options win over environment variables, which win over defaults.
 */

import { logger } from '../dev/logger';

export type BatchingMode = 'microtask' | 'manual';

/**
 * `deep` requires type and key equality at every node of the subtree before
 * adopting server markup. `shallow` compares only the root node's type.
 */
export type HydrationPolicy = 'deep' | 'shallow';

export interface RuntimeConfig {
  batching: BatchingMode;
  /** Executions allowed per render scope in a single flush */
  maxReexecutions: number;
  hydrationPolicy: HydrationPolicy;
  /** Drop server markers whose element is absent from the mount point */
  verifyMarkers: boolean;
  debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<RuntimeConfig> = Object.freeze({
  batching: 'microtask',
  maxReexecutions: 25,
  hydrationPolicy: 'deep',
  verifyMarkers: true,
  debug: false,
});

type Env = Record<string, string | undefined>;

function fromEnv(env: Env): Partial<RuntimeConfig> {
  const out: Partial<RuntimeConfig> = {};

  const debug = env.REWEAVE_DEBUG;
  if (debug === '1' || debug === 'true') out.debug = true;

  const raw = env.REWEAVE_MAX_REEXECUTIONS;
  if (raw !== undefined && raw !== '') {
    const parsed = Number(raw);
    if (Number.isInteger(parsed) && parsed > 0) {
      out.maxReexecutions = parsed;
    } else {
      logger.warn(
        `[Reweave] ignoring REWEAVE_MAX_REEXECUTIONS=${JSON.stringify(raw)}: expected a positive integer`
      );
    }
  }

  return out;
}

export function resolveConfig(
  options: Partial<RuntimeConfig> = {},
  env: Env = process.env
): RuntimeConfig {
  const explicit: Partial<RuntimeConfig> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(explicit, { [key]: value });
  }

  const config: RuntimeConfig = {
    ...DEFAULT_CONFIG,
    ...fromEnv(env),
    ...explicit,
  };

  if (!Number.isInteger(config.maxReexecutions) || config.maxReexecutions < 1) {
    throw new RangeError(
      `maxReexecutions must be a positive integer, got ${config.maxReexecutions}`
    );
  }

  return config;
}

import { logger } from './logger.js';

// ---------------------------------------------------------------------------
// Flag registry
// ---------------------------------------------------------------------------

const FLAG_REGISTRY = {
  roleTools:    { prod: true, dev: true,  desc: 'Expose personas as call_role_<id> tools' },
  webSearch:    { prod: true, dev: false, desc: 'Web search tools backed by the search endpoint' },
  sessionSweep: { prod: true, dev: false, desc: 'Periodic deletion of idle sessions' },
} as const;

export type FeatureFlag = keyof typeof FLAG_REGISTRY;

export type ParleyMode = 'prod' | 'dev';

export interface Features {
  readonly mode: ParleyMode;
  isEnabled(flag: FeatureFlag): boolean;
  allFlags(): Record<FeatureFlag, boolean>;
}

/** camelCase flag -> FEATURE_SCREAMING_SNAKE, e.g. roleTools -> FEATURE_ROLE_TOOLS */
export function toEnvKey(flag: string): string {
  return `FEATURE_${flag.replace(/[A-Z]/g, (ch) => `_${ch}`).toUpperCase()}`;
}

function parseMode(raw: string | undefined): ParleyMode {
  return raw === 'dev' ? 'dev' : 'prod';
}

/**
 * Resolve flags from FEATURE_* overrides ('true' / '1' enable) falling back to
 * the PARLEY_MODE profile (default prod).
 */
export function createFeatures(env: NodeJS.ProcessEnv = process.env): Features {
  const mode = parseMode(env.PARLEY_MODE);
  const resolve = (flag: FeatureFlag): boolean => {
    const override = env[toEnvKey(flag)];
    return override !== undefined ? override === 'true' || override === '1' : FLAG_REGISTRY[flag][mode];
  };
  const resolved: Record<FeatureFlag, boolean> = {
    roleTools: resolve('roleTools'),
    webSearch: resolve('webSearch'),
    sessionSweep: resolve('sessionSweep'),
  };

  const known = new Set(Object.keys(FLAG_REGISTRY).map(toEnvKey));
  const unknownVars = Object.keys(env).filter((key) => key.startsWith('FEATURE_') && !known.has(key));
  if (unknownVars.length > 0) {
    logger.warn({ unknownVars }, 'unknown FEATURE_* env vars have no effect');
  }
  logger.debug({ mode, flags: resolved }, 'feature flags resolved');

  return {
    mode,
    isEnabled: (flag) => resolved[flag],
    allFlags: () => ({ ...resolved }),
  };
}

export const features: Features = createFeatures();

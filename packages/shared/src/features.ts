import { logger } from './logger.js';

const log = logger.child({ module: 'features' });

// ---------------------------------------------------------------------------
// Flag registry: every behaviour toggle the controller reads
// ---------------------------------------------------------------------------

const FLAG_REGISTRY = {
  autoReloadAll:  { prod: false, dev: false, desc: 'Reload every workload that consumes a changed resource, annotated or not' },
  reloadOnCreate: { prod: false, dev: false, desc: 'Treat ConfigMaps/Secrets created after startup as changes' },
  argoRollouts:   { prod: false, dev: false, desc: 'Include Argo Rollouts in the workload kinds' },
  openshift:      { prod: false, dev: false, desc: 'Include OpenShift DeploymentConfigs (auto-detected when unset)' },
  alertOnReload:  { prod: false, dev: false, desc: 'POST an alert to ALERT_WEBHOOK_URL after each reload' },
  telemetry:      { prod: true,  dev: false, desc: 'OpenTelemetry traces and metrics export' },
} as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Union of all known flag names. */
export type FeatureFlag = keyof typeof FLAG_REGISTRY;

export type RollwatchMode = 'prod' | 'dev';

export interface Features {
  readonly mode: RollwatchMode;
  isEnabled(flag: FeatureFlag): boolean;
  /** True when the flag was set through its FEATURE_* variable rather than the mode default. */
  isExplicit(flag: FeatureFlag): boolean;
  allFlags(): Record<FeatureFlag, boolean>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Convert a camelCase flag name to FEATURE_SCREAMING_SNAKE env var name.
 *
 * e.g. reloadOnCreate → FEATURE_RELOAD_ON_CREATE
 */
export function toEnvKey(flag: string): string {
  const snake = flag.replace(/[A-Z]/g, (ch) => `_${ch}`).toUpperCase();
  return `FEATURE_${snake}`;
}

function isFeatureFlag(name: string): name is FeatureFlag {
  return Object.prototype.hasOwnProperty.call(FLAG_REGISTRY, name);
}

function resolveMode(raw: string | undefined): RollwatchMode {
  if (raw === undefined || raw === '' || raw === 'prod') return 'prod';
  if (raw === 'dev') return 'dev';
  log.warn({ mode: raw }, 'unknown ROLLWATCH_MODE, falling back to prod');
  return 'prod';
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Resolve flags from, in order:
 * 1. FEATURE_<SCREAMING_SNAKE> env var override (`true`/`1` enable, anything else disables)
 * 2. Mode profile default from FLAG_REGISTRY
 *
 * Mode comes from ROLLWATCH_MODE; defaults to 'prod'.
 */
export function createFeatures(env: NodeJS.ProcessEnv = process.env): Features {
  const mode = resolveMode(env.ROLLWATCH_MODE);

  const resolved = {} as Record<FeatureFlag, boolean>;
  const explicit = new Set<FeatureFlag>();

  for (const flag of Object.keys(FLAG_REGISTRY)) {
    if (!isFeatureFlag(flag)) continue;
    const envVal = env[toEnvKey(flag)];
    if (envVal !== undefined) {
      resolved[flag] = envVal === 'true' || envVal === '1';
      explicit.add(flag);
    } else {
      resolved[flag] = FLAG_REGISTRY[flag][mode];
    }
  }

  const known = new Set(Object.keys(FLAG_REGISTRY).map(toEnvKey));
  const unknownVars = Object.keys(env).filter((key) => key.startsWith('FEATURE_') && !known.has(key));
  if (unknownVars.length > 0) {
    log.warn({ unknownVars }, 'unknown FEATURE_* env vars detected, these have no effect');
  }

  log.info({ mode, flags: resolved }, 'feature flags resolved');

  return {
    mode,
    isEnabled(flag: FeatureFlag): boolean {
      return resolved[flag] ?? false;
    },
    isExplicit(flag: FeatureFlag): boolean {
      return explicit.has(flag);
    },
    allFlags(): Record<FeatureFlag, boolean> {
      return { ...resolved };
    },
  };
}

// ---------------------------------------------------------------------------
// Singleton (convenience export)
// ---------------------------------------------------------------------------

export const features: Features = createFeatures();

import { z } from 'zod';
import { DEFAULT_ANNOTATIONS, logger, type AnnotationKeys, type ReloadStrategyName } from '@rollwatch/shared';
import type { AlertSink } from './alerts.js';
import { DEFAULT_DELAY_WINDOW_MS } from './coalescer.js';

const log = logger.child({ module: 'config' });

export type IgnorableResource = 'configMaps' | 'secrets';

export interface ControllerConfig {
  reloadStrategy: ReloadStrategyName;
  /** Empty means every namespace. */
  watchNamespace: string;
  namespacesToIgnore: string[];
  resourcesToIgnore: IgnorableResource[];
  delayWindowMs: number;
  healthPort: number;
  webhookUrl?: string;
  alert: {
    webhookUrl?: string;
    sink: AlertSink;
    additionalInfo?: string;
  };
  annotations: AnnotationKeys;
}

/** Env var that overrides each annotation key. `lastReloadedFrom` is fixed. */
const ANNOTATION_ENV: ReadonlyArray<readonly [Exclude<keyof AnnotationKeys, 'lastReloadedFrom'>, string]> = [
  ['configmapReload', 'CONFIGMAP_ANNOTATION'],
  ['secretReload', 'SECRET_ANNOTATION'],
  ['auto', 'AUTO_ANNOTATION'],
  ['configmapAuto', 'CONFIGMAP_AUTO_ANNOTATION'],
  ['secretAuto', 'SECRET_AUTO_ANNOTATION'],
  ['search', 'AUTO_SEARCH_ANNOTATION'],
  ['match', 'SEARCH_MATCH_ANNOTATION'],
  ['configmapExclude', 'CONFIGMAP_EXCLUDE_ANNOTATION'],
  ['secretExclude', 'SECRET_EXCLUDE_ANNOTATION'],
  ['delayedUpgrade', 'DELAYED_UPGRADE_ANNOTATION'],
  ['ignore', 'IGNORE_ANNOTATION'],
  ['rolloutStrategy', 'ROLLOUT_STRATEGY_ANNOTATION'],
];

function parseCommaSeparated(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

const emptyToUndefined = (v: unknown) => (v === '' ? undefined : v);

const envSchema = z.object({
  RELOAD_STRATEGY: z.preprocess(emptyToUndefined, z.enum(['env-vars', 'annotations']).default('env-vars')),
  WATCH_NAMESPACE: z.string().default(''),
  NAMESPACES_TO_IGNORE: z.string().optional().transform(parseCommaSeparated),
  RESOURCES_TO_IGNORE: z
    .string()
    .optional()
    .transform(parseCommaSeparated)
    .pipe(z.array(z.enum(['configMaps', 'secrets']))),
  DELAYED_UPGRADE_WINDOW_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_DELAY_WINDOW_MS),
  ),
  HEALTH_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(9090)),
  WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  ALERT_WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  ALERT_SINK: z.preprocess(
    (v) => (typeof v === 'string' && v !== '' ? v.toLowerCase() : undefined),
    z.enum(['slack', 'teams', 'gchat', 'raw']).default('raw'),
  ),
  ALERT_ADDITIONAL_INFO: z.preprocess(emptyToUndefined, z.string().optional()),
});

function loadAnnotationKeys(env: NodeJS.ProcessEnv): AnnotationKeys {
  const keys: AnnotationKeys = { ...DEFAULT_ANNOTATIONS };
  for (const [field, envName] of ANNOTATION_ENV) {
    const override = env[envName]?.trim();
    if (override) keys[field] = override;
  }
  return keys;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ControllerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid controller configuration: ${issues}`);
  }
  const e = parsed.data;

  const config: ControllerConfig = {
    reloadStrategy: e.RELOAD_STRATEGY,
    watchNamespace: e.WATCH_NAMESPACE.trim(),
    namespacesToIgnore: e.NAMESPACES_TO_IGNORE,
    resourcesToIgnore: e.RESOURCES_TO_IGNORE,
    delayWindowMs: e.DELAYED_UPGRADE_WINDOW_MS,
    healthPort: e.HEALTH_PORT,
    webhookUrl: e.WEBHOOK_URL,
    alert: {
      webhookUrl: e.ALERT_WEBHOOK_URL,
      sink: e.ALERT_SINK,
      additionalInfo: e.ALERT_ADDITIONAL_INFO,
    },
    annotations: loadAnnotationKeys(env),
  };

  log.info(
    {
      reloadStrategy: config.reloadStrategy,
      watchNamespace: config.watchNamespace || 'all',
      namespacesToIgnore: config.namespacesToIgnore,
      resourcesToIgnore: config.resourcesToIgnore,
      delayWindowMs: config.delayWindowMs,
    },
    'controller configuration loaded',
  );
  if (config.webhookUrl) {
    log.warn('WEBHOOK_URL is set: changes are sent to the webhook and workloads are not updated');
  }

  return config;
}

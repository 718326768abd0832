import type { ChangeConfig, ConfigKind } from './types.js';

/** Every annotation key the controller reads or writes. */
export interface AnnotationKeys {
  configmapReload: string;
  secretReload: string;
  auto: string;
  configmapAuto: string;
  secretAuto: string;
  search: string;
  match: string;
  configmapExclude: string;
  secretExclude: string;
  /** Presence-only; the value is not read. */
  delayedUpgrade: string;
  ignore: string;
  rolloutStrategy: string;
  lastReloadedFrom: string;
}

export const DEFAULT_ANNOTATIONS: Readonly<AnnotationKeys> = Object.freeze({
  configmapReload: 'configmap.reloader.stakater.com/reload',
  secretReload: 'secret.reloader.stakater.com/reload',
  auto: 'reloader.stakater.com/auto',
  configmapAuto: 'configmap.reloader.stakater.com/auto',
  secretAuto: 'secret.reloader.stakater.com/auto',
  search: 'reloader.stakater.com/search',
  match: 'reloader.stakater.com/match',
  configmapExclude: 'configmaps.exclude.reloader.stakater.com/reload',
  secretExclude: 'secrets.exclude.reloader.stakater.com/reload',
  delayedUpgrade: 'reloader.stakater.com/delayed-upgrade',
  ignore: 'reloader.stakater.com/ignore',
  rolloutStrategy: 'reloader.stakater.com/rollout-strategy',
  lastReloadedFrom: 'reloader.stakater.com/last-reloaded-from',
});

export function reloadAnnotationFor(kind: ConfigKind, keys: AnnotationKeys): string {
  return kind === 'configmap' ? keys.configmapReload : keys.secretReload;
}

export function typedAutoAnnotationFor(kind: ConfigKind, keys: AnnotationKeys): string {
  return kind === 'configmap' ? keys.configmapAuto : keys.secretAuto;
}

export function excludeAnnotationFor(kind: ConfigKind, keys: AnnotationKeys): string {
  return kind === 'configmap' ? keys.configmapExclude : keys.secretExclude;
}

export interface ChangeSource {
  kind: ConfigKind;
  name: string;
  namespace: string;
  contentHash: string;
  annotations?: Record<string, string>;
}

/** Build the immutable change record for one detected ConfigMap/Secret change. */
export function createChangeConfig(source: ChangeSource, keys: AnnotationKeys): ChangeConfig {
  return Object.freeze({
    resourceName: source.name,
    namespace: source.namespace,
    kind: source.kind,
    annotationKey: reloadAnnotationFor(source.kind, keys),
    typedAutoAnnotationKey: typedAutoAnnotationFor(source.kind, keys),
    contentHash: source.contentHash,
    resourceAnnotations: Object.freeze({ ...(source.annotations ?? {}) }),
  });
}

// ---------------------------------------------------------------------------
// Change events
// ---------------------------------------------------------------------------

/** The two resource kinds whose content drives reloads. */
export type ConfigKind = 'configmap' | 'secret';

/** One detected ConfigMap/Secret change, as handed to the evaluator. */
export interface ChangeConfig {
  readonly resourceName: string;
  readonly namespace: string;
  readonly kind: ConfigKind;
  /** Manual reload annotation for this kind (e.g. configmap.reloader.stakater.com/reload). */
  readonly annotationKey: string;
  readonly typedAutoAnnotationKey: string;
  readonly contentHash: string;
  /** Annotations on the ConfigMap/Secret itself, read for search matching. */
  readonly resourceAnnotations: Readonly<Record<string, string>>;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export type EvaluationResult = 'updated' | 'not-updated' | 'no-container-found' | 'no-env-var-found';

/** Reload strategy names accepted by RELOAD_STRATEGY. */
export type ReloadStrategyName = 'env-vars' | 'annotations';

/**
 * Informational record written to the pod template by the annotations strategy.
 * Only the most recent reload is kept.
 */
export interface ReloadSource {
  type: 'CONFIGMAP' | 'SECRET';
  name: string;
  namespace: string;
  hash: string;
  containerRefs: string[];
  observedAt: number;
}

/** Suffix used in env var names and reload records for a config kind. */
export function kindSuffix(kind: ConfigKind): 'CONFIGMAP' | 'SECRET' {
  return kind === 'configmap' ? 'CONFIGMAP' : 'SECRET';
}

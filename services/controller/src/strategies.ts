import type * as k8s from '@kubernetes/client-node';
import {
  kindSuffix,
  logger,
  type ChangeConfig,
  type ConfigKind,
  type EvaluationResult,
  type ReloadSource,
  type ReloadStrategyName,
} from '@rollwatch/shared';
import type { ResourceAdapter } from './adapters/types.js';
import { findConsumingContainer } from './usage-scanner.js';

const log = logger.child({ module: 'strategies' });

export const ENV_VAR_PREFIX = 'STAKATER_';

/**
 * Mutates `item` in place so that applying it rolls the pods.
 * Nothing is sent to the API server here; the evaluator applies the item once per pass.
 */
export interface UpdateStrategy {
  readonly name: ReloadStrategyName;
  apply<T extends k8s.KubernetesObject>(
    adapter: ResourceAdapter<T>,
    item: T,
    change: ChangeConfig,
    autoReload: boolean,
  ): EvaluationResult;
}

/**
 * Upper-case the name, keep [A-Z0-9], and collapse every run of other characters
 * into a single underscore. A leading run is dropped.
 *
 * e.g. app-config → APP_CONFIG, my..db.secret → MY_DB_SECRET
 */
export function toEnvVarName(text: string): string {
  let out = '';
  let lastValid = false;
  for (const ch of text.toUpperCase()) {
    if ((ch >= 'A' && ch <= 'Z') || (ch >= '0' && ch <= '9')) {
      out += ch;
      lastValid = true;
    } else {
      if (lastValid) out += '_';
      lastValid = false;
    }
  }
  return out;
}

export function envVarNameFor(resourceName: string, kind: ConfigKind): string {
  return `${ENV_VAR_PREFIX}${toEnvVarName(resourceName)}_${kindSuffix(kind)}`;
}

function setExistingEnvVar(containers: k8s.V1Container[], name: string, value: string): EvaluationResult {
  for (const container of containers) {
    const envVar = container.env?.find((e) => e.name === name);
    if (!envVar) continue;
    if (envVar.value === value) return 'not-updated';
    envVar.value = value;
    return 'updated';
  }
  return 'no-env-var-found';
}

export function createEnvVarStrategy(): UpdateStrategy {
  return {
    name: 'env-vars',
    apply(adapter, item, change, autoReload) {
      const container = findConsumingContainer(adapter, item, change, autoReload);
      if (!container) return 'no-container-found';

      const name = envVarNameFor(change.resourceName, change.kind);
      const result = setExistingEnvVar(adapter.getContainers(item), name, change.contentHash);
      if (result !== 'no-env-var-found') return result;

      if (!container.env) container.env = [];
      container.env.push({ name, value: change.contentHash });
      return 'updated';
    },
  };
}

export function createAnnotationStrategy(lastReloadedFromKey: string): UpdateStrategy {
  return {
    name: 'annotations',
    apply(adapter, item, change, autoReload) {
      const container = findConsumingContainer(adapter, item, change, autoReload);
      if (!container) return 'no-container-found';

      const source: ReloadSource = {
        type: kindSuffix(change.kind),
        name: change.resourceName,
        namespace: change.namespace,
        hash: change.contentHash,
        containerRefs: [container.name],
        observedAt: Math.floor(Date.now() / 1000),
      };

      let serialized: string;
      try {
        serialized = JSON.stringify(source);
      } catch (err) {
        log.error({ err, resource: change.resourceName }, 'failed to serialize reload source annotation');
        return 'not-updated';
      }

      const podAnnotations = adapter.getPodAnnotations(item);
      if (!podAnnotations) return 'not-updated';
      podAnnotations[lastReloadedFromKey] = serialized;
      return 'updated';
    },
  };
}

export function createStrategy(name: ReloadStrategyName, lastReloadedFromKey: string): UpdateStrategy {
  return name === 'annotations' ? createAnnotationStrategy(lastReloadedFromKey) : createEnvVarStrategy();
}

import type * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import type { AnnotationKeys } from '@rollwatch/shared';
import type { WorkloadClients } from '../kube.js';
import { definePodTemplateAdapter } from './pod-template.js';
import type { ResourceAdapter } from './types.js';
import { itemName } from './types.js';

/** OpenShift apps.openshift.io/v1 DeploymentConfig, reduced to what the controller reads. */
export interface DeploymentConfig extends k8s.KubernetesObject {
  spec?: {
    template?: k8s.V1PodTemplateSpec;
    [field: string]: unknown;
  };
}

/** Argo argoproj.io/v1alpha1 Rollout, reduced to what the controller reads. */
export interface Rollout extends k8s.KubernetesObject {
  spec?: {
    template?: k8s.V1PodTemplateSpec;
    restartAt?: string;
    [field: string]: unknown;
  };
}

interface CustomResource {
  group: string;
  version: string;
  plural: string;
}

const DEPLOYMENT_CONFIGS: CustomResource = { group: 'apps.openshift.io', version: 'v1', plural: 'deploymentconfigs' };
const ROLLOUTS: CustomResource = { group: 'argoproj.io', version: 'v1alpha1', plural: 'rollouts' };

const groupVersion = (resource: CustomResource): string => `${resource.group}/${resource.version}`;

function isObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function customObjectList<T extends k8s.KubernetesObject>() {
  return z.object({ items: z.array(z.custom<T>(isObject, 'expected a Kubernetes object')) });
}

const deploymentConfigList = customObjectList<DeploymentConfig>();
const rolloutList = customObjectList<Rollout>();

async function listCustom<T extends k8s.KubernetesObject>(
  clients: WorkloadClients,
  resource: CustomResource,
  namespace: string,
  schema: z.ZodType<{ items: T[] }>,
): Promise<T[]> {
  const res: unknown = await clients.custom.listNamespacedCustomObject({ ...resource, namespace });
  return schema.parse(res).items;
}

async function replaceCustom(
  clients: WorkloadClients,
  resource: CustomResource,
  namespace: string,
  item: k8s.KubernetesObject,
): Promise<unknown> {
  return clients.custom.replaceNamespacedCustomObject({ ...resource, namespace, name: itemName(item), body: item });
}

export const deploymentConfigAdapter = definePodTemplateAdapter<DeploymentConfig>({
  kind: 'DeploymentConfig',
  apiVersion: groupVersion(DEPLOYMENT_CONFIGS),
  template: (item) => item.spec?.template,
  list: (clients, namespace) => listCustom(clients, DEPLOYMENT_CONFIGS, namespace, deploymentConfigList),
  update: (clients, namespace, item) => replaceCustom(clients, DEPLOYMENT_CONFIGS, namespace, item),
});

/**
 * Rollouts annotated with `<rolloutStrategy>: restart` also get `spec.restartAt`,
 * which makes Argo restart the pods in place instead of running a new rollout.
 */
export function createRolloutAdapter(keys: Pick<AnnotationKeys, 'rolloutStrategy'>): ResourceAdapter<Rollout> {
  return definePodTemplateAdapter<Rollout>({
    kind: 'Rollout',
    apiVersion: groupVersion(ROLLOUTS),
    template: (item) => item.spec?.template,
    list: (clients, namespace) => listCustom(clients, ROLLOUTS, namespace, rolloutList),
    update: (clients, namespace, item) => {
      if (item.metadata?.annotations?.[keys.rolloutStrategy] === 'restart') {
        item.spec = { ...item.spec, restartAt: new Date().toISOString() };
      }
      return replaceCustom(clients, ROLLOUTS, namespace, item);
    },
  });
}

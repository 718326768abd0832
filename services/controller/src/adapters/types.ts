import type * as k8s from '@kubernetes/client-node';
import type { WorkloadClients } from '../kube.js';

export type WorkloadKind = 'Deployment' | 'CronJob' | 'DaemonSet' | 'StatefulSet' | 'DeploymentConfig' | 'Rollout';

/**
 * Capability set for one workload kind. The evaluator only ever touches
 * workload objects through the adapter that listed them.
 */
export interface ResourceAdapter<T extends k8s.KubernetesObject = k8s.KubernetesObject> {
  readonly kind: WorkloadKind;
  /** Listed items carry no apiVersion of their own, so the adapter supplies it. */
  readonly apiVersion: string;
  /** Never rejects: listing errors are logged and yield an empty list. */
  listItems(clients: WorkloadClients, namespace: string): Promise<T[]>;
  getAnnotations(item: T): Record<string, string>;
  /** Live pod template annotation map (created when missing); undefined when the item has no pod template. */
  getPodAnnotations(item: T): Record<string, string> | undefined;
  getContainers(item: T): k8s.V1Container[];
  getInitContainers(item: T): k8s.V1Container[];
  getVolumes(item: T): k8s.V1Volume[];
  /** Rejects with UpdateError. */
  applyUpdate(clients: WorkloadClients, namespace: string, item: T): Promise<void>;
}

export function itemName(item: k8s.KubernetesObject): string {
  return item.metadata?.name ?? '';
}

import type * as k8s from '@kubernetes/client-node';
import { vi } from 'vitest';
import { createChangeConfig, DEFAULT_ANNOTATIONS, type ChangeConfig, type ConfigKind } from '@rollwatch/shared';
import type { WorkloadClients } from '../kube.js';

export const keys = { ...DEFAULT_ANNOTATIONS };

export interface PodSpecParts {
  namespace?: string;
  annotations?: Record<string, string>;
  podAnnotations?: Record<string, string>;
  containers?: k8s.V1Container[];
  initContainers?: k8s.V1Container[];
  volumes?: k8s.V1Volume[];
}

export function podTemplate(parts: PodSpecParts): k8s.V1PodTemplateSpec {
  return {
    metadata: parts.podAnnotations ? { annotations: { ...parts.podAnnotations } } : undefined,
    spec: {
      containers: parts.containers ?? [{ name: 'app', image: 'app:1' }],
      initContainers: parts.initContainers,
      volumes: parts.volumes,
    },
  };
}

export function deployment(name: string, parts: PodSpecParts = {}): k8s.V1Deployment {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name, namespace: parts.namespace ?? 'default', annotations: parts.annotations },
    spec: {
      selector: { matchLabels: { app: name } },
      template: podTemplate(parts),
    },
  };
}

export function cronJob(name: string, parts: PodSpecParts = {}): k8s.V1CronJob {
  return {
    apiVersion: 'batch/v1',
    kind: 'CronJob',
    metadata: { name, namespace: parts.namespace ?? 'default', uid: `${name}-uid`, annotations: parts.annotations },
    spec: {
      schedule: '*/5 * * * *',
      jobTemplate: {
        metadata: { labels: { job: name } },
        spec: { template: podTemplate(parts) },
      },
    },
  };
}

export interface ChangeParts {
  kind?: ConfigKind;
  namespace?: string;
  hash?: string;
  annotations?: Record<string, string>;
}

export function change(name: string, parts: ChangeParts = {}): ChangeConfig {
  return createChangeConfig(
    {
      kind: parts.kind ?? 'configmap',
      name,
      namespace: parts.namespace ?? 'default',
      contentHash: parts.hash ?? 'hash-1',
      annotations: parts.annotations,
    },
    keys,
  );
}

export const envFromConfigMap = (name: string): k8s.V1EnvFromSource => ({ configMapRef: { name } });
export const envFromSecret = (name: string): k8s.V1EnvFromSource => ({ secretRef: { name } });

export interface ClusterState {
  deployments?: k8s.V1Deployment[];
  daemonSets?: k8s.V1DaemonSet[];
  statefulSets?: k8s.V1StatefulSet[];
  cronJobs?: k8s.V1CronJob[];
  customObjects?: k8s.KubernetesObject[];
}

/** In-memory stand-in for the API calls the adapters make. */
export function fakeClients(state: ClusterState = {}) {
  const apps = {
    listNamespacedDeployment: vi.fn(async () => ({ items: state.deployments ?? [] })),
    replaceNamespacedDeployment: vi.fn(async (req: { body: k8s.V1Deployment }) => req.body),
    listNamespacedDaemonSet: vi.fn(async () => ({ items: state.daemonSets ?? [] })),
    replaceNamespacedDaemonSet: vi.fn(async (req: { body: k8s.V1DaemonSet }) => req.body),
    listNamespacedStatefulSet: vi.fn(async () => ({ items: state.statefulSets ?? [] })),
    replaceNamespacedStatefulSet: vi.fn(async (req: { body: k8s.V1StatefulSet }) => req.body),
  };
  const batch = {
    listNamespacedCronJob: vi.fn(async () => ({ items: state.cronJobs ?? [] })),
    createNamespacedJob: vi.fn(async (req: { body: k8s.V1Job }) => req.body),
  };
  const custom = {
    listNamespacedCustomObject: vi.fn(async (): Promise<object> => ({ items: state.customObjects ?? [] })),
    replaceNamespacedCustomObject: vi.fn(async (req: { body: object }): Promise<object> => req.body),
  };
  const clients: WorkloadClients = { apps, batch, custom };
  return { clients, apps, batch, custom };
}

/** Deep copy, so a test can compare an item before and after mutation. */
export function clone<T>(value: T): T {
  return structuredClone(value);
}

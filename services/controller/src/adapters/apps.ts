import type * as k8s from '@kubernetes/client-node';
import { definePodTemplateAdapter } from './pod-template.js';
import { itemName } from './types.js';

export const deploymentAdapter = definePodTemplateAdapter<k8s.V1Deployment>({
  kind: 'Deployment',
  apiVersion: 'apps/v1',
  template: (item) => item.spec?.template,
  list: async (clients, namespace) => (await clients.apps.listNamespacedDeployment({ namespace })).items,
  update: (clients, namespace, item) =>
    clients.apps.replaceNamespacedDeployment({ name: itemName(item), namespace, body: item }),
});

export const daemonSetAdapter = definePodTemplateAdapter<k8s.V1DaemonSet>({
  kind: 'DaemonSet',
  apiVersion: 'apps/v1',
  template: (item) => item.spec?.template,
  list: async (clients, namespace) => (await clients.apps.listNamespacedDaemonSet({ namespace })).items,
  update: (clients, namespace, item) =>
    clients.apps.replaceNamespacedDaemonSet({ name: itemName(item), namespace, body: item }),
});

export const statefulSetAdapter = definePodTemplateAdapter<k8s.V1StatefulSet>({
  kind: 'StatefulSet',
  apiVersion: 'apps/v1',
  template: (item) => item.spec?.template,
  list: async (clients, namespace) => (await clients.apps.listNamespacedStatefulSet({ namespace })).items,
  update: (clients, namespace, item) =>
    clients.apps.replaceNamespacedStatefulSet({ name: itemName(item), namespace, body: item }),
});

import type * as k8s from '@kubernetes/client-node';
import { logger } from '@rollwatch/shared';
import { UpdateError } from '../errors.js';
import type { WorkloadClients } from '../kube.js';
import { itemName, type ResourceAdapter, type WorkloadKind } from './types.js';

const log = logger.child({ module: 'adapters' });

export interface PodTemplateAccess<T extends k8s.KubernetesObject> {
  kind: WorkloadKind;
  /** Group/version the kind is served under, e.g. `apps/v1`. */
  apiVersion: string;
  template(item: T): k8s.V1PodTemplateSpec | undefined;
  list(clients: WorkloadClients, namespace: string): Promise<T[]>;
  update(clients: WorkloadClients, namespace: string, item: T): Promise<unknown>;
}

/**
 * Build an adapter for any kind whose pods come from a single pod template.
 * Kinds differ only in where the template lives and which API call lists/updates them.
 */
export function definePodTemplateAdapter<T extends k8s.KubernetesObject>(
  access: PodTemplateAccess<T>,
): ResourceAdapter<T> {
  return {
    kind: access.kind,
    apiVersion: access.apiVersion,

    async listItems(clients, namespace) {
      try {
        return await access.list(clients, namespace);
      } catch (err) {
        log.error({ err, kind: access.kind, namespace }, 'failed to list workloads');
        return [];
      }
    },

    getAnnotations(item) {
      return item.metadata?.annotations ?? {};
    },

    getPodAnnotations(item) {
      const template = access.template(item);
      if (!template) return undefined;
      if (!template.metadata) template.metadata = {};
      if (!template.metadata.annotations) template.metadata.annotations = {};
      return template.metadata.annotations;
    },

    getContainers(item) {
      return access.template(item)?.spec?.containers ?? [];
    },

    getInitContainers(item) {
      return access.template(item)?.spec?.initContainers ?? [];
    },

    getVolumes(item) {
      return access.template(item)?.spec?.volumes ?? [];
    },

    async applyUpdate(clients, namespace, item) {
      try {
        await access.update(clients, namespace, item);
      } catch (err) {
        throw new UpdateError(access.kind, namespace, itemName(item), err);
      }
    },
  };
}

import type * as k8s from '@kubernetes/client-node';
import type { ChangeConfig, ConfigKind } from '@rollwatch/shared';
import type { ResourceAdapter } from './adapters/types.js';

/** Name of the pod volume that mounts the resource, directly or through a projected volume. */
export function findVolumeName(volumes: k8s.V1Volume[], kind: ConfigKind, resourceName: string): string | undefined {
  for (const volume of volumes) {
    if (kind === 'configmap') {
      if (volume.configMap?.name === resourceName) return volume.name;
      if (volume.projected?.sources?.some((s) => s.configMap?.name === resourceName)) return volume.name;
    } else {
      if (volume.secret?.secretName === resourceName) return volume.name;
      if (volume.projected?.sources?.some((s) => s.secret?.name === resourceName)) return volume.name;
    }
  }
  return undefined;
}

export function findContainerWithVolumeMount(
  containers: k8s.V1Container[],
  volumeName: string,
): k8s.V1Container | undefined {
  return containers.find((c) => c.volumeMounts?.some((m) => m.name === volumeName));
}

function referencesResource(container: k8s.V1Container, kind: ConfigKind, resourceName: string): boolean {
  const fromEnv = container.env?.some((e) => {
    const ref = kind === 'configmap' ? e.valueFrom?.configMapKeyRef : e.valueFrom?.secretKeyRef;
    return ref?.name === resourceName;
  });
  if (fromEnv) return true;

  return (
    container.envFrom?.some((e) => {
      const ref = kind === 'configmap' ? e.configMapRef : e.secretRef;
      return ref?.name === resourceName;
    }) ?? false
  );
}

export function findContainerWithEnvReference(
  containers: k8s.V1Container[],
  kind: ConfigKind,
  resourceName: string,
): k8s.V1Container | undefined {
  return containers.find((c) => referencesResource(c, kind, resourceName));
}

/**
 * Locate the container that consumes the changed resource.
 *
 * Volume mounts are checked first, then env / envFrom references. A resource
 * used only by an init container resolves to the first regular container,
 * since only regular-container or pod-template changes roll the pods. With no
 * discoverable reference, a manual (non-auto) match still falls back to the
 * first regular container; an auto match returns undefined.
 */
export function findConsumingContainer<T extends k8s.KubernetesObject>(
  adapter: ResourceAdapter<T>,
  item: T,
  change: ChangeConfig,
  autoReload: boolean,
): k8s.V1Container | undefined {
  const containers = adapter.getContainers(item);
  const initContainers = adapter.getInitContainers(item);
  const first = containers[0];

  const volumeName = findVolumeName(adapter.getVolumes(item), change.kind, change.resourceName);
  if (volumeName !== undefined) {
    const mounting = findContainerWithVolumeMount(containers, volumeName);
    if (mounting) return mounting;
    if (findContainerWithVolumeMount(initContainers, volumeName)) return first;
  }

  const referencing = findContainerWithEnvReference(containers, change.kind, change.resourceName);
  if (referencing) return referencing;
  if (findContainerWithEnvReference(initContainers, change.kind, change.resourceName)) return first;

  return autoReload ? undefined : first;
}
